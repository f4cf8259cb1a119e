export * from "./offset-date-time.js";
export * from "./person-ident.js";
