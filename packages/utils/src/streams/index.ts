export * from "./byte-reader.js";
export * from "./collect.js";
