export * from "./git-directory.js";
export * from "./head-reader.js";
export * from "./packed-refs-reader.js";
export * from "./ref-name.js";
