export * from "./compression/index.js";
export * from "./result/index.js";
export * from "./streams/index.js";

// Note: files/ is exported via subpath "@git-stamp/utils/files"
