export * from "./commits/commit-reader.js";
export * from "./constants.js";
export * from "./errors.js";
export * from "./format/index.js";
export * from "./git-reader.js";
export * from "./ids/index.js";
export * from "./lazy-result.js";
export * from "./loose/loose-object-reader.js";
export * from "./refs/index.js";
export * from "./snapshot.js";
export * from "./tags/tag-reader.js";
export * from "./types.js";
