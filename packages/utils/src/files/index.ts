/**
 * File access for readers. The disk-backed FilesApi lives in
 * @git-stamp/utils-node.
 */

export * from "./file-utils.js";
export * from "./files-api.js";
export * from "./files-api-adapter.js";
export * from "./mem-files-api.js";
