/**
 * Node.js entry point
 *
 * @example
 * ```ts
 * import { createNodeGitReader } from "@git-stamp/reader/node";
 *
 * const reader = createNodeGitReader({ strict: true });
 * console.log(await reader.getCommitHash());
 * ```
 */

import { resolve } from "node:path";
import { setCompression } from "@git-stamp/utils/compression";
import type { FilesApi } from "@git-stamp/utils/files";
import { createNodeCompression } from "@git-stamp/utils-node/compression";
import { createNodeFilesApi } from "@git-stamp/utils-node/files";
import { GitReader } from "../git-reader.js";

export interface NodeGitReaderOptions {
  /** Directory to start from; defaults to process.cwd() */
  cwd?: string;
  strict?: boolean;
  /** Filesystem override; defaults to the real filesystem */
  files?: FilesApi;
}

/**
 * Create a GitReader over the local filesystem, with Node's zlib for inflate.
 */
export function createNodeGitReader(options: NodeGitReaderOptions = {}): GitReader {
  setCompression(createNodeCompression());
  return new GitReader({
    files: options.files ?? createNodeFilesApi(),
    cwd: resolve(options.cwd ?? process.cwd()),
    strict: options.strict,
  });
}
