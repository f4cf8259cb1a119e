/**
 * FilesApi on the local disk, backed by webrun-files' NodeFilesApi.
 *
 * Paths are POSIX paths under `rootDir`, which defaults to the filesystem
 * root so absolute paths address the disk directly.
 */

import * as fs from "node:fs/promises";
import { FilesApiAdapter, type FilesApi, type FilesApiAdapterOptions } from "@git-stamp/utils/files";
import { NodeFilesApi as WebrunNodeFilesApi } from "@statewalker/webrun-files";

export interface NodeFilesApiOptions extends FilesApiAdapterOptions {
  /** Directory that every path resolves under */
  rootDir?: string;
}

export class NodeFilesApi extends FilesApiAdapter {
  constructor({ rootDir = "/", ...options }: NodeFilesApiOptions = {}) {
    super(new WebrunNodeFilesApi({ fs, rootDir }), options);
  }
}

/**
 * @example
 * ```ts
 * const reader = new GitReader({ files: createNodeFilesApi(), cwd: process.cwd() });
 * ```
 */
export function createNodeFilesApi(options?: NodeFilesApiOptions): FilesApi {
  return new NodeFilesApi(options);
}
