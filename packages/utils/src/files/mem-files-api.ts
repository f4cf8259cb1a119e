/**
 * In-memory FilesApi for fixtures, backed by webrun-files' MemFilesApi.
 */

import { dirname, joinPath, MemFilesApi as WebrunMemFilesApi } from "@statewalker/webrun-files";
import { FilesApiAdapter, type FilesApiAdapterOptions } from "./files-api-adapter.js";
import { createFileError } from "./file-utils.js";

export type MemFilesApiOptions = FilesApiAdapterOptions;

/**
 * write() and mkdir() populate the tree; the FilesApi surface only reads.
 */
export class MemFilesApi extends FilesApiAdapter {
  constructor(options: MemFilesApiOptions = {}) {
    super(new WebrunMemFilesApi(), options);
  }

  /** Store `content` at `path`, creating missing parent directories */
  async write(path: string, content: string | Uint8Array): Promise<void> {
    const key = joinPath(path);
    if (key === "/") throw createFileError("EINVAL", `Invalid path: ${path}`);
    const data = typeof content === "string" ? new TextEncoder().encode(content) : content.slice();
    await this.backend.mkdir(dirname(key));
    await this.backend.write(key, [data]);
  }

  async mkdir(path: string): Promise<void> {
    await this.backend.mkdir(joinPath(path));
  }
}

/**
 * Build a MemFilesApi holding the given files.
 *
 * @example
 * ```ts
 * const files = await createInMemoryFilesApi({
 *   "/repo/.git/HEAD": "ref: refs/heads/main\n",
 * });
 * ```
 */
export async function createInMemoryFilesApi(
  initialFiles: Record<string, string | Uint8Array> = {},
  options?: MemFilesApiOptions,
): Promise<MemFilesApi> {
  const files = new MemFilesApi(options);
  for (const [path, content] of Object.entries(initialFiles)) {
    await files.write(path, content);
  }
  return files;
}
