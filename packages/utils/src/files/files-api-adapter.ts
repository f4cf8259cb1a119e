/**
 * Read-only FilesApi over a webrun-files backend.
 *
 * webrun-files reports missing paths through `stats()` rather than through
 * coded errors, so reads and listings check the entry first and raise
 * ENOENT, EISDIR or ENOTDIR the way the readers expect.
 */

import {
  basename,
  dirname,
  joinPath,
  FilesApi as WebrunFilesApi,
  type IFilesApi,
} from "@statewalker/webrun-files";
import { createFileError } from "./file-utils.js";
import type { FileInfo, FilesApi, FileStats } from "./files-api.js";

export interface FilesApiAdapterOptions {
  /** Largest chunk read() yields */
  chunkSize?: number;
}

export class FilesApiAdapter implements FilesApi {
  protected readonly backend: WebrunFilesApi;
  private readonly chunkSize: number;

  constructor(backend: IFilesApi, { chunkSize = 64 * 1024 }: FilesApiAdapterOptions = {}) {
    this.backend = backend instanceof WebrunFilesApi ? backend : new WebrunFilesApi(backend);
    this.chunkSize = chunkSize;
  }

  async *read(path: string): AsyncIterable<Uint8Array> {
    const key = joinPath(path);
    const info = await this.backend.stats(key);
    if (info === undefined) throw createFileError("ENOENT", `File not found: ${path}`);
    if (info.kind !== "file") throw createFileError("EISDIR", `Is a directory: ${path}`);
    for await (const chunk of this.backend.read(key)) {
      // Copies, so callers never write into the backend's buffers
      for (let at = 0; at < chunk.length; at += this.chunkSize) {
        yield chunk.slice(at, at + this.chunkSize);
      }
    }
  }

  async stats(path: string): Promise<FileStats | undefined> {
    const info = await this.backend.stats(joinPath(path));
    if (info === undefined) return undefined;
    return { kind: info.kind, size: info.size, lastModified: info.lastModified };
  }

  async *list(path: string): AsyncIterable<FileInfo> {
    const key = joinPath(path);
    const info = await this.backend.stats(key);
    if (info === undefined) throw createFileError("ENOENT", `Directory not found: ${path}`);
    if (info.kind !== "directory") throw createFileError("ENOTDIR", `Not a directory: ${path}`);
    for await (const entry of this.backend.list(key)) {
      yield { name: entry.name, path: this.join(path, entry.name), kind: entry.kind };
    }
  }

  async exists(path: string): Promise<boolean> {
    return this.backend.exists(joinPath(path));
  }

  join(...segments: string[]): string {
    return joinPath(...segments);
  }

  dirname(path: string): string {
    return dirname(path);
  }

  basename(path: string): string {
    return basename(path);
  }
}
