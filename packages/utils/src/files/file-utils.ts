/**
 * Whole-file helpers over the streaming FilesApi.
 */

import { collect } from "../streams/collect.js";
import type { FilesApi, FileStats } from "./files-api.js";

const utf8 = new TextDecoder();

/** Error thrown by file system backends, tagged with a Node-style code */
export type FileSystemError = Error & { code: string };

/**
 * Load a small file and decode it as UTF-8.
 */
export async function readText(files: FilesApi, path: string): Promise<string> {
  return utf8.decode(await collect(files.read(path)));
}

/**
 * Like readText(), but a missing file yields undefined.
 * Any other failure is rethrown.
 */
export async function tryReadText(files: FilesApi, path: string): Promise<string | undefined> {
  try {
    return await readText(files, path);
  } catch (error) {
    if (!isNotFoundError(error)) throw error;
    return undefined;
  }
}

async function kindOf(files: FilesApi, path: string): Promise<FileStats["kind"] | undefined> {
  return (await files.stats(path))?.kind;
}

export async function isFile(files: FilesApi, path: string): Promise<boolean> {
  return (await kindOf(files, path)) === "file";
}

export async function isDirectory(files: FilesApi, path: string): Promise<boolean> {
  return (await kindOf(files, path)) === "directory";
}

/** ENOENT from either backend */
export function isNotFoundError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

export function createFileError(code: string, message: string): FileSystemError {
  return Object.assign(new Error(message), { code });
}
