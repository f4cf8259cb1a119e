/**
 * Read-only view of a file tree.
 *
 * Readers see a repository only through this interface. NodeFilesApi backs
 * it with the real disk, MemFilesApi with an in-memory tree.
 */

export type EntryKind = "file" | "directory";

export interface FileStats {
  kind: EntryKind;
  /** Bytes; set for files */
  size?: number;
  /** Epoch milliseconds */
  lastModified?: number;
}

/** One child yielded by list() */
export interface FileInfo {
  name: string;
  /** `join(parent, name)` */
  path: string;
  kind: EntryKind;
}

/**
 * Reads are streaming only; readText() and tryReadText() in file-utils
 * load small files whole.
 */
export interface FilesApi {
  /**
   * Stream a file in chunks.
   *
   * The file is opened on first iteration and closed when iteration ends
   * for any reason, including an early `return()`. A missing file fails
   * iteration with code "ENOENT".
   */
  read(path: string): AsyncIterable<Uint8Array>;

  /** undefined when nothing exists at `path` */
  stats(path: string): Promise<FileStats | undefined>;

  /** Immediate children; fails with "ENOENT" for a missing directory */
  list(path: string): AsyncIterable<FileInfo>;

  exists(path: string): Promise<boolean>;

  join(...segments: string[]): string;

  /** A root is its own dirname, which ends upward directory walks */
  dirname(path: string): string;

  basename(path: string): string;
}
