import type { FilesApi } from "@git-stamp/utils/files";
import type { OffsetDateTime } from "./format/offset-date-time.js";

export interface GitReaderOptions {
  /** Filesystem to read the repository from */
  files: FilesApi;
  /** Absolute path of the directory to start looking for `.git` from */
  cwd: string;
  /**
   * Throw read failures to the caller instead of falling back to defaults.
   * @default false
   */
  strict?: boolean;
}

/**
 * The accessors a build-time generator reads repository metadata through.
 *
 * Values that cannot be read come back as null, false or an empty array.
 */
export interface GitMetadataSource {
  getCommitHash(): Promise<string | null>;
  getBranch(): Promise<string | null>;
  getIsDetached(): Promise<boolean>;
  getCommitAuthor(): Promise<string | null>;
  getCommitDate(): Promise<OffsetDateTime | null>;
  getCommitMessage(): Promise<string | null>;
  getCommitParents(): Promise<string[]>;
  getTags(): Promise<string[]>;
}
