import type { OffsetDateTime } from "./format/offset-date-time.js";
import type { GitMetadataSource } from "./types.js";

/**
 * Everything a build stamp carries, with defaults already applied.
 */
export interface GitSnapshot {
  hash: string | null;
  branch: string | null;
  isDetached: boolean;
  author: string | null;
  date: OffsetDateTime | null;
  message: string | null;
  parents: string[];
  tags: string[];
}

/** GitSnapshot with every level read-only */
export type FrozenGitSnapshot = Readonly<Omit<GitSnapshot, "parents" | "tags">> & {
  readonly parents: readonly string[];
  readonly tags: readonly string[];
};

/** Snapshot of a directory that is not inside a repository */
export const EMPTY_GIT_SNAPSHOT: FrozenGitSnapshot = Object.freeze({
  hash: null,
  branch: null,
  isDetached: false,
  author: null,
  date: null,
  message: null,
  parents: Object.freeze([]),
  tags: Object.freeze([]),
});

/**
 * Read all accessors at once.
 */
export async function readGitSnapshot(source: GitMetadataSource): Promise<GitSnapshot> {
  const [hash, branch, isDetached, author, date, message, parents, tags] = await Promise.all([
    source.getCommitHash(),
    source.getBranch(),
    source.getIsDetached(),
    source.getCommitAuthor(),
    source.getCommitDate(),
    source.getCommitMessage(),
    source.getCommitParents(),
    source.getTags(),
  ]);
  return { hash, branch, isDetached, author, date, message, parents, tags };
}
