/**
 * Repository metadata reader
 *
 * Reads HEAD, the HEAD commit and the tags on it straight from the `.git`
 * directory. Each of the three is read at most once per instance, however
 * many accessors ask for it and in whatever order.
 *
 * @example
 * ```ts
 * const reader = new GitReader({ files, cwd: "/work/project" });
 * const hash = await reader.getCommitHash();
 * const tags = await reader.getTags();
 * ```
 */

import type { FilesApi } from "@git-stamp/utils/files";
import type { Result } from "@git-stamp/utils/result";
import { type CommitInfo, readCommit } from "./commits/commit-reader.js";
import { OBJECTS_DIR } from "./constants.js";
import type { OffsetDateTime } from "./format/offset-date-time.js";
import { LazyResult } from "./lazy-result.js";
import { findGitDirectory } from "./refs/git-directory.js";
import { type HeadInfo, readHead } from "./refs/head-reader.js";
import { readTags, type TagInfo } from "./tags/tag-reader.js";
import type { GitMetadataSource, GitReaderOptions } from "./types.js";

export class GitReader implements GitMetadataSource {
  private readonly files: FilesApi;
  private readonly cwd: string;
  private readonly strict: boolean;

  private readonly gitDir: LazyResult<string>;
  private readonly head: LazyResult<HeadInfo>;
  private readonly commit: LazyResult<CommitInfo>;
  private readonly tags: LazyResult<TagInfo[]>;

  /** Errors already written out, so inherited failures are reported once */
  private readonly reported = new WeakSet<Error>();

  constructor(options: GitReaderOptions) {
    this.files = options.files;
    this.cwd = options.cwd;
    this.strict = options.strict ?? false;

    this.gitDir = this.lazy("git directory", () => findGitDirectory(this.files, this.cwd));
    this.head = this.lazy("HEAD", () => this.computeHead());
    this.commit = this.lazy("HEAD commit", () => this.computeCommit());
    this.tags = this.lazy("tags", () => this.computeTags());
  }

  async getCommitHash(): Promise<string | null> {
    const head = await this.resolve(this.head);
    return head?.commitHash ?? null;
  }

  async getBranch(): Promise<string | null> {
    const head = await this.resolve(this.head);
    return head?.branch ?? null;
  }

  async getIsDetached(): Promise<boolean> {
    const head = await this.resolve(this.head);
    return head?.isDetached ?? false;
  }

  async getCommitAuthor(): Promise<string | null> {
    const commit = await this.resolve(this.commit);
    return commit?.author ?? null;
  }

  async getCommitDate(): Promise<OffsetDateTime | null> {
    const commit = await this.resolve(this.commit);
    return commit ? { ...commit.date } : null;
  }

  async getCommitMessage(): Promise<string | null> {
    const commit = await this.resolve(this.commit);
    return commit?.message ?? null;
  }

  async getCommitParents(): Promise<string[]> {
    const commit = await this.resolve(this.commit);
    return commit ? [...commit.parents] : [];
  }

  async getTags(): Promise<string[]> {
    const tags = await this.resolve(this.tags);
    return tags ? tags.map((tag) => tag.tag) : [];
  }

  /**
   * Tags on the HEAD commit with their messages (undefined for lightweight tags).
   */
  async getTagDetails(): Promise<TagInfo[]> {
    const tags = await this.resolve(this.tags);
    return tags ? tags.map((tag) => ({ ...tag })) : [];
  }

  private async computeHead(): Promise<Result<HeadInfo, Error>> {
    const gitDir = await this.gitDir.get();
    if (!gitDir.success) return gitDir;
    return readHead(this.files, gitDir.value);
  }

  private async computeCommit(): Promise<Result<CommitInfo, Error>> {
    const gitDir = await this.gitDir.get();
    if (!gitDir.success) return gitDir;
    const head = await this.head.get();
    if (!head.success) return head;
    return readCommit(
      this.files,
      this.files.join(gitDir.value, OBJECTS_DIR),
      head.value.commitHash,
    );
  }

  private async computeTags(): Promise<Result<TagInfo[], Error>> {
    const gitDir = await this.gitDir.get();
    if (!gitDir.success) return gitDir;
    const head = await this.head.get();
    if (!head.success) return head;
    return readTags(
      this.files,
      gitDir.value,
      this.files.join(gitDir.value, OBJECTS_DIR),
      head.value.commitHash,
    );
  }

  private lazy<T>(label: string, compute: () => Promise<Result<T, Error>>): LazyResult<T> {
    return new LazyResult(compute, (error) => this.report(label, error));
  }

  private report(label: string, error: Error): void {
    if (this.strict || this.reported.has(error)) return;
    this.reported.add(error);
    console.warn(`git-stamp: could not read ${label}: ${error.message}`);
  }

  /** Apply the error mode to a cached value */
  private async resolve<T>(lazy: LazyResult<T>): Promise<T | undefined> {
    const result = await lazy.get();
    if (result.success) return result.value;
    if (this.strict) throw result.error;
    return undefined;
  }
}
