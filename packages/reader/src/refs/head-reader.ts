/**
 * HEAD resolution
 *
 * HEAD is either symbolic (`ref: refs/heads/<branch>`) or a detached commit ID.
 * Loose ref files take precedence over packed-refs.
 */

import { type FilesApi, tryReadText } from "@git-stamp/utils/files";
import { err, ok, type Result } from "@git-stamp/utils/result";
import { HEAD, R_HEADS, SYMREF_PREFIX } from "../constants.js";
import { type GitReadError, MalformedObjectError, NotFoundError } from "../errors.js";
import { isValidObjectId, type ObjectId } from "../ids/object-id.js";
import { readPackedRefs } from "./packed-refs-reader.js";
import { isValidRefName } from "./ref-name.js";

/**
 * What HEAD points at.
 *
 * `branch` is set exactly when `isDetached` is false.
 */
export type HeadInfo =
  | {
      /** Trimmed HEAD content */
      ref: string;
      branch: string;
      commitHash: ObjectId;
      isDetached: false;
    }
  | {
      ref: string;
      branch?: undefined;
      commitHash: ObjectId;
      isDetached: true;
    };

/**
 * Read a ref's object ID, from its loose file or else from packed-refs.
 *
 * @param refName Full ref name, e.g. "refs/heads/main"; must be a valid ref name
 * @returns The trimmed value as written, or undefined if the ref does not exist
 */
export async function readRefValue(
  files: FilesApi,
  gitDir: string,
  refName: string,
): Promise<Result<string | undefined, MalformedObjectError>> {
  const loose = await tryReadText(files, files.join(gitDir, ...refName.split("/")));
  if (loose !== undefined) {
    return ok(loose.trim());
  }
  const packed = await readPackedRefs(files, gitDir);
  if (!packed.success) return packed;
  return ok(packed.value.get(refName));
}

/**
 * Resolve HEAD to a branch and commit, or a detached commit.
 */
export async function readHead(
  files: FilesApi,
  gitDir: string,
): Promise<Result<HeadInfo, GitReadError>> {
  const headPath = files.join(gitDir, HEAD);
  const content = await tryReadText(files, headPath);
  if (content === undefined) {
    return err(new NotFoundError("HEAD file not found", { path: headPath }));
  }
  const ref = content.trim();

  if (!ref.startsWith(SYMREF_PREFIX)) {
    if (!isValidObjectId(ref)) {
      return err(new MalformedObjectError(`Invalid detached HEAD: ${ref}`, { path: headPath }));
    }
    const detached: HeadInfo = { ref, commitHash: ref, isDetached: true };
    return ok(detached);
  }

  const refName = ref.substring(SYMREF_PREFIX.length).trim();
  const branch = refName.substring(R_HEADS.length);
  if (!refName.startsWith(R_HEADS) || branch.length === 0 || !isValidRefName(refName)) {
    return err(
      new MalformedObjectError(`HEAD does not point at a branch: ${refName}`, { path: headPath }),
    );
  }

  const value = await readRefValue(files, gitDir, refName);
  if (!value.success) return value;
  if (value.value === undefined) {
    return err(
      new NotFoundError(`Branch ref not found: ${refName}`, {
        path: files.join(gitDir, ...refName.split("/")),
      }),
    );
  }
  const commitHash = value.value;
  if (!isValidObjectId(commitHash)) {
    return err(new MalformedObjectError(`Invalid object ID in ${refName}: ${commitHash}`));
  }
  const attached: HeadInfo = { ref, branch, commitHash, isDetached: false };
  return ok(attached);
}
