/**
 * Tag resolution
 *
 * Annotated tag object format:
 * ```
 * object <target-id>
 * type <target-type>
 * tag <tag-name>
 * tagger <name> <email> <timestamp> <timezone>
 *
 * <message>
 * ```
 *
 * Only tags that point at the HEAD commit are reported. Tags in nested
 * namespaces (refs/tags/release/v1) are not enumerated.
 */

import { type FilesApi, isDirectory, tryReadText } from "@git-stamp/utils/files";
import { err, ok, type Result } from "@git-stamp/utils/result";
import { OBJ_COMMIT, OBJ_TAG, R_TAGS } from "../constants.js";
import { type GitReadError, MalformedObjectError } from "../errors.js";
import { isValidObjectId, type ObjectId } from "../ids/object-id.js";
import { type LooseObjectReader, withLooseObject } from "../loose/loose-object-reader.js";
import { readPackedRefs } from "../refs/packed-refs-reader.js";

export interface TagInfo {
  /** Target commit */
  commit: ObjectId;
  /** Tag name without the refs/tags/ prefix */
  tag: string;
  /** Tag message; undefined for lightweight tags */
  message?: string;
}

/** A tag ref and its trimmed value */
export interface TagRef {
  name: string;
  value: string;
}

/**
 * List the tag refs directly under refs/tags, plus packed tag refs that
 * have no loose file, sorted by name.
 *
 * An unparsable packed-refs file contributes no tags; loose tags are
 * still listed.
 */
export async function listTagRefs(
  files: FilesApi,
  gitDir: string,
): Promise<Result<TagRef[], GitReadError>> {
  const refs = new Map<string, string>();

  const tagsDir = files.join(gitDir, "refs", "tags");
  if (await isDirectory(files, tagsDir)) {
    for await (const entry of files.list(tagsDir)) {
      if (entry.kind !== "file") continue;
      const content = await tryReadText(files, entry.path);
      if (content !== undefined) {
        refs.set(entry.name, content.trim());
      }
    }
  }

  const packed = await readPackedRefs(files, gitDir);
  const packedRefs = packed.success ? packed.value : new Map<string, string>();
  for (const [refName, value] of packedRefs) {
    if (!refName.startsWith(R_TAGS)) continue;
    const name = refName.substring(R_TAGS.length);
    if (name.length === 0 || name.includes("/") || refs.has(name)) continue;
    refs.set(name, value);
  }

  return ok(
    [...refs]
      .map(([name, value]) => ({ name, value }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)),
  );
}

async function decodeAnnotatedTag(
  object: LooseObjectReader,
  name: string,
  headCommit: ObjectId,
): Promise<Result<TagInfo | undefined, GitReadError>> {
  const type = await object.readHeader();
  if (!type.success) return type;
  if (type.value !== OBJ_TAG) return ok(undefined);

  let target: string | undefined;
  let targetType: string | undefined;
  while (true) {
    const field = await object.readField();
    if (!field.success) return field;
    if (field.value === undefined) break;
    const { key, value } = field.value;
    if (key === "object") target = value;
    else if (key === "type") targetType = value;
  }

  if (target === undefined) {
    return err(
      new MalformedObjectError(`Tag object ${object.id} has no object field`, {
        path: object.path,
      }),
    );
  }
  if (!isValidObjectId(target)) {
    return err(
      new MalformedObjectError(`Invalid tag target in ${object.id}: ${target}`, {
        path: object.path,
      }),
    );
  }
  if (target !== headCommit || targetType !== OBJ_COMMIT) {
    return ok(undefined);
  }

  const message = await object.readBody();
  if (!message.success) return message;
  return ok({ commit: target, tag: name, message: message.value });
}

/**
 * Resolve one tag ref against the HEAD commit.
 *
 * @returns The tag, or undefined when it does not point at `headCommit`
 */
export async function resolveTag(
  files: FilesApi,
  objectsDir: string,
  ref: TagRef,
  headCommit: ObjectId,
): Promise<Result<TagInfo | undefined, GitReadError>> {
  if (ref.value === headCommit) {
    return ok({ commit: ref.value, tag: ref.name });
  }
  if (!isValidObjectId(ref.value)) {
    return err(new MalformedObjectError(`Invalid object ID in tag ${ref.name}: ${ref.value}`));
  }
  return withLooseObject(files, objectsDir, ref.value, (object) =>
    decodeAnnotatedTag(object, ref.name, headCommit),
  );
}

/**
 * Collect the tags that point at the HEAD commit.
 *
 * Tags that cannot be resolved are left out.
 */
export async function readTags(
  files: FilesApi,
  gitDir: string,
  objectsDir: string,
  headCommit: ObjectId,
): Promise<Result<TagInfo[], GitReadError>> {
  const refs = await listTagRefs(files, gitDir);
  if (!refs.success) return refs;

  const tags: TagInfo[] = [];
  for (const ref of refs.value) {
    const resolved = await resolveTag(files, objectsDir, ref, headCommit);
    if (resolved.success && resolved.value !== undefined) {
      tags.push(resolved.value);
    }
  }
  return ok(tags);
}
