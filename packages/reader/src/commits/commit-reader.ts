/**
 * Commit object parsing
 *
 * Format:
 * ```
 * tree <tree-id>
 * parent <parent-id>
 * author <name> <email> <timestamp> <timezone>
 * committer <name> <email> <timestamp> <timezone>
 *
 * <message>
 * ```
 */

import type { FilesApi } from "@git-stamp/utils/files";
import { err, ok, type Result } from "@git-stamp/utils/result";
import { OBJ_COMMIT } from "../constants.js";
import { type GitReadError, MalformedObjectError } from "../errors.js";
import type { OffsetDateTime } from "../format/offset-date-time.js";
import { formatPersonName, getPersonDate, parsePersonIdent } from "../format/person-ident.js";
import { isValidObjectId, type ObjectId } from "../ids/object-id.js";
import { type LooseObjectReader, withLooseObject } from "../loose/loose-object-reader.js";

export interface CommitInfo {
  hash: ObjectId;
  /** "name <email>" */
  author: string;
  /** Author time in the author's timezone */
  date: OffsetDateTime;
  /** Raw text after the fields, possibly empty */
  message: string;
  /** Parent IDs in file order, first parent first */
  parents: ObjectId[];
}

async function decodeCommit(
  object: LooseObjectReader,
): Promise<Result<CommitInfo, GitReadError>> {
  const malformed = (message: string) =>
    err(new MalformedObjectError(`${message} (commit ${object.id})`, { path: object.path }));

  const type = await object.readHeader();
  if (!type.success) return type;
  if (type.value !== OBJ_COMMIT) {
    return malformed(`Expected a commit object, found ${type.value}`);
  }

  let author: { display: string; date: OffsetDateTime } | undefined;
  const parents: ObjectId[] = [];

  while (true) {
    const field = await object.readField();
    if (!field.success) return field;
    if (field.value === undefined) break;

    const { key, value } = field.value;
    switch (key) {
      case "author": {
        const ident = parsePersonIdent(value);
        if (!ident.success) return malformed(ident.error.message);
        const date = getPersonDate(ident.value);
        if (!date.success) return malformed(date.error.message);
        author = { display: formatPersonName(ident.value), date: date.value };
        break;
      }
      case "parent":
        if (!isValidObjectId(value)) {
          return malformed(`Invalid parent: ${value}`);
        }
        parents.push(value);
        break;
      // tree, committer, encoding, gpgsig, ... are not published
    }
  }

  if (author === undefined) {
    return malformed("Missing author");
  }

  const message = await object.readBody();
  if (!message.success) return message;

  return ok({
    hash: object.id,
    author: author.display,
    date: author.date,
    message: message.value,
    parents,
  });
}

/**
 * Decode the commit with the given ID from the loose object store.
 */
export async function readCommit(
  files: FilesApi,
  objectsDir: string,
  hash: ObjectId,
): Promise<Result<CommitInfo, GitReadError>> {
  return withLooseObject(files, objectsDir, hash, decodeCommit);
}
