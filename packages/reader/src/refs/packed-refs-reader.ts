/**
 * Packed refs file reader
 *
 * Format:
 * ```
 * # pack-refs with: peeled fully-peeled sorted
 * <sha1> refs/heads/main
 * <sha1> refs/tags/v1.0.0
 * ^<peeled-sha1>
 * ```
 *
 * Lines starting with ^ hold the peeled target of the annotated tag on the
 * line above. Only the ref values themselves are needed here.
 */

import { tryReadText } from "@git-stamp/utils/files";
import type { FilesApi } from "@git-stamp/utils/files";
import { err, ok, type Result } from "@git-stamp/utils/result";
import { PACKED_REFS } from "../constants.js";
import { MalformedObjectError } from "../errors.js";

/**
 * Parse packed-refs content into a map of ref name to object ID.
 *
 * IDs are returned as written; callers validate them before use.
 */
export function parsePackedRefs(
  content: string,
  path = PACKED_REFS,
): Result<Map<string, string>, MalformedObjectError> {
  const refs = new Map<string, string>();

  for (const rawLine of content.split("\n")) {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (line.length === 0 || line.startsWith("#") || line.startsWith("^")) {
      continue;
    }
    const spaceIdx = line.indexOf(" ");
    if (spaceIdx <= 0 || spaceIdx === line.length - 1) {
      return err(new MalformedObjectError(`Invalid packed-refs line: ${line}`, { path }));
    }
    refs.set(line.substring(spaceIdx + 1), line.substring(0, spaceIdx));
  }

  return ok(refs);
}

/**
 * Read packed-refs from the git directory.
 *
 * A missing file is an empty set of refs.
 */
export async function readPackedRefs(
  files: FilesApi,
  gitDir: string,
): Promise<Result<Map<string, string>, MalformedObjectError>> {
  const path = files.join(gitDir, PACKED_REFS);
  const content = await tryReadText(files, path);
  if (content === undefined) {
    return ok(new Map());
  }
  return parsePackedRefs(content, path);
}
