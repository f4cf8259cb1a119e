import { type FilesApi, isDirectory, isFile } from "@git-stamp/utils/files";
import { err, ok, type Result } from "@git-stamp/utils/result";
import { GIT_DIR, HEAD, OBJECTS_DIR } from "../constants.js";
import { NotFoundError } from "../errors.js";

/**
 * Check whether `<dir>/.git` looks like a repository: a directory with a
 * HEAD file and an objects directory.
 */
export async function isGitDirectory(files: FilesApi, gitDir: string): Promise<boolean> {
  return (
    (await isDirectory(files, gitDir)) &&
    (await isFile(files, files.join(gitDir, HEAD))) &&
    (await isDirectory(files, files.join(gitDir, OBJECTS_DIR)))
  );
}

/**
 * Find the git directory for `startDir`, walking up through its parents.
 *
 * @param startDir Absolute path of the directory to start from
 * @returns Path of the first `.git` directory found
 */
export async function findGitDirectory(
  files: FilesApi,
  startDir: string,
): Promise<Result<string, NotFoundError>> {
  let directory = startDir;
  while (true) {
    const candidate = files.join(directory, GIT_DIR);
    if (await isGitDirectory(files, candidate)) {
      return ok(candidate);
    }
    const parent = files.dirname(directory);
    if (parent === directory) {
      return err(
        new NotFoundError(`No git repository found in ${startDir} or its parents`, {
          path: startDir,
        }),
      );
    }
    directory = parent;
  }
}
