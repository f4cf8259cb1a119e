/** Repository metadata directory name */
export const GIT_DIR = ".git";

/** Special ref naming the current checkout */
export const HEAD = "HEAD";

/** Loose object store directory, relative to the git directory */
export const OBJECTS_DIR = "objects";

/** Packed refs file name */
export const PACKED_REFS = "packed-refs";

/** Magic string denoting symbolic reference */
export const SYMREF_PREFIX = "ref: ";

/** Common ref prefixes */
export const R_HEADS = "refs/heads/";
export const R_TAGS = "refs/tags/";

/** Object types this package decodes */
export const OBJ_COMMIT = "commit";
export const OBJ_TAG = "tag";
