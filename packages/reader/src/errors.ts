/**
 * Repository read errors.
 */

export type GitReadErrorKind = "NotFound" | "MalformedObject";

export interface GitReadErrorOptions extends ErrorOptions {
  /** Path of the file or directory involved, when there is one */
  path?: string;
}

/**
 * Base error for everything that can go wrong reading repository metadata.
 */
export abstract class GitReadError extends Error {
  abstract readonly kind: GitReadErrorKind;
  readonly path?: string;

  constructor(message: string, options?: GitReadErrorOptions) {
    super(message, options);
    this.name = "GitReadError";
    this.path = options?.path;
  }
}

/**
 * The git directory, HEAD, a ref or an object file does not exist.
 */
export class NotFoundError extends GitReadError {
  readonly kind = "NotFound";

  constructor(message: string, options?: GitReadErrorOptions) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

/**
 * File content does not follow the expected format.
 */
export class MalformedObjectError extends GitReadError {
  readonly kind = "MalformedObject";

  constructor(message: string, options?: GitReadErrorOptions) {
    super(message, options);
    this.name = "MalformedObjectError";
  }
}
