/** Chunks of bytes, pulled on demand */
export type ByteStream = AsyncIterable<Uint8Array>;

export interface InflateOptions {
  /** Input is bare DEFLATE with no zlib header or Adler-32 trailer */
  raw?: boolean;
}

/** Raised while inflating input that is not a valid zlib stream */
export class CompressionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CompressionError";
  }
}

/**
 * Inflater contract. When the consumer stops early, an implementation
 * must stop pulling from `stream` and call its `return()`.
 */
export type InflateFunction = (stream: ByteStream, options?: InflateOptions) => ByteStream;

/** What setCompression() installs */
export interface CompressionImplementation {
  inflate: InflateFunction;
}
