/**
 * Streaming zlib inflate used for loose objects.
 *
 * pako runs everywhere and is the default. Hosts with a native inflater
 * can install it once at startup through setCompression().
 */

import { inflatePako } from "./pako-inflate.js";
import type {
  ByteStream,
  CompressionImplementation,
  InflateFunction,
  InflateOptions,
} from "./types.js";

export * from "./pako-inflate.js";
export * from "./types.js";

let activeInflate: InflateFunction = inflatePako;

/**
 * Replace the inflater for every later inflate() call.
 * Fields left out of `impl` keep their current implementation.
 *
 * @example
 * ```ts
 * import { setCompression } from "@git-stamp/utils/compression";
 * import { createNodeCompression } from "@git-stamp/utils-node/compression";
 *
 * setCompression(createNodeCompression());
 * ```
 */
export function setCompression(impl: Partial<CompressionImplementation>): void {
  if (impl.inflate) activeInflate = impl.inflate;
}

/**
 * Inflate `stream` with the active implementation. Input is zlib-wrapped
 * unless `options.raw` is set. Corrupt input fails iteration with a
 * CompressionError.
 */
export function inflate(stream: ByteStream, options?: InflateOptions): ByteStream {
  return activeInflate(stream, options);
}
