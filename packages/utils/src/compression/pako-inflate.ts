/**
 * Pako-based streaming inflate
 *
 * Works in any JavaScript runtime. Input chunks are pushed into a single
 * pako.Inflate instance and output is yielded as soon as pako emits it,
 * so the compressed input is never buffered as a whole.
 */

import pako from "pako";
import {
  type ByteStream,
  CompressionError,
  type CompressionImplementation,
  type InflateOptions,
} from "./types.js";

/** zlib return code for success */
const Z_OK = 0;

/**
 * Decompress a stream using pako
 */
export async function* inflatePako(
  stream: ByteStream,
  options?: InflateOptions,
): ByteStream {
  const inflator = new pako.Inflate({ raw: options?.raw ?? false });

  let output: Uint8Array[] = [];
  let endStatus: number | undefined;

  inflator.onData = (chunk) => {
    if (!(chunk instanceof Uint8Array)) {
      throw new CompressionError("Unexpected non-binary inflate output");
    }
    output.push(chunk);
  };
  inflator.onEnd = (status) => {
    endStatus = status;
  };

  const drain = (): Uint8Array[] => {
    const chunks = output;
    output = [];
    return chunks;
  };

  const checkStatus = (): void => {
    if (endStatus !== undefined && endStatus !== Z_OK) {
      throw new CompressionError(`Decompression failed with zlib status ${endStatus}`);
    }
  };

  for await (const chunk of stream) {
    if (endStatus !== undefined) break;
    inflator.push(chunk, false);
    checkStatus();
    yield* drain();
  }

  if (endStatus === undefined) {
    inflator.push(new Uint8Array(0), true);
    checkStatus();
    yield* drain();
  }

  if (endStatus === undefined) {
    throw new CompressionError("Decompression failed: unexpected end of compressed stream");
  }
}

/**
 * Create a pako-based compression implementation.
 *
 * This is the default; it works universally in Node.js and browsers.
 */
export function createPakoCompression(): CompressionImplementation {
  return {
    inflate: inflatePako,
  };
}
