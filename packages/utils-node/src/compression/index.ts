/**
 * Inflate backed by node:zlib, for installing through setCompression().
 *
 * @example
 * ```ts
 * import { setCompression } from "@git-stamp/utils/compression";
 * import { createNodeCompression } from "@git-stamp/utils-node/compression";
 *
 * setCompression(createNodeCompression());
 * ```
 */
import { pipeline, Readable } from "node:stream";
import zlib from "node:zlib";
import type {
  ByteStream,
  CompressionImplementation,
  InflateOptions,
} from "@git-stamp/utils/compression";
import { CompressionError } from "@git-stamp/utils/compression";

/**
 * Abandoning the iterator tears down both the inflater and the source,
 * and only returns once the source has closed its file.
 */
export async function* inflateNode(
  stream: ByteStream,
  options?: InflateOptions,
): ByteStream {
  const inflater = options?.raw ? zlib.createInflateRaw() : zlib.createInflate();
  const source = Readable.from(stream, { objectMode: false });
  const sourceClosed = new Promise<void>((resolve) => {
    source.once("close", () => resolve());
  });

  // Errors on either side surface through iteration of the inflater
  pipeline(source, inflater, (error) => {
    if (error) inflater.destroy(error);
  });

  try {
    for await (const chunk of inflater) {
      if (!(chunk instanceof Uint8Array)) {
        throw new CompressionError("Unexpected non-binary inflate output");
      }
      yield new Uint8Array(chunk);
    }
  } catch (error) {
    if (error instanceof CompressionError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new CompressionError(`Decompression failed: ${message}`, { cause: error });
  } finally {
    inflater.destroy();
    source.destroy();
    await sourceClosed;
  }
}

export function createNodeCompression(): CompressionImplementation {
  return { inflate: inflateNode };
}
