import { concatBytes } from "./collect.js";

/**
 * Buffered reader over an async iterator of byte chunks.
 *
 * Supports delimiter-terminated reads, one-byte lookahead and draining the
 * rest of the stream. It buffers only what the current read needs.
 *
 * It calls `iterator.next()` directly instead of `for await`, so leftover
 * bytes survive between reads.
 * close() calls `iterator.return()`, releasing whatever the source holds
 * (file handles, inflate state) even when the stream was not fully read.
 */
export class ByteReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private done = false;
  private closed = false;

  constructor(private readonly iterator: AsyncIterator<Uint8Array>) {}

  /**
   * Create a reader over an async iterable.
   */
  static from(input: AsyncIterable<Uint8Array>): ByteReader {
    return new ByteReader(input[Symbol.asyncIterator]());
  }

  /** Pull one more chunk into the buffer. Returns false at end of stream. */
  private async fill(): Promise<boolean> {
    if (this.done) return false;
    const { value, done } = await this.iterator.next();
    if (done) {
      this.done = true;
      return false;
    }
    this.buffer = this.buffer.length === 0 ? value : concatBytes([this.buffer, value]);
    return true;
  }

  /**
   * Read bytes up to (not including) the delimiter and consume the delimiter.
   *
   * @returns The bytes before the delimiter, or undefined if the stream ends
   *   first (buffered bytes are kept for readToEnd()).
   */
  async readUntil(delimiter: number): Promise<Uint8Array | undefined> {
    let searchFrom = 0;
    while (true) {
      const pos = this.buffer.indexOf(delimiter, searchFrom);
      if (pos >= 0) {
        const result = this.buffer.slice(0, pos);
        this.buffer = this.buffer.subarray(pos + 1);
        return result;
      }
      searchFrom = this.buffer.length;
      if (!(await this.fill())) return undefined;
    }
  }

  /**
   * Look at the next byte without consuming it.
   *
   * @returns The byte value, or undefined at end of stream
   */
  async peek(): Promise<number | undefined> {
    while (this.buffer.length === 0) {
      if (!(await this.fill())) return undefined;
    }
    return this.buffer[0];
  }

  /** Read everything that is left. */
  async readToEnd(): Promise<Uint8Array> {
    const chunks: Uint8Array[] = [this.buffer];
    this.buffer = new Uint8Array(0);
    while (!this.done) {
      const { value, done } = await this.iterator.next();
      if (done) {
        this.done = true;
      } else {
        chunks.push(value);
      }
    }
    return concatBytes(chunks);
  }

  /** Whether the underlying iterator has ended and the buffer is empty. */
  get isExhausted(): boolean {
    return this.done && this.buffer.length === 0;
  }

  /**
   * Release the underlying iterator. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.buffer = new Uint8Array(0);
    if (!this.done) {
      this.done = true;
      await this.iterator.return?.();
    }
  }
}
