/**
 * Loose object decoder
 *
 * Loose objects are stored as individual zlib-compressed files:
 * `objects/XX/YYYYYY...` where XX is the first 2 hex chars of the object ID.
 *
 * Decompressed content:
 * ```
 * <type> <size>\0
 * key value\n
 * key value\n
 *  continuation of the previous value\n
 * \n
 * free text body
 * ```
 *
 * The reader walks this layout in one pass over the inflate stream:
 * header, then fields until the blank line, then body.
 */

import { CompressionError, inflate } from "@git-stamp/utils/compression";
import { type FilesApi, isFile, isNotFoundError } from "@git-stamp/utils/files";
import { err, ok, type Result } from "@git-stamp/utils/result";
import { ByteReader } from "@git-stamp/utils/streams";
import { type GitReadError, MalformedObjectError, NotFoundError } from "../errors.js";
import { isValidObjectId, type ObjectId } from "../ids/object-id.js";

const NUL = 0x00;
const LF = 0x0a;
const CR = "\r";
const SPACE = 0x20;

/** One `key value` line of an object's field block */
export interface ObjectField {
  key: string;
  value: string;
}

type DecodePhase = "header" | "fields" | "body" | "done";

/**
 * Get the path of a loose object file.
 */
export function getLooseObjectPath(files: FilesApi, objectsDir: string, id: ObjectId): string {
  return files.join(objectsDir, id.substring(0, 2), id.substring(2));
}

/**
 * Sequential reader over one loose object.
 *
 * readHeader(), readField() (until it returns undefined) and readBody() must
 * be called in that order. Always close() the reader, or use
 * withLooseObject() which does it for you.
 */
export class LooseObjectReader {
  private phase: DecodePhase = "header";
  // Content is returned byte for byte, including a leading U+FEFF
  private readonly decoder = new TextDecoder("utf-8", { ignoreBOM: true });

  private constructor(
    readonly id: ObjectId,
    readonly path: string,
    private readonly reader: ByteReader,
  ) {}

  /**
   * Open the loose object with the given ID.
   *
   * Nothing is inflated until the first read.
   */
  static async open(
    files: FilesApi,
    objectsDir: string,
    id: string,
  ): Promise<Result<LooseObjectReader, GitReadError>> {
    if (!isValidObjectId(id)) {
      return err(new MalformedObjectError(`Invalid object ID: ${id}`));
    }
    const path = getLooseObjectPath(files, objectsDir, id);
    if (!(await isFile(files, path))) {
      return err(new NotFoundError(`Object not found: ${id}`, { path }));
    }
    const reader = ByteReader.from(inflate(files.read(path)));
    return ok(new LooseObjectReader(id, path, reader));
  }

  /**
   * Read the `<type> <size>` header.
   *
   * @returns The object type ("commit", "tag", "tree", "blob", ...)
   */
  async readHeader(): Promise<Result<string, GitReadError>> {
    this.expectPhase("header");
    return this.guard<string>(async () => {
      const bytes = await this.reader.readUntil(NUL);
      if (bytes === undefined) {
        return this.fail("Object header is not terminated");
      }
      const header = this.decoder.decode(bytes);
      const spacePos = header.indexOf(" ");
      if (spacePos <= 0) {
        return this.fail(`Invalid object header: ${header}`);
      }
      this.phase = "fields";
      return ok(header.substring(0, spacePos));
    });
  }

  /**
   * Read the next field.
   *
   * @returns The field, or undefined once the blank line before the body is reached
   */
  async readField(): Promise<Result<ObjectField | undefined, GitReadError>> {
    this.expectPhase("fields");
    return this.guard<ObjectField | undefined>(async () => {
      const line = await this.readLine();
      if (line === undefined) {
        return this.fail("Object ends before the end of its fields");
      }
      if (line.length === 0) {
        this.phase = "body";
        return ok(undefined);
      }
      const spacePos = line.indexOf(" ");
      if (spacePos <= 0) {
        return this.fail(`Invalid object field: ${line}`);
      }

      let value = line.substring(spacePos + 1);
      // Multi-line values (gpgsig, mergetag) continue on lines starting with a space
      while ((await this.reader.peek()) === SPACE) {
        const continuation = await this.readLine();
        if (continuation === undefined) {
          return this.fail("Object ends before the end of its fields");
        }
        value += `\n${continuation.substring(1)}`;
      }
      return ok({ key: line.substring(0, spacePos), value });
    });
  }

  /**
   * Read everything after the fields.
   */
  async readBody(): Promise<Result<string, GitReadError>> {
    this.expectPhase("body");
    return this.guard<string>(async () => {
      const body = await this.reader.readToEnd();
      this.phase = "done";
      return ok(this.decoder.decode(body));
    });
  }

  /**
   * Release the file handle and inflate state.
   */
  async close(): Promise<void> {
    this.phase = "done";
    await this.reader.close();
  }

  private async readLine(): Promise<string | undefined> {
    const bytes = await this.reader.readUntil(LF);
    if (bytes === undefined) return undefined;
    const line = this.decoder.decode(bytes);
    return line.endsWith(CR) ? line.slice(0, -1) : line;
  }

  private expectPhase(expected: DecodePhase): void {
    if (this.phase !== expected) {
      throw new Error(
        `Loose object ${this.id}: cannot read ${expected} while in ${this.phase} phase`,
      );
    }
  }

  private fail(message: string): Result<never, GitReadError> {
    this.phase = "done";
    return err(new MalformedObjectError(`${message} (object ${this.id})`, { path: this.path }));
  }

  /** Map I/O and inflate failures raised mid-stream to read errors */
  private async guard<T>(
    read: () => Promise<Result<T, GitReadError>>,
  ): Promise<Result<T, GitReadError>> {
    try {
      return await read();
    } catch (error) {
      if (isNotFoundError(error)) {
        this.phase = "done";
        return err(
          new NotFoundError(`Object not found: ${this.id}`, { path: this.path, cause: error }),
        );
      }
      if (error instanceof CompressionError) {
        this.phase = "done";
        return err(
          new MalformedObjectError(`Corrupt object ${this.id}: ${error.message}`, {
            path: this.path,
            cause: error,
          }),
        );
      }
      throw error;
    }
  }
}

/**
 * Open a loose object, hand it to `fn` and close it afterwards,
 * whether `fn` returns, fails or throws.
 */
export async function withLooseObject<T>(
  files: FilesApi,
  objectsDir: string,
  id: string,
  fn: (object: LooseObjectReader) => Promise<Result<T, GitReadError>>,
): Promise<Result<T, GitReadError>> {
  const opened = await LooseObjectReader.open(files, objectsDir, id);
  if (!opened.success) return opened;
  const object = opened.value;
  try {
    return await fn(object);
  } finally {
    await object.close();
  }
}
