import { MemFilesApi } from "@git-stamp/utils/files";
import { ok } from "@git-stamp/utils/result";
import { beforeEach, describe, expect, it } from "vitest";
import {
  getLooseObjectPath,
  LooseObjectReader,
  withLooseObject,
} from "../../src/loose/loose-object-reader.js";
import { COMMIT_A, deflateRaw, encodeObject, OBJECTS, objectPath } from "../test-utils.js";

describe("LooseObjectReader", () => {
  let files: MemFilesApi;

  beforeEach(() => {
    files = new MemFilesApi();
  });

  async function open(id = COMMIT_A): Promise<LooseObjectReader> {
    const opened = await LooseObjectReader.open(files, OBJECTS, id);
    if (!opened.success) throw opened.error;
    return opened.value;
  }

  it("places objects under a two-character fan-out directory", () => {
    expect(getLooseObjectPath(files, OBJECTS, COMMIT_A)).toBe(
      "/work/project/.git/objects/a1/b2c3d4e5f60718293a4b5c6d7e8f9012345678",
    );
  });

  it("reads header, fields and body in order", async () => {
    await files.write(
      objectPath(COMMIT_A),
      encodeObject("commit", "tree abc\nauthor A <a@b.c> 1 +0000\n\nSubject\n\nBody\n"),
    );
    const object = await open();
    try {
      expect(await object.readHeader()).toEqual({ success: true, value: "commit" });
      expect(await object.readField()).toEqual({
        success: true,
        value: { key: "tree", value: "abc" },
      });
      expect(await object.readField()).toEqual({
        success: true,
        value: { key: "author", value: "A <a@b.c> 1 +0000" },
      });
      expect(await object.readField()).toEqual({ success: true, value: undefined });
      expect(await object.readBody()).toEqual({ success: true, value: "Subject\n\nBody\n" });
    } finally {
      await object.close();
    }
  });

  it("decodes across small chunk boundaries", async () => {
    files = new MemFilesApi({ chunkSize: 3 });
    await files.write(objectPath(COMMIT_A), encodeObject("tag", "object x\ntype commit\n\nhi"));
    const result = await withLooseObject<unknown[]>(files, OBJECTS, COMMIT_A, async (object) => {
      const type = await object.readHeader();
      if (!type.success) return type;
      const first = await object.readField();
      if (!first.success) return first;
      const second = await object.readField();
      if (!second.success) return second;
      const end = await object.readField();
      if (!end.success) return end;
      const body = await object.readBody();
      if (!body.success) return body;
      return ok([type.value, first.value, second.value, end.value, body.value]);
    });
    expect(result).toEqual({
      success: true,
      value: [
        "tag",
        { key: "object", value: "x" },
        { key: "type", value: "commit" },
        undefined,
        "hi",
      ],
    });
  });

  it("joins continuation lines onto the previous field", async () => {
    await files.write(
      objectPath(COMMIT_A),
      encodeObject(
        "commit",
        "tree abc\ngpgsig -----BEGIN-----\n line one\n \n -----END-----\nauthor A <a@b.c> 1 +0000\n\nmsg",
      ),
    );
    const object = await open();
    await object.readHeader();
    await object.readField();
    expect(await object.readField()).toEqual({
      success: true,
      value: { key: "gpgsig", value: "-----BEGIN-----\nline one\n\n-----END-----" },
    });
    expect(await object.readField()).toEqual({
      success: true,
      value: { key: "author", value: "A <a@b.c> 1 +0000" },
    });
    await object.close();
  });

  it("strips carriage returns from field lines", async () => {
    await files.write(objectPath(COMMIT_A), encodeObject("commit", "tree abc\r\n\r\nmsg"));
    const object = await open();
    await object.readHeader();
    expect(await object.readField()).toEqual({
      success: true,
      value: { key: "tree", value: "abc" },
    });
    expect(await object.readField()).toEqual({ success: true, value: undefined });
    await object.close();
  });

  it("returns an empty body when nothing follows the blank line", async () => {
    await files.write(objectPath(COMMIT_A), encodeObject("commit", "tree abc\n\n"));
    const object = await open();
    await object.readHeader();
    await object.readField();
    await object.readField();
    expect(await object.readBody()).toEqual({ success: true, value: "" });
    await object.close();
  });

  it("keeps a byte order mark at the start of the body", async () => {
    await files.write(objectPath(COMMIT_A), encodeObject("commit", "tree abc\n\n\uFEFFhello"));
    const object = await open();
    await object.readHeader();
    await object.readField();
    await object.readField();
    expect(await object.readBody()).toEqual({ success: true, value: "\uFEFFhello" });
    await object.close();
  });

  describe("failures", () => {
    it("reports a missing object file as NotFound", async () => {
      const result = await LooseObjectReader.open(files, OBJECTS, COMMIT_A);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("NotFound");
        expect(result.error.path).toBe(objectPath(COMMIT_A));
      }
    });

    it("rejects an invalid object ID before touching the store", async () => {
      const result = await LooseObjectReader.open(files, OBJECTS, "../../HEAD");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("MalformedObject");
      }
    });

    it("rejects a header without a space", async () => {
      await files.write(objectPath(COMMIT_A), deflateRaw("commit\0tree abc\n\n"));
      const object = await open();
      const result = await object.readHeader();
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("MalformedObject");
        expect(result.error.message).toBe(`Invalid object header: commit (object ${COMMIT_A})`);
      }
      await object.close();
    });

    it("rejects a header starting with a space", async () => {
      await files.write(objectPath(COMMIT_A), deflateRaw(" 12\0"));
      const object = await open();
      expect((await object.readHeader()).success).toBe(false);
      await object.close();
    });

    it("rejects a header without a NUL terminator", async () => {
      await files.write(objectPath(COMMIT_A), deflateRaw("commit 12"));
      const object = await open();
      const result = await object.readHeader();
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(`Object header is not terminated (object ${COMMIT_A})`);
      }
      await object.close();
    });

    it("rejects a field line without a space", async () => {
      await files.write(objectPath(COMMIT_A), encodeObject("commit", "tree\n\nmsg"));
      const object = await open();
      await object.readHeader();
      const result = await object.readField();
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(`Invalid object field: tree (object ${COMMIT_A})`);
      }
      await object.close();
    });

    it("rejects fields that run to the end of the stream", async () => {
      await files.write(objectPath(COMMIT_A), encodeObject("commit", "tree abc\n"));
      const object = await open();
      await object.readHeader();
      expect((await object.readField()).success).toBe(true);
      const result = await object.readField();
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("MalformedObject");
      }
      await object.close();
    });

    it("reports data that is not zlib as MalformedObject", async () => {
      await files.write(objectPath(COMMIT_A), "this is not compressed");
      const object = await open();
      const result = await object.readHeader();
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("MalformedObject");
        expect(result.error.cause).toBeInstanceOf(Error);
      }
      await object.close();
    });

    it("reports a truncated stream as MalformedObject", async () => {
      const full = encodeObject("commit", `tree abc\n\n${"message ".repeat(50)}`);
      await files.write(objectPath(COMMIT_A), full.slice(0, full.length - 8));
      const result = await withLooseObject<string>(files, OBJECTS, COMMIT_A, async (object) => {
        const type = await object.readHeader();
        if (!type.success) return type;
        while (true) {
          const field = await object.readField();
          if (!field.success) return field;
          if (field.value === undefined) break;
        }
        return object.readBody();
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("MalformedObject");
      }
    });
  });

  describe("read order", () => {
    it("refuses to read fields before the header", async () => {
      await files.write(objectPath(COMMIT_A), encodeObject("commit", "tree abc\n\n"));
      const object = await open();
      await expect(object.readField()).rejects.toThrow(
        `Loose object ${COMMIT_A}: cannot read fields while in header phase`,
      );
      await object.close();
    });

    it("refuses to read the body before the fields end", async () => {
      await files.write(objectPath(COMMIT_A), encodeObject("commit", "tree abc\n\n"));
      const object = await open();
      await object.readHeader();
      await expect(object.readBody()).rejects.toThrow(
        `Loose object ${COMMIT_A}: cannot read body while in fields phase`,
      );
      await object.close();
    });

    it("refuses to read after close", async () => {
      await files.write(objectPath(COMMIT_A), encodeObject("commit", "tree abc\n\n"));
      const object = await open();
      await object.close();
      await expect(object.readHeader()).rejects.toThrow(
        `Loose object ${COMMIT_A}: cannot read header while in done phase`,
      );
    });
  });

  describe("withLooseObject", () => {
    it("closes the reader when the callback throws", async () => {
      await files.write(objectPath(COMMIT_A), encodeObject("commit", "tree abc\n\n"));
      const seen: LooseObjectReader[] = [];
      await expect(
        withLooseObject(files, OBJECTS, COMMIT_A, async (object) => {
          seen.push(object);
          throw new Error("boom");
        }),
      ).rejects.toThrow("boom");
      expect(seen).toHaveLength(1);
      await expect(seen[0].readHeader()).rejects.toThrow(
        `Loose object ${COMMIT_A}: cannot read header while in done phase`,
      );
    });
  });
});
