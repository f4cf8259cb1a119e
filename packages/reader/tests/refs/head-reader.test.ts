import type { MemFilesApi } from "@git-stamp/utils/files";
import { beforeEach, describe, expect, it } from "vitest";
import { readHead, readRefValue } from "../../src/refs/head-reader.js";
import { COMMIT_A, COMMIT_B, createRepository, GIT_DIR } from "../test-utils.js";

describe("readHead", () => {
  let files: MemFilesApi;

  beforeEach(async () => {
    files = await createRepository({ head: COMMIT_A });
  });

  it("resolves a branch HEAD", async () => {
    expect(await readHead(files, GIT_DIR)).toEqual({
      success: true,
      value: {
        ref: "ref: refs/heads/main",
        branch: "main",
        commitHash: COMMIT_A,
        isDetached: false,
      },
    });
  });

  it("keeps slashes in branch names", async () => {
    await files.write(`${GIT_DIR}/HEAD`, "ref: refs/heads/feature/login\n");
    await files.write(`${GIT_DIR}/refs/heads/feature/login`, `${COMMIT_B}\n`);
    const result = await readHead(files, GIT_DIR);
    expect(result.success && result.value.branch).toBe("feature/login");
    expect(result.success && result.value.commitHash).toBe(COMMIT_B);
  });

  it("resolves a detached HEAD", async () => {
    await files.write(`${GIT_DIR}/HEAD`, `${COMMIT_B}\n`);
    expect(await readHead(files, GIT_DIR)).toEqual({
      success: true,
      value: { ref: COMMIT_B, commitHash: COMMIT_B, isDetached: true },
    });
  });

  it("sets branch exactly when HEAD is attached", async () => {
    const attached = await readHead(files, GIT_DIR);
    await files.write(`${GIT_DIR}/HEAD`, COMMIT_A);
    const detached = await readHead(files, GIT_DIR);
    if (!attached.success || !detached.success) throw new Error("HEAD did not resolve");
    expect([attached.value.isDetached, attached.value.branch]).toEqual([false, "main"]);
    expect([detached.value.isDetached, detached.value.branch]).toEqual([true, undefined]);
  });

  it("falls back to packed-refs when the branch file is missing", async () => {
    await files.write(`${GIT_DIR}/HEAD`, "ref: refs/heads/release\n");
    await files.write(
      `${GIT_DIR}/packed-refs`,
      `# pack-refs with: peeled\n${COMMIT_B} refs/heads/release\n`,
    );
    const result = await readHead(files, GIT_DIR);
    expect(result.success && result.value.commitHash).toBe(COMMIT_B);
  });

  it("prefers the loose ref over packed-refs", async () => {
    await files.write(`${GIT_DIR}/packed-refs`, `${COMMIT_B} refs/heads/main\n`);
    const result = await readHead(files, GIT_DIR);
    expect(result.success && result.value.commitHash).toBe(COMMIT_A);
  });

  describe("failures", () => {
    it("reports a missing HEAD file as NotFound", async () => {
      const result = await readHead(files, "/work/other/.git");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("NotFound");
        expect(result.error.path).toBe("/work/other/.git/HEAD");
      }
    });

    it("reports a missing branch ref as NotFound", async () => {
      await files.write(`${GIT_DIR}/HEAD`, "ref: refs/heads/unborn\n");
      const result = await readHead(files, GIT_DIR);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("NotFound");
        expect(result.error.message).toBe("Branch ref not found: refs/heads/unborn");
      }
    });

    it("rejects a symbolic ref outside refs/heads", async () => {
      await files.write(`${GIT_DIR}/HEAD`, "ref: refs/remotes/origin/main\n");
      const result = await readHead(files, GIT_DIR);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("MalformedObject");
      }
    });

    it("rejects a ref that escapes the git directory", async () => {
      await files.write(`${GIT_DIR}/HEAD`, "ref: refs/heads/../../../secrets\n");
      await files.write("/work/secrets", `${COMMIT_B}\n`);
      const result = await readHead(files, GIT_DIR);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("MalformedObject");
      }
    });

    it("rejects an empty branch name", async () => {
      await files.write(`${GIT_DIR}/HEAD`, "ref: refs/heads/\n");
      const result = await readHead(files, GIT_DIR);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("MalformedObject");
      }
    });

    it("rejects a branch ref holding an invalid hash", async () => {
      await files.write(`${GIT_DIR}/refs/heads/main`, "not-a-hash\n");
      const result = await readHead(files, GIT_DIR);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("MalformedObject");
        expect(result.error.message).toBe("Invalid object ID in refs/heads/main: not-a-hash");
      }
    });

    it("rejects a detached HEAD that is not a hash", async () => {
      await files.write(`${GIT_DIR}/HEAD`, "garbage\n");
      const result = await readHead(files, GIT_DIR);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("MalformedObject");
        expect(result.error.message).toBe("Invalid detached HEAD: garbage");
      }
    });
  });
});

describe("readRefValue", () => {
  it("returns undefined for a ref that exists nowhere", async () => {
    const files = await createRepository();
    expect(await readRefValue(files, GIT_DIR, "refs/heads/missing")).toEqual({
      success: true,
      value: undefined,
    });
  });
});
