import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { LocalStorage, type LocalStorageOptions } from "./local.js";

const OPTIONS: LocalStorageOptions = {
  maxFileSize: 16,
  allowedExtensions: [],
  blockedExtensions: ["exe", "sh"],
};

async function collect(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

function source(...parts: string[]): Readable {
  return Readable.from(parts.map((p) => Buffer.from(p)));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("LocalStorage", () => {
  let dir: string;
  let storage: LocalStorage;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "file-store-local-"));
    storage = await LocalStorage.open(dir, OPTIONS);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("creates a missing root", async () => {
    const nested = path.join(dir, "a", "b");
    const s = await LocalStorage.open(nested, OPTIONS);
    assert.equal(s.root, await fs.realpath(nested));
  });

  it("round-trips content byte for byte", async () => {
    const stored = await storage.write("hello.txt", source("hello ", "world"), 11);
    assert.equal(stored.storedName, "hello.txt");
    assert.equal(stored.sizeBytes, 11);
    assert.ok(stored.createdAt instanceof Date);
    assert.equal(await collect(await storage.read("hello.txt")), "hello world");
  });

  it("accepts a declared size exactly at the maximum", async () => {
    const stored = await storage.write("max.bin", source("x".repeat(16)), 16);
    assert.equal(stored.sizeBytes, 16);
  });

  it("rejects a declared size one byte over the maximum before writing", async () => {
    await assert.rejects(storage.write("big.bin", source("x".repeat(17)), 17), {
      code: "FILE_TOO_LARGE",
      status: 413,
      stage: "validate",
    });
    assert.deepEqual(await fs.readdir(dir), []);
  });

  it("stops an undeclared upload once it passes the maximum", async () => {
    await assert.rejects(storage.write("big.bin", source("x".repeat(10), "y".repeat(10))), {
      code: "FILE_TOO_LARGE",
    });
    assert.deepEqual(await fs.readdir(dir), []);
  });

  it("rejects a body that does not match its declared size", async () => {
    await assert.rejects(storage.write("short.txt", source("abc"), 5), {
      code: "VALIDATION_FAILED",
      message: "Upload size mismatch: declared 5 bytes, received 3",
    });
    assert.deepEqual(await fs.readdir(dir), []);
  });

  it("rejects blocked extensions", async () => {
    await assert.rejects(storage.write("setup.exe", source("MZ")), {
      code: "UNSUPPORTED_TYPE",
      status: 415,
      message: "File type not allowed: .exe",
    });
  });

  it("only accepts allow-listed extensions when a list is set", async () => {
    const strict = await LocalStorage.open(dir, { ...OPTIONS, allowedExtensions: ["pdf"] });
    await strict.write("doc.pdf", source("%PDF"));
    await assert.rejects(strict.write("doc.txt", source("text")), { code: "UNSUPPORTED_TYPE" });
    await assert.rejects(strict.write("noext", source("text")), {
      code: "UNSUPPORTED_TYPE",
      message: "File type not allowed: (none)",
    });
  });

  it("removes the temp file when the source fails mid-stream", async () => {
    const failing = new Readable({ read() {} });
    failing.push(Buffer.from("part"));
    setTimeout(() => failing.destroy(new Error("client aborted")), 20);

    await assert.rejects(storage.write("partial.txt", failing), {
      code: "STORAGE_ERROR",
      status: 500,
      message: "Failed to save file",
      stage: "persist",
    });
    assert.deepEqual(await fs.readdir(dir), []);
  });

  it("never overwrites an existing file", async () => {
    await storage.write("keep.txt", source("first"));
    await assert.rejects(storage.write("keep.txt", source("second")), {
      code: "STORAGE_ERROR",
      message: "Stored name already in use",
    });
    assert.equal(await collect(await storage.read("keep.txt")), "first");
    assert.deepEqual(await fs.readdir(dir), ["keep.txt"]);
  });

  it("keeps a file that appears under the name while an upload is streaming", async () => {
    const slow = new Readable({ read() {} });
    const pending = storage.write("race.txt", slow);
    slow.push(Buffer.from("upload"));
    await sleep(20);
    await fs.writeFile(path.join(dir, "race.txt"), "already here");
    slow.push(null);

    await assert.rejects(pending, { code: "STORAGE_ERROR", message: "Stored name already in use" });
    assert.equal(await fs.readFile(path.join(dir, "race.txt"), "utf8"), "already here");
    assert.deepEqual(await fs.readdir(dir), ["race.txt"]);
  });

  it("lists regular files newest first", async () => {
    await storage.write("a.txt", source("a"));
    await sleep(20);
    await storage.write("b.txt", source("bb"));
    await sleep(20);
    await storage.write("c.txt", source("ccc"));

    const files = await storage.list();
    assert.deepEqual(
      files.map((f) => [f.storedName, f.sizeBytes]),
      [["c.txt", 3], ["b.txt", 2], ["a.txt", 1]],
    );
  });

  it("skips hidden files, directories and symlinks when listing", async () => {
    const outside = await fs.mkdtemp(path.join(os.tmpdir(), "file-store-outside-"));
    try {
      await fs.writeFile(path.join(outside, "secret.txt"), "secret");
      await storage.write("visible.txt", source("ok"));
      await fs.writeFile(path.join(dir, ".upload-abc.tmp"), "partial");
      await fs.mkdir(path.join(dir, "sub"));
      await fs.symlink(path.join(outside, "secret.txt"), path.join(dir, "link.txt"));

      const files = await storage.list();
      assert.deepEqual(files.map((f) => f.storedName), ["visible.txt"]);
      await assert.rejects(storage.read("link.txt"), { code: "NOT_FOUND" });
      await assert.rejects(storage.read("sub"), { code: "NOT_FOUND" });
    } finally {
      await fs.rm(outside, { recursive: true, force: true });
    }
  });

  it("reports missing files as NOT_FOUND", async () => {
    await assert.rejects(storage.read("missing.txt"), {
      code: "NOT_FOUND",
      status: 404,
      message: "File missing.txt not found",
      stage: "read",
    });
  });

  it("refuses names outside the root", async () => {
    await assert.rejects(storage.read("../etc/passwd"), { code: "INVALID_NAME", stage: "read" });
    await assert.rejects(storage.delete("../etc/passwd"), { code: "INVALID_NAME", stage: "delete" });
    await assert.rejects(storage.write("../evil.txt", source("x")), { code: "INVALID_NAME" });
  });

  it("deletes once and then reports NOT_FOUND on every later attempt", async () => {
    await storage.write("gone.txt", source("bye"));
    await storage.delete("gone.txt");
    await assert.rejects(storage.delete("gone.txt"), { code: "NOT_FOUND", stage: "delete" });
    await assert.rejects(storage.delete("gone.txt"), { code: "NOT_FOUND", stage: "delete" });
    await assert.rejects(storage.read("gone.txt"), { code: "NOT_FOUND" });
    assert.deepEqual(await storage.list(), []);
  });
});
