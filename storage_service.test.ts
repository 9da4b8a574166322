/// <reference types="node" />
/**
 * Scoped temp files and summary artifacts.
 */

import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test, { TestContext } from "node:test";
import { StorageService } from "./src/services/storage.service";
import { CleanupWarning } from "./src/types/guide.types";

function tempStorage(t: TestContext): { storage: StorageService; dir: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "storage-test-"));
  t.after(() => fs.rmSync(dir, { recursive: true, force: true }));
  return { storage: new StorageService(dir), dir };
}

test("withTempFile exposes the bytes and deletes the file afterwards", async (t) => {
  const { storage, dir } = tempStorage(t);
  let seenPath = "";

  const content = await storage.withTempFile(Buffer.from("hello"), ".txt", async (filePath) => {
    seenPath = filePath;
    assert.strictEqual(path.extname(filePath), ".txt");
    return fs.readFileSync(filePath, "utf8");
  });

  assert.strictEqual(content, "hello");
  assert.strictEqual(fs.existsSync(seenPath), false);
  assert.deepStrictEqual(fs.readdirSync(dir), []);
});

test("withTempFile deletes the file when the callback throws", async (t) => {
  const { storage, dir } = tempStorage(t);
  let seenPath = "";

  await assert.rejects(
    storage.withTempFile(Buffer.from("hello"), ".txt", async (filePath) => {
      seenPath = filePath;
      throw new Error("parser exploded");
    }),
    /parser exploded/
  );

  assert.strictEqual(fs.existsSync(seenPath), false);
  assert.deepStrictEqual(fs.readdirSync(dir), []);
});

test("a failed deletion is reported as a warning, not an error", async (t) => {
  const { storage } = tempStorage(t);
  const warnings: CleanupWarning[] = [];
  let seenPath = "";

  const result = await storage.withTempFile(
    Buffer.from("hello"),
    ".txt",
    async (filePath) => {
      seenPath = filePath;
      // a non-empty directory in its place cannot be removed without recursion
      fs.rmSync(filePath);
      fs.mkdirSync(filePath);
      fs.writeFileSync(path.join(filePath, "child.txt"), "x");
      return "parsed";
    },
    (warning) => warnings.push(warning)
  );

  assert.strictEqual(result, "parsed");
  assert.strictEqual(warnings.length, 1);
  assert.strictEqual(warnings[0].path, seenPath);
  assert.ok(warnings[0].message.startsWith("Couldn't delete temp file: "));
});

test("saveArtifact writes a uniquely named file that deleteFile removes", async (t) => {
  const { storage, dir } = tempStorage(t);

  const first = await storage.saveArtifact(Buffer.from("%PDF-1.3 one"));
  const second = await storage.saveArtifact(Buffer.from("%PDF-1.3 two"));

  assert.notStrictEqual(first.id, second.id);
  assert.notStrictEqual(first.path, second.path);
  assert.strictEqual(path.dirname(first.path), dir);
  assert.strictEqual(first.size, 12);
  assert.strictEqual((await storage.readFile(second.path)).toString(), "%PDF-1.3 two");

  assert.strictEqual(await storage.deleteFile(first.path), null);
  assert.strictEqual(fs.existsSync(first.path), false);
  assert.strictEqual(await storage.deleteFile(first.path), null);
});

test("getContentType maps known extensions", (t) => {
  const { storage } = tempStorage(t);

  assert.strictEqual(storage.getContentType("summary.PDF"), "application/pdf");
  assert.strictEqual(storage.getContentType("notes.txt"), "text/plain");
  assert.strictEqual(storage.getContentType("archive.zip"), "application/octet-stream");
});
