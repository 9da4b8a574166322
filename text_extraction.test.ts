/// <reference types="node" />
/**
 * Text extraction and whitespace normalization for uploaded notes.
 *
 * Key coverage:
 * - Line-break collapsing and idempotence.
 * - Plain text, DOCX, PDF and broken PDF inputs.
 * - Temp files are gone after every extraction, failed or not.
 */

import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test, { TestContext } from "node:test";
import { Document, Packer, Paragraph } from "docx";
import { jsPDF } from "jspdf";
import { ExtractionService, normalizeText } from "./src/services/extraction.service";
import { StorageService } from "./src/services/storage.service";
import { ExtractionError } from "./src/utils/errors";

function tempExtractor(t: TestContext): { extractor: ExtractionService; dir: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "extract-test-"));
  t.after(() => fs.rmSync(dir, { recursive: true, force: true }));
  return { extractor: new ExtractionService(new StorageService(dir)), dir };
}

test("normalizeText collapses line breaks and whitespace runs", () => {
  const raw = "line one\nline two\n\nnext   para\t end\n";
  assert.strictEqual(normalizeText(raw), "line one line two next para end");
});

test("normalizeText is idempotent", () => {
  const samples = ["  a\nb\n\n\nc  ", "already clean", "tabs\tand\r\nwindows\r\nbreaks"];
  for (const sample of samples) {
    const once = normalizeText(sample);
    assert.strictEqual(normalizeText(once), once);
  }
});

test("plain text is decoded and normalized", async (t) => {
  const { extractor, dir } = tempExtractor(t);
  const result = await extractor.extractText(Buffer.from("I have a mild headache\nfor two days\n"), "text");

  assert.deepStrictEqual(result, {
    text: "I have a mild headache for two days",
    format: "text",
    warnings: [],
  });
  assert.deepStrictEqual(fs.readdirSync(dir), []);
});

test("invalid UTF-8 fails with an ExtractionError and leaves no temp file", async (t) => {
  const { extractor, dir } = tempExtractor(t);

  await assert.rejects(
    extractor.extractText(Buffer.from([0xff, 0xfe, 0xfd]), "text"),
    (error: unknown) =>
      error instanceof ExtractionError && error.message.startsWith("Error reading file: ")
  );
  assert.deepStrictEqual(fs.readdirSync(dir), []);
});

test("a corrupt PDF fails with an ExtractionError and leaves no temp file", async (t) => {
  const { extractor, dir } = tempExtractor(t);

  await assert.rejects(
    extractor.extractText(Buffer.from("this is not a pdf document"), "pdf"),
    ExtractionError
  );
  assert.deepStrictEqual(fs.readdirSync(dir), []);
});

test("PDF lines and pages are joined in order", async (t) => {
  const { extractor, dir } = tempExtractor(t);
  const doc = new jsPDF({ unit: "mm", format: "a4" });
  doc.text("Persistent cough", 10, 20);
  doc.text("since Monday", 10, 30);
  doc.addPage();
  doc.text("Page two text", 10, 20);
  const bytes = Buffer.from(doc.output("arraybuffer"));

  const result = await extractor.extractText(bytes, "pdf");

  assert.deepStrictEqual(result, {
    text: "Persistent cough since Monday Page two text",
    format: "pdf",
    warnings: [],
  });
  assert.deepStrictEqual(fs.readdirSync(dir), []);
});

test("DOCX paragraphs are joined in order", async (t) => {
  const { extractor, dir } = tempExtractor(t);
  const doc = new Document({
    sections: [{ children: [new Paragraph("Persistent cough"), new Paragraph("since Monday")] }],
  });
  const bytes = await Packer.toBuffer(doc);

  const result = await extractor.extractText(bytes, "docx");

  assert.strictEqual(result.text, "Persistent cough since Monday");
  assert.strictEqual(result.format, "docx");
  assert.deepStrictEqual(fs.readdirSync(dir), []);
});

test("detectFormat uses the MIME type, falling back to the file extension", (t) => {
  const { extractor } = tempExtractor(t);

  assert.strictEqual(extractor.detectFormat("application/pdf", "notes"), "pdf");
  assert.strictEqual(
    extractor.detectFormat(
      "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
      "notes"
    ),
    "docx"
  );
  assert.strictEqual(extractor.detectFormat("application/octet-stream", "notes.DOCX"), "docx");
  assert.strictEqual(extractor.detectFormat("", "scan.pdf"), "pdf");
  assert.strictEqual(extractor.detectFormat("text/markdown", "notes.md"), "text");
});
