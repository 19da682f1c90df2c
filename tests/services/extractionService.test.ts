import test from "node:test";
import assert from "node:assert/strict";
import JSZip from "jszip";
import { ExtractionService } from "../../src/services/extractionService.js";

const service = new ExtractionService(64 * 1024, 5000);

function encode(text: string): string {
  return Buffer.from(text, "utf8").toString("base64");
}

test("Extraction Service - Plain Text", async () => {
  const text = await service.extract(encode("  Notes on cell biology.\n"));
  assert.equal(text, "Notes on cell biology.");
});

test("Extraction Service - Data URL Prefix", async () => {
  const text = await service.extract(`data:text/plain;base64,${encode("Ribosomes build proteins.")}`);
  assert.equal(text, "Ribosomes build proteins.");
});

test("Extraction Service - DOCX Paragraphs", async () => {
  const zip = new JSZip();
  zip.file(
    "word/document.xml",
    "<w:document><w:body>" +
      "<w:p><w:r><w:t>Cell biology</w:t></w:r></w:p>" +
      "<w:p><w:r><w:t>Mitosis &amp; meiosis</w:t></w:r></w:p>" +
      "</w:body></w:document>"
  );
  const buffer = await zip.generateAsync({ type: "nodebuffer" });

  const text = await service.extract(buffer.toString("base64"));
  assert.equal(text, "Cell biology\nMitosis & meiosis");
});

test("Extraction Service - ZIP Without Document", async () => {
  const zip = new JSZip();
  zip.file("notes.txt", "hello");
  const buffer = await zip.generateAsync({ type: "nodebuffer" });

  await assert.rejects(service.extract(buffer.toString("base64")), {
    message: "ZIP archive is not a DOCX document",
  });
});

test("Extraction Service - Detect Kind", () => {
  assert.equal(service.detectKind(Buffer.from("%PDF-1.7")), "pdf");
  assert.equal(service.detectKind(Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x00])), "docx");
  assert.equal(service.detectKind(Buffer.from("plain")), "text");
});

test("Extraction Service - Invalid Base64", async () => {
  await assert.rejects(service.extract("@@not base64@@"), {
    message: "Document data is not valid base64",
  });
});

test("Extraction Service - Whitespace Only Text", async () => {
  await assert.rejects(service.extract(encode("   \n\t ")), {
    message: "No extractable text found in document",
  });
});

test("Extraction Service - Undecodable Bytes", async () => {
  const binary = Buffer.from([0xff, 0xfe, 0xfd, 0x00, 0x81]).toString("base64");
  await assert.rejects(service.extract(binary), {
    message: "Unsupported document format. Supported: PDF, DOCX, UTF-8 text",
  });
});

test("Extraction Service - Size Limit", async () => {
  const small = new ExtractionService(1024 * 1024, 5000);
  await assert.rejects(small.extract(encode("x".repeat(1536 * 1024))), {
    message: "Document size (1536KB) exceeds 1MB limit",
  });
});
