import { extractPdfText } from "../extract/pdf.js";
import { extractDocxText } from "../extract/docx.js";
import { withTimeout } from "../utils/timeout.js";
import config from "../config/env.js";

/**
 * Turns an encoded document into plain text. Implementations throw with a
 * human-readable message when the document cannot be read.
 */
export interface DocumentExtractor {
  extract(encodedDocument: string): Promise<string>;
}

export type DocumentKind = "pdf" | "docx" | "text";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const DATA_URL_PREFIX = /^data:[^;,]*;base64,/i;

/**
 * Service for extracting text content from base64-encoded documents
 */
export class ExtractionService implements DocumentExtractor {
  constructor(
    private readonly maxSizeBytes = config.uploadMaxSizeBytes,
    private readonly timeoutMs = config.extractionTimeoutMs
  ) {}

  async extract(encodedDocument: string): Promise<string> {
    const buffer = this.decode(encodedDocument);
    const kind = this.detectKind(buffer);

    const text = await withTimeout(
      () => this.extractByKind(kind, buffer),
      this.timeoutMs,
      "Document extraction timed out"
    );

    const trimmed = text.trim();
    if (!trimmed) {
      throw new Error("No extractable text found in document");
    }
    return trimmed;
  }

  /**
   * Decode base64 (optionally a data URL) into bytes, enforcing the size limit
   */
  decode(encodedDocument: string): Buffer {
    const payload = encodedDocument.trim().replace(DATA_URL_PREFIX, "");
    const compact = payload.replace(/\s+/g, "");

    if (!BASE64_PATTERN.test(compact) || compact.length % 4 === 1) {
      throw new Error("Document data is not valid base64");
    }

    const buffer = Buffer.from(compact, "base64");
    if (buffer.length === 0) {
      throw new Error("Empty document data provided");
    }
    if (buffer.length > this.maxSizeBytes) {
      throw new Error(
        `Document size (${Math.round(buffer.length / 1024)}KB) exceeds ${Math.round(
          this.maxSizeBytes / 1024 / 1024
        )}MB limit`
      );
    }
    return buffer;
  }

  /**
   * Detect document kind from the buffer header
   */
  detectKind(buffer: Buffer): DocumentKind {
    // PDF signature: %PDF
    if (buffer.subarray(0, 4).toString("latin1") === "%PDF") {
      return "pdf";
    }

    // ZIP signature: 50 4B 03 04
    if (
      buffer.length >= 4 &&
      buffer[0] === 0x50 &&
      buffer[1] === 0x4b &&
      buffer[2] === 0x03 &&
      buffer[3] === 0x04
    ) {
      return "docx";
    }

    return "text";
  }

  private async extractByKind(
    kind: DocumentKind,
    buffer: Buffer
  ): Promise<string> {
    switch (kind) {
      case "pdf":
        return extractPdfText(buffer);
      case "docx":
        return extractDocxText(buffer);
      case "text":
        return this.decodeText(buffer);
    }
  }

  private decodeText(buffer: Buffer): string {
    try {
      return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
    } catch (error) {
      throw new Error(
        "Unsupported document format. Supported: PDF, DOCX, UTF-8 text",
        { cause: error }
      );
    }
  }
}

// Export singleton instance
export const extractionService = new ExtractionService();
