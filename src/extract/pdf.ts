import { join } from "node:path";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { describeError } from "../utils/errors.js";
import config from "../config/env.js";

function createPdfLimiter(concurrency: number) {
  let active = 0;
  const waiting: Array<() => void> = [];

  return async function limit<T>(task: () => Promise<T>): Promise<T> {
    // A finishing task hands its slot straight to the next waiter
    if (active >= concurrency) {
      await new Promise<void>((resolve) => waiting.push(resolve));
    } else {
      active++;
    }

    try {
      return await task();
    } finally {
      const release = waiting.shift();
      if (release) release();
      else active--;
    }
  };
}

/** Concurrency limiter to prevent PDF extraction memory spikes */
const pdfLimit = createPdfLimiter(config.pdfExtractConcurrency);

/** Wrapper export with concurrency guard */
export function extractPdfText(
  buffer: Buffer,
  maxPages: number = config.pdfMaxPages
): Promise<string> {
  return pdfLimit(() => extractPdfTextImpl(buffer, maxPages));
}

function warnCleanupFailure(step: string) {
  return (error: unknown) => {
    console.warn(`[EXTRACT] PDF ${step} cleanup failed: ${describeError(error)}`);
  };
}

/**
 * Text of each page as `Page <n>:\n<text>`, pages separated by a blank line
 */
async function extractPdfTextImpl(buffer: Buffer, maxPages: number): Promise<string> {
  const standardFontDataUrl =
    join(process.cwd(), "node_modules", "pdfjs-dist", "standard_fonts") + "/";

  const loadingTask = getDocument({
    data: new Uint8Array(buffer),
    standardFontDataUrl,
    isEvalSupported: false,
    useSystemFonts: false,
  });

  try {
    const pdf = await loadingTask.promise;

    // Cap the number of pages processed to protect latency and memory
    const pageCount = Math.min(pdf.numPages, maxPages);
    const pages: string[] = [];

    for (let p = 1; p <= pageCount; p++) {
      const page = await pdf.getPage(p);
      try {
        const content = await page.getTextContent();
        const text = content.items
          .map((item) => ("str" in item ? item.str : ""))
          .filter(Boolean)
          .join(" ")
          .trim();
        if (text) {
          pages.push(`Page ${p}:\n${text}`);
        }
      } finally {
        page.cleanup();
      }
    }

    return pages.join("\n\n");
  } finally {
    await loadingTask.destroy().catch(warnCleanupFailure("document"));
  }
}
