import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import { pathToFileURL } from "node:url";
import type { IExtractor } from "./parser.interface.js";

let workerConfigured = false;

async function loadPdfjs() {
  const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  if (!workerConfigured) {
    const require = createRequire(import.meta.url);
    pdfjs.GlobalWorkerOptions.workerSrc = pathToFileURL(
      require.resolve("pdfjs-dist/legacy/build/pdf.worker.mjs"),
    ).href;
    workerConfigured = true;
  }
  return pdfjs;
}

/** Text layer of every page, pages separated by a blank line. No OCR. */
export class PdfExtractor implements IExtractor {
  readonly fileTypes = ["pdf"] as const;

  async extract(filePath: string): Promise<string> {
    const pdfjs = await loadPdfjs();
    const data = new Uint8Array(await readFile(filePath));

    const doc = await pdfjs.getDocument({
      data,
      useWorkerFetch: false,
      isEvalSupported: false,
      useSystemFonts: true,
    }).promise;

    try {
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
        const page = await doc.getPage(pageNumber);
        const content = await page.getTextContent();
        let text = "";
        for (const item of content.items) {
          if (!("str" in item)) continue;
          text += item.str;
          if (item.hasEOL) text += "\n";
        }
        pages.push(text);
        page.cleanup();
      }
      return pages.join("\n\n");
    } finally {
      await doc.destroy();
    }
  }
}
