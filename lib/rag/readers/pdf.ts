import type { FileType } from "../types";
import type { FormatReader, ReaderOutput } from "./types";

/** Separates pages in extracted text; the chunker reads it back as page numbers */
const PAGE_BREAK = "\n\f\n";

function infoTitle(info: unknown): string | undefined {
  if (typeof info !== "object" || info === null || !("Title" in info)) {
    return undefined;
  }
  const title = info.Title;
  return typeof title === "string" && title.trim() ? title.trim() : undefined;
}

/**
 * PDF reader using Mozilla's pdfjs-dist (legacy build, which runs under Node.js).
 * Loaded lazily so plain-text ingestion never pays for it.
 */
export const pdfReader: FormatReader = {
  extensions: [".pdf"],

  fileTypeFor(): FileType {
    return "pdf";
  },

  async read(buffer: Buffer): Promise<ReaderOutput> {
    const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
    const pdfDocument = await pdfjs.getDocument({
      data: new Uint8Array(buffer),
      useSystemFonts: true,
      isEvalSupported: false,
      verbosity: 0,
    }).promise;

    try {
      const pages: string[] = [];
      for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
        const page = await pdfDocument.getPage(pageNum);
        const textContent = await page.getTextContent();
        const pageText = textContent.items
          .map((item) => {
            if (!("str" in item) || typeof item.str !== "string") return "";
            return "hasEOL" in item && item.hasEOL ? `${item.str}\n` : item.str;
          })
          .join(" ")
          .replace(/[ \t]+/g, " ")
          .replace(/ ?\n ?/g, "\n")
          .trim();
        pages.push(pageText);
      }

      const { info } = await pdfDocument.getMetadata();

      return {
        text: pages.join(PAGE_BREAK),
        title: infoTitle(info),
        pageCount: pdfDocument.numPages,
      };
    } finally {
      await pdfDocument.destroy();
    }
  },
};
