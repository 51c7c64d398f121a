import mammoth from "mammoth";
import type { FileType } from "../types";
import type { FormatReader, ReaderOutput } from "./types";

/**
 * Word reader using mammoth. Parses DOCX directly from the buffer.
 */
export const docxReader: FormatReader = {
  extensions: [".docx"],

  fileTypeFor(): FileType {
    return "docx";
  },

  async read(buffer: Buffer): Promise<ReaderOutput> {
    const result = await mammoth.extractRawText({ buffer });
    return { text: result.value };
  },
};
