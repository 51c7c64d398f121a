import type { FileType } from "../types";

export interface ReaderOutput {
  text: string;
  /** Title from document properties, when the format carries one */
  title?: string;
  pageCount?: number;
  rowCount?: number;
}

/**
 * Reads one family of file formats into plain text.
 * Throws on corrupt input; the extractor turns that into READ_FAILURE.
 */
export interface FormatReader {
  /** Lowercase extensions including the dot */
  readonly extensions: readonly string[];
  fileTypeFor(extension: string): FileType;
  read(buffer: Buffer, extension: string): Promise<ReaderOutput>;
}
