import path from "path";
import { docxReader } from "./docx";
import { pdfReader } from "./pdf";
import { spreadsheetReader } from "./spreadsheet";
import { textReader } from "./text";
import type { FormatReader } from "./types";

export type { FormatReader, ReaderOutput } from "./types";

const READERS: readonly FormatReader[] = [
  textReader,
  pdfReader,
  docxReader,
  spreadsheetReader,
];

export const SUPPORTED_EXTENSIONS: readonly string[] = READERS.flatMap(
  (reader) => reader.extensions
);

export function getReaderForExtension(extension: string): FormatReader | undefined {
  const normalized = extension.toLowerCase();
  return READERS.find((reader) => reader.extensions.includes(normalized));
}

export function isSupportedFile(filePath: string): boolean {
  return getReaderForExtension(path.extname(filePath)) !== undefined;
}
