/**
 * Document Extractor
 *
 * Reads a source file and produces normalized text plus metadata.
 * Dispatches on extension to a format reader (text/markdown, PDF, Word,
 * CSV/XLSX). Never mutates or moves the source file.
 */

import type { Stats } from "fs";
import { readFile, stat } from "fs/promises";
import path from "path";
import { err, getErrorMessage, ok, PipelineError, type Result } from "../errors";
import { getReaderForExtension, SUPPORTED_EXTENSIONS } from "./readers";
import type { ExtractedDocument, FileType } from "./types";

export interface ExtractOptions {
  /** Files above this size fail with FILE_TOO_LARGE (default: 10 MiB) */
  maxFileSizeBytes?: number;
}

const DEFAULT_MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;

/**
 * Normalize line endings, drop NUL bytes and trailing spaces, trim the ends.
 * Form feeds (page breaks) are kept.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/\u0000/g, "")
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

function failure(
  code: "UNSUPPORTED_FORMAT" | "READ_FAILURE" | "FILE_TOO_LARGE",
  message: string,
  filePath: string,
  cause?: unknown
): Result<never> {
  return err(
    new PipelineError(code, message, {
      stage: "extracting",
      details: { filePath },
      cause,
    })
  );
}

/**
 * Extract text and metadata from a file.
 *
 * - Unknown extension → UNSUPPORTED_FORMAT
 * - Missing, unreadable or corrupt file → READ_FAILURE
 * - Empty file → success with empty text
 */
export async function extract(
  filePath: string,
  options: ExtractOptions = {}
): Promise<Result<ExtractedDocument>> {
  const maxBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES;
  const extension = path.extname(filePath).toLowerCase();
  const fileName = path.basename(filePath);

  const reader = getReaderForExtension(extension);
  if (!reader) {
    return failure(
      "UNSUPPORTED_FORMAT",
      `Unsupported file extension "${extension || "(none)"}". Supported: ${SUPPORTED_EXTENSIONS.join(", ")}`,
      filePath
    );
  }

  let fileStat: Stats;
  try {
    fileStat = await stat(filePath);
  } catch (error) {
    return failure("READ_FAILURE", `Unable to read ${fileName}: ${getErrorMessage(error)}`, filePath, error);
  }

  if (!fileStat.isFile()) {
    return failure("READ_FAILURE", `${fileName} is not a regular file`, filePath);
  }

  if (fileStat.size > maxBytes) {
    return failure(
      "FILE_TOO_LARGE",
      `${fileName} is ${fileStat.size} bytes; maximum allowed is ${maxBytes}`,
      filePath
    );
  }

  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    return failure("READ_FAILURE", `Unable to read ${fileName}: ${getErrorMessage(error)}`, filePath, error);
  }

  const fileType: FileType = reader.fileTypeFor(extension);
  let text = "";
  let title: string | undefined;
  let pageCount: number | undefined;
  let rowCount: number | undefined;

  if (buffer.length > 0) {
    try {
      const output = await reader.read(buffer, extension);
      text = normalizeText(output.text);
      title = output.title;
      pageCount = output.pageCount;
      rowCount = output.rowCount;
    } catch (error) {
      return failure(
        "READ_FAILURE",
        `Failed to parse ${fileName} as ${fileType}: ${getErrorMessage(error)}`,
        filePath,
        error
      );
    }
  }

  return ok({
    text,
    metadata: {
      title: title?.trim() || path.basename(fileName, path.extname(fileName)),
      fileType,
      fileName,
      extension,
      byteSize: fileStat.size,
      ...(pageCount !== undefined ? { pageCount } : {}),
      ...(rowCount !== undefined ? { rowCount } : {}),
      wordCount: countWords(text),
      charCount: text.length,
      modifiedAt: fileStat.mtime.toISOString(),
    },
  });
}
