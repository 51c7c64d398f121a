import type { FileType } from "../types";
import type { FormatReader, ReaderOutput } from "./types";

const MARKDOWN_EXTENSIONS = new Set([".md", ".markdown"]);

/**
 * Decode as UTF-8, falling back to latin-1 when the bytes are not valid UTF-8.
 */
export function decodeText(buffer: Buffer): string {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch {
    text = buffer.toString("latin1");
  }
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * First level-1 markdown heading, if any
 */
export function markdownTitle(text: string): string | undefined {
  const match = text.match(/^#\s+(.+?)\s*#*\s*$/m);
  return match?.[1];
}

export const textReader: FormatReader = {
  extensions: [".txt", ".md", ".markdown"],

  fileTypeFor(extension: string): FileType {
    return MARKDOWN_EXTENSIONS.has(extension) ? "markdown" : "text";
  },

  async read(buffer: Buffer, extension: string): Promise<ReaderOutput> {
    const text = decodeText(buffer);
    return {
      text,
      title: MARKDOWN_EXTENSIONS.has(extension) ? markdownTitle(text) : undefined,
    };
  },
};
