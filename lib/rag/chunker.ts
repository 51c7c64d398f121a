/**
 * Text Chunker
 *
 * Splits normalized document text into overlapping, sentence-bounded chunks
 * for embedding.
 *
 * Strategy:
 * 1. Accumulate words until the running count reaches `chunkSize`
 * 2. Close the chunk at the first boundary at or after that point. Sentence
 *    ends are always boundaries; with `boundary: "paragraph"` so are blank
 *    lines, headings and list items.
 * 3. Start the next chunk `chunkOverlap` words before the close point
 * 4. Text without any boundary falls back to plain word-count splits
 *
 * Chunk text is sliced from the original, so line breaks and markdown survive.
 * Output depends only on the input text and config.
 */

import { err, ok, PipelineError, type Result } from "../errors";
import type { ChunkBoundary, ChunkDraft, ChunkStrategy } from "./types";

export interface ChunkOptions {
  /** Target chunk size in words (default: 500) */
  chunkSize?: number;
  /** Words repeated at the start of the next chunk (default: 50) */
  chunkOverlap?: number;
  /**
   * Longest chunk allowed while waiting for a sentence boundary
   * (default: 2 × chunkSize). Past it the chunk is cut at `chunkSize` words.
   */
  maxChunkWords?: number;
  /** Breaks that may close a chunk (default: "paragraph") */
  boundary?: ChunkBoundary;
}

const DEFAULT_CHUNK_SIZE = 500;
const DEFAULT_CHUNK_OVERLAP = 50;

const HEADING_PATTERN = /^#{1,6}\s+(.+?)\s*#*\s*$/;
const LIST_ITEM_PATTERN = /^\s*(?:[-*+•]|\d+[.)])\s+/;
const TERMINAL_PATTERN = /[.!?]["'”’)\]]*$/;
const ABBREVIATIONS = new Set([
  "e.g.",
  "i.e.",
  "mr.",
  "mrs.",
  "ms.",
  "dr.",
  "prof.",
  "vs.",
  "st.",
  "no.",
  "fig.",
]);
const USABLE_WORD = /[\p{L}\p{N}]/u;

interface Token {
  start: number;
  end: number;
  terminal: boolean;
  /** Last word before a blank line, heading or list item, or of one */
  blockEnd: boolean;
  section?: string;
  page?: number;
}

interface Span {
  start: number;
  end: number;
  strategy: ChunkStrategy;
}

function isSentenceEnd(word: string): boolean {
  return TERMINAL_PATTERN.test(word) && !ABBREVIATIONS.has(word.toLowerCase());
}

/**
 * Locate every word with its offsets, heading section and page.
 */
function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  const paged = text.includes("\f");
  let page = 1;
  let section: string | undefined;
  let offset = 0;

  for (const line of text.split("\n")) {
    const breaks = line.split("\f").length - 1;
    page += breaks;

    const heading = line.match(HEADING_PATTERN);
    if (heading) {
      section = heading[1];
    }

    const previous = tokens.at(-1);
    const content = line.replace(/\f/g, "").trim();
    const isBlock = heading !== null || LIST_ITEM_PATTERN.test(line);
    if (previous && (content === "" || isBlock)) {
      previous.blockEnd = true;
    }

    for (const match of line.matchAll(/\S+/g)) {
      const start = offset + (match.index ?? 0);
      tokens.push({
        start,
        end: start + match[0].length,
        terminal: isSentenceEnd(match[0]),
        blockEnd: false,
        section,
        page: paged ? page : undefined,
      });
    }

    const last = tokens.at(-1);
    if (isBlock && last && last !== previous) {
      last.blockEnd = true;
    }

    offset += line.length + 1;
  }

  return tokens;
}

function planWordSpans(total: number, size: number, overlap: number): Span[] {
  const spans: Span[] = [];
  let start = 0;
  for (;;) {
    const end = Math.min(start + size, total);
    spans.push({ start, end, strategy: "word" });
    if (end >= total) return spans;
    start = end - overlap;
  }
}

function planBoundedSpans(
  tokens: Token[],
  isBoundary: (token: Token) => boolean,
  size: number,
  overlap: number,
  maxWords: number
): Span[] {
  const total = tokens.length;
  const boundaries: number[] = [];
  tokens.forEach((token, i) => {
    if (isBoundary(token)) boundaries.push(i + 1);
  });

  const spans: Span[] = [];
  let start = 0;
  let cursor = 0;

  for (;;) {
    const target = start + size;
    let end = total;
    let hardCut = false;

    if (target < total) {
      while (cursor < boundaries.length && boundaries[cursor] < target) {
        cursor++;
      }
      const boundary = cursor < boundaries.length ? boundaries[cursor] : undefined;

      if (boundary !== undefined && boundary - start <= maxWords) {
        end = boundary;
      } else if (total - start > maxWords) {
        end = target;
        hardCut = true;
      }
    }

    const strategy: ChunkStrategy = hardCut
      ? "word"
      : tokens[end - 1].terminal
        ? "sentence"
        : "paragraph";
    spans.push({ start, end, strategy });
    if (end >= total) return spans;
    start = end - overlap;
  }
}

/**
 * Split text into overlapping chunks. Empty text yields no chunks.
 */
export function chunkText(text: string, options: ChunkOptions = {}): ChunkDraft[] {
  const size = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const overlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
  const maxWords = options.maxChunkWords ?? size * 2;
  const boundary = options.boundary ?? "paragraph";

  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`chunkSize must be a positive integer (got ${size})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new RangeError(
      `chunkOverlap must be an integer in [0, chunkSize) (got ${overlap})`
    );
  }

  const tokens = tokenize(text);
  if (tokens.length === 0) {
    return [];
  }

  const isBoundary =
    boundary === "paragraph"
      ? (token: Token) => token.terminal || token.blockEnd
      : (token: Token) => token.terminal;
  const spans = tokens.some(isBoundary)
    ? planBoundedSpans(tokens, isBoundary, size, overlap, Math.max(maxWords, size))
    : planWordSpans(tokens.length, size, overlap);

  return spans.map((span, index) => {
    const first = tokens[span.start];
    const last = tokens[span.end - 1];
    const content = text.slice(first.start, last.end);

    return {
      index,
      text: content,
      wordCount: span.end - span.start,
      charCount: content.length,
      metadata: {
        ...(first.section !== undefined ? { section: first.section } : {}),
        ...(first.page !== undefined ? { page: first.page } : {}),
        strategy: span.strategy,
      },
    };
  });
}

/**
 * Chunk a document's text as a pipeline stage.
 * Non-empty text with no usable words (e.g. undecodable bytes) is
 * CHUNKING_DEGENERATE; empty text is zero chunks.
 */
export function chunkDocument(
  text: string,
  options: ChunkOptions = {}
): Result<ChunkDraft[]> {
  if (text.trim().length === 0) {
    return ok([]);
  }

  const usable = text.split(/\s+/).some((word) => USABLE_WORD.test(word));
  if (!usable) {
    return err(
      new PipelineError(
        "CHUNKING_DEGENERATE",
        "Extracted text contains no usable words",
        { stage: "chunking", details: { charCount: text.length } }
      )
    );
  }

  try {
    return ok(chunkText(text, options));
  } catch (error) {
    return err(
      new PipelineError(
        "CHUNKING_DEGENERATE",
        error instanceof Error ? error.message : "Chunking failed",
        { stage: "chunking", cause: error }
      )
    );
  }
}
