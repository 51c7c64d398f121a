/**
 * Query preparation for retrieval: picking a mode from the wording of a
 * question and widening it with known synonyms.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import type { RetrievalMode } from "./types";

const SYNONYMS: ReadonlyMap<string, readonly string[]> = new Map(
  Object.entries(
    z
      .record(z.array(z.string()))
      .parse(JSON.parse(readFileSync(new URL("./synonyms.json", import.meta.url), "utf-8")))
  )
);

/** Synonyms appended per matching term */
const MAX_SYNONYMS_PER_TERM = 2;

const QUOTED_PHRASE = /"[^"]+"|'[^']+'|“[^”]+”/;
const QUESTION_START = /^(what|how|why|when|where|who|which|explain|describe)\b/i;

/** Exact-match signals: acronyms, numbers, camelCase and CONSTANT_CASE terms */
const KEYWORD_SIGNALS = [
  /\b[A-Z]{2,}\b/g,
  /\d+/g,
  /\b[a-z]+[A-Z]\w*|\b[A-Z][a-z]+[A-Z]\w*/g,
  /\b[A-Z][A-Z0-9]*_[A-Z0-9_]+\b/g,
];

function countKeywordSignals(query: string): number {
  return KEYWORD_SIGNALS.reduce((count, pattern) => count + (query.match(pattern)?.length ?? 0), 0);
}

/**
 * Choose a retrieval mode for a query.
 *
 * Quoted phrases, codes and acronyms need exact terms, so they go to hybrid.
 * Questions and longer natural-language queries go to semantic. Anything
 * else is hybrid.
 */
export function selectMode(query: string): RetrievalMode {
  const trimmed = query.trim();
  if (QUOTED_PHRASE.test(trimmed)) {
    return "hybrid";
  }

  const words = trimmed.split(/\s+/).filter(Boolean);
  const signals = countKeywordSignals(trimmed);
  if (signals >= 2 || (signals > 0 && words.length <= 2)) {
    return "hybrid";
  }

  if (QUESTION_START.test(trimmed) || words.length >= 6) {
    return "semantic";
  }
  return "hybrid";
}

/**
 * Append up to two synonyms for every query term that has them.
 * Queries without a known term come back unchanged.
 */
export function expandQuery(query: string): string {
  const additions: string[] = [];
  for (const word of query.toLowerCase().split(/\s+/)) {
    const synonyms = SYNONYMS.get(word.replace(/[^\p{L}\p{N}]/gu, ""));
    if (synonyms) {
      additions.push(...synonyms.slice(0, MAX_SYNONYMS_PER_TERM));
    }
  }
  return additions.length > 0 ? `${query} ${additions.join(" ")}` : query;
}
