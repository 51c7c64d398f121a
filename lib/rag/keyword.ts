/**
 * Keyword scoring for hybrid retrieval.
 */

import { readFileSync } from "fs";
import { z } from "zod";

const STOPWORDS: ReadonlySet<string> = new Set(
  z
    .array(z.string())
    .parse(JSON.parse(readFileSync(new URL("./stopwords.json", import.meta.url), "utf-8")))
);

export function isStopword(term: string): boolean {
  return STOPWORDS.has(term);
}

/**
 * Lowercased letter/digit runs with stopwords removed
 */
export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []).filter(
    (term) => !STOPWORDS.has(term)
  );
}

/**
 * Share of the query's distinct terms that appear in `text`, in [0, 1].
 * A query with no terms scores 0 against everything.
 */
export function keywordOverlap(query: string | ReadonlySet<string>, text: string): number {
  const queryTerms = typeof query === "string" ? new Set(tokenize(query)) : query;
  if (queryTerms.size === 0) {
    return 0;
  }

  const textTerms = new Set(tokenize(text));
  let matched = 0;
  for (const term of queryTerms) {
    if (textTerms.has(term)) matched++;
  }
  return matched / queryTerms.size;
}
