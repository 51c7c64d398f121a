/**
 * Retriever / Ranker
 *
 * Embeds a question with the ingestion model, finds the nearest stored
 * chunks above the similarity threshold, optionally blends in keyword
 * overlap, and assembles a cited context within a character budget.
 * Queries can pick their own mode, be widened with synonyms, and be
 * limited to a few chunks per document.
 */

import type { PipelineConfig } from "../config";
import { err, ok, PipelineError, toPipelineError, type Result } from "../errors";
import { silentLogger, type Logger } from "../logger";
import type { Embedder } from "./embedder";
import { keywordOverlap, tokenize } from "./keyword";
import { expandQuery, selectMode } from "./query";
import type { DocumentStore } from "./store";
import type { ChunkMatch, Citation, QueryResult, RankedChunk, RetrievalMode } from "./types";

/** Hybrid mode re-ranks this many candidates per requested result */
const HYBRID_CANDIDATE_FACTOR = 4;
/** Semantic mode with a per-document cap fetches this many per result */
const DIVERSIFIED_CANDIDATE_FACTOR = 2;

const CONTEXT_SEPARATOR = "\n\n---\n\n";

export interface RetrieveOptions {
  /** "auto" picks semantic or hybrid from the query's wording (default: "semantic") */
  mode?: RetrievalMode | "auto";
  topK?: number;
  /** Minimum similarity in [0, 1] (default: config.similarityThreshold) */
  threshold?: number;
  /** Search with known synonyms appended to the query */
  expandQuery?: boolean;
  /** At most this many chunks from any one document (default: no limit) */
  maxPerDocument?: number;
  signal?: AbortSignal;
}

export interface RetrieverOptions {
  embedder: Embedder;
  store: DocumentStore;
  config: PipelineConfig;
  logger?: Logger;
}

export interface AssembledContext {
  chunks: RankedChunk[];
  context: string;
  citations: Citation[];
  dropped: number;
}

/**
 * Higher score first; ties go to the earlier chunk, then the lower
 * document id, then the lower chunk id.
 */
export function compareRanked(a: RankedChunk, b: RankedChunk): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.chunkIndex !== b.chunkIndex) return a.chunkIndex - b.chunkIndex;
  if (a.documentId !== b.documentId) return a.documentId < b.documentId ? -1 : 1;
  if (a.chunkId !== b.chunkId) return a.chunkId < b.chunkId ? -1 : 1;
  return 0;
}

/**
 * Score candidates for the given mode, drop duplicate chunks, cap chunks
 * per document when asked, and keep the best `topK`.
 */
export function rankCandidates(
  query: string,
  candidates: ChunkMatch[],
  options: { mode: RetrievalMode; topK: number; semanticWeight: number; maxPerDocument?: number }
): RankedChunk[] {
  const queryTerms = new Set(tokenize(query));
  const seen = new Set<string>();
  const ranked: RankedChunk[] = [];

  for (const candidate of candidates) {
    if (seen.has(candidate.chunkId)) continue;
    seen.add(candidate.chunkId);

    if (options.mode === "hybrid") {
      const keywordScore = keywordOverlap(queryTerms, candidate.text);
      ranked.push({
        ...candidate,
        keywordScore,
        score:
          options.semanticWeight * candidate.similarity +
          (1 - options.semanticWeight) * keywordScore,
      });
    } else {
      ranked.push({ ...candidate, score: candidate.similarity });
    }
  }

  ranked.sort(compareRanked);
  if (options.maxPerDocument === undefined) {
    return ranked.slice(0, options.topK);
  }

  const perDocument = new Map<string, number>();
  const diversified: RankedChunk[] = [];
  for (const chunk of ranked) {
    const taken = perDocument.get(chunk.documentId) ?? 0;
    if (taken >= options.maxPerDocument) continue;
    perDocument.set(chunk.documentId, taken + 1);
    diversified.push(chunk);
    if (diversified.length === options.topK) break;
  }
  return diversified;
}

export function formatSourceHeader(ordinal: number, chunk: Pick<RankedChunk, "documentTitle" | "chunkIndex">): string {
  return `[Source ${ordinal}: ${chunk.documentTitle}, chunk ${chunk.chunkIndex}]`;
}

function render(chunks: RankedChunk[]): string {
  return chunks
    .map((chunk, i) => `${formatSourceHeader(i + 1, chunk)}\n${chunk.text}`)
    .join(CONTEXT_SEPARATOR);
}

/**
 * Join ranked chunks into a numbered context. While the context is over
 * `charBudget`, the lowest-scoring chunk is removed whole. The top chunk
 * always stays, even if it alone exceeds the budget.
 */
export function assembleContext(ranked: RankedChunk[], charBudget: number): AssembledContext {
  const included = [...ranked];
  let context = render(included);

  while (included.length > 1 && context.length > charBudget) {
    included.pop();
    context = render(included);
  }

  const citations: Citation[] = included.map((chunk, i) => ({
    ordinal: i + 1,
    chunkId: chunk.chunkId,
    documentId: chunk.documentId,
    documentTitle: chunk.documentTitle,
    chunkIndex: chunk.chunkIndex,
    similarity: chunk.similarity,
    score: chunk.score,
  }));

  return {
    chunks: included,
    context,
    citations,
    dropped: ranked.length - included.length,
  };
}

export class Retriever {
  private readonly embedder: Embedder;
  private readonly store: DocumentStore;
  private readonly config: PipelineConfig;
  private readonly logger: Logger;

  constructor(options: RetrieverOptions) {
    this.embedder = options.embedder;
    this.store = options.store;
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Retrieve context for a question.
   *
   * An embedding model that differs from the one the store was built with
   * yields a `model_mismatch` result before any remote call. A query with
   * no chunk at or above the threshold yields `no_relevant_context`.
   */
  async retrieve(query: string, options: RetrieveOptions = {}): Promise<Result<QueryResult>> {
    const topK = options.topK ?? this.config.topK;
    const threshold = options.threshold ?? this.config.similarityThreshold;
    const { maxPerDocument } = options;
    const trimmed = query.trim();

    if (!trimmed) {
      return err(new PipelineError("INVALID_QUERY", "Query cannot be empty", { stage: "retrieving" }));
    }
    const mode = options.mode === "auto" ? selectMode(trimmed) : (options.mode ?? "semantic");
    if (!Number.isInteger(topK) || topK < 1) {
      return err(
        new PipelineError("INVALID_QUERY", `topK must be a positive integer (got ${topK})`, {
          stage: "retrieving",
        })
      );
    }
    if (!(threshold >= 0 && threshold <= 1)) {
      return err(
        new PipelineError("INVALID_QUERY", `threshold must be between 0 and 1 (got ${threshold})`, {
          stage: "retrieving",
        })
      );
    }

    if (maxPerDocument !== undefined && (!Number.isInteger(maxPerDocument) || maxPerDocument < 1)) {
      return err(
        new PipelineError(
          "INVALID_QUERY",
          `maxPerDocument must be a positive integer (got ${maxPerDocument})`,
          { stage: "retrieving" }
        )
      );
    }

    if (
      this.embedder.model !== this.config.embeddingModel ||
      this.embedder.dimensions !== this.store.dimensions
    ) {
      this.logger.error(
        `Query model ${this.embedder.model} (${this.embedder.dimensions}d) does not match stored ${this.config.embeddingModel} (${this.store.dimensions}d)`
      );
      return ok({
        status: "model_mismatch",
        query: trimmed,
        mode,
        expected: { model: this.config.embeddingModel, dimensions: this.store.dimensions },
        actual: { model: this.embedder.model, dimensions: this.embedder.dimensions },
      });
    }

    const searchQuery = options.expandQuery ? expandQuery(trimmed) : trimmed;
    if (searchQuery !== trimmed) {
      this.logger.debug(`Expanded "${trimmed}" to "${searchQuery}"`);
    }

    const embedded = await this.embedder.embedQuery(searchQuery, options.signal);
    if (!embedded.ok) {
      return embedded;
    }

    const candidateCount =
      mode === "hybrid"
        ? topK * HYBRID_CANDIDATE_FACTOR
        : maxPerDocument !== undefined
          ? topK * DIVERSIFIED_CANDIDATE_FACTOR
          : topK;

    let candidates: ChunkMatch[];
    try {
      candidates = await this.store.matchChunks(embedded.value, { topK: candidateCount, threshold });
    } catch (error) {
      return err(toPipelineError(error, "STORAGE_ERROR", "retrieving"));
    }

    const eligible = candidates.filter((candidate) => candidate.similarity >= threshold);
    if (eligible.length === 0) {
      this.logger.info(`No chunk reached similarity ${threshold} for "${trimmed}"`);
      return ok({ status: "no_relevant_context", query: trimmed, mode, threshold });
    }

    const ranked = rankCandidates(searchQuery, eligible, {
      mode,
      topK,
      semanticWeight: this.config.semanticWeight,
      maxPerDocument,
    });
    const assembled = assembleContext(ranked, this.config.contextCharBudget);

    this.logger.debug(
      `Retrieved ${assembled.chunks.length} chunk(s) in ${mode} mode` +
        (assembled.dropped > 0 ? `, ${assembled.dropped} dropped for the context budget` : "")
    );

    return ok({
      status: "ok",
      query: trimmed,
      mode,
      ...(searchQuery !== trimmed ? { expandedQuery: searchQuery } : {}),
      chunks: assembled.chunks,
      context: assembled.context,
      citations: assembled.citations,
      droppedForBudget: assembled.dropped,
    });
  }
}
