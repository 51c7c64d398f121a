/**
 * Text Embedder
 *
 * Converts chunk texts into fixed-length vectors through a batched,
 * retried remote call. Each batch is retried on its own fixed schedule
 * (1s, 2s, 4s by default); a batch that fails for good returns no vectors
 * plus the retry history, and the remaining batches still run.
 */

import OpenAI from "openai";
import {
  err,
  ok,
  PipelineError,
  ProviderError,
  type PipelineErrorCode,
  type Result,
} from "../errors";
import { silentLogger, type Logger } from "../logger";
import {
  categoryForStatus,
  DEFAULT_RETRY_DELAYS_MS,
  isTransientError,
  RetryFailedError,
  withRetry,
  type RetryAttempt,
  type RetryErrorDetail,
} from "../retry";
import type { ChunkDraft, EmbeddingRecord } from "./types";

/** Embedding model configuration */
const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";
const DEFAULT_EMBEDDING_DIMENSIONS = 1536;
const DEFAULT_BATCH_SIZE = 100;
const MAX_TOKENS_PER_REQUEST = 8191; // Model limit per input

/**
 * Remote embedding service. Returns one vector per input, in input order.
 * Failures should be ProviderErrors so they can be sorted into
 * transient and permanent categories.
 */
export interface EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface OpenAIEmbeddingProviderOptions {
  /** OpenAI API key (defaults to OPENAI_API_KEY env var) */
  apiKey?: string;
  model?: string;
  dimensions?: number;
  /** Preconfigured client; takes precedence over apiKey */
  client?: OpenAI;
}

/**
 * Map an OpenAI SDK failure onto a provider error category
 */
export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ProviderError("timeout", error.message, { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ProviderError("network", error.message, { cause: error });
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return new ProviderError("unknown", "Embedding request was aborted", {
      cause: error,
    });
  }
  if (error instanceof OpenAI.APIError && typeof error.status === "number") {
    return new ProviderError(categoryForStatus(error.status), error.message, {
      status: error.status,
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError("unknown", message, { cause: error });
}

/**
 * Embedding provider backed by OpenAI's embeddings endpoint.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  private openai: OpenAI;

  constructor(options: OpenAIEmbeddingProviderOptions = {}) {
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.dimensions = options.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS;

    if (options.client) {
      this.openai = options.client;
    } else {
      const apiKey = options.apiKey || process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new PipelineError(
          "CONFIGURATION_ERROR",
          "OpenAI API key is required for embedding (set OPENAI_API_KEY)"
        );
      }
      // Retries are owned by the Embedder's fixed schedule
      this.openai = new OpenAI({ apiKey, maxRetries: 0 });
    }
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    try {
      const response = await this.openai.embeddings.create(
        {
          model: this.model,
          input: texts,
          // Only the text-embedding-3 family accepts a dimensions override
          ...(this.model.startsWith("text-embedding-3")
            ? { dimensions: this.dimensions }
            : {}),
        },
        { signal }
      );

      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);
    } catch (error) {
      throw toProviderError(error);
    }
  }
}

/**
 * Raised when a provider returns vectors of the wrong length
 */
export class DimensionMismatchError extends ProviderError {
  constructor(expected: number, actual: number) {
    super(
      "invalid_response",
      `Expected ${expected}-dimensional vectors, provider returned ${actual}`
    );
    this.name = "DimensionMismatchError";
  }
}

export interface EmbedderOptions {
  /** Chunk texts per remote call (default: 100) */
  batchSize?: number;
  /** Wait before each retry (default: 1s, 2s, 4s) */
  retryDelaysMs?: readonly number[];
  logger?: Logger;
  /** Sleep implementation (tests swap in a recorder) */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Outcome of one remote call. Exactly one of these holds:
 * `embeddings` has one record per input and `errorDetail` is null, or
 * `embeddings` is empty and `errorDetail` describes the failure.
 */
export interface BatchEmbeddingResult {
  batchIndex: number;
  chunkIndices: number[];
  embeddings: EmbeddingRecord[];
  errorDetail: RetryErrorDetail | null;
  errorCode: PipelineErrorCode | null;
  /** Attempts made, including the first */
  attempts: number;
}

export interface DocumentEmbeddingResult {
  /** Vectors for every chunk whose batch succeeded, in chunk order */
  embeddings: EmbeddingRecord[];
  batches: BatchEmbeddingResult[];
  failedBatches: BatchEmbeddingResult[];
}

function codeForFailure(error: RetryFailedError): PipelineErrorCode {
  if (error.lastError instanceof DimensionMismatchError) {
    return "DIMENSION_MISMATCH";
  }
  return error.detail.exhausted
    ? "TRANSIENT_PROVIDER_ERROR"
    : "PERMANENT_PROVIDER_ERROR";
}

/**
 * Truncate text to fit within embedding model's token limit.
 * Uses a conservative character estimate.
 */
function truncateForEmbedding(text: string): string {
  // Rough estimate: 4 chars per token, leave some buffer
  const maxChars = MAX_TOKENS_PER_REQUEST * 3;
  if (text.length <= maxChars) {
    return text;
  }
  return text.slice(0, maxChars);
}

/**
 * Embedder class for generating chunk and query embeddings.
 */
export class Embedder {
  private readonly batchSize: number;
  private readonly delays: readonly number[];
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    readonly provider: EmbeddingProvider,
    options: EmbedderOptions = {}
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.delays = options.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep;
  }

  get model(): string {
    return this.provider.model;
  }

  get dimensions(): number {
    return this.provider.dimensions;
  }

  /**
   * Embed one batch with retries. Never throws.
   */
  async embedBatch(
    chunks: Pick<ChunkDraft, "index" | "text">[],
    batchIndex = 0,
    signal?: AbortSignal
  ): Promise<BatchEmbeddingResult> {
    const chunkIndices = chunks.map((chunk) => chunk.index);
    if (chunks.length === 0) {
      return { batchIndex, chunkIndices, embeddings: [], errorDetail: null, errorCode: null, attempts: 0 };
    }

    const texts = chunks.map((chunk) => truncateForEmbedding(chunk.text));

    try {
      const { data, attempts } = await withRetry(
        () => this.callProvider(texts, signal),
        {
          delaysMs: this.delays,
          isRetryable: (error) => !signal?.aborted && isTransientError(error),
          onRetry: (attempt) => this.logAttempt(attempt, batchIndex),
          sleep: this.sleep,
        }
      );

      return {
        batchIndex,
        chunkIndices,
        embeddings: data.map((vector, i) => ({
          chunkIndex: chunkIndices[i],
          vector,
          model: this.provider.model,
          dimensions: vector.length,
        })),
        errorDetail: null,
        errorCode: null,
        attempts,
      };
    } catch (error) {
      if (!(error instanceof RetryFailedError)) {
        throw error;
      }
      return {
        batchIndex,
        chunkIndices,
        embeddings: [],
        errorDetail: error.detail,
        errorCode: codeForFailure(error),
        attempts: error.detail.attempts.length,
      };
    }
  }

  /**
   * Embed every chunk of a document, batch by batch. A failed batch does
   * not stop the batches after it.
   */
  async embedChunks(
    chunks: Pick<ChunkDraft, "index" | "text">[],
    signal?: AbortSignal
  ): Promise<DocumentEmbeddingResult> {
    const batches: BatchEmbeddingResult[] = [];

    for (let start = 0; start < chunks.length; start += this.batchSize) {
      if (signal?.aborted) break;
      const batch = chunks.slice(start, start + this.batchSize);
      batches.push(await this.embedBatch(batch, batches.length, signal));
    }

    return {
      embeddings: batches.flatMap((batch) => batch.embeddings),
      batches,
      failedBatches: batches.filter((batch) => batch.errorDetail !== null),
    };
  }

  /**
   * Embed a document's chunks as a pipeline stage: every chunk gets a
   * vector or the stage fails with the first failed batch's retry history.
   */
  async embedDocument(
    chunks: Pick<ChunkDraft, "index" | "text">[],
    signal?: AbortSignal
  ): Promise<Result<EmbeddingRecord[]>> {
    const result = await this.embedChunks(chunks, signal);
    const [firstFailure] = result.failedBatches;

    if (firstFailure?.errorDetail) {
      const detail = firstFailure.errorDetail;
      return err(
        new PipelineError(
          firstFailure.errorCode ?? "PERMANENT_PROVIDER_ERROR",
          `Embedding batch ${firstFailure.batchIndex} failed after ${detail.retryCount + 1} attempt(s): ${detail.lastErrorMessage}`,
          {
            stage: "embedding",
            retry: detail,
            details: {
              failedBatches: result.failedBatches.map((batch) => batch.batchIndex),
              totalBatches: result.batches.length,
            },
          }
        )
      );
    }

    if (result.embeddings.length !== chunks.length) {
      return err(
        new PipelineError("CANCELLED", "Embedding stopped before every chunk was embedded", {
          stage: "embedding",
          details: { embedded: result.embeddings.length, expected: chunks.length },
        })
      );
    }

    return ok(result.embeddings);
  }

  /**
   * Embed a single query with the same model, dimensions and retry policy.
   */
  async embedQuery(text: string, signal?: AbortSignal): Promise<Result<number[]>> {
    const batch = await this.embedBatch([{ index: 0, text }], 0, signal);
    const [record] = batch.embeddings;

    if (!record) {
      const detail = batch.errorDetail;
      return err(
        new PipelineError(
          batch.errorCode ?? "PERMANENT_PROVIDER_ERROR",
          `Query embedding failed: ${detail?.lastErrorMessage ?? "no vector returned"}`,
          { stage: "retrieving", retry: detail ?? undefined }
        )
      );
    }

    return ok(record.vector);
  }

  private async callProvider(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    signal?.throwIfAborted();
    const vectors = await this.provider.embed(texts, signal);

    if (vectors.length !== texts.length) {
      throw new ProviderError(
        "invalid_response",
        `Provider returned ${vectors.length} vectors for ${texts.length} inputs`
      );
    }
    for (const vector of vectors) {
      if (vector.length !== this.provider.dimensions) {
        throw new DimensionMismatchError(this.provider.dimensions, vector.length);
      }
    }

    return vectors;
  }

  private logAttempt(attempt: RetryAttempt, batchIndex: number): void {
    const prefix = `Batch ${batchIndex}: attempt ${attempt.attempt}/${attempt.maxAttempts} failed (${attempt.category}): ${attempt.message}`;
    if (attempt.delayMs !== null) {
      this.logger.warn(`${prefix}. Retrying in ${attempt.delayMs}ms`);
    } else {
      this.logger.error(`${prefix}. Giving up`);
    }
  }
}
