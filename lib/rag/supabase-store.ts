/**
 * Supabase DocumentStore
 *
 * Documents and chunks live in Postgres (pgvector). A transaction buffers
 * its mutations and commits them through one `write_document_with_chunks`
 * RPC call, which Postgres runs as a single transaction. Similarity search
 * goes through the `match_document_chunks` RPC.
 *
 * Transient PostgREST/Postgres failures (connection loss, pool timeouts,
 * deadlocks) are retried on the fixed schedule; anything else surfaces as
 * a PipelineError.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { getErrorMessage, PipelineError, type PipelineStage } from "../errors";
import { silentLogger, type Logger } from "../logger";
import {
  DEFAULT_RETRY_DELAYS_MS,
  isTransientError,
  RetryFailedError,
  withRetry,
} from "../retry";
import type {
  DocumentChunkInsert,
  DocumentInsert,
  WriteDocumentArgs,
} from "../supabase/types";
import {
  abortedBeforeCommit,
  type DocumentStore,
  type MatchOptions,
  type StoreTransaction,
  type TransactionOptions,
} from "./store";
import {
  FILE_TYPES,
  type ChunkInput,
  type ChunkMatch,
  type Document,
  type DocumentInput,
  type StoredChunk,
} from "./types";

/**
 * Postgrest error codes that are retryable
 * See: https://postgrest.org/en/stable/references/errors.html
 */
const RETRYABLE_POSTGREST_CODES = new Set([
  "PGRST000", // Could not connect with the database
  "PGRST001", // Internal connection error
  "PGRST003", // Connection pool timeout
  "40001", // Serialization failure
  "40P01", // Deadlock detected
  "57P01", // Admin shutdown
  "57P02", // Crash shutdown
  "57P03", // Cannot connect now
  "53300", // Too many connections
  "08000", // Connection exception
  "08003", // Connection does not exist
  "08006", // Connection failure
]);

/** Postgres codes for bad vector input ("expected N dimensions, not M") */
const VECTOR_INPUT_CODES = new Set(["22000", "22P02"]);

export interface PostgrestErrorLike {
  code: string;
  message: string;
  details?: string | null;
  hint?: string | null;
}

/**
 * Check if an error is a PostgrestError
 */
export function isPostgrestError(error: unknown): error is PostgrestErrorLike {
  return (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string" &&
    "code" in error &&
    typeof error.code === "string"
  );
}

/**
 * Determines if a storage error is transient and should be retried
 */
export function isTransientStorageError(error: unknown): boolean {
  if (isPostgrestError(error)) {
    if (RETRYABLE_POSTGREST_CODES.has(error.code)) {
      return true;
    }
    // Constraint and input errors never succeed on retry
    if (/^2[23]/.test(error.code)) {
      return false;
    }
  }
  return isTransientError(error);
}

/**
 * Map a storage failure to the pipeline error taxonomy
 */
export function toStoreError(error: unknown, stage: PipelineStage): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const message = getErrorMessage(error);
  const details = isPostgrestError(error)
    ? { code: error.code, details: error.details ?? null, hint: error.hint ?? null }
    : undefined;

  if (isPostgrestError(error)) {
    if (error.code === "23503") {
      return new PipelineError("INTEGRITY_ERROR", message, { stage, details, cause: error });
    }
    if (
      error.code.startsWith("23") ||
      VECTOR_INPUT_CODES.has(error.code) ||
      /dimensions/i.test(message)
    ) {
      return new PipelineError("CONSTRAINT_ERROR", message, { stage, details, cause: error });
    }
  }

  return new PipelineError("STORAGE_ERROR", message, { stage, details, cause: error });
}

const metadataSchema = z
  .record(z.unknown())
  .nullable()
  .transform((value) => value ?? {});

const numberArraySchema = z.array(z.number());

/** pgvector values arrive as "[0.1,0.2,...]" strings through PostgREST */
const embeddingSchema = z.union([
  numberArraySchema,
  z
    .string()
    .transform((value, ctx): unknown => {
      try {
        return JSON.parse(value);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid vector literal" });
        return z.NEVER;
      }
    })
    .pipe(numberArraySchema),
]);

export function parseEmbedding(value: unknown): number[] {
  return embeddingSchema.parse(value);
}

const documentRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  file_path: z.string().nullable(),
  file_type: z.enum(FILE_TYPES),
  source_url: z.string().nullable(),
  metadata: metadataSchema,
  created_at: z.string(),
  updated_at: z.string(),
});

const chunkRowSchema = z.object({
  id: z.string(),
  document_id: z.string(),
  chunk_index: z.number().int(),
  chunk_text: z.string(),
  word_count: z.number().int(),
  char_count: z.number().int(),
  embedding: embeddingSchema,
  embedding_model: z.string(),
  metadata: metadataSchema,
  created_at: z.string(),
});

const matchRowSchema = z.object({
  chunk_id: z.string(),
  document_id: z.string(),
  document_title: z.string(),
  chunk_index: z.number().int(),
  chunk_text: z.string(),
  metadata: metadataSchema,
  similarity: z.number(),
});

/**
 * Parse match_document_chunks rows into ChunkMatches
 */
export function parseMatchRows(data: unknown): ChunkMatch[] {
  return z
    .array(matchRowSchema)
    .parse(data ?? [])
    .map((row) => ({
      chunkId: row.chunk_id,
      documentId: row.document_id,
      documentTitle: row.document_title,
      chunkIndex: row.chunk_index,
      text: row.chunk_text,
      metadata: row.metadata,
      similarity: Math.min(1, Math.max(0, row.similarity)),
    }));
}

function toDocumentInsert(document: DocumentInput): DocumentInsert {
  return {
    id: document.id,
    title: document.title,
    content: document.content,
    file_path: document.filePath ?? null,
    file_type: document.fileType,
    source_url: document.sourceUrl ?? null,
    metadata: document.metadata,
  };
}

function toChunkInsert(chunk: ChunkInput): DocumentChunkInsert {
  return {
    document_id: chunk.documentId,
    chunk_index: chunk.index,
    chunk_text: chunk.text,
    word_count: chunk.wordCount,
    char_count: chunk.charCount,
    embedding: chunk.embedding,
    embedding_model: chunk.embeddingModel,
    metadata: chunk.metadata,
  };
}

export interface SupabaseDocumentStoreOptions {
  /** Vector column dimensionality (default: 1536) */
  dimensions?: number;
  retryDelaysMs?: readonly number[];
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

type QueryResponse = { data: unknown; error: unknown };

export class SupabaseDocumentStore implements DocumentStore {
  readonly dimensions: number;
  private readonly delays: readonly number[];
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly client: SupabaseClient,
    options: SupabaseDocumentStoreOptions = {}
  ) {
    this.dimensions = options.dimensions ?? 1536;
    this.delays = options.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep;
  }

  async transaction<T>(
    work: (tx: StoreTransaction) => Promise<T>,
    options: TransactionOptions = {}
  ): Promise<T> {
    const { signal } = options;
    const pending: { document: DocumentInsert | null } = { document: null };
    const deleteChunksFor = new Set<string>();
    const chunks: DocumentChunkInsert[] = [];

    const tx: StoreTransaction = {
      upsertDocument: async (input) => {
        if (pending.document && pending.document.id !== input.id) {
          throw new PipelineError(
            "STORAGE_ERROR",
            "A transaction can upsert only one document",
            { stage: "writing" }
          );
        }
        pending.document = toDocumentInsert(input);
      },
      deleteChunks: async (documentId) => {
        deleteChunksFor.add(documentId);
      },
      insertChunks: async (inputs) => {
        for (const input of inputs) {
          if (input.embedding.length !== this.dimensions) {
            throw new PipelineError(
              "CONSTRAINT_ERROR",
              `expected ${this.dimensions} dimensions, not ${input.embedding.length}`,
              { stage: "writing", details: { documentId: input.documentId, chunkIndex: input.index } }
            );
          }
          chunks.push(toChunkInsert(input));
        }
      },
    };

    const result = await work(tx);

    if (pending.document !== null || deleteChunksFor.size > 0 || chunks.length > 0) {
      const args: WriteDocumentArgs = {
        p_document: pending.document,
        p_delete_chunks_for: [...deleteChunksFor],
        p_chunks: chunks,
      };
      await this.execute(
        "write_document_with_chunks",
        "writing",
        () => {
          if (signal?.aborted) {
            throw abortedBeforeCommit();
          }
          const request = this.client.rpc("write_document_with_chunks", args);
          return signal ? request.abortSignal(signal) : request;
        },
        signal
      );
    }

    return result;
  }

  async getDocument(id: string): Promise<Document | null> {
    const data = await this.execute("documents.select", "writing", () =>
      this.client.from("documents").select("*").eq("id", id).limit(1)
    );
    const [row] = this.parse(z.array(documentRowSchema), data, "documents");
    if (!row) {
      return null;
    }
    return {
      id: row.id,
      title: row.title,
      content: row.content,
      fileType: row.file_type,
      ...(row.file_path !== null ? { filePath: row.file_path } : {}),
      ...(row.source_url !== null ? { sourceUrl: row.source_url } : {}),
      metadata: row.metadata,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  async getChunks(documentId: string): Promise<StoredChunk[]> {
    const data = await this.execute("document_chunks.select", "writing", () =>
      this.client
        .from("document_chunks")
        .select("*")
        .eq("document_id", documentId)
        .order("chunk_index", { ascending: true })
    );

    return this.parse(z.array(chunkRowSchema), data, "document_chunks").map((row) => ({
      id: row.id,
      documentId: row.document_id,
      index: row.chunk_index,
      text: row.chunk_text,
      wordCount: row.word_count,
      charCount: row.char_count,
      metadata: row.metadata,
      embedding: row.embedding,
      embeddingModel: row.embedding_model,
      createdAt: row.created_at,
    }));
  }

  async matchChunks(embedding: number[], options: MatchOptions): Promise<ChunkMatch[]> {
    if (embedding.length !== this.dimensions) {
      throw new PipelineError(
        "DIMENSION_MISMATCH",
        `Query vector has ${embedding.length} dimensions; store expects ${this.dimensions}`,
        { stage: "retrieving" }
      );
    }

    const data = await this.execute("match_document_chunks", "retrieving", () =>
      this.client.rpc("match_document_chunks", {
        query_embedding: JSON.stringify(embedding),
        match_count: options.topK,
        similarity_threshold: options.threshold,
      })
    );

    try {
      return parseMatchRows(data).filter((match) => match.similarity >= options.threshold);
    } catch (error) {
      throw new PipelineError(
        "STORAGE_ERROR",
        `Unexpected match_document_chunks response: ${getErrorMessage(error)}`,
        { stage: "retrieving", cause: error }
      );
    }
  }

  async deleteDocument(id: string): Promise<boolean> {
    const data = await this.execute("documents.delete", "writing", () =>
      this.client.from("documents").delete().eq("id", id).select("id")
    );
    return Array.isArray(data) && data.length > 0;
  }

  /**
   * Run a query with retries, unwrapping `{ data, error }`
   */
  private async execute(
    label: string,
    stage: PipelineStage,
    query: () => PromiseLike<QueryResponse>,
    signal?: AbortSignal
  ): Promise<unknown> {
    try {
      const { data } = await withRetry(
        async () => {
          const response = await query();
          if (response.error) {
            throw response.error;
          }
          return response.data;
        },
        {
          delaysMs: this.delays,
          isRetryable: (error) => !signal?.aborted && isTransientStorageError(error),
          onRetry: (attempt) => {
            if (attempt.delayMs !== null) {
              this.logger.warn(
                `${label}: attempt ${attempt.attempt}/${attempt.maxAttempts} failed (${attempt.category}): ${attempt.message}. Retrying in ${attempt.delayMs}ms`
              );
            }
          },
          sleep: this.sleep,
        }
      );
      return data;
    } catch (error) {
      throw toStoreError(error instanceof RetryFailedError ? error.lastError : error, stage);
    }
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, table: string): T {
    const parsed = schema.safeParse(data ?? []);
    if (!parsed.success) {
      throw new PipelineError(
        "STORAGE_ERROR",
        `Unexpected ${table} row shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
        { details: parsed.error.issues }
      );
    }
    return parsed.data;
  }
}
