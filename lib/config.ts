/**
 * Pipeline Configuration
 *
 * A single typed configuration object, validated once when a pipeline is
 * constructed. Environment variables (RAG_*) map onto the same schema;
 * anything unset falls back to the documented defaults.
 */

import { z } from "zod";
import { PipelineError } from "./errors";

export const pipelineConfigSchema = z
  .object({
    /** Target chunk size in words */
    chunkSize: z.number().int().positive().default(500),
    /** Words shared between adjacent chunks */
    chunkOverlap: z.number().int().nonnegative().default(50),
    /** Breaks that may close a chunk: sentence ends only, or paragraph ends too */
    chunkBoundary: z.enum(["sentence", "paragraph"]).default("paragraph"),
    embeddingModel: z.string().min(1).default("text-embedding-3-small"),
    embeddingDimensions: z.number().int().positive().default(1536),
    /** Chunk texts per embedding request */
    embeddingBatchSize: z.number().int().positive().max(2048).default(100),
    /** Wait before each retry; length is the retry budget */
    retryDelaysMs: z
      .array(z.number().int().nonnegative())
      .default([1000, 2000, 4000]),
    /** Chunk rows per insert statement group */
    writeBatchSize: z.number().int().positive().default(50),
    /** Documents processed at once */
    concurrency: z.number().int().positive().default(10),
    stopOnFirstError: z.boolean().default(false),
    /** Wall-clock limit for any single stage of one document */
    stageTimeoutMs: z.number().int().positive().default(120_000),
    maxFileSizeBytes: z
      .number()
      .int()
      .positive()
      .default(10 * 1024 * 1024),
    /** Minimum cosine similarity for a chunk to be retrieved */
    similarityThreshold: z.number().min(0).max(1).default(0.5),
    topK: z.number().int().positive().max(100).default(5),
    /** Hybrid mode: weight of the semantic score; keyword gets the rest */
    semanticWeight: z.number().min(0).max(1).default(0.7),
    /** Character budget for assembled context */
    contextCharBudget: z.number().int().positive().default(12_000),
  })
  .refine((config) => config.chunkOverlap < config.chunkSize, {
    message: "chunkOverlap must be smaller than chunkSize",
    path: ["chunkOverlap"],
  });

export type PipelineConfig = z.output<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

/**
 * Validate and fill defaults. Throws CONFIGURATION_ERROR listing every bad field.
 */
export function parsePipelineConfig(input: unknown = {}): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
    );
    throw new PipelineError(
      "CONFIGURATION_ERROR",
      `Invalid pipeline configuration: ${issues.join("; ")}`,
      { details: issues }
    );
  }
  return parsed.data;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = parsePipelineConfig();

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

function booleanFromEnv(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return value.trim().toLowerCase() === "true";
}

function listFromEnv(value: string | undefined): number[] | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return value.split(",").map((part) => Number(part.trim()));
}

/**
 * Build the pipeline configuration from environment variables
 *
 * - RAG_CHUNK_SIZE, RAG_CHUNK_OVERLAP, RAG_CHUNK_BOUNDARY (sentence|paragraph)
 * - RAG_EMBEDDING_MODEL, RAG_EMBEDDING_DIMENSIONS, RAG_EMBEDDING_BATCH_SIZE
 * - RAG_RETRY_DELAYS_MS (comma-separated, e.g. "1000,2000,4000")
 * - RAG_WRITE_BATCH_SIZE, RAG_CONCURRENCY, RAG_STOP_ON_FIRST_ERROR
 * - RAG_STAGE_TIMEOUT_MS, RAG_MAX_FILE_SIZE_BYTES
 * - RAG_SIMILARITY_THRESHOLD, RAG_TOP_K, RAG_SEMANTIC_WEIGHT, RAG_CONTEXT_CHAR_BUDGET
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: PipelineConfigInput = {}
): PipelineConfig {
  // Raw values; the schema reports any that are invalid
  const fromEnv: Partial<Record<keyof PipelineConfigInput, unknown>> = {
    chunkSize: numberFromEnv(env.RAG_CHUNK_SIZE),
    chunkOverlap: numberFromEnv(env.RAG_CHUNK_OVERLAP),
    chunkBoundary: env.RAG_CHUNK_BOUNDARY?.trim() || undefined,
    embeddingModel: env.RAG_EMBEDDING_MODEL || undefined,
    embeddingDimensions: numberFromEnv(env.RAG_EMBEDDING_DIMENSIONS),
    embeddingBatchSize: numberFromEnv(env.RAG_EMBEDDING_BATCH_SIZE),
    retryDelaysMs: listFromEnv(env.RAG_RETRY_DELAYS_MS),
    writeBatchSize: numberFromEnv(env.RAG_WRITE_BATCH_SIZE),
    concurrency: numberFromEnv(env.RAG_CONCURRENCY),
    stopOnFirstError: booleanFromEnv(env.RAG_STOP_ON_FIRST_ERROR),
    stageTimeoutMs: numberFromEnv(env.RAG_STAGE_TIMEOUT_MS),
    maxFileSizeBytes: numberFromEnv(env.RAG_MAX_FILE_SIZE_BYTES),
    similarityThreshold: numberFromEnv(env.RAG_SIMILARITY_THRESHOLD),
    topK: numberFromEnv(env.RAG_TOP_K),
    semanticWeight: numberFromEnv(env.RAG_SEMANTIC_WEIGHT),
    contextCharBudget: numberFromEnv(env.RAG_CONTEXT_CHAR_BUDGET),
  };

  const defined = Object.fromEntries(
    Object.entries({ ...fromEnv, ...overrides }).filter(
      ([, value]) => value !== undefined
    )
  );

  return parsePipelineConfig(defined);
}
