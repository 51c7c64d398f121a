/**
 * Document Q&A Pipeline
 *
 * Ingestion (extract → chunk → embed → write) and retrieval with
 * grounded answer generation.
 */

// Extraction
export { extract, normalizeText, countWords, type ExtractOptions } from "./extractor";
export { isSupportedFile, SUPPORTED_EXTENSIONS } from "./readers";

// Chunking
export { chunkText, chunkDocument, type ChunkOptions } from "./chunker";

// Embedding
export {
  Embedder,
  OpenAIEmbeddingProvider,
  toProviderError,
  type EmbeddingProvider,
  type EmbedderOptions,
  type BatchEmbeddingResult,
  type DocumentEmbeddingResult,
} from "./embedder";

// Storage
export type { DocumentStore, StoreTransaction, TransactionOptions, MatchOptions } from "./store";
export { InMemoryDocumentStore, cosineSimilarity } from "./memory-store";
export { SupabaseDocumentStore } from "./supabase-store";
export { DocumentWriter, type WriteResult } from "./writer";

// Orchestration
export {
  IngestionOrchestrator,
  discoverFiles,
  documentIdForPath,
  type BatchRun,
  type BatchRunOptions,
} from "./orchestrator";
export { buildBatchReport, writeBatchReport, type BatchReport } from "./report";

// Retrieval
export { Retriever, rankCandidates, assembleContext, type RetrieveOptions } from "./retriever";
export { tokenize, keywordOverlap } from "./keyword";
export { selectMode, expandQuery } from "./query";

// Answers
export {
  AnswerGenerator,
  OpenAIChatClient,
  parseCitations,
  NO_CONTEXT_ANSWER,
  type Answer,
  type ChatClient,
} from "./answer";

// Assembly
export { createPipeline, createPipelineFromEnv, type Pipeline } from "./pipeline";

export type * from "./types";
