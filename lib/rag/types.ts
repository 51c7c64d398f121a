/**
 * Shared data model for ingestion and retrieval.
 */

import type { PipelineErrorCode } from "../errors";
import type { RetryErrorDetail } from "../retry";

export type { RetryErrorDetail } from "../retry";

export type Metadata = Record<string, unknown>;

export const FILE_TYPES = ["text", "markdown", "pdf", "docx", "csv", "xlsx"] as const;

export type FileType = (typeof FILE_TYPES)[number];

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

export interface ExtractionMetadata {
  title: string;
  fileType: FileType;
  fileName: string;
  extension: string;
  byteSize: number;
  /** PDF pages */
  pageCount?: number;
  /** Spreadsheet/CSV rows */
  rowCount?: number;
  wordCount: number;
  charCount: number;
  modifiedAt: string;
}

export interface ExtractedDocument {
  text: string;
  metadata: ExtractionMetadata;
}

// ---------------------------------------------------------------------------
// Chunking & embedding
// ---------------------------------------------------------------------------

/** How a chunk's end was chosen */
export type ChunkStrategy = "sentence" | "paragraph" | "word";

/** Which text breaks may close a chunk */
export type ChunkBoundary = "sentence" | "paragraph";

export interface ChunkMetadata {
  /** Nearest preceding markdown heading */
  section?: string;
  /** 1-based page, when the source text carries page breaks */
  page?: number;
  strategy: ChunkStrategy;
}

export interface ChunkDraft {
  /** 0-based, unique within the document */
  index: number;
  text: string;
  wordCount: number;
  charCount: number;
  metadata: ChunkMetadata;
}

export interface EmbeddingRecord {
  chunkIndex: number;
  vector: number[];
  model: string;
  dimensions: number;
}

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

export interface Document {
  id: string;
  title: string;
  content: string;
  fileType: FileType;
  filePath?: string;
  sourceUrl?: string;
  metadata: Metadata;
  createdAt: string;
  updatedAt: string;
}

/** Document fields supplied by the pipeline; timestamps are owned by the store */
export type DocumentInput = Omit<Document, "createdAt" | "updatedAt">;

export interface ChunkInput {
  documentId: string;
  index: number;
  text: string;
  wordCount: number;
  charCount: number;
  metadata: Metadata;
  embedding: number[];
  embeddingModel: string;
}

export interface StoredChunk extends ChunkInput {
  id: string;
  createdAt: string;
}

export interface ChunkMatch {
  chunkId: string;
  documentId: string;
  documentTitle: string;
  chunkIndex: number;
  text: string;
  metadata: Metadata;
  /** Cosine similarity clamped to [0, 1] */
  similarity: number;
}

// ---------------------------------------------------------------------------
// Orchestration
// ---------------------------------------------------------------------------

export type ProcessingStage = "extracting" | "chunking" | "embedding" | "writing";

export const STAGE_ORDER: readonly ProcessingStage[] = [
  "extracting",
  "chunking",
  "embedding",
  "writing",
];

export type DocumentStatus = "queued" | ProcessingStage | "complete" | "failed";

export type StageTimings = Partial<Record<ProcessingStage, number>>;

export interface StageFailure {
  stage: ProcessingStage;
  code: PipelineErrorCode;
  name: string;
  message: string;
  retry?: RetryErrorDetail;
}

export interface ProcessingResult {
  filePath: string;
  status: "complete" | "failed" | "skipped";
  documentId?: string;
  title?: string;
  chunkCount: number;
  timings: StageTimings;
  totalMs: number;
  /** Statuses the document passed through, in order */
  transitions: DocumentStatus[];
  error?: StageFailure;
  /** Why a skipped document was never started */
  skippedReason?: string;
}

// ---------------------------------------------------------------------------
// Retrieval
// ---------------------------------------------------------------------------

export type RetrievalMode = "semantic" | "hybrid";

export interface RankedChunk extends ChunkMatch {
  /** Keyword overlap in [0, 1]; hybrid mode only */
  keywordScore?: number;
  /** Score used for ranking */
  score: number;
}

export interface Citation {
  ordinal: number;
  chunkId: string;
  documentId: string;
  documentTitle: string;
  chunkIndex: number;
  similarity: number;
  score: number;
}

export type QueryResult =
  | {
      status: "ok";
      query: string;
      mode: RetrievalMode;
      /** Query text actually searched, when synonyms were added */
      expandedQuery?: string;
      chunks: RankedChunk[];
      context: string;
      citations: Citation[];
      /** Ranked chunks left out to stay within the context budget */
      droppedForBudget: number;
    }
  | {
      status: "no_relevant_context";
      query: string;
      mode: RetrievalMode;
      threshold: number;
    }
  | {
      status: "model_mismatch";
      query: string;
      mode: RetrievalMode;
      expected: { model: string; dimensions: number };
      actual: { model: string; dimensions: number };
    };
