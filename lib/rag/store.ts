/**
 * Storage contract shared by the Writer and the Retriever.
 *
 * Implementations throw PipelineError with code INTEGRITY_ERROR,
 * CONSTRAINT_ERROR, DIMENSION_MISMATCH or STORAGE_ERROR.
 */

import { PipelineError } from "../errors";
import type {
  ChunkInput,
  ChunkMatch,
  Document,
  DocumentInput,
  StoredChunk,
} from "./types";

/**
 * Mutations staged inside one transaction. Nothing is visible to readers
 * until the transaction's work resolves; if it rejects, nothing lands.
 */
export interface StoreTransaction {
  upsertDocument(document: DocumentInput): Promise<void>;
  /** Remove every chunk of the document */
  deleteChunks(documentId: string): Promise<void>;
  insertChunks(chunks: ChunkInput[]): Promise<void>;
}

export interface TransactionOptions {
  /** Once aborted, the transaction rolls back instead of committing */
  signal?: AbortSignal;
}

export interface MatchOptions {
  topK: number;
  /** Minimum similarity in [0, 1]; lower matches are excluded */
  threshold: number;
}

export function abortedBeforeCommit(): PipelineError {
  return new PipelineError("CANCELLED", "Transaction aborted before commit", {
    stage: "writing",
  });
}

export interface DocumentStore {
  /** Vector length enforced on chunk embeddings */
  readonly dimensions: number;

  /**
   * Run `work` against a staged transaction and commit it. Rejects with
   * CANCELLED, leaving storage untouched, when `signal` is aborted before
   * the commit.
   */
  transaction<T>(
    work: (tx: StoreTransaction) => Promise<T>,
    options?: TransactionOptions
  ): Promise<T>;

  getDocument(id: string): Promise<Document | null>;

  /** Chunks of one document ordered by chunk index */
  getChunks(documentId: string): Promise<StoredChunk[]>;

  /**
   * Nearest chunks by cosine similarity, highest first, at most `topK`,
   * none below `threshold`.
   */
  matchChunks(embedding: number[], options: MatchOptions): Promise<ChunkMatch[]>;

  /** Delete a document and, by cascade, its chunks */
  deleteDocument(id: string): Promise<boolean>;
}
