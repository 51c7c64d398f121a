/**
 * In-process DocumentStore.
 *
 * Mirrors the Postgres schema's guarantees: a chunk must reference a
 * committed (or same-transaction) document, (document, chunk index) is
 * unique, and embeddings must have exactly `dimensions` entries.
 * Transactions run one at a time against a staged copy that replaces the
 * live data only when the work resolves.
 */

import { randomUUID } from "crypto";
import { PipelineError } from "../errors";
import { Semaphore } from "../semaphore";
import {
  abortedBeforeCommit,
  type DocumentStore,
  type MatchOptions,
  type StoreTransaction,
  type TransactionOptions,
} from "./store";
import type {
  ChunkInput,
  ChunkMatch,
  Document,
  DocumentInput,
  StoredChunk,
} from "./types";

interface StoreState {
  documents: Map<string, Document>;
  chunks: Map<string, StoredChunk[]>;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export interface InMemoryDocumentStoreOptions {
  dimensions?: number;
  /** Clock used for timestamps */
  now?: () => Date;
}

export class InMemoryDocumentStore implements DocumentStore {
  readonly dimensions: number;
  private state: StoreState = { documents: new Map(), chunks: new Map() };
  private readonly lock = new Semaphore(1);
  private readonly now: () => Date;

  constructor(options: InMemoryDocumentStoreOptions = {}) {
    this.dimensions = options.dimensions ?? 1536;
    this.now = options.now ?? (() => new Date());
  }

  transaction<T>(
    work: (tx: StoreTransaction) => Promise<T>,
    options: TransactionOptions = {}
  ): Promise<T> {
    return this.lock.run(async () => {
      const staged: StoreState = {
        documents: new Map(this.state.documents),
        chunks: new Map(this.state.chunks),
      };
      const result = await work(this.createTransaction(staged));
      if (options.signal?.aborted) {
        throw abortedBeforeCommit();
      }
      this.state = staged;
      return result;
    });
  }

  async getDocument(id: string): Promise<Document | null> {
    const document = this.state.documents.get(id);
    return document ? { ...document } : null;
  }

  async getChunks(documentId: string): Promise<StoredChunk[]> {
    return (this.state.chunks.get(documentId) ?? [])
      .map((chunk) => ({ ...chunk }))
      .sort((a, b) => a.index - b.index);
  }

  async matchChunks(embedding: number[], options: MatchOptions): Promise<ChunkMatch[]> {
    if (embedding.length !== this.dimensions) {
      throw new PipelineError(
        "DIMENSION_MISMATCH",
        `Query vector has ${embedding.length} dimensions; store expects ${this.dimensions}`,
        { stage: "retrieving" }
      );
    }

    const matches: ChunkMatch[] = [];
    for (const [documentId, chunks] of this.state.chunks) {
      const title = this.state.documents.get(documentId)?.title ?? "";
      for (const chunk of chunks) {
        const similarity = Math.min(
          1,
          Math.max(0, cosineSimilarity(embedding, chunk.embedding))
        );
        if (similarity < options.threshold) continue;
        matches.push({
          chunkId: chunk.id,
          documentId,
          documentTitle: title,
          chunkIndex: chunk.index,
          text: chunk.text,
          metadata: { ...chunk.metadata },
          similarity,
        });
      }
    }

    return matches
      .sort(
        (a, b) =>
          b.similarity - a.similarity ||
          a.chunkIndex - b.chunkIndex ||
          compareIds(a.documentId, b.documentId) ||
          compareIds(a.chunkId, b.chunkId)
      )
      .slice(0, options.topK);
  }

  async deleteDocument(id: string): Promise<boolean> {
    return this.lock.run(async () => {
      const existed = this.state.documents.delete(id);
      this.state.chunks.delete(id);
      return existed;
    });
  }

  /** Number of stored documents and chunks */
  stats(): { documents: number; chunks: number } {
    let chunks = 0;
    for (const list of this.state.chunks.values()) {
      chunks += list.length;
    }
    return { documents: this.state.documents.size, chunks };
  }

  private createTransaction(staged: StoreState): StoreTransaction {
    return {
      upsertDocument: async (input: DocumentInput) => {
        const timestamp = this.now().toISOString();
        const existing = staged.documents.get(input.id);
        staged.documents.set(input.id, {
          ...input,
          metadata: { ...input.metadata },
          createdAt: existing?.createdAt ?? timestamp,
          updatedAt: timestamp,
        });
      },

      deleteChunks: async (documentId: string) => {
        staged.chunks.delete(documentId);
      },

      insertChunks: async (inputs: ChunkInput[]) => {
        for (const input of inputs) {
          this.insertChunk(staged, input);
        }
      },
    };
  }

  private insertChunk(staged: StoreState, input: ChunkInput): void {
    if (!staged.documents.has(input.documentId)) {
      throw new PipelineError(
        "INTEGRITY_ERROR",
        `Chunk ${input.index} references missing document ${input.documentId}`,
        { stage: "writing", details: { documentId: input.documentId, chunkIndex: input.index } }
      );
    }
    if (input.embedding.length !== this.dimensions) {
      throw new PipelineError(
        "CONSTRAINT_ERROR",
        `expected ${this.dimensions} dimensions, not ${input.embedding.length}`,
        { stage: "writing", details: { documentId: input.documentId, chunkIndex: input.index } }
      );
    }

    const existing = staged.chunks.get(input.documentId) ?? [];
    if (existing.some((chunk) => chunk.index === input.index)) {
      throw new PipelineError(
        "CONSTRAINT_ERROR",
        `Duplicate chunk index ${input.index} for document ${input.documentId}`,
        { stage: "writing", details: { documentId: input.documentId, chunkIndex: input.index } }
      );
    }

    staged.chunks.set(input.documentId, [
      ...existing,
      {
        ...input,
        embedding: [...input.embedding],
        metadata: { ...input.metadata },
        id: randomUUID(),
        createdAt: this.now().toISOString(),
      },
    ]);
  }
}
