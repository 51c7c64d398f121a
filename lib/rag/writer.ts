/**
 * Document Writer
 *
 * Persists a document and its embedded chunks in one transaction: the
 * document row is upserted, its previous chunks are deleted, and the new
 * chunks are inserted in groups of `writeBatchSize`. Either everything
 * lands or nothing does.
 */

import { err, ok, PipelineError, toPipelineError, type Result } from "../errors";
import { silentLogger, type Logger } from "../logger";
import type { DocumentStore } from "./store";
import type { ChunkInput, Document, DocumentInput, StoredChunk } from "./types";

export interface WriteResult {
  documentId: string;
  chunkCount: number;
  /** Insert groups used inside the transaction */
  batches: number;
}

export interface DocumentWithChunks {
  document: Document;
  chunks: StoredChunk[];
}

export interface DocumentWriterOptions {
  /** Chunk rows per insert group (default: 50) */
  writeBatchSize?: number;
  logger?: Logger;
}

function writeError(
  code: "INTEGRITY_ERROR" | "CONSTRAINT_ERROR",
  message: string,
  details: Record<string, unknown>
): Result<never> {
  return err(new PipelineError(code, message, { stage: "writing", details }));
}

export class DocumentWriter {
  private readonly batchSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: DocumentStore,
    options: DocumentWriterOptions = {}
  ) {
    this.batchSize = options.writeBatchSize ?? 50;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Upsert the document and replace its chunks atomically. Aborting
   * `signal` before the commit rolls the write back (CANCELLED).
   */
  async write(
    document: DocumentInput,
    chunks: ChunkInput[],
    signal?: AbortSignal
  ): Promise<Result<WriteResult>> {
    const seen = new Set<number>();
    for (const chunk of chunks) {
      if (chunk.documentId !== document.id) {
        return writeError(
          "INTEGRITY_ERROR",
          `Chunk ${chunk.index} references document ${chunk.documentId}, not ${document.id}`,
          { documentId: document.id, chunkIndex: chunk.index }
        );
      }
      if (chunk.embedding.length !== this.store.dimensions) {
        return writeError(
          "CONSTRAINT_ERROR",
          `Chunk ${chunk.index} has a ${chunk.embedding.length}-dimensional vector; storage expects ${this.store.dimensions}`,
          { documentId: document.id, chunkIndex: chunk.index }
        );
      }
      if (seen.has(chunk.index)) {
        return writeError(
          "CONSTRAINT_ERROR",
          `Duplicate chunk index ${chunk.index}`,
          { documentId: document.id, chunkIndex: chunk.index }
        );
      }
      seen.add(chunk.index);
    }

    const ordered = [...chunks].sort((a, b) => a.index - b.index);
    let batches = 0;

    try {
      await this.store.transaction(
        async (tx) => {
          await tx.upsertDocument(document);
          await tx.deleteChunks(document.id);
          for (let i = 0; i < ordered.length; i += this.batchSize) {
            await tx.insertChunks(ordered.slice(i, i + this.batchSize));
            batches++;
          }
        },
        { signal }
      );
    } catch (error) {
      const failure = toPipelineError(error, "STORAGE_ERROR", "writing");
      this.logger.error(`Write failed for ${document.id} (${failure.code}): ${failure.message}`);
      return err(failure);
    }

    this.logger.debug(`Wrote ${document.id}: ${ordered.length} chunks in ${batches} batch(es)`);
    return ok({ documentId: document.id, chunkCount: ordered.length, batches });
  }

  /**
   * Read a document back with its chunks ordered by index
   */
  async getDocumentWithChunks(id: string): Promise<Result<DocumentWithChunks | null>> {
    try {
      const document = await this.store.getDocument(id);
      if (!document) {
        return ok(null);
      }
      const chunks = await this.store.getChunks(id);
      return ok({ document, chunks });
    } catch (error) {
      return err(toPipelineError(error, "STORAGE_ERROR", "writing"));
    }
  }
}
