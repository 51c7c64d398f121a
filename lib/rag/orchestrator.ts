/**
 * Ingestion Orchestrator
 *
 * Drives each document through extracting → chunking → embedding → writing
 * and runs batches of documents with bounded concurrency. One document's
 * failure never affects another; every failure is recorded with the stage
 * it happened in.
 */

import crypto from "crypto";
import type { Dirent } from "fs";
import { readdir, stat } from "fs/promises";
import path from "path";
import type { PipelineConfig } from "../config";
import { err, getErrorMessage, ok, PipelineError, toPipelineError, type Result } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { Semaphore } from "../semaphore";
import { chunkDocument } from "./chunker";
import type { Embedder } from "./embedder";
import { extract } from "./extractor";
import { isSupportedFile } from "./readers";
import type {
  ChunkInput,
  DocumentInput,
  DocumentStatus,
  ProcessingResult,
  ProcessingStage,
  StageTimings,
} from "./types";
import type { DocumentWriter } from "./writer";

export interface OrchestratorOptions {
  embedder: Embedder;
  writer: DocumentWriter;
  config: PipelineConfig;
  logger?: Logger;
}

export interface BatchRunOptions {
  /** Aborting stops dispatch; documents already running finish */
  signal?: AbortSignal;
  /** Called once per document, in completion order */
  onResult?: (result: ProcessingResult, completed: number, total: number) => void;
}

export interface BatchRun {
  results: ProcessingResult[];
  startedAt: string;
  finishedAt: string;
  totalMs: number;
}

const IGNORED_DIRECTORIES = new Set(["node_modules"]);

/**
 * Stable UUID-shaped id derived from a file's absolute path, so that
 * re-ingesting the same file replaces its previous version.
 */
export function documentIdForPath(filePath: string): string {
  const hex = crypto.createHash("sha256").update(path.resolve(filePath)).digest("hex");
  const variant = ((parseInt(hex[16], 16) & 0x3) | 0x8).toString(16);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `5${hex.slice(13, 16)}`,
    `${variant}${hex.slice(17, 20)}`,
    hex.slice(20, 32),
  ].join("-");
}

function contentHash(text: string): string {
  return crypto.createHash("sha256").update(text).digest("hex");
}

async function walk(directory: string, found: string[]): Promise<void> {
  const entries: Dirent[] = await readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      if (!IGNORED_DIRECTORIES.has(entry.name)) {
        await walk(fullPath, found);
      }
    } else if (entry.isFile() && isSupportedFile(fullPath)) {
      found.push(fullPath);
    }
  }
}

/**
 * Expand an input path into the files to ingest.
 *
 * A directory yields its supported files recursively, sorted, skipping
 * dotfiles and node_modules. A file is returned as given, whatever its
 * extension, so that an unsupported file is reported rather than dropped.
 */
export async function discoverFiles(inputPath: string): Promise<Result<string[]>> {
  const resolved = path.resolve(inputPath);
  try {
    const info = await stat(resolved);
    if (!info.isDirectory()) {
      return ok([resolved]);
    }
    const found: string[] = [];
    await walk(resolved, found);
    return ok(found.sort());
  } catch (error) {
    return err(
      new PipelineError("READ_FAILURE", `Unable to read ${inputPath}: ${getErrorMessage(error)}`, {
        stage: "extracting",
        details: { filePath: resolved },
        cause: error,
      })
    );
  }
}

function failedResult(
  filePath: string,
  error: PipelineError,
  extra: Partial<ProcessingResult> = {}
): ProcessingResult {
  return {
    filePath,
    status: "failed",
    chunkCount: 0,
    timings: {},
    totalMs: 0,
    transitions: ["queued", "failed"],
    ...extra,
    error: {
      stage: error.stage && error.stage !== "retrieving" ? error.stage : "extracting",
      code: error.code,
      name: error.name,
      message: error.message,
      ...(error.retry ? { retry: error.retry } : {}),
    },
  };
}

export class IngestionOrchestrator {
  private readonly embedder: Embedder;
  private readonly writer: DocumentWriter;
  private readonly config: PipelineConfig;
  private readonly logger: Logger;

  constructor(options: OrchestratorOptions) {
    this.embedder = options.embedder;
    this.writer = options.writer;
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run one document through every stage. Never throws: any failure is
   * returned as a failed result naming the stage.
   */
  async processDocument(filePath: string): Promise<ProcessingResult> {
    const resolved = path.resolve(filePath);
    const documentId = documentIdForPath(resolved);
    const transitions: DocumentStatus[] = ["queued"];
    const timings: StageTimings = {};
    const started = performance.now();

    const stage = async <T>(
      name: ProcessingStage,
      work: (signal: AbortSignal) => Promise<Result<T>>
    ): Promise<Result<T>> => {
      transitions.push(name);
      const stageStarted = performance.now();
      const result = await this.runWithTimeout(name, work);
      timings[name] = performance.now() - stageStarted;
      return result;
    };

    const fail = (error: PipelineError, title?: string): ProcessingResult => {
      transitions.push("failed");
      return failedResult(resolved, error, {
        documentId,
        title,
        timings,
        totalMs: performance.now() - started,
        transitions,
      });
    };

    const extracted = await stage("extracting", () =>
      extract(resolved, { maxFileSizeBytes: this.config.maxFileSizeBytes })
    );
    if (!extracted.ok) return fail(extracted.error);
    const { text, metadata } = extracted.value;

    const chunked = await stage("chunking", async () =>
      chunkDocument(text, {
        chunkSize: this.config.chunkSize,
        chunkOverlap: this.config.chunkOverlap,
        boundary: this.config.chunkBoundary,
      })
    );
    if (!chunked.ok) return fail(chunked.error, metadata.title);
    const drafts = chunked.value;

    const embedded = await stage("embedding", (signal) =>
      this.embedder.embedDocument(drafts, signal)
    );
    if (!embedded.ok) return fail(embedded.error, metadata.title);

    const vectors = new Map(embedded.value.map((record) => [record.chunkIndex, record]));
    const chunks: ChunkInput[] = [];
    for (const draft of drafts) {
      const record = vectors.get(draft.index);
      if (!record) {
        return fail(
          new PipelineError("INTERNAL_ERROR", `No embedding returned for chunk ${draft.index}`, {
            stage: "embedding",
          }),
          metadata.title
        );
      }
      chunks.push({
        documentId,
        index: draft.index,
        text: draft.text,
        wordCount: draft.wordCount,
        charCount: draft.charCount,
        metadata: { ...draft.metadata },
        embedding: record.vector,
        embeddingModel: record.model,
      });
    }

    const document: DocumentInput = {
      id: documentId,
      title: metadata.title,
      content: text,
      fileType: metadata.fileType,
      filePath: resolved,
      metadata: {
        ...metadata,
        contentHash: contentHash(text),
        chunkCount: chunks.length,
        chunkSize: this.config.chunkSize,
        chunkOverlap: this.config.chunkOverlap,
        chunkBoundary: this.config.chunkBoundary,
        embeddingModel: this.embedder.model,
        embeddingDimensions: this.embedder.dimensions,
      },
    };

    const written = await stage("writing", (signal) => this.writer.write(document, chunks, signal));
    if (!written.ok) return fail(written.error, metadata.title);

    transitions.push("complete");
    return {
      filePath: resolved,
      status: "complete",
      documentId,
      title: metadata.title,
      chunkCount: written.value.chunkCount,
      timings,
      totalMs: performance.now() - started,
      transitions,
    };
  }

  /**
   * Ingest every file under the given paths. Results arrive in completion
   * order; documents never started (cancellation or stopOnFirstError) are
   * reported as skipped.
   */
  async run(inputPaths: string[], options: BatchRunOptions = {}): Promise<BatchRun> {
    const startedAt = new Date();
    const started = performance.now();
    const results: ProcessingResult[] = [];
    const unreadable: ProcessingResult[] = [];
    const queue: string[] = [];

    for (const inputPath of inputPaths) {
      const discovered = await discoverFiles(inputPath);
      if (discovered.ok) {
        queue.push(...discovered.value);
      } else {
        unreadable.push(failedResult(path.resolve(inputPath), discovered.error));
      }
    }

    const total = unreadable.length + queue.length;
    const semaphore = new Semaphore(this.config.concurrency);
    let stopReason: string | null = null;

    const record = (result: ProcessingResult) => {
      results.push(result);
      this.logResult(result, results.length, total);
      options.onResult?.(result, results.length, total);
    };

    unreadable.forEach(record);

    this.logger.info(
      `Ingesting ${queue.length} file(s) with concurrency ${this.config.concurrency}`
    );

    await Promise.all(
      queue.map((filePath) =>
        semaphore.run(async () => {
          if (options.signal?.aborted) {
            stopReason ??= "Batch cancelled before this document started";
          }
          if (stopReason) {
            record({
              filePath,
              status: "skipped",
              documentId: documentIdForPath(filePath),
              chunkCount: 0,
              timings: {},
              totalMs: 0,
              transitions: ["queued"],
              skippedReason: stopReason,
            });
            return;
          }

          const result = await this.processDocument(filePath);
          if (result.status === "failed" && this.config.stopOnFirstError) {
            stopReason ??= `Stopped after ${path.basename(result.filePath)} failed`;
          }
          record(result);
        })
      )
    );

    const finishedAt = new Date();
    return {
      results,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      totalMs: performance.now() - started,
    };
  }

  /**
   * Race a stage against the configured wall-clock limit. When the limit
   * passes the stage's signal is aborted and the work is still awaited, so
   * the document keeps its concurrency slot until nothing of it is running.
   * A write that commits anyway is reported as written.
   */
  private async runWithTimeout<T>(
    stage: ProcessingStage,
    work: (signal: AbortSignal) => Promise<Result<T>>
  ): Promise<Result<T>> {
    const limit = this.config.stageTimeoutMs;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<Result<T>>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(
          err(
            new PipelineError("STAGE_TIMEOUT", `${stage} did not finish within ${limit}ms`, {
              stage,
              details: { timeoutMs: limit },
            })
          )
        );
      }, limit);
    });

    const guarded = work(controller.signal).catch((error: unknown) =>
      err(toPipelineError(error, "INTERNAL_ERROR", stage))
    );

    const outcome = await Promise.race([guarded, timeout]);
    clearTimeout(timer);
    if (!controller.signal.aborted) {
      return outcome;
    }

    const settled = await guarded;
    if (stage === "writing" && settled.ok) {
      this.logger.warn(`writing committed after its ${limit}ms limit`);
      return settled;
    }
    return outcome;
  }

  private logResult(result: ProcessingResult, completed: number, total: number): void {
    const progress = `[${completed}/${total}]`;
    const name = path.basename(result.filePath);

    if (result.status === "complete") {
      this.logger.info(
        `${progress} ✓ ${name}: ${result.chunkCount} chunk(s) in ${Math.round(result.totalMs)}ms`
      );
    } else if (result.status === "skipped") {
      this.logger.warn(`${progress} - ${name}: skipped (${result.skippedReason ?? "not started"})`);
    } else if (result.error) {
      this.logger.error(
        `${progress} ✗ ${name}: ${result.error.name} at ${result.error.stage}: ${result.error.message}`
      );
    }
  }
}
