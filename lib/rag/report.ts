/**
 * Batch Report
 *
 * Aggregates the per-document results of one orchestration run into the
 * JSON report written by the ingest script.
 */

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import type { BatchRun } from "./orchestrator";
import type { ProcessingResult, ProcessingStage, RetryErrorDetail } from "./types";
import { STAGE_ORDER } from "./types";

export interface ReportRetry {
  retry_count: number;
  exhausted: boolean;
  last_error_category: string;
  last_error_message: string;
  retry_delays_ms: number[];
}

export interface ReportError {
  stage: ProcessingStage;
  name: string;
  code: string;
  message: string;
  retry: ReportRetry | null;
}

export interface ReportEntry {
  file_path: string;
  document_id: string | null;
  title: string | null;
  status: ProcessingResult["status"];
  chunk_count: number;
  timings_ms: Partial<Record<ProcessingStage, number>>;
  total_ms: number;
  error: ReportError | null;
  skipped_reason: string | null;
}

export interface BatchReport {
  summary: {
    total: number;
    successful: number;
    failed: number;
    skipped: number;
    total_chunks: number;
    total_time_ms: number;
    /** Mean wall-clock time of the documents that ran */
    average_time_ms: number;
  };
  performance: {
    stage_average_ms: Record<ProcessingStage, number>;
    /** Stage with the highest average time; null when nothing ran */
    bottleneck: ProcessingStage | null;
  };
  results: ReportEntry[];
  errors_by_stage: Record<ProcessingStage, number>;
  started_at: string;
  finished_at: string;
  generated_at: string;
}

function round(ms: number): number {
  return Math.round(ms * 100) / 100;
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

function perStage<T>(value: (stage: ProcessingStage) => T): Record<ProcessingStage, T> {
  return {
    extracting: value("extracting"),
    chunking: value("chunking"),
    embedding: value("embedding"),
    writing: value("writing"),
  };
}

function toReportRetry(detail: RetryErrorDetail): ReportRetry {
  return {
    retry_count: detail.retryCount,
    exhausted: detail.exhausted,
    last_error_category: detail.lastErrorCategory,
    last_error_message: detail.lastErrorMessage,
    retry_delays_ms: [...detail.retryDelaysMs],
  };
}

function toReportEntry(result: ProcessingResult): ReportEntry {
  const timings: Partial<Record<ProcessingStage, number>> = {};
  for (const stage of STAGE_ORDER) {
    const ms = result.timings[stage];
    if (ms !== undefined) timings[stage] = round(ms);
  }

  return {
    file_path: result.filePath,
    document_id: result.documentId ?? null,
    title: result.title ?? null,
    status: result.status,
    chunk_count: result.chunkCount,
    timings_ms: timings,
    total_ms: round(result.totalMs),
    error: result.error
      ? {
          stage: result.error.stage,
          name: result.error.name,
          code: result.error.code,
          message: result.error.message,
          retry: result.error.retry ? toReportRetry(result.error.retry) : null,
        }
      : null,
    skipped_reason: result.skippedReason ?? null,
  };
}

/**
 * Build the batch report. Results keep their completion order.
 */
export function buildBatchReport(run: BatchRun, generatedAt: Date = new Date()): BatchReport {
  const { results } = run;
  const ran = results.filter((result) => result.status !== "skipped");

  const stageAverages = perStage((stage) =>
    round(
      mean(
        results
          .map((result) => result.timings[stage])
          .filter((ms): ms is number => ms !== undefined)
      )
    )
  );

  let bottleneck: ProcessingStage | null = null;
  for (const stage of STAGE_ORDER) {
    if (stageAverages[stage] > 0 && (bottleneck === null || stageAverages[stage] > stageAverages[bottleneck])) {
      bottleneck = stage;
    }
  }

  return {
    summary: {
      total: results.length,
      successful: results.filter((result) => result.status === "complete").length,
      failed: results.filter((result) => result.status === "failed").length,
      skipped: results.filter((result) => result.status === "skipped").length,
      total_chunks: results.reduce((sum, result) => sum + result.chunkCount, 0),
      total_time_ms: round(run.totalMs),
      average_time_ms: round(mean(ran.map((result) => result.totalMs))),
    },
    performance: {
      stage_average_ms: stageAverages,
      bottleneck,
    },
    results: results.map(toReportEntry),
    errors_by_stage: perStage(
      (stage) =>
        results.filter((result) => result.status === "failed" && result.error?.stage === stage).length
    ),
    started_at: run.startedAt,
    finished_at: run.finishedAt,
    generated_at: generatedAt.toISOString(),
  };
}

/**
 * Write the report as pretty-printed JSON, creating parent directories
 */
export async function writeBatchReport(report: BatchReport, outputPath: string): Promise<string> {
  const resolved = path.resolve(outputPath);
  await mkdir(path.dirname(resolved), { recursive: true });
  await writeFile(resolved, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
  return resolved;
}
