/**
 * Pipeline Error Taxonomy
 *
 * Every failure a pipeline stage can report is a PipelineError carrying a
 * machine-readable code, the stage it came from, and optional details.
 * Stage boundaries return Result<T> instead of throwing.
 */

import type { RetryErrorDetail } from "./retry";

/**
 * Pipeline stages, in execution order for ingestion, plus query-time retrieval.
 */
export type PipelineStage =
  | "extracting"
  | "chunking"
  | "embedding"
  | "writing"
  | "retrieving";

/**
 * Error codes for pipeline failures
 */
export type PipelineErrorCode =
  | "UNSUPPORTED_FORMAT"
  | "READ_FAILURE"
  | "FILE_TOO_LARGE"
  | "CHUNKING_DEGENERATE"
  | "TRANSIENT_PROVIDER_ERROR"
  | "PERMANENT_PROVIDER_ERROR"
  | "DIMENSION_MISMATCH"
  | "INTEGRITY_ERROR"
  | "CONSTRAINT_ERROR"
  | "STORAGE_ERROR"
  | "STAGE_TIMEOUT"
  | "CANCELLED"
  | "MODEL_MISMATCH"
  | "INVALID_QUERY"
  | "CONFIGURATION_ERROR"
  | "INTERNAL_ERROR";

/**
 * Display name for each code, as it appears in batch reports
 */
const ERROR_NAME_MAP: Record<PipelineErrorCode, string> = {
  UNSUPPORTED_FORMAT: "UnsupportedFormat",
  READ_FAILURE: "ReadFailure",
  FILE_TOO_LARGE: "ReadFailure",
  CHUNKING_DEGENERATE: "ChunkingDegenerate",
  TRANSIENT_PROVIDER_ERROR: "TransientProviderError",
  PERMANENT_PROVIDER_ERROR: "PermanentProviderError",
  DIMENSION_MISMATCH: "DimensionMismatch",
  INTEGRITY_ERROR: "IntegrityError",
  CONSTRAINT_ERROR: "ConstraintError",
  STORAGE_ERROR: "StorageError",
  STAGE_TIMEOUT: "StageTimeout",
  CANCELLED: "Cancelled",
  MODEL_MISMATCH: "ModelMismatch",
  INVALID_QUERY: "InvalidQuery",
  CONFIGURATION_ERROR: "ConfigurationError",
  INTERNAL_ERROR: "InternalError",
};

/**
 * Process exit codes used by the scripts
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  DOCUMENT_FAILURES: 1,
  INVALID_ARGS: 2,
  CONFIGURATION_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface PipelineErrorOptions {
  stage?: PipelineStage;
  details?: unknown;
  /** Retry history of the remote call that failed */
  retry?: RetryErrorDetail;
  cause?: unknown;
}

/**
 * Serialized form used in reports and JSON output
 */
export interface SerializedPipelineError {
  code: PipelineErrorCode;
  name: string;
  message: string;
  stage?: PipelineStage;
  details?: unknown;
  retry?: RetryErrorDetail;
}

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly stage?: PipelineStage;
  readonly details?: unknown;
  readonly retry?: RetryErrorDetail;

  constructor(
    code: PipelineErrorCode,
    message: string,
    options: PipelineErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = ERROR_NAME_MAP[code];
    this.code = code;
    this.stage = options.stage;
    this.details = options.details;
    this.retry = options.retry;
  }

  toJSON(): SerializedPipelineError {
    return {
      code: this.code,
      name: this.name,
      message: this.message,
      ...(this.stage ? { stage: this.stage } : {}),
      ...(this.details !== undefined ? { details: this.details } : {}),
      ...(this.retry ? { retry: this.retry } : {}),
    };
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Categories a remote provider failure is sorted into.
 * The first four are transient and retried; the rest fail immediately.
 */
export type ProviderErrorCategory =
  | "rate_limit"
  | "network"
  | "timeout"
  | "server"
  | "bad_request"
  | "auth"
  | "invalid_response"
  | "unknown";

export const TRANSIENT_CATEGORIES: ReadonlySet<ProviderErrorCategory> = new Set([
  "rate_limit",
  "network",
  "timeout",
  "server",
]);

/**
 * Error raised by embedding/generation provider adapters with an explicit category
 */
export class ProviderError extends Error {
  readonly category: ProviderErrorCategory;
  readonly status?: number;

  constructor(
    category: ProviderErrorCategory,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.category = category;
    this.status = options.status;
  }

  get transient(): boolean {
    return TRANSIENT_CATEGORIES.has(this.category);
  }
}

/**
 * Stage-boundary result: either a value or a PipelineError
 */
export type Result<T, E = PipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Helper to extract error message safely
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return "Unknown error";
}

/**
 * Wrap anything thrown into a PipelineError, keeping existing ones as-is
 */
export function toPipelineError(
  error: unknown,
  fallbackCode: PipelineErrorCode,
  stage?: PipelineStage
): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  return new PipelineError(fallbackCode, getErrorMessage(error), {
    stage,
    cause: error,
  });
}
