/**
 * Fixed-Schedule Retry Logic for Remote Calls
 *
 * Retries transient failures such as:
 * - Rate limiting (429 errors)
 * - Network resets and timeouts
 * - Temporary provider/database unavailability
 *
 * The wait before retry N is the Nth entry of a fixed delay list, so the
 * retry budget and worst-case total wait are known up front. Non-transient
 * errors fail on the spot without consuming the budget.
 */

import {
  getErrorMessage,
  ProviderError,
  TRANSIENT_CATEGORIES,
  type ProviderErrorCategory,
} from "./errors";

/**
 * Default wait schedule: 1s, 2s, 4s (3 retries, 4 attempts total)
 */
export const DEFAULT_RETRY_DELAYS_MS: readonly number[] = [1000, 2000, 4000];

/**
 * One failed attempt, as logged and reported
 */
export interface RetryAttempt {
  /** 1-based attempt number */
  attempt: number;
  /** Total attempts allowed (retries + 1) */
  maxAttempts: number;
  category: ProviderErrorCategory;
  message: string;
  /** Wait before the next attempt, or null when no further attempt follows */
  delayMs: number | null;
}

/**
 * Describes a failed retried operation. Never persisted, only reported.
 */
export interface RetryErrorDetail {
  /** Retries performed after the first attempt */
  retryCount: number;
  /** True when every allowed attempt failed with a transient error */
  exhausted: boolean;
  lastErrorCategory: ProviderErrorCategory;
  lastErrorMessage: string;
  /** Every wait actually slept, in order */
  retryDelaysMs: number[];
  attempts: RetryAttempt[];
}

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Wait before each retry, in order; its length is the retry budget */
  delaysMs?: readonly number[];
  /** Function to determine if an error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Callback for logging failed attempts */
  onRetry?: (attempt: RetryAttempt) => void;
  /** Sleep implementation (tests swap in a recorder) */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * HTTP status codes that indicate transient errors
 */
const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

const MESSAGE_CATEGORY_PATTERNS: Array<[RegExp, ProviderErrorCategory]> = [
  [/rate limit|too many requests/i, "rate_limit"],
  [/timeout|timed out|ETIMEDOUT/i, "timeout"],
  [/network|ECONNRESET|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|socket hang up|fetch failed/i, "network"],
  [/temporarily unavailable|overloaded|service unavailable/i, "server"],
];

export function categoryForStatus(status: number): ProviderErrorCategory {
  if (status === 429) return "rate_limit";
  if (status === 408) return "timeout";
  if (status >= 500) return "server";
  if (status === 401 || status === 403) return "auth";
  if (status >= 400) return "bad_request";
  return "unknown";
}

/**
 * Sort any thrown value into a provider error category
 */
export function classifyProviderError(error: unknown): ProviderErrorCategory {
  if (!error) return "unknown";

  if (error instanceof ProviderError) {
    return error.category;
  }

  if (
    typeof error === "object" &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return categoryForStatus(error.status);
  }

  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return "timeout";
    }
    if (error.name === "NetworkError") {
      return "network";
    }
  }

  const message = getErrorMessage(error);
  for (const [pattern, category] of MESSAGE_CATEGORY_PATTERNS) {
    if (pattern.test(message)) {
      return category;
    }
  }

  return "unknown";
}

/**
 * Determines if an error is transient and should be retried
 */
export function isTransientError(error: unknown): boolean {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number" &&
    !(error instanceof ProviderError)
  ) {
    return RETRYABLE_STATUS_CODES.has(error.status);
  }
  return TRANSIENT_CATEGORIES.has(classifyProviderError(error));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Result of a retried operation
 */
export interface RetryResult<T> {
  data: T;
  /** Number of attempts made (1 = succeeded on first try) */
  attempts: number;
  /** Waits slept before succeeding */
  retryDelaysMs: number[];
  totalTimeMs: number;
}

/**
 * Thrown when a retried operation fails for good, either because the
 * budget ran out or because a non-retryable error came back.
 */
export class RetryFailedError extends Error {
  readonly detail: RetryErrorDetail;
  readonly lastError: unknown;
  readonly totalTimeMs: number;

  constructor(detail: RetryErrorDetail, lastError: unknown, totalTimeMs: number) {
    super(
      detail.exhausted
        ? `All ${detail.retryCount + 1} attempts failed. Last error: ${detail.lastErrorMessage}`
        : `Non-retryable error after ${detail.retryCount + 1} attempt(s): ${detail.lastErrorMessage}`,
      { cause: lastError }
    );
    this.name = "RetryFailedError";
    this.detail = detail;
    this.lastError = lastError;
    this.totalTimeMs = totalTimeMs;
  }
}

/**
 * Wraps an async operation with fixed-schedule retries.
 *
 * @example
 * ```ts
 * const { data } = await withRetry(() => provider.embed(texts), {
 *   onRetry: (a) => logger.warn(`Attempt ${a.attempt}/${a.maxAttempts} failed`),
 * });
 * ```
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {}
): Promise<RetryResult<T>> {
  const delays = config.delaysMs ?? DEFAULT_RETRY_DELAYS_MS;
  const isRetryable = config.isRetryable ?? isTransientError;
  const wait = config.sleep ?? sleep;
  const maxAttempts = delays.length + 1;

  const startTime = Date.now();
  const attempts: RetryAttempt[] = [];
  const slept: number[] = [];

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const data = await operation();
      return {
        data,
        attempts: attempt,
        retryDelaysMs: slept,
        totalTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      const retryable = isRetryable(error);
      const hasBudget = attempt < maxAttempts;
      const delayMs = retryable && hasBudget ? delays[attempt - 1] : null;

      const record: RetryAttempt = {
        attempt,
        maxAttempts,
        category: classifyProviderError(error),
        message: getErrorMessage(error),
        delayMs,
      };
      attempts.push(record);
      config.onRetry?.(record);

      if (delayMs === null) {
        throw new RetryFailedError(
          {
            retryCount: attempt - 1,
            exhausted: retryable,
            lastErrorCategory: record.category,
            lastErrorMessage: record.message,
            retryDelaysMs: slept,
            attempts,
          },
          error,
          Date.now() - startTime
        );
      }

      slept.push(delayMs);
      await wait(delayMs);
    }
  }

  // Unreachable: the last attempt either returns or throws above
  throw new Error("withRetry exited without a result");
}
