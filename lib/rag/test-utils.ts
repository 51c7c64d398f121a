/**
 * In-process stand-ins used by the pipeline tests.
 */

import { ProviderError, type ProviderErrorCategory } from "../errors";
import type { Logger, LogLevel } from "../logger";
import type { ChatClient, ChatMessage } from "./answer";
import type { EmbeddingProvider } from "./embedder";

export interface FakeEmbeddingProviderOptions {
  model?: string;
  dimensions?: number;
  /** Fixed vectors for specific texts; other texts get a hashed vector */
  vectors?: Record<string, number[]>;
  /** Milliseconds to wait before answering */
  latencyMs?: number;
}

/**
 * Deterministic embedding provider. Texts not listed in `vectors` are
 * embedded as a normalized bag of hashed words, so similar texts land
 * near each other. Failures can be queued with `failNext`.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  readonly calls: string[][] = [];
  private readonly vectors: Map<string, number[]>;
  private readonly latencyMs: number;
  private readonly failures: unknown[] = [];
  private failAlwaysWith: unknown = undefined;

  constructor(options: FakeEmbeddingProviderOptions = {}) {
    this.model = options.model ?? "test-embedding";
    this.dimensions = options.dimensions ?? 8;
    this.vectors = new Map(Object.entries(options.vectors ?? {}));
    this.latencyMs = options.latencyMs ?? 0;
  }

  /** Queue errors thrown by the next calls, one per call */
  failNext(...errors: unknown[]): this {
    this.failures.push(...errors);
    return this;
  }

  /** Throw on every call from now on */
  failAlways(error: unknown): this {
    this.failAlwaysWith = error;
    return this;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    this.calls.push(texts);
    if (this.latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
    }
    signal?.throwIfAborted();

    if (this.failAlwaysWith !== undefined) {
      throw this.failAlwaysWith;
    }
    if (this.failures.length > 0) {
      throw this.failures.shift();
    }

    return texts.map(
      (text) => this.vectors.get(text) ?? hashedVector(text, this.dimensions)
    );
  }
}

/**
 * Chat client that returns a fixed reply and records every prompt
 */
export class FakeChatClient implements ChatClient {
  readonly model = "test-chat";
  readonly calls: ChatMessage[][] = [];
  private readonly failures: unknown[] = [];

  constructor(private readonly reply: string) {}

  failNext(...errors: unknown[]): this {
    this.failures.push(...errors);
    return this;
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    this.calls.push(messages);
    if (this.failures.length > 0) {
      throw this.failures.shift();
    }
    return this.reply;
  }
}

export function hashedVector(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    let hash = 0;
    for (const char of word) {
      hash = (hash * 31 + char.charCodeAt(0)) >>> 0;
    }
    vector[hash % dimensions] += 1;
  }

  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (norm === 0) {
    vector[0] = 1;
    return vector;
  }
  return vector.map((v) => v / norm);
}

export function providerError(
  category: ProviderErrorCategory,
  message = `${category} error`
): ProviderError {
  return new ProviderError(category, message);
}

/**
 * Sleep replacement that resolves immediately and records each wait
 */
export function recordingSleep(): {
  sleep: (ms: number) => Promise<void>;
  delays: number[];
} {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

export interface LogEntry {
  level: Exclude<LogLevel, "silent">;
  scope: string;
  message: string;
}

/**
 * Logger that keeps every line in memory
 */
export function memoryLogger(
  scope = "test",
  entries: LogEntry[] = []
): Logger & { entries: LogEntry[] } {
  const write = (level: LogEntry["level"]) => (message: string) => {
    entries.push({ level, scope, message });
  };
  return {
    scope,
    entries,
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
    child: (child: string) => memoryLogger(`${scope}/${child}`, entries),
  };
}
