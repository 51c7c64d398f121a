/**
 * Answer Generation
 *
 * Turns a retrieval result into a grounded answer. The model only sees the
 * numbered context and is told to cite it as [Source N]; a question with
 * no relevant context gets a fixed reply and never reaches the model.
 */

import OpenAI from "openai";
import { err, ok, PipelineError, type Result } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { DEFAULT_RETRY_DELAYS_MS, isTransientError, RetryFailedError, withRetry } from "../retry";
import { toProviderError } from "./embedder";
import type { Citation, QueryResult, RankedChunk } from "./types";

export const NO_CONTEXT_ANSWER =
  "I don't have enough information to answer that question based on the available documents.";

const DEFAULT_CHAT_MODEL = "gpt-4o-mini";
const PREVIEW_CHARS = 200;

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatOptions {
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

/**
 * Chat completion backend. Failures should be ProviderErrors.
 */
export interface ChatClient {
  readonly model: string;
  complete(messages: ChatMessage[], options: ChatOptions): Promise<string>;
}

export interface OpenAIChatClientOptions {
  apiKey?: string;
  model?: string;
  client?: OpenAI;
}

export class OpenAIChatClient implements ChatClient {
  readonly model: string;
  private openai: OpenAI;

  constructor(options: OpenAIChatClientOptions = {}) {
    this.model = options.model ?? DEFAULT_CHAT_MODEL;

    if (options.client) {
      this.openai = options.client;
    } else {
      const apiKey = options.apiKey || process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new PipelineError(
          "CONFIGURATION_ERROR",
          "OpenAI API key is required for answer generation (set OPENAI_API_KEY)"
        );
      }
      this.openai = new OpenAI({ apiKey, maxRetries: 0 });
    }
  }

  async complete(messages: ChatMessage[], options: ChatOptions): Promise<string> {
    try {
      const response = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages,
          temperature: options.temperature,
          max_tokens: options.maxTokens,
        },
        { signal: options.signal }
      );
      return response.choices[0]?.message?.content ?? "";
    } catch (error) {
      throw toProviderError(error);
    }
  }
}

/**
 * System and user messages for a grounded answer
 */
export function buildQaPrompt(query: string, context: string): ChatMessage[] {
  const system = `You are a helpful assistant that answers questions based on the provided context.

INSTRUCTIONS:
1. Answer the question using ONLY the information provided in the CONTEXT section.
2. If the answer cannot be found in the context, respond with "${NO_CONTEXT_ANSWER}"
3. When referencing information, cite your sources using the [Source N] format (e.g., "According to [Source 1]...").
4. Be concise but comprehensive.
5. Do not make up or infer information that is not explicitly stated in the context.`;

  const user = `CONTEXT:
${context}

QUESTION:
${query}`;

  return [
    { role: "system", content: system },
    { role: "user", content: user },
  ];
}

/**
 * Ordinals referenced as [Source N] in an answer, split into those that
 * resolve to a citation and those that do not. Each ordinal appears once,
 * in order of first mention.
 */
export function parseCitations(
  answer: string,
  citations: Citation[]
): { cited: Citation[]; unresolved: number[] } {
  const byOrdinal = new Map(citations.map((citation) => [citation.ordinal, citation]));
  const seen = new Set<number>();
  const cited: Citation[] = [];
  const unresolved: number[] = [];

  for (const match of answer.matchAll(/\[Source (\d+)[^\]]*\]/g)) {
    const ordinal = Number(match[1]);
    if (seen.has(ordinal)) continue;
    seen.add(ordinal);

    const citation = byOrdinal.get(ordinal);
    if (citation) {
      cited.push(citation);
    } else {
      unresolved.push(ordinal);
    }
  }

  return { cited, unresolved };
}

export interface AnswerSource {
  ordinal: number;
  documentId: string;
  documentTitle: string;
  chunkIndex: number;
  similarity: number;
  preview: string;
}

export interface Answer {
  status: "answered" | "no_relevant_context";
  query: string;
  answer: string;
  /** Model that wrote the answer; null when no model was called */
  model: string | null;
  sources: AnswerSource[];
  citedOrdinals: number[];
  unresolvedOrdinals: number[];
}

export interface AnswerGeneratorOptions {
  temperature?: number;
  maxTokens?: number;
  retryDelaysMs?: readonly number[];
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

function preview(chunk: RankedChunk): string {
  return chunk.text.length > PREVIEW_CHARS
    ? `${chunk.text.slice(0, PREVIEW_CHARS)}...`
    : chunk.text;
}

export class AnswerGenerator {
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly delays: readonly number[];
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly chat: ChatClient,
    options: AnswerGeneratorOptions = {}
  ) {
    this.temperature = options.temperature ?? 0.1;
    this.maxTokens = options.maxTokens ?? 500;
    this.delays = options.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep;
  }

  async answer(result: QueryResult, signal?: AbortSignal): Promise<Result<Answer>> {
    if (result.status === "model_mismatch") {
      return err(
        new PipelineError(
          "MODEL_MISMATCH",
          `Query embedding model ${result.actual.model} (${result.actual.dimensions}d) does not match stored ${result.expected.model} (${result.expected.dimensions}d)`,
          { stage: "retrieving", details: { expected: result.expected, actual: result.actual } }
        )
      );
    }

    if (result.status === "no_relevant_context") {
      return ok({
        status: "no_relevant_context",
        query: result.query,
        answer: NO_CONTEXT_ANSWER,
        model: null,
        sources: [],
        citedOrdinals: [],
        unresolvedOrdinals: [],
      });
    }

    const messages = buildQaPrompt(result.query, result.context);
    let text: string;
    try {
      const { data } = await withRetry(
        () =>
          this.chat.complete(messages, {
            temperature: this.temperature,
            maxTokens: this.maxTokens,
            signal,
          }),
        {
          delaysMs: this.delays,
          isRetryable: (error) => !signal?.aborted && isTransientError(error),
          onRetry: (attempt) => {
            if (attempt.delayMs !== null) {
              this.logger.warn(
                `Answer attempt ${attempt.attempt}/${attempt.maxAttempts} failed (${attempt.category}): ${attempt.message}. Retrying in ${attempt.delayMs}ms`
              );
            }
          },
          sleep: this.sleep,
        }
      );
      text = data.trim();
    } catch (error) {
      if (!(error instanceof RetryFailedError)) {
        throw error;
      }
      return err(
        new PipelineError(
          error.detail.exhausted ? "TRANSIENT_PROVIDER_ERROR" : "PERMANENT_PROVIDER_ERROR",
          `Answer generation failed: ${error.detail.lastErrorMessage}`,
          { stage: "retrieving", retry: error.detail, cause: error.lastError }
        )
      );
    }

    const { cited, unresolved } = parseCitations(text, result.citations);
    if (unresolved.length > 0) {
      this.logger.warn(`Answer cites unknown source(s): ${unresolved.join(", ")}`);
    }

    return ok({
      status: "answered",
      query: result.query,
      answer: text,
      model: this.chat.model,
      sources: result.chunks.map((chunk, i) => ({
        ordinal: i + 1,
        documentId: chunk.documentId,
        documentTitle: chunk.documentTitle,
        chunkIndex: chunk.chunkIndex,
        similarity: chunk.similarity,
        preview: preview(chunk),
      })),
      citedOrdinals: cited.map((citation) => citation.ordinal),
      unresolvedOrdinals: unresolved,
    });
  }
}
