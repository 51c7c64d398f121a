/**
 * Pipeline Assembly
 *
 * Wires one validated configuration into every component, so the
 * embedder, store and retriever always agree on model and dimensions.
 */

import { parsePipelineConfig, loadConfigFromEnv, type PipelineConfig, type PipelineConfigInput } from "../config";
import { PipelineError } from "../errors";
import { createLogger, type Logger } from "../logger";
import { getServiceSupabase } from "../supabase/server";
import { AnswerGenerator, OpenAIChatClient, type ChatClient } from "./answer";
import { Embedder, OpenAIEmbeddingProvider, type EmbeddingProvider } from "./embedder";
import { InMemoryDocumentStore } from "./memory-store";
import { IngestionOrchestrator } from "./orchestrator";
import { Retriever } from "./retriever";
import type { DocumentStore } from "./store";
import { SupabaseDocumentStore } from "./supabase-store";
import { DocumentWriter } from "./writer";

export interface CreatePipelineOptions {
  provider: EmbeddingProvider;
  store: DocumentStore;
  /** Needed only for answer generation */
  chat?: ChatClient;
  config?: PipelineConfigInput;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface Pipeline {
  config: PipelineConfig;
  store: DocumentStore;
  embedder: Embedder;
  writer: DocumentWriter;
  orchestrator: IngestionOrchestrator;
  retriever: Retriever;
  answerer: AnswerGenerator | null;
}

export function createPipeline(options: CreatePipelineOptions): Pipeline {
  const config = parsePipelineConfig(options.config ?? {});
  const logger = options.logger ?? createLogger("pipeline");

  const embedder = new Embedder(options.provider, {
    batchSize: config.embeddingBatchSize,
    retryDelaysMs: config.retryDelaysMs,
    logger: logger.child("embedder"),
    sleep: options.sleep,
  });
  const writer = new DocumentWriter(options.store, {
    writeBatchSize: config.writeBatchSize,
    logger: logger.child("writer"),
  });

  return {
    config,
    store: options.store,
    embedder,
    writer,
    orchestrator: new IngestionOrchestrator({
      embedder,
      writer,
      config,
      logger: logger.child("ingest"),
    }),
    retriever: new Retriever({
      embedder,
      store: options.store,
      config,
      logger: logger.child("retriever"),
    }),
    answerer: options.chat
      ? new AnswerGenerator(options.chat, {
          retryDelaysMs: config.retryDelaysMs,
          logger: logger.child("answer"),
          sleep: options.sleep,
        })
      : null,
  };
}

export interface PipelineFromEnvOptions {
  env?: NodeJS.ProcessEnv;
  overrides?: PipelineConfigInput;
  /** Keep everything in memory instead of writing to Supabase */
  dryRun?: boolean;
  /** Build a chat client for answer generation */
  withAnswers?: boolean;
  logger?: Logger;
}

/**
 * Production wiring: OpenAI for embeddings and answers, Supabase for storage.
 * Throws CONFIGURATION_ERROR when a required key is missing.
 */
export function createPipelineFromEnv(options: PipelineFromEnvOptions = {}): Pipeline {
  const env = options.env ?? process.env;
  const config = loadConfigFromEnv(env, options.overrides);
  const logger = options.logger ?? createLogger("pipeline");

  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new PipelineError("CONFIGURATION_ERROR", "Missing OPENAI_API_KEY environment variable");
  }

  const provider = new OpenAIEmbeddingProvider({
    apiKey,
    model: config.embeddingModel,
    dimensions: config.embeddingDimensions,
  });

  const store: DocumentStore = options.dryRun
    ? new InMemoryDocumentStore({ dimensions: config.embeddingDimensions })
    : new SupabaseDocumentStore(getServiceSupabase(env), {
        dimensions: config.embeddingDimensions,
        retryDelaysMs: config.retryDelaysMs,
        logger: logger.child("store"),
      });

  const chat = options.withAnswers
    ? new OpenAIChatClient({ apiKey, model: env.RAG_CHAT_MODEL || undefined })
    : undefined;

  return createPipeline({ provider, store, chat, config, logger });
}
