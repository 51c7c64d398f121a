#!/usr/bin/env tsx
/**
 * CLI script to query ingested documents.
 *
 * Usage:
 *   npx tsx scripts/search.ts "<question>" [--mode semantic|hybrid|auto] [--top-k n]
 *                             [--threshold x] [--expand] [--max-per-document n]
 *                             [--answer] [--json]
 *
 * Requires OPENAI_API_KEY, SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.
 * With --answer, RAG_CHAT_MODEL picks the chat model (default: gpt-4o-mini).
 */

import "dotenv/config";

import chalk from "chalk";
import { parseArgs } from "node:util";
import { EXIT_CODES, getErrorMessage, isPipelineError, type ExitCode } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { createPipelineFromEnv, type QueryResult, type RetrievalMode } from "../lib/rag";

const USAGE = `Usage: tsx scripts/search.ts "<question>" [--mode semantic|hybrid|auto] [--top-k n] [--threshold x] [--expand] [--max-per-document n] [--answer] [--json]`;

const logger = createLogger("search");

function usageError(message: string): ExitCode {
  logger.error(message);
  console.error(USAGE);
  return EXIT_CODES.INVALID_ARGS;
}

function isModeOption(value: string): value is RetrievalMode | "auto" {
  return value === "semantic" || value === "hybrid" || value === "auto";
}

function parseCli(args: string[]) {
  return parseArgs({
    args,
    allowPositionals: true,
    options: {
      mode: { type: "string", default: "semantic" },
      "top-k": { type: "string" },
      threshold: { type: "string" },
      expand: { type: "boolean", default: false },
      "max-per-document": { type: "string" },
      answer: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

function printRetrieval(result: QueryResult): void {
  switch (result.status) {
    case "ok":
      console.log(chalk.bold(`\n${result.chunks.length} result(s) for "${result.query}" (${result.mode}):\n`));
      if (result.expandedQuery) {
        console.log(chalk.dim(`Searched as: ${result.expandedQuery}\n`));
      }
      result.chunks.forEach((chunk, i) => {
        const score =
          chunk.keywordScore !== undefined
            ? `score ${chunk.score.toFixed(3)}, similarity ${chunk.similarity.toFixed(3)}, keyword ${chunk.keywordScore.toFixed(3)}`
            : `similarity ${chunk.similarity.toFixed(3)}`;
        console.log(`${chalk.cyan(`[${i + 1}]`)} ${chunk.documentTitle}, chunk ${chunk.chunkIndex} ${chalk.dim(`(${score})`)}`);
        console.log(`    ${chunk.text.slice(0, 200).replace(/\s+/g, " ")}${chunk.text.length > 200 ? "..." : ""}\n`);
      });
      if (result.droppedForBudget > 0) {
        console.log(chalk.dim(`${result.droppedForBudget} lower-scoring chunk(s) left out to fit the context budget`));
      }
      return;
    case "no_relevant_context":
      console.log(chalk.yellow(`No chunk reached similarity ${result.threshold} for "${result.query}".`));
      return;
    case "model_mismatch":
      console.log(
        chalk.red(
          `Stored chunks use ${result.expected.model} (${result.expected.dimensions}d) but queries use ${result.actual.model} (${result.actual.dimensions}d). Re-ingest or change RAG_EMBEDDING_MODEL.`
        )
      );
      return;
  }
}

async function main(): Promise<ExitCode> {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(process.argv.slice(2));
  } catch (error) {
    return usageError(getErrorMessage(error));
  }

  const { values, positionals } = parsed;
  if (values.help) {
    console.log(USAGE);
    return EXIT_CODES.SUCCESS;
  }

  const query = positionals.join(" ").trim();
  if (!query) {
    return usageError("No question given");
  }
  const mode = values.mode;
  if (!isModeOption(mode)) {
    return usageError(`--mode must be "semantic", "hybrid" or "auto" (got "${mode}")`);
  }
  const topK = values["top-k"] !== undefined ? Number(values["top-k"]) : undefined;
  if (topK !== undefined && (!Number.isInteger(topK) || topK < 1)) {
    return usageError(`--top-k must be a positive integer (got "${values["top-k"]}")`);
  }
  const threshold = values.threshold !== undefined ? Number(values.threshold) : undefined;
  if (threshold !== undefined && !(threshold >= 0 && threshold <= 1)) {
    return usageError(`--threshold must be between 0 and 1 (got "${values.threshold}")`);
  }
  const maxPerDocument =
    values["max-per-document"] !== undefined ? Number(values["max-per-document"]) : undefined;
  if (maxPerDocument !== undefined && (!Number.isInteger(maxPerDocument) || maxPerDocument < 1)) {
    return usageError(`--max-per-document must be a positive integer (got "${values["max-per-document"]}")`);
  }

  const pipeline = createPipelineFromEnv({ withAnswers: values.answer, logger });

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const retrieved = await pipeline.retriever.retrieve(query, {
    mode,
    topK,
    threshold,
    expandQuery: values.expand,
    maxPerDocument,
    signal: controller.signal,
  });
  if (!retrieved.ok) {
    logger.error(`${retrieved.error.name}: ${retrieved.error.message}`);
    if (values.json) console.log(JSON.stringify({ error: retrieved.error }, null, 2));
    return EXIT_CODES.DOCUMENT_FAILURES;
  }

  if (!values.answer || !pipeline.answerer) {
    if (values.json) {
      console.log(JSON.stringify(retrieved.value, null, 2));
    } else {
      printRetrieval(retrieved.value);
    }
    return retrieved.value.status === "model_mismatch" ? EXIT_CODES.DOCUMENT_FAILURES : EXIT_CODES.SUCCESS;
  }

  const answered = await pipeline.answerer.answer(retrieved.value, controller.signal);
  if (!answered.ok) {
    logger.error(`${answered.error.name}: ${answered.error.message}`);
    if (values.json) console.log(JSON.stringify({ error: answered.error }, null, 2));
    return EXIT_CODES.DOCUMENT_FAILURES;
  }

  const answer = answered.value;
  if (values.json) {
    console.log(JSON.stringify(answer, null, 2));
    return EXIT_CODES.SUCCESS;
  }

  console.log(`\n${answer.answer}\n`);
  if (answer.sources.length > 0) {
    console.log(chalk.bold("Sources:"));
    for (const source of answer.sources) {
      const marker = answer.citedOrdinals.includes(source.ordinal) ? chalk.green("*") : " ";
      console.log(
        `${marker} [Source ${source.ordinal}] ${source.documentTitle}, chunk ${source.chunkIndex} ${chalk.dim(`(similarity ${source.similarity.toFixed(3)})`)}`
      );
    }
  }
  return EXIT_CODES.SUCCESS;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (isPipelineError(error) && error.code === "CONFIGURATION_ERROR") {
      logger.error(error.message);
      process.exitCode = EXIT_CODES.CONFIGURATION_ERROR;
      return;
    }
    logger.error(`Unexpected error: ${getErrorMessage(error)}`);
    process.exitCode = EXIT_CODES.DOCUMENT_FAILURES;
  });
