#!/usr/bin/env tsx
/**
 * CLI script to ingest documents into the Q&A store.
 *
 * Usage:
 *   npx tsx scripts/ingest.ts <file-or-directory>... [options]
 *
 * Options:
 *   --concurrency <n>       Documents processed at once (default: RAG_CONCURRENCY or 10)
 *   --stop-on-first-error   Skip documents not yet started once one fails
 *   --output <path>         Write the JSON batch report to this path
 *   --dry-run               Use an in-memory store instead of Supabase
 *
 * Requires:
 *   - OPENAI_API_KEY: For generating embeddings
 *   - SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY: Unless --dry-run is set
 *
 * Exit codes: 0 all documents stored, 1 some failed, 2 bad arguments,
 * 3 configuration error.
 */

import "dotenv/config";

import chalk from "chalk";
import { parseArgs } from "node:util";
import type { PipelineConfigInput } from "../lib/config";
import { EXIT_CODES, getErrorMessage, isPipelineError, type ExitCode } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { buildBatchReport, createPipelineFromEnv, writeBatchReport } from "../lib/rag";

const USAGE = `Usage: tsx scripts/ingest.ts <file-or-directory>... [--concurrency n] [--stop-on-first-error] [--output report.json] [--dry-run]`;

const logger = createLogger("ingest");

function usageError(message: string): ExitCode {
  logger.error(message);
  console.error(USAGE);
  return EXIT_CODES.INVALID_ARGS;
}

function parseCli(args: string[]) {
  return parseArgs({
    args,
    allowPositionals: true,
    options: {
      concurrency: { type: "string" },
      "stop-on-first-error": { type: "boolean", default: false },
      output: { type: "string", short: "o" },
      "dry-run": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
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
  if (positionals.length === 0) {
    return usageError("No input paths given");
  }

  const overrides: PipelineConfigInput = {};
  if (values.concurrency !== undefined) {
    const concurrency = Number(values.concurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      return usageError(`--concurrency must be a positive integer (got "${values.concurrency}")`);
    }
    overrides.concurrency = concurrency;
  }
  if (values["stop-on-first-error"]) {
    overrides.stopOnFirstError = true;
  }

  const pipeline = createPipelineFromEnv({
    overrides,
    dryRun: values["dry-run"],
    logger,
  });

  if (values["dry-run"]) {
    logger.info(chalk.cyan("Dry run: chunks are kept in memory and discarded on exit"));
  }

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Cancelling: documents in progress will finish, the rest are skipped");
    controller.abort();
  });

  const run = await pipeline.orchestrator.run(positionals, { signal: controller.signal });
  const report = buildBatchReport(run);
  const { summary } = report;

  console.log(
    `\n${chalk.bold("Ingestion complete:")} ${chalk.green(`${summary.successful} stored`)}, ` +
      `${summary.failed > 0 ? chalk.red(`${summary.failed} failed`) : "0 failed"}, ` +
      `${summary.skipped} skipped, ${summary.total_chunks} chunk(s) in ${summary.total_time_ms}ms`
  );
  if (report.performance.bottleneck) {
    console.log(chalk.dim(`Slowest stage on average: ${report.performance.bottleneck}`));
  }

  if (values.output) {
    const written = await writeBatchReport(report, values.output);
    logger.info(`Report written to ${written}`);
  } else if (values["dry-run"]) {
    console.log(JSON.stringify(report, null, 2));
  }

  return summary.failed > 0 ? EXIT_CODES.DOCUMENT_FAILURES : EXIT_CODES.SUCCESS;
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
