import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { after, before, describe, it } from "node:test";
import { isPipelineError } from "../errors";
import { silentLogger } from "../logger";
import { InMemoryDocumentStore } from "./memory-store";
import { createPipeline, createPipelineFromEnv } from "./pipeline";
import { FakeChatClient, FakeEmbeddingProvider } from "./test-utils";

const VACATION = "Employees receive twenty vacation days each year.";
const PASSWORDS = "Passwords must be rotated every ninety days.";
const QUESTION = "How many vacation days do employees get?";

function fakeProvider(model = "test-embedding"): FakeEmbeddingProvider {
  return new FakeEmbeddingProvider({
    model,
    dimensions: 3,
    vectors: {
      [VACATION]: [1, 0, 0],
      [PASSWORDS]: [0, 1, 0],
      [QUESTION]: [3, 0, 4],
    },
  });
}

describe("createPipeline", () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "pipeline-test-"));
    await writeFile(path.join(dir, "vacation.txt"), VACATION);
    await writeFile(path.join(dir, "passwords.md"), PASSWORDS);
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("ingests a folder, retrieves by meaning and answers with citations", async () => {
    const chat = new FakeChatClient("Twenty days a year [Source 1].");
    const pipeline = createPipeline({
      provider: fakeProvider(),
      store: new InMemoryDocumentStore({ dimensions: 3 }),
      chat,
      config: { embeddingModel: "test-embedding", embeddingDimensions: 3 },
      logger: silentLogger,
    });

    const run = await pipeline.orchestrator.run([dir]);
    assert.deepEqual(
      run.results.map((result) => result.status),
      ["complete", "complete"]
    );

    const retrieved = await pipeline.retriever.retrieve(QUESTION);
    assert.ok(retrieved.ok);
    assert.equal(retrieved.value.status, "ok");
    if (retrieved.value.status !== "ok") return;
    assert.equal(retrieved.value.context, `[Source 1: vacation, chunk 0]\n${VACATION}`);

    assert.ok(pipeline.answerer);
    const answered = await pipeline.answerer.answer(retrieved.value);
    assert.ok(answered.ok);
    assert.deepEqual(answered.value.citedOrdinals, [1]);
    assert.equal(answered.value.sources[0].documentTitle, "vacation");
  });

  it("builds no answer generator without a chat client", () => {
    const pipeline = createPipeline({
      provider: fakeProvider(),
      store: new InMemoryDocumentStore({ dimensions: 3 }),
      config: { embeddingModel: "test-embedding", embeddingDimensions: 3 },
      logger: silentLogger,
    });

    assert.equal(pipeline.answerer, null);
  });

  it("flags a query embedder that differs from the configured model", async () => {
    const pipeline = createPipeline({
      provider: fakeProvider("another-model"),
      store: new InMemoryDocumentStore({ dimensions: 3 }),
      config: { embeddingModel: "test-embedding", embeddingDimensions: 3 },
      logger: silentLogger,
    });

    const retrieved = await pipeline.retriever.retrieve(QUESTION);

    assert.ok(retrieved.ok);
    assert.equal(retrieved.value.status, "model_mismatch");
  });
});

describe("createPipelineFromEnv", () => {
  it("requires an OpenAI key", () => {
    assert.throws(
      () => createPipelineFromEnv({ env: {}, dryRun: true, logger: silentLogger }),
      (error: unknown) => isPipelineError(error) && error.code === "CONFIGURATION_ERROR"
    );
  });

  it("uses the in-memory store for a dry run", () => {
    const pipeline = createPipelineFromEnv({
      env: { OPENAI_API_KEY: "test-key", RAG_EMBEDDING_DIMENSIONS: "256" },
      dryRun: true,
      logger: silentLogger,
    });

    assert.ok(pipeline.store instanceof InMemoryDocumentStore);
    assert.equal(pipeline.store.dimensions, 256);
    assert.equal(pipeline.embedder.dimensions, 256);
  });

  it("needs Supabase credentials outside a dry run", () => {
    assert.throws(
      () => createPipelineFromEnv({ env: { OPENAI_API_KEY: "test-key" }, logger: silentLogger }),
      (error: unknown) => isPipelineError(error) && error.code === "CONFIGURATION_ERROR"
    );
  });
});
