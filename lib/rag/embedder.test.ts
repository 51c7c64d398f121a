import assert from "node:assert/strict";
import { describe, it } from "node:test";
import OpenAI from "openai";
import { Embedder, toProviderError } from "./embedder";
import {
  FakeEmbeddingProvider,
  memoryLogger,
  providerError,
  recordingSleep,
} from "./test-utils";

function drafts(count: number) {
  return Array.from({ length: count }, (_, index) => ({
    index,
    text: `chunk number ${index}`,
  }));
}

describe("Embedder.embedBatch", () => {
  it("retries twice on transient errors then succeeds after 1s and 2s waits", async () => {
    const provider = new FakeEmbeddingProvider().failNext(
      providerError("rate_limit"),
      providerError("network")
    );
    const recorder = recordingSleep();
    const embedder = new Embedder(provider, { sleep: recorder.sleep });

    const result = await embedder.embedBatch(drafts(3));

    assert.equal(result.errorDetail, null);
    assert.equal(result.embeddings.length, 3);
    assert.equal(result.attempts, 3);
    assert.deepEqual(recorder.delays, [1000, 2000]);
    assert.equal(provider.calls.length, 3);
  });

  it("returns no embeddings and the full retry history after four failed attempts", async () => {
    const provider = new FakeEmbeddingProvider().failAlways(
      providerError("server", "upstream unavailable")
    );
    const recorder = recordingSleep();
    const embedder = new Embedder(provider, { sleep: recorder.sleep });

    const result = await embedder.embedBatch(drafts(2));

    assert.deepEqual(result.embeddings, []);
    assert.ok(result.errorDetail);
    assert.equal(result.errorDetail.retryCount, 3);
    assert.deepEqual(result.errorDetail.retryDelaysMs, [1000, 2000, 4000]);
    assert.equal(result.errorDetail.exhausted, true);
    assert.equal(result.errorDetail.lastErrorCategory, "server");
    assert.equal(result.errorDetail.lastErrorMessage, "upstream unavailable");
    assert.equal(result.errorCode, "TRANSIENT_PROVIDER_ERROR");
    assert.deepEqual(recorder.delays, [1000, 2000, 4000]);
    assert.equal(provider.calls.length, 4);
  });

  it("fails immediately on a permanent error without sleeping", async () => {
    const provider = new FakeEmbeddingProvider().failNext(
      providerError("bad_request", "input too long")
    );
    const recorder = recordingSleep();
    const embedder = new Embedder(provider, { sleep: recorder.sleep });

    const result = await embedder.embedBatch(drafts(1));

    assert.deepEqual(result.embeddings, []);
    assert.equal(result.errorDetail?.retryCount, 0);
    assert.equal(result.errorDetail?.exhausted, false);
    assert.equal(result.errorCode, "PERMANENT_PROVIDER_ERROR");
    assert.deepEqual(recorder.delays, []);
    assert.equal(provider.calls.length, 1);
  });

  it("treats vectors of the wrong length as a fatal dimension mismatch", async () => {
    const provider = new FakeEmbeddingProvider({
      dimensions: 4,
      vectors: { short: [0.1, 0.2] },
    });
    const recorder = recordingSleep();
    const embedder = new Embedder(provider, { sleep: recorder.sleep });

    const result = await embedder.embedBatch([{ index: 0, text: "short" }]);

    assert.deepEqual(result.embeddings, []);
    assert.equal(result.errorCode, "DIMENSION_MISMATCH");
    assert.equal(result.errorDetail?.lastErrorCategory, "invalid_response");
    assert.deepEqual(recorder.delays, []);
  });

  it("returns vectors of the configured dimensionality tagged with chunk index and model", async () => {
    const provider = new FakeEmbeddingProvider({ dimensions: 6, model: "test-model" });
    const embedder = new Embedder(provider);

    const result = await embedder.embedBatch([
      { index: 4, text: "alpha" },
      { index: 5, text: "beta" },
    ]);

    assert.deepEqual(
      result.embeddings.map((e) => [e.chunkIndex, e.model, e.dimensions, e.vector.length]),
      [
        [4, "test-model", 6, 6],
        [5, "test-model", 6, 6],
      ]
    );
  });

  it("logs every failed attempt with its category, message and wait", async () => {
    const provider = new FakeEmbeddingProvider().failNext(
      providerError("rate_limit", "slow down")
    );
    const logger = memoryLogger();
    const embedder = new Embedder(provider, {
      logger,
      sleep: recordingSleep().sleep,
    });

    await embedder.embedBatch(drafts(1));

    assert.deepEqual(logger.entries, [
      {
        level: "warn",
        scope: "test",
        message: "Batch 0: attempt 1/4 failed (rate_limit): slow down. Retrying in 1000ms",
      },
    ]);
  });

  it("honours a custom delay schedule", async () => {
    const provider = new FakeEmbeddingProvider().failAlways(providerError("timeout"));
    const recorder = recordingSleep();
    const embedder = new Embedder(provider, {
      retryDelaysMs: [5, 10],
      sleep: recorder.sleep,
    });

    const result = await embedder.embedBatch(drafts(1));

    assert.equal(result.errorDetail?.retryCount, 2);
    assert.deepEqual(recorder.delays, [5, 10]);
  });
});

describe("Embedder.embedChunks", () => {
  it("splits chunks into batches of the configured size", async () => {
    const provider = new FakeEmbeddingProvider();
    const embedder = new Embedder(provider, { batchSize: 2 });

    const result = await embedder.embedChunks(drafts(5));

    assert.deepEqual(
      provider.calls.map((call) => call.length),
      [2, 2, 1]
    );
    assert.deepEqual(
      result.embeddings.map((e) => e.chunkIndex),
      [0, 1, 2, 3, 4]
    );
    assert.deepEqual(result.failedBatches, []);
  });

  it("keeps embedding later batches after one batch fails", async () => {
    const provider = new FakeEmbeddingProvider().failNext(
      providerError("auth", "bad key")
    );
    const embedder = new Embedder(provider, { batchSize: 2 });

    const result = await embedder.embedChunks(drafts(4));

    assert.equal(result.batches.length, 2);
    assert.deepEqual(
      result.failedBatches.map((b) => b.batchIndex),
      [0]
    );
    assert.deepEqual(
      result.embeddings.map((e) => e.chunkIndex),
      [2, 3]
    );
  });
});

describe("Embedder.embedDocument", () => {
  it("fails the stage with the first failed batch's retry detail", async () => {
    const provider = new FakeEmbeddingProvider().failAlways(providerError("network"));
    const embedder = new Embedder(provider, { sleep: recordingSleep().sleep });

    const result = await embedder.embedDocument(drafts(2));

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.code, "TRANSIENT_PROVIDER_ERROR");
      assert.equal(result.error.stage, "embedding");
      assert.deepEqual(result.error.retry, {
        retryCount: 3,
        exhausted: true,
        lastErrorCategory: "network",
        lastErrorMessage: "network error",
        retryDelaysMs: [1000, 2000, 4000],
        attempts: [
          { attempt: 1, maxAttempts: 4, category: "network", message: "network error", delayMs: 1000 },
          { attempt: 2, maxAttempts: 4, category: "network", message: "network error", delayMs: 2000 },
          { attempt: 3, maxAttempts: 4, category: "network", message: "network error", delayMs: 4000 },
          { attempt: 4, maxAttempts: 4, category: "network", message: "network error", delayMs: null },
        ],
      });
      assert.deepEqual(result.error.details, { failedBatches: [0], totalBatches: 1 });
    }
  });

  it("returns a record for every chunk on success", async () => {
    const embedder = new Embedder(new FakeEmbeddingProvider());
    const result = await embedder.embedDocument(drafts(3));

    assert.equal(result.ok, true);
    if (result.ok) {
      assert.equal(result.value.length, 3);
    }
  });

  it("succeeds with no records for a document without chunks", async () => {
    const provider = new FakeEmbeddingProvider();
    const result = await new Embedder(provider).embedDocument([]);

    assert.deepEqual(result, { ok: true, value: [] });
    assert.equal(provider.calls.length, 0);
  });
});

describe("Embedder.embedQuery", () => {
  it("embeds a query with the provider's model", async () => {
    const provider = new FakeEmbeddingProvider({
      dimensions: 3,
      vectors: { "what is up": [1, 0, 0] },
    });
    const result = await new Embedder(provider).embedQuery("what is up");

    assert.deepEqual(result, { ok: true, value: [1, 0, 0] });
  });

  it("reports a failed query embedding at the retrieving stage", async () => {
    const provider = new FakeEmbeddingProvider().failNext(providerError("auth"));
    const result = await new Embedder(provider).embedQuery("hello");

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.code, "PERMANENT_PROVIDER_ERROR");
      assert.equal(result.error.stage, "retrieving");
    }
  });
});

describe("toProviderError", () => {
  it("maps OpenAI status errors onto categories", () => {
    const rateLimited = new OpenAI.APIError(429, undefined, "Too many requests", undefined);
    const badRequest = new OpenAI.APIError(400, undefined, "Bad input", undefined);

    assert.equal(toProviderError(rateLimited).category, "rate_limit");
    assert.equal(toProviderError(rateLimited).status, 429);
    assert.equal(toProviderError(badRequest).category, "bad_request");
  });

  it("maps connection failures onto network and timeout", () => {
    assert.equal(
      toProviderError(new OpenAI.APIConnectionError({ message: "socket closed" })).category,
      "network"
    );
    assert.equal(
      toProviderError(new OpenAI.APIConnectionTimeoutError()).category,
      "timeout"
    );
  });
});
