import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  AnswerGenerator,
  buildQaPrompt,
  NO_CONTEXT_ANSWER,
  parseCitations,
} from "./answer";
import { FakeChatClient, providerError, recordingSleep } from "./test-utils";
import type { Citation, QueryResult, RankedChunk } from "./types";

const chunk = (index: number, text: string): RankedChunk => ({
  chunkId: `c${index}`,
  documentId: "doc-1",
  documentTitle: "Handbook",
  chunkIndex: index,
  text,
  metadata: {},
  similarity: 0.9 - index / 10,
  score: 0.9 - index / 10,
});

const citation = (ordinal: number): Citation => ({
  ordinal,
  chunkId: `c${ordinal - 1}`,
  documentId: "doc-1",
  documentTitle: "Handbook",
  chunkIndex: ordinal - 1,
  similarity: 0.9,
  score: 0.9,
});

const context: QueryResult = {
  status: "ok",
  query: "How many vacation days?",
  mode: "semantic",
  chunks: [chunk(0, "Employees get twenty vacation days."), chunk(1, "Requests need approval.")],
  context:
    "[Source 1: Handbook, chunk 0]\nEmployees get twenty vacation days.\n\n---\n\n[Source 2: Handbook, chunk 1]\nRequests need approval.",
  citations: [citation(1), citation(2)],
  droppedForBudget: 0,
};

describe("AnswerGenerator.answer", () => {
  it("answers from the context and resolves its citations", async () => {
    const chat = new FakeChatClient("Employees get twenty days [Source 1], with approval [Source 2].");
    const generator = new AnswerGenerator(chat);

    const result = await generator.answer(context);

    assert.ok(result.ok);
    assert.equal(result.value.status, "answered");
    assert.equal(result.value.model, "test-chat");
    assert.deepEqual(result.value.citedOrdinals, [1, 2]);
    assert.deepEqual(result.value.unresolvedOrdinals, []);
    assert.deepEqual(
      result.value.sources.map((source) => [source.ordinal, source.documentTitle, source.chunkIndex]),
      [
        [1, "Handbook", 0],
        [2, "Handbook", 1],
      ]
    );
    assert.equal(chat.calls.length, 1);
    assert.match(chat.calls[0][1].content, /QUESTION:\nHow many vacation days\?$/);
  });

  it("returns the fixed reply without calling the model when nothing is relevant", async () => {
    const chat = new FakeChatClient("should not be used");
    const generator = new AnswerGenerator(chat);

    const result = await generator.answer({
      status: "no_relevant_context",
      query: "What is the airspeed of a swallow?",
      mode: "semantic",
      threshold: 0.5,
    });

    assert.deepEqual(result, {
      ok: true,
      value: {
        status: "no_relevant_context",
        query: "What is the airspeed of a swallow?",
        answer: NO_CONTEXT_ANSWER,
        model: null,
        sources: [],
        citedOrdinals: [],
        unresolvedOrdinals: [],
      },
    });
    assert.equal(chat.calls.length, 0);
  });

  it("fails with MODEL_MISMATCH for a mismatched retrieval", async () => {
    const generator = new AnswerGenerator(new FakeChatClient(""));

    const result = await generator.answer({
      status: "model_mismatch",
      query: "q",
      mode: "semantic",
      expected: { model: "a", dimensions: 3 },
      actual: { model: "b", dimensions: 3 },
    });

    assert.ok(!result.ok);
    assert.equal(result.error.code, "MODEL_MISMATCH");
  });

  it("retries a rate-limited completion on the fixed schedule", async () => {
    const chat = new FakeChatClient("Twenty days [Source 1].").failNext(providerError("rate_limit"));
    const recorder = recordingSleep();
    const generator = new AnswerGenerator(chat, { sleep: recorder.sleep });

    const result = await generator.answer(context);

    assert.ok(result.ok);
    assert.deepEqual(recorder.delays, [1000]);
    assert.equal(chat.calls.length, 2);
  });

  it("fails without retrying on an authentication error", async () => {
    const chat = new FakeChatClient("").failNext(providerError("auth", "invalid key"));
    const generator = new AnswerGenerator(chat, { sleep: recordingSleep().sleep });

    const result = await generator.answer(context);

    assert.ok(!result.ok);
    assert.equal(result.error.code, "PERMANENT_PROVIDER_ERROR");
    assert.equal(result.error.message, "Answer generation failed: invalid key");
    assert.equal(chat.calls.length, 1);
  });
});

describe("parseCitations", () => {
  it("lists each cited ordinal once and separates unknown ones", () => {
    const parsed = parseCitations(
      "See [Source 2] and [Source 1: Handbook, chunk 0], again [Source 2], and [Source 7].",
      [citation(1), citation(2)]
    );

    assert.deepEqual(
      parsed.cited.map((c) => c.ordinal),
      [2, 1]
    );
    assert.deepEqual(parsed.unresolved, [7]);
  });
});

describe("buildQaPrompt", () => {
  it("puts the instructions in the system message and the context in the user message", () => {
    const [system, user] = buildQaPrompt("Why?", "[Source 1: T, chunk 0]\nBecause.");

    assert.equal(system.role, "system");
    assert.match(system.content, /\[Source N\] format/);
    assert.equal(user.content, "CONTEXT:\n[Source 1: T, chunk 0]\nBecause.\n\nQUESTION:\nWhy?");
  });
});
