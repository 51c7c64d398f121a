import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { isPipelineError } from "../errors";
import { getServiceSupabase } from "../supabase/server";
import {
  isTransientStorageError,
  parseEmbedding,
  parseMatchRows,
  SupabaseDocumentStore,
  toStoreError,
} from "./supabase-store";
import { recordingSleep } from "./test-utils";

interface RecordedRequest {
  method: string;
  path: string;
  search: string;
  body: unknown;
}

type Reply = { status: number; body: unknown };

/**
 * fetch stand-in answering PostgREST requests from a queue of replies
 */
function fakeFetch(replies: Reply[]): { fetch: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchImpl = async (
    input: Parameters<typeof fetch>[0],
    init?: RequestInit
  ): Promise<Response> => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    requests.push({
      method: init?.method ?? "GET",
      path: url.pathname,
      search: url.search,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : null,
    });
    const reply = replies.shift() ?? { status: 200, body: [] };
    return new Response(JSON.stringify(reply.body), {
      status: reply.status,
      headers: { "Content-Type": "application/json" },
    });
  };
  return { fetch: fetchImpl, requests };
}

const TEST_ENV = {
  SUPABASE_URL: "http://localhost:54321",
  SUPABASE_SERVICE_ROLE_KEY: "test-service-key",
};

function storeWith(replies: Reply[]) {
  const fake = fakeFetch(replies);
  const recorder = recordingSleep();
  const client = getServiceSupabase(TEST_ENV, fake.fetch);
  const store = new SupabaseDocumentStore(client, { dimensions: 3, sleep: recorder.sleep });
  return { store, requests: fake.requests, delays: recorder.delays };
}

const DOC_ID = "00000000-0000-4000-8000-000000000001";

describe("SupabaseDocumentStore.transaction", () => {
  it("commits the buffered document, chunk deletion and inserts in one RPC call", async () => {
    const { store, requests } = storeWith([{ status: 200, body: 2 }]);

    await store.transaction(async (tx) => {
      await tx.upsertDocument({
        id: DOC_ID,
        title: "Guide",
        content: "Body text.",
        fileType: "markdown",
        filePath: "/docs/guide.md",
        metadata: { wordCount: 2 },
      });
      await tx.deleteChunks(DOC_ID);
      await tx.insertChunks([
        {
          documentId: DOC_ID,
          index: 0,
          text: "Body text.",
          wordCount: 2,
          charCount: 10,
          metadata: { strategy: "sentence" },
          embedding: [0.1, 0.2, 0.3],
          embeddingModel: "test-embedding",
        },
      ]);
    });

    assert.equal(requests.length, 1);
    assert.equal(requests[0].method, "POST");
    assert.equal(requests[0].path, "/rest/v1/rpc/write_document_with_chunks");
    assert.deepEqual(requests[0].body, {
      p_document: {
        id: DOC_ID,
        title: "Guide",
        content: "Body text.",
        file_path: "/docs/guide.md",
        file_type: "markdown",
        source_url: null,
        metadata: { wordCount: 2 },
      },
      p_delete_chunks_for: [DOC_ID],
      p_chunks: [
        {
          document_id: DOC_ID,
          chunk_index: 0,
          chunk_text: "Body text.",
          word_count: 2,
          char_count: 10,
          embedding: [0.1, 0.2, 0.3],
          embedding_model: "test-embedding",
          metadata: { strategy: "sentence" },
        },
      ],
    });
  });

  it("sends nothing when the work fails", async () => {
    const { store, requests } = storeWith([]);

    await assert.rejects(
      store.transaction(async (tx) => {
        await tx.upsertDocument({ id: DOC_ID, title: "T", content: "", fileType: "text", metadata: {} });
        throw new Error("aborted by caller");
      }),
      /aborted by caller/
    );
    assert.equal(requests.length, 0);
  });

  it("skips the RPC when the signal is aborted before the commit", async () => {
    const { store, requests } = storeWith([{ status: 200, body: 1 }]);
    const controller = new AbortController();

    await assert.rejects(
      store.transaction(
        async (tx) => {
          await tx.upsertDocument({ id: DOC_ID, title: "T", content: "", fileType: "text", metadata: {} });
          controller.abort();
        },
        { signal: controller.signal }
      ),
      (error: unknown) => isPipelineError(error) && error.code === "CANCELLED"
    );
    assert.equal(requests.length, 0);
  });

  it("rejects vectors that do not match the column dimensions before calling the database", async () => {
    const { store, requests } = storeWith([]);

    await assert.rejects(
      store.transaction((tx) =>
        tx.insertChunks([
          {
            documentId: DOC_ID,
            index: 0,
            text: "x",
            wordCount: 1,
            charCount: 1,
            metadata: {},
            embedding: [1, 2],
            embeddingModel: "test-embedding",
          },
        ])
      ),
      (error: unknown) => isPipelineError(error) && error.code === "CONSTRAINT_ERROR"
    );
    assert.equal(requests.length, 0);
  });

  it("maps a foreign key violation to INTEGRITY_ERROR without retrying", async () => {
    const { store, requests, delays } = storeWith([
      {
        status: 409,
        body: {
          code: "23503",
          message: 'insert or update on table "document_chunks" violates foreign key constraint',
          details: null,
          hint: null,
        },
      },
    ]);

    await assert.rejects(
      store.transaction((tx) => tx.deleteChunks(DOC_ID)),
      (error: unknown) =>
        isPipelineError(error) && error.code === "INTEGRITY_ERROR" && error.stage === "writing"
    );
    assert.equal(requests.length, 1);
    assert.deepEqual(delays, []);
  });

  it("retries a transient connection failure on the fixed schedule", async () => {
    const { store, requests, delays } = storeWith([
      { status: 503, body: { code: "57P03", message: "the database system is starting up", details: null, hint: null } },
      { status: 200, body: 0 },
    ]);

    await store.transaction((tx) => tx.deleteChunks(DOC_ID));

    assert.equal(requests.length, 2);
    assert.deepEqual(delays, [1000]);
  });
});

describe("SupabaseDocumentStore reads", () => {
  it("matches chunks through the match_document_chunks RPC", async () => {
    const { store, requests } = storeWith([
      {
        status: 200,
        body: [
          {
            chunk_id: "c1",
            document_id: DOC_ID,
            document_title: "Guide",
            chunk_index: 2,
            chunk_text: "Relevant text.",
            metadata: null,
            similarity: 0.82,
          },
        ],
      },
    ]);

    const matches = await store.matchChunks([1, 0, 0], { topK: 4, threshold: 0.5 });

    assert.equal(requests[0].path, "/rest/v1/rpc/match_document_chunks");
    assert.deepEqual(requests[0].body, {
      query_embedding: "[1,0,0]",
      match_count: 4,
      similarity_threshold: 0.5,
    });
    assert.deepEqual(matches, [
      {
        chunkId: "c1",
        documentId: DOC_ID,
        documentTitle: "Guide",
        chunkIndex: 2,
        text: "Relevant text.",
        metadata: {},
        similarity: 0.82,
      },
    ]);
  });

  it("reads chunks back in index order with parsed vectors", async () => {
    const { store, requests } = storeWith([
      {
        status: 200,
        body: [
          {
            id: "c0",
            document_id: DOC_ID,
            chunk_index: 0,
            chunk_text: "First.",
            word_count: 1,
            char_count: 6,
            embedding: "[0.5,0.25,0]",
            embedding_model: "test-embedding",
            metadata: { page: 1 },
            created_at: "2024-01-01T00:00:00Z",
          },
        ],
      },
    ]);

    const chunks = await store.getChunks(DOC_ID);

    assert.equal(requests[0].path, "/rest/v1/document_chunks");
    assert.match(requests[0].search, /order=chunk_index\.asc/);
    assert.deepEqual(chunks[0].embedding, [0.5, 0.25, 0]);
    assert.deepEqual(chunks[0].metadata, { page: 1 });
  });

  it("returns null for a missing document", async () => {
    const { store } = storeWith([{ status: 200, body: [] }]);
    assert.equal(await store.getDocument(DOC_ID), null);
  });
});

describe("storage error helpers", () => {
  it("classifies Postgres error codes", () => {
    assert.equal(toStoreError({ code: "23505", message: "duplicate key" }, "writing").code, "CONSTRAINT_ERROR");
    assert.equal(
      toStoreError({ code: "22000", message: "expected 1536 dimensions, not 3" }, "writing").code,
      "CONSTRAINT_ERROR"
    );
    assert.equal(toStoreError({ code: "42P01", message: "relation does not exist" }, "writing").code, "STORAGE_ERROR");
  });

  it("retries connection codes but never constraint codes", () => {
    assert.equal(isTransientStorageError({ code: "40P01", message: "deadlock detected" }), true);
    assert.equal(isTransientStorageError({ code: "", message: "TypeError: fetch failed" }), true);
    assert.equal(isTransientStorageError({ code: "23505", message: "network of duplicates" }), false);
  });

  it("parses vector literals and rejects malformed ones", () => {
    assert.deepEqual(parseEmbedding("[1,2.5,-3]"), [1, 2.5, -3]);
    assert.deepEqual(parseEmbedding([0.5]), [0.5]);
    assert.throws(() => parseEmbedding("[1,2"));
  });

  it("clamps similarity into [0, 1]", () => {
    const [match] = parseMatchRows([
      {
        chunk_id: "c",
        document_id: DOC_ID,
        document_title: "T",
        chunk_index: 0,
        chunk_text: "t",
        metadata: {},
        similarity: 1.0000002,
      },
    ]);
    assert.equal(match.similarity, 1);
  });
});
