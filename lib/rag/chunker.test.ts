import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { chunkDocument, chunkText } from "./chunker";

/** `count` sentences of `wordsPerSentence` numbered words each */
function sentences(count: number, wordsPerSentence = 10): string {
  const out: string[] = [];
  let n = 0;
  for (let s = 0; s < count; s++) {
    const words: string[] = [];
    for (let w = 0; w < wordsPerSentence; w++) {
      words.push(`w${n++}`);
    }
    out.push(`${words.join(" ")}.`);
  }
  return out.join(" ");
}

function words(text: string): string[] {
  return text.split(/\s+/);
}

describe("chunkText", () => {
  it("splits 1,200 words of 10-word sentences into three chunks", () => {
    const chunks = chunkText(sentences(120), { chunkSize: 500, chunkOverlap: 50 });

    assert.equal(chunks.length, 3);
    assert.deepEqual(
      chunks.map((c) => c.wordCount),
      [500, 500, 300]
    );
    assert.deepEqual(
      chunks.map((c) => c.index),
      [0, 1, 2]
    );
    for (const chunk of chunks) {
      assert.ok(chunk.text.endsWith("."), `chunk ${chunk.index} ends mid-sentence`);
      assert.equal(chunk.metadata.strategy, "sentence");
      assert.equal(chunk.charCount, chunk.text.length);
    }
  });

  it("repeats the last overlap words at the start of the next chunk", () => {
    const chunks = chunkText(sentences(120), { chunkSize: 500, chunkOverlap: 50 });

    for (let i = 1; i < chunks.length; i++) {
      assert.deepEqual(
        words(chunks[i].text).slice(0, 50),
        words(chunks[i - 1].text).slice(-50)
      );
    }
    assert.equal(words(chunks[1].text)[0], "w450");
    assert.equal(words(chunks[2].text)[0], "w900");
  });

  it("returns a single chunk when the text is shorter than the target", () => {
    const text = "A short note. It has two sentences.";
    const chunks = chunkText(text, { chunkSize: 500, chunkOverlap: 50 });

    assert.equal(chunks.length, 1);
    assert.equal(chunks[0].text, text);
    assert.equal(chunks[0].wordCount, 7);
  });

  it("returns no chunks for empty or whitespace-only text", () => {
    assert.deepEqual(chunkText(""), []);
    assert.deepEqual(chunkText("  \n\n\t "), []);
  });

  it("is deterministic for the same input and config", () => {
    const text = sentences(75, 7);
    const options = { chunkSize: 60, chunkOverlap: 12 };

    assert.deepEqual(chunkText(text, options), chunkText(text, options));
  });

  it("extends a chunk to the next sentence boundary past the target", () => {
    const chunks = chunkText(sentences(10, 30), { chunkSize: 100, chunkOverlap: 10 });

    assert.equal(chunks[0].wordCount, 120);
    assert.ok(chunks[0].text.endsWith("w119."));
  });

  it("falls back to fixed word windows when there is no sentence punctuation", () => {
    const text = Array.from({ length: 1200 }, (_, i) => `w${i}`).join(" ");
    const chunks = chunkText(text, { chunkSize: 500, chunkOverlap: 50 });

    assert.deepEqual(
      chunks.map((c) => c.wordCount),
      [500, 500, 300]
    );
    assert.ok(chunks.every((c) => c.metadata.strategy === "word"));
    assert.equal(words(chunks[1].text)[0], "w450");
  });

  it("cuts an overlong sentence at the target size", () => {
    const text = `${Array.from({ length: 1000 }, (_, i) => `w${i}`).join(" ")}.`;
    const chunks = chunkText(text, {
      chunkSize: 100,
      chunkOverlap: 10,
      maxChunkWords: 200,
    });

    assert.equal(chunks.length, 10);
    assert.equal(chunks[0].metadata.strategy, "word");
    assert.equal(chunks[0].wordCount, 100);
    assert.equal(chunks[9].metadata.strategy, "sentence");
    assert.equal(chunks[9].wordCount, 190);
    assert.ok(chunks.every((c) => c.wordCount <= 200));
  });

  it("does not end sentences at common abbreviations", () => {
    const text = "Dr. Smith met Mr. Jones today. They talked.";
    const chunks = chunkText(text, {
      chunkSize: 3,
      chunkOverlap: 0,
      maxChunkWords: 10,
    });

    assert.deepEqual(
      chunks.map((c) => c.text),
      ["Dr. Smith met Mr. Jones today.", "They talked."]
    );
  });

  it("records the nearest markdown heading as the chunk section", () => {
    const text = [
      "# Intro",
      "Alpha beta gamma delta epsilon.",
      "## Details",
      "Zeta eta theta iota kappa.",
    ].join("\n");
    const chunks = chunkText(text, { chunkSize: 5, chunkOverlap: 0 });

    assert.equal(chunks.length, 2);
    assert.equal(chunks[0].metadata.section, "Intro");
    assert.equal(chunks[1].metadata.section, "Details");
    assert.equal(chunks[1].text, "## Details\nZeta eta theta iota kappa.");
  });

  it("tracks pages across form feeds", () => {
    const text = "One two three.\n\f\nFour five six.";
    const chunks = chunkText(text, { chunkSize: 3, chunkOverlap: 0 });

    assert.deepEqual(
      chunks.map((c) => [c.text, c.metadata.page]),
      [
        ["One two three.", 1],
        ["Four five six.", 2],
      ]
    );
  });

  it("omits page metadata for text without page breaks", () => {
    const [chunk] = chunkText("Plain text only.");
    assert.equal(chunk.metadata.page, undefined);
  });

  it("closes chunks at paragraph ends when headings and lists have no periods", () => {
    const text = [
      "## Checklist",
      "- badge photo taken",
      "- laptop issued",
      "",
      "Payroll forms go to HR.",
    ].join("\n");

    const chunks = chunkText(text, { chunkSize: 3, chunkOverlap: 0 });

    assert.deepEqual(
      chunks.map((c) => [c.text, c.metadata.strategy]),
      [
        ["## Checklist\n- badge photo taken", "paragraph"],
        ["- laptop issued", "paragraph"],
        ["Payroll forms go to HR.", "sentence"],
      ]
    );
  });

  it("ignores paragraph ends with the sentence boundary", () => {
    const text = ["First block without a period", "", "second block also bare"].join("\n");

    const chunks = chunkText(text, { chunkSize: 4, chunkOverlap: 0, boundary: "sentence" });

    assert.deepEqual(
      chunks.map((c) => [c.wordCount, c.metadata.strategy]),
      [
        [4, "word"],
        [4, "word"],
        [1, "word"],
      ]
    );
  });

  it("prefers a blank line over waiting for a distant full stop", () => {
    const text = `${sentences(1, 6).slice(0, -1)}\n\n${sentences(1, 6)}`;

    const paragraph = chunkText(text, { chunkSize: 5, chunkOverlap: 0 });
    const sentence = chunkText(text, { chunkSize: 5, chunkOverlap: 0, boundary: "sentence" });

    assert.deepEqual(
      paragraph.map((c) => c.wordCount),
      [6, 6]
    );
    assert.deepEqual(
      sentence.map((c) => c.wordCount),
      [5, 7]
    );
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    assert.throws(
      () => chunkText("Some words.", { chunkSize: 10, chunkOverlap: 10 }),
      RangeError
    );
  });
});

describe("chunkDocument", () => {
  it("yields zero chunks for empty text", () => {
    const result = chunkDocument("");
    assert.deepEqual(result, { ok: true, value: [] });
  });

  it("fails with CHUNKING_DEGENERATE when no word has a letter or digit", () => {
    const result = chunkDocument("••• --- ### ???");

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.code, "CHUNKING_DEGENERATE");
      assert.equal(result.error.stage, "chunking");
      assert.equal(result.error.name, "ChunkingDegenerate");
    }
  });

  it("wraps invalid options as a chunking failure", () => {
    const result = chunkDocument("Some words here.", { chunkSize: 5, chunkOverlap: 9 });

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.code, "CHUNKING_DEGENERATE");
    }
  });

  it("returns the chunks for ordinary text", () => {
    const result = chunkDocument(sentences(120), { chunkSize: 500, chunkOverlap: 50 });

    assert.equal(result.ok, true);
    if (result.ok) {
      assert.equal(result.value.length, 3);
    }
  });
});
