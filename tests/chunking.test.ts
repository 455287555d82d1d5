import { describe, expect, it } from "vitest";
import {
  chunkDocument,
  DEFAULT_CHUNKER_OPTIONS,
  extractBlocks,
  isBoilerplateLine,
  looksLikeHeading,
  mergeTinyBlocks,
  resolveChunkerOptions,
  splitBySentences,
  splitIntoChunks,
} from "../src/pipelines/chunking.js";

const P1 = "Vectors are stored together with the chunk text they encode.";
const P2 = "Queries are embedded once and compared against every entry.";
const P3 = "Results are ordered by cosine similarity, highest score first.";
const P4 = "Ties keep the order in which the entries were first inserted.";
const PRONOUN = "It also means a repeated query always yields the same ranking.";

const SMALL = { maxChars: 200, targetChars: 100, minChars: 50 };

describe("chunking pipeline", () => {
  it("returns no chunks for empty or blank text", () => {
    expect(splitIntoChunks("")).toEqual([]);
    expect(splitIntoChunks("  \n\n\t \n")).toEqual([]);
    expect(chunkDocument("doc", "   ")).toEqual([]);
  });

  it("keeps a short document as a single chunk with a stable id", () => {
    expect(chunkDocument("doc-1", "Hello world, this is a short document.")).toEqual([
      {
        chunkId: "doc-1#chunk0",
        documentId: "doc-1",
        ordinal: 0,
        text: "Hello world, this is a short document.",
      },
    ]);
  });

  it("normalizes line endings, zero-width characters and blank-line runs", () => {
    const text = "\uFEFFAlpha beta gamma delta.\r\n\r\n\r\n\r\nEpsilon\u200B zeta eta theta.   ";
    expect(splitIntoChunks(text)).toEqual(["Alpha beta gamma delta.\nEpsilon zeta eta theta."]);
  });

  it("seeds each chunk with the last block of the previous one", () => {
    const text = [P1, P2, P3, P4].join("\n\n");
    expect(splitIntoChunks(text, { ...SMALL, overlapBlocks: 1 })).toEqual([
      `${P1}\n\n${P2}`,
      `${P2}\n\n${P3}`,
      `${P3}\n\n${P4}`,
    ]);
  });

  it("prepends the previous block to a chunk that opens with a pronoun", () => {
    const text = [P1, P2, PRONOUN, P4].join("\n\n");
    expect(splitIntoChunks(text, { ...SMALL, overlapBlocks: 0 })).toEqual([
      `${P1}\n\n${P2}`,
      `${P2}\n\n${PRONOUN}\n\n${P4}`,
    ]);
  });

  it("restores context only when the overlap seed was dropped, even past maxChars", () => {
    const longPronoun =
      "It follows that the ranking for a repeated query never changes, even after the index has been reloaded from storage or rebuilt from the same documents.";
    const chunks = splitIntoChunks([P1, P2, longPronoun].join("\n\n"), { ...SMALL, overlapBlocks: 1 });

    expect(chunks).toEqual([`${P1}\n\n${P2}`, `${P2}\n\n${longPronoun}`]);
    expect(chunks[1].length).toBe(212);
  });

  it("is deterministic and covers every sentence", () => {
    const paragraphs = Array.from({ length: 12 }, (_, i) =>
      [
        `Sentence ${i}a explains part ${i} of the indexing pipeline.`,
        `Sentence ${i}b adds a detail about embeddings for part ${i}.`,
        `Sentence ${i}c closes part ${i} with a short remark on ranking.`,
      ].join(" "),
    );
    const text = paragraphs.join("\n\n");

    const first = splitIntoChunks(text);
    const second = splitIntoChunks(text);

    expect(first).toEqual(second);
    expect(first.length).toBeGreaterThan(1);
    for (const chunk of first) {
      expect(chunk.trim().length).toBeGreaterThan(0);
      expect(chunk.length).toBeLessThanOrEqual(DEFAULT_CHUNKER_OPTIONS.maxChars);
    }
    for (let i = 0; i < 12; i += 1) {
      const sentence = `Sentence ${i}c closes part ${i} with a short remark on ranking.`;
      expect(first.some((chunk) => chunk.includes(sentence))).toBe(true);
    }
  });

  it("rejects inconsistent size options", () => {
    expect(() => resolveChunkerOptions({ minChars: 400, targetChars: 350 })).toThrow(
      /Invalid chunk sizes/,
    );
  });
});

describe("chunking heuristics", () => {
  it("recognizes boilerplate lines", () => {
    expect(isBoilerplateLine("ok", DEFAULT_CHUNKER_OPTIONS)).toBe(true);
    expect(isBoilerplateLine("We use cookies to improve your experience", DEFAULT_CHUNKER_OPTIONS)).toBe(true);
    expect(isBoilerplateLine("==========", DEFAULT_CHUNKER_OPTIONS)).toBe(true);
    expect(isBoilerplateLine("Home / Docs / Guides / Setup", DEFAULT_CHUNKER_OPTIONS)).toBe(true);
    expect(
      isBoilerplateLine("Cats chase mice across the garden every morning.", DEFAULT_CHUNKER_OPTIONS),
    ).toBe(false);
  });

  it("recognizes headings", () => {
    expect(looksLikeHeading("## Installation", DEFAULT_CHUNKER_OPTIONS)).toBe(true);
    expect(looksLikeHeading("2.1 Getting Started", DEFAULT_CHUNKER_OPTIONS)).toBe(true);
    expect(looksLikeHeading("Introduction to vectors", DEFAULT_CHUNKER_OPTIONS)).toBe(true);
    expect(looksLikeHeading("Vector Index Design", DEFAULT_CHUNKER_OPTIONS)).toBe(true);
    expect(looksLikeHeading("This sentence ends with a period.", DEFAULT_CHUNKER_OPTIONS)).toBe(false);
    expect(looksLikeHeading("just some lowercase words", DEFAULT_CHUNKER_OPTIONS)).toBe(false);
  });

  it("keeps headings as standalone blocks and joins the other lines", () => {
    const text = "Overview\nThe index stores vectors in memory.\nIt answers cosine queries.";
    expect(extractBlocks(text, DEFAULT_CHUNKER_OPTIONS)).toEqual([
      "Overview",
      "The index stores vectors in memory. It answers cosine queries.",
    ]);
  });

  it("merges tiny blocks forward and appends a tiny remainder", () => {
    expect(mergeTinyBlocks(["aaa", "bbb", "ccccccccc"], 7)).toEqual(["aaa\nbbb", "ccccccccc"]);
    expect(mergeTinyBlocks(["aaaaaaaa", "bb"], 7)).toEqual(["aaaaaaaa\nbb"]);
  });

  it("packs sentences up to the limit and leaves an oversized sentence whole", () => {
    expect(splitBySentences("One. Two two. Three three three.", 12)).toEqual([
      "One.",
      "Two two.",
      "Three three three.",
    ]);
    expect(splitBySentences("One. Two.", 20)).toEqual(["One. Two."]);
  });
});
