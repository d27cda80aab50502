import { describe, it, expect } from "vitest";
import type { ChunkingConfig } from "@ragsync/types";
import { BoundaryChunker } from "./boundary-chunker.js";
import { FixedChunker } from "./fixed-chunker.js";
import { createChunker } from "./factory.js";
import { estimateTokens, toChars } from "./size.js";

const config: ChunkingConfig = {
  strategy: "boundary",
  maxSize: 60,
  overlap: 0,
  lookBack: 20,
  unit: "chars",
};

const contents = (text: string, overrides: Partial<ChunkingConfig> = {}) =>
  new BoundaryChunker().chunk(text, { ...config, ...overrides }).map((c) => c.content);

describe("BoundaryChunker", () => {
  const chunker = new BoundaryChunker();

  it("has strategy 'boundary'", () => {
    expect(chunker.strategy).toBe("boundary");
  });

  it("returns a short text as a single chunk", () => {
    const results = chunker.chunk("  A single paragraph.  ", config);
    expect(results).toHaveLength(1);
    expect(results[0]).toEqual({
      content: "A single paragraph.",
      index: 0,
      size: 19,
      tokenCount: 5,
      metadata: { startChar: 2, endChar: 21 },
    });
  });

  it("returns nothing for empty or whitespace-only text", () => {
    expect(chunker.chunk("", config)).toEqual([]);
    expect(chunker.chunk("  \n\n \t", config)).toEqual([]);
  });

  it("produces ceil(L / S) chunks for evenly spaced words", () => {
    const text = Array.from({ length: 50 }, () => "lorem").join(" ");
    const results = chunker.chunk(text, config);
    const tenWords = Array.from({ length: 10 }, () => "lorem").join(" ");

    expect(text).toHaveLength(299);
    expect(results).toHaveLength(Math.ceil(299 / 60));
    results.forEach((chunk, i) => {
      expect(chunk.content).toBe(tenWords);
      expect(chunk.index).toBe(i);
      expect(chunk.metadata.startChar).toBe(i * 60);
      expect(chunk.metadata.endChar).toBe(i * 60 + 59);
    });
  });

  it("never exceeds the size limit", () => {
    const text = "The quick brown fox jumps over the lazy dog. ".repeat(40);
    for (const chunk of chunker.chunk(text, config)) {
      expect(chunk.size).toBeLessThanOrEqual(60);
      expect(chunk.content).toBe(chunk.content.trim());
    }
  });

  it("prefers a paragraph break inside the look-back window", () => {
    const text = "Para one is here.\n\nPara two follows.";
    expect(contents(text, { maxSize: 30 })).toEqual(["Para one is here.", "Para two follows."]);
  });

  it("prefers a sentence end over later whitespace", () => {
    const text = "One two three. Four five six. Seven eight nine.";
    expect(contents(text, { maxSize: 25, lookBack: 15 })).toEqual([
      "One two three.",
      "Four five six.",
      "Seven eight nine.",
    ]);
  });

  it("packs whole sentences up to the limit", () => {
    const text = "One two three. Four five six. Seven eight nine.";
    expect(contents(text, { maxSize: 30, lookBack: 15 })).toEqual([
      "One two three. Four five six.",
      "Seven eight nine.",
    ]);
  });

  it("backs off to earlier whitespace before cutting a word", () => {
    const text = "abcdefghij klmnopqrstuvwxyz";
    expect(contents(text, { maxSize: 20, lookBack: 5 })).toEqual(["abcdefghij", "klmnopqrstuvwxyz"]);
  });

  it("hard-cuts a token longer than the limit", () => {
    const text = "x".repeat(25);
    expect(contents(text, { maxSize: 10, lookBack: 3 })).toEqual([
      "x".repeat(10),
      "x".repeat(10),
      "x".repeat(5),
    ]);
  });

  it("starts overlapping chunks on a word boundary", () => {
    const text = "aaaa bbbb cccc dddd eeee ffff";
    expect(contents(text, { maxSize: 14, overlap: 5, lookBack: 10 })).toEqual([
      "aaaa bbbb cccc",
      "cccc dddd eeee",
      "eeee ffff",
    ]);
  });

  it("measures sizes in tokens when asked", () => {
    const text = Array.from({ length: 50 }, () => "lorem").join(" ");
    const byTokens = contents(text, { maxSize: 15, lookBack: 5, unit: "tokens" });
    expect(byTokens).toEqual(contents(text, { maxSize: 60, lookBack: 20 }));
  });

  it("is deterministic", () => {
    const text = "First sentence here. Second one there.\n\nNew paragraph now. ".repeat(10);
    expect(chunker.chunk(text, config)).toEqual(chunker.chunk(text, config));
  });
});

describe("FixedChunker", () => {
  const chunker = new FixedChunker();
  const fixed: ChunkingConfig = { ...config, strategy: "fixed" };

  it("has strategy 'fixed'", () => {
    expect(chunker.strategy).toBe("fixed");
  });

  it("splits into fixed windows and trims each one", () => {
    const results = chunker.chunk("aaaa bbbb cccc", { ...fixed, maxSize: 5 });
    expect(results.map((c) => c.content)).toEqual(["aaaa", "bbbb", "cccc"]);
    expect(results.map((c) => c.metadata.startChar)).toEqual([0, 5, 10]);
  });

  it("applies overlap between windows", () => {
    const results = chunker.chunk("abcdefghij", { ...fixed, maxSize: 4, overlap: 2 });
    expect(results.map((c) => c.content)).toEqual(["abcd", "cdef", "efgh", "ghij"]);
    expect(results.map((c) => c.index)).toEqual([0, 1, 2, 3]);
  });

  it("handles empty content", () => {
    expect(chunker.chunk("", fixed)).toHaveLength(0);
  });
});

describe("createChunker", () => {
  it("creates a BoundaryChunker", () => {
    expect(createChunker("boundary")).toBeInstanceOf(BoundaryChunker);
  });

  it("creates a FixedChunker", () => {
    expect(createChunker("fixed")).toBeInstanceOf(FixedChunker);
  });
});

describe("size helpers", () => {
  it("converts tokens to characters", () => {
    expect(toChars(10, "tokens")).toBe(40);
    expect(toChars(10, "chars")).toBe(10);
  });

  it("estimates tokens from length", () => {
    expect(estimateTokens("abcde")).toBe(2);
  });
});
