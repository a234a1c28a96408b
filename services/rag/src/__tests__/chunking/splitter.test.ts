import { describe, it, expect } from "vitest";
import { createTextSplitter, splitText } from "../../chunking/splitter.js";
import { createChunker } from "../../chunking/index.js";
import { ConfigurationError } from "../../errors.js";

describe("splitText", () => {
  it("returns short text as a single chunk", () => {
    const text = "A short note.\n\nWith two paragraphs.";
    expect(splitText(text, { chunkSize: 500, chunkOverlap: 50 })).toEqual([text]);
  });

  it("returns text exactly chunkSize long as a single chunk", () => {
    const text = "x".repeat(500);
    expect(splitText(text, { chunkSize: 500, chunkOverlap: 50 })).toEqual([text]);
  });

  it("returns nothing for empty or whitespace-only text", () => {
    expect(splitText("", { chunkSize: 10, chunkOverlap: 2 })).toEqual([]);
    expect(splitText("   \n\n  ", { chunkSize: 10, chunkOverlap: 2 })).toEqual([]);
  });

  it("splits 1000 repeated characters into 500, 500 and 100 with a 50-character overlap", () => {
    const chunks = splitText("A".repeat(1000), { chunkSize: 500, chunkOverlap: 50 });

    expect(chunks.map((chunk) => chunk.length)).toEqual([500, 500, 100]);
    expect(chunks[1].startsWith(chunks[0].slice(-50))).toBe(true);
    expect(chunks[2].startsWith(chunks[1].slice(-50))).toBe(true);
  });

  it("carries the tail of each chunk into the next one", () => {
    const text = "0123456789".repeat(100);
    const chunks = splitText(text, { chunkSize: 500, chunkOverlap: 50 });

    expect(chunks).toEqual([text.slice(0, 500), text.slice(450, 950), text.slice(900)]);
  });

  it("prefers paragraph boundaries and keeps the separator on the next chunk", () => {
    const chunks = splitText("First paragraph.\n\nSecond paragraph.", {
      chunkSize: 20,
      chunkOverlap: 0,
    });

    expect(chunks).toEqual(["First paragraph.", "\n\nSecond paragraph."]);
  });

  it("falls back to word boundaries with overlapping words", () => {
    const chunks = splitText("alpha beta gamma delta epsilon zeta eta theta iota kappa", {
      chunkSize: 20,
      chunkOverlap: 8,
    });

    expect(chunks).toEqual([
      "alpha beta gamma",
      " gamma delta epsilon",
      " epsilon zeta eta",
      " eta theta iota",
      " iota kappa",
    ]);
  });

  it("never emits a chunk longer than chunkSize", () => {
    const text = Array.from({ length: 40 }, (_, i) => `Sentence number ${i} is here. `).join("");
    const chunks = splitText(text, { chunkSize: 60, chunkOverlap: 10 });

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.length).toBeLessThanOrEqual(60);
    }
  });

  it("keeps surrogate pairs whole when splitting characters", () => {
    const chunks = splitText("😀".repeat(6), { chunkSize: 4, chunkOverlap: 0 });
    expect(chunks.join("")).toBe("😀".repeat(6));
    expect(chunks.every((chunk) => !/^[\uDC00-\uDFFF]/.test(chunk))).toBe(true);
  });

  it("measures length with a custom length function", () => {
    const words = (text: string) => text.split(" ").filter(Boolean).length;
    const splitter = createTextSplitter({ chunkSize: 3, chunkOverlap: 0, lengthFunction: words });

    expect(splitter("a b c d e f")).toEqual(["a b c", " d e f"]);
  });
});

describe("option validation", () => {
  it.each([
    { options: { chunkSize: 0, chunkOverlap: 0 }, message: "chunkSize must be a positive integer" },
    { options: { chunkSize: -5, chunkOverlap: 0 }, message: "chunkSize must be a positive integer" },
    { options: { chunkSize: 10.5, chunkOverlap: 0 }, message: "chunkSize must be a positive integer" },
    { options: { chunkSize: 10, chunkOverlap: -1 }, message: "chunkOverlap must be a non-negative integer" },
    {
      options: { chunkSize: 10, chunkOverlap: 10 },
      message: "chunkOverlap (10) must be smaller than chunkSize (10)",
    },
  ])("rejects $options", ({ options, message }) => {
    expect(() => createTextSplitter(options)).toThrow(ConfigurationError);
    expect(() => createTextSplitter(options)).toThrow(message);
  });
});

describe("createChunker", () => {
  it("counts characters by default", () => {
    const chunker = createChunker({ chunkSize: 500, chunkOverlap: 50 });
    expect(chunker("A".repeat(1000))).toHaveLength(3);
  });

  it("counts tokens when asked", () => {
    const chunker = createChunker({ chunkSize: 500, chunkOverlap: 50, lengthUnit: "tokens" });
    const text = "word ".repeat(200);
    expect(chunker(text)).toEqual([text]);
  });
});
