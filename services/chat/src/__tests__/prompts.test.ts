import { describe, it, expect } from "vitest";
import type { SearchHit } from "@docent/rag";
import { buildSystemPrompt, formatContext, sourceOf } from "../prompts.js";

function hit(id: string, content: string, filename: string | null): SearchHit {
  return { id, content, metadata: { filename, type: "txt" }, distance: 0.1 };
}

describe("formatContext", () => {
  it("numbers blocks and names their source", () => {
    expect(formatContext([hit("a", "First.", "a.txt"), hit("b", "Second.", "b.txt")])).toBe(
      "[1] (source: a.txt)\nFirst.\n\n[2] (source: b.txt)\nSecond.",
    );
  });

  it("says so when nothing matched", () => {
    expect(formatContext([])).toBe("(no matching documents)");
  });
});

describe("sourceOf", () => {
  it("falls back when the filename is not a string", () => {
    expect(sourceOf(hit("a", "x", null))).toBe("unknown");
  });
});

describe("buildSystemPrompt", () => {
  it("ends with the context section", () => {
    const prompt = buildSystemPrompt([hit("a", "First.", "a.txt")]);
    expect(prompt.endsWith("Context:\n[1] (source: a.txt)\nFirst.")).toBe(true);
  });
});
