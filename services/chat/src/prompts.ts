import type { SearchHit } from "@docent/rag";

export const NO_ANSWER = "I don't have enough information from the documents.";

export function sourceOf(hit: SearchHit): string {
  const filename = hit.metadata.filename;
  return typeof filename === "string" ? filename : "unknown";
}

/** Numbered context blocks, closest match first. */
export function formatContext(hits: readonly SearchHit[]): string {
  if (hits.length === 0) return "(no matching documents)";
  return hits
    .map((hit, i) => `[${i + 1}] (source: ${sourceOf(hit)})\n${hit.content}`)
    .join("\n\n");
}

export function buildSystemPrompt(hits: readonly SearchHit[]): string {
  return `You are a helpful AI assistant. Use the following context to answer the question accurately.
If the context doesn't have the information, say "${NO_ANSWER}"
When you use a context block, mention its source.

Context:
${formatContext(hits)}`;
}
