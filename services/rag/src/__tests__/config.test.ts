import { describe, it, expect } from "vitest";
import { loadConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { createEmbeddingClient } from "../embeddings/index.js";

// Minimal valid env: only the embedding provider and key are required
const BASE: Record<string, string> = {
  EMBEDDING_PROVIDER: "openai",
  EMBEDDING_API_KEY: "test-key",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(BASE);

    expect(config.embedding).toEqual({
      provider: "openai",
      apiKey: "test-key",
      model: undefined,
      dimensions: undefined,
    });
    expect(config.index).toEqual({
      backend: "memory",
      collectionName: "rag_collection",
      persistDirectory: undefined,
      pruneStale: true,
    });
    expect(config.qdrant).toEqual({ url: "http://localhost:6333", apiKey: undefined });
    expect(config.chunking).toEqual({ chunkSize: 500, chunkOverlap: 50, lengthUnit: "characters" });
    expect(config.documents).toEqual({
      directory: "data",
      extensions: [".txt", ".md", ".html", ".pdf"],
      pruneMissing: false,
    });
    expect(config.sync).toEqual({ cronSchedule: "0 */6 * * *", onStart: false });
    expect(config.snapshotFile).toBe("knowledge_base.json");
    expect(config.logLevel).toBe("info");
  });

  it.each([
    { provider: "openai", model: "text-embedding-3-small", dimensions: 1536 },
    { provider: "voyage", model: "voyage-3", dimensions: 1024 },
    { provider: "cohere", model: "embed-multilingual-v3.0", dimensions: 1024 },
  ])("leaves the $provider client on its own model defaults", ({ provider, model, dimensions }) => {
    const config = loadConfig({ ...BASE, EMBEDDING_PROVIDER: provider });
    const client = createEmbeddingClient(config.embedding);

    expect(client.model).toBe(model);
    expect(client.dimensions).toBe(dimensions);
  });

  it("reads every override", () => {
    const config = loadConfig({
      ...BASE,
      EMBEDDING_PROVIDER: "voyage",
      EMBEDDING_MODEL: "voyage-3",
      EMBEDDING_DIMENSIONS: "1024",
      INDEX_BACKEND: "qdrant",
      INDEX_COLLECTION: "docs",
      INDEX_PERSIST_DIRECTORY: "/var/index",
      INDEX_PRUNE_STALE: "false",
      QDRANT_URL: "http://qdrant:6333",
      QDRANT_API_KEY: "test-secret",
      CHUNK_SIZE: "800",
      CHUNK_OVERLAP: "100",
      CHUNK_LENGTH_UNIT: "tokens",
      DOCUMENTS_DIRECTORY: "/docs",
      DOCUMENTS_EXTENSIONS: ".md, .txt",
      DOCUMENTS_PRUNE_MISSING: "true",
      SYNC_CRON: "*/5 * * * *",
      SYNC_ON_START: "true",
      SNAPSHOT_FILE: "out/kb.json",
      LOG_LEVEL: "debug",
    });

    expect(config.embedding).toEqual({
      provider: "voyage",
      apiKey: "test-key",
      model: "voyage-3",
      dimensions: 1024,
    });
    expect(config.index).toEqual({
      backend: "qdrant",
      collectionName: "docs",
      persistDirectory: "/var/index",
      pruneStale: false,
    });
    expect(config.qdrant).toEqual({ url: "http://qdrant:6333", apiKey: "test-secret" });
    expect(config.chunking).toEqual({ chunkSize: 800, chunkOverlap: 100, lengthUnit: "tokens" });
    expect(config.documents).toEqual({ directory: "/docs", extensions: [".md", ".txt"], pruneMissing: true });
    expect(config.sync).toEqual({ cronSchedule: "*/5 * * * *", onStart: true });
    expect(config.snapshotFile).toBe("out/kb.json");
    expect(config.logLevel).toBe("debug");
  });

  it("requires an embedding provider", () => {
    expect(() => loadConfig({ EMBEDDING_API_KEY: "test-key" })).toThrow(ConfigurationError);
  });

  it("rejects an unknown embedding provider", () => {
    expect(() => loadConfig({ ...BASE, EMBEDDING_PROVIDER: "acme" })).toThrow(/embedding\.provider/);
  });

  it("requires an embedding api key", () => {
    expect(() => loadConfig({ EMBEDDING_PROVIDER: "openai" })).toThrow(/embedding\.apiKey/);
  });

  it("rejects overlap that is not smaller than chunk size", () => {
    expect(() => loadConfig({ ...BASE, CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" })).toThrow(
      "chunking.chunkOverlap: CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    );
  });

  it("rejects a non-numeric chunk size", () => {
    expect(() => loadConfig({ ...BASE, CHUNK_SIZE: "large" })).toThrow(/chunking\.chunkSize/);
  });

  it("rejects a malformed boolean flag", () => {
    expect(() => loadConfig({ ...BASE, INDEX_PRUNE_STALE: "yes" })).toThrow(/index\.pruneStale/);
  });

  it("rejects an unknown backend", () => {
    expect(() => loadConfig({ ...BASE, INDEX_BACKEND: "sqlite" })).toThrow(/index\.backend/);
  });

  it("treats an empty persist directory as unset", () => {
    expect(loadConfig({ ...BASE, INDEX_PERSIST_DIRECTORY: "" }).index.persistDirectory).toBeUndefined();
  });
});
