import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { MemoryVectorStore } from "../../store/memory.js";
import { cosineDistance } from "../../store/cosine.js";
import { ConfigurationError } from "../../errors.js";
import type { VectorRecord } from "../../store/types.js";

function record(id: string, vector: number[], filename = "a.txt"): VectorRecord {
  return { id, content: `content of ${id}`, metadata: { filename, type: "txt" }, vector };
}

const baseConfig = { collectionName: "test", embeddingModel: "fake", dimensions: 2 };

describe("cosineDistance", () => {
  it("is 0 for parallel vectors", () => {
    expect(cosineDistance([1, 2], [2, 4])).toBeCloseTo(0);
  });

  it("is 1 for orthogonal vectors", () => {
    expect(cosineDistance([1, 0], [0, 1])).toBeCloseTo(1);
  });

  it("is 2 for opposite vectors", () => {
    expect(cosineDistance([1, 0], [-1, 0])).toBeCloseTo(2);
  });

  it("treats a zero vector as orthogonal", () => {
    expect(cosineDistance([0, 0], [1, 1])).toBe(1);
  });

  it("refuses vectors of different lengths", () => {
    expect(() => cosineDistance([1, 0], [1, 0, 0])).toThrow(ConfigurationError);
  });
});

describe("MemoryVectorStore", () => {
  it("upserts by id", async () => {
    const store = new MemoryVectorStore(baseConfig);
    await store.upsert([record("a", [1, 0]), record("b", [0, 1])]);
    await store.upsert([{ ...record("a", [1, 1]), content: "replaced" }]);

    expect(await store.count()).toBe(2);
    expect(await store.getAll()).toEqual([
      { id: "a", content: "replaced", metadata: { filename: "a.txt", type: "txt" } },
      { id: "b", content: "content of b", metadata: { filename: "a.txt", type: "txt" } },
    ]);
  });

  it("returns the k nearest records, closest first", async () => {
    const store = new MemoryVectorStore(baseConfig);
    await store.upsert([record("far", [-1, 0]), record("near", [1, 0.1]), record("mid", [0, 1])]);

    const hits = await store.query([1, 0], 2);

    expect(hits.map((hit) => hit.id)).toEqual(["near", "mid"]);
    expect(hits[0].distance).toBeLessThan(hits[1].distance);
  });

  it("breaks distance ties by id", async () => {
    const store = new MemoryVectorStore(baseConfig);
    await store.upsert([record("b", [1, 0]), record("a", [2, 0])]);

    const hits = await store.query([1, 0], 2);
    expect(hits.map((hit) => hit.id)).toEqual(["a", "b"]);
  });

  it("rejects vectors of the wrong size", async () => {
    const store = new MemoryVectorStore(baseConfig);
    await expect(store.upsert([record("a", [1, 0, 0])])).rejects.toThrow(ConfigurationError);
    expect(await store.count()).toBe(0);
  });

  it("rejects a query vector of the wrong size", async () => {
    const store = new MemoryVectorStore(baseConfig);
    await store.upsert([record("a", [1, 0])]);
    await expect(store.query([1, 0, 0], 1)).rejects.toThrow(
      "Query vector has 3 dimensions, expected 2",
    );
  });

  it("keeps its own copy of metadata on the way in and out", async () => {
    const store = new MemoryVectorStore(baseConfig);
    const input = record("a", [1, 0]);
    await store.upsert([input]);
    input.metadata.filename = "changed-after-upsert.txt";

    const [exported] = await store.getAll();
    exported.metadata.filename = "changed-export.txt";
    const [hit] = await store.query([1, 0], 1);
    hit.metadata.type = "changed-hit";

    expect(await store.getAll()).toEqual([
      { id: "a", content: "content of a", metadata: { filename: "a.txt", type: "txt" } },
    ]);
    expect(await store.listIds({ filename: "a.txt" })).toEqual(["a"]);
  });

  it("lists ids per filename and distinct filenames", async () => {
    const store = new MemoryVectorStore(baseConfig);
    await store.upsert([record("a1", [1, 0], "a.txt"), record("a2", [0, 1], "a.txt"), record("b1", [1, 1], "b.txt")]);

    expect(await store.listIds({ filename: "a.txt" })).toEqual(["a1", "a2"]);
    expect(await store.listIds()).toEqual(["a1", "a2", "b1"]);
    expect(await store.listFilenames()).toEqual(["a.txt", "b.txt"]);
  });

  it("deletes by id", async () => {
    const store = new MemoryVectorStore(baseConfig);
    await store.upsert([record("a", [1, 0]), record("b", [0, 1])]);
    await store.deleteByIds(["a", "missing"]);

    expect(await store.listIds()).toEqual(["b"]);
  });

  describe("with a persist directory", () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await mkdtemp(join(tmpdir(), "docent-store-"));
    });

    afterEach(async () => {
      await rm(tmpDir, { recursive: true, force: true });
    });

    it("writes the collection file and loads it on init", async () => {
      const first = new MemoryVectorStore({ ...baseConfig, persistDirectory: tmpDir });
      await first.init();
      await first.upsert([record("a", [1, 0]), record("b", [0, 1])]);
      await first.deleteByIds(["b"]);

      const saved = JSON.parse(await readFile(join(tmpDir, "test.json"), "utf-8"));
      expect(saved.embedding).toEqual({ model: "fake", dimensions: 2 });
      expect(saved.records).toHaveLength(1);

      const second = new MemoryVectorStore({ ...baseConfig, persistDirectory: tmpDir });
      await second.init();
      expect(await second.listIds()).toEqual(["a"]);
      const [hit] = await second.query([1, 0], 1);
      expect(hit.id).toBe("a");
      expect(hit.distance).toBeCloseTo(0);
    });

    it("leaves the live records untouched when the file cannot be written", async () => {
      const store = new MemoryVectorStore({ ...baseConfig, persistDirectory: tmpDir });
      await store.init();
      await store.upsert([record("a", [1, 0])]);
      // a directory where the temp file should go makes the write fail
      await mkdir(join(tmpDir, "test.json.tmp"));

      await expect(store.upsert([record("b", [0, 1])])).rejects.toThrow();
      await expect(store.deleteByIds(["a"])).rejects.toThrow();

      expect(await store.listIds()).toEqual(["a"]);
      expect(await store.count()).toBe(1);
    });

    it("starts empty when no file exists yet", async () => {
      const store = new MemoryVectorStore({ ...baseConfig, persistDirectory: tmpDir });
      await store.init();
      expect(await store.count()).toBe(0);
    });

    it("refuses a file built with different embedding dimensions", async () => {
      const writer = new MemoryVectorStore({ ...baseConfig, persistDirectory: tmpDir });
      await writer.upsert([record("a", [1, 0])]);

      const reader = new MemoryVectorStore({ ...baseConfig, dimensions: 3, persistDirectory: tmpDir });
      await expect(reader.init()).rejects.toThrow(ConfigurationError);
    });

    it("refuses a file built with a different embedding model", async () => {
      const writer = new MemoryVectorStore({ ...baseConfig, persistDirectory: tmpDir });
      await writer.upsert([record("a", [1, 0])]);

      const reader = new MemoryVectorStore({ ...baseConfig, embeddingModel: "other", persistDirectory: tmpDir });
      await expect(reader.init()).rejects.toThrow("Re-index required");
    });

    it("fails on a corrupt collection file", async () => {
      await writeFile(join(tmpDir, "test.json"), JSON.stringify({ version: 2 }));
      const store = new MemoryVectorStore({ ...baseConfig, persistDirectory: tmpDir });
      await expect(store.init()).rejects.toThrow();
    });
  });
});
