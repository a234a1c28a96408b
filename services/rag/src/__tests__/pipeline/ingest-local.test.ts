import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, writeFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

vi.mock("pdf-parse", () => ({
  PDFParse: vi.fn(function () {
    return {
      getText: vi.fn().mockRejectedValue(new Error("Invalid PDF structure")),
      destroy: vi.fn().mockResolvedValue(undefined),
    };
  }),
}));

import { ingestLocalFiles } from "../../pipeline/ingest-local.js";
import { LocalFileClient } from "../../local/client.js";
import { VectorIndex } from "../../indexing/vector-index.js";
import { MemoryVectorStore } from "../../store/memory.js";
import { FakeEmbedding } from "../helpers/fake-embedding.js";

async function openIndex(): Promise<VectorIndex> {
  const embedding = new FakeEmbedding();
  const store = new MemoryVectorStore({ collectionName: "test", embeddingModel: embedding.model, dimensions: embedding.dimensions });
  return VectorIndex.open({ store, embedding, chunking: { chunkSize: 500, chunkOverlap: 50 } });
}

describe("ingestLocalFiles", () => {
  let tmpDir: string;
  let index: VectorIndex;
  let localFiles: LocalFileClient;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "docent-ingest-"));
    index = await openIndex();
    localFiles = new LocalFileClient({ directory: tmpDir, extensions: [".txt", ".md", ".pdf"] });
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("indexes every file in the directory", async () => {
    await writeFile(join(tmpDir, "a.txt"), "A".repeat(1000));
    await writeFile(join(tmpDir, "b.md"), "Short markdown note.");

    const result = await ingestLocalFiles(localFiles, index);

    expect(result).toEqual({
      filesLoaded: 2,
      filesFailed: 0,
      chunksUpserted: 4,
      staleChunksRemoved: 0,
      sourcesRemoved: 0,
      errors: [],
    });
    expect(await index.listSources()).toEqual(["a.txt", "b.md"]);
  });

  it("replaces the chunks of an edited file", async () => {
    await writeFile(join(tmpDir, "a.txt"), "A".repeat(1000));
    await ingestLocalFiles(localFiles, index);

    await writeFile(join(tmpDir, "a.txt"), "Rewritten content.");
    const result = await ingestLocalFiles(localFiles, index);

    expect(result.chunksUpserted).toBe(1);
    expect(result.staleChunksRemoved).toBe(3);
    expect(await index.count()).toBe(1);
  });

  it("keeps sources of deleted files unless pruneMissing is set", async () => {
    await writeFile(join(tmpDir, "a.txt"), "Alpha.");
    await writeFile(join(tmpDir, "b.txt"), "Beta.");
    await ingestLocalFiles(localFiles, index);
    await rm(join(tmpDir, "b.txt"));

    const kept = await ingestLocalFiles(localFiles, index);
    expect(kept.sourcesRemoved).toBe(0);
    expect(await index.listSources()).toEqual(["a.txt", "b.txt"]);

    const pruned = await ingestLocalFiles(localFiles, index, { pruneMissing: true });
    expect(pruned.sourcesRemoved).toBe(1);
    expect(pruned.staleChunksRemoved).toBe(1);
    expect(await index.listSources()).toEqual(["a.txt"]);
  });

  it("reports unreadable files without dropping their indexed chunks", async () => {
    await writeFile(join(tmpDir, "a.txt"), "Alpha.");
    await writeFile(join(tmpDir, "scan.pdf"), "not a pdf");
    await index.ingest([{ content: "Old scan text.", metadata: { filename: "scan.pdf", type: "pdf" } }]);

    const result = await ingestLocalFiles(localFiles, index, { pruneMissing: true });

    expect(result.filesLoaded).toBe(1);
    expect(result.filesFailed).toBe(1);
    expect(result.errors.map((e) => e.message)).toEqual(["scan.pdf: Invalid PDF structure"]);
    expect(result.sourcesRemoved).toBe(0);
    expect(await index.listSources()).toEqual(["a.txt", "scan.pdf"]);
  });
});
