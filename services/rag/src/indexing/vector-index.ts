import { Mutex } from "async-mutex";
import { errorMessage, silentLogger, type Logger } from "@docent/common";
import { createChunker } from "../chunking/index.js";
import type { Chunk, ChunkingOptions, TextSplitter } from "../chunking/types.js";
import type { EmbeddingClient, EmbeddingInputType } from "../embeddings/index.js";
import {
  ConfigurationError,
  EmbeddingError,
  IndexUnavailableError,
  IngestionError,
  QueryError,
  isRagError,
} from "../errors.js";
import type { VectorRecord, VectorStore } from "../store/types.js";
import { withSpan } from "../tracing.js";
import { chunkDocument } from "./ids.js";
import { DocumentSchema } from "./schema.js";
import type { Document, ExportedRecord, IngestReport, SearchResult } from "./types.js";

export interface VectorIndexOptions {
  store: VectorStore;
  embedding: EmbeddingClient;
  chunking: ChunkingOptions;
  /** Delete chunks of re-ingested sources that the new content no longer produces. Default true. */
  pruneStale?: boolean;
  logger?: Logger;
}

export const DEFAULT_RESULTS = 5;

/**
 * Chunked, embedded document collection. Writes are serialized per instance;
 * reads go straight to the store.
 */
export class VectorIndex {
  private readonly store: VectorStore;
  private readonly embedding: EmbeddingClient;
  private readonly splitter: TextSplitter;
  private readonly pruneStale: boolean;
  private readonly logger: Logger;
  private readonly writeLock = new Mutex();

  private constructor(options: VectorIndexOptions) {
    this.store = options.store;
    this.embedding = options.embedding;
    this.splitter = createChunker(options.chunking);
    this.pruneStale = options.pruneStale ?? true;
    this.logger = (options.logger ?? silentLogger).child({ component: "vector-index" });
  }

  /** Build the index and initialise its store. */
  static async open(options: VectorIndexOptions): Promise<VectorIndex> {
    const index = new VectorIndex(options);
    await index.storeCall("open", () => index.store.init());
    index.logger.info("Index opened", {
      backend: index.store.backend,
      collection: index.store.collectionName,
      model: index.embedding.model,
      dimensions: index.embedding.dimensions,
    });
    return index;
  }

  get collectionName(): string {
    return this.store.collectionName;
  }

  get backend(): VectorStore["backend"] {
    return this.store.backend;
  }

  async ingest(documents: readonly Document[]): Promise<IngestReport> {
    return withSpan("rag.ingest", (span) =>
      this.writeLock.runExclusive(async () => {
        const report: IngestReport = {
          documentsReceived: documents.length,
          documentsIndexed: 0,
          documentsSkipped: 0,
          chunksUpserted: 0,
          staleChunksRemoved: 0,
          ids: [],
          errors: [],
        };

        const chunksById = new Map<string, Chunk>();
        const filenames = new Set<string>();

        documents.forEach((document, position) => {
          const chunks = this.chunkOne(document, position, report.errors);
          if (!chunks) {
            report.documentsSkipped++;
            return;
          }
          report.documentsIndexed++;
          filenames.add(document.metadata.filename);
          for (const chunk of chunks) {
            // Re-setting keeps the first position but takes the last occurrence
            chunksById.set(chunk.id, chunk);
          }
        });

        const chunks = [...chunksById.values()];
        if (chunks.length > 0) {
          const vectors = await this.embedAll(
            chunks.map((chunk) => chunk.content),
            "document",
          );
          const records: VectorRecord[] = chunks.map((chunk, i) => ({
            id: chunk.id,
            content: chunk.content,
            metadata: chunk.metadata,
            vector: vectors[i],
          }));
          await this.storeCall(`upsert of ${records.length} chunks`, () =>
            this.store.upsert(records),
          );
        }

        report.ids = chunks.map((chunk) => chunk.id);
        report.chunksUpserted = chunks.length;

        if (this.pruneStale) {
          const keep = new Set(report.ids);
          for (const filename of filenames) {
            report.staleChunksRemoved += await this.deleteWhere(filename, (id) => !keep.has(id));
          }
        }

        span.setAttribute("rag.documents", documents.length);
        span.setAttribute("rag.chunks", chunks.length);
        this.logger.info("Ingested documents", {
          documents: report.documentsIndexed,
          skipped: report.documentsSkipped,
          chunks: report.chunksUpserted,
          staleRemoved: report.staleChunksRemoved,
        });
        return report;
      }),
    );
  }

  async search(query: string, nResults: number = DEFAULT_RESULTS): Promise<SearchResult> {
    if (!Number.isInteger(nResults) || nResults <= 0) {
      throw new ConfigurationError(`nResults must be a positive integer, got ${nResults}`);
    }
    if (query.trim() === "") {
      throw new QueryError("Query text must not be empty");
    }

    return withSpan("rag.search", async (span) => {
      span.setAttribute("rag.n_results", nResults);
      const vector = await this.embedQuery(query);
      const hits = await this.storeCall("query", () => this.store.query(vector, nResults));
      span.setAttribute("rag.hits", hits.length);
      this.logger.debug("Search complete", { nResults, hits: hits.length });
      return hits.map(({ id, content, metadata, distance }) => ({ id, content, metadata, distance }));
    });
  }

  async count(): Promise<number> {
    return this.storeCall("count", () => this.store.count());
  }

  async isEmpty(): Promise<boolean> {
    return (await this.count()) === 0;
  }

  async exportAll(): Promise<ExportedRecord[]> {
    return withSpan("rag.export", async (span) => {
      const records = await this.storeCall("export", () => this.store.getAll());
      span.setAttribute("rag.records", records.length);
      return records;
    });
  }

  /** Distinct filenames currently indexed, sorted. */
  async listSources(): Promise<string[]> {
    const filenames = await this.storeCall("list sources", () => this.store.listFilenames());
    return filenames.sort((a, b) => a.localeCompare(b));
  }

  /** Remove every chunk of a source. Returns the number of chunks deleted. */
  async removeSource(filename: string): Promise<number> {
    return this.writeLock.runExclusive(async () => {
      const removed = await this.deleteWhere(filename, () => true);
      this.logger.info("Removed source", { filename, chunks: removed });
      return removed;
    });
  }

  /** Re-embed exported records and store them under their saved ids. */
  async restore(records: readonly ExportedRecord[]): Promise<number> {
    if (records.length === 0) return 0;
    return this.writeLock.runExclusive(async () => {
      const vectors = await this.embedAll(
        records.map((record) => record.content),
        "document",
      );
      const withVectors: VectorRecord[] = records.map((record, i) => ({
        id: record.id,
        content: record.content,
        metadata: record.metadata,
        vector: vectors[i],
      }));
      await this.storeCall(`restore of ${withVectors.length} records`, () =>
        this.store.upsert(withVectors),
      );
      this.logger.info("Restored records", { records: withVectors.length });
      return withVectors.length;
    });
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  private chunkOne(
    document: Document,
    position: number,
    errors: IngestionError[],
  ): Chunk[] | undefined {
    const parsed = DocumentSchema.safeParse(document);
    if (!parsed.success) {
      const error = new IngestionError(
        `document #${position}`,
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
        parsed.error,
      );
      this.logger.warn("Skipping invalid document", { position, error: error.message });
      errors.push(error);
      return undefined;
    }

    try {
      return chunkDocument(document, this.splitter);
    } catch (cause) {
      const error = new IngestionError(document.metadata.filename, errorMessage(cause), cause);
      this.logger.warn("Skipping document that could not be chunked", {
        filename: document.metadata.filename,
        error: error.message,
      });
      errors.push(error);
      return undefined;
    }
  }

  private async deleteWhere(filename: string, predicate: (id: string) => boolean): Promise<number> {
    const stored = await this.storeCall("list ids", () => this.store.listIds({ filename }));
    const doomed = stored.filter(predicate);
    if (doomed.length === 0) return 0;
    await this.storeCall("delete", () => this.store.deleteByIds(doomed));
    this.logger.debug("Deleted chunks", { filename, chunks: doomed.length });
    return doomed.length;
  }

  private async embedAll(texts: string[], inputType: EmbeddingInputType): Promise<number[][]> {
    const vectors = await this.embeddingCall(() => this.embedding.embed(texts, inputType));
    if (vectors.length !== texts.length) {
      throw new EmbeddingError(
        `Embedding client returned ${vectors.length} vectors for ${texts.length} texts`,
      );
    }
    return vectors;
  }

  private async embedQuery(query: string): Promise<number[]> {
    return this.embeddingCall(() => this.embedding.embedSingle(query, "query"));
  }

  private async embeddingCall<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isRagError(error)) throw error;
      throw new EmbeddingError(errorMessage(error), error);
    }
  }

  private async storeCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isRagError(error)) throw error;
      throw new IndexUnavailableError(operation, errorMessage(error), error);
    }
  }
}
