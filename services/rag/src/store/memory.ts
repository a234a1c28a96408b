import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { cosineDistance } from "./cosine.js";
import { RecordMetadataSchema } from "./schema.js";
import type {
  ListIdsFilter,
  ScoredRecord,
  StoredRecord,
  VectorRecord,
  VectorStore,
} from "./types.js";

export interface MemoryVectorStoreConfig {
  collectionName: string;
  /** When set, the collection is loaded from and saved to `<dir>/<collection>.json`. */
  persistDirectory?: string;
  embeddingModel: string;
  dimensions: number;
}

const PersistedCollectionSchema = z.object({
  version: z.literal(1),
  collectionName: z.string(),
  embedding: z.object({ model: z.string(), dimensions: z.number().int().positive() }),
  records: z.array(
    z.object({
      id: z.string(),
      content: z.string(),
      metadata: RecordMetadataSchema,
      vector: z.array(z.number()),
    }),
  ),
});

type PersistedCollection = z.infer<typeof PersistedCollectionSchema>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Exact nearest-neighbour store held in process memory, optionally persisted to
 * a JSON file. Mutations are applied before the returned promise settles.
 */
export class MemoryVectorStore implements VectorStore {
  readonly backend = "memory" as const;
  readonly collectionName: string;
  private records = new Map<string, VectorRecord>();
  private readonly config: MemoryVectorStoreConfig;

  constructor(config: MemoryVectorStoreConfig) {
    this.config = config;
    this.collectionName = config.collectionName;
  }

  get filePath(): string | undefined {
    const { persistDirectory } = this.config;
    return persistDirectory ? join(persistDirectory, `${this.collectionName}.json`) : undefined;
  }

  async init(): Promise<void> {
    const file = this.filePath;
    if (!file) return;

    let raw: string;
    try {
      raw = await readFile(file, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }

    const persisted = PersistedCollectionSchema.parse(JSON.parse(raw));
    const { model, dimensions } = persisted.embedding;
    if (dimensions !== this.config.dimensions || model !== this.config.embeddingModel) {
      throw new ConfigurationError(
        `Collection "${this.collectionName}" was built with ${model} (${dimensions} dims); ` +
          `configured embedding is ${this.config.embeddingModel} (${this.config.dimensions} dims). Re-index required.`,
      );
    }

    this.records = new Map(persisted.records.map((record) => [record.id, record]));
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    for (const record of records) {
      if (record.vector.length !== this.config.dimensions) {
        throw new ConfigurationError(
          `Vector for ${record.id} has ${record.vector.length} dimensions, expected ${this.config.dimensions}`,
        );
      }
    }
    const next = new Map(this.records);
    for (const record of records) {
      next.set(record.id, {
        id: record.id,
        content: record.content,
        metadata: { ...record.metadata },
        vector: [...record.vector],
      });
    }
    await this.commit(next);
  }

  async query(vector: number[], k: number): Promise<ScoredRecord[]> {
    if (vector.length !== this.config.dimensions) {
      throw new ConfigurationError(
        `Query vector has ${vector.length} dimensions, expected ${this.config.dimensions}`,
      );
    }
    const scored: ScoredRecord[] = [];
    for (const record of this.records.values()) {
      scored.push({
        id: record.id,
        content: record.content,
        metadata: { ...record.metadata },
        distance: cosineDistance(vector, record.vector),
      });
    }
    scored.sort((a, b) => a.distance - b.distance || a.id.localeCompare(b.id));
    return scored.slice(0, k);
  }

  async getAll(): Promise<StoredRecord[]> {
    return [...this.records.values()].map(({ id, content, metadata }) => ({
      id,
      content,
      metadata: { ...metadata },
    }));
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async listIds(filter: ListIdsFilter = {}): Promise<string[]> {
    const ids: string[] = [];
    for (const record of this.records.values()) {
      if (filter.filename === undefined || record.metadata.filename === filter.filename) {
        ids.push(record.id);
      }
    }
    return ids;
  }

  async listFilenames(): Promise<string[]> {
    const filenames = new Set<string>();
    for (const record of this.records.values()) {
      const { filename } = record.metadata;
      if (typeof filename === "string") filenames.add(filename);
    }
    return [...filenames];
  }

  async deleteByIds(ids: string[]): Promise<void> {
    const next = new Map(this.records);
    let removed = false;
    for (const id of ids) {
      removed = next.delete(id) || removed;
    }
    if (removed) await this.commit(next);
  }

  async close(): Promise<void> {
    this.records.clear();
  }

  /** Writes `next` to disk first; the live map is replaced only once that succeeds. */
  private async commit(next: Map<string, VectorRecord>): Promise<void> {
    await this.persist(next);
    this.records = next;
  }

  private async persist(records: Map<string, VectorRecord>): Promise<void> {
    const file = this.filePath;
    const dir = this.config.persistDirectory;
    if (!file || !dir) return;

    const snapshot: PersistedCollection = {
      version: 1,
      collectionName: this.collectionName,
      embedding: { model: this.config.embeddingModel, dimensions: this.config.dimensions },
      records: [...records.values()],
    };

    await mkdir(dir, { recursive: true });
    const tmp = `${file}.tmp`;
    await writeFile(tmp, JSON.stringify(snapshot), "utf-8");
    await rename(tmp, file);
  }
}
