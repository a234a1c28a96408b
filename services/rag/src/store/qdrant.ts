import { QdrantClient as QdrantSDK } from "@qdrant/js-client-rest";
import { v5 as uuidv5 } from "uuid";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { RecordMetadataSchema } from "./schema.js";
import type {
  ListIdsFilter,
  ScoredRecord,
  StoredRecord,
  VectorRecord,
  VectorStore,
} from "./types.js";

type PageOffset = string | number | undefined;

export interface QdrantStoreConfig {
  url: string;
  collectionName: string;
  apiKey?: string;
  vectorSize: number;
}

// Fixed namespace for deriving point UUIDs from chunk ids
const POINT_ID_NAMESPACE = "3f5f1c1e-8d5b-4c55-9a0e-6f1f1d3c2b7a";

const FILENAME_KEY = "metadata.filename";
const SCROLL_PAGE = 1000;

const PayloadSchema = z.object({
  chunkId: z.string(),
  content: z.string(),
  metadata: RecordMetadataSchema,
});

const ChunkIdPayloadSchema = z.object({ chunkId: z.string() });

const FilenamePayloadSchema = z.object({
  metadata: z.object({ filename: z.string() }),
});

const VectorParamsSchema = z.object({ size: z.number() });

export function toPointId(chunkId: string): string {
  return uuidv5(chunkId, POINT_ID_NAMESPACE);
}

function toOffset(value: unknown): PageOffset {
  return typeof value === "string" || typeof value === "number" ? value : undefined;
}

export class QdrantVectorStore implements VectorStore {
  readonly backend = "qdrant" as const;
  readonly collectionName: string;
  private readonly client: QdrantSDK;
  private readonly vectorSize: number;

  constructor(config: QdrantStoreConfig) {
    this.client = new QdrantSDK({
      url: config.url,
      apiKey: config.apiKey,
    });
    this.collectionName = config.collectionName;
    this.vectorSize = config.vectorSize;
  }

  /**
   * Create the collection if it doesn't exist, otherwise check its vector size.
   */
  async init(): Promise<void> {
    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c) => c.name === this.collectionName);

    if (!exists) {
      await this.client.createCollection(this.collectionName, {
        vectors: {
          size: this.vectorSize,
          distance: "Cosine",
        },
      });

      await this.client.createPayloadIndex(this.collectionName, {
        field_name: FILENAME_KEY,
        field_schema: "keyword",
      });
      return;
    }

    const info = await this.client.getCollection(this.collectionName);
    const params = VectorParamsSchema.safeParse(info.config?.params?.vectors);
    if (params.success && params.data.size !== this.vectorSize) {
      throw new ConfigurationError(
        `Collection "${this.collectionName}" stores ${params.data.size}-dimensional vectors; ` +
          `configured embedding produces ${this.vectorSize}. Re-index required.`,
      );
    }
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    const points = records.map((record) => ({
      id: toPointId(record.id),
      vector: record.vector,
      payload: {
        chunkId: record.id,
        content: record.content,
        metadata: record.metadata,
      },
    }));

    await this.client.upsert(this.collectionName, { wait: true, points });
  }

  async query(vector: number[], k: number): Promise<ScoredRecord[]> {
    const results = await this.client.search(this.collectionName, {
      vector,
      limit: k,
      with_payload: true,
    });

    return results.map((result) => {
      const payload = PayloadSchema.parse(result.payload);
      return {
        id: payload.chunkId,
        content: payload.content,
        metadata: payload.metadata,
        // Qdrant reports cosine similarity
        distance: 1 - result.score,
      };
    });
  }

  async getAll(): Promise<StoredRecord[]> {
    const records: StoredRecord[] = [];
    await this.scrollAll({ withPayload: true }, (payload) => {
      const parsed = PayloadSchema.parse(payload);
      records.push({ id: parsed.chunkId, content: parsed.content, metadata: parsed.metadata });
    });
    return records;
  }

  async count(): Promise<number> {
    const result = await this.client.count(this.collectionName, { exact: true });
    return result.count;
  }

  async listIds(filter: ListIdsFilter = {}): Promise<string[]> {
    const ids: string[] = [];
    await this.scrollAll({ withPayload: ["chunkId"], filename: filter.filename }, (payload) => {
      ids.push(ChunkIdPayloadSchema.parse(payload).chunkId);
    });
    return ids;
  }

  async listFilenames(): Promise<string[]> {
    const filenames = new Set<string>();
    await this.scrollAll({ withPayload: [FILENAME_KEY] }, (payload) => {
      const parsed = FilenamePayloadSchema.safeParse(payload);
      if (parsed.success) filenames.add(parsed.data.metadata.filename);
    });
    return [...filenames];
  }

  async deleteByIds(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    await this.client.delete(this.collectionName, {
      wait: true,
      points: ids.map(toPointId),
    });
  }

  async close(): Promise<void> {
    // The REST client holds no connection state.
  }

  private async scrollAll(
    options: { withPayload: true | string[]; filename?: string },
    visit: (payload: unknown) => void,
  ): Promise<void> {
    const filter = options.filename
      ? { must: [{ key: FILENAME_KEY, match: { value: options.filename } }] }
      : undefined;
    let offset: PageOffset = undefined;

    do {
      const response = await this.client.scroll(this.collectionName, {
        limit: SCROLL_PAGE,
        offset,
        filter,
        with_payload: options.withPayload,
        with_vector: false,
      });

      for (const point of response.points) {
        visit(point.payload);
      }

      offset = toOffset(response.next_page_offset);
    } while (offset !== undefined);
  }
}
