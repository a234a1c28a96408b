import type { Logger } from "@docent/common";
import type { Config } from "./config.js";
import { createEmbeddingClient } from "./embeddings/index.js";
import { VectorIndex } from "./indexing/index.js";
import { LocalFileClient } from "./local/index.js";
import { createVectorStore } from "./store/index.js";

/** Wire the embedding client, store and index described by `config`. */
export async function openIndex(config: Config, logger?: Logger): Promise<VectorIndex> {
  const embedding = createEmbeddingClient({ ...config.embedding, logger });
  const store = createVectorStore(
    {
      backend: config.index.backend,
      collectionName: config.index.collectionName,
      persistDirectory: config.index.persistDirectory,
      qdrant: config.qdrant,
    },
    embedding,
  );
  return VectorIndex.open({
    store,
    embedding,
    chunking: config.chunking,
    pruneStale: config.index.pruneStale,
    logger,
  });
}

export function createLocalFileClient(config: Config, logger?: Logger, directory?: string): LocalFileClient {
  return new LocalFileClient({
    directory: directory ?? config.documents.directory,
    extensions: config.documents.extensions,
    logger,
  });
}
