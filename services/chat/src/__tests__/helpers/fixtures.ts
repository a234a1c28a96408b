import { MemoryVectorStore, VectorIndex, type Document, type EmbeddingClient } from "@docent/rag";

const VOCABULARY = ["apples", "orchard", "rockets", "orbit", "whales", "ocean"];

/** One dimension per vocabulary word plus a constant bias dimension. */
export class KeywordEmbedding implements EmbeddingClient {
  readonly model = "keyword-embedding";
  readonly dimensions = VOCABULARY.length + 1;
  failWith: Error | undefined;

  async embed(texts: string[]): Promise<number[][]> {
    if (this.failWith) throw this.failWith;
    return texts.map((text) => {
      const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
      return [...VOCABULARY.map((term) => words.filter((w) => w === term).length), 1];
    });
  }

  async embedSingle(text: string): Promise<number[]> {
    const [vector] = await this.embed([text]);
    return vector;
  }
}

export const corpus: Document[] = [
  { content: "Apples grow in the orchard.", metadata: { filename: "fruit.txt", type: "txt" } },
  { content: "Rockets reach orbit quickly.", metadata: { filename: "space.txt", type: "txt" } },
];

export async function createTestIndex(documents: Document[] = corpus) {
  const embedding = new KeywordEmbedding();
  const store = new MemoryVectorStore({
    collectionName: "test",
    embeddingModel: embedding.model,
    dimensions: embedding.dimensions,
  });
  const index = await VectorIndex.open({
    store,
    embedding,
    chunking: { chunkSize: 500, chunkOverlap: 50 },
  });
  await index.ingest(documents);
  return { index, store, embedding };
}
