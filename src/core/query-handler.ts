import { VectorStore, SearchResult } from "../ports/VectorStore";
import { Embedder, EmbeddingIntent } from "../ports/Embedder";
import { QueryEmbeddingFailure } from "../shared/errors";

const clampScore = (similarity: number) => (Number.isFinite(similarity) ? Math.min(1, Math.max(0, similarity)) : 0);

export class QueryHandler {
  constructor(private readonly vectorStore: VectorStore, private readonly embedder: Embedder) {}

  async run(query: string, topK: number = 5): Promise<SearchResult[]> {
    if (!query.trim()) {
      throw new RangeError('Query text must not be empty');
    }
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new RangeError(`topK must be a positive integer, got ${topK}`);
    }

    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.embedder.getEmbeddings(query, EmbeddingIntent.Query);
    } catch (error) {
      throw new QueryEmbeddingFailure(query, error);
    }

    // A store that has never been indexed has no table yet; it should read as empty.
    await this.vectorStore.ensureSchema();
    const results = await this.vectorStore.searchSimilar(queryEmbedding, topK);

    // pgvector's cosine distance spans [0, 2] and is NaN for a zero vector; both map into [0, 1].
    return results.map(result => ({ ...result, similarity: clampScore(result.similarity) }));
  }
}
