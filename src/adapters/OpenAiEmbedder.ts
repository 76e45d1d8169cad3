import OpenAI from 'openai';
import { Embedder, EmbeddingIntent } from '../ports/Embedder';
import { EmbeddingConfig } from '../shared/config';
import { EmbeddingFailure, describeError } from '../shared/errors';

export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string; dimensions?: number }): PromiseLike<{ data: { embedding: number[] }[] }>;
  };
}

/**
 * Embeds text through any OpenAI-compatible embeddings endpoint. The intent
 * reaches the provider as an instruction prefix on the input.
 */
export class OpenAiEmbedder implements Embedder {
  private readonly client: EmbeddingsClient;
  public readonly dimensions: number;

  constructor(private readonly config: EmbeddingConfig, client?: EmbeddingsClient) {
    this.dimensions = config.dimensions;
    this.client = client ?? new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
    });
  }

  withIntent(text: string, intent: EmbeddingIntent): string {
    const prefix = intent === EmbeddingIntent.Query ? this.config.queryPrefix : this.config.documentPrefix;
    return `${prefix}${text}`;
  }

  async getEmbeddings(text: string, intent: EmbeddingIntent): Promise<number[]> {
    let embedding: number[] | undefined;
    try {
      const response = await this.client.embeddings.create({
        model: this.config.model,
        input: this.withIntent(text, intent),
        ...(this.config.sendDimensions ? { dimensions: this.dimensions } : {}),
      });
      embedding = response.data[0]?.embedding;
    } catch (error) {
      throw new EmbeddingFailure(`Embedding API error: ${describeError(error)}`, { intent }, error);
    }

    if (!embedding) {
      throw new EmbeddingFailure('Embedding API returned no embedding', { intent });
    }
    if (embedding.length !== this.dimensions) {
      throw new EmbeddingFailure(`Unexpected embedding dimension: ${embedding.length}, expected ${this.dimensions}`, { intent });
    }
    if (embedding.every((value) => value === 0)) {
      throw new EmbeddingFailure('Embedding API returned a zero vector', { intent });
    }
    return embedding;
  }
}
