/**
 * Task hint sent to the provider. Indexing always embeds with `Document`,
 * search always with `Query`.
 */
export enum EmbeddingIntent {
  Document = 'RETRIEVAL_DOCUMENT',
  Query = 'RETRIEVAL_QUERY',
}

export interface Embedder {
  readonly dimensions: number;
  getEmbeddings: (text: string, intent: EmbeddingIntent) => Promise<number[]>;
}
