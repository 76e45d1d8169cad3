export interface DocumentRecord {
  filename: string;
  chunkText: string;
  embedding: number[];
  splitStrategy: string | null;
}

export interface StoredRecord extends DocumentRecord {
  id: number;
  createdAt: Date;
}

export interface SearchResult {
  id: number;
  filename: string;
  chunkText: string;
  similarity: number;
}

export interface VectorStore {
  ensureSchema(): Promise<void>;
  insertDocuments(records: DocumentRecord[]): Promise<void>;
  searchSimilar(queryEmbedding: number[], limit?: number): Promise<SearchResult[]>;
  countDocuments(): Promise<number>;
  close(): Promise<void>;
}
