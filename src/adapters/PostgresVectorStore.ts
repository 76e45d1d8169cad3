import { Pool } from 'pg';
import { VectorStore, DocumentRecord, SearchResult } from '../ports/VectorStore';
import { DatabaseConfig } from '../shared/config';
import { ConnectionFailure, InsertFailure, SchemaSetupFailure, SearchFailure, describeError, toError } from '../shared/errors';
import { Logger, silentLogger } from '../shared/logger';

export type Row = Record<string, unknown>;

export interface PgClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[] }>;
  release(err?: Error | boolean): void;
}

export interface PgPool {
  connect(): Promise<PgClient>;
  end(): Promise<void>;
}

export type PoolFactory = (connectionString: string) => PgPool;

const COLUMNS_PER_ROW = 4;

const createPgPool: PoolFactory = (connectionString) =>
  new Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

export function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(',')}]`;
}

export class PostgresVectorStore implements VectorStore {
  private pool: PgPool | null = null;

  constructor(
    private readonly config: DatabaseConfig,
    private readonly logger: Logger = silentLogger,
    private readonly createPool: PoolFactory = createPgPool,
  ) {}

  private async acquire(): Promise<PgClient> {
    if (!this.pool) {
      this.pool = this.createPool(this.config.connectionString);
    }
    try {
      return await this.pool.connect();
    } catch (error) {
      throw new ConnectionFailure(`Could not connect to the database: ${describeError(error)}`, error);
    }
  }

  private validateEmbedding(embedding: number[]): void {
    if (embedding.length !== this.config.dimensions) {
      throw new Error(`Invalid embedding dimension: expected ${this.config.dimensions}, got ${embedding.length}`);
    }
    if (!embedding.every(Number.isFinite)) {
      throw new Error('Embedding contains non-finite values');
    }
    // Cosine distance is undefined for a zero vector.
    if (embedding.every((value) => value === 0)) {
      throw new Error('Embedding has zero magnitude');
    }
  }

  /**
   * Returns the rollback error, if any, so the caller can discard the client
   * instead of handing a broken connection back to the pool.
   */
  private async rollback(client: PgClient): Promise<Error | undefined> {
    try {
      await client.query('ROLLBACK');
      return undefined;
    } catch (error) {
      this.logger.warning(`ROLLBACK failed: ${describeError(error)}`);
      return toError(error);
    }
  }

  async ensureSchema(): Promise<void> {
    const client = await this.acquire();
    let broken: Error | undefined;

    try {
      await client.query('BEGIN');
      this.logger.debug("Ensuring 'vector' extension is enabled...");
      await client.query('CREATE EXTENSION IF NOT EXISTS vector');
      this.logger.debug("Creating 'documents' table if it doesn't exist...");
      await client.query(`
        CREATE TABLE IF NOT EXISTS documents (
          id SERIAL PRIMARY KEY,
          filename VARCHAR(255) NOT NULL,
          chunk_text TEXT NOT NULL,
          embedding VECTOR(${this.config.dimensions}) NOT NULL,
          split_strategy VARCHAR(50),
          created_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
        )
      `);
      await client.query(`
        CREATE INDEX IF NOT EXISTS idx_embedding
        ON documents
        USING ivfflat (embedding vector_cosine_ops)
        WITH (lists = ${this.config.ivfflatLists})
      `);
      await client.query('COMMIT');
    } catch (error) {
      broken = await this.rollback(client);
      throw new SchemaSetupFailure(`Database setup failed: ${describeError(error)}`, error);
    } finally {
      client.release(broken);
    }
  }

  async insertDocuments(records: DocumentRecord[]): Promise<void> {
    if (records.length === 0) return;

    // Nothing reaches the database when one record in the batch is malformed.
    records.forEach((record, index) => {
      try {
        this.validateEmbedding(record.embedding);
      } catch (error) {
        throw new InsertFailure(`Record ${index + 1} of ${records.length} rejected: ${describeError(error)}`, { filename: record.filename }, error);
      }
    });

    const client = await this.acquire();
    let broken: Error | undefined;

    try {
      await client.query('BEGIN');

      const batchSize = this.config.insertBatchSize;
      for (let i = 0; i < records.length; i += batchSize) {
        const batch = records.slice(i, i + batchSize);
        const values: unknown[] = [];
        const placeholders: string[] = [];

        batch.forEach((record, index) => {
          const base = index * COLUMNS_PER_ROW;
          placeholders.push(`($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4})`);
          values.push(record.filename, record.chunkText, toVectorLiteral(record.embedding), record.splitStrategy);
        });

        await client.query(
          `INSERT INTO documents (filename, chunk_text, embedding, split_strategy) VALUES ${placeholders.join(', ')}`,
          values,
        );
      }

      await client.query('COMMIT');
      this.logger.debug(`Committed ${records.length} records`);
    } catch (error) {
      broken = await this.rollback(client);
      throw new InsertFailure(`Bulk insert of ${records.length} records failed: ${describeError(error)}`, { filename: records[0].filename }, error);
    } finally {
      client.release(broken);
    }
  }

  async searchSimilar(queryEmbedding: number[], limit: number = 5): Promise<SearchResult[]> {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError(`topK must be a positive integer, got ${limit}`);
    }
    try {
      this.validateEmbedding(queryEmbedding);
    } catch (error) {
      throw new SearchFailure(describeError(error), error);
    }

    const client = await this.acquire();

    try {
      const result = await client.query(
        `
        SELECT
          id,
          filename,
          chunk_text,
          1 - (embedding <=> $1) AS similarity
        FROM documents
        ORDER BY embedding <=> $1
        LIMIT $2
      `,
        [toVectorLiteral(queryEmbedding), limit],
      );

      return result.rows.map((row) => ({
        id: Number(row.id),
        filename: String(row.filename),
        chunkText: String(row.chunk_text),
        similarity: Number(row.similarity),
      }));
    } catch (error) {
      throw new SearchFailure(`Similarity search failed: ${describeError(error)}`, error);
    } finally {
      client.release();
    }
  }

  async countDocuments(): Promise<number> {
    const client = await this.acquire();

    try {
      const result = await client.query('SELECT COUNT(*) AS count FROM documents');
      return Number(result.rows[0]?.count ?? 0);
    } catch (error) {
      throw new SearchFailure(`Counting documents failed: ${describeError(error)}`, error);
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.end();
    }
  }
}
