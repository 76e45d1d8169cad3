import * as path from 'node:path';
import { Embedder, EmbeddingIntent } from '../ports/Embedder';
import { TextExtractor } from '../ports/TextExtractor';
import { VectorStore, DocumentRecord } from '../ports/VectorStore';
import { EmbeddingFailure } from '../shared/errors';
import { Logger, silentLogger } from '../shared/logger';
import { splitTextBySentences, SENTENCE_SPLIT_STRATEGY } from './text-chunker';

export type IndexingState = 'extracted' | 'chunked' | 'embedded' | 'persisted' | 'aborted';

export type EmptyReason = 'no-text' | 'no-chunks' | 'no-embeddings';

export interface ChunkFailure {
  chunkIndex: number;
  message: string;
}

export interface IngestCounts {
  filename: string;
  totalChunks: number;
  inserted: number;
  skipped: number;
  failed: number;
  failures: ChunkFailure[];
}

export type IngestReport =
  | (IngestCounts & { status: 'indexed' })
  | (IngestCounts & { status: 'empty'; reason: EmptyReason });

export interface IngestOptions {
  sentencesPerChunk?: number;
}

export function normalizeChunk(chunk: string): string {
  return chunk.replace(/\n/g, ' ').trim();
}

export class IngestHandler {
  private readonly sentencesPerChunk: number;

  constructor(
    private readonly vectorStore: VectorStore,
    private readonly embedder: Embedder,
    private readonly extractor: TextExtractor,
    private readonly logger: Logger = silentLogger,
    options: IngestOptions = {},
  ) {
    this.sentencesPerChunk = options.sentencesPerChunk ?? 3;
  }

  private transition(filename: string, state: IndexingState): void {
    this.logger.debug(`[${filename}] -> ${state}`);
  }

  async run(filePath: string): Promise<IngestReport> {
    const filename = path.basename(filePath);

    try {
      await this.vectorStore.ensureSchema();
      this.logger.info(`📄 Extracting text from: ${filePath}`);
      const text = await this.extractor.extractText(filePath);
      this.logger.info(`📝 Extracted ${text.length} characters from ${filename}`);
      return await this.indexText(filename, text);
    } catch (error) {
      this.transition(filename, 'aborted');
      throw error;
    }
  }

  /**
   * Runs chunking, embedding and persistence for text that has already been
   * extracted. Chunks whose embedding fails are dropped and reported; every
   * other failure aborts the document.
   */
  async indexText(filename: string, text: string): Promise<IngestReport> {
    const counts: IngestCounts = { filename, totalChunks: 0, inserted: 0, skipped: 0, failed: 0, failures: [] };
    this.transition(filename, 'extracted');

    if (!text.trim()) {
      this.logger.warning(`⚠️  The extracted text of ${filename} is empty. No data will be indexed.`);
      return { ...counts, status: 'empty', reason: 'no-text' };
    }

    const chunks = Array.from(splitTextBySentences(text, this.sentencesPerChunk));
    counts.totalChunks = chunks.length;
    this.transition(filename, 'chunked');
    this.logger.info(`📦 Created ${chunks.length} chunks of up to ${this.sentencesPerChunk} sentences from ${filename}`);

    if (chunks.length === 0) {
      return { ...counts, status: 'empty', reason: 'no-chunks' };
    }

    const records: DocumentRecord[] = [];

    for (let i = 0; i < chunks.length; i++) {
      const chunkText = normalizeChunk(chunks[i]);
      if (!chunkText) {
        this.logger.warning(`  - Skipping empty chunk ${i + 1}`);
        counts.skipped++;
        continue;
      }

      this.logger.debug(`  - Processing chunk ${i + 1}/${chunks.length}...`);
      try {
        const embedding = await this.embedder.getEmbeddings(chunkText, EmbeddingIntent.Document);
        records.push({ filename, chunkText, embedding, splitStrategy: SENTENCE_SPLIT_STRATEGY });
      } catch (error) {
        if (!(error instanceof EmbeddingFailure)) throw error;
        this.logger.error(`❌ Failed to generate embedding for chunk ${i + 1}: ${error.message}`);
        counts.failed++;
        counts.failures.push({ chunkIndex: i, message: error.message });
      }
    }

    if (records.length === 0) {
      return { ...counts, status: 'empty', reason: counts.failed > 0 ? 'no-embeddings' : 'no-chunks' };
    }
    this.transition(filename, 'embedded');

    this.logger.info(`💾 Inserting ${records.length} chunks from ${filename}`);
    await this.vectorStore.insertDocuments(records);
    counts.inserted = records.length;
    this.transition(filename, 'persisted');

    return { ...counts, status: 'indexed' };
  }
}
