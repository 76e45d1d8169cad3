#!/usr/bin/env node
import "dotenv/config";
import { Command, InvalidArgumentError } from 'commander'
import { input } from '@inquirer/prompts';
import chalk from 'chalk'
import ora from 'ora'
import { FileTextExtractor } from './adapters/FileTextExtractor';
import { OpenAiEmbedder } from './adapters/OpenAiEmbedder';
import { PostgresVectorStore } from './adapters/PostgresVectorStore';
import { IngestHandler, IngestReport } from './core/ingest-handler';
import { QueryHandler } from './core/query-handler';
import { SearchResult, VectorStore } from './ports/VectorStore';
import { loadConfig } from './shared/config';
import { DocvecError, describeError } from './shared/errors';
import { createConsoleLogger, Logger } from './shared/logger';

const program = new Command()

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

function reportFailure(logger: Logger, error: unknown): void {
    const label = error instanceof DocvecError ? error.name : 'Error';
    logger.error(`❌ ${label}: ${describeError(error)}`);
    if (error instanceof Error && error.cause !== undefined) {
        logger.debug(`   Caused by: ${describeError(error.cause)}`);
    }
    process.exitCode = 1;
}

function printIngestReport(logger: Logger, report: IngestReport): void {
    if (report.status === 'empty') {
        if (report.reason === 'no-text') {
            logger.warning('⚠️  Nothing to index.');
            return;
        }
        logger.error(`CRITICAL: No data was prepared for insertion (${report.reason}). Halting.`);
        process.exitCode = 1;
        return;
    }

    logger.success(`✅ ${report.filename} successfully indexed`);
    logger.info(`   Inserted: ${report.inserted} of ${report.totalChunks} chunks`);
    if (report.skipped > 0) logger.warning(`   Skipped empty chunks: ${report.skipped}`);
    if (report.failed > 0) logger.warning(`   Failed to embed: ${report.failed} (chunks ${report.failures.map(f => f.chunkIndex + 1).join(', ')})`);
}

// Runs after the insert has committed, so a failed count only warns.
export async function logStoreSize(logger: Logger, vectorStore: Pick<VectorStore, 'countDocuments'>): Promise<void> {
    try {
        logger.info(`   Documents table now holds ${await vectorStore.countDocuments()} chunks`);
    } catch (error) {
        logger.warning(`⚠️  Could not count stored chunks: ${describeError(error)}`);
    }
}

export function formatSearchResults(results: SearchResult[]): string {
    if (results.length === 0) {
        return 'No relevant documents found.';
    }
    return results
        .map((result, i) => `--- Result ${i + 1} (Similarity: ${result.similarity.toFixed(4)}) [${result.filename}] ---\n${result.chunkText}`)
        .join('\n\n');
}

program
    .name('docvec')
    .description('Index documents into PostgreSQL/pgvector and search them by similarity')
    .version('1.0.0')

program
    .command('index')
    .description('Chunk, embed and store a document (PDF, DOCX, TXT or MD)')
    .argument('[file]', 'path to the document')
    .option('-s, --sentences <n>', 'sentences per chunk', parsePositiveInt)
    .action(async (file: string | undefined, options: { sentences?: number }) => {
        let logger = createConsoleLogger();
        let vectorStore: PostgresVectorStore | undefined;

        try {
            const config = loadConfig();
            logger = createConsoleLogger(config.logLevel);
            const filePath = file ?? await input({
                message: 'Enter the path of the document to index',
                validate: (value) => value.trim().length > 0 || 'Please enter a path',
            });

            vectorStore = new PostgresVectorStore(config.database, logger);
            const ingestion = new IngestHandler(vectorStore, new OpenAiEmbedder(config.embedding), new FileTextExtractor(), logger, {
                sentencesPerChunk: options.sentences ?? config.sentencesPerChunk,
            });

            console.log(chalk.blue(`📂 Indexing: ${filePath.trim()}`));
            const report = await ingestion.run(filePath.trim());
            printIngestReport(logger, report);

            if (report.status === 'indexed') {
                await logStoreSize(logger, vectorStore);
            }
        } catch (error) {
            reportFailure(logger, error);
        } finally {
            await vectorStore?.close();
            logger.debug('Database connection closed.');
        }
    })

program
    .command('search')
    .description('Find the chunks most similar to a query')
    .argument('[query]', 'free-text query')
    .option('-k, --top-k <n>', 'number of results', parsePositiveInt)
    .action(async (query: string | undefined, options: { topK?: number }) => {
        let logger = createConsoleLogger();
        let vectorStore: PostgresVectorStore | undefined;

        try {
            const config = loadConfig();
            logger = createConsoleLogger(config.logLevel);
            const question = query ?? await input({
                message: chalk.cyan('Query:'),
                validate: (value) => value.trim().length > 0 || 'Please enter a query',
            });
            const topK = options.topK ?? config.searchTopK;

            vectorStore = new PostgresVectorStore(config.database, logger);
            const queryHandler = new QueryHandler(vectorStore, new OpenAiEmbedder(config.embedding));

            const spinner = ora(`🔍 Searching for the top ${topK} most relevant chunks...`).start();
            let results: SearchResult[];
            try {
                results = await queryHandler.run(question, topK);
            } finally {
                spinner.stop();
            }

            console.log(chalk.bold('\n--- Search Results ---\n'));
            console.log(formatSearchResults(results));
        } catch (error) {
            reportFailure(logger, error);
        } finally {
            await vectorStore?.close();
            logger.debug('Database connection closed.');
        }
    })

if (require.main === module) {
    program.parseAsync().catch((error: unknown) => {
        console.error(chalk.red(describeError(error)));
        process.exitCode = 1;
    });
}
