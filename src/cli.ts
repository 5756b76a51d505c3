#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import { ConfigOverrides, loadConfig } from './config';
import { FrozenSyncConfig } from './models/config';
import { EXIT_CODES, exitCodeFor } from './models/report';
import { ContentHasher } from './services/contentHasher';
import { Reconciler } from './services/reconciler';
import { SyncStateStore } from './services/syncStateStore';
import { QdrantIndexBackend } from './services/vectorIndex';
import { forgetDocument, runSync } from './index';
import { logger } from './utils/logger';

interface SyncCommandOptions {
    config?: string;
    resetState?: boolean;
    timeout?: number;
    concurrency?: number;
}

interface ConfigCommandOptions {
    config?: string;
}

export type OutputWriter = (text: string) => void;

export function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

async function loadCliConfig(
    options: ConfigCommandOptions,
    requireIndexCredentials: boolean,
    overrides?: ConfigOverrides
): Promise<FrozenSyncConfig> {
    const config = await loadConfig({ configPath: options.config, requireIndexCredentials, overrides });
    logger.configure({ level: config.logging.level, logDir: config.logging.dir });
    return config;
}

export function createProgram(write: OutputWriter = text => process.stdout.write(`${text}\n`)): Command {
    const program = new Command();

    program
        .name('rag-sync')
        .description('Keep a vector index in agreement with a document source')
        .version('1.0.0');

    const fail = (message: string, error: unknown): void => {
        logger.error(message, { error: error instanceof Error ? error.message : String(error) });
        process.exitCode = EXIT_CODES.aborted;
    };

    program
        .command('sync')
        .description('Run one synchronization cycle and print its report')
        .option('-c, --config <file>', 'JSON configuration file (environment variables otherwise)')
        .option('--reset-state', 'move a corrupted state file aside and start from an empty state')
        .option('--timeout <ms>', 'cycle deadline in milliseconds, 0 disables it', parseInteger)
        .option('--concurrency <n>', 'documents processed in parallel', parseInteger)
        .action(async (options: SyncCommandOptions) => {
            try {
                const config = await loadCliConfig(options, true, {
                    cycleTimeoutMs: options.timeout,
                    concurrency: options.concurrency
                });
                const report = await runSync(config, { resetState: options.resetState });
                write(JSON.stringify(report, null, 2));
                process.exitCode = exitCodeFor(report);
            } catch (error) {
                fail('Synchronization failed to start', error);
            }
        });

    program
        .command('status')
        .description('Summarize the stored synchronization state')
        .option('-c, --config <file>', 'JSON configuration file (environment variables otherwise)')
        .action(async (options: ConfigCommandOptions) => {
            try {
                const config = await loadCliConfig(options, false);
                const store = new SyncStateStore(config.state.path, logger);
                const state = await store.load();

                let chunks = 0;
                for (const record of state.records.values()) {
                    chunks += record.chunkIds.length;
                }
                write(JSON.stringify({
                    statePath: store.getPath(),
                    documents: state.records.size,
                    chunks,
                    updatedAt: state.updatedAt ?? null
                }, null, 2));
                process.exitCode = EXIT_CODES.completed;
            } catch (error) {
                fail('Could not read synchronization state', error);
            }
        });

    program
        .command('forget <documentId>')
        .description('Delete one document\'s chunks and its record so the next cycle re-adds it')
        .option('-c, --config <file>', 'JSON configuration file (environment variables otherwise)')
        .action(async (documentId: string, options: ConfigCommandOptions) => {
            try {
                const config = await loadCliConfig(options, false);
                const result = await forgetDocument(config, documentId);
                write(JSON.stringify(result));
                process.exitCode = result.removed ? EXIT_CODES.completed : EXIT_CODES.completed_with_failures;
            } catch (error) {
                fail('Could not forget document', error);
            }
        });

    program
        .command('verify')
        .description('List records whose chunks are missing from the vector index')
        .option('-c, --config <file>', 'JSON configuration file (environment variables otherwise)')
        .action(async (options: ConfigCommandOptions) => {
            try {
                const config = await loadCliConfig(options, true);
                const store = new SyncStateStore(config.state.path, logger);
                const backend = new QdrantIndexBackend({ ...config.vectorStore }, logger);
                const reconciler = new Reconciler(new ContentHasher({ maxContentBytes: config.sync.maxDocumentBytes }), logger);

                const stale = await reconciler.findStaleRecords(await store.load(), backend);
                write(JSON.stringify({ stale }, null, 2));
                process.exitCode = stale.length > 0 ? EXIT_CODES.completed_with_failures : EXIT_CODES.completed;
            } catch (error) {
                fail('Verification failed', error);
            }
        });

    return program;
}

if (require.main === module) {
    dotenv.config();
    createProgram()
        .parseAsync(process.argv)
        .catch((error: unknown) => {
            logger.error('rag-sync failed', { error: error instanceof Error ? error.message : String(error) });
            process.exitCode = EXIT_CODES.aborted;
        });
}
