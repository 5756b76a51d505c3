import { v4 as uuidv4 } from 'uuid';
import { createContentSource } from './data/connectors';
import { ContentSource } from './data/connectors/base';
import { FrozenSyncConfig } from './models/config';
import { DocumentPipeline, IndexBackend } from './models/indexing';
import { SyncReport } from './models/report';
import { TextChunker } from './services/chunking';
import { CycleLock } from './services/cycleLock';
import { EmbeddingService } from './services/embedding';
import { Synchronizer, SynchronizerOptions } from './services/synchronizer';
import { SyncStateStore } from './services/syncStateStore';
import { EmbeddingPipeline, QdrantIndexBackend } from './services/vectorIndex';
import { StateCorruptedError } from './utils/errors';
import { Logger, logger as defaultLogger } from './utils/logger';

export interface SyncComponents {
    source: ContentSource;
    backend: IndexBackend;
    pipeline: DocumentPipeline;
    store: SyncStateStore;
    synchronizer: Synchronizer;
}

export interface RunSyncOptions {
    /** Move a corrupted state file aside and start from an empty state. */
    resetState?: boolean;
    logger?: Logger;
    /** Replace the collaborators built from the configuration. */
    source?: ContentSource;
    backend?: IndexBackend;
    pipeline?: DocumentPipeline;
}

export interface ForgetResult {
    documentId: string;
    removed: boolean;
    chunksDeleted: number;
}

export function synchronizerOptions(config: FrozenSyncConfig): SynchronizerOptions {
    return {
        concurrency: config.sync.concurrency,
        cycleTimeoutMs: config.sync.cycleTimeoutMs,
        commitStrategy: config.sync.commitStrategy,
        verifyChunks: config.sync.verifyChunks,
        maxDocumentBytes: config.sync.maxDocumentBytes,
        hashMetadataFields: config.sync.hashMetadataFields,
        lock: {
            mode: config.state.lockMode,
            waitMs: config.state.lockWaitMs,
            pollMs: config.state.lockPollMs,
            staleMs: config.state.staleLockMs
        }
    };
}

export function createSyncComponents(config: FrozenSyncConfig, options: RunSyncOptions = {}): SyncComponents {
    const logger = options.logger ?? defaultLogger;
    const pipeline = options.pipeline ?? new EmbeddingPipeline(
        new TextChunker({ ...config.chunking }),
        new EmbeddingService({ ...config.embedding }, logger)
    );

    return {
        source: options.source ?? createContentSource(config.source, logger),
        backend: options.backend ?? new QdrantIndexBackend({ ...config.vectorStore }, logger),
        pipeline,
        store: new SyncStateStore(config.state.path, logger),
        synchronizer: new Synchronizer(pipeline, synchronizerOptions(config), logger)
    };
}

/**
 * Run one synchronization cycle with collaborators built from `config`.
 */
export async function runSync(config: FrozenSyncConfig, options: RunSyncOptions = {}): Promise<SyncReport> {
    const { source, backend, store, synchronizer } = createSyncComponents(config, options);

    if (options.resetState) {
        const logger = options.logger ?? defaultLogger;
        await withStateLock(config, store, logger, 'reset-state', () => quarantineIfCorrupted(store, logger));
    }

    return synchronizer.runCycle({ source, backend, store });
}

/**
 * Delete a document's chunks from the index and then drop its record, so the
 * next cycle adds the document again.
 */
export async function forgetDocument(
    config: FrozenSyncConfig,
    documentId: string,
    options: Pick<RunSyncOptions, 'logger' | 'backend'> = {}
): Promise<ForgetResult> {
    const logger = options.logger ?? defaultLogger;
    const store = new SyncStateStore(config.state.path, logger);
    const backend = options.backend ?? new QdrantIndexBackend({ ...config.vectorStore }, logger);

    return withStateLock(config, store, logger, 'forget', async () => {
        const record = (await store.load()).records.get(documentId);
        if (!record) {
            return { documentId, removed: false, chunksDeleted: 0 };
        }

        if (record.chunkIds.length > 0) {
            await backend.delete(record.chunkIds);
        }
        const removed = await store.remove(documentId);
        logger.info('Forgot document', { documentId, chunksDeleted: record.chunkIds.length });
        return { documentId, removed, chunksDeleted: record.chunkIds.length };
    });
}

/**
 * Run `work` while holding the lock that synchronization cycles take, so the
 * state file has a single writer.
 */
async function withStateLock<T>(
    config: FrozenSyncConfig,
    store: SyncStateStore,
    logger: Logger,
    operation: string,
    work: () => Promise<T>
): Promise<T> {
    const lock = CycleLock.forState(store.getPath(), synchronizerOptions(config).lock, logger);
    await lock.acquire(`${operation}-${uuidv4()}`);
    try {
        return await work();
    } finally {
        await lock.release().catch((error: unknown) => {
            logger.error('Failed to release state lock', {
                lockPath: lock.getPath(),
                error: error instanceof Error ? error.message : String(error)
            });
        });
    }
}

async function quarantineIfCorrupted(store: SyncStateStore, logger: Logger): Promise<void> {
    try {
        await store.load();
    } catch (error) {
        if (!(error instanceof StateCorruptedError)) {
            throw error;
        }
        const movedTo = await store.quarantine();
        logger.warn('Corrupted state file moved aside, starting from empty state', { movedTo });
    }
}

export * from './config';
export * from './data/connectors';
export * from './models/config';
export * from './models/document';
export * from './models/indexing';
export * from './models/plan';
export * from './models/report';
export * from './models/syncState';
export * from './services';
export * from './utils/errors';
export { logger, StructuredLogger } from './utils/logger';
export type { Logger } from './utils/logger';
