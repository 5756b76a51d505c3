import { v4 as uuidv4 } from 'uuid';
import { ContentSource } from '../data/connectors/base';
import { CommitStrategy } from '../models/config';
import { DocumentPipeline, IndexBackend, IndexChunk } from '../models/indexing';
import { MutationPlan, PlannedDelete, PlannedUpsert, isEmptyPlan, summarizePlan } from '../models/plan';
import { CyclePhase, SyncReport, SyncStatus } from '../models/report';
import { SyncRecord, SyncState, cloneState } from '../models/syncState';
import { runWithConcurrency, SerialQueue } from '../utils/concurrency';
import { BaseError, DocumentFailure, ErrorCategory, ErrorHandler } from '../utils/errors';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { ContentHasher } from './contentHasher';
import { CycleLock, CycleLockOptions } from './cycleLock';
import { Reconciler } from './reconciler';
import { StateStore } from './syncStateStore';

export interface SynchronizerOptions {
    concurrency: number;
    /** 0 disables the cycle deadline. */
    cycleTimeoutMs: number;
    commitStrategy: CommitStrategy;
    verifyChunks: boolean;
    maxDocumentBytes: number;
    hashMetadataFields: readonly string[];
    lock: CycleLockOptions;
}

export interface CycleDependencies {
    source: ContentSource;
    backend: IndexBackend;
    store: StateStore;
}

/**
 * Mutable bookkeeping of one cycle, turned into a `SyncReport` at the end.
 */
class CycleTally {
    readonly added: string[] = [];
    readonly modified: string[] = [];
    readonly deleted: string[] = [];
    readonly failed: DocumentFailure[] = [];
    readonly deferred: string[] = [];
    unchanged = 0;
    chunksWritten = 0;
    dirty = false;
    indexMutated = false;
}

function fatalErrorSummary(error: unknown): NonNullable<SyncReport['error']> {
    if (error instanceof BaseError) {
        return { code: error.code, category: error.category, message: error.message, retryable: error.retryable };
    }
    return {
        code: 'UNKNOWN_ERROR',
        category: ErrorCategory.SYSTEM,
        message: error instanceof Error ? error.message : String(error),
        retryable: ErrorHandler.isRetryable(error)
    };
}

/**
 * Runs synchronization cycles: fetch the listing, reconcile it against the
 * stored state, apply the resulting plan to the index and commit the state.
 *
 * A cycle never throws. Fatal errors end it with an `aborted` report, or an
 * `interrupted` one once the index was touched; errors of single documents
 * are collected in `failed` and do not stop the others.
 */
export class Synchronizer {
    private readonly pipeline: DocumentPipeline;
    private readonly options: SynchronizerOptions;
    private readonly reconciler: Reconciler;
    private readonly logger: Logger;

    constructor(pipeline: DocumentPipeline, options: SynchronizerOptions, logger: Logger = defaultLogger) {
        this.pipeline = pipeline;
        this.options = options;
        this.logger = logger;
        this.reconciler = new Reconciler(
            new ContentHasher({
                maxContentBytes: options.maxDocumentBytes,
                hashMetadataFields: options.hashMetadataFields
            }),
            logger
        );
    }

    public async runCycle({ source, backend, store }: CycleDependencies): Promise<SyncReport> {
        const cycleId = uuidv4();
        const startedAt = new Date();
        const log = this.logger.child({ cycleId, sourceName: source.name });
        const lock = CycleLock.forState(store.getPath(), this.options.lock, log);
        const tally = new CycleTally();
        let phase: CyclePhase = 'start';

        const enter = (next: CyclePhase): void => {
            log.info(`Cycle phase ${phase} -> ${next}`, { operation: 'sync-cycle' });
            phase = next;
        };

        log.info('Starting synchronization cycle', { operation: 'sync-cycle' });

        try {
            await lock.acquire(cycleId);

            enter('fetch');
            const listing = await source.listDocuments();
            const previous = await store.load();

            enter('reconcile');
            const forceReindex = this.options.verifyChunks
                ? new Set((await this.reconciler.findStaleRecords(previous, backend)).map(stale => stale.id))
                : new Set<string>();
            const plan = this.reconciler.plan(listing.documents, previous, listing.unreadable, forceReindex);
            tally.unchanged = plan.unchanged.length;
            tally.failed.push(...plan.failed);
            log.info('Reconciled listing against stored state', { ...summarizePlan(plan) });

            if (isEmptyPlan(plan)) {
                enter('done');
                return this.buildReport(cycleId, startedAt, 'done', tally, false);
            }

            enter('apply');
            const working = cloneState(previous);
            const timedOut = await this.applyPlan(plan, working, { backend, store }, tally, startedAt, log);

            enter('commit');
            if (tally.dirty && this.options.commitStrategy === 'cycle') {
                await store.save(working);
            }

            enter('done');
            return this.buildReport(cycleId, startedAt, 'done', tally, timedOut);
        } catch (error) {
            const failedPhase = phase;
            enter('failed');
            const summary = fatalErrorSummary(error);
            log.error('Synchronization cycle stopped on a fatal error', {
                failedPhase,
                errorCode: summary.code,
                errorCategory: summary.category,
                retryable: summary.retryable,
                error: summary.message
            });
            return this.buildReport(cycleId, startedAt, 'failed', tally, false, summary);
        } finally {
            await lock.release().catch((error: unknown) => {
                log.error('Failed to release cycle lock', {
                    lockPath: lock.getPath(),
                    error: error instanceof Error ? error.message : String(error)
                });
            });
        }
    }

    /**
     * Deletes run before upserts. Returns true when the cycle deadline stopped
     * dispatching before the plan was exhausted.
     */
    private async applyPlan(
        plan: MutationPlan,
        working: SyncState,
        { backend, store }: Pick<CycleDependencies, 'backend' | 'store'>,
        tally: CycleTally,
        startedAt: Date,
        log: Logger
    ): Promise<boolean> {
        const deadline = this.options.cycleTimeoutMs > 0 ? startedAt.getTime() + this.options.cycleTimeoutMs : undefined;
        const mutating: IndexBackend = {
            upsert: (documentId, chunks) => {
                tally.indexMutated = true;
                return backend.upsert(documentId, chunks);
            },
            delete: chunkIds => {
                tally.indexMutated = true;
                return backend.delete(chunkIds);
            }
        };
        const shouldContinue = (): boolean => deadline === undefined || Date.now() < deadline;
        const writer = new SerialQueue();

        const commit = (mutate: (state: SyncState) => void): Promise<void> => writer.run(async () => {
            mutate(working);
            tally.dirty = true;
            if (this.options.commitStrategy === 'per-document') {
                await store.save(working);
            }
        });

        const recordFailure = (id: string, error: unknown): void => {
            const failure = ErrorHandler.toFailure(error, id);
            tally.failed.push(failure);
            log.warn('Document failed, continuing with the rest of the plan', {
                documentId: id,
                errorCode: failure.errorCode,
                errorCategory: ErrorHandler.getErrorCategory(error),
                retryable: failure.retryable
            });
        };

        const deletes = await runWithConcurrency(plan.toDelete, async (entry: PlannedDelete) => {
            try {
                if (entry.previous.chunkIds.length > 0) {
                    await mutating.delete(entry.previous.chunkIds);
                }
            } catch (error) {
                recordFailure(entry.id, error);
                return;
            }
            await commit(state => { state.records.delete(entry.id); });
            tally.deleted.push(entry.id);
        }, { concurrency: this.options.concurrency, shouldContinue });

        const upserts = await runWithConcurrency(plan.toUpsert, async (entry: PlannedUpsert) => {
            await this.applyUpsert(entry, mutating, commit, recordFailure, tally, log);
        }, { concurrency: this.options.concurrency, shouldContinue });

        tally.deferred.push(...deletes.skipped.map(entry => entry.id), ...upserts.skipped.map(entry => entry.document.id));
        if (tally.deferred.length > 0) {
            log.warn('Cycle deadline reached, remaining work deferred to the next cycle', {
                deferredCount: tally.deferred.length,
                cycleTimeoutMs: this.options.cycleTimeoutMs
            });
            return true;
        }
        return false;
    }

    private async applyUpsert(
        entry: PlannedUpsert,
        backend: IndexBackend,
        commit: (mutate: (state: SyncState) => void) => Promise<void>,
        recordFailure: (id: string, error: unknown) => void,
        tally: CycleTally,
        log: Logger
    ): Promise<void> {
        const { document, contentHash, previous } = entry;

        let chunks: IndexChunk[];
        try {
            chunks = await this.pipeline.prepare(document, contentHash);
        } catch (error) {
            recordFailure(document.id, error);
            return;
        }

        // Old chunks go first so that a modified document never leaves orphans
        const newChunkIds = new Set(chunks.map(chunk => chunk.id));
        const previousChunkIds = new Set(previous?.chunkIds ?? []);
        const staleChunkIds = [...previousChunkIds].filter(id => !newChunkIds.has(id));
        if (staleChunkIds.length > 0) {
            try {
                await backend.delete(staleChunkIds);
            } catch (error) {
                recordFailure(document.id, error);
                return;
            }
        }

        try {
            await backend.upsert(document.id, chunks);
        } catch (error) {
            recordFailure(document.id, error);
            await this.discardPartialUpsert(chunks.filter(chunk => !previousChunkIds.has(chunk.id)), backend, log, document.id);
            if (staleChunkIds.length > 0) {
                // The record's chunks are gone; forget it so the next cycle re-adds the document
                await commit(state => { state.records.delete(document.id); });
            }
            return;
        }

        const record: SyncRecord = {
            contentHash,
            chunkIds: chunks.map(chunk => chunk.id),
            lastSyncedAt: new Date().toISOString(),
            ...(document.sourceVersion !== undefined ? { sourceVersion: document.sourceVersion } : {}),
            title: document.title,
            metadata: { ...document.metadata, folderPath: document.folderPath }
        };
        await commit(state => { state.records.set(document.id, record); });

        tally.chunksWritten += chunks.length;
        (entry.change === 'added' ? tally.added : tally.modified).push(document.id);
    }

    private async discardPartialUpsert(chunks: readonly IndexChunk[], backend: IndexBackend, log: Logger, documentId: string): Promise<void> {
        if (chunks.length === 0) {
            return;
        }
        try {
            await backend.delete(chunks.map(chunk => chunk.id));
        } catch (error) {
            log.warn('Could not remove chunks of a failed upsert; they are overwritten when the document is retried', {
                documentId,
                error: error instanceof Error ? error.message : String(error)
            });
        }
    }

    private buildReport(
        cycleId: string,
        startedAt: Date,
        phase: CyclePhase,
        tally: CycleTally,
        timedOut: boolean,
        error?: SyncReport['error']
    ): SyncReport {
        const finishedAt = new Date();
        let status: SyncStatus = 'completed';
        if (error) {
            status = tally.indexMutated ? 'interrupted' : 'aborted';
        } else if (tally.failed.length > 0 || tally.deferred.length > 0) {
            status = 'completed_with_failures';
        }

        const report: SyncReport = {
            cycleId,
            status,
            phase,
            startedAt: startedAt.toISOString(),
            finishedAt: finishedAt.toISOString(),
            durationMs: finishedAt.getTime() - startedAt.getTime(),
            added: [...tally.added].sort(),
            modified: [...tally.modified].sort(),
            deleted: [...tally.deleted].sort(),
            unchanged: tally.unchanged,
            failed: [...tally.failed].sort((a, b) => a.id.localeCompare(b.id)),
            deferred: [...tally.deferred].sort(),
            chunksWritten: tally.chunksWritten,
            timedOut,
            ...(error ? { error } : {})
        };

        this.logger.child({ cycleId }).info('Synchronization cycle finished', {
            operation: 'sync-cycle',
            status,
            added: report.added.length,
            modified: report.modified.length,
            deleted: report.deleted.length,
            unchanged: report.unchanged,
            failed: report.failed.length,
            deferred: report.deferred.length,
            chunksWritten: report.chunksWritten,
            duration: report.durationMs
        });

        return report;
    }
}
