import { DocumentInfo, UnreadableDocument } from '../models/document';
import { MutationPlan, PlannedDelete, PlannedUpsert } from '../models/plan';
import { SyncRecord, SyncState } from '../models/syncState';
import { DocumentFailure, DuplicateDocumentIdError, ErrorHandler } from '../utils/errors';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { ContentHasher } from './contentHasher';

/**
 * Backend capability used by the repair pass. Backends that cannot answer it
 * simply do not implement it.
 */
export interface ChunkPresenceChecker {
    missingChunks?(chunkIds: readonly string[]): Promise<string[]>;
}

export interface StaleRecord {
    id: string;
    missingChunkIds: string[];
}

function findDuplicates(ids: Iterable<string>): string[] {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const id of ids) {
        if (seen.has(id)) {
            duplicates.add(id);
        }
        seen.add(id);
    }
    return Array.from(duplicates);
}

/**
 * Pure comparison of the current listing against the last synced state.
 */
export class Reconciler {
    private readonly hasher: ContentHasher;
    private readonly logger: Logger;

    constructor(hasher: ContentHasher, logger: Logger = defaultLogger) {
        this.hasher = hasher;
        this.logger = logger;
    }

    /**
     * Classify every id of `current ∪ previous` into exactly one of
     * upsert, delete, unchanged or failed.
     *
     * Unreadable documents are excluded from both upsert and delete: an id the
     * source still lists must keep its chunks even when it could not be read.
     * Ids in `forceReindex` are upserted even when their hash is unchanged.
     */
    public plan(
        current: readonly DocumentInfo[],
        previous: SyncState,
        unreadable: readonly UnreadableDocument[] = [],
        forceReindex: ReadonlySet<string> = new Set()
    ): MutationPlan {
        const duplicates = findDuplicates([...current.map(doc => doc.id), ...unreadable.map(doc => doc.id)]);
        if (duplicates.length > 0) {
            throw new DuplicateDocumentIdError(duplicates);
        }

        const toUpsert: PlannedUpsert[] = [];
        const toDelete: PlannedDelete[] = [];
        const unchanged: string[] = [];
        const failed: DocumentFailure[] = [];

        const remaining = new Set(previous.records.keys());

        for (const entry of unreadable) {
            remaining.delete(entry.id);
            failed.push({ id: entry.id, reason: entry.reason, errorCode: entry.errorCode, retryable: entry.retryable ?? true });
        }

        for (const document of current) {
            const record = previous.records.get(document.id);
            remaining.delete(document.id);

            let contentHash: string;
            try {
                contentHash = this.hasher.hashDocument(document);
            } catch (error) {
                const failure = ErrorHandler.toFailure(error, document.id);
                failed.push(failure);
                this.logger.warn('Document excluded from this cycle', {
                    documentId: document.id,
                    errorCode: failure.errorCode,
                    retryable: failure.retryable
                });
                continue;
            }

            if (!record) {
                toUpsert.push({ document, contentHash, change: 'added' });
            } else if (record.contentHash !== contentHash) {
                toUpsert.push({ document, contentHash, change: 'modified', previous: record });
            } else if (forceReindex.has(document.id)) {
                // Chunks went missing from the backend; rebuild as if new
                toUpsert.push({ document, contentHash, change: 'added', previous: record });
            } else {
                unchanged.push(document.id);
                this.noteVersionDrift(document, record);
            }
        }

        for (const id of remaining) {
            const record = previous.records.get(id);
            if (record) {
                toDelete.push({ id, previous: record });
            }
        }

        return { toUpsert, toDelete, unchanged, failed };
    }

    /**
     * Records whose chunks are no longer all present in the backend. Returns an
     * empty list when the backend cannot report missing chunks.
     */
    public async findStaleRecords(previous: SyncState, backend: ChunkPresenceChecker): Promise<StaleRecord[]> {
        if (!backend.missingChunks) {
            this.logger.debug('Backend cannot report missing chunks, skipping repair pass');
            return [];
        }

        const stale: StaleRecord[] = [];
        for (const [id, record] of previous.records) {
            if (record.chunkIds.length === 0) {
                continue;
            }
            const missingChunkIds = await backend.missingChunks(record.chunkIds);
            if (missingChunkIds.length > 0) {
                stale.push({ id, missingChunkIds });
            }
        }

        if (stale.length > 0) {
            this.logger.warn('Found records with missing chunks', { staleCount: stale.length });
        }
        return stale;
    }

    private noteVersionDrift(document: DocumentInfo, record: SyncRecord): void {
        if (document.sourceVersion && record.sourceVersion && document.sourceVersion !== record.sourceVersion) {
            this.logger.debug('Source version changed but content hash did not', {
                documentId: document.id,
                previousVersion: record.sourceVersion,
                currentVersion: document.sourceVersion
            });
        }
    }
}
