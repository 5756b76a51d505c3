import { DocumentFailure, ErrorCategory } from '../utils/errors';

/**
 * `aborted`: the cycle stopped before touching the index.
 * `interrupted`: the cycle stopped after index mutations were applied, so the
 * stored state may lag behind the index until the next cycle converges.
 */
export type SyncStatus = 'completed' | 'completed_with_failures' | 'aborted' | 'interrupted';

export type CyclePhase = 'start' | 'fetch' | 'reconcile' | 'apply' | 'commit' | 'done' | 'failed';

export interface SyncReport {
    cycleId: string;
    status: SyncStatus;
    phase: CyclePhase;
    startedAt: string;
    finishedAt: string;
    durationMs: number;
    added: string[];
    modified: string[];
    deleted: string[];
    unchanged: number;
    failed: DocumentFailure[];
    deferred: string[];
    chunksWritten: number;
    timedOut: boolean;
    error?: {
        code: string;
        category: ErrorCategory;
        message: string;
        retryable: boolean;
    };
}

export const EXIT_CODES: Record<SyncStatus, number> = {
    completed: 0,
    completed_with_failures: 1,
    aborted: 2,
    interrupted: 3
};

export function exitCodeFor(report: Pick<SyncReport, 'status'>): number {
    return EXIT_CODES[report.status];
}
