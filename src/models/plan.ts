import { DocumentFailure } from '../utils/errors';
import { DocumentInfo } from './document';
import { SyncRecord } from './syncState';

export type ChangeType = 'added' | 'modified';

export interface PlannedUpsert {
    document: DocumentInfo;
    contentHash: string;
    change: ChangeType;
    previous?: SyncRecord;
}

export interface PlannedDelete {
    id: string;
    previous: SyncRecord;
}

/**
 * Transient result of reconciliation. `toUpsert`, `toDelete`, `unchanged` and
 * `failed` partition the union of current and previously synced ids.
 */
export interface MutationPlan {
    toUpsert: PlannedUpsert[];
    toDelete: PlannedDelete[];
    unchanged: string[];
    failed: DocumentFailure[];
}

export function isEmptyPlan(plan: MutationPlan): boolean {
    return plan.toUpsert.length === 0 && plan.toDelete.length === 0;
}

export function summarizePlan(plan: MutationPlan): { added: number; modified: number; deleted: number; unchanged: number; failed: number } {
    return {
        added: plan.toUpsert.filter(entry => entry.change === 'added').length,
        modified: plan.toUpsert.filter(entry => entry.change === 'modified').length,
        deleted: plan.toDelete.length,
        unchanged: plan.unchanged.length,
        failed: plan.failed.length
    };
}
