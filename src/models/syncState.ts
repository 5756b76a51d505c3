import Joi from 'joi';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export interface SyncRecord {
    contentHash: string;
    chunkIds: string[];
    lastSyncedAt: string;
    sourceVersion?: string;
    title?: string;
    metadata?: Record<string, JsonValue>;
}

export interface SyncState {
    records: Map<string, SyncRecord>;
    updatedAt?: string;
}

/**
 * On-disk layout of the state file. Records are checked one by one on load,
 * since ids are opaque and may collide with reserved property names.
 */
export interface PersistedSyncState {
    formatVersion: number;
    updatedAt: string;
    checksum: string;
    records: Record<string, SyncRecord>;
}

export const STATE_FORMAT_VERSION = 1;
export const MAX_METADATA_DEPTH = 32;

export const syncRecordSchema = Joi.object({
    contentHash: Joi.string().hex().length(64).required(),
    chunkIds: Joi.array().items(Joi.string().min(1)).unique().required(),
    lastSyncedAt: Joi.string().isoDate().required(),
    sourceVersion: Joi.string().optional(),
    title: Joi.string().allow('').optional(),
    metadata: Joi.object().unknown(true).optional()
});

export const persistedSyncStateSchema = Joi.object({
    formatVersion: Joi.number().integer().valid(STATE_FORMAT_VERSION).required(),
    updatedAt: Joi.string().isoDate().required(),
    checksum: Joi.string().hex().length(64).required(),
    records: Joi.object().required()
});

export function createEmptyState(): SyncState {
    return { records: new Map() };
}

export function cloneState(state: SyncState): SyncState {
    const records = new Map<string, SyncRecord>();
    for (const [id, record] of state.records) {
        records.set(id, { ...record, chunkIds: [...record.chunkIds] });
    }
    return { records, updatedAt: state.updatedAt };
}
