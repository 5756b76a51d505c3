import { createHash, randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import {
    MAX_METADATA_DEPTH,
    PersistedSyncState,
    STATE_FORMAT_VERSION,
    SyncRecord,
    SyncState,
    createEmptyState,
    persistedSyncStateSchema,
    syncRecordSchema
} from '../models/syncState';
import { StateCorruptedError, StateSerializationError, ValidationError } from '../utils/errors';
import { Logger, logger as defaultLogger } from '../utils/logger';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    const prototype: unknown = Object.getPrototypeOf(value);
    return prototype === Object.prototype || prototype === null;
}

/**
 * Canonical serialisation with object keys sorted at every level. The checksum
 * is computed over this form so that key order in the file does not matter.
 */
export function canonicalJson(value: unknown): string {
    if (Array.isArray(value)) {
        return `[${value.map(item => canonicalJson(item)).join(',')}]`;
    }
    if (isPlainObject(value)) {
        const entries = Object.keys(value)
            .sort()
            .filter(key => value[key] !== undefined)
            .map(key => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
        return `{${entries.join(',')}}`;
    }
    return JSON.stringify(value);
}

export function computeChecksum(records: Record<string, SyncRecord>): string {
    return createHash('sha256').update(canonicalJson(records)).digest('hex');
}

/**
 * Walk a metadata value and reject anything JSON cannot round-trip.
 * Returns the offending path, or undefined when the value is serialisable.
 */
function findUnserializable(value: unknown, fieldPath: string, depth: number, seen: Set<object>): string | undefined {
    if (depth > MAX_METADATA_DEPTH) {
        return `${fieldPath} (nested deeper than ${MAX_METADATA_DEPTH} levels)`;
    }
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
        return undefined;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value) ? undefined : `${fieldPath} (non-finite number)`;
    }
    if (typeof value !== 'object') {
        return `${fieldPath} (${typeof value})`;
    }
    if (seen.has(value)) {
        return `${fieldPath} (circular reference)`;
    }
    seen.add(value);

    if (Array.isArray(value)) {
        for (let i = 0; i < value.length; i++) {
            const found = findUnserializable(value[i], `${fieldPath}[${i}]`, depth + 1, seen);
            if (found) {
                return found;
            }
        }
    } else if (isPlainObject(value)) {
        for (const [key, nested] of Object.entries(value)) {
            const found = findUnserializable(nested, `${fieldPath}.${key}`, depth + 1, seen);
            if (found) {
                return found;
            }
        }
    } else {
        return `${fieldPath} (non-plain object)`;
    }

    seen.delete(value);
    return undefined;
}

export interface StateStore {
    getPath(): string;
    load(): Promise<SyncState>;
    save(state: SyncState): Promise<void>;
}

/**
 * Durable store of the per-document sync records, kept as a single JSON file.
 * Writes go to a temporary sibling that is flushed and renamed over the
 * target, so a reader sees either the old or the new file in full.
 */
export class SyncStateStore implements StateStore {
    private readonly statePath: string;
    private readonly logger: Logger;

    constructor(statePath: string, logger: Logger = defaultLogger) {
        if (typeof statePath !== 'string' || statePath.trim().length === 0) {
            throw new ValidationError('State path must be a non-empty string', 'statePath', statePath);
        }
        if (statePath.includes('\0')) {
            throw new ValidationError('State path must not contain NUL characters', 'statePath', statePath);
        }
        this.statePath = path.resolve(statePath);
        this.logger = logger.child({ operation: 'sync-state', statePath: this.statePath });
    }

    public getPath(): string {
        return this.statePath;
    }

    public async load(): Promise<SyncState> {
        let raw: string;
        try {
            raw = await fs.readFile(this.statePath, 'utf-8');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                this.logger.info('No state file found, starting from empty state');
                return createEmptyState();
            }
            if (isErrnoException(error) && error.code === 'EISDIR') {
                throw new ValidationError(`State path points at a directory: ${this.statePath}`, 'statePath', this.statePath);
            }
            throw error;
        }

        if (raw.length === 0) {
            this.logger.info('State file is empty, starting from empty state');
            return createEmptyState();
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            throw new StateCorruptedError(
                `State file is not valid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
                this.statePath
            );
        }

        const { error, value } = persistedSyncStateSchema.validate(parsed, { abortEarly: false, convert: false });
        if (error) {
            throw new StateCorruptedError(
                `State file has an unexpected shape: ${error.details.map(d => d.message).join(', ')}`,
                this.statePath
            );
        }

        const persisted: PersistedSyncState = value;
        const records = this.validateRecords(persisted.records);
        const expectedChecksum = computeChecksum(persisted.records);
        if (persisted.checksum !== expectedChecksum) {
            throw new StateCorruptedError('State file checksum does not match its records', this.statePath, {
                expectedChecksum,
                actualChecksum: persisted.checksum
            });
        }

        this.logger.debug('Loaded sync state', { recordCount: records.size });

        return { records, updatedAt: persisted.updatedAt };
    }

    public async save(state: SyncState): Promise<void> {
        for (const [id, record] of state.records) {
            this.assertSerializable(id, record);
        }
        // Own data properties, so an id such as "__proto__" is kept as a key
        const records = Object.fromEntries(state.records);

        const updatedAt = new Date().toISOString();
        const persisted: PersistedSyncState = {
            formatVersion: STATE_FORMAT_VERSION,
            updatedAt,
            checksum: computeChecksum(records),
            records
        };

        await this.writeAtomically(JSON.stringify(persisted, null, 2));
        state.updatedAt = updatedAt;

        this.logger.debug('Saved sync state', { recordCount: state.records.size });
    }

    /**
     * Remove one record and persist the result. Returns whether the id existed.
     */
    public async remove(id: string): Promise<boolean> {
        const state = await this.load();
        if (!state.records.delete(id)) {
            return false;
        }
        await this.save(state);
        this.logger.info('Removed sync record', { documentId: id });
        return true;
    }

    /**
     * Move a corrupted state file aside so that the next load starts empty.
     * Returns the new location, or undefined when there was no file.
     */
    public async quarantine(): Promise<string | undefined> {
        const target = `${this.statePath}.corrupt-${new Date().toISOString().replace(/[:.]/g, '-')}`;
        try {
            await fs.rename(this.statePath, target);
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return undefined;
            }
            throw error;
        }
        this.logger.warn('Moved state file aside', { quarantinedTo: target });
        return target;
    }

    private validateRecords(persistedRecords: Record<string, unknown>): Map<string, SyncRecord> {
        const records = new Map<string, SyncRecord>();
        for (const [id, raw] of Object.entries(persistedRecords)) {
            if (id.length === 0) {
                throw new StateCorruptedError('State file contains a record with an empty id', this.statePath);
            }
            const { error, value } = syncRecordSchema.validate(raw, { abortEarly: false, convert: false });
            if (error) {
                throw new StateCorruptedError(
                    `State record "${id}" has an unexpected shape: ${error.details.map(d => d.message).join(', ')}`,
                    this.statePath
                );
            }
            const record: SyncRecord = value;
            records.set(id, record);
        }
        return records;
    }

    private assertSerializable(id: string, record: SyncRecord): void {
        const recordValue: Record<string, unknown> = { ...record };
        for (const [key, value] of Object.entries(recordValue)) {
            if (value === undefined && (key === 'sourceVersion' || key === 'title' || key === 'metadata')) {
                continue;
            }
            const found = findUnserializable(value, key, 0, new Set());
            if (found) {
                throw new StateSerializationError(
                    `Record "${id}" cannot be serialised: ${found}`,
                    found,
                    id
                );
            }
        }
    }

    private async writeAtomically(contents: string): Promise<void> {
        const directory = path.dirname(this.statePath);
        const tempPath = `${this.statePath}.tmp-${process.pid}-${randomBytes(6).toString('hex')}`;

        await fs.mkdir(directory, { recursive: true });

        try {
            const handle = await fs.open(tempPath, 'w');
            try {
                await handle.writeFile(contents, 'utf-8');
                await handle.sync();
            } finally {
                await handle.close();
            }
            await fs.rename(tempPath, this.statePath);
        } catch (error) {
            await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
                this.logger.debug('Failed to remove temporary state file', {
                    tempPath,
                    error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
                });
            });
            throw error;
        }
    }
}
