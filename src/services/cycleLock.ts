import { randomBytes } from 'crypto';
import { promises as fs, Stats } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LockMode } from '../models/config';
import { ConcurrentCycleError } from '../utils/errors';
import { Logger, logger as defaultLogger } from '../utils/logger';

export interface LockOwner {
    pid: number;
    hostname: string;
    cycleId: string;
    acquiredAt: string;
}

interface ObservedLock {
    raw: string;
    owner?: LockOwner;
}

export interface CycleLockOptions {
    mode: LockMode;
    waitMs: number;
    pollMs: number;
    staleMs: number;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

function parseOwner(raw: string): LockOwner | undefined {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return undefined;
    }
    if (typeof parsed !== 'object' || parsed === null) {
        return undefined;
    }
    const pid = 'pid' in parsed ? parsed.pid : undefined;
    const hostname = 'hostname' in parsed ? parsed.hostname : undefined;
    const cycleId = 'cycleId' in parsed ? parsed.cycleId : undefined;
    const acquiredAt = 'acquiredAt' in parsed ? parsed.acquiredAt : undefined;
    if (typeof pid !== 'number' || typeof hostname !== 'string' || typeof cycleId !== 'string' || typeof acquiredAt !== 'string') {
        return undefined;
    }
    return { pid, hostname, cycleId, acquiredAt };
}

export function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (error) {
        // EPERM: the process exists but belongs to another user
        return isErrnoException(error) && error.code === 'EPERM';
    }
}

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Exclusive lock file guarding one synchronization cycle per state file.
 *
 * The owner record is written to a temporary file and hard-linked into place,
 * so the lock file appears with its full contents or not at all.
 */
export class CycleLock {
    private readonly lockPath: string;
    private readonly options: CycleLockOptions;
    private readonly logger: Logger;
    private owner?: LockOwner;

    constructor(lockPath: string, options: CycleLockOptions, logger: Logger = defaultLogger) {
        this.lockPath = lockPath;
        this.options = options;
        this.logger = logger.child({ operation: 'cycle-lock', lockPath });
    }

    public static forState(statePath: string, options: CycleLockOptions, logger?: Logger): CycleLock {
        return new CycleLock(`${statePath}.lock`, options, logger);
    }

    public getPath(): string {
        return this.lockPath;
    }

    public isHeld(): boolean {
        return this.owner !== undefined;
    }

    public async acquire(cycleId: string): Promise<void> {
        if (this.owner) {
            throw new ConcurrentCycleError(`Lock already held by cycle ${this.owner.cycleId}`, this.lockPath, this.owner.pid);
        }

        const owner: LockOwner = {
            pid: process.pid,
            hostname: os.hostname(),
            cycleId,
            acquiredAt: new Date().toISOString()
        };
        const deadline = Date.now() + (this.options.mode === 'wait' ? this.options.waitMs : 0);

        for (;;) {
            if (await this.tryCreate(owner)) {
                this.owner = owner;
                this.logger.debug('Lock acquired', { cycleId });
                return;
            }

            const observed = await this.readLockFile();
            if (!observed || await this.removeIfStale(observed)) {
                continue;
            }
            const holder = observed.owner;

            if (this.options.mode === 'fail' || Date.now() + this.options.pollMs > deadline) {
                throw new ConcurrentCycleError(
                    holder
                        ? `Another synchronization cycle (${holder.cycleId}) holds the lock since ${holder.acquiredAt}`
                        : 'Another synchronization cycle holds the lock',
                    this.lockPath,
                    holder?.pid
                );
            }

            this.logger.debug('Waiting for lock', { holderPid: holder?.pid, pollMs: this.options.pollMs });
            await sleep(this.options.pollMs);
        }
    }

    public async release(): Promise<void> {
        const owner = this.owner;
        if (!owner) {
            return;
        }
        this.owner = undefined;

        const current = await this.readOwner();
        if (!current || current.cycleId !== owner.cycleId || current.pid !== owner.pid) {
            this.logger.warn('Lock file no longer belongs to this cycle, leaving it in place', { cycleId: owner.cycleId });
            return;
        }
        await fs.rm(this.lockPath, { force: true });
        this.logger.debug('Lock released', { cycleId: owner.cycleId });
    }

    private async tryCreate(owner: LockOwner): Promise<boolean> {
        await fs.mkdir(path.dirname(this.lockPath), { recursive: true });
        const tempPath = `${this.lockPath}.${process.pid}-${randomBytes(6).toString('hex')}`;
        await fs.writeFile(tempPath, JSON.stringify(owner), { flag: 'wx' });
        try {
            await fs.link(tempPath, this.lockPath);
            return true;
        } catch (error) {
            if (isErrnoException(error) && error.code === 'EEXIST') {
                return false;
            }
            throw error;
        } finally {
            await fs.rm(tempPath, { force: true });
        }
    }

    private async readOwner(): Promise<LockOwner | undefined> {
        return (await this.readLockFile())?.owner;
    }

    private async readLockFile(filePath: string = this.lockPath): Promise<ObservedLock | undefined> {
        try {
            const raw = await fs.readFile(filePath, 'utf-8');
            return { raw, owner: parseOwner(raw) };
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return undefined;
            }
            throw error;
        }
    }

    /**
     * Take a stale lock out of the way. Returns true when the caller should
     * retry acquisition straight away.
     *
     * The file is first renamed to a private name and its contents compared
     * with what was judged stale. If another process replaced the lock in the
     * meantime, the moved file is its fresh lock and is linked back.
     */
    private async removeIfStale(observed: ObservedLock): Promise<boolean> {
        let stat: Stats;
        try {
            stat = await fs.stat(this.lockPath);
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return true;
            }
            throw error;
        }

        const holder = observed.owner;
        const reason = this.staleReason(holder, stat.mtimeMs);
        if (!reason) {
            return false;
        }

        const movedPath = `${this.lockPath}.stale-${process.pid}-${randomBytes(6).toString('hex')}`;
        try {
            await fs.rename(this.lockPath, movedPath);
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return true;
            }
            throw error;
        }

        try {
            const moved = await this.readLockFile(movedPath);
            if (moved && moved.raw !== observed.raw) {
                this.logger.debug('Lock changed hands before takeover, restoring it', { holderPid: moved.owner?.pid });
                await this.restore(movedPath);
                return true;
            }
        } finally {
            await fs.rm(movedPath, { force: true });
        }

        this.logger.warn('Taking over stale lock', { reason, holderPid: holder?.pid, holderCycleId: holder?.cycleId });
        return true;
    }

    private async restore(movedPath: string): Promise<void> {
        try {
            await fs.link(movedPath, this.lockPath);
        } catch (error) {
            if (isErrnoException(error) && error.code === 'EEXIST') {
                this.logger.warn('Lock was taken again while restoring a moved lock', { movedPath });
                return;
            }
            throw error;
        }
    }

    private staleReason(holder: LockOwner | undefined, mtimeMs: number): string | undefined {
        if (!holder) {
            return 'unreadable lock file';
        }
        const acquiredAt = Date.parse(holder.acquiredAt);
        const age = Date.now() - (Number.isNaN(acquiredAt) ? mtimeMs : acquiredAt);
        if (age > this.options.staleMs) {
            return `lock older than ${this.options.staleMs}ms`;
        }
        if (holder.hostname === os.hostname() && !isProcessAlive(holder.pid)) {
            return `holder process ${holder.pid} is not running`;
        }
        return undefined;
    }
}
