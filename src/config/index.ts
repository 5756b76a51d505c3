import { FrozenSyncConfig, SyncConfig } from '../models/config';
import { Environment, loadFromEnv } from './env';
import { loadFromFile } from './file';
import { ValidationOptions, validateConfig } from './validation';

export interface LoadConfigOptions extends ValidationOptions {
    configPath?: string;
    env?: Environment;
    overrides?: ConfigOverrides;
}

export interface ConfigOverrides {
    concurrency?: number;
    cycleTimeoutMs?: number;
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const nested of Object.values(value)) {
            deepFreeze(nested);
        }
    }
    return value;
}

function applyOverrides(raw: Record<string, unknown> | SyncConfig, overrides: ConfigOverrides = {}): unknown {
    const sync = raw.sync;
    if (typeof sync !== 'object' || sync === null) {
        return raw;
    }
    return {
        ...raw,
        sync: {
            ...sync,
            ...(overrides.concurrency !== undefined ? { concurrency: overrides.concurrency } : {}),
            ...(overrides.cycleTimeoutMs !== undefined ? { cycleTimeoutMs: overrides.cycleTimeoutMs } : {})
        }
    };
}

/**
 * Build the configuration once at process start: from a JSON file when a path
 * is given, from the environment otherwise. The returned value is validated
 * and deeply frozen.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<FrozenSyncConfig> {
    const rawConfig = options.configPath
        ? await loadFromFile(options.configPath)
        : loadFromEnv(options.env);

    const validatedConfig = validateConfig(applyOverrides(rawConfig, options.overrides), options);
    return deepFreeze(validatedConfig);
}

export * from './defaults';
export * from './env';
export * from './file';
export * from './validation';
