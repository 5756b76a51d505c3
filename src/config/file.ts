import { promises as fs } from 'fs';
import { SourceType, SyncConfig } from '../models/config';
import { ConfigurationError } from '../utils/errors';
import { defaultConfig, sourceDefaults } from './defaults';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSourceType(value: unknown): value is SourceType {
    return value === 'filesystem' || value === 'google-drive' || value === 'sharepoint';
}

/**
 * Read a JSON configuration file and merge it over the defaults. The result is
 * not validated yet; pass it through `validateConfig`.
 */
export async function loadFromFile(configPath: string): Promise<PlainObject> {
    let configData: string;
    try {
        configData = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new ConfigurationError(`Configuration file not found: ${configPath}`, [`file ${configPath} does not exist`]);
        }
        throw new ConfigurationError(
            `Failed to read configuration file: ${error instanceof Error ? error.message : 'Unknown error'}`,
            [`file ${configPath} is not readable`]
        );
    }

    let parsedConfig: unknown;
    try {
        parsedConfig = JSON.parse(configData);
    } catch (error) {
        throw new ConfigurationError(
            `Configuration file is not valid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
            [`file ${configPath} is not valid JSON`]
        );
    }

    if (!isPlainObject(parsedConfig)) {
        throw new ConfigurationError('Configuration file must contain a JSON object', [`file ${configPath} is not an object`]);
    }

    return mergeWithDefaults(parsedConfig, defaultConfig);
}

export function mergeWithDefaults(config: PlainObject, defaults: SyncConfig): PlainObject {
    const merged: PlainObject = { ...defaults };

    for (const [key, value] of Object.entries(config)) {
        const base = merged[key];
        if (key === 'source' && isPlainObject(value)) {
            // Defaults of another source type would leak foreign keys into the section.
            const type = value.type ?? defaults.source.type;
            merged[key] = isSourceType(type) ? { ...sourceDefaults(type), ...value } : value;
        } else if (isPlainObject(value) && isPlainObject(base)) {
            merged[key] = { ...base, ...value };
        } else {
            merged[key] = value;
        }
    }

    return merged;
}
