import { SourceConfig, SyncConfig } from '../models/config';
import { ConfigurationError } from '../utils/errors';
import { defaultConfig, sourceDefaults } from './defaults';

export type Environment = Record<string, string | undefined>;

function intOr(value: string | undefined, fallback: number): number {
    return value === undefined || value === '' ? fallback : Number(value);
}

function listOr(value: string | undefined, fallback: string[]): string[] {
    if (value === undefined || value.trim() === '') {
        return [...fallback];
    }
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

function boolOr(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') {
        return fallback;
    }
    return value === 'true' || value === '1';
}

function oneOf<T extends string>(name: string, value: string | undefined, allowed: readonly T[], fallback: T): T {
    if (value === undefined || value === '') {
        return fallback;
    }
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
        throw new ConfigurationError(
            `${name} must be one of ${allowed.join(', ')}`,
            [`${name} must be one of [${allowed.join(', ')}], got "${value}"`]
        );
    }
    return match;
}

function sourceFromEnv(env: Environment): SourceConfig {
    const type = oneOf('SYNC_SOURCE_TYPE', env.SYNC_SOURCE_TYPE, ['filesystem', 'google-drive', 'sharepoint'], defaultConfig.source.type);
    const defaults = sourceDefaults(type);

    switch (defaults.type) {
        case 'filesystem':
            return {
                ...defaults,
                rootPath: env.SOURCE_ROOT_PATH || defaults.rootPath,
                extensions: listOr(env.SOURCE_EXTENSIONS, defaults.extensions),
                recursive: boolOr(env.SOURCE_RECURSIVE, defaults.recursive)
            };
        case 'google-drive':
            return {
                ...defaults,
                folderId: env.GOOGLE_DRIVE_FOLDER_ID || defaults.folderId,
                accessToken: env.GOOGLE_DRIVE_ACCESS_TOKEN || defaults.accessToken,
                apiBaseUrl: env.GOOGLE_DRIVE_API_URL || defaults.apiBaseUrl,
                timeout: intOr(env.SOURCE_TIMEOUT, defaults.timeout),
                pageSize: intOr(env.GOOGLE_DRIVE_PAGE_SIZE, defaults.pageSize)
            };
        case 'sharepoint':
            return {
                ...defaults,
                siteUrl: env.SHAREPOINT_SITE_URL || defaults.siteUrl,
                folderPath: env.SHAREPOINT_FOLDER_PATH || defaults.folderPath,
                tenantId: env.SHAREPOINT_TENANT_ID || defaults.tenantId,
                clientId: env.SHAREPOINT_CLIENT_ID || defaults.clientId,
                clientSecret: env.SHAREPOINT_CLIENT_SECRET || defaults.clientSecret,
                timeout: intOr(env.SOURCE_TIMEOUT, defaults.timeout)
            };
    }
}

export function loadFromEnv(env: Environment = process.env): SyncConfig {
    return {
        source: sourceFromEnv(env),
        state: {
            path: env.SYNC_STATE_PATH || defaultConfig.state.path,
            lockMode: oneOf('SYNC_LOCK_MODE', env.SYNC_LOCK_MODE, ['fail', 'wait'], defaultConfig.state.lockMode),
            lockWaitMs: intOr(env.SYNC_LOCK_WAIT_MS, defaultConfig.state.lockWaitMs),
            lockPollMs: intOr(env.SYNC_LOCK_POLL_MS, defaultConfig.state.lockPollMs),
            staleLockMs: intOr(env.SYNC_STALE_LOCK_MS, defaultConfig.state.staleLockMs)
        },
        sync: {
            maxDocumentBytes: intOr(env.SYNC_MAX_DOCUMENT_BYTES, defaultConfig.sync.maxDocumentBytes),
            concurrency: intOr(env.SYNC_CONCURRENCY, defaultConfig.sync.concurrency),
            cycleTimeoutMs: intOr(env.SYNC_CYCLE_TIMEOUT_MS, defaultConfig.sync.cycleTimeoutMs),
            hashMetadataFields: listOr(env.SYNC_HASH_METADATA_FIELDS, defaultConfig.sync.hashMetadataFields),
            commitStrategy: oneOf('SYNC_COMMIT_STRATEGY', env.SYNC_COMMIT_STRATEGY, ['cycle', 'per-document'], defaultConfig.sync.commitStrategy),
            verifyChunks: boolOr(env.SYNC_VERIFY_CHUNKS, defaultConfig.sync.verifyChunks)
        },
        chunking: {
            chunkSize: intOr(env.CHUNK_SIZE, defaultConfig.chunking.chunkSize),
            chunkOverlap: intOr(env.CHUNK_OVERLAP, defaultConfig.chunking.chunkOverlap),
            minChunkSize: intOr(env.CHUNK_MIN_SIZE, defaultConfig.chunking.minChunkSize)
        },
        embedding: {
            provider: oneOf('EMBEDDING_PROVIDER', env.EMBEDDING_PROVIDER, ['openai', 'huggingface'], defaultConfig.embedding.provider),
            model: env.EMBEDDING_MODEL || defaultConfig.embedding.model,
            apiKey: env.EMBEDDING_API_KEY || env.OPENAI_API_KEY,
            batchSize: intOr(env.EMBEDDING_BATCH_SIZE, defaultConfig.embedding.batchSize),
            timeout: intOr(env.EMBEDDING_TIMEOUT, defaultConfig.embedding.timeout)
        },
        vectorStore: {
            provider: 'qdrant',
            url: env.QDRANT_URL || defaultConfig.vectorStore.url,
            apiKey: env.QDRANT_API_KEY,
            collection: env.QDRANT_COLLECTION || defaultConfig.vectorStore.collection,
            dimension: intOr(env.EMBEDDING_DIMENSION, defaultConfig.vectorStore.dimension)
        },
        logging: {
            level: oneOf('LOG_LEVEL', env.LOG_LEVEL, ['debug', 'info', 'warn', 'error'], defaultConfig.logging.level),
            dir: env.LOG_DIR
        }
    };
}
