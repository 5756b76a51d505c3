import Joi from 'joi';
import * as path from 'path';
import { SourceType, SyncConfig } from '../models/config';
import { ConfigurationError } from '../utils/errors';

export interface ValidationOptions {
    /**
     * When false, credentials of the embedding provider are not required. Used by
     * commands that only touch the state file.
     */
    requireIndexCredentials?: boolean;
}

const statePathSchema = Joi.string()
    .min(1)
    .custom((value: string, helpers) => {
        if (value.includes('\0')) {
            return helpers.message({ custom: 'state.path must not contain NUL characters' });
        }
        if (value.split(/[\\/]/).includes('..')) {
            return helpers.message({ custom: 'state.path must not contain ".." segments' });
        }
        if (value.endsWith('/') || value.endsWith(path.sep)) {
            return helpers.message({ custom: 'state.path must name a file, not a directory' });
        }
        return value;
    });

const fileSystemSourceSchema = Joi.object({
    type: Joi.string().valid('filesystem').required(),
    rootPath: Joi.string().min(1).required(),
    extensions: Joi.array().items(Joi.string().pattern(/^\.[A-Za-z0-9]+$/)).min(1).required(),
    recursive: Joi.boolean().required()
});

const googleDriveSourceSchema = Joi.object({
    type: Joi.string().valid('google-drive').required(),
    folderId: Joi.string().min(1).required(),
    accessToken: Joi.string().min(1).required(),
    apiBaseUrl: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
    timeout: Joi.number().integer().min(1000).max(300000).required(),
    pageSize: Joi.number().integer().min(1).max(1000).required()
});

const sharePointSourceSchema = Joi.object({
    type: Joi.string().valid('sharepoint').required(),
    siteUrl: Joi.string().uri({ scheme: ['https'] }).required(),
    folderPath: Joi.string().allow('').required(),
    tenantId: Joi.string().min(1).required(),
    clientId: Joi.string().min(1).required(),
    clientSecret: Joi.string().min(1).required(),
    graphBaseUrl: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
    authorityUrl: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
    timeout: Joi.number().integer().min(1000).max(300000).required()
});

const configSchema = Joi.object({
    source: Joi.object({
        type: Joi.string().valid('filesystem', 'google-drive', 'sharepoint').required()
    }).unknown(true).required(),

    state: Joi.object({
        path: statePathSchema.required(),
        lockMode: Joi.string().valid('fail', 'wait').required(),
        lockWaitMs: Joi.number().integer().min(0).required(),
        lockPollMs: Joi.number().integer().positive().required(),
        staleLockMs: Joi.number().integer().positive().required()
    }).required(),

    sync: Joi.object({
        maxDocumentBytes: Joi.number().integer().positive().required(),
        concurrency: Joi.number().integer().min(1).max(64).required(),
        cycleTimeoutMs: Joi.number().integer().min(0).required(),
        hashMetadataFields: Joi.array().items(Joi.string().min(1)).unique().required(),
        commitStrategy: Joi.string().valid('cycle', 'per-document').required(),
        verifyChunks: Joi.boolean().required()
    }).required(),

    chunking: Joi.object({
        chunkSize: Joi.number().integer().positive().required(),
        chunkOverlap: Joi.number().integer().min(0).required(),
        minChunkSize: Joi.number().integer().positive().required()
    }).required(),

    embedding: Joi.object({
        provider: Joi.string().valid('openai', 'huggingface').required(),
        model: Joi.string().min(1).required(),
        apiKey: Joi.string().optional(),
        batchSize: Joi.number().integer().min(1).max(2048).required(),
        timeout: Joi.number().integer().min(1000).max(300000).required()
    }).required(),

    vectorStore: Joi.object({
        provider: Joi.string().valid('qdrant').required(),
        url: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
        apiKey: Joi.string().optional(),
        collection: Joi.string().pattern(/^[A-Za-z0-9_-]+$/).required(),
        dimension: Joi.number().integer().positive().max(65536).required()
    }).required(),

    logging: Joi.object({
        level: Joi.string().valid('debug', 'info', 'warn', 'error').required(),
        dir: Joi.string().optional()
    }).required()
});

const sourceSchemas: Record<SourceType, Joi.ObjectSchema> = {
    'filesystem': fileSystemSourceSchema,
    'google-drive': googleDriveSourceSchema,
    'sharepoint': sharePointSourceSchema
};

const validationOptions: Joi.ValidationOptions = {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: true
};

export function validateConfig(config: unknown, options: ValidationOptions = {}): SyncConfig {
    const { error, value } = configSchema.validate(config, validationOptions);

    if (error) {
        const violations = error.details.map(d => d.message);
        throw new ConfigurationError(`Configuration validation failed: ${violations.join(', ')}`, violations);
    }

    // The source section is checked against the schema of its declared type.
    const sourceType: SourceType = value.source.type;
    const sourceResult = sourceSchemas[sourceType].validate(value.source, validationOptions);
    if (sourceResult.error) {
        const violations = sourceResult.error.details.map(d => `source.${d.message.replace(/^"/, '').replace(/"/, '')}`);
        throw new ConfigurationError(`Configuration validation failed: ${violations.join(', ')}`, violations);
    }

    const validated: SyncConfig = { ...value, source: sourceResult.value };
    validateCrossFieldConstraints(validated, options);

    return validated;
}

function validateCrossFieldConstraints(config: SyncConfig, options: ValidationOptions): void {
    const violations: string[] = [];

    if (config.chunking.chunkOverlap >= config.chunking.chunkSize) {
        violations.push('chunking.chunkOverlap must be smaller than chunking.chunkSize');
    }

    if (config.chunking.minChunkSize > config.chunking.chunkSize) {
        violations.push('chunking.minChunkSize must not exceed chunking.chunkSize');
    }

    if (options.requireIndexCredentials !== false && !config.embedding.apiKey) {
        violations.push(`embedding.apiKey is required when using the ${config.embedding.provider} embedding provider`);
    }

    if (config.state.lockMode === 'wait' && config.state.lockPollMs > config.state.lockWaitMs) {
        violations.push('state.lockPollMs must not exceed state.lockWaitMs when lockMode is "wait"');
    }

    if (violations.length > 0) {
        throw new ConfigurationError(`Configuration validation failed: ${violations.join(', ')}`, violations);
    }
}
