import { SourceConfig, SourceType, SyncConfig } from '../models/config';

export const DEFAULT_MAX_DOCUMENT_BYTES = 10 * 1024 * 1024; // 10 MiB

export function sourceDefaults(type: SourceType): SourceConfig {
    switch (type) {
        case 'google-drive':
            return {
                type: 'google-drive',
                folderId: '',
                accessToken: '',
                apiBaseUrl: 'https://www.googleapis.com/drive/v3',
                timeout: 30000,
                pageSize: 100
            };
        case 'sharepoint':
            return {
                type: 'sharepoint',
                siteUrl: '',
                folderPath: '',
                tenantId: '',
                clientId: '',
                clientSecret: '',
                graphBaseUrl: 'https://graph.microsoft.com/v1.0',
                authorityUrl: 'https://login.microsoftonline.com',
                timeout: 30000
            };
        case 'filesystem':
            return {
                type: 'filesystem',
                rootPath: './documents',
                extensions: ['.txt', '.md', '.docx'],
                recursive: true
            };
    }
}

export const defaultConfig: SyncConfig = {
    source: sourceDefaults('filesystem'),
    state: {
        path: './data/sync-state.json',
        lockMode: 'fail',
        lockWaitMs: 60000, // 1 minute
        lockPollMs: 500,
        staleLockMs: 6 * 60 * 60 * 1000 // 6 hours
    },
    sync: {
        maxDocumentBytes: DEFAULT_MAX_DOCUMENT_BYTES,
        concurrency: 4,
        cycleTimeoutMs: 0, // disabled
        hashMetadataFields: [],
        commitStrategy: 'cycle',
        verifyChunks: false
    },
    chunking: {
        chunkSize: 1000,
        chunkOverlap: 200,
        minChunkSize: 1
    },
    embedding: {
        provider: 'openai',
        model: 'text-embedding-3-small',
        batchSize: 32,
        timeout: 30000
    },
    vectorStore: {
        provider: 'qdrant',
        url: 'http://localhost:6333',
        collection: 'documents',
        dimension: 1536
    },
    logging: {
        level: 'info'
    }
};
