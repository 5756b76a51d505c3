export type SourceType = 'filesystem' | 'google-drive' | 'sharepoint';
export type LockMode = 'fail' | 'wait';
export type CommitStrategy = 'cycle' | 'per-document';
export type EmbeddingProvider = 'openai' | 'huggingface';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface FileSystemSourceConfig {
    type: 'filesystem';
    rootPath: string;
    extensions: string[];
    recursive: boolean;
}

export interface GoogleDriveSourceConfig {
    type: 'google-drive';
    folderId: string;
    accessToken: string;
    apiBaseUrl: string;
    timeout: number;
    pageSize: number;
}

export interface SharePointSourceConfig {
    type: 'sharepoint';
    siteUrl: string;
    folderPath: string;
    tenantId: string;
    clientId: string;
    clientSecret: string;
    graphBaseUrl: string;
    authorityUrl: string;
    timeout: number;
}

export type SourceConfig = FileSystemSourceConfig | GoogleDriveSourceConfig | SharePointSourceConfig;

export interface StateConfig {
    path: string;
    lockMode: LockMode;
    lockWaitMs: number;
    lockPollMs: number;
    staleLockMs: number;
}

export interface SyncSettings {
    maxDocumentBytes: number;
    concurrency: number;
    cycleTimeoutMs: number;
    hashMetadataFields: string[];
    commitStrategy: CommitStrategy;
    verifyChunks: boolean;
}

export interface ChunkingConfig {
    chunkSize: number;
    chunkOverlap: number;
    minChunkSize: number;
}

export interface EmbeddingSettings {
    provider: EmbeddingProvider;
    model: string;
    apiKey?: string;
    batchSize: number;
    timeout: number;
}

export interface VectorStoreConfig {
    provider: 'qdrant';
    url: string;
    apiKey?: string;
    collection: string;
    dimension: number;
}

export interface LoggingConfig {
    level: LogLevel;
    dir?: string;
}

export interface SyncConfig {
    source: SourceConfig;
    state: StateConfig;
    sync: SyncSettings;
    chunking: ChunkingConfig;
    embedding: EmbeddingSettings;
    vectorStore: VectorStoreConfig;
    logging: LoggingConfig;
}

export type DeepReadonly<T> = T extends (infer U)[]
    ? ReadonlyArray<DeepReadonly<U>>
    : T extends object
        ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
        : T;

export type FrozenSyncConfig = DeepReadonly<SyncConfig>;
