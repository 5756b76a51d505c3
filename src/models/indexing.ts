import { DocumentInfo, DocumentMetadataValue } from './document';

export type ChunkMetadata = Record<string, DocumentMetadataValue>;

/**
 * One retrievable unit written to the index backend.
 */
export interface IndexChunk {
    id: string;
    vector: number[];
    text: string;
    metadata: ChunkMetadata;
}

/**
 * Vector store seen by the synchronizer. Both mutations must be idempotent:
 * upserting the same chunk ids again overwrites, deleting absent ids is a no-op.
 */
export interface IndexBackend {
    upsert(documentId: string, chunks: readonly IndexChunk[]): Promise<void>;
    delete(chunkIds: readonly string[]): Promise<void>;
    /**
     * Of `chunkIds`, the ones the backend does not hold.
     */
    missingChunks?(chunkIds: readonly string[]): Promise<string[]>;
}

/**
 * Turns a document into index chunks (chunking and embedding). Must not touch
 * the backend, so a failure here leaves the index unchanged.
 */
export interface DocumentPipeline {
    prepare(document: DocumentInfo, contentHash: string): Promise<IndexChunk[]>;
}
