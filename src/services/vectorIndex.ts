import { QdrantClient } from '@qdrant/js-client-rest';
import { v5 as uuidv5 } from 'uuid';
import { VectorStoreConfig } from '../models/config';
import { DocumentInfo } from '../models/document';
import { DocumentPipeline, IndexBackend, IndexChunk } from '../models/indexing';
import { IndexingError } from '../utils/errors';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { TextChunker } from './chunking';
import { EmbeddingService } from './embedding';

const CHUNK_ID_NAMESPACE = 'b3f1c0de-5a4e-4c1b-9d7e-2f6a8e1d4c90';

/**
 * Deterministic chunk id: re-running a crashed cycle overwrites the same
 * points instead of creating duplicates.
 */
export function chunkIdFor(documentId: string, contentHash: string, chunkIndex: number): string {
    return uuidv5(`${documentId}\n${contentHash}\n${chunkIndex}`, CHUNK_ID_NAMESPACE);
}

/**
 * Chunks a document and embeds every chunk. Touches no vector store.
 */
export class EmbeddingPipeline implements DocumentPipeline {
    private readonly chunker: TextChunker;
    private readonly embeddingService: EmbeddingService;

    constructor(chunker: TextChunker, embeddingService: EmbeddingService) {
        this.chunker = chunker;
        this.embeddingService = embeddingService;
    }

    public async prepare(document: DocumentInfo, contentHash: string): Promise<IndexChunk[]> {
        const textChunks = this.chunker.chunk(document.content);
        if (textChunks.length === 0) {
            return [];
        }

        const { embeddings } = await this.embeddingService.batchEmbeddings(textChunks.map(chunk => chunk.text));

        return textChunks.map((chunk, index) => ({
            id: chunkIdFor(document.id, contentHash, index),
            vector: embeddings[index] ?? [],
            text: chunk.text,
            metadata: {
                ...document.metadata,
                documentId: document.id,
                title: document.title,
                folderPath: document.folderPath,
                sourceVersion: document.sourceVersion ?? null,
                contentHash,
                chunkIndex: index,
                totalChunks: textChunks.length,
                startIndex: chunk.startIndex,
                endIndex: chunk.endIndex
            }
        }));
    }
}

export class QdrantIndexBackend implements IndexBackend {
    private readonly config: VectorStoreConfig;
    private readonly client: QdrantClient;
    private readonly logger: Logger;
    private collectionReady?: Promise<void>;

    constructor(config: VectorStoreConfig, logger: Logger = defaultLogger, client?: QdrantClient) {
        this.config = config;
        this.client = client ?? new QdrantClient({
            url: config.url,
            apiKey: config.apiKey
        });
        this.logger = logger.child({ operation: 'vector-index', collection: config.collection });
    }

    public async upsert(documentId: string, chunks: readonly IndexChunk[]): Promise<void> {
        if (chunks.length === 0) {
            return;
        }
        await this.ensureCollection();

        const points = chunks.map(chunk => ({
            id: chunk.id,
            vector: chunk.vector,
            payload: { ...chunk.metadata, text: chunk.text }
        }));

        try {
            await this.client.upsert(this.config.collection, {
                wait: true,
                points
            });
        } catch (error) {
            throw new IndexingError(
                `Failed to upsert chunks: ${error instanceof Error ? error.message : 'Unknown error'}`,
                'upsert',
                documentId
            );
        }
        this.logger.debug('Upserted chunks', { documentId, chunkCount: chunks.length });
    }

    public async delete(chunkIds: readonly string[]): Promise<void> {
        if (chunkIds.length === 0) {
            return;
        }
        await this.ensureCollection();

        try {
            await this.client.delete(this.config.collection, {
                wait: true,
                points: [...chunkIds]
            });
        } catch (error) {
            throw new IndexingError(
                `Failed to delete chunks: ${error instanceof Error ? error.message : 'Unknown error'}`,
                'delete'
            );
        }
        this.logger.debug('Deleted chunks', { chunkCount: chunkIds.length });
    }

    public async missingChunks(chunkIds: readonly string[]): Promise<string[]> {
        if (chunkIds.length === 0) {
            return [];
        }
        await this.ensureCollection();

        try {
            const found = await this.client.retrieve(this.config.collection, {
                ids: [...chunkIds],
                with_payload: false,
                with_vector: false
            });
            const present = new Set(found.map(point => String(point.id)));
            return chunkIds.filter(id => !present.has(id));
        } catch (error) {
            throw new IndexingError(
                `Failed to look up chunks: ${error instanceof Error ? error.message : 'Unknown error'}`,
                'retrieve'
            );
        }
    }

    private ensureCollection(): Promise<void> {
        if (!this.collectionReady) {
            this.collectionReady = this.createCollectionIfMissing().catch((error: unknown) => {
                this.collectionReady = undefined;
                throw error;
            });
        }
        return this.collectionReady;
    }

    private async createCollectionIfMissing(): Promise<void> {
        try {
            const { collections } = await this.client.getCollections();
            if (collections.some(collection => collection.name === this.config.collection)) {
                return;
            }
            await this.client.createCollection(this.config.collection, {
                vectors: { size: this.config.dimension, distance: 'Cosine' }
            });
            this.logger.info('Created vector collection', { dimension: this.config.dimension });
        } catch (error) {
            throw new IndexingError(
                `Failed to prepare collection ${this.config.collection}: ${error instanceof Error ? error.message : 'Unknown error'}`,
                'ensure-collection'
            );
        }
    }
}
