import { VectorStoreConfig } from '../../models/config';
import { DocumentInfo } from '../../models/document';
import { IndexChunk } from '../../models/indexing';
import { TextChunker } from '../../services/chunking';
import { EmbeddingService } from '../../services/embedding';
import { chunkIdFor, EmbeddingPipeline, QdrantIndexBackend } from '../../services/vectorIndex';
import { IndexingError } from '../../utils/errors';

const mockQdrant = {
    getCollections: jest.fn(),
    createCollection: jest.fn(),
    upsert: jest.fn(),
    delete: jest.fn(),
    retrieve: jest.fn()
};

const mockOpenAI = {
    embeddings: {
        create: jest.fn()
    }
};

jest.mock('@qdrant/js-client-rest', () => ({
    QdrantClient: jest.fn(() => mockQdrant)
}));

jest.mock('openai', () => ({
    __esModule: true,
    default: jest.fn(() => mockOpenAI)
}));

const HASH = 'a'.repeat(64);

const storeConfig: VectorStoreConfig = {
    provider: 'qdrant',
    url: 'http://localhost:6333',
    collection: 'documents',
    dimension: 3
};

function chunk(id: string): IndexChunk {
    return { id, vector: [0.1, 0.2, 0.3], text: `text of ${id}`, metadata: { documentId: 'docs/a.txt', chunkIndex: 0 } };
}

describe('chunkIdFor', () => {
    it('should derive stable UUIDs from document, hash and index', () => {
        expect(chunkIdFor('docs/a.txt', HASH, 0)).toBe('64c27525-1cc2-5220-9525-a57d9cb5efb9');
        expect(chunkIdFor('docs/a.txt', HASH, 1)).toBe('129d62d8-dda9-5392-bfdf-b1ee36ba59f0');
    });
});

describe('EmbeddingPipeline', () => {
    const document: DocumentInfo = {
        id: 'docs/a.txt',
        title: 'A',
        content: 'abcdefghijklmnopqrst',
        folderPath: 'docs',
        sourceVersion: 'v1',
        metadata: { author: 'Kim' }
    };

    let pipeline: EmbeddingPipeline;

    beforeEach(() => {
        mockOpenAI.embeddings.create.mockImplementation(async ({ input }: { input: string[] }) => ({
            data: input.map((_, index) => ({ index, embedding: [index, 1, 0] }))
        }));
        pipeline = new EmbeddingPipeline(
            new TextChunker({ chunkSize: 10, chunkOverlap: 0, minChunkSize: 1 }),
            new EmbeddingService({ provider: 'openai', model: 'text-embedding-3-small', apiKey: 'test-secret', batchSize: 16, timeout: 30000 })
        );
    });

    it('should chunk, embed and attach metadata', async () => {
        const chunks = await pipeline.prepare(document, HASH);

        expect(chunks).toHaveLength(2);
        expect(chunks[0]).toEqual({
            id: chunkIdFor('docs/a.txt', HASH, 0),
            vector: [0, 1, 0],
            text: 'abcdefghij',
            metadata: {
                author: 'Kim',
                documentId: 'docs/a.txt',
                title: 'A',
                folderPath: 'docs',
                sourceVersion: 'v1',
                contentHash: HASH,
                chunkIndex: 0,
                totalChunks: 2,
                startIndex: 0,
                endIndex: 10
            }
        });
        expect(chunks[1].id).toBe(chunkIdFor('docs/a.txt', HASH, 1));
        expect(chunks[1].vector).toEqual([1, 1, 0]);
    });

    it('should produce no chunks for empty content without calling the provider', async () => {
        expect(await pipeline.prepare({ ...document, content: '' }, HASH)).toEqual([]);
        expect(mockOpenAI.embeddings.create).not.toHaveBeenCalled();
    });
});

describe('QdrantIndexBackend', () => {
    let backend: QdrantIndexBackend;

    beforeEach(() => {
        mockQdrant.getCollections.mockResolvedValue({ collections: [{ name: 'documents' }] });
        mockQdrant.createCollection.mockResolvedValue(true);
        mockQdrant.upsert.mockResolvedValue({ status: 'completed' });
        mockQdrant.delete.mockResolvedValue({ status: 'completed' });
        backend = new QdrantIndexBackend(storeConfig);
    });

    it('should upsert points with the chunk text in the payload', async () => {
        await backend.upsert('docs/a.txt', [chunk('c-1')]);

        expect(mockQdrant.upsert).toHaveBeenCalledWith('documents', {
            wait: true,
            points: [{
                id: 'c-1',
                vector: [0.1, 0.2, 0.3],
                payload: { documentId: 'docs/a.txt', chunkIndex: 0, text: 'text of c-1' }
            }]
        });
        expect(mockQdrant.createCollection).not.toHaveBeenCalled();
    });

    it('should create a missing collection once', async () => {
        mockQdrant.getCollections.mockResolvedValue({ collections: [] });

        await backend.upsert('docs/a.txt', [chunk('c-1')]);
        await backend.upsert('docs/b.txt', [chunk('c-2')]);

        expect(mockQdrant.getCollections).toHaveBeenCalledTimes(1);
        expect(mockQdrant.createCollection).toHaveBeenCalledWith('documents', { vectors: { size: 3, distance: 'Cosine' } });
    });

    it('should skip empty upserts and deletes', async () => {
        await backend.upsert('docs/a.txt', []);
        await backend.delete([]);

        expect(mockQdrant.getCollections).not.toHaveBeenCalled();
        expect(mockQdrant.upsert).not.toHaveBeenCalled();
        expect(mockQdrant.delete).not.toHaveBeenCalled();
    });

    it('should delete points by id', async () => {
        await backend.delete(['c-1', 'c-2']);

        expect(mockQdrant.delete).toHaveBeenCalledWith('documents', { wait: true, points: ['c-1', 'c-2'] });
    });

    it('should wrap upsert failures with the document id', async () => {
        mockQdrant.upsert.mockRejectedValue(new Error('Bad Request'));

        const upserting = backend.upsert('docs/a.txt', [chunk('c-1')]);

        await expect(upserting).rejects.toThrow(IndexingError);
        await expect(upserting).rejects.toMatchObject({ operation: 'upsert', documentId: 'docs/a.txt' });
    });

    it('should retry collection setup after a failure', async () => {
        mockQdrant.getCollections.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

        await expect(backend.delete(['c-1'])).rejects.toMatchObject({ operation: 'ensure-collection' });
        await backend.delete(['c-1']);

        expect(mockQdrant.getCollections).toHaveBeenCalledTimes(2);
        expect(mockQdrant.delete).toHaveBeenCalledTimes(1);
    });

    it('should report chunks the collection does not hold', async () => {
        mockQdrant.retrieve.mockResolvedValue([{ id: 'c-1' }]);

        expect(await backend.missingChunks(['c-1', 'c-2'])).toEqual(['c-2']);
        expect(mockQdrant.retrieve).toHaveBeenCalledWith('documents', { ids: ['c-1', 'c-2'], with_payload: false, with_vector: false });
    });
});
