import OpenAI from 'openai';
import { EmbeddingConfig, EmbeddingService, toSentenceVector } from '../../services/embedding';
import { ConfigurationError, EmbeddingError, TimeoutError } from '../../utils/errors';

const mockHfInference = {
    featureExtraction: jest.fn()
};

const mockOpenAI = {
    embeddings: {
        create: jest.fn()
    }
};

jest.mock('@huggingface/inference', () => ({
    HfInference: jest.fn(() => mockHfInference)
}));

jest.mock('openai', () => ({
    __esModule: true,
    default: jest.fn(() => mockOpenAI)
}));

const openaiConfig: EmbeddingConfig = {
    provider: 'openai',
    model: 'text-embedding-3-small',
    apiKey: 'test-secret',
    batchSize: 2,
    timeout: 30000
};

describe('EmbeddingService', () => {
    beforeEach(() => {
        jest.clearAllMocks();
    });

    describe('OpenAI provider', () => {
        it('should create the client with key and timeout', async () => {
            mockOpenAI.embeddings.create.mockResolvedValue({ data: [{ index: 0, embedding: [0.1] }] });

            await new EmbeddingService(openaiConfig).generateEmbedding('hello');

            expect(OpenAI).toHaveBeenCalledWith({ apiKey: 'test-secret', timeout: 30000 });
        });

        it('should batch inputs and order results by index', async () => {
            mockOpenAI.embeddings.create
                .mockResolvedValueOnce({ data: [{ index: 1, embedding: [2] }, { index: 0, embedding: [1] }] })
                .mockResolvedValueOnce({ data: [{ index: 0, embedding: [3] }] });

            const result = await new EmbeddingService(openaiConfig).batchEmbeddings(['a', 'b', 'c']);

            expect(result.embeddings).toEqual([[1], [2], [3]]);
            expect(result.totalProcessed).toBe(3);
            expect(mockOpenAI.embeddings.create).toHaveBeenNthCalledWith(1, { model: 'text-embedding-3-small', input: ['a', 'b'] });
            expect(mockOpenAI.embeddings.create).toHaveBeenNthCalledWith(2, { model: 'text-embedding-3-small', input: ['c'] });
        });

        it('should truncate long inputs', async () => {
            mockOpenAI.embeddings.create.mockResolvedValue({ data: [{ index: 0, embedding: [1] }] });

            await new EmbeddingService({ ...openaiConfig, maxTokens: 2 }).generateEmbedding('123456789');

            expect(mockOpenAI.embeddings.create).toHaveBeenCalledWith({ model: 'text-embedding-3-small', input: ['12345678'] });
        });

        it('should require an API key', async () => {
            const service = new EmbeddingService({ ...openaiConfig, apiKey: undefined });

            await expect(service.batchEmbeddings(['a'])).rejects.toThrow(ConfigurationError);
        });

        it('should map provider timeouts to TimeoutError', async () => {
            mockOpenAI.embeddings.create.mockRejectedValue(new Error('Request timed out.'));

            await expect(new EmbeddingService(openaiConfig).generateEmbedding('a')).rejects.toThrow(TimeoutError);
        });

        it('should wrap other provider failures', async () => {
            mockOpenAI.embeddings.create.mockRejectedValue(new Error('Rate limit exceeded'));

            await expect(new EmbeddingService(openaiConfig).generateEmbedding('a'))
                .rejects.toThrow('Failed to generate embeddings: Rate limit exceeded');
        });

        it('should reject a response with the wrong number of embeddings', async () => {
            mockOpenAI.embeddings.create.mockResolvedValue({ data: [{ index: 0, embedding: [1] }] });

            await expect(new EmbeddingService(openaiConfig).batchEmbeddings(['a', 'b'])).rejects.toThrow(EmbeddingError);
        });

        it('should not expose the API key', () => {
            expect(new EmbeddingService(openaiConfig).getConfig()).toEqual({
                provider: 'openai',
                model: 'text-embedding-3-small',
                batchSize: 2,
                timeout: 30000,
                maxTokens: 8000
            });
        });
    });

    describe('HuggingFace provider', () => {
        const hfConfig: EmbeddingConfig = {
            provider: 'huggingface',
            model: 'sentence-transformers/all-MiniLM-L6-v2',
            apiKey: 'test-secret',
            batchSize: 8,
            timeout: 30000
        };

        it('should embed one input per request and pool token vectors', async () => {
            mockHfInference.featureExtraction
                .mockResolvedValueOnce([[1, 2], [3, 4]])
                .mockResolvedValueOnce([5, 6]);

            const result = await new EmbeddingService(hfConfig).batchEmbeddings(['first', 'second']);

            expect(result.embeddings).toEqual([[2, 3], [5, 6]]);
            expect(mockHfInference.featureExtraction).toHaveBeenCalledTimes(2);
            expect(mockHfInference.featureExtraction).toHaveBeenCalledWith({ model: 'sentence-transformers/all-MiniLM-L6-v2', inputs: 'first' });
        });

        it('should reject empty vectors', async () => {
            mockHfInference.featureExtraction.mockResolvedValue('unexpected');

            await expect(new EmbeddingService(hfConfig).generateEmbedding('a')).rejects.toThrow(EmbeddingError);
        });
    });
});

describe('toSentenceVector', () => {
    it('should unwrap a single nested output', () => {
        expect(toSentenceVector([[[1, 2], [3, 4]]])).toEqual([2, 3]);
    });

    it('should return an empty vector for unexpected output', () => {
        expect(toSentenceVector({ vector: [1] })).toEqual([]);
    });
});
