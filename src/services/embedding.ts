import { HfInference } from '@huggingface/inference';
import OpenAI from 'openai';
import { EmbeddingSettings } from '../models/config';
import { ConfigurationError, EmbeddingError, TimeoutError } from '../utils/errors';
import { Logger, logger as defaultLogger } from '../utils/logger';

export interface EmbeddingConfig extends EmbeddingSettings {
    maxTokens?: number;
}

export interface BatchEmbeddingResult {
    embeddings: number[][];
    totalProcessed: number;
    processingTime: number;
}

function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every(item => typeof item === 'number');
}

/**
 * Reduce a feature-extraction output to one vector. Token-level outputs
 * (a matrix) are mean-pooled.
 */
export function toSentenceVector(output: unknown): number[] {
    if (isNumberArray(output)) {
        return output;
    }
    if (Array.isArray(output) && output.length > 0 && output.every(isNumberArray)) {
        const rows: number[][] = output.filter(isNumberArray);
        const width = rows[0]?.length ?? 0;
        const pooled = new Array<number>(width).fill(0);
        for (const row of rows) {
            row.forEach((value, index) => {
                pooled[index] = (pooled[index] ?? 0) + value / rows.length;
            });
        }
        return pooled;
    }
    if (Array.isArray(output) && output.length === 1) {
        return toSentenceVector(output[0]);
    }
    return [];
}

export class EmbeddingService {
    private config: EmbeddingConfig;
    private hfClient?: HfInference;
    private openaiClient?: OpenAI;
    private isInitialized: boolean = false;
    private readonly logger: Logger;

    constructor(config: EmbeddingConfig, logger: Logger = defaultLogger) {
        this.config = {
            maxTokens: 8000,
            ...config
        };
        this.logger = logger.child({ operation: 'embedding', provider: config.provider, model: config.model });
    }

    public initialize(): void {
        if (this.isInitialized) {
            return;
        }

        switch (this.config.provider) {
            case 'huggingface':
                if (!this.config.apiKey) {
                    throw new ConfigurationError('HuggingFace API key is required', ['embedding.apiKey is required']);
                }
                this.hfClient = new HfInference(this.config.apiKey);
                break;

            case 'openai':
                if (!this.config.apiKey) {
                    throw new ConfigurationError('OpenAI API key is required', ['embedding.apiKey is required']);
                }
                this.openaiClient = new OpenAI({
                    apiKey: this.config.apiKey,
                    timeout: this.config.timeout
                });
                break;
        }

        this.isInitialized = true;
    }

    public async generateEmbedding(text: string): Promise<number[]> {
        const [embedding] = (await this.batchEmbeddings([text])).embeddings;
        if (!embedding) {
            throw new EmbeddingError('Provider returned no embedding', this.config.model, text.length);
        }
        return embedding;
    }

    public async batchEmbeddings(texts: readonly string[]): Promise<BatchEmbeddingResult> {
        this.initialize();

        const startTime = Date.now();
        const embeddings: number[][] = [];

        for (let i = 0; i < texts.length; i += this.config.batchSize) {
            const batch = texts.slice(i, i + this.config.batchSize);
            const batchEmbeddings = await this.computeWithErrors(batch);
            embeddings.push(...batchEmbeddings);
        }

        const processingTime = Date.now() - startTime;
        this.logger.debug('Generated embeddings', { count: embeddings.length, duration: processingTime });

        return {
            embeddings,
            totalProcessed: texts.length,
            processingTime
        };
    }

    private async computeWithErrors(texts: string[]): Promise<number[][]> {
        const totalLength = texts.reduce((sum, text) => sum + text.length, 0);
        let embeddings: number[][];
        try {
            embeddings = await this.computeBatchEmbeddings(texts);
        } catch (error) {
            const message = error instanceof Error ? error.message : 'Unknown error';
            if (/timed? ?out/i.test(message)) {
                throw new TimeoutError(`Embedding generation timed out: ${message}`, 'embedding', this.config.timeout);
            }
            throw new EmbeddingError(`Failed to generate embeddings: ${message}`, this.config.model, totalLength);
        }

        if (embeddings.length !== texts.length || embeddings.some(embedding => embedding.length === 0)) {
            throw new EmbeddingError(
                `Provider returned ${embeddings.length} embeddings for ${texts.length} inputs`,
                this.config.model,
                totalLength
            );
        }
        return embeddings;
    }

    private async computeBatchEmbeddings(texts: string[]): Promise<number[][]> {
        const truncatedTexts = texts.map(text => this.truncateText(text));

        switch (this.config.provider) {
            case 'huggingface': {
                if (!this.hfClient) {
                    throw new EmbeddingError('HuggingFace client not initialized', this.config.model, 0);
                }
                // The inference API embeds one input per request
                const hfResults: number[][] = [];
                for (const text of truncatedTexts) {
                    const result = await this.hfClient.featureExtraction({
                        model: this.config.model,
                        inputs: text
                    });
                    hfResults.push(toSentenceVector(result));
                }
                return hfResults;
            }

            case 'openai': {
                if (!this.openaiClient) {
                    throw new EmbeddingError('OpenAI client not initialized', this.config.model, 0);
                }
                const openaiResult = await this.openaiClient.embeddings.create({
                    model: this.config.model,
                    input: truncatedTexts
                });
                return [...openaiResult.data]
                    .sort((a, b) => a.index - b.index)
                    .map(item => item.embedding);
            }
        }
    }

    private truncateText(text: string): string {
        const maxTokens = this.config.maxTokens ?? 8000;
        // Simple approximation: 1 token ≈ 4 characters
        const maxChars = maxTokens * 4;
        return text.length > maxChars ? text.substring(0, maxChars) : text;
    }

    public getConfig(): Omit<EmbeddingConfig, 'apiKey'> {
        const { apiKey: _apiKey, ...rest } = this.config;
        return rest;
    }
}
