import { ChunkingConfig } from '../models/config';
import { ValidationError } from '../utils/errors';

export interface TextChunk {
    text: string;
    startIndex: number;
    endIndex: number;
}

/**
 * Fixed-size sliding window over the text. Windows shorter than
 * `minChunkSize` (after trimming) are dropped.
 */
export class TextChunker {
    private readonly config: ChunkingConfig;

    constructor(config: ChunkingConfig) {
        if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
            throw new ValidationError('chunkSize must be a positive integer', 'chunkSize', config.chunkSize);
        }
        if (config.chunkOverlap < 0 || config.chunkOverlap >= config.chunkSize) {
            throw new ValidationError('chunkOverlap must be between 0 and chunkSize', 'chunkOverlap', config.chunkOverlap);
        }
        this.config = { ...config };
    }

    public chunk(text: string): TextChunk[] {
        const chunks: TextChunk[] = [];
        const { chunkSize, chunkOverlap, minChunkSize } = this.config;
        const step = chunkSize - chunkOverlap;

        for (let i = 0; i < text.length; i += step) {
            const endIndex = Math.min(i + chunkSize, text.length);
            const chunkText = text.slice(i, endIndex);

            if (chunkText.trim().length >= minChunkSize) {
                chunks.push({ text: chunkText, startIndex: i, endIndex });
            }

            if (endIndex >= text.length) break;
        }

        return chunks;
    }
}
