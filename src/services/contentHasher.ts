import { createHash, Hash } from 'crypto';
import { DEFAULT_MAX_DOCUMENT_BYTES } from '../config/defaults';
import { DocumentInfo } from '../models/document';
import { ContentTooLargeError, ValidationError } from '../utils/errors';

export type SaltField = readonly [name: string, value: string];

export interface ContentHasherOptions {
    maxContentBytes?: number;
    hashMetadataFields?: readonly string[];
}

const SLICE_BYTES = 64 * 1024;

// Present values are salted as JSON, which never produces this token
const ABSENT_VALUE = 'absent';

/**
 * Deterministic SHA-256 fingerprint of a document's hash-relevant fields.
 *
 * Every field is written as `<byte length>:<bytes>` so that adjacent fields
 * cannot be shifted into one another.
 */
export class ContentHasher {
    private readonly maxContentBytes: number;
    private readonly hashMetadataFields: readonly string[];

    constructor(options: ContentHasherOptions = {}) {
        const maxContentBytes = options.maxContentBytes ?? DEFAULT_MAX_DOCUMENT_BYTES;
        if (!Number.isInteger(maxContentBytes) || maxContentBytes <= 0) {
            throw new ValidationError('maxContentBytes must be a positive integer', 'maxContentBytes', maxContentBytes);
        }
        this.maxContentBytes = maxContentBytes;
        this.hashMetadataFields = [...(options.hashMetadataFields ?? [])];
    }

    public hash(content: string, saltFields: readonly SaltField[] = []): string {
        const byteLength = Buffer.byteLength(content, 'utf8');
        if (byteLength > this.maxContentBytes) {
            throw new ContentTooLargeError(byteLength, this.maxContentBytes);
        }
        const contentBytes = Buffer.from(content, 'utf8');

        const digest = createHash('sha256');
        for (const [name, value] of saltFields) {
            this.writeField(digest, Buffer.from(name, 'utf8'));
            this.writeField(digest, Buffer.from(value, 'utf8'));
        }
        this.writeField(digest, contentBytes);

        return digest.digest('hex');
    }

    /**
     * Hash a document with its title and the configured metadata fields as salt.
     * Field values are typed, so `1` and `"1"` or `null` and `""` differ.
     */
    public hashDocument(document: Pick<DocumentInfo, 'title' | 'content' | 'metadata'>): string {
        const saltFields: SaltField[] = [['title', document.title]];
        for (const field of this.hashMetadataFields) {
            const value = Object.prototype.hasOwnProperty.call(document.metadata, field) ? document.metadata[field] : undefined;
            saltFields.push([`metadata.${field}`, value === undefined ? ABSENT_VALUE : JSON.stringify(value)]);
        }
        return this.hash(document.content, saltFields);
    }

    private writeField(digest: Hash, bytes: Buffer): void {
        digest.update(`${bytes.byteLength}:`);
        for (let offset = 0; offset < bytes.byteLength; offset += SLICE_BYTES) {
            digest.update(bytes.subarray(offset, offset + SLICE_BYTES));
        }
    }
}
