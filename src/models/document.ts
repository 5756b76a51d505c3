import Joi from 'joi';
import { ValidationError } from '../utils/errors';

export type DocumentMetadataValue = string | number | boolean | null;

export interface DocumentInfo {
    id: string;
    title: string;
    content: string;
    folderPath: string;
    sourceVersion?: string;
    metadata: Record<string, DocumentMetadataValue>;
}

/**
 * A document the source enumerated but could not read or validate.
 */
export interface UnreadableDocument {
    id: string;
    reason: string;
    errorCode: string;
    retryable?: boolean;
}

export interface SourceListing {
    documents: DocumentInfo[];
    unreadable: UnreadableDocument[];
}

export const MAX_DOCUMENT_ID_LENGTH = 1000;
export const MAX_TITLE_LENGTH = 1000;
export const MAX_FOLDER_PATH_LENGTH = 2000;

const WINDOWS_DRIVE_PATTERN = /^[A-Za-z]:[\\/]/;

/**
 * True when `value` could escape a base directory if used as a path segment.
 */
export function hasPathTraversal(value: string): boolean {
    return value.split(/[\\/]/).includes('..')
        || value.startsWith('/')
        || value.startsWith('\\')
        || WINDOWS_DRIVE_PATTERN.test(value)
        || value.includes('\0');
}

const documentIdSchema = Joi.string()
    .min(1)
    .max(MAX_DOCUMENT_ID_LENGTH)
    .custom((value: string, helpers) => {
        if (value.trim().length === 0) {
            return helpers.message({ custom: 'id cannot be empty or whitespace only' });
        }
        if (hasPathTraversal(value)) {
            return helpers.message({ custom: 'id must not contain path traversal sequences or absolute path markers' });
        }
        return value;
    })
    .required();

const documentInfoSchema = Joi.object({
    id: documentIdSchema,
    title: Joi.string().allow('').max(MAX_TITLE_LENGTH).required(),
    content: Joi.string().allow('').required(),
    folderPath: Joi.string()
        .allow('')
        .max(MAX_FOLDER_PATH_LENGTH)
        .custom((value: string, helpers) => {
            if (value.split(/[\\/]/).includes('..') || value.includes('\0')) {
                return helpers.message({ custom: 'folderPath must not contain path traversal sequences' });
            }
            return value;
        })
        .required(),
    sourceVersion: Joi.string().max(200).optional(),
    metadata: Joi.object()
        .pattern(Joi.string(), Joi.alternatives().try(Joi.string().allow(''), Joi.number(), Joi.boolean(), Joi.valid(null)))
        .required()
});

export function validateDocumentId(id: unknown): string {
    const { error, value } = documentIdSchema.validate(id);
    if (error) {
        throw new ValidationError(`Invalid document id: ${error.message}`, 'id', id);
    }
    return value;
}

/**
 * Validated, immutable document as produced by a content source.
 * Content size is not checked here; the hasher enforces the configured bound.
 */
export class DocumentInfoModel implements DocumentInfo {
    public readonly id: string;
    public readonly title: string;
    public readonly content: string;
    public readonly folderPath: string;
    public readonly sourceVersion?: string;
    public readonly metadata: Record<string, DocumentMetadataValue>;

    constructor(data: Partial<DocumentInfo>) {
        const validatedData = this.validate(this.sanitize(data));

        this.id = validatedData.id;
        this.title = validatedData.title;
        this.content = validatedData.content;
        this.folderPath = validatedData.folderPath;
        this.sourceVersion = validatedData.sourceVersion;
        this.metadata = Object.freeze({ ...validatedData.metadata });
        Object.freeze(this);
    }

    private sanitize(data: Partial<DocumentInfo>): Partial<DocumentInfo> {
        return {
            id: data.id,
            title: typeof data.title === 'string' ? data.title.trim() : data.title,
            content: data.content,
            folderPath: data.folderPath ?? '',
            sourceVersion: data.sourceVersion,
            metadata: data.metadata ?? {}
        };
    }

    private validate(data: Partial<DocumentInfo>): DocumentInfo {
        const { error, value } = documentInfoSchema.validate(data, { abortEarly: false });
        if (error) {
            throw new ValidationError(
                `DocumentInfo validation failed: ${error.details.map(d => d.message).join(', ')}`,
                'document',
                { id: data.id }
            );
        }
        return value;
    }

    public toJSON(): DocumentInfo {
        return {
            id: this.id,
            title: this.title,
            content: this.content,
            folderPath: this.folderPath,
            sourceVersion: this.sourceVersion,
            metadata: { ...this.metadata }
        };
    }
}
