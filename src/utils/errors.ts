import { LogContext, logger } from './logger';

export { LogContext };

// Error categories for structured logging and retry policy
export enum ErrorCategory {
    SOURCE = 'source',
    STATE = 'state',
    RECONCILIATION = 'reconciliation',
    INDEXING = 'indexing',
    CONCURRENCY = 'concurrency',
    AUTHENTICATION = 'authentication',
    VALIDATION = 'validation',
    CONFIGURATION = 'configuration',
    NETWORK = 'network',
    SYSTEM = 'system'
}

// Base error class with structured logging support
export class BaseError extends Error {
    public readonly code: string;
    public readonly category: ErrorCategory;
    public readonly retryable: boolean;
    public readonly timestamp: Date;
    public readonly correlationId: string;
    public readonly context: LogContext;

    constructor(
        message: string,
        code: string,
        category: ErrorCategory,
        retryable: boolean = false,
        context: LogContext = {}
    ) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.category = category;
        this.retryable = retryable;
        this.timestamp = new Date();
        this.correlationId = logger.getCorrelationId();
        this.context = context;

        this.logError();
    }

    private logError(): void {
        logger.debug(this.message, {
            errorCode: this.code,
            errorCategory: this.category,
            retryable: this.retryable,
            stackTrace: this.stack,
            ...this.context
        });
    }

    public toJSON(): SerializedError {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            category: this.category,
            retryable: this.retryable,
            timestamp: this.timestamp.toISOString(),
            correlationId: this.correlationId,
            context: this.context
        };
    }
}

export interface SerializedError {
    name: string;
    message: string;
    code: string;
    category: ErrorCategory;
    retryable: boolean;
    timestamp: string;
    correlationId: string;
    context: LogContext;
}

// Content source errors

export class SourceUnavailableError extends BaseError {
    public readonly sourceName: string;

    constructor(message: string, sourceName: string, context: LogContext = {}) {
        super(message, 'SOURCE_UNAVAILABLE', ErrorCategory.SOURCE, true, {
            ...context,
            sourceName,
            errorType: 'source_unavailable'
        });
        this.sourceName = sourceName;
    }
}

export class AuthenticationError extends BaseError {
    constructor(message: string, sourceName?: string, context: LogContext = {}) {
        super(message, 'AUTHENTICATION_ERROR', ErrorCategory.AUTHENTICATION, false, {
            ...context,
            sourceName,
            errorType: 'authentication_failure'
        });
    }
}

export class DocumentReadError extends BaseError {
    public readonly documentId: string;

    constructor(message: string, documentId: string, context: LogContext = {}) {
        super(message, 'DOCUMENT_READ_ERROR', ErrorCategory.SOURCE, true, {
            ...context,
            documentId,
            errorType: 'document_unreadable'
        });
        this.documentId = documentId;
    }
}

export class ContentTooLargeError extends BaseError {
    public readonly sizeBytes: number;
    public readonly maxBytes: number;

    constructor(sizeBytes: number, maxBytes: number, context: LogContext = {}) {
        super(
            `Content size ${sizeBytes} bytes exceeds limit of ${maxBytes} bytes`,
            'CONTENT_TOO_LARGE',
            ErrorCategory.VALIDATION,
            false,
            { ...context, sizeBytes, maxBytes, errorType: 'content_too_large' }
        );
        this.sizeBytes = sizeBytes;
        this.maxBytes = maxBytes;
    }
}

// State store errors

export class StateCorruptedError extends BaseError {
    public readonly statePath: string;

    constructor(message: string, statePath: string, context: LogContext = {}) {
        super(message, 'STATE_CORRUPTED', ErrorCategory.STATE, false, {
            ...context,
            statePath,
            errorType: 'state_corrupted'
        });
        this.statePath = statePath;
    }
}

export class StateSerializationError extends BaseError {
    public readonly documentId?: string;
    public readonly fieldPath: string;

    constructor(message: string, fieldPath: string, documentId?: string, context: LogContext = {}) {
        super(message, 'STATE_SERIALIZATION_ERROR', ErrorCategory.STATE, false, {
            ...context,
            documentId,
            fieldPath,
            errorType: 'state_not_serializable'
        });
        this.documentId = documentId;
        this.fieldPath = fieldPath;
    }
}

// Reconciliation errors

export class DuplicateDocumentIdError extends BaseError {
    public readonly duplicateIds: string[];

    constructor(duplicateIds: string[], context: LogContext = {}) {
        super(
            `Source listing contains duplicate document ids: ${duplicateIds.join(', ')}`,
            'DUPLICATE_DOCUMENT_ID',
            ErrorCategory.RECONCILIATION,
            false,
            { ...context, duplicateIds, errorType: 'duplicate_document_id' }
        );
        this.duplicateIds = duplicateIds;
    }
}

export class ConcurrentCycleError extends BaseError {
    public readonly lockPath: string;
    public readonly holderPid?: number;

    constructor(message: string, lockPath: string, holderPid?: number, context: LogContext = {}) {
        super(message, 'CONCURRENT_CYCLE', ErrorCategory.CONCURRENCY, true, {
            ...context,
            lockPath,
            holderPid,
            errorType: 'concurrent_cycle'
        });
        this.lockPath = lockPath;
        this.holderPid = holderPid;
    }
}

// Index backend errors

export class IndexingError extends BaseError {
    public readonly documentId?: string;
    public readonly operation: string;

    constructor(message: string, operation: string, documentId?: string, context: LogContext = {}) {
        super(message, 'INDEXING_ERROR', ErrorCategory.INDEXING, true, {
            ...context,
            documentId,
            operation,
            errorType: 'indexing_failure'
        });
        this.documentId = documentId;
        this.operation = operation;
    }
}

export class EmbeddingError extends BaseError {
    public readonly modelName: string;
    public readonly textLength: number;

    constructor(message: string, modelName: string, textLength: number, context: LogContext = {}) {
        super(message, 'EMBEDDING_ERROR', ErrorCategory.INDEXING, true, {
            ...context,
            modelName,
            textLength,
            errorType: 'embedding_generation_failure'
        });
        this.modelName = modelName;
        this.textLength = textLength;
    }
}

export class TimeoutError extends BaseError {
    public readonly timeoutMs: number;
    public readonly operation: string;

    constructor(message: string, operation: string, timeoutMs: number, context: LogContext = {}) {
        super(message, 'TIMEOUT_ERROR', ErrorCategory.NETWORK, true, {
            ...context,
            operation,
            timeoutMs,
            errorType: 'timeout'
        });
        this.timeoutMs = timeoutMs;
        this.operation = operation;
    }
}

// Construction-time errors

export class ValidationError extends BaseError {
    public readonly field?: string;
    public readonly value?: unknown;

    constructor(message: string, field?: string, value?: unknown, context: LogContext = {}) {
        super(message, 'VALIDATION_ERROR', ErrorCategory.VALIDATION, false, {
            ...context,
            field,
            value: typeof value === 'object' && value !== null ? JSON.stringify(value) : value,
            errorType: 'validation_failure'
        });
        this.field = field;
        this.value = value;
    }
}

export class ConfigurationError extends BaseError {
    public readonly violations: string[];

    constructor(message: string, violations: string[] = [], context: LogContext = {}) {
        super(message, 'CONFIGURATION_ERROR', ErrorCategory.CONFIGURATION, false, {
            ...context,
            violations,
            errorType: 'invalid_configuration'
        });
        this.violations = violations;
    }
}

export class SystemError extends BaseError {
    public readonly component: string;

    constructor(message: string, component: string, context: LogContext = {}) {
        super(message, 'SYSTEM_ERROR', ErrorCategory.SYSTEM, false, {
            ...context,
            component,
            errorType: 'system_failure'
        });
        this.component = component;
    }
}

export interface DocumentFailure {
    id: string;
    reason: string;
    errorCode: string;
    retryable: boolean;
}

// Error handler utility functions
export class ErrorHandler {
    private static readonly retryableCodes = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN'];

    public static handleError(error: unknown, operation: string, context: LogContext = {}): BaseError {
        if (error instanceof BaseError) {
            return error;
        }

        if (error instanceof Error) {
            if (ErrorHandler.looksLikeTimeout(error)) {
                return new TimeoutError(error.message, operation, 0, context);
            }
            return new SystemError(error.message, operation, {
                ...context,
                originalErrorName: error.name,
                retryable: ErrorHandler.isRetryable(error)
            });
        }

        return new SystemError(`Unknown error during ${operation}: ${String(error)}`, operation, context);
    }

    public static isRetryable(error: unknown): boolean {
        if (error instanceof BaseError) {
            return error.retryable;
        }
        if (!(error instanceof Error)) {
            return false;
        }

        const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
        return ErrorHandler.retryableCodes.some(retryable => code === retryable || error.message.includes(retryable))
            || ErrorHandler.looksLikeTimeout(error);
    }

    public static getErrorCategory(error: unknown): ErrorCategory {
        if (error instanceof BaseError) {
            return error.category;
        }
        if (!(error instanceof Error)) {
            return ErrorCategory.SYSTEM;
        }

        const message = error.message.toLowerCase();
        if (message.includes('timeout') || message.includes('connection')) {
            return ErrorCategory.NETWORK;
        }
        if (message.includes('auth')) {
            return ErrorCategory.AUTHENTICATION;
        }
        return ErrorCategory.SYSTEM;
    }

    /**
     * Collapse any thrown value into the per-document failure entry recorded in a sync report.
     */
    public static toFailure(error: unknown, documentId: string): DocumentFailure {
        const reason = error instanceof Error ? error.message : String(error);

        if (error instanceof BaseError) {
            return { id: documentId, reason, errorCode: error.code, retryable: error.retryable };
        }

        const errorCode = error instanceof Error && 'code' in error && typeof error.code === 'string'
            ? error.code
            : ErrorHandler.looksLikeTimeout(error) ? 'TIMEOUT_ERROR' : 'UNKNOWN_ERROR';

        return { id: documentId, reason, errorCode, retryable: ErrorHandler.isRetryable(error) };
    }

    private static looksLikeTimeout(error: unknown): boolean {
        return error instanceof Error && (
            error.name === 'TimeoutError' ||
            error.message.toLowerCase().includes('timeout') ||
            error.message.toLowerCase().includes('timed out')
        );
    }
}
