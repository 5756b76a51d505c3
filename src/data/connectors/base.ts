import axios from 'axios';
import { DocumentInfo, DocumentInfoModel, SourceListing, UnreadableDocument } from '../../models/document';
import {
    AuthenticationError,
    BaseError,
    DocumentReadError,
    ErrorHandler,
    SourceUnavailableError,
    SystemError,
    TimeoutError
} from '../../utils/errors';
import { Logger, logger as defaultLogger } from '../../utils/logger';
import { runWithConcurrency } from '../../utils/concurrency';

/**
 * Anything that can enumerate the documents of a corpus. Listing failures
 * reject with `SourceUnavailableError`; per-document read failures are
 * reported in `unreadable` instead.
 */
export interface ContentSource {
    readonly name: string;
    listDocuments(): Promise<SourceListing>;
}

export interface RetryOptions {
    maxAttempts: number;
    baseDelay: number;
    maxDelay: number;
    backoffMultiplier: number;
}

/**
 * A file found during enumeration whose content still has to be fetched.
 */
export interface PendingDocument {
    id: string;
    read(): Promise<Omit<DocumentInfo, 'id'>>;
}

const DEFAULT_RETRY: RetryOptions = {
    maxAttempts: 3,
    baseDelay: 1000,
    maxDelay: 30000,
    backoffMultiplier: 2
};

/**
 * Retry, timeout, error mapping and logging shared by the source
 * implementations. Sources hold one of these rather than extending a base class.
 */
export class ConnectorSupport {
    private readonly sourceName: string;
    private readonly timeoutMs: number;
    private readonly retryOptions: RetryOptions;
    private readonly readConcurrency: number;
    readonly logger: Logger;

    constructor(
        sourceName: string,
        options: { timeoutMs?: number; retry?: Partial<RetryOptions>; readConcurrency?: number } = {},
        logger: Logger = defaultLogger
    ) {
        this.sourceName = sourceName;
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.retryOptions = { ...DEFAULT_RETRY, ...options.retry };
        this.readConcurrency = options.readConcurrency ?? 4;
        this.logger = logger.child({ sourceName });
    }

    /**
     * Execute an operation with retry logic.
     * Implements exponential backoff with jitter.
     */
    public async executeWithRetry<T>(operation: () => Promise<T>, description: string): Promise<T> {
        let attempt = 0;

        for (;;) {
            try {
                return await this.executeWithTimeout(operation, description);
            } catch (error) {
                attempt++;

                if (!this.isRetryable(error) || attempt >= this.retryOptions.maxAttempts) {
                    throw error;
                }

                const baseDelay = Math.min(
                    this.retryOptions.baseDelay * Math.pow(this.retryOptions.backoffMultiplier, attempt - 1),
                    this.retryOptions.maxDelay
                );
                const delay = baseDelay + Math.random() * 0.1 * baseDelay; // 10% jitter

                this.logger.warn(`Retrying ${description}`, {
                    attempt,
                    maxAttempts: this.retryOptions.maxAttempts,
                    delay,
                    error: error instanceof Error ? error.message : String(error)
                });

                await new Promise(resolve => setTimeout(resolve, delay));
            }
        }
    }

    public async executeWithTimeout<T>(operation: () => Promise<T>, description: string): Promise<T> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                reject(new TimeoutError(`${description} timed out after ${this.timeoutMs}ms`, description, this.timeoutMs));
            }, this.timeoutMs);
        });

        try {
            return await Promise.race([operation(), timeout]);
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * Map a listing failure onto `SourceUnavailableError`, keeping the cause's
     * code in the context.
     */
    public toUnavailable(error: unknown, operation: string): SourceUnavailableError {
        if (error instanceof SourceUnavailableError) {
            return error;
        }

        const cause = this.classify(error);
        const wrapped = new SourceUnavailableError(
            `${this.sourceName}: ${operation} failed: ${cause.message}`,
            this.sourceName,
            { operation, causeCode: cause.code, causeCategory: cause.category }
        );
        this.logger.error(`Error during ${operation}`, {
            errorCode: cause.code,
            errorCategory: cause.category,
            retryable: cause.retryable
        });
        return wrapped;
    }

    /**
     * Read every pending document, turning per-document failures into
     * `UnreadableDocument` entries.
     */
    public async collect(pending: readonly PendingDocument[]): Promise<SourceListing> {
        const documents: DocumentInfo[] = [];
        const unreadable: UnreadableDocument[] = [];

        await runWithConcurrency(pending, async (entry) => {
            try {
                const data = await this.executeWithRetry(() => entry.read(), `read ${entry.id}`);
                documents.push(new DocumentInfoModel({ ...data, id: entry.id }).toJSON());
            } catch (error) {
                const failure = ErrorHandler.toFailure(this.classifyRead(error, entry.id), entry.id);
                unreadable.push({ id: entry.id, reason: failure.reason, errorCode: failure.errorCode, retryable: failure.retryable });
                this.logger.warn('Document could not be read', {
                    documentId: entry.id,
                    errorCode: failure.errorCode,
                    retryable: failure.retryable
                });
            }
        }, { concurrency: this.readConcurrency });

        // Listing order should not depend on read timing
        documents.sort((a, b) => a.id.localeCompare(b.id));
        unreadable.sort((a, b) => a.id.localeCompare(b.id));

        this.logger.info('Listed documents', { documentCount: documents.length, unreadableCount: unreadable.length });
        return { documents, unreadable };
    }

    private classifyRead(error: unknown, documentId: string): BaseError {
        const cause = this.classify(error);
        if (cause instanceof SystemError) {
            return new DocumentReadError(cause.message, documentId, { causeCode: cause.code });
        }
        return cause;
    }

    private classify(error: unknown): BaseError {
        if (error instanceof BaseError) {
            return error;
        }
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            if (status === 401 || status === 403) {
                return new AuthenticationError(`Request rejected with status ${status}`, this.sourceName, { status });
            }
            return ErrorHandler.handleError(error, 'request', { status, sourceName: this.sourceName });
        }
        return ErrorHandler.handleError(error, 'source', { sourceName: this.sourceName });
    }

    private isRetryable(error: unknown): boolean {
        if (error instanceof BaseError) {
            return error.retryable;
        }
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            if (status === undefined) {
                return ErrorHandler.isRetryable(error);
            }
            return status === 429 || status >= 500;
        }
        return ErrorHandler.isRetryable(error);
    }
}
