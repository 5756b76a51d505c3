import {
    BaseError,
    ConcurrentCycleError,
    ContentTooLargeError,
    DuplicateDocumentIdError,
    ErrorCategory,
    ErrorHandler,
    IndexingError,
    SourceUnavailableError,
    StateCorruptedError,
    SystemError,
    TimeoutError,
    ValidationError
} from '../../utils/errors';

jest.mock('../../utils/logger', () => ({
    logger: {
        debug: jest.fn(),
        getCorrelationId: jest.fn(() => 'test-correlation-id')
    }
}));

describe('Error Classes', () => {
    describe('BaseError', () => {
        it('should create a base error with all required properties', () => {
            const error = new BaseError('Test error message', 'TEST_ERROR', ErrorCategory.SYSTEM, true, { operation: 'test-operation' });

            expect(error.message).toBe('Test error message');
            expect(error.code).toBe('TEST_ERROR');
            expect(error.category).toBe(ErrorCategory.SYSTEM);
            expect(error.retryable).toBe(true);
            expect(error.timestamp).toBeInstanceOf(Date);
            expect(error.correlationId).toBe('test-correlation-id');
            expect(error.context).toEqual({ operation: 'test-operation' });
            expect(error.name).toBe('BaseError');
        });

        it('should serialize to JSON', () => {
            const error = new BaseError('Serialize me', 'SERIAL', ErrorCategory.STATE);
            const json = error.toJSON();

            expect(json).toEqual({
                name: 'BaseError',
                message: 'Serialize me',
                code: 'SERIAL',
                category: ErrorCategory.STATE,
                retryable: false,
                timestamp: error.timestamp.toISOString(),
                correlationId: 'test-correlation-id',
                context: {}
            });
        });
    });

    describe('domain errors', () => {
        it('should mark source outages as retryable', () => {
            const error = new SourceUnavailableError('Drive is down', 'google-drive:root');

            expect(error.code).toBe('SOURCE_UNAVAILABLE');
            expect(error.category).toBe(ErrorCategory.SOURCE);
            expect(error.retryable).toBe(true);
            expect(error.sourceName).toBe('google-drive:root');
            expect(error.name).toBe('SourceUnavailableError');
        });

        it('should describe oversized content', () => {
            const error = new ContentTooLargeError(2048, 1024);

            expect(error.message).toBe('Content size 2048 bytes exceeds limit of 1024 bytes');
            expect(error.retryable).toBe(false);
            expect(error.sizeBytes).toBe(2048);
            expect(error.maxBytes).toBe(1024);
        });

        it('should list duplicate ids in the message', () => {
            const error = new DuplicateDocumentIdError(['a.txt', 'b.txt']);

            expect(error.message).toBe('Source listing contains duplicate document ids: a.txt, b.txt');
            expect(error.duplicateIds).toEqual(['a.txt', 'b.txt']);
            expect(error.category).toBe(ErrorCategory.RECONCILIATION);
        });

        it('should keep lock details on concurrent cycle errors', () => {
            const error = new ConcurrentCycleError('Held', '/tmp/state.json.lock', 4242);

            expect(error.lockPath).toBe('/tmp/state.json.lock');
            expect(error.holderPid).toBe(4242);
            expect(error.retryable).toBe(true);
        });

        it('should not retry corrupted state', () => {
            const error = new StateCorruptedError('Bad checksum', '/tmp/state.json');

            expect(error.retryable).toBe(false);
            expect(error.statePath).toBe('/tmp/state.json');
        });
    });
});

describe('ErrorHandler', () => {
    describe('handleError', () => {
        it('should return BaseError instances unchanged', () => {
            const original = new IndexingError('Upsert failed', 'upsert', 'doc-1');

            expect(ErrorHandler.handleError(original, 'upsert')).toBe(original);
        });

        it('should convert timeout errors', () => {
            const handled = ErrorHandler.handleError(new Error('Request timed out'), 'download');

            expect(handled).toBeInstanceOf(TimeoutError);
            expect(handled.retryable).toBe(true);
        });

        it('should wrap other errors in SystemError', () => {
            const handled = ErrorHandler.handleError(new Error('boom'), 'parse');

            expect(handled).toBeInstanceOf(SystemError);
            expect(handled.message).toBe('boom');
        });

        it('should handle non-Error values', () => {
            const handled = ErrorHandler.handleError('plain string', 'parse');

            expect(handled.message).toBe('Unknown error during parse: plain string');
        });
    });

    describe('isRetryable', () => {
        it('should honour the flag of BaseError instances', () => {
            expect(ErrorHandler.isRetryable(new ValidationError('bad'))).toBe(false);
            expect(ErrorHandler.isRetryable(new IndexingError('flaky', 'upsert'))).toBe(true);
        });

        it('should retry network error codes', () => {
            const error = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });

            expect(ErrorHandler.isRetryable(error)).toBe(true);
        });

        it('should not retry unknown errors', () => {
            expect(ErrorHandler.isRetryable(new Error('logic bug'))).toBe(false);
            expect(ErrorHandler.isRetryable(42)).toBe(false);
        });
    });

    describe('getErrorCategory', () => {
        it('should categorise plain errors by message', () => {
            expect(ErrorHandler.getErrorCategory(new Error('Connection refused'))).toBe(ErrorCategory.NETWORK);
            expect(ErrorHandler.getErrorCategory(new Error('auth failed'))).toBe(ErrorCategory.AUTHENTICATION);
            expect(ErrorHandler.getErrorCategory(new Error('other'))).toBe(ErrorCategory.SYSTEM);
        });
    });

    describe('toFailure', () => {
        it('should use code and retryable flag of BaseError instances', () => {
            const failure = ErrorHandler.toFailure(new ContentTooLargeError(10, 5), 'big.txt');

            expect(failure).toEqual({
                id: 'big.txt',
                reason: 'Content size 10 bytes exceeds limit of 5 bytes',
                errorCode: 'CONTENT_TOO_LARGE',
                retryable: false
            });
        });

        it('should map plain timeouts to TIMEOUT_ERROR', () => {
            const failure = ErrorHandler.toFailure(new Error('operation timed out'), 'slow.txt');

            expect(failure).toEqual({ id: 'slow.txt', reason: 'operation timed out', errorCode: 'TIMEOUT_ERROR', retryable: true });
        });

        it('should keep system error codes', () => {
            const error = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });

            expect(ErrorHandler.toFailure(error, 'locked.txt')).toEqual({
                id: 'locked.txt',
                reason: 'EACCES: permission denied',
                errorCode: 'EACCES',
                retryable: false
            });
        });
    });
});
