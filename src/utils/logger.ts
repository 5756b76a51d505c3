import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
    correlationId?: string;
    cycleId?: string;
    documentId?: string;
    sourceName?: string;
    operation?: string;
    duration?: number;
    errorCode?: string;
    errorCategory?: string;
    retryable?: boolean;
    stackTrace?: string;
    [key: string]: unknown;
}

export interface StructuredLogEntry {
    timestamp: string;
    level: string;
    message: string;
    correlationId: string;
    service: string;
    context: LogContext;
}

export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
    child(context: LogContext): Logger;
    setCorrelationId(correlationId: string): void;
    getCorrelationId(): string;
}

export interface LoggerOptions {
    level?: string;
    logDir?: string;
    silent?: boolean;
}

function isLogContext(value: unknown): value is LogContext {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function createTransports(serviceName: string, logDir: string | undefined, fallbackId: () => string): winston.transport[] {
    const transports: winston.transport[] = [
        // stdout carries command output
        new winston.transports.Console({
            stderrLevels: ['error', 'warn', 'info', 'debug'],
            format: winston.format.combine(
                winston.format.colorize(),
                winston.format.printf((info) => {
                    const correlationId = String(info.correlationId || fallbackId());
                    const contextStr = info.context ? ` ${JSON.stringify(info.context)}` : '';
                    return `[${info.timestamp}] [${serviceName}:${correlationId.substring(0, 8)}] ${info.level}: ${info.message}${contextStr}`;
                })
            )
        })
    ];

    if (logDir) {
        transports.push(
            new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error' }),
            new winston.transports.File({ filename: path.join(logDir, 'sync.log') })
        );
    }

    return transports;
}

class StructuredLogger implements Logger {
    private winston: winston.Logger;
    private correlationId: string;
    private serviceName: string;
    private boundContext: LogContext;

    constructor(serviceName: string = 'rag-index-sync', options: LoggerOptions = {}, winstonLogger?: winston.Logger) {
        this.serviceName = serviceName;
        this.correlationId = uuidv4();
        this.boundContext = {};

        this.winston = winstonLogger ?? winston.createLogger({
            level: options.level || process.env.LOG_LEVEL || 'info',
            silent: options.silent ?? process.env.LOG_SILENT === 'true',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.printf((info) => {
                    const logEntry: StructuredLogEntry = {
                        timestamp: String(info.timestamp),
                        level: info.level,
                        message: String(info.message),
                        correlationId: String(info.correlationId || this.correlationId),
                        service: this.serviceName,
                        context: isLogContext(info.context) ? info.context : {}
                    };
                    return JSON.stringify(logEntry);
                })
            ),
            transports: createTransports(serviceName, options.logDir ?? process.env.LOG_DIR, () => this.correlationId)
        });
    }

    private enrichContext(context: LogContext = {}): LogContext {
        return {
            ...this.boundContext,
            ...context,
            correlationId: context.correlationId || this.correlationId,
            service: this.serviceName
        };
    }

    private write(level: LogLevel, message: string, context?: LogContext): void {
        this.winston.log(level, message, {
            correlationId: this.correlationId,
            context: this.enrichContext(context)
        });
    }

    debug(message: string, context?: LogContext): void {
        this.write('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.write('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.write('warn', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.write('error', message, context);
    }

    /**
     * Returns a logger sharing the same winston instance with `context` bound to
     * every entry. A `correlationId` or `cycleId` in the context becomes the
     * child's correlation id.
     */
    child(context: LogContext): Logger {
        const childLogger = new StructuredLogger(this.serviceName, {}, this.winston);
        childLogger.correlationId = context.correlationId || context.cycleId || this.correlationId;
        childLogger.boundContext = { ...this.boundContext, ...context };
        return childLogger;
    }

    setCorrelationId(correlationId: string): void {
        this.correlationId = correlationId;
    }

    getCorrelationId(): string {
        return this.correlationId;
    }

    /**
     * Adjust level and file output once configuration has been loaded.
     */
    configure(options: LoggerOptions): void {
        if (options.level) {
            this.winston.level = options.level;
        }
        if (options.silent !== undefined) {
            this.winston.silent = options.silent;
        }
        if (options.logDir) {
            this.winston.add(new winston.transports.File({ filename: path.join(options.logDir, 'error.log'), level: 'error' }));
            this.winston.add(new winston.transports.File({ filename: path.join(options.logDir, 'sync.log') }));
        }
    }
}

export const logger = new StructuredLogger();

export { StructuredLogger };
