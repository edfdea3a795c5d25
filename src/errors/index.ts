/**
 * Error context for correlation and tracing
 */
export interface ErrorContext {
    /** Unique correlation ID for run tracing */
    correlationId?: string;
    /** Timestamp when error occurred */
    timestamp?: Date;
    /** Original cause of the error */
    cause?: Error;
    /** Operation that was being performed */
    operation?: string;
}

/**
 * Generate a unique correlation ID
 */
export function generateCorrelationId(): string {
    return `irag_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Current correlation ID; one per CLI run
 */
let currentCorrelationId: string | undefined;

export function setCorrelationId(id: string): void {
    currentCorrelationId = id;
}

export function getCorrelationId(): string {
    if (!currentCorrelationId) {
        currentCorrelationId = generateCorrelationId();
    }
    return currentCorrelationId;
}

export function clearCorrelationId(): void {
    currentCorrelationId = undefined;
}

/**
 * Base error class for incident-rag
 * All errors extend this class for consistent handling
 */
export class IncidentRAGError extends Error {
    public readonly code: string;
    public readonly details?: Record<string, unknown>;
    public readonly correlationId: string;
    public readonly timestamp: Date;
    public override readonly cause?: Error;
    public readonly operation?: string;

    constructor(
        message: string,
        code: string,
        details?: Record<string, unknown>,
        context?: ErrorContext
    ) {
        super(message);
        this.name = 'IncidentRAGError';
        this.code = code;
        this.details = details;
        this.correlationId = context?.correlationId ?? getCorrelationId();
        this.timestamp = context?.timestamp ?? new Date();
        this.cause = context?.cause;
        this.operation = context?.operation;
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            correlationId: this.correlationId,
            timestamp: this.timestamp.toISOString(),
            operation: this.operation,
            cause: this.cause ? {
                name: this.cause.name,
                message: this.cause.message,
            } : undefined,
        };
    }
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends IncidentRAGError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'CONFIGURATION_ERROR', details);
        this.name = 'ConfigurationError';
    }
}

/**
 * Validation errors (input data that cannot be processed at all)
 */
export class ValidationError extends IncidentRAGError {
    public readonly field?: string;

    constructor(message: string, field?: string, details?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', { field, ...details });
        this.name = 'ValidationError';
        this.field = field;
    }
}

/**
 * Spreadsheet read errors
 */
export class SpreadsheetError extends IncidentRAGError {
    public readonly filename?: string;

    constructor(message: string, filename?: string, details?: Record<string, unknown>) {
        super(message, 'SPREADSHEET_ERROR', { filename, ...details });
        this.name = 'SpreadsheetError';
        this.filename = filename;
    }
}

/**
 * Shared options for errors raised while talking to a remote endpoint
 */
export interface EndpointErrorOptions {
    /** Endpoint that failed (URL or host:port) */
    endpoint?: string;
    /** HTTP status code, if a response was received */
    statusCode?: number;
    /** Whether retrying the same request may succeed */
    retryable?: boolean;
    details?: Record<string, unknown>;
    /** Underlying client error */
    cause?: Error;
    /** Request that failed */
    operation?: string;
}

/**
 * Relational store errors
 */
export class DatabaseError extends IncidentRAGError {
    public readonly endpoint?: string;
    public readonly retryable: boolean;

    constructor(message: string, options: EndpointErrorOptions = {}) {
        super(message, 'DATABASE_ERROR', { endpoint: options.endpoint, ...options.details }, {
            cause: options.cause,
            operation: options.operation,
        });
        this.name = 'DatabaseError';
        this.endpoint = options.endpoint;
        this.retryable = options.retryable ?? false;
    }
}

/**
 * Search index errors (connectivity, authentication, malformed query)
 */
export class SearchError extends IncidentRAGError {
    public readonly endpoint?: string;
    public readonly statusCode?: number;
    public readonly retryable: boolean;

    constructor(message: string, options: EndpointErrorOptions = {}) {
        super(message, 'SEARCH_ERROR', {
            endpoint: options.endpoint,
            statusCode: options.statusCode,
            ...options.details,
        }, { cause: options.cause, operation: options.operation });
        this.name = 'SearchError';
        this.endpoint = options.endpoint;
        this.statusCode = options.statusCode;
        this.retryable = options.retryable ?? false;
    }
}

/**
 * Generation endpoint errors
 */
export class GenerationError extends IncidentRAGError {
    public readonly endpoint?: string;
    public readonly statusCode?: number;
    public readonly retryable: boolean;

    constructor(message: string, options: EndpointErrorOptions = {}) {
        super(message, 'GENERATION_ERROR', {
            endpoint: options.endpoint,
            statusCode: options.statusCode,
            ...options.details,
        }, { cause: options.cause, operation: options.operation });
        this.name = 'GenerationError';
        this.endpoint = options.endpoint;
        this.statusCode = options.statusCode;
        this.retryable = options.retryable ?? false;
    }
}
