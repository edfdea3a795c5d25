import { z } from 'zod';
import type { QueryMode } from './search.types.js';
import type { TokenFieldType } from './gateway.types.js';

/**
 * Logging configuration
 */
export interface LogConfig {
    /** Log level */
    level: 'debug' | 'info' | 'warn' | 'error';
    /** Structured JSON logging (default: true); false uses pino-pretty */
    structured: boolean;
    /** Custom logger function */
    customLogger?: (level: string, message: string, meta?: Record<string, unknown>) => void;
}

/**
 * Relational store configuration (PostgreSQL)
 */
export interface DatabaseConfig {
    /** Connection string; when absent the PG* environment variables apply */
    connectionString?: string;
    /** Destination table (default: 'docs') */
    table: string;
    /** Connect timeout in milliseconds (default: 10000) */
    connectionTimeoutMs: number;
}

/**
 * Search index configuration (Elasticsearch)
 */
export interface SearchConfig {
    /** Node URL (default: http://localhost:9200) */
    node: string;
    username: string;
    password: string;
    /** Index holding the shipped records */
    index: string;
    /** ELSER model id, also used as inference id in sparse_vector mode */
    modelId: string;
    /** Field holding the expanded tokens */
    tokenField: string;
    /** Request shape (default: text_expansion) */
    queryMode: QueryMode;
    /** Ingest pipeline id */
    pipelineId: string;
    /** Client request timeout (default: 120000) */
    requestTimeoutMs: number;
}

/**
 * Generation endpoint configuration (Ollama)
 */
export interface GenerationConfig {
    /** Server URL (default: http://localhost:11434) */
    host: string;
    /** Chat model (default: llama3.1:8b) */
    model: string;
    /** Request timeout (default: 300000) */
    timeoutMs: number;
    /** Sampling temperature; server default when unset */
    temperature?: number;
}

/**
 * Query Tool defaults
 */
export interface QueryConfig {
    /** Top-K hits (default: 5) */
    size: number;
    /** Context cap in characters, 0 = none (default: 0) */
    contextChars: number;
}

/**
 * Retry policy for transient search and store-connect failures
 */
export interface RetryConfig {
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
}

/**
 * ELSER deployment wait used by the stack doctor
 */
export interface DeploymentConfig {
    waitTimeoutMs: number;
    pollIntervalMs: number;
}

/**
 * Main incident-rag configuration
 */
export interface IncidentRAGConfig {
    database?: Partial<DatabaseConfig>;
    search?: Partial<SearchConfig>;
    generation?: Partial<GenerationConfig>;
    query?: Partial<QueryConfig>;
    retry?: Partial<RetryConfig>;
    deployment?: Partial<DeploymentConfig>;
    logging?: Partial<LogConfig>;
}

/**
 * Internal resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
    database: DatabaseConfig;
    search: SearchConfig;
    generation: GenerationConfig;
    query: QueryConfig;
    retry: RetryConfig;
    deployment: DeploymentConfig;
    logging: LogConfig;
}

/**
 * Default configuration values
 */
export const DEFAULT_DATABASE_CONFIG: DatabaseConfig = {
    table: 'docs',
    connectionTimeoutMs: 10000,
};

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
    node: 'http://localhost:9200',
    username: 'elastic',
    password: 'changeme',
    index: 'incidents_elser',
    modelId: '.elser_model_2',
    tokenField: 'ml.tokens',
    queryMode: 'text_expansion',
    pipelineId: 'elser_incidents_pipeline',
    requestTimeoutMs: 120000,
};

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = {
    host: 'http://localhost:11434',
    model: 'llama3.1:8b',
    timeoutMs: 300000,
};

export const DEFAULT_QUERY_CONFIG: QueryConfig = {
    size: 5,
    contextChars: 0,
};

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 2,
    initialDelayMs: 500,
    maxDelayMs: 10000,
    backoffMultiplier: 2,
};

export const DEFAULT_DEPLOYMENT_CONFIG: DeploymentConfig = {
    waitTimeoutMs: 600000,
    pollIntervalMs: 10000,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
    level: 'info',
    structured: true,
};

/**
 * Plain or schema-qualified SQL identifier
 */
export const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

/**
 * Mapping type the token field needs for a query mode
 */
export function tokenFieldTypeFor(mode: QueryMode): TokenFieldType {
    return mode === 'sparse_vector' ? 'sparse_vector' : 'rank_features';
}

/**
 * Zod schema for config validation
 */
export const configSchema = z.object({
    database: z
        .object({
            connectionString: z.string().min(1).optional(),
            table: z.string().regex(TABLE_NAME_PATTERN, 'Table must be a plain SQL identifier').optional(),
            connectionTimeoutMs: z.number().int().min(100).max(600000).optional(),
        })
        .optional(),
    search: z
        .object({
            node: z.string().url().optional(),
            username: z.string().optional(),
            password: z.string().optional(),
            index: z.string().min(1).optional(),
            modelId: z.string().min(1).optional(),
            tokenField: z.string().min(1).optional(),
            queryMode: z.enum(['text_expansion', 'sparse_vector', 'match']).optional(),
            pipelineId: z.string().min(1).optional(),
            requestTimeoutMs: z.number().int().min(100).optional(),
        })
        .optional(),
    generation: z
        .object({
            host: z.string().url().optional(),
            model: z.string().min(1).optional(),
            timeoutMs: z.number().int().min(100).optional(),
            temperature: z.number().min(0).max(2).optional(),
        })
        .optional(),
    query: z
        .object({
            size: z.number().int().min(1).max(100).optional(),
            contextChars: z.number().int().min(0).optional(),
        })
        .optional(),
    retry: z
        .object({
            maxRetries: z.number().int().min(0).max(10).optional(),
            initialDelayMs: z.number().int().min(0).max(60000).optional(),
            maxDelayMs: z.number().int().min(0).optional(),
            backoffMultiplier: z.number().min(1).max(5).optional(),
        })
        .optional(),
    deployment: z
        .object({
            waitTimeoutMs: z.number().int().min(0).optional(),
            pollIntervalMs: z.number().int().min(0).optional(),
        })
        .optional(),
    logging: z
        .object({
            level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
            structured: z.boolean().optional(),
        })
        .optional(),
});
