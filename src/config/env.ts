/**
 * Centralized Environment Configuration
 *
 * Validates environment variables with Zod and maps them onto
 * `IncidentRAGConfig`. The CLI loads `.env` through dotenv before calling
 * `parseEnv`.
 *
 * @example
 * ```typescript
 * import { parseEnv, envToConfig } from './config/env.js';
 * const rag = createIncidentRAG(envToConfig(parseEnv()));
 * ```
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { IncidentRAGConfig } from '../types/config.types.js';
import { TABLE_NAME_PATTERN } from '../types/config.types.js';

/**
 * Unset and empty variables are treated the same
 */
const emptyToUndefined = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

const intWithDefault = (fallback: number, min = 0) =>
    z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).default(fallback));

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
    LOG_LEVEL: z
        .preprocess(emptyToUndefined, z.enum(['debug', 'info', 'warn', 'error']).default('info'))
        .describe('Log level: debug, info, warn, error'),
    LOG_FORMAT: z
        .preprocess(emptyToUndefined, z.enum(['json', 'pretty']).default('json'))
        .describe('json for structured output, pretty for pino-pretty'),

    DATABASE_URL: optionalString.describe('PostgreSQL connection string'),
    DB_TABLE: z
        .preprocess(emptyToUndefined, z.string().regex(TABLE_NAME_PATTERN, 'must be a plain SQL identifier').default('docs')),
    DB_CONNECTION_TIMEOUT_MS: intWithDefault(10000, 100),

    ES_URL: z.preprocess(emptyToUndefined, z.string().url().default('http://localhost:9200')),
    ES_USER: z.preprocess(emptyToUndefined, z.string().default('elastic')),
    ES_PASS: optionalString,
    ELASTIC_PASSWORD: optionalString,
    ES_INDEX: z.preprocess(emptyToUndefined, z.string().default('incidents_elser')),
    ES_MODEL: z.preprocess(emptyToUndefined, z.string().default('.elser_model_2')),
    ES_ELSER_FIELD: z.preprocess(emptyToUndefined, z.string().default('ml.tokens')),
    ES_QUERY_MODE: z.preprocess(
        emptyToUndefined,
        z.enum(['text_expansion', 'sparse_vector', 'match']).default('text_expansion')
    ),
    ES_INGEST_PIPELINE: z.preprocess(emptyToUndefined, z.string().default('elser_incidents_pipeline')),
    ES_REQUEST_TIMEOUT_MS: intWithDefault(120000, 100),

    OLLAMA_HOST: z.preprocess(emptyToUndefined, z.string().url().default('http://localhost:11434')),
    OLLAMA_MODEL: z.preprocess(emptyToUndefined, z.string().default('llama3.1:8b')),
    OLLAMA_TIMEOUT_MS: intWithDefault(300000, 100),

    SEARCH_SIZE: intWithDefault(5, 1),
    CONTEXT_CHARS: intWithDefault(0),
    RETRY_MAX: intWithDefault(2),
});

/**
 * Validated environment type
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse environment variables with validation
 * @throws ConfigurationError listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const result = envSchema.safeParse(source);

    if (!result.success) {
        const errors = result.error.issues
            .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Environment validation failed:\n${errors}`, {
            variables: result.error.issues.map(issue => issue.path.join('.')),
        });
    }

    return result.data;
}

/**
 * Map validated environment variables onto the library config
 */
export function envToConfig(env: Env): IncidentRAGConfig {
    return {
        logging: {
            level: env.LOG_LEVEL,
            structured: env.LOG_FORMAT === 'json',
        },
        database: {
            connectionString: env.DATABASE_URL,
            table: env.DB_TABLE,
            connectionTimeoutMs: env.DB_CONNECTION_TIMEOUT_MS,
        },
        search: {
            node: env.ES_URL,
            username: env.ES_USER,
            password: env.ES_PASS ?? env.ELASTIC_PASSWORD ?? 'changeme',
            index: env.ES_INDEX,
            modelId: env.ES_MODEL,
            tokenField: env.ES_ELSER_FIELD,
            queryMode: env.ES_QUERY_MODE,
            pipelineId: env.ES_INGEST_PIPELINE,
            requestTimeoutMs: env.ES_REQUEST_TIMEOUT_MS,
        },
        generation: {
            host: env.OLLAMA_HOST,
            model: env.OLLAMA_MODEL,
            timeoutMs: env.OLLAMA_TIMEOUT_MS,
        },
        query: {
            size: env.SEARCH_SIZE,
            contextChars: env.CONTEXT_CHARS,
        },
        retry: {
            maxRetries: env.RETRY_MAX,
        },
    };
}
