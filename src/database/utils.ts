import type { QueryResult, QueryResultRow } from 'pg';
import type { DatabaseConfig } from '../types/config.types.js';
import { TABLE_NAME_PATTERN } from '../types/config.types.js';
import { ValidationError } from '../errors/index.js';

/**
 * The part of a pg Pool or Client the repository needs
 */
export interface Queryable {
    query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>;
    end(): Promise<void>;
}

/**
 * Quote a plain or schema-qualified table name
 * @throws ValidationError when the name is not a plain SQL identifier
 */
export function quoteTableName(table: string): string {
    if (!TABLE_NAME_PATTERN.test(table)) {
        throw new ValidationError(`Invalid table name "${table}"`, 'table');
    }
    return table
        .split('.')
        .map(part => `"${part}"`)
        .join('.');
}

/**
 * host:port/database of the store, without credentials
 */
export function describeDatabaseEndpoint(
    config: Pick<DatabaseConfig, 'connectionString'>,
    env: NodeJS.ProcessEnv = process.env
): string {
    if (config.connectionString) {
        try {
            const url = new URL(config.connectionString);
            const database = decodeURIComponent(url.pathname.replace(/^\//, ''));
            return `${url.hostname || 'localhost'}:${url.port || '5432'}/${database || 'postgres'}`;
        } catch {
            return 'postgresql (unparseable connection string)';
        }
    }

    const host = env.PGHOST ?? 'localhost';
    const port = env.PGPORT ?? '5432';
    const database = env.PGDATABASE ?? env.PGUSER ?? 'postgres';
    return `${host}:${port}/${database}`;
}
