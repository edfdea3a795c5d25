import pg from 'pg';
import type { Pool } from 'pg';
import type { DatabaseConfig } from '../types/config.types.js';
import type { Logger } from '../utils/logger.js';

/**
 * PostgreSQL connection pool for the Loader.
 *
 * Without a connection string the standard PG* environment variables apply.
 * The Loader writes one statement at a time, so one connection is enough.
 */
export function createPool(config: DatabaseConfig, logger: Logger): Pool {
    const pool = new pg.Pool({
        connectionString: config.connectionString,
        connectionTimeoutMillis: config.connectionTimeoutMs,
        max: 1,
    });

    // Idle client errors would otherwise crash the process
    pool.on('error', error => {
        logger.error('Unexpected PostgreSQL pool error', { error: error.message });
    });

    return pool;
}
