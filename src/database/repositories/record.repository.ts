import { z } from 'zod';
import type { IncidentRecord } from '../../types/record.types.js';
import type { IRecordRepository, UpsertOutcome } from '../../types/repository.types.js';
import { DatabaseError, toError } from '../../errors/index.js';
import { RETRYABLE_ERROR_PATTERNS } from '../../config/constants.js';
import { isRetryableError } from '../../utils/retry.js';
import { quoteTableName, type Queryable } from '../utils.js';

const recordRowSchema = z.object({
    id: z.string(),
    title: z.string(),
    body: z.string(),
    content: z.string(),
    updated_at: z.coerce.date().nullable(),
});

const countRowSchema = z.object({
    count: z.coerce.number().int(),
});

/**
 * Repository for the Loader's destination table
 *
 * Writes are single-statement upserts keyed by `id`. A record without
 * `updatedAt` keeps the stored timestamp, so reloading a file is a no-op.
 *
 * @implements {IRecordRepository}
 */
export class RecordRepository implements IRecordRepository {
    private readonly table: string;

    constructor(
        private readonly db: Queryable,
        table: string,
        readonly endpoint: string
    ) {
        this.table = quoteTableName(table);
    }

    async ping(): Promise<void> {
        try {
            await this.db.query('SELECT 1');
        } catch (error) {
            const cause = toError(error);
            throw new DatabaseError(`Cannot reach relational store at ${this.endpoint}: ${cause.message}`, {
                endpoint: this.endpoint,
                retryable: isRetryableError(cause, RETRYABLE_ERROR_PATTERNS),
                cause,
                operation: 'ping',
            });
        }
    }

    async ensureTable(): Promise<void> {
        try {
            await this.db.query(`
                CREATE TABLE IF NOT EXISTS ${this.table} (
                    id VARCHAR(64) PRIMARY KEY,
                    title VARCHAR(500) NOT NULL,
                    body TEXT NOT NULL DEFAULT '',
                    content TEXT NOT NULL DEFAULT '',
                    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
                )
            `);
        } catch (error) {
            throw new DatabaseError(`Failed to create table ${this.table}: ${toError(error).message}`, {
                endpoint: this.endpoint,
            });
        }
    }

    async upsert(record: IncidentRecord): Promise<UpsertOutcome> {
        try {
            await this.db.query(
                `
                INSERT INTO ${this.table} AS target (id, title, body, content, updated_at)
                VALUES ($1, $2, $3, $4, COALESCE($5::timestamptz, NOW()))
                ON CONFLICT (id) DO UPDATE SET
                    title = EXCLUDED.title,
                    body = EXCLUDED.body,
                    content = EXCLUDED.content,
                    updated_at = COALESCE($5::timestamptz, target.updated_at)
                `,
                [record.id, record.title, record.body, record.content, record.updatedAt]
            );
            return { ok: true, id: record.id };
        } catch (error) {
            return { ok: false, id: record.id, error: toError(error).message };
        }
    }

    async findById(id: string): Promise<IncidentRecord | null> {
        try {
            const result = await this.db.query(
                `SELECT id, title, body, content, updated_at FROM ${this.table} WHERE id = $1`,
                [id]
            );
            const row = result.rows[0];
            if (!row) {
                return null;
            }

            const parsed = recordRowSchema.parse(row);
            return {
                id: parsed.id,
                title: parsed.title,
                body: parsed.body,
                content: parsed.content,
                updatedAt: parsed.updated_at,
            };
        } catch (error) {
            throw new DatabaseError(`Failed to read record "${id}": ${toError(error).message}`, {
                endpoint: this.endpoint,
            });
        }
    }

    async count(): Promise<number> {
        try {
            const result = await this.db.query(`SELECT COUNT(*)::int AS count FROM ${this.table}`);
            return countRowSchema.parse(result.rows[0] ?? { count: 0 }).count;
        } catch (error) {
            throw new DatabaseError(`Failed to count records: ${toError(error).message}`, {
                endpoint: this.endpoint,
            });
        }
    }

    async close(): Promise<void> {
        await this.db.end();
    }
}
