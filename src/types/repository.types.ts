import type { IncidentRecord } from './record.types.js';

/**
 * Result of upserting a single record
 */
export type UpsertOutcome =
    | { ok: true; id: string }
    | { ok: false; id: string; error: string };

/**
 * Record Repository Interface
 *
 * Destination table for the Loader. Writes are upserts keyed by `id`.
 */
export interface IRecordRepository {
    /** Endpoint description (host:port/database) for diagnostics */
    readonly endpoint: string;

    /**
     * Verify the store can be reached
     * @throws DatabaseError when the connection cannot be established
     */
    ping(): Promise<void>;

    /**
     * Create the table when it does not exist
     */
    ensureTable(): Promise<void>;

    /**
     * Insert or update one record; never throws for row-level failures
     */
    upsert(record: IncidentRecord): Promise<UpsertOutcome>;

    /**
     * Find a record by identifier
     */
    findById(id: string): Promise<IncidentRecord | null>;

    count(): Promise<number>;

    /** Release connections */
    close(): Promise<void>;
}
