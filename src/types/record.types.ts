/**
 * One incident row as stored in the relational table.
 * The external shipper copies these rows into the search index keyed by `id`.
 */
export interface IncidentRecord {
    /** Stable identifier taken from the spreadsheet (max 64 chars) */
    id: string;
    /** Title (max 500 chars) */
    title: string;
    body: string;
    /** `title + "\n" + body`, the text the ingest pipeline expands */
    content: string;
    /** Last-updated time; null keeps the stored value on reload */
    updatedAt: Date | null;
}

/**
 * Column limits of the destination table
 */
export const RECORD_LIMITS = {
    ID_MAX_LENGTH: 64,
    TITLE_MAX_LENGTH: 500,
} as const;
