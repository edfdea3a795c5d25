/**
 * System constants for incident-rag
 */

// ============================================
// Spreadsheet Columns
// ============================================

/**
 * Header candidates per record field, matched case-insensitively in order
 */
export const COLUMN_CANDIDATES = {
    id: ['id', 'case_id', 'doc_id', 'incident_id'],
    title: ['title', 'subject', 'summary'],
    body: ['body', 'description', 'details', 'content'],
    updatedAt: ['updated_at', 'opendate', 'date', 'created_at', 'timestamp'],
} as const;

/**
 * Spreadsheet serial day 0 (1899-12-30, UTC)
 */
export const SPREADSHEET_EPOCH_MS = Date.UTC(1899, 11, 30);

export const MS_PER_DAY = 86_400_000;

// ============================================
// Search Settings
// ============================================

export const SEARCH_DEFAULTS = {
    /** Fields requested from the index */
    SOURCE_FIELDS: ['id', 'title', 'body', 'content', 'updated_at'],
    /** Fields and boosts for the keyword fallback */
    MATCH_FIELDS: ['title^2', 'body', 'content'],
    /** Source text field of the ingest pipeline */
    PIPELINE_INPUT_FIELD: 'content',
} as const;

// ============================================
// Retryable Failures
// ============================================

/**
 * Message and code fragments of transient failures
 */
export const RETRYABLE_ERROR_PATTERNS = [
    '429',
    '502',
    '503',
    '504',
    'TIMEOUT',
    'ECONNRESET',
    'ETIMEDOUT',
    'EAI_AGAIN',
];
