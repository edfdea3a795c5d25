/**
 * Search request shape sent to the index
 */
export const QueryModeEnum = {
    /** ELSER text_expansion over a rank_features field */
    TEXT_EXPANSION: 'text_expansion',
    /** sparse_vector query (Elasticsearch 8.15+) */
    SPARSE_VECTOR: 'sparse_vector',
    /** Plain multi_match keyword search */
    MATCH: 'match',
} as const;

export type QueryModeEnumType = (typeof QueryModeEnum)[keyof typeof QueryModeEnum];

/**
 * Reasons a spreadsheet row is skipped or flagged during a load
 */
export const RowIssueEnum = {
    MISSING_ID: 'missing_id',
    ID_TOO_LONG: 'id_too_long',
    DUPLICATE_ID: 'duplicate_id',
    INVALID_TIMESTAMP: 'invalid_timestamp',
} as const;

export type RowIssueEnumType = (typeof RowIssueEnum)[keyof typeof RowIssueEnum];

/**
 * Answer generation state in answer mode
 */
export const AnswerStatusEnum = {
    GENERATED: 'generated',
    SKIPPED: 'skipped',
    FAILED: 'failed',
} as const;

export type AnswerStatusEnumType = (typeof AnswerStatusEnum)[keyof typeof AnswerStatusEnum];

/**
 * Stack doctor check outcome
 */
export const CheckStatusEnum = {
    OK: 'ok',
    WARN: 'warn',
    FAIL: 'fail',
} as const;

export type CheckStatusEnumType = (typeof CheckStatusEnum)[keyof typeof CheckStatusEnum];
