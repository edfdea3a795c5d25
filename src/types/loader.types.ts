import type { RowIssueEnumType } from './enums.js';

/**
 * Normalized spreadsheet cell
 */
export type CellValue = string | number | boolean | Date | null;

/**
 * One data row of a sheet, keyed by header name
 */
export interface RawRow {
    /** 1-based row number in the sheet (header is usually row 1) */
    rowNumber: number;
    cells: Record<string, CellValue>;
}

/**
 * Parsed sheet
 */
export interface SheetData {
    sheetName: string;
    headers: string[];
    rows: RawRow[];
}

/**
 * Sheet selector: zero-based index or sheet name
 */
export type SheetSelector = number | string;

/**
 * Header names to use instead of automatic detection
 */
export interface ColumnMapping {
    id?: string;
    title?: string;
    body?: string;
    updatedAt?: string;
}

/**
 * Columns resolved against a sheet's headers
 */
export interface ResolvedColumns {
    id: string;
    title: string;
    body: string;
    updatedAt: string;
}

/**
 * A row that was skipped or loaded with a caveat
 */
export interface RowIssue {
    rowNumber: number;
    reason: RowIssueEnumType;
    message: string;
    /** Identifier of the row, when it had one */
    id?: string;
}

/**
 * A record the store rejected
 */
export interface RecordFailure {
    id: string;
    error: string;
}

/**
 * Load progress
 */
export interface LoadProgress {
    processed: number;
    total: number;
    upserted: number;
    failed: number;
}

/**
 * Loader options
 */
export interface LoadOptions {
    /** Path to a .xlsx or .csv file */
    file: string;
    /** Sheet index or name (default: 0) */
    sheet?: SheetSelector;
    /** Only load the first N data rows (0 = all) */
    limit?: number;
    /** Map rows and report without touching the store */
    dryRun?: boolean;
    /** Create the destination table when it does not exist */
    createTable?: boolean;
    /** Explicit header names */
    columns?: ColumnMapping;
    onProgress?: (progress: LoadProgress) => void;
}

/**
 * Loader summary
 */
export interface LoadResult {
    file: string;
    sheetName: string;
    columns: ResolvedColumns | null;
    rowsRead: number;
    prepared: number;
    upserted: number;
    /** Rows skipped or flagged during mapping */
    issues: RowIssue[];
    /** Records the store rejected */
    failures: RecordFailure[];
    dryRun: boolean;
    durationMs: number;
}

/**
 * Spreadsheet reader
 */
export interface ISpreadsheetReader {
    read(file: string, sheet?: SheetSelector): Promise<SheetData>;
}
