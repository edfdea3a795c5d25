import type { IncidentRecord } from '../types/record.types.js';
import { RECORD_LIMITS } from '../types/record.types.js';
import type {
    ColumnMapping,
    RawRow,
    ResolvedColumns,
    RowIssue,
} from '../types/loader.types.js';
import { RowIssueEnum } from '../types/enums.js';
import { COLUMN_CANDIDATES } from '../config/constants.js';
import { ValidationError } from '../errors/index.js';
import { cellToDate, cellToText } from '../utils/cell-values.js';

const RECORD_FIELDS = ['id', 'title', 'body', 'updatedAt'] as const;

const FIELD_LABELS: Record<keyof ResolvedColumns, string> = {
    id: 'identifier',
    title: 'title',
    body: 'body',
    updatedAt: 'updated-at',
};

export interface MappedRecords {
    /** One record per distinct identifier, last occurrence wins */
    records: IncidentRecord[];
    issues: RowIssue[];
}

/**
 * Find the first header matching any candidate, ignoring case
 */
export function pickColumn(headers: string[], candidates: readonly string[]): string | undefined {
    const byLowerCase = new Map(headers.map(h => [h.trim().toLowerCase(), h]));
    for (const candidate of candidates) {
        const match = byLowerCase.get(candidate.toLowerCase());
        if (match !== undefined) {
            return match;
        }
    }
    return undefined;
}

/**
 * Resolve the four record columns against a sheet's headers.
 * Explicit mappings take precedence over the candidate lists.
 *
 * @throws ValidationError naming every column that could not be resolved
 */
export function resolveColumns(headers: string[], overrides: ColumnMapping = {}): ResolvedColumns {
    const candidatesFor = (field: keyof ResolvedColumns): readonly string[] => {
        const override = overrides[field];
        return override ? [override] : COLUMN_CANDIDATES[field];
    };
    const resolve = (field: keyof ResolvedColumns): string | undefined =>
        pickColumn(headers, candidatesFor(field));

    const id = resolve('id');
    const title = resolve('title');
    const body = resolve('body');
    const updatedAt = resolve('updatedAt');

    if (id && title && body && updatedAt) {
        return { id, title, body, updatedAt };
    }

    const found: Partial<ResolvedColumns> = { id, title, body, updatedAt };
    const missing = RECORD_FIELDS
        .filter(field => found[field] === undefined)
        .map(field => `${FIELD_LABELS[field]} (tried: ${candidatesFor(field).join(', ')})`);

    throw new ValidationError(`Required columns not found: ${missing.join('; ')}`, 'columns', {
        headers,
    });
}

/**
 * Map sheet rows to records.
 *
 * Rows without an identifier, or with one longer than the key column,
 * are skipped and reported. A repeated identifier skips the earlier row.
 */
export function mapRowsToRecords(rows: RawRow[], columns: ResolvedColumns): MappedRecords {
    const issues: RowIssue[] = [];
    const byId = new Map<string, { rowNumber: number; record: IncidentRecord; notes: RowIssue[] }>();

    for (const row of rows) {
        const id = cellToText(row.cells[columns.id] ?? null);

        if (!id) {
            issues.push({
                rowNumber: row.rowNumber,
                reason: RowIssueEnum.MISSING_ID,
                message: `Row ${row.rowNumber} has no identifier in column "${columns.id}"`,
            });
            continue;
        }

        // Column limits count characters, not UTF-16 units
        const idLength = [...id].length;
        if (idLength > RECORD_LIMITS.ID_MAX_LENGTH) {
            issues.push({
                rowNumber: row.rowNumber,
                reason: RowIssueEnum.ID_TOO_LONG,
                message: `Identifier is ${idLength} characters; the limit is ${RECORD_LIMITS.ID_MAX_LENGTH}`,
                id,
            });
            continue;
        }

        const title = Array.from(cellToText(row.cells[columns.title] ?? null) || id)
            .slice(0, RECORD_LIMITS.TITLE_MAX_LENGTH)
            .join('');
        const body = cellToText(row.cells[columns.body] ?? null);

        let updatedAt: Date | null = null;
        const notes: RowIssue[] = [];
        const parsed = cellToDate(row.cells[columns.updatedAt] ?? null);
        if (parsed.kind === 'date') {
            updatedAt = parsed.value;
        } else if (parsed.kind === 'invalid') {
            notes.push({
                rowNumber: row.rowNumber,
                reason: RowIssueEnum.INVALID_TIMESTAMP,
                message: `Unparseable timestamp "${parsed.raw}"; keeping the stored value`,
                id,
            });
        }

        // The superseded row is reported once, as a duplicate
        const previous = byId.get(id);
        if (previous) {
            issues.push({
                rowNumber: previous.rowNumber,
                reason: RowIssueEnum.DUPLICATE_ID,
                message: `Identifier "${id}" repeats at row ${row.rowNumber}; earlier row skipped`,
                id,
            });
            byId.delete(id);
        }

        byId.set(id, {
            rowNumber: row.rowNumber,
            record: {
                id,
                title,
                body,
                content: `${title}\n${body}`.trim(),
                updatedAt,
            },
            notes,
        });
    }

    for (const entry of byId.values()) {
        issues.push(...entry.notes);
    }
    issues.sort((a, b) => a.rowNumber - b.rowNumber);

    return {
        records: Array.from(byId.values(), entry => entry.record),
        issues,
    };
}
