import type { CellValue as SheetCellValue } from 'exceljs';
import type { CellValue } from '../types/loader.types.js';
import { MS_PER_DAY, SPREADSHEET_EPOCH_MS } from '../config/constants.js';

/**
 * Flatten an exceljs cell value (rich text, hyperlinks, formulas) into a plain value
 */
export function normalizeCellValue(value: SheetCellValue): CellValue {
    if (value === null || value === undefined) {
        return null;
    }
    if (value instanceof Date || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if ('richText' in value) {
        return value.richText.map(part => part.text).join('');
    }
    if ('hyperlink' in value) {
        return value.text;
    }
    if ('error' in value) {
        return null;
    }
    if ('formula' in value || 'sharedFormula' in value) {
        return normalizeCellValue(value.result ?? null);
    }
    return null;
}

/**
 * Cell as trimmed text; empty string for empty cells
 */
export function cellToText(value: CellValue): string {
    if (value === null) {
        return '';
    }
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? '' : value.toISOString();
    }
    return String(value).trim();
}

export type CellDate =
    | { kind: 'empty' }
    | { kind: 'date'; value: Date }
    | { kind: 'invalid'; raw: string };

/**
 * Interpret a cell as a timestamp.
 * Numbers are spreadsheet serial dates (days since 1899-12-30).
 */
export function cellToDate(value: CellValue): CellDate {
    if (value === null) {
        return { kind: 'empty' };
    }
    if (value instanceof Date) {
        return Number.isNaN(value.getTime())
            ? { kind: 'invalid', raw: String(value) }
            : { kind: 'date', value };
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value) || value <= 0) {
            return { kind: 'invalid', raw: String(value) };
        }
        return { kind: 'date', value: new Date(SPREADSHEET_EPOCH_MS + Math.round(value * MS_PER_DAY)) };
    }
    if (typeof value === 'boolean') {
        return { kind: 'invalid', raw: String(value) };
    }

    const text = value.trim();
    if (!text) {
        return { kind: 'empty' };
    }

    const ms = Date.parse(text);
    return Number.isNaN(ms)
        ? { kind: 'invalid', raw: text }
        : { kind: 'date', value: new Date(ms) };
}
