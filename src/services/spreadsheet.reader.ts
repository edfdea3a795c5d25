import ExcelJS from 'exceljs';
import * as fs from 'fs/promises';
import * as path from 'path';
import type {
    CellValue,
    ISpreadsheetReader,
    RawRow,
    SheetData,
    SheetSelector,
} from '../types/loader.types.js';
import type { Logger } from '../utils/logger.js';
import { SpreadsheetError, toError } from '../errors/index.js';
import { cellToText, normalizeCellValue } from '../utils/cell-values.js';

const SUPPORTED_EXTENSIONS = ['.xlsx', '.csv'] as const;

function keepCsvText(datum: string): string | null {
    return datum === '' ? null : datum;
}

/**
 * Reads .xlsx workbooks and .csv files into header-keyed rows.
 *
 * The first non-empty row is the header. Blank header cells get a
 * positional name (`column_<n>`). Fully empty rows are dropped.
 */
export class SpreadsheetReader implements ISpreadsheetReader {
    constructor(private readonly logger: Logger) { }

    async read(file: string, sheet: SheetSelector = 0): Promise<SheetData> {
        const filePath = path.resolve(file);
        const extension = path.extname(filePath).toLowerCase();

        if (!SUPPORTED_EXTENSIONS.some(ext => ext === extension)) {
            throw new SpreadsheetError(
                `Unsupported file type "${extension || '(none)'}"; expected .xlsx or .csv`,
                filePath
            );
        }

        try {
            await fs.access(filePath);
        } catch {
            throw new SpreadsheetError(`Spreadsheet not found: ${filePath}`, filePath);
        }

        const workbook = new ExcelJS.Workbook();
        let worksheet: ExcelJS.Worksheet | undefined;

        try {
            if (extension === '.csv') {
                // Cells stay text: no number or date coercion of identifiers
                worksheet = await workbook.csv.readFile(filePath, { map: keepCsvText });
            } else {
                await workbook.xlsx.readFile(filePath);
                worksheet = this.selectWorksheet(workbook, sheet);
            }
        } catch (error) {
            throw new SpreadsheetError(`Failed to read spreadsheet: ${toError(error).message}`, filePath);
        }

        if (!worksheet) {
            throw new SpreadsheetError(`Sheet not found: ${String(sheet)}`, filePath, {
                sheets: workbook.worksheets.map(ws => ws.name),
            });
        }

        const data = this.extractRows(worksheet);

        this.logger.debug('Spreadsheet read', {
            file: filePath,
            sheet: data.sheetName,
            rows: data.rows.length,
            headers: data.headers,
        });

        return data;
    }

    private selectWorksheet(workbook: ExcelJS.Workbook, sheet: SheetSelector): ExcelJS.Worksheet | undefined {
        if (typeof sheet === 'number') {
            return workbook.worksheets[sheet];
        }
        return workbook.worksheets.find(ws => ws.name === sheet);
    }

    private extractRows(worksheet: ExcelJS.Worksheet): SheetData {
        let headers: string[] | undefined;
        const rows: RawRow[] = [];

        worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
            const values: CellValue[] = [];
            row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
                values[colNumber - 1] = normalizeCellValue(cell.value);
            });

            if (!headers) {
                headers = Array.from({ length: values.length }, (_, i) => {
                    const name = cellToText(values[i] ?? null);
                    return name || `column_${i + 1}`;
                });
                return;
            }

            const cells: Record<string, CellValue> = {};
            headers.forEach((header, i) => {
                cells[header] = values[i] ?? null;
            });

            if (Object.values(cells).some(value => cellToText(value) !== '')) {
                rows.push({ rowNumber, cells });
            }
        });

        return {
            sheetName: worksheet.name,
            headers: headers ?? [],
            rows,
        };
    }
}
