/**
 * Test Fixtures
 *
 * Factory functions for creating test data.
 * Uses @faker-js/faker for realistic random data generation.
 */

import { faker } from '@faker-js/faker';
import ExcelJS from 'exceljs';
import * as path from 'path';
import type { IncidentRAGConfig, ResolvedConfig } from '../../src/types/config.types.js';
import type { IncidentRecord } from '../../src/types/record.types.js';
import type { RawRow, CellValue } from '../../src/types/loader.types.js';
import type { RetrievedDocument, SearchHit } from '../../src/types/search.types.js';
import { IncidentRAGFactory } from '../../src/incident-rag.factory.js';

// ========================================
// CONFIG FIXTURES
// ========================================

/**
 * Resolved config with instant retries and deployment polling
 */
export function createMockResolvedConfig(overrides: IncidentRAGConfig = {}): ResolvedConfig {
    return IncidentRAGFactory.resolveConfig({
        ...overrides,
        search: { node: 'http://es.test:9200', ...overrides.search },
        generation: { host: 'http://ollama.test:11434', model: 'test-model', ...overrides.generation },
        retry: { initialDelayMs: 0, maxDelayMs: 0, ...overrides.retry },
        deployment: { waitTimeoutMs: 1000, pollIntervalMs: 0, ...overrides.deployment },
    });
}

// ========================================
// RECORD FIXTURES
// ========================================

export function createMockRecord(overrides?: Partial<IncidentRecord>): IncidentRecord {
    const title = overrides?.title ?? faker.lorem.sentence();
    const body = overrides?.body ?? faker.lorem.paragraph();

    return {
        id: `INC-${faker.number.int({ min: 1000, max: 9999 })}`,
        title,
        body,
        content: `${title}\n${body}`,
        updatedAt: faker.date.recent(),
        ...overrides,
    };
}

export function createRawRow(rowNumber: number, cells: Record<string, CellValue>): RawRow {
    return { rowNumber, cells };
}

// ========================================
// SEARCH FIXTURES
// ========================================

export function createMockDocument(overrides?: Partial<RetrievedDocument>): RetrievedDocument {
    return {
        id: `INC-${faker.number.int({ min: 1000, max: 9999 })}`,
        title: faker.lorem.sentence(),
        body: faker.lorem.paragraphs(2),
        score: faker.number.float({ min: 1, max: 20, fractionDigits: 4 }),
        updatedAt: faker.date.recent().toISOString(),
        ...overrides,
    };
}

export function createMockSearchHit(overrides?: Partial<SearchHit>): SearchHit {
    const id = `INC-${faker.number.int({ min: 1000, max: 9999 })}`;
    return {
        id,
        score: faker.number.float({ min: 1, max: 20, fractionDigits: 4 }),
        source: {
            id,
            title: faker.lorem.sentence(),
            body: faker.lorem.paragraph(),
            updated_at: '2024-03-01T10:00:00Z',
        },
        ...overrides,
    };
}

// ========================================
// SPREADSHEET FIXTURES
// ========================================

/**
 * Write rows (header first) to an .xlsx file and return its path
 */
export async function writeWorkbook(
    dir: string,
    filename: string,
    rows: CellValue[][],
    sheetName = 'Incidents'
): Promise<string> {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet(sheetName);
    for (const row of rows) {
        sheet.addRow(row);
    }

    const filePath = path.join(dir, filename);
    await workbook.xlsx.writeFile(filePath);
    return filePath;
}
