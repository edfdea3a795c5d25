import type { ResolvedConfig } from '../types/config.types.js';
import type {
    ISpreadsheetReader,
    LoadOptions,
    LoadResult,
    RecordFailure,
} from '../types/loader.types.js';
import type { IRecordRepository } from '../types/repository.types.js';
import { mapRowsToRecords, resolveColumns } from '../services/record.mapper.js';
import { getRetryOptions, withRetry } from '../utils/retry.js';
import type { Logger } from '../utils/logger.js';

export interface LoaderEngineDependencies {
    reader: ISpreadsheetReader;
    repository: IRecordRepository;
}

/**
 * Loader engine: spreadsheet rows to upserts on the destination table.
 *
 * Row-level problems are reported and skipped; an unreadable file,
 * missing columns or an unreachable store end the run.
 */
export class LoaderEngine {
    private readonly reader: ISpreadsheetReader;
    private readonly repository: IRecordRepository;

    constructor(
        private readonly config: ResolvedConfig,
        dependencies: LoaderEngineDependencies,
        private readonly logger: Logger
    ) {
        this.reader = dependencies.reader;
        this.repository = dependencies.repository;
    }

    async load(options: LoadOptions): Promise<LoadResult> {
        const startTime = Date.now();
        const dryRun = options.dryRun ?? false;

        const sheet = await this.reader.read(options.file, options.sheet ?? 0);
        const limit = options.limit ?? 0;
        const rows = limit > 0 ? sheet.rows.slice(0, limit) : sheet.rows;

        const columns = resolveColumns(sheet.headers, options.columns);
        this.logger.info('Columns resolved', { sheet: sheet.sheetName, ...columns });

        const { records, issues } = mapRowsToRecords(rows, columns);
        for (const issue of issues) {
            this.logger.warn(issue.message, {
                rowNumber: issue.rowNumber,
                reason: issue.reason,
                recordId: issue.id,
            });
        }

        const result: LoadResult = {
            file: options.file,
            sheetName: sheet.sheetName,
            columns,
            rowsRead: rows.length,
            prepared: records.length,
            upserted: 0,
            issues,
            failures: [],
            dryRun,
            durationMs: 0,
        };

        if (dryRun) {
            this.logger.info('Dry run, store not touched', { prepared: records.length });
            return { ...result, durationMs: Date.now() - startTime };
        }

        await withRetry(
            () => this.repository.ping(),
            getRetryOptions(this.config.retry, (attempt, error, delayMs) => {
                this.logger.warn('Store connection failed, retrying', {
                    attempt,
                    delayMs: Math.round(delayMs),
                    endpoint: this.repository.endpoint,
                    error: error.message,
                });
            })
        );

        if (options.createTable) {
            await this.repository.ensureTable();
        }

        const failures: RecordFailure[] = [];
        let upserted = 0;

        // One statement per record, in file order
        for (const [index, record] of records.entries()) {
            const outcome = await this.repository.upsert(record);
            if (outcome.ok) {
                upserted++;
            } else {
                failures.push({ id: outcome.id, error: outcome.error });
                this.logger.warn('Upsert failed', { recordId: outcome.id, error: outcome.error });
            }

            options.onProgress?.({
                processed: index + 1,
                total: records.length,
                upserted,
                failed: failures.length,
            });
        }

        const durationMs = Date.now() - startTime;
        this.logger.info('Load completed', {
            file: options.file,
            rowsRead: rows.length,
            upserted,
            skipped: issues.length,
            failed: failures.length,
            durationMs,
        });

        return { ...result, upserted, failures, durationMs };
    }
}
