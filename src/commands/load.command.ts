import type { IncidentRAG } from '../incident-rag.js';
import type { ColumnMapping, SheetSelector } from '../types/loader.types.js';
import { consoleIO, formatLoadResult, reportError, type CommandIO } from './output.js';

export interface LoadCommandOptions {
    file: string;
    sheet?: SheetSelector;
    limit?: number;
    dryRun?: boolean;
    createTable?: boolean;
    columns?: ColumnMapping;
    /** Print progress to stderr every N records (0 = off) */
    progressEvery?: number;
}

/**
 * `load`: exit 0 when the run completes, even with skipped or failed rows
 */
export async function runLoadCommand(
    rag: IncidentRAG,
    options: LoadCommandOptions,
    io: CommandIO = consoleIO
): Promise<number> {
    const progressEvery = options.progressEvery ?? 0;

    try {
        const result = await rag.load({
            file: options.file,
            sheet: options.sheet,
            limit: options.limit,
            dryRun: options.dryRun,
            createTable: options.createTable,
            columns: options.columns,
            onProgress: progress => {
                if (progressEvery > 0 && (progress.processed % progressEvery === 0 || progress.processed === progress.total)) {
                    io.err(`Upserting: ${progress.processed}/${progress.total} (failed: ${progress.failed})`);
                }
            },
        });

        formatLoadResult(result).forEach(line => io.out(line));
        return 0;
    } catch (error) {
        return reportError(error, io);
    }
}
