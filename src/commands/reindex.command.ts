import type { IncidentRAG, ReindexOptions } from '../incident-rag.js';
import { consoleIO, formatReindexSummary, reportError, type CommandIO } from './output.js';

export async function runReindexCommand(
    rag: IncidentRAG,
    options: ReindexOptions,
    io: CommandIO = consoleIO
): Promise<number> {
    try {
        const summary = await rag.reindex(options);
        formatReindexSummary(summary).forEach(line => io.out(line));
        return summary.failures > 0 ? 1 : 0;
    } catch (error) {
        return reportError(error, io);
    }
}
