import type { IncidentRAG } from '../incident-rag.js';
import { consoleIO, formatStackReport, reportError, type CommandIO } from './output.js';

export interface DoctorCommandOptions {
    fix?: boolean;
    recreateIndex?: boolean;
    skipDatabase?: boolean;
}

/**
 * `doctor`: exit 0 when no check failed
 */
export async function runDoctorCommand(
    rag: IncidentRAG,
    options: DoctorCommandOptions,
    io: CommandIO = consoleIO
): Promise<number> {
    try {
        const report = await rag.inspectStack({
            fix: options.fix,
            recreateIndex: options.recreateIndex,
            skipDatabase: options.skipDatabase,
        });

        formatStackReport(report).forEach(line => io.out(line));
        return report.healthy ? 0 : 1;
    } catch (error) {
        return reportError(error, io);
    }
}
