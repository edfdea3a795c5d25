import type { IncidentRAG } from '../incident-rag.js';
import { consoleIO, formatQueryOutcome, reportError, type CommandIO } from './output.js';

export interface SearchCommandOptions {
    question: string;
    answer?: boolean;
    size?: number;
    contextChars?: number;
}

/**
 * `search`: exit 0 with or without hits and when generation degrades;
 * 1 when the index cannot be queried
 */
export async function runSearchCommand(
    rag: IncidentRAG,
    options: SearchCommandOptions,
    io: CommandIO = consoleIO
): Promise<number> {
    try {
        const outcome = await rag.query({
            question: options.question,
            answer: options.answer,
            size: options.size,
            contextChars: options.contextChars,
        });

        formatQueryOutcome(outcome).forEach(line => io.out(line));
        return 0;
    } catch (error) {
        return reportError(error, io);
    }
}
