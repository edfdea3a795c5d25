import type { LoadResult } from '../types/loader.types.js';
import type { QueryOutcome } from '../types/query.types.js';
import type { StackReport } from '../types/stack.types.js';
import type { ReindexSummary } from '../types/gateway.types.js';
import { toError } from '../errors/index.js';

/**
 * Where a command writes: results to `out`, diagnostics to `err`
 */
export interface CommandIO {
    out: (line: string) => void;
    err: (line: string) => void;
}

export const consoleIO: CommandIO = {
    out: line => console.log(line),
    err: line => console.error(line),
};

/** Longest list printed before collapsing the rest */
const MAX_LISTED = 20;

function listWithOverflow<T>(items: T[], render: (item: T) => string): string[] {
    const lines = items.slice(0, MAX_LISTED).map(item => `  - ${render(item)}`);
    if (items.length > MAX_LISTED) {
        lines.push(`  ...and ${items.length - MAX_LISTED} more`);
    }
    return lines;
}

function seconds(ms: number): string {
    return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Print a fatal error and return the exit code
 */
export function reportError(error: unknown, io: CommandIO): number {
    io.err(`Error: ${toError(error).message}`);
    return 1;
}

export function formatLoadResult(result: LoadResult): string[] {
    const lines = [`File: ${result.file} (sheet: ${result.sheetName})`];

    if (result.columns) {
        const { id, title, body, updatedAt } = result.columns;
        lines.push(`Columns: id=${id}, title=${title}, body=${body}, updated_at=${updatedAt}`);
    }

    lines.push(`Rows read: ${result.rowsRead}`);
    lines.push(`Records prepared: ${result.prepared}`);
    lines.push(result.dryRun ? 'Dry run: nothing written' : `Upserted: ${result.upserted}`);

    if (result.issues.length > 0) {
        lines.push(`Row issues: ${result.issues.length}`);
        lines.push(...listWithOverflow(result.issues, issue => `row ${issue.rowNumber} (${issue.reason}): ${issue.message}`));
    }

    if (result.failures.length > 0) {
        lines.push(`Failed: ${result.failures.length}`);
        lines.push(...listWithOverflow(result.failures, failure => `${failure.id}: ${failure.error}`));
    }

    lines.push(`Duration: ${seconds(result.durationMs)}`);
    return lines;
}

export function formatQueryOutcome(outcome: QueryOutcome): string[] {
    const lines = [`Query: ${outcome.question}`, `Hits: ${outcome.documents.length}`];

    if (outcome.documents.length === 0) {
        lines.push('No matching documents.');
    }

    outcome.documents.forEach((doc, i) => {
        lines.push('');
        lines.push(`[${i + 1}] score=${doc.score.toFixed(4)} id=${doc.id}`);
        lines.push(`    ${doc.title}`);
    });

    const answer = outcome.answer;
    if (!answer) {
        return lines;
    }

    lines.push('');
    switch (answer.status) {
        case 'generated':
            lines.push(`=== Answer (${answer.model}) ===`);
            lines.push(answer.text);
            break;
        case 'skipped':
            lines.push('No matching documents; answer generation skipped.');
            break;
        case 'failed':
            lines.push(`Answer generation failed (${answer.endpoint}): ${answer.error}`);
            lines.push('Showing retrieval results only.');
            break;
    }
    return lines;
}

export function formatStackReport(report: StackReport): string[] {
    const lines: string[] = [];

    for (const check of report.checks) {
        lines.push(`[${check.status}] ${check.name}: ${check.message}`);
        for (const action of check.actions ?? []) {
            lines.push(`      + ${action}`);
        }
    }

    const failed = report.checks.filter(check => check.status === 'fail').length;
    lines.push('');
    lines.push(report.healthy ? 'Stack healthy' : `Stack unhealthy: ${failed} check(s) failed`);
    if (!report.healthy && !report.fix) {
        lines.push('Run with --fix to install, deploy and create what is missing.');
    }
    return lines;
}

export function formatReindexSummary(summary: ReindexSummary): string[] {
    return [
        `Reindexed ${summary.source} -> ${summary.dest}`,
        `  Total: ${summary.total}`,
        `  Created: ${summary.created}`,
        `  Updated: ${summary.updated}`,
        `  Failures: ${summary.failures}`,
        `  Took: ${seconds(summary.tookMs)}`,
    ];
}
