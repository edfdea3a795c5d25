#!/usr/bin/env node

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'fs';
import { z } from 'zod';
import type { IncidentRAG } from '../incident-rag.js';
import type { ColumnMapping, SheetSelector } from '../types/loader.types.js';
import { createIncidentRAG } from '../incident-rag.factory.js';
import { envToConfig, parseEnv } from '../config/env.js';
import {
    consoleIO,
    reportError,
    runDoctorCommand,
    runLoadCommand,
    runReindexCommand,
    runSearchCommand,
} from '../commands/index.js';

function readVersion(): string {
    try {
        const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
        const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(raw));
        return parsed.success ? parsed.data.version : '0.0.0';
    } catch {
        return '0.0.0';
    }
}

function parseCount(min: number) {
    return (value: string): number => {
        const parsed = Number(value);
        if (!Number.isInteger(parsed) || parsed < min) {
            throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
        }
        return parsed;
    };
}

function parseSheet(value: string): SheetSelector {
    return /^\d+$/.test(value) ? Number(value) : value;
}

/**
 * Build the client from the environment, run one command, release connections
 */
async function withRag(run: (rag: IncidentRAG) => Promise<number>): Promise<void> {
    let rag: IncidentRAG;
    try {
        rag = createIncidentRAG(envToConfig(parseEnv()));
    } catch (error) {
        process.exitCode = reportError(error, consoleIO);
        return;
    }

    try {
        process.exitCode = await run(rag);
    } finally {
        await rag.close();
    }
}

const program: Command = new Command();

program
    .name('incident-rag')
    .description('Load incident spreadsheets and query them with ELSER retrieval and a local LLM')
    .version(readVersion());

program
    .command('load')
    .description('Upsert spreadsheet rows (.xlsx or .csv) into the relational table')
    .argument('[file]', 'Spreadsheet path')
    .option('-f, --file <path>', 'Spreadsheet path (alternative to the argument)')
    .option('-s, --sheet <sheet>', 'Sheet index or name', parseSheet)
    .option('-l, --limit <n>', 'Only load the first N rows', parseCount(0))
    .option('--dry-run', 'Map rows and report without writing')
    .option('--create-table', 'Create the table when it does not exist')
    .option('--id-column <name>', 'Header of the identifier column')
    .option('--title-column <name>', 'Header of the title column')
    .option('--body-column <name>', 'Header of the body column')
    .option('--updated-column <name>', 'Header of the updated-at column')
    .action(async (fileArgument: string | undefined, options: {
        file?: string;
        sheet?: SheetSelector;
        limit?: number;
        dryRun?: boolean;
        createTable?: boolean;
        idColumn?: string;
        titleColumn?: string;
        bodyColumn?: string;
        updatedColumn?: string;
    }) => {
        const file = options.file ?? fileArgument;
        if (!file) {
            program.error('error: a spreadsheet path is required (argument or --file)');
        }

        const columns: ColumnMapping = {
            id: options.idColumn,
            title: options.titleColumn,
            body: options.bodyColumn,
            updatedAt: options.updatedColumn,
        };

        await withRag(rag => runLoadCommand(rag, {
            file,
            sheet: options.sheet,
            limit: options.limit,
            dryRun: options.dryRun,
            createTable: options.createTable,
            columns,
            progressEvery: 100,
        }));
    });

program
    .command('search')
    .description('Search the index for a question, optionally answering it')
    .argument('<question...>', 'Question text')
    .option('-a, --answer', 'Generate an answer from the hits')
    .option('-n, --size <n>', 'Number of hits', parseCount(1))
    .option('--context-chars <n>', 'Cap on the context sent to the model (0 = none)', parseCount(0))
    .action(async (words: string[], options: { answer?: boolean; size?: number; contextChars?: number }) => {
        await withRag(rag => runSearchCommand(rag, {
            question: words.join(' '),
            answer: options.answer,
            size: options.size,
            contextChars: options.contextChars,
        }));
    });

program
    .command('doctor')
    .description('Check the search stack; --fix installs, deploys and creates what is missing')
    .option('--fix', 'Repair missing components')
    .option('--recreate-index', 'Delete and recreate the index (with --fix)')
    .option('--skip-database', 'Skip the relational store check')
    .action(async (options: { fix?: boolean; recreateIndex?: boolean; skipDatabase?: boolean }) => {
        await withRag(rag => runDoctorCommand(rag, options));
    });

program
    .command('reindex')
    .description('Copy an index into the configured index through the ingest pipeline')
    .requiredOption('--source <index>', 'Index to copy from')
    .option('--dest <index>', 'Destination index (default: ES_INDEX)')
    .option('--pipeline <id>', 'Ingest pipeline (default: ES_INGEST_PIPELINE)')
    .action(async (options: { source: string; dest?: string; pipeline?: string }) => {
        await withRag(rag => runReindexCommand(rag, options));
    });

program.parseAsync().catch((error: unknown) => {
    process.exitCode = reportError(error, consoleIO);
});
