/**
 * 01 - Basic Usage
 *
 * Load a spreadsheet, then ask a question with a generated answer.
 *
 * Run: npx tsx examples/01-basic-usage.ts incidents.xlsx "why did ingestion stop?"
 */

import 'dotenv/config';
import { createIncidentRAG, envToConfig, parseEnv } from '../src/index.js';

async function main(): Promise<void> {
    const [file = 'incidents.xlsx', question = 'Why did the ingest worker stop?'] = process.argv.slice(2);

    const rag = createIncidentRAG(envToConfig(parseEnv()));

    try {
        // 1. Loader: upsert rows by id
        const result = await rag.load({ file, createTable: true });
        console.log(`Upserted ${result.upserted} of ${result.rowsRead} rows from ${result.sheetName}`);
        for (const issue of result.issues) {
            console.log(`  row ${issue.rowNumber}: ${issue.reason}`);
        }

        // 2. Query Tool: retrieval plus answer
        const outcome = await rag.query({ question, answer: true, size: 3 });
        for (const [i, doc] of outcome.documents.entries()) {
            console.log(`[${i + 1}] ${doc.score.toFixed(4)} ${doc.id} ${doc.title}`);
        }

        if (outcome.answer?.status === 'generated') {
            console.log(`\n${outcome.answer.text}`);
        } else if (outcome.answer?.status === 'failed') {
            console.log(`\nNo answer: ${outcome.answer.error}`);
        }
    } finally {
        await rag.close();
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
