/**
 * 02 - Error Handling
 *
 * Correlation ids, typed errors and degraded answers.
 *
 * Run: npx tsx examples/02-error-handling.ts
 */

import {
    ConfigurationError,
    DatabaseError,
    SearchError,
    createIncidentRAG,
    generateCorrelationId,
    setCorrelationId,
} from '../src/index.js';

async function main(): Promise<void> {
    // 1. Every log line and error of this run carries the id
    setCorrelationId(generateCorrelationId());

    // 2. Invalid settings fail before any client is created
    try {
        createIncidentRAG({ query: { size: 0 } });
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.log(`Configuration rejected: ${error.message}`);
        }
    }

    const rag = createIncidentRAG({
        search: { node: 'http://localhost:9200' },
        generation: { host: 'http://localhost:11434', timeoutMs: 5000 },
        retry: { maxRetries: 1 },
    });

    try {
        // 3. Search failures are fatal and name the endpoint
        const outcome = await rag.query({ question: 'disk full on db host', answer: true });

        // 4. Generation failures are not: the hits are still there
        if (outcome.answer?.status === 'failed') {
            console.log(`Answer unavailable from ${outcome.answer.endpoint}; ${outcome.documents.length} hits kept`);
        }
    } catch (error) {
        if (error instanceof SearchError) {
            console.log(`Search failed at ${error.endpoint} (retryable: ${error.retryable})`);
            console.log(JSON.stringify(error.toJSON(), null, 2));
        } else if (error instanceof DatabaseError) {
            console.log(`Store unavailable at ${error.endpoint}`);
        } else {
            throw error;
        }
    } finally {
        await rag.close();
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
