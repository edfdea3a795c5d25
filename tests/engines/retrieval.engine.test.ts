import { describe, it, expect, beforeEach } from 'vitest';
import { RetrievalEngine, toRetrievedDocument } from '../../src/engines/retrieval.engine.js';
import { SearchError } from '../../src/errors/index.js';
import {
    createMockLogger,
    createMockResolvedConfig,
    createMockSearchGateway,
    createMockSearchHit,
    type MockLogger,
    type MockSearchGateway,
} from '../mocks/index.js';

describe('RetrievalEngine', () => {
    let gateway: MockSearchGateway;
    let logger: MockLogger;
    let engine: RetrievalEngine;

    beforeEach(() => {
        gateway = createMockSearchGateway();
        logger = createMockLogger();
        engine = new RetrievalEngine(createMockResolvedConfig(), gateway, logger);
    });

    // ========================================
    // HIT MAPPING
    // ========================================

    describe('toRetrievedDocument', () => {
        it('should read the document fields from the source', () => {
            expect(toRetrievedDocument({
                id: 'es-doc-1',
                score: 12.5,
                source: { id: 'INC-7', title: 'Disk full', body: 'Rotated logs', updated_at: '2024-03-01T10:00:00Z' },
            })).toEqual({
                id: 'INC-7',
                title: 'Disk full',
                body: 'Rotated logs',
                score: 12.5,
                updatedAt: '2024-03-01T10:00:00Z',
            });
        });

        it('should fall back to the hit id, content and a zero score', () => {
            expect(toRetrievedDocument({
                id: 'es-doc-2',
                score: null,
                source: { title: 'Queue backlog', content: 'Queue backlog\nScaled consumers' },
            })).toEqual({
                id: 'es-doc-2',
                title: 'Queue backlog',
                body: 'Queue backlog\nScaled consumers',
                score: 0,
            });
        });

        it('should join array values', () => {
            expect(toRetrievedDocument({
                id: 'es-1',
                score: 3.2,
                source: { id: 'INC-7', title: ['Disk full', 'node-3'], body: 'Rotated logs and freed 40GB' },
            })).toEqual({
                id: 'INC-7',
                title: 'Disk full node-3',
                body: 'Rotated logs and freed 40GB',
                score: 3.2,
            });
        });

        it('should keep the other fields when one has an unexpected shape', () => {
            expect(toRetrievedDocument({
                id: 'es-1',
                score: 3.2,
                source: { id: 'INC-7', title: { text: 'Disk full' }, body: 'Rotated logs', updated_at: [2024] },
            })).toEqual({
                id: 'INC-7',
                title: '',
                body: 'Rotated logs',
                score: 3.2,
            });
        });

        it('should stringify numeric identifiers', () => {
            expect(toRetrievedDocument({ id: 'x', score: 1, source: { id: 42 } }).id).toBe('42');
        });

        it('should tolerate a missing or unexpected source', () => {
            expect(toRetrievedDocument({ id: 'es-doc-3', score: 1, source: undefined })).toEqual({
                id: 'es-doc-3',
                title: '',
                body: '',
                score: 1,
            });
            expect(toRetrievedDocument({ id: 'es-doc-4', score: 1, source: 'text' }).title).toBe('');
        });
    });

    // ========================================
    // SEARCH
    // ========================================

    describe('search', () => {
        it('should send one text_expansion request to the configured index', async () => {
            await engine.search({ query: 'why did ingestion stop' });

            expect(gateway.search).toHaveBeenCalledTimes(1);
            expect(gateway.search).toHaveBeenCalledWith({
                index: 'incidents_elser',
                size: 5,
                query: {
                    text_expansion: {
                        'ml.tokens': { model_id: '.elser_model_2', model_text: 'why did ingestion stop' },
                    },
                },
                sourceFields: ['id', 'title', 'body', 'content', 'updated_at'],
            });
        });

        it('should honour an explicit size', async () => {
            await engine.search({ query: 'disk', size: 2 });

            expect(gateway.search.mock.calls[0]?.[0].size).toBe(2);
        });

        it('should keep the ranking of the index', async () => {
            const first = createMockSearchHit({ score: 9 });
            const second = createMockSearchHit({ score: 4 });
            gateway.search.mockResolvedValue({ hits: [first, second], totalHits: 2, tookMs: 3 });

            const response = await engine.searchWithMetadata({ query: 'disk' });

            expect(response.documents.map(doc => doc.score)).toEqual([9, 4]);
            expect(response.metadata).toMatchObject({
                index: 'incidents_elser',
                mode: 'text_expansion',
                totalHits: 2,
                tookMs: 3,
            });
        });

        it('should retry a transient failure once and log it', async () => {
            gateway.search
                .mockRejectedValueOnce(new SearchError('Search failed at http://es.test:9200: socket hang up', {
                    endpoint: 'http://es.test:9200',
                    retryable: true,
                }))
                .mockResolvedValueOnce({ hits: [createMockSearchHit()], totalHits: 1 });

            const documents = await engine.search({ query: 'disk' });

            expect(documents).toHaveLength(1);
            expect(gateway.search).toHaveBeenCalledTimes(2);
            expect(logger.warn).toHaveBeenCalledWith('Search failed, retrying', expect.objectContaining({
                attempt: 1,
                endpoint: 'http://es.test:9200',
            }));
        });

        it('should not retry permanent failures', async () => {
            gateway.search.mockRejectedValue(new SearchError('Search failed at http://es.test:9200 (HTTP 401): unauthorized', {
                endpoint: 'http://es.test:9200',
                statusCode: 401,
            }));

            await expect(engine.search({ query: 'disk' })).rejects.toThrow('(HTTP 401): unauthorized');
            expect(gateway.search).toHaveBeenCalledTimes(1);
        });
    });
});
