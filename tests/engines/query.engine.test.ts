import { describe, it, expect, beforeEach } from 'vitest';
import { QueryEngine } from '../../src/engines/query.engine.js';
import { RetrievalEngine } from '../../src/engines/retrieval.engine.js';
import { GenerationError, SearchError, ValidationError } from '../../src/errors/index.js';
import type { ChatMessage } from '../../src/types/generation.types.js';
import {
    createMockGenerationService,
    createMockLogger,
    createMockResolvedConfig,
    createMockSearchGateway,
    createMockSearchHit,
    emptyHits,
    type MockGenerationService,
    type MockSearchGateway,
} from '../mocks/index.js';

describe('QueryEngine', () => {
    let gateway: MockSearchGateway;
    let generation: MockGenerationService;
    let engine: QueryEngine;

    beforeEach(() => {
        const config = createMockResolvedConfig();
        const logger = createMockLogger();
        gateway = createMockSearchGateway();
        generation = createMockGenerationService();
        engine = new QueryEngine(config, new RetrievalEngine(config, gateway, logger), generation, logger);
    });

    function hitsWithBodies(...bodies: string[]) {
        return {
            hits: bodies.map((body, i) => createMockSearchHit({
                id: `es-${i}`,
                score: 10 - i,
                source: { id: `INC-${i + 1}`, title: `Incident ${i + 1}`, body },
            })),
            totalHits: bodies.length,
        };
    }

    // ========================================
    // RETRIEVAL ONLY
    // ========================================

    it('should return documents without calling the model', async () => {
        gateway.search.mockResolvedValue(hitsWithBodies('Rotated logs'));

        const outcome = await engine.run({ question: 'disk full?' });

        expect(outcome.question).toBe('disk full?');
        expect(outcome.documents.map(doc => doc.id)).toEqual(['INC-1']);
        expect(outcome.answer).toBeUndefined();
        expect(generation.generate).not.toHaveBeenCalled();
    });

    it('should reject an empty question', async () => {
        await expect(engine.run({ question: '   ' })).rejects.toThrow(ValidationError);
        expect(gateway.search).not.toHaveBeenCalled();
    });

    // ========================================
    // ANSWER MODE
    // ========================================

    describe('with answer', () => {
        it('should send every full document body and the question verbatim', async () => {
            const longBody = 'Step one. '.repeat(400).trim();
            const question = 'What fixed the "disk full" alert on node-3?';
            gateway.search.mockResolvedValue(hitsWithBodies(longBody, 'Scaled consumers to 6'));

            const outcome = await engine.run({ question, answer: true });

            expect(outcome.answer).toEqual({
                status: 'generated',
                text: 'Restart the ingest worker.',
                model: 'test-model',
            });
            const messages: ChatMessage[] = generation.generate.mock.calls[0]?.[0] ?? [];
            const user = messages.find(message => message.role === 'user')?.content ?? '';
            expect(user).toContain(`BODY: ${longBody}\n`);
            expect(user).toContain('BODY: Scaled consumers to 6');
            expect(user).toContain(`QUESTION:\n${question}\n`);
            expect(messages[0]?.role).toBe('system');
        });

        it('should cap the context when asked', async () => {
            gateway.search.mockResolvedValue(hitsWithBodies('Rotated logs'));

            await engine.run({ question: 'disk?', answer: true, contextChars: 10 });

            const messages: ChatMessage[] = generation.generate.mock.calls[0]?.[0] ?? [];
            expect(messages[1]?.content).toBe(
                'CONTEXT:\n[Doc 1] id\n\nQUESTION:\ndisk?\n\n' +
                'Return a concise answer. If multiple incidents apply, use bullet points.'
            );
        });

        it('should skip generation when nothing matched', async () => {
            gateway.search.mockResolvedValue(emptyHits());

            const outcome = await engine.run({ question: 'unknown outage', answer: true });

            expect(outcome.documents).toEqual([]);
            expect(outcome.answer).toEqual({ status: 'skipped', reason: 'No matching documents' });
            expect(generation.generate).not.toHaveBeenCalled();
        });

        it('should keep the documents when generation fails', async () => {
            gateway.search.mockResolvedValue(hitsWithBodies('Rotated logs'));
            generation.generate.mockRejectedValue(new GenerationError(
                'Cannot reach http://ollama.test:11434/api/chat: fetch failed',
                { endpoint: 'http://ollama.test:11434', retryable: true }
            ));

            const outcome = await engine.run({ question: 'disk?', answer: true });

            expect(outcome.documents).toHaveLength(1);
            expect(outcome.answer).toEqual({
                status: 'failed',
                endpoint: 'http://ollama.test:11434',
                error: 'Cannot reach http://ollama.test:11434/api/chat: fetch failed',
            });
        });

        it('should not call the model when the search fails', async () => {
            gateway.search.mockRejectedValue(new SearchError(
                'Search on index "incidents_elser" failed at http://es.test:9200: connect ECONNREFUSED',
                { endpoint: 'http://es.test:9200' }
            ));

            await expect(engine.run({ question: 'disk?', answer: true })).rejects.toThrow(SearchError);
            expect(generation.generate).not.toHaveBeenCalled();
        });
    });
});
