import { describe, it, expect, afterEach } from 'vitest';
import {
    IncidentRAGError,
    ConfigurationError,
    ValidationError,
    SpreadsheetError,
    DatabaseError,
    SearchError,
    GenerationError,
    clearCorrelationId,
    generateCorrelationId,
    getCorrelationId,
    setCorrelationId,
    toError,
} from '../src/errors/index.js';

describe('Error Classes', () => {
    afterEach(() => {
        clearCorrelationId();
    });

    describe('IncidentRAGError', () => {
        it('should create with message and code', () => {
            const error = new IncidentRAGError('Test error', 'TEST_CODE');
            expect(error.message).toBe('Test error');
            expect(error.code).toBe('TEST_CODE');
            expect(error.name).toBe('IncidentRAGError');
            expect(error).toBeInstanceOf(Error);
        });

        it('should create with details', () => {
            const error = new IncidentRAGError('Test error', 'TEST', { key: 'value' });
            expect(error.details).toEqual({ key: 'value' });
        });

        it('should use the current correlation ID', () => {
            setCorrelationId('irag_test_run');
            const error = new IncidentRAGError('Test error', 'TEST');
            expect(error.correlationId).toBe('irag_test_run');
        });

        it('should serialize to JSON with cause and operation', () => {
            const cause = new Error('socket hang up');
            const error = new IncidentRAGError('Test error', 'TEST', { key: 'value' }, {
                correlationId: 'irag_fixed',
                timestamp: new Date('2024-05-01T00:00:00.000Z'),
                cause,
                operation: 'search',
            });

            expect(error.toJSON()).toEqual({
                name: 'IncidentRAGError',
                code: 'TEST',
                message: 'Test error',
                details: { key: 'value' },
                correlationId: 'irag_fixed',
                timestamp: '2024-05-01T00:00:00.000Z',
                operation: 'search',
                cause: { name: 'Error', message: 'socket hang up' },
            });
        });
    });

    describe('correlation IDs', () => {
        it('should generate prefixed IDs', () => {
            expect(generateCorrelationId()).toMatch(/^irag_\d+_[a-z0-9]+$/);
        });

        it('should keep one ID per run until cleared', () => {
            const first = getCorrelationId();
            expect(getCorrelationId()).toBe(first);

            clearCorrelationId();
            setCorrelationId('irag_next');
            expect(getCorrelationId()).toBe('irag_next');
        });
    });

    describe('subclasses', () => {
        it('should set name and code for ConfigurationError', () => {
            const error = new ConfigurationError('Invalid config', { variables: ['ES_URL'] });
            expect(error.name).toBe('ConfigurationError');
            expect(error.code).toBe('CONFIGURATION_ERROR');
            expect(error.details).toEqual({ variables: ['ES_URL'] });
        });

        it('should store field on ValidationError', () => {
            const error = new ValidationError('Required columns not found', 'columns');
            expect(error.field).toBe('columns');
            expect(error.code).toBe('VALIDATION_ERROR');
        });

        it('should store filename on SpreadsheetError', () => {
            const error = new SpreadsheetError('Sheet not found: 3', '/tmp/incidents.xlsx');
            expect(error.filename).toBe('/tmp/incidents.xlsx');
            expect(error.code).toBe('SPREADSHEET_ERROR');
        });

        it('should default retryable to false on DatabaseError', () => {
            const error = new DatabaseError('Cannot reach store', { endpoint: 'db.test:5432/incidents' });
            expect(error.endpoint).toBe('db.test:5432/incidents');
            expect(error.retryable).toBe(false);
            expect(error.details).toEqual({ endpoint: 'db.test:5432/incidents' });
        });

        it('should carry endpoint, status code and cause on SearchError', () => {
            const cause = new Error('Service Unavailable');
            const error = new SearchError('Search failed', {
                endpoint: 'http://es.test:9200',
                statusCode: 503,
                retryable: true,
                cause,
                operation: 'Search on index "incidents"',
            });

            expect(error.endpoint).toBe('http://es.test:9200');
            expect(error.statusCode).toBe(503);
            expect(error.retryable).toBe(true);
            expect(error.cause).toBe(cause);
            expect(error.operation).toBe('Search on index "incidents"');
        });

        it('should set name and code for GenerationError', () => {
            const error = new GenerationError('HTTP 500', { endpoint: 'http://ollama.test:11434', statusCode: 500 });
            expect(error.name).toBe('GenerationError');
            expect(error.code).toBe('GENERATION_ERROR');
            expect(error.statusCode).toBe(500);
        });
    });

    describe('toError', () => {
        it('should return Error instances unchanged', () => {
            const error = new Error('boom');
            expect(toError(error)).toBe(error);
        });

        it('should wrap other thrown values', () => {
            const error = toError('plain string');
            expect(error).toBeInstanceOf(Error);
            expect(error.message).toBe('plain string');
        });
    });
});
