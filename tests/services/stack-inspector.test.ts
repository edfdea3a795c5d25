import { describe, it, expect, beforeEach } from 'vitest';
import { StackInspector, STACK_CHECKS } from '../../src/services/stack-inspector.service.js';
import { SearchError } from '../../src/errors/index.js';
import {
    createMockGenerationService,
    createMockLogger,
    createMockResolvedConfig,
    createMockSearchGateway,
    createUnreachableRepository,
    InMemoryRecordRepository,
    type MockGenerationService,
    type MockSearchGateway,
} from '../mocks/index.js';

describe('StackInspector', () => {
    let gateway: MockSearchGateway;
    let generation: MockGenerationService;
    let repository: InMemoryRecordRepository;
    let inspector: StackInspector;

    beforeEach(() => {
        gateway = createMockSearchGateway();
        generation = createMockGenerationService();
        repository = new InMemoryRecordRepository();
        inspector = new StackInspector(
            createMockResolvedConfig(),
            { gateway, generation, repository },
            createMockLogger()
        );
    });

    function checkNamed(report: { checks: { name: string }[] }, name: string) {
        return report.checks.find(check => check.name === name);
    }

    // ========================================
    // READ-ONLY INSPECTION
    // ========================================

    describe('inspect', () => {
        it('should report a healthy stack', async () => {
            const report = await inspector.inspect();

            expect(report.healthy).toBe(true);
            expect(report.fix).toBe(false);
            expect(report.checks.map(check => check.name)).toEqual([
                'elasticsearch',
                'elser-model',
                'elser-deployment',
                'ingest-pipeline',
                'index',
                'document-count',
                'ollama',
                'database',
            ]);
            expect(checkNamed(report, STACK_CHECKS.ELASTICSEARCH)).toMatchObject({
                status: 'ok',
                message: 'test-cluster 8.15.0 at http://es.test:9200',
            });
            expect(checkNamed(report, STACK_CHECKS.DOCUMENT_COUNT)).toMatchObject({
                status: 'ok',
                message: '3 documents in incidents_elser',
            });
            expect(checkNamed(report, STACK_CHECKS.OLLAMA)).toMatchObject({
                status: 'ok',
                message: 'Model test-model available at http://ollama.test:11434',
            });
            expect(checkNamed(report, STACK_CHECKS.DATABASE)).toMatchObject({
                status: 'ok',
                message: 'Reachable at memory:5432/test',
            });
        });

        it('should stop the search checks when the cluster is unreachable', async () => {
            gateway.info.mockRejectedValue(
                new SearchError('Cluster info failed at http://es.test:9200: connect ECONNREFUSED', {
                    endpoint: 'http://es.test:9200',
                })
            );

            const report = await inspector.inspect();

            expect(report.healthy).toBe(false);
            expect(report.checks.map(check => check.name)).toEqual(['elasticsearch', 'ollama', 'database']);
            expect(report.checks[0]).toEqual({
                name: 'elasticsearch',
                status: 'fail',
                message: 'Cluster info failed at http://es.test:9200: connect ECONNREFUSED',
            });
            expect(gateway.hasTrainedModel).not.toHaveBeenCalled();
        });

        it('should report missing components without changing them', async () => {
            gateway.hasTrainedModel.mockResolvedValue(false);
            gateway.getDeploymentState.mockResolvedValue(undefined);
            gateway.hasPipeline.mockResolvedValue(false);
            gateway.indexExists.mockResolvedValue(false);

            const report = await inspector.inspect();

            expect(report.healthy).toBe(false);
            expect(checkNamed(report, STACK_CHECKS.ELSER_MODEL)).toMatchObject({
                status: 'fail',
                message: 'Model .elser_model_2 not installed',
            });
            expect(checkNamed(report, STACK_CHECKS.ELSER_DEPLOYMENT)).toMatchObject({
                status: 'fail',
                message: 'Deployment of .elser_model_2 is absent',
            });
            expect(checkNamed(report, STACK_CHECKS.INGEST_PIPELINE)).toMatchObject({
                status: 'fail',
                message: 'Pipeline elser_incidents_pipeline missing',
            });
            expect(checkNamed(report, STACK_CHECKS.INDEX)).toMatchObject({
                status: 'fail',
                message: 'Index incidents_elser does not exist',
            });
            expect(checkNamed(report, STACK_CHECKS.DOCUMENT_COUNT)).toEqual({
                name: 'document-count',
                status: 'warn',
                message: 'Skipped: index unavailable',
            });
            expect(gateway.installElserModel).not.toHaveBeenCalled();
            expect(gateway.createIndex).not.toHaveBeenCalled();
        });

        it('should flag a token field mapped with the wrong type', async () => {
            gateway.getFieldType.mockResolvedValue('float');

            const report = await inspector.inspect();

            expect(checkNamed(report, STACK_CHECKS.INDEX)).toMatchObject({
                status: 'fail',
                message:
                    'Index incidents_elser maps ml.tokens as float; expected rank_features (use --fix --recreate-index)',
            });
        });

        it('should warn on an empty index', async () => {
            gateway.count.mockResolvedValue(0);

            const report = await inspector.inspect();

            expect(report.healthy).toBe(true);
            expect(checkNamed(report, STACK_CHECKS.DOCUMENT_COUNT)).toMatchObject({
                status: 'warn',
                message: 'Index incidents_elser is empty',
            });
        });

        it('should warn when the chat model is not pulled', async () => {
            generation.listModels.mockResolvedValue(['other:7b']);

            const report = await inspector.inspect();

            expect(report.healthy).toBe(true);
            expect(checkNamed(report, STACK_CHECKS.OLLAMA)).toMatchObject({
                status: 'warn',
                message: 'Model test-model not pulled at http://ollama.test:11434 (ollama pull test-model)',
            });
        });

        it('should fail when the relational store is unreachable', async () => {
            inspector = new StackInspector(
                createMockResolvedConfig(),
                { gateway, generation, repository: createUnreachableRepository() },
                createMockLogger()
            );

            const report = await inspector.inspect();

            expect(report.healthy).toBe(false);
            expect(checkNamed(report, STACK_CHECKS.DATABASE)).toMatchObject({
                status: 'fail',
                message: 'Cannot reach relational store at memory:5432/test: connect ECONNREFUSED',
            });
        });

        it('should skip the database check on request', async () => {
            const report = await inspector.inspect({ skipDatabase: true });

            expect(checkNamed(report, STACK_CHECKS.DATABASE)).toBeUndefined();
            expect(repository.pingCalls).toBe(0);
        });
    });

    // ========================================
    // REPAIR
    // ========================================

    describe('inspect with fix', () => {
        it('should install, deploy and create what is missing', async () => {
            gateway.hasTrainedModel.mockResolvedValue(false);
            gateway.getDeploymentState
                .mockResolvedValueOnce(undefined)
                .mockResolvedValueOnce('starting')
                .mockResolvedValue('started');
            gateway.hasPipeline.mockResolvedValue(false);
            gateway.indexExists.mockResolvedValue(false);

            const report = await inspector.inspect({ fix: true });

            expect(report.healthy).toBe(true);
            expect(gateway.installElserModel).toHaveBeenCalledWith('.elser_model_2');
            expect(gateway.startDeployment).toHaveBeenCalledWith('.elser_model_2');
            expect(gateway.putPipeline).toHaveBeenCalledWith('elser_incidents_pipeline', {
                description: 'ELSER expansion of content into ml.tokens',
                modelId: '.elser_model_2',
                inputField: 'content',
                outputField: 'ml.tokens',
            });
            expect(gateway.createIndex).toHaveBeenCalledWith('incidents_elser', {
                tokenField: 'ml.tokens',
                tokenFieldType: 'rank_features',
                pipeline: 'elser_incidents_pipeline',
            });
            expect(report.checks.flatMap(check => check.actions ?? [])).toEqual([
                'installed .elser_model_2',
                'started deployment of .elser_model_2',
                'wrote pipeline elser_incidents_pipeline',
                'created index incidents_elser',
            ]);
        });

        it('should delete and recreate the index on request', async () => {
            const report = await inspector.inspect({ fix: true, recreateIndex: true });

            expect(gateway.deleteIndex).toHaveBeenCalledWith('incidents_elser');
            expect(gateway.createIndex).toHaveBeenCalledTimes(1);
            expect(checkNamed(report, STACK_CHECKS.INDEX)).toMatchObject({
                status: 'ok',
                actions: ['deleted index incidents_elser', 'created index incidents_elser'],
            });
        });

        it('should create a sparse_vector field for sparse_vector queries', async () => {
            inspector = new StackInspector(
                createMockResolvedConfig({ search: { queryMode: 'sparse_vector' } }),
                { gateway, generation, repository },
                createMockLogger()
            );
            gateway.indexExists.mockResolvedValue(false);

            await inspector.inspect({ fix: true });

            expect(gateway.createIndex).toHaveBeenCalledWith('incidents_elser', expect.objectContaining({
                tokenFieldType: 'sparse_vector',
            }));
        });

        it('should fail when the deployment does not start in time', async () => {
            inspector = new StackInspector(
                createMockResolvedConfig({ deployment: { waitTimeoutMs: 0 } }),
                { gateway, generation, repository },
                createMockLogger()
            );
            gateway.getDeploymentState.mockResolvedValue('starting');

            const report = await inspector.inspect({ fix: true });

            expect(report.healthy).toBe(false);
            expect(checkNamed(report, STACK_CHECKS.ELSER_DEPLOYMENT)).toEqual({
                name: 'elser-deployment',
                status: 'fail',
                message: 'Deployment of .elser_model_2 not started after 0ms',
                actions: ['started deployment of .elser_model_2'],
            });
        });
    });
});
