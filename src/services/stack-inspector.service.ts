import type { ResolvedConfig } from '../types/config.types.js';
import { tokenFieldTypeFor } from '../types/config.types.js';
import type { ISearchGateway } from '../types/gateway.types.js';
import type { IGenerationService } from '../types/generation.types.js';
import type { IRecordRepository } from '../types/repository.types.js';
import type { InspectOptions, StackCheck, StackReport } from '../types/stack.types.js';
import { CheckStatusEnum } from '../types/enums.js';
import { SEARCH_DEFAULTS } from '../config/constants.js';
import { toError } from '../errors/index.js';
import { sleep } from '../utils/retry.js';
import type { Logger } from '../utils/logger.js';

export const STACK_CHECKS = {
    ELASTICSEARCH: 'elasticsearch',
    ELSER_MODEL: 'elser-model',
    ELSER_DEPLOYMENT: 'elser-deployment',
    INGEST_PIPELINE: 'ingest-pipeline',
    INDEX: 'index',
    DOCUMENT_COUNT: 'document-count',
    OLLAMA: 'ollama',
    DATABASE: 'database',
} as const;

export interface StackInspectorDependencies {
    gateway: ISearchGateway;
    generation: IGenerationService;
    /** Omitted when no relational store is configured */
    repository?: IRecordRepository;
}

/**
 * Health check of the retrieval stack, with an optional repair pass
 * that installs, deploys and creates what is missing.
 */
export class StackInspector {
    private readonly gateway: ISearchGateway;
    private readonly generation: IGenerationService;
    private readonly repository?: IRecordRepository;

    constructor(
        private readonly config: ResolvedConfig,
        dependencies: StackInspectorDependencies,
        private readonly logger: Logger
    ) {
        this.gateway = dependencies.gateway;
        this.generation = dependencies.generation;
        this.repository = dependencies.repository;
    }

    async inspect(options: InspectOptions = {}): Promise<StackReport> {
        const fix = options.fix ?? false;
        const checks: StackCheck[] = [];

        const cluster = await this.guard(STACK_CHECKS.ELASTICSEARCH, () => this.checkCluster());
        checks.push(cluster);

        if (cluster.status !== CheckStatusEnum.FAIL) {
            checks.push(await this.guard(STACK_CHECKS.ELSER_MODEL, () => this.checkModel(fix)));
            checks.push(await this.guard(STACK_CHECKS.ELSER_DEPLOYMENT, () => this.checkDeployment(fix)));
            checks.push(await this.guard(STACK_CHECKS.INGEST_PIPELINE, () => this.checkPipeline(fix)));

            const index = await this.guard(STACK_CHECKS.INDEX, () =>
                this.checkIndex(fix, options.recreateIndex ?? false)
            );
            checks.push(index);

            checks.push(
                index.status === CheckStatusEnum.FAIL
                    ? {
                        name: STACK_CHECKS.DOCUMENT_COUNT,
                        status: CheckStatusEnum.WARN,
                        message: 'Skipped: index unavailable',
                    }
                    : await this.guard(STACK_CHECKS.DOCUMENT_COUNT, () => this.checkDocumentCount())
            );
        }

        checks.push(await this.guard(STACK_CHECKS.OLLAMA, () => this.checkOllama()));

        if (this.repository && !options.skipDatabase) {
            const repository = this.repository;
            checks.push(await this.guard(STACK_CHECKS.DATABASE, () => this.checkDatabase(repository)));
        }

        const healthy = checks.every(check => check.status !== CheckStatusEnum.FAIL);
        this.logger.info('Stack inspected', {
            healthy,
            fix,
            failed: checks.filter(check => check.status === CheckStatusEnum.FAIL).map(check => check.name),
        });

        return { checks, healthy, fix };
    }

    /**
     * Poll until the deployment reports `started` or the wait times out
     */
    async waitForDeployment(modelId: string): Promise<boolean> {
        const { waitTimeoutMs, pollIntervalMs } = this.config.deployment;
        const deadline = Date.now() + waitTimeoutMs;

        for (;;) {
            const state = await this.gateway.getDeploymentState(modelId);
            if (state === 'started') {
                return true;
            }
            if (Date.now() >= deadline) {
                return false;
            }
            this.logger.debug('Waiting for deployment', { modelId, state });
            await sleep(pollIntervalMs);
        }
    }

    private async checkCluster(): Promise<StackCheck> {
        const info = await this.gateway.info();
        return {
            name: STACK_CHECKS.ELASTICSEARCH,
            status: CheckStatusEnum.OK,
            message: `${info.clusterName} ${info.version} at ${this.gateway.endpoint}`,
        };
    }

    private async checkModel(fix: boolean): Promise<StackCheck> {
        const { modelId } = this.config.search;
        const name = STACK_CHECKS.ELSER_MODEL;

        if (await this.gateway.hasTrainedModel(modelId)) {
            return { name, status: CheckStatusEnum.OK, message: `Model ${modelId} installed` };
        }
        if (!fix) {
            return { name, status: CheckStatusEnum.FAIL, message: `Model ${modelId} not installed` };
        }

        await this.gateway.installElserModel(modelId);
        return {
            name,
            status: CheckStatusEnum.OK,
            message: `Model ${modelId} installed`,
            actions: [`installed ${modelId}`],
        };
    }

    private async checkDeployment(fix: boolean): Promise<StackCheck> {
        const { modelId } = this.config.search;
        const name = STACK_CHECKS.ELSER_DEPLOYMENT;
        const state = await this.gateway.getDeploymentState(modelId);

        if (state === 'started') {
            return { name, status: CheckStatusEnum.OK, message: `Deployment of ${modelId} started` };
        }
        if (!fix) {
            return {
                name,
                status: CheckStatusEnum.FAIL,
                message: `Deployment of ${modelId} is ${state ?? 'absent'}`,
            };
        }

        await this.gateway.startDeployment(modelId);
        const started = await this.waitForDeployment(modelId);
        const actions = [`started deployment of ${modelId}`];

        return started
            ? { name, status: CheckStatusEnum.OK, message: `Deployment of ${modelId} started`, actions }
            : {
                name,
                status: CheckStatusEnum.FAIL,
                message: `Deployment of ${modelId} not started after ${this.config.deployment.waitTimeoutMs}ms`,
                actions,
            };
    }

    private async checkPipeline(fix: boolean): Promise<StackCheck> {
        const { pipelineId, modelId, tokenField } = this.config.search;
        const name = STACK_CHECKS.INGEST_PIPELINE;

        if (await this.gateway.hasPipeline(pipelineId)) {
            return { name, status: CheckStatusEnum.OK, message: `Pipeline ${pipelineId} present` };
        }
        if (!fix) {
            return { name, status: CheckStatusEnum.FAIL, message: `Pipeline ${pipelineId} missing` };
        }

        await this.gateway.putPipeline(pipelineId, {
            description: `ELSER expansion of ${SEARCH_DEFAULTS.PIPELINE_INPUT_FIELD} into ${tokenField}`,
            modelId,
            inputField: SEARCH_DEFAULTS.PIPELINE_INPUT_FIELD,
            outputField: tokenField,
        });
        return {
            name,
            status: CheckStatusEnum.OK,
            message: `Pipeline ${pipelineId} present`,
            actions: [`wrote pipeline ${pipelineId}`],
        };
    }

    private async checkIndex(fix: boolean, recreate: boolean): Promise<StackCheck> {
        const { index, tokenField, queryMode, pipelineId } = this.config.search;
        const name = STACK_CHECKS.INDEX;
        const expected = tokenFieldTypeFor(queryMode);
        const actions: string[] = [];

        let exists = await this.gateway.indexExists(index);

        if (exists && fix && recreate) {
            await this.gateway.deleteIndex(index);
            actions.push(`deleted index ${index}`);
            exists = false;
        }

        if (!exists) {
            if (!fix) {
                return { name, status: CheckStatusEnum.FAIL, message: `Index ${index} does not exist` };
            }
            await this.gateway.createIndex(index, {
                tokenField,
                tokenFieldType: expected,
                pipeline: pipelineId,
            });
            actions.push(`created index ${index}`);
            return {
                name,
                status: CheckStatusEnum.OK,
                message: `Index ${index} maps ${tokenField} as ${expected}`,
                actions,
            };
        }

        const actual = await this.gateway.getFieldType(index, tokenField);
        if (actual === expected) {
            return { name, status: CheckStatusEnum.OK, message: `Index ${index} maps ${tokenField} as ${expected}` };
        }

        return {
            name,
            status: CheckStatusEnum.FAIL,
            message: `Index ${index} maps ${tokenField} as ${actual ?? 'nothing'}; expected ${expected} (use --fix --recreate-index)`,
        };
    }

    private async checkDocumentCount(): Promise<StackCheck> {
        const { index } = this.config.search;
        const name = STACK_CHECKS.DOCUMENT_COUNT;
        const count = await this.gateway.count(index);

        return count === 0
            ? { name, status: CheckStatusEnum.WARN, message: `Index ${index} is empty` }
            : { name, status: CheckStatusEnum.OK, message: `${count} documents in ${index}` };
    }

    private async checkOllama(): Promise<StackCheck> {
        const name = STACK_CHECKS.OLLAMA;
        const model = this.generation.model;
        const models = await this.generation.listModels();

        // Ollama lists untagged models with an explicit `:latest`
        const available = models.some(listed => listed === model || listed === `${model}:latest`);

        return available
            ? { name, status: CheckStatusEnum.OK, message: `Model ${model} available at ${this.generation.endpoint}` }
            : {
                name,
                status: CheckStatusEnum.WARN,
                message: `Model ${model} not pulled at ${this.generation.endpoint} (ollama pull ${model})`,
            };
    }

    private async checkDatabase(repository: IRecordRepository): Promise<StackCheck> {
        await repository.ping();
        return {
            name: STACK_CHECKS.DATABASE,
            status: CheckStatusEnum.OK,
            message: `Reachable at ${repository.endpoint}`,
        };
    }

    /**
     * Run a check, reporting a thrown error as a failed check
     */
    private async guard(name: string, check: () => Promise<StackCheck>): Promise<StackCheck> {
        try {
            return await check();
        } catch (error) {
            const message = toError(error).message;
            this.logger.warn('Stack check failed', { check: name, error: message });
            return { name, status: CheckStatusEnum.FAIL, message };
        }
    }
}
