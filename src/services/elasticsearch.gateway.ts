import { Client, errors } from '@elastic/elasticsearch';
import type { estypes } from '@elastic/elasticsearch';
import { z } from 'zod';
import type { SearchConfig } from '../types/config.types.js';
import type {
    ClusterInfo,
    ISearchGateway,
    IndexDefinition,
    PipelineDefinition,
    ReindexRequest,
    ReindexSummary,
    TokenFieldType,
} from '../types/gateway.types.js';
import type { QueryMode, SearchHits, SearchRequest } from '../types/search.types.js';
import { QueryModeEnum } from '../types/enums.js';
import { SEARCH_DEFAULTS } from '../config/constants.js';
import { SearchError, toError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';

const RETRYABLE_STATUS_CODES = new Set([429, 502, 503, 504]);

/**
 * Create an Elasticsearch client with basic auth
 */
export function createSearchClient(config: SearchConfig): Client {
    return new Client({
        node: config.node,
        auth: { username: config.username, password: config.password },
        requestTimeout: config.requestTimeoutMs,
    });
}

/**
 * Node URL without credentials, for messages and logs
 */
export function redactEndpoint(node: string): string {
    try {
        const url = new URL(node);
        url.username = '';
        url.password = '';
        return url.toString().replace(/\/$/, '');
    } catch {
        return node;
    }
}

/**
 * Build the query for the configured request shape
 */
export function buildSearchQuery(
    mode: QueryMode,
    config: Pick<SearchConfig, 'modelId' | 'tokenField'>,
    question: string
): estypes.QueryDslQueryContainer {
    switch (mode) {
        case QueryModeEnum.SPARSE_VECTOR:
            return {
                sparse_vector: {
                    field: config.tokenField,
                    inference_id: config.modelId,
                    query: question,
                },
            };
        case QueryModeEnum.MATCH:
            return {
                multi_match: {
                    query: question,
                    fields: [...SEARCH_DEFAULTS.MATCH_FIELDS],
                },
            };
        case QueryModeEnum.TEXT_EXPANSION:
        default:
            return {
                text_expansion: {
                    [config.tokenField]: {
                        model_id: config.modelId,
                        model_text: question,
                    },
                },
            };
    }
}

/**
 * Nest a dotted field path into object mappings (`ml.tokens` -> ml.properties.tokens)
 */
function nestProperty(
    path: string,
    leaf: estypes.MappingProperty
): Record<string, estypes.MappingProperty> {
    const [head, ...rest] = path.split('.');
    if (!head) {
        return {};
    }
    if (rest.length === 0) {
        return { [head]: leaf };
    }
    return {
        [head]: {
            type: 'object',
            properties: nestProperty(rest.join('.'), leaf),
        },
    };
}

function tokenFieldMapping(type: TokenFieldType): estypes.MappingProperty {
    return type === 'sparse_vector' ? { type: 'sparse_vector' } : { type: 'rank_features' };
}

/**
 * Mappings for incident records plus the expanded token field
 */
export function buildIndexMappings(definition: IndexDefinition): estypes.MappingTypeMapping {
    return {
        properties: {
            id: { type: 'keyword' },
            title: { type: 'text' },
            body: { type: 'text' },
            content: { type: 'text' },
            updated_at: { type: 'date' },
            ...nestProperty(definition.tokenField, tokenFieldMapping(definition.tokenFieldType)),
        },
    };
}

const fieldMappingResponseSchema = z.record(
    z.object({
        mappings: z.record(
            z.object({
                full_name: z.string().optional(),
                mapping: z.record(z.object({ type: z.string().optional() }).passthrough()),
            })
        ),
    })
);

/**
 * Mapping type of `field` from a get-field-mapping response
 */
export function parseFieldType(response: unknown, field: string): string | undefined {
    const parsed = fieldMappingResponseSchema.safeParse(response);
    if (!parsed.success) {
        return undefined;
    }

    const leafName = field.split('.').pop() ?? field;
    for (const entry of Object.values(parsed.data)) {
        const type = entry.mappings[field]?.mapping[leafName]?.type;
        if (type) {
            return type;
        }
    }
    return undefined;
}

function isNotFound(error: unknown): boolean {
    return error instanceof errors.ResponseError && error.statusCode === 404;
}

function isConflict(error: unknown): boolean {
    return error instanceof errors.ResponseError && error.statusCode === 409;
}

/**
 * Translate a client failure into a SearchError naming the endpoint
 */
export function toSearchError(error: unknown, endpoint: string, operation: string): SearchError {
    if (error instanceof SearchError) {
        return error;
    }

    const cause = toError(error);

    if (error instanceof errors.ResponseError) {
        const statusCode = error.statusCode;
        return new SearchError(`${operation} failed at ${endpoint} (HTTP ${statusCode ?? 'n/a'}): ${cause.message}`, {
            endpoint,
            statusCode,
            retryable: statusCode !== undefined && RETRYABLE_STATUS_CODES.has(statusCode),
            cause,
            operation,
        });
    }

    const transient =
        error instanceof errors.ConnectionError ||
        error instanceof errors.TimeoutError ||
        error instanceof errors.NoLivingConnectionsError;

    return new SearchError(`${operation} failed at ${endpoint}: ${cause.message}`, {
        endpoint,
        retryable: transient,
        cause,
        operation,
    });
}

/**
 * Elasticsearch-backed search gateway
 *
 * Covers the search request of the Query Tool and the cluster
 * administration used by the stack doctor and reindex.
 */
export class ElasticsearchGateway implements ISearchGateway {
    readonly endpoint: string;

    constructor(
        private readonly client: Client,
        node: string,
        private readonly logger: Logger
    ) {
        this.endpoint = redactEndpoint(node);
    }

    async info(): Promise<ClusterInfo> {
        const response = await this.call('Cluster info', () => this.client.info());
        return {
            clusterName: response.cluster_name,
            version: response.version.number,
        };
    }

    async search(request: SearchRequest): Promise<SearchHits> {
        const response = await this.call(`Search on index "${request.index}"`, () =>
            this.client.search({
                index: request.index,
                size: request.size,
                query: request.query,
                _source: request.sourceFields,
            })
        );

        const total = response.hits.total;
        const totalHits = typeof total === 'number' ? total : total?.value ?? response.hits.hits.length;

        return {
            hits: response.hits.hits.map(hit => ({
                id: hit._id ?? '',
                score: hit._score ?? null,
                source: hit._source,
            })),
            totalHits,
            tookMs: response.took,
        };
    }

    async hasTrainedModel(modelId: string): Promise<boolean> {
        try {
            const response = await this.client.ml.getTrainedModels({ model_id: modelId });
            return response.count > 0;
        } catch (error) {
            if (isNotFound(error)) {
                return false;
            }
            throw toSearchError(error, this.endpoint, `Trained model lookup "${modelId}"`);
        }
    }

    async installElserModel(modelId: string): Promise<void> {
        this.logger.info('Installing ELSER model', { modelId, endpoint: this.endpoint });
        await this.call(`Model install "${modelId}"`, () =>
            this.client.ml.putTrainedModel({
                model_id: modelId,
                input: { field_names: ['text_field'] },
            })
        );
    }

    async getDeploymentState(modelId: string): Promise<string | undefined> {
        try {
            const response = await this.client.ml.getTrainedModelsStats({ model_id: modelId });
            return response.trained_model_stats[0]?.deployment_stats?.state;
        } catch (error) {
            if (isNotFound(error)) {
                return undefined;
            }
            throw toSearchError(error, this.endpoint, `Deployment stats "${modelId}"`);
        }
    }

    async startDeployment(modelId: string): Promise<void> {
        try {
            await this.client.ml.startTrainedModelDeployment({ model_id: modelId });
        } catch (error) {
            // Already started or starting
            if (isConflict(error)) {
                this.logger.debug('Deployment already exists', { modelId });
                return;
            }
            throw toSearchError(error, this.endpoint, `Deployment start "${modelId}"`);
        }
    }

    async hasPipeline(id: string): Promise<boolean> {
        try {
            await this.client.ingest.getPipeline({ id });
            return true;
        } catch (error) {
            if (isNotFound(error)) {
                return false;
            }
            throw toSearchError(error, this.endpoint, `Pipeline lookup "${id}"`);
        }
    }

    async putPipeline(id: string, definition: PipelineDefinition): Promise<void> {
        await this.call(`Pipeline write "${id}"`, () =>
            this.client.ingest.putPipeline({
                id,
                description: definition.description,
                processors: [
                    {
                        inference: {
                            model_id: definition.modelId,
                            input_output: [
                                {
                                    input_field: definition.inputField,
                                    output_field: definition.outputField,
                                },
                            ],
                        },
                    },
                ],
            })
        );
    }

    async indexExists(index: string): Promise<boolean> {
        return this.call(`Index lookup "${index}"`, () => this.client.indices.exists({ index }));
    }

    async getFieldType(index: string, field: string): Promise<string | undefined> {
        const response = await this.call(`Field mapping "${index}/${field}"`, () =>
            this.client.indices.getFieldMapping({ index, fields: field })
        );
        return parseFieldType(response, field);
    }

    async createIndex(index: string, definition: IndexDefinition): Promise<void> {
        await this.call(`Index create "${index}"`, () =>
            this.client.indices.create({
                index,
                mappings: buildIndexMappings(definition),
                ...(definition.pipeline
                    ? { settings: { index: { default_pipeline: definition.pipeline } } }
                    : {}),
            })
        );
    }

    async deleteIndex(index: string): Promise<void> {
        try {
            await this.client.indices.delete({ index });
        } catch (error) {
            if (isNotFound(error)) {
                return;
            }
            throw toSearchError(error, this.endpoint, `Index delete "${index}"`);
        }
    }

    async count(index: string): Promise<number> {
        const response = await this.call(`Count on index "${index}"`, () => this.client.count({ index }));
        return response.count;
    }

    async reindex(request: ReindexRequest): Promise<ReindexSummary> {
        const response = await this.call(`Reindex "${request.source}" -> "${request.dest}"`, () =>
            this.client.reindex({
                source: { index: request.source },
                dest: {
                    index: request.dest,
                    ...(request.pipeline ? { pipeline: request.pipeline } : {}),
                },
                wait_for_completion: true,
                refresh: true,
            })
        );

        return {
            source: request.source,
            dest: request.dest,
            total: response.total ?? 0,
            created: response.created ?? 0,
            updated: response.updated ?? 0,
            failures: response.failures?.length ?? 0,
            tookMs: response.took ?? 0,
        };
    }

    async close(): Promise<void> {
        await this.client.close();
    }

    private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            const mapped = toSearchError(error, this.endpoint, operation);
            this.logger.debug('Elasticsearch request failed', {
                operation,
                endpoint: this.endpoint,
                statusCode: mapped.statusCode,
            });
            throw mapped;
        }
    }
}
