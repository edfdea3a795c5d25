import type { SearchHits, SearchRequest } from './search.types.js';

/**
 * Cluster identity returned by the root endpoint
 */
export interface ClusterInfo {
    clusterName: string;
    version: string;
}

/**
 * Mapping type used for the expanded token field
 */
export type TokenFieldType = 'rank_features' | 'sparse_vector';

/**
 * Ingest pipeline with a single ELSER inference processor
 */
export interface PipelineDefinition {
    description: string;
    modelId: string;
    /** Source text field (the record's `content`) */
    inputField: string;
    /** Token output field */
    outputField: string;
}

/**
 * Index definition for incident records
 */
export interface IndexDefinition {
    tokenField: string;
    tokenFieldType: TokenFieldType;
    /** Default ingest pipeline */
    pipeline?: string;
}

export interface ReindexRequest {
    source: string;
    dest: string;
    pipeline?: string;
}

export interface ReindexSummary {
    source: string;
    dest: string;
    total: number;
    created: number;
    updated: number;
    failures: number;
    tookMs: number;
}

/**
 * Search cluster operations used by retrieval, the stack doctor and reindex.
 * Implementations translate transport failures into SearchError.
 */
export interface ISearchGateway {
    /** Node URL, used in diagnostics */
    readonly endpoint: string;

    info(): Promise<ClusterInfo>;
    search(request: SearchRequest): Promise<SearchHits>;

    hasTrainedModel(modelId: string): Promise<boolean>;
    installElserModel(modelId: string): Promise<void>;
    /** Deployment state (`started`, `starting`, ...) or undefined when not deployed */
    getDeploymentState(modelId: string): Promise<string | undefined>;
    startDeployment(modelId: string): Promise<void>;

    hasPipeline(id: string): Promise<boolean>;
    putPipeline(id: string, definition: PipelineDefinition): Promise<void>;

    indexExists(index: string): Promise<boolean>;
    /** Mapping type of a field, or undefined when unmapped */
    getFieldType(index: string, field: string): Promise<string | undefined>;
    createIndex(index: string, definition: IndexDefinition): Promise<void>;
    deleteIndex(index: string): Promise<void>;
    count(index: string): Promise<number>;
    reindex(request: ReindexRequest): Promise<ReindexSummary>;

    /** Release client connections */
    close(): Promise<void>;
}
