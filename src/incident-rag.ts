import type { ResolvedConfig } from './types/config.types.js';
import type { LoadOptions, LoadResult } from './types/loader.types.js';
import type { SearchOptions, SearchResponse } from './types/search.types.js';
import type { QueryOptions, QueryOutcome } from './types/query.types.js';
import type { InspectOptions, StackReport } from './types/stack.types.js';
import type { ISearchGateway, ReindexSummary } from './types/gateway.types.js';
import type { IRecordRepository } from './types/repository.types.js';
import { ValidationError } from './errors/index.js';
import type { Logger } from './utils/logger.js';
import type { LoaderEngine } from './engines/loader.engine.js';
import type { RetrievalEngine } from './engines/retrieval.engine.js';
import type { QueryEngine } from './engines/query.engine.js';
import type { StackInspector } from './services/stack-inspector.service.js';

export interface ReindexOptions {
    /** Index to copy from */
    source: string;
    /** Destination index (default: configured index) */
    dest?: string;
    /** Ingest pipeline (default: configured pipeline) */
    pipeline?: string;
}

/**
 * Wired components of an IncidentRAG instance
 */
export interface IncidentRAGDependencies {
    logger: Logger;
    loaderEngine: LoaderEngine;
    retrievalEngine: RetrievalEngine;
    queryEngine: QueryEngine;
    stackInspector: StackInspector;
    gateway: ISearchGateway;
    repository: IRecordRepository;
}

/**
 * Incident RAG facade: Loader, Query Tool, stack doctor and reindex
 *
 * @example
 * ```typescript
 * import { createIncidentRAG } from 'incident-rag';
 *
 * const rag = createIncidentRAG({ search: { index: 'incidents_elser' } });
 * try {
 *     await rag.load({ file: 'incidents.xlsx' });
 *     const outcome = await rag.query({ question: 'disk full on db host', answer: true });
 * } finally {
 *     await rag.close();
 * }
 * ```
 */
export class IncidentRAG {
    private readonly logger: Logger;
    private readonly loaderEngine: LoaderEngine;
    private readonly retrievalEngine: RetrievalEngine;
    private readonly queryEngine: QueryEngine;
    private readonly stackInspector: StackInspector;
    private readonly gateway: ISearchGateway;
    private readonly repository: IRecordRepository;

    constructor(
        private readonly config: ResolvedConfig,
        dependencies: IncidentRAGDependencies
    ) {
        this.logger = dependencies.logger;
        this.loaderEngine = dependencies.loaderEngine;
        this.retrievalEngine = dependencies.retrievalEngine;
        this.queryEngine = dependencies.queryEngine;
        this.stackInspector = dependencies.stackInspector;
        this.gateway = dependencies.gateway;
        this.repository = dependencies.repository;
    }

    /**
     * Resolved configuration (read-only)
     */
    getConfig(): Readonly<ResolvedConfig> {
        return this.config;
    }

    // ============================================
    // LOADER
    // ============================================

    /**
     * Upsert the rows of a spreadsheet into the destination table
     */
    async load(options: LoadOptions): Promise<LoadResult> {
        return this.loaderEngine.load(options);
    }

    // ============================================
    // QUERY TOOL
    // ============================================

    /**
     * Retrieve documents for a question, without generation
     */
    async search(options: SearchOptions): Promise<SearchResponse> {
        return this.retrievalEngine.searchWithMetadata(options);
    }

    /**
     * Retrieve documents and, in answer mode, generate a grounded answer
     */
    async query(options: QueryOptions): Promise<QueryOutcome> {
        return this.queryEngine.run(options);
    }

    // ============================================
    // STACK
    // ============================================

    /**
     * Check (and with `fix`, repair) the search stack
     */
    async inspectStack(options: InspectOptions = {}): Promise<StackReport> {
        return this.stackInspector.inspect(options);
    }

    /**
     * Copy an index into the configured index through the ingest pipeline
     */
    async reindex(options: ReindexOptions): Promise<ReindexSummary> {
        const dest = options.dest ?? this.config.search.index;
        const pipeline = options.pipeline ?? this.config.search.pipelineId;

        if (!options.source.trim()) {
            throw new ValidationError('Source index must not be empty', 'source');
        }
        if (options.source === dest) {
            throw new ValidationError(`Source and destination are both "${dest}"`, 'dest');
        }

        this.logger.info('Reindexing', { source: options.source, dest, pipeline });
        const summary = await this.gateway.reindex({ source: options.source, dest, pipeline });
        this.logger.info('Reindex completed', { ...summary });
        return summary;
    }

    /**
     * Release store and index connections
     */
    async close(): Promise<void> {
        await Promise.all([this.repository.close(), this.gateway.close()]);
    }
}
