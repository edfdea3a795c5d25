import { z } from 'zod';
import type { ResolvedConfig } from '../types/config.types.js';
import type { ISearchGateway } from '../types/gateway.types.js';
import type {
    RetrievedDocument,
    SearchHit,
    SearchOptions,
    SearchResponse,
} from '../types/search.types.js';
import { SEARCH_DEFAULTS } from '../config/constants.js';
import { buildSearchQuery } from '../services/elasticsearch.gateway.js';
import { getRetryOptions, withRetry } from '../utils/retry.js';
import type { Logger } from '../utils/logger.js';

// Fields parse independently; a malformed one becomes undefined
const scalarField = z.union([z.string(), z.number()]).nullish().catch(undefined);

// Any field may hold an array of values
const textField = z
    .union([z.string(), z.array(z.string()).transform(parts => parts.join(' '))])
    .nullish()
    .catch(undefined);

const hitSourceSchema = z.object({
    id: scalarField,
    title: textField,
    body: textField,
    content: textField,
    updated_at: scalarField,
});

type HitSource = z.infer<typeof hitSourceSchema>;

const EMPTY_SOURCE: HitSource = {};

/**
 * Map a raw hit to a document; `body` falls back to `content`
 */
export function toRetrievedDocument(hit: SearchHit): RetrievedDocument {
    const parsed = hitSourceSchema.safeParse(hit.source ?? {});
    const source = parsed.success ? parsed.data : EMPTY_SOURCE;

    const id = source.id !== undefined && source.id !== null ? String(source.id) : hit.id;
    const updatedAt = source.updated_at !== undefined && source.updated_at !== null
        ? String(source.updated_at)
        : undefined;

    return {
        id,
        title: source.title ?? '',
        body: source.body || source.content || '',
        score: hit.score ?? 0,
        ...(updatedAt !== undefined ? { updatedAt } : {}),
    };
}

/**
 * Retrieval engine: one semantic search request per question
 */
export class RetrievalEngine {
    constructor(
        private readonly config: ResolvedConfig,
        private readonly gateway: ISearchGateway,
        private readonly logger: Logger
    ) { }

    async search(options: SearchOptions): Promise<RetrievedDocument[]> {
        const response = await this.searchWithMetadata(options);
        return response.documents;
    }

    /**
     * Search and return timing and hit totals alongside the documents
     * @throws SearchError when the index cannot be queried
     */
    async searchWithMetadata(options: SearchOptions): Promise<SearchResponse> {
        const startTime = Date.now();
        const { index, queryMode } = this.config.search;
        const size = options.size ?? this.config.query.size;

        this.logger.debug('Starting search', {
            query: options.query.substring(0, 50),
            index,
            mode: queryMode,
            size,
        });

        const hits = await withRetry(
            () => this.gateway.search({
                index,
                size,
                query: buildSearchQuery(queryMode, this.config.search, options.query),
                sourceFields: [...SEARCH_DEFAULTS.SOURCE_FIELDS],
            }),
            getRetryOptions(this.config.retry, (attempt, error, delayMs) => {
                this.logger.warn('Search failed, retrying', {
                    attempt,
                    delayMs: Math.round(delayMs),
                    endpoint: this.gateway.endpoint,
                    error: error.message,
                });
            })
        );

        const documents = hits.hits.map(toRetrievedDocument);
        const processingTimeMs = Date.now() - startTime;

        this.logger.info('Search completed', {
            index,
            hits: documents.length,
            totalHits: hits.totalHits,
            processingTimeMs,
        });

        return {
            documents,
            metadata: {
                index,
                mode: queryMode,
                totalHits: hits.totalHits,
                ...(hits.tookMs !== undefined ? { tookMs: hits.tookMs } : {}),
                processingTimeMs,
            },
        };
    }
}
