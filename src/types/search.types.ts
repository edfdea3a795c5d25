import type { estypes } from '@elastic/elasticsearch';
import type { QueryModeEnumType } from './enums.js';

export type QueryMode = QueryModeEnumType;

/**
 * A ranked hit returned by the index
 */
export interface RetrievedDocument {
    id: string;
    title: string;
    /** Body text, falling back to the indexed `content` field */
    body: string;
    /** Relevance score (0 when the index returns none) */
    score: number;
    updatedAt?: string;
}

/**
 * Search options
 */
export interface SearchOptions {
    /** The question text */
    query: string;
    /** Maximum number of hits (default: configured top-K) */
    size?: number;
}

/**
 * Search response with metadata
 */
export interface SearchResponse {
    documents: RetrievedDocument[];
    metadata: {
        index: string;
        mode: QueryMode;
        totalHits: number;
        tookMs?: number;
        processingTimeMs: number;
    };
}

/**
 * Search request as sent to the gateway
 */
export interface SearchRequest {
    index: string;
    size: number;
    query: estypes.QueryDslQueryContainer;
    sourceFields: string[];
}

/**
 * Raw hit from the gateway, before mapping
 */
export interface SearchHit {
    id: string;
    score: number | null;
    source: unknown;
}

/**
 * Raw gateway response
 */
export interface SearchHits {
    hits: SearchHit[];
    totalHits: number;
    tookMs?: number;
}
