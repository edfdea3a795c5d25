import type { RetrievedDocument } from './search.types.js';

/**
 * Query Tool options
 */
export interface QueryOptions {
    question: string;
    /** Also generate a grounded answer */
    answer?: boolean;
    /** Top-K hits (default: configured) */
    size?: number;
    /** Cap on the context length sent to the model; 0 = no cap */
    contextChars?: number;
}

export type AnswerState =
    | { status: 'generated'; text: string; model: string }
    | { status: 'skipped'; reason: string }
    | { status: 'failed'; endpoint: string; error: string };

/**
 * Result of one Query Tool run
 */
export interface QueryOutcome {
    question: string;
    documents: RetrievedDocument[];
    /** Present only in answer mode */
    answer?: AnswerState;
}
