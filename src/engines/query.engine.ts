import type { ResolvedConfig } from '../types/config.types.js';
import type { IGenerationService } from '../types/generation.types.js';
import type { AnswerState, QueryOptions, QueryOutcome } from '../types/query.types.js';
import type { RetrievedDocument } from '../types/search.types.js';
import { AnswerStatusEnum } from '../types/enums.js';
import { ValidationError, toError } from '../errors/index.js';
import { buildAnswerMessages } from '../utils/context-builder.js';
import type { Logger } from '../utils/logger.js';
import type { RetrievalEngine } from './retrieval.engine.js';

/**
 * Query Tool: retrieve, then optionally answer from the retrieved documents.
 *
 * A search failure propagates. A generation failure does not: the outcome
 * carries the documents plus a `failed` answer state.
 */
export class QueryEngine {
    constructor(
        private readonly config: ResolvedConfig,
        private readonly retrieval: RetrievalEngine,
        private readonly generation: IGenerationService,
        private readonly logger: Logger
    ) { }

    async run(options: QueryOptions): Promise<QueryOutcome> {
        const question = options.question;
        if (!question.trim()) {
            throw new ValidationError('Question must not be empty', 'question');
        }

        const documents = await this.retrieval.search({ query: question, size: options.size });

        if (!options.answer) {
            return { question, documents };
        }

        return {
            question,
            documents,
            answer: await this.answer(question, documents, options.contextChars),
        };
    }

    private async answer(
        question: string,
        documents: RetrievedDocument[],
        contextChars = this.config.query.contextChars
    ): Promise<AnswerState> {
        if (documents.length === 0) {
            this.logger.info('No documents retrieved, answer generation skipped');
            return { status: AnswerStatusEnum.SKIPPED, reason: 'No matching documents' };
        }

        const messages = buildAnswerMessages(question, documents, contextChars);

        try {
            const result = await this.generation.generate(messages);
            return { status: AnswerStatusEnum.GENERATED, text: result.text, model: result.model };
        } catch (error) {
            const message = toError(error).message;
            this.logger.warn('Answer generation failed, showing retrieval results only', {
                endpoint: this.generation.endpoint,
                error: message,
            });
            return { status: AnswerStatusEnum.FAILED, endpoint: this.generation.endpoint, error: message };
        }
    }
}
