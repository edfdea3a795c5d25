import type { RetrievedDocument } from '../types/search.types.js';
import type { ChatMessage } from '../types/generation.types.js';
import { ANSWER_SYSTEM_PROMPT, buildAnswerUserMessage } from '../config/templates.js';

/**
 * Render one retrieved document as a context block
 */
export function formatContextDocument(doc: RetrievedDocument, rank: number): string {
    return (
        `[Doc ${rank}] id=${doc.id} | score=${doc.score} | updated_at=${doc.updatedAt ?? 'n/a'}\n` +
        `TITLE: ${doc.title}\n` +
        `BODY: ${doc.body.trim()}\n`
    );
}

/**
 * Concatenate retrieved documents into grounding context.
 * With `maxChars` > 0 the result is cut to that length.
 */
export function buildContext(documents: RetrievedDocument[], maxChars = 0): string {
    const context = documents
        .map((doc, i) => formatContextDocument(doc, i + 1))
        .join('\n')
        .trim();

    return maxChars > 0 ? context.slice(0, maxChars) : context;
}

/**
 * Chat messages for a grounded answer
 */
export function buildAnswerMessages(
    question: string,
    documents: RetrievedDocument[],
    maxChars = 0
): ChatMessage[] {
    return [
        { role: 'system', content: ANSWER_SYSTEM_PROMPT },
        { role: 'user', content: buildAnswerUserMessage(buildContext(documents, maxChars), question) },
    ];
}
