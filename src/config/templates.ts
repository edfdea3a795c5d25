/**
 * Prompt templates for grounded answers
 */

export const ANSWER_SYSTEM_PROMPT =
    'You are a precise assistant. Use ONLY the provided CONTEXT to answer. ' +
    "If the answer is not in the context, say you don't have enough information.";

export const ANSWER_INSTRUCTIONS =
    'Return a concise answer. If multiple incidents apply, use bullet points.';

/**
 * User message: context block, the question verbatim, then instructions
 */
export function buildAnswerUserMessage(context: string, question: string): string {
    return `CONTEXT:\n${context}\n\nQUESTION:\n${question}\n\n${ANSWER_INSTRUCTIONS}`;
}
