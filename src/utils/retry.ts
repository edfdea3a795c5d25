import type { RetryConfig } from '../types/config.types.js';
import { toError } from '../errors/index.js';
import { RETRYABLE_ERROR_PATTERNS } from '../config/constants.js';

export interface RetryOptions {
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
    retryableErrors?: string[];
    onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Retry options from the retry config
 */
export function getRetryOptions(
    retryConfig: RetryConfig,
    onRetry?: RetryOptions['onRetry']
): RetryOptions {
    return {
        maxRetries: retryConfig.maxRetries,
        initialDelayMs: retryConfig.initialDelayMs,
        maxDelayMs: retryConfig.maxDelayMs,
        backoffMultiplier: retryConfig.backoffMultiplier,
        retryableErrors: [...RETRYABLE_ERROR_PATTERNS],
        onRetry,
    };
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: Error, retryableErrors: string[] = []): boolean {
    // Errors that know their own transience decide for themselves
    if ('retryable' in error && typeof error.retryable === 'boolean') {
        return error.retryable;
    }

    const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
    const errorString = `${error.message} ${error.name} ${code}`;

    return retryableErrors.some(pattern => errorString.includes(pattern));
}

/**
 * Calculate delay with exponential backoff
 */
export function calculateBackoffDelay(
    attempt: number,
    initialDelayMs: number,
    backoffMultiplier: number,
    maxDelayMs: number
): number {
    const delay = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
    // Add jitter (±10%)
    const jitter = delay * 0.1 * (Math.random() * 2 - 1);
    return Math.min(delay + jitter, maxDelayMs);
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions
): Promise<T> {
    let lastError: Error = new Error('withRetry made no attempt');

    for (let attempt = 1; attempt <= options.maxRetries + 1; attempt++) {
        try {
            return await fn();
        } catch (error) {
            lastError = toError(error);

            if (attempt > options.maxRetries) {
                break;
            }

            if (!isRetryableError(lastError, options.retryableErrors)) {
                throw lastError;
            }

            const delayMs = calculateBackoffDelay(
                attempt,
                options.initialDelayMs,
                options.backoffMultiplier,
                options.maxDelayMs
            );

            options.onRetry?.(attempt, lastError, delayMs);

            await sleep(delayMs);
        }
    }

    throw lastError;
}
