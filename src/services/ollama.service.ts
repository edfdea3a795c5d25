import { z } from 'zod';
import type { GenerationConfig } from '../types/config.types.js';
import type {
    ChatMessage,
    GenerationResult,
    IGenerationService,
} from '../types/generation.types.js';
import { GenerationError, toError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';

const chatResponseSchema = z.object({
    model: z.string().optional(),
    message: z.object({
        role: z.string().optional(),
        content: z.string(),
    }),
});

const tagsResponseSchema = z.object({
    models: z.array(z.object({ name: z.string() })).default([]),
});

/**
 * Client for a local Ollama server (`/api/chat`, `/api/tags`)
 */
export class OllamaGenerationService implements IGenerationService {
    readonly endpoint: string;
    readonly model: string;
    private readonly timeoutMs: number;
    private readonly temperature?: number;

    constructor(
        config: GenerationConfig,
        private readonly logger: Logger
    ) {
        this.endpoint = config.host.replace(/\/+$/, '');
        this.model = config.model;
        this.timeoutMs = config.timeoutMs;
        this.temperature = config.temperature;
    }

    async generate(messages: ChatMessage[]): Promise<GenerationResult> {
        const startTime = Date.now();
        const url = `${this.endpoint}/api/chat`;

        this.logger.debug('Requesting chat completion', {
            endpoint: this.endpoint,
            model: this.model,
            messages: messages.length,
        });

        const payload = await this.request(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({
                model: this.model,
                messages,
                stream: false,
                ...(this.temperature !== undefined ? { options: { temperature: this.temperature } } : {}),
            }),
        });

        const parsed = chatResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new GenerationError(`Malformed reply from ${url}: missing message.content`, {
                endpoint: this.endpoint,
                details: { issues: parsed.error.issues.map(issue => issue.path.join('.')) },
            });
        }

        const durationMs = Date.now() - startTime;
        this.logger.info('Answer generated', { model: this.model, durationMs });

        return {
            text: parsed.data.message.content.trim(),
            model: parsed.data.model ?? this.model,
            durationMs,
        };
    }

    async listModels(): Promise<string[]> {
        const url = `${this.endpoint}/api/tags`;
        const payload = await this.request(url, { method: 'GET' });

        const parsed = tagsResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new GenerationError(`Malformed reply from ${url}`, { endpoint: this.endpoint });
        }
        return parsed.data.models.map(model => model.name);
    }

    /**
     * Send a request and decode the JSON body.
     * @throws GenerationError for transport failures, timeouts and HTTP errors
     */
    private async request(url: string, init: RequestInit): Promise<unknown> {
        let response: Response;
        try {
            response = await fetch(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
        } catch (error) {
            const cause = toError(error);
            const timedOut = cause.name === 'TimeoutError' || cause.name === 'AbortError';
            throw new GenerationError(
                timedOut
                    ? `Request to ${url} timed out after ${this.timeoutMs}ms`
                    : `Cannot reach ${url}: ${cause.message}`,
                { endpoint: this.endpoint, retryable: true, cause, operation: url }
            );
        }

        if (!response.ok) {
            const text = await response.text().catch(() => '');
            throw new GenerationError(
                `HTTP ${response.status} from ${url}${text ? `: ${text.slice(0, 200)}` : ''}`,
                {
                    endpoint: this.endpoint,
                    statusCode: response.status,
                    retryable: response.status >= 500 || response.status === 429,
                }
            );
        }

        try {
            return await response.json();
        } catch (error) {
            throw new GenerationError(`Invalid JSON from ${url}: ${toError(error).message}`, {
                endpoint: this.endpoint,
            });
        }
    }
}
