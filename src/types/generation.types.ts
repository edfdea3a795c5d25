/**
 * Chat message sent to the generation endpoint
 */
export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface GenerationResult {
    text: string;
    model: string;
    durationMs: number;
}

/**
 * Text generation service (a local Ollama server)
 */
export interface IGenerationService {
    /** Base URL of the server, used in diagnostics */
    readonly endpoint: string;
    readonly model: string;

    /**
     * Generate one completion for the given messages
     * @throws GenerationError on connectivity, HTTP or response-shape failures
     */
    generate(messages: ChatMessage[]): Promise<GenerationResult>;

    /**
     * List the models available on the server
     * @throws GenerationError when the server cannot be reached
     */
    listModels(): Promise<string[]>;
}
