/**
 * Completion Client
 *
 * Wrapper for an OpenAI-compatible REST API. It covers the two remote
 * capabilities the pipeline needs: one chat completion per question and
 * query embeddings for the vector indexes.
 *
 * - Adapter over the remote API: callers only see our interface
 * - fetch() with an AbortController timeout, no retries
 * - Every failure is turned into a CompletionError with a code
 *
 * Endpoints used:
 * - GET /models - lightweight reachability check
 * - POST /chat/completions - text generation
 * - POST /embeddings - query embeddings
 */

import { GenerationOptions } from '../../shared/types';

/**
 * Configuration for the completion client.
 */
export interface CompletionClientConfig {
    /** API root, without trailing slash */
    baseUrl: string;
    /** Bearer credential */
    apiKey: string;
    /** Default model for text generation */
    defaultModel: string;
    /** Model used for query embeddings */
    embeddingModel: string;
    /** Default sampling temperature */
    temperature: number;
    /** Optional bound on generated tokens */
    maxTokens?: number;
    /** Request timeout in milliseconds */
    timeoutMs: number;
}

export const DEFAULT_COMPLETION_CONFIG: CompletionClientConfig = {
    baseUrl: 'https://api.openai.com/v1',
    apiKey: '',
    defaultModel: 'gpt-4o',
    embeddingModel: 'text-embedding-ada-002',
    temperature: 0,
    timeoutMs: 30000,
};

/**
 * Error codes for different failure scenarios.
 */
export enum CompletionErrorCode {
    /** API host is unreachable */
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    /** Request took too long */
    TIMEOUT = 'TIMEOUT',
    /** Caller abandoned the request */
    ABORTED = 'ABORTED',
    /** Credential rejected */
    AUTH_FAILED = 'AUTH_FAILED',
    /** Too many requests */
    RATE_LIMITED = 'RATE_LIMITED',
    /** Requested model is not available */
    MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
    /** API returned an error response */
    API_ERROR = 'API_ERROR',
    /** 2xx response without the expected payload */
    MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
    /** Unexpected error during communication */
    UNKNOWN = 'UNKNOWN',
}

export class CompletionError extends Error {
    constructor(
        message: string,
        public readonly code: CompletionErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'CompletionError';
    }
}

/**
 * Produces the embedding vector for a query string.
 * This is what a vector index backend needs to search itself.
 */
export interface EmbeddingProvider {
    generateEmbedding(text: string, signal?: AbortSignal): Promise<number[]>;
}

/**
 * The completion client contract.
 * Tests substitute an in-process fake implementing this interface.
 */
export interface ICompletionClient extends EmbeddingProvider {
    isAvailable(): Promise<boolean>;
    generateCompletion(prompt: string, options?: GenerationOptions): Promise<string>;
}

export class OpenAICompletionClient implements ICompletionClient {
    private readonly config: CompletionClientConfig;

    constructor(config: Partial<CompletionClientConfig> = {}) {
        this.config = { ...DEFAULT_COMPLETION_CONFIG, ...config };
        this.config.baseUrl = this.config.baseUrl.replace(/\/+$/, '');
    }

    /**
     * Check if the API is reachable and accepts our credential.
     *
     * Used by the /api/health endpoint. Never throws.
     */
    async isAvailable(): Promise<boolean> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/models`,
                {
                    method: 'GET',
                    headers: this.headers(),
                },
                5000 // Short timeout for health checks
            );
            return response.ok;
        } catch {
            return false;
        }
    }

    /**
     * Generate a completion for a fully rendered prompt.
     *
     * The prompt is sent as a single user message. No streaming: the
     * whole answer comes back in one response.
     *
     * @throws CompletionError if generation fails
     */
    async generateCompletion(
        prompt: string,
        options: GenerationOptions = {}
    ): Promise<string> {
        const model = options.model ?? this.config.defaultModel;
        const maxTokens = options.maxTokens ?? this.config.maxTokens;

        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/chat/completions`,
                {
                    method: 'POST',
                    headers: this.headers(),
                    body: JSON.stringify({
                        model,
                        messages: [{ role: 'user', content: prompt }],
                        temperature: options.temperature ?? this.config.temperature,
                        ...(maxTokens !== undefined ? { max_tokens: maxTokens } : {}),
                    }),
                },
                this.config.timeoutMs,
                options.signal
            );

            if (!response.ok) {
                await this.handleErrorResponse(response, model);
            }

            return extractCompletionText(await response.json());
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate completion');
        }
    }

    /**
     * Generate an embedding vector for the given text.
     *
     * @throws CompletionError if embedding generation fails
     */
    async generateEmbedding(text: string, signal?: AbortSignal): Promise<number[]> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/embeddings`,
                {
                    method: 'POST',
                    headers: this.headers(),
                    body: JSON.stringify({
                        model: this.config.embeddingModel,
                        input: text,
                    }),
                },
                this.config.timeoutMs,
                signal
            );

            if (!response.ok) {
                await this.handleErrorResponse(response, this.config.embeddingModel);
            }

            return extractEmbedding(await response.json());
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate embedding');
        }
    }

    private headers(): Record<string, string> {
        return {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.config.apiKey}`,
        };
    }

    /**
     * Fetch with a timeout, optionally tied to a caller's signal.
     *
     * The caller's signal lets a superseded cycle drop its in-flight call.
     */
    private async fetchWithTimeout(
        url: string,
        options: RequestInit,
        timeoutMs: number,
        signal?: AbortSignal
    ): Promise<Response> {
        if (signal?.aborted) {
            throw new CompletionError('Request aborted', CompletionErrorCode.ABORTED);
        }

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
        const onAbort = () => controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            return await fetch(url, {
                ...options,
                signal: controller.signal,
            });
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                if (signal?.aborted) {
                    throw new CompletionError('Request aborted', CompletionErrorCode.ABORTED);
                }
                throw new CompletionError(
                    `Request timed out after ${timeoutMs}ms`,
                    CompletionErrorCode.TIMEOUT
                );
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', onAbort);
        }
    }

    /**
     * Handle non-OK HTTP responses.
     *
     * - 401/403: credential rejected
     * - 404: unknown model
     * - 429: rate limited
     * - Others: generic API error
     */
    private async handleErrorResponse(response: Response, model: string): Promise<never> {
        let errorMessage: string;

        try {
            errorMessage = readApiErrorMessage(await response.json()) ?? `HTTP ${response.status}`;
        } catch {
            errorMessage = `HTTP ${response.status}: ${response.statusText}`;
        }

        switch (response.status) {
            case 401:
            case 403:
                throw new CompletionError(
                    `Authentication failed: ${errorMessage}`,
                    CompletionErrorCode.AUTH_FAILED
                );
            case 404:
                throw new CompletionError(
                    `Model "${model}" not found: ${errorMessage}`,
                    CompletionErrorCode.MODEL_NOT_FOUND
                );
            case 429:
                throw new CompletionError(
                    `Rate limited: ${errorMessage}`,
                    CompletionErrorCode.RATE_LIMITED
                );
            default:
                throw new CompletionError(
                    `API error: ${errorMessage}`,
                    CompletionErrorCode.API_ERROR
                );
        }
    }

    /**
     * Wrap errors in CompletionError for consistent error handling.
     */
    private wrapError(error: unknown, context: string): CompletionError {
        if (error instanceof CompletionError) {
            return error;
        }

        // undici reports unreachable hosts as "TypeError: fetch failed"
        if (error instanceof TypeError && error.message.includes('fetch')) {
            return new CompletionError(
                `Cannot connect to ${this.config.baseUrl}`,
                CompletionErrorCode.CONNECTION_REFUSED,
                error
            );
        }

        const message = error instanceof Error ? error.message : String(error);
        return new CompletionError(
            `${context}: ${message}`,
            CompletionErrorCode.UNKNOWN,
            error instanceof Error ? error : undefined
        );
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Pull `choices[0].message.content` out of a chat completion body.
 */
export function extractCompletionText(body: unknown): string {
    const choices = isRecord(body) ? body.choices : undefined;
    const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
    const message = isRecord(first) ? first.message : undefined;
    const content = isRecord(message) ? message.content : undefined;

    if (typeof content !== 'string' || content.trim().length === 0) {
        throw new CompletionError(
            'Completion response did not contain any text',
            CompletionErrorCode.MALFORMED_RESPONSE
        );
    }
    return content;
}

/**
 * Pull `data[0].embedding` out of an embeddings body.
 */
export function extractEmbedding(body: unknown): number[] {
    const data = isRecord(body) ? body.data : undefined;
    const first: unknown = Array.isArray(data) ? data[0] : undefined;
    const embedding = isRecord(first) ? first.embedding : undefined;

    if (
        !Array.isArray(embedding) ||
        embedding.length === 0 ||
        !embedding.every((v): v is number => typeof v === 'number')
    ) {
        throw new CompletionError(
            'Embedding response did not contain a vector',
            CompletionErrorCode.MALFORMED_RESPONSE
        );
    }
    return embedding;
}

function readApiErrorMessage(body: unknown): string | undefined {
    if (!isRecord(body)) {
        return undefined;
    }
    const error = body.error;
    if (typeof error === 'string') {
        return error;
    }
    if (isRecord(error) && typeof error.message === 'string') {
        return error.message;
    }
    return undefined;
}

/**
 * Factory function to create a completion client.
 */
export function createCompletionClient(
    config?: Partial<CompletionClientConfig>
): OpenAICompletionClient {
    return new OpenAICompletionClient(config);
}
