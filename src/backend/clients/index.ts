/**
 * External service clients
 *
 * Wrappers for external service communication:
 * - OpenAICompletionClient: completions and query embeddings over an OpenAI-compatible API
 */

export {
    OpenAICompletionClient,
    createCompletionClient,
    extractCompletionText,
    extractEmbedding,
    CompletionError,
    CompletionErrorCode,
    DEFAULT_COMPLETION_CONFIG,
    type CompletionClientConfig,
    type EmbeddingProvider,
    type ICompletionClient,
} from './completionClient';
