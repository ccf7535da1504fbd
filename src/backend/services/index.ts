/**
 * Backend services
 *
 * Core components of one question/answer cycle:
 * - QueryProcessor: input gate, prompt template, fixed messages
 * - RetrievalBackend / VectorStore: one pre-built index per source
 * - BackendRegistry: the live backends, built once
 * - ContextAggregator: fan-out, truncation, labeled context block
 * - AnswerGenerator: the single completion call
 * - QASessionController: the cycle state machine
 */

export {
    validateQuery,
    renderPrompt,
    missingPromptSlots,
    formatErrorMessage,
    DEFAULT_PROMPT_TEMPLATE,
    PROMPT_FOR_INPUT_MESSAGE,
    NO_CONTEXT_MESSAGE,
} from './queryProcessor';

export type { ValidationResult, PromptSlots } from './queryProcessor';

export {
    InMemoryVectorStore,
    createVectorStore,
    cosineSimilarity,
} from './vectorStore';

export type { IVectorStore, IndexEntry, SearchResult } from './vectorStore';

export {
    VectorIndexBackend,
    openVectorIndexBackend,
    createVectorIndexOpener,
    parseIndexFile,
    INDEX_FILE_NAME,
} from './retrievalBackend';

export type { RetrievalBackend, BackendOpener, IndexFile } from './retrievalBackend';

export { BackendRegistry, RegistryHolder } from './backendRegistry';

export type { RegistryBuildResult, SourceLoadResult } from './backendRegistry';

export {
    assembleContext,
    truncateText,
    formatSnippet,
    DEFAULT_AGGREGATOR_CONFIG,
} from './contextAggregator';

export type {
    AggregatorConfig,
    AssembleContextOptions,
    AssembleResult,
} from './contextAggregator';

export { AnswerGenerator, createAnswerGenerator } from './answerGenerator';

export type { AnswerGeneratorConfig, IAnswerGenerator } from './answerGenerator';

export {
    QASessionController,
    createQASessionController,
    DEFAULT_SESSION_CONFIG,
} from './qaSessionController';

export type { QASessionConfig, QASessionDependencies } from './qaSessionController';
