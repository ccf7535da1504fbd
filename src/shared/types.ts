/**
 * Shared type definitions for the multi-source Q&A service
 *
 * These types define the contract between the HTTP layer and the services.
 * They're organized by domain:
 * - Retrieval: Snippets and source configuration
 * - Context: What the aggregator hands to the generator
 * - Cycle: Controller states and outcomes
 * - API: Request/response shapes
 */

// ============================================================================
// Retrieval Types
// ============================================================================

/**
 * Metadata attached to a retrieved snippet (origin URL, page number, ...).
 * Opaque to the pipeline; it is passed through untouched.
 */
export type SnippetMetadata = Record<string, string | number | boolean>;

/**
 * A retrieved unit of text.
 * Created by a backend in response to one query and discarded when the
 * cycle ends.
 */
export interface Snippet {
    readonly sourceName: string;
    readonly text: string;
    readonly metadata: SnippetMetadata;
}

/**
 * One configured data source: a unique name and where its index lives.
 */
export interface SourceConfig {
    name: string;
    location: string;
}

// ============================================================================
// Context Types
// ============================================================================

/**
 * The bounded, labeled concatenation of snippets for one question.
 */
export interface AggregatedContext {
    /** Formatted text handed to the prompt template */
    text: string;
    /** Snippets that made it into the text, already truncated */
    snippets: Snippet[];
    /** Names of sources that contributed at least one snippet, registry order */
    sources: string[];
}

/**
 * A source whose query failed during one cycle.
 */
export interface SourceFailure {
    sourceName: string;
    message: string;
}

// ============================================================================
// Cycle Types
// ============================================================================

/**
 * States of one question/answer cycle.
 * - idle: nothing asked yet
 * - awaiting-input: last submission was empty, waiting for a real question
 * - retrieving / generating: work in flight
 * - no-context / done / errored: terminal for the cycle
 */
export type CycleState =
    | 'idle'
    | 'awaiting-input'
    | 'retrieving'
    | 'no-context'
    | 'generating'
    | 'done'
    | 'errored';

/**
 * Result of one cycle, as returned to the caller.
 */
export type QAOutcome =
    | {
          kind: 'answer';
          text: string;
          sources: string[];
          sourceFailures: SourceFailure[];
      }
    | { kind: 'invalid-input'; message: string }
    | { kind: 'no-context'; message: string; sourceFailures: SourceFailure[] }
    | { kind: 'error'; message: string; code: string }
    | { kind: 'superseded' };

/**
 * Options for a single completion call.
 */
export interface GenerationOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
}

// ============================================================================
// API Types
// ============================================================================

/**
 * Request body for POST /api/ask
 */
export interface AskRequest {
    question: string;
    clientId?: string;
}

/**
 * Response body for POST /api/ask
 */
export interface AskResponse {
    clientId: string;
    outcome: QAOutcome;
}

/**
 * Response body for GET /api/health
 */
export interface HealthResponse {
    status: 'ok' | 'degraded' | 'error';
    generation: boolean;
    sources: {
        loaded: string[];
        failed: SourceFailure[];
    };
}

/**
 * One entry of GET /api/sources
 */
export interface SourceStatus {
    name: string;
    location: string;
    loaded: boolean;
    error?: string;
}
