/**
 * Context Aggregator
 *
 * Fans one query out to every live backend, then folds the answers into a
 * single labeled, size-bounded context block:
 *
 *   Source: youtube
 *   <first snippet, at most C code points>
 *   Source: youtube
 *   <second snippet>
 *   Source: pdf
 *   ...
 *
 * - Backends are queried concurrently, each behind its own timeout and
 *   failure boundary; a failing source contributes nothing for this cycle
 * - Output order is registry order, then backend rank order, whatever
 *   order the queries finish in
 * - Total size is bounded by liveBackends × K × C (plus labels)
 * - An empty result is reported as `no-context`, never as an empty string
 */

import { AggregatedContext, Snippet } from '../../shared/types';
import { QAErrorCode, RetrievalError, toError } from '../errors';
import { Logger } from '../logging';
import { BackendRegistry } from './backendRegistry';
import { RetrievalBackend } from './retrievalBackend';

export interface AggregatorConfig {
    /** K: snippets kept per source */
    perSourceLimit: number;
    /** C: code points kept per snippet */
    perSnippetCharBudget: number;
    /** Bounded wait for each backend query */
    backendTimeoutMs: number;
}

export const DEFAULT_AGGREGATOR_CONFIG: AggregatorConfig = {
    perSourceLimit: 4,
    perSnippetCharBudget: 2000,
    backendTimeoutMs: 15000,
};

export interface AssembleContextOptions extends Partial<AggregatorConfig> {
    /** Aborts every in-flight backend query when the cycle is abandoned */
    signal?: AbortSignal;
    logger?: Logger;
}

export type AssembleResult =
    | { status: 'ok'; context: AggregatedContext; sourceErrors: RetrievalError[] }
    | { status: 'no-context'; sourceErrors: RetrievalError[] };

type SourceOutcome =
    | { sourceName: string; snippets: Snippet[] }
    | { sourceName: string; error: RetrievalError };

/**
 * Keep the first `budget` code points of `text`.
 *
 * Counting code points rather than UTF-16 units means a surrogate pair is
 * never split. Idempotent: truncating twice equals truncating once.
 */
export function truncateText(text: string, budget: number): string {
    if (budget <= 0) {
        return '';
    }
    // Fast path: fewer UTF-16 units than the budget means fewer code points too
    if (text.length <= budget) {
        return text;
    }
    const codePoints = Array.from(text);
    if (codePoints.length <= budget) {
        return text;
    }
    return codePoints.slice(0, budget).join('');
}

/**
 * Render one snippet as a labeled block.
 */
export function formatSnippet(snippet: Snippet, budget: number): string {
    return `Source: ${snippet.sourceName}\n${truncateText(snippet.text, budget)}`;
}

/**
 * Query every backend in the registry and assemble the context block.
 *
 * Never throws for backend failures; they come back in `sourceErrors`.
 *
 * @param registry - Live backends, in registration order
 * @param query - The user's question, already validated
 */
export async function assembleContext(
    registry: BackendRegistry,
    query: string,
    options: AssembleContextOptions = {}
): Promise<AssembleResult> {
    const { signal, logger = console, ...overrides } = options;
    const config: AggregatorConfig = { ...DEFAULT_AGGREGATOR_CONFIG, ...overrides };

    const backends = [...registry];
    const outcomes = await Promise.all(
        backends.map((backend) => queryBackend(backend, query, config, signal))
    );

    const sourceErrors: RetrievalError[] = [];
    const snippets: Snippet[] = [];
    const sources: string[] = [];

    // outcomes[i] belongs to backends[i], so this loop walks registry order
    for (const outcome of outcomes) {
        if ('error' in outcome) {
            logger.warn(outcome.error.message);
            sourceErrors.push(outcome.error);
            continue;
        }

        const kept = outcome.snippets
            .slice(0, config.perSourceLimit)
            .map((snippet) => ({
                sourceName: outcome.sourceName,
                text: truncateText(snippet.text, config.perSnippetCharBudget),
                metadata: snippet.metadata,
            }));

        if (kept.length > 0) {
            sources.push(outcome.sourceName);
            snippets.push(...kept);
        }
    }

    // Snippets are already truncated; formatting with the same budget is a no-op on them
    const text = snippets
        .map((snippet) => formatSnippet(snippet, config.perSnippetCharBudget))
        .join('\n');

    if (text.trim().length === 0) {
        return { status: 'no-context', sourceErrors };
    }

    return {
        status: 'ok',
        context: { text, snippets, sources },
        sourceErrors,
    };
}

/**
 * Run one backend query inside its own failure boundary.
 *
 * Resolves with either the snippets or a RetrievalError; never rejects.
 */
async function queryBackend(
    backend: RetrievalBackend,
    query: string,
    config: AggregatorConfig,
    parentSignal?: AbortSignal
): Promise<SourceOutcome> {
    const sourceName = backend.sourceName;
    const controller = new AbortController();
    const abortFromParent = () => controller.abort();
    if (parentSignal?.aborted) {
        controller.abort();
    }
    parentSignal?.addEventListener('abort', abortFromParent, { once: true });

    let timeoutId: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
            controller.abort();
            reject(
                new RetrievalError(
                    sourceName,
                    `Query against ${sourceName} timed out after ${config.backendTimeoutMs}ms`,
                    QAErrorCode.RETRIEVAL_TIMEOUT
                )
            );
        }, config.backendTimeoutMs);
    });

    try {
        const snippets = await Promise.race([
            backend.retrieve(query, config.perSourceLimit, controller.signal),
            timeout,
        ]);
        return { sourceName, snippets };
    } catch (error) {
        if (error instanceof RetrievalError) {
            return { sourceName, error };
        }
        const cause = toError(error);
        return {
            sourceName,
            error: new RetrievalError(
                sourceName,
                `Error querying ${sourceName}: ${cause.message}`,
                QAErrorCode.RETRIEVAL_FAILED,
                cause
            ),
        };
    } finally {
        clearTimeout(timeoutId);
        parentSignal?.removeEventListener('abort', abortFromParent);
    }
}
