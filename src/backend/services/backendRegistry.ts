/**
 * Backend Registry
 *
 * Owns the named collection of live retrieval backends. Built once at
 * process start and read-only afterwards, so every cycle (and every
 * concurrent client) can share it without locking.
 *
 * A source that fails to load is simply absent. The failure is returned
 * as a value alongside the registry so the caller can display it.
 */

import { SourceConfig } from '../../shared/types';
import { BackendLoadError, Result, toError } from '../errors';
import { Logger } from '../logging';
import { BackendOpener, RetrievalBackend } from './retrievalBackend';

/**
 * Per-source outcome of registry construction, in configuration order.
 */
export interface SourceLoadResult {
    source: SourceConfig;
    result: Result<RetrievalBackend, BackendLoadError>;
}

export interface RegistryBuildResult {
    registry: BackendRegistry;
    results: SourceLoadResult[];
    loadFailures: BackendLoadError[];
}

export class BackendRegistry implements Iterable<RetrievalBackend> {
    private readonly backends: ReadonlyMap<string, RetrievalBackend>;

    constructor(backends: Iterable<RetrievalBackend> = []) {
        const map = new Map<string, RetrievalBackend>();
        for (const backend of backends) {
            if (map.has(backend.sourceName)) {
                throw new Error(`Duplicate source name: ${backend.sourceName}`);
            }
            map.set(backend.sourceName, backend);
        }
        this.backends = map;
        Object.freeze(this);
    }

    /**
     * Open every configured source, one after another.
     *
     * A failing source is recorded and skipped; construction never aborts,
     * and there is no retry at this level.
     */
    static async build(
        sources: SourceConfig[],
        open: BackendOpener,
        logger: Logger = console
    ): Promise<RegistryBuildResult> {
        const results: SourceLoadResult[] = [];

        for (const source of sources) {
            try {
                const backend = await open(source.name, source.location);
                results.push({ source, result: { ok: true, value: backend } });
                logger.log(`Loaded ${source.name} index successfully.`);
            } catch (error) {
                const cause = toError(error);
                const loadError = new BackendLoadError(
                    source.name,
                    `Error loading ${source.name} index: ${cause.message}`,
                    cause
                );
                results.push({ source, result: { ok: false, error: loadError } });
                logger.warn(loadError.message);
            }
        }

        const live: RetrievalBackend[] = [];
        const loadFailures: BackendLoadError[] = [];
        for (const { result } of results) {
            if (result.ok) {
                live.push(result.value);
            } else {
                loadFailures.push(result.error);
            }
        }

        return {
            registry: new BackendRegistry(live),
            results,
            loadFailures,
        };
    }

    get size(): number {
        return this.backends.size;
    }

    /** Source names in registration order */
    names(): string[] {
        return [...this.backends.keys()];
    }

    get(name: string): RetrievalBackend | undefined {
        return this.backends.get(name);
    }

    has(name: string): boolean {
        return this.backends.has(name);
    }

    [Symbol.iterator](): Iterator<RetrievalBackend> {
        return this.backends.values();
    }
}

/**
 * Holds the current registry, with the load results that produced it, and
 * swaps both atomically.
 *
 * Readers call `current()` once per cycle and keep that instance, so a
 * swap never changes the sources a running cycle sees.
 */
export class RegistryHolder {
    private state: RegistryBuildResult;

    constructor(initial: RegistryBuildResult | BackendRegistry) {
        this.state =
            initial instanceof BackendRegistry
                ? { registry: initial, results: [], loadFailures: [] }
                : initial;
    }

    current(): BackendRegistry {
        return this.state.registry;
    }

    /** Registry plus the per-source load results behind it */
    snapshot(): RegistryBuildResult {
        return this.state;
    }

    /**
     * Publish a new registry. Returns the state it replaced.
     */
    swap(next: RegistryBuildResult): RegistryBuildResult {
        const previous = this.state;
        this.state = next;
        return previous;
    }
}
