/**
 * QA Session Controller
 *
 * Drives one question/answer cycle at a time:
 *
 *   idle ─▶ awaiting-input ◀─ (empty question)
 *     │
 *     ▼
 *   retrieving ──▶ no-context        (aggregator found nothing; no generation)
 *     │
 *     ▼
 *   generating ──▶ done | errored
 *
 * A finished cycle stays in its end state (awaiting-input, no-context,
 * done or errored) until the next `ask`; each of them accepts the next
 * question, so it acts as awaiting input. Nothing carries over from one
 * cycle to the next except the shared, read-only registry.
 *
 * If a newer question arrives while a cycle is in flight, the older cycle
 * is abandoned: its calls are aborted, its state changes are dropped and it
 * resolves as `superseded`. Only the latest question's result is shown.
 */

import { CycleState, QAOutcome, SourceFailure } from '../../shared/types';
import {
    GenerationError,
    QAError,
    QAErrorCode,
    Result,
    RetrievalError,
    toError,
} from '../errors';
import { Logger } from '../logging';
import { IAnswerGenerator } from './answerGenerator';
import { BackendRegistry, RegistryHolder } from './backendRegistry';
import {
    AggregatorConfig,
    AssembleResult,
    DEFAULT_AGGREGATOR_CONFIG,
    assembleContext,
} from './contextAggregator';
import {
    DEFAULT_PROMPT_TEMPLATE,
    NO_CONTEXT_MESSAGE,
    PROMPT_FOR_INPUT_MESSAGE,
    formatErrorMessage,
    validateQuery,
} from './queryProcessor';

export interface QASessionConfig extends AggregatorConfig {
    /** Template with {context} and {question} slots */
    promptTemplate: string;
    /** Upper bound for a whole cycle; 0 disables it */
    cycleTimeoutMs: number;
}

export const DEFAULT_SESSION_CONFIG: QASessionConfig = {
    ...DEFAULT_AGGREGATOR_CONFIG,
    promptTemplate: DEFAULT_PROMPT_TEMPLATE,
    cycleTimeoutMs: 60000,
};

export interface QASessionDependencies {
    /** A fixed registry, or a holder whose current registry is read per cycle */
    registry: BackendRegistry | RegistryHolder;
    generator: IAnswerGenerator;
    config?: Partial<QASessionConfig>;
    logger?: Logger;
    /** Called on every state transition of the latest cycle */
    onStateChange?: (state: CycleState) => void;
}

const SUPERSEDED: QAOutcome = { kind: 'superseded' };

/**
 * Identifies one cycle. A cycle is stale once a newer one has started or
 * once its controller was aborted (superseded or timed out).
 */
interface Cycle {
    id: number;
    controller: AbortController;
}

function toSourceFailures(errors: RetrievalError[]): SourceFailure[] {
    return errors.map((error) => ({ sourceName: error.sourceName, message: error.message }));
}

export class QASessionController {
    private readonly registry: BackendRegistry | RegistryHolder;
    private readonly generator: IAnswerGenerator;
    private readonly config: QASessionConfig;
    private readonly logger: Logger;
    private readonly onStateChange?: (state: CycleState) => void;

    private currentState: CycleState = 'idle';
    private latestCycle = 0;
    private inFlight: AbortController | undefined;
    private failure: QAError | undefined;

    constructor(deps: QASessionDependencies) {
        this.registry = deps.registry;
        this.generator = deps.generator;
        this.config = { ...DEFAULT_SESSION_CONFIG, ...deps.config };
        this.logger = deps.logger ?? console;
        this.onStateChange = deps.onStateChange;
    }

    get state(): CycleState {
        return this.currentState;
    }

    /** Error behind the `errored` state of the latest cycle */
    get lastError(): QAError | undefined {
        return this.failure;
    }

    /**
     * Run one cycle for `question`.
     *
     * Never rejects: every ending, including failures, is a QAOutcome.
     */
    async ask(question: string): Promise<QAOutcome> {
        this.inFlight?.abort();
        const controller = new AbortController();
        const cycle: Cycle = { id: ++this.latestCycle, controller };
        this.inFlight = controller;
        this.failure = undefined;

        // Input gate: nothing downstream runs for an empty question
        const validation = validateQuery(question);
        if (!validation.valid) {
            this.inFlight = undefined;
            this.transition(cycle, 'awaiting-input');
            return { kind: 'invalid-input', message: PROMPT_FOR_INPUT_MESSAGE };
        }

        try {
            return await this.withCycleTimeout(cycle, this.runCycle(cycle, question));
        } finally {
            if (this.inFlight === controller) {
                this.inFlight = undefined;
            }
        }
    }

    private async runCycle(cycle: Cycle, question: string): Promise<QAOutcome> {
        const signal = cycle.controller.signal;
        this.transition(cycle, 'retrieving');
        const registry =
            this.registry instanceof RegistryHolder ? this.registry.current() : this.registry;

        let assembled: AssembleResult;
        try {
            assembled = await assembleContext(registry, question, {
                perSourceLimit: this.config.perSourceLimit,
                perSnippetCharBudget: this.config.perSnippetCharBudget,
                backendTimeoutMs: this.config.backendTimeoutMs,
                signal,
                logger: this.logger,
            });
        } catch (error) {
            const cause = toError(error);
            return this.fail(
                cycle,
                new QAError(cause.message, QAErrorCode.RETRIEVAL_FAILED, cause)
            );
        }

        if (this.isStale(cycle)) {
            return SUPERSEDED;
        }

        const sourceFailures = toSourceFailures(assembled.sourceErrors);

        if (assembled.status === 'no-context') {
            this.transition(cycle, 'no-context');
            return { kind: 'no-context', message: NO_CONTEXT_MESSAGE, sourceFailures };
        }

        this.transition(cycle, 'generating');
        let generated: Result<string, GenerationError>;
        try {
            generated = await this.generator.generate(
                this.config.promptTemplate,
                assembled.context.text,
                question,
                signal
            );
        } catch (error) {
            const cause = toError(error);
            generated = { ok: false, error: new GenerationError(cause.message, cause) };
        }

        if (this.isStale(cycle)) {
            return SUPERSEDED;
        }

        if (!generated.ok) {
            return this.fail(cycle, generated.error);
        }

        this.transition(cycle, 'done');
        return {
            kind: 'answer',
            text: generated.value,
            sources: assembled.context.sources,
            sourceFailures,
        };
    }

    /**
     * Race the cycle against `cycleTimeoutMs`.
     *
     * On timeout the cycle's calls are aborted and it ends in `errored`.
     */
    private async withCycleTimeout(cycle: Cycle, work: Promise<QAOutcome>): Promise<QAOutcome> {
        const limit = this.config.cycleTimeoutMs;
        if (limit <= 0) {
            return work;
        }

        let timeoutId: NodeJS.Timeout | undefined;
        const timedOut = new Promise<'timeout'>((resolve) => {
            timeoutId = setTimeout(() => resolve('timeout'), limit);
        });

        try {
            const winner = await Promise.race([work, timedOut]);
            if (winner !== 'timeout') {
                return winner;
            }
        } finally {
            clearTimeout(timeoutId);
        }

        // Record the failure first: once aborted, the cycle counts as stale
        const outcome = this.fail(
            cycle,
            new QAError(`Question timed out after ${limit}ms`, QAErrorCode.CYCLE_TIMEOUT)
        );
        cycle.controller.abort();
        return outcome;
    }

    private fail(cycle: Cycle, error: QAError): QAOutcome {
        if (this.isStale(cycle)) {
            return SUPERSEDED;
        }
        this.failure = error;
        this.logger.error(`Cycle failed (${error.code}): ${error.message}`);
        this.transition(cycle, 'errored');
        return {
            kind: 'error',
            message: formatErrorMessage(error.message),
            code: error.code,
        };
    }

    private isStale(cycle: Cycle): boolean {
        return cycle.id !== this.latestCycle || cycle.controller.signal.aborted;
    }

    private transition(cycle: Cycle, next: CycleState): void {
        if (this.isStale(cycle) || this.currentState === next) {
            return;
        }
        this.currentState = next;
        if (!this.onStateChange) {
            return;
        }
        try {
            this.onStateChange(next);
        } catch (error) {
            this.logger.error(`State observer failed: ${toError(error).message}`);
        }
    }
}

export function createQASessionController(deps: QASessionDependencies): QASessionController {
    return new QASessionController(deps);
}
