/**
 * Error taxonomy for the Q&A pipeline.
 *
 * Every failure the pipeline reports is a QAError carrying a code, so the
 * HTTP layer and the controller can branch on `code` instead of parsing
 * messages. An empty retrieval result is not in here: it is a result
 * variant of the aggregator, not a failure.
 */

/**
 * Error codes for the pipeline.
 * Using an enum keeps the codes identical across logs and API responses.
 */
export enum QAErrorCode {
    /** Missing credential or invalid setting; fatal at startup */
    CONFIGURATION = 'CONFIGURATION',
    /** A source's index could not be opened */
    BACKEND_LOAD_FAILED = 'BACKEND_LOAD_FAILED',
    /** A live source raised while answering a query */
    RETRIEVAL_FAILED = 'RETRIEVAL_FAILED',
    /** A live source did not answer within the bounded wait */
    RETRIEVAL_TIMEOUT = 'RETRIEVAL_TIMEOUT',
    /** The completion call failed or returned unusable output */
    GENERATION_FAILED = 'GENERATION_FAILED',
    /** A whole cycle exceeded its time budget */
    CYCLE_TIMEOUT = 'CYCLE_TIMEOUT',
    /** Empty or whitespace-only question */
    INVALID_QUERY = 'INVALID_QUERY',
}

export class QAError extends Error {
    constructor(
        message: string,
        public readonly code: QAErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'QAError';
    }
}

export class ConfigurationError extends QAError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message, QAErrorCode.CONFIGURATION);
        this.name = 'ConfigurationError';
    }
}

export class BackendLoadError extends QAError {
    constructor(
        public readonly sourceName: string,
        message: string,
        cause?: Error
    ) {
        super(message, QAErrorCode.BACKEND_LOAD_FAILED, cause);
        this.name = 'BackendLoadError';
    }
}

export class RetrievalError extends QAError {
    constructor(
        public readonly sourceName: string,
        message: string,
        code: QAErrorCode.RETRIEVAL_FAILED | QAErrorCode.RETRIEVAL_TIMEOUT = QAErrorCode.RETRIEVAL_FAILED,
        cause?: Error
    ) {
        super(message, code, cause);
        this.name = 'RetrievalError';
    }
}

export class GenerationError extends QAError {
    constructor(message: string, cause?: Error) {
        super(message, QAErrorCode.GENERATION_FAILED, cause);
        this.name = 'GenerationError';
    }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

/**
 * Success-or-failure value for operations whose failure is an expected,
 * inspectable outcome rather than an exception.
 */
export type Result<T, E extends Error = QAError> =
    | { ok: true; value: T }
    | { ok: false; error: E };
