/**
 * Outcome Error Taxonomy
 *
 * Only precondition violations are thrown by the outcome core. The remaining
 * classes describe failures that travel inside an OutcomeRecord or are raised
 * to promise-based consumers when a record is settled.
 */

export type OutcomeErrorCategory =
    | 'PRECONDITION'  // Caller bug; thrown at construction
    | 'TIMEOUT'       // No reply within the dispatch layer's deadline
    | 'CANCELLED'     // Dispatch layer gave up on the request (e.g. session closed)
    | 'PROTOCOL'      // Reply arrived but was rejected by an inspector
    | 'PROCESSING';   // Local failure wrapped from an arbitrary thrown value

export abstract class OutcomeError extends Error {
    abstract readonly code: string;
    abstract readonly category: OutcomeErrorCategory;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class MissingRequestError extends OutcomeError {
    readonly code = 'MISSING_REQUEST';
    readonly category = 'PRECONDITION';

    constructor() {
        super('An outcome cannot be created without the request it answers');
    }
}

export class InvalidDurationError extends OutcomeError {
    readonly code = 'INVALID_DURATION';
    readonly category = 'PRECONDITION';

    constructor(public readonly durationNanos: number) {
        super(`Duration must be a non-negative integer number of nanoseconds, got ${durationNanos}`);
    }
}

export class InvalidAddressError extends OutcomeError {
    readonly code = 'INVALID_ADDRESS';
    readonly category = 'PRECONDITION';

    constructor(public readonly input: string, reason: string) {
        super(`Invalid transport address "${input}": ${reason}`);
    }
}

export const DEFAULT_TIMEOUT_MESSAGE = 'Request timed out';

export class RequestTimeoutError extends OutcomeError {
    readonly code = 'REQUEST_TIMEOUT';
    readonly category = 'TIMEOUT';

    constructor(
        message: string = DEFAULT_TIMEOUT_MESSAGE,
        public readonly durationNanos: number = 0
    ) {
        super(message);
    }
}

export class RequestCancelledError extends OutcomeError {
    readonly code = 'REQUEST_CANCELLED';
    readonly category = 'CANCELLED';

    constructor(public readonly reason: string) {
        super(`Request cancelled: ${reason}`);
    }
}

/**
 * Raised when a reply was received but a response inspector refused it,
 * for example an error-status or report reply.
 */
export class ResponseRejectedError<TResponse = unknown> extends OutcomeError {
    readonly code = 'RESPONSE_REJECTED';
    readonly category = 'PROTOCOL';

    constructor(
        message: string,
        public readonly response: TResponse,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class ProcessingError extends OutcomeError {
    readonly code = 'PROCESSING_ERROR';
    readonly category = 'PROCESSING';

    constructor(
        message: string,
        public readonly contextLabel: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}
