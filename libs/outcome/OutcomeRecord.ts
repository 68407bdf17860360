import type { TransportAddress } from '../address/transportAddress.js';
import { InvalidDurationError, MissingRequestError } from '../errors/outcomeErrors.js';
import {
    OUTCOME_KIND_METADATA,
    OutcomeKind,
    OutcomeVariant,
    classifyOutcome
} from './outcomeKind.js';

const NANOS_PER_MILLI = 1_000_000;

/**
 * Construction input for an outcome. Only `source` and `request` are required.
 *
 * `durationNanos` left out means the latency was not measured; an explicit
 * `0` is a real measurement.
 */
export interface OutcomeInit<TRequest, TResponse, TContext, TAddress> {
    readonly source: unknown;
    readonly request: TRequest;
    readonly peerAddress?: TAddress | null;
    readonly response?: TResponse | null;
    readonly userContext?: TContext | null;
    readonly durationNanos?: number;
    readonly error?: Error | null;
}

/**
 * Plain snapshot of every field, used for comparison and log output.
 */
export interface OutcomeFields<TRequest, TResponse, TContext, TAddress> {
    readonly source: unknown;
    readonly kind: OutcomeKind;
    readonly request: TRequest;
    readonly response: TResponse | undefined;
    readonly peerAddress: TAddress | undefined;
    readonly userContext: TContext | undefined;
    readonly error: Error | undefined;
    readonly durationNanos: number;
    readonly durationMeasured: boolean;
}

/**
 * The resolved result of one asynchronous request: a reply, a timeout or a
 * processing error.
 *
 * Records are immutable once constructed and handed to exactly one consumer
 * path. Subclasses may add fields but must keep the read contract.
 */
export class OutcomeRecord<
    TRequest,
    TResponse = TRequest,
    TContext = unknown,
    TAddress = TransportAddress
> {
    private readonly source: unknown;
    private readonly request: TRequest;
    private readonly response: TResponse | undefined;
    private readonly peerAddress: TAddress | undefined;
    private readonly userContext: TContext | undefined;
    private readonly error: Error | undefined;
    private readonly durationNanos: number;
    private readonly durationMeasured: boolean;
    private readonly kind: OutcomeKind;

    /**
     * @throws MissingRequestError if no request is supplied
     * @throws InvalidDurationError if the duration is negative or not a safe integer;
     *   durations of 2^53 ns (about 104 days) or more are rejected rather than rounded
     */
    constructor(init: OutcomeInit<TRequest, TResponse, TContext, TAddress>) {
        if (init.request === undefined || init.request === null) {
            throw new MissingRequestError();
        }
        if (init.durationNanos !== undefined
            && (!Number.isSafeInteger(init.durationNanos) || init.durationNanos < 0)) {
            throw new InvalidDurationError(init.durationNanos);
        }

        this.source = init.source;
        this.request = init.request;
        this.response = init.response ?? undefined;
        this.userContext = init.userContext ?? undefined;
        this.error = init.error ?? undefined;
        this.durationNanos = init.durationNanos ?? 0;
        this.durationMeasured = init.durationNanos !== undefined;
        this.kind = classifyOutcome(this.response, this.error);

        // A timeout has no attributable peer.
        this.peerAddress = this.kind === 'TIMEOUT' ? undefined : init.peerAddress ?? undefined;
    }

    /** Component that completed the request. */
    public getSource(): unknown {
        return this.source;
    }

    public getRequest(): TRequest {
        return this.request;
    }

    /** The reply, or undefined if the request timed out or failed before one arrived. */
    public getResponse(): TResponse | undefined {
        return this.response;
    }

    public getPeerAddress(): TAddress | undefined {
        return this.peerAddress;
    }

    /** The caller's context, returned by identity. */
    public getUserObject(): TContext | undefined {
        return this.userContext;
    }

    public getError(): Error | undefined {
        return this.error;
    }

    /** Elapsed nanoseconds between submission and delivery; 0 if unmeasured. */
    public getDurationNanos(): number {
        return this.durationNanos;
    }

    public getDurationMillis(): number {
        return this.durationNanos / NANOS_PER_MILLI;
    }

    /** Distinguishes a measured zero from "not measured". */
    public isDurationMeasured(): boolean {
        return this.durationMeasured;
    }

    public getKind(): OutcomeKind {
        return this.kind;
    }

    /** True only for a received reply with no error. */
    public isSuccess(): boolean {
        return this.kind === 'SUCCESS';
    }

    public isTimeout(): boolean {
        return this.kind === 'TIMEOUT';
    }

    public isFailed(): boolean {
        return OUTCOME_KIND_METADATA[this.kind].failed;
    }

    public toVariant(): OutcomeVariant<TRequest, TResponse, TAddress> {
        const { request, response, error, peerAddress } = this;

        if (response !== undefined && error !== undefined) {
            return { kind: 'PARTIAL_ERROR', request, response, error, peerAddress };
        }
        if (response !== undefined) {
            return { kind: 'SUCCESS', request, response, peerAddress };
        }
        if (error !== undefined) {
            return { kind: 'ERROR', request, error, peerAddress };
        }
        return { kind: 'TIMEOUT', request };
    }

    public toFields(): OutcomeFields<TRequest, TResponse, TContext, TAddress> {
        return {
            source: this.source,
            kind: this.kind,
            request: this.request,
            response: this.response,
            peerAddress: this.peerAddress,
            userContext: this.userContext,
            error: this.error,
            durationNanos: this.durationNanos,
            durationMeasured: this.durationMeasured
        };
    }
}
