import { OutcomeRecord } from './OutcomeRecord.js';

/**
 * Single point where every outcome is minted.
 *
 * The dispatch layer calls `createOutcome` exactly once per resolved request.
 * Hosts swap in their own factory per client or per call site to attach
 * cross-cutting behaviour or to return an OutcomeRecord subclass.
 * Implementations must not throw for a present request and a valid duration.
 */
export interface OutcomeFactory {
    createOutcome<TRequest, TResponse, TContext, TAddress>(
        source: unknown,
        peerAddress: TAddress | null | undefined,
        request: TRequest,
        response: TResponse | null | undefined,
        userContext: TContext | null | undefined,
        durationNanos: number | undefined,
        error: Error | null | undefined
    ): OutcomeRecord<TRequest, TResponse, TContext, TAddress>;
}

/**
 * Constructs the record directly from its arguments.
 */
export class DefaultOutcomeFactory implements OutcomeFactory {
    public createOutcome<TRequest, TResponse, TContext, TAddress>(
        source: unknown,
        peerAddress: TAddress | null | undefined,
        request: TRequest,
        response: TResponse | null | undefined,
        userContext: TContext | null | undefined,
        durationNanos: number | undefined,
        error: Error | null | undefined
    ): OutcomeRecord<TRequest, TResponse, TContext, TAddress> {
        return new OutcomeRecord<TRequest, TResponse, TContext, TAddress>({
            source,
            peerAddress,
            request,
            response,
            userContext,
            durationNanos,
            error
        });
    }
}

export const defaultOutcomeFactory: OutcomeFactory = new DefaultOutcomeFactory();
