import { RequestCancelledError } from '../errors/outcomeErrors.js';
import type { OutcomeFactory } from '../outcome/OutcomeFactory.js';
import type { OutcomeRecord } from '../outcome/OutcomeRecord.js';

/**
 * The outcome a dispatch layer reports for a request it abandons, e.g. when
 * the session closes with the request still pending. No reply and no peer.
 */
export function cancelledOutcome<TRequest, TResponse, TContext, TAddress>(
    factory: OutcomeFactory,
    source: unknown,
    request: TRequest,
    userContext: TContext | undefined,
    durationNanos: number | undefined,
    reason: string
): OutcomeRecord<TRequest, TResponse, TContext, TAddress> {
    return factory.createOutcome<TRequest, TResponse, TContext, TAddress>(
        source,
        undefined,
        request,
        undefined,
        userContext,
        durationNanos,
        new RequestCancelledError(reason)
    );
}
