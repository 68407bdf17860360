import type { TransportAddress } from '../address/transportAddress.js';
import type { OutcomeConfig } from '../bootstrap/config.js';
import { DEFAULT_TIMEOUT_MESSAGE, RequestTimeoutError } from '../errors/outcomeErrors.js';
import type { OutcomeRecord } from '../outcome/OutcomeRecord.js';

/**
 * Callback registered with an asynchronous request; invoked once with the outcome.
 */
export type OutcomeListener<TRequest, TResponse = TRequest, TContext = unknown, TAddress = TransportAddress> =
    (outcome: OutcomeRecord<TRequest, TResponse, TContext, TAddress>) => void;

/**
 * Inspects a received reply and returns an error when it must be refused
 * (error status, report reply). Returning undefined accepts it.
 */
export type ResponseInspector<TResponse> = (response: TResponse) => Error | undefined;

export interface SettleOptions<TResponse> {
    readonly timeoutMessage?: string;
    readonly inspectResponse?: ResponseInspector<TResponse>;
}

/**
 * Settle options carrying the configured timeout message.
 */
export function settleOptionsFromConfig<TResponse>(
    config: Pick<OutcomeConfig, 'timeoutMessage'>,
    inspectResponse?: ResponseInspector<TResponse>
): SettleOptions<TResponse> {
    return { timeoutMessage: config.timeoutMessage, inspectResponse };
}

/**
 * Maps an outcome onto return-or-throw semantics:
 * an error is thrown as-is (even when a reply is present), a timeout throws
 * RequestTimeoutError and an accepted reply is returned.
 */
export function settleOutcome<TRequest, TResponse, TContext, TAddress>(
    outcome: OutcomeRecord<TRequest, TResponse, TContext, TAddress>,
    options: SettleOptions<TResponse> = {}
): TResponse {
    const error = outcome.getError();
    if (error !== undefined) {
        throw error;
    }

    const response = outcome.getResponse();
    if (response === undefined) {
        throw new RequestTimeoutError(options.timeoutMessage ?? DEFAULT_TIMEOUT_MESSAGE, outcome.getDurationNanos());
    }

    const rejection = options.inspectResponse?.(response);
    if (rejection !== undefined) {
        throw rejection;
    }
    return response;
}
