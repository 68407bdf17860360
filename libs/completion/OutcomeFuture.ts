import type { OutcomeConfig } from '../bootstrap/config.js';
import { normalizeError } from '../errors/normalize.js';
import { logger } from '../logging/logger.js';
import type { OutcomeRecord } from '../outcome/OutcomeRecord.js';
import {
    settleOptionsFromConfig,
    settleOutcome,
    type OutcomeListener,
    type ResponseInspector,
    type SettleOptions
} from './settle.js';

/**
 * Bridges the listener-based completion path to a promise.
 *
 * Hand `listener` to the dispatch layer as the request's completion callback
 * and await `promise`. Only the first outcome settles the future.
 * A rejection nobody awaits is not reported as unhandled, so callers that
 * only read `getOutcome()` may ignore `promise`.
 */
export class OutcomeFuture<TRequest, TResponse = TRequest, TContext = unknown, TAddress = unknown> {
    private resolvePromise: (value: TResponse) => void = () => undefined;
    private rejectPromise: (reason: Error) => void = () => undefined;
    private outcome: OutcomeRecord<TRequest, TResponse, TContext, TAddress> | undefined;

    public readonly promise: Promise<TResponse> = new Promise<TResponse>((resolve, reject) => {
        this.resolvePromise = resolve;
        this.rejectPromise = reject;
    });

    constructor(private readonly options: SettleOptions<TResponse> = {}) {
        this.promise.catch((err: unknown) => {
            logger.trace({ event: 'OUTCOME_FUTURE_REJECTED', error: err instanceof Error ? err.message : String(err) },
                'Outcome future rejected');
        });
    }

    /**
     * Future whose timeouts carry the configured OUTCOME_TIMEOUT_MESSAGE.
     */
    public static fromConfig<TRequest, TResponse = TRequest, TContext = unknown, TAddress = unknown>(
        config: Pick<OutcomeConfig, 'timeoutMessage'>,
        inspectResponse?: ResponseInspector<TResponse>
    ): OutcomeFuture<TRequest, TResponse, TContext, TAddress> {
        return new OutcomeFuture<TRequest, TResponse, TContext, TAddress>(
            settleOptionsFromConfig(config, inspectResponse)
        );
    }

    public readonly listener: OutcomeListener<TRequest, TResponse, TContext, TAddress> = (outcome) => {
        if (this.outcome !== undefined) {
            logger.debug({ event: 'DUPLICATE_OUTCOME', outcomeKind: outcome.getKind() },
                'Outcome delivered to an already settled future; ignoring');
            return;
        }
        this.outcome = outcome;

        try {
            this.resolvePromise(settleOutcome(outcome, this.options));
        } catch (err: unknown) {
            this.rejectPromise(normalizeError(err, 'outcome-future'));
        }
    };

    /** The outcome that settled this future, if any. */
    public getOutcome(): OutcomeRecord<TRequest, TResponse, TContext, TAddress> | undefined {
        return this.outcome;
    }

    public isSettled(): boolean {
        return this.outcome !== undefined;
    }
}
