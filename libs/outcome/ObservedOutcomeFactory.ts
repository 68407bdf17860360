import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { defaultOutcomeFactory, type OutcomeFactory } from './OutcomeFactory.js';
import type { OutcomeRecord } from './OutcomeRecord.js';
import type { OutcomeObserver } from './observers.js';

/**
 * Decorates another factory with observers.
 *
 * The delegate mints the record first; observers run afterwards and a
 * throwing observer is reported, never allowed to replace the outcome.
 */
export class ObservedOutcomeFactory implements OutcomeFactory {
    private failures = 0;

    constructor(
        private readonly delegate: OutcomeFactory = defaultOutcomeFactory,
        private readonly observers: readonly OutcomeObserver[] = [],
        private readonly log: Logger = rootLogger
    ) { }

    public createOutcome<TRequest, TResponse, TContext, TAddress>(
        source: unknown,
        peerAddress: TAddress | null | undefined,
        request: TRequest,
        response: TResponse | null | undefined,
        userContext: TContext | null | undefined,
        durationNanos: number | undefined,
        error: Error | null | undefined
    ): OutcomeRecord<TRequest, TResponse, TContext, TAddress> {
        const outcome = this.delegate.createOutcome(
            source, peerAddress, request, response, userContext, durationNanos, error
        );

        for (const observer of this.observers) {
            try {
                observer(outcome);
            } catch (err: unknown) {
                this.failures += 1;
                this.reportObserverFailure(err);
            }
        }

        return outcome;
    }

    /** Number of observer invocations that threw. */
    public get observerFailures(): number {
        return this.failures;
    }

    private reportObserverFailure(err: unknown): void {
        const message = err instanceof Error ? err.message : String(err);
        try {
            this.log.warn({ event: 'OUTCOME_OBSERVER_FAILED', error: message }, 'Outcome observer failed');
        } catch (logErr: unknown) {
            // Logger itself is broken; fall back to a process warning.
            process.emitWarning(
                `Outcome observer failed (${message}); logging also failed: ${logErr instanceof Error ? logErr.message : String(logErr)}`
            );
        }
    }
}
