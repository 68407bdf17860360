import { getOutcomeLogger, logger as rootLogger, type Logger } from '../logging/logger.js';
import type { OutcomeKind } from './outcomeKind.js';
import type { OutcomeRecord } from './OutcomeRecord.js';

export type AnyOutcome = OutcomeRecord<unknown, unknown, unknown, unknown>;

/**
 * Side effect run once for every minted outcome.
 * Observers may throw; the observing factory contains the failure.
 */
export type OutcomeObserver = (outcome: AnyOutcome) => void;

export const DEFAULT_SLOW_THRESHOLD_MS = 1000;

export interface LoggingObserverOptions {
    /** Measured outcomes slower than this are logged at warn. */
    readonly slowThresholdMs?: number;
}

/**
 * Logs one line per outcome: failures at warn, timeouts at info, slow
 * replies at warn and everything else at debug.
 */
export function createLoggingObserver(
    log: Logger = rootLogger,
    options: LoggingObserverOptions = {}
): OutcomeObserver {
    const slowThresholdMs = options.slowThresholdMs ?? DEFAULT_SLOW_THRESHOLD_MS;

    return (outcome) => {
        const durationMs = outcome.isDurationMeasured() ? outcome.getDurationMillis() : undefined;
        const outcomeLog = getOutcomeLogger(outcome, log);
        const entry = {
            durationMs,
            request: outcome.getRequest(),
            response: outcome.getResponse(),
            error: outcome.getError()?.message
        };

        switch (outcome.getKind()) {
            case 'ERROR':
            case 'PARTIAL_ERROR':
                outcomeLog.warn(entry, 'Request failed');
                break;
            case 'TIMEOUT':
                outcomeLog.info(entry, 'Request timed out');
                break;
            case 'SUCCESS':
                if (durationMs !== undefined && durationMs > slowThresholdMs) {
                    outcomeLog.warn(entry, `Slow request done in ${durationMs} ms`);
                } else {
                    outcomeLog.debug(entry, `Request done in ${durationMs ?? 0} ms`);
                }
                break;
        }
    };
}

export interface OutcomeStatisticsSnapshot {
    readonly total: number;
    readonly byKind: Readonly<Record<OutcomeKind, number>>;
    /** Outcomes that carried a latency measurement */
    readonly measured: number;
    readonly totalDurationNanos: number;
    readonly maxDurationNanos: number;
    readonly meanDurationNanos: number;
}

function emptyKindCounts(): Record<OutcomeKind, number> {
    return { SUCCESS: 0, TIMEOUT: 0, ERROR: 0, PARTIAL_ERROR: 0 };
}

/**
 * In-memory outcome counters for a single client.
 */
export class OutcomeStatistics {
    private byKind = emptyKindCounts();
    private measured = 0;
    private totalDurationNanos = 0;
    private maxDurationNanos = 0;

    public readonly observer: OutcomeObserver = (outcome) => this.record(outcome);

    public record(outcome: AnyOutcome): void {
        this.byKind[outcome.getKind()] += 1;

        if (outcome.isDurationMeasured()) {
            const nanos = outcome.getDurationNanos();
            this.measured += 1;
            this.totalDurationNanos += nanos;
            this.maxDurationNanos = Math.max(this.maxDurationNanos, nanos);
        }
    }

    public snapshot(): OutcomeStatisticsSnapshot {
        const byKind = { ...this.byKind };
        const total = byKind.SUCCESS + byKind.TIMEOUT + byKind.ERROR + byKind.PARTIAL_ERROR;

        return Object.freeze({
            total,
            byKind: Object.freeze(byKind),
            measured: this.measured,
            totalDurationNanos: this.totalDurationNanos,
            maxDurationNanos: this.maxDurationNanos,
            meanDurationNanos: this.measured === 0 ? 0 : Math.round(this.totalDurationNanos / this.measured)
        });
    }

    public reset(): void {
        this.byKind = emptyKindCounts();
        this.measured = 0;
        this.totalDurationNanos = 0;
        this.maxDurationNanos = 0;
    }
}
