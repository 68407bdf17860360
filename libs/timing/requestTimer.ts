/**
 * Latency measurement for the dispatch layer.
 * Uses a monotonic nanosecond clock so wall-clock adjustments never produce
 * a negative duration.
 */

export type NanoClock = () => bigint;

export const monotonicClock: NanoClock = () => process.hrtime.bigint();

export interface RequestTimer {
    /** Clock reading taken when the request was submitted */
    readonly startedAt: bigint;
    /** Nanoseconds since submission, clamped to 0 and to the safe integer range */
    elapsedNanos(): number;
}

export function startRequestTimer(clock: NanoClock = monotonicClock): RequestTimer {
    const startedAt = clock();

    return {
        startedAt,
        elapsedNanos: () => {
            const elapsed = clock() - startedAt;
            if (elapsed <= 0n) return 0;
            if (elapsed > BigInt(Number.MAX_SAFE_INTEGER)) return Number.MAX_SAFE_INTEGER;
            return Number(elapsed);
        }
    };
}
