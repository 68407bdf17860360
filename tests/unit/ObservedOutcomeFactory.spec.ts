/**
 * Unit Tests: ObservedOutcomeFactory and logging observer
 *
 * Observers attach cross-cutting behaviour at the minting point and must
 * never replace or suppress the real outcome.
 *
 * @see libs/outcome/ObservedOutcomeFactory.ts
 * @see libs/outcome/observers.ts
 */

import { describe, it, mock, afterEach } from 'node:test';
import assert from 'node:assert';
import pino from 'pino';
import { ObservedOutcomeFactory } from '../../libs/outcome/ObservedOutcomeFactory.js';
import { defaultOutcomeFactory } from '../../libs/outcome/OutcomeFactory.js';
import { createLoggingObserver, OutcomeStatistics, type AnyOutcome } from '../../libs/outcome/observers.js';
import { createOutcomeFactory } from '../../libs/outcome/createOutcomeFactory.js';
import { parseTransportAddress } from '../../libs/address/transportAddress.js';
import { REDACT_CENSOR, REDACT_KEYS } from '../../libs/logging/redactionConfig.js';
import type { Logger } from '../../libs/logging/logger.js';

function captureLogger(): { log: Logger; lines: Array<Record<string, unknown>> } {
    const lines: Array<Record<string, unknown>> = [];
    const log = pino(
        { level: 'debug', base: null, redact: { paths: REDACT_KEYS, censor: REDACT_CENSOR } },
        { write: (msg: string) => { lines.push(JSON.parse(msg)); } }
    );
    return { log, lines };
}

const peer = parseTransportAddress('udp:10.0.0.5/161');

describe('ObservedOutcomeFactory', () => {
    afterEach(() => {
        mock.restoreAll();
    });

    it('should notify every observer with the minted outcome', () => {
        const seen: AnyOutcome[] = [];
        const factory = new ObservedOutcomeFactory(defaultOutcomeFactory, [
            (outcome) => { seen.push(outcome); },
            (outcome) => { seen.push(outcome); }
        ]);

        const outcome = factory.createOutcome('session', peer, 'R1', 'P1', 'ctx-1', 1_500_000, undefined);

        assert.strictEqual(seen.length, 2);
        assert.strictEqual(seen[0], outcome);
        assert.strictEqual(seen[1], outcome);
    });

    it('should return the outcome when an observer throws', () => {
        const { log, lines } = captureLogger();
        const after = mock.fn((_outcome: AnyOutcome) => undefined);
        const factory = new ObservedOutcomeFactory(defaultOutcomeFactory, [
            () => { throw new Error('metrics backend down'); },
            after
        ], log);

        const outcome = factory.createOutcome('session', peer, 'R1', 'P1', 'ctx-1', 10, undefined);

        assert.strictEqual(outcome.getResponse(), 'P1');
        assert.strictEqual(outcome.isSuccess(), true);
        assert.strictEqual(factory.observerFailures, 1);
        assert.strictEqual(after.mock.callCount(), 1);
        assert.strictEqual(lines.length, 1);
        assert.strictEqual(lines[0].msg, 'Outcome observer failed');
        assert.strictEqual(lines[0].error, 'metrics backend down');
        assert.strictEqual(lines[0].event, 'OUTCOME_OBSERVER_FAILED');
    });

    it('should fall back to a process warning when logging also fails', () => {
        const emitWarning = mock.method(process, 'emitWarning', () => undefined);
        const brokenLogger = {
            warn: () => { throw new Error('stream closed'); }
        } as unknown as Logger;
        const factory = new ObservedOutcomeFactory(defaultOutcomeFactory, [
            () => { throw new Error('observer broke'); }
        ], brokenLogger);

        const outcome = factory.createOutcome('session', undefined, 'R1', undefined, undefined, 10, undefined);

        assert.strictEqual(outcome.isTimeout(), true);
        assert.strictEqual(factory.observerFailures, 1);
        assert.strictEqual(emitWarning.mock.callCount(), 1);
        assert.strictEqual(
            emitWarning.mock.calls[0].arguments[0],
            'Outcome observer failed (observer broke); logging also failed: stream closed'
        );
    });

    it('should not contain errors raised by the delegate', () => {
        const factory = new ObservedOutcomeFactory(defaultOutcomeFactory, []);

        assert.throws(() => factory.createOutcome('session', peer, null, 'P1', undefined, 10, undefined));
    });

    it('should produce the same fields as the default factory', () => {
        const { log } = captureLogger();
        const factory = new ObservedOutcomeFactory(defaultOutcomeFactory, [createLoggingObserver(log)], log);
        const error = new Error('bad OID');

        const observed = factory.createOutcome('session', peer, 'R3', undefined, 'ctx-3', 0, error);
        const baseline = defaultOutcomeFactory.createOutcome('session', peer, 'R3', undefined, 'ctx-3', 0, error);

        assert.deepStrictEqual(observed.toFields(), baseline.toFields());
    });
});

describe('createLoggingObserver', () => {
    it('should log a fast reply at debug with its latency', () => {
        const { log, lines } = captureLogger();
        const observe = createLoggingObserver(log);

        observe(defaultOutcomeFactory.createOutcome('session', peer, 'R1', 'P1', undefined, 1_500_000, undefined));

        assert.strictEqual(lines.length, 1);
        assert.strictEqual(lines[0].level, 20);
        assert.strictEqual(lines[0].msg, 'Request done in 1.5 ms');
        assert.strictEqual(lines[0].outcomeKind, 'SUCCESS');
        assert.strictEqual(lines[0].peer, 'udp:10.0.0.5/161');
        assert.strictEqual(lines[0].durationMs, 1.5);
    });

    it('should log a slow reply at warn', () => {
        const { log, lines } = captureLogger();
        const observe = createLoggingObserver(log, { slowThresholdMs: 1 });

        observe(defaultOutcomeFactory.createOutcome('session', peer, 'R1', 'P1', undefined, 5_000_000, undefined));

        assert.strictEqual(lines[0].level, 40);
        assert.strictEqual(lines[0].msg, 'Slow request done in 5 ms');
    });

    it('should log a timeout at info without a peer', () => {
        const { log, lines } = captureLogger();
        const observe = createLoggingObserver(log);

        observe(defaultOutcomeFactory.createOutcome('session', undefined, 'R2', undefined, undefined, 5_000_000_000, undefined));

        assert.strictEqual(lines[0].level, 30);
        assert.strictEqual(lines[0].msg, 'Request timed out');
        assert.strictEqual(lines[0].outcomeKind, 'TIMEOUT');
        assert.strictEqual('peer' in lines[0], false);
    });

    it('should log a failure at warn with the error message', () => {
        const { log, lines } = captureLogger();
        const observe = createLoggingObserver(log);

        observe(defaultOutcomeFactory.createOutcome('session', undefined, 'R3', undefined, undefined, 0, new Error('bad OID')));

        assert.strictEqual(lines[0].level, 40);
        assert.strictEqual(lines[0].msg, 'Request failed');
        assert.strictEqual(lines[0].outcomeKind, 'ERROR');
        assert.strictEqual(lines[0].error, 'bad OID');
    });

    it('should redact credentials carried in the request', () => {
        const { log, lines } = captureLogger();
        const observe = createLoggingObserver(log);

        observe(defaultOutcomeFactory.createOutcome(
            'session', peer, { community: 'test-community', oid: '1.3.6.1.2.1.1.1.0' }, 'P1', undefined, 1_000, undefined
        ));

        assert.deepStrictEqual(lines[0].request, { community: REDACT_CENSOR, oid: '1.3.6.1.2.1.1.1.0' });
    });
});

describe('createOutcomeFactory', () => {
    it('should return the default factory when observation is disabled', () => {
        const factory = createOutcomeFactory({ observe: false, slowThresholdMs: 1000 });

        assert.strictEqual(factory, defaultOutcomeFactory);
    });

    it('should wire logging and statistics when observation is enabled', () => {
        const { log, lines } = captureLogger();
        const statistics = new OutcomeStatistics();
        const extra = mock.fn((_outcome: AnyOutcome) => undefined);
        const factory = createOutcomeFactory(
            { observe: true, slowThresholdMs: 1000 },
            { logger: log, statistics, observers: [extra] }
        );

        factory.createOutcome('session', peer, 'R1', 'P1', undefined, 2_000_000, undefined);
        factory.createOutcome('session', undefined, 'R2', undefined, undefined, undefined, undefined);

        assert.ok(factory instanceof ObservedOutcomeFactory);
        assert.strictEqual(lines.length, 2);
        assert.strictEqual(statistics.snapshot().total, 2);
        assert.strictEqual(extra.mock.callCount(), 2);
    });
});
