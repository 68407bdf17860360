import type { OutcomeConfig } from '../bootstrap/config.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { ObservedOutcomeFactory } from './ObservedOutcomeFactory.js';
import { defaultOutcomeFactory, type OutcomeFactory } from './OutcomeFactory.js';
import { createLoggingObserver, type OutcomeObserver, type OutcomeStatistics } from './observers.js';

export interface OutcomeFactoryOptions {
    readonly logger?: Logger;
    readonly statistics?: OutcomeStatistics;
    readonly observers?: readonly OutcomeObserver[];
}

/**
 * Builds the factory a client should use for the given configuration.
 * With observation disabled the plain default factory is returned.
 */
export function createOutcomeFactory(
    config: Pick<OutcomeConfig, 'observe' | 'slowThresholdMs'>,
    options: OutcomeFactoryOptions = {}
): OutcomeFactory {
    if (!config.observe) {
        return defaultOutcomeFactory;
    }

    const log = options.logger ?? rootLogger;
    const observers: OutcomeObserver[] = [
        createLoggingObserver(log, { slowThresholdMs: config.slowThresholdMs }),
        ...(options.statistics ? [options.statistics.observer] : []),
        ...(options.observers ?? [])
    ];

    return new ObservedOutcomeFactory(defaultOutcomeFactory, observers, log);
}
