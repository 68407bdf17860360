/**
 * Outcome records and the factory extension point.
 */

export type { OutcomeKind, OutcomeKindTraits, OutcomeVariant, RetryPolicy } from './outcomeKind.js';
export { OUTCOME_KIND_METADATA, classifyOutcome } from './outcomeKind.js';

export type { OutcomeInit, OutcomeFields } from './OutcomeRecord.js';
export { OutcomeRecord } from './OutcomeRecord.js';

export type { OutcomeFactory } from './OutcomeFactory.js';
export { DefaultOutcomeFactory, defaultOutcomeFactory } from './OutcomeFactory.js';
export { ObservedOutcomeFactory } from './ObservedOutcomeFactory.js';

export type {
    AnyOutcome,
    OutcomeObserver,
    LoggingObserverOptions,
    OutcomeStatisticsSnapshot
} from './observers.js';
export { createLoggingObserver, OutcomeStatistics, DEFAULT_SLOW_THRESHOLD_MS } from './observers.js';

export type { OutcomeFactoryOptions } from './createOutcomeFactory.js';
export { createOutcomeFactory } from './createOutcomeFactory.js';
