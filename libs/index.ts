export * from './outcome/index.js';
export * from './completion/index.js';

export type { TransportAddress, TransportType } from './address/transportAddress.js';
export {
    TRANSPORT_TYPES,
    TransportAddressSchema,
    parseTransportAddress,
    formatTransportAddress,
    isTransportAddress,
    describePeer
} from './address/transportAddress.js';

export type { NanoClock, RequestTimer } from './timing/requestTimer.js';
export { startRequestTimer, monotonicClock } from './timing/requestTimer.js';

export type { OutcomeErrorCategory } from './errors/outcomeErrors.js';
export {
    OutcomeError,
    MissingRequestError,
    InvalidDurationError,
    InvalidAddressError,
    RequestTimeoutError,
    RequestCancelledError,
    ResponseRejectedError,
    ProcessingError,
    DEFAULT_TIMEOUT_MESSAGE
} from './errors/outcomeErrors.js';
export { normalizeError } from './errors/normalize.js';

export type { OutcomeConfig, OutcomeLogLevel } from './bootstrap/config.js';
export { loadOutcomeConfig, resolveLogLevel, OutcomeConfigSchema, ConfigValidationError } from './bootstrap/config.js';

export type { Logger } from './logging/logger.js';
export { logger, getOutcomeLogger } from './logging/logger.js';
