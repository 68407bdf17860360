export type { OutcomeListener, ResponseInspector, SettleOptions } from './settle.js';
export { settleOutcome, settleOptionsFromConfig } from './settle.js';
export { OutcomeFuture } from './OutcomeFuture.js';
export { cancelledOutcome } from './cancel.js';
