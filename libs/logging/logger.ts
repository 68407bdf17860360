import pino, { type Logger as PinoLogger } from "pino";
import { resolveLogLevel } from "../bootstrap/config.js";
import { describePeer } from "../address/transportAddress.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: resolveLogLevel(),
  base: {
    system: "request-outcome"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export type Logger = PinoLogger;

/**
 * Returns a child logger bound to a single outcome.
 */
export function getOutcomeLogger(
  outcome: { getKind(): string; getPeerAddress(): unknown },
  base: Logger = logger
): Logger {
  return base.child({
    outcomeKind: outcome.getKind(),
    peer: describePeer(outcome.getPeerAddress())
  });
}
