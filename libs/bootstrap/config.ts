import { z } from 'zod';
import { DEFAULT_TIMEOUT_MESSAGE } from '../errors/outcomeErrors.js';

/**
 * Outcome Configuration
 * Environment-driven settings for logging and factory selection.
 * Fail-closed: any invalid value rejects the whole configuration.
 */

const BooleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1');

const LogLevelSchema = z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info');

export const OutcomeConfigSchema = z.object({
    OUTCOME_LOG_LEVEL: LogLevelSchema,
    OUTCOME_OBSERVE: BooleanFlag.default('true'),
    OUTCOME_SLOW_THRESHOLD_MS: z.coerce.number().int().nonnegative().default(1000),
    OUTCOME_TIMEOUT_MESSAGE: z.string().min(1).max(256).default(DEFAULT_TIMEOUT_MESSAGE),
});

export type OutcomeLogLevel = z.infer<typeof LogLevelSchema>;

export interface OutcomeConfig {
    readonly logLevel: OutcomeLogLevel;
    readonly observe: boolean;
    readonly slowThresholdMs: number;
    readonly timeoutMessage: string;
}

export class ConfigValidationError extends Error {
    readonly code = 'CONFIG_INVALID';

    constructor(public readonly violations: readonly string[]) {
        super(`FATAL CONFIG: ${violations.join('; ')}`);
        this.name = 'ConfigValidationError';
    }
}

/**
 * Parses outcome settings from an environment map.
 *
 * @throws ConfigValidationError listing every invalid variable
 */
export function loadOutcomeConfig(env: NodeJS.ProcessEnv = process.env): OutcomeConfig {
    const parsed = OutcomeConfigSchema.safeParse(env);

    if (!parsed.success) {
        const violations = parsed.error.issues.map(
            (issue) => `${issue.path.join('.')}: ${issue.message}`
        );
        throw new ConfigValidationError(violations);
    }

    return Object.freeze({
        logLevel: parsed.data.OUTCOME_LOG_LEVEL,
        observe: parsed.data.OUTCOME_OBSERVE,
        slowThresholdMs: parsed.data.OUTCOME_SLOW_THRESHOLD_MS,
        timeoutMessage: parsed.data.OUTCOME_TIMEOUT_MESSAGE,
    });
}

/**
 * Reads only OUTCOME_LOG_LEVEL, falling back to `info` when it is invalid.
 * Used at logger creation, where a bad variable must not fail the import.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): OutcomeLogLevel {
    const parsed = LogLevelSchema.safeParse(env.OUTCOME_LOG_LEVEL);
    return parsed.success ? parsed.data : 'info';
}
