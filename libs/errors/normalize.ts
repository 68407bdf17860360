import { ProcessingError } from './outcomeErrors.js';

/**
 * Turns an arbitrary thrown value into an Error suitable for the `error`
 * field of an outcome. Error instances pass through unchanged; anything else
 * is wrapped in a ProcessingError with the original value as `cause`.
 */
export function normalizeError(err: unknown, contextLabel: string): Error {
    if (err instanceof Error) return err;

    let message: string;
    if (typeof err === 'string') {
        message = err;
    } else if (err !== null && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
        message = err.message;
    } else {
        message = String(err);
    }

    return new ProcessingError(`${contextLabel}: ${message}`, contextLabel, { cause: err });
}
