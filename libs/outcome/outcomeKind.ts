/**
 * Outcome kinds.
 *
 * The {response, error} pair of an outcome forms four distinguishable cases.
 * They are kept apart rather than collapsed into success/failure so that a
 * consumer can tell "no reply on the network" from "reply rejected locally".
 */

export type OutcomeKind =
    | 'SUCCESS'        // Reply received, no error
    | 'TIMEOUT'        // No reply, no error detail
    | 'ERROR'          // Failed before any reply was attributable
    | 'PARTIAL_ERROR'; // Reply received but failed post-processing

/**
 * Whether a caller may resend the request after this kind of outcome.
 * Errors depend on their cause (transport vs. encoding), so the caller decides.
 */
export type RetryPolicy = 'ALLOWED' | 'CALLER_DECIDES' | 'NOT_APPLICABLE';

export interface OutcomeKindTraits {
    /** Whether a reply reached the client */
    readonly replyReceived: boolean;
    /** Whether the outcome counts as failed */
    readonly failed: boolean;
    readonly retry: RetryPolicy;
    readonly description: string;
}

export const OUTCOME_KIND_METADATA: Record<OutcomeKind, OutcomeKindTraits> = {
    SUCCESS: {
        retry: 'NOT_APPLICABLE',
        replyReceived: true,
        failed: false,
        description: 'Reply received and accepted'
    },
    TIMEOUT: {
        retry: 'ALLOWED',
        replyReceived: false,
        failed: true,
        description: 'No reply arrived within the deadline'
    },
    ERROR: {
        retry: 'CALLER_DECIDES',
        replyReceived: false,
        failed: true,
        description: 'Processing failed before a reply was received'
    },
    PARTIAL_ERROR: {
        retry: 'CALLER_DECIDES',
        replyReceived: true,
        failed: true,
        description: 'Reply received but failed local processing'
    }
};

export function classifyOutcome(response: unknown, error: unknown): OutcomeKind {
    const hasResponse = response !== undefined && response !== null;
    const hasError = error !== undefined && error !== null;

    if (hasError) return hasResponse ? 'PARTIAL_ERROR' : 'ERROR';
    return hasResponse ? 'SUCCESS' : 'TIMEOUT';
}

/**
 * Tagged view of an outcome carrying only the fields its kind defines.
 */
export type OutcomeVariant<TRequest, TResponse, TAddress> =
    | { readonly kind: 'SUCCESS'; readonly request: TRequest; readonly response: TResponse; readonly peerAddress?: TAddress }
    | { readonly kind: 'TIMEOUT'; readonly request: TRequest }
    | { readonly kind: 'ERROR'; readonly request: TRequest; readonly error: Error; readonly peerAddress?: TAddress }
    | { readonly kind: 'PARTIAL_ERROR'; readonly request: TRequest; readonly response: TResponse; readonly error: Error; readonly peerAddress?: TAddress };
