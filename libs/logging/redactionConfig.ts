/**
 * Centralized Redaction Configuration
 * Keys whose values must never reach a log line. Requests and responses are
 * logged as-is, so credential-bearing fields of a management message are
 * listed here alongside the usual secrets.
 */
export const REDACT_KEYS = [
    // Community-based access (Root and Nested)
    'community', '*.community',
    'writeCommunity', '*.writeCommunity',

    // User-based security passphrases (Root and Nested)
    'authPassphrase', '*.authPassphrase',
    'privPassphrase', '*.privPassphrase',
    'authKey', '*.authKey',
    'privKey', '*.privKey',

    // Generic credentials (Root and Nested)
    'password', '*.password',
    'secret', '*.secret',
    'token', '*.token',
    'apiKey', '*.apiKey'
];

export const REDACT_CENSOR = '[REDACTED]';
