/**
 * Centralized Redaction Configuration
 * Keys that must never reach a log line in clear text.
 * Audit detail redaction uses BASE_SENSITIVE_FIELDS (see libs/audit/redaction.ts).
 */
export const BASE_SENSITIVE_FIELDS = ['password', 'token', 'secret'] as const;

export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'password', '*.password',
    'token', '*.token',
    'access_token', '*.access_token',
    'refresh_token', '*.refresh_token',
    'secret', '*.secret',
    'client_secret', '*.client_secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Session material
    'session', '*.session',
    'mfa_code', '*.mfa_code',
    'cookie', '*.cookie'
];

export const REDACT_CENSOR = '[REDACTED]';
