/**
 * Centralized Redaction Configuration
 * Keys that must never reach the logs: credentials sent to the proposal API
 * and the bearer token it hands back.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'Authorization', '*.Authorization',
    'headers.Authorization', '*.headers.Authorization',
    'token', '*.token',
    'accessToken', '*.accessToken',
    'access_token', '*.access_token',
    'password', '*.password',
    'secret', '*.secret'
];

export const REDACT_CENSOR = '[REDACTED]';
