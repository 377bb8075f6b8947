/**
 * Centralized Redaction Configuration
 * Defines keys that must be redacted from logs to prevent credential leakage.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'Authorization', '*.Authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'password', '*.password',
    'secret', '*.secret',
    'client_secret', '*.client_secret',

    // Collaborator credentials
    'slackToken', '*.slackToken',
    'jiraPassword', '*.jiraPassword',
    'orgTokens', '*.orgTokens',
    'headers.Authorization', '*.headers.Authorization'
];

export const REDACT_CENSOR = '[REDACTED]';
