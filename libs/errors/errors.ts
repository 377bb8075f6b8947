/**
 * Error taxonomy for the attribution pipeline.
 *
 * Fatal failures (staging, committing, pushing) surface as ChangeAttributionError.
 * Everything else is caught by the orchestrator and only degrades the commit message.
 */

export type AttributionErrorCode =
    | 'CONFIGURATION_INVALID'
    | 'VCS_FAILED'
    | 'AUDIT_LOG_QUERY_FAILED'
    | 'AUTOMATION_RUN_QUERY_FAILED'
    | 'UNKNOWN_CHANGER'
    | 'NOTIFIER_FAILED'
    | 'ATTRIBUTION_FAILED';

export class AttributionError extends Error {
    public readonly code: AttributionErrorCode;
    public override cause?: unknown;

    constructor(code: AttributionErrorCode, message: string, options?: { cause?: unknown }) {
        super(message);
        this.name = 'AttributionError';
        this.code = code;
        this.cause = options?.cause;
    }
}

export class ConfigurationError extends AttributionError {
    constructor(message: string, public readonly violations: readonly string[] = [], options?: { cause?: unknown }) {
        super('CONFIGURATION_INVALID', message, options);
        this.name = 'ConfigurationError';
    }
}

export class VersionControlError extends AttributionError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('VCS_FAILED', message, options);
        this.name = 'VersionControlError';
    }
}

export class AuditLogQueryError extends AttributionError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('AUDIT_LOG_QUERY_FAILED', message, options);
        this.name = 'AuditLogQueryError';
    }
}

export class AutomationRunQueryError extends AttributionError {
    constructor(message: string, options?: { cause?: unknown; code?: 'AUTOMATION_RUN_QUERY_FAILED' | 'UNKNOWN_CHANGER' }) {
        super(options?.code ?? 'AUTOMATION_RUN_QUERY_FAILED', message, options);
        this.name = 'AutomationRunQueryError';
    }
}

/**
 * The changer login has no workspace mapping. Raised before any transport call.
 */
export class UnknownChangerError extends AutomationRunQueryError {
    constructor(public readonly login: string) {
        super(`Unknown changer '${login}': no automation workspace mapping`, { code: 'UNKNOWN_CHANGER' });
        this.name = 'UnknownChangerError';
    }
}

export class NotifierError extends AttributionError {
    constructor(public readonly notifier: string, message: string, options?: { cause?: unknown }) {
        super('NOTIFIER_FAILED', message, options);
        this.name = 'NotifierError';
    }
}

export class ChangeAttributionError extends AttributionError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('ATTRIBUTION_FAILED', message, options);
        this.name = 'ChangeAttributionError';
    }
}

/**
 * Renders any thrown value into a single log-safe line, following the cause chain.
 */
export function describeError(err: unknown): string {
    const parts: string[] = [];
    let current: unknown = err;
    let depth = 0;

    while (current !== undefined && current !== null && depth < 5) {
        if (current instanceof Error) {
            parts.push(current.message);
            current = current.cause;
        } else if (typeof current === 'string') {
            parts.push(current);
            current = undefined;
        } else if (typeof current === 'object' && 'message' in current && typeof current.message === 'string') {
            parts.push(current.message);
            current = undefined;
        } else {
            parts.push(String(current));
            current = undefined;
        }
        depth += 1;
    }

    return parts.length > 0 ? parts.join(': ') : 'Unknown error';
}
