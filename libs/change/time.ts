const MINUTE_MS = 60_000;

const UTC_SECONDS_PREFIX = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})/;

/**
 * Start of a look-back window of `minutes` ending at `reference`.
 */
export function windowStart(reference: Date, minutes: number): Date {
    return new Date(reference.getTime() - minutes * MINUTE_MS);
}

/**
 * Parses the `YYYY-MM-DDTHH:MM:SS` prefix of an upstream timestamp as UTC,
 * dropping fractional seconds and offsets. Upstreams here always report UTC.
 */
export function parseUtcTimestamp(value: string | null | undefined): Date | null {
    if (!value) {
        return null;
    }
    const match = UTC_SECONDS_PREFIX.exec(value);
    if (!match?.[1]) {
        return null;
    }
    const parsed = new Date(`${match[1]}Z`);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * `YYYY-MM-DDTHH:MM:SS` rendering used in upstream filter expressions.
 */
export function formatUtcSeconds(value: Date): string {
    return value.toISOString().slice(0, 19);
}

/**
 * Current time truncated to whole seconds.
 */
export function utcNow(): Date {
    const now = Date.now();
    return new Date(now - (now % 1000));
}
