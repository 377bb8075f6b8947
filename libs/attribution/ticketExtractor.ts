/**
 * Pulls a ticket reference out of free-text run messages.
 *
 * The pattern must have one capture group; it is searched anywhere in the
 * message. Underscores in the captured id become hyphens (`TEST_1234` ->
 * `TEST-1234`) since ticket URLs use the hyphenated key.
 */
export class TicketExtractor {
    private readonly pattern: RegExp;
    private readonly baseUrl: string;

    constructor(ticketPattern: string, ticketBaseUrl: string) {
        this.pattern = new RegExp(ticketPattern);
        this.baseUrl = ticketBaseUrl.replace(/\/+$/, '');
    }

    extractTicketId(message: string | null): string | null {
        if (!message) {
            return null;
        }
        const captured = this.pattern.exec(message)?.[1];
        return captured ? captured.replace(/_/g, '-') : null;
    }

    ticketUrl(message: string | null): string | null {
        const ticketId = this.extractTicketId(message);
        return ticketId === null ? null : `${this.baseUrl}/${ticketId}`;
    }
}

/**
 * Builds an extractor only when both the pattern and the base URL are set.
 */
export function createTicketExtractor(ticketPattern?: string, ticketBaseUrl?: string): TicketExtractor | null {
    if (!ticketPattern || !ticketBaseUrl) {
        return null;
    }
    return new TicketExtractor(ticketPattern, ticketBaseUrl);
}
