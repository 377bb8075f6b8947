import { pino } from 'pino';
import type { ChangeIdentity, Provider } from '../change/change.js';
import { windowStart } from '../change/time.js';
import { AuditLogQueryError } from '../errors/errors.js';
import type { AuditLogEntry } from './auditLogEntry.js';
import type { AuditLogSource } from './auditLogSource.js';
import { ResourceTypeRegistry } from './resourceRegistry.js';

const logger = pino({ name: 'AuditLogCorrelator' });

/** Entries fetched per lookup: one small page. */
export const AUDIT_PAGE_SIZE = 6;

/**
 * Finds the audit entries that may explain a change within the scan window.
 */
export class AuditLogCorrelator {
    private readonly sources: ReadonlyMap<Provider, AuditLogSource>;

    constructor(
        sources: readonly AuditLogSource[],
        private readonly registry: ResourceTypeRegistry = new ResourceTypeRegistry()
    ) {
        this.sources = new Map(sources.map(source => [source.provider, source]));
    }

    /**
     * @returns at most {@link AUDIT_PAGE_SIZE} entries, most recent first
     * @throws AuditLogQueryError when the provider or resource type is not wired,
     *         or the source fails at the transport boundary
     */
    public async correlate(
        target: ChangeIdentity,
        referenceTime: Date,
        windowMinutes: number
    ): Promise<AuditLogEntry[]> {
        const source = this.sources.get(target.provider);
        if (!source) {
            throw new AuditLogQueryError(`No audit log source configured for provider '${target.provider}'`);
        }

        const logResourceType = this.registry.logResourceType(target.provider, target.resourceType);
        if (!logResourceType) {
            throw new AuditLogQueryError(
                `No audit log resource type registered for '${target.provider}/${target.resourceType}'`
            );
        }

        const since = windowStart(referenceTime, windowMinutes);
        logger.debug({
            provider: target.provider,
            logResourceType,
            targetId: target.projectId,
            since: since.toISOString()
        }, 'Querying audit log');

        let entries: AuditLogEntry[];
        try {
            entries = await source.query({
                logResourceType,
                targetId: target.projectId,
                since,
                pageSize: AUDIT_PAGE_SIZE
            });
        } catch (error: unknown) {
            throw new AuditLogQueryError(
                `Audit log query failed for ${target.provider}/${target.resourceType}/${target.projectId}`,
                { cause: error }
            );
        }

        return entries.slice(0, AUDIT_PAGE_SIZE);
    }
}
