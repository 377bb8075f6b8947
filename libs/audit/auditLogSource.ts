import type { Provider } from '../change/change.js';
import type { AuditLogEntry } from './auditLogEntry.js';

export interface AuditLogQuery {
    /** Provider-side resource type, as resolved by the ResourceTypeRegistry. */
    readonly logResourceType: string;
    /** GCP project id or Azure subscription id. */
    readonly targetId: string;
    readonly since: Date;
    readonly pageSize: number;
}

/**
 * One provider's audit trail. Implementations return at most `pageSize`
 * entries, most recent first, and only throw for transport or auth failures.
 */
export interface AuditLogSource {
    readonly provider: Provider;
    query(query: AuditLogQuery): Promise<AuditLogEntry[]>;
}
