/**
 * A single audit record that may identify who changed a resource.
 * Every attribute is nullable: upstream records are parsed defensively.
 */
export interface AuditLogEntry {
    readonly resourceName: string | null;
    readonly resourceType: string | null;
    /** Principal identity, usually an email. */
    readonly changer: string | null;
    readonly timestamp: Date | null;
    readonly methodName: string | null;
    readonly requestType: string | null;
}

export function createAuditLogEntry(fields: Partial<AuditLogEntry>): AuditLogEntry {
    return Object.freeze({
        resourceName: fields.resourceName ?? null,
        resourceType: fields.resourceType ?? null,
        changer: fields.changer ?? null,
        timestamp: fields.timestamp ?? null,
        methodName: fields.methodName ?? null,
        requestType: fields.requestType ?? null
    });
}

export function auditLogEntriesEqual(a: AuditLogEntry, b: AuditLogEntry): boolean {
    return a.resourceName === b.resourceName
        && a.resourceType === b.resourceType
        && a.changer === b.changer
        && (a.timestamp?.getTime() ?? null) === (b.timestamp?.getTime() ?? null)
        && a.methodName === b.methodName
        && a.requestType === b.requestType;
}

export function formatAuditLogEntry(entry: AuditLogEntry): string {
    return [
        entry.resourceName,
        entry.resourceType,
        entry.changer,
        entry.timestamp?.toISOString() ?? null,
        entry.methodName,
        entry.requestType
    ].join(' ');
}
