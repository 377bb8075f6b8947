import { google, logging_v2 } from 'googleapis';
import { z } from 'zod';
import { logger } from '../logging/logger.js';
import { formatUtcSeconds, parseUtcTimestamp } from '../change/time.js';
import { createAuditLogEntry, type AuditLogEntry } from './auditLogEntry.js';
import type { AuditLogQuery, AuditLogSource } from './auditLogSource.js';

const LOGGING_READ_SCOPE = 'https://www.googleapis.com/auth/logging.read';

/**
 * The slice of the Cloud Logging entries resource this source calls.
 */
export interface LogEntriesLister {
    list(params: { requestBody: logging_v2.Schema$ListLogEntriesRequest }): Promise<{
        data: logging_v2.Schema$ListLogEntriesResponse;
    }>;
}

export function createLogEntriesLister(): LogEntriesLister {
    const auth = new google.auth.GoogleAuth({ scopes: [LOGGING_READ_SCOPE] });
    const client = google.logging({ version: 'v2', auth });
    return {
        list: params => client.entries.list(params)
    };
}

const field = z.string().nullish().catch(null).transform(value => value ?? null);

/**
 * Audit record layout. Every level falls back to null so one odd field
 * never discards the rest of the record.
 */
const GcpAuditRecordSchema = z.object({
    timestamp: field,
    resource: z.object({ type: field }).nullish().catch(null),
    protoPayload: z.object({
        resourceName: field,
        methodName: field,
        authenticationInfo: z.object({ principalEmail: field }).nullish().catch(null),
        request: z.object({ '@type': field }).nullish().catch(null)
    }).nullish().catch(null)
});

export function buildGcpAuditFilter(logResourceType: string, since: Date): string {
    return [
        `timestamp>="${formatUtcSeconds(since)}"`,
        'logName: "cloudaudit.googleapis.com"',
        'logName: "activity"',
        `resource.type="${logResourceType}"`,
        'NOT protoPayload.response.@type="type.googleapis.com/error"'
    ].join(' AND ');
}

/**
 * Admin-activity audit logs from Cloud Logging, read from a single project.
 */
export class GcpAuditLogSource implements AuditLogSource {
    public readonly provider = 'gcp' as const;

    constructor(private readonly entries: LogEntriesLister = createLogEntriesLister()) { }

    async query(query: AuditLogQuery): Promise<AuditLogEntry[]> {
        const response = await this.entries.list({
            requestBody: {
                resourceNames: [`projects/${query.targetId}`],
                filter: buildGcpAuditFilter(query.logResourceType, query.since),
                orderBy: 'timestamp desc',
                pageSize: query.pageSize
            }
        });

        const records = response.data.entries ?? [];
        const result: AuditLogEntry[] = [];
        for (const record of records.slice(0, query.pageSize)) {
            const parsed = GcpAuditRecordSchema.safeParse(record);
            if (!parsed.success) {
                logger.warn({ targetId: query.targetId }, 'Skipping unreadable GCP audit record');
                continue;
            }
            result.push(toEntry(parsed.data, query.targetId));
        }
        return result;
    }
}

function toEntry(record: z.infer<typeof GcpAuditRecordSchema>, targetId: string): AuditLogEntry {
    const payload = record.protoPayload;
    const timestamp = parseUtcTimestamp(record.timestamp);
    if (!timestamp) {
        logger.warn({
            resourceName: payload?.resourceName ?? null,
            targetId,
            timestamp: record.timestamp
        }, 'Issue parsing GCP audit log timestamp');
    }

    return createAuditLogEntry({
        resourceName: payload?.resourceName,
        resourceType: record.resource?.type,
        changer: payload?.authenticationInfo?.principalEmail,
        timestamp,
        methodName: payload?.methodName,
        requestType: payload?.request?.['@type']
    });
}
