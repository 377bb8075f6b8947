import { DefaultAzureCredential, type TokenCredential } from '@azure/identity';
import {
    LogsQueryClient,
    LogsQueryResultStatus,
    type LogsQueryResult,
    type LogsTable,
    type QueryTimeInterval
} from '@azure/monitor-query';
import { logger } from '../logging/logger.js';
import { parseUtcTimestamp } from '../change/time.js';
import { createAuditLogEntry, type AuditLogEntry } from './auditLogEntry.js';
import type { AuditLogQuery, AuditLogSource } from './auditLogSource.js';

/**
 * The slice of LogsQueryClient this source calls.
 */
export interface WorkspaceLogsQuerier {
    queryWorkspace(workspaceId: string, query: string, timespan: QueryTimeInterval): Promise<LogsQueryResult>;
}

export function createWorkspaceLogsQuerier(credential: TokenCredential = new DefaultAzureCredential()): WorkspaceLogsQuerier {
    return new LogsQueryClient(credential);
}

type Cell = LogsTable['rows'][number][number];

function kqlString(value: string): string {
    return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function buildActivityQuery(query: AuditLogQuery): string {
    return [
        'AzureActivity',
        `| where TimeGenerated >= datetime(${query.since.toISOString()})`,
        `| where SubscriptionId =~ ${kqlString(query.targetId)}`,
        '| where CategoryValue == "Administrative"',
        `| where OperationNameValue startswith ${kqlString(`${query.logResourceType}/`)}`,
        '| where ActivityStatusValue != "Failure"',
        `| top ${query.pageSize} by TimeGenerated desc`,
        '| project _ResourceId, Caller, TimeGenerated, OperationNameValue'
    ].join('\n');
}

/**
 * Administrative activity log of a subscription, read from the Log Analytics
 * workspace the subscription exports its activity log to.
 */
export class AzureActivityLogSource implements AuditLogSource {
    public readonly provider = 'azure' as const;

    constructor(
        private readonly workspaceId: string,
        private readonly client: WorkspaceLogsQuerier = createWorkspaceLogsQuerier()
    ) { }

    async query(query: AuditLogQuery): Promise<AuditLogEntry[]> {
        const result = await this.client.queryWorkspace(
            this.workspaceId,
            buildActivityQuery(query),
            { startTime: query.since, endTime: new Date() }
        );

        let tables: LogsTable[];
        if (result.status === LogsQueryResultStatus.Success) {
            tables = result.tables;
        } else {
            logger.warn({
                targetId: query.targetId,
                error: result.partialError.message
            }, 'Partial Azure activity log result');
            tables = result.partialTables;
        }

        const table = tables[0];
        if (!table) {
            return [];
        }

        const columns = table.columnDescriptors.map(column => column.name ?? '');
        const entries: AuditLogEntry[] = [];
        for (const row of table.rows.slice(0, query.pageSize)) {
            const cell = (name: string): Cell | undefined => {
                const index = columns.indexOf(name);
                return index >= 0 ? row[index] : undefined;
            };
            const operation = asString(cell('OperationNameValue'));
            const timestamp = asTimestamp(cell('TimeGenerated'));
            if (!timestamp) {
                logger.warn({ targetId: query.targetId, operation }, 'Issue parsing Azure activity log timestamp');
            }
            entries.push(createAuditLogEntry({
                resourceName: asString(cell('_ResourceId')),
                resourceType: operation && operation.includes('/')
                    ? operation.slice(0, operation.lastIndexOf('/'))
                    : null,
                changer: asString(cell('Caller')),
                timestamp,
                methodName: operation
            }));
        }
        return entries;
    }
}

function asString(value: Cell | undefined): string | null {
    return typeof value === 'string' && value.length > 0 ? value : null;
}

function asTimestamp(value: Cell | undefined): Date | null {
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? null : value;
    }
    return typeof value === 'string' ? parseUtcTimestamp(value) : null;
}
