/**
 * Unit Tests: AzureActivityLogSource
 *
 * @see libs/audit/azureActivityLogSource.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    LogsQueryResultStatus,
    type LogsQueryResult,
    type LogsTable,
    type QueryTimeInterval
} from '@azure/monitor-query';
import {
    AzureActivityLogSource,
    buildActivityQuery,
    type WorkspaceLogsQuerier
} from '../../libs/audit/azureActivityLogSource.js';

class FakeQuerier implements WorkspaceLogsQuerier {
    public readonly calls: { workspaceId: string; query: string; timespan: QueryTimeInterval }[] = [];

    constructor(private readonly result: LogsQueryResult) { }

    async queryWorkspace(workspaceId: string, query: string, timespan: QueryTimeInterval): Promise<LogsQueryResult> {
        this.calls.push({ workspaceId, query, timespan });
        return this.result;
    }
}

const query = {
    logResourceType: 'Microsoft.Network/virtualNetworks',
    targetId: 'sub-1',
    since: new Date('2024-05-01T09:30:00Z'),
    pageSize: 6
};

const activityTable: LogsTable = {
    name: 'PrimaryResult',
    columnDescriptors: [
        { name: '_ResourceId', type: 'string' },
        { name: 'Caller', type: 'string' },
        { name: 'TimeGenerated', type: 'datetime' },
        { name: 'OperationNameValue', type: 'string' }
    ],
    rows: [
        [
            '/subscriptions/sub-1/resourcegroups/net/providers/microsoft.network/virtualnetworks/vnet1',
            'bob@example.com',
            new Date('2024-05-01T09:58:00Z'),
            'MICROSOFT.NETWORK/VIRTUALNETWORKS/WRITE'
        ],
        ['', '', 'garbage', 'WRITE']
    ]
};

describe('AzureActivityLogSource', () => {
    it('should build a subscription-scoped activity query', () => {
        const lines = buildActivityQuery(query).split('\n');

        assert.strictEqual(lines[0], 'AzureActivity');
        assert.strictEqual(lines[1], '| where TimeGenerated >= datetime(2024-05-01T09:30:00.000Z)');
        assert.strictEqual(lines[2], '| where SubscriptionId =~ "sub-1"');
        assert.strictEqual(lines[4], '| where OperationNameValue startswith "Microsoft.Network/virtualNetworks/"');
        assert.strictEqual(lines[6], '| top 6 by TimeGenerated desc');
    });

    it('should escape quotes in query values', () => {
        const lines = buildActivityQuery({ ...query, targetId: 'sub"1' }).split('\n');
        assert.strictEqual(lines[2], '| where SubscriptionId =~ "sub\\"1"');
    });

    it('should map activity rows to entries', async () => {
        const querier = new FakeQuerier({ status: LogsQueryResultStatus.Success, tables: [activityTable] });
        const source = new AzureActivityLogSource('ws-1', querier);

        const entries = await source.query(query);

        assert.strictEqual(querier.calls[0]?.workspaceId, 'ws-1');
        assert.strictEqual(entries.length, 2);
        const [first, second] = entries;
        assert.ok(first && second);
        assert.strictEqual(first.changer, 'bob@example.com');
        assert.strictEqual(first.resourceType, 'MICROSOFT.NETWORK/VIRTUALNETWORKS');
        assert.strictEqual(first.methodName, 'MICROSOFT.NETWORK/VIRTUALNETWORKS/WRITE');
        assert.strictEqual(first.timestamp?.toISOString(), '2024-05-01T09:58:00.000Z');
        assert.strictEqual(first.requestType, null);

        assert.strictEqual(second.changer, null);
        assert.strictEqual(second.resourceName, null);
        assert.strictEqual(second.resourceType, null);
        assert.strictEqual(second.timestamp, null);
    });

    it('should use the partial tables of a partial result', async () => {
        const querier = new FakeQuerier({
            status: LogsQueryResultStatus.PartialFailure,
            partialTables: [activityTable],
            partialError: Object.assign(new Error('query timed out'), { code: 'GatewayTimeout' })
        });
        const source = new AzureActivityLogSource('ws-1', querier);

        const entries = await source.query(query);

        assert.strictEqual(entries[0]?.changer, 'bob@example.com');
    });

    it('should return nothing for an empty result', async () => {
        const source = new AzureActivityLogSource('ws-1', new FakeQuerier({ status: LogsQueryResultStatus.Success, tables: [] }));
        assert.deepStrictEqual(await source.query(query), []);
    });
});
