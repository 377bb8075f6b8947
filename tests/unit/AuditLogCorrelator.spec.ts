/**
 * Unit Tests: AuditLogCorrelator
 *
 * @see libs/audit/correlator.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { AUDIT_PAGE_SIZE, AuditLogCorrelator } from '../../libs/audit/correlator.js';
import { createAuditLogEntry, type AuditLogEntry } from '../../libs/audit/auditLogEntry.js';
import type { AuditLogQuery, AuditLogSource } from '../../libs/audit/auditLogSource.js';
import { ResourceTypeRegistry } from '../../libs/audit/resourceRegistry.js';
import { AuditLogQueryError } from '../../libs/errors/errors.js';

class RecordingSource implements AuditLogSource {
    public readonly provider = 'gcp' as const;
    public readonly queries: AuditLogQuery[] = [];

    constructor(private readonly result: AuditLogEntry[] | Error) { }

    async query(query: AuditLogQuery): Promise<AuditLogEntry[]> {
        this.queries.push(query);
        if (this.result instanceof Error) {
            throw this.result;
        }
        return this.result;
    }
}

const target = { provider: 'gcp' as const, resourceType: 'networks', projectId: 'p1' };
const referenceTime = new Date('2024-05-01T10:00:00Z');

describe('AuditLogCorrelator', () => {
    let source: RecordingSource;

    beforeEach(() => {
        source = new RecordingSource([createAuditLogEntry({ changer: 'alice@example.com' })]);
    });

    it('should query the provider source over the scan window', async () => {
        const correlator = new AuditLogCorrelator([source]);

        const entries = await correlator.correlate(target, referenceTime, 30);

        assert.strictEqual(entries.length, 1);
        assert.strictEqual(source.queries.length, 1);
        const query = source.queries[0];
        assert.ok(query);
        assert.strictEqual(query.logResourceType, 'gce_network');
        assert.strictEqual(query.targetId, 'p1');
        assert.strictEqual(query.since.toISOString(), '2024-05-01T09:30:00.000Z');
        assert.strictEqual(query.pageSize, AUDIT_PAGE_SIZE);
    });

    it('should return at most one page of entries', async () => {
        const many = Array.from({ length: 8 }, (_, i) => createAuditLogEntry({ changer: `user${i}@example.com` }));
        const correlator = new AuditLogCorrelator([new RecordingSource(many)]);

        const entries = await correlator.correlate(target, referenceTime, 30);

        assert.strictEqual(entries.length, 6);
        assert.strictEqual(entries[5]?.changer, 'user5@example.com');
    });

    it('should reject providers without a source', async () => {
        const correlator = new AuditLogCorrelator([source]);

        await assert.rejects(
            correlator.correlate({ provider: 'azure', resourceType: 'virtualNetworks', projectId: 'sub-1' }, referenceTime, 30),
            (error: unknown) => error instanceof AuditLogQueryError
                && error.message === "No audit log source configured for provider 'azure'"
        );
    });

    it('should reject unregistered resource types', async () => {
        const correlator = new AuditLogCorrelator([source]);

        await assert.rejects(
            correlator.correlate({ ...target, resourceType: 'buckets' }, referenceTime, 30),
            AuditLogQueryError
        );
        assert.strictEqual(source.queries.length, 0);
    });

    it('should wrap source failures', async () => {
        const cause = new Error('permission denied');
        const correlator = new AuditLogCorrelator([new RecordingSource(cause)]);

        await assert.rejects(
            correlator.correlate(target, referenceTime, 30),
            (error: unknown) => error instanceof AuditLogQueryError && error.cause === cause
        );
    });

    it('should use registry overrides', async () => {
        const registry = new ResourceTypeRegistry({ gcp: { buckets: 'gcs_bucket' } });
        const correlator = new AuditLogCorrelator([source], registry);

        await correlator.correlate({ ...target, resourceType: 'buckets' }, referenceTime, 30);

        assert.strictEqual(source.queries[0]?.logResourceType, 'gcs_bucket');
    });
});

describe('ResourceTypeRegistry', () => {
    it('should carry defaults for both providers', () => {
        const registry = new ResourceTypeRegistry();
        assert.strictEqual(registry.logResourceType('gcp', 'firewalls'), 'gce_firewall_rule');
        assert.strictEqual(registry.logResourceType('azure', 'virtualNetworks'), 'Microsoft.Network/virtualNetworks');
    });

    it('should keep defaults next to overrides', () => {
        const registry = new ResourceTypeRegistry({ gcp: { buckets: 'gcs_bucket' } });
        assert.strictEqual(registry.logResourceType('gcp', 'networks'), 'gce_network');
        assert.strictEqual(registry.logResourceType('gcp', 'buckets'), 'gcs_bucket');
    });

    it('should not resolve inherited object keys', () => {
        const registry = new ResourceTypeRegistry();
        assert.strictEqual(registry.logResourceType('gcp', 'toString'), undefined);
    });
});
