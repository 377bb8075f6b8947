/**
 * Unit Tests: AuditLogEntry
 *
 * @see libs/audit/auditLogEntry.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    auditLogEntriesEqual,
    createAuditLogEntry,
    formatAuditLogEntry
} from '../../libs/audit/auditLogEntry.js';

describe('AuditLogEntry', () => {
    it('should default missing attributes to null', () => {
        const entry = createAuditLogEntry({ changer: 'alice@example.com' });
        assert.strictEqual(entry.changer, 'alice@example.com');
        assert.strictEqual(entry.resourceName, null);
        assert.strictEqual(entry.resourceType, null);
        assert.strictEqual(entry.timestamp, null);
        assert.strictEqual(entry.methodName, null);
        assert.strictEqual(entry.requestType, null);
    });

    it('should be immutable', () => {
        const entry = createAuditLogEntry({ changer: 'alice@example.com' });
        assert.ok(Object.isFrozen(entry));
    });

    it('should compare every attribute, timestamps by instant', () => {
        const a = createAuditLogEntry({
            resourceName: 'projects/p1/global/networks/vpc',
            changer: 'alice@example.com',
            timestamp: new Date('2024-05-01T09:55:00Z')
        });
        const b = createAuditLogEntry({
            resourceName: 'projects/p1/global/networks/vpc',
            changer: 'alice@example.com',
            timestamp: new Date('2024-05-01T09:55:00Z')
        });
        assert.strictEqual(auditLogEntriesEqual(a, b), true);
        assert.strictEqual(auditLogEntriesEqual(a, createAuditLogEntry({ ...a, changer: 'bob@example.com' })), false);
        assert.strictEqual(auditLogEntriesEqual(a, createAuditLogEntry({ ...a, timestamp: null })), false);
    });

    it('should format attributes space separated', () => {
        const entry = createAuditLogEntry({
            resourceName: 'vpc',
            resourceType: 'gce_network',
            changer: 'alice@example.com',
            timestamp: new Date('2024-05-01T09:55:00Z'),
            methodName: 'v1.compute.networks.patch',
            requestType: 'type.googleapis.com/compute.networks.patch'
        });
        assert.strictEqual(
            formatAuditLogEntry(entry),
            'vpc gce_network alice@example.com 2024-05-01T09:55:00.000Z v1.compute.networks.patch type.googleapis.com/compute.networks.patch'
        );
    });
});
