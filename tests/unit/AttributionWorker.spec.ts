/**
 * Unit Tests: AttributionWorker
 *
 * @see libs/attribution/attributionWorker.ts
 */

import { describe, it, beforeEach, mock } from 'node:test';
import * as assert from 'node:assert';
import { AttributionWorker } from '../../libs/attribution/attributionWorker.js';
import type { BatchResult } from '../../libs/attribution/changeAttributor.js';
import { Change } from '../../libs/change/change.js';
import { ChangeAttributionError } from '../../libs/errors/errors.js';

type Process = (changes: readonly Change[], referenceTime?: Date) => Promise<BatchResult>;

describe('AttributionWorker', () => {
    let detected: Change[];
    let detectChanges: ReturnType<typeof mock.fn<() => Promise<Change[]>>>;
    let process: ReturnType<typeof mock.fn<Process>>;
    let worker: AttributionWorker;

    beforeEach(() => {
        detected = [];
        detectChanges = mock.fn<() => Promise<Change[]>>(async () => detected);
        process = mock.fn<Process>(async changes => ({
            committed: changes.slice(0, 1),
            skipped: changes.slice(1),
            pushedCommits: 1
        }));
        worker = new AttributionWorker({ detectChanges }, { process }, 30);
    });

    it('should not process an empty batch', async () => {
        const result = await worker.runCycle();

        assert.strictEqual(result.detected, 0);
        assert.strictEqual(process.mock.callCount(), 0);
        assert.deepStrictEqual(result.errors, []);
    });

    it('should hand detected changes over with the reference time', async () => {
        detected = [new Change('gcp', 'networks', 'p1'), new Change('gcp', 'routes', 'p1')];
        const referenceTime = new Date('2024-05-01T10:00:00Z');

        const result = await worker.runCycle(referenceTime);

        assert.deepStrictEqual(result, { detected: 2, committed: 1, skipped: 1, pushed: 1, errors: [] });
        const call = process.mock.calls[0];
        assert.ok(call);
        assert.strictEqual(call.arguments[0], detected);
        assert.strictEqual(call.arguments[1], referenceTime);
    });

    it('should record a failed batch', async () => {
        detected = [new Change('gcp', 'networks', 'p1')];
        process.mock.mockImplementationOnce(async () => {
            throw new ChangeAttributionError('Issue pushing changes to remote', { cause: new Error('rejected') });
        });

        const result = await worker.runCycle();

        assert.deepStrictEqual(result.errors, ['Issue pushing changes to remote: rejected']);
        assert.strictEqual(result.committed, 0);
    });

    it('should not overlap cycles', async () => {
        detected = [new Change('gcp', 'networks', 'p1')];
        let release: () => void = () => undefined;
        process.mock.mockImplementationOnce(() => new Promise<BatchResult>(resolve => {
            release = () => resolve({ committed: [], skipped: [], pushedCommits: 0 });
        }));

        const first = worker.runCycle();
        const second = await worker.runCycle();
        await new Promise(resolve => setImmediate(resolve));
        release();
        await first;

        assert.deepStrictEqual(second.errors, ['cycle already in flight']);
        assert.strictEqual(detectChanges.mock.callCount(), 1);
    });
});
