import { pino } from 'pino';
import type { Change } from '../change/change.js';
import { utcNow } from '../change/time.js';
import { describeError } from '../errors/errors.js';
import type { BatchResult } from './changeAttributor.js';

const logger = pino({ name: 'AttributionWorker' });

const MINUTE_MS = 60_000;

export interface ChangeSource {
    detectChanges(): Promise<Change[]>;
}

export interface BatchProcessor {
    process(changes: readonly Change[], referenceTime?: Date): Promise<BatchResult>;
}

export interface CycleResult {
    detected: number;
    committed: number;
    skipped: number;
    pushed: number;
    errors: string[];
}

/**
 * Attribution Worker
 *
 * Each cycle detects changed snapshot files and hands them to the
 * attributor as one batch. Cycles never overlap: the working tree has a
 * single writer.
 */
export class AttributionWorker {
    private isRunning = false;
    private cycleInFlight = false;
    private intervalHandle: NodeJS.Timeout | null = null;

    constructor(
        private readonly source: ChangeSource,
        private readonly processor: BatchProcessor,
        private readonly scanIntervalMinutes: number
    ) { }

    /**
     * Start the worker
     */
    public start(): void {
        if (this.isRunning) {
            logger.warn('AttributionWorker already running');
            return;
        }

        this.isRunning = true;
        logger.info({ scanIntervalMinutes: this.scanIntervalMinutes }, 'AttributionWorker started');

        // Run immediately, then on interval
        void this.runCycle();
        this.intervalHandle = setInterval(() => void this.runCycle(), this.scanIntervalMinutes * MINUTE_MS);
    }

    /**
     * Stop the worker
     */
    public stop(): void {
        this.isRunning = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        logger.info('AttributionWorker stopped');
    }

    /**
     * Run a single detect-and-attribute cycle. Failures are recorded in the
     * result; files left uncommitted are picked up again next cycle.
     */
    public async runCycle(referenceTime: Date = utcNow()): Promise<CycleResult> {
        const result: CycleResult = {
            detected: 0,
            committed: 0,
            skipped: 0,
            pushed: 0,
            errors: []
        };

        if (this.cycleInFlight) {
            logger.warn('Previous attribution cycle still running, skipping');
            result.errors.push('cycle already in flight');
            return result;
        }

        this.cycleInFlight = true;
        try {
            const changes = await this.source.detectChanges();
            result.detected = changes.length;
            if (changes.length === 0) {
                logger.debug('No changes detected');
                return result;
            }

            const batch = await this.processor.process(changes, referenceTime);
            result.committed = batch.committed.length;
            result.skipped = batch.skipped.length;
            result.pushed = batch.pushedCommits;
            logger.info({
                detected: result.detected,
                committed: result.committed,
                skipped: result.skipped,
                pushed: result.pushed
            }, 'Attribution cycle complete');
        } catch (error: unknown) {
            const errorMessage = describeError(error);
            result.errors.push(errorMessage);
            logger.error({ error: errorMessage }, 'Attribution cycle failed');
        } finally {
            this.cycleInFlight = false;
        }

        return result;
    }
}
