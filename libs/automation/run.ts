import { z } from 'zod';
import { pino } from 'pino';
import { parseUtcTimestamp } from '../change/time.js';
import { AutomationRunQueryError } from '../errors/errors.js';

const logger = pino({ name: 'AutomationRun' });

/** Statuses of runs that may have modified infrastructure. */
export const CHANGE_RUN_STATUSES = ['applied', 'errored'] as const;

export type ChangeRunStatus = typeof CHANGE_RUN_STATUSES[number];

export function isChangeRunStatus(status: string | null | undefined): status is ChangeRunStatus {
    return CHANGE_RUN_STATUSES.some(changeStatus => changeStatus === status);
}

export interface AutomationRun {
    readonly message: string | null;
    readonly runId: string | null;
    readonly status: ChangeRunStatus;
    /** When the run applied, or errored for failed runs. */
    readonly applyTime: Date;
    readonly organization: string;
    readonly workspace: string;
}

const text = z.string().nullish().catch(null).transform(value => value ?? null);

const RunResourceSchema = z.object({
    id: text,
    attributes: z.object({
        status: text,
        message: text,
        'status-timestamps': z.record(z.string(), z.unknown()).nullish().catch(null)
    }).nullish().catch(null)
});

const RunListSchema = z.object({
    data: z.array(z.unknown())
});

function timestampField(timestamps: Record<string, unknown> | null | undefined, key: string): string | null {
    const value = timestamps?.[key];
    return typeof value === 'string' ? value : null;
}

/**
 * Converts a `runs` list response into change-relevant runs.
 *
 * Only `applied` and `errored` runs are kept. Errored runs never reach
 * `applying-at`, so they are timed by `errored-at` when present.
 *
 * @throws AutomationRunQueryError when the response carries no `data` array
 */
export function parseRuns(response: unknown, organization: string, workspace: string): AutomationRun[] {
    const list = RunListSchema.safeParse(response);
    if (!list.success) {
        throw new AutomationRunQueryError(`No 'data' in run list response for workspace '${workspace}'`);
    }

    const runs: AutomationRun[] = [];
    for (const item of list.data.data) {
        const parsed = RunResourceSchema.safeParse(item);
        const run = parsed.success ? parsed.data : null;
        const status = run?.attributes?.status ?? null;
        if (!run || status === null) {
            logger.warn({ organization, workspace, run: item }, 'No status field for run');
            continue;
        }
        if (!isChangeRunStatus(status)) {
            continue;
        }

        const timestamps = run.attributes?.['status-timestamps'];
        const applyTimeRaw = status === 'errored'
            ? timestampField(timestamps, 'errored-at') ?? timestampField(timestamps, 'applying-at')
            : timestampField(timestamps, 'applying-at');
        if (applyTimeRaw === null) {
            logger.warn({ organization, workspace, runId: run.id }, 'No status-timestamps field for run');
            continue;
        }
        const applyTime = parseUtcTimestamp(applyTimeRaw);
        if (!applyTime) {
            logger.warn({ organization, workspace, runId: run.id, applyTimeRaw }, 'Issue parsing run timestamp');
            continue;
        }

        runs.push(Object.freeze({
            message: run.attributes?.message ?? null,
            runId: run.id,
            status,
            applyTime,
            organization,
            workspace
        }));
    }
    return runs;
}

/**
 * Keeps runs that applied at or after `since`.
 */
export function filterRelevantRuns(runs: readonly AutomationRun[], since: Date): AutomationRun[] {
    return runs.filter(run => run.applyTime.getTime() >= since.getTime());
}

export function formatRun(run: AutomationRun): string {
    return `Msg: '${run.message ?? ''}', RunID: '${run.runId ?? ''}', Status: '${run.status}', Applied: '${run.applyTime.toISOString()}'`;
}
