import type { Logger } from 'pino';
import { logger as rootLogger, getChangeLogger } from '../logging/logger.js';
import { titleCase, type Change } from '../change/change.js';
import { utcNow } from '../change/time.js';
import { formatAuditLogEntry, type AuditLogEntry } from '../audit/auditLogEntry.js';
import type { AuditLogCorrelator } from '../audit/correlator.js';
import type { AutomationRunSource } from '../automation/runCorrelator.js';
import { formatRun, type AutomationRun } from '../automation/run.js';
import { ChangeAttributionError, UnknownChangerError, describeError } from '../errors/errors.js';
import type { NotificationDispatcher } from '../notify/notifier.js';
import type { VersionControl } from '../vcs/versionControl.js';
import type { ChangerClassifier } from './classifier.js';
import type { TicketExtractor } from './ticketExtractor.js';

export const UNIDENTIFIED_CHANGER_NOTE = 'Unable to identify changer';

export interface ChangeAttributorOptions {
    readonly repo: VersionControl;
    readonly auditLog: Pick<AuditLogCorrelator, 'correlate'>;
    readonly classifier: ChangerClassifier;
    /** Minutes; bounds both the audit-log lookup and run relevance. */
    readonly scanIntervalMinutes: number;
    readonly automationRuns?: AutomationRunSource | null;
    /** Null when the ticket pattern or ticket URL is not configured. */
    readonly tickets?: TicketExtractor | null;
    readonly notifications?: NotificationDispatcher | null;
}

export type ChangeOutcome = 'committed' | 'skipped';

export interface BatchResult {
    readonly committed: Change[];
    readonly skipped: Change[];
    /** Commits found ahead of the remote and pushed; 0 when nothing was pushed. */
    readonly pushedCommits: number;
}

/**
 * Attributes each detected change to its changer, commits it with the
 * attribution as message, notifies, then pushes the batch.
 *
 * Changes are handled one after another so that commits land in detection
 * order. Staging, committing and pushing abort the batch; lookups only
 * degrade the message.
 */
export class ChangeAttributor {
    constructor(private readonly options: ChangeAttributorOptions) { }

    public async process(changes: readonly Change[], referenceTime?: Date): Promise<BatchResult> {
        const committed: Change[] = [];
        const skipped: Change[] = [];

        for (const change of changes) {
            const outcome = await this.processChange(change, referenceTime);
            (outcome === 'committed' ? committed : skipped).push(change);
        }

        const pending = await this.pendingCommitCount();
        if (pending > 0) {
            rootLogger.info({ commits: pending }, 'Pushing commits to remote');
            try {
                await this.options.repo.push();
            } catch (error: unknown) {
                throw new ChangeAttributionError('Issue pushing changes to remote', { cause: error });
            }
        }

        return { committed, skipped, pushedCommits: pending };
    }

    public async processChange(change: Change, referenceTime?: Date): Promise<ChangeOutcome> {
        const { repo } = this.options;
        const log = getChangeLogger(change);
        const filename = change.filename;

        try {
            await repo.stagePath(filename);
        } catch (error: unknown) {
            throw new ChangeAttributionError(`Issue adding file '${filename}'`, { cause: error });
        }

        try {
            if (!(await repo.hasPendingDiff(filename))) {
                log.info({ filename }, 'Skipping non-change');
                return 'skipped';
            }
        } catch (error: unknown) {
            // Repositories without a first commit have no HEAD to compare against.
            log.warn({ filename, error: describeError(error) }, 'Issue checking pending diff against HEAD');
        }

        const reference = referenceTime ?? utcNow();
        let message = `${titleCase(change.resourceType)} updated in ${change.projectId}`;
        const note = (line: string) => {
            message += `\n ${line}`;
        };

        const entries = await this.findAuditEntries(change, reference, log);

        for (const entry of entries) {
            const identity = entry.changer;
            if (!identity) {
                log.info({ entry: formatAuditLogEntry(entry) }, 'Missing changer in audit log entry');
                continue;
            }

            const classification = this.options.classifier.classify(identity);
            if (!classification.parsed) {
                log.warn({ identity }, 'Issue retrieving changer login');
                if (!change.changers.includes(identity)) {
                    change.changers.push(identity);
                    note(`Change done by unknown user '${identity}'`);
                }
                continue;
            }

            const { login, origin } = classification;
            if (change.changers.includes(login)) {
                log.info({ login }, 'Skipping lookup for already seen changer');
                continue;
            }
            change.changers.push(login);

            if (origin === 'manual') {
                change.manual = true;
                log.info({ login }, 'Manual change detected');
                note(`MANUAL change done by ${login}`);
                continue;
            }

            note(`Terraform change done by ${login}`);
            const runs = await this.findRuns(login, reference, log);
            for (const line of this.describeRuns(runs, log)) {
                note(line);
            }
        }

        if (change.changers.length === 0) {
            note(UNIDENTIFIED_CHANGER_NOTE);
        }
        change.message = message;

        log.info({ filename }, 'Committing change');
        try {
            change.commitId = await repo.commit(message);
        } catch (error: unknown) {
            throw new ChangeAttributionError(`Issue committing change '${filename}'`, { cause: error });
        }
        try {
            change.diff = await repo.diffLastCommit();
        } catch (error: unknown) {
            log.warn({ filename, error: describeError(error) }, 'Issue reading diff of committed change');
        }

        if (this.options.notifications) {
            await this.options.notifications.dispatch(change);
        }
        return 'committed';
    }

    private async findAuditEntries(change: Change, reference: Date, log: Logger): Promise<AuditLogEntry[]> {
        let entries: AuditLogEntry[];
        try {
            log.info('Retrieving audit log entries');
            entries = await this.options.auditLog.correlate(change, reference, this.options.scanIntervalMinutes);
        } catch (error: unknown) {
            log.warn({ error: describeError(error) }, 'Issue getting audit log entries');
            return [];
        }

        if (entries.length === 1) {
            log.info('Found audit log entry for change');
        } else if (entries.length > 1) {
            log.info({ count: entries.length, entries: entries.map(formatAuditLogEntry) }, 'Multiple audit log entries found');
        }
        return entries;
    }

    private async findRuns(login: string, reference: Date, log: Logger): Promise<AutomationRun[]> {
        const source = this.options.automationRuns;
        if (!source) {
            return [];
        }
        log.info({ login }, 'Retrieving automation runs for service account');
        try {
            return await source.runsFor(login, {
                referenceTime: reference,
                windowMinutes: this.options.scanIntervalMinutes
            });
        } catch (error: unknown) {
            const reason = error instanceof UnknownChangerError ? 'unknown changer' : 'query failed';
            log.warn({ login, reason, error: describeError(error) }, 'Issue getting automation runs');
            return [];
        }
    }

    private describeRuns(runs: readonly AutomationRun[], log: Logger): string[] {
        const source = this.options.automationRuns;
        if (!source || runs.length === 0) {
            return [];
        }
        const { tickets } = this.options;
        if (!tickets) {
            log.info('Skipping ticket processing - ticket pattern and/or ticket URL not set');
        }

        const lines: string[] = [];
        for (const run of runs) {
            log.info({ run: formatRun(run) }, 'Processing automation run');
            lines.push(`Related TF run ${source.runUrl(run)}`);

            const ticketUrl = tickets?.ticketUrl(run.message) ?? null;
            if (ticketUrl) {
                lines.push(`Related ticket ${ticketUrl}`);
            }
        }
        return lines;
    }

    private async pendingCommitCount(): Promise<number> {
        const { repo } = this.options;
        try {
            return await repo.commitsAhead();
        } catch (error: unknown) {
            rootLogger.warn({ error: describeError(error) }, 'Issue checking commits ahead of remote');
        }
        try {
            return await repo.commitCount();
        } catch (error: unknown) {
            rootLogger.warn({ error: describeError(error) }, 'Unexpected error when counting commits');
            return 1;
        }
    }
}
