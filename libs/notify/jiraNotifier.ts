import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { pino } from 'pino';
import type { Change } from '../change/change.js';
import { NotifierError, describeError } from '../errors/errors.js';
import type { Notifier } from './notifier.js';

const logger = pino({ name: 'JiraNotifier' });

export const DEFAULT_ISSUE_TYPE = 'Task';

export interface JiraNotifierOptions {
    readonly url: string;
    readonly projectKey: string;
    readonly username: string;
    readonly password: string;
    readonly issueType?: string;
    /** Extra issue fields merged into every created issue. */
    readonly fields?: Readonly<Record<string, unknown>>;
    /** Only changes whose project id matches this pattern open tickets. */
    readonly projectIdFilter?: string;
}

const CreatedIssueSchema = z.object({
    key: z.string().min(1)
});

export function buildIssueSummary(change: Change): string {
    return `${change.provider.toUpperCase()} manual change detected - project: ${change.projectId}, resource: ${change.resourceType}`;
}

export function buildIssueDescription(change: Change): string {
    const changer = change.changers.length === 0 ? 'Unknown changer' : change.changers.join(', ');
    return `Manual changes performed by ${changer}\n\n{code:java}\n${change.diff ?? ''}\n{code}\n`;
}

/**
 * Opens a Jira issue for every manual change and hands it to the changer.
 */
export class JiraNotifier implements Notifier {
    public readonly name = 'jira';
    private readonly http: AxiosInstance;
    private readonly projectIdPattern: RegExp | null;

    constructor(private readonly options: JiraNotifierOptions, http?: AxiosInstance) {
        this.http = http ?? axios.create({
            baseURL: options.url.replace(/\/+$/, ''),
            auth: { username: options.username, password: options.password },
            headers: { 'Content-Type': 'application/json' }
        });
        this.projectIdPattern = options.projectIdFilter ? new RegExp(`^(?:${options.projectIdFilter})`) : null;
    }

    async post(change: Change): Promise<void> {
        if (!change.manual) {
            logger.info({ change: change.filename }, 'Skipping ticket creation for non-manual change');
            return;
        }
        if (this.projectIdPattern && !this.projectIdPattern.test(change.projectId)) {
            logger.info({ projectId: change.projectId }, 'Skipping ticket creation for non-matching project id');
            return;
        }

        const issueType = this.options.issueType ?? DEFAULT_ISSUE_TYPE;
        let issueKey: string;
        try {
            logger.info({ url: this.options.url, username: this.options.username }, 'Connecting to Jira');
            logger.info({ projectKey: this.options.projectKey, issueType }, 'Creating ticket');
            const { data } = await this.http.post<unknown>('/rest/api/2/issue', {
                fields: {
                    ...this.options.fields,
                    project: { key: this.options.projectKey },
                    summary: buildIssueSummary(change),
                    description: buildIssueDescription(change),
                    issuetype: { name: issueType }
                }
            });
            issueKey = CreatedIssueSchema.parse(data).key;
        } catch (error: unknown) {
            throw new NotifierError(this.name, 'Issue creating ticket', { cause: error });
        }

        for (const changer of change.changers) {
            try {
                logger.info({ issueKey, changer }, 'Assigning issue to changer');
                await this.http.put(`/rest/api/2/issue/${encodeURIComponent(issueKey)}/assignee`, { name: changer });
                break;
            } catch (error: unknown) {
                logger.warn({ issueKey, changer, error: describeError(error) }, 'Unable to assign ticket to changer');
            }
        }
    }
}
