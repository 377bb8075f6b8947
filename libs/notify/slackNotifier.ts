import { WebClient } from '@slack/web-api';
import { pino } from 'pino';
import type { Change } from '../change/change.js';
import { NotifierError } from '../errors/errors.js';
import type { Notifier } from './notifier.js';

const logger = pino({ name: 'SlackNotifier' });

export const MANUAL_CHANGE_HEADER = ':warning: *MANUAL CHANGE* :warning:';

export interface SlackUpload {
    readonly channelId: string;
    readonly title: string;
    readonly filename: string;
    readonly content: string;
    readonly initialComment: string;
}

export interface SlackFileUploader {
    upload(upload: SlackUpload): Promise<void>;
}

export function createSlackUploader(token: string): SlackFileUploader {
    const client = new WebClient(token);
    return {
        upload: async upload => {
            await client.filesUploadV2({
                channel_id: upload.channelId,
                title: upload.title,
                filename: upload.filename,
                content: upload.content,
                initial_comment: upload.initialComment
            });
        }
    };
}

export interface SlackNotifierOptions {
    readonly channelId: string;
    /** Commit URL prefix, e.g. https://github.com/<org>/<repo>/commit */
    readonly repoCommitUrl: string;
    /** Branch whose history is linked when the commit id is unknown. Defaults to master. */
    readonly branch?: string;
}

/**
 * Posts the diff of each committed change to a Slack channel.
 */
export class SlackNotifier implements Notifier {
    public readonly name = 'slack';

    constructor(
        private readonly options: SlackNotifierOptions,
        private readonly uploader: SlackFileUploader
    ) { }

    get channelId(): string {
        return this.options.channelId;
    }

    buildComment(change: Change): string {
        let comment = change.manual ? `${MANUAL_CHANGE_HEADER}\n` : '';
        comment += `${change.message ?? ''}\n`;
        if (change.commitId) {
            comment += `Commit: ${this.options.repoCommitUrl}/${change.commitId}\n`;
        } else {
            // "<repo>/commit" + "s/<branch>" lands on the branch history page.
            comment += `Unknown commit ID: ${this.options.repoCommitUrl}s/${this.options.branch ?? 'master'}\n`;
        }
        return comment;
    }

    async post(change: Change): Promise<void> {
        logger.info({ channelId: this.options.channelId, change: change.filename }, 'Posting to Slack channel');
        try {
            await this.uploader.upload({
                channelId: this.options.channelId,
                title: change.filename,
                filename: change.filename,
                content: change.diff ?? '',
                initialComment: this.buildComment(change)
            });
        } catch (error: unknown) {
            throw new NotifierError(this.name, 'Issue posting to Slack channel', { cause: error });
        }
    }
}
