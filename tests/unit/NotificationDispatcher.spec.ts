/**
 * Unit Tests: NotificationDispatcher
 *
 * @see libs/notify/notifier.ts
 */

import { describe, it, mock } from 'node:test';
import assert from 'node:assert';
import { NotificationDispatcher, type Notifier } from '../../libs/notify/notifier.js';
import { Change } from '../../libs/change/change.js';
import { NotifierError } from '../../libs/errors/errors.js';

function notifier(name: string, post: (change: Change) => Promise<void>) {
    const fn = mock.fn(post);
    const instance: Notifier = { name, post: fn };
    return { instance, fn };
}

describe('NotificationDispatcher', () => {
    it('should ignore unconfigured notifiers', () => {
        const slack = notifier('slack', async () => undefined);
        const dispatcher = new NotificationDispatcher([slack.instance, null, undefined]);
        assert.strictEqual(dispatcher.size, 1);
    });

    it('should post to every notifier in order', async () => {
        const order: string[] = [];
        const slack = notifier('slack', async () => { order.push('slack'); });
        const jira = notifier('jira', async () => { order.push('jira'); });
        const change = new Change('gcp', 'firewalls', 'p1');

        const outcomes = await new NotificationDispatcher([slack.instance, jira.instance]).dispatch(change);

        assert.deepStrictEqual(order, ['slack', 'jira']);
        assert.strictEqual(slack.fn.mock.calls[0]?.arguments[0], change);
        assert.deepStrictEqual(outcomes, [
            { notifier: 'slack', delivered: true },
            { notifier: 'jira', delivered: true }
        ]);
    });

    it('should keep going after a notifier fails', async () => {
        const slack = notifier('slack', async () => {
            throw new NotifierError('slack', 'Issue posting to Slack channel', { cause: new Error('invalid_auth') });
        });
        const jira = notifier('jira', async () => undefined);

        const outcomes = await new NotificationDispatcher([slack.instance, jira.instance])
            .dispatch(new Change('gcp', 'firewalls', 'p1'));

        assert.strictEqual(jira.fn.mock.callCount(), 1);
        assert.deepStrictEqual(outcomes, [
            { notifier: 'slack', delivered: false, error: 'Issue posting to Slack channel: invalid_auth' },
            { notifier: 'jira', delivered: true }
        ]);
    });
});
