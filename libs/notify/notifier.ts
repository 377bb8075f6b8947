import { pino } from 'pino';
import type { Change } from '../change/change.js';
import { describeError } from '../errors/errors.js';

const logger = pino({ name: 'NotificationDispatcher' });

export interface Notifier {
    readonly name: string;
    /** @throws NotifierError */
    post(change: Change): Promise<void>;
}

export interface DispatchOutcome {
    readonly notifier: string;
    readonly delivered: boolean;
    readonly error?: string;
}

/**
 * Fans a committed change out to every configured notifier. A failing
 * notifier is logged and never stops the others.
 */
export class NotificationDispatcher {
    private readonly notifiers: readonly Notifier[];

    constructor(notifiers: ReadonlyArray<Notifier | null | undefined>) {
        this.notifiers = notifiers.filter((notifier): notifier is Notifier => notifier != null);
    }

    get size(): number {
        return this.notifiers.length;
    }

    async dispatch(change: Change): Promise<DispatchOutcome[]> {
        const outcomes: DispatchOutcome[] = [];
        for (const notifier of this.notifiers) {
            try {
                await notifier.post(change);
                outcomes.push({ notifier: notifier.name, delivered: true });
            } catch (error: unknown) {
                const message = describeError(error);
                logger.warn({ notifier: notifier.name, change: change.filename, error: message }, 'Notification failed');
                outcomes.push({ notifier: notifier.name, delivered: false, error: message });
            }
        }
        return outcomes;
    }
}
