export type ChangerOrigin = 'automation' | 'manual';

export type ChangerClassification =
    | { readonly parsed: true; readonly login: string; readonly origin: ChangerOrigin }
    | { readonly parsed: false; readonly identity: string };

/**
 * Short login of an email-like identity: everything before the first `@`.
 * An identity without `@` is its own login. Returns null when nothing
 * usable precedes the `@`.
 */
export function extractLogin(identity: string): string | null {
    const login = identity.split('@')[0]?.trim() ?? '';
    return login.length > 0 ? login : null;
}

/**
 * Decides human vs. automation origin. The pattern is anchored at the start
 * of the full raw identity, not the login.
 */
export class ChangerClassifier {
    private readonly automationPattern: RegExp;

    constructor(automationAccountPattern: string) {
        this.automationPattern = new RegExp(`^(?:${automationAccountPattern})`);
    }

    isAutomation(identity: string): boolean {
        return this.automationPattern.test(identity);
    }

    classify(identity: string): ChangerClassification {
        const login = extractLogin(identity);
        if (login === null) {
            return { parsed: false, identity };
        }
        return {
            parsed: true,
            login,
            origin: this.isAutomation(identity) ? 'automation' : 'manual'
        };
    }
}
