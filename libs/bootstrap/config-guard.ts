import { logger } from '../logging/logger.js';
import { ConfigurationError } from '../errors/errors.js';

export type Environment = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'required'; name: string }
    | { type: 'forbidIf'; name: string; when: (env: Environment) => boolean; message: string }
    | { type: 'assert'; check: (env: Environment) => boolean; message: string };

/**
 * Configuration Guard
 * Evaluates every rule and reports all violations at once, so one start-up
 * attempt surfaces the whole misconfiguration.
 */
export class ConfigGuard {
    static violations(rules: readonly GuardRule[], env: Environment = process.env): string[] {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        return errors;
    }

    static enforce(rules: readonly GuardRule[], env: Environment = process.env): void {
        const errors = ConfigGuard.violations(rules, env);

        if (errors.length > 0) {
            // Log structure for machine parsing + human readability
            logger.fatal({
                errors,
                remediation: "Check environment variables and the configuration file."
            }, "Configuration Guard Violation");

            throw new ConfigurationError('Configuration guard violation', errors);
        }

        logger.info("Configuration guard passed.");
    }
}
