import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { ConfigurationError } from '../errors/errors.js';

/**
 * Validates a document against a schema, throwing a ConfigurationError
 * that lists every violation.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const violations = result.error.issues.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);

        logger.warn({
            context,
            errors: violations,
        }, "Configuration validation failure");

        throw new ConfigurationError(`Invalid ${context}: ${violations.join('; ')}`, violations);
    }

    return result.data;
}

