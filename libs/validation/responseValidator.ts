import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { ParseError } from '../errors/errors.js';

/**
 * Validates a decoded server response against a schema.
 * Throws a ParseError listing every issue on failure.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const issues = result.error.issues.map(issue => {
            const path = issue.path.join('.');
            return path ? `${path}: ${issue.message}` : issue.message;
        });

        logger.warn({ context, issues }, 'Unexpected response from the proposal API');

        throw new ParseError(`The server response for ${context} cannot be parsed.`, issues);
    }

    return result.data;
}

