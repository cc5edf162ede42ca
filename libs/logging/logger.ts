import { pino, type Logger } from 'pino';

import { REDACT_KEYS, REDACT_CENSOR } from './redactionConfig.js';

export type { Logger };

export const logger: Logger = pino({
    level: process.env.LOG_LEVEL?.trim() || 'info',
    base: {
        system: 'proposal-api-client'
    },
    redact: {
        paths: REDACT_KEYS,
        censor: REDACT_CENSOR
    }
});

/**
 * Returns a child logger tagged with the component name and any extra bindings.
 */
export function getComponentLogger(component: string, bindings: Record<string, string | number> = {}): Logger {
    return logger.child({ component, ...bindings });
}
