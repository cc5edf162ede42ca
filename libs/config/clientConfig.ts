import { z } from 'zod';
import { logger } from '../logging/logger.js';
import { ConfigurationError } from '../errors/errors.js';

/**
 * Client configuration.
 * All violations are collected before failing, so one run reports every
 * misconfigured value.
 */

export const DEFAULT_BASE_URL = 'https://example.org';
export const DEFAULT_POLLING_INTERVAL_MS = 10_000;
export const DEFAULT_RECONNECT_DELAY_MS = 10_000;
export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export const ClientConfigSchema = z.object({
    baseUrl: z.string()
        .url()
        .refine(value => /^https?:\/\//.test(value), 'must be an http or https URL')
        .refine(value => !value.endsWith('/'), 'must not have a trailing slash'),
    pollingIntervalMs: z.coerce.number().int().nonnegative(),
    reconnectDelayMs: z.coerce.number().int().nonnegative(),
    maxRetries: z.coerce.number().int().nonnegative(),
    requestTimeoutMs: z.coerce.number().int().positive()
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigKey = keyof ClientConfig;

export const DEFAULT_CLIENT_CONFIG: Readonly<ClientConfig> = Object.freeze({
    baseUrl: DEFAULT_BASE_URL,
    pollingIntervalMs: DEFAULT_POLLING_INTERVAL_MS,
    reconnectDelayMs: DEFAULT_RECONNECT_DELAY_MS,
    maxRetries: DEFAULT_MAX_RETRIES,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS
});

/**
 * Environment variable for each configuration value.
 */
export const CONFIG_ENV_VARS: Readonly<Record<ClientConfigKey, string>> = Object.freeze({
    baseUrl: 'PROPOSAL_API_BASE_URL',
    pollingIntervalMs: 'PROPOSAL_API_POLLING_INTERVAL_MS',
    reconnectDelayMs: 'PROPOSAL_API_RECONNECT_DELAY_MS',
    maxRetries: 'PROPOSAL_API_MAX_RETRIES',
    requestTimeoutMs: 'PROPOSAL_API_TIMEOUT_MS'
});

const CONFIG_KEYS: readonly ClientConfigKey[] = [
    'baseUrl',
    'pollingIntervalMs',
    'reconnectDelayMs',
    'maxRetries',
    'requestTimeoutMs'
];

export type ClientConfigInput = Partial<Record<ClientConfigKey, unknown>>;

function enforce(candidate: ClientConfigInput, label: (key: string) => string): Readonly<ClientConfig> {
    const merged: Record<string, unknown> = {};
    for (const key of CONFIG_KEYS) {
        merged[key] = candidate[key] ?? DEFAULT_CLIENT_CONFIG[key];
    }

    const result = ClientConfigSchema.safeParse(merged);
    if (!result.success) {
        const violations = result.error.issues.map(issue => `${label(issue.path.join('.'))} ${issue.message}`);
        logger.error({ violations }, 'Configuration Guard Violation');
        throw new ConfigurationError(violations);
    }

    return Object.freeze(result.data);
}

/**
 * Validates an explicit configuration, filling in defaults for missing values.
 *
 * @throws ConfigurationError listing every invalid value
 */
export function parseClientConfig(input: ClientConfigInput = {}): Readonly<ClientConfig> {
    return enforce(input, key => key);
}

/**
 * Loads the configuration from environment variables. Empty variables count
 * as unset.
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ClientConfig> {
    const input: ClientConfigInput = {};
    for (const key of CONFIG_KEYS) {
        const value = env[CONFIG_ENV_VARS[key]]?.trim();
        if (value) {
            input[key] = value;
        }
    }

    return enforce(input, key => (isConfigKey(key) ? CONFIG_ENV_VARS[key] : key));
}

function isConfigKey(key: string): key is ClientConfigKey {
    return CONFIG_KEYS.some(k => k === key);
}
