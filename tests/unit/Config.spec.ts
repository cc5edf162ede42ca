/**
 * Unit Tests: Client Configuration
 *
 * @see libs/config/clientConfig.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    DEFAULT_CLIENT_CONFIG,
    loadClientConfig,
    parseClientConfig
} from '../../libs/config/clientConfig.js';
import { ConfigurationError } from '../../libs/errors/errors.js';

describe('Client configuration', () => {
    it('should fall back to the defaults', () => {
        const config = parseClientConfig();

        assert.deepStrictEqual(config, DEFAULT_CLIENT_CONFIG);
        assert.strictEqual(config.baseUrl, 'https://example.org');
        assert.strictEqual(config.pollingIntervalMs, 10_000);
        assert.strictEqual(config.reconnectDelayMs, 10_000);
        assert.strictEqual(config.maxRetries, 5);
        assert.ok(Object.isFrozen(config));
    });

    it('should read values from the environment', () => {
        const config = loadClientConfig({
            PROPOSAL_API_BASE_URL: 'https://api.test',
            PROPOSAL_API_MAX_RETRIES: '3',
            PROPOSAL_API_RECONNECT_DELAY_MS: ' 2500 ',
            PROPOSAL_API_POLLING_INTERVAL_MS: ''
        });

        assert.strictEqual(config.baseUrl, 'https://api.test');
        assert.strictEqual(config.maxRetries, 3);
        assert.strictEqual(config.reconnectDelayMs, 2500);
        assert.strictEqual(config.pollingIntervalMs, 10_000);
    });

    it('should reject a base URL with a trailing slash', () => {
        assert.throws(
            () => loadClientConfig({ PROPOSAL_API_BASE_URL: 'https://api.test/' }),
            (error: unknown) => {
                assert.ok(error instanceof ConfigurationError);
                assert.deepStrictEqual(error.violations, ['PROPOSAL_API_BASE_URL must not have a trailing slash']);
                return true;
            }
        );
    });

    it('should reject a base URL that is not an HTTP URL', () => {
        assert.throws(
            () => parseClientConfig({ baseUrl: 'ftp://api.test' }),
            (error: unknown) => {
                assert.ok(error instanceof ConfigurationError);
                assert.deepStrictEqual(error.violations, ['baseUrl must be an http or https URL']);
                return true;
            }
        );
    });

    it('should report every invalid value at once', () => {
        assert.throws(
            () => loadClientConfig({
                PROPOSAL_API_MAX_RETRIES: '-1',
                PROPOSAL_API_TIMEOUT_MS: 'soon'
            }),
            (error: unknown) => {
                assert.ok(error instanceof ConfigurationError);
                assert.deepStrictEqual(
                    error.violations.map(violation => violation.split(' ')[0]),
                    ['PROPOSAL_API_MAX_RETRIES', 'PROPOSAL_API_TIMEOUT_MS']
                );
                assert.strictEqual(error.kind, 'configuration');
                return true;
            }
        );
    });
});
