/**
 * Unit Tests: Transport Session
 *
 * Requests go to an in-process axios adapter instead of the network.
 *
 * @see libs/http/session.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { Session } from '../../libs/http/session.js';
import { ConfigurationError, TransportError } from '../../libs/errors/errors.js';
import { ApiError, NotAuthenticatedError, NotFoundError, ServerError } from '../../libs/errors/apiErrors.js';

interface StubResponse {
    status: number;
    data?: unknown;
}

function stubAdapter(...responses: Array<StubResponse | Error>) {
    const requests: InternalAxiosRequestConfig[] = [];
    const adapter: AxiosAdapter = async config => {
        requests.push(config);
        const response = responses.shift();
        if (response === undefined) {
            throw new Error(`Unexpected request to ${config.url}`);
        }
        if (response instanceof Error) {
            throw response;
        }
        return { status: response.status, statusText: '', data: response.data, headers: {}, config };
    };
    return { adapter, requests };
}

function authorizationHeader(config: InternalAxiosRequestConfig | undefined): unknown {
    return config?.headers['Authorization'];
}

describe('Session', () => {
    describe('base URL', () => {
        it('should reject a trailing slash', () => {
            assert.throws(() => new Session({ baseUrl: 'https://api.test/' }), ConfigurationError);

            const session = new Session({ baseUrl: 'https://api.test' });
            assert.throws(() => {
                session.baseUrl = 'https://other.test/';
            }, ConfigurationError);
            assert.strictEqual(session.baseUrl, 'https://api.test');
        });

        it('should resolve endpoints against the base URL', async () => {
            const { adapter, requests } = stubAdapter({ status: 200, data: {} });
            const session = new Session({ baseUrl: 'https://api.test/v1', adapter });

            await session.request('GET', '/submissions/abcd/progress', { params: { from_entry_number: 3 } });

            assert.strictEqual(requests[0]?.url, 'https://api.test/v1/submissions/abcd/progress');
            assert.strictEqual(requests[0]?.method, 'get');
            assert.deepStrictEqual(requests[0]?.params, { from_entry_number: 3 });
        });
    });

    describe('endpoints', () => {
        const session = new Session({ baseUrl: 'https://api.test', adapter: stubAdapter().adapter });

        it('should reject full URLs', async () => {
            await assert.rejects(session.request('GET', 'https://api.test/submissions/'), TypeError);
        });

        it('should require a single leading slash', async () => {
            await assert.rejects(session.request('GET', 'submissions/'), TypeError);
            await assert.rejects(session.request('GET', '//submissions/'), TypeError);
        });
    });

    describe('login() / logout()', () => {
        it('should request a token with the credentials', async () => {
            const { adapter, requests } = stubAdapter({ status: 200, data: { token: 'test-token' } });
            const session = new Session({ baseUrl: 'https://api.test', adapter });

            await session.login('jdoe', 'test-secret');

            assert.strictEqual(requests[0]?.method, 'post');
            assert.strictEqual(requests[0]?.url, 'https://api.test/token');
            assert.strictEqual(String(requests[0]?.data), 'username=jdoe&password=test-secret');
            assert.strictEqual(session.loggedIn, true);
            assert.strictEqual(session.accessToken, 'test-token');
        });

        it('should send the token until logging out', async () => {
            const { adapter, requests } = stubAdapter(
                { status: 200, data: { token: 'test-token' } },
                { status: 200, data: {} },
                { status: 200, data: {} }
            );
            const session = new Session({ baseUrl: 'https://api.test', adapter });

            await session.login('jdoe', 'test-secret');
            await session.request('GET', '/submissions/abcd/progress');
            session.logout();
            await session.request('GET', '/submissions/abcd/progress');

            assert.strictEqual(authorizationHeader(requests[1]), 'Bearer test-token');
            assert.strictEqual(authorizationHeader(requests[2]), undefined);
            assert.strictEqual(session.loggedIn, false);
            assert.strictEqual(session.accessToken, undefined);
        });

        it('should not mind logging out twice', () => {
            const session = new Session({ baseUrl: 'https://api.test' });

            session.logout();
            session.logout();

            assert.strictEqual(session.loggedIn, false);
        });

        it('should fail for wrong credentials', async () => {
            const { adapter } = stubAdapter({ status: 401, data: { message: 'Wrong username or password' } });
            const session = new Session({ baseUrl: 'https://api.test', adapter });

            await assert.rejects(session.login('jdoe', 'test-secret'), (error: unknown) => {
                assert.ok(error instanceof NotAuthenticatedError);
                assert.strictEqual(error.message, 'Wrong username or password');
                return true;
            });
            assert.strictEqual(session.loggedIn, false);
        });

        it('should fail for an unexpected token response', async () => {
            const { adapter } = stubAdapter({ status: 200, data: { access: 'test-token' } });
            const session = new Session({ baseUrl: 'https://api.test', adapter });

            await assert.rejects(session.login('jdoe', 'test-secret'), (error: unknown) => {
                assert.ok(error instanceof ApiError);
                assert.strictEqual(error.message, 'The server response cannot be parsed.');
                assert.strictEqual(error.statusCode, 200);
                return true;
            });
            assert.strictEqual(session.loggedIn, false);
        });
    });

    describe('request()', () => {
        it('should turn error statuses into API errors', async () => {
            const { adapter } = stubAdapter({ status: 500, data: '' });
            const session = new Session({ baseUrl: 'https://api.test', adapter });

            await assert.rejects(session.request('GET', '/submissions/abcd/progress'), (error: unknown) => {
                assert.ok(error instanceof ServerError);
                assert.strictEqual(error.message, 'An internal server error has occurred. Please contact the observatory.');
                return true;
            });
        });

        it('should read error messages from binary responses', async () => {
            const body = Buffer.from(JSON.stringify({ message: 'Unknown proposal' }));
            const { adapter } = stubAdapter({ status: 404, data: body });
            const session = new Session({ baseUrl: 'https://api.test', adapter });

            await assert.rejects(
                session.request('GET', '/proposals/2024-2-SCI-042.zip', { responseType: 'arraybuffer' }),
                (error: unknown) => {
                    assert.ok(error instanceof NotFoundError);
                    assert.strictEqual(error.message, 'Unknown proposal');
                    return true;
                }
            );
        });

        it('should wrap network failures', async () => {
            const cause = new Error('connect ECONNREFUSED');
            const { adapter } = stubAdapter(cause);
            const session = new Session({ baseUrl: 'https://api.test', adapter });

            await assert.rejects(session.request('GET', '/submissions/abcd/progress'), (error: unknown) => {
                assert.ok(error instanceof TransportError);
                assert.ok(!(error instanceof ApiError));
                assert.strictEqual(
                    error.message,
                    'GET https://api.test/submissions/abcd/progress failed: connect ECONNREFUSED'
                );
                assert.strictEqual(error.cause, cause);
                return true;
            });
        });

        it('should return status and body', async () => {
            const { adapter } = stubAdapter({ status: 201, data: { identifier: 'abcd' } });
            const session = new Session({ baseUrl: 'https://api.test', adapter });

            const response = await session.request('POST', '/submissions/', { data: { proposal_code: null } });

            assert.deepStrictEqual(response, { status: 201, data: { identifier: 'abcd' } });
        });
    });
});
