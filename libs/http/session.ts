/**
 * Transport Session
 *
 * Authenticated HTTP access to the proposal API. Endpoints are given relative
 * to the base URL (e.g. "/submissions/"); responses with a status of 400 or
 * above are turned into the matching ApiError.
 *
 * One instance is created explicitly and injected wherever requests are made;
 * there is no process-wide session.
 */

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';

import { getComponentLogger } from '../logging/logger.js';
import { ConfigurationError, TransportError } from '../errors/errors.js';
import { ApiError, createApiError } from '../errors/apiErrors.js';
import { validate } from '../validation/responseValidator.js';
import { DEFAULT_BASE_URL, DEFAULT_REQUEST_TIMEOUT_MS } from '../config/clientConfig.js';

const logger = getComponentLogger('Session');

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RequestOptions {
    /** Query string parameters */
    readonly params?: Readonly<Record<string, string | number>>;
    /** Request body: a JSON-serialisable value, URLSearchParams or FormData */
    readonly data?: unknown;
    /** 'arraybuffer' returns the raw body as a Buffer */
    readonly responseType?: 'json' | 'arraybuffer';
}

export interface SessionResponse {
    readonly status: number;
    readonly data: unknown;
}

/**
 * The contract the rest of the library relies on. Anything that can make
 * authenticated requests relative to a base URL can stand in for a Session.
 */
export interface TransportSession {
    readonly baseUrl: string;
    readonly accessToken: string | undefined;
    request(method: HttpMethod, endpoint: string, options?: RequestOptions): Promise<SessionResponse>;
}

export interface SessionOptions {
    readonly baseUrl?: string;
    readonly timeoutMs?: number;
    /** Replaces axios' HTTP adapter, e.g. with an in-process stand-in */
    readonly adapter?: AxiosAdapter;
}

const TokenResponseSchema = z.object({
    token: z.string().min(1)
});

export class Session implements TransportSession {
    private readonly http: AxiosInstance;
    private currentBaseUrl: string;
    private token: string | undefined;

    constructor(options: SessionOptions = {}) {
        this.currentBaseUrl = Session.checkBaseUrl(options.baseUrl ?? DEFAULT_BASE_URL);
        this.http = axios.create({
            timeout: options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
            // Error statuses are mapped by the session itself
            validateStatus: () => true,
            ...(options.adapter ? { adapter: options.adapter } : {})
        });
    }

    /**
     * The base URL relative to which endpoints are resolved. It must not have a
     * trailing slash.
     */
    get baseUrl(): string {
        return this.currentBaseUrl;
    }

    set baseUrl(value: string) {
        this.currentBaseUrl = Session.checkBaseUrl(value);
    }

    get loggedIn(): boolean {
        return this.token !== undefined;
    }

    get accessToken(): string | undefined {
        return this.token;
    }

    /**
     * Requests an API token and sends it in the Authorization header of all
     * further requests.
     *
     * @throws NotAuthenticatedError if the credentials are wrong
     * @throws ApiError if the token response cannot be parsed
     */
    async login(username: string, password: string): Promise<void> {
        const body = new URLSearchParams({ username, password });
        const response = await this.request('POST', '/token', { data: body });

        let token: string;
        try {
            token = validate(TokenResponseSchema, response.data, 'token request').token;
        } catch {
            throw new ApiError('The server response cannot be parsed.', response.status);
        }

        this.token = token;
        logger.info({ username }, 'Logged in');
    }

    /**
     * Stops sending the Authorization header. Does nothing when logged out.
     */
    logout(): void {
        if (!this.loggedIn) {
            return;
        }
        this.token = undefined;
        logger.info('Logged out');
    }

    async request(method: HttpMethod, endpoint: string, options: RequestOptions = {}): Promise<SessionResponse> {
        Session.checkEndpoint(endpoint);

        const url = this.currentBaseUrl + endpoint;
        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.request<unknown>({
                method,
                url,
                params: options.params,
                data: options.data,
                responseType: options.responseType ?? 'json',
                headers: this.token ? { Authorization: `Bearer ${this.token}` } : {}
            });
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            logger.warn({ method, endpoint, reason }, 'Request failed');
            throw new TransportError(`${method} ${url} failed: ${reason}`, { cause: error });
        }

        logger.debug({ method, endpoint, status: response.status }, 'Request completed');

        if (response.status >= 400) {
            throw createApiError(response.status, decodeErrorBody(response.data));
        }

        return { status: response.status, data: response.data };
    }

    private static checkBaseUrl(value: string): string {
        if (value.endsWith('/')) {
            throw new ConfigurationError(['The base URL must not have a trailing slash.']);
        }
        return value;
    }

    private static checkEndpoint(endpoint: string): void {
        // Full URLs are not allowed.
        if (endpoint.startsWith('http://') || endpoint.startsWith('https://')) {
            throw new TypeError(
                'The endpoint must be the path relative to the base URL, not the URL itself. ' +
                'An example would be "/submissions/".'
            );
        }

        if (!endpoint.startsWith('/') || endpoint.startsWith('//')) {
            throw new TypeError('The endpoint must start with a single slash. An example would be "/submissions/".');
        }
    }
}

/**
 * Error bodies of binary requests arrive as raw bytes; decode them so the
 * error message can still be read from them.
 */
function decodeErrorBody(data: unknown): unknown {
    if (!Buffer.isBuffer(data)) {
        return data;
    }
    try {
        const parsed: unknown = JSON.parse(data.toString('utf-8'));
        return parsed;
    } catch {
        return undefined;
    }
}
