import { TransportError } from './errors.js';

/**
 * Fallback messages for error responses without a usable body.
 */
export const DEFAULT_STATUS_CODE_ERRORS: Readonly<Record<number, string>> = Object.freeze({
    400: 'It seems there was a problem with your input.',
    401: 'You are not authenticated. Please log in first.',
    403: 'You are not allowed to perform this action.',
    404: 'The required API endpoint could not be found. Please contact the observatory.',
    500: 'An internal server error has occurred. Please contact the observatory.'
});

/**
 * The server responded with a status code of 400 or above.
 */
export class ApiError extends TransportError {
    readonly statusCode: number;

    constructor(message: string, statusCode: number) {
        super(message);
        this.name = 'ApiError';
        this.statusCode = statusCode;
    }
}

export class BadRequestError extends ApiError {
    constructor(message: string) {
        super(message, 400);
        this.name = 'BadRequestError';
    }
}

export class NotAuthenticatedError extends ApiError {
    constructor(message: string) {
        super(message, 401);
        this.name = 'NotAuthenticatedError';
    }
}

export class ForbiddenError extends ApiError {
    constructor(message: string) {
        super(message, 403);
        this.name = 'ForbiddenError';
    }
}

export class NotFoundError extends ApiError {
    constructor(message: string) {
        super(message, 404);
        this.name = 'NotFoundError';
    }
}

export class ServerError extends ApiError {
    constructor(message: string) {
        super(message, 500);
        this.name = 'ServerError';
    }
}

/**
 * Picks the error message for an error response: the body's `message`
 * member, else its `error` member, else a default for the status code.
 */
export function resolveErrorMessage(statusCode: number, body: unknown): string {
    if (body !== null && typeof body === 'object') {
        if ('message' in body && body.message !== undefined && body.message !== null) {
            return String(body.message);
        }
        if ('error' in body && body.error !== undefined && body.error !== null) {
            return String(body.error);
        }
    }

    return DEFAULT_STATUS_CODE_ERRORS[statusCode] ?? `The request failed with a status code ${statusCode}.`;
}

export function createApiError(statusCode: number, body: unknown): ApiError {
    const message = resolveErrorMessage(statusCode, body);
    switch (statusCode) {
        case 400:
            return new BadRequestError(message);
        case 401:
            return new NotAuthenticatedError(message);
        case 403:
            return new ForbiddenError(message);
        case 404:
            return new NotFoundError(message);
        case 500:
            return new ServerError(message);
        default:
            return new ApiError(message, statusCode);
    }
}

/**
 * Throws the matching ApiError if the status code signals an error.
 */
export function raiseForStatus(statusCode: number, body: unknown): void {
    if (statusCode < 400) {
        return;
    }
    throw createApiError(statusCode, body);
}
