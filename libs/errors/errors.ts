/**
 * Error taxonomy of the proposal API client.
 *
 * Every error raised by the library extends ProposalClientError and carries a
 * machine-readable `kind`. The polling path retries on the kinds listed in
 * RETRYABLE_ERROR_KINDS and lets everything else through untouched.
 */

export type ProposalClientErrorKind =
    | 'transport'      // Network failure or HTTP error status
    | 'parse'          // Malformed or unexpected response body
    | 'sequence'       // Progress entries not contiguous with the cursor
    | 'validation'     // Invalid submission archive
    | 'configuration'; // Invalid client configuration

export class ProposalClientError extends Error {
    readonly kind: ProposalClientErrorKind;
    readonly timestamp: string;

    constructor(kind: ProposalClientErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ProposalClientError';
        this.kind = kind;
        this.timestamp = new Date().toISOString();
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * The HTTP or socket call itself failed.
 */
export class TransportError extends ProposalClientError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('transport', message, options);
        this.name = 'TransportError';
    }
}

/**
 * The server response could not be decoded into the expected shape.
 */
export class ParseError extends ProposalClientError {
    readonly issues: readonly string[];

    constructor(message: string, issues: readonly string[] = [], options?: { cause?: unknown }) {
        super('parse', message, options);
        this.name = 'ParseError';
        this.issues = Object.freeze([...issues]);
    }
}

/**
 * A progress batch does not continue the log where the client left off.
 */
export class SequenceError extends ProposalClientError {
    readonly expectedEntryNumber: number;
    readonly receivedEntryNumber: number;

    constructor(expectedEntryNumber: number, receivedEntryNumber: number) {
        super(
            'sequence',
            `Expected log entry number ${expectedEntryNumber}, but received ${receivedEntryNumber}.`
        );
        this.name = 'SequenceError';
        this.expectedEntryNumber = expectedEntryNumber;
        this.receivedEntryNumber = receivedEntryNumber;
    }
}

/**
 * The content passed to submit() is unacceptable. Never retried.
 */
export class ValidationError extends ProposalClientError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('validation', message, options);
        this.name = 'ValidationError';
    }
}

export class ConfigurationError extends ProposalClientError {
    readonly violations: readonly string[];

    constructor(violations: readonly string[]) {
        super('configuration', `Invalid client configuration: ${violations.join('; ')}`);
        this.name = 'ConfigurationError';
        this.violations = Object.freeze([...violations]);
    }
}

export type PollFailure = TransportError | ParseError | SequenceError;

export const RETRYABLE_ERROR_KINDS: ReadonlySet<ProposalClientErrorKind> = new Set([
    'transport',
    'parse',
    'sequence'
]);

/**
 * True for the failures the reconnection logic treats as transient.
 */
export function isPollFailure(error: unknown): error is PollFailure {
    return error instanceof ProposalClientError && RETRYABLE_ERROR_KINDS.has(error.kind);
}
