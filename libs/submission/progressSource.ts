import type { PollFailure } from '../errors/errors.js';
import type { ProgressBatch } from './progressBatch.js';

/**
 * Result of one fetch from a progress source.
 *
 * - batch:   a decoded, contiguous batch
 * - closed:  the server ended the stream; no more data will come
 * - failure: a transient failure the caller may retry
 */
export type PollOutcome =
    | { readonly kind: 'batch'; readonly batch: ProgressBatch }
    | { readonly kind: 'closed' }
    | { readonly kind: 'failure'; readonly error: PollFailure };

export type DeliveredOutcome = Exclude<PollOutcome, { kind: 'failure' }>;

/**
 * Where progress batches come from: the HTTP progress endpoint or its
 * socket variant.
 */
export interface ProgressSource {
    /** True if the source waits for the server to push the next batch */
    readonly pushesUpdates: boolean;
    /**
     * Fetches everything from `fromEntryNumber` onward. Transient failures are
     * returned, not thrown; anything thrown is a programming error.
     */
    fetch(identifier: string, fromEntryNumber: number): Promise<PollOutcome>;
    /** Releases any open connection */
    close(): void;
}

export function assertEntryNumber(fromEntryNumber: number): void {
    if (!Number.isInteger(fromEntryNumber) || fromEntryNumber < 1) {
        throw new RangeError(`The entry number must be a positive integer, got ${fromEntryNumber}.`);
    }
}
