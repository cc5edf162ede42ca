/**
 * Progress Poller
 *
 * Exactly one round trip to the progress endpoint per call:
 *   GET /submissions/{identifier}/progress?from_entry_number=<n>
 * No caching and no retries; see ReconnectionController for the latter.
 */

import { isPollFailure } from '../errors/errors.js';
import { getComponentLogger } from '../logging/logger.js';
import type { TransportSession } from '../http/session.js';
import { parseProgressBatch } from './progressBatch.js';
import { assertEntryNumber, type PollOutcome, type ProgressSource } from './progressSource.js';

const logger = getComponentLogger('ProgressPoller');

export function progressEndpoint(identifier: string): string {
    return `/submissions/${encodeURIComponent(identifier)}/progress`;
}

export class HttpProgressPoller implements ProgressSource {
    readonly pushesUpdates = false;

    constructor(private readonly session: TransportSession) { }

    async fetch(identifier: string, fromEntryNumber: number): Promise<PollOutcome> {
        assertEntryNumber(fromEntryNumber);

        try {
            const response = await this.session.request('GET', progressEndpoint(identifier), {
                params: { from_entry_number: fromEntryNumber }
            });
            const batch = parseProgressBatch(response.data, fromEntryNumber);

            logger.debug({
                identifier,
                fromEntryNumber,
                status: batch.status,
                entryCount: batch.entries.length
            }, 'Fetched submission progress');

            return { kind: 'batch', batch };
        } catch (error) {
            if (isPollFailure(error)) {
                return { kind: 'failure', error };
            }
            throw error;
        }
    }

    close(): void {
        // Each fetch is a self-contained request.
    }
}
