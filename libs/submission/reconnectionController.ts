/**
 * Reconnection Controller
 *
 * Retries a progress source across transient failures with a fixed backoff.
 * The consecutive-failure count spans calls and is only cleared by reset()
 * or by giving up. The owner calls reset() once a fetched batch is merged.
 */

import type { Clock } from '../clock/clock.js';
import { getComponentLogger, type Logger } from '../logging/logger.js';
import type { DeliveredOutcome, ProgressSource } from './progressSource.js';

export interface ReconnectionOptions {
    /** Retries allowed after the initial attempt before a failure is fatal */
    readonly maxRetries: number;
    /** Fixed delay between attempts */
    readonly reconnectDelayMs: number;
    readonly clock: Clock;
    readonly logger?: Logger;
}

export class ReconnectionController {
    private consecutiveFailures = 0;
    private readonly logger: Logger;

    constructor(
        private readonly source: ProgressSource,
        private readonly options: ReconnectionOptions
    ) {
        if (!Number.isInteger(options.maxRetries) || options.maxRetries < 0) {
            throw new RangeError(`maxRetries must be a non-negative integer, got ${options.maxRetries}.`);
        }
        this.logger = options.logger ?? getComponentLogger('ReconnectionController');
    }

    get failureCount(): number {
        return this.consecutiveFailures;
    }

    reset(): void {
        this.consecutiveFailures = 0;
    }

    /**
     * Fetches from `fromEntryNumber`, retrying with the same entry number
     * (nothing was merged) until the source delivers or the retry budget is
     * spent. The last failure is thrown once the budget is exceeded.
     */
    async fetchWithRetry(identifier: string, fromEntryNumber: number): Promise<DeliveredOutcome> {
        while (true) {
            const outcome = await this.source.fetch(identifier, fromEntryNumber);
            if (outcome.kind !== 'failure') {
                return outcome;
            }

            this.consecutiveFailures += 1;
            const error = outcome.error;

            if (this.consecutiveFailures > this.options.maxRetries) {
                this.logger.error({
                    identifier,
                    fromEntryNumber,
                    failures: this.consecutiveFailures,
                    errorKind: error.kind,
                    error: error.message
                }, 'Giving up on submission progress');
                // The next call starts a fresh sequence.
                this.consecutiveFailures = 0;
                throw error;
            }

            this.logger.warn({
                identifier,
                fromEntryNumber,
                failures: this.consecutiveFailures,
                maxRetries: this.options.maxRetries,
                delayMs: this.options.reconnectDelayMs,
                errorKind: error.kind,
                error: error.message
            }, 'Progress fetch failed, reconnecting');

            await this.options.clock.sleep(this.options.reconnectDelayMs);
        }
    }
}
