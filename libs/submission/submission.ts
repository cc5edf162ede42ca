/**
 * Submission State Machine
 *
 * The cached, externally visible view of one submission's progress. Reads are
 * pull-based: a read either answers from the cache or triggers exactly one
 * refresh through the ReconnectionController. There are no background timers.
 *
 *   In progress ──▶ Failed
 *        │
 *        └────────▶ Successful
 *
 * A terminal submission is never polled again.
 */

import { SequenceError } from '../errors/errors.js';
import { systemClock, type Clock } from '../clock/clock.js';
import { getComponentLogger, type Logger } from '../logging/logger.js';
import {
    DEFAULT_MAX_RETRIES,
    DEFAULT_POLLING_INTERVAL_MS,
    DEFAULT_RECONNECT_DELAY_MS
} from '../config/clientConfig.js';
import type { TransportSession } from '../http/session.js';
import {
    isTerminalStatus,
    LogMessageType,
    SubmissionStatus,
    type LogEntry
} from './logEntry.js';
import type { ProgressBatch } from './progressBatch.js';
import { HttpProgressPoller } from './progressPoller.js';
import type { ProgressSource } from './progressSource.js';
import { ReconnectionController } from './reconnectionController.js';

export interface SubmissionOptions {
    /** Where progress comes from; defaults to the HTTP progress endpoint */
    readonly source?: ProgressSource;
    readonly clock?: Clock;
    /** Minimum time between two refreshes of the cache */
    readonly pollingIntervalMs?: number;
    readonly reconnectDelayMs?: number;
    readonly maxRetries?: number;
    readonly logger?: Logger;
}

export interface ProgressStreamOptions {
    /** Source for this stream only, e.g. a WebSocketProgressSource */
    readonly source?: ProgressSource;
}

/**
 * One item of the progress stream.
 */
export interface ProgressUpdate {
    readonly status: SubmissionStatus;
    /** Only the entries added by this update */
    readonly logEntries: readonly LogEntry[];
    readonly proposalCode?: string;
}

export interface SubmissionSnapshot {
    readonly identifier: string;
    readonly status: SubmissionStatus;
    readonly log: readonly LogEntry[];
    readonly nextExpectedEntryNumber: number;
    /** Epoch milliseconds of the last completed refresh */
    readonly lastRefreshedAt?: number;
    readonly proposalCode?: string;
}

type RefreshResult =
    | { readonly kind: 'merged'; readonly update: ProgressUpdate }
    | { readonly kind: 'closed' };

export class Submission {
    readonly identifier: string;

    private currentStatus: SubmissionStatus = SubmissionStatus.InProgress;
    private readonly entries: LogEntry[] = [];
    private lastRefreshedAt: number | undefined;
    private code: string | undefined;
    private inFlight: Promise<RefreshResult> | undefined;

    private readonly source: ProgressSource;
    private readonly controller: ReconnectionController;
    private readonly clock: Clock;
    private readonly pollingIntervalMs: number;
    private readonly reconnectDelayMs: number;
    private readonly maxRetries: number;
    private readonly logger: Logger;

    constructor(identifier: string, session: TransportSession, options: SubmissionOptions = {}) {
        if (!identifier) {
            throw new TypeError('The submission identifier must not be empty.');
        }
        this.identifier = identifier;
        this.clock = options.clock ?? systemClock;
        this.pollingIntervalMs = options.pollingIntervalMs ?? DEFAULT_POLLING_INTERVAL_MS;
        this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
        this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
        this.logger = options.logger ?? getComponentLogger('Submission', { identifier });
        this.source = options.source ?? new HttpProgressPoller(session);
        this.controller = this.createController(this.source);
    }

    get nextExpectedEntryNumber(): number {
        return this.entries.length + 1;
    }

    async status(): Promise<SubmissionStatus> {
        await this.refreshIfDue();
        return this.currentStatus;
    }

    /**
     * All log entries received so far, oldest first.
     */
    async log(): Promise<readonly LogEntry[]> {
        await this.refreshIfDue();
        return Object.freeze([...this.entries]);
    }

    /**
     * The message of the last Error entry of a failed submission. Undefined
     * unless the submission has failed, and for a failed submission that
     * logged no Error entry.
     */
    async error(): Promise<string | undefined> {
        await this.refreshIfDue();
        if (this.currentStatus !== SubmissionStatus.Failed) {
            return undefined;
        }
        for (let i = this.entries.length - 1; i >= 0; i--) {
            const entry = this.entries[i];
            if (entry?.messageType === LogMessageType.Error) {
                return entry.message;
            }
        }
        return undefined;
    }

    async proposalCode(): Promise<string | undefined> {
        await this.refreshIfDue();
        return this.code;
    }

    /**
     * The cached state, without refreshing it.
     */
    snapshot(): SubmissionSnapshot {
        return Object.freeze({
            identifier: this.identifier,
            status: this.currentStatus,
            log: Object.freeze([...this.entries]),
            nextExpectedEntryNumber: this.nextExpectedEntryNumber,
            ...(this.lastRefreshedAt !== undefined ? { lastRefreshedAt: this.lastRefreshedAt } : {}),
            ...(this.code !== undefined ? { proposalCode: this.code } : {})
        });
    }

    /**
     * Streams the submission progress, one update per merged batch, until the
     * submission reaches a terminal status or the server closes the stream.
     * Stopping the iteration closes the source.
     *
     * The cache is shared with the read operations, so entries already
     * received are not delivered again.
     */
    async *progress(options: ProgressStreamOptions = {}): AsyncGenerator<ProgressUpdate, void, undefined> {
        const source = options.source ?? this.source;
        const controller = options.source ? this.createController(options.source) : this.controller;

        try {
            while (!isTerminalStatus(this.currentStatus)) {
                const result = await this.refresh(controller);
                if (result.kind === 'closed') {
                    this.logger.info('Progress stream closed by the server');
                    return;
                }

                yield result.update;

                if (isTerminalStatus(this.currentStatus)) {
                    return;
                }
                if (!source.pushesUpdates) {
                    await this.clock.sleep(this.pollingIntervalMs);
                }
            }
        } finally {
            source.close();
        }
    }

    private createController(source: ProgressSource): ReconnectionController {
        return new ReconnectionController(source, {
            maxRetries: this.maxRetries,
            reconnectDelayMs: this.reconnectDelayMs,
            clock: this.clock,
            logger: this.logger
        });
    }

    private async refreshIfDue(): Promise<void> {
        if (this.lastRefreshedAt !== undefined
            && this.clock.now() - this.lastRefreshedAt < this.pollingIntervalMs) {
            return;
        }
        if (isTerminalStatus(this.currentStatus)) {
            return;
        }
        await this.refresh(this.controller);
    }

    /**
     * Joins the refresh in flight, or starts one.
     */
    private refresh(controller: ReconnectionController): Promise<RefreshResult> {
        if (!this.inFlight) {
            this.inFlight = this.runRefresh(controller).finally(() => {
                this.inFlight = undefined;
            });
        }
        return this.inFlight;
    }

    private async runRefresh(controller: ReconnectionController): Promise<RefreshResult> {
        const fromEntryNumber = this.nextExpectedEntryNumber;
        const outcome = await controller.fetchWithRetry(this.identifier, fromEntryNumber);

        if (outcome.kind === 'closed') {
            this.lastRefreshedAt = this.clock.now();
            return { kind: 'closed' };
        }

        const update = this.merge(outcome.batch, fromEntryNumber);
        this.lastRefreshedAt = this.clock.now();
        // Every merged batch ends a run of consecutive failures.
        controller.reset();
        return { kind: 'merged', update };
    }

    private merge(batch: ProgressBatch, fromEntryNumber: number): ProgressUpdate {
        // The cache may not move while a fetch is in flight.
        if (fromEntryNumber !== this.nextExpectedEntryNumber) {
            throw new SequenceError(this.nextExpectedEntryNumber, fromEntryNumber);
        }

        batch.entries.forEach(({ entryNumber }, index) => {
            if (entryNumber !== fromEntryNumber + index) {
                throw new SequenceError(fromEntryNumber + index, entryNumber);
            }
        });

        const added = batch.entries.map(({ entry }) => entry);
        this.entries.push(...added);

        const previousStatus = this.currentStatus;
        this.currentStatus = batch.status;
        this.code = batch.status === SubmissionStatus.Successful ? batch.proposalCode : undefined;

        if (previousStatus !== batch.status) {
            this.logger.info({ from: previousStatus, to: batch.status }, 'Submission status changed');
        }

        return Object.freeze({
            status: batch.status,
            logEntries: Object.freeze(added),
            ...(this.code !== undefined ? { proposalCode: this.code } : {})
        });
    }
}
