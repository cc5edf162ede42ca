/**
 * Progress Socket
 *
 * Streaming variant of the progress source. The server pushes one progress
 * batch per message over
 *   ws(s)://<host>/submissions/{identifier}/progress/ws?from_entry_number=<n>
 * after the client has sent its access token as the first message. A normal
 * close (1000) means no more data will come.
 *
 * The connection is kept open across fetches as long as the caller asks for
 * the entry number the socket will deliver next. Any failure drops it, and the
 * next fetch reconnects from the requested entry number.
 */

import WebSocket from 'ws';

import { isPollFailure, ParseError, TransportError, type PollFailure } from '../errors/errors.js';
import { getComponentLogger } from '../logging/logger.js';
import type { TransportSession } from '../http/session.js';
import { parseProgressBatch } from './progressBatch.js';
import { progressEndpoint } from './progressPoller.js';
import { assertEntryNumber, type PollOutcome, type ProgressSource } from './progressSource.js';

const logger = getComponentLogger('ProgressSocket');

export const NORMAL_CLOSURE = 1000;

export interface SocketHandlers {
    onOpen(): void;
    onMessage(data: string): void;
    onClose(code: number, reason: string): void;
    onError(error: Error): void;
}

export interface ProgressSocket {
    send(data: string): void;
    close(code?: number): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => ProgressSocket;

export const createWebSocket: SocketFactory = (url, handlers) => {
    const socket = new WebSocket(url);
    socket.on('open', () => handlers.onOpen());
    socket.on('message', (data: WebSocket.RawData) => handlers.onMessage(rawDataToString(data)));
    socket.on('close', (code: number, reason: Buffer) => handlers.onClose(code, reason.toString('utf-8')));
    socket.on('error', (error: Error) => handlers.onError(error));
    return socket;
};

function rawDataToString(data: WebSocket.RawData): string {
    if (Buffer.isBuffer(data)) {
        return data.toString('utf-8');
    }
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf-8');
    }
    return Buffer.from(data).toString('utf-8');
}

/**
 * The socket URL for a submission, derived from the HTTP base URL.
 */
export function progressSocketUrl(baseUrl: string, identifier: string, fromEntryNumber: number): string {
    const url = new URL(`${baseUrl}${progressEndpoint(identifier)}/ws`);
    url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
    url.searchParams.set('from_entry_number', String(fromEntryNumber));
    return url.toString();
}

type SocketEvent =
    | { readonly kind: 'message'; readonly data: string }
    | { readonly kind: 'closed' }
    | { readonly kind: 'failure'; readonly error: TransportError };

/**
 * One open socket. Events are queued until fetch() asks for them; nothing
 * after the first close or error is recorded.
 */
class SocketConnection {
    readonly socket: ProgressSocket;
    nextEntryNumber: number;

    private readonly queue: SocketEvent[] = [];
    private waiter: ((event: SocketEvent) => void) | undefined;
    private ended = false;

    constructor(
        readonly identifier: string,
        fromEntryNumber: number,
        url: string,
        accessToken: string,
        factory: SocketFactory
    ) {
        this.nextEntryNumber = fromEntryNumber;
        this.socket = factory(url, {
            onOpen: () => this.socket.send(accessToken),
            onMessage: data => this.push({ kind: 'message', data }),
            onClose: (code, reason) => this.push(
                code === NORMAL_CLOSURE
                    ? { kind: 'closed' }
                    : {
                        kind: 'failure',
                        error: new TransportError(
                            `The progress socket closed unexpectedly with code ${code}${reason ? ` (${reason})` : ''}.`
                        )
                    }
            ),
            onError: error => this.push({
                kind: 'failure',
                error: new TransportError(`The progress socket failed: ${error.message}`, { cause: error })
            })
        });
    }

    next(): Promise<SocketEvent> {
        const queued = this.queue.shift();
        if (queued) {
            return Promise.resolve(queued);
        }
        if (this.ended) {
            return Promise.resolve<SocketEvent>({ kind: 'closed' });
        }
        return new Promise<SocketEvent>(resolve => {
            this.waiter = resolve;
        });
    }

    close(): void {
        if (!this.ended) {
            this.ended = true;
            this.socket.close(NORMAL_CLOSURE);
        }
        this.deliver({ kind: 'closed' });
    }

    private push(event: SocketEvent): void {
        if (this.ended) {
            return;
        }
        if (event.kind !== 'message') {
            this.ended = true;
        }
        if (!this.deliver(event)) {
            this.queue.push(event);
        }
    }

    private deliver(event: SocketEvent): boolean {
        const waiter = this.waiter;
        if (!waiter) {
            return false;
        }
        this.waiter = undefined;
        waiter(event);
        return true;
    }
}

export class WebSocketProgressSource implements ProgressSource {
    readonly pushesUpdates = true;

    private connection: SocketConnection | undefined;

    constructor(
        private readonly session: Pick<TransportSession, 'baseUrl' | 'accessToken'>,
        private readonly factory: SocketFactory = createWebSocket
    ) { }

    async fetch(identifier: string, fromEntryNumber: number): Promise<PollOutcome> {
        assertEntryNumber(fromEntryNumber);

        let connection = this.connection;
        if (connection && (connection.identifier !== identifier || connection.nextEntryNumber !== fromEntryNumber)) {
            logger.debug({ identifier, fromEntryNumber }, 'Cursor moved, reconnecting');
            this.close();
            connection = undefined;
        }
        if (!connection) {
            connection = this.connect(identifier, fromEntryNumber);
        }

        const event = await connection.next();
        switch (event.kind) {
            case 'closed':
                this.drop(connection);
                return { kind: 'closed' };
            case 'failure':
                logger.warn({ identifier, fromEntryNumber, error: event.error.message }, 'Progress socket failed');
                this.drop(connection);
                return { kind: 'failure', error: event.error };
            case 'message':
                return this.decode(connection, event.data, fromEntryNumber);
        }
    }

    close(): void {
        const connection = this.connection;
        if (connection) {
            this.connection = undefined;
            connection.close();
        }
    }

    private connect(identifier: string, fromEntryNumber: number): SocketConnection {
        const url = progressSocketUrl(this.session.baseUrl, identifier, fromEntryNumber);
        logger.info({ identifier, fromEntryNumber }, 'Connecting to the progress socket');
        const connection = new SocketConnection(
            identifier,
            fromEntryNumber,
            url,
            this.session.accessToken ?? '',
            this.factory
        );
        this.connection = connection;
        return connection;
    }

    private decode(connection: SocketConnection, data: string, fromEntryNumber: number): PollOutcome {
        try {
            const payload: unknown = JSON.parse(data);
            const batch = parseProgressBatch(payload, fromEntryNumber);
            connection.nextEntryNumber = fromEntryNumber + batch.entries.length;
            return { kind: 'batch', batch };
        } catch (error) {
            const failure = toPollFailure(error);
            this.drop(connection);
            return { kind: 'failure', error: failure };
        }
    }

    private drop(connection: SocketConnection): void {
        if (this.connection === connection) {
            this.close();
        }
    }
}

function toPollFailure(error: unknown): PollFailure {
    if (isPollFailure(error)) {
        return error;
    }
    if (error instanceof SyntaxError) {
        return new ParseError('The progress message is not valid JSON.', [error.message], { cause: error });
    }
    throw error;
}
