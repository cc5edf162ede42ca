/**
 * Unit Tests: Progress Socket
 *
 * @see libs/submission/progressSocket.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { progressSocketUrl, WebSocketProgressSource } from '../../libs/submission/progressSocket.js';
import { Submission, type ProgressUpdate } from '../../libs/submission/submission.js';
import { ParseError, SequenceError, TransportError } from '../../libs/errors/errors.js';
import { FakeSession } from '../helpers/fakeSession.js';
import { FakeSocketFactory } from '../helpers/fakeSocket.js';
import { ManualClock } from '../helpers/manualClock.js';
import { progressPayload } from '../helpers/progress.js';

function sessionWithToken(token: string | undefined = 'test-token'): FakeSession {
    const session = new FakeSession();
    session.accessToken = token;
    return session;
}

describe('progressSocketUrl()', () => {
    it('should use wss for https', () => {
        assert.strictEqual(
            progressSocketUrl('https://api.test', 'abcd', 1),
            'wss://api.test/submissions/abcd/progress/ws?from_entry_number=1'
        );
    });

    it('should use ws for http and keep the base path', () => {
        assert.strictEqual(
            progressSocketUrl('http://localhost:8000/api', 'a/b', 7),
            'ws://localhost:8000/api/submissions/a%2Fb/progress/ws?from_entry_number=7'
        );
    });
});

describe('WebSocketProgressSource', () => {
    it('should send the access token and read a batch', async () => {
        const factory = new FakeSocketFactory();
        const source = new WebSocketProgressSource(sessionWithToken(), factory.create);

        const pending = source.fetch('abcd', 1);
        const socket = factory.sockets[0];
        assert.ok(socket);
        socket.open();
        socket.message(progressPayload('In progress', 1, 2));
        const outcome = await pending;

        assert.strictEqual(socket.url, 'wss://api.test/submissions/abcd/progress/ws?from_entry_number=1');
        assert.deepStrictEqual(socket.sent, ['test-token']);
        assert.ok(outcome.kind === 'batch');
        assert.deepStrictEqual(outcome.batch.entries.map(e => e.entryNumber), [1, 2]);
        assert.strictEqual(source.pushesUpdates, true);
    });

    it('should send an empty token when logged out', async () => {
        const factory = new FakeSocketFactory();
        const source = new WebSocketProgressSource(sessionWithToken(undefined), factory.create);

        const pending = source.fetch('abcd', 1);
        factory.sockets[0]?.open();
        factory.sockets[0]?.serverClose();
        await pending;

        assert.deepStrictEqual(factory.sockets[0]?.sent, ['']);
    });

    it('should keep the connection while the cursor follows the stream', async () => {
        const factory = new FakeSocketFactory();
        const source = new WebSocketProgressSource(sessionWithToken(), factory.create);

        const first = source.fetch('abcd', 1);
        const socket = factory.sockets[0];
        assert.ok(socket);
        socket.open();
        socket.message(progressPayload('In progress', 1, 2));
        socket.message(progressPayload('In progress', 3, 1));
        socket.message(progressPayload('Successful', 4, 0, '2024-2-SCI-042'));

        const outcomes = [await first, await source.fetch('abcd', 3), await source.fetch('abcd', 4)];

        assert.strictEqual(factory.sockets.length, 1);
        assert.deepStrictEqual(outcomes.map(o => (o.kind === 'batch' ? o.batch.status : o.kind)), [
            'In progress',
            'In progress',
            'Successful'
        ]);
    });

    it('should report a normal close and reconnect afterwards', async () => {
        const factory = new FakeSocketFactory();
        const source = new WebSocketProgressSource(sessionWithToken(), factory.create);

        const pending = source.fetch('abcd', 3);
        factory.sockets[0]?.serverClose(1000);
        assert.deepStrictEqual(await pending, { kind: 'closed' });

        const next = source.fetch('abcd', 3);
        assert.strictEqual(factory.sockets.length, 2);
        source.close();
        assert.deepStrictEqual(await next, { kind: 'closed' });
    });

    it('should report an abnormal close as a transport failure', async () => {
        const factory = new FakeSocketFactory();
        const source = new WebSocketProgressSource(sessionWithToken(), factory.create);

        const first = source.fetch('abcd', 1);
        const socket = factory.sockets[0];
        assert.ok(socket);
        socket.open();
        socket.message(progressPayload('In progress', 1, 2));
        socket.serverClose(1011, 'internal error');

        await first;
        const outcome = await source.fetch('abcd', 3);

        assert.ok(outcome.kind === 'failure');
        assert.ok(outcome.error instanceof TransportError);
        assert.strictEqual(
            outcome.error.message,
            'The progress socket closed unexpectedly with code 1011 (internal error).'
        );

        const retry = source.fetch('abcd', 3);
        assert.strictEqual(factory.sockets[1]?.url, 'wss://api.test/submissions/abcd/progress/ws?from_entry_number=3');
        source.close();
        await retry;
    });

    it('should report socket errors once', async () => {
        const factory = new FakeSocketFactory();
        const source = new WebSocketProgressSource(sessionWithToken(), factory.create);

        const pending = source.fetch('abcd', 1);
        const socket = factory.sockets[0];
        assert.ok(socket);
        socket.error(new Error('getaddrinfo ENOTFOUND api.test'));
        socket.serverClose(1006);
        const outcome = await pending;

        assert.ok(outcome.kind === 'failure');
        assert.strictEqual(outcome.error.message, 'The progress socket failed: getaddrinfo ENOTFOUND api.test');
        assert.strictEqual(socket.closedWith, undefined);
    });

    it('should drop the connection after a message that cannot be parsed', async () => {
        const factory = new FakeSocketFactory();
        const source = new WebSocketProgressSource(sessionWithToken(), factory.create);

        const pending = source.fetch('abcd', 1);
        factory.sockets[0]?.message('{"status": ');
        const outcome = await pending;

        assert.ok(outcome.kind === 'failure');
        assert.ok(outcome.error instanceof ParseError);
        assert.strictEqual(outcome.error.message, 'The progress message is not valid JSON.');
        assert.strictEqual(factory.sockets[0]?.closedWith, 1000);
    });

    it('should drop the connection after a gap', async () => {
        const factory = new FakeSocketFactory();
        const source = new WebSocketProgressSource(sessionWithToken(), factory.create);

        const pending = source.fetch('abcd', 1);
        factory.sockets[0]?.message(progressPayload('In progress', 2, 1));
        const outcome = await pending;

        assert.ok(outcome.kind === 'failure');
        assert.ok(outcome.error instanceof SequenceError);
        assert.strictEqual(factory.sockets[0]?.closedWith, 1000);
    });

    it('should reconnect when asked for a different entry number', async () => {
        const factory = new FakeSocketFactory();
        const source = new WebSocketProgressSource(sessionWithToken(), factory.create);

        const first = source.fetch('abcd', 1);
        factory.sockets[0]?.message(progressPayload('In progress', 1, 2));
        await first;

        const second = source.fetch('abcd', 5);
        assert.strictEqual(factory.sockets[0]?.closedWith, 1000);
        assert.strictEqual(factory.sockets[1]?.url, 'wss://api.test/submissions/abcd/progress/ws?from_entry_number=5');
        factory.sockets[1]?.message(progressPayload('In progress', 5, 1));
        const outcome = await second;

        assert.ok(outcome.kind === 'batch');
        assert.strictEqual(outcome.batch.entries[0]?.entryNumber, 5);
    });

    it('should reject invalid entry numbers', async () => {
        const factory = new FakeSocketFactory();
        const source = new WebSocketProgressSource(sessionWithToken(), factory.create);

        await assert.rejects(source.fetch('abcd', 0), RangeError);
        assert.strictEqual(factory.sockets.length, 0);
    });
});

describe('Submission.progress() over a socket', () => {
    it('should resume from the next entry after a dropped connection', async () => {
        const factory = new FakeSocketFactory([
            socket => {
                socket.open();
                socket.message(progressPayload('In progress', 1, 2));
                socket.serverClose(1006);
            },
            socket => {
                socket.open();
                socket.message(progressPayload('Successful', 3, 1, '2024-2-SCI-042'));
            }
        ]);
        const session = sessionWithToken();
        const clock = new ManualClock();
        const submission = new Submission('abcd', session, { clock });
        const source = new WebSocketProgressSource(session, factory.create);

        const updates: ProgressUpdate[] = [];
        for await (const update of submission.progress({ source })) {
            updates.push(update);
        }

        assert.deepStrictEqual(updates.map(u => u.logEntries.map(e => e.message)), [
            ['Message 1', 'Message 2'],
            ['Message 3']
        ]);
        assert.strictEqual(updates[1]?.proposalCode, '2024-2-SCI-042');
        assert.deepStrictEqual(factory.sockets.map(s => s.url), [
            'wss://api.test/submissions/abcd/progress/ws?from_entry_number=1',
            'wss://api.test/submissions/abcd/progress/ws?from_entry_number=3'
        ]);
        assert.deepStrictEqual(clock.sleeps, [10_000]);
        assert.strictEqual(factory.sockets[1]?.closedWith, 1000);
        assert.strictEqual(session.requests.length, 0);
    });
});
