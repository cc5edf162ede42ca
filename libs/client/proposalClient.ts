import type { Writable } from 'node:stream';

import { systemClock, type Clock } from '../clock/clock.js';
import { parseClientConfig, type ClientConfig, type ClientConfigInput } from '../config/clientConfig.js';
import { Session, type TransportSession } from '../http/session.js';
import { downloadZip } from '../proposal/download.js';
import { Submission, type SubmissionOptions } from '../submission/submission.js';
import { submit, type SubmissionContent } from '../submission/submit.js';
import {
    createWebSocket,
    WebSocketProgressSource,
    type SocketFactory
} from '../submission/progressSocket.js';

export interface ProposalClientOptions {
    readonly config?: ClientConfigInput | Readonly<ClientConfig>;
    /** Used instead of a Session built from the configuration */
    readonly session?: TransportSession;
    readonly clock?: Clock;
    readonly socketFactory?: SocketFactory;
}

/**
 * Entry point of the library: one authenticated session plus the operations
 * on proposals and submissions.
 *
 * ```ts
 * const client = new ProposalClient({ config: loadClientConfig() });
 * await client.login(username, password);
 * const submission = await client.submit('proposal.zip');
 * for await (const update of submission.progress()) { ... }
 * ```
 */
export class ProposalClient {
    readonly config: Readonly<ClientConfig>;
    readonly session: TransportSession;

    private readonly httpSession: Session | undefined;
    private readonly clock: Clock;
    private readonly socketFactory: SocketFactory;

    constructor(options: ProposalClientOptions = {}) {
        this.config = parseClientConfig(options.config ?? {});
        this.session = options.session ?? new Session({
            baseUrl: this.config.baseUrl,
            timeoutMs: this.config.requestTimeoutMs
        });
        // login and logout need the HTTP session itself
        this.httpSession = this.session instanceof Session ? this.session : undefined;
        this.clock = options.clock ?? systemClock;
        this.socketFactory = options.socketFactory ?? createWebSocket;
    }

    get loggedIn(): boolean {
        return this.session.accessToken !== undefined;
    }

    async login(username: string, password: string): Promise<void> {
        await this.requireHttpSession('log in').login(username, password);
    }

    logout(): void {
        this.requireHttpSession('log out').logout();
    }

    /**
     * @see submit
     */
    submit(file: SubmissionContent, proposalCode?: string): Promise<Submission> {
        return submit(this.session, file, proposalCode, this.submissionOptions());
    }

    /**
     * A handle on an existing submission, with nothing fetched yet.
     */
    submission(identifier: string): Submission {
        return new Submission(identifier, this.session, this.submissionOptions());
    }

    /**
     * A progress source that streams updates over a socket instead of polling,
     * for use with Submission.progress().
     */
    progressSocket(): WebSocketProgressSource {
        return new WebSocketProgressSource(this.session, this.socketFactory);
    }

    downloadZip(proposalCode: string, out: string | Writable): Promise<Buffer> {
        return downloadZip(this.session, proposalCode, out);
    }

    private submissionOptions(): SubmissionOptions {
        return {
            clock: this.clock,
            pollingIntervalMs: this.config.pollingIntervalMs,
            reconnectDelayMs: this.config.reconnectDelayMs,
            maxRetries: this.config.maxRetries
        };
    }

    private requireHttpSession(action: string): Session {
        if (!this.httpSession) {
            throw new TypeError(`Cannot ${action} with a custom session.`);
        }
        return this.httpSession;
    }
}
