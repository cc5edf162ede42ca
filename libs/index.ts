export { ProposalClient, type ProposalClientOptions } from './client/proposalClient.js';
export {
    loadClientConfig,
    parseClientConfig,
    DEFAULT_CLIENT_CONFIG,
    CONFIG_ENV_VARS,
    type ClientConfig,
    type ClientConfigInput
} from './config/clientConfig.js';
export { systemClock, type Clock } from './clock/clock.js';
export * from './errors/index.js';
export {
    Session,
    type HttpMethod,
    type RequestOptions,
    type SessionOptions,
    type SessionResponse,
    type TransportSession
} from './http/session.js';
export {
    SubmissionStatus,
    LogMessageType,
    isTerminalStatus,
    logEntriesEqual,
    type LogEntry
} from './submission/logEntry.js';
export type { ProgressBatch, NumberedLogEntry } from './submission/progressBatch.js';
export type { PollOutcome, ProgressSource } from './submission/progressSource.js';
export { HttpProgressPoller } from './submission/progressPoller.js';
export {
    WebSocketProgressSource,
    type ProgressSocket,
    type SocketFactory,
    type SocketHandlers
} from './submission/progressSocket.js';
export { ReconnectionController, type ReconnectionOptions } from './submission/reconnectionController.js';
export {
    Submission,
    type ProgressStreamOptions,
    type ProgressUpdate,
    type SubmissionOptions,
    type SubmissionSnapshot
} from './submission/submission.js';
export { submit, type SubmissionContent } from './submission/submit.js';
export { downloadZip } from './proposal/download.js';
