import { z } from 'zod';

/**
 * Submission status as reported by the server.
 * 'In progress' is the only non-terminal status.
 */
export const SubmissionStatus = {
    InProgress: 'In progress',
    Failed: 'Failed',
    Successful: 'Successful'
} as const;

export type SubmissionStatus = typeof SubmissionStatus[keyof typeof SubmissionStatus];

export const TERMINAL_STATUSES: ReadonlySet<SubmissionStatus> = new Set([
    SubmissionStatus.Failed,
    SubmissionStatus.Successful
]);

export function isTerminalStatus(status: SubmissionStatus): boolean {
    return TERMINAL_STATUSES.has(status);
}

export const LogMessageType = {
    Info: 'Info',
    Warning: 'Warning',
    Error: 'Error'
} as const;

export type LogMessageType = typeof LogMessageType[keyof typeof LogMessageType];

/**
 * One line of a submission log. Instances are frozen.
 */
export interface LogEntry {
    readonly loggedAt: Date;
    readonly messageType: LogMessageType;
    readonly message: string;
}

const OFFSET_PATTERN = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Parses an ISO-8601 timestamp. A timestamp without offset is taken to be UTC.
 */
export function parseTimestamp(value: string): Date {
    const match = OFFSET_PATTERN.exec(value);
    let normalized: string;
    if (!match) {
        normalized = `${value}Z`;
    } else {
        const offset = match[0];
        const base = value.slice(0, value.length - offset.length);
        normalized = base + normalizeOffset(offset);
    }
    return new Date(normalized);
}

function normalizeOffset(offset: string): string {
    if (offset.toUpperCase() === 'Z') {
        return 'Z';
    }
    const sign = offset.slice(0, 1);
    const digits = offset.slice(1).replace(':', '');
    const hours = digits.slice(0, 2);
    const minutes = digits.slice(2) || '00';
    return `${sign}${hours}:${minutes}`;
}

export const LogEntryWireSchema = z.object({
    entry_number: z.number().int().positive(),
    logged_at: z.string().datetime({ offset: true, local: true }),
    message_type: z.enum([LogMessageType.Info, LogMessageType.Warning, LogMessageType.Error]),
    message: z.string()
});

export type LogEntryWire = z.infer<typeof LogEntryWireSchema>;

export function createLogEntry(loggedAt: Date, messageType: LogMessageType, message: string): LogEntry {
    return Object.freeze({ loggedAt: new Date(loggedAt.getTime()), messageType, message });
}

export function fromWire(raw: LogEntryWire): LogEntry {
    return createLogEntry(parseTimestamp(raw.logged_at), raw.message_type, raw.message);
}

/**
 * Two log entries are equal iff timestamp, type and message are equal.
 */
export function logEntriesEqual(a: LogEntry, b: LogEntry): boolean {
    return a.loggedAt.getTime() === b.loggedAt.getTime()
        && a.messageType === b.messageType
        && a.message === b.message;
}
