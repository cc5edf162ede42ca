import { z } from 'zod';

import { SequenceError } from '../errors/errors.js';
import { validate } from '../validation/responseValidator.js';
import {
    fromWire,
    LogEntryWireSchema,
    SubmissionStatus,
    type LogEntry
} from './logEntry.js';

export interface NumberedLogEntry {
    readonly entryNumber: number;
    readonly entry: LogEntry;
}

/**
 * One server-delivered chunk: the current status plus the log entries added
 * since the requested entry number.
 */
export interface ProgressBatch {
    readonly status: SubmissionStatus;
    readonly entries: readonly NumberedLogEntry[];
    /** Only present for a successful submission */
    readonly proposalCode?: string;
}

export const ProgressBatchWireSchema = z.object({
    status: z.enum([SubmissionStatus.InProgress, SubmissionStatus.Failed, SubmissionStatus.Successful]),
    log_entries: z.array(LogEntryWireSchema),
    proposal_code: z.string().min(1).nullish()
}).superRefine((batch, ctx) => {
    if (batch.status === SubmissionStatus.Successful && !batch.proposal_code) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['proposal_code'],
            message: 'A successful submission must include the proposal code'
        });
    }
});

/**
 * Decodes a progress payload and checks that its entries continue the log at
 * `fromEntryNumber` without gaps.
 *
 * @throws ParseError if the payload has an unexpected shape
 * @throws SequenceError if the entry numbers are not contiguous with the cursor
 */
export function parseProgressBatch(payload: unknown, fromEntryNumber: number): ProgressBatch {
    const wire = validate(ProgressBatchWireSchema, payload, 'submission progress');

    const entries = wire.log_entries.map((raw, index) => {
        const expected = fromEntryNumber + index;
        if (raw.entry_number !== expected) {
            throw new SequenceError(expected, raw.entry_number);
        }
        return Object.freeze({ entryNumber: raw.entry_number, entry: fromWire(raw) });
    });

    return Object.freeze({
        status: wire.status,
        entries: Object.freeze(entries),
        ...(wire.status === SubmissionStatus.Successful && wire.proposal_code
            ? { proposalCode: wire.proposal_code }
            : {})
    });
}
