import { readFile, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';

import { ValidationError } from '../errors/errors.js';
import { getComponentLogger } from '../logging/logger.js';
import { validate } from '../validation/responseValidator.js';
import { checkSubmissionArchive } from '../archive/submissionArchive.js';
import type { TransportSession } from '../http/session.js';
import { Submission, type SubmissionOptions } from './submission.js';

const logger = getComponentLogger('Submit');

export const SUBMISSIONS_ENDPOINT = '/submissions/';

const SubmitResponseSchema = z.object({
    identifier: z.string().min(1)
});

export type SubmissionContent = string | Uint8Array;

async function readContent(file: SubmissionContent): Promise<Uint8Array> {
    if (typeof file !== 'string') {
        return file;
    }

    const path = resolve(file);
    let isFile: boolean;
    try {
        isFile = (await stat(path)).isFile();
    } catch (error) {
        throw new ValidationError(`File does not exist: ${path}`, { cause: error });
    }
    if (!isFile) {
        throw new ValidationError(`Not a file: ${path}`);
    }
    return readFile(path);
}

/**
 * Submits a proposal or blocks archive.
 *
 * Pass no proposal code for a new proposal, and the code of the proposal for a
 * resubmission or a block submission. The archive is checked before it is
 * uploaded; the server does all further validation while it processes the
 * submission, which is what the returned Submission tracks.
 *
 * @param file path of the zip file, or its content
 * @throws ValidationError if the archive cannot be submitted
 */
export async function submit(
    session: TransportSession,
    file: SubmissionContent,
    proposalCode?: string,
    options: SubmissionOptions = {}
): Promise<Submission> {
    const content = await readContent(file);
    const archive = await checkSubmissionArchive(content, proposalCode);

    const form = new FormData();
    form.append('proposal.zip', new Blob([content], { type: 'application/zip' }), 'proposal.zip');
    if (proposalCode !== undefined) {
        form.append('proposal_code', proposalCode);
    }

    const response = await session.request('POST', SUBMISSIONS_ENDPOINT, { data: form });
    const { identifier } = validate(SubmitResponseSchema, response.data, 'proposal submission');

    logger.info({ identifier, manifest: archive.manifest, proposalCode }, 'Submitted proposal archive');

    return new Submission(identifier, session, options);
}
