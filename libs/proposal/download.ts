import { writeFile } from 'node:fs/promises';
import { finished } from 'node:stream/promises';
import type { Writable } from 'node:stream';

import { ParseError } from '../errors/errors.js';
import { getComponentLogger } from '../logging/logger.js';
import { rewriteProposalCode } from '../archive/proposalArchive.js';
import type { TransportSession } from '../http/session.js';

const logger = getComponentLogger('ProposalDownload');

export function proposalZipEndpoint(proposalCode: string): string {
    return `/proposals/${encodeURIComponent(proposalCode)}.zip`;
}

/**
 * Downloads the zip file of a proposal, with the proposal code in its
 * Proposal.xml set to `proposalCode`.
 *
 * `out` is either a file path (an existing file is overwritten) or a stream,
 * which is ended once the archive has been written.
 */
export async function downloadZip(
    session: TransportSession,
    proposalCode: string,
    out: string | Writable
): Promise<Buffer> {
    const response = await session.request('GET', proposalZipEndpoint(proposalCode), {
        responseType: 'arraybuffer'
    });
    if (!Buffer.isBuffer(response.data) && !(response.data instanceof ArrayBuffer)) {
        throw new ParseError(`The download of proposal ${proposalCode} did not return a file.`);
    }

    const archive = await rewriteProposalCode(new Uint8Array(response.data), proposalCode);

    if (typeof out === 'string') {
        await writeFile(out, archive);
    } else {
        out.end(archive);
        await finished(out);
    }

    logger.info({ proposalCode, bytes: archive.length }, 'Downloaded proposal');
    return archive;
}
