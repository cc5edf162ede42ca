import JSZip from 'jszip';

import { setRootAttribute } from './xml.js';

const PROPOSAL_FILE = 'Proposal.xml';

/**
 * Copies every member of a proposal archive into a new archive, setting the
 * code attribute of the root element of Proposal.xml to `proposalCode`.
 * Stored proposals may still carry an "Unsubmitted-..." code.
 */
export async function rewriteProposalCode(content: Uint8Array, proposalCode: string): Promise<Buffer> {
    const source = await JSZip.loadAsync(content);
    const target = new JSZip();

    const members: Array<[string, JSZip.JSZipObject]> = [];
    source.forEach((path, file) => {
        members.push([path, file]);
    });

    for (const [path, file] of members) {
        if (file.dir) {
            target.folder(path);
        } else if (path === PROPOSAL_FILE) {
            const xml = await file.async('string');
            target.file(path, setRootAttribute(xml, 'code', proposalCode));
        } else {
            target.file(path, await file.async('nodebuffer'));
        }
    }

    return target.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}
