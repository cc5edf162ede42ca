import JSZip from 'jszip';

import { ValidationError } from '../errors/errors.js';
import { readRootAttribute, xmlSyntaxError } from './xml.js';

export const MANIFEST_FILES = ['Proposal.xml', 'Blocks.xml', 'Block.xml'] as const;

export type ManifestFile = typeof MANIFEST_FILES[number];

export interface SubmissionArchiveInfo {
    /** The proposal or block file found at the top level of the archive */
    readonly manifest: ManifestFile;
    /** Code on the root element of Proposal.xml, if any */
    readonly proposalCode?: string;
}

async function openZip(content: Uint8Array): Promise<JSZip> {
    try {
        return await JSZip.loadAsync(content);
    } catch (error) {
        throw new ValidationError('The submitted file must be a zip file.', { cause: error });
    }
}

/**
 * Checks that an archive can be submitted with the given proposal code.
 *
 * A new proposal has no proposal code. A resubmitted proposal must have the
 * code stated in its Proposal.xml (if it states one), and blocks can only be
 * submitted for an existing proposal.
 *
 * @throws ValidationError describing the first problem found
 */
export async function checkSubmissionArchive(
    content: Uint8Array,
    proposalCode: string | undefined
): Promise<SubmissionArchiveInfo> {
    const zip = await openZip(content);

    const manifests = MANIFEST_FILES.filter(name => {
        const file = zip.file(name);
        return file !== null && !file.dir;
    });

    const [manifest] = manifests;
    if (manifest === undefined) {
        throw new ValidationError('The submitted zip file must contain a file Proposal.xml, Blocks.xml or Block.xml.');
    }
    if (manifests.length > 1) {
        throw new ValidationError('The submitted zip file must contain exactly one of Proposal.xml, Blocks.xml or Block.xml.');
    }

    if (manifest !== 'Proposal.xml') {
        if (proposalCode === undefined) {
            throw new ValidationError('A proposal code is required for a block submission.');
        }
        return { manifest };
    }

    const file = zip.file(manifest);
    const xml = file ? await file.async('string') : '';
    const syntaxError = xmlSyntaxError(xml);
    if (syntaxError !== undefined) {
        throw new ValidationError(`The submitted Proposal.xml file is not well-formed: ${syntaxError}`);
    }

    const code = readRootAttribute(xml, 'code');
    if (code && code !== proposalCode) {
        throw new ValidationError(
            `The proposal code argument (${proposalCode ?? 'none'}) does not match the proposal code ` +
            `in the submitted Proposal.xml file (${code}).`
        );
    }

    return code ? { manifest, proposalCode: code } : { manifest };
}
