import { ProposalClient } from "../../libs/client/proposalClient.js";
import { loadClientConfig } from "../../libs/config/clientConfig.js";
import type { ProgressUpdate } from "../../libs/submission/submission.js";

/**
 * Submission Progress Watcher
 * Follows a submission until it has finished and prints its log as it grows.
 *
 * Usage: watch_submission.ts <submission identifier> [--socket]
 * Credentials are read from PROPOSAL_API_USERNAME and PROPOSAL_API_PASSWORD.
 */

function formatUpdate(update: ProgressUpdate): string[] {
    const lines = update.logEntries.map(entry =>
        `${entry.loggedAt.toISOString()} [${entry.messageType}] ${entry.message}`
    );
    if (update.status !== "In progress") {
        lines.push(`Status: ${update.status}` + (update.proposalCode ? ` (${update.proposalCode})` : ""));
    }
    return lines;
}

async function watchSubmission(identifier: string, useSocket: boolean) {
    const client = new ProposalClient({ config: loadClientConfig() });

    const username = process.env.PROPOSAL_API_USERNAME;
    const password = process.env.PROPOSAL_API_PASSWORD;
    if (username && password) {
        await client.login(username, password);
    }

    console.log(`--- Watching submission ${identifier} ---`);

    const submission = client.submission(identifier);
    const source = useSocket ? client.progressSocket() : undefined;
    for await (const update of submission.progress(source ? { source } : {})) {
        for (const line of formatUpdate(update)) {
            console.log(line);
        }
    }

    const error = await submission.error();
    if (error) {
        console.error("Submission failed: " + error);
        process.exitCode = 1;
    }
}

const [identifier, ...flags] = process.argv.slice(2);
if (!identifier) {
    console.error("Usage: watch_submission.ts <submission identifier> [--socket]");
    process.exit(1);
}

watchSubmission(identifier, flags.includes("--socket")).catch(error => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
