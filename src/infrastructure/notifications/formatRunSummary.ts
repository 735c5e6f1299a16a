import type { RunSummary } from "../../application/sync-run/sync.error-handler";

const MAX_LISTED_FAILURES = 20;

/** Plain-text subject and body for a run summary; shared by every sink. */
export const formatRunSummary = (summary: RunSummary): { subject: string; body: string } => {
  const subject = `Mobility sync ${summary.runId}: ${summary.status}`;
  const lines = [
    `Run: ${summary.runId}`,
    `Status: ${summary.status}`,
    `Started: ${summary.startedAt}`,
    `Finished: ${summary.finishedAt}`,
    `Chunks: ${summary.totalChunks} total, ${summary.succeeded.length} succeeded, ${summary.resumed.length} resumed, ${summary.failed.length} failed, ${summary.notStarted.length} not started`,
    `Objects: ${summary.transfer.copied} copied, ${summary.transfer.skipped} unchanged, ${summary.transfer.bytesCopied} bytes`
  ];
  if (summary.abortReason) lines.push(`Aborted: ${summary.abortReason}`);

  if (summary.failed.length > 0) {
    lines.push("", "Failed chunks:");
    for (const failure of summary.failed.slice(0, MAX_LISTED_FAILURES)) {
      lines.push(`- ${failure.chunkKey} [${failure.code}] after ${failure.attempts} attempt(s): ${failure.message}`);
    }
    if (summary.failed.length > MAX_LISTED_FAILURES) {
      lines.push(`- ... ${summary.failed.length - MAX_LISTED_FAILURES} more`);
    }
  }
  return { subject, body: lines.join("\n") };
};
