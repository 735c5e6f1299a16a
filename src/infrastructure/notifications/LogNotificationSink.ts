import type { RunSummary } from "../../application/sync-run/sync.error-handler";
import type { NotificationSink } from "../../ports/NotificationSink";
import { logInfo } from "../../shared/logging/log";
import { formatRunSummary } from "./formatRunSummary";

/** Used when no SNS topic is configured: the notification goes to the log. */
export class LogNotificationSink implements NotificationSink {
  async notify(summary: RunSummary): Promise<void> {
    const { subject, body } = formatRunSummary(summary);
    logInfo("notification.logged", { runId: summary.runId, subject, body });
  }
}
