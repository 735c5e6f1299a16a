import type { RunSummary } from "../application/sync-run/sync.error-handler";

export interface NotificationSink {
  notify(summary: RunSummary): Promise<void>;
}
