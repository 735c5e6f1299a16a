import { PublishCommand, SNSClient, type PublishCommandInput, type PublishCommandOutput } from "@aws-sdk/client-sns";
import type { RunSummary } from "../../application/sync-run/sync.error-handler";
import type { NotificationSink } from "../../ports/NotificationSink";
import { logInfo } from "../../shared/logging/log";
import { formatRunSummary } from "../notifications/formatRunSummary";

export type PublishOperation = (input: PublishCommandInput) => Promise<PublishCommandOutput>;

// SNS subjects are limited to 100 characters
const MAX_SUBJECT = 100;

export class SnsNotificationSink implements NotificationSink {
  constructor(
    private readonly publish: PublishOperation,
    private readonly topicArn: string
  ) {}

  async notify(summary: RunSummary): Promise<void> {
    const { subject, body } = formatRunSummary(summary);
    const out = await this.publish({
      TopicArn: this.topicArn,
      Subject: subject.slice(0, MAX_SUBJECT),
      Message: body
    });
    logInfo("notification.sent", { runId: summary.runId, status: summary.status, messageId: out.MessageId ?? null });
  }
}

export const createSnsNotificationSink = (region: string, topicArn: string): SnsNotificationSink => {
  const client = new SNSClient({ region });
  return new SnsNotificationSink((input) => client.send(new PublishCommand(input)), topicArn);
};
