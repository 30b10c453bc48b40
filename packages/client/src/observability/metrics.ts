import { Counter, register } from "prom-client";

export const PUBLISH_RESULTS_NAME = "streamgate_publish_results_total";
export const DENIAL_NOTIFICATIONS_NAME = "streamgate_denial_notifications_total";
export const CONSUMER_RECORDS_NAME = "streamgate_consumer_records_total";

export type PublishOutcome = "success" | "late_denial" | "learned_denial" | "transport_failure";

export type RecordOutcome = "delivered" | "legacy" | "malformed" | "unrouted";

function getOrCreateCounter(name: string, help: string, labelNames: string[]): Counter<string> {
  // the default registry outlives module reloads
  const existing = register.getSingleMetric(name);
  if (existing instanceof Counter) {
    return existing;
  }
  return new Counter({ name, help, labelNames });
}

const publishResultCounter = getOrCreateCounter(
  PUBLISH_RESULTS_NAME,
  "Publish futures by terminal outcome",
  ["outcome"]
);

const denialNotificationCounter = getOrCreateCounter(
  DENIAL_NOTIFICATIONS_NAME,
  "Denial notifications received from the policy feed",
  []
);

const consumerRecordCounter = getOrCreateCounter(
  CONSUMER_RECORDS_NAME,
  "Consumed broker records by dispatch outcome",
  ["outcome"]
);

export function recordPublishResult(outcome: PublishOutcome): void {
  publishResultCounter.labels(outcome).inc();
}

export function recordDenialNotification(): void {
  denialNotificationCounter.inc();
}

export function recordConsumerRecord(outcome: RecordOutcome): void {
  consumerRecordCounter.labels(outcome).inc();
}

export function resetMetrics(): void {
  publishResultCounter.reset();
  denialNotificationCounter.reset();
  consumerRecordCounter.reset();
}

export { publishResultCounter, denialNotificationCounter, consumerRecordCounter };
