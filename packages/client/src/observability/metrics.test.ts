import { register } from "prom-client";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  CONSUMER_RECORDS_NAME,
  DENIAL_NOTIFICATIONS_NAME,
  PUBLISH_RESULTS_NAME,
  consumerRecordCounter,
  denialNotificationCounter,
  publishResultCounter,
  recordConsumerRecord,
  recordDenialNotification,
  recordPublishResult,
  resetMetrics,
} from "./metrics.js";

describe("metrics", () => {
  beforeEach(() => {
    resetMetrics();
  });

  afterEach(() => {
    resetMetrics();
  });

  it("registers each counter once on the default registry", () => {
    expect(register.getSingleMetric(PUBLISH_RESULTS_NAME)).toBe(publishResultCounter);
    expect(register.getSingleMetric(DENIAL_NOTIFICATIONS_NAME)).toBe(denialNotificationCounter);
    expect(register.getSingleMetric(CONSUMER_RECORDS_NAME)).toBe(consumerRecordCounter);
  });

  it("counts outcomes by label and resets them", async () => {
    recordPublishResult("success");
    recordPublishResult("success");
    recordPublishResult("late_denial");
    recordDenialNotification();
    recordConsumerRecord("legacy");

    const publishes = await publishResultCounter.get();
    expect(publishes.values.map(({ labels, value }) => [labels.outcome, value])).toEqual([
      ["success", 2],
      ["late_denial", 1],
    ]);
    expect((await denialNotificationCounter.get()).values[0]?.value).toBe(1);
    expect((await consumerRecordCounter.get()).values[0]?.labels).toEqual({ outcome: "legacy" });

    resetMetrics();
    expect((await publishResultCounter.get()).values).toEqual([]);
  });
});
