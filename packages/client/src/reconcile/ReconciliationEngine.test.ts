import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { LateDenialError, TransportFailureError } from "../errors.js";
import { createLogger } from "../observability/logger.js";
import { publishResultCounter, resetMetrics } from "../observability/metrics.js";
import type { DenialNotification, PublishMeta } from "../types/index.js";
import { NotificationQueue } from "./NotificationQueue.js";
import { PublishFuture } from "./PublishFuture.js";
import { ReconciliationEngine, pendingKey } from "./ReconciliationEngine.js";

const logger = createLogger({ level: "silent" });

function meta(topic: string, channel: number, offset: string): PublishMeta {
  return { topic, channel, offset };
}

function denial(topic: string, channel: number, offset: string, code = 403): DenialNotification {
  return { topic, channel, offset, code };
}

async function outcomeCount(outcome: string): Promise<number> {
  const metric = await publishResultCounter.get();
  return metric.values.find((value) => value.labels.outcome === outcome)?.value ?? 0;
}

describe("ReconciliationEngine", () => {
  let engine: ReconciliationEngine;

  beforeEach(() => {
    vi.useFakeTimers();
    resetMetrics();
    engine = new ReconciliationEngine({ logger });
  });

  afterEach(() => {
    engine.close();
    vi.useRealTimers();
  });

  it("builds pending keys from topic, channel and offset", () => {
    expect(pendingKey("orders", 2, "41")).toBe("orders^2^41");
  });

  it("succeeds exactly once when no denial arrives within the window", async () => {
    const callback = { success: vi.fn(), error: vi.fn() };
    const future = new PublishFuture(callback);
    engine.registerPending(meta("orders", 0, "7"), future);

    vi.advanceTimersByTime(4_999);
    expect(future.state).toBe("pending");

    vi.advanceTimersByTime(1);
    await expect(future.promise).resolves.toEqual({ topic: "orders", channel: 0, offset: "7" });

    engine.onDenialNotification(denial("orders", 0, "7"));
    vi.advanceTimersByTime(10_000);

    expect(callback.success).toHaveBeenCalledTimes(1);
    expect(callback.error).not.toHaveBeenCalled();
    expect(await outcomeCount("success")).toBe(1);
  });

  it("fails an exact match before the window closes", async () => {
    const callback = { success: vi.fn(), error: vi.fn() };
    const future = new PublishFuture(callback);
    engine.registerPending(meta("orders", 0, "7"), future);

    engine.onDenialNotification(denial("orders", 0, "7", 403));

    await expect(future.promise).rejects.toBeInstanceOf(LateDenialError);
    await expect(future.promise).rejects.toMatchObject({
      code: "LATE_DENIAL",
      topic: "orders",
      channel: 0,
      offset: "7",
      denialCode: 403,
      reason: "Write permission denied",
    });

    vi.advanceTimersByTime(5_000);
    expect(callback.success).not.toHaveBeenCalled();
    expect(callback.error).toHaveBeenCalledTimes(1);
    expect(engine.pendingCount).toBe(0);
    expect(await outcomeCount("late_denial")).toBe(1);
  });

  it("fails every pending publish on the channel when a denial is first learned", () => {
    const first = new PublishFuture();
    const second = new PublishFuture();
    const otherChannel = new PublishFuture();
    engine.registerPending(meta("orders", 0, "1"), first);
    engine.registerPending(meta("orders", 0, "2"), second);
    engine.registerPending(meta("orders", 1, "3"), otherChannel);

    engine.onDenialNotification(denial("orders", 0, "99"));

    expect(first.state).toBe("failed");
    expect(second.state).toBe("failed");
    expect(otherChannel.state).toBe("pending");

    vi.advanceTimersByTime(5_000);
    expect(otherChannel.state).toBe("succeeded");
  });

  it("only resolves the exact key while a denial is already learned", () => {
    engine.onDenialNotification(denial("orders", 0, "1"));

    const denied = new PublishFuture();
    const untouched = new PublishFuture();
    engine.registerPending(meta("orders", 0, "5"), denied);
    engine.registerPending(meta("orders", 0, "6"), untouched);

    engine.onDenialNotification(denial("orders", 0, "5"));

    expect(denied.state).toBe("failed");
    expect(untouched.state).toBe("pending");
  });

  it("remembers denials for the learned error window", () => {
    engine.onDenialNotification(denial("orders", 3, "1", 429));

    expect(engine.checkLearned("orders", 3)).toEqual({ code: 429, reason: "Publish rate limit exceeded" });
    expect(engine.checkLearned("orders", 2)).toBeUndefined();

    vi.advanceTimersByTime(19_999);
    expect(engine.checkLearned("orders", 3)).toBeDefined();

    vi.advanceTimersByTime(1);
    expect(engine.checkLearned("orders", 3)).toBeUndefined();
  });

  it("describes unknown codes with the numeric code", async () => {
    const future = new PublishFuture();
    engine.registerPending(meta("orders", 0, "1"), future);

    engine.onDenialNotification(denial("orders", 0, "1", 499));

    await expect(future.promise).rejects.toMatchObject({
      denialCode: 499,
      reason: "Publish rejected by policy (code 499)",
    });
  });

  it("ignores futures that already settled", () => {
    const future = new PublishFuture();
    future.fail(new TransportFailureError("send failed"));

    engine.registerPending(meta("orders", 0, "1"), future);

    expect(engine.pendingCount).toBe(0);
  });

  it("drains notifications from a queue until it closes", async () => {
    const queue = new NotificationQueue<DenialNotification>();
    const future = new PublishFuture();
    engine.registerPending(meta("orders", 0, "4"), future);

    queue.push(denial("orders", 0, "4"));
    const draining = engine.consume(queue);
    queue.close();
    await draining;

    expect(future.state).toBe("failed");
    expect(queue.push(denial("orders", 0, "5"))).toBe(false);
  });

  it("fails all pending publishes on demand", async () => {
    const first = new PublishFuture();
    const second = new PublishFuture();
    engine.registerPending(meta("orders", 0, "1"), first);
    engine.registerPending(meta("billing", 1, "2"), second);

    const failed = engine.failAllPending(new TransportFailureError("client closed"));

    expect(failed).toBe(2);
    await expect(first.promise).rejects.toBeInstanceOf(TransportFailureError);
    await expect(second.promise).rejects.toThrow("client closed");
    expect(await outcomeCount("transport_failure")).toBe(2);
  });

  it("fails publishes registered after close instead of leaving them pending", async () => {
    const callback = { success: vi.fn(), error: vi.fn() };
    const future = new PublishFuture(callback);
    engine.close();

    engine.registerPending(meta("orders", 0, "9"), future);
    await vi.advanceTimersByTimeAsync(10_000);

    await expect(future.promise).rejects.toThrow("Client closed before the publish settled");
    expect(callback.error).toHaveBeenCalledWith(expect.any(TransportFailureError));
    expect(callback.success).not.toHaveBeenCalled();
    expect(engine.pendingCount).toBe(0);
    expect(await outcomeCount("transport_failure")).toBe(1);
  });

  it("keeps resolving when a callback throws", () => {
    const errorSpy = vi.spyOn(logger, "error");
    const throwing = new PublishFuture({
      error: () => {
        throw new Error("callback exploded");
      },
    });
    const next = new PublishFuture();
    engine.registerPending(meta("orders", 0, "1"), throwing);
    engine.registerPending(meta("orders", 0, "2"), next);

    engine.onDenialNotification(denial("orders", 0, "1"));

    expect(throwing.state).toBe("failed");
    expect(next.state).toBe("failed");
    expect(errorSpy).toHaveBeenCalledWith(
      expect.objectContaining({ event: "publish.callback_failed", topic: "orders" }),
      "Publish callback threw"
    );
  });
});
