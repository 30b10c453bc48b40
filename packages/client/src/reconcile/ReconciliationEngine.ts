import { LateDenialError, TransportFailureError, type DenialReason, type StreamClientError } from "../errors.js";
import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import { recordDenialNotification, recordPublishResult, type PublishOutcome } from "../observability/metrics.js";
import type { DenialNotification, PublishMeta } from "../types/index.js";
import { TimedMap } from "../utils/TimedMap.js";
import { describeDenial } from "./denialReasons.js";
import type { NotificationQueue } from "./NotificationQueue.js";
import type { PublishFuture } from "./PublishFuture.js";

export const DEFAULT_PUBLISH_WINDOW_MS = 5_000;
export const DEFAULT_LEARNED_ERROR_TTL_MS = 20_000;

export type ReconciliationEngineOptions = {
  publishWindowMs?: number;
  learnedErrorTtlMs?: number;
  logger?: AppLogger;
};

type PendingPublish = {
  meta: PublishMeta;
  future: PublishFuture;
};

export function learnedKey(topic: string, channel: number): string {
  return `${topic}^${channel}`;
}

export function pendingKey(topic: string, channel: number, offset: string): string {
  return `${learnedKey(topic, channel)}^${offset}`;
}

/**
 * Correlates broker acknowledgments with denial notifications.
 *
 * An acknowledged publish waits in the pending table for the publish window.
 * If it is still there when the window closes it succeeds; a denial for its
 * exact key, or the first denial learned for its topic and channel, fails it
 * instead. Each key leaves the table through a single synchronous `remove` or
 * sweep, so exactly one of the two outcomes wins.
 */
export class ReconciliationEngine {
  private readonly pending: TimedMap<string, PendingPublish>;
  private readonly learned: TimedMap<string, DenialReason>;
  private readonly publishWindowMs: number;
  private readonly learnedErrorTtlMs: number;
  private readonly logger: AppLogger;
  private closed = false;

  constructor(options: ReconciliationEngineOptions = {}) {
    this.publishWindowMs = options.publishWindowMs ?? DEFAULT_PUBLISH_WINDOW_MS;
    this.learnedErrorTtlMs = options.learnedErrorTtlMs ?? DEFAULT_LEARNED_ERROR_TTL_MS;
    this.logger = options.logger ?? appLogger.child({ subsystem: "reconciliation" });
    this.pending = new TimedMap({ name: "pending-publishes", logger: this.logger });
    this.learned = new TimedMap({ name: "learned-errors", logger: this.logger });
    this.pending.onEviction((_key, entry) => this.completeOnTimeout(entry));
  }

  /** After `close()` the future fails at once, since no window runs any more. */
  registerPending(meta: PublishMeta, future: PublishFuture, ttlMs: number = this.publishWindowMs): void {
    if (future.settled) {
      return;
    }
    if (this.closed) {
      const error = new TransportFailureError("Client closed before the publish settled");
      this.settle({ meta, future }, "transport_failure", () => future.fail(error));
      return;
    }
    this.pending.put(pendingKey(meta.topic, meta.channel, meta.offset), { meta, future }, ttlMs);
  }

  onDenialNotification(notification: DenialNotification): void {
    recordDenialNotification();
    const denial = describeDenial(notification.code);
    const topicChannel = learnedKey(notification.topic, notification.channel);

    if (!this.learned.has(topicChannel)) {
      this.learned.put(topicChannel, denial, this.learnedErrorTtlMs);
      this.logger.warn(
        {
          event: "publish.denial_learned",
          topic: notification.topic,
          channel: notification.channel,
          code: denial.code,
        },
        "Learned publish denial"
      );
      const prefix = `${topicChannel}^`;
      for (const key of this.pending.keys()) {
        if (!key.startsWith(prefix)) {
          continue;
        }
        const entry = this.pending.remove(key);
        if (entry) {
          this.failWithDenial(entry, denial);
        }
      }
    }

    const exact = this.pending.remove(pendingKey(notification.topic, notification.channel, notification.offset));
    if (exact) {
      this.failWithDenial(exact, denial);
    }
  }

  checkLearned(topic: string, channel: number): DenialReason | undefined {
    return this.learned.get(learnedKey(topic, channel));
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Fails every pending publish with `error`; returns how many were failed. */
  failAllPending(error: StreamClientError): number {
    let failed = 0;
    for (const key of this.pending.keys()) {
      const entry = this.pending.remove(key);
      if (entry && this.settle(entry, "transport_failure", () => entry.future.fail(error))) {
        failed += 1;
      }
    }
    return failed;
  }

  async consume(queue: NotificationQueue<DenialNotification>): Promise<void> {
    for await (const notification of queue) {
      try {
        this.onDenialNotification(notification);
      } catch (error) {
        this.logger.error(
          { err: normalizeError(error), event: "notification.handle_failed", topic: notification.topic },
          "Failed to apply denial notification"
        );
      }
    }
  }

  close(): void {
    this.closed = true;
    this.pending.close();
    this.learned.close();
  }

  private completeOnTimeout(entry: PendingPublish): void {
    this.settle(entry, "success", () => entry.future.succeed(entry.meta));
  }

  private failWithDenial(entry: PendingPublish, denial: DenialReason): void {
    const error = new LateDenialError(entry.meta, denial);
    if (this.settle(entry, "late_denial", () => entry.future.fail(error))) {
      this.logger.warn(
        {
          event: "publish.denied",
          topic: entry.meta.topic,
          channel: entry.meta.channel,
          offset: entry.meta.offset,
          code: denial.code,
        },
        "Acknowledged publish was denied"
      );
    }
  }

  private settle(entry: PendingPublish, outcome: PublishOutcome, transition: () => boolean): boolean {
    let settled = false;
    try {
      settled = transition();
    } catch (error) {
      // the future settled; only the caller's callback threw
      settled = entry.future.settled;
      this.logger.error(
        { err: normalizeError(error), event: "publish.callback_failed", topic: entry.meta.topic },
        "Publish callback threw"
      );
    }
    if (settled) {
      recordPublishResult(outcome);
    }
    return settled;
  }
}
