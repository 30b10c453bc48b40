import type { ProducerConnection, RecordPosition } from "../broker/types.js";
import type { PayloadCipher } from "../crypto/PayloadCipher.js";
import {
  LearnedDenialError,
  NoPermissionError,
  StreamClientError,
  TopicNotFoundError,
  TransportFailureError,
  type DenialReason,
} from "../errors.js";
import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import { recordPublishResult, type PublishOutcome } from "../observability/metrics.js";
import { PermissionSet } from "../permissions/PermissionSet.js";
import { PublishFuture } from "../reconcile/PublishFuture.js";
import type { ReconciliationEngine } from "../reconcile/ReconciliationEngine.js";
import type { PublishCallback, PublishMeta, PublishRequest } from "../types/index.js";

export type PublisherOptions = {
  publishKey: string;
  secretKey: string;
  /** Read on every publish, so connections added or dropped later are seen. */
  producers: () => readonly ProducerConnection[];
  engine: ReconciliationEngine;
  permissions?: () => PermissionSet;
  cipher?: PayloadCipher;
  /** Uniform in [0, 1); picks the producer when there are several. */
  random?: () => number;
  logger?: AppLogger;
};

export class Publisher {
  private readonly publishKey: string;
  private readonly secretKey: string;
  private readonly producers: () => readonly ProducerConnection[];
  private readonly engine: ReconciliationEngine;
  private readonly permissions: () => PermissionSet;
  private readonly cipher?: PayloadCipher;
  private readonly random: () => number;
  private readonly logger: AppLogger;

  constructor(options: PublisherOptions) {
    this.publishKey = options.publishKey;
    this.secretKey = options.secretKey;
    this.producers = options.producers;
    this.engine = options.engine;
    this.permissions = options.permissions ?? PermissionSet.empty;
    this.cipher = options.cipher;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? appLogger.child({ subsystem: "publisher" });
  }

  /**
   * Sends `body` to one channel, or to every writable channel of the topic
   * when the channel is omitted or negative. Resolves with one result per channel once
   * each has outlived the denial window; the callback runs once per channel.
   */
  async publish(request: PublishRequest): Promise<PublishMeta[]> {
    const { topic, callback } = request;
    const channel = request.channel ?? -1;

    let producer: ProducerConnection;
    let channels: number[];
    let payload: Buffer;
    try {
      producer = this.selectProducer();
      channels = channel >= 0 ? [channel] : await producer.partitionsFor(this.encode(topic));
      if (channels.length === 0) {
        throw new TopicNotFoundError(topic);
      }
      if (channel >= 0) {
        this.assertWritable(topic, channel);
      } else {
        channels = this.writableOf(topic, channels);
      }
      payload = this.cipher ? this.cipher.encrypt(request.body) : toBuffer(request.body);
    } catch (error) {
      throw this.rejectBeforeSend(topic, error, callback);
    }

    const key = `${this.secretKey}-${producer.token}`;
    const futures = channels.map((target) => this.sendToChannel(producer, topic, target, payload, key, callback));
    return Promise.all(futures.map((future) => future.promise));
  }

  private sendToChannel(
    producer: ProducerConnection,
    topic: string,
    channel: number,
    payload: Buffer,
    key: string,
    callback: PublishCallback | undefined
  ): PublishFuture {
    const future = new PublishFuture(callback);
    const learned = this.engine.checkLearned(topic, channel);
    if (learned) {
      this.failLearned(future, { topic, channel }, learned);
      return future;
    }

    void producer
      .send({ topic: this.encode(topic), partition: channel, key, value: payload })
      .then(
        (position) => this.onAcknowledged(future, topic, position),
        (error: unknown) => {
          this.logger.error(
            { err: normalizeError(error), event: "publish.send_failed", topic, channel, endpoint: producer.endpoint },
            "Broker send failed"
          );
          const failure = new TransportFailureError(`Failed to publish to [${topic}:${channel}]`, { cause: error });
          this.settle(future, "transport_failure", () => future.fail(failure));
        }
      )
      .catch((error: unknown) => {
        this.logger.error(
          { err: normalizeError(error), event: "publish.ack_failed", topic },
          "Acknowledgment handling failed"
        );
      });
    return future;
  }

  private onAcknowledged(future: PublishFuture, topic: string, position: RecordPosition): void {
    const meta: PublishMeta = { topic, channel: position.partition, offset: position.offset };
    const learned = this.engine.checkLearned(topic, position.partition);
    if (learned) {
      this.failLearned(future, meta, learned);
      return;
    }
    this.engine.registerPending(meta, future);
  }

  private failLearned(
    future: PublishFuture,
    target: { topic: string; channel: number; offset?: string },
    denial: DenialReason
  ): void {
    this.logger.debug(
      { event: "publish.learned_denial", topic: target.topic, channel: target.channel, code: denial.code },
      "Publish failed on a learned denial"
    );
    const error = new LearnedDenialError(target, denial);
    this.settle(future, "learned_denial", () => future.fail(error));
  }

  private settle(future: PublishFuture, outcome: PublishOutcome, transition: () => boolean): void {
    let settled = false;
    try {
      settled = transition();
    } catch (error) {
      settled = future.settled;
      this.logger.error({ err: normalizeError(error), event: "publish.callback_failed" }, "Publish callback threw");
    }
    if (settled) {
      recordPublishResult(outcome);
    }
  }

  private rejectBeforeSend(topic: string, error: unknown, callback: PublishCallback | undefined): StreamClientError {
    const failure =
      error instanceof StreamClientError
        ? error
        : new TransportFailureError(`Failed to publish to [${topic}]`, { cause: error });
    if (failure instanceof TransportFailureError) {
      recordPublishResult("transport_failure");
    }
    this.logger.warn({ err: normalizeError(failure), event: "publish.rejected", topic }, "Publish rejected");
    try {
      callback?.error?.(failure);
    } catch (callbackError) {
      this.logger.error(
        { err: normalizeError(callbackError), event: "publish.callback_failed" },
        "Publish callback threw"
      );
    }
    return failure;
  }

  private selectProducer(): ProducerConnection {
    const producers = this.producers();
    if (producers.length === 0) {
      throw new TransportFailureError("Not connected to any publish endpoint");
    }
    const index =
      producers.length === 1 ? 0 : Math.min(producers.length - 1, Math.floor(this.random() * producers.length));
    const producer = producers[index];
    if (!producer) {
      throw new TransportFailureError("Not connected to any publish endpoint");
    }
    return producer;
  }

  private assertWritable(topic: string, channel: number): void {
    const snapshot = this.permissions();
    if (snapshot.hasTopic(topic) && !snapshot.canWrite(topic, channel)) {
      throw new NoPermissionError(topic, "write", channel);
    }
  }

  /** Fan-out skips channels the snapshot knows to be read-only. */
  private writableOf(topic: string, channels: number[]): number[] {
    const snapshot = this.permissions();
    if (!snapshot.hasTopic(topic)) {
      return channels;
    }
    const writable = channels.filter((target) => snapshot.canWrite(topic, target));
    if (writable.length === 0) {
      throw new NoPermissionError(topic, "write");
    }
    return writable;
  }

  private encode(topic: string): string {
    return `${this.publishKey}.${topic}`;
  }
}

function toBuffer(body: Buffer | Uint8Array | string): Buffer {
  return typeof body === "string" ? Buffer.from(body, "utf8") : Buffer.from(body);
}
