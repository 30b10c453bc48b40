import { type BrokerRecord, type ConsumerConnection, WakeupError } from "../broker/types.js";
import type { PayloadCipher } from "../crypto/PayloadCipher.js";
import {
  ClientStateError,
  MalformedPayloadError,
  NoPermissionError,
  StreamClientError,
  TopicNotFoundError,
  TransportFailureError,
} from "../errors.js";
import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import { recordConsumerRecord } from "../observability/metrics.js";
import type { PermissionSet } from "../permissions/PermissionSet.js";
import type { NetworkListener } from "../types/index.js";

export const DEFAULT_POLL_TIMEOUT_MS = 256;

export type GroupConsumerState = "created" | "assigned" | "running" | "stopping" | "closed";

export type GroupConsumerOptions = {
  group: string;
  /** Prefix of every broker topic this consumer reads. */
  subscribeKey: string;
  connection: ConsumerConnection;
  permissions: PermissionSet;
  cipher?: PayloadCipher;
  pollTimeoutMs?: number;
  logger?: AppLogger;
};

export type TopicSubscription = {
  topic: string;
  channels: number[];
};

/**
 * Consumes one broker endpoint on behalf of one consumer group.
 *
 * Partitions are attached only when the permission snapshot lets the session
 * read them, and the assignment is always rebuilt from the full
 * topic/channel/listener map.
 */
export class GroupConsumer {
  readonly group: string;
  private readonly subscribeKey: string;
  private readonly connection: ConsumerConnection;
  private readonly cipher?: PayloadCipher;
  private readonly pollTimeoutMs: number;
  private readonly logger: AppLogger;
  private assignment = new Map<string, Map<number, NetworkListener>>();
  private readonly partitionCache = new Map<string, number[]>();
  private permissions: PermissionSet;
  private currentState: GroupConsumerState = "created";
  private alive = false;
  private loop: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  private lastChange: Promise<void> = Promise.resolve();

  constructor(options: GroupConsumerOptions) {
    this.group = options.group;
    this.subscribeKey = options.subscribeKey;
    this.connection = options.connection;
    this.permissions = options.permissions;
    this.cipher = options.cipher;
    this.pollTimeoutMs = options.pollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
    this.logger =
      options.logger ??
      appLogger.child({ subsystem: "group-consumer", group: this.group, endpoint: options.connection.endpoint });
  }

  get state(): GroupConsumerState {
    return this.currentState;
  }

  get endpoint(): string {
    return this.connection.endpoint;
  }

  updatePermissions(permissions: PermissionSet): void {
    this.permissions = permissions;
  }

  /**
   * Attaches `listener` to the readable channels of `topic`; a negative
   * channel means all of them. Resolves with the channels attached.
   */
  async subscribe(topic: string, channel: number, listener: NetworkListener): Promise<number[]> {
    if (this.currentState === "stopping" || this.currentState === "closed") {
      throw new ClientStateError(`Group consumer [${this.group}] is ${this.currentState}`);
    }
    try {
      const encoded = this.encode(topic);
      const partitions = await this.partitionsOf(encoded);
      if (partitions.length === 0) {
        throw new TopicNotFoundError(topic);
      }
      const channels = this.permissions.computeReadableChannels(topic, channel, partitions);
      if (channels.length === 0) {
        throw new NoPermissionError(topic, "read", channel);
      }

      await this.serialize(async () => {
        const next = copyAssignment(this.assignment);
        const listeners = next.get(encoded) ?? new Map<number, NetworkListener>();
        for (const readable of channels) {
          listeners.set(readable, listener);
        }
        next.set(encoded, listeners);
        await this.reassign(next);
        this.assignment = next;
      });
      if (this.currentState === "created") {
        this.currentState = "assigned";
      }
      this.logger.info({ event: "consumer.subscribed", topic, channels }, "Subscribed");
      return channels;
    } catch (error) {
      const failure =
        error instanceof StreamClientError
          ? error
          : new TransportFailureError(`Failed to subscribe to [${topic}]`, { cause: error });
      this.invokeListener(() => listener.onError?.(failure));
      throw failure;
    }
  }

  /** Drops `topic` (or one of its channels) from the assignment. */
  unsubscribe(topic: string, channel?: number): Promise<boolean> {
    return this.serialize(() => this.detach(this.encode(topic), topic, channel));
  }

  subscriptions(): TopicSubscription[] {
    return Array.from(this.assignment, ([encoded, listeners]) => ({
      topic: this.decode(encoded),
      channels: Array.from(listeners.keys()).sort((a, b) => a - b),
    }));
  }

  /**
   * Starts the poll loop. The returned promise settles once the loop has
   * stopped and the connection is closed; it never rejects after start.
   */
  run(): Promise<void> {
    if (this.currentState === "stopping" || this.currentState === "closed") {
      return Promise.reject(new ClientStateError(`Group consumer [${this.group}] is ${this.currentState}`));
    }
    if (this.loop) {
      return this.loop;
    }
    this.alive = true;
    this.currentState = "running";
    this.loop = this.pollLoop();
    return this.loop;
  }

  shutdown(): Promise<void> {
    if (!this.closing) {
      this.closing = this.stop();
    }
    return this.closing;
  }

  /** Dispatches one record to the listener attached to its partition. */
  handle(record: BrokerRecord): void {
    const listener = this.assignment.get(record.topic)?.get(record.partition);
    if (!listener) {
      recordConsumerRecord("unrouted");
      return;
    }

    const payload = record.value ?? Buffer.alloc(0);
    let body = payload;
    let legacy = false;
    if (this.cipher) {
      try {
        const result = this.cipher.decrypt(payload);
        body = result.body;
        legacy = result.kind === "legacy";
      } catch (error) {
        recordConsumerRecord("malformed");
        const failure =
          error instanceof MalformedPayloadError
            ? error
            : new MalformedPayloadError("Failed to decrypt payload", { cause: error });
        this.logger.warn(
          {
            err: normalizeError(failure),
            event: "consumer.record.malformed",
            topic: record.topic,
            partition: record.partition,
            offset: record.offset,
          },
          "Dropping malformed record"
        );
        this.invokeListener(() => listener.onError?.(failure));
        return;
      }
    }

    recordConsumerRecord(legacy ? "legacy" : "delivered");
    this.invokeListener(() =>
      listener.onMessage({
        topic: this.decode(record.topic),
        channel: record.partition,
        body,
        offset: record.offset,
        timestamp: record.timestamp,
      })
    );
  }

  private async detach(encoded: string, topic: string, channel: number | undefined): Promise<boolean> {
    const listeners = this.assignment.get(encoded);
    if (!listeners) {
      return false;
    }
    const removed: NetworkListener[] = [];
    if (channel === undefined || channel < 0) {
      removed.push(...listeners.values());
      this.assignment.delete(encoded);
    } else {
      const listener = listeners.get(channel);
      if (!listener) {
        return false;
      }
      listeners.delete(channel);
      removed.push(listener);
      if (listeners.size === 0) {
        this.assignment.delete(encoded);
      }
    }

    if (this.currentState !== "stopping" && this.currentState !== "closed") {
      await this.reassign(this.assignment);
    }
    const stillAttached = new Set(this.assignment.get(encoded)?.values() ?? []);
    for (const listener of new Set(removed)) {
      if (!stillAttached.has(listener)) {
        this.invokeListener(() => listener.onDisconnected?.(topic));
      }
    }
    return true;
  }

  private async stop(): Promise<void> {
    if (this.currentState === "closed") {
      return;
    }
    this.currentState = "stopping";
    if (this.loop) {
      this.alive = false;
      this.connection.wakeup();
      await this.loop;
      return;
    }
    await this.closeConnection();
  }

  private async pollLoop(): Promise<void> {
    try {
      while (this.alive) {
        let records: BrokerRecord[];
        try {
          records = await this.connection.poll(this.pollTimeoutMs);
        } catch (error) {
          if (error instanceof WakeupError) {
            continue;
          }
          this.logger.error({ err: normalizeError(error), event: "consumer.poll.failed" }, "Consumer poll failed");
          this.notifyAll(new TransportFailureError("Consumer poll failed", { cause: error }));
          break;
        }
        for (const record of records) {
          this.handle(record);
        }
      }
    } finally {
      this.alive = false;
      this.currentState = "stopping";
      await this.closeConnection();
    }
  }

  private async closeConnection(): Promise<void> {
    try {
      await this.connection.close();
    } catch (error) {
      this.logger.warn({ err: normalizeError(error), event: "consumer.close_failed" }, "Consumer close failed");
    }
    this.currentState = "closed";
  }

  /** Assignment changes run one at a time so none works from a stale map. */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lastChange.then(task);
    this.lastChange = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async reassign(assignment: Map<string, Map<number, NetworkListener>>): Promise<void> {
    await this.connection.assign(
      Array.from(assignment, ([topic, listeners]) => ({
        topic,
        partitions: Array.from(listeners.keys()).sort((a, b) => a - b),
      }))
    );
  }

  private async partitionsOf(encoded: string): Promise<number[]> {
    const cached = this.partitionCache.get(encoded);
    if (cached) {
      return cached;
    }
    const partitions = await this.connection.partitionsFor(encoded);
    if (partitions.length > 0) {
      this.partitionCache.set(encoded, partitions);
    }
    return partitions;
  }

  private notifyAll(error: StreamClientError): void {
    const listeners = new Set<NetworkListener>();
    for (const channels of this.assignment.values()) {
      for (const listener of channels.values()) {
        listeners.add(listener);
      }
    }
    for (const listener of listeners) {
      this.invokeListener(() => listener.onError?.(error));
    }
  }

  private invokeListener(call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.error({ err: normalizeError(error), event: "consumer.listener.failed" }, "Listener threw");
    }
  }

  private encode(topic: string): string {
    return `${this.subscribeKey}.${topic}`;
  }

  private decode(encoded: string): string {
    return encoded.substring(encoded.indexOf(".") + 1);
  }
}

function copyAssignment(
  assignment: Map<string, Map<number, NetworkListener>>
): Map<string, Map<number, NetworkListener>> {
  return new Map(Array.from(assignment, ([topic, listeners]) => [topic, new Map(listeners)]));
}
