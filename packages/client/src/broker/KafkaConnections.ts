import {
  type Admin,
  type Consumer,
  type EachBatchPayload,
  Kafka,
  type KafkaConfig,
  type KafkaMessage,
  logLevel,
  type Producer,
  type SASLOptions,
} from "kafkajs";
import { v4 as uuidv4 } from "uuid";

import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import {
  type BrokerRecord,
  type ConsumerConnection,
  type HistoryConnection,
  type OffsetBounds,
  type OutgoingRecord,
  type ProducerConnection,
  type RecordPosition,
  type TopicPartitions,
  WakeupError,
} from "./types.js";

const DEFAULT_CLIENT_ID = "streamgate-client";
const DEFAULT_SESSION_TIMEOUT_MS = 30_000;
const DEFAULT_HISTORY_TIMEOUT_MS = 10_000;

export type KafkaFactory = Pick<Kafka, "producer" | "consumer" | "admin">;

export type KafkaConnectionOptions = {
  /** Label used in logs and subscribe results; defaults to the joined broker list. */
  endpoint?: string;
  brokers: string[];
  clientId?: string;
  ssl?: KafkaConfig["ssl"];
  sasl?: SASLOptions;
  kafka?: KafkaFactory;
  logger?: AppLogger;
};

export type KafkaProducerOptions = KafkaConnectionOptions & {
  token: string;
};

export type KafkaConsumerOptions = KafkaConnectionOptions & {
  groupId: string;
  sessionTimeoutMs?: number;
  fromBeginning?: boolean;
};

export type KafkaHistoryOptions = KafkaConnectionOptions & {
  /** Longest a `read` waits for the last record of its range. */
  readTimeoutMs?: number;
  /** Each read joins its own throwaway group named `{prefix}-{uuid}`. */
  groupIdPrefix?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isUnknownTopicError(error: unknown): boolean {
  return isRecord(error) && error.type === "UNKNOWN_TOPIC_OR_PARTITION";
}

function createKafkaFactory(options: KafkaConnectionOptions): KafkaFactory {
  if (options.kafka) {
    return options.kafka;
  }
  const kafkaOptions: KafkaConfig = {
    clientId: options.clientId ?? DEFAULT_CLIENT_ID,
    brokers: options.brokers,
    logLevel: logLevel.NOTHING,
  };
  if (options.ssl !== undefined) {
    kafkaOptions.ssl = options.ssl;
  }
  if (options.sasl) {
    kafkaOptions.sasl = options.sasl;
  }
  return new Kafka(kafkaOptions);
}

async function fetchPartitions(admin: Admin, topic: string): Promise<number[]> {
  try {
    const metadata = await admin.fetchTopicMetadata({ topics: [topic] });
    const match = metadata.topics.find((entry) => entry.name === topic);
    if (!match) {
      return [];
    }
    return match.partitions.map((partition) => partition.partitionId).sort((a, b) => a - b);
  } catch (error) {
    if (isUnknownTopicError(error)) {
      return [];
    }
    throw error;
  }
}

function toBrokerRecord(topic: string, partition: number, message: KafkaMessage): BrokerRecord {
  const timestamp = Number(message.timestamp);
  return {
    topic,
    partition,
    offset: message.offset,
    timestamp: Number.isFinite(timestamp) ? timestamp : Date.now(),
    key: message.key ?? null,
    value: message.value ?? null,
  };
}

export class KafkaProducerConnection implements ProducerConnection {
  readonly endpoint: string;
  readonly token: string;
  private readonly kafka: KafkaFactory;
  private readonly logger: AppLogger;
  private producer: Producer | null = null;
  private admin: Admin | null = null;
  private connecting: Promise<void> | null = null;

  constructor(options: KafkaProducerOptions) {
    this.endpoint = options.endpoint ?? options.brokers.join(",");
    this.token = options.token;
    this.kafka = createKafkaFactory(options);
    this.logger = options.logger ?? appLogger.child({ subsystem: "kafka-producer", endpoint: this.endpoint });
  }

  async connect(): Promise<void> {
    if (this.producer) {
      return;
    }
    if (this.connecting) {
      return this.connecting;
    }
    this.connecting = (async () => {
      const producer = this.kafka.producer({ allowAutoTopicCreation: false });
      const admin = this.kafka.admin();
      await Promise.all([producer.connect(), admin.connect()]);
      this.producer = producer;
      this.admin = admin;
      this.logger.info({ event: "producer.connected" }, "Kafka producer connected");
    })().finally(() => {
      this.connecting = null;
    });
    await this.connecting;
  }

  async partitionsFor(topic: string): Promise<number[]> {
    const admin = await this.requireAdmin();
    return fetchPartitions(admin, topic);
  }

  async send(record: OutgoingRecord): Promise<RecordPosition> {
    if (!this.producer) {
      await this.connect();
    }
    const producer = this.producer;
    if (!producer) {
      throw new Error("Kafka producer unavailable");
    }
    const metadata = await producer.send({
      topic: record.topic,
      messages: [{ key: record.key, value: record.value, partition: record.partition }],
    });
    const ack =
      metadata.find((entry) => entry.topicName === record.topic && entry.partition === record.partition) ??
      metadata[0];
    const offset = ack?.baseOffset ?? ack?.offset;
    if (offset === undefined) {
      throw new Error(`Kafka returned no offset for ${record.topic}:${record.partition}`);
    }
    return { topic: record.topic, partition: ack?.partition ?? record.partition, offset };
  }

  async close(): Promise<void> {
    const [producer, admin] = [this.producer, this.admin];
    this.producer = null;
    this.admin = null;
    await Promise.all([
      producer
        ?.disconnect()
        .catch((error: unknown) =>
          this.logger.warn({ err: normalizeError(error), event: "producer.close_failed" }, "Kafka producer close failed")
        ),
      admin
        ?.disconnect()
        .catch((error: unknown) =>
          this.logger.warn({ err: normalizeError(error), event: "admin.close_failed" }, "Kafka admin close failed")
        ),
    ]);
  }

  private async requireAdmin(): Promise<Admin> {
    if (!this.admin) {
      await this.connect();
    }
    if (!this.admin) {
      throw new Error("Kafka admin unavailable");
    }
    return this.admin;
  }
}

type Delivery = {
  records: BrokerRecord[];
  release: (delivered: boolean) => void;
};

type PendingPoll = {
  resolve: (records: BrokerRecord[]) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
};

/**
 * Pull-style consumer over kafkajs' push-based run loop.
 *
 * Each batch kafkajs fetches waits until a `poll` takes it; its offsets are
 * resolved only after that hand-off. The assignment is applied with
 * pause/resume, so partitions outside it stay subscribed but never deliver.
 */
export class KafkaConsumerConnection implements ConsumerConnection {
  readonly endpoint: string;
  private readonly kafka: KafkaFactory;
  private readonly logger: AppLogger;
  private readonly groupId: string;
  private readonly sessionTimeoutMs: number;
  private readonly fromBeginning: boolean;
  private consumer: Consumer | null = null;
  private admin: Admin | null = null;
  private running = false;
  private readonly subscribedTopics = new Set<string>();
  private readonly assigned = new Map<string, Set<number>>();
  private readonly deliveries: Delivery[] = [];
  private pendingPoll: PendingPoll | null = null;
  private wakeupRequested = false;

  constructor(options: KafkaConsumerOptions) {
    this.endpoint = options.endpoint ?? options.brokers.join(",");
    this.kafka = createKafkaFactory(options);
    this.groupId = options.groupId;
    this.sessionTimeoutMs = options.sessionTimeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.fromBeginning = options.fromBeginning ?? false;
    this.logger =
      options.logger ??
      appLogger.child({ subsystem: "kafka-consumer", endpoint: this.endpoint, group: this.groupId });
  }

  async connect(): Promise<void> {
    if (this.consumer) {
      return;
    }
    const consumer = this.kafka.consumer({
      groupId: this.groupId,
      sessionTimeout: this.sessionTimeoutMs,
      allowAutoTopicCreation: false,
    });
    const admin = this.kafka.admin();
    await Promise.all([consumer.connect(), admin.connect()]);
    this.consumer = consumer;
    this.admin = admin;
  }

  async partitionsFor(topic: string): Promise<number[]> {
    const admin = await this.requireAdmin();
    return fetchPartitions(admin, topic);
  }

  async assign(assignment: TopicPartitions[]): Promise<void> {
    const consumer = await this.requireConsumer();
    this.assigned.clear();
    for (const { topic, partitions } of assignment) {
      this.assigned.set(topic, new Set(partitions));
    }

    const newTopics = Array.from(this.assigned.keys()).filter((topic) => !this.subscribedTopics.has(topic));
    if (newTopics.length > 0) {
      if (this.running) {
        this.releaseDeliveries();
        await consumer.stop();
        this.running = false;
      }
      await consumer.subscribe({ topics: newTopics, fromBeginning: this.fromBeginning });
      for (const topic of newTopics) {
        this.subscribedTopics.add(topic);
      }
    }
    if (!this.running && this.subscribedTopics.size > 0) {
      await this.startRunLoop(consumer);
    }
    await this.applyPauses(consumer);
  }

  poll(timeoutMs: number): Promise<BrokerRecord[]> {
    if (this.wakeupRequested) {
      this.wakeupRequested = false;
      return Promise.reject(new WakeupError());
    }
    const delivery = this.deliveries.shift();
    if (delivery) {
      delivery.release(true);
      return Promise.resolve(delivery.records);
    }
    if (this.pendingPoll) {
      return Promise.reject(new Error("A poll is already pending"));
    }
    return new Promise<BrokerRecord[]>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingPoll = null;
        resolve([]);
      }, Math.max(0, timeoutMs));
      this.pendingPoll = { resolve, reject, timer };
    });
  }

  wakeup(): void {
    const pending = this.pendingPoll;
    if (!pending) {
      this.wakeupRequested = true;
      return;
    }
    this.pendingPoll = null;
    clearTimeout(pending.timer);
    pending.reject(new WakeupError());
  }

  async close(): Promise<void> {
    const [consumer, admin] = [this.consumer, this.admin];
    this.consumer = null;
    this.admin = null;
    this.running = false;
    this.releaseDeliveries();
    const pending = this.pendingPoll;
    if (pending) {
      this.pendingPoll = null;
      clearTimeout(pending.timer);
      pending.resolve([]);
    }
    this.subscribedTopics.clear();
    this.assigned.clear();
    await Promise.all([
      consumer
        ?.disconnect()
        .catch((error: unknown) =>
          this.logger.warn({ err: normalizeError(error), event: "consumer.close_failed" }, "Kafka consumer close failed")
        ),
      admin
        ?.disconnect()
        .catch((error: unknown) =>
          this.logger.warn({ err: normalizeError(error), event: "admin.close_failed" }, "Kafka admin close failed")
        ),
    ]);
  }

  private async startRunLoop(consumer: Consumer): Promise<void> {
    this.running = true;
    await consumer.run({
      autoCommit: true,
      eachBatchAutoResolve: false,
      eachBatch: (payload) => this.handleBatch(payload),
    });
  }

  private async handleBatch({ batch, resolveOffset, heartbeat, isRunning, isStale }: EachBatchPayload): Promise<void> {
    const partitions = this.assigned.get(batch.topic);
    if (!partitions || !partitions.has(batch.partition) || batch.messages.length === 0) {
      return;
    }
    const records = batch.messages.map((message) => toBrokerRecord(batch.topic, batch.partition, message));
    const delivered = await this.handOff(records);
    if (!delivered || !isRunning() || isStale()) {
      return;
    }
    for (const message of batch.messages) {
      resolveOffset(message.offset);
    }
    await heartbeat();
  }

  private handOff(records: BrokerRecord[]): Promise<boolean> {
    return new Promise<boolean>((release) => {
      const pending = this.pendingPoll;
      if (pending) {
        this.pendingPoll = null;
        clearTimeout(pending.timer);
        pending.resolve(records);
        release(true);
        return;
      }
      this.deliveries.push({ records, release });
    });
  }

  private releaseDeliveries(): void {
    for (const delivery of this.deliveries.splice(0)) {
      delivery.release(false);
    }
  }

  private async applyPauses(consumer: Consumer): Promise<void> {
    const pause: TopicPartitions[] = [];
    const resume: TopicPartitions[] = [];
    for (const topic of this.subscribedTopics) {
      const assignedPartitions = this.assigned.get(topic) ?? new Set<number>();
      const all = await this.partitionsFor(topic);
      const paused = all.filter((partition) => !assignedPartitions.has(partition));
      const active = all.filter((partition) => assignedPartitions.has(partition));
      if (paused.length > 0) {
        pause.push({ topic, partitions: paused });
      }
      if (active.length > 0) {
        resume.push({ topic, partitions: active });
      }
    }
    if (pause.length > 0) {
      consumer.pause(pause);
    }
    if (resume.length > 0) {
      consumer.resume(resume);
    }
    this.logger.debug({ event: "consumer.assigned", assignment: resume }, "Consumer assignment applied");
  }

  private async requireConsumer(): Promise<Consumer> {
    if (!this.consumer) {
      await this.connect();
    }
    if (!this.consumer) {
      throw new Error("Kafka consumer unavailable");
    }
    return this.consumer;
  }

  private async requireAdmin(): Promise<Admin> {
    if (!this.admin) {
      await this.connect();
    }
    if (!this.admin) {
      throw new Error("Kafka admin unavailable");
    }
    return this.admin;
  }
}

/**
 * Reads stored ranges through a throwaway consumer group: the consumer seeks
 * to the start of the range and stops once the batch holding its last offset
 * arrives. Nothing is committed.
 */
export class KafkaHistoryConnection implements HistoryConnection {
  readonly endpoint: string;
  private readonly kafka: KafkaFactory;
  private readonly logger: AppLogger;
  private readonly readTimeoutMs: number;
  private readonly groupIdPrefix: string;
  private admin: Admin | null = null;

  constructor(options: KafkaHistoryOptions) {
    this.endpoint = options.endpoint ?? options.brokers.join(",");
    this.kafka = createKafkaFactory(options);
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_HISTORY_TIMEOUT_MS;
    this.groupIdPrefix = options.groupIdPrefix ?? "streamgate-history";
    this.logger = options.logger ?? appLogger.child({ subsystem: "kafka-history", endpoint: this.endpoint });
  }

  async connect(): Promise<void> {
    if (this.admin) {
      return;
    }
    const admin = this.kafka.admin();
    await admin.connect();
    this.admin = admin;
  }

  async partitionsFor(topic: string): Promise<number[]> {
    return fetchPartitions(await this.requireAdmin(), topic);
  }

  async offsetBounds(topic: string, partition: number): Promise<OffsetBounds> {
    const admin = await this.requireAdmin();
    const offsets = await admin.fetchTopicOffsets(topic);
    const match = offsets.find((entry) => entry.partition === partition);
    if (!match) {
      throw new Error(`Kafka returned no offsets for ${topic}:${partition}`);
    }
    return { low: match.low, high: match.high };
  }

  async offsetForTimestamp(topic: string, partition: number, timestamp: number): Promise<string> {
    const admin = await this.requireAdmin();
    const offsets = await admin.fetchTopicOffsetsByTimestamp(topic, timestamp);
    const match = offsets.find((entry) => entry.partition === partition);
    if (!match || match.offset === "-1") {
      const bounds = await this.offsetBounds(topic, partition);
      return bounds.high;
    }
    return match.offset;
  }

  async read(topic: string, partition: number, from: string, to: string): Promise<BrokerRecord[]> {
    const first = BigInt(from);
    const last = BigInt(to) - 1n;
    if (last < first) {
      return [];
    }
    const others = (await this.partitionsFor(topic)).filter((candidate) => candidate !== partition);
    const consumer = this.kafka.consumer({
      groupId: `${this.groupIdPrefix}-${uuidv4()}`,
      allowAutoTopicCreation: false,
    });
    await consumer.connect();
    try {
      const collected = new Map<string, BrokerRecord>();
      let reachedEnd: () => void = () => undefined;
      const complete = new Promise<void>((resolve) => {
        reachedEnd = resolve;
      });

      await consumer.subscribe({ topics: [topic], fromBeginning: true });
      await consumer.run({
        autoCommit: false,
        eachBatch: async ({ batch }) => {
          if (batch.partition !== partition) {
            return;
          }
          for (const message of batch.messages) {
            const offset = BigInt(message.offset);
            if (offset >= first && offset <= last) {
              collected.set(message.offset, toBrokerRecord(topic, partition, message));
            }
          }
          if (BigInt(batch.lastOffset()) >= last) {
            reachedEnd();
          }
        },
      });
      if (others.length > 0) {
        consumer.pause([{ topic, partitions: others }]);
      }
      consumer.seek({ topic, partition, offset: from });
      await this.within(complete, `${topic}:${partition}`);

      return Array.from(collected.values()).sort((a, b) => (BigInt(a.offset) < BigInt(b.offset) ? -1 : 1));
    } finally {
      await consumer
        .disconnect()
        .catch((error: unknown) =>
          this.logger.warn({ err: normalizeError(error), event: "history.close_failed" }, "History consumer close failed")
        );
    }
  }

  async close(): Promise<void> {
    const admin = this.admin;
    this.admin = null;
    await admin
      ?.disconnect()
      .catch((error: unknown) =>
        this.logger.warn({ err: normalizeError(error), event: "admin.close_failed" }, "Kafka admin close failed")
      );
  }

  private within(complete: Promise<void>, target: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(
        () => reject(new Error(`Timed out after ${this.readTimeoutMs}ms reading history of ${target}`)),
        this.readTimeoutMs
      );
      void complete.then(() => {
        clearTimeout(timer);
        resolve();
      });
    });
  }

  private async requireAdmin(): Promise<Admin> {
    if (!this.admin) {
      await this.connect();
    }
    if (!this.admin) {
      throw new Error("Kafka admin unavailable");
    }
    return this.admin;
  }
}
