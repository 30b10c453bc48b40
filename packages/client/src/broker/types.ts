export type BrokerRecord = {
  topic: string;
  partition: number;
  offset: string;
  timestamp: number;
  key: Buffer | null;
  value: Buffer | null;
};

export type TopicPartitions = {
  topic: string;
  partitions: number[];
};

export type OutgoingRecord = {
  topic: string;
  partition: number;
  key: string;
  value: Buffer;
};

/** Where the broker stored a record. */
export type RecordPosition = {
  topic: string;
  partition: number;
  offset: string;
};

export interface ProducerConnection {
  readonly endpoint: string;
  /** Session token issued with the connection settings. */
  readonly token: string;
  connect(): Promise<void>;
  /** Partition ids of `topic`; empty when the broker does not know the topic. */
  partitionsFor(topic: string): Promise<number[]>;
  send(record: OutgoingRecord): Promise<RecordPosition>;
  close(): Promise<void>;
}

export interface ConsumerConnection {
  readonly endpoint: string;
  connect(): Promise<void>;
  partitionsFor(topic: string): Promise<number[]>;
  /** Replaces the whole assignment. */
  assign(assignment: TopicPartitions[]): Promise<void>;
  /** Resolves with the next batch, or an empty array once `timeoutMs` passes. */
  poll(timeoutMs: number): Promise<BrokerRecord[]>;
  /** Makes a pending poll, or the next one, reject with `WakeupError`. */
  wakeup(): void;
  close(): Promise<void>;
}

/** `low` is the first stored offset of a partition, `high` the next one to be written. */
export type OffsetBounds = {
  low: string;
  high: string;
};

/** Reads records already stored in one partition; opened per history query. */
export interface HistoryConnection {
  readonly endpoint: string;
  connect(): Promise<void>;
  partitionsFor(topic: string): Promise<number[]>;
  offsetBounds(topic: string, partition: number): Promise<OffsetBounds>;
  /** Offset of the first record stamped at or after `timestamp`; `high` when there is none. */
  offsetForTimestamp(topic: string, partition: number, timestamp: number): Promise<string>;
  /** Records with offsets in [from, to), in offset order. */
  read(topic: string, partition: number, from: string, to: string): Promise<BrokerRecord[]>;
  close(): Promise<void>;
}

export class WakeupError extends Error {
  constructor() {
    super("Consumer poll was woken up");
    this.name = "WakeupError";
  }
}
