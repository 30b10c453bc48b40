import type { BrokerRecord, HistoryConnection } from "../broker/types.js";
import type { PayloadCipher } from "../crypto/PayloadCipher.js";
import { InvalidArgumentError, MalformedPayloadError, NoPermissionError, TopicNotFoundError } from "../errors.js";
import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import type { PermissionSet } from "../permissions/PermissionSet.js";
import type { HistoryRequest, MessageEvent } from "../types/index.js";

/** Longest time window a single history query covers. */
export const MAX_HISTORY_WINDOW_MS = 86_400_000;

export type HistoryQuery =
  | { kind: "latest"; count: number }
  | { kind: "since"; start: number; count: number }
  | { kind: "window"; start: number; end: number };

function assertCount(count: number): void {
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidArgumentError(`History count must be a positive integer, got ${count}`);
  }
}

function assertTimestamp(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(`History ${name} must be a non-negative epoch timestamp, got ${value}`);
  }
}

/**
 * Validates a history request. Windows longer than a day are cut to the day
 * after `start`.
 */
export function toHistoryQuery(request: HistoryRequest): HistoryQuery {
  if (!Number.isInteger(request.channel) || request.channel < 0) {
    throw new InvalidArgumentError(`History needs a single channel, got ${request.channel}`);
  }
  if ("end" in request) {
    assertTimestamp("start", request.start);
    assertTimestamp("end", request.end);
    if (request.start >= request.end) {
      throw new InvalidArgumentError("History start must be before its end");
    }
    const end = Math.min(request.end, request.start + MAX_HISTORY_WINDOW_MS);
    return { kind: "window", start: request.start, end };
  }
  assertCount(request.count);
  if ("start" in request) {
    assertTimestamp("start", request.start);
    return { kind: "since", start: request.start, count: request.count };
  }
  return { kind: "latest", count: request.count };
}

export type HistoryReaderOptions = {
  subscribeKey: string;
  permissions: () => PermissionSet;
  cipher?: PayloadCipher;
  logger?: AppLogger;
};

type OffsetRange = { from: bigint; to: bigint };

function maxOf(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

function minOf(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export class HistoryReader {
  private readonly subscribeKey: string;
  private readonly permissions: () => PermissionSet;
  private readonly cipher?: PayloadCipher;
  private readonly logger: AppLogger;

  constructor(options: HistoryReaderOptions) {
    this.subscribeKey = options.subscribeKey;
    this.permissions = options.permissions;
    this.cipher = options.cipher;
    this.logger = options.logger ?? appLogger.child({ subsystem: "history" });
  }

  /** Reads the messages `query` selects from one endpoint, oldest first. */
  async read(
    connection: HistoryConnection,
    topic: string,
    channel: number,
    query: HistoryQuery
  ): Promise<MessageEvent[]> {
    const encoded = `${this.subscribeKey}.${topic}`;
    const partitions = await connection.partitionsFor(encoded);
    if (partitions.length === 0) {
      throw new TopicNotFoundError(topic);
    }
    if (this.permissions().computeReadableChannels(topic, channel, partitions).length === 0) {
      throw new NoPermissionError(topic, "read", channel);
    }

    const range = await this.rangeOf(connection, encoded, channel, query);
    if (range.from >= range.to) {
      return [];
    }
    const records = await connection.read(encoded, channel, range.from.toString(), range.to.toString());
    // broker timestamps are not guaranteed to grow with the offset
    const inWindow =
      query.kind === "window"
        ? records.filter((record) => record.timestamp >= query.start && record.timestamp < query.end)
        : records;

    const messages: MessageEvent[] = [];
    for (const record of inWindow) {
      const message = this.decode(topic, record);
      if (message) {
        messages.push(message);
      }
    }
    this.logger.debug(
      {
        event: "history.read",
        endpoint: connection.endpoint,
        topic,
        channel,
        kind: query.kind,
        count: messages.length,
      },
      "History read"
    );
    return messages;
  }

  private async rangeOf(
    connection: HistoryConnection,
    encoded: string,
    channel: number,
    query: HistoryQuery
  ): Promise<OffsetRange> {
    const bounds = await connection.offsetBounds(encoded, channel);
    const low = BigInt(bounds.low);
    const high = BigInt(bounds.high);
    switch (query.kind) {
      case "latest":
        return { from: maxOf(low, high - BigInt(query.count)), to: high };
      case "since": {
        const from = maxOf(low, BigInt(await connection.offsetForTimestamp(encoded, channel, query.start)));
        return { from, to: minOf(high, from + BigInt(query.count)) };
      }
      case "window": {
        const [start, end] = await Promise.all([
          connection.offsetForTimestamp(encoded, channel, query.start),
          connection.offsetForTimestamp(encoded, channel, query.end),
        ]);
        return { from: maxOf(low, BigInt(start)), to: minOf(high, BigInt(end)) };
      }
    }
  }

  private decode(topic: string, record: BrokerRecord): MessageEvent | null {
    let body = record.value ?? Buffer.alloc(0);
    if (this.cipher) {
      try {
        body = this.cipher.decrypt(body).body;
      } catch (error) {
        const failure =
          error instanceof MalformedPayloadError
            ? error
            : new MalformedPayloadError("Failed to decrypt payload", { cause: error });
        this.logger.warn(
          {
            err: normalizeError(failure),
            event: "history.record.malformed",
            topic,
            partition: record.partition,
            offset: record.offset,
          },
          "Skipping malformed history record"
        );
        return null;
      }
    }
    return { topic, channel: record.partition, body, offset: record.offset, timestamp: record.timestamp };
  }
}
