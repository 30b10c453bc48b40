import mqtt, { type IClientOptions } from "mqtt";
import { z } from "zod";

import { TransportFailureError } from "../errors.js";
import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import type { NotificationQueue } from "../reconcile/NotificationQueue.js";
import type { DenialNotification } from "../types/index.js";

type QoS = 0 | 1 | 2;

/** The part of an MQTT client the feed drives. */
export interface FeedClient {
  on(event: "connect", listener: () => void): unknown;
  on(event: "message", listener: (topic: string, payload: Buffer) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  subscribeAsync(topic: string, options: { qos: QoS }): Promise<unknown>;
  publishAsync(topic: string, message: Buffer, options: { qos: QoS; retain: boolean }): Promise<unknown>;
  endAsync(force?: boolean): Promise<void>;
}

export type FeedConnect = (url: string, options: IClientOptions) => FeedClient;

export type NotificationProtocol = "mqtts" | "mqtt" | "wss" | "ws";

export type MqttNotificationFeedOptions = {
  host: string;
  port?: number;
  protocol?: NotificationProtocol;
  keepaliveSeconds?: number;
  exceptionsTopic?: string;
  token: string;
  publishKey: string;
  secretKey: string;
  queue: NotificationQueue<DenialNotification>;
  connect?: FeedConnect;
  logger?: AppLogger;
};

const ONLINE = Buffer.from([1]);
const OFFLINE = Buffer.from([0]);

const offsetSchema = z.union([
  z.number().int().nonnegative().transform((value) => String(value)),
  z.string().regex(/^\d+$/),
]);

export const DenialNotificationSchema = z.object({
  topic: z.string().min(1),
  channel: z.number().int().nonnegative(),
  offset: offsetSchema,
  code: z.number().int(),
});

/**
 * Listens for policy denials on the notification broker and forwards them to
 * the reconciliation queue. While connected the session's presence topic
 * holds a retained `1`; the last will and `close()` set it back to `0`.
 */
export class MqttNotificationFeed {
  private readonly options: MqttNotificationFeedOptions;
  private readonly connectFn: FeedConnect;
  private readonly logger: AppLogger;
  private readonly presenceTopic: string;
  private readonly exceptionsTopic: string;
  private client: FeedClient | null = null;
  private closing: Promise<void> | null = null;

  constructor(options: MqttNotificationFeedOptions) {
    this.options = options;
    this.connectFn = options.connect ?? ((url, clientOptions) => mqtt.connect(url, clientOptions));
    this.presenceTopic = `presence/${options.publishKey}/${options.token}`;
    this.exceptionsTopic = options.exceptionsTopic ?? "exceptions";
    this.logger = options.logger ?? appLogger.child({ subsystem: "notifications", host: options.host });
  }

  get url(): string {
    return `${this.options.protocol ?? "mqtts"}://${this.options.host}:${this.options.port ?? 8883}`;
  }

  /** Resolves on the first successful connection. */
  async start(): Promise<void> {
    if (this.client) {
      return;
    }
    const client = this.connectFn(this.url, {
      clientId: this.options.token,
      username: this.options.publishKey,
      password: this.options.secretKey,
      keepalive: this.options.keepaliveSeconds ?? 30,
      clean: true,
      will: { topic: this.presenceTopic, payload: OFFLINE, qos: 2, retain: true },
    });
    this.client = client;

    client.on("message", (topic, payload) => this.onMessage(topic, payload));
    client.on("close", () => {
      this.logger.debug({ event: "notifications.disconnected" }, "Notification feed disconnected");
    });

    await new Promise<void>((resolve, reject) => {
      let connected = false;
      client.on("connect", () => {
        connected = true;
        this.logger.info({ event: "notifications.connected", url: this.url }, "Notification feed connected");
        void this.announce(client);
        resolve();
      });
      client.on("error", (error) => {
        this.logger.warn({ err: normalizeError(error), event: "notifications.error" }, "Notification feed error");
        if (!connected) {
          reject(new TransportFailureError(`Failed to connect to ${this.url}`, { cause: error }));
        }
      });
    }).catch(async (error: unknown) => {
      this.client = null;
      await client.endAsync(true);
      throw error;
    });
  }

  /** Publishes offline presence and disconnects. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) {
      return;
    }
    try {
      await client.publishAsync(this.presenceTopic, OFFLINE, { qos: 2, retain: true });
    } catch (error) {
      this.logger.warn(
        { err: normalizeError(error), event: "notifications.presence_failed" },
        "Presence update failed"
      );
    }
    await client.endAsync();
  }

  private async announce(client: FeedClient): Promise<void> {
    try {
      await client.subscribeAsync(this.exceptionsTopic, { qos: 1 });
      await client.publishAsync(this.presenceTopic, ONLINE, { qos: 1, retain: true });
    } catch (error) {
      this.logger.warn({ err: normalizeError(error), event: "notifications.announce_failed" }, "Announce failed");
    }
  }

  private onMessage(topic: string, payload: Buffer): void {
    if (topic !== this.exceptionsTopic) {
      return;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(payload.toString("utf8"));
    } catch (error) {
      this.logger.warn(
        { err: normalizeError(error), event: "notifications.malformed" },
        "Dropping unparsable notification"
      );
      return;
    }
    const parsed = DenialNotificationSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(
        { event: "notifications.malformed", issues: parsed.error.issues.map((issue) => issue.message) },
        "Dropping malformed notification"
      );
      return;
    }
    const prefix = `${this.options.publishKey}.`;
    const logicalTopic = parsed.data.topic.startsWith(prefix)
      ? parsed.data.topic.slice(prefix.length)
      : parsed.data.topic;
    this.options.queue.push({
      topic: logicalTopic,
      channel: parsed.data.channel,
      offset: parsed.data.offset,
      code: parsed.data.code,
    });
  }
}
