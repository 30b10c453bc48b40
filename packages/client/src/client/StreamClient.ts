import {
  KafkaConsumerConnection,
  KafkaHistoryConnection,
  KafkaProducerConnection,
} from "../broker/KafkaConnections.js";
import type { ConsumerConnection, HistoryConnection, ProducerConnection } from "../broker/types.js";
import {
  describeIssues,
  StreamClientConfigSchema,
  type StreamClientConfig,
  type StreamClientConfigInput,
} from "../config/schema.js";
import {
  HttpCredentialService,
  type BrokerSettings,
  type CredentialService,
  type GrantRequest,
  type RevokeRequest,
} from "../credentials/CredentialService.js";
import { PayloadCipher } from "../crypto/PayloadCipher.js";
import {
  ClientStateError,
  InvalidConfigurationError,
  StreamClientError,
  TransportFailureError,
} from "../errors.js";
import { HistoryReader, toHistoryQuery } from "../history/HistoryReader.js";
import { MqttNotificationFeed, type MqttNotificationFeedOptions } from "../notifications/MqttNotificationFeed.js";
import { createLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import { PermissionSet } from "../permissions/PermissionSet.js";
import { NotificationQueue } from "../reconcile/NotificationQueue.js";
import { ReconciliationEngine } from "../reconcile/ReconciliationEngine.js";
import { GroupConsumer } from "../subscribe/GroupConsumer.js";
import type {
  DenialNotification,
  History,
  HistoryRequest,
  MessageEvent,
  PublishMeta,
  PublishRequest,
  SubscribeMeta,
  SubscribeRequest,
  TopicMeta,
} from "../types/index.js";
import { Publisher } from "./Publisher.js";

export interface NotificationFeed {
  start(): Promise<void>;
  close(): Promise<void>;
}

export type ProducerFactory = (settings: BrokerSettings, token: string) => ProducerConnection;
export type ConsumerFactory = (settings: BrokerSettings, group: string) => ConsumerConnection;
export type HistoryFactory = (settings: BrokerSettings) => HistoryConnection;
export type FeedFactory = (options: MqttNotificationFeedOptions) => NotificationFeed;

/** Collaborators `connect` builds by default; tests swap in fakes. */
export type StreamClientDependencies = {
  credentials?: CredentialService;
  createProducer?: ProducerFactory;
  createConsumer?: ConsumerFactory;
  createHistory?: HistoryFactory;
  createFeed?: FeedFactory;
  random?: () => number;
  logger?: AppLogger;
};

type ConsumerSlot = {
  consumer: GroupConsumer;
  /** Settles once the connection is up; shared by concurrent subscribes. */
  ready: Promise<void>;
};

type ClientParts = {
  config: StreamClientConfig;
  token: string;
  subscribeEndpoints: BrokerSettings[];
  credentials: CredentialService;
  createConsumer: ConsumerFactory;
  createHistory: HistoryFactory;
  producers: ProducerConnection[];
  feed: NotificationFeed;
  queue: NotificationQueue<DenialNotification>;
  engine: ReconciliationEngine;
  permissions: PermissionSet;
  cipher?: PayloadCipher;
  random?: () => number;
  logger: AppLogger;
};

function validate(options: StreamClientConfigInput): { config: StreamClientConfig; cipher?: PayloadCipher } {
  const parsed = StreamClientConfigSchema.safeParse(options);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new InvalidConfigurationError(`Invalid client configuration: ${issues.join("; ")}`, issues);
  }
  const config = parsed.data;
  return config.cipherKey === undefined ? { config } : { config, cipher: PayloadCipher.fromKey(config.cipherKey) };
}

function toSslOption(settings: BrokerSettings): true | undefined {
  return settings.ssl ? true : undefined;
}

/**
 * A connected session: publishes with asynchronous denial reconciliation and
 * subscribes through permission-filtered group consumers.
 */
export class StreamClient {
  readonly token: string;
  private readonly config: StreamClientConfig;
  private readonly subscribeEndpoints: BrokerSettings[];
  private readonly credentials: CredentialService;
  private readonly createConsumer: ConsumerFactory;
  private readonly createHistory: HistoryFactory;
  private readonly producers: ProducerConnection[];
  private readonly feed: NotificationFeed;
  private readonly queue: NotificationQueue<DenialNotification>;
  private readonly engine: ReconciliationEngine;
  private readonly publisher: Publisher;
  private readonly historyReader: HistoryReader;
  private readonly cipher?: PayloadCipher;
  private readonly logger: AppLogger;
  private readonly consumers = new Map<string, Map<string, ConsumerSlot>>();
  private readonly draining: Promise<void>;
  private snapshot: PermissionSet;
  private closing: Promise<void> | null = null;

  private constructor(parts: ClientParts) {
    this.config = parts.config;
    this.token = parts.token;
    this.subscribeEndpoints = parts.subscribeEndpoints;
    this.credentials = parts.credentials;
    this.createConsumer = parts.createConsumer;
    this.createHistory = parts.createHistory;
    this.producers = parts.producers;
    this.feed = parts.feed;
    this.queue = parts.queue;
    this.engine = parts.engine;
    this.snapshot = parts.permissions;
    this.cipher = parts.cipher;
    this.logger = parts.logger;
    this.publisher = new Publisher({
      publishKey: parts.config.publishKey,
      secretKey: parts.config.secretKey,
      producers: () => this.producers,
      engine: parts.engine,
      permissions: () => this.snapshot,
      cipher: parts.cipher,
      random: parts.random,
      logger: parts.logger.child({ subsystem: "publisher" }),
    });
    this.historyReader = new HistoryReader({
      subscribeKey: parts.config.subscribeKey,
      permissions: () => this.snapshot,
      cipher: parts.cipher,
      logger: parts.logger.child({ subsystem: "history" }),
    });
    this.draining = parts.engine.consume(parts.queue).catch((error: unknown) => {
      this.logger.error({ err: normalizeError(error), event: "notifications.drain_failed" }, "Denial drain stopped");
    });
  }

  /**
   * Validates `options`, then opens the session: connection settings, one
   * producer per publish endpoint, the notification feed and the permission
   * snapshot. Anything opened before a failure is closed again.
   */
  static async connect(options: StreamClientConfigInput, deps: StreamClientDependencies = {}): Promise<StreamClient> {
    const { config, cipher } = validate(options);
    const logger = deps.logger ?? createLogger({ level: config.logLevel, bindings: { subsystem: "streamgate" } });
    const credentials =
      deps.credentials ??
      new HttpCredentialService({
        host: config.host,
        port: config.port,
        publishKey: config.publishKey,
        subscribeKey: config.subscribeKey,
        secretKey: config.secretKey,
        logger: logger.child({ subsystem: "credentials" }),
      });
    const createProducer: ProducerFactory =
      deps.createProducer ??
      ((settings, token) =>
        new KafkaProducerConnection({
          endpoint: settings.endpoint,
          brokers: settings.bootstrapServers,
          ssl: toSslOption(settings),
          token,
          logger: logger.child({ subsystem: "kafka-producer", endpoint: settings.endpoint }),
        }));
    const createConsumer: ConsumerFactory =
      deps.createConsumer ??
      ((settings, group) =>
        new KafkaConsumerConnection({
          endpoint: settings.endpoint,
          brokers: settings.bootstrapServers,
          ssl: toSslOption(settings),
          groupId: group,
          sessionTimeoutMs: config.consumer.sessionTimeoutMs,
          logger: logger.child({ subsystem: "kafka-consumer", endpoint: settings.endpoint, group }),
        }));
    const createHistory: HistoryFactory =
      deps.createHistory ??
      ((settings) =>
        new KafkaHistoryConnection({
          endpoint: settings.endpoint,
          brokers: settings.bootstrapServers,
          ssl: toSslOption(settings),
          logger: logger.child({ subsystem: "kafka-history", endpoint: settings.endpoint }),
        }));
    const createFeed: FeedFactory = deps.createFeed ?? ((feedOptions) => new MqttNotificationFeed(feedOptions));

    const settings = await credentials.connectionSettings();
    const queue = new NotificationQueue<DenialNotification>();
    const producers: ProducerConnection[] = [];
    let feed: NotificationFeed | null = null;
    try {
      for (const endpoint of settings.publish) {
        const producer = createProducer(endpoint, settings.token);
        producers.push(producer);
        await producer.connect();
        logger.info({ event: "publisher.connected", endpoint: endpoint.endpoint }, "Publisher connected");
      }
      feed = createFeed({
        host: config.host,
        port: config.notifications.port,
        protocol: config.notifications.protocol,
        keepaliveSeconds: config.notifications.keepaliveSeconds,
        exceptionsTopic: config.notifications.exceptionsTopic,
        token: settings.token,
        publishKey: config.publishKey,
        secretKey: config.secretKey,
        queue,
        logger: logger.child({ subsystem: "notifications" }),
      });
      await feed.start();
      const permissions = await credentials.permissions();

      return new StreamClient({
        config,
        token: settings.token,
        subscribeEndpoints: settings.subscribe,
        credentials,
        createConsumer,
        createHistory,
        producers,
        feed,
        queue,
        engine: new ReconciliationEngine({
          publishWindowMs: config.reconciliation.publishWindowMs,
          learnedErrorTtlMs: config.reconciliation.learnedErrorTtlMs,
          logger: logger.child({ subsystem: "reconciliation" }),
        }),
        permissions,
        cipher,
        random: deps.random,
        logger,
      });
    } catch (error) {
      logger.error({ err: normalizeError(error), event: "client.connect_failed" }, "Client connection failed");
      queue.close();
      await Promise.allSettled([...producers.map((producer) => producer.close()), feed?.close()]);
      throw error;
    }
  }

  get closed(): boolean {
    return this.closing !== null;
  }

  get permissionSnapshot(): PermissionSet {
    return this.snapshot;
  }

  async publish(request: PublishRequest): Promise<PublishMeta[]> {
    this.assertOpen();
    return this.publisher.publish(request);
  }

  /**
   * Attaches `listener` on every subscribe endpoint through the group's
   * consumers, creating them on first use.
   */
  async subscribe(request: SubscribeRequest): Promise<SubscribeMeta> {
    const { topic, listener, callback } = request;
    const group = request.group && request.group.length > 0 ? request.group : this.config.consumer.defaultGroup;
    const channel = request.channel ?? -1;

    let consumers: GroupConsumer[];
    try {
      this.assertOpen();
      consumers = await this.consumersFor(group);
    } catch (error) {
      const failure =
        error instanceof StreamClientError
          ? error
          : new TransportFailureError(`Failed to subscribe to [${topic}]`, { cause: error });
      this.notify(() => listener.onError?.(failure));
      this.notify(() => callback?.error?.(failure));
      throw failure;
    }

    try {
      for (const consumer of consumers) {
        await consumer.subscribe(topic, channel, listener);
        this.startLoop(consumer);
      }
    } catch (error) {
      const failure =
        error instanceof StreamClientError
          ? error
          : new TransportFailureError(`Failed to subscribe to [${topic}]`, { cause: error });
      this.notify(() => callback?.error?.(failure));
      throw failure;
    }

    const meta: SubscribeMeta = {
      group,
      topic,
      channel,
      endpoints: consumers.map((consumer) => consumer.endpoint),
    };
    this.logger.debug({ event: "client.subscribed", ...meta }, "Subscribed");
    this.notify(() => listener.onConnected?.(topic));
    this.notify(() => callback?.success?.(meta));
    return meta;
  }

  /** Detaches `topic` (or one channel) in every group; true when anything was attached. */
  async unsubscribe(topic: string, channel?: number): Promise<boolean> {
    this.assertOpen();
    const results = await Promise.all(this.allConsumers().map((consumer) => consumer.unsubscribe(topic, channel)));
    return results.some(Boolean);
  }

  /**
   * Reads stored messages of one channel from every subscribe endpoint: the
   * latest `count`, `count` from `start`, or those stamped in [start, end).
   * Windows longer than a day end a day after `start`.
   */
  async history(request: HistoryRequest): Promise<History> {
    const { topic, channel, callback } = request;
    try {
      this.assertOpen();
      const query = toHistoryQuery(request);
      if (this.subscribeEndpoints.length === 0) {
        throw new TransportFailureError("No subscribe endpoints are configured for this session");
      }
      const messages: MessageEvent[] = [];
      for (const settings of this.subscribeEndpoints) {
        const connection = this.createHistory(settings);
        try {
          await connection.connect();
          messages.push(...(await this.historyReader.read(connection, topic, channel, query)));
        } finally {
          await connection.close();
        }
      }
      const history: History = { messages };
      this.notify(() => callback?.success?.(history));
      return history;
    } catch (error) {
      const failure =
        error instanceof StreamClientError
          ? error
          : new TransportFailureError(`Failed to read history of [${topic}:${channel}]`, { cause: error });
      this.notify(() => callback?.error?.(failure));
      throw failure;
    }
  }

  /**
   * Fetches a fresh permission snapshot. A full fetch replaces the one used
   * for publish checks and new subscriptions.
   */
  async permissions(topic?: string): Promise<PermissionSet> {
    this.assertOpen();
    const permissions = await this.credentials.permissions(topic);
    if (topic === undefined) {
      this.replacePermissions(permissions);
    }
    return permissions;
  }

  async topics(): Promise<TopicMeta[]> {
    const permissions = await this.permissions();
    return permissions.topics().map((topic) => ({ topic, channels: permissions.channelsOf(topic) }));
  }

  async topic(name: string): Promise<TopicMeta> {
    const permissions = await this.permissions(name);
    return { topic: name, channels: permissions.channelsOf(name) };
  }

  async grant(request: GrantRequest): Promise<PermissionSet> {
    this.assertOpen();
    return this.credentials.grant(request);
  }

  async revoke(request: RevokeRequest): Promise<PermissionSet> {
    this.assertOpen();
    return this.credentials.revoke(request);
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    const consumers = this.allConsumers();
    this.consumers.clear();
    await Promise.all(consumers.map((consumer) => consumer.shutdown()));

    this.failPending();
    const results = await Promise.allSettled([
      ...this.producers.map((producer) => producer.close()),
      this.feed.close(),
    ]);
    for (const result of results) {
      if (result.status === "rejected") {
        this.logger.warn({ err: normalizeError(result.reason), event: "client.close_failed" }, "Close step failed");
      }
    }

    this.queue.close();
    await this.draining;
    // acknowledgments that landed while the producers were closing; later ones
    // find the engine closed
    this.failPending();
    this.engine.close();
    this.logger.info({ event: "client.closed" }, "Client closed");
  }

  private failPending(): void {
    const failed = this.engine.failAllPending(new TransportFailureError("Client closed before the publish settled"));
    if (failed > 0) {
      this.logger.warn({ event: "client.pending_failed", count: failed }, "Failed pending publishes on close");
    }
  }

  private async consumersFor(group: string): Promise<GroupConsumer[]> {
    if (this.subscribeEndpoints.length === 0) {
      throw new TransportFailureError("No subscribe endpoints are configured for this session");
    }
    const byEndpoint = this.consumers.get(group) ?? new Map<string, ConsumerSlot>();
    this.consumers.set(group, byEndpoint);

    const slots: ConsumerSlot[] = [];
    for (const settings of this.subscribeEndpoints) {
      let slot = byEndpoint.get(settings.endpoint);
      if (!slot || slot.consumer.state === "stopping" || slot.consumer.state === "closed") {
        slot = this.openConsumer(settings, group, byEndpoint);
        byEndpoint.set(settings.endpoint, slot);
      }
      slots.push(slot);
    }
    await Promise.all(slots.map((slot) => slot.ready));
    return slots.map((slot) => slot.consumer);
  }

  private openConsumer(settings: BrokerSettings, group: string, byEndpoint: Map<string, ConsumerSlot>): ConsumerSlot {
    const connection = this.createConsumer(settings, group);
    const consumer = new GroupConsumer({
      group,
      subscribeKey: this.config.subscribeKey,
      connection,
      permissions: this.snapshot,
      cipher: this.cipher,
      pollTimeoutMs: this.config.consumer.pollTimeoutMs,
      logger: this.logger.child({ subsystem: "group-consumer", group, endpoint: settings.endpoint }),
    });
    const ready = connection.connect().catch(async (error: unknown) => {
      if (byEndpoint.get(settings.endpoint)?.consumer === consumer) {
        byEndpoint.delete(settings.endpoint);
      }
      await consumer.shutdown();
      throw error;
    });
    return { consumer, ready };
  }

  private allConsumers(): GroupConsumer[] {
    return Array.from(this.consumers.values()).flatMap((byEndpoint) =>
      Array.from(byEndpoint.values(), (slot) => slot.consumer)
    );
  }

  private startLoop(consumer: GroupConsumer): void {
    if (consumer.state === "running") {
      return;
    }
    void consumer.run().catch((error: unknown) => {
      this.logger.error(
        { err: normalizeError(error), event: "consumer.loop_failed", group: consumer.group },
        "Consumer loop failed"
      );
    });
  }

  private replacePermissions(permissions: PermissionSet): void {
    this.snapshot = permissions;
    for (const consumer of this.allConsumers()) {
      consumer.updatePermissions(permissions);
    }
  }

  private notify(call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.error({ err: normalizeError(error), event: "client.callback_failed" }, "Subscriber callback threw");
    }
  }

  private assertOpen(): void {
    if (this.closing) {
      throw new ClientStateError("Client is closed");
    }
  }
}
