import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  ClientStateError,
  InvalidArgumentError,
  InvalidConfigurationError,
  LateDenialError,
  NoPermissionError,
  TransportFailureError,
} from "../errors.js";
import type { MqttNotificationFeedOptions } from "../notifications/MqttNotificationFeed.js";
import {
  brokerSettings,
  FakeConsumerConnection,
  FakeCredentialService,
  FakeHistoryConnection,
  FakeProducerConnection,
  record,
  silentLogger,
} from "../test/fakes.js";
import { StreamClient, type NotificationFeed, type StreamClientDependencies } from "./StreamClient.js";

const PUBLISH_KEY = "pub-123e4567-e89b-12d3-a456-426614174000";
const SUBSCRIBE_KEY = "sub-123e4567-e89b-12d3-a456-426614174001";
const SECRET_KEY = "s-123e4567-e89b-12d3-a456-426614174002";

const OPTIONS = {
  host: "app.local",
  publishKey: PUBLISH_KEY,
  subscribeKey: SUBSCRIBE_KEY,
  secretKey: SECRET_KEY,
};

class FakeFeed implements NotificationFeed {
  started = false;
  closeCalls = 0;
  startError: Error | null = null;

  constructor(readonly options: MqttNotificationFeedOptions) {}

  async start(): Promise<void> {
    if (this.startError) {
      throw this.startError;
    }
    this.started = true;
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}

describe("StreamClient", () => {
  let credentials: FakeCredentialService;
  let producers: FakeProducerConnection[];
  let consumers: FakeConsumerConnection[];
  let consumerGroups: string[];
  let histories: FakeHistoryConnection[];
  let feeds: FakeFeed[];
  let feedStartError: Error | null;
  let consumerConnectError: Error | null;
  let client: StreamClient | null;

  function deps(): StreamClientDependencies {
    return {
      credentials,
      createProducer: (settings, token) => {
        const producer = new FakeProducerConnection(settings.endpoint, token, { [`${PUBLISH_KEY}.orders`]: [0, 1] });
        producers.push(producer);
        return producer;
      },
      createConsumer: (settings, group) => {
        const consumer = new FakeConsumerConnection(settings.endpoint, { [`${SUBSCRIBE_KEY}.orders`]: [0, 1] });
        consumer.connectError = consumerConnectError;
        consumerConnectError = null;
        consumers.push(consumer);
        consumerGroups.push(group);
        return consumer;
      },
      createHistory: (settings) => {
        const stored =
          settings.endpoint === "sub-1:9092"
            ? [record(`${SUBSCRIBE_KEY}.orders`, 0, "0", "a1"), record(`${SUBSCRIBE_KEY}.orders`, 0, "1", "b1")]
            : [record(`${SUBSCRIBE_KEY}.orders`, 0, "0", "a2")];
        const history = new FakeHistoryConnection(settings.endpoint, {
          [`${SUBSCRIBE_KEY}.orders`]: { 0: stored, 1: [] },
        });
        histories.push(history);
        return history;
      },
      createFeed: (options) => {
        const feed = new FakeFeed(options);
        feed.startError = feedStartError;
        feeds.push(feed);
        return feed;
      },
      random: () => 0,
      logger: silentLogger,
    };
  }

  async function connect(): Promise<StreamClient> {
    client = await StreamClient.connect(OPTIONS, deps());
    return client;
  }

  function feedQueue() {
    const feed = feeds[0];
    if (!feed) {
      throw new Error("no feed was created");
    }
    return feed.options.queue;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    credentials = new FakeCredentialService(
      {
        token: "tok-1",
        publish: [brokerSettings("pub-1:9092"), brokerSettings("pub-2:9092")],
        subscribe: [brokerSettings("sub-1:9092"), brokerSettings("sub-2:9092")],
      },
      [
        {
          topic: "orders",
          channels: [
            { channel: 0, read: true, write: true },
            { channel: 1, write: true },
          ],
        },
      ]
    );
    producers = [];
    consumers = [];
    consumerGroups = [];
    histories = [];
    feeds = [];
    feedStartError = null;
    consumerConnectError = null;
    client = null;
  });

  afterEach(async () => {
    await client?.close();
    vi.useRealTimers();
  });

  it("validates configuration before contacting the credential service", async () => {
    await expect(StreamClient.connect({ ...OPTIONS, secretKey: "nope" }, deps())).rejects.toBeInstanceOf(
      InvalidConfigurationError
    );
    await expect(StreamClient.connect({ ...OPTIONS, cipherKey: "too-short" }, deps())).rejects.toMatchObject({
      code: "INVALID_CONFIGURATION",
      issues: ["cipherKey: cipherKey must be at least 16 characters"],
    });

    expect(credentials.settingsCalls).toBe(0);
  });

  it("opens a producer per publish endpoint and one notification feed", async () => {
    const connected = await connect();

    expect(connected.token).toBe("tok-1");
    expect(producers.map((producer) => [producer.endpoint, producer.token, producer.connectCalls])).toEqual([
      ["pub-1:9092", "tok-1", 1],
      ["pub-2:9092", "tok-1", 1],
    ]);
    expect(feeds).toHaveLength(1);
    expect(feeds[0]?.started).toBe(true);
    expect(feeds[0]?.options).toMatchObject({
      host: "app.local",
      port: 8883,
      protocol: "mqtts",
      keepaliveSeconds: 30,
      exceptionsTopic: "exceptions",
      token: "tok-1",
      publishKey: PUBLISH_KEY,
      secretKey: SECRET_KEY,
    });
    expect(credentials.permissionQueries).toEqual([undefined]);
  });

  it("resolves quiet publishes and fails those denied on the feed", async () => {
    const connected = await connect();

    const accepted = connected.publish({ topic: "orders", channel: 0, body: "a" });
    const denied = connected.publish({ topic: "orders", channel: 1, body: "b" }).catch((error: unknown) => error);
    await vi.advanceTimersByTimeAsync(0);
    expect(producers[0]?.sent.map((sent) => [sent.topic, sent.partition])).toEqual([
      [`${PUBLISH_KEY}.orders`, 0],
      [`${PUBLISH_KEY}.orders`, 1],
    ]);

    feedQueue().push({ topic: "orders", channel: 1, offset: "1", code: 403 });
    await vi.advanceTimersByTimeAsync(0);
    expect(await denied).toBeInstanceOf(LateDenialError);

    await vi.advanceTimersByTimeAsync(5_000);
    await expect(accepted).resolves.toEqual([{ topic: "orders", channel: 0, offset: "0" }]);
  });

  it("subscribes through one consumer per subscribe endpoint", async () => {
    const connected = await connect();
    const listener = { onMessage: vi.fn(), onError: vi.fn(), onConnected: vi.fn() };
    const callback = { success: vi.fn() };

    const meta = await connected.subscribe({ topic: "orders", listener, callback });

    expect(meta).toEqual({ group: "default", topic: "orders", channel: -1, endpoints: ["sub-1:9092", "sub-2:9092"] });
    expect(consumerGroups).toEqual(["default", "default"]);
    expect(consumers.map((consumer) => consumer.lastAssignment)).toEqual([
      [{ topic: `${SUBSCRIBE_KEY}.orders`, partitions: [0] }],
      [{ topic: `${SUBSCRIBE_KEY}.orders`, partitions: [0] }],
    ]);
    expect(listener.onConnected).toHaveBeenCalledWith("orders");
    expect(callback.success).toHaveBeenCalledWith(meta);

    consumers[1]?.deliver([record(`${SUBSCRIBE_KEY}.orders`, 0, "5", "hello")]);
    await vi.advanceTimersByTimeAsync(0);
    expect(listener.onMessage).toHaveBeenCalledWith({
      topic: "orders",
      channel: 0,
      body: Buffer.from("hello"),
      offset: "5",
      timestamp: 1_700_000_000_000,
    });

    await connected.subscribe({ topic: "orders", channel: 0, listener: { onMessage: vi.fn() } });
    expect(consumers).toHaveLength(2);
  });

  it("shares one consumer per endpoint between concurrent subscribes", async () => {
    const connected = await connect();

    await Promise.all([
      connected.subscribe({ topic: "orders", listener: { onMessage: vi.fn() } }),
      connected.subscribe({ topic: "orders", channel: 0, listener: { onMessage: vi.fn() } }),
    ]);

    expect(consumers.map((consumer) => [consumer.endpoint, consumer.connectCalls, consumer.closeCalls])).toEqual([
      ["sub-1:9092", 1, 0],
      ["sub-2:9092", 1, 0],
    ]);
  });

  it("closes a consumer whose connection fails and retries on the next subscribe", async () => {
    const connected = await connect();
    consumerConnectError = new Error("broker unreachable");
    const listener = { onMessage: vi.fn(), onError: vi.fn() };

    await expect(connected.subscribe({ topic: "orders", listener })).rejects.toBeInstanceOf(TransportFailureError);
    expect(listener.onError).toHaveBeenCalledWith(expect.any(TransportFailureError));
    expect(consumers.map((consumer) => consumer.closeCalls)).toEqual([1, 0]);

    await connected.subscribe({ topic: "orders", listener });
    expect(consumers.map((consumer) => [consumer.endpoint, consumer.connectCalls])).toEqual([
      ["sub-1:9092", 1],
      ["sub-2:9092", 1],
      ["sub-1:9092", 1],
    ]);
  });

  it("keeps groups on separate consumers", async () => {
    const connected = await connect();

    await connected.subscribe({ topic: "orders", group: "audit", listener: { onMessage: vi.fn() } });
    await connected.subscribe({ topic: "orders", listener: { onMessage: vi.fn() } });

    expect(consumerGroups).toEqual(["audit", "audit", "default", "default"]);
  });

  it("reports refused subscriptions to the listener and the callback", async () => {
    const connected = await connect();
    const listener = { onMessage: vi.fn(), onError: vi.fn(), onConnected: vi.fn() };
    const callback = { success: vi.fn(), error: vi.fn() };

    await expect(connected.subscribe({ topic: "orders", channel: 1, listener, callback })).rejects.toBeInstanceOf(
      NoPermissionError
    );

    expect(listener.onError).toHaveBeenCalledWith(expect.any(NoPermissionError));
    expect(callback.error).toHaveBeenCalledWith(expect.any(NoPermissionError));
    expect(listener.onConnected).not.toHaveBeenCalled();
    expect(callback.success).not.toHaveBeenCalled();
  });

  it("reads history from every subscribe endpoint", async () => {
    const connected = await connect();
    const callback = { success: vi.fn(), error: vi.fn() };

    const history = await connected.history({ topic: "orders", channel: 0, count: 5, callback });

    expect(history.messages.map((message) => [message.offset, message.body.toString()])).toEqual([
      ["0", "a1"],
      ["1", "b1"],
      ["0", "a2"],
    ]);
    expect(history.messages[0]?.topic).toBe("orders");
    expect(callback.success).toHaveBeenCalledWith(history);
    expect(histories.map((reader) => [reader.endpoint, reader.connectCalls, reader.closeCalls])).toEqual([
      ["sub-1:9092", 1, 1],
      ["sub-2:9092", 1, 1],
    ]);
  });

  it("refuses a history window that ends before it starts", async () => {
    const connected = await connect();
    const callback = { success: vi.fn(), error: vi.fn() };

    const refused = connected.history({ topic: "orders", channel: 0, start: 5_000, end: 1_000, callback });

    await expect(refused).rejects.toBeInstanceOf(InvalidArgumentError);

    expect(callback.error).toHaveBeenCalledWith(expect.any(InvalidArgumentError));
    expect(histories).toEqual([]);
  });

  it("closes the history connection when the channel is not readable", async () => {
    const connected = await connect();

    await expect(connected.history({ topic: "orders", channel: 1, count: 1 })).rejects.toBeInstanceOf(
      NoPermissionError
    );
    expect(histories.map((reader) => reader.closeCalls)).toEqual([1]);
  });

  it("detaches listeners on unsubscribe", async () => {
    const connected = await connect();
    const listener = { onMessage: vi.fn(), onDisconnected: vi.fn() };
    await connected.subscribe({ topic: "orders", listener });

    await expect(connected.unsubscribe("orders")).resolves.toBe(true);
    expect(listener.onDisconnected).toHaveBeenCalledTimes(2);
    expect(consumers.map((consumer) => consumer.lastAssignment)).toEqual([[], []]);

    await expect(connected.unsubscribe("orders")).resolves.toBe(false);
  });

  it("derives topic metadata from permissions", async () => {
    const connected = await connect();
    credentials.permissionList.push({ topic: "billing", channels: [{ channel: 2, read: true }] });

    await expect(connected.topics()).resolves.toEqual([
      { topic: "orders", channels: [0, 1] },
      { topic: "billing", channels: [2] },
    ]);
    await expect(connected.topic("billing")).resolves.toEqual({ topic: "billing", channels: [2] });
    expect(credentials.permissionQueries).toEqual([undefined, undefined, "billing"]);
    expect(connected.permissionSnapshot.hasTopic("billing")).toBe(true);
  });

  it("passes grants and revocations to the credential service", async () => {
    const connected = await connect();

    await connected.grant({ user: "user-2", topic: "orders", read: true, write: false, ttl: 60 });
    await connected.revoke({ user: "user-2", topic: "orders", channel: 0 });

    expect(credentials.grants).toEqual([{ user: "user-2", topic: "orders", read: true, write: false, ttl: 60 }]);
    expect(credentials.revocations).toEqual([{ user: "user-2", topic: "orders", channel: 0 }]);
  });

  it("fails pending publishes and releases every connection on close", async () => {
    const connected = await connect();
    await connected.subscribe({ topic: "orders", listener: { onMessage: vi.fn() } });
    const pending = connected.publish({ topic: "orders", channel: 0, body: "x" }).catch((error: unknown) => error);
    await vi.advanceTimersByTimeAsync(0);

    await Promise.all([connected.close(), connected.close()]);

    expect(await pending).toBeInstanceOf(TransportFailureError);
    expect(producers.map((producer) => producer.closeCalls)).toEqual([1, 1]);
    expect(consumers.map((consumer) => consumer.closeCalls)).toEqual([1, 1]);
    expect(feeds[0]?.closeCalls).toBe(1);
    expect(connected.closed).toBe(true);
    await expect(connected.publish({ topic: "orders", channel: 0, body: "x" })).rejects.toBeInstanceOf(
      ClientStateError
    );
    await expect(connected.history({ topic: "orders", channel: 0, count: 1 })).rejects.toBeInstanceOf(
      ClientStateError
    );
  });

  it("fails a publish acknowledged after the client closed", async () => {
    const connected = await connect();
    const producer = producers[0];
    if (!producer) {
      throw new Error("no producer was created");
    }
    producer.holdAcks = true;
    const pending = connected.publish({ topic: "orders", channel: 0, body: "a" }).catch((error: unknown) => error);
    await vi.advanceTimersByTimeAsync(0);

    await connected.close();
    producer.releaseAcks();
    await vi.advanceTimersByTimeAsync(6_000);

    expect(await pending).toBeInstanceOf(TransportFailureError);
  });

  it("fails a publish acknowledged while the producers close", async () => {
    const connected = await connect();
    const producer = producers[0];
    if (!producer) {
      throw new Error("no producer was created");
    }
    producer.holdAcks = true;
    const pending = connected.publish({ topic: "orders", channel: 0, body: "a" }).catch((error: unknown) => error);
    await vi.advanceTimersByTimeAsync(0);
    const closeProducer = producer.close.bind(producer);
    producer.close = async () => {
      producer.releaseAcks();
      await closeProducer();
    };

    await connected.close();
    await vi.advanceTimersByTimeAsync(6_000);

    expect(await pending).toBeInstanceOf(TransportFailureError);
  });

  it("closes what it opened when the notification feed cannot start", async () => {
    feedStartError = new TransportFailureError("Failed to connect to mqtts://app.local:8883");

    await expect(StreamClient.connect(OPTIONS, deps())).rejects.toBe(feedStartError);

    expect(producers.map((producer) => producer.closeCalls)).toEqual([1, 1]);
    expect(feeds[0]?.closeCalls).toBe(1);
  });
});
