export { StreamClient } from "./client/StreamClient.js";
export type {
  ConsumerFactory,
  FeedFactory,
  HistoryFactory,
  NotificationFeed,
  ProducerFactory,
  StreamClientDependencies,
} from "./client/StreamClient.js";
export { Publisher } from "./client/Publisher.js";
export type { PublisherOptions } from "./client/Publisher.js";

export { GroupConsumer, DEFAULT_POLL_TIMEOUT_MS } from "./subscribe/GroupConsumer.js";
export type { GroupConsumerOptions, GroupConsumerState, TopicSubscription } from "./subscribe/GroupConsumer.js";

export { HistoryReader, MAX_HISTORY_WINDOW_MS, toHistoryQuery } from "./history/HistoryReader.js";
export type { HistoryQuery, HistoryReaderOptions } from "./history/HistoryReader.js";

export {
  ReconciliationEngine,
  DEFAULT_LEARNED_ERROR_TTL_MS,
  DEFAULT_PUBLISH_WINDOW_MS,
  learnedKey,
  pendingKey,
} from "./reconcile/ReconciliationEngine.js";
export type { ReconciliationEngineOptions } from "./reconcile/ReconciliationEngine.js";
export { PublishFuture } from "./reconcile/PublishFuture.js";
export { NotificationQueue } from "./reconcile/NotificationQueue.js";
export { describeDenial } from "./reconcile/denialReasons.js";

export { PermissionSet, PermissionEntrySchema, PermissionListSchema } from "./permissions/PermissionSet.js";
export type { ChannelAccess, PermissionEntry, PermissionEntryWire } from "./permissions/PermissionSet.js";

export { PayloadCipher } from "./crypto/PayloadCipher.js";
export type { DecryptResult } from "./crypto/PayloadCipher.js";

export { TimedMap } from "./utils/TimedMap.js";

export { KafkaConsumerConnection, KafkaHistoryConnection, KafkaProducerConnection } from "./broker/KafkaConnections.js";
export type {
  KafkaConnectionOptions,
  KafkaConsumerOptions,
  KafkaFactory,
  KafkaHistoryOptions,
  KafkaProducerOptions,
} from "./broker/KafkaConnections.js";
export { WakeupError } from "./broker/types.js";
export type {
  BrokerRecord,
  ConsumerConnection,
  HistoryConnection,
  OffsetBounds,
  OutgoingRecord,
  ProducerConnection,
  RecordPosition,
  TopicPartitions,
} from "./broker/types.js";

export { MqttNotificationFeed, DenialNotificationSchema } from "./notifications/MqttNotificationFeed.js";
export type { FeedClient, FeedConnect, MqttNotificationFeedOptions } from "./notifications/MqttNotificationFeed.js";

export { HttpCredentialService } from "./credentials/CredentialService.js";
export type {
  BrokerSettings,
  ConnectionSettings,
  CredentialService,
  GrantRequest,
  HttpCredentialServiceOptions,
  RevokeRequest,
} from "./credentials/CredentialService.js";

export { loadConfig, ConfigLoadError } from "./config/loadConfig.js";
export type { ConfigOverrides } from "./config/loadConfig.js";
export { StreamClientConfigSchema } from "./config/schema.js";
export type { StreamClientConfig, StreamClientConfigInput } from "./config/schema.js";

export { appLogger, createLogger, normalizeError } from "./observability/logger.js";
export type { AppLogger, NormalizedError } from "./observability/logger.js";
export { resetMetrics } from "./observability/metrics.js";

export * from "./errors.js";
export type {
  DenialNotification,
  History,
  HistoryCallback,
  HistoryRequest,
  HistorySinceRequest,
  HistoryWindowRequest,
  LatestHistoryRequest,
  MessageEvent,
  NetworkListener,
  PublishCallback,
  PublishMeta,
  PublishRequest,
  SubscribeCallback,
  SubscribeMeta,
  SubscribeRequest,
  TopicMeta,
} from "./types/index.js";
