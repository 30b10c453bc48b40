import type { StreamClientError } from "../errors.js";

// ============================================================================
// Publishing
// ============================================================================

/** Where an acknowledged message landed. `offset` is a decimal string. */
export interface PublishMeta {
  topic: string;
  channel: number;
  offset: string;
}

export interface PublishCallback {
  success?(meta: PublishMeta): void;
  error?(error: StreamClientError): void;
}

export interface PublishRequest {
  topic: string;
  /** Omitted or negative: send to every channel of the topic. */
  channel?: number;
  body: Buffer | Uint8Array | string;
  callback?: PublishCallback;
}

// ============================================================================
// Subscribing
// ============================================================================

export interface MessageEvent {
  topic: string;
  channel: number;
  body: Buffer;
  offset: string;
  timestamp: number;
}

export interface NetworkListener {
  onMessage(event: MessageEvent): void;
  onError?(error: StreamClientError): void;
  onConnected?(topic: string): void;
  onDisconnected?(topic: string): void;
}

export interface SubscribeMeta {
  group: string;
  topic: string;
  channel: number;
  endpoints: string[];
}

export interface SubscribeCallback {
  success?(meta: SubscribeMeta): void;
  error?(error: StreamClientError): void;
}

export interface SubscribeRequest {
  topic: string;
  group?: string;
  /** Omitted or negative: every channel the permissions allow. */
  channel?: number;
  listener: NetworkListener;
  callback?: SubscribeCallback;
}

// ============================================================================
// History
// ============================================================================

export interface History {
  messages: MessageEvent[];
}

export interface HistoryCallback {
  success?(history: History): void;
  error?(error: StreamClientError): void;
}

interface HistoryRequestBase {
  topic: string;
  channel: number;
  callback?: HistoryCallback;
}

/** The last `count` messages of the channel. */
export interface LatestHistoryRequest extends HistoryRequestBase {
  count: number;
}

/** Up to `count` messages stamped at or after `start` (epoch ms). */
export interface HistorySinceRequest extends HistoryRequestBase {
  start: number;
  count: number;
}

/** Messages stamped in [`start`, `end`); windows longer than a day are cut to one day. */
export interface HistoryWindowRequest extends HistoryRequestBase {
  start: number;
  end: number;
}

export type HistoryRequest = LatestHistoryRequest | HistorySinceRequest | HistoryWindowRequest;

// ============================================================================
// Topics and notifications
// ============================================================================

export interface TopicMeta {
  topic: string;
  channels: number[];
}

/** A policy rejection reported on the notification feed. */
export interface DenialNotification {
  topic: string;
  channel: number;
  offset: string;
  code: number;
}
