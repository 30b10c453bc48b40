export type StreamClientErrorCode =
  | "TOPIC_NOT_FOUND"
  | "NO_PERMISSION"
  | "LEARNED_DENIAL"
  | "LATE_DENIAL"
  | "MALFORMED_PAYLOAD"
  | "TRANSPORT_FAILURE"
  | "INVALID_CONFIGURATION"
  | "INVALID_ARGUMENT"
  | "CREDENTIAL_SERVICE"
  | "INVALID_STATE";

export class StreamClientError extends Error {
  readonly code: StreamClientErrorCode;

  constructor(message: string, code: StreamClientErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StreamClientError";
    this.code = code;
  }
}

export class TopicNotFoundError extends StreamClientError {
  readonly topic: string;

  constructor(topic: string) {
    super(`Topic [${topic}] does not exist`, "TOPIC_NOT_FOUND");
    this.name = "TopicNotFoundError";
    this.topic = topic;
  }
}

export class NoPermissionError extends StreamClientError {
  readonly topic: string;
  readonly channel?: number;
  readonly access: "read" | "write";

  constructor(topic: string, access: "read" | "write", channel?: number) {
    const target = channel === undefined || channel < 0 ? `topic [${topic}]` : `topic [${topic}] channel ${channel}`;
    super(`No ${access} permission granted for ${target}`, "NO_PERMISSION");
    this.name = "NoPermissionError";
    this.topic = topic;
    this.channel = channel;
    this.access = access;
  }
}

/**
 * Why the policy service rejected a publish. `code` is the numeric code
 * reported on the notification feed.
 */
export type DenialReason = {
  code: number;
  reason: string;
};

export type DenialTarget = {
  topic: string;
  channel: number;
  offset?: string;
};

abstract class DenialError extends StreamClientError {
  readonly topic: string;
  readonly channel: number;
  readonly offset?: string;
  readonly denialCode: number;
  readonly reason: string;

  protected constructor(code: "LEARNED_DENIAL" | "LATE_DENIAL", target: DenialTarget, denial: DenialReason) {
    super(`${denial.reason} [${target.topic}:${target.channel}]`, code);
    this.topic = target.topic;
    this.channel = target.channel;
    this.offset = target.offset;
    this.denialCode = denial.code;
    this.reason = denial.reason;
  }
}

/** Raised locally, without a broker round trip, while a recent denial is remembered. */
export class LearnedDenialError extends DenialError {
  constructor(target: DenialTarget, denial: DenialReason) {
    super("LEARNED_DENIAL", target, denial);
    this.name = "LearnedDenialError";
  }
}

/** A publish the broker acknowledged was rejected afterwards by the policy service. */
export class LateDenialError extends DenialError {
  constructor(target: DenialTarget, denial: DenialReason) {
    super("LATE_DENIAL", target, denial);
    this.name = "LateDenialError";
  }
}

export class MalformedPayloadError extends StreamClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "MALFORMED_PAYLOAD", options);
    this.name = "MalformedPayloadError";
  }
}

export class TransportFailureError extends StreamClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "TRANSPORT_FAILURE", options);
    this.name = "TransportFailureError";
  }
}

export class InvalidConfigurationError extends StreamClientError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, "INVALID_CONFIGURATION");
    this.name = "InvalidConfigurationError";
    this.issues = issues;
  }
}

/** A request the client refuses before contacting any broker. */
export class InvalidArgumentError extends StreamClientError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}

export class CredentialServiceError extends StreamClientError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, "CREDENTIAL_SERVICE", options);
    this.name = "CredentialServiceError";
    this.status = status;
  }
}

export class ClientStateError extends StreamClientError {
  constructor(message: string) {
    super(message, "INVALID_STATE");
    this.name = "ClientStateError";
  }
}
