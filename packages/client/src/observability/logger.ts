import pino, { type DestinationStream, type LoggerOptions, stdTimeFunctions, type Logger as PinoLogger } from "pino";

import {
  CredentialServiceError,
  InvalidConfigurationError,
  LateDenialError,
  LearnedDenialError,
  NoPermissionError,
  StreamClientError,
  TopicNotFoundError,
} from "../errors.js";

export type AppLogger = PinoLogger;

/**
 * Log shape of an error under `err`. Client errors keep their code and the
 * topic, channel and denial they are about, so log queries can filter on them.
 */
export type NormalizedError = {
  message: string;
  name?: string;
  code?: string | number;
  topic?: string;
  channel?: number;
  offset?: string;
  denialCode?: number;
  reason?: string;
  status?: number;
  issues?: string[];
  retriable?: boolean;
  stack?: string;
  cause?: NormalizedError;
};

type CreateLoggerOptions = {
  level?: string;
  serviceName?: string;
  bindings?: Record<string, unknown>;
  options?: LoggerOptions;
  destination?: DestinationStream;
};

// keys and tokens logged by accident under any of these names
const REDACTED_PATHS = [
  "secretKey",
  "cipherKey",
  "password",
  "token",
  "*.secretKey",
  "*.cipherKey",
  "*.password",
  "*.token",
];

const MAX_CAUSE_DEPTH = 4;

function envValue(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value && value.length > 0 ? value : undefined;
}

export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const loggerOptions: LoggerOptions = {
    level: options.level ?? envValue("LOG_LEVEL") ?? "info",
    base: { service: options.serviceName ?? envValue("SERVICE_NAME") ?? "streamgate-client" },
    timestamp: stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    ...options.options,
  };
  const logger = options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
  return options.bindings && Object.keys(options.bindings).length > 0 ? logger.child(options.bindings) : logger;
}

export const appLogger: AppLogger = createLogger({ bindings: { subsystem: "streamgate" } });

function readField(value: object, key: string): unknown {
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

function describeClientError(error: StreamClientError, normalized: NormalizedError): void {
  normalized.code = error.code;
  if (error instanceof LateDenialError || error instanceof LearnedDenialError) {
    normalized.topic = error.topic;
    normalized.channel = error.channel;
    normalized.offset = error.offset;
    normalized.denialCode = error.denialCode;
    normalized.reason = error.reason;
  } else if (error instanceof NoPermissionError) {
    normalized.topic = error.topic;
    normalized.channel = error.channel;
  } else if (error instanceof TopicNotFoundError) {
    normalized.topic = error.topic;
  } else if (error instanceof CredentialServiceError) {
    normalized.status = error.status;
  } else if (error instanceof InvalidConfigurationError) {
    normalized.issues = error.issues;
  }
}

// kafkajs and mqtt errors carry `code` (numeric or string) and kafkajs a `retriable` flag
function describeTransportError(error: object, normalized: NormalizedError): void {
  const code = readField(error, "code");
  if (typeof code === "string" || typeof code === "number") {
    normalized.code = code;
  }
  const retriable = readField(error, "retriable");
  if (typeof retriable === "boolean") {
    normalized.retriable = retriable;
  }
}

function normalizeAt(error: unknown, depth: number): NormalizedError {
  if (!(error instanceof Error)) {
    if (typeof error === "string") {
      return { message: error };
    }
    if (typeof error === "object" && error !== null) {
      const message = readField(error, "message");
      const normalized: NormalizedError = {
        message: typeof message === "string" && message.length > 0 ? message : stringify(error),
      };
      describeTransportError(error, normalized);
      return normalized;
    }
    return { message: String(error) };
  }

  const normalized: NormalizedError = { message: error.message, name: error.name };
  if (error instanceof StreamClientError) {
    describeClientError(error, normalized);
  } else {
    describeTransportError(error, normalized);
  }
  if (error.stack) {
    normalized.stack = error.stack;
  }
  if (error.cause !== undefined && depth < MAX_CAUSE_DEPTH) {
    normalized.cause = normalizeAt(error.cause, depth + 1);
  }
  return normalized;
}

export function normalizeError(error: unknown): NormalizedError {
  return normalizeAt(error, 0);
}

function stringify(value: object): string {
  try {
    return JSON.stringify(value) ?? "Unknown error";
  } catch {
    return "Unknown error";
  }
}
