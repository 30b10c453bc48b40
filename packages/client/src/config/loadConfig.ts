import fs from "node:fs";

import YAML from "yaml";

import { InvalidConfigurationError } from "../errors.js";
import {
  describeIssues,
  StreamClientConfigSchema,
  type StreamClientConfig,
  type StreamClientConfigInput,
} from "./schema.js";

export type ConfigOverrides = Partial<StreamClientConfigInput>;

type Env = Record<string, string | undefined>;
type ConfigRecord = Record<string, unknown>;

export class ConfigLoadError extends InvalidConfigurationError {
  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, issues);
    this.name = "ConfigLoadError";
  }
}

const SECTIONS = ["notifications", "reconciliation", "consumer"] as const;

/** Environment variable → config path. Numeric leaves are converted when they parse. */
const ENV_BINDINGS: ReadonlyArray<{ variable: string; path: readonly [string] | readonly [string, string] }> = [
  { variable: "STREAMGATE_HOST", path: ["host"] },
  { variable: "STREAMGATE_PORT", path: ["port"] },
  { variable: "STREAMGATE_PUBLISH_KEY", path: ["publishKey"] },
  { variable: "STREAMGATE_SUBSCRIBE_KEY", path: ["subscribeKey"] },
  { variable: "STREAMGATE_SECRET_KEY", path: ["secretKey"] },
  { variable: "STREAMGATE_CIPHER_KEY", path: ["cipherKey"] },
  { variable: "STREAMGATE_LOG_LEVEL", path: ["logLevel"] },
  { variable: "STREAMGATE_NOTIFICATIONS_PROTOCOL", path: ["notifications", "protocol"] },
  { variable: "STREAMGATE_NOTIFICATIONS_PORT", path: ["notifications", "port"] },
  { variable: "STREAMGATE_NOTIFICATIONS_KEEPALIVE_SECONDS", path: ["notifications", "keepaliveSeconds"] },
  { variable: "STREAMGATE_EXCEPTIONS_TOPIC", path: ["notifications", "exceptionsTopic"] },
  { variable: "STREAMGATE_PUBLISH_WINDOW_MS", path: ["reconciliation", "publishWindowMs"] },
  { variable: "STREAMGATE_LEARNED_ERROR_TTL_MS", path: ["reconciliation", "learnedErrorTtlMs"] },
  { variable: "STREAMGATE_POLL_TIMEOUT_MS", path: ["consumer", "pollTimeoutMs"] },
  { variable: "STREAMGATE_CONSUMER_GROUP", path: ["consumer", "defaultGroup"] },
  { variable: "STREAMGATE_SESSION_TIMEOUT_MS", path: ["consumer", "sessionTimeoutMs"] },
];

const NUMERIC_LEAVES = new Set([
  "port",
  "keepaliveSeconds",
  "publishWindowMs",
  "learnedErrorTtlMs",
  "pollTimeoutMs",
  "sessionTimeoutMs",
]);

function asRecord(value: unknown): ConfigRecord | undefined {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return undefined;
  }
  const record: ConfigRecord = {};
  for (const [key, entry] of Object.entries(value)) {
    record[key] = entry;
  }
  return record;
}

function asNumber(value: string): number | string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return value;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : value;
}

function readFileFrom(variable: string, filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf-8").trim();
  } catch (error) {
    throw new ConfigLoadError(`Failed to read ${variable} from ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

/** `NAME` wins over `NAME_FILE`, which names a file holding the value. */
function readEnv(env: Env, variable: string): string | undefined {
  const direct = env[variable];
  if (direct !== undefined && direct.length > 0) {
    return direct;
  }
  const filePath = env[`${variable}_FILE`];
  if (filePath !== undefined && filePath.length > 0) {
    return readFileFrom(`${variable}_FILE`, filePath);
  }
  return undefined;
}

function readConfigFile(filePath: string): ConfigRecord {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigLoadError(`Failed to read config file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (error) {
    throw new ConfigLoadError(`Failed to parse config file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  const record = asRecord(parsed);
  if (!record) {
    throw new ConfigLoadError(`Config file ${filePath} must contain a mapping`);
  }
  return record;
}

function readEnvLayer(env: Env): ConfigRecord {
  const layer: ConfigRecord = {};
  for (const { variable, path } of ENV_BINDINGS) {
    const raw = readEnv(env, variable);
    if (raw === undefined) {
      continue;
    }
    const leaf = path.length === 2 ? path[1] : path[0];
    const value = NUMERIC_LEAVES.has(leaf) ? asNumber(raw) : raw;
    if (path.length === 2) {
      const section = asRecord(layer[path[0]]) ?? {};
      section[path[1]] = value;
      layer[path[0]] = section;
    } else {
      layer[path[0]] = value;
    }
  }
  return layer;
}

function mergeLayers(layers: readonly ConfigRecord[]): ConfigRecord {
  const merged: ConfigRecord = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) {
        continue;
      }
      const isSection = SECTIONS.some((section) => section === key);
      const incoming = isSection ? asRecord(value) : undefined;
      const existing = isSection ? asRecord(merged[key]) : undefined;
      merged[key] = incoming && existing ? { ...existing, ...incoming } : value;
    }
  }
  return merged;
}

/**
 * Builds the session configuration from, in increasing precedence: the YAML
 * file named by `STREAMGATE_CONFIG`, `STREAMGATE_*` environment variables and
 * `overrides`.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: Env = process.env): StreamClientConfig {
  const configPath = env.STREAMGATE_CONFIG;
  const fileLayer = configPath ? readConfigFile(configPath) : {};
  const merged = mergeLayers([fileLayer, readEnvLayer(env), asRecord(overrides) ?? {}]);

  const result = StreamClientConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigLoadError("Invalid client configuration", describeIssues(result.error));
  }
  return result.data;
}
