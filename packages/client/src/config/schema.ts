/**
 * Configuration schema for a client session.
 *
 * Every section has defaults, so a session needs only its keys and the
 * credential service host.
 */

import { z } from "zod";

const UUID = "[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}";

export const PUBLISH_KEY_PATTERN = new RegExp(`^pub-${UUID}$`);
export const SUBSCRIBE_KEY_PATTERN = new RegExp(`^sub-${UUID}$`);
export const SECRET_KEY_PATTERN = new RegExp(`^s-${UUID}$`);

// ============================================================================
// Sections
// ============================================================================

export const NotificationsConfigSchema = z.object({
  protocol: z.enum(["mqtts", "mqtt", "wss", "ws"]).default("mqtts"),
  port: z.number().int().min(1).max(65535).default(8883),
  keepaliveSeconds: z.number().int().min(1).max(3600).default(30),
  exceptionsTopic: z.string().min(1).default("exceptions"),
});
export type NotificationsConfig = z.infer<typeof NotificationsConfigSchema>;

export const ReconciliationConfigSchema = z.object({
  publishWindowMs: z.number().int().min(0).max(600_000).default(5_000),
  learnedErrorTtlMs: z.number().int().min(0).max(3_600_000).default(20_000),
});
export type ReconciliationConfig = z.infer<typeof ReconciliationConfigSchema>;

export const ConsumerConfigSchema = z.object({
  pollTimeoutMs: z.number().int().min(1).max(60_000).default(256),
  defaultGroup: z.string().min(1).default("default"),
  sessionTimeoutMs: z.number().int().min(1_000).max(600_000).default(30_000),
});
export type ConsumerConfig = z.infer<typeof ConsumerConfigSchema>;

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

// ============================================================================
// Root
// ============================================================================

export const StreamClientConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(443),
  publishKey: z.string().regex(PUBLISH_KEY_PATTERN, "publishKey must look like pub-<uuid>"),
  subscribeKey: z.string().regex(SUBSCRIBE_KEY_PATTERN, "subscribeKey must look like sub-<uuid>"),
  secretKey: z.string().regex(SECRET_KEY_PATTERN, "secretKey must look like s-<uuid>"),
  cipherKey: z.string().min(16, "cipherKey must be at least 16 characters").optional(),
  notifications: NotificationsConfigSchema.default({}),
  reconciliation: ReconciliationConfigSchema.default({}),
  consumer: ConsumerConfigSchema.default({}),
  logLevel: LogLevelSchema.default("info"),
});
export type StreamClientConfig = z.infer<typeof StreamClientConfigSchema>;
export type StreamClientConfigInput = z.input<typeof StreamClientConfigSchema>;

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
}
