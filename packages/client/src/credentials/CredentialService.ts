import { z } from "zod";

import { CredentialServiceError } from "../errors.js";
import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import { PermissionListSchema, PermissionSet } from "../permissions/PermissionSet.js";

export type BrokerSettings = {
  /** Connection string as served, also used as the endpoint label. */
  endpoint: string;
  bootstrapServers: string[];
  ssl: boolean;
};

export type ConnectionSettings = {
  token: string;
  publish: BrokerSettings[];
  subscribe: BrokerSettings[];
};

export type GrantRequest = {
  user: string;
  topic: string;
  /** Omitted: every channel of the topic. */
  channel?: number;
  read: boolean;
  write: boolean;
  /** Seconds until the grant lapses; omitted for a permanent grant. */
  ttl?: number;
};

export type RevokeRequest = {
  user: string;
  topic: string;
  channel?: number;
};

export interface CredentialService {
  connectionSettings(): Promise<ConnectionSettings>;
  permissions(topic?: string): Promise<PermissionSet>;
  grant(request: GrantRequest): Promise<PermissionSet>;
  revoke(request: RevokeRequest): Promise<PermissionSet>;
}

const brokerSettingsSchema = z.object({
  "bootstrap.servers": z.string().min(1),
  "bootstrap.servers.ssl": z.string().min(1).optional(),
});

export const ConnectionSettingsSchema = z.object({
  meta: z.object({ token: z.string().min(1) }),
  pub: z.array(brokerSettingsSchema).min(1),
  sub: z.array(brokerSettingsSchema).default([]),
});

function toBrokerSettings(wire: z.infer<typeof brokerSettingsSchema>): BrokerSettings {
  const sslServers = wire["bootstrap.servers.ssl"];
  const endpoint = sslServers ?? wire["bootstrap.servers"];
  return {
    endpoint,
    bootstrapServers: endpoint
      .split(",")
      .map((server) => server.trim())
      .filter((server) => server.length > 0),
    ssl: sslServers !== undefined,
  };
}

export type HttpCredentialServiceOptions = {
  host: string;
  port?: number;
  publishKey: string;
  subscribeKey: string;
  secretKey: string;
  /** Defaults to https. */
  protocol?: "https" | "http";
  timeoutMs?: number;
  logger?: AppLogger;
};

type HttpMethod = "GET" | "PUT" | "DELETE";

/** Client of the session's credential and permission REST endpoints. */
export class HttpCredentialService implements CredentialService {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly logger: AppLogger;

  constructor(options: HttpCredentialServiceOptions) {
    const protocol = options.protocol ?? "https";
    this.baseUrl = `${protocol}://${options.host}:${options.port ?? 443}`;
    const basic = Buffer.from(`${options.publishKey}:${options.secretKey}`, "utf8").toString("base64");
    this.headers = {
      Accept: "application/json",
      Authorization: `Basic ${basic}`,
      "X-Subscribe-Key": options.subscribeKey,
    };
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = options.logger ?? appLogger.child({ subsystem: "credentials", host: options.host });
  }

  async connectionSettings(): Promise<ConnectionSettings> {
    const raw = await this.request("GET", "/api/v1/connection-settings");
    const parsed = ConnectionSettingsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CredentialServiceError("Connection settings response is malformed", undefined, {
        cause: parsed.error,
      });
    }
    return {
      token: parsed.data.meta.token,
      publish: parsed.data.pub.map(toBrokerSettings),
      subscribe: parsed.data.sub.map(toBrokerSettings),
    };
  }

  async permissions(topic?: string): Promise<PermissionSet> {
    const query = topic === undefined ? undefined : { topic };
    return this.parsePermissions(await this.request("GET", "/api/v1/permissions", { query }));
  }

  async grant(request: GrantRequest): Promise<PermissionSet> {
    return this.parsePermissions(await this.request("PUT", "/api/v1/permissions", { body: request }));
  }

  async revoke(request: RevokeRequest): Promise<PermissionSet> {
    return this.parsePermissions(await this.request("DELETE", "/api/v1/permissions", { body: request }));
  }

  private parsePermissions(raw: unknown): PermissionSet {
    const parsed = PermissionListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CredentialServiceError("Permissions response is malformed", undefined, { cause: parsed.error });
    }
    return PermissionSet.fromParsed(parsed.data);
  }

  private async request(
    method: HttpMethod,
    path: string,
    options: { query?: Record<string, string>; body?: unknown } = {}
  ): Promise<unknown> {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    const timeoutHandle = setTimeout(() => controller.abort(), this.timeoutMs);
    timeoutHandle.unref?.();

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers:
          options.body === undefined ? this.headers : { ...this.headers, "Content-Type": "application/json" },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
    } catch (error) {
      this.logger.warn(
        { err: normalizeError(error), event: "credentials.request_failed", method, path },
        "Credential service request failed"
      );
      if (error instanceof Error && error.name === "AbortError") {
        throw new CredentialServiceError(`${method} ${path} timed out after ${this.timeoutMs}ms`, undefined, {
          cause: error,
        });
      }
      throw new CredentialServiceError(`${method} ${path} failed`, undefined, { cause: error });
    } finally {
      clearTimeout(timeoutHandle);
    }

    const text = await response.text();
    if (response.status >= 400) {
      this.logger.warn(
        { event: "credentials.request_rejected", method, path, status: response.status },
        "Credential service rejected request"
      );
      throw new CredentialServiceError(text || `${method} ${path} returned ${response.status}`, response.status);
    }
    if (text.length === 0) {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new CredentialServiceError(`${method} ${path} returned invalid JSON`, response.status, { cause: error });
    }
  }
}
