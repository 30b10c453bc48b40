import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";

import { CredentialServiceError } from "../errors.js";
import { silentLogger } from "../test/fakes.js";
import { HttpCredentialService } from "./CredentialService.js";

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

const PERMISSIONS = [
  {
    topic: "orders",
    channels: [
      { channel: 0, read: true, write: true },
      { channel: 1, read: true },
    ],
  },
];

describe("HttpCredentialService", () => {
  let fetchMock: Mock<FetchFn>;

  function createService(): HttpCredentialService {
    return new HttpCredentialService({
      host: "app.local",
      port: 8443,
      publishKey: "pub-key",
      subscribeKey: "sub-key",
      secretKey: "test-secret",
      logger: silentLogger,
    });
  }

  function lastCall(): { url: string; init: RequestInit | undefined } {
    const call = fetchMock.mock.calls[fetchMock.mock.calls.length - 1];
    if (!call) {
      throw new Error("fetch was not called");
    }
    return { url: call[0].toString(), init: call[1] };
  }

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>(async () => jsonResponse(PERMISSIONS));
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("normalizes connection settings and prefers TLS bootstrap servers", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        meta: { token: "tok-1" },
        pub: [{ "bootstrap.servers": "pub-1:9092,pub-2:9092", "bootstrap.servers.ssl": "pub-1:9093" }],
        sub: [{ "bootstrap.servers": "sub-1:9092" }],
      })
    );

    const settings = await createService().connectionSettings();

    expect(settings).toEqual({
      token: "tok-1",
      publish: [{ endpoint: "pub-1:9093", bootstrapServers: ["pub-1:9093"], ssl: true }],
      subscribe: [{ endpoint: "sub-1:9092", bootstrapServers: ["sub-1:9092"], ssl: false }],
    });
    expect(lastCall().url).toBe("https://app.local:8443/api/v1/connection-settings");
  });

  it("authenticates with the publish and secret keys", async () => {
    await createService().permissions();

    expect(lastCall().init?.method).toBe("GET");
    expect(lastCall().init?.headers).toEqual({
      Accept: "application/json",
      Authorization: `Basic ${Buffer.from("pub-key:test-secret").toString("base64")}`,
      "X-Subscribe-Key": "sub-key",
    });
  });

  it("parses permissions and filters by topic", async () => {
    const permissions = await createService().permissions("orders");

    expect(lastCall().url).toBe("https://app.local:8443/api/v1/permissions?topic=orders");
    expect(permissions.canWrite("orders", 0)).toBe(true);
    expect(permissions.canWrite("orders", 1)).toBe(false);
    expect(permissions.channelsOf("orders")).toEqual([0, 1]);
  });

  it("sends grants and revocations as JSON bodies", async () => {
    const service = createService();

    await service.grant({ user: "user-2", topic: "orders", channel: 1, read: true, write: false, ttl: 60 });
    expect(lastCall().init?.method).toBe("PUT");
    expect(lastCall().init?.body).toBe(
      JSON.stringify({ user: "user-2", topic: "orders", channel: 1, read: true, write: false, ttl: 60 })
    );
    expect(lastCall().init?.headers).toMatchObject({ "Content-Type": "application/json" });

    await service.revoke({ user: "user-2", topic: "orders" });
    expect(lastCall().init?.method).toBe("DELETE");
    expect(lastCall().init?.body).toBe(JSON.stringify({ user: "user-2", topic: "orders" }));
  });

  it("raises a credential error carrying the status on rejection", async () => {
    fetchMock.mockResolvedValueOnce(new Response("forbidden", { status: 403 }));

    await expect(createService().permissions()).rejects.toMatchObject({
      code: "CREDENTIAL_SERVICE",
      status: 403,
      message: "forbidden",
    });
  });

  it("rejects malformed payloads", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ meta: {}, pub: [] }));
    await expect(createService().connectionSettings()).rejects.toBeInstanceOf(CredentialServiceError);

    fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));
    await expect(createService().permissions()).rejects.toThrow("GET /api/v1/permissions returned invalid JSON");
  });

  it("wraps network failures", async () => {
    const cause = new TypeError("fetch failed");
    fetchMock.mockRejectedValueOnce(cause);

    await expect(createService().permissions()).rejects.toMatchObject({
      code: "CREDENTIAL_SERVICE",
      message: "GET /api/v1/permissions failed",
      cause,
    });
  });
});
