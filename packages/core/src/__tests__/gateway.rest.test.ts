import { describe, expect, it } from "vitest";
import {
  createGatewayClient,
  GatewayError,
  makeGatewayUrl,
  resolveAuthToken,
  resolveGatewayUrl,
  resolveTiming
} from "../index.js";
import { silentLogger } from "./support.js";

function stubFetch(status: number, body: string, requests: string[] = []): typeof fetch {
  return async (input) => {
    requests.push(String(input));
    return new Response(body, { status });
  };
}

async function lookupError(promise: Promise<string>): Promise<GatewayError> {
  const error = await promise.catch((reason: unknown) => reason);
  if (!(error instanceof GatewayError)) {
    throw new Error("expected a GatewayError");
  }
  return error;
}

describe("gateway lookup", () => {
  it("fetches the gateway URL from the versioned REST route", async () => {
    const requests: string[] = [];
    const client = createGatewayClient({
      apiBaseUrl: "https://api.chat.test/api/",
      apiVersion: 9,
      fetchImpl: stubFetch(200, JSON.stringify({ url: "wss://gateway.chat.test" }), requests),
      logger: silentLogger()
    });

    expect(await makeGatewayUrl(client)).toBe("wss://gateway.chat.test?v=9&encoding=json");
    expect(requests).toEqual(["https://api.chat.test/api/v9/gateway"]);
  });

  it("skips the request when a gateway URL is configured", async () => {
    const requests: string[] = [];
    const client = createGatewayClient({
      gatewayUrl: "wss://fixed.test",
      fetchImpl: stubFetch(500, "", requests),
      logger: silentLogger()
    });
    expect(await resolveGatewayUrl(client)).toBe("wss://fixed.test");
    expect(requests).toEqual([]);
  });

  it("reports non-ok responses and malformed bodies", async () => {
    const failed = createGatewayClient({
      fetchImpl: stubFetch(503, "upstream unavailable"),
      logger: silentLogger()
    });
    const statusError = await lookupError(resolveGatewayUrl(failed));
    expect(statusError.code).toBe("gateway_lookup_failed");
    expect(statusError.message).toBe("Gateway lookup failed status=503 description=upstream unavailable");

    const missingUrl = createGatewayClient({
      fetchImpl: stubFetch(200, JSON.stringify({ shards: 1 })),
      logger: silentLogger()
    });
    expect((await lookupError(resolveGatewayUrl(missingUrl))).message).toBe("Gateway lookup response is missing url");

    const notJson = createGatewayClient({
      fetchImpl: stubFetch(200, "<html>"),
      logger: silentLogger()
    });
    expect((await lookupError(resolveGatewayUrl(notJson))).message).toBe(
      "Gateway lookup returned an invalid response body"
    );
  });

  it("wraps transport failures", async () => {
    const client = createGatewayClient({
      fetchImpl: async () => {
        throw new Error("connection refused");
      },
      logger: silentLogger()
    });
    const error = await lookupError(resolveGatewayUrl(client));
    expect(error.message).toBe("Gateway lookup request failed: connection refused");
  });
});

describe("auth token", () => {
  it("prefers the configured token over the environment", () => {
    expect(resolveAuthToken({ token: "test-secret", tokenEnvVar: "BOT_TOKEN", env: { BOT_TOKEN: "other" } })).toBe(
      "test-secret"
    );
    expect(resolveAuthToken({ tokenEnvVar: "BOT_TOKEN", env: { BOT_TOKEN: " env-secret " } })).toBe("env-secret");
  });

  it("fails loudly when no token is available", () => {
    expect(() => resolveAuthToken({ tokenEnvVar: "BOT_TOKEN", env: { BOT_TOKEN: "   " } })).toThrowError(
      "Bot token is not configured. Set BOT_TOKEN or pass token in config."
    );
  });
});

describe("client defaults", () => {
  it("fills timing defaults and clamps invalid values", () => {
    expect(resolveTiming({ doctorPollIntervalMs: 0, restartDelayMs: -5, stopTimeoutMs: 250.7 })).toEqual({
      doctorPollIntervalMs: 1,
      doctorGracePeriodMs: 5000,
      stopTimeoutMs: 250,
      stopPollIntervalMs: 100,
      scheduleTimeoutMs: 30000,
      schedulePollIntervalMs: 100,
      helloTimeoutMs: 30000,
      restartDelayMs: 0
    });
  });

  it("uses the default intents, token variable and identify names", () => {
    const client = createGatewayClient({ identify: { os: "linux" }, logger: silentLogger() });
    expect(client.intents).toBe(0x01ffff);
    expect(client.tokenEnvVar).toBe("DISCORD_BOT_TOKEN");
    expect(client.identify).toEqual({ os: "linux", browser: "gatewire", device: "gatewire" });
    expect(client.eventQueueCapacity).toBe(100);
  });
});
