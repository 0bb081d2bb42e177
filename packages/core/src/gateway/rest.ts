import { z } from "zod";
import { GatewayError, toError } from "../errors.js";
import { buildGatewayUrl } from "./codec.js";
import type { GatewayClient } from "./client.js";

const gatewayResponseSchema = z
  .object({
    url: z.string().min(1)
  })
  .passthrough();

function buildApiUrl(baseUrl: string, apiVersion: number, route: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/v${apiVersion}/${route.replace(/^\/+/, "")}`;
}

function truncateForLog(value: string, max = 240): string {
  const normalized = value.trim();
  if (normalized.length <= max) {
    return normalized;
  }
  return `${normalized.slice(0, Math.max(0, max - 3))}...`;
}

export function resolveAuthToken(client: Pick<GatewayClient, "token" | "tokenEnvVar" | "env">): string {
  const explicit = client.token?.trim();
  if (explicit) {
    return explicit;
  }
  const fromEnv = client.env[client.tokenEnvVar]?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  throw new GatewayError(
    "missing_credentials",
    `Bot token is not configured. Set ${client.tokenEnvVar} or pass token in config.`
  );
}

/** Looks up the gateway base URL over REST unless one is configured. */
export async function resolveGatewayUrl(client: GatewayClient, signal?: AbortSignal): Promise<string> {
  if (client.gatewayUrl) {
    return client.gatewayUrl;
  }
  const url = buildApiUrl(client.apiBaseUrl, client.apiVersion, "gateway");
  let response: Response;
  try {
    response = await client.fetchImpl(url, {
      method: "GET",
      headers: { accept: "application/json" },
      ...(signal ? { signal } : {})
    });
  } catch (error) {
    throw new GatewayError("gateway_lookup_failed", `Gateway lookup request failed: ${toError(error).message}`, {
      cause: error
    });
  }

  const rawBody = await response.text();
  if (!response.ok) {
    const detail = truncateForLog(rawBody);
    throw new GatewayError(
      "gateway_lookup_failed",
      `Gateway lookup failed status=${response.status}${detail ? ` description=${detail}` : ""}`
    );
  }
  let body: unknown;
  try {
    body = JSON.parse(rawBody);
  } catch {
    throw new GatewayError("gateway_lookup_failed", "Gateway lookup returned an invalid response body");
  }
  const parsed = gatewayResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new GatewayError("gateway_lookup_failed", "Gateway lookup response is missing url");
  }
  return parsed.data.url;
}

export async function makeGatewayUrl(client: GatewayClient, signal?: AbortSignal): Promise<string> {
  return buildGatewayUrl(await resolveGatewayUrl(client, signal), client.apiVersion);
}
