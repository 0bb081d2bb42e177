import { z } from "zod";
import { GatewayError, toError } from "../errors.js";

export const GatewayOpcode = {
  Dispatch: 0,
  Heartbeat: 1,
  Identify: 2,
  PresenceUpdate: 3,
  VoiceStateUpdate: 4,
  Resume: 6,
  Reconnect: 7,
  RequestGuildMembers: 8,
  InvalidSession: 9,
  Hello: 10,
  HeartbeatAck: 11
} as const;

export type GatewayOpcode = (typeof GatewayOpcode)[keyof typeof GatewayOpcode];

/** One inbound frame. `data` stays opaque until routing decides how to decode it. */
export interface GatewayEnvelope {
  op: number;
  sequence: number | null;
  eventName: string | null;
  data: unknown;
}

export interface IdentifyProperties {
  os: string;
  browser: string;
  device: string;
}

export interface IdentifyPayload {
  token: string;
  intents: number;
  properties: IdentifyProperties;
}

const envelopeSchema = z.object({
  op: z.number().int(),
  s: z.number().nullish(),
  t: z.string().nullish(),
  d: z.unknown()
});

const helloDataSchema = z.object({
  heartbeat_interval: z.number().int().positive()
});

export function decodeEnvelope(frame: string): GatewayEnvelope {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch (error) {
    throw new GatewayError("protocol_error", `Gateway frame is not valid JSON: ${toError(error).message}`);
  }
  const parsed = envelopeSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".") || "frame"}: ${issue.message}` : "unknown shape";
    throw new GatewayError("protocol_error", `Gateway frame has an unexpected shape (${detail})`);
  }
  const { op, s, t, d } = parsed.data;
  return {
    op,
    sequence: typeof s === "number" && Number.isInteger(s) ? s : null,
    eventName: t ?? null,
    data: d
  };
}

export function readHelloInterval(envelope: GatewayEnvelope): number {
  if (envelope.op !== GatewayOpcode.Hello) {
    throw new GatewayError("handshake_failed", `Wrong opcode: ${envelope.op}`);
  }
  const parsed = helloDataSchema.safeParse(envelope.data);
  if (!parsed.success) {
    throw new GatewayError("handshake_failed", "Hello payload is missing a positive heartbeat_interval");
  }
  return parsed.data.heartbeat_interval;
}

// An unset sequence is sent as an explicit null.
export function encodeHeartbeat(sequence: number | null): string {
  return JSON.stringify({
    op: GatewayOpcode.Heartbeat,
    d: sequence
  });
}

export function encodeIdentify(payload: IdentifyPayload): string {
  return JSON.stringify({
    op: GatewayOpcode.Identify,
    d: {
      token: payload.token,
      intents: payload.intents,
      properties: {
        os: payload.properties.os,
        browser: payload.properties.browser,
        device: payload.properties.device
      }
    }
  });
}

export function buildGatewayUrl(baseUrl: string, apiVersion: number): string {
  return `${baseUrl.replace(/\/+$/, "")}?v=${apiVersion}&encoding=json`;
}
