import type { Logger } from "pino";
import type { ControlPlaneTimingConfig, GatewireConfig } from "../config.js";
import {
  DEFAULT_API_BASE_URL,
  DEFAULT_API_VERSION,
  DEFAULT_CLIENT_NAME,
  DEFAULT_DOCTOR_GRACE_PERIOD_MS,
  DEFAULT_DOCTOR_POLL_INTERVAL_MS,
  DEFAULT_EVENT_QUEUE_CAPACITY,
  DEFAULT_HELLO_TIMEOUT_MS,
  DEFAULT_INTENTS,
  DEFAULT_RESTART_DELAY_MS,
  DEFAULT_SCHEDULE_POLL_INTERVAL_MS,
  DEFAULT_SCHEDULE_TIMEOUT_MS,
  DEFAULT_STOP_POLL_INTERVAL_MS,
  DEFAULT_STOP_TIMEOUT_MS,
  DEFAULT_TOKEN_ENV_VAR
} from "../constants.js";
import { createLogger } from "../logger.js";
import type { IdentifyProperties } from "./codec.js";
import { connectWebSocket, type GatewaySocketFactory } from "./socket.js";

export type ControlPlaneTiming = Required<ControlPlaneTimingConfig>;

export interface GatewayClientOptions extends GatewireConfig {
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
  connect?: GatewaySocketFactory;
  logger?: Logger;
  random?: () => number;
}

/** Everything one attempt needs, with defaults applied. Shared across attempts. */
export interface GatewayClient {
  readonly apiBaseUrl: string;
  readonly apiVersion: number;
  readonly gatewayUrl?: string;
  readonly token?: string;
  readonly tokenEnvVar: string;
  readonly env: NodeJS.ProcessEnv;
  readonly intents: number;
  readonly identify: IdentifyProperties;
  readonly timing: ControlPlaneTiming;
  readonly eventQueueCapacity: number;
  readonly fetchImpl: typeof fetch;
  readonly connect: GatewaySocketFactory;
  readonly logger: Logger;
  readonly random: () => number;
}

function clampMs(value: number | undefined, fallback: number, min = 0): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(min, Math.floor(value));
}

function platformName(): string {
  switch (process.platform) {
    case "win32":
      return "windows";
    case "darwin":
      return "darwin";
    default:
      return "linux";
  }
}

export function resolveTiming(config: ControlPlaneTimingConfig | undefined): ControlPlaneTiming {
  return {
    doctorPollIntervalMs: clampMs(config?.doctorPollIntervalMs, DEFAULT_DOCTOR_POLL_INTERVAL_MS, 1),
    doctorGracePeriodMs: clampMs(config?.doctorGracePeriodMs, DEFAULT_DOCTOR_GRACE_PERIOD_MS),
    stopTimeoutMs: clampMs(config?.stopTimeoutMs, DEFAULT_STOP_TIMEOUT_MS, 1),
    stopPollIntervalMs: clampMs(config?.stopPollIntervalMs, DEFAULT_STOP_POLL_INTERVAL_MS, 1),
    scheduleTimeoutMs: clampMs(config?.scheduleTimeoutMs, DEFAULT_SCHEDULE_TIMEOUT_MS, 1),
    schedulePollIntervalMs: clampMs(config?.schedulePollIntervalMs, DEFAULT_SCHEDULE_POLL_INTERVAL_MS, 1),
    helloTimeoutMs: clampMs(config?.helloTimeoutMs, DEFAULT_HELLO_TIMEOUT_MS, 1),
    restartDelayMs: clampMs(config?.restartDelayMs, DEFAULT_RESTART_DELAY_MS)
  };
}

export function createGatewayClient(options: GatewayClientOptions = {}): GatewayClient {
  const apiVersion = Math.floor(options.apiVersion ?? DEFAULT_API_VERSION);
  if (!Number.isFinite(apiVersion) || apiVersion < 1) {
    throw new Error(`Invalid gateway API version: ${options.apiVersion}`);
  }
  const intents = options.intents ?? DEFAULT_INTENTS;
  if (!Number.isInteger(intents) || intents < 0) {
    throw new Error(`Invalid gateway intents bitmask: ${options.intents}`);
  }
  const gatewayUrl = options.gatewayUrl?.trim();
  return {
    apiBaseUrl: options.apiBaseUrl?.trim() || DEFAULT_API_BASE_URL,
    apiVersion,
    gatewayUrl: gatewayUrl && gatewayUrl.length > 0 ? gatewayUrl : undefined,
    token: options.token,
    tokenEnvVar: options.tokenEnvVar?.trim() || DEFAULT_TOKEN_ENV_VAR,
    env: options.env ?? process.env,
    intents,
    identify: {
      os: options.identify?.os ?? platformName(),
      browser: options.identify?.browser ?? DEFAULT_CLIENT_NAME,
      device: options.identify?.device ?? DEFAULT_CLIENT_NAME
    },
    timing: resolveTiming(options.timing),
    eventQueueCapacity: Math.max(1, Math.floor(options.eventQueueCapacity ?? DEFAULT_EVENT_QUEUE_CAPACITY)),
    fetchImpl: options.fetchImpl ?? fetch,
    connect: options.connect ?? connectWebSocket,
    logger: options.logger ?? createLogger({ level: options.logLevel }),
    random: options.random ?? Math.random
  };
}
