import {
  ControlPlane,
  createGatewayClient,
  isGatewayError,
  redactToken,
  toError,
  type GatewayClientOptions,
  type GatewireConfig,
  type SessionTracker
} from "@gatewire/core";
import { formatControlPlaneEvent, formatGatewayEvent } from "./format.js";
import { print, printError } from "./runtime-common.js";

export interface StartParams {
  config: GatewireConfig;
  env?: NodeJS.ProcessEnv;
  /** Test seams; real runs use the client's defaults. */
  client?: Pick<GatewayClientOptions, "connect" | "fetchImpl" | "logger" | "random">;
  signal?: AbortSignal;
  handleProcessSignals?: boolean;
  output?: (line: string) => void;
  errorOutput?: (line: string) => void;
}

async function pumpEvents(tracker: SessionTracker, output: (line: string) => void): Promise<void> {
  for await (const event of tracker.events) {
    output(formatGatewayEvent(tracker.attempt, event));
  }
}

/** Holds `consumer` in `consumers` until it settles. */
export function trackConsumer(consumers: Set<Promise<void>>, consumer: Promise<void>): void {
  const tracked = consumer.finally(() => {
    consumers.delete(tracked);
  });
  consumers.add(tracked);
}

/**
 * Runs the supervise loop until SIGINT/SIGTERM (or `signal`). Returns the
 * process exit code: 0 after a requested shutdown, 1 on missing credentials.
 */
export async function runStart(params: StartParams): Promise<number> {
  const output = params.output ?? print;
  const errorOutput = params.errorOutput ?? printError;
  const client = createGatewayClient({
    ...params.config,
    ...params.client,
    env: params.env ?? process.env
  });
  const plane = new ControlPlane(client);
  const consumers = new Set<Promise<void>>();

  const unsubscribeRuntimeEvents = plane.onRuntimeEvent((event) => {
    output(formatControlPlaneEvent(event));
  });
  const unsubscribeAttempts = plane.onAttempt((tracker) => {
    trackConsumer(
      consumers,
      pumpEvents(tracker, output).catch((error: unknown) => {
        client.logger.error({ err: toError(error), attempt: tracker.attempt }, "Event consumer failed");
      })
    );
  });

  const requestShutdown = (): void => {
    plane.shutdown().catch((error: unknown) => {
      client.logger.error({ err: toError(error) }, "Shutdown failed");
    });
  };
  const handleProcessSignals = params.handleProcessSignals ?? true;
  if (handleProcessSignals) {
    process.on("SIGINT", requestShutdown);
    process.on("SIGTERM", requestShutdown);
  }
  if (params.signal?.aborted) {
    requestShutdown();
  } else {
    params.signal?.addEventListener("abort", requestShutdown, { once: true });
  }

  try {
    await plane.run();
    await Promise.all([...consumers]);
    return 0;
  } catch (error) {
    if (isGatewayError(error, "missing_credentials")) {
      errorOutput(`[gatewire] ${redactToken(error.message, client.token)}`);
      return 1;
    }
    throw error;
  } finally {
    if (handleProcessSignals) {
      process.off("SIGINT", requestShutdown);
      process.off("SIGTERM", requestShutdown);
    }
    params.signal?.removeEventListener("abort", requestShutdown);
    unsubscribeAttempts();
    unsubscribeRuntimeEvents();
  }
}
