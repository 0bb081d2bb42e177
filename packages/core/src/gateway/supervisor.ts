import type { Logger } from "pino";
import { GatewayError, toError, toGatewayError } from "../errors.js";
import type { GatewayClient } from "./client.js";
import { decodeEnvelope, encodeIdentify, readHelloInterval } from "./codec.js";
import { startHeartbeat } from "./heartbeat.js";
import { startProcessor } from "./processor.js";
import { makeGatewayUrl, resolveAuthToken } from "./rest.js";
import type { GatewaySocket } from "./socket.js";
import { SessionTracker } from "./tracker.js";
import { abortError } from "./worker.js";

export type AttemptStart =
  | {
      ok: true;
      tracker: SessionTracker;
    }
  | {
      ok: false;
      error: GatewayError;
    };

export interface AttemptHandle {
  attempt: number;
  /** Settles once, with the tracker or with the reason the handshake failed. */
  ready: Promise<AttemptStart>;
  /** Settles after both core workers stopped and the socket was closed. Never rejects. */
  completion: Promise<void>;
}

async function closeSocket(socket: GatewaySocket, logger: Logger): Promise<void> {
  try {
    await socket.close();
  } catch (error) {
    logger.warn({ err: toError(error) }, "Failed to close gateway socket");
  }
}

async function receiveHello(socket: GatewaySocket, timeoutMs: number, stopSignal?: AbortSignal): Promise<string> {
  const wait = new AbortController();
  const timer = setTimeout(() => {
    wait.abort(new GatewayError("handshake_failed", `No Hello was received within ${timeoutMs}ms`));
  }, timeoutMs);
  const onStop = (): void => wait.abort(abortError(stopSignal));
  stopSignal?.addEventListener("abort", onStop, { once: true });
  try {
    return await socket.receive(wait.signal);
  } finally {
    clearTimeout(timer);
    stopSignal?.removeEventListener("abort", onStop);
  }
}

/**
 * One connection attempt: open, Hello, Identify, start heartbeat and processor,
 * then wait for both to stop. Handshake failures settle `ready` with a failure
 * instead of throwing. Once `stopSignal` aborts, the handshake is abandoned
 * before Identify goes out and no worker starts.
 */
export function runOneAttempt(client: GatewayClient, attempt: number, stopSignal?: AbortSignal): AttemptHandle {
  const logger = client.logger.child({ attempt });
  let publish!: (start: AttemptStart) => void;
  const ready = new Promise<AttemptStart>((resolve) => {
    publish = resolve;
  });

  const run = async (): Promise<void> => {
    let socket: GatewaySocket | null = null;
    try {
      stopSignal?.throwIfAborted();
      const url = await makeGatewayUrl(client, stopSignal);
      logger.info({ url }, "Connecting to gateway");
      socket = await client.connect(url);
      stopSignal?.throwIfAborted();

      const hello = await receiveHello(socket, client.timing.helloTimeoutMs, stopSignal);
      if (hello.length === 0) {
        throw new GatewayError("handshake_failed", "No data was received from gateway");
      }
      const heartbeatIntervalMs = readHelloInterval(decodeEnvelope(hello));
      const tracker = new SessionTracker({
        attempt,
        socket,
        heartbeatIntervalMs,
        eventQueueCapacity: client.eventQueueCapacity,
        timing: client.timing,
        logger
      });

      const token = resolveAuthToken(client);
      stopSignal?.throwIfAborted();
      await socket.send(
        encodeIdentify({
          token,
          intents: client.intents,
          properties: client.identify
        })
      );
      logger.info({ heartbeatIntervalMs, intents: client.intents }, "Sent identify");

      const heartbeat = startHeartbeat(tracker, client);
      const processor = startProcessor(tracker);
      publish({ ok: true, tracker });

      await Promise.all([heartbeat.completion, processor.completion]);
      logger.info({ sequence: tracker.sequence }, "Heartbeat and processor stopped");
    } catch (error) {
      if (stopSignal?.aborted) {
        logger.info("Shutdown requested, abandoning handshake");
        publish({
          ok: false,
          error: new GatewayError("handshake_failed", "Shutdown requested during handshake", { cause: error })
        });
        return;
      }
      const failure = toGatewayError(error);
      logger.error({ err: failure, code: failure.code }, "Unable to start control plane");
      publish({ ok: false, error: failure });
    } finally {
      if (socket) {
        await closeSocket(socket, logger);
      }
    }
  };

  return {
    attempt,
    ready,
    completion: run()
  };
}
