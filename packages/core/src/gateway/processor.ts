import type { Logger } from "pino";
import { decodeEvent, type GatewayEvent } from "../events/registry.js";
import { decodeEnvelope, GatewayOpcode, type GatewayEnvelope } from "./codec.js";
import type { SessionTracker } from "./tracker.js";
import { BackgroundWorker } from "./worker.js";

/**
 * Applies one envelope to the tracker and returns the event to publish, if any.
 * Control opcodes become synthetic events without touching the schema registry.
 */
export function routeEnvelope(
  tracker: Pick<SessionTracker, "sequence">,
  envelope: GatewayEnvelope,
  logger: Logger
): GatewayEvent | null {
  if (envelope.sequence !== null) {
    tracker.sequence = envelope.sequence;
  }

  switch (envelope.op) {
    case GatewayOpcode.Resume:
      return { name: "RESUME" };
    case GatewayOpcode.Reconnect:
      return { name: "RECONNECT" };
    case GatewayOpcode.InvalidSession:
      return { name: "INVALID_SESSION", payload: envelope.data ?? null };
    default:
      break;
  }

  if (envelope.eventName !== null && envelope.data !== undefined && envelope.data !== null) {
    const decoded = decodeEvent(envelope.eventName, envelope.data);
    if (!decoded.ok) {
      logger.error({ event: envelope.eventName, err: decoded.error }, "Dropped dispatch event that failed to decode");
      return null;
    }
    return decoded.event;
  }

  logger.debug({ op: envelope.op }, "Ignored control envelope");
  return null;
}

/**
 * Reads frames until the socket closes, yields an empty frame, or the worker
 * is interrupted. Publishing waits while the event queue is full. The queue
 * is closed when the loop ends so consumers see the end of the attempt.
 */
export function startProcessor(tracker: SessionTracker): BackgroundWorker {
  const logger = tracker.logger.child({ worker: "processor" });
  const worker = new BackgroundWorker("processor", logger, async (signal) => {
    try {
      while (true) {
        signal.throwIfAborted();
        if (!tracker.socket.isOpen) {
          logger.error("Gateway socket is no longer open");
          return;
        }
        const frame = await tracker.socket.receive(signal);
        if (frame.length === 0) {
          logger.error("Received empty frame from gateway");
          return;
        }
        const envelope = decodeEnvelope(frame);
        logger.debug({ op: envelope.op, s: envelope.sequence, t: envelope.eventName }, "Received envelope");
        const event = routeEnvelope(tracker, envelope, logger);
        if (event) {
          signal.throwIfAborted();
          await tracker.events.put(event, signal);
        }
      }
    } finally {
      tracker.events.close();
    }
  });
  tracker.processor = worker;
  return worker;
}
