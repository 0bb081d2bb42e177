import type { GatewayClient } from "./client.js";
import { encodeHeartbeat } from "./codec.js";
import type { SessionTracker } from "./tracker.js";
import { BackgroundWorker, sleep } from "./worker.js";

/**
 * Sends a heartbeat carrying the last seen sequence, then naps for
 * `interval * U` with U drawn from [0, 1). Every nap is jittered, not just
 * the first one.
 */
export function startHeartbeat(tracker: SessionTracker, client: Pick<GatewayClient, "random">): BackgroundWorker {
  const logger = tracker.logger.child({ worker: "heartbeat" });
  const worker = new BackgroundWorker("heartbeat", logger, async (signal) => {
    while (!signal.aborted) {
      const sequence = tracker.sequence;
      await tracker.socket.send(encodeHeartbeat(sequence));
      const napMs = tracker.heartbeatIntervalMs * client.random();
      logger.debug({ sequence, napMs: Math.round(napMs) }, "Sent heartbeat, taking nap now");
      await sleep(napMs, signal);
    }
  });
  tracker.heartbeat = worker;
  return worker;
}
