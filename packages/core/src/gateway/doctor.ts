import { stopControlPlane } from "./stop-worker.js";
import { diagnoseTracker, type SessionTracker } from "./tracker.js";
import { BackgroundWorker, sleep } from "./worker.js";

/**
 * Watches the attempt. On the first unhealthy diagnosis it waits out the grace
 * period, cancels the heartbeat and processor, vacates its own slot and exits.
 * It never revives an attempt; the supervise loop starts a new one.
 */
export function startDoctor(tracker: SessionTracker): BackgroundWorker {
  const logger = tracker.logger.child({ worker: "doctor" });
  const { doctorPollIntervalMs, doctorGracePeriodMs } = tracker.timing;
  const worker = new BackgroundWorker("doctor", logger, async (signal) => {
    while (true) {
      const diagnosis = diagnoseTracker(tracker);
      if (!diagnosis.healthy) {
        logger.warn({ reason: diagnosis.reason, gracePeriodMs: doctorGracePeriodMs }, "Control plane is unhealthy");
        await sleep(doctorGracePeriodMs, signal);
        const stopped = await stopControlPlane(tracker);
        logger.info({ stopped }, "Doctor tore down control plane");
        if (tracker.doctor === worker) {
          tracker.doctor = null;
        }
        return;
      }
      await sleep(doctorPollIntervalMs, signal);
    }
  });
  tracker.doctor = worker;
  return worker;
}
