import { GatewayError } from "../errors.js";
import type { SessionTracker } from "./tracker.js";
import { sleep, type WorkerName } from "./worker.js";

/**
 * Interrupts a worker until it reports completion, then clears its slot.
 * Returns false when the worker is still running after `stopTimeoutMs`; the
 * slot is left set in that case.
 */
export async function stopWorker(tracker: SessionTracker, name: WorkerName): Promise<boolean> {
  const worker = tracker.worker(name);
  if (!worker) {
    return true;
  }

  const { stopTimeoutMs, stopPollIntervalMs } = tracker.timing;
  const started = Date.now();
  while (!worker.done) {
    if (Date.now() - started >= stopTimeoutMs) {
      const error = new GatewayError(
        "cancellation_timeout",
        `${name} worker did not stop within ${stopTimeoutMs}ms`
      );
      tracker.logger.error({ err: error, worker: name }, "Unable to stop worker");
      return false;
    }
    worker.interrupt();
    await Promise.race([worker.completion, sleep(stopPollIntervalMs)]);
  }

  if (tracker[name] === worker) {
    tracker[name] = null;
  }
  tracker.logger.debug({ worker: name, outcome: worker.outcome }, "Worker stopped");
  return true;
}

/** Cancels the two core workers of an attempt. The doctor is left alone. */
export async function stopControlPlane(tracker: SessionTracker): Promise<boolean> {
  const processorStopped = await stopWorker(tracker, "processor");
  const heartbeatStopped = await stopWorker(tracker, "heartbeat");
  return processorStopped && heartbeatStopped;
}

/**
 * Stops the attempt and marks it as the last one. Safe to call more than once;
 * later calls find the slots already cleared.
 */
export async function shutdown(tracker: SessionTracker): Promise<boolean> {
  if (!tracker.terminateRequested) {
    tracker.terminateRequested = true;
    tracker.logger.info("Shutdown requested");
  }
  const doctorStopped = await stopWorker(tracker, "doctor");
  const workersStopped = await stopControlPlane(tracker);
  return doctorStopped && workersStopped;
}
