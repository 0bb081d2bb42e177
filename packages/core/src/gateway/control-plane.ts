import { isAbortError, toError, type GatewayError } from "../errors.js";
import type { GatewayClient } from "./client.js";
import { startDoctor } from "./doctor.js";
import { shutdown, stopWorker } from "./stop-worker.js";
import { runOneAttempt } from "./supervisor.js";
import { describeTracker, isDoctorAround, type SessionTracker, type TrackerSnapshot } from "./tracker.js";
import { sleep, waitForScheduled } from "./worker.js";

export type ControlPlaneStart =
  | {
      ok: true;
      attempt: number;
      tracker: SessionTracker;
      completion: Promise<void>;
    }
  | {
      ok: false;
      attempt: number;
      error: GatewayError;
      completion: Promise<void>;
    };

/**
 * Runs one attempt and brings it up in stages: heartbeat and processor must be
 * scheduled before the doctor starts, so the doctor never mistakes a worker
 * that has not started yet for a dead one.
 */
export async function startControlPlane(
  client: GatewayClient,
  attempt = 1,
  stopSignal?: AbortSignal
): Promise<ControlPlaneStart> {
  const handle = runOneAttempt(client, attempt, stopSignal);
  const start = await handle.ready;
  if (!start.ok) {
    return { ok: false, attempt, error: start.error, completion: handle.completion };
  }

  const { tracker } = start;
  const wait = {
    timeoutMs: client.timing.scheduleTimeoutMs,
    pollIntervalMs: client.timing.schedulePollIntervalMs,
    logger: tracker.logger
  };
  const heartbeatScheduled = await waitForScheduled(tracker.heartbeat, wait);
  const processorScheduled = await waitForScheduled(tracker.processor, wait);
  startDoctor(tracker);
  await waitForScheduled(tracker.doctor, wait);

  tracker.ready = heartbeatScheduled && processorScheduled;
  tracker.logger.info({ ready: tracker.ready }, "Control plane started");
  return { ok: true, attempt, tracker, completion: handle.completion };
}

export type ControlPlaneEventType =
  | "attempt.starting"
  | "attempt.ready"
  | "attempt.failed"
  | "attempt.finished"
  | "control_plane.stopped";

export interface ControlPlaneEvent {
  type: ControlPlaneEventType;
  timestamp: string;
  payload: Record<string, unknown>;
}

export type AttemptListener = (tracker: SessionTracker) => void;

const MAX_RETAINED_EVENTS = 500;

/**
 * The supervise loop. Each attempt gets a fresh tracker and event queue;
 * `onAttempt` listeners are told about every tracker that comes up so they can
 * subscribe to its queue.
 */
export class ControlPlane {
  private terminateRequested = false;
  private tracker: SessionTracker | null = null;
  private attemptCount = 0;
  private readonly stopController = new AbortController();
  private readonly attemptListeners = new Set<AttemptListener>();
  private readonly eventHandlers = new Set<(event: ControlPlaneEvent) => void>();
  private readonly events: ControlPlaneEvent[] = [];

  constructor(private readonly client: GatewayClient) {}

  get current(): SessionTracker | null {
    return this.tracker;
  }

  get attempts(): number {
    return this.attemptCount;
  }

  get stopping(): boolean {
    return this.terminateRequested;
  }

  onAttempt(listener: AttemptListener): () => void {
    this.attemptListeners.add(listener);
    return () => {
      this.attemptListeners.delete(listener);
    };
  }

  onRuntimeEvent(handler: (event: ControlPlaneEvent) => void): () => void {
    this.eventHandlers.add(handler);
    return () => {
      this.eventHandlers.delete(handler);
    };
  }

  listRuntimeEvents(limit = 100): ControlPlaneEvent[] {
    if (limit <= 0) {
      return [];
    }
    return this.events.slice(-limit);
  }

  /**
   * Runs attempts until shutdown. A failed handshake is retried after
   * `restartDelayMs`; missing credentials end the loop with a rejection.
   */
  async run(): Promise<void> {
    const logger = this.client.logger;
    while (!this.terminateRequested) {
      this.attemptCount += 1;
      const attempt = this.attemptCount;
      this.emitRuntimeEvent("attempt.starting", { attempt });

      const start = await startControlPlane(this.client, attempt, this.stopController.signal);
      if (!start.ok) {
        await start.completion;
        this.emitRuntimeEvent("attempt.failed", {
          attempt,
          code: start.error.code,
          message: start.error.message
        });
        if (start.error.code === "missing_credentials") {
          this.terminateRequested = true;
          this.emitRuntimeEvent("control_plane.stopped", { attempts: attempt, reason: start.error.code });
          throw start.error;
        }
        await this.pauseBeforeRestart(this.client.timing.restartDelayMs);
        continue;
      }

      const { tracker } = start;
      this.tracker = tracker;
      if (this.terminateRequested) {
        await shutdown(tracker);
      } else {
        this.emitRuntimeEvent("attempt.ready", { attempt, ready: tracker.ready });
        this.notifyAttempt(tracker);
      }

      await start.completion;
      if (isDoctorAround(tracker)) {
        await stopWorker(tracker, "doctor");
      }
      if (tracker.terminateRequested) {
        this.terminateRequested = true;
      }
      this.tracker = null;
      this.emitRuntimeEvent("attempt.finished", {
        attempt,
        sequence: tracker.sequence,
        terminateRequested: tracker.terminateRequested
      });
      if (!this.terminateRequested) {
        logger.info({ attempt }, "Attempt finished, restarting control plane");
      }
    }
    this.emitRuntimeEvent("control_plane.stopped", { attempts: this.attemptCount });
    logger.info({ attempts: this.attemptCount }, "Control plane stopped");
  }

  /** Stops the current attempt and prevents the next one. Idempotent. */
  async shutdown(): Promise<void> {
    this.terminateRequested = true;
    this.stopController.abort();
    const tracker = this.tracker;
    if (tracker) {
      await shutdown(tracker);
    }
  }

  describe(): TrackerSnapshot | null {
    return this.tracker ? describeTracker(this.tracker) : null;
  }

  private async pauseBeforeRestart(delayMs: number): Promise<void> {
    if (delayMs <= 0 || this.terminateRequested) {
      return;
    }
    try {
      await sleep(delayMs, this.stopController.signal);
    } catch (error) {
      if (!isAbortError(error)) {
        throw error;
      }
    }
  }

  private notifyAttempt(tracker: SessionTracker): void {
    for (const listener of this.attemptListeners) {
      try {
        listener(tracker);
      } catch (error) {
        tracker.logger.error({ err: toError(error) }, "Attempt listener failed");
      }
    }
  }

  private emitRuntimeEvent(type: ControlPlaneEventType, payload: Record<string, unknown>): void {
    const event: ControlPlaneEvent = {
      type,
      timestamp: new Date().toISOString(),
      payload
    };
    this.events.push(event);
    if (this.events.length > MAX_RETAINED_EVENTS) {
      this.events.splice(0, this.events.length - MAX_RETAINED_EVENTS);
    }
    for (const handler of this.eventHandlers) {
      handler(event);
    }
  }
}

/**
 * Blocks until `terminateSignal` aborts and the last attempt has wound down.
 */
export async function runControlPlane(
  client: GatewayClient,
  terminateSignal?: AbortSignal,
  onAttempt?: AttemptListener
): Promise<void> {
  const plane = new ControlPlane(client);
  if (onAttempt) {
    plane.onAttempt(onAttempt);
  }
  const requestShutdown = (): void => {
    plane.shutdown().catch((error: unknown) => {
      client.logger.error({ err: toError(error) }, "Shutdown failed");
    });
  };
  if (terminateSignal?.aborted) {
    requestShutdown();
  } else {
    terminateSignal?.addEventListener("abort", requestShutdown, { once: true });
  }
  try {
    await plane.run();
  } finally {
    terminateSignal?.removeEventListener("abort", requestShutdown);
  }
}
