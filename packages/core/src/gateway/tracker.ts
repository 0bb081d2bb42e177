import type { Logger } from "pino";
import type { GatewayEvent } from "../events/registry.js";
import type { ControlPlaneTiming } from "./client.js";
import { EventQueue } from "./event-queue.js";
import type { GatewaySocket } from "./socket.js";
import { isWorkerRunning, type BackgroundWorker, type WorkerName, type WorkerOutcome } from "./worker.js";

export interface SessionTrackerParams {
  attempt: number;
  socket: GatewaySocket;
  heartbeatIntervalMs: number;
  eventQueueCapacity: number;
  timing: ControlPlaneTiming;
  logger: Logger;
}

/**
 * State for one connection attempt. Created only after a successful Hello;
 * never reused by a later attempt.
 *
 * `sequence` has a single writer (the processor). Worker slots are filled at
 * start-up and cleared only by `stopWorker`.
 */
export class SessionTracker {
  readonly attempt: number;
  readonly socket: GatewaySocket;
  readonly heartbeatIntervalMs: number;
  readonly timing: ControlPlaneTiming;
  readonly logger: Logger;
  readonly events: EventQueue<GatewayEvent>;
  readonly createdAt = new Date().toISOString();

  sequence: number | null = null;
  ready = false;
  terminateRequested = false;
  heartbeat: BackgroundWorker | null = null;
  processor: BackgroundWorker | null = null;
  doctor: BackgroundWorker | null = null;

  constructor(params: SessionTrackerParams) {
    if (!Number.isInteger(params.heartbeatIntervalMs) || params.heartbeatIntervalMs <= 0) {
      throw new Error(`Heartbeat interval must be a positive integer, got ${params.heartbeatIntervalMs}`);
    }
    this.attempt = params.attempt;
    this.socket = params.socket;
    this.heartbeatIntervalMs = params.heartbeatIntervalMs;
    this.timing = params.timing;
    this.logger = params.logger;
    this.events = new EventQueue<GatewayEvent>(params.eventQueueCapacity);
  }

  worker(name: WorkerName): BackgroundWorker | null {
    return this[name];
  }
}

export type UnhealthyReason = "socket_closed" | "heartbeat_stopped" | "processor_stopped";

export type TrackerDiagnosis =
  | {
      healthy: true;
    }
  | {
      healthy: false;
      reason: UnhealthyReason;
    };

export function diagnoseTracker(tracker: SessionTracker): TrackerDiagnosis {
  if (!tracker.socket.isOpen) {
    return { healthy: false, reason: "socket_closed" };
  }
  if (!isWorkerRunning(tracker.heartbeat)) {
    return { healthy: false, reason: "heartbeat_stopped" };
  }
  if (!isWorkerRunning(tracker.processor)) {
    return { healthy: false, reason: "processor_stopped" };
  }
  return { healthy: true };
}

export function isOperational(tracker: SessionTracker): boolean {
  return diagnoseTracker(tracker).healthy;
}

export function isDoctorAround(tracker: SessionTracker): boolean {
  return isWorkerRunning(tracker.doctor);
}

export type WorkerState = WorkerOutcome | "absent";

export interface TrackerSnapshot {
  attempt: number;
  createdAt: string;
  connected: boolean;
  heartbeatIntervalMs: number;
  sequence: number | null;
  ready: boolean;
  terminateRequested: boolean;
  queuedEvents: number;
  workers: Record<WorkerName, WorkerState>;
}

function workerState(worker: BackgroundWorker | null): WorkerState {
  return worker ? worker.outcome : "absent";
}

export function describeTracker(tracker: SessionTracker): TrackerSnapshot {
  return {
    attempt: tracker.attempt,
    createdAt: tracker.createdAt,
    connected: tracker.socket.isOpen,
    heartbeatIntervalMs: tracker.heartbeatIntervalMs,
    sequence: tracker.sequence,
    ready: tracker.ready,
    terminateRequested: tracker.terminateRequested,
    queuedEvents: tracker.events.size,
    workers: {
      heartbeat: workerState(tracker.heartbeat),
      processor: workerState(tracker.processor),
      doctor: workerState(tracker.doctor)
    }
  };
}
