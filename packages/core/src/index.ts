export { defineConfig } from "./config.js";
export type { ControlPlaneTimingConfig, GatewireConfig, IdentifyPropertiesConfig } from "./config.js";
export * from "./constants.js";
export {
  GatewayError,
  isAbortError,
  isGatewayError,
  toError,
  toGatewayError
} from "./errors.js";
export type { GatewayErrorCode } from "./errors.js";
export { createLogger, redactToken } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";

export {
  buildGatewayUrl,
  decodeEnvelope,
  encodeHeartbeat,
  encodeIdentify,
  GatewayOpcode,
  readHelloInterval
} from "./gateway/codec.js";
export type { GatewayEnvelope, IdentifyPayload, IdentifyProperties } from "./gateway/codec.js";
export { createGatewayClient, resolveTiming } from "./gateway/client.js";
export type { ControlPlaneTiming, GatewayClient, GatewayClientOptions } from "./gateway/client.js";
export { connectWebSocket, WebSocketGatewaySocket } from "./gateway/socket.js";
export type { GatewaySocket, GatewaySocketFactory } from "./gateway/socket.js";
export { EventQueue } from "./gateway/event-queue.js";
export { BackgroundWorker, isWorkerRunning, waitForScheduled } from "./gateway/worker.js";
export type { WorkerName, WorkerOutcome } from "./gateway/worker.js";
export {
  describeTracker,
  diagnoseTracker,
  isDoctorAround,
  isOperational,
  SessionTracker
} from "./gateway/tracker.js";
export type { TrackerDiagnosis, TrackerSnapshot, UnhealthyReason, WorkerState } from "./gateway/tracker.js";
export { startHeartbeat } from "./gateway/heartbeat.js";
export { routeEnvelope, startProcessor } from "./gateway/processor.js";
export { startDoctor } from "./gateway/doctor.js";
export { shutdown, stopControlPlane, stopWorker } from "./gateway/stop-worker.js";
export { runOneAttempt } from "./gateway/supervisor.js";
export type { AttemptHandle, AttemptStart } from "./gateway/supervisor.js";
export { ControlPlane, runControlPlane, startControlPlane } from "./gateway/control-plane.js";
export type {
  AttemptListener,
  ControlPlaneEvent,
  ControlPlaneEventType,
  ControlPlaneStart
} from "./gateway/control-plane.js";
export { makeGatewayUrl, resolveAuthToken, resolveGatewayUrl } from "./gateway/rest.js";

export { decodeEvent, eventSchemas, isGatewayEvent, isKnownEventName, schemaFor } from "./events/registry.js";
export type {
  DecodeEventResult,
  EventPayload,
  GatewayEvent,
  KnownEventName,
  KnownGatewayEvent
} from "./events/registry.js";
