import type { Logger } from "pino";
import { isAbortError, toError } from "../errors.js";

export type WorkerName = "heartbeat" | "processor" | "doctor";

export type WorkerOutcome = "pending" | "running" | "completed" | "cancelled" | "failed";

export type WorkerBody = (signal: AbortSignal) => Promise<void>;

export function abortError(signal?: AbortSignal): Error {
  if (signal?.reason instanceof Error) {
    return signal.reason;
  }
  const error = new Error("The operation was aborted");
  error.name = "AbortError";
  return error;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortError(signal));
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortError(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * A cancellable background loop. The body starts on the next turn of the
 * event loop; `scheduled` flips once it does and `done` once it settles.
 * Cancellation is cooperative: `interrupt` aborts the signal handed to the
 * body, which must observe it at every suspension point.
 */
export class BackgroundWorker {
  private readonly controller = new AbortController();
  private outcomeState: WorkerOutcome = "pending";
  private failure: Error | null = null;
  readonly completion: Promise<void>;

  constructor(
    readonly name: WorkerName,
    private readonly logger: Logger,
    body: WorkerBody
  ) {
    this.completion = new Promise<void>((resolve) => {
      setImmediate(() => {
        this.outcomeState = "running";
        body(this.controller.signal)
          .then(
            () => {
              this.outcomeState = this.controller.signal.aborted ? "cancelled" : "completed";
              this.logger.info(`Finished ${this.name} loop`);
            },
            (error: unknown) => {
              if (isAbortError(error) && this.controller.signal.aborted) {
                this.outcomeState = "cancelled";
                this.logger.info(`${this.name} loop stopped by control plane`);
                return;
              }
              this.outcomeState = "failed";
              this.failure = toError(error);
              this.logger.error({ err: this.failure }, `${this.name} loop exited with error`);
            }
          )
          .finally(() => resolve());
      });
    });
  }

  get outcome(): WorkerOutcome {
    return this.outcomeState;
  }

  get error(): Error | null {
    return this.failure;
  }

  get scheduled(): boolean {
    return this.outcomeState !== "pending";
  }

  get done(): boolean {
    return this.outcomeState !== "pending" && this.outcomeState !== "running";
  }

  get running(): boolean {
    return this.outcomeState === "running";
  }

  interrupt(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }
}

export function isWorkerRunning(worker: BackgroundWorker | null): boolean {
  return worker !== null && worker.running;
}

export interface ScheduleWaitOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  logger: Logger;
}

// Workers are normally scheduled on the next tick; this only guards against a starved loop.
export async function waitForScheduled(
  worker: BackgroundWorker | null,
  options: ScheduleWaitOptions
): Promise<boolean> {
  if (!worker) {
    options.logger.warn("Worker handle is absent, nothing to wait for");
    return false;
  }
  const started = Date.now();
  while (Date.now() - started <= options.timeoutMs) {
    if (worker.scheduled) {
      options.logger.debug({ worker: worker.name, elapsedMs: Date.now() - started }, "Worker scheduled");
      return true;
    }
    await sleep(options.pollIntervalMs);
  }
  options.logger.warn({ worker: worker.name, timeoutMs: options.timeoutMs }, "Worker never got scheduled");
  return false;
}
