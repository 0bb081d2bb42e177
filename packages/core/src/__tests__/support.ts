import { createGatewayClient, createLogger, type GatewayClient, type GatewayClientOptions, type GatewaySocket } from "../index.js";

export const FAST_TIMING = {
  doctorPollIntervalMs: 10,
  doctorGracePeriodMs: 20,
  stopTimeoutMs: 500,
  stopPollIntervalMs: 5,
  scheduleTimeoutMs: 500,
  schedulePollIntervalMs: 5,
  helloTimeoutMs: 200,
  restartDelayMs: 0
};

export const HELLO_FRAME = JSON.stringify({ op: 10, d: { heartbeat_interval: 41250 } });

export function silentLogger() {
  return createLogger({ level: "silent" });
}

function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) {
    return signal.reason;
  }
  const error = new Error("The operation was aborted");
  error.name = "AbortError";
  return error;
}

interface Waiter {
  resolve: (frame: string) => void;
  detach: () => void;
}

/** In-memory gateway connection fed by the test. */
export class ScriptedSocket implements GatewaySocket {
  readonly sent: string[] = [];
  closeCalls = 0;
  private readonly frames: string[] = [];
  private readonly waiters: Waiter[] = [];
  private open = true;

  constructor(frames: string[] = []) {
    this.frames.push(...frames);
  }

  get isOpen(): boolean {
    return this.open;
  }

  push(frame: string): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.detach();
      waiter.resolve(frame);
      return;
    }
    this.frames.push(frame);
  }

  pushJson(value: unknown): void {
    this.push(JSON.stringify(value));
  }

  receive(signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    const frame = this.frames.shift();
    if (frame !== undefined) {
      return Promise.resolve(frame);
    }
    if (!this.open) {
      return Promise.resolve("");
    }
    return new Promise<string>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        if (signal) {
          reject(abortReason(signal));
        }
      };
      const waiter: Waiter = {
        resolve,
        detach: () => signal?.removeEventListener("abort", onAbort)
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  async send(frame: string): Promise<void> {
    if (!this.open) {
      throw new Error("socket is closed");
    }
    this.sent.push(frame);
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
    this.drop();
  }

  /** The remote end goes away: pending and later reads see the empty frame. */
  drop(): void {
    this.open = false;
    for (const waiter of this.waiters.splice(0)) {
      waiter.detach();
      waiter.resolve("");
    }
  }
}

export function makeClient(
  sockets: ScriptedSocket[],
  overrides: Partial<GatewayClientOptions> = {}
): { client: GatewayClient; connectedUrls: string[] } {
  const connectedUrls: string[] = [];
  const client = createGatewayClient({
    token: "test-secret",
    gatewayUrl: "wss://gateway.test",
    env: {},
    logger: silentLogger(),
    random: () => 0.5,
    timing: FAST_TIMING,
    connect: async (url) => {
      connectedUrls.push(url);
      const socket = sockets.shift();
      if (!socket) {
        throw new Error("no scripted socket left");
      }
      return socket;
    },
    ...overrides
  });
  return { client, connectedUrls };
}

export async function waitFor(condition: () => boolean, timeoutMs = 2_000): Promise<void> {
  const started = Date.now();
  while (!condition()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
