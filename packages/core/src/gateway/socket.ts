import WebSocket from "ws";
import type { RawData } from "ws";
import { DEFAULT_SOCKET_BUFFERED_FRAMES } from "../constants.js";
import { GatewayError, toError } from "../errors.js";
import { abortError } from "./worker.js";

/**
 * Bidirectional text-frame connection to the gateway.
 *
 * `receive` resolves with the next frame, or with an empty string once the
 * connection has closed. Once closed, `send` rejects.
 */
export interface GatewaySocket {
  readonly isOpen: boolean;
  receive(signal?: AbortSignal): Promise<string>;
  send(frame: string): Promise<void>;
  close(code?: number, reason?: string): Promise<void>;
}

export type GatewaySocketFactory = (url: string) => Promise<GatewaySocket>;

function rawDataToText(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}

/**
 * Reads from the underlying socket stop while `maxBufferedFrames` frames wait
 * unread, so a stalled processor holds the gateway back instead of growing
 * the buffer.
 */
export class WebSocketGatewaySocket implements GatewaySocket {
  private readonly frames: string[] = [];
  private readonly waiters: Array<(frame: string) => void> = [];
  private closed = false;
  lastError: Error | null = null;

  constructor(
    private readonly ws: WebSocket,
    private readonly maxBufferedFrames = DEFAULT_SOCKET_BUFFERED_FRAMES
  ) {
    ws.on("message", (data: RawData) => {
      this.push(rawDataToText(data));
    });
    ws.on("error", (error: Error) => {
      // ws always emits close after error; the close handler releases readers.
      this.lastError = toError(error);
    });
    ws.on("close", () => {
      this.closed = true;
      for (const waiter of this.waiters.splice(0)) {
        waiter("");
      }
    });
  }

  get isOpen(): boolean {
    return !this.closed && this.ws.readyState === WebSocket.OPEN;
  }

  get bufferedFrames(): number {
    return this.frames.length;
  }

  get paused(): boolean {
    return this.ws.isPaused;
  }

  private push(frame: string): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(frame);
      return;
    }
    this.frames.push(frame);
    if (this.frames.length >= this.maxBufferedFrames && !this.ws.isPaused) {
      this.ws.pause();
    }
  }

  receive(signal?: AbortSignal): Promise<string> {
    const buffered = this.frames.shift();
    if (buffered !== undefined) {
      if (this.ws.isPaused && this.frames.length < this.maxBufferedFrames) {
        this.ws.resume();
      }
      return Promise.resolve(buffered);
    }
    if (this.closed) {
      return Promise.resolve("");
    }
    if (signal?.aborted) {
      return Promise.reject(abortError(signal));
    }
    return new Promise<string>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(abortError(signal));
      };
      const waiter = (frame: string): void => {
        signal?.removeEventListener("abort", onAbort);
        resolve(frame);
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  send(frame: string): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(new GatewayError("protocol_error", "Cannot send on a closed gateway socket"));
    }
    return new Promise<void>((resolve, reject) => {
      this.ws.send(frame, (error) => {
        if (error) {
          reject(toError(error));
          return;
        }
        resolve();
      });
    });
  }

  close(code = 1000, reason?: string): Promise<void> {
    if (this.closed || this.ws.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.ws.once("close", () => resolve());
      this.ws.close(code, reason);
    });
  }
}

export async function connectWebSocket(
  url: string,
  maxBufferedFrames = DEFAULT_SOCKET_BUFFERED_FRAMES
): Promise<WebSocketGatewaySocket> {
  const ws = new WebSocket(url);
  const socket = new WebSocketGatewaySocket(ws, maxBufferedFrames);
  await new Promise<void>((resolve, reject) => {
    const onOpen = (): void => {
      ws.off("close", onClose);
      resolve();
    };
    const onClose = (): void => {
      ws.off("open", onOpen);
      const detail = socket.lastError ? `: ${socket.lastError.message}` : "";
      reject(new GatewayError("handshake_failed", `WebSocket connection failed${detail}`, { cause: socket.lastError }));
    };
    ws.once("open", onOpen);
    ws.once("close", onClose);
  });
  return socket;
}
