import { abortError } from "./worker.js";

interface PendingPut<T> {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

type PendingTake<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Bounded FIFO between the processor and the application. `put` waits while
 * the queue is full, `take` waits while it is empty. After `close`, takers
 * drain whatever is buffered and then see `done`.
 */
export class EventQueue<T> implements AsyncIterable<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly pendingPuts: Array<PendingPut<T>> = [];
  private readonly pendingTakes: Array<PendingTake<T>> = [];
  private closedFlag = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Event queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.closedFlag;
  }

  put(item: T, signal?: AbortSignal): Promise<void> {
    if (this.closedFlag) {
      return Promise.reject(new Error("Event queue is closed"));
    }
    if (signal?.aborted) {
      return Promise.reject(abortError(signal));
    }
    const taker = this.pendingTakes.shift();
    if (taker) {
      taker({ value: item, done: false });
      return Promise.resolve();
    }
    if (this.items.length < this.capacity) {
      this.items.push({ value: item });
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.pendingPuts.indexOf(pending);
        if (index >= 0) {
          this.pendingPuts.splice(index, 1);
        }
        reject(abortError(signal));
      };
      const pending: PendingPut<T> = {
        item,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
        reject: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        }
      };
      this.pendingPuts.push(pending);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  take(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    const entry = this.items.shift();
    if (entry) {
      this.admitPendingPut();
      return Promise.resolve({ value: entry.value, done: false });
    }
    if (this.closedFlag) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (signal?.aborted) {
      return Promise.reject(abortError(signal));
    }
    return new Promise<IteratorResult<T, undefined>>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.pendingTakes.indexOf(taker);
        if (index >= 0) {
          this.pendingTakes.splice(index, 1);
        }
        reject(abortError(signal));
      };
      const taker: PendingTake<T> = (result) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(result);
      };
      this.pendingTakes.push(taker);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Removes and returns everything currently buffered without waiting. */
  drain(): T[] {
    const drained = this.items.splice(0).map((entry) => entry.value);
    while (this.pendingPuts.length > 0 && this.items.length < this.capacity) {
      this.admitPendingPut();
    }
    return drained;
  }

  close(): void {
    if (this.closedFlag) {
      return;
    }
    this.closedFlag = true;
    for (const taker of this.pendingTakes.splice(0)) {
      taker({ value: undefined, done: true });
    }
    for (const pending of this.pendingPuts.splice(0)) {
      pending.reject(new Error("Event queue is closed"));
    }
  }

  private admitPendingPut(): void {
    const pending = this.pendingPuts.shift();
    if (!pending) {
      return;
    }
    this.items.push({ value: pending.item });
    pending.resolve();
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.take()
    };
  }
}
