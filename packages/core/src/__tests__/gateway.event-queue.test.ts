import { describe, expect, it } from "vitest";
import { EventQueue } from "../index.js";

describe("EventQueue", () => {
  it("delivers items in insertion order", async () => {
    const queue = new EventQueue<number>(3);
    await queue.put(1);
    await queue.put(2);
    await queue.put(3);
    expect(queue.size).toBe(3);
    expect(await queue.take()).toEqual({ value: 1, done: false });
    expect(await queue.take()).toEqual({ value: 2, done: false });
    expect(await queue.take()).toEqual({ value: 3, done: false });
  });

  it("blocks the producer while full", async () => {
    const queue = new EventQueue<string>(1);
    await queue.put("a");
    let admitted = false;
    const pending = queue.put("b").then(() => {
      admitted = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(admitted).toBe(false);

    expect(await queue.take()).toEqual({ value: "a", done: false });
    await pending;
    expect(admitted).toBe(true);
    expect(queue.drain()).toEqual(["b"]);
  });

  it("hands an item straight to a waiting consumer", async () => {
    const queue = new EventQueue<string>(1);
    const next = queue.take();
    await queue.put("direct");
    expect(await next).toEqual({ value: "direct", done: false });
    expect(queue.size).toBe(0);
  });

  it("aborts a blocked put", async () => {
    const queue = new EventQueue<number>(1);
    await queue.put(1);
    const controller = new AbortController();
    const pending = queue.put(2, controller.signal);
    controller.abort();
    const error = await pending.catch((reason: unknown) => reason);
    expect(error instanceof Error ? error.name : error).toBe("AbortError");
    expect(queue.drain()).toEqual([1]);
  });

  it("ends iteration after close once buffered items are consumed", async () => {
    const queue = new EventQueue<string>(5);
    await queue.put("x");
    await queue.put("y");
    queue.close();
    await expect(queue.put("z")).rejects.toThrowError("Event queue is closed");

    const seen: string[] = [];
    for await (const item of queue) {
      seen.push(item);
    }
    expect(seen).toEqual(["x", "y"]);
  });

  it("releases waiting consumers on close", async () => {
    const queue = new EventQueue<number>(2);
    const next = queue.take();
    queue.close();
    expect(await next).toEqual({ value: undefined, done: true });
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new EventQueue(0)).toThrowError("Event queue capacity must be a positive integer, got 0");
  });
});
