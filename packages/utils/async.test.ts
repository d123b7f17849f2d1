import { getEventListeners } from "node:events";
import { describe, expect, it } from "vitest";
import {
  AsyncQueue,
  Completer,
  delay,
  formatError,
  isAbortError,
  Mutex,
  TimeoutError,
  withTimeout,
} from "./mod.ts";

describe("Completer", () => {
  it("resolves with correct value", async () => {
    const completer = new Completer<boolean>();
    setTimeout(() => completer.resolve(true), 10);
    await expect(completer.wait({})).resolves.toBe(true);
  });

  it("rejects with provided error", async () => {
    const completer = new Completer<boolean>();
    completer.reject(new Error("Test error"));
    await expect(completer.wait({})).rejects.toThrow("Test error");
  });

  it("aborts when abort signal is triggered", async () => {
    const completer = new Completer<boolean>();
    const controller = new AbortController();
    const waiting = completer.wait({ signal: controller.signal });
    controller.abort();
    const error = await waiting.catch((e: unknown) => e);
    expect(isAbortError(error)).toBe(true);
    expect(formatError(error)).toBe("Operation aborted");
  });

  it("only honors first resolution", async () => {
    const completer = new Completer<number>();
    completer.resolve(1);
    completer.resolve(2);
    await expect(completer.wait({})).resolves.toBe(1);
  });

  it("ignores resolution after rejection", async () => {
    const completer = new Completer<number>();
    completer.reject(new Error("fail"));
    completer.resolve(1);
    await expect(completer.wait({})).rejects.toThrow("fail");
  });

  it("ignores abort signal after resolution", async () => {
    const completer = new Completer<number>();
    const controller = new AbortController();
    completer.resolve(1);
    controller.abort();
    await expect(completer.wait({ signal: controller.signal })).resolves.toBe(
      1,
    );
  });

  it("rejects immediately with pre-aborted signal", async () => {
    const completer = new Completer<number>();
    const controller = new AbortController();
    controller.abort();
    const error = await completer.wait({ signal: controller.signal }).catch(
      (e: unknown) => e,
    );
    expect(isAbortError(error)).toBe(true);
    expect(completer.settled).toBe(true);
  });

  it("delivers same resolution to multiple waiters", async () => {
    const completer = new Completer<number>();
    const p1 = completer.wait({});
    const p2 = completer.wait({});
    completer.resolve(42);
    expect(await p1).toBe(42);
    expect(await p2).toBe(42);
  });
});

describe("AsyncQueue", () => {
  it("hands out buffered items in insertion order", async () => {
    const queue = new AsyncQueue<string>();
    queue.put("a");
    queue.put("b");
    expect(queue.size).toBe(2);
    expect(await queue.get()).toBe("a");
    expect(await queue.get()).toBe("b");
    expect(queue.size).toBe(0);
  });

  it("serves pending consumers in the order they waited", async () => {
    const queue = new AsyncQueue<number>();
    const first = queue.get();
    const second = queue.get();
    queue.put(1);
    queue.put(2);
    expect(await first).toBe(1);
    expect(await second).toBe(2);
  });

  it("skips consumers whose wait was aborted", async () => {
    const queue = new AsyncQueue<number>();
    const controller = new AbortController();
    const aborted = queue.get({ signal: controller.signal });
    const live = queue.get();
    controller.abort();
    expect(isAbortError(await aborted.catch((e: unknown) => e))).toBe(true);

    queue.put(7);
    expect(await live).toBe(7);
    expect(queue.size).toBe(0);
  });

  it("releases abort listeners once each wait settles", async () => {
    const queue = new AsyncQueue<number>();
    const controller = new AbortController();

    for (let i = 0; i < 25; i++) {
      const next = queue.get({ signal: controller.signal });
      queue.put(i);
      expect(await next).toBe(i);
    }

    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });

  it("drains buffered items", () => {
    const queue = new AsyncQueue<number>();
    queue.put(1);
    queue.put(2);
    expect(queue.drain()).toEqual([1, 2]);
    expect(queue.size).toBe(0);
  });
});

describe("Mutex", () => {
  it("grants the lock in FIFO order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    await Promise.all(["a", "b", "c"].map((name) =>
      mutex.runExclusive(async () => {
        order.push(`${name}:start`);
        await delay(5);
        order.push(`${name}:end`);
      })
    ));

    expect(order).toEqual([
      "a:start",
      "a:end",
      "b:start",
      "b:end",
      "c:start",
      "c:end",
    ]);
  });

  it("releases the lock when the callback throws", async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(mutex.locked).toBe(false);
    await expect(mutex.runExclusive(() => 1)).resolves.toBe(1);
  });

  it("reports whether it is held", async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    expect(mutex.locked).toBe(true);
    release();
    release();
    expect(mutex.locked).toBe(false);
  });
});

describe("withTimeout", () => {
  it("returns the value when the promise settles first", async () => {
    await expect(withTimeout(Promise.resolve("ok"), 50)).resolves.toBe("ok");
  });

  it("rejects with TimeoutError when the timer fires first", async () => {
    const pending = new Promise<never>(() => {});
    const result = withTimeout(pending, 10, "too slow");
    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow("too slow");
  });
});
