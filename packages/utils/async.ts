/**
 * Async utilities for coordinating work between long-lived loops and
 * request handlers.
 *
 * @example
 * ```ts
 * import { AsyncQueue, Mutex } from "@agui-relay/utils/async";
 *
 * const queue = new AsyncQueue<string>();
 * queue.put("hello");
 * const item = await queue.get();
 *
 * const mutex = new Mutex();
 * await mutex.runExclusive(async () => {
 *   // only one caller at a time
 * });
 * ```
 *
 * @module
 */

import { createAbortError, TimeoutError } from "./error.ts";

/**
 * A Promise wrapper that allows external resolution/rejection.
 * Useful for bridging callback-based APIs with async/await.
 *
 * @example
 * ```ts
 * const completer = new Completer<string>();
 *
 * // Somewhere else in the code
 * completer.resolve("done");
 *
 * // Wait for the result
 * const result = await completer.wait();
 * ```
 */
export class Completer<T> {
  readonly #promise: Promise<T>;
  #resolve!: (value: T) => void;
  #reject!: (reason?: unknown) => void;
  #settled = false;
  readonly #cleanups: Array<() => void> = [];

  constructor() {
    this.#promise = new Promise((res, rej) => {
      this.#resolve = res;
      this.#reject = rej;
    });
  }

  /** Whether {@link resolve} or {@link reject} has been called. */
  get settled(): boolean {
    return this.#settled;
  }

  /**
   * Wait for the completer to be resolved or rejected.
   *
   * @param options.signal - AbortSignal to cancel the wait
   */
  wait(options?: { signal?: AbortSignal }): Promise<T> {
    const signal = options?.signal;
    if (signal && !this.#settled) {
      if (signal.aborted) {
        this.reject(createAbortError("Operation aborted"));
        return this.#promise;
      }

      const onAbort = () => {
        this.reject(createAbortError("Operation aborted"));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      // Long-lived signals are shared across many waits
      this.#cleanups.push(() => signal.removeEventListener("abort", onAbort));
    }
    return this.#promise;
  }

  resolve(value: T): void {
    if (this.#settled) return;
    this.#settled = true;
    this.#cleanup();
    this.#resolve(value);
  }

  reject(reason?: unknown): void {
    if (this.#settled) return;
    this.#settled = true;
    this.#cleanup();
    this.#reject(reason);
  }

  #cleanup(): void {
    for (const cleanup of this.#cleanups.splice(0)) cleanup();
  }
}

/**
 * Unbounded FIFO queue with an awaitable {@link get}.
 *
 * Any number of producers may {@link put}; items are handed to consumers in
 * insertion order, and pending consumers are served in the order they called
 * {@link get}.
 */
export class AsyncQueue<T> {
  readonly #items: T[] = [];
  readonly #waiters: Completer<T>[] = [];

  get size(): number {
    return this.#items.length;
  }

  put(item: T): void {
    // Skip waiters whose wait was aborted
    while (this.#waiters.length > 0) {
      const waiter = this.#waiters.shift();
      if (waiter && !waiter.settled) {
        waiter.resolve(item);
        return;
      }
    }
    this.#items.push(item);
  }

  /**
   * Take the next item, waiting for one to arrive if the queue is empty.
   *
   * @param options.signal - Abort the wait; rejects with an AbortError
   */
  get(options?: { signal?: AbortSignal }): Promise<T> {
    if (this.#items.length > 0) {
      const [item] = this.#items.splice(0, 1);
      return Promise.resolve(item);
    }
    const waiter = new Completer<T>();
    this.#waiters.push(waiter);
    return waiter.wait(options);
  }

  /** Remove and return every buffered item. Pending consumers keep waiting. */
  drain(): T[] {
    return this.#items.splice(0, this.#items.length);
  }
}

/**
 * Promise-based mutual exclusion lock.
 *
 * Waiters acquire the lock in FIFO order.
 */
export class Mutex {
  #tail: Promise<void> = Promise.resolve();
  #locked = false;

  get locked(): boolean {
    return this.#locked;
  }

  /**
   * Wait for the lock. Resolves with a release function that must be called
   * exactly once.
   */
  async acquire(): Promise<() => void> {
    const previous = this.#tail;
    const turn = new Completer<void>();
    this.#tail = previous.then(() => turn.wait());

    await previous;
    this.#locked = true;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.#locked = false;
      turn.resolve();
    };
  }

  /** Run `fn` while holding the lock. */
  async runExclusive<R>(fn: () => Promise<R> | R): Promise<R> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/**
 * Race `promise` against a timer.
 *
 * Rejects with a {@link TimeoutError} when `ms` elapses first. The timer is
 * always cleared, so a settled race never keeps the process alive.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  message = `Timed out after ${ms}ms`,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(message)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Resolve after `ms` milliseconds. */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
