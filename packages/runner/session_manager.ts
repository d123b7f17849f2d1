import { getLogger } from "@logtape/logtape";
import { Mutex } from "@agui-relay/utils";

import {
  SessionWorker,
  type SessionWorkerOptions,
} from "./session_worker.ts";
import type {
  ResumableOptions,
  VendorClientFactory,
} from "./vendor_client.ts";

const logger = getLogger(["agui-relay", "session"]);

export interface SessionManagerOptions<TOptions extends ResumableOptions>
  extends SessionWorkerOptions {
  createClient: VendorClientFactory<TOptions>;
}

/**
 * Creates, caches and tears down one {@link SessionWorker} per thread.
 *
 * Remembers the vendor session id of destroyed workers so that a recreated
 * worker resumes the same conversation.
 */
export class SessionManager<TOptions extends ResumableOptions> {
  readonly #createClient: VendorClientFactory<TOptions>;
  readonly #workerOptions: SessionWorkerOptions;
  readonly #workers = new Map<string, SessionWorker>();
  readonly #locks = new Map<string, Mutex>();
  readonly #sessionIds = new Map<string, string>();
  readonly #mapLock = new Mutex();

  constructor(options: SessionManagerOptions<TOptions>) {
    const { createClient, ...workerOptions } = options;
    this.#createClient = createClient;
    this.#workerOptions = workerOptions;
  }

  get size(): number {
    return this.#workers.size;
  }

  /**
   * Return the live worker for `threadId`, creating and starting one if
   * needed. A worker that has disconnected is replaced.
   */
  getOrCreate(threadId: string, options: TOptions): Promise<SessionWorker> {
    return this.#mapLock.runExclusive(() => {
      const existing = this.#workers.get(threadId);
      if (existing && !existing.closed) {
        return existing;
      }
      if (existing) {
        this.#remember(threadId, existing);
        logger.info("Replacing closed worker for thread {threadId}", {
          threadId,
        });
      }

      const resume = this.getSessionId(threadId);
      const workerOptions: TOptions = resume && options.resume === undefined
        ? { ...options, resume }
        : options;
      if (workerOptions.resume) {
        logger.info("Resuming session {resume} for thread {threadId}", {
          resume: workerOptions.resume,
          threadId,
        });
      }

      const worker = new SessionWorker(
        threadId,
        () => this.#createClient(workerOptions),
        this.#workerOptions,
      );
      worker.start();
      this.#workers.set(threadId, worker);
      if (!this.#locks.has(threadId)) {
        this.#locks.set(threadId, new Mutex());
      }
      logger.debug("Created worker for thread {threadId}", { threadId });
      return worker;
    });
  }

  getExisting(threadId: string): SessionWorker | undefined {
    return this.#workers.get(threadId);
  }

  /** Per-thread lock held for the whole run of a request. */
  getLock(threadId: string): Mutex {
    let lock = this.#locks.get(threadId);
    if (!lock) {
      lock = new Mutex();
      this.#locks.set(threadId, lock);
    }
    return lock;
  }

  /** The vendor session id of the thread, live or remembered. */
  getSessionId(threadId: string): string | undefined {
    return this.#workers.get(threadId)?.sessionId ??
      this.#sessionIds.get(threadId);
  }

  /** Stop and forget the worker, keeping its session id for a later resume. */
  async destroy(threadId: string): Promise<void> {
    const worker = await this.#mapLock.runExclusive(() => {
      const worker = this.#workers.get(threadId);
      this.#workers.delete(threadId);
      this.#locks.delete(threadId);
      if (worker) this.#remember(threadId, worker);
      return worker;
    });
    await worker?.stop();
    logger.debug("Destroyed worker for thread {threadId}", { threadId });
  }

  /**
   * Stop every worker. Workers are removed at once, so a request arriving
   * meanwhile gets a fresh worker that resumes the remembered session.
   */
  async shutdown(): Promise<void> {
    const workers = await this.#mapLock.runExclusive(() => {
      const workers = [...this.#workers.entries()];
      for (const [threadId, worker] of workers) {
        this.#remember(threadId, worker);
      }
      this.#workers.clear();
      this.#locks.clear();
      return workers.map(([, worker]) => worker);
    });
    await Promise.all(workers.map((worker) => worker.stop()));
    logger.info("All workers shut down");
  }

  #remember(threadId: string, worker: SessionWorker): void {
    if (worker.sessionId) {
      this.#sessionIds.set(threadId, worker.sessionId);
    }
  }
}
