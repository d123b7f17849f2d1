/**
 * One long-lived vendor client per conversation thread.
 *
 * The worker's background loop is the only code that touches its
 * {@link VendorClient}. Callers talk to it through an inbound
 * {@link AsyncQueue} of turns; each turn answers on its own
 * {@link ReplaySubject}, which completes when the turn is over.
 *
 * @example
 * ```ts
 * const worker = new SessionWorker("thread-1", () => createClient(options));
 * worker.start();
 *
 * for await (const message of worker.query("Hello", "thread-1")) {
 *   console.log(message.kind);
 * }
 *
 * await worker.stop();
 * ```
 *
 * @module
 */

import { getLogger } from "@logtape/logtape";
import { ReplaySubject } from "rxjs";
import { eachValueFrom } from "rxjs-for-await";
import type { VendorMessage } from "@agui-relay/agui";
import {
  AsyncQueue,
  formatError,
  isAbortError,
  TimeoutError,
  withTimeout,
} from "@agui-relay/utils";

import { WorkerClosedError } from "./error.ts";
import type { VendorClient } from "./vendor_client.ts";

const logger = getLogger(["agui-relay", "session"]);

export const DEFAULT_GRACEFUL_DISCONNECT_TIMEOUT_MS = 5_000;
export const DEFAULT_STOP_TIMEOUT_MS = 15_000;

export type SessionWorkerStatus =
  | "created"
  | "connecting"
  | "serving"
  | "draining"
  | "disconnected";

/** What a turn publishes before it completes. */
export type TurnResult =
  | { type: "message"; message: VendorMessage }
  | { type: "error"; error: unknown };

type InboxItem =
  | {
    kind: "turn";
    prompt: string;
    sessionId: string;
    output: ReplaySubject<TurnResult>;
  }
  | { kind: "shutdown" };

type Turn = Extract<InboxItem, { kind: "turn" }>;

export interface SessionWorkerOptions {
  /** How long the vendor gets to persist the session on shutdown. */
  gracefulDisconnectTimeoutMs?: number;
  /** How long {@link SessionWorker.stop} waits before force-cancelling. */
  stopTimeoutMs?: number;
}

export class SessionWorker {
  readonly threadId: string;

  readonly #createClient: () => VendorClient;
  readonly #inbox = new AsyncQueue<InboxItem>();
  readonly #abortController = new AbortController();
  readonly #gracefulDisconnectTimeoutMs: number;
  readonly #stopTimeoutMs: number;

  #client: VendorClient | undefined;
  #loop: Promise<void> | undefined;
  #stopping: Promise<void> | undefined;
  #status: SessionWorkerStatus = "created";
  #sessionId: string | undefined;

  constructor(
    threadId: string,
    createClient: () => VendorClient,
    options: SessionWorkerOptions = {},
  ) {
    this.threadId = threadId;
    this.#createClient = createClient;
    this.#gracefulDisconnectTimeoutMs = options.gracefulDisconnectTimeoutMs ??
      DEFAULT_GRACEFUL_DISCONNECT_TIMEOUT_MS;
    this.#stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
  }

  get status(): SessionWorkerStatus {
    return this.#status;
  }

  /** Vendor session id from the latest `system/init` message, used to resume. */
  get sessionId(): string | undefined {
    return this.#sessionId;
  }

  get closed(): boolean {
    return this.#status === "draining" || this.#status === "disconnected";
  }

  /** Spawn the background loop. Calling it again has no effect. */
  start(): void {
    if (this.#loop) return;
    this.#loop = this.#run(this.#abortController.signal);
    logger.info("Started worker for thread {threadId}", {
      threadId: this.threadId,
    });
  }

  /**
   * Send `prompt` to the vendor and yield its messages until the turn ends.
   *
   * Concurrent callers are served one turn at a time, in the order their
   * iteration began. A turn's error is re-thrown here.
   */
  async *query(
    prompt: string,
    sessionId = "default",
  ): AsyncGenerator<VendorMessage, void, undefined> {
    if (this.closed) {
      throw new WorkerClosedError(this.threadId);
    }
    this.start();

    const output = new ReplaySubject<TurnResult>();
    this.#inbox.put({ kind: "turn", prompt, sessionId, output });

    for await (const result of eachValueFrom(output)) {
      if (result.type === "error") {
        throw result.error;
      }
      yield result.message;
    }
  }

  /** Forward an interrupt to the vendor. Failures are logged, not thrown. */
  async interrupt(): Promise<void> {
    const client = this.#client;
    if (!client || this.#status !== "serving") {
      logger.warn("Interrupt requested but no active client for {threadId}", {
        threadId: this.threadId,
      });
      return;
    }
    try {
      await client.interrupt();
    } catch (error) {
      logger.warn("Interrupt failed for {threadId}: {error}", {
        threadId: this.threadId,
        error: formatError(error),
      });
    }
  }

  /**
   * Ask the loop to finish, waiting at most `stopTimeoutMs` before
   * force-cancelling it. Idempotent.
   */
  stop(): Promise<void> {
    const loop = this.#loop;
    if (!loop) {
      this.#status = "disconnected";
      return Promise.resolve();
    }
    this.#stopping ??= this.#stop(loop);
    return this.#stopping;
  }

  async #stop(loop: Promise<void>): Promise<void> {
    this.#inbox.put({ kind: "shutdown" });
    try {
      await withTimeout(loop, this.#stopTimeoutMs);
      return;
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
    }

    logger.warn("Worker for thread {threadId} did not stop in time, cancelling", {
      threadId: this.threadId,
    });
    this.#abortController.abort();
    await this.#client?.disconnect().catch((error: unknown) => {
      logger.warn("Force disconnect failed for {threadId}: {error}", {
        threadId: this.threadId,
        error: formatError(error),
      });
    });
    try {
      await withTimeout(loop, this.#gracefulDisconnectTimeoutMs);
    } catch (error) {
      logger.error("Worker for thread {threadId} is unresponsive: {error}", {
        threadId: this.threadId,
        error: formatError(error),
      });
    }
  }

  async #run(signal: AbortSignal): Promise<void> {
    this.#status = "connecting";
    let client: VendorClient | undefined;

    try {
      client = this.#createClient();
      this.#client = client;
      await client.connect();
    } catch (error) {
      logger.error("Failed to connect for thread {threadId}: {error}", {
        threadId: this.threadId,
        error: formatError(error),
      });
      await this.#failFirstTurn(error, signal);
      await this.#finish(client);
      return;
    }

    this.#status = "serving";
    logger.info("Connected for thread {threadId}", { threadId: this.threadId });

    try {
      while (true) {
        const item = await this.#inbox.get({ signal });
        if (item.kind === "shutdown") {
          logger.info("Shutdown signal for thread {threadId}", {
            threadId: this.threadId,
          });
          break;
        }
        await this.#serveTurn(client, item);
      }
    } catch (error) {
      if (!isAbortError(error)) {
        logger.error("Fatal error for thread {threadId}: {error}", {
          threadId: this.threadId,
          error: formatError(error),
        });
      }
    } finally {
      await this.#finish(client);
    }
  }

  async #serveTurn(client: VendorClient, turn: Turn): Promise<void> {
    try {
      for await (const message of client.query(turn.prompt, turn.sessionId)) {
        if (
          message.kind === "system" && message.subtype === "init" &&
          message.sessionId
        ) {
          this.#sessionId = message.sessionId;
        }
        turn.output.next({ type: "message", message });
      }
    } catch (error) {
      logger.error("Error during query for thread {threadId}: {error}", {
        threadId: this.threadId,
        error: formatError(error),
      });
      turn.output.next({ type: "error", error });
    } finally {
      turn.output.complete();
    }
  }

  /** A failed connection is reported through the next turn, if one comes. */
  async #failFirstTurn(error: unknown, signal: AbortSignal): Promise<void> {
    try {
      const item = await this.#inbox.get({ signal });
      if (item.kind === "turn") {
        item.output.next({ type: "error", error });
        item.output.complete();
      }
    } catch (waitError) {
      if (!isAbortError(waitError)) {
        logger.error("Failed to report connection error for {threadId}: {error}", {
          threadId: this.threadId,
          error: formatError(waitError),
        });
      }
    }
  }

  async #finish(client: VendorClient | undefined): Promise<void> {
    this.#status = "draining";

    for (const item of this.#inbox.drain()) {
      if (item.kind === "turn") {
        item.output.next({
          type: "error",
          error: new WorkerClosedError(this.threadId),
        });
        item.output.complete();
      }
    }

    if (client) {
      await this.#gracefulDisconnect(client);
    }
    this.#status = "disconnected";
    logger.info("Disconnected for thread {threadId}", {
      threadId: this.threadId,
    });
  }

  /** Close the input channel, give the vendor time to persist, then disconnect. */
  async #gracefulDisconnect(client: VendorClient): Promise<void> {
    try {
      await withTimeout(client.closeInput(), this.#gracefulDisconnectTimeoutMs);
    } catch (error) {
      logger.warn("Graceful close failed for thread {threadId}: {error}", {
        threadId: this.threadId,
        error: formatError(error),
      });
    } finally {
      try {
        await client.disconnect();
      } catch (error) {
        logger.warn("Disconnect failed for thread {threadId}: {error}", {
          threadId: this.threadId,
          error: formatError(error),
        });
      }
    }
  }
}
