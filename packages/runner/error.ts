/**
 * Thrown when an interrupt targets a thread that has no live session.
 */
export class NoActiveSessionError extends Error {
  constructor(message = "No active session") {
    super(message);
    this.name = "NoActiveSessionError";
  }
}

/** Thrown by {@link ClaudeBridge.run} before a runner context is set. */
export class ContextNotSetError extends Error {
  constructor() {
    super("Context not set, call setContext() first");
    this.name = "ContextNotSetError";
  }
}

/** Thrown for turns submitted to a worker that has stopped. */
export class WorkerClosedError extends Error {
  readonly threadId: string;

  constructor(threadId: string) {
    super(`Session worker for thread ${threadId} is closed`);
    this.name = "WorkerClosedError";
    this.threadId = threadId;
  }
}
