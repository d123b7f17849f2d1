import type { VendorMessage } from "@agui-relay/agui";

/**
 * A long-lived connection to the agent vendor.
 *
 * Only the owning {@link SessionWorker} loop calls these methods, one turn at
 * a time.
 */
export interface VendorClient {
  connect(): Promise<void>;

  /**
   * Submit a prompt and stream the vendor's answer. The iterable ends after
   * the turn's result message.
   */
  query(prompt: string, sessionId: string): AsyncIterable<VendorMessage>;

  /** Ask the vendor to stop the turn in progress. */
  interrupt(): Promise<void>;

  /**
   * Close the input channel so the vendor can persist the session. Resolves
   * once the vendor has finished.
   */
  closeInput(): Promise<void>;

  /** Tear down the connection. Safe to call more than once. */
  disconnect(): Promise<void>;
}

/** Options every vendor accepts, so a recreated worker can resume. */
export interface ResumableOptions {
  resume?: string;
}

export type VendorClientFactory<TOptions> = (options: TOptions) => VendorClient;
