import {
  type Options,
  query,
  type SDKUserMessage,
} from "@anthropic-ai/claude-agent-sdk";
import { getLogger } from "@logtape/logtape";
import { decodeVendorMessage, type VendorMessage } from "@agui-relay/agui";
import { AsyncQueue } from "@agui-relay/utils";

import type { VendorClient } from "../vendor_client.ts";

const logger = getLogger(["agui-relay", "claude"]);

/** The part of the SDK's `Query` this client relies on. */
export interface ClaudeQueryHandle extends AsyncIterator<unknown> {
  interrupt(): Promise<void>;
}

export type ClaudeQueryFn = (params: {
  prompt: AsyncIterable<SDKUserMessage>;
  options: Options;
}) => ClaudeQueryHandle;

/**
 * {@link VendorClient} over the Claude Agent SDK in streaming input mode.
 *
 * One SDK query, and so one CLI process, serves every turn of the thread.
 * Prompts are pushed into its input channel; a turn's output ends with the
 * `result` message.
 */
export class ClaudeAgentClient implements VendorClient {
  readonly #options: Options;
  readonly #queryFn: ClaudeQueryFn;
  readonly #input = new AsyncQueue<SDKUserMessage | null>();
  readonly #abortController = new AbortController();

  #handle: ClaudeQueryHandle | undefined;
  #inputClosed = false;
  #disconnected = false;

  constructor(options: Options, queryFn: ClaudeQueryFn = query) {
    this.#options = options;
    this.#queryFn = queryFn;
  }

  connect(): Promise<void> {
    if (this.#handle) return Promise.resolve();
    if (this.#disconnected) {
      return Promise.reject(new Error("Claude client has been disconnected"));
    }
    this.#handle = this.#queryFn({
      prompt: this.#prompts(),
      options: { ...this.#options, abortController: this.#abortController },
    });
    logger.debug("Opened Claude session (model {model}, resume {resume})", {
      model: this.#options.model ?? "default",
      resume: this.#options.resume ?? "none",
    });
    return Promise.resolve();
  }

  async *query(
    prompt: string,
    sessionId: string,
  ): AsyncGenerator<VendorMessage, void, undefined> {
    const handle = this.#requireHandle();
    if (this.#inputClosed) {
      throw new Error("Claude session input is closed");
    }

    this.#input.put({
      type: "user",
      message: { role: "user", content: prompt },
      parent_tool_use_id: null,
      session_id: sessionId,
    });

    while (true) {
      const next = await handle.next();
      if (next.done) {
        throw new Error("Claude session ended before the turn completed");
      }
      const message = decodeVendorMessage(next.value);
      yield message;
      if (message.kind === "result") return;
    }
  }

  async interrupt(): Promise<void> {
    await this.#requireHandle().interrupt();
  }

  /** End the prompt stream and wait for the CLI to finish writing its output. */
  async closeInput(): Promise<void> {
    if (this.#inputClosed) return;
    this.#inputClosed = true;
    this.#input.put(null);

    const handle = this.#handle;
    if (!handle) return;
    let remaining = 0;
    while (!(await handle.next()).done) {
      remaining++;
    }
    if (remaining > 0) {
      logger.debug("Discarded {remaining} messages after input closed", {
        remaining,
      });
    }
  }

  disconnect(): Promise<void> {
    if (this.#disconnected) return Promise.resolve();
    this.#disconnected = true;
    if (!this.#inputClosed) {
      this.#inputClosed = true;
      this.#input.put(null);
    }
    this.#abortController.abort();
    this.#handle = undefined;
    return Promise.resolve();
  }

  async *#prompts(): AsyncGenerator<SDKUserMessage, void, undefined> {
    while (true) {
      const message = await this.#input.get();
      if (message === null) return;
      yield message;
    }
  }

  #requireHandle(): ClaudeQueryHandle {
    if (!this.#handle) {
      throw new Error("Claude client is not connected");
    }
    return this.#handle;
  }
}

/** Factory for {@link SessionManager}. */
export function createClaudeAgentClient(options: Options): VendorClient {
  return new ClaudeAgentClient(options);
}
