/**
 * Run-level AG-UI framing around {@link AguiStreamTranslator}.
 *
 * @example
 * ```ts
 * import { createAguiEventStream, encodeSSEStream } from "@agui-relay/agui";
 *
 * const events = createAguiEventStream(input, {
 *   query: (prompt) => worker.query(prompt, threadId),
 * });
 * return new Response(encodeSSEStream(events), {
 *   headers: { "Content-Type": "text/event-stream" },
 * });
 * ```
 */

import type { RunAgentInput } from "@ag-ui/core";
import { getLogger } from "@logtape/logtape";
import { formatError } from "@agui-relay/utils";

import {
  type AguiEvent,
  createRunErrorEvent,
  createRunFinishedEvent,
  createRunStartedEvent,
  createStateSnapshotEvent,
} from "./events.ts";
import { extractUserMessage, hasState } from "./messages.ts";
import { extractToolNames } from "./tools.ts";
import { AguiStreamTranslator } from "./translator.ts";
import type { VendorMessage } from "./vendor_message.ts";

const logger = getLogger(["agui-relay", "agui"]);

/** A run request, optionally branched from an earlier run. */
export type RunInput = RunAgentInput & { parentRunId?: string };

export interface AguiEventStreamOptions {
  /** Submit the prompt and stream the vendor's answer. */
  query: (prompt: string) => AsyncIterable<VendorMessage>;
  /** Called when a frontend tool call halts the run. */
  onHalt?: () => void;
  /** Message for the `RUN_ERROR` event; defaults to the error text. */
  describeError?: (error: unknown) => string;
}

/**
 * Produce the complete event sequence of one run: `RUN_STARTED`, an initial
 * `STATE_SNAPSHOT` when state was provided, the translated stream, and
 * `RUN_FINISHED` or `RUN_ERROR`.
 */
export async function* createAguiEventStream(
  input: RunInput,
  options: AguiEventStreamOptions,
): AsyncGenerator<AguiEvent, void, undefined> {
  const { threadId, runId, parentRunId } = input;

  try {
    if (parentRunId) {
      logger.debug("Run {runId} is branched from {parentRunId}", {
        runId,
        parentRunId,
      });
    }

    yield createRunStartedEvent(threadId, runId, {
      parentRunId,
      input: {
        threadId,
        runId,
        parentRunId,
        messages: input.messages,
        tools: input.tools,
        state: input.state,
        context: input.context,
        forwardedProps: input.forwardedProps,
      },
    });

    const prompt = extractUserMessage(input.messages);
    const frontendToolNames = extractToolNames(input.tools);
    if (frontendToolNames.length > 0) {
      logger.debug("Frontend tools: {frontendToolNames}", {
        frontendToolNames,
      });
    }

    if (!prompt) {
      logger.warn("No user message found in {count} messages", {
        count: input.messages.length,
      });
      yield createRunFinishedEvent(threadId, runId);
      return;
    }

    if (hasState(input.state)) {
      yield createStateSnapshotEvent(input.state);
    }

    const translator = new AguiStreamTranslator({
      threadId,
      runId,
      inputMessages: input.messages,
      frontendToolNames,
      state: input.state,
      onHalt: options.onHalt,
    });
    yield* translator.translate(options.query(prompt));

    yield createRunFinishedEvent(threadId, runId, translator.resultData);
  } catch (error) {
    logger.error("Error in run {runId}: {error}", {
      runId,
      error: formatError(error),
    });
    yield createRunErrorEvent(
      options.describeError?.(error) ?? formatError(error),
      { threadId, runId },
    );
  }
}
