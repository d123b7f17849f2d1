import type { AguiEvent } from "./events.ts";
import { createRunErrorEvent } from "./events.ts";
import { formatError } from "@agui-relay/utils";

/** Content type of an AG-UI event stream. */
export const SSE_CONTENT_TYPE = "text/event-stream";

export function formatSSEMessage(event: AguiEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

/**
 * Encode events as a server-sent event byte stream.
 *
 * An error thrown by `events` ends the stream with a `RUN_ERROR` event
 * carrying `ids`. Cancelling the stream returns the underlying iterator.
 */
export function encodeSSEStream(
  events: AsyncIterable<AguiEvent>,
  describeError: (error: unknown) => string = formatError,
  ids: { threadId?: string; runId?: string } = {},
): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const iterator = events[Symbol.asyncIterator]();

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const { value, done } = await iterator.next();
        if (done) {
          controller.close();
          return;
        }
        controller.enqueue(encoder.encode(formatSSEMessage(value)));
      } catch (error) {
        const errorEvent = createRunErrorEvent(describeError(error), ids);
        controller.enqueue(encoder.encode(formatSSEMessage(errorEvent)));
        controller.close();
      }
    },
    async cancel() {
      await iterator.return?.();
    },
  });
}
