import type { AguiEvent } from "./events.ts";
import type { StreamChunk, VendorMessage } from "./vendor_message.ts";

export function chunk(value: StreamChunk): VendorMessage {
  return { kind: "stream", chunk: value, parentToolUseId: null };
}

export async function* streamOf(
  messages: VendorMessage[],
  failure?: Error,
): AsyncGenerator<VendorMessage> {
  for (const message of messages) {
    yield message;
  }
  if (failure) throw failure;
}

export async function collect(
  events: AsyncIterable<AguiEvent>,
): Promise<AguiEvent[]> {
  const out: AguiEvent[] = [];
  for await (const event of events) {
    out.push(event);
  }
  return out;
}

/** Collect events until the iterable throws; returns both. */
export async function collectUntilError(
  events: AsyncIterable<AguiEvent>,
): Promise<{ events: AguiEvent[]; error: unknown }> {
  const out: AguiEvent[] = [];
  try {
    for await (const event of events) {
      out.push(event);
    }
  } catch (error) {
    return { events: out, error };
  }
  return { events: out, error: undefined };
}
