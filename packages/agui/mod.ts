/**
 * AG-UI protocol translation for Claude Agent SDK message streams.
 *
 * @example
 * ```typescript
 * import { createAguiEventStream, encodeSSEStream } from "@agui-relay/agui";
 *
 * const events = createAguiEventStream(input, { query });
 * return new Response(encodeSSEStream(events), {
 *   headers: { "Content-Type": "text/event-stream" },
 * });
 * ```
 *
 * @module
 */

// Run framing and SSE encoding
export { createAguiEventStream } from "./adapter.ts";
export type { AguiEventStreamOptions, RunInput } from "./adapter.ts";
export { encodeSSEStream, formatSSEMessage, SSE_CONTENT_TYPE } from "./sse.ts";

// Stream translation
export {
  AguiStreamTranslator,
  createTranslatorState,
  mergeState,
  resolveStateUpdates,
} from "./translator.ts";
export type { TranslatorOptions, TranslatorState } from "./translator.ts";

// Vendor messages
export { decodeStreamChunk, decodeVendorMessage } from "./vendor_message.ts";
export type {
  ContentBlock,
  ResultMessageData,
  StreamChunk,
  VendorMessage,
} from "./vendor_message.ts";

// Events
export {
  createMessagesSnapshotEvent,
  createRunErrorEvent,
  createRunFinishedEvent,
  createRunStartedEvent,
  createStateSnapshotEvent,
  createTextMessageEvents,
} from "./events.ts";
export type {
  AguiEvent,
  NamedToolMessage,
  RunMessage,
  RunResultData,
  SnapshotMessage,
  TextMessageRole,
} from "./events.ts";

// Messages and tools
export {
  buildAssistantMessage,
  buildStateContextAddendum,
  buildToolMessage,
  extractUserMessage,
  hasState,
  normalizeToolResultContent,
} from "./messages.ts";
export {
  AGUI_MCP_SERVER_NAME,
  aguiToolFullName,
  extractToolNames,
  isStateTool,
  STATE_TOOL_FULL_NAME,
  STATE_TOOL_NAME,
  stripMcpPrefix,
} from "./tools.ts";
