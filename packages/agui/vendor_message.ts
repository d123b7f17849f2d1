/**
 * Closed set of vendor messages the translator understands.
 *
 * Raw Claude Agent SDK messages are decoded exactly once, at the client
 * boundary, by {@link decodeVendorMessage}. Anything unrecognised becomes an
 * `unknown` variant instead of being probed for fields later on.
 *
 * @module
 */

import * as z from "zod";

export type ContentBlock =
  | { type: "text"; text: string }
  | { type: "thinking"; thinking: string; signature?: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | {
    type: "tool_result";
    toolUseId: string;
    content: unknown;
    isError?: boolean;
  }
  | { type: "other"; blockType: string };

/** Incremental chunks of a streamed assistant message. */
export type StreamChunk =
  | { type: "message_start" }
  | {
    type: "content_block_start";
    block:
      | { type: "text" }
      | { type: "thinking" }
      | { type: "tool_use"; id: string; name: string }
      | { type: "other"; blockType: string };
  }
  | { type: "text_delta"; text: string }
  | { type: "thinking_delta"; thinking: string }
  | { type: "input_json_delta"; partialJson: string }
  | { type: "content_block_stop" }
  | { type: "message_delta"; stopReason?: string }
  | { type: "message_stop" }
  | { type: "other"; chunkType: string };

export interface ResultMessageData {
  subtype: string;
  isError: boolean;
  result?: string;
  durationMs?: number;
  durationApiMs?: number;
  numTurns?: number;
  totalCostUsd?: number;
  usage?: unknown;
  structuredOutput?: unknown;
  sessionId?: string;
}

export type VendorMessage =
  | { kind: "stream"; chunk: StreamChunk; parentToolUseId: string | null }
  | {
    kind: "assistant";
    content: ContentBlock[];
    parentToolUseId: string | null;
  }
  | { kind: "user"; content: ContentBlock[]; parentToolUseId: string | null }
  | {
    kind: "system";
    subtype: string;
    sessionId?: string;
    text?: string;
    data: Record<string, unknown>;
  }
  | ({ kind: "result" } & ResultMessageData)
  | { kind: "unknown"; type: string };

const ParentIdSchema = z.string().nullish().transform((v) => v ?? null);

const RawBlockSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({
    type: z.literal("thinking"),
    thinking: z.string(),
    signature: z.string().optional(),
  }),
  z.object({
    type: z.literal("tool_use"),
    id: z.string(),
    name: z.string(),
    input: z.record(z.string(), z.unknown()).nullish(),
  }),
  z.object({
    type: z.literal("tool_result"),
    tool_use_id: z.string(),
    content: z.unknown(),
    is_error: z.boolean().nullish(),
  }),
]);

const RawStreamEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("message_start") }),
  z.object({
    type: z.literal("content_block_start"),
    content_block: z.object({
      type: z.string(),
      id: z.string().optional(),
      name: z.string().optional(),
    }),
  }),
  z.object({
    type: z.literal("content_block_delta"),
    delta: z.object({
      type: z.string(),
      text: z.string().optional(),
      thinking: z.string().optional(),
      partial_json: z.string().optional(),
    }),
  }),
  z.object({ type: z.literal("content_block_stop") }),
  z.object({
    type: z.literal("message_delta"),
    delta: z.object({ stop_reason: z.string().nullish() }).optional(),
  }),
  z.object({ type: z.literal("message_stop") }),
]);

const RawMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("stream_event"),
    event: z.looseObject({ type: z.string() }),
    parent_tool_use_id: ParentIdSchema,
  }),
  z.object({
    type: z.literal("assistant"),
    message: z.object({ content: z.array(z.unknown()) }),
    parent_tool_use_id: ParentIdSchema,
  }),
  z.object({
    type: z.literal("user"),
    message: z.object({ content: z.union([z.string(), z.array(z.unknown())]) }),
    parent_tool_use_id: ParentIdSchema,
  }),
  z.looseObject({
    type: z.literal("system"),
    subtype: z.string().default(""),
    session_id: z.string().optional(),
  }),
  z.object({
    type: z.literal("result"),
    subtype: z.string(),
    is_error: z.boolean().default(false),
    result: z.string().optional(),
    duration_ms: z.number().optional(),
    duration_api_ms: z.number().optional(),
    num_turns: z.number().optional(),
    total_cost_usd: z.number().optional(),
    usage: z.unknown(),
    structured_output: z.unknown(),
    session_id: z.string().optional(),
  }),
]);

function decodeBlock(raw: unknown): ContentBlock {
  const parsed = RawBlockSchema.safeParse(raw);
  if (!parsed.success) {
    const blockType = z.object({ type: z.string() }).safeParse(raw);
    return {
      type: "other",
      blockType: blockType.success ? blockType.data.type : "unknown",
    };
  }
  const block = parsed.data;
  switch (block.type) {
    case "text":
      return block;
    case "thinking":
      return block.signature === undefined
        ? { type: "thinking", thinking: block.thinking }
        : block;
    case "tool_use":
      return {
        type: "tool_use",
        id: block.id,
        name: block.name,
        input: block.input ?? {},
      };
    case "tool_result":
      return {
        type: "tool_result",
        toolUseId: block.tool_use_id,
        content: block.content,
        ...(block.is_error != null ? { isError: block.is_error } : {}),
      };
  }
}

function decodeContent(content: string | unknown[]): ContentBlock[] {
  if (typeof content === "string") {
    return content ? [{ type: "text", text: content }] : [];
  }
  return content.map(decodeBlock);
}

/** Decode one raw `stream_event` payload. */
export function decodeStreamChunk(raw: unknown): StreamChunk {
  const parsed = RawStreamEventSchema.safeParse(raw);
  if (!parsed.success) {
    const chunkType = z.object({ type: z.string() }).safeParse(raw);
    return {
      type: "other",
      chunkType: chunkType.success ? chunkType.data.type : "unknown",
    };
  }
  const event = parsed.data;
  switch (event.type) {
    case "message_start":
    case "content_block_stop":
    case "message_stop":
      return { type: event.type };
    case "content_block_start": {
      const block = event.content_block;
      if (block.type === "text" || block.type === "thinking") {
        return { type: "content_block_start", block: { type: block.type } };
      }
      if (block.type === "tool_use" && block.id) {
        return {
          type: "content_block_start",
          block: { type: "tool_use", id: block.id, name: block.name ?? "unknown" },
        };
      }
      return {
        type: "content_block_start",
        block: { type: "other", blockType: block.type },
      };
    }
    case "content_block_delta": {
      const delta = event.delta;
      if (delta.type === "text_delta") {
        return { type: "text_delta", text: delta.text ?? "" };
      }
      if (delta.type === "thinking_delta") {
        return { type: "thinking_delta", thinking: delta.thinking ?? "" };
      }
      if (delta.type === "input_json_delta") {
        return { type: "input_json_delta", partialJson: delta.partial_json ?? "" };
      }
      return { type: "other", chunkType: delta.type };
    }
    case "message_delta": {
      const stopReason = event.delta?.stop_reason;
      return stopReason
        ? { type: "message_delta", stopReason }
        : { type: "message_delta" };
    }
  }
}

/**
 * Decode a raw SDK message into a {@link VendorMessage}.
 *
 * Never throws: malformed or unrecognised input yields an `unknown` variant.
 */
export function decodeVendorMessage(raw: unknown): VendorMessage {
  const parsed = RawMessageSchema.safeParse(raw);
  if (!parsed.success) {
    const type = z.object({ type: z.string() }).safeParse(raw);
    return { kind: "unknown", type: type.success ? type.data.type : "unknown" };
  }
  const message = parsed.data;
  switch (message.type) {
    case "stream_event":
      return {
        kind: "stream",
        chunk: decodeStreamChunk(message.event),
        parentToolUseId: message.parent_tool_use_id,
      };
    case "assistant":
    case "user":
      return {
        kind: message.type,
        content: decodeContent(message.message.content),
        parentToolUseId: message.parent_tool_use_id,
      };
    case "system": {
      const { type: _type, subtype, session_id, ...data } = message;
      const text = systemText(data);
      return {
        kind: "system",
        subtype,
        ...(session_id !== undefined ? { sessionId: session_id } : {}),
        ...(text !== undefined ? { text } : {}),
        data,
      };
    }
    case "result":
      return {
        kind: "result",
        subtype: message.subtype,
        isError: message.is_error,
        result: message.result,
        durationMs: message.duration_ms,
        durationApiMs: message.duration_api_ms,
        numTurns: message.num_turns,
        totalCostUsd: message.total_cost_usd,
        usage: message.usage,
        structuredOutput: message.structured_output,
        sessionId: message.session_id,
      };
  }
}

function systemText(data: Record<string, unknown>): string | undefined {
  for (const key of ["message", "text"]) {
    const value = data[key];
    if (typeof value === "string" && value) return value;
  }
  return undefined;
}
