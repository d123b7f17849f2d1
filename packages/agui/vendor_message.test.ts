import { describe, expect, it } from "vitest";

import { decodeStreamChunk, decodeVendorMessage } from "./vendor_message.ts";

describe("decodeVendorMessage", () => {
  it("decodes stream events with their parent tool use id", () => {
    expect(decodeVendorMessage({
      type: "stream_event",
      event: {
        type: "content_block_delta",
        index: 0,
        delta: { type: "text_delta", text: "Hi" },
      },
      parent_tool_use_id: "tool-7",
      session_id: "s-1",
    })).toEqual({
      kind: "stream",
      chunk: { type: "text_delta", text: "Hi" },
      parentToolUseId: "tool-7",
    });
  });

  it("decodes assistant content blocks", () => {
    expect(decodeVendorMessage({
      type: "assistant",
      message: {
        id: "msg_1",
        role: "assistant",
        content: [
          { type: "text", text: "Checking" },
          { type: "tool_use", id: "tool-1", name: "search", input: { q: "x" } },
          { type: "server_tool_use", id: "srv-1" },
        ],
      },
      parent_tool_use_id: null,
    })).toEqual({
      kind: "assistant",
      parentToolUseId: null,
      content: [
        { type: "text", text: "Checking" },
        { type: "tool_use", id: "tool-1", name: "search", input: { q: "x" } },
        { type: "other", blockType: "server_tool_use" },
      ],
    });
  });

  it("decodes user tool results and plain string content", () => {
    expect(decodeVendorMessage({
      type: "user",
      message: {
        role: "user",
        content: [{
          type: "tool_result",
          tool_use_id: "tool-1",
          content: "ok",
          is_error: false,
        }],
      },
      parent_tool_use_id: null,
    })).toEqual({
      kind: "user",
      parentToolUseId: null,
      content: [{
        type: "tool_result",
        toolUseId: "tool-1",
        content: "ok",
        isError: false,
      }],
    });

    expect(decodeVendorMessage({
      type: "user",
      message: { role: "user", content: "hello" },
    })).toEqual({
      kind: "user",
      parentToolUseId: null,
      content: [{ type: "text", text: "hello" }],
    });
  });

  it("decodes system messages and their text", () => {
    expect(decodeVendorMessage({
      type: "system",
      subtype: "init",
      session_id: "s-1",
      model: "test-model",
    })).toEqual({
      kind: "system",
      subtype: "init",
      sessionId: "s-1",
      data: { model: "test-model" },
    });

    expect(decodeVendorMessage({
      type: "system",
      subtype: "notice",
      message: "Heads up",
    })).toMatchObject({ kind: "system", text: "Heads up" });
  });

  it("decodes result messages", () => {
    expect(decodeVendorMessage({
      type: "result",
      subtype: "success",
      is_error: false,
      result: "All done",
      duration_ms: 10,
      duration_api_ms: 8,
      num_turns: 1,
      total_cost_usd: 0.5,
      usage: { input_tokens: 3 },
      session_id: "s-1",
    })).toEqual({
      kind: "result",
      subtype: "success",
      isError: false,
      result: "All done",
      durationMs: 10,
      durationApiMs: 8,
      numTurns: 1,
      totalCostUsd: 0.5,
      usage: { input_tokens: 3 },
      structuredOutput: undefined,
      sessionId: "s-1",
    });
  });

  it("falls back to an unknown variant", () => {
    expect(decodeVendorMessage({ type: "tool_progress" }))
      .toEqual({ kind: "unknown", type: "tool_progress" });
    expect(decodeVendorMessage(42))
      .toEqual({ kind: "unknown", type: "unknown" });
  });
});

describe("decodeStreamChunk", () => {
  it("decodes block starts", () => {
    expect(decodeStreamChunk({
      type: "content_block_start",
      content_block: { type: "tool_use", id: "tool-1", name: "mcp__x__y" },
    })).toEqual({
      type: "content_block_start",
      block: { type: "tool_use", id: "tool-1", name: "mcp__x__y" },
    });
    expect(decodeStreamChunk({
      type: "content_block_start",
      content_block: { type: "thinking", thinking: "" },
    })).toEqual({ type: "content_block_start", block: { type: "thinking" } });
  });

  it("decodes deltas", () => {
    expect(decodeStreamChunk({
      type: "content_block_delta",
      delta: { type: "input_json_delta", partial_json: '{"a"' },
    })).toEqual({ type: "input_json_delta", partialJson: '{"a"' });
    expect(decodeStreamChunk({
      type: "content_block_delta",
      delta: { type: "signature_delta", signature: "sig" },
    })).toEqual({ type: "other", chunkType: "signature_delta" });
    expect(decodeStreamChunk({
      type: "message_delta",
      delta: { stop_reason: "tool_use" },
    })).toEqual({ type: "message_delta", stopReason: "tool_use" });
  });
});
