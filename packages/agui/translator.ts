/**
 * Stateful translation of a vendor message stream into AG-UI events.
 *
 * One {@link AguiStreamTranslator} handles one run. It keeps text messages,
 * thinking blocks and tool calls correctly framed, turns state tool calls into
 * `STATE_SNAPSHOT` events, halts on frontend tool calls, and always closes
 * whatever is still open when the stream ends or fails.
 *
 * @module
 */

import { randomUUID } from "node:crypto";

import { EventType } from "@ag-ui/core";
import type { Message, ToolCall } from "@ag-ui/core";
import { getLogger } from "@logtape/logtape";
import { formatError } from "@agui-relay/utils";

import {
  type AguiEvent,
  createMessagesSnapshotEvent,
  createStateSnapshotEvent,
  createTextMessageEvents,
  type RunMessage,
  type RunResultData,
  type SnapshotMessage,
} from "./events.ts";
import { buildAssistantMessage, buildToolMessage } from "./messages.ts";
import { isStateTool, stripMcpPrefix } from "./tools.ts";
import type {
  ContentBlock,
  ResultMessageData,
  StreamChunk,
  VendorMessage,
} from "./vendor_message.ts";

const logger = getLogger(["agui-relay", "translator"]);

export interface TranslatorOptions {
  threadId: string;
  runId: string;
  /** Messages the run was started with; they lead the final snapshot. */
  inputMessages?: readonly Message[];
  /** Tools executed by the client. Calling one halts the stream. */
  frontendToolNames?: Iterable<string>;
  /** Shared state at the start of the run. */
  state?: unknown;
  /** Called once, right after the halting `TOOL_CALL_END` was emitted. */
  onHalt?: () => void;
}

interface OpenToolCall {
  id: string;
  rawName: string;
  displayName: string;
  args: string;
}

interface PendingMessage {
  id: string;
  content: string;
  toolCalls: ToolCall[];
}

/** Mutable per-run translation state. */
export interface TranslatorState {
  currentMessageId: string | undefined;
  hasStreamedText: boolean;
  inThinkingBlock: boolean;
  thinkingText: string;
  /** Tool call whose input is currently streaming. */
  toolCall: OpenToolCall | undefined;
  /** Tool calls with a `TOOL_CALL_START` but no `TOOL_CALL_END` yet. */
  unendedToolCallIds: Set<string>;
  /** Tool use ids already announced, to skip them in whole messages. */
  processedToolIds: Set<string>;
  /** State tool calls, whose results are never forwarded. */
  stateToolIds: Set<string>;
  toolNameById: Map<string, string>;
  pending: PendingMessage | undefined;
  runMessages: RunMessage[];
  currentState: unknown;
  resultData: RunResultData | undefined;
  halted: boolean;
  messageCount: number;
}

export function createTranslatorState(state?: unknown): TranslatorState {
  return {
    currentMessageId: undefined,
    hasStreamedText: false,
    inThinkingBlock: false,
    thinkingText: "",
    toolCall: undefined,
    unendedToolCallIds: new Set(),
    processedToolIds: new Set(),
    stateToolIds: new Set(),
    toolNameById: new Map(),
    pending: undefined,
    runMessages: [],
    currentState: state,
    resultData: undefined,
    halted: false,
    messageCount: 0,
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

type StateUpdate = { ok: true; updates: unknown } | { ok: false };

/**
 * Extract the update carried by a state tool payload. Accepts
 * `{ state_updates: {...} }`, `{ state_updates: "<json>" }` or a bare object.
 */
export function resolveStateUpdates(payload: unknown): StateUpdate {
  if (!isPlainObject(payload)) return { ok: false };
  let updates: unknown = "state_updates" in payload
    ? payload.state_updates
    : payload;
  if (typeof updates === "string") {
    try {
      updates = JSON.parse(updates);
    } catch (error) {
      logger.warn("Failed to parse state_updates JSON: {error}", {
        error: formatError(error),
      });
      return { ok: false };
    }
  }
  return { ok: true, updates };
}

/** Shallow-merge two objects; any other update replaces the state. */
export function mergeState(current: unknown, updates: unknown): unknown {
  if (isPlainObject(current) && isPlainObject(updates)) {
    return { ...current, ...updates };
  }
  return updates;
}

export class AguiStreamTranslator {
  readonly #options: TranslatorOptions;
  readonly #frontendToolNames: ReadonlySet<string>;
  readonly #state: TranslatorState;

  constructor(options: TranslatorOptions) {
    this.#options = options;
    this.#frontendToolNames = new Set(options.frontendToolNames ?? []);
    this.#state = createTranslatorState(options.state);
  }

  /** Whether a frontend tool call stopped event emission. */
  get halted(): boolean {
    return this.#state.halted;
  }

  /** Shared state after every update applied so far. */
  get currentState(): unknown {
    return this.#state.currentState;
  }

  /** Metadata from the vendor's result message, once received. */
  get resultData(): RunResultData | undefined {
    return this.#state.resultData;
  }

  /**
   * Consume `stream` to its end and yield the corresponding events.
   *
   * After a halt the stream is still drained, but nothing more is emitted
   * from it. A stream error is re-thrown once open messages and tool calls
   * are closed and the messages snapshot is out.
   */
  async *translate(
    stream: AsyncIterable<VendorMessage>,
  ): AsyncGenerator<AguiEvent, void, undefined> {
    const s = this.#state;
    const { threadId } = this.#options;
    let failure: { error: unknown } | undefined;

    logger.info("Processing message stream for thread {threadId}", {
      threadId,
    });

    try {
      for await (const message of stream) {
        s.messageCount++;
        if (s.halted) {
          logger.debug("Halted, draining message #{count}", {
            count: s.messageCount,
          });
          continue;
        }

        yield* this.#handleMessage(message);

        if (s.halted) {
          this.#options.onHalt?.();
        }
      }
    } catch (error) {
      failure = { error };
      logger.error("Fatal error in message stream: {error}", {
        error: formatError(error),
      });
    }

    yield* this.#cleanup();

    if (s.runMessages.length > 0) {
      const messages: SnapshotMessage[] = [
        ...(this.#options.inputMessages ?? []),
        ...s.runMessages.map((message): SnapshotMessage => {
          if (message.role !== "tool") return message;
          const name = s.toolNameById.get(message.toolCallId);
          return name === undefined ? message : { ...message, name };
        }),
      ];
      logger.debug(
        "Messages snapshot: {total} messages ({count} vendor messages processed)",
        { total: messages.length, count: s.messageCount },
      );
      yield createMessagesSnapshotEvent(messages);
    }

    if (failure) {
      throw failure.error;
    }
  }

  #handleMessage(message: VendorMessage): AguiEvent[] {
    switch (message.kind) {
      case "stream":
        return this.#handleChunk(message.chunk);
      case "assistant":
      case "user":
        return this.#handleWholeMessage(
          message.kind,
          message.content,
          message.parentToolUseId,
        );
      case "system":
        return this.#handleSystemText(message.text);
      case "result":
        return this.#handleResult(message);
      case "unknown":
        logger.debug("Ignoring vendor message of type {type}", {
          type: message.type,
        });
        return [];
    }
  }

  #handleChunk(chunk: StreamChunk): AguiEvent[] {
    const s = this.#state;
    const timestamp = Date.now();

    switch (chunk.type) {
      case "message_start": {
        s.currentMessageId = randomUUID();
        s.hasStreamedText = false;
        s.pending = { id: s.currentMessageId, content: "", toolCalls: [] };
        return [];
      }

      case "text_delta": {
        const messageId = s.currentMessageId;
        if (!chunk.text || messageId === undefined) return [];
        const events: AguiEvent[] = [];
        if (!s.hasStreamedText) {
          events.push({
            type: EventType.TEXT_MESSAGE_START,
            messageId,
            role: "assistant",
            timestamp,
          });
          s.hasStreamedText = true;
        }
        if (s.pending) s.pending.content += chunk.text;
        events.push({
          type: EventType.TEXT_MESSAGE_CONTENT,
          messageId,
          delta: chunk.text,
          timestamp,
        });
        return events;
      }

      case "thinking_delta": {
        // Deltas only belong to an open thinking block
        if (!chunk.thinking || !s.inThinkingBlock) return [];
        s.thinkingText += chunk.thinking;
        return [{
          type: EventType.THINKING_TEXT_MESSAGE_CONTENT,
          delta: chunk.thinking,
          timestamp,
        }];
      }

      case "input_json_delta": {
        const toolCall = s.toolCall;
        if (!chunk.partialJson || !toolCall) return [];
        toolCall.args += chunk.partialJson;
        if (isStateTool(toolCall.rawName)) return [];
        return [{
          type: EventType.TOOL_CALL_ARGS,
          toolCallId: toolCall.id,
          delta: chunk.partialJson,
          timestamp,
        }];
      }

      case "content_block_start": {
        const block = chunk.block;
        if (block.type === "thinking") {
          s.inThinkingBlock = true;
          return [
            { type: EventType.THINKING_START, timestamp },
            { type: EventType.THINKING_TEXT_MESSAGE_START, timestamp },
          ];
        }
        if (block.type !== "tool_use") return [];

        const displayName = stripMcpPrefix(block.name);
        s.toolCall = {
          id: block.id,
          rawName: block.name,
          displayName,
          args: "",
        };
        s.processedToolIds.add(block.id);
        if (isStateTool(block.name)) {
          s.stateToolIds.add(block.id);
          return [];
        }
        s.toolNameById.set(block.id, displayName);
        s.unendedToolCallIds.add(block.id);
        return [{
          type: EventType.TOOL_CALL_START,
          toolCallId: block.id,
          toolCallName: displayName,
          ...(s.currentMessageId !== undefined
            ? { parentMessageId: s.currentMessageId }
            : {}),
          timestamp,
        }];
      }

      case "content_block_stop":
        return [...this.#closeThinking(), ...this.#closeStreamedToolCall()];

      case "message_stop": {
        this.#flushPending();
        const events = this.#closeText();
        s.currentMessageId = undefined;
        return events;
      }

      case "message_delta":
        if (chunk.stopReason) {
          logger.debug("Message stop reason: {stopReason}", {
            stopReason: chunk.stopReason,
          });
        }
        return [];

      case "other":
        return [];
    }
  }

  #closeThinking(): AguiEvent[] {
    const s = this.#state;
    if (!s.inThinkingBlock) return [];
    s.inThinkingBlock = false;
    const timestamp = Date.now();
    if (s.thinkingText) {
      this.#upsert({
        id: randomUUID(),
        role: "developer",
        content: s.thinkingText,
      });
      s.thinkingText = "";
    }
    return [
      { type: EventType.THINKING_TEXT_MESSAGE_END, timestamp },
      { type: EventType.THINKING_END, timestamp },
    ];
  }

  #closeStreamedToolCall(): AguiEvent[] {
    const s = this.#state;
    const toolCall = s.toolCall;
    if (!toolCall) return [];
    s.toolCall = undefined;

    if (isStateTool(toolCall.rawName)) {
      return this.#applyStateArgs(toolCall.args);
    }

    s.pending?.toolCalls.push({
      id: toolCall.id,
      type: "function",
      function: { name: toolCall.displayName, arguments: toolCall.args },
    });

    if (!this.#frontendToolNames.has(toolCall.displayName)) {
      // Backend tools are closed by their result
      return [];
    }

    // No message_stop follows the interrupt, so flush now
    this.#flushPending();
    const events: AguiEvent[] = [this.#endToolCall(toolCall.id)];
    events.push(...this.#closeText());
    s.currentMessageId = undefined;
    s.halted = true;
    logger.debug("Frontend tool halt: {toolName}", {
      toolName: toolCall.displayName,
    });
    return events;
  }

  #applyStateArgs(args: string): AguiEvent[] {
    let payload: unknown;
    try {
      payload = JSON.parse(args);
    } catch (error) {
      logger.warn("Failed to parse tool JSON for state update: {error}", {
        error: formatError(error),
      });
      return [];
    }
    return this.#applyStatePayload(payload);
  }

  #applyStatePayload(payload: unknown): AguiEvent[] {
    const update = resolveStateUpdates(payload);
    if (!update.ok) return [];
    const s = this.#state;
    s.currentState = mergeState(s.currentState, update.updates);
    return [createStateSnapshotEvent(s.currentState)];
  }

  #handleWholeMessage(
    kind: "assistant" | "user",
    content: readonly ContentBlock[],
    parentToolUseId: string | null,
  ): AguiEvent[] {
    const s = this.#state;
    const events: AguiEvent[] = [];

    if (kind === "assistant") {
      const message = buildAssistantMessage(
        content,
        s.currentMessageId ?? randomUUID(),
      );
      if (message) this.#upsert(message);
    }

    for (const block of content) {
      if (block.type === "tool_use") {
        events.push(...this.#handleToolUseBlock(block, parentToolUseId));
      } else if (block.type === "tool_result") {
        events.push(...this.#handleToolResultBlock(block));
      }
    }
    return events;
  }

  #handleToolUseBlock(
    block: Extract<ContentBlock, { type: "tool_use" }>,
    parentToolUseId: string | null,
  ): AguiEvent[] {
    const s = this.#state;
    if (s.processedToolIds.has(block.id)) return [];
    s.processedToolIds.add(block.id);

    if (isStateTool(block.name)) {
      s.stateToolIds.add(block.id);
      return this.#applyStatePayload(block.input);
    }

    const displayName = stripMcpPrefix(block.name);
    s.toolNameById.set(block.id, displayName);
    s.unendedToolCallIds.add(block.id);

    const timestamp = Date.now();
    const events: AguiEvent[] = [{
      type: EventType.TOOL_CALL_START,
      toolCallId: block.id,
      toolCallName: displayName,
      ...(parentToolUseId !== null ? { parentMessageId: parentToolUseId } : {}),
      timestamp,
    }];
    if (Object.keys(block.input).length > 0) {
      events.push({
        type: EventType.TOOL_CALL_ARGS,
        toolCallId: block.id,
        delta: JSON.stringify(block.input),
        timestamp,
      });
    }
    return events;
  }

  #handleToolResultBlock(
    block: Extract<ContentBlock, { type: "tool_result" }>,
  ): AguiEvent[] {
    const s = this.#state;
    if (s.stateToolIds.has(block.toolUseId)) return [];

    const message = buildToolMessage(block.toolUseId, block.content);
    this.#upsert(message);
    return [
      this.#endToolCall(block.toolUseId),
      {
        type: EventType.TOOL_CALL_RESULT,
        toolCallId: block.toolUseId,
        messageId: message.id,
        content: message.content,
        role: "tool",
        timestamp: Date.now(),
      },
    ];
  }

  #handleSystemText(text: string | undefined): AguiEvent[] {
    if (!text) return [];
    const id = randomUUID();
    this.#upsert({ id, role: "system", content: text });
    return createTextMessageEvents(id, text, "system");
  }

  #handleResult(result: ResultMessageData): AguiEvent[] {
    const s = this.#state;
    s.resultData = {
      isError: result.isError,
      durationMs: result.durationMs,
      durationApiMs: result.durationApiMs,
      numTurns: result.numTurns,
      totalCostUsd: result.totalCostUsd,
      usage: result.usage,
      structuredOutput: result.structuredOutput,
    };

    if (s.hasStreamedText || !result.result) return [];

    const id = randomUUID();
    this.#upsert({ id, role: "assistant", content: result.result });
    return createTextMessageEvents(id, result.result, "assistant");
  }

  #endToolCall(toolCallId: string): AguiEvent {
    this.#state.unendedToolCallIds.delete(toolCallId);
    return {
      type: EventType.TOOL_CALL_END,
      toolCallId,
      timestamp: Date.now(),
    };
  }

  #closeText(): AguiEvent[] {
    const s = this.#state;
    const messageId = s.currentMessageId;
    if (!s.hasStreamedText || messageId === undefined) return [];
    s.currentMessageId = undefined;
    return [{
      type: EventType.TEXT_MESSAGE_END,
      messageId,
      timestamp: Date.now(),
    }];
  }

  /** Close everything still open, innermost first. */
  *#cleanup(): Generator<AguiEvent> {
    const s = this.#state;

    s.toolCall = undefined;
    for (const toolCallId of [...s.unendedToolCallIds]) {
      logger.debug("Cleanup: closing tool call {toolCallId}", { toolCallId });
      yield this.#endToolCall(toolCallId);
    }

    if (s.inThinkingBlock) {
      logger.debug("Cleanup: closing thinking block");
      yield* this.#closeThinking();
    }

    if (s.hasStreamedText && s.currentMessageId !== undefined) {
      logger.debug("Cleanup: closing text message {messageId}", {
        messageId: s.currentMessageId,
      });
      yield* this.#closeText();
    }

    this.#flushPending();
  }

  #flushPending(): void {
    const s = this.#state;
    const pending = s.pending;
    if (!pending) return;
    s.pending = undefined;

    const hasContent = pending.content !== "";
    const hasTools = pending.toolCalls.length > 0;
    if (!hasContent && !hasTools) return;

    this.#upsert({
      id: pending.id,
      role: "assistant",
      ...(hasContent ? { content: pending.content } : {}),
      ...(hasTools ? { toolCalls: pending.toolCalls } : {}),
    });
  }

  /** Replace the run message with the same id, or append. */
  #upsert(message: RunMessage): void {
    const messages = this.#state.runMessages;
    const index = messages.findIndex((m) => m.id === message.id);
    if (index === -1) {
      messages.push(message);
    } else {
      messages[index] = message;
    }
  }
}
