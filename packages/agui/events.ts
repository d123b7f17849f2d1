import { EventType } from "@ag-ui/core";
import type {
  AssistantMessage,
  DeveloperMessage,
  Message,
  MessagesSnapshotEvent,
  RunErrorEvent,
  RunFinishedEvent,
  RunStartedEvent,
  StateSnapshotEvent,
  SystemMessage,
  TextMessageContentEvent,
  TextMessageEndEvent,
  TextMessageStartEvent,
  ThinkingEndEvent,
  ThinkingStartEvent,
  ThinkingTextMessageContentEvent,
  ThinkingTextMessageEndEvent,
  ThinkingTextMessageStartEvent,
  ToolCallArgsEvent,
  ToolCallEndEvent,
  ToolCallResultEvent,
  ToolCallStartEvent,
  ToolMessage,
} from "@ag-ui/core";

/** Role carried by a `TEXT_MESSAGE_START` event. */
export type TextMessageRole = "assistant" | "system";

/** A `tool` message enriched with the display name of the tool that produced it. */
export type NamedToolMessage = ToolMessage & { name: string };

/** Any message that can appear in a `MESSAGES_SNAPSHOT`. */
export type SnapshotMessage = Message | NamedToolMessage;

/** Messages produced during a run. */
export type RunMessage =
  | AssistantMessage
  | DeveloperMessage
  | SystemMessage
  | ToolMessage;

/** Metadata captured from the vendor's result message. */
export interface RunResultData {
  isError: boolean;
  durationMs?: number;
  durationApiMs?: number;
  numTurns?: number;
  totalCostUsd?: number;
  usage?: unknown;
  structuredOutput?: unknown;
}

/** Every event this relay emits. */
export type AguiEvent =
  | RunStartedEvent
  | RunFinishedEvent
  | RunErrorEvent
  | TextMessageStartEvent
  | TextMessageContentEvent
  | TextMessageEndEvent
  | ToolCallStartEvent
  | ToolCallArgsEvent
  | ToolCallEndEvent
  | ToolCallResultEvent
  | ThinkingStartEvent
  | ThinkingEndEvent
  | ThinkingTextMessageStartEvent
  | ThinkingTextMessageContentEvent
  | ThinkingTextMessageEndEvent
  | StateSnapshotEvent
  | MessagesSnapshotEvent;

export function createRunStartedEvent(
  threadId: string,
  runId: string,
  extra: { parentRunId?: string; input?: RunStartedEvent["input"] } = {},
): RunStartedEvent {
  return {
    type: EventType.RUN_STARTED,
    threadId,
    runId,
    ...(extra.parentRunId !== undefined ? { parentRunId: extra.parentRunId } : {}),
    ...(extra.input !== undefined ? { input: extra.input } : {}),
    timestamp: Date.now(),
  } satisfies RunStartedEvent;
}

export function createRunFinishedEvent(
  threadId: string,
  runId: string,
  result?: RunResultData,
): RunFinishedEvent {
  return {
    type: EventType.RUN_FINISHED,
    threadId,
    runId,
    ...(result !== undefined ? { result } : {}),
    timestamp: Date.now(),
  };
}

export function createRunErrorEvent(
  message: string,
  ids: { threadId?: string; runId?: string; code?: string } = {},
): RunErrorEvent {
  return {
    type: EventType.RUN_ERROR,
    ...ids,
    message,
    timestamp: Date.now(),
  };
}

/** Start, content and end events for one complete text message. */
export function createTextMessageEvents(
  messageId: string,
  text: string,
  role: TextMessageRole,
): AguiEvent[] {
  const timestamp = Date.now();
  return [
    {
      type: EventType.TEXT_MESSAGE_START,
      messageId,
      role,
      timestamp,
    } satisfies TextMessageStartEvent,
    {
      type: EventType.TEXT_MESSAGE_CONTENT,
      messageId,
      delta: text,
      timestamp,
    } satisfies TextMessageContentEvent,
    {
      type: EventType.TEXT_MESSAGE_END,
      messageId,
      timestamp,
    } satisfies TextMessageEndEvent,
  ];
}

export function createMessagesSnapshotEvent(
  messages: SnapshotMessage[],
): MessagesSnapshotEvent {
  return {
    type: EventType.MESSAGES_SNAPSHOT,
    messages,
    timestamp: Date.now(),
  };
}

export function createStateSnapshotEvent(
  snapshot: unknown,
): StateSnapshotEvent {
  return {
    type: EventType.STATE_SNAPSHOT,
    snapshot,
    timestamp: Date.now(),
  };
}
