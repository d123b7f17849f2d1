import type {
  AssistantMessage,
  Context,
  Message,
  ToolCall,
  ToolMessage,
} from "@ag-ui/core";
import { getLogger } from "@logtape/logtape";

import type { ContentBlock } from "./vendor_message.ts";
import { isStateTool, STATE_TOOL_NAME, stripMcpPrefix } from "./tools.ts";

const logger = getLogger(["agui-relay", "agui"]);

/**
 * Extract the prompt to send to the agent from the input messages.
 *
 * The vendor keeps its own conversation history, so only the last message
 * is used, whatever its role. Its content is taken as-is when it is a
 * string, otherwise from its first text part.
 */
export function extractUserMessage(messages: readonly Message[]): string {
  const last = messages.at(-1);
  if (!last || !("content" in last)) return "";
  return contentText(last.content);
}

function contentText(content: unknown): string {
  if (typeof content === "string") return content;
  if (Array.isArray(content)) {
    for (const part of content) {
      if (
        typeof part === "object" && part !== null && "text" in part &&
        typeof part.text === "string"
      ) {
        return part.text;
      }
    }
  }
  return "";
}

/**
 * Build an assistant message from a complete vendor message.
 *
 * The state tool and thinking blocks are not conversation history and are
 * left out. Returns `undefined` when nothing user-visible remains.
 */
export function buildAssistantMessage(
  content: readonly ContentBlock[],
  messageId: string,
): AssistantMessage | undefined {
  let text = "";
  const toolCalls: ToolCall[] = [];

  for (const block of content) {
    if (block.type === "text") {
      text += block.text;
    } else if (block.type === "tool_use" && !isStateTool(block.name)) {
      toolCalls.push({
        id: block.id,
        type: "function",
        function: {
          name: stripMcpPrefix(block.name),
          arguments: JSON.stringify(block.input),
        },
      });
    }
  }

  if (!text && toolCalls.length === 0) return undefined;

  return {
    id: messageId,
    role: "assistant",
    ...(text ? { content: text } : {}),
    ...(toolCalls.length > 0 ? { toolCalls } : {}),
  };
}

/**
 * Normalise tool result content to a string for the frontend.
 *
 * Tools usually answer with `[{ type: "text", text: "<json>" }]`: the first
 * text part is used, compacted when it parses as JSON. Strings pass through
 * and anything else is serialised.
 */
export function normalizeToolResultContent(content: unknown): string {
  if (content === undefined || content === null) return "";
  if (typeof content === "string") return content;

  if (Array.isArray(content) && content.length > 0) {
    const first: unknown = content[0];
    if (
      typeof first === "object" && first !== null && "type" in first &&
      first.type === "text"
    ) {
      const text = "text" in first && typeof first.text === "string"
        ? first.text
        : "";
      try {
        return JSON.stringify(JSON.parse(text));
      } catch {
        return text;
      }
    }
  }

  try {
    return JSON.stringify(content) ?? String(content);
  } catch {
    return String(content);
  }
}

export function toolResultMessageId(toolUseId: string): string {
  return `${toolUseId}-result`;
}

export function buildToolMessage(
  toolUseId: string,
  content: unknown,
): ToolMessage {
  return {
    id: toolResultMessageId(toolUseId),
    role: "tool",
    content: normalizeToolResultContent(content),
    toolCallId: toolUseId,
  };
}

/**
 * Render application context and shared state as a system prompt addendum.
 * Returns an empty string when there is neither.
 */
export function buildStateContextAddendum(
  state: unknown,
  context: readonly Context[] | undefined,
): string {
  const parts: string[] = [];

  if (context && context.length > 0) {
    parts.push("## Context from the application");
    for (const item of context) {
      parts.push(`- ${item.description}: ${item.value}`);
    }
    parts.push("");
  }

  if (hasState(state)) {
    parts.push("## Current Shared State");
    parts.push("This state is shared with the frontend UI and can be updated.");
    try {
      parts.push("```json\n" + JSON.stringify(state, null, 2) + "\n```");
    } catch (error) {
      logger.warn("Failed to serialize state: {error}", { error });
      parts.push(`State: ${String(state)}`);
    }
    parts.push("");
    parts.push(
      `To update this state, use the \`${STATE_TOOL_NAME}\` tool with your changes.`,
    );
    parts.push("");
  }

  return parts.join("\n");
}

/** Whether a state value counts as present: non-empty objects and other truthy values. */
export function hasState(state: unknown): boolean {
  if (state === undefined || state === null) return false;
  if (typeof state === "object") return Object.keys(state).length > 0;
  return Boolean(state);
}
