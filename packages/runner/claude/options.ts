/**
 * Per-run Claude Agent SDK options.
 *
 * The bridge's base options are combined with what a run request carries:
 * its shared state and context (appended to the system prompt), its
 * frontend tools (exposed through the in-process `ag_ui` MCP server) and a
 * whitelist of `forwardedProps` overrides.
 *
 * @module
 */

import {
  createSdkMcpServer,
  type Options,
  tool,
} from "@anthropic-ai/claude-agent-sdk";
import { getLogger } from "@logtape/logtape";
import * as z from "zod";
import type { Tool } from "@ag-ui/core";
import {
  AGUI_MCP_SERVER_NAME,
  aguiToolFullName,
  buildStateContextAddendum,
  extractToolNames,
  hasState,
  type RunInput,
  STATE_TOOL_FULL_NAME,
  STATE_TOOL_NAME,
} from "@agui-relay/agui";

import { toolParametersToShape, type ZodShape } from "./tool_schema.ts";

const logger = getLogger(["agui-relay", "claude"]);

/**
 * `forwardedProps` a client may use to override options for one run. Keys
 * are accepted in camelCase or snake_case.
 */
export const ForwardedOptions = z.object({
  resume: z.string(),
  forkSession: z.boolean(),
  resumeSessionAt: z.string(),
  model: z.string(),
  fallbackModel: z.string(),
  maxThinkingTokens: z.number().int().positive(),
  maxTurns: z.number().int().positive(),
  maxBudgetUsd: z.number().positive(),
  outputFormat: z.object({
    type: z.literal("json_schema"),
    schema: z.record(z.string(), z.unknown()),
  }),
  includePartialMessages: z.boolean(),
  enableFileCheckpointing: z.boolean(),
  strictMcpConfig: z.boolean(),
  betas: z.array(z.literal("context-1m-2025-08-07")),
}).partial();
export type ForwardedOptions = z.infer<typeof ForwardedOptions>;

const ALLOWED_FORWARDED_PROPS = new Set(Object.keys(ForwardedOptions.shape));

/** Accepted by other runtimes but not settable through the Agent SDK. */
const UNSUPPORTED_FORWARDED_PROPS = new Set(["temperature", "maxTokens"]);

const FRONTEND_TOOL_RESULT = "Tool call forwarded to client";
const STATE_TOOL_RESULT = "State updated successfully";

function toCamelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

/**
 * Pick the whitelisted overrides out of `forwardedProps`. Unknown keys and
 * invalid values are logged and skipped; `null` values are ignored.
 */
export function parseForwardedOptions(forwardedProps: unknown): ForwardedOptions {
  const props = z.record(z.string(), z.unknown()).safeParse(forwardedProps);
  if (!props.success) return {};

  let applied: ForwardedOptions = {};
  for (const [rawKey, value] of Object.entries(props.data)) {
    const key = toCamelCase(rawKey);
    if (UNSUPPORTED_FORWARDED_PROPS.has(key)) {
      logger.warn("Ignoring forwarded prop {key}: not supported by the Agent SDK", {
        key: rawKey,
      });
      continue;
    }
    if (!ALLOWED_FORWARDED_PROPS.has(key)) {
      logger.warn("Ignoring non-whitelisted forwarded prop {key}", {
        key: rawKey,
      });
      continue;
    }
    if (value === null || value === undefined) continue;

    const parsed = ForwardedOptions.safeParse({ [key]: value });
    if (!parsed.success) {
      logger.warn("Ignoring invalid forwarded prop {key}: {issues}", {
        key: rawKey,
        issues: parsed.error.issues.map((issue) => issue.message).join("; "),
      });
      continue;
    }
    applied = { ...applied, ...parsed.data };
    logger.debug("Applied forwarded prop {key}", { key });
  }
  return applied;
}

/** Add `addendum` to a system prompt, preserving a preset's shape. */
export function appendSystemPrompt(
  systemPrompt: Options["systemPrompt"],
  addendum: string,
): NonNullable<Options["systemPrompt"]> {
  if (systemPrompt === undefined || systemPrompt === "") {
    return addendum;
  }
  if (typeof systemPrompt === "string") {
    return `${systemPrompt}\n\n${addendum}`;
  }
  return {
    ...systemPrompt,
    append: systemPrompt.append
      ? `${systemPrompt.append}\n\n${addendum}`
      : addendum,
  };
}

function frontendToolStub(definition: Tool, shape: ZodShape) {
  return tool(definition.name, definition.description, shape, () =>
    Promise.resolve({
      content: [{ type: "text" as const, text: FRONTEND_TOOL_RESULT }],
    }));
}

function stateTool() {
  const shape: ZodShape = {
    state_updates: z.union([z.record(z.string(), z.unknown()), z.string()])
      .describe("The state changes to merge into the shared state"),
  };
  return tool(
    STATE_TOOL_NAME,
    "Update the shared application state. Use this to persist changes that " +
      "should be visible in the UI. Pass the complete updated state object.",
    shape,
    () =>
      Promise.resolve({
        content: [{ type: "text" as const, text: STATE_TOOL_RESULT }],
      }),
  );
}

/**
 * Build the SDK options for one run.
 *
 * Partial messages are on unless `base` or a forwarded prop turns them off.
 */
export function buildClaudeOptions(base: Options, input: RunInput): Options {
  const options: Options = { includePartialMessages: true, ...base };
  const withState = hasState(input.state);

  const addendum = buildStateContextAddendum(input.state, input.context);
  if (addendum) {
    options.systemPrompt = appendSystemPrompt(options.systemPrompt, addendum);
    logger.debug("Appended state and context ({length} chars) to system prompt", {
      length: addendum.length,
    });
  }

  const toolNames = extractToolNames(input.tools);
  const allowedTools = options.allowedTools ?? [];
  const toolsToAdd = [
    ...(withState ? [STATE_TOOL_FULL_NAME] : []),
    ...toolNames.map(aguiToolFullName),
  ].filter((name, index, all) =>
    !allowedTools.includes(name) && all.indexOf(name) === index
  );
  if (toolsToAdd.length > 0) {
    options.allowedTools = [...allowedTools, ...toolsToAdd];
    logger.debug("Auto-granted ag_ui tools: {toolsToAdd}", { toolsToAdd });
  }

  Object.assign(options, parseForwardedOptions(input.forwardedProps));

  const aguiTools = [
    ...(input.tools ?? [])
      .filter((definition, index, all) =>
        definition.name !== "" &&
        all.findIndex((other) => other.name === definition.name) === index
      )
      .map((definition) =>
        frontendToolStub(definition, toolParametersToShape(definition.parameters))
      ),
    ...(withState ? [stateTool()] : []),
  ];
  if (aguiTools.length > 0) {
    options.mcpServers = {
      ...options.mcpServers,
      [AGUI_MCP_SERVER_NAME]: createSdkMcpServer({
        name: AGUI_MCP_SERVER_NAME,
        version: "1.0.0",
        tools: aguiTools,
      }),
    };
    logger.debug("Registered ag_ui MCP server with {count} tools", {
      count: aguiTools.length,
    });
  }

  return options;
}
