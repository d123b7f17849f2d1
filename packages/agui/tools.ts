import type { Tool } from "@ag-ui/core";

/** Name of the in-process MCP server hosting frontend tool stubs and the state tool. */
export const AGUI_MCP_SERVER_NAME = "ag_ui";

/** Reserved tool used by the agent to update shared application state. */
export const STATE_TOOL_NAME = "ag_ui_update_state";

/** {@link STATE_TOOL_NAME} as the vendor reports it, with its MCP prefix. */
export const STATE_TOOL_FULL_NAME =
  `mcp__${AGUI_MCP_SERVER_NAME}__${STATE_TOOL_NAME}`;

export function isStateTool(name: string): boolean {
  return name === STATE_TOOL_NAME || name === STATE_TOOL_FULL_NAME;
}

/**
 * Strip the `mcp__<server>__` prefix the vendor adds to MCP tool names, so
 * the name matches what the frontend registered.
 *
 * @example
 * ```ts
 * stripMcpPrefix("mcp__weather__get_weather"); // "get_weather"
 * stripMcpPrefix("mcp__ag_ui__a__b");          // "a__b"
 * stripMcpPrefix("local_tool");                // "local_tool"
 * ```
 */
export function stripMcpPrefix(toolName: string): string {
  if (toolName.startsWith("mcp__")) {
    const parts = toolName.split("__");
    if (parts.length >= 3) {
      return parts.slice(2).join("__");
    }
  }
  return toolName;
}

/** Full vendor-side name of a tool served by the `ag_ui` MCP server. */
export function aguiToolFullName(name: string): string {
  return `mcp__${AGUI_MCP_SERVER_NAME}__${name}`;
}

export function extractToolNames(tools: readonly Tool[] | undefined): string[] {
  return (tools ?? []).map((tool) => tool.name).filter((name) => name !== "");
}
