export {
  ClaudeAgentClient,
  type ClaudeQueryFn,
  type ClaudeQueryHandle,
  createClaudeAgentClient,
} from "./client.ts";
export { expandEnvVars, loadMcpConfig, parseMcpConfig } from "./mcp_config.ts";
export {
  appendSystemPrompt,
  buildClaudeOptions,
  ForwardedOptions,
  parseForwardedOptions,
} from "./options.ts";
export {
  buildAllowedTools,
  buildSystemPrompt,
  buildWorkspacePrompt,
  DEFAULT_ALLOWED_TOOLS,
} from "./prompts.ts";
export {
  type JsonSchema,
  jsonSchemaToShape,
  jsonSchemaToZod,
  toolParametersToShape,
} from "./tool_schema.ts";
