import type { Options } from "@anthropic-ai/claude-agent-sdk";

export const DEFAULT_ALLOWED_TOOLS = [
  "Read",
  "Write",
  "Bash",
  "Glob",
  "Grep",
  "Edit",
  "MultiEdit",
  "WebSearch",
];

/** Workspace notes appended to the Claude Code preset prompt. */
export function buildWorkspacePrompt(
  workspacePath: string,
  artifactsPath = "artifacts",
): string {
  return [
    "# Workspace Structure",
    "",
    `**Workspace root**: ${workspacePath}`,
    "",
    `**Artifacts**: ${artifactsPath} (create all output files here)`,
    "",
  ].join("\n");
}

export function buildSystemPrompt(
  workspacePath: string,
): NonNullable<Options["systemPrompt"]> {
  return {
    type: "preset",
    preset: "claude_code",
    append: buildWorkspacePrompt(workspacePath),
  };
}

/** Allowed tool names: the built-in defaults plus every configured MCP server. */
export function buildAllowedTools(mcpServerNames: readonly string[]): string[] {
  return [
    ...DEFAULT_ALLOWED_TOOLS,
    ...mcpServerNames.map((name) => `mcp__${name}`),
  ];
}
