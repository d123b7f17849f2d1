import { readFile } from "node:fs/promises";
import type { McpServerConfig } from "@anthropic-ai/claude-agent-sdk";
import { getLogger } from "@logtape/logtape";
import * as z from "zod";
import { formatError } from "@agui-relay/utils";

const logger = getLogger(["agui-relay", "claude"]);

const McpServerConfigSchema = z.union([
  z.object({
    type: z.literal("stdio").optional(),
    command: z.string().min(1),
    args: z.array(z.string()).optional(),
    env: z.record(z.string(), z.string()).optional(),
  }),
  z.object({
    type: z.literal("sse"),
    url: z.url(),
    headers: z.record(z.string(), z.string()).optional(),
  }),
  z.object({
    type: z.literal("http"),
    url: z.url(),
    headers: z.record(z.string(), z.string()).optional(),
  }),
]);

const McpConfigFileSchema = z.object({
  mcpServers: z.record(z.string(), McpServerConfigSchema).default({}),
});

const ENV_VAR_PATTERN = /\$\{([^}:]+)(?::-([^}]*))?\}/g;

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a JSON value.
 * Unset variables without a default become empty strings.
 */
export function expandEnvVars(
  value: unknown,
  env: Record<string, string | undefined>,
): unknown {
  if (typeof value === "string") {
    return value.replace(
      ENV_VAR_PATTERN,
      (_, name: string, fallback: string | undefined) =>
        env[name] ?? fallback ?? "",
    );
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandEnvVars(item, env));
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, expandEnvVars(item, env)]),
    );
  }
  return value;
}

/** Parse the text of an `.mcp.json` file. */
export function parseMcpConfig(
  text: string,
  env: Record<string, string | undefined>,
): Record<string, McpServerConfig> {
  const raw: unknown = JSON.parse(text);
  return McpConfigFileSchema.parse(expandEnvVars(raw, env)).mcpServers;
}

/**
 * Load MCP servers from `path`. A missing or invalid file is logged and
 * yields no servers.
 */
export async function loadMcpConfig(
  path: string,
  env: Record<string, string | undefined>,
): Promise<Record<string, McpServerConfig>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    logger.info("No MCP config loaded from {path}: {error}", {
      path,
      error: formatError(error),
    });
    return {};
  }

  try {
    const servers = parseMcpConfig(text, env);
    logger.info("Loaded {count} MCP servers from {path}", {
      count: Object.keys(servers).length,
      path,
    });
    return servers;
  } catch (error) {
    logger.error("Failed to parse MCP config {path}: {error}", {
      path,
      error: formatError(error),
    });
    return {};
  }
}
