import * as z from "zod";
import { parsePort } from "@agui-relay/utils";

import {
  DEFAULT_GRACEFUL_DISCONNECT_TIMEOUT_MS,
  DEFAULT_STOP_TIMEOUT_MS,
} from "./session_worker.ts";

export const DEFAULT_MODEL = "claude-sonnet-4-5";

const LogLevel = z.enum(["trace", "debug", "info", "warning", "error", "fatal"]);
export type LogLevel = z.infer<typeof LogLevel>;

/** Unset or invalid values fall back to the default. */
const Milliseconds = (fallback: number) =>
  z.coerce.number().int().positive().catch(fallback);

const EnvSchema = z.object({
  SESSION_ID: z.string().min(1).catch("unknown"),
  WORKSPACE_PATH: z.string().min(1).catch("/workspace"),
  HOST: z.string().min(1).catch("0.0.0.0"),
  PORT: z.string().optional(),
  LLM_MODEL: z.string().min(1).optional(),
  MCP_CONFIG_FILE: z.string().min(1).optional(),
  LOG_LEVEL: z.preprocess(
    (level) =>
      typeof level === "string"
        ? level.toLowerCase().replace(/^warn$/, "warning")
        : level,
    LogLevel,
  ).catch("info"),
  GRACEFUL_DISCONNECT_TIMEOUT_MS: Milliseconds(
    DEFAULT_GRACEFUL_DISCONNECT_TIMEOUT_MS,
  ),
  WORKER_STOP_TIMEOUT_MS: Milliseconds(DEFAULT_STOP_TIMEOUT_MS),
});

export interface RunnerConfig {
  sessionId: string;
  workspacePath: string;
  host: string;
  port: number;
  model: string;
  mcpConfigFile: string | undefined;
  logLevel: LogLevel;
  gracefulDisconnectTimeoutMs: number;
  stopTimeoutMs: number;
}

/**
 * Read the runner configuration from environment variables. Credentials are
 * not part of it: the bridge reads them from its runner context.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): RunnerConfig {
  const parsed = EnvSchema.parse(env);
  return {
    sessionId: parsed.SESSION_ID,
    workspacePath: parsed.WORKSPACE_PATH,
    host: parsed.HOST,
    port: parsePort(parsed.PORT, 8000),
    model: parsed.LLM_MODEL ?? DEFAULT_MODEL,
    mcpConfigFile: parsed.MCP_CONFIG_FILE,
    logLevel: parsed.LOG_LEVEL,
    gracefulDisconnectTimeoutMs: parsed.GRACEFUL_DISCONNECT_TIMEOUT_MS,
    stopTimeoutMs: parsed.WORKER_STOP_TIMEOUT_MS,
  };
}
