/**
 * Full run lifecycle for the Claude Agent SDK: lazy setup, one persistent
 * session worker per thread, and AG-UI translation of each run.
 *
 * @example
 * ```ts
 * const bridge = new ClaudeBridge();
 * bridge.setContext(new RunnerContext({ sessionId, workspacePath }));
 *
 * for await (const event of bridge.run(input)) {
 *   send(event);
 * }
 *
 * await bridge.shutdown();
 * ```
 *
 * @module
 */

import type { Options } from "@anthropic-ai/claude-agent-sdk";
import { getLogger } from "@logtape/logtape";
import {
  type AguiEvent,
  createAguiEventStream,
  type RunInput,
} from "@agui-relay/agui";
import { formatError, parseBooleanEnv } from "@agui-relay/utils";

import { createClaudeAgentClient } from "./claude/client.ts";
import { loadMcpConfig } from "./claude/mcp_config.ts";
import { buildClaudeOptions } from "./claude/options.ts";
import { buildAllowedTools, buildSystemPrompt } from "./claude/prompts.ts";
import { DEFAULT_MODEL } from "./config.ts";
import type { RunnerContext } from "./context.ts";
import { ContextNotSetError, NoActiveSessionError } from "./error.ts";
import { SessionManager } from "./session_manager.ts";
import type { SessionWorkerOptions } from "./session_worker.ts";
import type { VendorClientFactory } from "./vendor_client.ts";

const logger = getLogger(["agui-relay", "bridge"]);

/** Stderr lines kept for error reports. */
const MAX_STDERR_LINES = 50;
const ERROR_CONTEXT_LINES = 10;

export interface FrameworkCapabilities {
  framework: string;
  agentFeatures: string[];
  fileSystem: boolean;
  mcp: boolean;
  tracing: string | null;
  sessionPersistence: boolean;
}

export interface ClaudeBridgeOptions extends SessionWorkerOptions {
  /** Overrides `LLM_MODEL` from the context environment. */
  model?: string;
  /** Path of an `.mcp.json` file; overrides `MCP_CONFIG_FILE`. */
  mcpConfigFile?: string;
  createClient?: VendorClientFactory<Options>;
}

interface Platform {
  manager: SessionManager<Options>;
  baseOptions: Options;
}

export class ClaudeBridge {
  readonly #options: ClaudeBridgeOptions;
  readonly #stderrLines: string[] = [];

  #context: RunnerContext | undefined;
  #platform: Promise<Platform> | undefined;
  #manager: SessionManager<Options> | undefined;
  #configuredModel = "";

  constructor(options: ClaudeBridgeOptions = {}) {
    this.#options = options;
  }

  get context(): RunnerContext | undefined {
    return this.#context;
  }

  get configuredModel(): string {
    return this.#configuredModel;
  }

  get sessionManager(): SessionManager<Options> | undefined {
    return this.#manager;
  }

  capabilities(): FrameworkCapabilities {
    return {
      framework: "claude-agent-sdk",
      agentFeatures: [
        "agentic_chat",
        "backend_tool_rendering",
        "shared_state",
        "human_in_the_loop",
        "thinking",
      ],
      fileSystem: true,
      mcp: true,
      tracing: null,
      sessionPersistence: true,
    };
  }

  setContext(context: RunnerContext): void {
    this.#context = context;
  }

  /**
   * Run one request: resolve the thread's worker, then, holding the thread's
   * lock, stream the translated AG-UI events of the turn.
   */
  async *run(input: RunInput): AsyncGenerator<AguiEvent, void, undefined> {
    const { manager, baseOptions } = await this.#ensureReady();

    const threadId = input.threadId || this.#requireContext().sessionId;
    const runInput: RunInput = { ...input, threadId };
    const options = buildClaudeOptions(baseOptions, runInput);
    const worker = await manager.getOrCreate(threadId, options);
    const sessionLabel = manager.getSessionId(threadId) ?? threadId;

    const release = await manager.getLock(threadId).acquire();
    try {
      yield* createAguiEventStream(runInput, {
        query: (prompt) => worker.query(prompt, sessionLabel),
        onHalt: () => {
          worker.interrupt().catch((error: unknown) => {
            logger.warn("Interrupt after halt failed: {error}", {
              error: formatError(error),
            });
          });
        },
        describeError: (error) => this.describeError(error),
      });
    } finally {
      release();
    }
  }

  /** Interrupt the running turn of `threadId`, or of the session's own thread. */
  async interrupt(threadId?: string): Promise<void> {
    const manager = this.#manager;
    if (!manager) {
      throw new NoActiveSessionError("No active session manager");
    }
    const tid = threadId || this.#context?.sessionId;
    if (!tid) {
      throw new NoActiveSessionError("No thread_id available");
    }
    const worker = manager.getExisting(tid);
    if (!worker) {
      throw new NoActiveSessionError(`No active session for thread ${tid}`);
    }
    logger.info("Interrupt request for thread {threadId}", { threadId: tid });
    await worker.interrupt();
  }

  /** Stop every worker so the vendor can persist its sessions. */
  async shutdown(): Promise<void> {
    await this.#manager?.shutdown();
    logger.info("Bridge shutdown complete");
  }

  /**
   * Rebuild the platform on the next run. Existing workers are stopped;
   * their threads resume the same vendor session with the new options.
   */
  markDirty(): void {
    this.#platform = undefined;
    this.#manager?.shutdown().catch((error: unknown) => {
      logger.warn("Session manager shutdown failed: {error}", {
        error: formatError(error),
      });
    });
    logger.info("Bridge marked dirty, will reinitialise on next run");
  }

  /** Recent vendor stderr lines for error reports. */
  getErrorContext(): string {
    if (this.#stderrLines.length === 0) return "";
    return "Claude CLI stderr:\n" +
      this.#stderrLines.slice(-ERROR_CONTEXT_LINES).join("\n");
  }

  /** Error text for a `RUN_ERROR` event, with the error context appended. */
  describeError(error: unknown): string {
    const message = formatError(error);
    const context = this.getErrorContext();
    return context ? `${message}\n\n${context}` : message;
  }

  #requireContext(): RunnerContext {
    if (!this.#context) throw new ContextNotSetError();
    return this.#context;
  }

  #ensureReady(): Promise<Platform> {
    const context = this.#requireContext();
    if (!this.#platform) {
      const platform = this.#setup(context);
      this.#platform = platform;
      platform.catch(() => {
        if (this.#platform === platform) this.#platform = undefined;
      });
    }
    return this.#platform;
  }

  async #setup(context: RunnerContext): Promise<Platform> {
    const apiKey = context.getEnv("ANTHROPIC_API_KEY");
    const useVertex = parseBooleanEnv(context.getEnv("CLAUDE_CODE_USE_VERTEX"));
    if (!apiKey && !useVertex) {
      throw new Error(
        "Either ANTHROPIC_API_KEY or CLAUDE_CODE_USE_VERTEX=1 must be set",
      );
    }

    const model = this.#options.model ?? context.getEnv("LLM_MODEL") ??
      DEFAULT_MODEL;
    const mcpConfigFile = this.#options.mcpConfigFile ??
      context.getEnv("MCP_CONFIG_FILE");
    const mcpServers = mcpConfigFile
      ? await loadMcpConfig(mcpConfigFile, context.environment)
      : {};

    this.#stderrLines.length = 0;
    const baseOptions: Options = {
      cwd: context.workspacePath,
      permissionMode: "acceptEdits",
      allowedTools: buildAllowedTools(Object.keys(mcpServers)),
      mcpServers,
      settingSources: ["project"],
      systemPrompt: buildSystemPrompt(context.workspacePath),
      includePartialMessages: true,
      stderr: (line) => this.#onStderr(line),
      model,
      env: { ...context.environment },
    };

    const manager = this.#manager ??= new SessionManager<Options>({
      createClient: this.#options.createClient ?? createClaudeAgentClient,
      gracefulDisconnectTimeoutMs: this.#options.gracefulDisconnectTimeoutMs,
      stopTimeoutMs: this.#options.stopTimeoutMs,
    });
    this.#configuredModel = model;
    logger.info("Platform ready, model {model}, cwd {cwd}", {
      model,
      cwd: context.workspacePath,
    });
    return { manager, baseOptions };
  }

  #onStderr(line: string): void {
    const stripped = line.trimEnd();
    if (!stripped) return;
    logger.warn("[SDK stderr] {line}", { line: stripped });
    this.#stderrLines.push(stripped);
    if (this.#stderrLines.length > MAX_STDERR_LINES) {
      this.#stderrLines.shift();
    }
  }
}
