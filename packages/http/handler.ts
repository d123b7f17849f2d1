import type { Context } from "hono";
import { Hono } from "hono";
import { getLogger } from "@logtape/logtape";
import {
  type AguiEvent,
  encodeSSEStream,
  type RunInput,
  SSE_CONTENT_TYPE,
} from "@agui-relay/agui";
import type { FrameworkCapabilities } from "@agui-relay/runner";
import { ApiError, errorHandler } from "./error.ts";
import { InterruptRequest, parseRunInput } from "./schema.ts";

const logger = getLogger(["agui-relay", "http"]);

/** The part of a bridge the HTTP surface drives. */
export interface RunnerBridge {
  readonly configuredModel: string;
  run(input: RunInput): AsyncIterable<AguiEvent>;
  interrupt(threadId?: string): Promise<void>;
  describeError(error: unknown): string;
  capabilities(): FrameworkCapabilities;
}

/**
 * Options for creating a runner HTTP handler.
 */
export interface RunnerHandlerOptions {
  bridge: RunnerBridge;
  /** Reported by `/health` and `/capabilities`. */
  sessionId: string;
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch (error) {
    throw new ApiError(
      400,
      "invalid_request",
      "Request body must be valid JSON",
      error instanceof Error ? error.message : undefined,
    );
  }
}

/** An absent or empty body reads as `{}`. */
async function readOptionalJson(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ApiError(
      400,
      "invalid_request",
      "Request body must be valid JSON",
      error instanceof Error ? error.message : undefined,
    );
  }
}

/**
 * Creates a Hono app exposing a bridge over AG-UI.
 * The returned app can be used as a fetch handler or mounted in another Hono app.
 */
export function createRunnerHandler(options: RunnerHandlerOptions): Hono {
  const { bridge, sessionId } = options;
  const app = new Hono();

  app.onError(errorHandler);

  app
    /**
     * POST / - Run the agent and stream AG-UI events as server-sent events.
     * Errors after the stream has started arrive as a `RUN_ERROR` event.
     */
    .post("/", async (c) => {
      const input = parseRunInput(await readJson(c));
      logger.info("Run: thread_id={threadId}, run_id={runId}", {
        threadId: input.threadId,
        runId: input.runId,
      });

      const body = encodeSSEStream(
        bridge.run(input),
        (error) => bridge.describeError(error),
        { threadId: input.threadId, runId: input.runId },
      );
      return new Response(body, {
        headers: {
          "Content-Type": SSE_CONTENT_TYPE,
          "Cache-Control": "no-cache",
          "X-Accel-Buffering": "no",
        },
      });
    })
    // Interrupt the running turn of a thread
    .post("/interrupt", async (c) => {
      const request = InterruptRequest.parse(await readOptionalJson(c));
      const threadId = request.thread_id ?? request.threadId;
      logger.info("Interrupt request received (thread_id={threadId})", {
        threadId: threadId ?? "default",
      });
      await bridge.interrupt(threadId);
      return c.json({ message: "Interrupt signal sent" });
    })
    // Health check
    .get("/health", (c) => c.json({ status: "healthy", session_id: sessionId }))
    // Framework and platform capabilities
    .get("/capabilities", (c) => {
      const capabilities = bridge.capabilities();
      return c.json({
        framework: capabilities.framework,
        agent_features: capabilities.agentFeatures,
        platform_features: [],
        file_system: capabilities.fileSystem,
        mcp: capabilities.mcp,
        tracing: capabilities.tracing,
        session_persistence: capabilities.sessionPersistence,
        model: bridge.configuredModel || null,
        session_id: sessionId,
      });
    });

  return app;
}
