import "dotenv/config";
import { serve } from "@hono/node-server";
import { configure, getConsoleSink, getLogger } from "@logtape/logtape";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { ClaudeBridge, loadConfig, RunnerContext } from "@agui-relay/runner";
import { formatError } from "@agui-relay/utils";
import { createRunnerHandler } from "./handler.ts";

const logger = getLogger(["agui-relay", "http"]);

export async function main(): Promise<void> {
  const config = loadConfig();

  await configure({
    sinks: { console: getConsoleSink() },
    loggers: [
      {
        category: ["agui-relay"],
        lowestLevel: config.logLevel,
        sinks: ["console"],
      },
      { category: ["logtape", "meta"], lowestLevel: "warning", sinks: ["console"] },
    ],
  });

  const bridge = new ClaudeBridge({
    model: config.model,
    mcpConfigFile: config.mcpConfigFile,
    gracefulDisconnectTimeoutMs: config.gracefulDisconnectTimeoutMs,
    stopTimeoutMs: config.stopTimeoutMs,
  });
  bridge.setContext(
    new RunnerContext({
      sessionId: config.sessionId,
      workspacePath: config.workspacePath,
    }),
  );

  const app = new Hono()
    .use(cors())
    .route("/", createRunnerHandler({ bridge, sessionId: config.sessionId }));

  const server = serve(
    { fetch: app.fetch, port: config.port, hostname: config.host },
    (info) => {
      logger.info("AG-UI runner listening on http://{host}:{port}", {
        host: info.address,
        port: info.port,
      });
      logger.info("Session: {sessionId}, workspace: {workspacePath}", {
        sessionId: config.sessionId,
        workspacePath: config.workspacePath,
      });
    },
  );

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Received {signal}, shutting down", { signal });
    try {
      await bridge.shutdown();
    } catch (error) {
      logger.error("Bridge shutdown failed: {error}", {
        error: formatError(error),
      });
    }
    server.close();
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.fatal("Runner failed to start: {error}", { error: formatError(error) });
  process.exitCode = 1;
});
