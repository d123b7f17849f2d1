/**
 * HTTP surface for an AG-UI runner.
 *
 * Uses Hono internally and exports a standard web fetch handler that can be
 * served with `@hono/node-server` or mounted in another Hono app.
 *
 * @example Run as standalone server
 * ```bash
 * ANTHROPIC_API_KEY=... npm start
 * ```
 *
 * @example Import as library
 * ```ts
 * import { createRunnerHandler } from "@agui-relay/http";
 * import { ClaudeBridge, RunnerContext } from "@agui-relay/runner";
 *
 * const bridge = new ClaudeBridge();
 * bridge.setContext(new RunnerContext({ sessionId, workspacePath }));
 *
 * const app = createRunnerHandler({ bridge, sessionId });
 * serve({ fetch: app.fetch, port: 8000 });
 * ```
 *
 * ## Endpoints
 *
 * - `POST /`            - Run the agent; AG-UI events as server-sent events
 * - `POST /interrupt`   - Interrupt the running turn, `{ thread_id? }`
 * - `GET  /health`      - `{ status: "healthy", session_id }`
 * - `GET  /capabilities` - Framework and platform capabilities
 *
 * @module
 */

export {
  createRunnerHandler,
  type RunnerBridge,
  type RunnerHandlerOptions,
} from "./handler.ts";
export { ApiError, errorHandler } from "./error.ts";
export { InterruptRequest, parseRunInput, RunRequest } from "./schema.ts";
