/**
 * Session concurrency core and Claude Agent SDK bridge.
 *
 * One {@link SessionWorker} per conversation thread owns a long-lived
 * vendor client; {@link SessionManager} maps threads to workers and
 * serialises requests per thread; {@link ClaudeBridge} runs a request end
 * to end and yields AG-UI events.
 *
 * @example
 * ```ts
 * import { ClaudeBridge, loadConfig, RunnerContext } from "@agui-relay/runner";
 *
 * const config = loadConfig();
 * const bridge = new ClaudeBridge({ model: config.model });
 * bridge.setContext(new RunnerContext(config));
 * ```
 *
 * @module
 */

export {
  ClaudeBridge,
  type ClaudeBridgeOptions,
  type FrameworkCapabilities,
} from "./bridge.ts";
export { DEFAULT_MODEL, type LogLevel, loadConfig, type RunnerConfig } from "./config.ts";
export { RunnerContext } from "./context.ts";
export {
  ContextNotSetError,
  NoActiveSessionError,
  WorkerClosedError,
} from "./error.ts";
export { SessionManager, type SessionManagerOptions } from "./session_manager.ts";
export {
  DEFAULT_GRACEFUL_DISCONNECT_TIMEOUT_MS,
  DEFAULT_STOP_TIMEOUT_MS,
  SessionWorker,
  type SessionWorkerOptions,
  type SessionWorkerStatus,
  type TurnResult,
} from "./session_worker.ts";
export type {
  ResumableOptions,
  VendorClient,
  VendorClientFactory,
} from "./vendor_client.ts";
export * from "./claude/mod.ts";
