/**
 * Common utilities shared across agui-relay packages.
 *
 * Provides helpers for async coordination, environment variables, and error
 * handling.
 *
 * @example
 * ```ts
 * import { AsyncQueue, Mutex, parsePort } from "@agui-relay/utils";
 * // Or import specific modules:
 * import { Completer } from "@agui-relay/utils/async";
 * import { parsePort } from "@agui-relay/utils/env";
 * ```
 *
 * @module
 */

// Error utilities
export {
  createAbortError,
  formatError,
  isAbortError,
  TimeoutError,
} from "./error.ts";

// Async utilities
export { AsyncQueue, Completer, delay, Mutex, withTimeout } from "./async.ts";

// Environment utilities
export { parseBooleanEnv, parsePort } from "./env.ts";
