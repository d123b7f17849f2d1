/**
 * Utilities for reading and parsing environment variables.
 *
 * @example
 * ```ts
 * import { parseBooleanEnv, parsePort } from "@agui-relay/utils/env";
 *
 * const port = parsePort(process.env.PORT, 8000);
 * const useVertex = parseBooleanEnv(process.env.CLAUDE_CODE_USE_VERTEX);
 * ```
 *
 * @module
 */

/**
 * Parses a port string into a valid port number.
 *
 * @param port - The port string to parse (e.g., from environment variable)
 * @param defaultPort - The fallback port if parsing fails or port is invalid
 * @returns A valid port number between 1 and 65535, or the default port
 *
 * @example
 * ```ts
 * parsePort(process.env.PORT, 8000)  // Returns PORT env value or 8000
 * parsePort("3000", 8000)             // Returns 3000
 * parsePort("invalid", 8000)          // Returns 8000
 * parsePort(undefined, 8000)          // Returns 8000
 * ```
 */
export function parsePort(
  port: string | undefined,
  defaultPort: number,
): number {
  if (!port) return defaultPort;

  const parsedPort = parseInt(port, 10);
  if (isNaN(parsedPort)) return defaultPort;

  // Valid port numbers are between 1 and 65535
  if (parsedPort < 1 || parsedPort > 65535) return defaultPort;

  return parsedPort;
}

/**
 * Parses a boolean flag such as `"true"`, `"1"` or `"yes"`.
 * Anything else, including an unset variable, yields `defaultValue`.
 */
export function parseBooleanEnv(
  value: string | undefined,
  defaultValue = false,
): boolean {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) return true;
  if (["false", "0", "no"].includes(normalized)) return false;
  return defaultValue;
}
