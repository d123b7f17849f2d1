import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { getLogger } from "@logtape/logtape";
import * as z from "zod";
import { NoActiveSessionError } from "@agui-relay/runner";
import { formatError } from "@agui-relay/utils";

const logger = getLogger(["agui-relay", "http"]);

export class ApiError extends Error {
  constructor(
    readonly statusCode: ContentfulStatusCode,
    readonly type: string,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

/** hono `onError` handler: a JSON error body with a matching status. */
export function errorHandler(err: Error, c: Context): Response {
  logger.error("Error processing {method} {path}: {error}", {
    method: c.req.method,
    path: c.req.path,
    error: formatError(err),
  });

  if (err instanceof ApiError) {
    return c.json({
      code: err.statusCode,
      type: err.type,
      message: err.message,
      details: err.details,
    }, err.statusCode);
  }

  if (err instanceof z.ZodError) {
    return c.json({
      code: 400,
      type: "invalid_request",
      message: "Validation error",
      details: err.issues,
    }, 400);
  }

  if (err instanceof NoActiveSessionError) {
    return c.json({
      code: 404,
      type: "no_active_session",
      message: err.message,
    }, 404);
  }

  return c.json({
    code: 500,
    type: "internal_server_error",
    message: "Internal server error",
    error: formatError(err),
  }, 500);
}
