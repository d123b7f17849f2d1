import { randomUUID } from "node:crypto";
import { RunAgentInputSchema } from "@ag-ui/core";
import * as z from "zod";
import type { RunInput } from "@agui-relay/agui";
import { ApiError } from "./error.ts";

// =============================================================================
// Run request (POST /)
// =============================================================================

/** snake_case aliases accepted for top-level run fields. */
const RUN_KEY_ALIASES: Record<string, string> = {
  thread_id: "threadId",
  run_id: "runId",
  parent_run_id: "parentRunId",
  forwarded_props: "forwardedProps",
};

/** snake_case aliases accepted inside messages. */
const MESSAGE_KEY_ALIASES: Record<string, string> = {
  tool_call_id: "toolCallId",
  tool_calls: "toolCalls",
};

const JsonObject = z.record(z.string(), z.unknown());

function renameKeys(
  value: Record<string, unknown>,
  aliases: Record<string, string>,
): Record<string, unknown> {
  const renamed: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    const target = aliases[key] ?? key;
    // The camelCase spelling wins when a request carries both.
    if (target !== key && target in value) continue;
    renamed[target] = item;
  }
  return renamed;
}

function renameMessageKeys(message: unknown): unknown {
  const parsed = JsonObject.safeParse(message);
  return parsed.success
    ? renameKeys(parsed.data, MESSAGE_KEY_ALIASES)
    : message;
}

/**
 * Run request envelope. Missing optional fields get their defaults before
 * the AG-UI schema validates the result.
 */
export const RunRequest = z.looseObject({
  threadId: z.string().nullish().transform((id) => id ?? ""),
  runId: z.string().nullish().transform((id) => id || randomUUID()),
  parentRunId: z.string().nullish().transform((id) => id ?? undefined),
  messages: z.array(z.unknown()).transform((messages) =>
    messages.map(renameMessageKeys)
  ),
  state: z.unknown().transform((state) => state ?? {}),
  tools: z.array(z.unknown()).nullish().transform((tools) => tools ?? []),
  context: z.unknown().transform((context) =>
    Array.isArray(context) ? context : []
  ),
  forwardedProps: JsonObject.nullish().transform((props) => props ?? {}),
});

/**
 * Parse a run request body, in camelCase or snake_case, into a validated
 * {@link RunInput}.
 *
 * @throws {ApiError} 400 when the body is not a valid run request.
 */
export function parseRunInput(body: unknown): RunInput {
  const object = JsonObject.safeParse(body);
  if (!object.success) {
    throw new ApiError(400, "invalid_request", "Run request must be an object");
  }

  const request = RunRequest.parse(renameKeys(object.data, RUN_KEY_ALIASES));
  const { parentRunId, ...envelope } = request;

  const parsed = RunAgentInputSchema.safeParse(envelope);
  if (!parsed.success) {
    throw new ApiError(
      400,
      "invalid_request",
      "Invalid run input",
      parsed.error.issues,
    );
  }
  return parentRunId ? { ...parsed.data, parentRunId } : parsed.data;
}

// =============================================================================
// Interrupt request (POST /interrupt)
// =============================================================================

export const InterruptRequest = z.object({
  thread_id: z.string().min(1).optional(),
  threadId: z.string().min(1).optional(),
});
export type InterruptRequest = z.infer<typeof InterruptRequest>;
