import { z } from "zod";

import { fail, ok } from "./errors.js";
import type { IngestError, Result } from "./errors.js";

export const messageSchema = z.object({
  name: z.string(),
  email: z.string(),
  message: z.string(),
});

export type InboundMessage = z.infer<typeof messageSchema>;

const typeName = (value: unknown): string => {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
};

function toValidationError(
  issue: z.ZodIssue,
  data: Record<string, unknown>
): IngestError {
  const field = issue.path.join(".");
  const value = data[field];

  if (value === undefined) {
    return {
      kind: "ValidationError",
      reason: "missing",
      field,
      message: `Missing required field: ${field}`,
    };
  }

  const received = typeName(value);
  return {
    kind: "ValidationError",
    reason: "wrong_type",
    field,
    expected: "string",
    received,
    message: `Invalid type for field ${field}: expected string, received ${received}`,
  };
}

/**
 * Parses a raw message body and checks the three required string fields.
 * Fields are checked in schema order, so the first failing one is reported.
 */
export function parseMessage(raw: string): Result<InboundMessage> {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    return fail({
      kind: "ParseError",
      message: `Body is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      cause: err,
    });
  }

  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return fail({
      kind: "ParseError",
      message: `Body must be a JSON object, received ${typeName(data)}`,
    });
  }

  const record: Record<string, unknown> = { ...data };
  const parsed = messageSchema.safeParse(record);
  if (!parsed.success) {
    return fail(toValidationError(parsed.error.issues[0], record));
  }

  return ok(parsed.data);
}
