import { z } from "zod";
import type { APIGatewayProxyEvent, SQSEvent } from "aws-lambda";

import { fail, ok } from "./errors.js";
import type { Result } from "./errors.js";

export type DirectEvent = Pick<APIGatewayProxyEvent, "body">;

export type InvocationEvent = DirectEvent | SQSEvent;

export type InvocationStyle = "direct" | "queue";

const directSchema = z.object({ body: z.string() });

// Only the first record is read; the rest of the batch is left unchecked.
const queueSchema = z.object({
  Records: z.tuple([z.object({ body: z.string() })]).rest(z.unknown()),
});

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export function invocationStyle(event: unknown): InvocationStyle {
  if (isObject(event) && !("body" in event) && "Records" in event) {
    return "queue";
  }
  return "direct";
}

export function decodeEvent(event: unknown): Result<string> {
  if (invocationStyle(event) === "queue") {
    const queue = queueSchema.safeParse(event);
    if (queue.success) {
      return ok(queue.data.Records[0].body);
    }
  } else {
    const direct = directSchema.safeParse(event);
    if (direct.success) {
      return ok(direct.data.body);
    }
  }

  return fail({
    kind: "DecodeError",
    message: "Event has neither a string body nor a Records[0].body",
  });
}
