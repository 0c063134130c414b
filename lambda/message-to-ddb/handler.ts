import type { APIGatewayProxyResult } from "aws-lambda";

import { decodeEvent, invocationStyle } from "./decode.js";
import type { InvocationStyle } from "./decode.js";
import { errorCause, IngestFailure } from "./errors.js";
import type { Result } from "./errors.js";
import type { LogSink, MetricSink, TraceSink } from "./observability.js";
import type { MessageStoreWriter, StoredMessage } from "./store.js";

export type InvocationResult = APIGatewayProxyResult | void;

export interface IngestDeps {
  writer: Pick<MessageStoreWriter, "write">;
  logger: LogSink;
  tracer: TraceSink;
  metrics: MetricSink;
}

export const SUCCESS_RESPONSE: Readonly<APIGatewayProxyResult> = Object.freeze({
  statusCode: 200,
  body: '{"message": "success"}',
});

export const ERROR_RESPONSE: Readonly<APIGatewayProxyResult> = Object.freeze({
  statusCode: 500,
  body: '{"message": "error"}',
});

function respond(
  style: InvocationStyle,
  outcome: Result<StoredMessage>
): InvocationResult {
  if (style === "direct") {
    return outcome.ok ? SUCCESS_RESPONSE : ERROR_RESPONSE;
  }
  if (!outcome.ok) {
    throw new IngestFailure(outcome.error);
  }
}

export function createHandler({ writer, logger, tracer, metrics }: IngestDeps) {
  return async (event: unknown): Promise<InvocationResult> => {
    logger.info("Received event");
    const style = invocationStyle(event);

    try {
      const outcome = await tracer.span<Result<StoredMessage>>(
        "persistMessage",
        async () => {
          const raw = decodeEvent(event);
          const result = raw.ok ? await writer.write(raw.value) : raw;
          if (!result.ok) {
            tracer.recordError(new IngestFailure(result.error));
          }
          return result;
        }
      );

      if (outcome.ok) {
        metrics.count("MessagePersisted");
      } else {
        logger.error(outcome.error.message, {
          errorKind: outcome.error.kind,
          cause: errorCause(outcome.error),
        });
        metrics.count("MessageFailed");
      }

      return respond(style, outcome);
    } finally {
      metrics.flush();
    }
  };
}
