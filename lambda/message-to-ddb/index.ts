import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import type { Context, Handler } from "aws-lambda";

import { loadConfig } from "./config.js";
import type { InvocationEvent } from "./decode.js";
import { createHandler } from "./handler.js";
import type { InvocationResult } from "./handler.js";
import { powertoolsSinks } from "./observability.js";
import { MessageStoreWriter } from "./store.js";

const config = loadConfig(process.env);
const { logger, tracer, metrics } = powertoolsSinks(config);

const dynamo = tracer.tracer.captureAWSv3Client(
  DynamoDBDocumentClient.from(new DynamoDBClient({}))
);

const ingest = createHandler({
  writer: new MessageStoreWriter({
    client: dynamo,
    tableName: config.tableName,
    logger,
  }),
  logger,
  tracer,
  metrics,
});

export const handler: Handler<InvocationEvent, InvocationResult> = async (
  event: InvocationEvent,
  context: Context
): Promise<InvocationResult> => {
  logger.logger.addContext(context);
  return ingest(event);
};
