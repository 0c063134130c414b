import type { Context, SQSEvent, SQSRecord } from "aws-lambda";

import type { DirectEvent } from "./decode.js";
import type { LogSink, MetricSink, TraceSink } from "./observability.js";

export const messageBody = (overrides: Record<string, unknown> = {}): string =>
  JSON.stringify({
    name: "test",
    email: "test@example.com",
    message: "test",
    ...overrides,
  });

export const sqsRecord = (body: string, messageId = "message-1"): SQSRecord => ({
  messageId,
  receiptHandle: "test-receipt-handle",
  body,
  attributes: {
    ApproximateReceiveCount: "1",
    SentTimestamp: "1545082649183",
    SenderId: "test-sender",
    ApproximateFirstReceiveTimestamp: "1545082649185",
  },
  messageAttributes: {},
  md5OfBody: "",
  eventSource: "aws:sqs",
  eventSourceARN: "arn:aws:sqs:us-east-2:123456789012:test-queue",
  awsRegion: "us-east-2",
});

export const queueEvent = (...bodies: string[]): SQSEvent => ({
  Records: bodies.map((body, index) => sqsRecord(body, `message-${index + 1}`)),
});

export const directEvent = (body: string): DirectEvent => ({ body });

export const lambdaContext: Context = {
  callbackWaitsForEmptyEventLoop: true,
  functionName: "message-ingest",
  functionVersion: "$LATEST",
  invokedFunctionArn:
    "arn:aws:lambda:us-east-2:123456789012:function:message-ingest",
  memoryLimitInMB: "128",
  awsRequestId: "test-request-id",
  logGroupName: "/aws/lambda/message-ingest",
  logStreamName: "test-stream",
  getRemainingTimeInMillis: () => 30000,
  done: () => undefined,
  fail: () => undefined,
  succeed: () => undefined,
};

export interface FakeSinks {
  logger: LogSink & { info: jest.Mock; error: jest.Mock };
  tracer: TraceSink & { spans: string[]; recordError: jest.Mock };
  metrics: MetricSink & { count: jest.Mock; flush: jest.Mock };
}

export const fakeSinks = (): FakeSinks => {
  const spans: string[] = [];
  return {
    logger: { info: jest.fn(), error: jest.fn() },
    tracer: {
      spans,
      span: <T>(name: string, fn: () => Promise<T>): Promise<T> => {
        spans.push(name);
        return fn();
      },
      recordError: jest.fn(),
    },
    metrics: { count: jest.fn(), flush: jest.fn() },
  };
};
