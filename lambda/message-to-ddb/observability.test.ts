import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient, PutCommand } from "@aws-sdk/lib-dynamodb";
import { Tracer } from "@aws-lambda-powertools/tracer";
import { mockClient } from "aws-sdk-client-mock";
import { Segment } from "aws-xray-sdk-core";

import { directEvent, fakeSinks, messageBody } from "./fixtures.js";
import { createHandler } from "./handler.js";
import { PowertoolsTraceSink } from "./observability.js";
import { MessageStoreWriter } from "./store.js";

const ddbMock = mockClient(DynamoDBDocumentClient);
const client = DynamoDBDocumentClient.from(
  new DynamoDBClient({ region: "us-east-2" })
);

let tracer: Tracer;
let root: Segment;
let setSegment: jest.SpyInstance<void, Parameters<Tracer["setSegment"]>>;

const openedSubsegment = () => {
  const [[subsegment]] = setSegment.mock.calls;
  return subsegment;
};

beforeEach(() => {
  ddbMock.reset();
  ddbMock.on(PutCommand).resolves({});
  tracer = new Tracer({ serviceName: "message-ingest" });
  root = new Segment("root");
  jest.spyOn(tracer, "isTracingEnabled").mockReturnValue(true);
  jest.spyOn(tracer, "getSegment").mockReturnValue(root);
  setSegment = jest
    .spyOn(tracer, "setSegment")
    .mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("PowertoolsTraceSink", () => {
  test("opens, closes and leaves a named subsegment", async () => {
    const sink = new PowertoolsTraceSink(tracer);

    await expect(sink.span("persistMessage", async () => "done")).resolves.toBe(
      "done"
    );

    const subsegment = openedSubsegment();
    expect(subsegment).toMatchObject({ name: "persistMessage" });
    expect(subsegment.isClosed()).toBe(true);
    expect(subsegment).not.toHaveProperty("fault");
    expect(setSegment).toHaveBeenCalledTimes(2);
    expect(setSegment.mock.calls[1][0]).toBe(root);
  });

  test("records an error reported while the span is open", async () => {
    const sink = new PowertoolsTraceSink(tracer);

    await sink.span("persistMessage", async () => {
      sink.recordError(new Error("put failed"));
    });

    expect(openedSubsegment()).toMatchObject({
      fault: true,
      cause: { exceptions: [expect.objectContaining({ message: "put failed" })] },
    });
  });

  test("records and rethrows an error thrown inside the span", async () => {
    const sink = new PowertoolsTraceSink(tracer);

    await expect(
      sink.span("persistMessage", async () => {
        throw new Error("socket closed");
      })
    ).rejects.toThrow("socket closed");

    const subsegment = openedSubsegment();
    expect(subsegment).toMatchObject({ fault: true });
    expect(subsegment.isClosed()).toBe(true);
    expect(setSegment.mock.calls[1][0]).toBe(root);
  });

  test("ignores errors recorded outside a span", () => {
    const sink = new PowertoolsTraceSink(tracer);

    sink.recordError(new Error("late"));

    expect(root).not.toHaveProperty("fault");
  });

  test("runs the callback untraced when tracing is disabled", async () => {
    jest.spyOn(tracer, "isTracingEnabled").mockReturnValue(false);
    const sink = new PowertoolsTraceSink(tracer);

    await expect(sink.span("persistMessage", async () => 7)).resolves.toBe(7);
    expect(setSegment).not.toHaveBeenCalled();
  });
});

describe("handler tracing", () => {
  const ingestWith = (sink: PowertoolsTraceSink) => {
    const { logger, metrics } = fakeSinks();
    return createHandler({
      writer: new MessageStoreWriter({
        client,
        tableName: "test-table",
        logger,
      }),
      logger,
      tracer: sink,
      metrics,
    });
  };

  test("marks the persistMessage subsegment as failed when the body is invalid", async () => {
    const ingest = ingestWith(new PowertoolsTraceSink(tracer));

    const result = await ingest(directEvent("not json"));

    expect(result).toEqual({ statusCode: 500, body: '{"message": "error"}' });
    const subsegment = openedSubsegment();
    expect(subsegment).toMatchObject({
      name: "persistMessage",
      fault: true,
      cause: { exceptions: [expect.objectContaining({ type: "ParseError" })] },
    });
    expect(subsegment.isClosed()).toBe(true);
    expect(setSegment.mock.calls[1][0]).toBe(root);
  });

  test("leaves the subsegment clean when the message is persisted", async () => {
    const ingest = ingestWith(new PowertoolsTraceSink(tracer));

    await ingest(directEvent(messageBody()));

    const subsegment = openedSubsegment();
    expect(subsegment).not.toHaveProperty("fault");
    expect(subsegment.isClosed()).toBe(true);
  });
});
