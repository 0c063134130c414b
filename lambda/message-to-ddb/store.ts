import { DynamoDBDocumentClient, PutCommand } from "@aws-sdk/lib-dynamodb";
import { v4 as uuidv4 } from "uuid";

import { fail, ok } from "./errors.js";
import type { Result } from "./errors.js";
import { parseMessage } from "./message.js";
import type { LogSink } from "./observability.js";

// 30 days
export const RETENTION_SECONDS = 30 * 24 * 60 * 60;

export interface StoredMessage {
  id: string;
  email: string;
  name: string;
  message: string;
  expires_at: number;
}

export interface MessageStoreWriterOptions {
  client: DynamoDBDocumentClient;
  tableName: string;
  logger: LogSink;
  newId?: () => string;
  now?: () => number;
}

export class MessageStoreWriter {
  private readonly client: DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly logger: LogSink;
  private readonly newId: () => string;
  private readonly now: () => number;

  constructor(options: MessageStoreWriterOptions) {
    this.client = options.client;
    this.tableName = options.tableName;
    this.logger = options.logger;
    this.newId = options.newId ?? uuidv4;
    this.now = options.now ?? Date.now;
  }

  /**
   * Validates a raw message body and puts it as a single row. Nothing is sent to
   * DynamoDB unless the body parses and all three fields are strings.
   */
  async write(raw: string): Promise<Result<StoredMessage>> {
    const parsed = parseMessage(raw);
    if (!parsed.ok) {
      return parsed;
    }

    const item: StoredMessage = {
      id: this.newId(),
      email: parsed.value.email,
      name: parsed.value.name,
      message: parsed.value.message,
      expires_at: Math.floor(this.now() / 1000) + RETENTION_SECONDS,
    };

    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: { ...item },
        })
      );
    } catch (err) {
      const description =
        err instanceof Error ? `${err.name}: ${err.message}` : String(err);
      return fail({ kind: "StoreError", message: description, cause: err });
    }

    this.logger.info(`Message written to table: ${this.tableName}`);
    return ok(item);
  }
}
