export type Result<T, E = IngestError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export type IngestError =
  | { kind: "DecodeError"; message: string }
  | { kind: "ParseError"; message: string; cause?: unknown }
  | {
      kind: "ValidationError";
      reason: "missing";
      field: string;
      message: string;
    }
  | {
      kind: "ValidationError";
      reason: "wrong_type";
      field: string;
      expected: string;
      received: string;
      message: string;
    }
  | { kind: "StoreError"; message: string; cause: unknown };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const fail = (error: IngestError): Result<never> => ({
  ok: false,
  error,
});

// Thrown back to the queue trigger so the message is redelivered.
export class IngestFailure extends Error {
  readonly error: IngestError;

  constructor(error: IngestError) {
    super(error.message);
    this.name = error.kind;
    this.error = error;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const errorCause = (error: IngestError): unknown =>
  "cause" in error ? error.cause : undefined;
