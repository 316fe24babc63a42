import type { PoolName } from "./types.js";

export type QuizErrorCode =
  | "STORE_UNAVAILABLE"
  | "INVALID_REQUEST_COUNT"
  | "QUIZ_STATE";

export class QuizError extends Error {
  public readonly code: QuizErrorCode;

  constructor(code: QuizErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.name = "QuizError";
  }
}

/**
 * A question store could not be read: missing or unreadable file, unexpected
 * schema, failed query or a row that does not validate.
 */
export class StoreUnavailableError extends QuizError {
  public readonly pool: PoolName;

  constructor(pool: PoolName, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("STORE_UNAVAILABLE", `Question store '${pool}' unavailable: ${reason}`, {
      cause,
    });
    this.pool = pool;
    this.name = "StoreUnavailableError";
  }
}

export class InvalidRequestCountError extends QuizError {
  public readonly requested: number;

  constructor(requested: number) {
    super(
      "INVALID_REQUEST_COUNT",
      `Requested question count must be a positive integer, got ${requested}`
    );
    this.requested = requested;
    this.name = "InvalidRequestCountError";
  }
}

export class QuizStateError extends QuizError {
  constructor(message: string) {
    super("QUIZ_STATE", message);
    this.name = "QuizStateError";
  }
}
