import type { EntityKind } from "../types/status.js";
import { SDKError } from "./base.js";

/**
 * Error thrown when the status endpoint answers outside the accepted status codes.
 * The message is the raw response body.
 */
export class ProtocolError extends SDKError {
  constructor(
    statusCode: number,
    public body: string,
  ) {
    super(body, "PROTOCOL_ERROR", statusCode);
  }
}

/**
 * Error thrown when a status payload carries no recognisable state
 */
export class MalformedResponseError extends SDKError {
  constructor(
    public payload: unknown,
    cause?: Error,
  ) {
    super(
      `unexpected response from server - ${describePayload(payload)}`,
      "MALFORMED_RESPONSE",
      undefined,
      cause,
    );
  }
}

/**
 * Error thrown when the wait budget runs out before a terminal state
 */
export class WaitTimeoutError extends SDKError {
  constructor(public timeoutSeconds: number) {
    super(
      `operation timeout, waited for ${timeoutSeconds} seconds`,
      "TIMEOUT_ERROR",
    );
  }
}

/**
 * Outer error of a wait session. Every failure raised while polling
 * reaches the caller wrapped in this class.
 */
export class OperationFailedError extends SDKError {
  constructor(
    public entityKind: EntityKind,
    cause: Error,
  ) {
    super(
      `Operation failed for ${entityKind}:\nerror:\n${cause.message}`,
      "OPERATION_FAILED",
      cause instanceof SDKError ? cause.statusCode : undefined,
      cause,
    );
  }
}

function describePayload(payload: unknown): string {
  if (payload === undefined) return "";
  if (typeof payload === "string") return payload;
  return JSON.stringify(payload);
}
