import { SDKError } from "./base.js";

/**
 * Request never got a response (refused, reset, timed out)
 */
export class NetworkError extends SDKError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", undefined, cause);
  }
}

/**
 * 401: missing, invalid or expired bearer token
 */
export class AuthenticationError extends SDKError {
  constructor(message = "Invalid or expired token") {
    super(message, "AUTHENTICATION_ERROR", 401);
  }
}

/**
 * 403: token valid but the project or role does not allow the call
 */
export class AuthorizationError extends SDKError {
  constructor(message = "Access forbidden") {
    super(message, "AUTHORIZATION_ERROR", 403);
  }
}

/**
 * 404, or no resource in a collection matches a name or id
 */
export class NotFoundError extends SDKError {
  constructor(message: string) {
    super(message, "NOT_FOUND", 404);
  }
}

/**
 * 429
 */
export class RateLimitError extends SDKError {
  constructor(
    message: string,
    public retryAfter?: number, // seconds
  ) {
    super(message, "RATE_LIMIT_ERROR", 429);
  }
}

/**
 * 400/422 from the server, or arguments rejected before any request
 */
export class ValidationError extends SDKError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR", 400);
  }
}

/**
 * Any other non-2xx answer
 */
export class APIError extends SDKError {
  constructor(
    message: string,
    statusCode: number,
    public response?: unknown,
  ) {
    super(message, "API_ERROR", statusCode);
  }
}
