/**
 * Error classes for the orchestration client
 */

export { SDKError } from "./base.js";
export {
  NetworkError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  RateLimitError,
  ValidationError,
  APIError,
} from "./http.js";
export {
  ProtocolError,
  MalformedResponseError,
  WaitTimeoutError,
  OperationFailedError,
} from "./wait.js";
