/**
 * Network-function-orchestration client with operation status polling
 *
 * @packageDocumentation
 */

// Main client
export { NfvoClient, mapError } from "./client.js";

// Services
export { NsService } from "./services/ns.js";
export { NsiService } from "./services/nsi.js";
export { PduService } from "./services/pdu.js";
export { AccountService } from "./services/accounts.js";
export type { AccountKind } from "./services/accounts.js";

// Types
export type {
  ClientConfig,
  ResolvedClientConfig,
  EntityKind,
  OperationState,
  OperationalState,
  StatusPayload,
  StatusResponse,
  StatusFetcher,
  ProgressSink,
  WaitRequest,
  WaitOptions,
  WaitResult,
  ResourceRecord,
  NsInstance,
  LcmOperation,
  CreateNsOptions,
  CreateNsiOptions,
  ScaleDirection,
  WaitFlag,
  DeleteOptions,
  CreateResult,
  DeleteResult,
} from "./types/index.js";
export { ENTITY_KINDS, PollOutcome } from "./types/status.js";

// Errors
export {
  SDKError,
  AuthenticationError,
  AuthorizationError,
  RateLimitError,
  ValidationError,
  NetworkError,
  NotFoundError,
  APIError,
  ProtocolError,
  MalformedResponseError,
  WaitTimeoutError,
  OperationFailedError,
} from "./errors/index.js";

// Constants
export {
  TIMEOUT_GENERIC_OPERATION,
  TIMEOUT_NS_OPERATION,
  TIMEOUT_NSI_OPERATION,
  TIMEOUT_SDNC_OPERATION,
  TIMEOUT_VIM_OPERATION,
  TIMEOUT_WIM_OPERATION,
  DEFAULT_TIMEOUTS,
  POLLING_TIME_INTERVAL,
  MAX_DELETE_ATTEMPTS,
  SDK_VERSION,
} from "./utils/constants.js";

// Status polling (for callers with their own transport)
export {
  waitForStatus,
  reportDetailedStatus,
  writeProgressToStderr,
  ACCEPTED_STATUS_CODES,
} from "./utils/polling.js";
export {
  classify,
  detailedStatus,
  finishedStates,
  isDeleteError,
  operationalState,
} from "./utils/status.js";
export { createStatusFetcher } from "./lib/http.js";

// Utilities (for advanced use)
export { isUuid, validateWaitTimeout } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";
