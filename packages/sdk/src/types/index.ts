/**
 * Type definitions for the orchestration client
 */

export type { ClientConfig, ResolvedClientConfig } from "./config.js";
export type {
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
} from "./status.js";
export type {
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
} from "./resources.js";
