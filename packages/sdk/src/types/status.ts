/**
 * Status polling type definitions.
 *
 * @packageDocumentation
 */

/**
 * Entity kinds that support waiting on an asynchronous operation.
 *
 * - **NS**: network service instance (state in `operationState` of the operation record)
 * - **NSI**: network slice instance (same layout as NS)
 * - **SDNC**, **VIM**, **WIM**: accounts (state in `_admin.operationalState` of the resource)
 */
export const ENTITY_KINDS = ["NS", "NSI", "SDNC", "VIM", "WIM"] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

/**
 * Lifecycle operation states reported for NS and NSI operations
 */
export type OperationState =
  | "PROCESSING"
  | "COMPLETED"
  | "PARTIALLY_COMPLETED"
  | "FAILED_TEMP"
  | "FAILED"
  | "ROLLING_BACK"
  | "ROLLED_BACK";

/**
 * Administrative operational states reported for accounts
 */
export type OperationalState = "ENABLED" | "DISABLED" | "ERROR" | "PROCESSING";

/**
 * Decoded JSON body of one status poll. Layout depends on the entity kind,
 * so fields are read through the kind's policy rather than typed here.
 */
export type StatusPayload = Record<string, unknown>;

/**
 * Classification of a single status payload
 */
export const PollOutcome = {
  Finished: "finished",
  Pending: "pending",
  Malformed: "malformed",
} as const;

export type PollOutcome = (typeof PollOutcome)[keyof typeof PollOutcome];

/**
 * Raw answer of one status request
 */
export interface StatusResponse {
  status: number;
  body?: string;
}

/**
 * Performs one GET against `path` and returns the status code with the raw body.
 * Must not retry or interpret the body.
 */
export type StatusFetcher = (path: string) => Promise<StatusResponse>;

/**
 * Receives every change of the reported detailed status
 */
export type ProgressSink = (detailedStatus: string, kind: EntityKind) => void;

/**
 * What to wait for
 */
export interface WaitRequest {
  kind: EntityKind;
  /** Operation id for create/action waits, resource or operation id for deletes */
  entityId: string;
  /** Base path; `/{entityId}` is appended on every poll */
  statusEndpoint: string;
  /** Budget in seconds. Default: per-kind default timeout */
  timeout?: number;
  /** Enables 404-as-success and the delete retry budget */
  deleteOperation?: boolean;
}

export interface WaitOptions {
  /** Progress sink. Default: writes `detailed-status: <value>` to stderr */
  onProgress?: ProgressSink;
  /** Log timeout warnings with `console.warn`. Default: false */
  debug?: boolean;
}

/**
 * Outcome of a wait that reached a terminal state.
 *
 * A terminal state is not necessarily a successful one: inspect `payload`
 * (for example `operationState === "FAILED"`) to tell them apart.
 */
export interface WaitResult {
  /** Last reported detailed status (`Deleted` when a delete ended in 404) */
  detailedStatus: string;
  /** Payload of the last poll; absent when the last answer had no body */
  payload?: StatusPayload;
  /** Number of status requests performed */
  polls: number;
  /** ERROR observations absorbed while deleting */
  deleteErrors: number;
}
