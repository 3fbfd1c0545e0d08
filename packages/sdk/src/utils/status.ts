import {
  PollOutcome,
  type EntityKind,
  type StatusPayload,
} from "../types/status.js";

/**
 * Where a kind keeps its state and which state values end a wait
 */
interface StatusFieldPolicy {
  finishedStates: readonly string[];
  /** Object holding `detailed-status` and the state field */
  container: (payload: StatusPayload) => StatusPayload | undefined;
  stateField: string;
}

// NS and NSI report on the operation record itself
const LIFECYCLE_POLICY: StatusFieldPolicy = {
  finishedStates: ["COMPLETED", "PARTIALLY_COMPLETED", "FAILED_TEMP", "FAILED"],
  container: (payload) => payload,
  stateField: "operationState",
};

// Accounts report under `_admin`
const ADMIN_POLICY: StatusFieldPolicy = {
  finishedStates: ["ENABLED", "ERROR"],
  container: (payload) => asPayload(payload._admin),
  stateField: "operationalState",
};

const POLICIES = {
  NS: LIFECYCLE_POLICY,
  NSI: LIFECYCLE_POLICY,
  SDNC: ADMIN_POLICY,
  VIM: ADMIN_POLICY,
  WIM: ADMIN_POLICY,
} satisfies Record<EntityKind, StatusFieldPolicy>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrow a decoded JSON value to an object payload
 */
export function asPayload(value: unknown): StatusPayload | undefined {
  return isRecord(value) ? value : undefined;
}

function readString(
  payload: StatusPayload | undefined,
  kind: EntityKind,
  field: string,
): string | undefined {
  if (!payload) return undefined;
  const value = POLICIES[kind].container(payload)?.[field];
  return typeof value === "string" ? value : undefined;
}

/**
 * Terminal state values for a kind. Success and failure are both terminal.
 */
export function finishedStates(kind: EntityKind): readonly string[] {
  return POLICIES[kind].finishedStates;
}

/**
 * Extract the state string, or undefined when the field or its parent is missing
 */
export function operationalState(
  payload: StatusPayload | undefined,
  kind: EntityKind,
): string | undefined {
  return readString(payload, kind, POLICIES[kind].stateField);
}

export function classify(
  payload: StatusPayload | undefined,
  kind: EntityKind,
): PollOutcome {
  if (!payload || Object.keys(payload).length === 0) {
    return PollOutcome.Malformed;
  }
  const state = operationalState(payload, kind);
  if (!state) {
    return PollOutcome.Malformed;
  }
  return finishedStates(kind).includes(state)
    ? PollOutcome.Finished
    : PollOutcome.Pending;
}

/**
 * Detailed status to report for a poll. `override` wins when set; an
 * undefined result means the caller reports "In progress". A structured
 * value is reported as its JSON text.
 */
export function detailedStatus(
  payload: StatusPayload | undefined,
  kind: EntityKind,
  override?: string,
): string | undefined {
  if (override) return override;
  if (!payload) return undefined;
  const value = POLICIES[kind].container(payload)?.["detailed-status"];
  if (!value) return undefined;
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * True when a delete in flight reports ERROR and retry budget remains
 */
export function isDeleteError(
  payload: StatusPayload | undefined,
  kind: EntityKind,
  isDeleteOperation: boolean,
  deleteRetriesLeft: number,
): boolean {
  return (
    isDeleteOperation &&
    deleteRetriesLeft > 0 &&
    operationalState(payload, kind) === "ERROR"
  );
}
