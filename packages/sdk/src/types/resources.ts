import type { WaitResult } from "./status.js";

/**
 * Minimal shape shared by every listed resource
 */
export interface ResourceRecord {
  _id: string;
  name?: string;
  _admin?: {
    operationalState?: string;
    "detailed-status"?: string;
    [key: string]: unknown;
  };
  [key: string]: unknown;
}

export interface NsInstance extends ResourceRecord {
  "nsd-name-ref"?: string;
  "operational-status"?: string;
  "config-status"?: string;
  "detailed-status"?: string;
}

/**
 * Lifecycle operation occurrence of an NS or NSI
 */
export interface LcmOperation {
  _id: string;
  id?: string;
  lcmOperationType?: string;
  operationState?: string;
  nsInstanceId?: string;
  netsliceInstanceId?: string;
  "detailed-status"?: string;
  startTime?: number;
  statusEnteredTime?: number;
  [key: string]: unknown;
}

export interface CreateNsOptions {
  nsdId: string;
  nsName: string;
  vimAccountId: string;
  nsDescription?: string;
  /** Public keys injected into the deployed VNFs */
  sshKeys?: string[];
  /** Extra instantiation parameters merged into the request body */
  config?: Record<string, unknown>;
}

export interface CreateNsiOptions {
  nstId: string;
  nsiName: string;
  vimAccountId: string;
  nsiDescription?: string;
  sshKeys?: string[];
  config?: Record<string, unknown>;
}

/**
 * Scaling direction for a VNF scaling group
 */
export type ScaleDirection = "in" | "out";

export interface WaitFlag {
  /** Block until the triggered operation reaches a terminal state */
  wait?: boolean;
}

export interface DeleteOptions extends WaitFlag {
  /** Ask the server to delete regardless of the resource state */
  force?: boolean;
}

export interface CreateResult {
  id: string;
  /** Id of the lifecycle operation started by the request, for NS and NSI */
  operationId?: string;
  result?: WaitResult;
}

export interface DeleteResult {
  /**
   * - `deleted`: the server deleted the resource synchronously
   * - `in-progress`: deletion accepted, not waited for
   * - `finished`: deletion accepted and waited for until a terminal state
   */
  status: "deleted" | "in-progress" | "finished";
  operationId?: string;
  result?: WaitResult;
}
