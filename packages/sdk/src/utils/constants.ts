import type { EntityKind } from "../types/status.js";

/**
 * Default wait budget for most operations (seconds)
 */
export const TIMEOUT_GENERIC_OPERATION = 600;

// One constant per kind so each can be tuned on its own
export const TIMEOUT_NSI_OPERATION = TIMEOUT_GENERIC_OPERATION;
export const TIMEOUT_SDNC_OPERATION = TIMEOUT_GENERIC_OPERATION;
export const TIMEOUT_VIM_OPERATION = TIMEOUT_GENERIC_OPERATION;
export const TIMEOUT_WIM_OPERATION = TIMEOUT_GENERIC_OPERATION;

/**
 * Full network service lifecycle operations (seconds)
 */
export const TIMEOUT_NS_OPERATION = 3600;

export const DEFAULT_TIMEOUTS: Readonly<Record<EntityKind, number>> = {
  NS: TIMEOUT_NS_OPERATION,
  NSI: TIMEOUT_NSI_OPERATION,
  SDNC: TIMEOUT_SDNC_OPERATION,
  VIM: TIMEOUT_VIM_OPERATION,
  WIM: TIMEOUT_WIM_OPERATION,
};

/**
 * Seconds between two status polls
 */
export const POLLING_TIME_INTERVAL = 1;

/**
 * ERROR observations tolerated while waiting on a delete
 */
export const MAX_DELETE_ATTEMPTS = 3;

/**
 * Client version
 */
export const SDK_VERSION = "0.1.0";
