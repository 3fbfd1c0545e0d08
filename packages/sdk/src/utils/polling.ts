import {
  MalformedResponseError,
  OperationFailedError,
  ProtocolError,
  ValidationError,
  WaitTimeoutError,
} from "../errors/index.js";
import {
  PollOutcome,
  type StatusFetcher,
  type StatusPayload,
  type WaitOptions,
  type WaitRequest,
  type WaitResult,
} from "../types/status.js";
import {
  DEFAULT_TIMEOUTS,
  MAX_DELETE_ATTEMPTS,
  POLLING_TIME_INTERVAL,
} from "./constants.js";
import {
  asPayload,
  classify,
  detailedStatus,
  isDeleteError,
} from "./status.js";
import { validateWaitTimeout } from "./validation.js";

export const ACCEPTED_STATUS_CODES: readonly number[] = [200, 201, 202, 204];

const IN_PROGRESS = "In progress";
const DELETED = "Deleted";

/**
 * Default progress sink
 */
export function writeProgressToStderr(detailedStatus: string): void {
  process.stderr.write(`detailed-status: ${detailedStatus}\n`);
}

/**
 * Emit `next` through `sink` when it differs from `previous`.
 *
 * @returns The value to remember as last reported
 */
export function reportDetailedStatus(
  previous: string | undefined,
  next: string,
  sink: (detailedStatus: string) => void,
): string {
  if (next !== previous) {
    sink(next);
  }
  return next;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function decodeBody(body: string | undefined): StatusPayload | undefined {
  if (!body) return undefined;

  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch (error) {
    throw new MalformedResponseError(
      body,
      error instanceof Error ? error : undefined,
    );
  }

  const payload = asPayload(decoded);
  if (!payload) {
    throw new MalformedResponseError(decoded);
  }
  return payload;
}

/**
 * Poll a status endpoint until the awaited operation reaches a terminal state.
 *
 * One cycle is: fetch `statusEndpoint/entityId`, classify the payload for
 * `kind`, report the detailed status when it changed, then sleep
 * {@link POLLING_TIME_INTERVAL} seconds. The budget drops by the interval
 * on every cycle that does not return.
 *
 * For deletes a 404 means the resource is gone. An `ERROR` state is
 * tolerated up to {@link MAX_DELETE_ATTEMPTS} times, since a resource that
 * was already in error keeps reporting it for a while after the delete
 * request. Otherwise a delete only returns on a terminal state that follows
 * an earlier terminal observation.
 *
 * @param request - Entity kind, id, endpoint, budget and delete flag
 * @param fetch - One GET against the status endpoint
 * @param options - Progress sink
 * @returns Last detailed status and payload; terminal does not imply success
 * @throws {ValidationError} If the timeout is not a positive integer
 * @throws {OperationFailedError} Wrapping a {@link ProtocolError},
 *   {@link MalformedResponseError}, {@link WaitTimeoutError} or transport failure
 *
 * @example
 * ```typescript
 * const result = await waitForStatus(
 *   {
 *     kind: 'NS',
 *     entityId: operationId,
 *     statusEndpoint: '/nslcm/v1/ns_lcm_op_occs',
 *   },
 *   createStatusFetcher(http),
 * );
 *
 * if (result.payload?.operationState === 'FAILED') {
 *   // terminal, but not successful
 * }
 * ```
 */
export async function waitForStatus(
  request: WaitRequest,
  fetch: StatusFetcher,
  options: WaitOptions = {},
): Promise<WaitResult> {
  const { kind, entityId, statusEndpoint, deleteOperation = false } = request;
  const timeout = request.timeout ?? DEFAULT_TIMEOUTS[kind];

  const validation = validateWaitTimeout(timeout);
  if (!validation.valid) {
    throw new ValidationError(validation.error ?? `Invalid timeout: ${timeout}`);
  }
  if (options.debug) {
    for (const warning of validation.warnings ?? []) {
      console.warn(`[nfvo] ${warning}`);
    }
  }

  const onProgress = options.onProgress ?? writeProgressToStderr;
  const emit = (value: string) => onProgress(value, kind);
  const path = `${statusEndpoint}/${entityId}`;

  let timeLeft = timeout;
  let reported: string | undefined;
  let deletedStatus: string | undefined;
  let deleteAttemptsLeft = MAX_DELETE_ATTEMPTS;
  let deleteErrors = 0;
  let timeToReturn = false;
  let polls = 0;

  try {
    while (true) {
      const response = await fetch(path);
      polls++;

      let payload: StatusPayload | undefined;
      if (deleteOperation && response.status === 404) {
        timeToReturn = true;
        deletedStatus = DELETED;
      } else if (!ACCEPTED_STATUS_CODES.includes(response.status)) {
        throw new ProtocolError(response.status, response.body ?? "");
      } else {
        payload = decodeBody(response.body);
      }

      if (!timeToReturn) {
        const outcome = classify(payload, kind);
        if (outcome === PollOutcome.Malformed) {
          throw new MalformedResponseError(payload);
        }

        if (outcome === PollOutcome.Finished) {
          if (isDeleteError(payload, kind, deleteOperation, deleteAttemptsLeft)) {
            deleteAttemptsLeft--;
            deleteErrors++;
          } else if (deleteOperation) {
            if (deleteAttemptsLeft < MAX_DELETE_ATTEMPTS) {
              timeToReturn = true;
            }
            deleteAttemptsLeft--;
          } else {
            timeToReturn = true;
          }
        }
      }

      reported = reportDetailedStatus(
        reported,
        detailedStatus(payload, kind, deletedStatus) || IN_PROGRESS,
        emit,
      );

      if (timeToReturn) {
        return { detailedStatus: reported, payload, polls, deleteErrors };
      }

      timeLeft -= POLLING_TIME_INTERVAL;
      await sleep(POLLING_TIME_INTERVAL * 1000);
      if (timeLeft <= 0) {
        throw new WaitTimeoutError(timeout);
      }
    }
  } catch (error) {
    throw new OperationFailedError(kind, toError(error));
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
