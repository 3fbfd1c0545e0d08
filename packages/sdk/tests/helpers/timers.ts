import { vi } from "vitest";

export type Settled<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

/**
 * Run fake timers until `promise` settles. The rejection handler is attached
 * before any timer fires.
 */
export async function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  const settled = promise.then(
    (value): Settled<T> => ({ ok: true, value }),
    (error: unknown): Settled<T> => ({ ok: false, error }),
  );
  await vi.runAllTimersAsync();
  return settled;
}

/**
 * Settle and return the value, failing the test on rejection
 */
export async function resolveWithTimers<T>(promise: Promise<T>): Promise<T> {
  const outcome = await settle(promise);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}

/**
 * Settle and return the rejection, failing the test on success
 */
export async function rejectWithTimers(promise: Promise<unknown>): Promise<unknown> {
  const outcome = await settle(promise);
  if (outcome.ok) {
    throw new Error("Expected promise to reject");
  }
  return outcome.error;
}
