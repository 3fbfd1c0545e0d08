import { APIError, NetworkError, RateLimitError } from "../errors/index.js";

export interface RetryOptions {
  maxRetries: number;
  initialDelay: number;
  maxDelay: number;
  multiplier: number;
  onRetry?: (attempt: number, error: Error) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
};

/**
 * Check if an error is retriable.
 *
 * Errors arrive already mapped by the client's response interceptor.
 */
export function isRetriableError(error: unknown): boolean {
  // No response at all
  if (error instanceof NetworkError) {
    return true;
  }

  if (error instanceof RateLimitError) {
    return true;
  }

  if (error instanceof APIError) {
    const status = error.statusCode ?? 0;
    // Server errors (5xx) and request timeout (408)
    return status >= 500 || status === 408;
  }

  // Don't retry auth, validation, not-found or local errors
  return false;
}

/**
 * Get delay before next retry attempt
 */
export function getRetryDelay(
  attempt: number,
  options: RetryOptions,
  error: unknown,
): number {
  if (error instanceof RateLimitError && error.retryAfter !== undefined) {
    return error.retryAfter * 1000;
  }

  // Exponential backoff with jitter
  const delay = Math.min(
    options.initialDelay * Math.pow(options.multiplier, attempt),
    options.maxDelay,
  );

  // Add jitter (±25%)
  const jitter = delay * 0.25 * (Math.random() * 2 - 1);
  return Math.floor(delay + jitter);
}

/**
 * Retry an idempotent async operation with exponential backoff
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isRetriableError(error) || attempt >= opts.maxRetries) {
        throw error;
      }

      const delay = getRetryDelay(attempt, opts, error);
      opts.onRetry?.(
        attempt + 1,
        error instanceof Error ? error : new Error(String(error)),
      );

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
