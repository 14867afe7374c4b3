/**
 * Reusable retry logic utility
 */

import { ExhaustionError, toError } from "../errors/index";

export interface RetryOptions<T> {
  maxAttempts: number;
  baseDelayMs: number;
  backoffMultiplier?: number;
  retryCondition?: (error: Error) => boolean;
  /** Runs before every attempt, e.g. to clear session state */
  beforeAttempt?: (attempt: number) => Promise<void>;
  /** A result failing this check counts as a failed attempt */
  isAcceptable?: (result: T) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Executes an operation with retry logic and exponential backoff.
 * Attempts are strictly sequential. Only a thrown error backs off, for
 * baseDelayMs * backoffMultiplier^n after attempt n (0-based); an
 * unacceptable result moves straight on to the next attempt.
 * @param operation - The operation to retry, given the 0-based attempt number
 * @param options - Retry configuration
 * @returns The first acceptable result
 * @throws The last attempt's error once all attempts are exhausted
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions<T>,
): Promise<T> {
  const {
    maxAttempts,
    baseDelayMs,
    backoffMultiplier = 2,
    retryCondition = () => true,
    beforeAttempt,
    isAcceptable = () => true,
    sleep = defaultSleep,
  } = options;

  let lastError: Error = new ExhaustionError("No attempts were made");

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      if (beforeAttempt) await beforeAttempt(attempt);
      const result = await operation(attempt);
      if (isAcceptable(result)) return result;
      lastError = new ExhaustionError(
        `Attempt ${attempt + 1} returned no usable result`,
      );
      continue;
    } catch (error) {
      lastError = toError(error);

      // Check if we should retry this error
      if (!retryCondition(lastError)) {
        throw lastError;
      }
    }

    if (attempt < maxAttempts - 1) {
      await sleep(baseDelayMs * Math.pow(backoffMultiplier, attempt));
    }
  }

  throw lastError;
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));
