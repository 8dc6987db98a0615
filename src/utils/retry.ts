/**
 * Retry Utility
 * Bounded retry with a randomized delay between attempts
 */

import { toError } from '../types/errors.js';

/**
 * Source of uniformly distributed numbers in [0, 1)
 */
export type RandomSource = () => number;

export type Sleep = (ms: number) => Promise<void>;

/**
 * Retry options
 */
export interface RetryOptions {
  /** Maximum number of attempts (default: 11) */
  maxAttempts?: number;
  /** Upper bound of the random delay between attempts in ms (default: 2000) */
  maxDelay?: number;
  /** Random source for the delay (default: Math.random) */
  random?: RandomSource;
  /** Sleep implementation (default: setTimeout based) */
  sleep?: Sleep;
  /** Callback called before each retry */
  onRetry?: (error: Error, attempt: number, nextDelay: number) => void | Promise<void>;
  /** Function to determine if error is retryable */
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Custom error for retry failures
 */
export class RetryError extends Error {
  public readonly lastError: Error;
  public readonly attempts: number;

  constructor(message: string, lastError: Error, attempts: number) {
    super(message, { cause: lastError });
    this.name = 'RetryError';
    this.lastError = lastError;
    this.attempts = attempts;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, RetryError.prototype);
  }
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay drawn uniformly from [0, maxDelay)
 */
export function jitterDelay(maxDelay: number, random: RandomSource = Math.random): number {
  return Math.floor(random() * maxDelay);
}

/**
 * Retry a function with a uniformly random delay between attempts.
 *
 * The attempt number (1-based) is passed to `fn`. An error on the final
 * attempt, or one rejected by `shouldRetry`, ends the loop.
 */
export async function retryWithJitter<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 11,
    maxDelay = 2000,
    random = Math.random,
    sleep: wait = sleep,
    onRetry,
    shouldRetry,
  } = options;

  let lastError: Error = new Error('No attempts made');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = toError(error);

      if (shouldRetry && !shouldRetry(lastError)) {
        throw lastError;
      }

      if (attempt >= maxAttempts) {
        break;
      }

      const delayMs = jitterDelay(maxDelay, random);

      if (onRetry) {
        await onRetry(lastError, attempt, delayMs);
      }

      await wait(delayMs);
    }
  }

  throw new RetryError(
    `Failed after ${maxAttempts} attempts: ${lastError.message}`,
    lastError,
    maxAttempts
  );
}
