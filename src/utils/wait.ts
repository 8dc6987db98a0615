/**
 * Bounded polling
 *
 * Repeats a readiness check with a fixed delay until it passes or an overall
 * deadline elapses. The most recent failure is kept as the cause of the
 * timeout error so callers see why the target never became ready.
 *
 * @example
 * ```typescript
 * await pollUntil(async () => (await client.sys.initStatus()).initialized, {
 *   timeoutMs: 5000,
 *   intervalMs: 10,
 * });
 * ```
 */

import { FixtureError, FixtureErrorType, toError } from '../types/errors.js';
import { sleep, type Sleep } from './retry.js';

/**
 * Options for pollUntil
 */
export interface PollOptions {
  /** Overall deadline in ms - default: 5000 */
  timeoutMs?: number;
  /** Delay between checks in ms - default: 10 */
  intervalMs?: number;
  /** Stops polling early; the abort reason is thrown */
  signal?: AbortSignal;
  /** Sleep implementation */
  sleep?: Sleep;
  /** Label used in the timeout message */
  description?: string;
}

/**
 * Result from pollUntil
 */
export interface PollResult {
  /** Number of checks performed, including the successful one */
  attempts: number;
  /** Time taken in ms */
  elapsed: number;
}

function abortReason(signal: AbortSignal): Error {
  return toError(signal.reason ?? new Error('Polling aborted'));
}

/**
 * Poll `check` until it resolves `true`.
 *
 * A rejected check or a `false` result counts as "not ready yet".
 *
 * @throws FixtureError (READINESS_TIMEOUT) carrying the most recent failure
 * @throws the signal's abort reason when aborted
 */
export async function pollUntil(
  check: () => Promise<boolean>,
  options: PollOptions = {}
): Promise<PollResult> {
  const {
    timeoutMs = 5000,
    intervalMs = 10,
    signal,
    sleep: wait = sleep,
    description = 'condition',
  } = options;

  const startTime = Date.now();
  const deadline = startTime + timeoutMs;
  let attempts = 0;
  let lastError: Error | undefined;

  do {
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    attempts++;
    try {
      if (await check()) {
        return { attempts, elapsed: Date.now() - startTime };
      }
      lastError = new Error(`${description} not satisfied`);
    } catch (error) {
      lastError = toError(error);
    }

    if (signal?.aborted) {
      throw abortReason(signal);
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      break;
    }
    await wait(Math.min(intervalMs, remaining));
  } while (Date.now() < deadline);

  const cause = lastError ?? new Error(`${description} never checked`);
  throw new FixtureError(
    FixtureErrorType.READINESS_TIMEOUT,
    'READINESS_TIMEOUT',
    `${description} not met after ${timeoutMs}ms (${attempts} attempts): ${cause.message}`,
    { cause, details: { attempts, timeoutMs } }
  );
}
