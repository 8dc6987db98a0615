/**
 * Fixture configuration
 * Validates caller options with Zod and fills defaults from the environment
 */

import { z } from 'zod';
import { FixtureError, FixtureErrorType } from '../types/errors.js';

export const DEFAULT_BINARY = 'vault';
export const DEFAULT_ATTEMPTS = 11;
export const DEFAULT_START_TIMEOUT_MS = 500;
export const DEFAULT_STOP_TIMEOUT_MS = 1000;
export const DEFAULT_READINESS_TIMEOUT_MS = 5000;
export const DEFAULT_READINESS_INTERVAL_MS = 10;
export const DEFAULT_MAX_BACKOFF_MS = 2000;
export const CI_TIMEOUT_MULTIPLIER = 3;

/**
 * Readiness polling options schema
 */
export const ReadinessOptionsSchema = z.object({
  timeoutMs: z.number().int().positive().default(DEFAULT_READINESS_TIMEOUT_MS),
  intervalMs: z.number().int().nonnegative().default(DEFAULT_READINESS_INTERVAL_MS),
});

/**
 * Fixture options schema
 */
export const FixtureOptionsSchema = z.object({
  /** Server binary; falls back to VAULT_BINARY, then `vault` on the PATH */
  binary: z.string().min(1).optional(),
  /** Arguments placed before the `server` subcommand, e.g. a script for an interpreter */
  binaryArgs: z.array(z.string()).default([]),
  attempts: z.number().int().min(1).default(DEFAULT_ATTEMPTS),
  startTimeoutMs: z.number().int().positive().default(DEFAULT_START_TIMEOUT_MS),
  /** Scales the start and readiness timeouts; falls back to TEST_TIMEOUT_MULTIPLIER */
  timeoutMultiplier: z.number().positive().optional(),
  stopTimeoutMs: z.number().int().positive().default(DEFAULT_STOP_TIMEOUT_MS),
  readiness: ReadinessOptionsSchema.default({}),
  maxBackoffMs: z.number().int().nonnegative().default(DEFAULT_MAX_BACKOFF_MS),
  /** Extra environment variables for the server process */
  env: z.record(z.string()).optional(),
});

export type FixtureOptionsInput = z.input<typeof FixtureOptionsSchema>;

/**
 * Fully resolved configuration, timeouts already scaled
 */
export interface FixtureConfig {
  binary: string;
  binaryArgs: string[];
  attempts: number;
  timeoutMultiplier: number;
  startTimeoutMs: number;
  stopTimeoutMs: number;
  readiness: {
    timeoutMs: number;
    intervalMs: number;
  };
  maxBackoffMs: number;
  env: Record<string, string>;
}

/**
 * Timeout multiplier from the environment: TEST_TIMEOUT_MULTIPLIER wins,
 * CI builds get a slower default.
 */
export function timeoutMultiplierFromEnv(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.TEST_TIMEOUT_MULTIPLIER;
  if (raw !== undefined && raw !== '') {
    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new FixtureError(
        FixtureErrorType.CONFIG_ERROR,
        'INVALID_MULTIPLIER',
        `TEST_TIMEOUT_MULTIPLIER must be a positive number, got "${raw}"`
      );
    }
    return parsed;
  }
  return env.CI ? CI_TIMEOUT_MULTIPLIER : 1;
}

/**
 * Validate options and resolve environment defaults
 *
 * @throws FixtureError (CONFIG_ERROR) when the options do not validate
 */
export function resolveFixtureConfig(
  options: FixtureOptionsInput = {},
  env: NodeJS.ProcessEnv = process.env
): FixtureConfig {
  const result = FixtureOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new FixtureError(
      FixtureErrorType.CONFIG_ERROR,
      'INVALID_OPTIONS',
      `Invalid fixture options: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join(', ')}`,
      { details: result.error.issues }
    );
  }

  const parsed = result.data;
  const multiplier = parsed.timeoutMultiplier ?? timeoutMultiplierFromEnv(env);

  return {
    binary: parsed.binary ?? (env.VAULT_BINARY || DEFAULT_BINARY),
    binaryArgs: parsed.binaryArgs,
    attempts: parsed.attempts,
    timeoutMultiplier: multiplier,
    startTimeoutMs: Math.round(parsed.startTimeoutMs * multiplier),
    stopTimeoutMs: parsed.stopTimeoutMs,
    readiness: {
      timeoutMs: Math.round(parsed.readiness.timeoutMs * multiplier),
      intervalMs: parsed.readiness.intervalMs,
    },
    maxBackoffMs: parsed.maxBackoffMs,
    env: parsed.env ?? {},
  };
}
