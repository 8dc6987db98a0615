/**
 * vault-test-fixture
 *
 * Ephemeral dev-mode Vault servers for automated tests.
 */

export {
  VaultFixture,
  type VaultConfig,
  type VaultFixtureOptions,
  type FixtureDeps,
} from './fixture/vault-fixture.js';
export { vaultVersion, type VaultVersionOptions } from './fixture/vault-version.js';
export {
  buildLaunchCommand,
  describeCommand,
  generateRootToken,
  LOOPBACK_HOST,
  type LaunchCommand,
  type LaunchCommandOptions,
} from './fixture/command-builder.js';
export { VaultClient, type VaultClientOptions, type FetchFn } from './client/vault-client.js';
export type { HealthStatus, InitStatus, Secret, TokenLookup } from './client/schemas.js';
export {
  resolveFixtureConfig,
  timeoutMultiplierFromEnv,
  FixtureOptionsSchema,
  type FixtureConfig,
  type FixtureOptionsInput,
} from './config/fixture-config.js';
export { FreePortPool, defaultPortPool, findAvailablePort } from './ports/free-port-pool.js';
export type { PortReservation } from './ports/port-reservation.js';
export { CompletionSignal, type WaitOutcome } from './process/completion-signal.js';
export {
  ProcessHandle,
  spawnChildProcess,
  type ProcessExit,
  type SpawnProcess,
  type SpawnedProcess,
} from './process/process-handle.js';
export { createBufferSink, createLoggerSink, maskSink, type LineSink, type OutputStream } from './process/line-sink.js';
export { FixtureError, FixtureErrorType, VaultApiError, isFixtureError } from './types/errors.js';
export { retryWithJitter, RetryError, type RetryOptions, type RandomSource } from './utils/retry.js';
export { pollUntil, type PollOptions, type PollResult } from './utils/wait.js';
export { VERSION } from './version.js';
