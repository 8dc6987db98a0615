/**
 * Fixture Configuration Unit Tests
 */

import {
  resolveFixtureConfig,
  timeoutMultiplierFromEnv,
  DEFAULT_ATTEMPTS,
} from '../../src/config/fixture-config.js';
import { FixtureError, FixtureErrorType } from '../../src/types/errors.js';

describe('resolveFixtureConfig', () => {
  it('should apply defaults', () => {
    const config = resolveFixtureConfig({}, {});

    expect(config).toEqual({
      binary: 'vault',
      binaryArgs: [],
      attempts: DEFAULT_ATTEMPTS,
      timeoutMultiplier: 1,
      startTimeoutMs: 500,
      stopTimeoutMs: 1000,
      readiness: { timeoutMs: 5000, intervalMs: 10 },
      maxBackoffMs: 2000,
      env: {},
    });
  });

  it('should take the binary from VAULT_BINARY', () => {
    expect(resolveFixtureConfig({}, { VAULT_BINARY: '/opt/vault/bin/vault' }).binary).toBe('/opt/vault/bin/vault');
  });

  it('should prefer an explicit binary over the environment', () => {
    expect(resolveFixtureConfig({ binary: './vault' }, { VAULT_BINARY: '/opt/vault' }).binary).toBe('./vault');
  });

  it('should scale start and readiness timeouts by the multiplier', () => {
    const config = resolveFixtureConfig(
      { startTimeoutMs: 400, readiness: { timeoutMs: 2000 }, stopTimeoutMs: 900 },
      { TEST_TIMEOUT_MULTIPLIER: '2.5' }
    );

    expect(config.timeoutMultiplier).toBe(2.5);
    expect(config.startTimeoutMs).toBe(1000);
    expect(config.readiness).toEqual({ timeoutMs: 5000, intervalMs: 10 });
    expect(config.stopTimeoutMs).toBe(900);
  });

  it('should let an explicit multiplier win over the environment', () => {
    expect(resolveFixtureConfig({ timeoutMultiplier: 2 }, { CI: 'true' }).startTimeoutMs).toBe(1000);
  });

  it('should reject invalid options with a config error', () => {
    let caught: unknown;
    try {
      resolveFixtureConfig({ attempts: 0, stopTimeoutMs: -1 }, {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FixtureError);
    const error = caught as FixtureError;
    expect(error.type).toBe(FixtureErrorType.CONFIG_ERROR);
    expect(error.code).toBe('INVALID_OPTIONS');
    expect(error.message).toContain('attempts:');
    expect(error.message).toContain('stopTimeoutMs:');
    expect(error.recoverable).toBe(false);
  });
});

describe('timeoutMultiplierFromEnv', () => {
  it('should default to 1 outside CI', () => {
    expect(timeoutMultiplierFromEnv({})).toBe(1);
  });

  it('should slow down on CI', () => {
    expect(timeoutMultiplierFromEnv({ CI: 'true' })).toBe(3);
  });

  it('should read TEST_TIMEOUT_MULTIPLIER', () => {
    expect(timeoutMultiplierFromEnv({ TEST_TIMEOUT_MULTIPLIER: '4', CI: 'true' })).toBe(4);
  });

  it('should reject a non-positive multiplier', () => {
    expect(() => timeoutMultiplierFromEnv({ TEST_TIMEOUT_MULTIPLIER: 'zero' })).toThrow(
      'TEST_TIMEOUT_MULTIPLIER must be a positive number, got "zero"'
    );
  });
});
