/**
 * Vault Test Fixture
 *
 * Launches a dev-mode Vault server on a reserved loopback port, waits until it
 * reports itself initialized and hands back a client authenticated with the
 * generated root token. `stop()` kills the server and returns every port the
 * fixture reserved.
 *
 * @example
 * ```typescript
 * let vault: VaultFixture;
 *
 * beforeAll(async () => {
 *   vault = await VaultFixture.create();
 * });
 *
 * afterAll(async () => {
 *   await vault.stop();
 * });
 *
 * it('reads the token', async () => {
 *   const self = await vault.client.auth.lookupSelf();
 *   expect(self.data.id).toBe(vault.rootToken);
 * });
 * ```
 */

import { resolveFixtureConfig, type FixtureConfig, type FixtureOptionsInput } from '../config/fixture-config.js';
import { VaultClient, type FetchFn } from '../client/vault-client.js';
import { createLoggerSink, type LineSink } from '../process/line-sink.js';
import {
  ProcessHandle,
  describeExit,
  spawnChildProcess,
  type ProcessExit,
  type SpawnProcess,
} from '../process/process-handle.js';
import { defaultPortPool } from '../ports/free-port-pool.js';
import type { PortReservation } from '../ports/port-reservation.js';
import { FixtureError, FixtureErrorType, toError } from '../types/errors.js';
import { fixtureLogger, processLogger, type Logger } from '../utils/logger.js';
import { retryWithJitter, sleep, type RandomSource, type Sleep } from '../utils/retry.js';
import { pollUntil } from '../utils/wait.js';
import { buildLaunchCommand, describeCommand, generateRootToken, type LaunchCommand } from './command-builder.js';

/**
 * Configuration handed to code under test that talks to Vault
 */
export interface VaultConfig {
  readonly enabled: true;
  readonly token: string;
  readonly address: string;
}

/**
 * Collaborators that tests may replace
 */
export interface FixtureDeps {
  spawnProcess: SpawnProcess;
  fetch: FetchFn;
  random: RandomSource;
  sleep: Sleep;
  generateToken: () => string;
}

export interface VaultFixtureOptions extends FixtureOptionsInput {
  /** Port source (default: the process-wide pool) */
  ports?: PortReservation;
  /** Receives server output line by line (default: debug logs) */
  sink?: LineSink;
  deps?: Partial<FixtureDeps>;
}

interface FixtureContext {
  config: FixtureConfig;
  deps: FixtureDeps;
  ports: PortReservation;
  sink?: LineSink;
  log: Logger;
}

/**
 * Everything derived from one port and one root token
 */
interface LaunchPlan {
  command: LaunchCommand;
  client: VaultClient;
  config: VaultConfig;
}

function defaultDeps(): FixtureDeps {
  return {
    spawnProcess: spawnChildProcess,
    fetch: (url, init) => globalThis.fetch(url, init),
    random: Math.random,
    sleep,
    generateToken: generateRootToken,
  };
}

function createContext(options: VaultFixtureOptions): FixtureContext {
  const { ports, sink, deps, ...rest } = options;
  return {
    config: resolveFixtureConfig(rest),
    deps: { ...defaultDeps(), ...deps },
    ports: ports ?? defaultPortPool,
    sink,
    log: fixtureLogger,
  };
}

function buildPlan(port: number, ctx: FixtureContext): LaunchPlan {
  const token = ctx.deps.generateToken();
  const command = buildLaunchCommand(port, token, {
    binary: ctx.config.binary,
    binaryArgs: ctx.config.binaryArgs,
    env: ctx.config.env,
  });

  const client = new VaultClient({ address: command.httpAddr, fetch: ctx.deps.fetch });
  client.setToken(token);

  const config: VaultConfig = { enabled: true, token, address: command.httpAddr };
  Object.freeze(config);
  return { command, client, config };
}

function createHandle(plan: LaunchPlan, ctx: FixtureContext): ProcessHandle {
  const { command } = plan;
  return new ProcessHandle({
    command: command.command,
    args: command.args,
    env: command.env,
    sink: ctx.sink ?? createLoggerSink(processLogger.child({ port: command.port })),
    secrets: [command.token],
    spawnProcess: ctx.deps.spawnProcess,
  });
}

function exitError(exit: ProcessExit, plan: LaunchPlan): FixtureError {
  if (exit.error) {
    return new FixtureError(
      FixtureErrorType.LAUNCH_FAILURE,
      'SPAWN_FAILED',
      `Failed to start vault: ${exit.error.message}`,
      { cause: exit.error, details: { port: plan.command.port } }
    );
  }
  return new FixtureError(
    FixtureErrorType.EARLY_EXIT,
    'PROCESS_EXITED',
    `Vault on ${plan.command.addr} ${describeExit(exit)} before becoming ready`,
    { details: { port: plan.command.port, code: exit.code, signal: exit.signal } }
  );
}

/**
 * Start the process, give it the start timeout to fall over, then poll the
 * init status until it reports initialized. Polling stops as soon as the
 * process exits.
 */
async function launch(handle: ProcessHandle, plan: LaunchPlan, ctx: FixtureContext): Promise<void> {
  const { config } = ctx;

  handle.start();

  const early = await handle.completion.waitFor(config.startTimeoutMs);
  if (early.settled) {
    throw exitError(early.value, plan);
  }

  const controller = new AbortController();
  const unsubscribe = handle.completion.subscribe((exit) => controller.abort(exitError(exit, plan)));

  try {
    await pollUntil(
      async () => {
        const status = await plan.client.sys.initStatus();
        if (!status.initialized) {
          throw new Error('Vault reports not initialized');
        }
        return true;
      },
      {
        timeoutMs: config.readiness.timeoutMs,
        intervalMs: config.readiness.intervalMs,
        signal: controller.signal,
        sleep: ctx.deps.sleep,
        description: `Vault readiness on ${plan.command.httpAddr}`,
      }
    );
  } finally {
    unsubscribe();
  }
}

/**
 * Kill the process of a failed attempt so at most one server runs per fixture
 */
async function discardAttempt(handle: ProcessHandle, ctx: FixtureContext): Promise<void> {
  try {
    const stopped = await handle.terminate(ctx.config.stopTimeoutMs);
    if (!stopped) {
      ctx.log.warn({ pid: handle.pid }, 'Failed attempt did not exit within the stop timeout');
    }
  } catch (error) {
    ctx.log.warn({ err: toError(error), pid: handle.pid }, 'Failed to kill process of failed attempt');
  }
}

export class VaultFixture {
  /** host:port the server listens on */
  readonly addr: string;
  /** Base URL of the HTTP API */
  readonly httpAddr: string;
  readonly rootToken: string;
  readonly config: VaultConfig;
  /** Client bound to httpAddr, authenticated with rootToken */
  readonly client: VaultClient;

  private readonly plan: LaunchPlan;
  private handle: ProcessHandle | null;
  private portsReleased = false;

  private constructor(
    private readonly ctx: FixtureContext,
    plan: LaunchPlan,
    private readonly reservedPorts: readonly number[],
    handle: ProcessHandle | null
  ) {
    this.addr = plan.command.addr;
    this.httpAddr = plan.command.httpAddr;
    this.rootToken = plan.command.token;
    this.config = plan.config;
    this.client = plan.client;
    this.plan = plan;
    this.handle = handle;
  }

  /**
   * Launch a server and wait until it is ready, retrying on a fresh port and
   * token after a failed attempt.
   *
   * Every port tried is kept until `stop()`; if all attempts fail they are
   * released before the error is thrown.
   *
   * @throws RetryError wrapping the last attempt's failure
   */
  static async create(options: VaultFixtureOptions = {}): Promise<VaultFixture> {
    const ctx = createContext(options);
    const { config, log } = ctx;
    const ports: number[] = [];

    try {
      return await retryWithJitter(
        async (attempt) => {
          const [port] = await ctx.ports.acquire(1);
          ports.push(port);

          const plan = buildPlan(port, ctx);
          const handle = createHandle(plan, ctx);
          log.info({ attempt, port, command: describeCommand(plan.command) }, 'Launching vault');

          try {
            await launch(handle, plan, ctx);
          } catch (error) {
            await discardAttempt(handle, ctx);
            throw error;
          }

          log.info({ attempt, addr: plan.command.addr, pid: handle.pid }, 'Vault ready');
          return new VaultFixture(ctx, plan, ports, handle);
        },
        {
          maxAttempts: config.attempts,
          maxDelay: config.maxBackoffMs,
          random: ctx.deps.random,
          sleep: ctx.deps.sleep,
          onRetry: (error, attempt, nextDelay) => {
            log.warn({ attempt, nextDelay, err: error }, 'Vault failed to start, retrying');
          },
        }
      );
    } catch (error) {
      ctx.ports.release(ports);
      log.error({ err: toError(error), ports }, 'Giving up on starting vault');
      throw error;
    }
  }

  /**
   * Reserve a port and prepare the server without launching it. Call
   * `start()` to launch; retrying after a failed start is up to the caller.
   */
  static async createDelayed(options: VaultFixtureOptions = {}): Promise<VaultFixture> {
    const ctx = createContext(options);
    const ports = await ctx.ports.acquire(1);
    return new VaultFixture(ctx, buildPlan(ports[0], ctx), ports, null);
  }

  /** Ports held by this fixture; empty once released */
  get ports(): readonly number[] {
    return this.portsReleased ? [] : [...this.reservedPorts];
  }

  get pid(): number | undefined {
    return this.handle?.pid;
  }

  /** True while a launched process has not exited */
  get running(): boolean {
    return this.handle !== null && this.handle.started && !this.handle.exited;
  }

  /**
   * Launch a fixture made by `createDelayed` and wait until it is ready.
   *
   * @throws FixtureError describing why the server did not come up
   */
  async start(): Promise<void> {
    if (this.handle) {
      throw new FixtureError(FixtureErrorType.ALREADY_STARTED, 'ALREADY_STARTED', 'Vault fixture was already started');
    }

    const handle = createHandle(this.plan, this.ctx);
    this.handle = handle;
    this.ctx.log.info(
      { port: this.plan.command.port, command: describeCommand(this.plan.command) },
      'Launching vault'
    );
    await launch(handle, this.plan, this.ctx);
    this.ctx.log.info({ addr: this.addr, pid: handle.pid }, 'Vault ready');
  }

  /**
   * Kill the server and release the reserved ports.
   *
   * A server that already exited is not an error.
   *
   * @throws FixtureError (TEARDOWN_HANG) if the exit is not observed within
   *   the stop timeout
   * @throws FixtureError (TEARDOWN_FAILURE) if the kill signal failed
   */
  async stop(): Promise<void> {
    try {
      const handle = this.handle;
      if (!handle || !handle.started) {
        return;
      }

      let killError: FixtureError | undefined;
      try {
        if (handle.kill() === 'already-exited') {
          this.ctx.log.debug({ addr: this.addr }, 'Vault already exited');
          return;
        }
      } catch (error) {
        killError =
          error instanceof FixtureError
            ? error
            : new FixtureError(FixtureErrorType.TEARDOWN_FAILURE, 'KILL_FAILED', toError(error).message, {
                cause: error,
              });
        this.ctx.log.error({ err: killError, pid: handle.pid }, 'Failed to kill vault');
      }

      const stopTimeoutMs = this.ctx.config.stopTimeoutMs;
      const outcome = await handle.completion.waitFor(stopTimeoutMs);
      if (!outcome.settled) {
        throw new FixtureError(
          FixtureErrorType.TEARDOWN_HANG,
          'STOP_TIMEOUT',
          `Timed out waiting for vault (pid ${handle.pid ?? 'unknown'}) to terminate after ${stopTimeoutMs}ms`,
          { cause: killError }
        );
      }
      if (killError) {
        throw killError;
      }
      this.ctx.log.info({ addr: this.addr }, 'Vault stopped');
    } finally {
      this.releasePorts();
    }
  }

  private releasePorts(): void {
    if (this.portsReleased) {
      return;
    }
    this.portsReleased = true;
    this.ctx.ports.release(this.reservedPorts);
  }
}
