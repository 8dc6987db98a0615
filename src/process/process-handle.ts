/**
 * Process Handle
 *
 * Owns one launched server process: its output streams, the exit watcher and
 * the one-shot completion signal the watcher writes.
 *
 * The exit watcher is attached in the same synchronous turn as the spawn
 * call. Attaching it later, from another task, can miss an exit that happens
 * in between, so `start()` is the only place listeners are registered.
 */

import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable } from 'stream';
import { FixtureError, FixtureErrorType, toError } from '../types/errors.js';
import { CompletionSignal } from './completion-signal.js';
import { maskSink, pipeLines, type LineSink } from './line-sink.js';

/**
 * The subset of ChildProcess the handle relies on
 */
export interface SpawnedProcess extends EventEmitter {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export interface SpawnOptions {
  env: NodeJS.ProcessEnv;
}

export type SpawnProcess = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;

/** Default spawner wrapping child_process.spawn */
export const spawnChildProcess: SpawnProcess = (command, args, options) =>
  spawn(command, [...args], { env: options.env, stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * How the process ended
 */
export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started at all */
  error?: Error;
}

export type KillOutcome = 'signalled' | 'already-exited';

export interface ProcessHandleOptions {
  command: string;
  args: readonly string[];
  env: NodeJS.ProcessEnv;
  sink: LineSink;
  /** Masked in every output line before it reaches the sink */
  secrets?: readonly string[];
  spawnProcess?: SpawnProcess;
}

export function describeExit(exit: ProcessExit): string {
  if (exit.error) {
    return exit.error.message;
  }
  if (exit.signal) {
    return `terminated by ${exit.signal}`;
  }
  return `exited with code ${exit.code}`;
}

export class ProcessHandle {
  readonly completion = new CompletionSignal<ProcessExit>();
  private process: SpawnedProcess | null = null;
  /** Last error the running process emitted, e.g. a refused signal */
  private lastError: Error | null = null;

  constructor(private readonly options: ProcessHandleOptions) {}

  get started(): boolean {
    return this.process !== null;
  }

  get exited(): boolean {
    return this.completion.isSettled;
  }

  get pid(): number | undefined {
    return this.process?.pid;
  }

  /**
   * Launch the process and attach the exit watcher.
   *
   * Spawn failures (missing binary, permissions) settle the completion signal
   * with the error rather than throwing. Errors from a process that did spawn,
   * such as a signal it could not be sent, are kept for `kill()` and do not
   * count as an exit.
   */
  start(): void {
    if (this.process) {
      throw new FixtureError(FixtureErrorType.ALREADY_STARTED, 'PROCESS_ALREADY_STARTED', 'Process already started');
    }

    const { command, args, env, secrets = [], spawnProcess = spawnChildProcess } = this.options;
    const sink = maskSink(this.options.sink, secrets);

    let proc: SpawnedProcess;
    try {
      proc = spawnProcess(command, args, { env });
    } catch (error) {
      this.completion.settle({ code: null, signal: null, error: toError(error) });
      return;
    }
    this.process = proc;

    // A process that failed to spawn never gets a pid
    proc.on('error', (error: Error) => {
      if (proc.pid === undefined) {
        this.completion.settle({ code: null, signal: null, error });
        return;
      }
      this.lastError = error;
    });
    proc.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      this.completion.settle({ code, signal });
    });

    pipeLines(proc.stdout, 'stdout', sink);
    pipeLines(proc.stderr, 'stderr', sink);
  }

  /**
   * Send SIGKILL. A process that already exited is not an error.
   *
   * @throws FixtureError (TEARDOWN_FAILURE) if the signal cannot be delivered
   */
  kill(): KillOutcome {
    const proc = this.process;
    if (!proc || this.hasExited(proc)) {
      return 'already-exited';
    }

    this.lastError = null;
    let delivered: boolean;
    try {
      delivered = proc.kill('SIGKILL');
    } catch (error) {
      throw new FixtureError(
        FixtureErrorType.TEARDOWN_FAILURE,
        'KILL_FAILED',
        `Failed to kill process ${proc.pid ?? '(no pid)'}: ${toError(error).message}`,
        { cause: error }
      );
    }

    if (!delivered) {
      // The OS refuses signals to a process that is gone
      if (this.hasExited(proc)) {
        return 'already-exited';
      }
      const cause = this.takeLastError();
      throw new FixtureError(
        FixtureErrorType.TEARDOWN_FAILURE,
        'KILL_FAILED',
        `Failed to deliver SIGKILL to process ${proc.pid ?? '(no pid)'}${cause ? `: ${cause.message}` : ''}`,
        { cause: cause ?? undefined }
      );
    }
    return 'signalled';
  }

  /**
   * Kill the process and wait up to `timeoutMs` for it to exit.
   * Resolves false if the exit was not observed in time.
   */
  async terminate(timeoutMs: number): Promise<boolean> {
    if (this.kill() === 'already-exited') {
      return true;
    }
    const outcome = await this.completion.waitFor(timeoutMs);
    return outcome.settled;
  }

  private takeLastError(): Error | null {
    const error = this.lastError;
    this.lastError = null;
    return error;
  }

  private hasExited(proc: SpawnedProcess): boolean {
    return this.completion.isSettled || proc.exitCode !== null || proc.signalCode !== null;
  }
}
