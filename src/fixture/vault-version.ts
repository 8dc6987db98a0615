/**
 * Version query for the server binary
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { DEFAULT_BINARY } from '../config/fixture-config.js';

const execFileAsync = promisify(execFile);

export interface VaultVersionOptions {
  binary?: string;
  binaryArgs?: readonly string[];
  timeoutMs?: number;
}

/**
 * Run `<binary> version` and return its raw stdout.
 * Rejects with the invocation error when the binary cannot be run or exits
 * non-zero.
 */
export async function vaultVersion(options: VaultVersionOptions = {}): Promise<string> {
  const binary = options.binary ?? (process.env.VAULT_BINARY || DEFAULT_BINARY);
  const { stdout } = await execFileAsync(binary, [...(options.binaryArgs ?? []), 'version'], {
    encoding: 'utf8',
    timeout: options.timeoutMs ?? 10_000,
  });
  return stdout;
}
