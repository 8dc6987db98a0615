/**
 * Launch command for a dev-mode server bound to a loopback port
 */

import { randomUUID } from 'crypto';
import { maskSecrets } from '../utils/logger.js';

export const LOOPBACK_HOST = '127.0.0.1';

export interface LaunchCommand {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
  port: number;
  token: string;
  /** host:port the server listens on */
  addr: string;
  /** Base URL of the HTTP API */
  httpAddr: string;
}

export interface LaunchCommandOptions {
  binary: string;
  binaryArgs?: readonly string[];
  env?: Record<string, string>;
  baseEnv?: NodeJS.ProcessEnv;
}

/**
 * Fresh root token for one launch attempt
 */
export function generateRootToken(): string {
  return randomUUID();
}

/**
 * Build the command for `<binary> server -dev` with the given port and root
 * token. Nothing is started.
 */
export function buildLaunchCommand(port: number, token: string, options: LaunchCommandOptions): LaunchCommand {
  const addr = `${LOOPBACK_HOST}:${port}`;
  return {
    command: options.binary,
    args: [
      ...(options.binaryArgs ?? []),
      'server',
      '-dev',
      `-dev-listen-address=${addr}`,
      `-dev-root-token-id=${token}`,
    ],
    env: { ...(options.baseEnv ?? process.env), ...options.env },
    port,
    token,
    addr,
    httpAddr: `http://${addr}`,
  };
}

/**
 * Command line with the root token masked, safe for logs
 */
export function describeCommand(cmd: LaunchCommand): string {
  return maskSecrets([cmd.command, ...cmd.args].join(' '), [cmd.token]);
}
