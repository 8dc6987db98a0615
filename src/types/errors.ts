/**
 * Error type definitions
 */

import { types } from 'util';

export enum FixtureErrorType {
  LAUNCH_FAILURE = 'LAUNCH_FAILURE',
  EARLY_EXIT = 'EARLY_EXIT',
  READINESS_TIMEOUT = 'READINESS_TIMEOUT',
  TEARDOWN_FAILURE = 'TEARDOWN_FAILURE',
  TEARDOWN_HANG = 'TEARDOWN_HANG',
  ALREADY_STARTED = 'ALREADY_STARTED',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

/**
 * Types that a startup attempt may recover from by retrying on a fresh port
 */
const RECOVERABLE_TYPES: ReadonlySet<FixtureErrorType> = new Set([
  FixtureErrorType.LAUNCH_FAILURE,
  FixtureErrorType.EARLY_EXIT,
  FixtureErrorType.READINESS_TIMEOUT,
]);

export interface FixtureErrorInfo {
  type: FixtureErrorType;
  code: string;
  message: string;
  details?: unknown;
  recoverable: boolean;
}

export class FixtureError extends Error implements FixtureErrorInfo {
  type: FixtureErrorType;
  code: string;
  recoverable: boolean;
  details?: unknown;

  constructor(
    type: FixtureErrorType,
    code: string,
    message: string,
    options?: {
      details?: unknown;
      recoverable?: boolean;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'FixtureError';
    this.type = type;
    this.code = code;
    this.recoverable = options?.recoverable ?? RECOVERABLE_TYPES.has(type);
    this.details = options?.details;

    Object.setPrototypeOf(this, FixtureError.prototype);
  }

  toJSON(): FixtureErrorInfo {
    return {
      type: this.type,
      code: this.code,
      message: this.message,
      details: this.details,
      recoverable: this.recoverable,
    };
  }
}

/**
 * Error returned by the Vault HTTP API for a non-2xx response
 */
export class VaultApiError extends Error {
  public readonly status: number;
  public readonly errors: string[];
  public readonly path: string;

  constructor(path: string, status: number, errors: string[]) {
    const detail = errors.length > 0 ? errors.join('; ') : 'no error details';
    super(`Vault API ${path} returned ${status}: ${detail}`);
    this.name = 'VaultApiError';
    this.path = path;
    this.status = status;
    this.errors = errors;

    Object.setPrototypeOf(this, VaultApiError.prototype);
  }
}

/**
 * Normalize anything thrown into an Error. Errors from another realm (a vm
 * context, Jest's sandbox) fail `instanceof` and are kept as they are.
 */
export function toError(error: unknown): Error {
  return error instanceof Error || types.isNativeError(error) ? error : new Error(String(error));
}

export function isFixtureError(error: unknown, type?: FixtureErrorType): error is FixtureError {
  return error instanceof FixtureError && (type === undefined || error.type === type);
}
