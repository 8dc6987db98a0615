/**
 * Vault API Client
 *
 * Minimal HTTP client for the endpoints a test needs: init status, health,
 * token self-lookup and the logical read/write/delete operations.
 */

import type { z } from 'zod';
import { VaultApiError } from '../types/errors.js';
import { clientLogger } from '../utils/logger.js';
import { USER_AGENT } from '../version.js';
import {
  ErrorBodySchema,
  HealthSchema,
  InitStatusSchema,
  SecretSchema,
  TokenLookupSchema,
  type HealthStatus,
  type InitStatus,
  type Secret,
  type TokenLookup,
} from './schemas.js';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface VaultClientOptions {
  /** Base URL, e.g. http://127.0.0.1:8200 */
  address: string;
  token?: string;
  /** Per-request timeout in ms (default: 2000) */
  timeoutMs?: number;
  fetch?: FetchFn;
}

type Method = 'GET' | 'PUT' | 'DELETE';

interface ApiResponse {
  status: number;
  /** Parsed JSON body; undefined when the response has none */
  payload: unknown;
}

interface RequestOptions {
  body?: unknown;
  /** Non-2xx statuses whose body is still a valid answer */
  acceptStatus?: readonly number[];
  authenticated?: boolean;
}

// Health reports sealed, standby and uninitialized nodes through the status code
const HEALTH_STATUSES = [429, 472, 473, 501, 503] as const;

export class VaultClient {
  readonly address: string;
  private token: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  readonly sys = {
    /** GET /v1/sys/init */
    initStatus: async (): Promise<InitStatus> =>
      this.parse(InitStatusSchema, (await this.request('GET', 'sys/init', { authenticated: false })).payload, 'sys/init'),

    /** GET /v1/sys/health */
    health: async (): Promise<HealthStatus> =>
      this.parse(
        HealthSchema,
        (await this.request('GET', 'sys/health', { authenticated: false, acceptStatus: HEALTH_STATUSES })).payload,
        'sys/health'
      ),
  };

  readonly auth = {
    /** GET /v1/auth/token/lookup-self */
    lookupSelf: async (): Promise<TokenLookup> =>
      this.parse(
        TokenLookupSchema,
        (await this.request('GET', 'auth/token/lookup-self')).payload,
        'auth/token/lookup-self'
      ),
  };

  readonly logical = {
    /** Read a path; null when nothing is stored there */
    read: async (path: string): Promise<Secret | null> => {
      const { status, payload } = await this.request('GET', path, { acceptStatus: [404] });
      return status === 404 || payload === undefined ? null : this.parse(SecretSchema, payload, path);
    },

    /** Write data to a path; null when the server returns no body */
    write: async (path: string, data: Record<string, unknown>): Promise<Secret | null> => {
      const { payload } = await this.request('PUT', path, { body: data });
      return payload === undefined ? null : this.parse(SecretSchema, payload, path);
    },

    delete: async (path: string): Promise<void> => {
      await this.request('DELETE', path);
    },
  };

  constructor(options: VaultClientOptions) {
    this.address = options.address.replace(/\/+$/, '');
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 2000;
    this.fetchFn = options.fetch ?? ((url, init) => globalThis.fetch(url, init));
  }

  setToken(token: string): void {
    this.token = token;
  }

  getToken(): string | undefined {
    return this.token;
  }

  clearToken(): void {
    this.token = undefined;
  }

  private async request(method: Method, path: string, options: RequestOptions = {}): Promise<ApiResponse> {
    const { body, acceptStatus = [], authenticated = true } = options;
    const cleanPath = path.replace(/^\/+/, '');
    const url = `${this.address}/v1/${cleanPath}`;

    const headers: Record<string, string> = { 'User-Agent': USER_AGENT };
    if (authenticated && this.token) {
      headers['X-Vault-Token'] = this.token;
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const response = await this.fetchFn(url, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: controller.signal,
    }).finally(() => clearTimeout(timeout));

    const payload = await readJson(response);

    if (!response.ok && !acceptStatus.includes(response.status)) {
      const parsed = ErrorBodySchema.safeParse(payload ?? {});
      const errors = parsed.success ? parsed.data.errors : [];
      clientLogger.debug({ method, path: cleanPath, status: response.status }, 'Vault API error');
      throw new VaultApiError(cleanPath, response.status, errors);
    }

    return { status: response.status, payload };
  }

  private parse<T extends z.ZodTypeAny>(schema: T, body: unknown, path: string): z.infer<T> {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new Error(`Unexpected response from ${path}: ${result.error.message}`);
    }
    return result.data;
  }
}

async function readJson(response: Response): Promise<unknown> {
  if (response.status === 204) {
    return undefined;
  }
  const text = await response.text();
  if (text.trim() === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return { errors: [text.trim()] };
  }
}
