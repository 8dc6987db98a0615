/**
 * In-process free port pool
 *
 * Asks the OS for ephemeral loopback ports and remembers which ones are out,
 * so two fixtures in the same process never share a port.
 */

import { createServer } from 'net';
import type { PortReservation } from './port-reservation.js';
import { portsLogger } from '../utils/logger.js';

const LOOPBACK = '127.0.0.1';
const MAX_PROBES_PER_PORT = 50;

/**
 * Find an available port by binding to port 0 and reading back the
 * OS-assigned port.
 */
export async function findAvailablePort(host: string = LOOPBACK): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.unref();
    server.on('error', reject);
    server.listen(0, host, () => {
      const address = server.address();
      if (address && typeof address === 'object') {
        const { port } = address;
        server.close(() => resolve(port));
      } else {
        server.close(() => reject(new Error('Failed to get port from server address')));
      }
    });
  });
}

export interface FreePortPoolOptions {
  host?: string;
  /** Port probe, replaceable in tests */
  probe?: (host: string) => Promise<number>;
}

export class FreePortPool implements PortReservation {
  private readonly reserved = new Set<number>();
  private readonly host: string;
  private readonly probe: (host: string) => Promise<number>;

  constructor(options: FreePortPoolOptions = {}) {
    this.host = options.host ?? LOOPBACK;
    this.probe = options.probe ?? findAvailablePort;
  }

  /** Ports currently handed out */
  get inUse(): ReadonlySet<number> {
    return this.reserved;
  }

  async acquire(count: number): Promise<number[]> {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`Port count must be a positive integer, got ${count}`);
    }

    const ports: number[] = [];
    while (ports.length < count) {
      ports.push(await this.acquireOne());
    }
    portsLogger.debug({ ports }, 'Reserved ports');
    return ports;
  }

  release(ports: readonly number[]): void {
    for (const port of ports) {
      if (!this.reserved.delete(port)) {
        portsLogger.warn({ port }, 'Released a port that was not reserved');
      }
    }
    portsLogger.debug({ ports }, 'Released ports');
  }

  private async acquireOne(): Promise<number> {
    for (let probe = 0; probe < MAX_PROBES_PER_PORT; probe++) {
      const port = await this.probe(this.host);
      if (!this.reserved.has(port)) {
        this.reserved.add(port);
        return port;
      }
    }
    throw new Error(`No free port found on ${this.host} after ${MAX_PROBES_PER_PORT} probes`);
  }
}

/**
 * Pool shared by every fixture in the current process
 */
export const defaultPortPool = new FreePortPool();
