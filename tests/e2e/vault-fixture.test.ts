/**
 * Vault Fixture E2E Tests
 *
 * Runs the fixture against a fake dev server started under the current Node
 * binary, with real processes, ports and HTTP.
 */

import { VaultFixture } from '../../src/fixture/vault-fixture.js';
import { FreePortPool } from '../../src/ports/free-port-pool.js';
import type { PortReservation } from '../../src/ports/port-reservation.js';
import { createBufferSink } from '../../src/process/line-sink.js';
import { FixtureErrorType, VaultApiError, isFixtureError } from '../../src/types/errors.js';
import { RetryError } from '../../src/utils/retry.js';
import { fakeVaultOptions, occupyPort } from '../helpers/index.js';

/**
 * Hands out a port someone else is listening on first, then defers to a pool
 */
class CollidingPorts implements PortReservation {
  private handedOut = false;

  constructor(
    private readonly occupied: number,
    private readonly pool: FreePortPool
  ) {}

  async acquire(count: number): Promise<number[]> {
    if (!this.handedOut) {
      this.handedOut = true;
      return [this.occupied];
    }
    return this.pool.acquire(count);
  }

  release(ports: readonly number[]): void {
    this.pool.release(ports.filter((port) => port !== this.occupied));
  }
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

describe('VaultFixture (fake server)', () => {
  const fixtures: VaultFixture[] = [];

  afterEach(async () => {
    await Promise.all(fixtures.splice(0).map((fixture) => fixture.stop()));
  });

  async function create(pool: PortReservation, env: Record<string, string> = {}): Promise<VaultFixture> {
    const fixture = await VaultFixture.create(fakeVaultOptions({ ports: pool, env }));
    fixtures.push(fixture);
    return fixture;
  }

  it('should come up once the server reports initialized', async () => {
    const pool = new FreePortPool();
    const sink = createBufferSink();

    const fixture = await VaultFixture.create(
      fakeVaultOptions({ ports: pool, sink, env: { FAKE_VAULT_INIT_AFTER: '3' } })
    );
    fixtures.push(fixture);

    expect(fixture.running).toBe(true);
    expect(fixture.ports).toHaveLength(1);
    expect(fixture.addr).toBe(`127.0.0.1:${fixture.ports[0]}`);
    expect(fixture.httpAddr).toBe(`http://127.0.0.1:${fixture.ports[0]}`);
    expect(fixture.config).toEqual({ enabled: true, token: fixture.rootToken, address: fixture.httpAddr });
    expect(sink.lines).toContainEqual({
      line: `==> Vault server started! Listening on ${fixture.addr}`,
      stream: 'stdout',
    });
  });

  it('should hand back a client authenticated with the root token', async () => {
    const fixture = await create(new FreePortPool());

    const self = await fixture.client.auth.lookupSelf();

    expect(self.data.id).toBe(fixture.rootToken);
    expect(self.data.policies).toEqual(['root']);
  });

  it('should reject requests made with another token', async () => {
    const fixture = await create(new FreePortPool());
    fixture.client.setToken('test-secret');

    const error = await fixture.client.auth.lookupSelf().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(VaultApiError);
    expect(error).toMatchObject({ status: 403, errors: ['permission denied'] });
    fixture.client.setToken(fixture.rootToken);
  });

  it('should store and read secrets', async () => {
    const fixture = await create(new FreePortPool());

    await fixture.client.logical.write('secret/app', { password: 'test-secret' });

    await expect(fixture.client.logical.read('secret/app')).resolves.toMatchObject({
      data: { password: 'test-secret' },
    });
    await expect(fixture.client.logical.read('secret/missing')).resolves.toBeNull();
  });

  it('should kill the server and release its port on stop', async () => {
    const pool = new FreePortPool();
    const fixture = await VaultFixture.create(fakeVaultOptions({ ports: pool }));
    const [port] = fixture.ports;
    const pid = fixture.pid;

    await fixture.stop();

    expect(pid).toBeDefined();
    expect(isAlive(pid ?? 0)).toBe(false);
    expect(fixture.running).toBe(false);
    expect(fixture.ports).toEqual([]);
    expect(pool.inUse.has(port)).toBe(false);
    await expect(fixture.client.sys.initStatus()).rejects.toThrow();
  });

  it('should give concurrent fixtures distinct addresses', async () => {
    const pool = new FreePortPool();

    const [a, b] = await Promise.all([create(pool), create(pool)]);

    expect(a.addr).not.toBe(b.addr);
    expect(a.rootToken).not.toBe(b.rootToken);
    expect(pool.inUse.size).toBe(2);
  });

  it('should retry on a new port when the first one is taken', async () => {
    const occupied = await occupyPort();
    try {
      const pool = new FreePortPool();
      const fixture = await create(new CollidingPorts(occupied.port, pool));

      expect(fixture.ports).toHaveLength(2);
      expect(fixture.ports[0]).toBe(occupied.port);
      expect(fixture.addr).toBe(`127.0.0.1:${fixture.ports[1]}`);
      await expect(fixture.client.auth.lookupSelf()).resolves.toMatchObject({ data: { id: fixture.rootToken } });
    } finally {
      await occupied.close();
    }
  });

  it('should launch a delayed fixture on start', async () => {
    const pool = new FreePortPool();
    const fixture = await VaultFixture.createDelayed(fakeVaultOptions({ ports: pool }));
    fixtures.push(fixture);

    expect(fixture.running).toBe(false);
    expect(fixture.pid).toBeUndefined();
    expect(pool.inUse.has(fixture.ports[0])).toBe(true);

    await fixture.start();

    expect(fixture.running).toBe(true);
    await expect(fixture.client.auth.lookupSelf()).resolves.toMatchObject({ data: { id: fixture.rootToken } });
  });

  it('should give up after every attempt fails to launch the binary', async () => {
    const pool = new FreePortPool();

    const error = await VaultFixture.create({
      binary: '/nonexistent/vault',
      attempts: 2,
      maxBackoffMs: 0,
      ports: pool,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryError);
    if (!(error instanceof RetryError)) {
      return;
    }
    expect(error.attempts).toBe(2);
    expect(isFixtureError(error.lastError, FixtureErrorType.LAUNCH_FAILURE)).toBe(true);
    expect(pool.inUse.size).toBe(0);
  });
});
