import { FakeClock } from '@las/scaler/__tests__/support/fake-clock';
import type { BackendDiscoveryPort } from '@las/scaler/domain/services/ports/backend-discovery.port';
import type { BackendEndpoint } from '@las/scaler/domain/types/backend';
import { describe, expect, it, vi } from 'vitest';
import { BackendPoolAdapter } from '../pool/backend-pool.adapter';

function setup(initial: BackendEndpoint[]) {
  const discovery: BackendDiscoveryPort = { listEndpoints: vi.fn(async () => initial) };
  const clock = new FakeClock(1_700_000_000_000);
  const pool = new BackendPoolAdapter({ discovery, refreshIntervalMs: 5000, timeoutMs: 1000, clock });
  return { pool, discovery, clock };
}

describe('BackendPoolAdapter', () => {
  it('starts empty', () => {
    const { pool } = setup([]);

    expect(pool.readyEndpoints()).toEqual([]);
    expect(pool.getSnapshot()).toEqual({ endpoints: [], refreshedAt: null, quarantined: [] });
  });

  it('exposes only ready endpoints after a refresh', async () => {
    const { pool } = setup([
      { endpoint: '10.0.0.1:5000', ready: true },
      { endpoint: '10.0.0.2:5000', ready: false },
      { endpoint: '10.0.0.3:5000', ready: true },
    ]);

    await pool.refreshOnce();

    expect(pool.readyEndpoints().map((entry) => entry.endpoint)).toEqual(['10.0.0.1:5000', '10.0.0.3:5000']);
    expect(pool.getSnapshot().refreshedAt).toBe(1_700_000_000_000);
    expect(pool.getSnapshot().endpoints).toHaveLength(3);
  });

  it('replaces the list instead of editing it in place', async () => {
    const { pool, discovery } = setup([{ endpoint: 'a:5000', ready: true }]);
    await pool.refreshOnce();
    const before = pool.getSnapshot().endpoints;

    vi.mocked(discovery.listEndpoints).mockResolvedValueOnce([{ endpoint: 'b:5000', ready: true }]);
    await pool.refreshOnce();

    expect(before.map((entry) => entry.endpoint)).toEqual(['a:5000']);
    expect(Object.isFrozen(before)).toBe(true);
    expect(pool.readyEndpoints().map((entry) => entry.endpoint)).toEqual(['b:5000']);
  });

  it('quarantines an endpoint until the next refresh', async () => {
    const { pool } = setup([
      { endpoint: 'a:5000', ready: true },
      { endpoint: 'b:5000', ready: true },
    ]);
    await pool.refreshOnce();

    pool.quarantine('a:5000');
    expect(pool.readyEndpoints().map((entry) => entry.endpoint)).toEqual(['b:5000']);
    expect(pool.getSnapshot().quarantined).toEqual(['a:5000']);

    await pool.refreshOnce();
    expect(pool.readyEndpoints().map((entry) => entry.endpoint)).toEqual(['a:5000', 'b:5000']);
    expect(pool.getSnapshot().quarantined).toEqual([]);
  });

  it('keeps the known pool when discovery fails', async () => {
    const { pool, discovery } = setup([{ endpoint: 'a:5000', ready: true }]);
    await pool.refreshOnce();

    vi.mocked(discovery.listEndpoints).mockRejectedValueOnce(new Error('apiserver unavailable'));

    await expect(pool.refreshOnce()).rejects.toThrow('pool-discovery: apiserver unavailable');
    expect(pool.readyEndpoints().map((entry) => entry.endpoint)).toEqual(['a:5000']);
  });

  it('shares one discovery call between concurrent refreshes', async () => {
    const { pool, discovery } = setup([{ endpoint: 'a:5000', ready: true }]);

    await Promise.all([pool.refreshOnce(), pool.refreshOnce(), pool.refreshOnce()]);

    expect(discovery.listEndpoints).toHaveBeenCalledTimes(1);
  });

  it('refreshes on every interval until stopped', async () => {
    const { pool, discovery, clock } = setup([{ endpoint: 'a:5000', ready: true }]);

    pool.start();
    await vi.waitFor(() => expect(clock.sleeps).toEqual([5000]));
    expect(pool.readyEndpoints()).toHaveLength(1);

    vi.mocked(discovery.listEndpoints).mockRejectedValueOnce(new Error('timeout'));
    clock.wake();
    await vi.waitFor(() => expect(clock.sleeps).toEqual([5000, 5000]));
    expect(pool.readyEndpoints()).toHaveLength(1);

    await pool.stop();
    expect(discovery.listEndpoints).toHaveBeenCalledTimes(2);
  });
});
