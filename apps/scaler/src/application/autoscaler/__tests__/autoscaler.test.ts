import { FakeClock } from '@las/scaler/__tests__/support/fake-clock';
import type { ReplicaControllerPort } from '@las/scaler/domain/services/ports/replica-controller.port';
import type { StatsSourcePort } from '@las/scaler/domain/services/ports/stats-source.port';
import { HysteresisScalingPolicy } from '@las/scaler/domain/services/scaling-policy.service';
import type { MonitorStats } from '@las/scaler/domain/types/stats';
import type { NotificationMessage, NotificationPort } from '@las/domain';
import { describe, expect, it, vi } from 'vitest';
import { Autoscaler, type AutoscalerOptions } from '../autoscaler';

const snapshot = (p99: number, count = 50): MonitorStats => ({
  kind: 'snapshot',
  count,
  p50: p99 / 2,
  p95: p99 * 0.9,
  p99,
  mean: p99 / 2,
  windowSpanMs: 10_000,
  windowCapacity: 1000,
});

class FakeController implements ReplicaControllerPort {
  readonly mutations: number[] = [];
  readFailure: Error | null = null;
  writeFailure: Error | null = null;

  constructor(public replicas: number) {}

  async getReplicaCount(): Promise<number> {
    if (this.readFailure) throw this.readFailure;
    return this.replicas;
  }

  async setReplicaCount(replicas: number): Promise<void> {
    if (this.writeFailure) throw this.writeFailure;
    this.mutations.push(replicas);
    this.replicas = replicas;
  }
}

function setup(overrides: { stats?: MonitorStats; replicas?: number } & Partial<AutoscalerOptions> = {}) {
  const statsSource: StatsSourcePort = { fetchStats: vi.fn(async () => overrides.stats ?? snapshot(200)) };
  const controller = new FakeController(overrides.replicas ?? 5);
  const sent: NotificationMessage[] = [];
  const notifier: NotificationPort = {
    send: vi.fn(async (message: NotificationMessage) => {
      sent.push(message);
    }),
  };
  const clock = new FakeClock();
  const autoscaler = new Autoscaler({
    statsSource,
    controller,
    policy: new HysteresisScalingPolicy({
      latencyCeilingMs: 330,
      scaleUpFactor: 1.2,
      scaleDownStep: 1,
      minReplicas: 2,
      maxReplicas: 20,
    }),
    pollIntervalMs: 10_000,
    callTimeoutMs: 1000,
    minSamples: 20,
    latencyCeilingMs: 330,
    notifier,
    clock,
    ...overrides,
  });
  return { autoscaler, statsSource, controller, notifier, sent, clock };
}

describe('Autoscaler.tick', () => {
  it('scales up above the ceiling and notifies', async () => {
    const { autoscaler, controller, sent } = setup({ stats: snapshot(400), replicas: 10 });

    const outcome = await autoscaler.tick();

    expect(outcome.status).toBe('applied');
    expect(controller.mutations).toEqual([12]);
    expect(sent).toHaveLength(1);
    expect(sent[0]).toMatchObject({
      type: 'scale-up',
      title: 'Scaled up to 12 replicas',
      message: 'p99 400.0ms above ceiling 330ms',
      data: { from: 10, to: 12, p99Ms: 400, ceilingMs: 330 },
    });
  });

  it('steps down within the ceiling', async () => {
    const { autoscaler, controller, sent } = setup({ stats: snapshot(120), replicas: 5 });

    const outcome = await autoscaler.tick();

    expect(outcome).toMatchObject({ status: 'applied', decision: { targetReplicas: 4, action: 'scale-down' } });
    expect(controller.mutations).toEqual([4]);
    expect(sent[0]?.type).toBe('scale-down');
  });

  it('issues no mutation when the target equals the current count', async () => {
    const { autoscaler, controller, notifier } = setup({ stats: snapshot(120), replicas: 2 });
    const setSpy = vi.spyOn(controller, 'setReplicaCount');

    const outcome = await autoscaler.tick();

    expect(outcome.status).toBe('held');
    expect(setSpy).not.toHaveBeenCalled();
    expect(notifier.send).not.toHaveBeenCalled();
  });

  it('skips the tick when stats cannot be fetched', async () => {
    const { autoscaler, statsSource, controller } = setup();
    vi.mocked(statsSource.fetchStats).mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    const readSpy = vi.spyOn(controller, 'getReplicaCount');

    const outcome = await autoscaler.tick();

    expect(outcome).toEqual({ status: 'skipped', reason: 'stats-unavailable' });
    expect(readSpy).not.toHaveBeenCalled();
    expect(controller.mutations).toEqual([]);
  });

  it('skips the decision on an undersized window', async () => {
    const { autoscaler, controller } = setup({ stats: snapshot(900, 19) });

    expect(await autoscaler.tick()).toEqual({ status: 'skipped', reason: 'insufficient-data' });
    expect(controller.mutations).toEqual([]);
  });

  it('skips the decision when the window is empty', async () => {
    const { autoscaler } = setup({ stats: { kind: 'no-data', count: 0, windowCapacity: 1000 } });

    expect(await autoscaler.tick()).toEqual({ status: 'skipped', reason: 'insufficient-data' });
  });

  it('skips when the replica count cannot be read', async () => {
    const { autoscaler, controller } = setup({ stats: snapshot(400) });
    controller.readFailure = new Error('forbidden');

    expect(await autoscaler.tick()).toEqual({ status: 'skipped', reason: 'replicas-unavailable' });
  });

  it('reports a failed mutation and recovers on the next tick', async () => {
    const { autoscaler, controller } = setup({ stats: snapshot(400), replicas: 10 });
    controller.writeFailure = new Error('conflict');

    const failed = await autoscaler.tick();
    expect(failed.status).toBe('apply-failed');
    if (failed.status === 'apply-failed') {
      expect(failed.error.message).toBe('replica-mutation: conflict');
      expect(failed.decision.targetReplicas).toBe(12);
    }

    controller.writeFailure = null;
    const retried = await autoscaler.tick();
    expect(retried.status).toBe('applied');
    expect(controller.mutations).toEqual([12]);
  });

  it('still applies when the notification fails', async () => {
    const { autoscaler, notifier, controller } = setup({ stats: snapshot(400), replicas: 10 });
    vi.mocked(notifier.send).mockRejectedValueOnce(new Error('webhook down'));

    expect((await autoscaler.tick()).status).toBe('applied');
    expect(controller.mutations).toEqual([12]);
  });

  it('times out a hanging stats call', async () => {
    const { autoscaler, statsSource } = setup({ callTimeoutMs: 20 });
    vi.mocked(statsSource.fetchStats).mockImplementationOnce(() => new Promise<MonitorStats>(() => {}));

    expect(await autoscaler.tick()).toEqual({ status: 'skipped', reason: 'stats-unavailable' });
  });

  it('abandons a tick without mutating once aborted', async () => {
    const { autoscaler, controller } = setup({ stats: snapshot(400), replicas: 10 });
    const controllerAbort = new AbortController();
    vi.spyOn(controller, 'getReplicaCount').mockImplementation(async () => {
      controllerAbort.abort();
      return 10;
    });

    const outcome = await autoscaler.tick(controllerAbort.signal);

    expect(outcome).toEqual({ status: 'aborted' });
    expect(controller.mutations).toEqual([]);
  });

  it('tracks the phase and returns to idle', async () => {
    const { autoscaler, statsSource } = setup({ stats: snapshot(120), replicas: 2 });
    const phases: string[] = [];
    vi.mocked(statsSource.fetchStats).mockImplementationOnce(async () => {
      phases.push(autoscaler.getPhase());
      return snapshot(120);
    });

    await autoscaler.tick();

    expect(phases).toEqual(['fetch-stats']);
    expect(autoscaler.getPhase()).toBe('idle');
  });
});

describe('Autoscaler loop', () => {
  it('ticks once per poll interval and stops cleanly', async () => {
    const { autoscaler, statsSource, clock } = setup({ stats: snapshot(120), replicas: 2 });

    autoscaler.start();
    expect(autoscaler.isRunning()).toBe(true);
    await vi.waitFor(() => expect(clock.sleeps).toEqual([10_000]));
    expect(statsSource.fetchStats).toHaveBeenCalledTimes(1);

    clock.wake();
    await vi.waitFor(() => expect(clock.sleeps).toEqual([10_000, 10_000]));
    expect(statsSource.fetchStats).toHaveBeenCalledTimes(2);

    await autoscaler.stop();
    expect(autoscaler.isRunning()).toBe(false);
    expect(statsSource.fetchStats).toHaveBeenCalledTimes(2);
  });

  it('keeps looping after a tick throws', async () => {
    const { autoscaler, clock } = setup({ stats: snapshot(400), replicas: 10 });
    vi.spyOn(autoscaler, 'tick').mockRejectedValueOnce(new Error('unexpected'));

    autoscaler.start();
    await vi.waitFor(() => expect(clock.sleeps).toHaveLength(1));
    clock.wake();
    await vi.waitFor(() => expect(clock.sleeps).toHaveLength(2));

    await autoscaler.stop();
  });
});
