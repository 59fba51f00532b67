import type { ScalingPolicy } from '@las/scaler/domain/services/scaling-policy.service';
import type { ReplicaControllerPort } from '@las/scaler/domain/services/ports/replica-controller.port';
import type { StatsSourcePort } from '@las/scaler/domain/services/ports/stats-source.port';
import type { AutoscalerPhase, ScalingDecision, TickOutcome } from '@las/scaler/domain/types/scaling';
import type { MonitorStats, StatsSnapshot } from '@las/scaler/domain/types/stats';
import { createChildLogger } from '@las/scaler/infrastructure/logging/pino-logger';
import { withTimeout } from '@las/scaler/infrastructure/utils/with-timeout';
import {
  type ClockPort,
  DataInsufficientError,
  DefaultClock,
  errorMessage,
  type NotificationPort,
  PolicyBoundError,
  replicasScaledEvent,
  toError,
} from '@las/domain';

const log = createChildLogger('autoscaler');

export interface AutoscalerOptions {
  statsSource: StatsSourcePort;
  controller: ReplicaControllerPort;
  policy: ScalingPolicy;
  pollIntervalMs: number;
  callTimeoutMs: number;
  minSamples: number;
  latencyCeilingMs: number;
  notifier?: NotificationPort;
  clock?: ClockPort;
}

/**
 * Reactive replica controller. One tick per poll interval:
 * idle → fetch-stats → decide → (apply) → idle.
 *
 * Nothing is carried between ticks: each one re-reads stats and the replica
 * count, so a failed mutation is retried by the next tick's fresh decision.
 * Only one instance may run against a workload; this is not enforced here.
 */
export class Autoscaler {
  private phase: AutoscalerPhase = 'idle';
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private readonly clock: ClockPort;

  constructor(private readonly options: AutoscalerOptions) {
    this.clock = options.clock ?? new DefaultClock();
  }

  getPhase(): AutoscalerPhase {
    return this.phase;
  }

  isRunning(): boolean {
    return this.abort !== null;
  }

  start(): void {
    if (this.abort) {
      log.warn('Autoscaler already running');
      return;
    }
    this.abort = new AbortController();
    this.loop = this.run(this.abort.signal);
    log.info(
      `Autoscaler started: poll=${this.options.pollIntervalMs}ms ceiling=${this.options.latencyCeilingMs}ms minSamples=${this.options.minSamples}`,
    );
  }

  /** Abandons the in-flight tick (no mutation is issued after this) and waits for the loop to exit. */
  async stop(): Promise<void> {
    const abort = this.abort;
    if (!abort) {
      return;
    }
    abort.abort();
    await this.loop;
    this.abort = null;
    this.loop = null;
    log.info('Autoscaler stopped');
  }

  async tick(signal?: AbortSignal): Promise<TickOutcome> {
    try {
      return await this.runTick(signal);
    } finally {
      this.phase = 'idle';
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const outcome = await this.tick(signal);
        log.debug(`Tick finished: ${outcome.status}`);
      } catch (error) {
        log.error('Tick failed unexpectedly', toError(error));
      }
      await this.clock.sleep(this.options.pollIntervalMs, signal);
    }
  }

  private async runTick(signal?: AbortSignal): Promise<TickOutcome> {
    const { statsSource, controller, policy, callTimeoutMs } = this.options;

    // FETCH_STATS
    this.phase = 'fetch-stats';
    let stats: MonitorStats;
    try {
      stats = await withTimeout('stats-fetch', callTimeoutMs, (s) => statsSource.fetchStats(s), signal);
    } catch (error) {
      if (signal?.aborted) return { status: 'aborted' };
      log.warn(`Skipping tick, could not fetch stats: ${errorMessage(error)}`);
      return { status: 'skipped', reason: 'stats-unavailable' };
    }

    const snapshot = this.usableSnapshot(stats);
    if (!snapshot) {
      return { status: 'skipped', reason: 'insufficient-data' };
    }

    // DECIDE
    this.phase = 'decide';
    let currentReplicas: number;
    try {
      currentReplicas = await withTimeout('replica-read', callTimeoutMs, (s) => controller.getReplicaCount(s), signal);
    } catch (error) {
      if (signal?.aborted) return { status: 'aborted' };
      log.warn(`Skipping tick, could not read replica count: ${errorMessage(error)}`);
      return { status: 'skipped', reason: 'replicas-unavailable' };
    }

    const decision = policy.decide(snapshot.p99, currentReplicas);
    if (decision.clamped) {
      const bound = new PolicyBoundError(decision.clamped.requested, decision.targetReplicas, decision.clamped.bound);
      log.warn(bound.message);
    }
    log.info(
      `p99=${snapshot.p99.toFixed(1)}ms over ${snapshot.count} samples, replicas=${currentReplicas}, decision=${decision.action} -> ${decision.targetReplicas}`,
    );

    if (decision.targetReplicas === decision.currentReplicas) {
      return { status: 'held', decision };
    }
    if (signal?.aborted) {
      return { status: 'aborted' };
    }

    // APPLY
    this.phase = 'apply';
    try {
      await withTimeout(
        'replica-mutation',
        callTimeoutMs,
        (s) => controller.setReplicaCount(decision.targetReplicas, s),
        signal,
      );
    } catch (error) {
      if (signal?.aborted) return { status: 'aborted' };
      const err = toError(error);
      log.error(`Failed to scale ${decision.currentReplicas} -> ${decision.targetReplicas}; next tick re-derives`, err);
      return { status: 'apply-failed', decision, error: err };
    }

    log.info(`Scaled ${decision.currentReplicas} -> ${decision.targetReplicas} replicas (${decision.reason})`);
    await this.notify(decision, snapshot);
    return { status: 'applied', decision };
  }

  private usableSnapshot(stats: MonitorStats): StatsSnapshot | null {
    if (stats.kind === 'no-data' || stats.count < this.options.minSamples) {
      const insufficient = new DataInsufficientError(stats.count, this.options.minSamples);
      log.debug(`Skipping decision: ${insufficient.message}`);
      return null;
    }
    return stats;
  }

  private async notify(decision: ScalingDecision, snapshot: StatsSnapshot): Promise<void> {
    const notifier = this.options.notifier;
    if (!notifier) {
      return;
    }
    const event = replicasScaledEvent(
      decision.currentReplicas,
      decision.targetReplicas,
      snapshot.p99,
      this.options.latencyCeilingMs,
      decision.reason,
    );
    try {
      await notifier.send({
        type: event.direction === 'up' ? 'scale-up' : 'scale-down',
        title: `Scaled ${event.direction} to ${event.toReplicas} replicas`,
        message: event.reason,
        data: {
          from: event.fromReplicas,
          to: event.toReplicas,
          p99Ms: Number(event.p99Ms.toFixed(1)),
          ceilingMs: event.ceilingMs,
        },
        timestamp: event.timestamp,
      });
    } catch (error) {
      log.warn(`Scale notification failed: ${errorMessage(error)}`);
    }
  }
}
