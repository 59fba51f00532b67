import type { MonitorStats } from '@las/scaler/domain/types/stats';
import { type ClockPort, createLatencySample, DefaultClock, type LatencySample, nearestRank, RollingWindow } from '@las/domain';

export interface LatencyMonitor {
  record(durationMs: number): LatencySample;
  stats(): MonitorStats;
  size(): number;
  capacity(): number;
}

interface LatencyMonitorOptions {
  windowCapacity: number;
  clock?: ClockPort;
}

/**
 * Process-wide latency window. One instance is created at startup and shared by
 * every writer in the process.
 *
 * `record` and the snapshot copy in `stats` are synchronous, so concurrent
 * requests interleave only between whole calls; percentile work runs on the copy.
 */
export class LatencyMonitorService implements LatencyMonitor {
  private readonly window: RollingWindow<LatencySample>;
  private readonly clock: ClockPort;

  constructor(options: LatencyMonitorOptions) {
    this.window = new RollingWindow<LatencySample>(options.windowCapacity);
    this.clock = options.clock ?? new DefaultClock();
  }

  record(durationMs: number): LatencySample {
    const sample = createLatencySample(durationMs, this.nextTimestamp());
    this.window.push(sample);
    return sample;
  }

  stats(): MonitorStats {
    const samples = this.window.toArray();
    const windowCapacity = this.window.capacity;

    const first = samples[0];
    const last = samples[samples.length - 1];
    if (!first || !last) {
      return { kind: 'no-data', count: 0, windowCapacity };
    }

    const sorted = samples.map((sample) => sample.duration).sort((a, b) => a - b);
    const sum = sorted.reduce((acc, value) => acc + value, 0);

    return {
      kind: 'snapshot',
      count: sorted.length,
      p50: nearestRank(sorted, 50) ?? 0,
      p95: nearestRank(sorted, 95) ?? 0,
      p99: nearestRank(sorted, 99) ?? 0,
      mean: sum / sorted.length,
      windowSpanMs: last.timestamp - first.timestamp,
      windowCapacity,
    };
  }

  size(): number {
    return this.window.size;
  }

  capacity(): number {
    return this.window.capacity;
  }

  // Wall clocks can step backwards; arrival order must not.
  private nextTimestamp(): number {
    const now = this.clock.now();
    const newest = this.window.newest();
    return newest && newest.timestamp > now ? newest.timestamp : now;
  }
}
