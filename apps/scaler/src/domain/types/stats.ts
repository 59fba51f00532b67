export interface StatsSnapshot {
  readonly kind: 'snapshot';
  readonly count: number;
  readonly p50: number;
  readonly p95: number;
  readonly p99: number;
  readonly mean: number;
  /** Milliseconds between the oldest and newest sample in the window. */
  readonly windowSpanMs: number;
  readonly windowCapacity: number;
}

export interface NoDataStats {
  readonly kind: 'no-data';
  readonly count: 0;
  readonly windowCapacity: number;
}

export type MonitorStats = StatsSnapshot | NoDataStats;
