import type { MonitorStats } from '@las/scaler/domain/types/stats';

export interface StatsSourcePort {
  fetchStats(signal?: AbortSignal): Promise<MonitorStats>;
}
