import type { LatencyMonitor } from '@las/scaler/domain/services/latency-monitor.service';
import type { LatencyReporterPort } from '@las/scaler/domain/services/ports/latency-reporter.port';
import type { StatsSourcePort } from '@las/scaler/domain/services/ports/stats-source.port';
import type { MonitorStats } from '@las/scaler/domain/types/stats';
import { createChildLogger } from '@las/scaler/infrastructure/logging/pino-logger';
import { errorMessage } from '@las/domain';

const log = createChildLogger('local-monitor');

/** Reporter and stats source over a monitor living in the same process. */
export class LocalMonitorAdapter implements StatsSourcePort, LatencyReporterPort {
  constructor(private readonly monitor: LatencyMonitor) {}

  async fetchStats(): Promise<MonitorStats> {
    return this.monitor.stats();
  }

  report(durationMs: number): void {
    try {
      this.monitor.record(durationMs);
    } catch (error) {
      log.warn(`Dropped latency sample: ${errorMessage(error)}`);
    }
  }
}
