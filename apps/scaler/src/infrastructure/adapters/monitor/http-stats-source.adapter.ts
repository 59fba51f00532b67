import type { StatsSourcePort } from '@las/scaler/domain/services/ports/stats-source.port';
import type { MonitorStats } from '@las/scaler/domain/types/stats';
import { monitorStatsSchema } from '@las/scaler/infrastructure/http/schemas';

export class HttpStatsSourceAdapter implements StatsSourcePort {
  private readonly statsUrl: URL;

  constructor(monitorUrl: string) {
    this.statsUrl = new URL('/stats', monitorUrl);
  }

  async fetchStats(signal?: AbortSignal): Promise<MonitorStats> {
    const response = await fetch(this.statsUrl, {
      method: 'GET',
      headers: { accept: 'application/json' },
      signal,
    });

    if (!response.ok) {
      throw new Error(`Monitor responded with status ${response.status}`);
    }

    const parsed = monitorStatsSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Monitor returned malformed stats: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
  }
}
