import type { LatencyReporterPort } from '@las/scaler/domain/services/ports/latency-reporter.port';
import { createChildLogger } from '@las/scaler/infrastructure/logging/pino-logger';
import { errorMessage } from '@las/domain';
import { withTimeout } from '@las/scaler/infrastructure/utils/with-timeout';

const log = createChildLogger('latency-reporter');

const WARN_EVERY_N_FAILURES = 10;

interface HttpLatencyReporterOptions {
  monitorUrl: string;
  timeoutMs: number;
}

/** Pushes samples to a remote monitor without holding up the request path. */
export class HttpLatencyReporterAdapter implements LatencyReporterPort {
  private readonly recordUrl: URL;
  private readonly pending = new Set<Promise<void>>();
  private consecutiveFailures = 0;

  constructor(private readonly options: HttpLatencyReporterOptions) {
    this.recordUrl = new URL('/record', options.monitorUrl);
  }

  report(durationMs: number): void {
    const push = this.push(durationMs)
      .then(() => {
        this.consecutiveFailures = 0;
      })
      .catch((error) => {
        this.consecutiveFailures += 1;
        const message = `Could not report latency to monitor: ${errorMessage(error)}`;
        if (this.consecutiveFailures % WARN_EVERY_N_FAILURES === 1) {
          log.warn(`${message} (${this.consecutiveFailures} consecutive failure(s))`);
        } else {
          log.debug(message);
        }
      })
      .finally(() => {
        this.pending.delete(push);
      });
    this.pending.add(push);
  }

  /** Waits for pushes already in flight; used on shutdown. */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }

  private async push(durationMs: number): Promise<void> {
    await withTimeout('latency-report', this.options.timeoutMs, async (signal) => {
      const response = await fetch(this.recordUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ duration: durationMs }),
        signal,
      });
      if (!response.ok) {
        throw new Error(`Monitor responded with status ${response.status}`);
      }
    });
  }
}
