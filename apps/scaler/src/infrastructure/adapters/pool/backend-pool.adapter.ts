import type { BackendDiscoveryPort } from '@las/scaler/domain/services/ports/backend-discovery.port';
import type { BackendEndpoint, BackendPoolSnapshot } from '@las/scaler/domain/types/backend';
import { createChildLogger } from '@las/scaler/infrastructure/logging/pino-logger';
import { withTimeout } from '@las/scaler/infrastructure/utils/with-timeout';
import { type ClockPort, DefaultClock, errorMessage } from '@las/domain';

const log = createChildLogger('backend-pool');

export interface BackendPool {
  start(): void;
  stop(): Promise<void>;
  refreshOnce(): Promise<readonly BackendEndpoint[]>;
  /** Endpoints that are ready and not quarantined, in discovery order. */
  readyEndpoints(): BackendEndpoint[];
  /** Excludes an endpoint from selection until the next successful refresh. */
  quarantine(endpoint: string): void;
  getSnapshot(): BackendPoolSnapshot;
}

interface BackendPoolOptions {
  discovery: BackendDiscoveryPort;
  refreshIntervalMs: number;
  timeoutMs: number;
  clock?: ClockPort;
}

/**
 * Cached view of pool membership. Each refresh swaps in a new frozen array, so
 * readers never observe a list being edited in place.
 */
export class BackendPoolAdapter implements BackendPool {
  private endpoints: readonly BackendEndpoint[] = Object.freeze([]);
  private quarantined: ReadonlySet<string> = new Set();
  private refreshedAt: number | null = null;
  private readonly clock: ClockPort;
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private inflight: Promise<readonly BackendEndpoint[]> | null = null;

  constructor(private readonly options: BackendPoolOptions) {
    this.clock = options.clock ?? new DefaultClock();
  }

  start(): void {
    if (this.abort) {
      return;
    }
    this.abort = new AbortController();
    this.loop = this.refreshLoop(this.abort.signal);
  }

  async stop(): Promise<void> {
    this.abort?.abort();
    this.abort = null;
    await this.loop;
    this.loop = null;
  }

  readyEndpoints(): BackendEndpoint[] {
    const quarantined = this.quarantined;
    return this.endpoints.filter((entry) => entry.ready && !quarantined.has(entry.endpoint));
  }

  quarantine(endpoint: string): void {
    if (this.quarantined.has(endpoint)) {
      return;
    }
    const next = new Set(this.quarantined);
    next.add(endpoint);
    this.quarantined = next;
    log.info(`Quarantined ${endpoint} until next pool refresh`);
  }

  getSnapshot(): BackendPoolSnapshot {
    return {
      endpoints: this.endpoints,
      refreshedAt: this.refreshedAt,
      quarantined: [...this.quarantined],
    };
  }

  async refreshOnce(): Promise<readonly BackendEndpoint[]> {
    if (this.inflight) {
      return this.inflight;
    }
    this.inflight = withTimeout(
      'pool-discovery',
      this.options.timeoutMs,
      (signal) => this.options.discovery.listEndpoints(signal),
      this.abort?.signal,
    )
      .then((entries) => {
        const next = Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
        this.logMembershipChange(next);
        this.endpoints = next;
        this.quarantined = new Set();
        this.refreshedAt = this.clock.now();
        return next;
      })
      .finally(() => {
        this.inflight = null;
      });
    return this.inflight;
  }

  private async refreshLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.refreshOnce();
      } catch (error) {
        log.warn(`Pool refresh failed, keeping ${this.endpoints.length} known endpoint(s): ${errorMessage(error)}`);
      }
      await this.clock.sleep(this.options.refreshIntervalMs, signal);
    }
  }

  private logMembershipChange(next: readonly BackendEndpoint[]): void {
    const before = new Set(this.endpoints.filter((entry) => entry.ready).map((entry) => entry.endpoint));
    const after = new Set(next.filter((entry) => entry.ready).map((entry) => entry.endpoint));
    const added = [...after].filter((endpoint) => !before.has(endpoint));
    const removed = [...before].filter((endpoint) => !after.has(endpoint));
    if (added.length > 0 || removed.length > 0) {
      log.info(`Pool updated: ${after.size} ready endpoint(s)`, { added, removed });
    }
  }
}
