import type { BackendClientPort } from '@las/scaler/domain/services/ports/backend-client.port';
import type { LatencyReporterPort } from '@las/scaler/domain/services/ports/latency-reporter.port';
import type { SelectionStrategy } from '@las/scaler/domain/services/ports/selection-strategy.port';
import type { BackendRequest, BackendResponse } from '@las/scaler/domain/types/backend';
import type { BackendPool } from '@las/scaler/infrastructure/adapters/pool/backend-pool.adapter';
import { createChildLogger } from '@las/scaler/infrastructure/logging/pino-logger';
import { BackendUnavailableError, type ClockPort, DefaultClock, toError } from '@las/domain';

const log = createChildLogger('dispatcher');

/** First attempt plus one retry on a different endpoint. */
export const MAX_ATTEMPTS = 2;

export interface DispatchResult {
  readonly response: BackendResponse;
  readonly endpoint: string;
  readonly attempts: number;
}

type AttemptResult =
  | { readonly ok: true; readonly response: BackendResponse; readonly durationMs: number }
  | { readonly ok: false; readonly error: Error; readonly durationMs: number };

interface DispatcherDeps {
  pool: Pick<BackendPool, 'readyEndpoints' | 'quarantine'>;
  strategy: SelectionStrategy;
  client: BackendClientPort;
  reporter: LatencyReporterPort;
  clock?: ClockPort;
}

export class Dispatcher {
  private readonly pool: DispatcherDeps['pool'];
  private readonly strategy: SelectionStrategy;
  private readonly client: BackendClientPort;
  private readonly reporter: LatencyReporterPort;
  private readonly clock: ClockPort;

  constructor(deps: DispatcherDeps) {
    this.pool = deps.pool;
    this.strategy = deps.strategy;
    this.client = deps.client;
    this.reporter = deps.reporter;
    this.clock = deps.clock ?? new DefaultClock();
  }

  async route(request: BackendRequest): Promise<DispatchResult> {
    const ready = this.pool.readyEndpoints();
    if (ready.length === 0) {
      throw new BackendUnavailableError('No ready backend endpoints', 0);
    }

    let excluded: string | null = null;
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const candidates =
        excluded === null ? ready : this.pool.readyEndpoints().filter((entry) => entry.endpoint !== excluded);
      if (candidates.length === 0) {
        throw new BackendUnavailableError(
          `Backend ${excluded} failed and no other endpoint is ready`,
          attempt - 1,
          { cause: lastError },
        );
      }

      const { endpoint } = this.strategy.select(candidates);
      const result = await this.attempt(endpoint, request);
      if (result.ok) {
        if (attempt > 1) {
          log.info(`Retry on ${endpoint} succeeded after ${excluded} failed`);
        }
        return { response: result.response, endpoint, attempts: attempt };
      }

      log.warn(`Attempt ${attempt}/${MAX_ATTEMPTS} on ${endpoint} failed after ${result.durationMs}ms: ${result.error.message}`);
      this.pool.quarantine(endpoint);
      excluded = endpoint;
      lastError = result.error;
    }

    throw new BackendUnavailableError(`All ${MAX_ATTEMPTS} attempts failed`, MAX_ATTEMPTS, { cause: lastError });
  }

  /**
   * Times one attempt and reports it whatever the outcome. Samples are per
   * attempt, not per client request: a request that fails over records two
   * samples and never its end-to-end time, so p99 tracks backend latency.
   */
  private async attempt(endpoint: string, request: BackendRequest): Promise<AttemptResult> {
    const startedAt = this.clock.now();
    let result: AttemptResult;
    try {
      const response = await this.client.forward(endpoint, request);
      const durationMs = this.elapsed(startedAt);
      result =
        response.status >= 500
          ? { ok: false, error: new Error(`Backend responded with status ${response.status}`), durationMs }
          : { ok: true, response, durationMs };
    } catch (error) {
      result = {
        ok: false,
        error: toError(error),
        durationMs: this.elapsed(startedAt),
      };
    }
    this.reporter.report(result.durationMs);
    return result;
  }

  private elapsed(startedAt: number): number {
    return Math.max(0, this.clock.now() - startedAt);
  }
}
