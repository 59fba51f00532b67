/** Fire-and-forget sink for attempt durations. Must never throw or block the caller. */
export interface LatencyReporterPort {
  report(durationMs: number): void;
  /** Settles reports still in flight. */
  flush?(): Promise<void>;
}
