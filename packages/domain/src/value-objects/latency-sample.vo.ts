export interface LatencySample {
  /** Epoch milliseconds at which the sample was recorded. */
  readonly timestamp: number;
  /** Wall-clock duration of one backend attempt, in milliseconds. */
  readonly duration: number;
}

export function createLatencySample(duration: number, timestamp: number): LatencySample {
  if (!Number.isFinite(duration) || duration < 0) {
    throw new Error(`Latency duration must be a non-negative finite number, got ${duration}`);
  }
  if (!Number.isFinite(timestamp)) {
    throw new Error('Latency timestamp must be finite');
  }
  return Object.freeze({ timestamp, duration });
}
