/**
 * Error taxonomy shared by the monitor, dispatcher and autoscaler.
 * Configuration failures live in `@las/config` as `FatalConfigError`.
 */

/** A call to an external collaborator failed or timed out. */
export class TransientIOError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
    this.name = 'TransientIOError';
    this.operation = operation;
  }
}

/** The latency window holds too few samples to act on. */
export class DataInsufficientError extends Error {
  readonly count: number;
  readonly required: number;

  constructor(count: number, required: number) {
    super(`Insufficient latency samples: ${count} < ${required}`);
    this.name = 'DataInsufficientError';
    this.count = count;
    this.required = required;
  }
}

/** A computed replica target fell outside the configured bounds and was clamped. */
export class PolicyBoundError extends Error {
  readonly requested: number;
  readonly clamped: number;
  readonly bound: 'min' | 'max';

  constructor(requested: number, clamped: number, bound: 'min' | 'max') {
    super(`Replica target ${requested} clamped to ${bound} bound ${clamped}`);
    this.name = 'PolicyBoundError';
    this.requested = requested;
    this.clamped = clamped;
    this.bound = bound;
  }
}

/** Every attempt for one client request failed. */
export class BackendUnavailableError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BackendUnavailableError';
    this.attempts = attempts;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
