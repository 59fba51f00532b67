// Errors
export {
  BackendUnavailableError,
  DataInsufficientError,
  PolicyBoundError,
  errorMessage,
  toError,
  TransientIOError,
} from './errors';

// Domain Events
export type { ReplicasScaledEventData } from './events/replicas-scaled.event';
export { replicasScaledEvent } from './events/replicas-scaled.event';

// Infrastructure
export type { LoggerPort, LogLevel } from './infrastructure/logger.port';
export type { LoggerConfig } from './infrastructure/pino-logger';
export { PinoLogger } from './infrastructure/pino-logger';

// Ports (Interfaces)
export type { ClockPort } from './ports/clock.port';
export type { NotificationMessage, NotificationPort } from './ports/notification.port';

// Value Objects
export type { LatencySample } from './value-objects/latency-sample.vo';
export { createLatencySample } from './value-objects/latency-sample.vo';
export { ReplicaCount } from './value-objects/replica-count.vo';

// Services
export { DefaultClock } from './services/default-clock';
export { nearestRank } from './services/nearest-rank';
export { RollingWindow } from './services/rolling-window';
