import { loadConfig } from '@las/config';
import { type LoggerPort, type LogLevel, PinoLogger } from '@las/domain';

const ROOT_NAME = 'las';

let globalRootLogger: LoggerPort | null = null;

export function createRootLogger(config: { name: string; logLevel?: LogLevel; traceErrors?: boolean }): LoggerPort {
  const underTest = process.env.VITEST !== undefined || process.env.NODE_ENV === 'test';
  const level: LogLevel = underTest ? 'silent' : (config.logLevel ?? 'info');

  globalRootLogger = new PinoLogger({
    name: config.name,
    level,
    traceErrors: config.traceErrors,
    containerId: process.env.CONTAINER_ID,
    prettyPrint: !underTest && process.env.NODE_ENV !== 'production',
  });
  return globalRootLogger;
}

function initializeRootLogger(): void {
  try {
    const { config } = loadConfig();
    createRootLogger({
      name: ROOT_NAME,
      logLevel: config.telemetry.logLevel,
      traceErrors: config.telemetry.traceErrors,
    });
  } catch {
    // The startup path reports the configuration error itself.
    createRootLogger({ name: ROOT_NAME });
  }
}

export function createChildLogger(name: string): LoggerPort {
  if (!globalRootLogger) {
    initializeRootLogger();
  }
  if (!globalRootLogger) {
    throw new Error('Logger not initialized');
  }
  return globalRootLogger.child({ name });
}
