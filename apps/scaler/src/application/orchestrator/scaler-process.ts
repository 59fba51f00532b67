import type { Autoscaler } from '@las/scaler/application/autoscaler/autoscaler';
import type { Dispatcher } from '@las/scaler/application/dispatcher/dispatcher';
import type { LatencyMonitor } from '@las/scaler/domain/services/latency-monitor.service';
import type { LatencyReporterPort } from '@las/scaler/domain/services/ports/latency-reporter.port';
import type { BackendPool } from '@las/scaler/infrastructure/adapters/pool/backend-pool.adapter';
import type { Role } from '@las/scaler/infrastructure/constants';
import { registerModules, type ServiceContainer } from '@las/scaler/infrastructure/di/module-registry';
import { type ConfigSchema, type EnvSchema, loadConfig, type LoadOptions } from '@las/config';
import type { NotificationPort } from '@las/domain';

export interface ScalerProcessOptions {
  role: Role;
  /** Pre-built container; the default wires one from the loaded configuration. */
  container?: ServiceContainer;
  configOptions?: LoadOptions;
}

export abstract class ScalerProcess {
  protected readonly container: ServiceContainer;
  protected readonly config: ConfigSchema;
  protected readonly env: EnvSchema;
  protected readonly role: Role;

  constructor(options: ScalerProcessOptions) {
    this.role = options.role;
    if (options.container) {
      this.container = options.container;
      this.config = options.container.resolve('Config');
      this.env = options.container.resolve('Env');
    } else {
      const { config, env } = loadConfig(options.configOptions);
      this.config = config;
      this.env = env;
      this.container = registerModules(config, env, options.role);
    }
  }

  // ============================================================================
  // Latency Monitor
  // ============================================================================

  protected getLatencyMonitor(): LatencyMonitor {
    return this.container.resolve('LatencyMonitor');
  }

  protected getLatencyReporter(): LatencyReporterPort {
    return this.container.resolve('LatencyReporter');
  }

  // ============================================================================
  // Dispatcher
  // ============================================================================

  protected getBackendPool(): BackendPool {
    return this.container.resolve('BackendPool');
  }

  protected getDispatcher(): Dispatcher {
    return this.container.resolve('Dispatcher');
  }

  // ============================================================================
  // Autoscaler
  // ============================================================================

  protected getAutoscaler(): Autoscaler {
    return this.container.resolve('Autoscaler');
  }

  protected getNotificationPort(): NotificationPort {
    return this.container.resolve('NotificationPort');
  }
}
