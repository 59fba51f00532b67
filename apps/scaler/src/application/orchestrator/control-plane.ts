import { runsAutoscaler, runsDispatcher, runsMonitor } from '@las/scaler/infrastructure/constants';
import { createServer } from '@las/scaler/infrastructure/http/create-server';
import dispatcherRoutes from '@las/scaler/infrastructure/http/dispatcher.routes';
import monitorRoutes from '@las/scaler/infrastructure/http/monitor.routes';
import { createChildLogger } from '@las/scaler/infrastructure/logging/pino-logger';
import { errorMessage } from '@las/domain';
import type { FastifyInstance } from 'fastify';
import { ScalerProcess, type ScalerProcessOptions } from './scaler-process';

const log = createChildLogger('control-plane');

interface RunningServer {
  readonly name: string;
  readonly app: FastifyInstance;
}

/**
 * Starts the components a role owns: the monitor service, the dispatcher
 * with its pool refresher, and the autoscaler loop. `standalone` runs all
 * three in one process sharing the in-memory latency window.
 */
export class ControlPlane extends ScalerProcess {
  private isRunning = false;
  private readonly servers: RunningServer[] = [];

  constructor(options: ScalerProcessOptions) {
    super(options);
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      log.warn('Control plane already running');
      return;
    }

    log.info(`Starting latency autoscaler (role: ${this.role})`);

    if (runsMonitor(this.role)) {
      await this.startMonitor();
    }

    if (runsDispatcher(this.role)) {
      await this.startDispatcher();
    }

    if (runsAutoscaler(this.role)) {
      this.getAutoscaler().start();
      await this.getNotificationPort().send({
        type: 'info',
        title: 'Autoscaler Started',
        message: `Watching ${this.config.discovery.namespace}/${this.config.discovery.deploymentName}`,
        data: {
          ceilingMs: this.config.autoscaler.latencyCeilingMs,
          minReplicas: this.config.autoscaler.minReplicas,
          maxReplicas: this.config.autoscaler.maxReplicas,
        },
      });
    }

    this.isRunning = true;
    log.info('Latency autoscaler started');
  }

  /** Stops components in reverse start order. */
  async stop(): Promise<void> {
    if (!this.isRunning) return;

    log.info('Stopping latency autoscaler...');

    if (runsAutoscaler(this.role)) {
      await this.getAutoscaler().stop();
    }

    // Servers stop taking requests before the pool and reporter wind down.
    while (this.servers.length > 0) {
      const server = this.servers.pop();
      if (!server) break;
      try {
        await server.app.close();
        log.info(`${server.name} server closed`);
      } catch (error) {
        log.warn(`Failed to close ${server.name} server: ${errorMessage(error)}`);
      }
    }

    if (runsDispatcher(this.role)) {
      await this.getBackendPool().stop();
      await this.getLatencyReporter().flush?.();
    }

    this.isRunning = false;
    log.info('Latency autoscaler stopped');
  }

  private async startMonitor(): Promise<void> {
    const { host, port } = this.config.monitor;
    const app = createServer({ role: 'monitor' });
    await app.register(monitorRoutes, { monitor: this.getLatencyMonitor() });
    await app.listen({ host, port });
    this.servers.push({ name: 'monitor', app });
    log.info(`Monitor listening on ${host}:${port} (window: ${this.config.monitor.windowCapacity})`);
  }

  private async startDispatcher(): Promise<void> {
    const { host, port, bodyLimitBytes } = this.config.dispatcher;
    const pool = this.getBackendPool();

    // A first refresh so the dispatcher does not open with an empty pool.
    try {
      const endpoints = await pool.refreshOnce();
      log.info(`Discovered ${endpoints.filter((entry) => entry.ready).length} ready backend(s)`);
    } catch (error) {
      log.warn(`Initial backend discovery failed: ${errorMessage(error)}`);
    }
    pool.start();

    const app = createServer({ role: 'dispatcher', bodyLimitBytes });
    await app.register(dispatcherRoutes, { dispatcher: this.getDispatcher(), pool });
    await app.listen({ host, port });
    this.servers.push({ name: 'dispatcher', app });
    log.info(`Dispatcher listening on ${host}:${port} (selection: ${this.config.dispatcher.selection})`);
  }
}
