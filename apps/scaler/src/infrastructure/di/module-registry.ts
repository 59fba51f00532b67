import { Autoscaler } from '@las/scaler/application/autoscaler/autoscaler';
import { Dispatcher } from '@las/scaler/application/dispatcher/dispatcher';
import { createSelectionStrategy } from '@las/scaler/application/dispatcher/selection-strategies';
import { type LatencyMonitor, LatencyMonitorService } from '@las/scaler/domain/services/latency-monitor.service';
import type { BackendClientPort } from '@las/scaler/domain/services/ports/backend-client.port';
import type { BackendDiscoveryPort } from '@las/scaler/domain/services/ports/backend-discovery.port';
import type { LatencyReporterPort } from '@las/scaler/domain/services/ports/latency-reporter.port';
import type { ReplicaControllerPort } from '@las/scaler/domain/services/ports/replica-controller.port';
import type { SelectionStrategy } from '@las/scaler/domain/services/ports/selection-strategy.port';
import type { StatsSourcePort } from '@las/scaler/domain/services/ports/stats-source.port';
import { HysteresisScalingPolicy, type ScalingPolicy } from '@las/scaler/domain/services/scaling-policy.service';
import { HttpBackendClientAdapter } from '@las/scaler/infrastructure/adapters/backend/http-backend-client.adapter';
import { KubernetesDiscoveryAdapter } from '@las/scaler/infrastructure/adapters/discovery/kubernetes-discovery.adapter';
import { StaticDiscoveryAdapter } from '@las/scaler/infrastructure/adapters/discovery/static-discovery.adapter';
import { createKubernetesApis, type KubernetesApis } from '@las/scaler/infrastructure/adapters/kubernetes/kubernetes-client';
import { KubernetesReplicaControllerAdapter } from '@las/scaler/infrastructure/adapters/kubernetes/kubernetes-replica-controller.adapter';
import { HttpLatencyReporterAdapter } from '@las/scaler/infrastructure/adapters/monitor/http-latency-reporter.adapter';
import { HttpStatsSourceAdapter } from '@las/scaler/infrastructure/adapters/monitor/http-stats-source.adapter';
import { LocalMonitorAdapter } from '@las/scaler/infrastructure/adapters/monitor/local-monitor.adapter';
import { ConsoleNotifierAdapter } from '@las/scaler/infrastructure/adapters/notification/console-notifier.adapter';
import { MultiNotifierAdapter } from '@las/scaler/infrastructure/adapters/notification/multi-notifier.adapter';
import { WebhookNotifierAdapter } from '@las/scaler/infrastructure/adapters/notification/webhook-notifier.adapter';
import { type BackendPool, BackendPoolAdapter } from '@las/scaler/infrastructure/adapters/pool/backend-pool.adapter';
import type { Role } from '@las/scaler/infrastructure/constants';
import { createChildLogger } from '@las/scaler/infrastructure/logging/pino-logger';
import type { ConfigSchema, EnvSchema } from '@las/config';
import { type ClockPort, DefaultClock, type NotificationPort } from '@las/domain';
import { Container } from './container';

const log = createChildLogger('module-registry');

export interface ServiceMap {
  Config: ConfigSchema;
  Env: EnvSchema;
  Role: Role;
  Clock: ClockPort;
  LatencyMonitor: LatencyMonitor;
  LocalMonitorAdapter: LocalMonitorAdapter;
  LatencyReporter: LatencyReporterPort;
  StatsSource: StatsSourcePort;
  KubernetesApis: KubernetesApis;
  BackendDiscovery: BackendDiscoveryPort;
  BackendPool: BackendPool;
  BackendClient: BackendClientPort;
  SelectionStrategy: SelectionStrategy;
  Dispatcher: Dispatcher;
  ReplicaController: ReplicaControllerPort;
  ScalingPolicy: ScalingPolicy;
  NotificationPort: NotificationPort;
  Autoscaler: Autoscaler;
}

export type ServiceContainer = Container<ServiceMap>;

/**
 * Wires every collaborator lazily; a role only builds what it resolves, so a
 * monitor process never touches Kubernetes credentials.
 */
export function registerModules(config: ConfigSchema, env: EnvSchema, role: Role): ServiceContainer {
  const container = new Container<ServiceMap>();
  const standalone = role === 'standalone';

  container.registerInstance('Config', config);
  container.registerInstance('Env', env);
  container.registerInstance('Role', role);
  container.registerInstance('Clock', new DefaultClock());

  // ============================================================================
  // Latency Monitor
  // ============================================================================

  container.register(
    'LatencyMonitor',
    () =>
      new LatencyMonitorService({
        windowCapacity: config.monitor.windowCapacity,
        clock: container.resolve('Clock'),
      }),
  );

  container.register('LocalMonitorAdapter', () => new LocalMonitorAdapter(container.resolve('LatencyMonitor')));

  // Standalone shares the in-process monitor; split roles talk to it over HTTP.
  container.register('LatencyReporter', () =>
    standalone
      ? container.resolve('LocalMonitorAdapter')
      : new HttpLatencyReporterAdapter({
          monitorUrl: config.monitor.url,
          timeoutMs: config.dispatcher.reportTimeoutMs,
        }),
  );

  container.register('StatsSource', () =>
    standalone ? container.resolve('LocalMonitorAdapter') : new HttpStatsSourceAdapter(config.monitor.url),
  );

  // ============================================================================
  // Cluster controller
  // ============================================================================

  container.register('KubernetesApis', () => {
    const inCluster = env.KUBERNETES_SERVICE_HOST !== undefined;
    log.info(`Loading Kubernetes credentials (${inCluster ? 'in-cluster' : 'kubeconfig'})`);
    return createKubernetesApis({ inCluster });
  });

  container.register('BackendDiscovery', () => {
    if (config.discovery.mode === 'static') {
      return new StaticDiscoveryAdapter(config.discovery.staticEndpoints);
    }
    return new KubernetesDiscoveryAdapter(container.resolve('KubernetesApis').core, {
      namespace: config.discovery.namespace,
      labelSelector: config.discovery.labelSelector,
      backendPort: config.discovery.backendPort,
    });
  });

  container.register(
    'ReplicaController',
    () =>
      new KubernetesReplicaControllerAdapter(container.resolve('KubernetesApis').apps, {
        namespace: config.discovery.namespace,
        deploymentName: config.discovery.deploymentName,
      }),
  );

  // ============================================================================
  // Dispatcher
  // ============================================================================

  container.register(
    'BackendPool',
    () =>
      new BackendPoolAdapter({
        discovery: container.resolve('BackendDiscovery'),
        refreshIntervalMs: config.dispatcher.poolRefreshIntervalMs,
        timeoutMs: config.discovery.timeoutMs,
        clock: container.resolve('Clock'),
      }),
  );

  container.register(
    'BackendClient',
    () =>
      new HttpBackendClientAdapter({
        backendPath: config.dispatcher.backendPath,
        timeoutMs: config.dispatcher.requestTimeoutMs,
      }),
  );

  container.register('SelectionStrategy', () => createSelectionStrategy(config.dispatcher.selection));

  container.register(
    'Dispatcher',
    () =>
      new Dispatcher({
        pool: container.resolve('BackendPool'),
        strategy: container.resolve('SelectionStrategy'),
        client: container.resolve('BackendClient'),
        reporter: container.resolve('LatencyReporter'),
        clock: container.resolve('Clock'),
      }),
  );

  // ============================================================================
  // Autoscaler
  // ============================================================================

  container.register(
    'ScalingPolicy',
    () =>
      new HysteresisScalingPolicy({
        latencyCeilingMs: config.autoscaler.latencyCeilingMs,
        scaleUpFactor: config.autoscaler.scaleUpFactor,
        scaleDownStep: config.autoscaler.scaleDownStep,
        minReplicas: config.autoscaler.minReplicas,
        maxReplicas: config.autoscaler.maxReplicas,
      }),
  );

  container.register('NotificationPort', () => {
    const consoleNotifier = new ConsoleNotifierAdapter();
    const webhookUrl = config.telemetry.notifyWebhookUrl;
    return webhookUrl
      ? new MultiNotifierAdapter([consoleNotifier, new WebhookNotifierAdapter(webhookUrl, config.discovery.deploymentName)])
      : consoleNotifier;
  });

  container.register(
    'Autoscaler',
    () =>
      new Autoscaler({
        statsSource: container.resolve('StatsSource'),
        controller: container.resolve('ReplicaController'),
        policy: container.resolve('ScalingPolicy'),
        pollIntervalMs: config.autoscaler.pollIntervalMs,
        callTimeoutMs: config.autoscaler.callTimeoutMs,
        minSamples: config.autoscaler.minSamples,
        latencyCeilingMs: config.autoscaler.latencyCeilingMs,
        notifier: container.resolve('NotificationPort'),
        clock: container.resolve('Clock'),
      }),
  );

  return container;
}
