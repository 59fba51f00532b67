import type { BackendDiscoveryPort } from '@las/scaler/domain/services/ports/backend-discovery.port';
import type { BackendEndpoint } from '@las/scaler/domain/types/backend';
import { withAbortSignal } from '@las/scaler/infrastructure/adapters/kubernetes/kubernetes-client';
import type { CoreV1Api, V1Pod } from '@kubernetes/client-node';

interface KubernetesDiscoveryOptions {
  namespace: string;
  labelSelector: string;
  backendPort: number;
}

type PodApi = Pick<CoreV1Api, 'listNamespacedPod'>;

export class KubernetesDiscoveryAdapter implements BackendDiscoveryPort {
  constructor(
    private readonly api: PodApi,
    private readonly options: KubernetesDiscoveryOptions,
  ) {}

  async listEndpoints(signal?: AbortSignal): Promise<BackendEndpoint[]> {
    const pods = await this.api.listNamespacedPod(
      {
        namespace: this.options.namespace,
        labelSelector: this.options.labelSelector,
      },
      withAbortSignal(signal),
    );

    const endpoints: BackendEndpoint[] = [];
    for (const pod of pods.items) {
      const podIp = pod.status?.podIP;
      if (!podIp) {
        continue;
      }
      endpoints.push({
        endpoint: formatEndpoint(podIp, this.options.backendPort),
        ready: isPodReady(pod),
      });
    }
    return endpoints;
  }
}

/** `host:port`, with IPv6 addresses bracketed so the endpoint forms a valid URL authority. */
export function formatEndpoint(podIp: string, port: number): string {
  return podIp.includes(':') ? `[${podIp}]:${port}` : `${podIp}:${port}`;
}

export function isPodReady(pod: V1Pod): boolean {
  if (pod.metadata?.deletionTimestamp) {
    return false;
  }
  if (pod.status?.phase !== 'Running') {
    return false;
  }
  return (pod.status.conditions ?? []).some((condition) => condition.type === 'Ready' && condition.status === 'True');
}
