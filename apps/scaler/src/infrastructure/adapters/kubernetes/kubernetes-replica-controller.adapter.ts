import type { ReplicaControllerPort } from '@las/scaler/domain/services/ports/replica-controller.port';
import type { AppsV1Api, V1Scale } from '@kubernetes/client-node';
import { withAbortSignal } from './kubernetes-client';

interface KubernetesReplicaControllerOptions {
  namespace: string;
  deploymentName: string;
}

type ScaleApi = Pick<AppsV1Api, 'readNamespacedDeploymentScale' | 'replaceNamespacedDeploymentScale'>;

/**
 * Reads and writes `spec.replicas` through the Deployment scale subresource.
 * The replace carries no resourceVersion, so it never conflicts with rollouts.
 */
export class KubernetesReplicaControllerAdapter implements ReplicaControllerPort {
  constructor(
    private readonly api: ScaleApi,
    private readonly options: KubernetesReplicaControllerOptions,
  ) {}

  async getReplicaCount(signal?: AbortSignal): Promise<number> {
    const scale = await this.api.readNamespacedDeploymentScale(
      {
        name: this.options.deploymentName,
        namespace: this.options.namespace,
      },
      withAbortSignal(signal),
    );
    const replicas = scale.spec?.replicas;
    if (typeof replicas !== 'number') {
      throw new Error(`Deployment ${this.options.deploymentName} has no spec.replicas`);
    }
    return replicas;
  }

  async setReplicaCount(replicas: number, signal?: AbortSignal): Promise<void> {
    const body: V1Scale = {
      apiVersion: 'autoscaling/v1',
      kind: 'Scale',
      metadata: {
        name: this.options.deploymentName,
        namespace: this.options.namespace,
      },
      spec: { replicas },
    };
    await this.api.replaceNamespacedDeploymentScale(
      {
        name: this.options.deploymentName,
        namespace: this.options.namespace,
        body,
      },
      withAbortSignal(signal),
    );
  }
}
