export interface ReplicaControllerPort {
  /** Desired replica count as currently stored by the cluster controller. */
  getReplicaCount(signal?: AbortSignal): Promise<number>;
  /** Resolves on acknowledgment; does not wait for the rollout to converge. */
  setReplicaCount(replicas: number, signal?: AbortSignal): Promise<void>;
}
