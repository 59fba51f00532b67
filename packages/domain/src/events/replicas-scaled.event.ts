export interface ReplicasScaledEventData {
  readonly type: 'replicas-scaled';
  readonly timestamp: number;
  readonly direction: 'up' | 'down';
  readonly fromReplicas: number;
  readonly toReplicas: number;
  readonly p99Ms: number;
  readonly ceilingMs: number;
  readonly reason: string;
}

export function replicasScaledEvent(
  fromReplicas: number,
  toReplicas: number,
  p99Ms: number,
  ceilingMs: number,
  reason: string,
): ReplicasScaledEventData {
  return {
    type: 'replicas-scaled',
    timestamp: Date.now(),
    direction: toReplicas > fromReplicas ? 'up' : 'down',
    fromReplicas,
    toReplicas,
    p99Ms,
    ceilingMs,
    reason,
  };
}
