export type ScalingAction = 'scale-up' | 'scale-down' | 'hold';

export interface ScalingDecision {
  readonly currentReplicas: number;
  readonly targetReplicas: number;
  readonly action: ScalingAction;
  readonly reason: string;
  /** Set when the raw target fell outside the replica bounds and was clamped. */
  readonly clamped?: { readonly requested: number; readonly bound: 'min' | 'max' };
}

export interface ScalingPolicyConfig {
  readonly latencyCeilingMs: number;
  readonly scaleUpFactor: number;
  readonly scaleDownStep: number;
  readonly minReplicas: number;
  readonly maxReplicas: number;
}

export type AutoscalerPhase = 'idle' | 'fetch-stats' | 'decide' | 'apply';

export type TickOutcome =
  | { readonly status: 'skipped'; readonly reason: 'stats-unavailable' | 'insufficient-data' | 'replicas-unavailable' }
  | { readonly status: 'held'; readonly decision: ScalingDecision }
  | { readonly status: 'applied'; readonly decision: ScalingDecision }
  | { readonly status: 'apply-failed'; readonly decision: ScalingDecision; readonly error: Error }
  | { readonly status: 'aborted' };
