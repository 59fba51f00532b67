import type { ScalingAction, ScalingDecision, ScalingPolicyConfig } from '@las/scaler/domain/types/scaling';
import { ReplicaCount } from '@las/domain';

export interface ScalingPolicy {
  decide(p99Ms: number, currentReplicas: number): ScalingDecision;
}

/**
 * Hysteresis policy: multiplicative scale-up when p99 exceeds the ceiling,
 * one additive step down otherwise. A p99 exactly at the ceiling never scales up.
 */
export class HysteresisScalingPolicy implements ScalingPolicy {
  constructor(private readonly config: ScalingPolicyConfig) {
    if (config.scaleUpFactor <= 1) {
      throw new RangeError(`scaleUpFactor must be greater than 1, got ${config.scaleUpFactor}`);
    }
    if (config.scaleDownStep < 1) {
      throw new RangeError(`scaleDownStep must be at least 1, got ${config.scaleDownStep}`);
    }
    if (config.minReplicas < 1) {
      throw new RangeError(`minReplicas must be at least 1, got ${config.minReplicas}`);
    }
    if (config.minReplicas > config.maxReplicas) {
      throw new RangeError(`minReplicas ${config.minReplicas} exceeds maxReplicas ${config.maxReplicas}`);
    }
  }

  decide(p99Ms: number, currentReplicas: number): ScalingDecision {
    const current = ReplicaCount.create(currentReplicas);
    const { latencyCeilingMs, scaleUpFactor, scaleDownStep, minReplicas, maxReplicas } = this.config;

    if (p99Ms > latencyCeilingMs) {
      const requested = current.scaleBy(scaleUpFactor);
      const target = requested.clamp(minReplicas, maxReplicas);
      return this.build(
        current,
        target,
        `p99 ${p99Ms.toFixed(1)}ms above ceiling ${latencyCeilingMs}ms`,
        this.boundHit(requested, target),
      );
    }

    if (current.value > minReplicas) {
      const requested = current.minus(scaleDownStep);
      const target = requested.clamp(minReplicas, Number.MAX_SAFE_INTEGER);
      return this.build(
        current,
        target,
        `p99 ${p99Ms.toFixed(1)}ms within ceiling ${latencyCeilingMs}ms`,
        this.boundHit(requested, target),
      );
    }

    return this.build(current, current, `p99 ${p99Ms.toFixed(1)}ms within ceiling at minimum replicas`);
  }

  private build(
    current: ReplicaCount,
    target: ReplicaCount,
    reason: string,
    clamped?: ScalingDecision['clamped'],
  ): ScalingDecision {
    const action: ScalingAction = target.greaterThan(current)
      ? 'scale-up'
      : target.lessThan(current)
        ? 'scale-down'
        : 'hold';
    return {
      currentReplicas: current.value,
      targetReplicas: target.value,
      action,
      reason,
      ...(clamped ? { clamped } : {}),
    };
  }

  private boundHit(requested: ReplicaCount, target: ReplicaCount): ScalingDecision['clamped'] {
    if (requested.equals(target)) {
      return undefined;
    }
    return { requested: requested.value, bound: requested.greaterThan(target) ? 'max' : 'min' };
  }
}
