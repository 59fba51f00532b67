import { describe, expect, it } from 'vitest';
import { HysteresisScalingPolicy } from '../scaling-policy.service';

const policy = (overrides: Partial<ConstructorParameters<typeof HysteresisScalingPolicy>[0]> = {}) =>
  new HysteresisScalingPolicy({
    latencyCeilingMs: 330,
    scaleUpFactor: 1.2,
    scaleDownStep: 1,
    minReplicas: 2,
    maxReplicas: 20,
    ...overrides,
  });

describe('HysteresisScalingPolicy', () => {
  it('scales up multiplicatively above the ceiling', () => {
    const decision = policy().decide(400, 10);

    expect(decision).toEqual({
      currentReplicas: 10,
      targetReplicas: 12,
      action: 'scale-up',
      reason: 'p99 400.0ms above ceiling 330ms',
    });
  });

  it('clamps a scale-up to the maximum', () => {
    const decision = policy().decide(400, 18);

    expect(decision.targetReplicas).toBe(20);
    expect(decision.action).toBe('scale-up');
    expect(decision.clamped).toEqual({ requested: 22, bound: 'max' });
  });

  it('steps down by one within the ceiling', () => {
    const decision = policy().decide(200, 5);

    expect(decision).toEqual({
      currentReplicas: 5,
      targetReplicas: 4,
      action: 'scale-down',
      reason: 'p99 200.0ms within ceiling 330ms',
    });
  });

  it('holds at the minimum', () => {
    const decision = policy().decide(200, 2);

    expect(decision.targetReplicas).toBe(2);
    expect(decision.action).toBe('hold');
    expect(decision.reason).toBe('p99 200.0ms within ceiling at minimum replicas');
  });

  it('never scales up at exactly the ceiling', () => {
    expect(policy().decide(330, 5).action).toBe('scale-down');
    expect(policy().decide(330, 2).action).toBe('hold');
    expect(policy().decide(330.1, 5).action).toBe('scale-up');
  });

  it('clamps a large step down to the minimum', () => {
    const decision = policy({ scaleDownStep: 3 }).decide(100, 4);

    expect(decision.targetReplicas).toBe(2);
    expect(decision.clamped).toEqual({ requested: 1, bound: 'min' });
  });

  it('lifts a workload scaled to zero back to the minimum', () => {
    const decision = policy().decide(500, 0);

    expect(decision.targetReplicas).toBe(2);
    expect(decision.action).toBe('scale-up');
    expect(decision.clamped).toEqual({ requested: 0, bound: 'min' });
  });

  it('holds when already at the maximum under load', () => {
    const decision = policy({ maxReplicas: 8 }).decide(500, 8);

    expect(decision.action).toBe('hold');
    expect(decision.clamped).toEqual({ requested: 10, bound: 'max' });
  });

  it('rejects invalid parameters', () => {
    expect(() => policy({ scaleUpFactor: 1 })).toThrow('scaleUpFactor must be greater than 1, got 1');
    expect(() => policy({ scaleDownStep: 0 })).toThrow('scaleDownStep must be at least 1, got 0');
    expect(() => policy({ minReplicas: 5, maxReplicas: 3 })).toThrow('minReplicas 5 exceeds maxReplicas 3');
    expect(() => policy({ minReplicas: 0 })).toThrow('minReplicas must be at least 1, got 0');
  });

  it('never steps a single replica down to zero', () => {
    const decision = policy({ minReplicas: 1 }).decide(100, 1);

    expect(decision.targetReplicas).toBe(1);
    expect(decision.action).toBe('hold');
  });

  it('recovers from zero replicas under load with a floor of one', () => {
    const decision = policy({ minReplicas: 1 }).decide(5000, 0);

    expect(decision.targetReplicas).toBe(1);
    expect(decision.action).toBe('scale-up');
  });
});
