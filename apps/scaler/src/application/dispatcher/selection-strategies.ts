import type { SelectionStrategy } from '@las/scaler/domain/services/ports/selection-strategy.port';
import type { BackendEndpoint } from '@las/scaler/domain/types/backend';

export type SelectionMode = 'random' | 'round-robin';

export class RandomSelection implements SelectionStrategy {
  readonly name = 'random';

  constructor(private readonly random: () => number = Math.random) {}

  select(candidates: readonly BackendEndpoint[]): BackendEndpoint {
    const index = Math.min(candidates.length - 1, Math.floor(this.random() * candidates.length));
    return pick(candidates, index);
  }
}

export class RoundRobinSelection implements SelectionStrategy {
  readonly name = 'round-robin';
  private cursor = 0;

  select(candidates: readonly BackendEndpoint[]): BackendEndpoint {
    const index = this.cursor % candidates.length;
    this.cursor = (this.cursor + 1) % Number.MAX_SAFE_INTEGER;
    return pick(candidates, index);
  }
}

export function createSelectionStrategy(mode: SelectionMode): SelectionStrategy {
  switch (mode) {
    case 'random':
      return new RandomSelection();
    case 'round-robin':
      return new RoundRobinSelection();
  }
}

function pick(candidates: readonly BackendEndpoint[], index: number): BackendEndpoint {
  const chosen = candidates[index];
  if (!chosen) {
    throw new Error('Cannot select from an empty endpoint list');
  }
  return chosen;
}
