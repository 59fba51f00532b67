import type { BackendEndpoint } from '@las/scaler/domain/types/backend';

export interface SelectionStrategy {
  readonly name: string;
  /** Picks one entry from a non-empty list of ready endpoints. */
  select(candidates: readonly BackendEndpoint[]): BackendEndpoint;
}
