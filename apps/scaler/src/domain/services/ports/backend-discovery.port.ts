import type { BackendEndpoint } from '@las/scaler/domain/types/backend';

export interface BackendDiscoveryPort {
  listEndpoints(signal?: AbortSignal): Promise<BackendEndpoint[]>;
}
