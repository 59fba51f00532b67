import type { BackendDiscoveryPort } from '@las/scaler/domain/services/ports/backend-discovery.port';
import type { BackendEndpoint } from '@las/scaler/domain/types/backend';

/** Fixed endpoint list from configuration; every entry counts as ready. */
export class StaticDiscoveryAdapter implements BackendDiscoveryPort {
  private readonly endpoints: readonly string[];

  constructor(endpoints: readonly string[]) {
    this.endpoints = [...new Set(endpoints)];
  }

  async listEndpoints(): Promise<BackendEndpoint[]> {
    return this.endpoints.map((endpoint) => ({ endpoint, ready: true }));
  }
}
