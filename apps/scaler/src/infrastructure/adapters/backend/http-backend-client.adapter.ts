import type { BackendClientPort } from '@las/scaler/domain/services/ports/backend-client.port';
import type { BackendRequest, BackendResponse } from '@las/scaler/domain/types/backend';
import { withTimeout } from '@las/scaler/infrastructure/utils/with-timeout';

interface HttpBackendClientOptions {
  backendPath: string;
  timeoutMs: number;
}

export class HttpBackendClientAdapter implements BackendClientPort {
  constructor(private readonly options: HttpBackendClientOptions) {}

  async forward(endpoint: string, request: BackendRequest): Promise<BackendResponse> {
    const url = new URL(this.options.backendPath, `http://${endpoint}`);
    return withTimeout(`backend ${endpoint}`, this.options.timeoutMs, async (signal) => {
      const headers: Record<string, string> = {};
      if (request.contentType) {
        headers['content-type'] = request.contentType;
      }
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body: request.body,
        signal,
      });
      const body = new Uint8Array(await response.arrayBuffer());
      return {
        status: response.status,
        contentType: response.headers.get('content-type'),
        body,
      };
    });
  }
}
