import type { BackendRequest, BackendResponse } from '@las/scaler/domain/types/backend';

export interface BackendClientPort {
  /** Rejects on transport failure or timeout; HTTP error statuses resolve normally. */
  forward(endpoint: string, request: BackendRequest): Promise<BackendResponse>;
}
