export interface BackendEndpoint {
  /** host:port */
  readonly endpoint: string;
  readonly ready: boolean;
}

export interface BackendPoolSnapshot {
  readonly endpoints: readonly BackendEndpoint[];
  readonly refreshedAt: number | null;
  readonly quarantined: readonly string[];
}

export interface BackendRequest {
  readonly body: Uint8Array;
  readonly contentType?: string;
}

export interface BackendResponse {
  readonly status: number;
  readonly contentType: string | null;
  readonly body: Uint8Array;
}
