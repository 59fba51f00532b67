export interface NotificationMessage {
  readonly type: 'scale-up' | 'scale-down' | 'status' | 'error' | 'info';
  readonly title: string;
  readonly message: string;
  readonly data?: Record<string, unknown>;
  readonly timestamp?: number;
}

export interface NotificationPort {
  send(message: NotificationMessage): Promise<void>;
}
