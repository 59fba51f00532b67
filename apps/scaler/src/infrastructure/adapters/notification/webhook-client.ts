import { createChildLogger } from '@las/scaler/infrastructure/logging/pino-logger';
import { errorMessage } from '@las/domain';

const log = createChildLogger('webhook');

const WEBHOOK_TIMEOUT_MS = 3000;

export interface WebhookField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface WebhookEmbed {
  title: string;
  description?: string;
  color?: number;
  fields?: WebhookField[];
  footer?: { text: string };
  timestamp?: string;
}

/** Posts Discord-style embeds; failures are logged, never thrown. */
export class WebhookClient {
  constructor(
    private readonly webhookUrl: string,
    private readonly username: string = 'Latency Autoscaler',
  ) {}

  async sendEmbed(embed: WebhookEmbed): Promise<void> {
    try {
      const response = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ username: this.username, embeds: [embed] }),
        signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS),
      });
      if (!response.ok) {
        log.warn(`Webhook responded with status ${response.status}`);
      }
    } catch (error) {
      log.warn(`Failed to send notification: ${errorMessage(error)}`);
    }
  }
}
