import type { NotificationMessage, NotificationPort } from '@las/domain';
import { buildFooter, formatFieldValue, getColorForType } from './notification-formatter';
import { WebhookClient } from './webhook-client';

export class WebhookNotifierAdapter implements NotificationPort {
  private readonly client: WebhookClient;

  constructor(
    webhookUrl: string,
    private readonly workload: string,
  ) {
    this.client = new WebhookClient(webhookUrl);
  }

  async send(message: NotificationMessage): Promise<void> {
    const at = new Date(message.timestamp ?? Date.now());
    await this.client.sendEmbed({
      title: message.title,
      description: message.message,
      color: getColorForType(message.type),
      timestamp: at.toISOString(),
      fields: message.data
        ? Object.entries(message.data).map(([name, value]) => ({
            name,
            value: formatFieldValue(value),
            inline: true,
          }))
        : undefined,
      footer: { text: buildFooter(this.workload, at) },
    });
  }
}
