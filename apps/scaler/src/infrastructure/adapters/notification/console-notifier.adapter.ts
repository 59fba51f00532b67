import { createChildLogger } from '@las/scaler/infrastructure/logging/pino-logger';
import type { NotificationMessage, NotificationPort } from '@las/domain';

const log = createChildLogger('console-notifier');

export class ConsoleNotifierAdapter implements NotificationPort {
  async send(message: NotificationMessage): Promise<void> {
    log.info(`[${message.type.toUpperCase()}] ${message.title}: ${message.message}`, message.data);
  }
}
