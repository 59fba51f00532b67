import { ControlPlane } from '@las/scaler/application/orchestrator/control-plane';
import { isRole, ROLES } from '@las/scaler/infrastructure/constants';
import { createChildLogger } from '@las/scaler/infrastructure/logging/pino-logger';
import { toError } from '@las/domain';

const log = createChildLogger('main');

async function main(): Promise<void> {
  const role = process.argv[2] ?? process.env.LAS_ROLE ?? 'standalone';
  if (!isRole(role)) {
    log.fatal(`Unknown role "${role}", expected one of: ${ROLES.join(', ')}`);
    process.exit(1);
  }

  log.info(`Latency autoscaler starting (${role})...`);

  const controlPlane = new ControlPlane({ role });

  const shutdown = async (signal: string) => {
    log.info(`Received ${signal}, shutting down gracefully...`);
    await controlPlane.stop();
    log.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      log.error('Shutdown failed', toError(error));
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  await controlPlane.start();
}

main().catch((error) => {
  log.fatal('Fatal error starting latency autoscaler', toError(error));
  process.exit(1);
});
