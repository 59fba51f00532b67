import { createChildLogger } from '@las/scaler/infrastructure/logging/pino-logger';
import Fastify, { type FastifyInstance } from 'fastify';
import healthRoutes from './health.routes';

const log = createChildLogger('http');

export function createServer(options: { role: string; bodyLimitBytes?: number }): FastifyInstance {
  const app = Fastify({ logger: false, bodyLimit: options.bodyLimitBytes });

  app.addHook('onResponse', async (request, reply) => {
    log.debug(`${request.method} ${request.url} -> ${reply.statusCode} (${reply.elapsedTime.toFixed(1)}ms)`);
  });

  app.setErrorHandler(async (error, request, reply) => {
    log.error(`Unhandled error on ${request.method} ${request.url}`, error);
    return reply.code(500).send({ error: 'Internal error' });
  });

  app.register(healthRoutes, { role: options.role });

  return app;
}
