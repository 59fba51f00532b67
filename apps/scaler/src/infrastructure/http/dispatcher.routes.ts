import type { Dispatcher } from '@las/scaler/application/dispatcher/dispatcher';
import type { BackendPool } from '@las/scaler/infrastructure/adapters/pool/backend-pool.adapter';
import { BackendUnavailableError } from '@las/domain';
import type { FastifyInstance } from 'fastify';

interface DispatcherRouteOptions {
  dispatcher: Pick<Dispatcher, 'route'>;
  pool: Pick<BackendPool, 'getSnapshot'>;
}

export default async function dispatcherRoutes(app: FastifyInstance, opts: DispatcherRouteOptions) {
  const { dispatcher, pool } = opts;

  // Requests are forwarded byte for byte, whatever their content type.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  app.post('/', async (request, reply) => {
    const body = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
    const contentType = request.headers['content-type'];

    try {
      const result = await dispatcher.route({ body, contentType });
      reply.code(result.response.status).header('x-backend-endpoint', result.endpoint);
      if (result.response.contentType) {
        reply.header('content-type', result.response.contentType);
      }
      return reply.send(Buffer.from(result.response.body));
    } catch (error) {
      if (error instanceof BackendUnavailableError) {
        return reply.code(503).send({ error: error.message, attempts: error.attempts });
      }
      throw error;
    }
  });

  app.get('/pool', async () => pool.getSnapshot());
}
