import type { LatencyMonitor } from '@las/scaler/domain/services/latency-monitor.service';
import type { FastifyInstance } from 'fastify';
import { recordBodySchema } from './schemas';

export default async function monitorRoutes(app: FastifyInstance, opts: { monitor: LatencyMonitor }) {
  const { monitor } = opts;

  app.post('/record', async (request, reply) => {
    const parsed = recordBodySchema.safeParse(request.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return reply.code(400).send({
        status: 'error',
        message: issue ? `${issue.path.map(String).join('.') || 'body'}: ${issue.message}` : 'Invalid body',
      });
    }
    monitor.record(parsed.data.duration);
    return { status: 'ok' };
  });

  app.get('/stats', async () => monitor.stats());
}
