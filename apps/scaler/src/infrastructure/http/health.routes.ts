import type { FastifyInstance } from 'fastify';

export default async function healthRoutes(app: FastifyInstance, opts: { role: string }) {
  app.get('/health', async () => ({ ok: true, role: opts.role }));
}
