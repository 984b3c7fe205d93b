import type { FastifyInstance } from 'fastify';

export async function registerHealthRoutes(app: FastifyInstance, version: string): Promise<void> {
  app.get('/healthz', async (_request, reply) => {
    return reply.status(200).send({ status: 'ok', version });
  });
}
