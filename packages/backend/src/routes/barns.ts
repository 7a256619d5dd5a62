import { FastifyInstance } from 'fastify';
import { colorFiltersSchema } from '../schemas/farm.schema.js';

export async function barnsRoutes(fastify: FastifyInstance): Promise<void> {
  const { farm, farmQueue } = fastify;

  // GET /api/barns — barns with their current occupancy
  fastify.get<{ Querystring: Record<string, unknown> }>(
    '/api/barns',
    async (request, reply) => {
      const { color } = colorFiltersSchema.parse(request.query);
      const barns = await farmQueue.run(() => farm.listBarns(color));
      return reply.code(200).send(barns);
    }
  );

  // GET /api/barns/health — recheck the allocation invariants against the store
  fastify.get(
    '/api/barns/health',
    async (_request, reply) => {
      const violations = await farmQueue.run(() => farm.checkInvariants());
      return reply.code(200).send({ healthy: violations.length === 0, violations });
    }
  );
}
