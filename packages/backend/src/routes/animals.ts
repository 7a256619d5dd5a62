import { FastifyInstance } from 'fastify';
import {
  animalParamsSchema,
  colorFiltersSchema,
  createAnimalSchema,
  createAnimalsBatchSchema,
  removeAnimalsBatchSchema,
} from '../schemas/farm.schema.js';

export async function animalsRoutes(fastify: FastifyInstance): Promise<void> {
  const { farm, farmQueue } = fastify;

  // GET /api/animals — list animals, optionally for one color
  fastify.get<{ Querystring: Record<string, unknown> }>(
    '/api/animals',
    async (request, reply) => {
      const { color } = colorFiltersSchema.parse(request.query);
      const animals = await farmQueue.run(() => (color ? farm.findByColor(color) : farm.findAll()));
      return reply.code(200).send(animals);
    }
  );

  // GET /api/animals/:id — get single animal
  fastify.get<{ Params: Record<string, string> }>(
    '/api/animals/:id',
    async (request, reply) => {
      const { id } = animalParamsSchema.parse(request.params);
      const animal = await farmQueue.run(() => farm.getById(id));
      return reply.code(200).send(animal);
    }
  );

  // POST /api/animals — place a new animal
  fastify.post<{ Body: unknown }>(
    '/api/animals',
    async (request, reply) => {
      const data = createAnimalSchema.parse(request.body);
      const animal = await farmQueue.run(() => farm.addToFarm(data));
      return reply.code(201).send(animal);
    }
  );

  // POST /api/animals/batch — place several animals in order
  fastify.post<{ Body: unknown }>(
    '/api/animals/batch',
    async (request, reply) => {
      const { animals } = createAnimalsBatchSchema.parse(request.body);
      const added = await farmQueue.run(() => farm.addAllToFarm(animals));
      return reply.code(201).send(added);
    }
  );

  // POST /api/animals/batch-delete — remove several animals in order
  fastify.post<{ Body: unknown }>(
    '/api/animals/batch-delete',
    async (request, reply) => {
      const { ids } = removeAnimalsBatchSchema.parse(request.body);
      await farmQueue.run(() => farm.removeAllFromFarm(ids.map((id) => ({ id }))));
      return reply.code(204).send();
    }
  );

  // DELETE /api/animals/:id — remove an animal and rebalance its color
  fastify.delete<{ Params: Record<string, string> }>(
    '/api/animals/:id',
    async (request, reply) => {
      const { id } = animalParamsSchema.parse(request.params);
      await farmQueue.run(async () => farm.removeFromFarm(await farm.getById(id)));
      return reply.code(204).send();
    }
  );

  // DELETE /api/animals — clear the farm
  fastify.delete(
    '/api/animals',
    async (_request, reply) => {
      await farmQueue.run(() => farm.deleteAll());
      return reply.code(204).send();
    }
  );
}
