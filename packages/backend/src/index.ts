import Fastify from 'fastify';
import cors from '@fastify/cors';
import 'dotenv/config';
import { registerErrorHandler } from './lib/error-handler.js';
import { loadFarmConfig } from './lib/config/farm.js';
import farmPlugin from './plugins/farm.plugin.js';
import { animalsRoutes } from './routes/animals.js';
import { barnsRoutes } from './routes/barns.js';

const config = loadFarmConfig();

const fastify = Fastify({
  logger: { level: config.logLevel },
});

await fastify.register(cors, {
  origin: config.frontendUrl,
});

await fastify.register(farmPlugin, { barnCapacity: config.barnCapacity });

registerErrorHandler(fastify);

fastify.get('/health', async () => {
  return {
    status: 'ok',
    barnCapacity: fastify.farm.capacity,
  };
});

await fastify.register(animalsRoutes);
await fastify.register(barnsRoutes);

const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
