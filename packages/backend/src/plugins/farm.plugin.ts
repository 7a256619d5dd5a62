import fp from 'fastify-plugin';
import { FastifyInstance } from 'fastify';
import { loadFarmConfig } from '../lib/config/farm.js';
import { SerialQueue } from '../lib/serial-queue.js';
import { FarmService } from '../services/farm.service.js';
import { InMemoryFarmStore } from '../storage/memory/store.js';
import type { FarmStore } from '../storage/interfaces.js';

declare module 'fastify' {
  interface FastifyInstance {
    farm: FarmService;
    /** Serializes farm mutations; route handlers run writes through it. */
    farmQueue: SerialQueue;
  }
}

export interface FarmPluginOptions {
  store?: FarmStore;
  /** Defaults to BARN_CAPACITY from the environment. */
  barnCapacity?: number;
  barnName?: (index: number) => string;
}

async function farmPlugin(fastify: FastifyInstance, options: FarmPluginOptions): Promise<void> {
  const farm = new FarmService({
    store: options.store ?? new InMemoryFarmStore(),
    barnCapacity: options.barnCapacity ?? loadFarmConfig().barnCapacity,
    barnName: options.barnName,
    logger: fastify.log,
  });

  fastify.decorate('farm', farm);
  fastify.decorate('farmQueue', new SerialQueue());
}

export default fp(farmPlugin, {
  name: 'farm',
});
