import { FastifyInstance } from 'fastify';
import { GatewayServices } from '../services';
import restRoutes from './rest';
import queryRoutes from './query';
import streamRoutes from './stream';
import healthRoutes from './health';

export async function registerRoutes(fastify: FastifyInstance, services: GatewayServices): Promise<void> {
  await fastify.register(healthRoutes, { prefix: '/health', services });
  await fastify.register(streamRoutes, { prefix: '/stream', services });

  await fastify.register(restRoutes, { prefix: '/v1', services });
  await fastify.register(queryRoutes, { prefix: '/query', services });

  fastify.get('/', async () => ({
    service: 'Model Integration Gateway',
    version: '1.0.0',
    status: 'operational',
    endpoints: {
      health: '/health',
      rest: '/v1',
      query: '/query',
      stream: '/stream',
    },
  }));
}
