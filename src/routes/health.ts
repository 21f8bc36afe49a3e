import { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { IntegrationPattern } from '../types';
import { RouteOptions } from './rest';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

const VERSION = '1.0.0';

const healthRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { services }) => {
  const { registry, engine, cache, vectorStore, healthChecker } = services;

  // Liveness plus a rollup of backends, queue and storage
  fastify.get('/', async (request: FastifyRequest, reply: FastifyReply) => {
    const backends = registry.list();
    const healthy = backends.filter(backend => backend.healthy).length;

    const [queue, storeHealthy] = await Promise.all([
      engine.listQueue(),
      vectorStore.health().catch((error: unknown) => {
        request.log.warn({ err: error }, 'Vector store health probe failed');
        return false;
      }),
    ]);

    let status: HealthStatus = 'healthy';
    if (backends.length > 0 && healthy === 0) {
      status = 'unhealthy';
    } else if (healthy < backends.length || !storeHealthy) {
      status = 'degraded';
    }

    const patterns = Object.values(IntegrationPattern).reduce<Record<string, number>>((acc, pattern) => {
      acc[pattern] = registry.listByPattern(pattern).filter(backend => backend.healthy).length;
      return acc;
    }, {});

    return reply.code(status === 'unhealthy' ? 503 : 200).send({
      status,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: VERSION,
      backends: {
        total: backends.length,
        healthy,
        byPattern: patterns,
        items: backends.map(backend => ({
          name: backend.name,
          model: backend.model,
          pattern: backend.pattern,
          healthy: backend.healthy,
          activeConnections: backend.activeConnections,
          consecutiveFailures: healthChecker.consecutiveFailures(backend.name),
        })),
      },
      queue,
      cache: cache.stats(),
      vectorStore: { healthy: storeHealthy },
    });
  });
};

export default healthRoutes;
