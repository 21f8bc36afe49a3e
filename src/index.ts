import { loadConfig } from './config';
import { loadBackends } from './config/backends';
import { createRedisClient } from './lib/redis';
import { createServices, GatewayServices } from './services';
import { buildServer } from './app';
import { Logger } from './utils/logger';
import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';

const logger = Logger.child({ component: 'gateway' });

let server: FastifyInstance | undefined;
let services: GatewayServices | undefined;
let redis: Redis | undefined;

async function start(): Promise<void> {
  const config = loadConfig();
  const backends = await loadBackends(config.backends.file);

  redis = createRedisClient(config.redis);
  await redis.connect();

  services = createServices(config, { redis, backends });

  const recovered = await services.engine.recover();
  if (recovered > 0) {
    logger.info({ recovered }, 'Requeued interrupted jobs');
  }

  services.healthChecker.start();
  services.cache.start();
  services.engine.start();

  server = await buildServer(services, {
    logLevel: config.logLevel,
    cors: config.cors,
    rateLimit: config.rateLimit,
  });

  await server.listen({ port: config.port, host: config.host });

  logger.info({
    port: config.port,
    host: config.host,
    environment: config.environment,
    nodeVersion: process.version,
    backends: backends.length,
    strategy: config.backends.strategy,
  }, `Gateway started on ${config.host}:${config.port}`);
}

// Graceful shutdown
async function gracefulShutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, starting graceful shutdown...`);

  try {
    if (server) await server.close();

    if (services) {
      await services.engine.stop();
      await services.healthChecker.stop();
      services.cache.stop();
      services.registry.destroy();
    }

    if (redis) await redis.quit();

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled rejection');
  process.exit(1);
});

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start gateway');
  process.exit(1);
});
