import Redis from 'ioredis';
import { Config } from '../config';
import { Logger } from '../utils/logger';

const logger = Logger.child({ component: 'redis' });

/**
 * Job store connection. Keys are prefixed by the store, not the client.
 */
export function createRedisClient(config: Config['redis']): Redis {
  const redis = new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    db: config.db,
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });

  redis.on('connect', () => logger.info({ host: config.host, port: config.port }, 'Redis connected'));
  redis.on('error', (err: Error) => logger.error({ err }, 'Redis connection error'));

  return redis;
}
