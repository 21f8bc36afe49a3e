/**
 * Full service graph over ioredis-mock and in-process fakes.
 * Test files using this must mock ioredis with ioredis-mock.
 */

import Redis from 'ioredis';
import { loadConfig } from '../../config';
import { createServices, GatewayServices } from '../../services';
import { IntegrationPattern } from '../../types';
import { backendConfig, FakeEmbeddingProvider, fakeProviders, InMemoryVectorStore } from './fakes';

export interface TestGateway {
  services: GatewayServices;
  provider: FakeEmbeddingProvider;
  vectorStore: InMemoryVectorStore;
  redis: Redis;
}

export const TEST_BACKENDS = [
  backendConfig({ name: 'phi3', pattern: IntegrationPattern.REAL_TIME }),
  backendConfig({ name: 'llama', pattern: IntegrationPattern.HYBRID }),
  backendConfig({ name: 'mixtral', pattern: IntegrationPattern.BULK_ONLY }),
];

export async function createTestGateway(env: Record<string, string> = {}): Promise<TestGateway> {
  const config = loadConfig({
    LOG_LEVEL: 'silent',
    REDIS_KEY_PREFIX: 'test:',
    RETRY_BASE_DELAY_MS: '1',
    RETRY_MAX_DELAY_MS: '1',
    ...env,
  });
  const redis = new Redis();
  await redis.flushall();

  const provider = new FakeEmbeddingProvider();
  const vectorStore = new InMemoryVectorStore();

  const services = createServices(config, {
    redis,
    backends: TEST_BACKENDS,
    providers: fakeProviders(provider),
    vectorStore,
  });

  return { services, provider, vectorStore, redis };
}

export async function closeTestGateway({ services, redis }: TestGateway): Promise<void> {
  await services.engine.stop();
  services.cache.stop();
  services.registry.destroy();
  redis.disconnect();
}
