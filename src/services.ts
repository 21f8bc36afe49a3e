/**
 * Component graph shared by every surface
 */

import Redis from 'ioredis';
import { Config } from './config';
import { BackendConfig, Operation, OperationResult, VectorStore } from './types';
import { BackendRegistry } from './registry/backend-registry';
import { HealthChecker } from './registry/health-checker';
import { ResponseCache } from './cache/response-cache';
import { LoadBalancer } from './balancer/load-balancer';
import { createProviders, ProviderMap } from './clients/providers';
import { QdrantVectorStore } from './clients/qdrant-vector-store';
import { createEnricher } from './dispatcher/enrichment';
import { EmbeddingPipeline } from './dispatcher/embedding-pipeline';
import { PatternDispatcher } from './dispatcher/pattern-dispatcher';
import { RedisJobStore } from './queue/job-store';
import { BatchJobEngine } from './queue/batch-job-engine';
import { Authorizer, createAuthorizer } from './gateway/authorization';

export interface GatewayServices {
  registry: BackendRegistry;
  healthChecker: HealthChecker;
  balancer: LoadBalancer;
  cache: ResponseCache<OperationResult>;
  dispatcher: PatternDispatcher;
  engine: BatchJobEngine;
  vectorStore: VectorStore;
  authorizer: Authorizer;
}

export interface ServiceDependencies {
  redis: Redis;
  backends: BackendConfig[];
  providers?: ProviderMap;
  vectorStore?: VectorStore;
  authorizer?: Authorizer;
  random?: () => number;
  now?: () => number;
}

export function createServices(config: Config, deps: ServiceDependencies): GatewayServices {
  const registry = new BackendRegistry(deps.backends);
  const providers = deps.providers ?? createProviders();
  const vectorStore = deps.vectorStore ?? new QdrantVectorStore(config.vectorStore);

  const healthChecker = new HealthChecker(registry, providers, config.health);

  const balancer = new LoadBalancer(registry, {
    strategy: config.backends.strategy,
    random: deps.random,
  });

  const cache = new ResponseCache<OperationResult>({
    enabled: config.cache.enabled,
    maxEntries: config.cache.maxEntries,
    sweepIntervalMs: config.cache.sweepIntervalMs,
    ttlMs: {
      [Operation.SEARCH]: config.cache.searchTtlMs,
      [Operation.EMBED]: config.cache.embedTtlMs,
    },
    ...(deps.now && { now: deps.now }),
  });

  const pipeline = new EmbeddingPipeline(providers, createEnricher(config.dispatch.enrichment));
  const store = new RedisJobStore(deps.redis, config.redis.keyPrefix);

  const engine = new BatchJobEngine(store, registry, balancer, pipeline, vectorStore, {
    ...config.batch,
    retryBaseDelayMs: config.dispatch.retryBaseDelayMs,
    retryMaxDelayMs: config.dispatch.retryMaxDelayMs,
  });

  const dispatcher = new PatternDispatcher(registry, balancer, cache, pipeline, vectorStore, engine, {
    hybridBatchThreshold: config.dispatch.hybridBatchThreshold,
    retryBaseDelayMs: config.dispatch.retryBaseDelayMs,
    retryMaxDelayMs: config.dispatch.retryMaxDelayMs,
  });

  return {
    registry,
    healthChecker,
    balancer,
    cache,
    dispatcher,
    engine,
    vectorStore,
    authorizer: deps.authorizer ?? createAuthorizer(config.auth.apiKeys),
  };
}
