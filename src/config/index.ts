import { z } from 'zod';
import * as dotenv from 'dotenv';
import { ConfigError } from '../errors';
import { BalancingStrategy } from '../types';

// Load environment variables from .env file
dotenv.config();

const ConfigSchema = z.object({
  // Server configuration
  host: z.string().default('0.0.0.0'),
  port: z.number().int().positive().default(3020),
  environment: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // CORS configuration
  cors: z.object({
    origins: z.array(z.string()).default(['http://localhost:3000']),
    credentials: z.boolean().default(true),
  }),

  // Rate limiting
  rateLimit: z.object({
    max: z.number().int().positive().default(1000),
    timeWindow: z.string().default('1 minute'),
  }),

  // Redis configuration
  redis: z.object({
    host: z.string().default('localhost'),
    port: z.number().int().positive().default(6379),
    password: z.string().optional(),
    db: z.number().int().nonnegative().default(0),
    keyPrefix: z.string().default('gateway:'),
  }),

  // Backend registry
  backends: z.object({
    file: z.string().default('config/backends.json'),
    strategy: z.nativeEnum(BalancingStrategy).default(BalancingStrategy.WEIGHTED_RANDOM),
  }),

  health: z.object({
    intervalMs: z.number().int().positive().default(15000),
    timeoutMs: z.number().int().positive().default(2000),
    failureThreshold: z.number().int().positive().default(3),
  }),

  cache: z.object({
    enabled: z.boolean().default(true),
    maxEntries: z.number().int().positive().default(10000),
    sweepIntervalMs: z.number().int().positive().default(60000),
    searchTtlMs: z.number().int().positive().default(600000), // 10 minutes
    embedTtlMs: z.number().int().positive().default(300000), // 5 minutes
  }),

  dispatch: z.object({
    hybridBatchThreshold: z.number().int().positive().default(50),
    retryBaseDelayMs: z.number().int().nonnegative().default(100),
    retryMaxDelayMs: z.number().int().nonnegative().default(2000),
    enrichment: z.enum(['none', 'l2_normalize']).default('none'),
  }),

  batch: z.object({
    workers: z.number().int().positive().default(3),
    subBatchSize: z.number().int().positive().default(100),
    pollIntervalMs: z.number().int().positive().default(500),
    maxJobRetries: z.number().int().nonnegative().default(3),
  }),

  vectorStore: z.object({
    url: z.string().url().default('http://localhost:6333'),
    apiKey: z.string().optional(),
    timeoutMs: z.number().int().positive().default(10000),
  }),

  auth: z.object({
    apiKeys: z.array(z.string().min(1)).default([]),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

const toInt = (value: string | undefined): number | undefined =>
  value !== undefined && value !== '' ? Number(value) : undefined;

const toList = (value: string | undefined): string[] | undefined =>
  value
    ? value.split(',').map(part => part.trim()).filter(part => part.length > 0)
    : undefined;

const toBool = (value: string | undefined): boolean | undefined =>
  value === undefined || value === '' ? undefined : value !== 'false' && value !== '0';

/**
 * Build the gateway configuration from an environment map.
 * Throws ConfigError naming every offending setting.
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    host: env.HOST,
    port: toInt(env.PORT),
    environment: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,

    cors: {
      origins: toList(env.CORS_ORIGIN),
      credentials: toBool(env.CORS_CREDENTIALS),
    },

    rateLimit: {
      max: toInt(env.RATE_LIMIT_MAX),
      timeWindow: env.RATE_LIMIT_TIME_WINDOW,
    },

    redis: {
      host: env.REDIS_HOST,
      port: toInt(env.REDIS_PORT),
      password: env.REDIS_PASSWORD || undefined,
      db: toInt(env.REDIS_DB),
      keyPrefix: env.REDIS_KEY_PREFIX,
    },

    backends: {
      file: env.BACKENDS_FILE,
      strategy: env.ROUTER_STRATEGY,
    },

    health: {
      intervalMs: toInt(env.HEALTH_CHECK_INTERVAL_MS),
      timeoutMs: toInt(env.HEALTH_CHECK_TIMEOUT_MS),
      failureThreshold: toInt(env.HEALTH_FAILURE_THRESHOLD),
    },

    cache: {
      enabled: toBool(env.CACHE_ENABLED),
      maxEntries: toInt(env.CACHE_MAX_ENTRIES),
      sweepIntervalMs: toInt(env.CACHE_SWEEP_INTERVAL_MS),
      searchTtlMs: toInt(env.CACHE_SEARCH_TTL_MS),
      embedTtlMs: toInt(env.CACHE_EMBED_TTL_MS),
    },

    dispatch: {
      hybridBatchThreshold: toInt(env.HYBRID_BATCH_THRESHOLD),
      retryBaseDelayMs: toInt(env.RETRY_BASE_DELAY_MS),
      retryMaxDelayMs: toInt(env.RETRY_MAX_DELAY_MS),
      enrichment: env.EMBEDDING_ENRICHMENT,
    },

    batch: {
      workers: toInt(env.BATCH_WORKERS),
      subBatchSize: toInt(env.BATCH_SUB_BATCH_SIZE),
      pollIntervalMs: toInt(env.BATCH_POLL_INTERVAL_MS),
      maxJobRetries: toInt(env.BATCH_MAX_JOB_RETRIES),
    },

    vectorStore: {
      url: env.VECTOR_STORE_URL,
      apiKey: env.VECTOR_STORE_API_KEY || undefined,
      timeoutMs: toInt(env.VECTOR_STORE_TIMEOUT_MS),
    },

    auth: {
      apiKeys: toList(env.GATEWAY_API_KEYS),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid configuration: ${issues.map(issue => issue.field).join(', ')}`,
      { issues }
    );
  }

  return parsed.data;
}
