import { FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyHelmet from '@fastify/helmet';
import fastifyRateLimit from '@fastify/rate-limit';
import fastifySensible from '@fastify/sensible';
import fastifyWebsocket from '@fastify/websocket';

export interface PluginOptions {
  cors: {
    origins: string[];
    credentials: boolean;
  };
  rateLimit: {
    max: number;
    timeWindow: string;
  };
  maxPayloadBytes: number;
}

export const DEFAULT_PLUGIN_OPTIONS: PluginOptions = {
  cors: {
    origins: ['http://localhost:3000'],
    credentials: true,
  },
  rateLimit: {
    max: 1000,
    timeWindow: '1 minute',
  },
  maxPayloadBytes: 10 * 1024 * 1024,
};

const firstHeader = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

export async function setupPlugins(fastify: FastifyInstance, options: PluginOptions): Promise<void> {
  // Security plugins
  await fastify.register(fastifyHelmet, {
    contentSecurityPolicy: false, // API only
  });

  await fastify.register(fastifyCors, {
    origin: options.cors.origins,
    credentials: options.cors.credentials,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key', 'X-Request-Id'],
  });

  await fastify.register(fastifyRateLimit, {
    max: options.rateLimit.max,
    timeWindow: options.rateLimit.timeWindow,
    keyGenerator: (request) => firstHeader(request.headers['x-api-key']) || request.ip,
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      success: false,
      error: 'RATE_LIMIT_EXCEEDED',
      message: `Too many requests, please try again later. Limit: ${context.max} requests per ${context.after}`,
      retryable: true,
    }),
  });

  await fastify.register(fastifySensible);

  await fastify.register(fastifyWebsocket, {
    options: {
      maxPayload: options.maxPayloadBytes,
    },
  });
}
