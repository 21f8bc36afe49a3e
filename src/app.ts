import Fastify, { FastifyInstance } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { Config } from './config';
import { GatewayServices } from './services';
import { setupPlugins, DEFAULT_PLUGIN_OPTIONS } from './plugins';
import { registerRoutes } from './routes';
import { errorHandler } from './middleware/error-handler';

export interface ServerOptions {
  logLevel: Config['logLevel'];
  cors?: Config['cors'];
  rateLimit?: Config['rateLimit'];
  bodyLimit?: number;
}

/**
 * Fastify instance with plugins, error handling and every surface mounted.
 * Does not listen.
 */
export async function buildServer(services: GatewayServices, options: ServerOptions): Promise<FastifyInstance> {
  const bodyLimit = options.bodyLimit ?? DEFAULT_PLUGIN_OPTIONS.maxPayloadBytes;

  const fastify = Fastify({
    logger: { level: options.logLevel },
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    genReqId: () => uuidv4(),
    trustProxy: true,
    bodyLimit,
  });

  await setupPlugins(fastify, {
    cors: options.cors ?? DEFAULT_PLUGIN_OPTIONS.cors,
    rateLimit: options.rateLimit ?? DEFAULT_PLUGIN_OPTIONS.rateLimit,
    maxPayloadBytes: bodyLimit,
  });

  fastify.setErrorHandler(errorHandler);

  await registerRoutes(fastify, services);

  return fastify;
}
