import { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AlreadyTerminalError, NotFoundError } from '../errors';
import { BackendDescriptor, IntegrationPattern, Operation } from '../types';
import { GatewayServices } from '../services';
import { buildRequest } from '../gateway/request-factory';
import { authorizeOrThrow } from '../gateway/authorization';
import { serializeOutcome } from './serialize';

export interface RouteOptions {
  services: GatewayServices;
}

const JobParamsSchema = z.object({
  jobId: z.string().min(1),
});

const BackendParamsSchema = z.object({
  name: z.string().min(1),
});

const ModelParamsSchema = z.object({
  model: z.string().min(1),
});

const WarmSchema = z.object({
  model: z.string().trim().min(1, 'model is required'),
  texts: z.array(z.string().trim().min(1)).min(1, 'texts must not be empty').max(100),
});

const InvalidateSchema = z.object({
  pattern: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

const OPERATION_ROUTES: { path: string; operation: Operation }[] = [
  { path: '/search', operation: Operation.SEARCH },
  { path: '/embed', operation: Operation.EMBED },
  { path: '/upsert', operation: Operation.UPSERT },
  { path: '/delete', operation: Operation.DELETE },
];

const modelStatus = (model: string, backends: Readonly<BackendDescriptor>[]) => ({
  model,
  pattern: backends[0]?.pattern,
  dimension: backends[0]?.dimension,
  backends: backends.map(backend => backend.name),
  healthy: backends.filter(backend => backend.healthy).length,
  activeConnections: backends.reduce((sum, backend) => sum + backend.activeConnections, 0),
});

/**
 * Request/response surface, mounted under /v1
 */
const restRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { services }) => {
  const { dispatcher, engine, registry, cache, healthChecker, authorizer } = services;

  const authorize = (request: FastifyRequest, action: string) =>
    authorizeOrThrow(authorizer, {
      surface: 'rest',
      action,
      headers: request.headers,
      ip: request.ip,
    });

  for (const { path, operation } of OPERATION_ROUTES) {
    fastify.post(path, async (request: FastifyRequest, reply: FastifyReply) => {
      await authorize(request, operation);

      const gatewayRequest = buildRequest(operation, request.body, { requestId: request.id });
      const outcome = await dispatcher.dispatch(gatewayRequest);

      return reply.code(outcome.kind === 'queued' ? 202 : 200).send(serializeOutcome(outcome));
    });
  }

  // Batch job status
  fastify.get('/jobs/:jobId', async (request: FastifyRequest, reply: FastifyReply) => {
    await authorize(request, 'job.status');
    const { jobId } = JobParamsSchema.parse(request.params);

    return reply.send(await engine.status(jobId));
  });

  // Cancel a batch job
  fastify.delete('/jobs/:jobId', async (request: FastifyRequest, reply: FastifyReply) => {
    await authorize(request, 'job.cancel');
    const { jobId } = JobParamsSchema.parse(request.params);

    const cancellation = await engine.cancel(jobId);
    if (cancellation.result === 'already_terminal') {
      throw new AlreadyTerminalError(jobId, cancellation.status);
    }

    return reply.send(cancellation);
  });

  fastify.get('/queue', async (request: FastifyRequest, reply: FastifyReply) => {
    await authorize(request, 'queue.list');
    return reply.send(await engine.listQueue());
  });

  fastify.get('/backends', async (request: FastifyRequest, reply: FastifyReply) => {
    await authorize(request, 'backends.list');

    return reply.send({
      strategy: services.balancer.strategyName,
      backends: registry.list().map(backend => ({
        ...backend,
        consecutiveFailures: healthChecker.consecutiveFailures(backend.name),
      })),
    });
  });

  // On-demand connectivity probe of one backend
  fastify.post('/backends/:name/check', async (request: FastifyRequest, reply: FastifyReply) => {
    await authorize(request, 'backends.check');
    const { name } = BackendParamsSchema.parse(request.params);

    return reply.send(await healthChecker.checkConnection(name));
  });

  fastify.get('/models', async (request: FastifyRequest, reply: FastifyReply) => {
    await authorize(request, 'models.list');

    const byModel = new Map<string, Readonly<BackendDescriptor>[]>();
    registry.list().forEach(backend => {
      byModel.set(backend.model, [...(byModel.get(backend.model) ?? []), backend]);
    });

    return reply.send({
      patterns: Object.values(IntegrationPattern),
      models: Array.from(byModel.entries()).map(([model, backends]) => modelStatus(model, backends)),
    });
  });

  fastify.get('/models/:model', async (request: FastifyRequest, reply: FastifyReply) => {
    await authorize(request, 'models.status');
    const { model } = ModelParamsSchema.parse(request.params);

    const backends = registry.findByModel(model);
    if (backends.length === 0) {
      throw new NotFoundError(`Model ${model}`);
    }

    return reply.send(modelStatus(model, backends));
  });

  fastify.get('/cache/stats', async (request: FastifyRequest, reply: FastifyReply) => {
    await authorize(request, 'cache.stats');
    return reply.send(cache.stats());
  });

  fastify.post('/cache/warm', async (request: FastifyRequest, reply: FastifyReply) => {
    await authorize(request, 'cache.warm');
    const { model, texts } = WarmSchema.parse(request.body ?? {});

    return reply.send(await dispatcher.warm(model, texts));
  });

  fastify.post('/cache/invalidate', async (request: FastifyRequest, reply: FastifyReply) => {
    await authorize(request, 'cache.invalidate');
    const { pattern, model } = InvalidateSchema.parse(request.body ?? {});

    if (!pattern && !model) {
      throw fastify.httpErrors.badRequest('pattern or model is required');
    }

    const removed = model ? cache.invalidateModel(model) : cache.invalidate(pattern ?? '');
    return reply.send({ removed });
  });
};

export default restRoutes;
