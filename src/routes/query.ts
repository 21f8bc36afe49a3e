import { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { Operation } from '../types';
import { buildRequest } from '../gateway/request-factory';
import { authorizeOrThrow } from '../gateway/authorization';
import { ErrorSummary, summarizeError } from '../middleware/error-handler';
import { serializeOutcome } from './serialize';
import { RouteOptions } from './rest';

export interface QueryEnvelope<T> {
  data: T | null;
  errors: ErrorSummary[];
}

const QueryValue = z.union([z.string(), z.array(z.string())]).optional();

const QueryStringSchema = z.record(QueryValue);

const first = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

const all = (value: string | string[] | undefined): string[] | undefined => {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value : [value];
};

const toNumber = (value: string | undefined): number | undefined =>
  value === undefined || value === '' ? undefined : Number(value);

const toVector = (value: string | undefined): number[] | undefined =>
  value === undefined ? undefined : value.split(',').map(part => Number(part.trim()));

const toFlag = (value: string | undefined): boolean | undefined =>
  value === undefined ? undefined : value === 'true' || value === '1';

/**
 * Query surface: GET with query-string arguments, always answered with a
 * `{ data, errors }` envelope
 */
const queryRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { services }) => {
  const { dispatcher, engine, authorizer } = services;

  const resolve = async <T>(
    request: FastifyRequest,
    action: string,
    run: (args: Record<string, string | string[] | undefined>) => Promise<T>
  ): Promise<QueryEnvelope<T>> => {
    try {
      await authorizeOrThrow(authorizer, {
        surface: 'query',
        action,
        headers: request.headers,
        ip: request.ip,
      });
      const args = QueryStringSchema.parse(request.query ?? {});
      return { data: await run(args), errors: [] };
    } catch (error) {
      const { statusCode, summary } = summarizeError(error);
      if (statusCode >= 500) {
        request.log.error({ err: error, action }, 'Query failed');
      }
      return { data: null, errors: [summary] };
    }
  };

  fastify.get('/search', async (request) =>
    resolve(request, Operation.SEARCH, async (args) => {
      const gatewayRequest = buildRequest(Operation.SEARCH, {
        model: first(args.model),
        text: first(args.text),
        vector: toVector(first(args.vector)),
        limit: toNumber(first(args.limit)),
        collection: first(args.collection),
        urgent: toFlag(first(args.urgent)),
      }, { requestId: request.id });

      return serializeOutcome(await dispatcher.dispatch(gatewayRequest));
    })
  );

  fastify.get('/embed', async (request) =>
    resolve(request, Operation.EMBED, async (args) => {
      const gatewayRequest = buildRequest(Operation.EMBED, {
        model: first(args.model),
        texts: all(args.text),
        collection: first(args.collection),
        urgent: toFlag(first(args.urgent)),
      }, { requestId: request.id });

      return serializeOutcome(await dispatcher.dispatch(gatewayRequest));
    })
  );

  fastify.get('/job', async (request) =>
    resolve(request, 'job.status', async (args) => {
      const jobId = z.string().min(1, 'id is required').parse(first(args.id));
      return engine.status(jobId);
    })
  );
};

export default queryRoutes;
