/**
 * Pattern Dispatcher - decides synchronous vs queued execution per model
 */

import { Logger } from '../utils/logger';
import { retry } from '../utils/retry';
import { textItemId } from '../utils/ids';
import { buildRequest } from '../gateway/request-factory';
import { ValidationError, isRetryable, toAppError } from '../errors';
import {
  BackendDescriptor,
  BatchItem,
  DispatchOutcome,
  GatewayRequest,
  IntegrationPattern,
  Operation,
  OperationResult,
  SearchPayload,
  EmbedPayload,
  UpsertPayload,
  DeletePayload,
  Vector,
  VectorPoint,
  VectorStore,
} from '../types';
import { BackendRegistry } from '../registry/backend-registry';
import { LoadBalancer } from '../balancer/load-balancer';
import { ResponseCache, isCacheable } from '../cache/response-cache';
import { BatchJobEngine } from '../queue/batch-job-engine';
import { EmbeddingPipeline } from './embedding-pipeline';

const logger = Logger.child({ component: 'pattern-dispatcher' });

export interface PatternDispatcherOptions {
  hybridBatchThreshold: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export const DEFAULT_DISPATCHER_OPTIONS: PatternDispatcherOptions = {
  hybridBatchThreshold: 50,
  retryBaseDelayMs: 100,
  retryMaxDelayMs: 2000,
};

export type JobSubmitter = Pick<BatchJobEngine, 'submit'>;

export interface WarmResult {
  model: string;
  warmed: number;
  skipped: number;
  failed: number;
}

type Handler = (request: GatewayRequest) => Promise<DispatchOutcome>;

interface Execution {
  result: OperationResult;
  backend?: string;
}

export class PatternDispatcher {
  private options: PatternDispatcherOptions;
  private handlers: Record<IntegrationPattern, Handler>;

  constructor(
    private registry: BackendRegistry,
    private balancer: LoadBalancer,
    private cache: ResponseCache<OperationResult>,
    private pipeline: EmbeddingPipeline,
    private vectorStore: VectorStore,
    private jobs: JobSubmitter,
    options: Partial<PatternDispatcherOptions> = {}
  ) {
    this.options = { ...DEFAULT_DISPATCHER_OPTIONS, ...options };
    this.handlers = {
      [IntegrationPattern.REAL_TIME]: request => this.realTime(request, IntegrationPattern.REAL_TIME),
      [IntegrationPattern.HYBRID]: request => this.hybrid(request),
      [IntegrationPattern.BULK_ONLY]: request => this.bulkOnly(request),
    };
  }

  public async dispatch(request: GatewayRequest): Promise<DispatchOutcome> {
    const pattern = this.registry.patternFor(request.targetModel);
    if (!pattern) {
      throw new ValidationError(`Unknown model ${request.targetModel}`, 'model');
    }

    // Deletes only touch the vector store
    if (request.operation === Operation.DELETE) {
      return this.sync(request, await this.remove(request.targetModel, request.payload), false);
    }

    return this.handlers[pattern](request);
  }

  /**
   * Embed each text once so later identical requests are served from cache
   */
  public async warm(model: string, texts: string[]): Promise<WarmResult> {
    const pattern = this.registry.patternFor(model);
    if (!pattern) {
      throw new ValidationError(`Unknown model ${model}`, 'model');
    }
    if (pattern === IntegrationPattern.BULK_ONLY) {
      throw new ValidationError(`Model ${model} is bulk-only; its embeddings are never cached`, 'model');
    }

    const result: WarmResult = { model, warmed: 0, skipped: 0, failed: 0 };
    for (const text of texts) {
      try {
        const outcome = await this.realTime(buildRequest(Operation.EMBED, { model, text, urgent: true }), pattern);
        if (outcome.kind === 'sync' && outcome.cached) {
          result.skipped++;
        } else {
          result.warmed++;
        }
      } catch (err) {
        result.failed++;
        logger.warn({ err, model }, 'Cache warm-up failed for a text');
      }
    }

    logger.info(result, 'Cache warmed');
    return result;
  }

  private async hybrid(request: GatewayRequest): Promise<DispatchOutcome> {
    const size = batchSize(request);
    if (request.urgent || size < this.options.hybridBatchThreshold) {
      return this.realTime(request, IntegrationPattern.HYBRID);
    }

    logger.debug({ requestId: request.requestId, size }, 'Hybrid request deferred to batch');
    return this.bulkOnly(request);
  }

  private async bulkOnly(request: GatewayRequest): Promise<DispatchOutcome> {
    switch (request.operation) {
      case Operation.SEARCH:
        if (request.payload.vector) {
          return this.realTime(request, IntegrationPattern.BULK_ONLY);
        }
        throw new ValidationError(
          `Model ${request.targetModel} is bulk-only; text search needs a synchronous embedding`,
          'text'
        );
      case Operation.EMBED:
        return this.enqueue(request, toEmbedItems(request.payload), request.payload.collection);
      case Operation.UPSERT:
        return this.enqueue(request, [...request.payload.items], request.payload.collection);
      case Operation.DELETE:
        return this.sync(request, await this.remove(request.targetModel, request.payload), false);
    }
  }

  private async enqueue(
    request: GatewayRequest,
    items: BatchItem[],
    collection?: string
  ): Promise<DispatchOutcome> {
    const job = await this.jobs.submit(request.targetModel, request.operation, items, { collection });

    logger.info({
      requestId: request.requestId,
      jobId: job.jobId,
      model: request.targetModel,
      items: items.length
    }, 'Request queued');

    return {
      kind: 'queued',
      requestId: request.requestId,
      model: request.targetModel,
      operation: request.operation,
      jobId: job.jobId,
      status: job.status,
    };
  }

  private async realTime(request: GatewayRequest, pattern: IntegrationPattern): Promise<DispatchOutcome> {
    const { targetModel: model, operation, payload } = request;
    const cacheable = isCacheable(operation) && !writesToStore(request);

    if (cacheable) {
      const cached = this.cache.get(model, operation, payload);
      if (cached) {
        logger.debug({ requestId: request.requestId, model, operation }, 'Cache hit');
        return this.sync(request, cached, true);
      }
    }

    const execution = await retry(
      () => this.execute(request, pattern),
      {
        retries: this.registry.retryBudget(model),
        minDelayMs: this.options.retryBaseDelayMs,
        maxDelayMs: this.options.retryMaxDelayMs,
        shouldRetry: isRetryable,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          logger.warn({
            requestId: request.requestId,
            model,
            attempt,
            maxAttempts,
            delayMs,
            err: error
          }, 'Retrying dispatch');
        },
        onGiveUp: ({ attempt, error }) => {
          logger.error({ requestId: request.requestId, model, attempt, err: error }, 'Dispatch failed');
        },
      }
    );

    if (cacheable) {
      this.cache.put(model, operation, payload, execution.result);
    }

    return this.sync(request, execution.result, false, execution.backend);
  }

  private async execute(request: GatewayRequest, pattern: IntegrationPattern): Promise<Execution> {
    switch (request.operation) {
      case Operation.SEARCH:
        return this.search(request.targetModel, pattern, request.payload);
      case Operation.EMBED:
        return this.embed(request.targetModel, pattern, request.payload);
      case Operation.UPSERT:
        return this.upsert(request.targetModel, pattern, request.payload);
      case Operation.DELETE:
        return { result: await this.remove(request.targetModel, request.payload) };
    }
  }

  private async embed(model: string, pattern: IntegrationPattern, payload: Readonly<EmbedPayload>): Promise<Execution> {
    const backend = this.balancer.selectBackend(pattern, model);
    const embeddings = await this.embedWith(backend, payload.texts);

    let stored = 0;
    if (payload.collection) {
      const points = toEmbedItems(payload).map((item, i) => ({
        id: item.id,
        vector: embeddings[i],
        payload: { text: item.text },
      }));
      await this.store(model, payload.collection, points);
      stored = points.length;
    }

    return {
      result: { embeddings, dimension: backend.dimension, stored },
      backend: backend.name,
    };
  }

  private async search(model: string, pattern: IntegrationPattern, payload: Readonly<SearchPayload>): Promise<Execution> {
    let vector: Vector;
    let backendName: string | undefined;

    if (payload.vector) {
      this.checkDimension(model, payload.vector);
      vector = payload.vector;
    } else if (payload.text !== undefined) {
      const backend = this.balancer.selectBackend(pattern, model);
      [vector] = await this.embedWith(backend, [payload.text]);
      backendName = backend.name;
    } else {
      throw new ValidationError('Search needs a vector or a text', 'vector');
    }

    try {
      const results = await this.vectorStore.search(
        payload.collection ?? model,
        vector,
        payload.limit,
        payload.filter
      );
      return { result: { results }, backend: backendName };
    } catch (error) {
      throw toAppError(error, 'vector-store');
    }
  }

  private async upsert(model: string, pattern: IntegrationPattern, payload: Readonly<UpsertPayload>): Promise<Execution> {
    const withVectors = payload.items.filter(item => item.vector !== undefined);
    const withText = payload.items.filter(item => item.vector === undefined);

    withVectors.forEach(item => this.checkDimension(model, item.vector ?? []));

    const points: VectorPoint[] = withVectors.map(item => ({
      id: item.id,
      vector: item.vector ?? [],
      payload: item.payload,
    }));

    let backendName: string | undefined;
    if (withText.length > 0) {
      const backend = this.balancer.selectBackend(pattern, model);
      const vectors = await this.embedWith(backend, withText.map(item => item.text ?? ''));
      withText.forEach((item, i) => points.push({
        id: item.id,
        vector: vectors[i],
        payload: { ...item.payload, text: item.text },
      }));
      backendName = backend.name;
    }

    await this.store(model, payload.collection ?? model, points);
    return { result: { upserted: points.length }, backend: backendName };
  }

  private async remove(model: string, payload: Readonly<DeletePayload>): Promise<OperationResult> {
    try {
      await this.vectorStore.delete(payload.collection ?? model, [...payload.ids]);
    } catch (error) {
      throw toAppError(error, 'vector-store');
    }
    this.cache.invalidate(`${model}:${Operation.SEARCH}:`);
    this.cache.invalidate(`${model}:${Operation.EMBED}:`);
    return { deleted: payload.ids.length };
  }

  private async embedWith(backend: Readonly<BackendDescriptor>, texts: string[]): Promise<Vector[]> {
    return this.balancer.track(backend, b => this.pipeline.embed(b, texts));
  }

  private async store(model: string, collection: string, points: VectorPoint[]): Promise<void> {
    try {
      await this.vectorStore.upsert(collection, points);
    } catch (error) {
      throw toAppError(error, 'vector-store');
    }
    this.cache.invalidate(`${model}:${Operation.SEARCH}:`);
  }

  private checkDimension(model: string, vector: Vector): void {
    const dimension = this.registry.findByModel(model)[0]?.dimension;
    if (dimension !== undefined && vector.length !== dimension) {
      throw new ValidationError(
        `Vector has ${vector.length} dimensions, model ${model} expects ${dimension}`,
        'vector'
      );
    }
  }

  private sync(
    request: GatewayRequest,
    result: OperationResult,
    cached: boolean,
    backend?: string
  ): DispatchOutcome {
    return {
      kind: 'sync',
      requestId: request.requestId,
      model: request.targetModel,
      operation: request.operation,
      result,
      cached,
      ...(backend && { backend }),
    };
  }
}

/**
 * Number of items a request implies, used by the hybrid threshold
 */
export function batchSize(request: GatewayRequest): number {
  switch (request.operation) {
    case Operation.EMBED:
      return request.payload.texts.length;
    case Operation.UPSERT:
      return request.payload.items.length;
    case Operation.DELETE:
      return request.payload.ids.length;
    case Operation.SEARCH:
      return 1;
  }
}

/**
 * Embeds that also store their vectors must reach the vector store every time
 */
function writesToStore(request: GatewayRequest): boolean {
  return request.operation === Operation.EMBED && request.payload.collection !== undefined;
}

function toEmbedItems(payload: Readonly<EmbedPayload>): BatchItem[] {
  return payload.texts.map((text, i) => ({
    id: payload.ids?.[i] ?? textItemId(text),
    text,
  }));
}
