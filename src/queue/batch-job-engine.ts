/**
 * Batch Job Engine - durable bulk queue drained by a fixed worker pool
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../utils/logger';
import { retry } from '../utils/retry';
import {
  AppError,
  NotFoundError,
  UnavailableError,
  ValidationError,
  isRetryable,
  toAppError,
} from '../errors';
import {
  BatchItem,
  BatchJob,
  BatchJobSnapshot,
  CancelResult,
  ItemFailure,
  JobStatus,
  Operation,
  QueueStats,
  Vector,
  VectorPoint,
  VectorStore,
  isTerminal,
} from '../types';
import { BackendRegistry } from '../registry/backend-registry';
import { LoadBalancer } from '../balancer/load-balancer';
import { EmbeddingPipeline } from '../dispatcher/embedding-pipeline';
import { RedisJobStore } from './job-store';

const logger = Logger.child({ component: 'batch-job-engine' });

export const SNAPSHOT_FAILURE_LIMIT = 100;

const ALLOWED_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  [JobStatus.PENDING]: [JobStatus.RUNNING, JobStatus.CANCELLED],
  [JobStatus.RUNNING]: [JobStatus.COMPLETED, JobStatus.FAILED, JobStatus.CANCELLED],
  [JobStatus.COMPLETED]: [],
  [JobStatus.FAILED]: [],
  [JobStatus.CANCELLED]: [],
};

export interface BatchJobEngineOptions {
  workers: number;
  subBatchSize: number;
  pollIntervalMs: number;
  maxJobRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export const DEFAULT_ENGINE_OPTIONS: BatchJobEngineOptions = {
  workers: 3,
  subBatchSize: 100,
  pollIntervalMs: 500,
  maxJobRetries: 3,
  retryBaseDelayMs: 100,
  retryMaxDelayMs: 2000,
};

export interface SubmitOptions {
  collection?: string;
}

interface SubBatchOutcome {
  processed: number;
  failures: ItemFailure[];
  exhausted: boolean;
  error?: string;
}

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class BatchJobEngine extends EventEmitter {
  private options: BatchJobEngineOptions;
  private loops: Promise<void>[] = [];
  private busy: Set<string> = new Set();
  private waiters: Set<() => void> = new Set();
  private stopping = false;

  constructor(
    private store: RedisJobStore,
    private registry: BackendRegistry,
    private balancer: LoadBalancer,
    private pipeline: EmbeddingPipeline,
    private vectorStore: VectorStore,
    options: Partial<BatchJobEngineOptions> = {}
  ) {
    super();
    this.setMaxListeners(0); // one listener per stream watch
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
  }

  /**
   * Create a pending job. Never touches a backend.
   */
  public async submit(
    model: string,
    operation: Operation,
    items: BatchItem[],
    options: SubmitOptions = {}
  ): Promise<BatchJobSnapshot> {
    if (operation !== Operation.EMBED && operation !== Operation.UPSERT) {
      throw new ValidationError(`Operation ${operation} cannot run as a batch job`, 'operation');
    }
    if (items.length === 0) {
      throw new ValidationError('A batch job needs at least one item', 'items');
    }
    if (!this.registry.hasModel(model)) {
      throw new ValidationError(`Unknown model ${model}`, 'model');
    }

    const job: BatchJob = {
      jobId: uuidv4(),
      model,
      operation,
      collection: options.collection ?? model,
      status: JobStatus.PENDING,
      progress: { processed: 0, failed: 0, total: items.length },
      sequence: await this.store.nextSequence(),
      createdAt: new Date().toISOString(),
    };

    await this.store.create(job, items);
    logger.info({ jobId: job.jobId, model, operation, items: items.length }, 'Job submitted');

    this.emit('job:updated', job);
    this.wake();

    return { ...job, cancelRequested: false, failures: [] };
  }

  public async status(jobId: string): Promise<BatchJobSnapshot> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new NotFoundError(`Job ${jobId}`);
    }

    const [cancelRequested, failures] = await Promise.all([
      this.store.isCancelRequested(jobId),
      this.store.failures(jobId, SNAPSHOT_FAILURE_LIMIT),
    ]);

    // A request that lost the race against completion is not reported
    const pendingCancel = cancelRequested && (!isTerminal(job.status) || job.status === JobStatus.CANCELLED);

    return { ...job, cancelRequested: pendingCancel, failures };
  }

  /**
   * Cancel a pending job now, or flag a running one for its worker
   */
  public async cancel(jobId: string): Promise<CancelResult> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new NotFoundError(`Job ${jobId}`);
    }

    if (isTerminal(job.status)) {
      return { result: 'already_terminal', jobId, status: job.status };
    }

    if (job.status === JobStatus.PENDING && await this.store.removePending(jobId)) {
      this.transition(job, JobStatus.CANCELLED);
      job.completedAt = new Date().toISOString();
      await this.store.requestCancel(jobId);
      await this.store.save(job);
      logger.info({ jobId }, 'Pending job cancelled');
      this.emit('job:updated', job);
      return { result: 'cancelled', jobId, status: JobStatus.CANCELLED };
    }

    // A worker owns it (or is about to); re-read in case it already finished
    await this.store.requestCancel(jobId);
    const current = await this.store.get(jobId);
    if (current && isTerminal(current.status)) {
      if (current.status !== JobStatus.CANCELLED) {
        await this.store.clearCancel(jobId);
      }
      return { result: 'already_terminal', jobId, status: current.status };
    }

    logger.info({ jobId }, 'Cancellation requested');
    return { result: 'cancel_requested', jobId, status: JobStatus.RUNNING };
  }

  public async listQueue(): Promise<QueueStats> {
    const [pending, running] = await Promise.all([this.store.pending(), this.store.runningCount()]);
    const backlog: Record<string, number> = {};

    const jobs = await Promise.all(pending.map(jobId => this.store.get(jobId)));
    for (const job of jobs) {
      if (job) backlog[job.model] = (backlog[job.model] ?? 0) + 1;
    }

    return {
      depth: pending.length,
      running,
      activeWorkers: this.busy.size,
      workers: this.loops.length,
      backlog,
    };
  }

  /**
   * Return jobs left running by a previous process to the pending set
   */
  public async recover(): Promise<number> {
    const orphaned = await this.store.running();
    let recovered = 0;

    for (const jobId of orphaned) {
      if (this.busy.has(jobId)) continue;

      const job = await this.store.get(jobId);
      if (!job || isTerminal(job.status)) {
        await this.store.release(jobId);
        continue;
      }

      job.status = JobStatus.PENDING; // the one sanctioned backward move
      await this.store.save(job);
      await this.store.requeue(job);
      recovered++;
      logger.info({ jobId, progress: job.progress }, 'Recovered interrupted job');
    }

    return recovered;
  }

  public start(): void {
    if (this.loops.length > 0) return;
    this.stopping = false;

    for (let i = 1; i <= this.options.workers; i++) {
      this.loops.push(this.workerLoop(`worker-${i}`));
    }
    logger.info({ workers: this.options.workers }, 'Batch workers started');
  }

  /**
   * Stop pulling work; resolves once every in-flight sub-batch has finished
   */
  public async stop(): Promise<void> {
    this.stopping = true;
    this.wake();
    await Promise.all(this.loops);
    this.loops = [];
    logger.info('Batch workers stopped');
  }

  /**
   * Claim the oldest runnable pending job and run it. False when idle.
   */
  public async processNext(workerId: string): Promise<boolean> {
    const pending = await this.store.pending();

    for (const jobId of pending) {
      const job = await this.store.get(jobId);
      if (!job) {
        await this.store.removePending(jobId);
        continue;
      }

      const pattern = this.registry.patternFor(job.model);
      if (!pattern || !this.balancer.hasHealthyBackend(pattern, job.model)) {
        continue; // stays pending until a backend is back
      }

      if (!(await this.store.claim(jobId))) continue;

      this.busy.add(jobId);
      try {
        await this.run(jobId, workerId);
      } catch (err) {
        await this.abandon(jobId, workerId, err);
      } finally {
        this.busy.delete(jobId);
      }
      return true;
    }

    return false;
  }

  private async workerLoop(workerId: string): Promise<void> {
    while (!this.stopping) {
      let worked = false;
      try {
        worked = await this.processNext(workerId);
      } catch (err) {
        logger.error({ err, workerId }, 'Worker iteration failed');
      }
      if (!worked && !this.stopping) {
        await this.idle();
      }
    }
  }

  private async run(jobId: string, workerId: string): Promise<void> {
    const job = await this.store.get(jobId);
    if (!job) {
      await this.store.release(jobId);
      return;
    }

    this.transition(job, JobStatus.RUNNING);
    job.startedAt = job.startedAt ?? new Date().toISOString();
    await this.save(job);
    logger.info({ jobId, workerId, model: job.model, total: job.progress.total }, 'Job started');

    let cursor = job.progress.processed + job.progress.failed;
    let consecutiveFailures = 0;

    while (cursor < job.progress.total) {
      if (await this.store.isCancelRequested(jobId)) {
        await this.finish(job, JobStatus.CANCELLED);
        return;
      }

      if (this.stopping) {
        job.status = JobStatus.PENDING;
        await this.store.save(job);
        await this.store.requeue(job);
        logger.info({ jobId, cursor }, 'Job returned to queue on shutdown');
        return;
      }

      const items = await this.store.items(jobId, cursor, cursor + this.options.subBatchSize - 1);
      if (items.length === 0) break;

      const outcome = await this.processSubBatch(job, items, cursor);
      await this.store.addFailures(jobId, outcome.failures);

      job.progress.processed += outcome.processed;
      job.progress.failed += outcome.failures.length;
      cursor += items.length;

      if (outcome.exhausted) {
        consecutiveFailures++;
        job.lastError = outcome.error;
        logger.warn({
          jobId,
          workerId,
          cursor,
          consecutiveFailures,
          error: outcome.error
        }, 'Sub-batch failed');
      } else {
        consecutiveFailures = 0;
      }

      await this.save(job);

      if (consecutiveFailures > this.options.maxJobRetries) {
        await this.finish(job, JobStatus.FAILED);
        return;
      }
    }

    await this.finish(job, JobStatus.COMPLETED);
  }

  /**
   * Settle a job whose run threw so it is not left in the running set
   */
  private async abandon(jobId: string, workerId: string, err: unknown): Promise<void> {
    logger.error({ err, jobId, workerId }, 'Job run aborted');

    const job = await this.store.get(jobId);
    if (!job || isTerminal(job.status)) {
      await this.store.release(jobId);
      return;
    }

    if (job.status === JobStatus.PENDING) {
      await this.store.requeue(job);
      return;
    }

    job.lastError = describe(toAppError(err));
    await this.finish(job, JobStatus.FAILED);
  }

  private async processSubBatch(job: BatchJob, items: BatchItem[], offset: number): Promise<SubBatchOutcome> {
    const failures: ItemFailure[] = [];
    const dimension = this.registry.findByModel(job.model)[0]?.dimension;
    const ready: { point: VectorPoint; index: number }[] = [];
    const toEmbed: { item: BatchItem; index: number }[] = [];

    items.forEach((item, i) => {
      const index = offset + i;
      if (item.vector) {
        if (dimension !== undefined && item.vector.length !== dimension) {
          failures.push({
            index,
            id: item.id,
            error: `Vector has ${item.vector.length} dimensions, expected ${dimension}`,
          });
        } else {
          ready.push({ point: { id: item.id, vector: item.vector, payload: item.payload }, index });
        }
      } else if (item.text !== undefined && item.text.trim().length > 0) {
        toEmbed.push({ item, index });
      } else {
        failures.push({ index, id: item.id, error: 'Item has neither text nor vector' });
      }
    });

    if (ready.length === 0 && toEmbed.length === 0) {
      return { processed: 0, failures, exhausted: false };
    }

    try {
      await retry(
        async () => {
          const embedded = toEmbed.length > 0 ? await this.embedItems(job, toEmbed.map(e => e.item)) : [];
          await this.vectorStore.upsert(job.collection, [...ready.map(r => r.point), ...embedded]);
        },
        {
          retries: this.registry.retryBudget(job.model),
          minDelayMs: this.options.retryBaseDelayMs,
          maxDelayMs: this.options.retryMaxDelayMs,
          shouldRetry: isRetryable,
          onRetry: ({ attempt, delayMs, error }) => {
            logger.warn({ jobId: job.jobId, offset, attempt, delayMs, err: error }, 'Retrying sub-batch');
          },
        }
      );
    } catch (error) {
      const message = describe(toAppError(error));
      [...ready.map(({ point, index }) => ({ id: point.id, index })), ...toEmbed.map(({ item, index }) => ({ id: item.id, index }))]
        .forEach(({ id, index }) => failures.push({ index, id, error: message }));
      failures.sort((a, b) => a.index - b.index);
      return { processed: 0, failures, exhausted: true, error: message };
    }

    return { processed: ready.length + toEmbed.length, failures, exhausted: false };
  }

  /**
   * Backend resolved per sub-batch so a failover mid-job is picked up
   */
  private async embedItems(job: BatchJob, items: BatchItem[]): Promise<VectorPoint[]> {
    const pattern = this.registry.patternFor(job.model);
    if (!pattern) {
      throw new UnavailableError(job.model);
    }

    const backend = this.balancer.selectBackend(pattern, job.model);
    const texts = items.map(item => item.text ?? '');
    const vectors: Vector[] = await this.balancer.track(backend, b => this.pipeline.embed(b, texts));

    return items.map((item, i) => ({
      id: item.id,
      vector: vectors[i],
      payload: { ...item.payload, text: item.text },
    }));
  }

  private async finish(job: BatchJob, status: JobStatus): Promise<void> {
    this.transition(job, status);
    job.completedAt = new Date().toISOString();
    await this.save(job);
    await this.store.release(job.jobId);
    if (status !== JobStatus.CANCELLED) {
      await this.store.clearCancel(job.jobId);
    }

    logger.info({
      jobId: job.jobId,
      status,
      processed: job.progress.processed,
      failed: job.progress.failed,
      total: job.progress.total
    }, 'Job finished');
  }

  private async save(job: BatchJob): Promise<void> {
    await this.store.save(job);
    this.emit('job:updated', { ...job, progress: { ...job.progress } });
  }

  private transition(job: BatchJob, to: JobStatus): void {
    if (!ALLOWED_TRANSITIONS[job.status].includes(to)) {
      throw new AppError(
        `Job ${job.jobId} cannot move from ${job.status} to ${to}`,
        500,
        'INVALID_TRANSITION',
        { isOperational: false, details: { jobId: job.jobId, from: job.status, to } }
      );
    }
    job.status = to;
  }

  private idle(): Promise<void> {
    return new Promise(resolve => {
      const done = (): void => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, this.options.pollIntervalMs);
      this.waiters.add(done);
    });
  }

  private wake(): void {
    Array.from(this.waiters).forEach(done => done());
  }
}
