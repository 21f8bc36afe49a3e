/**
 * Redis persistence for batch jobs
 *
 * Layout (all under the configured prefix):
 *   jobs:seq              submission counter
 *   jobs:pending          sorted set of pending job ids, scored by sequence
 *   jobs:running          set of job ids owned by a worker
 *   jobs:{id}             job record (JSON)
 *   jobs:{id}:items       list of items (JSON each)
 *   jobs:{id}:failures    list of item failures (JSON each)
 *   jobs:{id}:cancel      cancellation flag
 */

import Redis from 'ioredis';
import { z } from 'zod';
import { Logger } from '../utils/logger';
import { AppError } from '../errors';
import { BatchItem, BatchJob, ItemFailure, JobStatus, Operation } from '../types';

const logger = Logger.child({ component: 'job-store' });

const ITEM_CHUNK = 500;

const BatchItemSchema = z.object({
  id: z.string(),
  text: z.string().optional(),
  vector: z.array(z.number()).optional(),
  payload: z.record(z.unknown()).optional(),
});

const BatchJobSchema = z.object({
  jobId: z.string(),
  model: z.string(),
  operation: z.enum([Operation.EMBED, Operation.UPSERT]),
  collection: z.string(),
  status: z.nativeEnum(JobStatus),
  progress: z.object({
    processed: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
    total: z.number().int().nonnegative(),
  }),
  sequence: z.number().int(),
  createdAt: z.string(),
  startedAt: z.string().optional(),
  completedAt: z.string().optional(),
  lastError: z.string().optional(),
});

const ItemFailureSchema = z.object({
  index: z.number().int(),
  id: z.string(),
  error: z.string(),
});

const decode = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string, what: string): T => {
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new AppError(`Corrupt ${what} in job store`, 500, 'STORE_CORRUPT', {
      details: { issues: parsed.error.issues.map(issue => issue.path.join('.')) },
    });
  }
  return parsed.data;
};

export class RedisJobStore {
  constructor(private redis: Redis, private prefix: string = 'gateway:') {}

  public async nextSequence(): Promise<number> {
    return this.redis.incr(this.key('jobs:seq'));
  }

  /**
   * Persist a new pending job together with its items
   */
  public async create(job: BatchJob, items: BatchItem[]): Promise<void> {
    const multi = this.redis.multi();
    multi.set(this.jobKey(job.jobId), JSON.stringify(job));
    for (let start = 0; start < items.length; start += ITEM_CHUNK) {
      const chunk = items.slice(start, start + ITEM_CHUNK).map(item => JSON.stringify(item));
      multi.rpush(this.jobKey(job.jobId, 'items'), ...chunk);
    }
    multi.zadd(this.key('jobs:pending'), job.sequence, job.jobId);
    await multi.exec();

    logger.debug({ jobId: job.jobId, items: items.length }, 'Job persisted');
  }

  public async get(jobId: string): Promise<BatchJob | undefined> {
    const raw = await this.redis.get(this.jobKey(jobId));
    return raw === null ? undefined : decode(BatchJobSchema, raw, 'job record');
  }

  public async save(job: BatchJob): Promise<void> {
    await this.redis.set(this.jobKey(job.jobId), JSON.stringify(job));
  }

  /**
   * Items `start` to `end` inclusive
   */
  public async items(jobId: string, start: number, end: number): Promise<BatchItem[]> {
    const raw = await this.redis.lrange(this.jobKey(jobId, 'items'), start, end);
    return raw.map(entry => decode(BatchItemSchema, entry, 'job item'));
  }

  public async addFailures(jobId: string, failures: ItemFailure[]): Promise<void> {
    if (failures.length === 0) return;
    await this.redis.rpush(this.jobKey(jobId, 'failures'), ...failures.map(f => JSON.stringify(f)));
  }

  public async failures(jobId: string, limit: number): Promise<ItemFailure[]> {
    const raw = await this.redis.lrange(this.jobKey(jobId, 'failures'), 0, limit - 1);
    return raw.map(entry => decode(ItemFailureSchema, entry, 'item failure'));
  }

  public async requestCancel(jobId: string): Promise<void> {
    await this.redis.set(this.jobKey(jobId, 'cancel'), '1');
  }

  public async clearCancel(jobId: string): Promise<void> {
    await this.redis.del(this.jobKey(jobId, 'cancel'));
  }

  public async isCancelRequested(jobId: string): Promise<boolean> {
    return (await this.redis.exists(this.jobKey(jobId, 'cancel'))) === 1;
  }

  /**
   * Pending job ids, oldest first
   */
  public async pending(): Promise<string[]> {
    return this.redis.zrange(this.key('jobs:pending'), 0, -1);
  }

  /**
   * Take a pending job. Only one caller wins.
   */
  public async claim(jobId: string): Promise<boolean> {
    const removed = await this.redis.zrem(this.key('jobs:pending'), jobId);
    if (removed !== 1) return false;
    await this.redis.sadd(this.key('jobs:running'), jobId);
    return true;
  }

  /**
   * Remove a job from the pending set without running it
   */
  public async removePending(jobId: string): Promise<boolean> {
    return (await this.redis.zrem(this.key('jobs:pending'), jobId)) === 1;
  }

  public async release(jobId: string): Promise<void> {
    await this.redis.srem(this.key('jobs:running'), jobId);
  }

  /**
   * Put a job back in the pending set at its original position
   */
  public async requeue(job: BatchJob): Promise<void> {
    await this.redis
      .multi()
      .srem(this.key('jobs:running'), job.jobId)
      .zadd(this.key('jobs:pending'), job.sequence, job.jobId)
      .exec();
  }

  public async running(): Promise<string[]> {
    return this.redis.smembers(this.key('jobs:running'));
  }

  public async runningCount(): Promise<number> {
    return this.redis.scard(this.key('jobs:running'));
  }

  private key(suffix: string): string {
    return `${this.prefix}${suffix}`;
  }

  private jobKey(jobId: string, part?: string): string {
    return part ? this.key(`jobs:${jobId}:${part}`) : this.key(`jobs:${jobId}`);
  }
}
