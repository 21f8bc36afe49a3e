/**
 * One streaming connection: decodes inbound frames, dispatches them and
 * pushes result, job and progress frames back. Knows nothing about the
 * socket beyond a send callback.
 */

import { z } from 'zod';
import { Logger } from '../utils/logger';
import { ErrorSummary, summarizeError } from '../middleware/error-handler';
import { buildRequest } from '../gateway/request-factory';
import { Authorizer, authorizeOrThrow } from '../gateway/authorization';
import { serializeQueued, serializeSync, QueuedResponse, SyncResponse } from '../routes/serialize';
import { PatternDispatcher } from '../dispatcher/pattern-dispatcher';
import { BatchJobEngine } from '../queue/batch-job-engine';
import {
  BatchJob,
  BatchJobSnapshot,
  CancelResult,
  JobProgress,
  JobStatus,
  Operation,
  isTerminal,
} from '../types';

const logger = Logger.child({ component: 'stream-session' });

const FRAME_TYPES = [
  'embed',
  'search',
  'upsert',
  'delete',
  'job.status',
  'job.cancel',
  'job.watch',
] as const;

export type InboundFrameType = typeof FRAME_TYPES[number];

const FrameSchema = z
  .object({
    id: z.string().min(1),
    type: z.enum(FRAME_TYPES),
  })
  .passthrough();

const JobFrameSchema = z.object({
  jobId: z.string().min(1, 'jobId is required'),
});

const OPERATIONS: Partial<Record<InboundFrameType, Operation>> = {
  embed: Operation.EMBED,
  search: Operation.SEARCH,
  upsert: Operation.UPSERT,
  delete: Operation.DELETE,
};

export interface JobProgressFrameData {
  jobId: string;
  status: JobStatus;
  progress: JobProgress;
  lastError?: string;
}

export type OutboundFrame =
  | { id: string; type: 'result'; data: SyncResponse }
  | { id: string; type: 'queued'; data: QueuedResponse }
  | { id: string; type: 'job'; data: BatchJobSnapshot | CancelResult }
  | { id: string; type: 'progress'; data: JobProgressFrameData }
  | { id: string; type: 'done'; data: JobProgressFrameData }
  | { id: string | null; type: 'error'; error: ErrorSummary };

export interface StreamSessionDependencies {
  dispatcher: Pick<PatternDispatcher, 'dispatch'>;
  engine: Pick<BatchJobEngine, 'status' | 'cancel' | 'on' | 'off'>;
  authorizer: Authorizer;
}

export interface StreamSessionOptions {
  headers?: Record<string, string | string[] | undefined>;
  ip?: string;
}

type JobListener = (job: BatchJob) => void;

const toProgress = (job: BatchJob): JobProgressFrameData => ({
  jobId: job.jobId,
  status: job.status,
  progress: { ...job.progress },
  ...(job.lastError && { lastError: job.lastError }),
});

export class StreamSession {
  private watches: Map<string, JobListener> = new Map();
  private closed = false;

  constructor(
    private deps: StreamSessionDependencies,
    private send: (frame: OutboundFrame) => void,
    private options: StreamSessionOptions = {}
  ) {}

  public get activeWatches(): number {
    return this.watches.size;
  }

  /**
   * Handle one raw inbound message. Never throws; failures become error frames.
   */
  public async handle(raw: string): Promise<void> {
    let frameId: string | null = null;

    try {
      let decoded: unknown;
      try {
        decoded = JSON.parse(raw);
      } catch {
        this.emit({
          id: null,
          type: 'error',
          error: { code: 'INVALID_FRAME', message: 'Frame is not valid JSON', retryable: false },
        });
        return;
      }

      const parsed = FrameSchema.safeParse(decoded);
      if (!parsed.success) {
        const id = z.object({ id: z.string() }).safeParse(decoded);
        this.emit({
          id: id.success ? id.data.id : null,
          type: 'error',
          error: { code: 'INVALID_FRAME', message: 'Frame needs an id and a known type', retryable: false },
        });
        return;
      }

      const { id, type, ...args } = parsed.data;
      frameId = id;

      await authorizeOrThrow(this.deps.authorizer, {
        surface: 'stream',
        action: type,
        headers: this.options.headers ?? {},
        ip: this.options.ip,
      });

      await this.route(id, type, args);
    } catch (error) {
      this.fail(frameId, error);
    }
  }

  /**
   * Detach every job watch. Safe to call more than once.
   */
  public close(): void {
    this.closed = true;
    for (const listener of this.watches.values()) {
      this.deps.engine.off('job:updated', listener);
    }
    this.watches.clear();
  }

  private async route(id: string, type: InboundFrameType, args: Record<string, unknown>): Promise<void> {
    const operation = OPERATIONS[type];
    if (operation) {
      const request = buildRequest(operation, args);
      const outcome = await this.deps.dispatcher.dispatch(request);

      if (outcome.kind === 'queued') {
        this.emit({ id, type: 'queued', data: serializeQueued(outcome) });
      } else {
        this.emit({ id, type: 'result', data: serializeSync(outcome) });
      }
      return;
    }

    const { jobId } = JobFrameSchema.parse(args);

    switch (type) {
      case 'job.status':
        this.emit({ id, type: 'job', data: await this.deps.engine.status(jobId) });
        return;
      case 'job.cancel':
        this.emit({ id, type: 'job', data: await this.deps.engine.cancel(jobId) });
        return;
      default:
        await this.watch(id, jobId);
    }
  }

  private async watch(id: string, jobId: string): Promise<void> {
    this.unwatch(id);

    const listener: JobListener = (job) => {
      if (job.jobId !== jobId) return;
      this.push(id, job);
    };

    // attach before reading so no update between the two is lost
    this.watches.set(id, listener);
    this.deps.engine.on('job:updated', listener);

    try {
      const snapshot = await this.deps.engine.status(jobId);
      if (this.watches.get(id) === listener) {
        this.push(id, snapshot);
      }
    } catch (error) {
      this.unwatch(id);
      throw error;
    }
  }

  private push(id: string, job: BatchJob): void {
    const data = toProgress(job);
    this.emit({ id, type: 'progress', data });

    if (isTerminal(job.status)) {
      this.emit({ id, type: 'done', data });
      this.unwatch(id);
    }
  }

  private unwatch(id: string): void {
    const listener = this.watches.get(id);
    if (!listener) return;
    this.deps.engine.off('job:updated', listener);
    this.watches.delete(id);
  }

  private fail(id: string | null, error: unknown): void {
    const { statusCode, summary } = summarizeError(error);
    if (statusCode >= 500) {
      logger.error({ err: error, frameId: id }, 'Stream frame failed');
    }
    this.emit({ id, type: 'error', error: summary });
  }

  private emit(frame: OutboundFrame): void {
    if (this.closed) return;
    this.send(frame);
  }
}
