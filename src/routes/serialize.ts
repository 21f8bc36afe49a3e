import { DispatchOutcome, Operation } from '../types';

export interface QueuedResponse {
  requestId: string;
  model: string;
  jobId: string;
  status: 'queued';
}

export type SyncResponse = {
  requestId: string;
  model: string;
  operation: Operation;
  cached: boolean;
  backend?: string;
  embedding?: number[];
} & Record<string, unknown>;

type SyncOutcome = Extract<DispatchOutcome, { kind: 'sync' }>;
type QueuedOutcome = Extract<DispatchOutcome, { kind: 'queued' }>;

export const serializeQueued = (outcome: QueuedOutcome): QueuedResponse => ({
  requestId: outcome.requestId,
  model: outcome.model,
  jobId: outcome.jobId,
  status: 'queued',
});

export function serializeSync(outcome: SyncOutcome): SyncResponse {
  const { result } = outcome;
  return {
    requestId: outcome.requestId,
    model: outcome.model,
    operation: outcome.operation,
    cached: outcome.cached,
    ...(outcome.backend && { backend: outcome.backend }),
    ...result,
    // single-text embeds also get the bare vector
    ...('embeddings' in result && result.embeddings.length === 1 && { embedding: result.embeddings[0] }),
  };
}

/**
 * Wire shape shared by every surface
 */
export const serializeOutcome = (outcome: DispatchOutcome): SyncResponse | QueuedResponse =>
  outcome.kind === 'queued' ? serializeQueued(outcome) : serializeSync(outcome);
