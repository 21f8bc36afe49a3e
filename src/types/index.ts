/**
 * Type definitions for the Model Integration Gateway
 */

export enum IntegrationPattern {
  REAL_TIME = 'real_time',
  HYBRID = 'hybrid',
  BULK_ONLY = 'bulk_only'
}

export enum Operation {
  SEARCH = 'search',
  EMBED = 'embed',
  UPSERT = 'upsert',
  DELETE = 'delete'
}

export enum ProviderKind {
  OPENAI = 'openai',
  OLLAMA = 'ollama'
}

export enum BalancingStrategy {
  WEIGHTED_RANDOM = 'weighted_random',
  LEAST_CONNECTIONS = 'least_connections',
  ROUND_ROBIN = 'round_robin'
}

export enum JobStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled'
}

export interface BackendDescriptor {
  name: string;
  model: string;
  endpoint: string;
  provider: ProviderKind;
  pattern: IntegrationPattern;
  dimension: number;
  weight: number;
  timeoutMs: number;
  maxRetries: number;
  healthy: boolean;
  activeConnections: number;
}

/**
 * What static configuration supplies; runtime state is owned by the registry.
 */
export type BackendConfig = Omit<BackendDescriptor, 'healthy' | 'activeConnections'>;

export type Vector = number[];

export interface BatchItem {
  id: string;
  text?: string;
  vector?: Vector;
  payload?: Record<string, unknown>;
}

export interface SearchPayload {
  vector?: Vector;
  text?: string;
  limit: number;
  collection?: string;
  filter?: Record<string, unknown>;
}

export interface EmbedPayload {
  texts: string[];
  ids?: string[];
  collection?: string;
}

export interface UpsertPayload {
  items: BatchItem[];
  collection?: string;
}

export interface DeletePayload {
  ids: string[];
  collection?: string;
}

export interface OperationPayloads {
  [Operation.SEARCH]: SearchPayload;
  [Operation.EMBED]: EmbedPayload;
  [Operation.UPSERT]: UpsertPayload;
  [Operation.DELETE]: DeletePayload;
}

interface RequestEnvelope<O extends Operation> {
  readonly requestId: string;
  readonly operation: O;
  readonly targetModel: string;
  readonly payload: Readonly<OperationPayloads[O]>;
  readonly urgent: boolean;
  readonly receivedAt: Date;
}

export type GatewayRequest =
  | RequestEnvelope<Operation.SEARCH>
  | RequestEnvelope<Operation.EMBED>
  | RequestEnvelope<Operation.UPSERT>
  | RequestEnvelope<Operation.DELETE>;

export interface SearchHit {
  id: string | number;
  score: number;
  payload?: Record<string, unknown>;
}

export interface EmbedResult {
  embeddings: Vector[];
  dimension: number;
  stored: number;
}

export interface SearchResult {
  results: SearchHit[];
}

export interface UpsertResult {
  upserted: number;
}

export interface DeleteResult {
  deleted: number;
}

export type OperationResult = EmbedResult | SearchResult | UpsertResult | DeleteResult;

export type DispatchOutcome =
  | {
      kind: 'sync';
      requestId: string;
      model: string;
      operation: Operation;
      result: OperationResult;
      cached: boolean;
      backend?: string;
    }
  | {
      kind: 'queued';
      requestId: string;
      model: string;
      operation: Operation;
      jobId: string;
      status: JobStatus;
    };

export interface JobProgress {
  processed: number;
  failed: number;
  total: number;
}

export type BatchOperation = Operation.EMBED | Operation.UPSERT;

export interface BatchJob {
  jobId: string;
  model: string;
  operation: BatchOperation;
  collection: string;
  status: JobStatus;
  progress: JobProgress;
  sequence: number;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  lastError?: string;
}

export interface ItemFailure {
  index: number;
  id: string;
  error: string;
}

export interface BatchJobSnapshot extends BatchJob {
  cancelRequested: boolean;
  failures: ItemFailure[];
}

export type CancelResult =
  | { result: 'cancelled'; jobId: string; status: JobStatus.CANCELLED }
  | { result: 'cancel_requested'; jobId: string; status: JobStatus.RUNNING }
  | { result: 'already_terminal'; jobId: string; status: JobStatus };

export interface QueueStats {
  depth: number;
  running: number;
  activeWorkers: number;
  workers: number;
  backlog: Record<string, number>;
}

export interface CacheStats {
  enabled: boolean;
  entries: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
}

/**
 * Adapter over one kind of embedding provider.
 */
export interface EmbeddingProvider {
  embed(backend: Readonly<BackendDescriptor>, texts: string[]): Promise<Vector[]>;
  health(backend: Readonly<BackendDescriptor>, timeoutMs: number): Promise<boolean>;
}

export interface VectorPoint {
  id: string;
  vector: Vector;
  payload?: Record<string, unknown>;
}

/**
 * The vector database the gateway forwards storage operations to.
 */
export interface VectorStore {
  search(collection: string, vector: Vector, limit: number, filter?: Record<string, unknown>): Promise<SearchHit[]>;
  upsert(collection: string, points: VectorPoint[]): Promise<void>;
  delete(collection: string, ids: string[]): Promise<void>;
  health(): Promise<boolean>;
}

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set([
  JobStatus.COMPLETED,
  JobStatus.FAILED,
  JobStatus.CANCELLED
]);

export const isTerminal = (status: JobStatus): boolean => TERMINAL_STATUSES.has(status);
