/**
 * Embedding provider adapters
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { Logger } from '../utils/logger';
import { BackendError } from '../errors';
import { BackendDescriptor, EmbeddingProvider, ProviderKind, Vector } from '../types';
import { mapHttpError } from './http-errors';

const logger = Logger.child({ component: 'providers' });

export type ProviderMap = Readonly<Record<ProviderKind, EmbeddingProvider>>;

const OpenAIEmbeddingResponse = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int().optional(),
    })
  ),
});

const OllamaEmbeddingResponse = z.object({
  embeddings: z.array(z.array(z.number())),
});

const trimSlash = (endpoint: string): string => endpoint.replace(/\/+$/, '');

const checkCount = (backend: Readonly<BackendDescriptor>, vectors: Vector[], expected: number): Vector[] => {
  if (vectors.length !== expected) {
    throw new BackendError(
      `${backend.name} returned ${vectors.length} embeddings for ${expected} inputs`,
      { backend: backend.name }
    );
  }
  return vectors;
};

const parseBody = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, backend: Readonly<BackendDescriptor>): T => {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new BackendError(`${backend.name} returned a malformed response`, {
      backend: backend.name,
      cause: parsed.error,
    });
  }
  return parsed.data;
};

/**
 * OpenAI-compatible servers: `POST /v1/embeddings`
 */
export class OpenAICompatibleProvider implements EmbeddingProvider {
  constructor(private http: AxiosInstance = axios.create()) {}

  public async embed(backend: Readonly<BackendDescriptor>, texts: string[]): Promise<Vector[]> {
    try {
      const response = await this.http.post(
        `${trimSlash(backend.endpoint)}/v1/embeddings`,
        { input: texts, model: backend.model, encoding_format: 'float' },
        { timeout: backend.timeoutMs }
      );
      const body = parseBody(OpenAIEmbeddingResponse, response.data, backend);
      const ordered = body.data.every(item => item.index !== undefined)
        ? [...body.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
        : body.data;

      return checkCount(backend, ordered.map(item => item.embedding), texts.length);
    } catch (error) {
      throw mapHttpError(error, backend.name, backend.timeoutMs);
    }
  }

  public async health(backend: Readonly<BackendDescriptor>, timeoutMs: number): Promise<boolean> {
    try {
      const response = await this.http.get(`${trimSlash(backend.endpoint)}/health`, { timeout: timeoutMs });
      return response.status >= 200 && response.status < 300;
    } catch (error) {
      logger.debug({ err: error, backend: backend.name }, 'Health endpoint failed');
      return false;
    }
  }
}

/**
 * Ollama servers: `POST /api/embed`
 */
export class OllamaProvider implements EmbeddingProvider {
  constructor(private http: AxiosInstance = axios.create()) {}

  public async embed(backend: Readonly<BackendDescriptor>, texts: string[]): Promise<Vector[]> {
    try {
      const response = await this.http.post(
        `${trimSlash(backend.endpoint)}/api/embed`,
        { model: backend.model, input: texts },
        { timeout: backend.timeoutMs }
      );
      const body = parseBody(OllamaEmbeddingResponse, response.data, backend);
      return checkCount(backend, body.embeddings, texts.length);
    } catch (error) {
      throw mapHttpError(error, backend.name, backend.timeoutMs);
    }
  }

  public async health(backend: Readonly<BackendDescriptor>, timeoutMs: number): Promise<boolean> {
    try {
      const response = await this.http.get(`${trimSlash(backend.endpoint)}/api/version`, { timeout: timeoutMs });
      return response.status >= 200 && response.status < 300;
    } catch (error) {
      logger.debug({ err: error, backend: backend.name }, 'Health endpoint failed');
      return false;
    }
  }
}

export function createProviders(http?: AxiosInstance): ProviderMap {
  return {
    [ProviderKind.OPENAI]: new OpenAICompatibleProvider(http),
    [ProviderKind.OLLAMA]: new OllamaProvider(http),
  };
}
