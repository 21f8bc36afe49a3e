/**
 * Qdrant REST client behind the VectorStore interface
 */

import axios, { AxiosInstance } from 'axios';
import { v5 as uuidv5, validate as isUuid } from 'uuid';
import { z } from 'zod';
import { Logger } from '../utils/logger';
import { BackendError } from '../errors';
import { SearchHit, Vector, VectorPoint, VectorStore } from '../types';
import { mapHttpError } from './http-errors';

const logger = Logger.child({ component: 'vector-store' });

// Namespace for deriving point ids from caller ids that are not UUIDs
export const POINT_ID_NAMESPACE = '6f0b3c7e-2d4a-5b8e-9c1f-3a7d5e2b8c40';

const EXTERNAL_ID_FIELD = 'external_id';

const SearchResponse = z.object({
  result: z.array(
    z.object({
      id: z.union([z.string(), z.number()]),
      score: z.number(),
      payload: z.record(z.unknown()).nullish(),
    })
  ),
});

export interface QdrantOptions {
  url: string;
  apiKey?: string;
  timeoutMs: number;
}

/**
 * Qdrant accepts unsigned integers and UUIDs only; anything else maps to a
 * stable UUID v5.
 */
export const toPointId = (id: string): string => (isUuid(id) ? id : uuidv5(id, POINT_ID_NAMESPACE));

export class QdrantVectorStore implements VectorStore {
  private client: AxiosInstance;
  private timeoutMs: number;

  constructor(options: QdrantOptions) {
    this.timeoutMs = options.timeoutMs;
    this.client = axios.create({
      baseURL: options.url.replace(/\/+$/, ''),
      timeout: options.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        ...(options.apiKey && { 'api-key': options.apiKey }),
      },
    });
  }

  public async search(
    collection: string,
    vector: Vector,
    limit: number,
    filter?: Record<string, unknown>
  ): Promise<SearchHit[]> {
    try {
      const response = await this.client.post(`/collections/${encodeURIComponent(collection)}/points/search`, {
        vector,
        limit,
        with_payload: true,
        ...(filter && { filter }),
      });

      const parsed = SearchResponse.safeParse(response.data);
      if (!parsed.success) {
        throw new BackendError('Vector store returned a malformed search response', {
          backend: 'vector-store',
          cause: parsed.error,
        });
      }

      return parsed.data.result.map(point => {
        const stored: Record<string, unknown> = point.payload ?? {};
        const { [EXTERNAL_ID_FIELD]: externalId, ...payload } = stored;
        return {
          id: typeof externalId === 'string' ? externalId : point.id,
          score: point.score,
          ...(Object.keys(payload).length > 0 && { payload }),
        };
      });
    } catch (error) {
      throw mapHttpError(error, 'vector-store', this.timeoutMs);
    }
  }

  public async upsert(collection: string, points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;

    try {
      await this.client.put(`/collections/${encodeURIComponent(collection)}/points`, {
        points: points.map(point => ({
          id: toPointId(point.id),
          vector: point.vector,
          payload: { ...point.payload, [EXTERNAL_ID_FIELD]: point.id },
        })),
      }, { params: { wait: true } });

      logger.debug({ collection, points: points.length }, 'Points upserted');
    } catch (error) {
      throw mapHttpError(error, 'vector-store', this.timeoutMs);
    }
  }

  public async delete(collection: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;

    try {
      await this.client.post(`/collections/${encodeURIComponent(collection)}/points/delete`, {
        points: ids.map(toPointId),
      }, { params: { wait: true } });

      logger.debug({ collection, points: ids.length }, 'Points deleted');
    } catch (error) {
      throw mapHttpError(error, 'vector-store', this.timeoutMs);
    }
  }

  public async health(): Promise<boolean> {
    try {
      const response = await this.client.get('/healthz');
      return response.status >= 200 && response.status < 300;
    } catch (error) {
      logger.debug({ err: error }, 'Vector store health check failed');
      return false;
    }
  }
}
