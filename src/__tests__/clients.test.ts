/**
 * Provider and Vector Store Adapter Tests
 */

import { v5 as uuidv5 } from 'uuid';
import { OllamaProvider, OpenAICompatibleProvider } from '../clients/providers';
import { POINT_ID_NAMESPACE, QdrantVectorStore, toPointId } from '../clients/qdrant-vector-store';
import { mapHttpError } from '../clients/http-errors';
import { BackendError, TimeoutError, ValidationError } from '../errors';
import { BackendDescriptor, IntegrationPattern, ProviderKind } from '../types';
import { startTestServer, TestServer } from './helpers/http-server';

const descriptor = (endpoint: string, overrides: Partial<BackendDescriptor> = {}): BackendDescriptor => ({
  name: 'test-backend',
  model: 'test-model',
  endpoint,
  provider: ProviderKind.OPENAI,
  pattern: IntegrationPattern.REAL_TIME,
  dimension: 3,
  weight: 1,
  timeoutMs: 1000,
  maxRetries: 0,
  healthy: true,
  activeConnections: 0,
  ...overrides,
});

describe('Adapters', () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await startTestServer();
  });

  afterEach(async () => {
    await server.close();
  });

  describe('OpenAICompatibleProvider', () => {
    const provider = new OpenAICompatibleProvider();

    it('should post the texts and return embeddings in input order', async () => {
      server.respond(() => ({
        status: 200,
        body: {
          data: [
            { index: 1, embedding: [0, 1, 0] },
            { index: 0, embedding: [1, 0, 0] },
          ],
        },
      }));

      const vectors = await provider.embed(descriptor(`${server.url}/`), ['first', 'second']);

      expect(vectors).toEqual([[1, 0, 0], [0, 1, 0]]);
      expect(server.requests).toEqual([expect.objectContaining({
        method: 'POST',
        url: '/v1/embeddings',
        body: { input: ['first', 'second'], model: 'test-model', encoding_format: 'float' },
      })]);
    });

    it('should map an error status to BackendError', async () => {
      server.respond(() => ({ status: 503, body: { error: 'overloaded' } }));

      await expect(provider.embed(descriptor(server.url), ['a'])).rejects.toThrow(
        new BackendError('test-backend responded with status 503')
      );
    });

    it('should reject a malformed body', async () => {
      server.respond(() => ({ status: 200, body: { embeddings: [] } }));

      await expect(provider.embed(descriptor(server.url), ['a'])).rejects.toThrow(
        'test-backend returned a malformed response'
      );
    });

    it('should reject a count mismatch', async () => {
      server.respond(() => ({ status: 200, body: { data: [{ embedding: [1, 0, 0] }] } }));

      await expect(provider.embed(descriptor(server.url), ['a', 'b'])).rejects.toThrow(
        'test-backend returned 1 embeddings for 2 inputs'
      );
    });

    it('should time out slow backends', async () => {
      server.respond(() => ({ status: 200, body: { data: [] }, delayMs: 200 }));

      await expect(provider.embed(descriptor(server.url, { timeoutMs: 20 }), ['a'])).rejects.toBeInstanceOf(
        TimeoutError
      );
    });

    it('should report health from the health endpoint', async () => {
      server.respond(request => ({ status: request.url === '/health' ? 200 : 404 }));

      await expect(provider.health(descriptor(server.url), 500)).resolves.toBe(true);
    });

    it('should report an unreachable backend as unhealthy', async () => {
      await expect(provider.health(descriptor('http://127.0.0.1:1'), 500)).resolves.toBe(false);
    });
  });

  describe('OllamaProvider', () => {
    const provider = new OllamaProvider();

    it('should post to the embed API', async () => {
      server.respond(() => ({ status: 200, body: { embeddings: [[1, 2, 3]] } }));

      const vectors = await provider.embed(descriptor(server.url, { provider: ProviderKind.OLLAMA }), ['hi']);

      expect(vectors).toEqual([[1, 2, 3]]);
      expect(server.requests[0]).toMatchObject({
        url: '/api/embed',
        body: { model: 'test-model', input: ['hi'] },
      });
    });

    it('should probe the version endpoint', async () => {
      server.respond(request => ({ status: request.url === '/api/version' ? 200 : 500 }));

      await expect(provider.health(descriptor(server.url), 500)).resolves.toBe(true);
    });
  });

  describe('QdrantVectorStore', () => {
    let store: QdrantVectorStore;

    beforeEach(() => {
      store = new QdrantVectorStore({ url: server.url, apiKey: 'test-secret', timeoutMs: 1000 });
    });

    it('should keep UUIDs and derive one for other ids', () => {
      const uuid = '3f2b8c1e-9d4a-4e6b-8c2d-1a7f5e3b9c0d';

      expect(toPointId(uuid)).toBe(uuid);
      expect(toPointId('doc-1')).toBe(uuidv5('doc-1', POINT_ID_NAMESPACE));
    });

    it('should upsert points with their caller id in the payload', async () => {
      server.respond(() => ({ status: 200, body: { result: { status: 'completed' } } }));

      await store.upsert('docs', [{ id: 'doc-1', vector: [1, 0], payload: { title: 'one' } }]);

      expect(server.requests[0]).toMatchObject({
        method: 'PUT',
        url: '/collections/docs/points?wait=true',
        headers: expect.objectContaining({ 'api-key': 'test-secret' }),
        body: {
          points: [{
            id: uuidv5('doc-1', POINT_ID_NAMESPACE),
            vector: [1, 0],
            payload: { title: 'one', external_id: 'doc-1' },
          }],
        },
      });
    });

    it('should search and restore caller ids', async () => {
      server.respond(() => ({
        status: 200,
        body: {
          result: [
            { id: uuidv5('doc-1', POINT_ID_NAMESPACE), score: 0.9, payload: { external_id: 'doc-1', title: 'one' } },
            { id: 42, score: 0.5, payload: null },
          ],
        },
      }));

      const hits = await store.search('docs', [1, 0], 2, { must: [] });

      expect(hits).toEqual([
        { id: 'doc-1', score: 0.9, payload: { title: 'one' } },
        { id: 42, score: 0.5 },
      ]);
      expect(server.requests[0].body).toEqual({ vector: [1, 0], limit: 2, with_payload: true, filter: { must: [] } });
    });

    it('should delete by derived point id', async () => {
      server.respond(() => ({ status: 200, body: { result: {} } }));

      await store.delete('docs', ['doc-1']);

      expect(server.requests[0]).toMatchObject({
        method: 'POST',
        url: '/collections/docs/points/delete?wait=true',
        body: { points: [uuidv5('doc-1', POINT_ID_NAMESPACE)] },
      });
    });

    it('should skip empty writes', async () => {
      await store.upsert('docs', []);
      await store.delete('docs', []);

      expect(server.requests).toEqual([]);
    });

    it('should map failures into the error taxonomy', async () => {
      server.respond(() => ({ status: 500, body: { status: { error: 'disk full' } } }));

      await expect(store.search('docs', [1], 1)).rejects.toMatchObject({
        errorCode: 'BACKEND_ERROR',
        status: 500,
        retryable: true,
      });
    });

    it('should report health', async () => {
      server.respond(request => ({ status: request.url === '/healthz' ? 200 : 404 }));

      await expect(store.health()).resolves.toBe(true);
    });
  });

  describe('mapHttpError', () => {
    it('should pass gateway errors through', () => {
      const error = new ValidationError('bad');

      expect(mapHttpError(error, 'phi3', 1000)).toBe(error);
    });

    it('should wrap anything else as BackendError', () => {
      expect(mapHttpError('boom', 'phi3', 1000)).toMatchObject({
        name: 'BackendError',
        message: 'boom',
        backend: 'phi3',
      });
    });

    it('should describe an unreachable target', async () => {
      const failure = await new OpenAICompatibleProvider()
        .embed(descriptor('http://127.0.0.1:1'), ['a'])
        .catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(BackendError);
      expect(failure).toMatchObject({ message: expect.stringMatching(/^test-backend is unreachable: /) });
    });
  });
});
