/**
 * Request Factory and Authorization Unit Tests
 */

import { buildRequest, MAX_SEARCH_LIMIT } from '../gateway/request-factory';
import {
  AllowAllAuthorizer,
  ApiKeyAuthorizer,
  authorizeOrThrow,
  createAuthorizer,
} from '../gateway/authorization';
import { ForbiddenError, ValidationError } from '../errors';
import { Operation } from '../types';
import { textItemId } from '../utils/ids';

describe('buildRequest', () => {
  const now = () => new Date('2024-01-01T00:00:00.000Z');

  describe('Search', () => {
    it('should build a frozen request with defaults', () => {
      const request = buildRequest(Operation.SEARCH, { model: 'phi3', text: 'hello' }, { requestId: 'req-1', now });

      expect(request).toEqual({
        requestId: 'req-1',
        receivedAt: new Date('2024-01-01T00:00:00.000Z'),
        operation: Operation.SEARCH,
        targetModel: 'phi3',
        urgent: false,
        payload: { text: 'hello', limit: 10 },
      });
      expect(Object.isFrozen(request)).toBe(true);
      expect(Object.isFrozen(request.payload)).toBe(true);
    });

    it('should generate a request id when none is given', () => {
      const request = buildRequest(Operation.SEARCH, { model: 'phi3', vector: [1] });

      expect(request.requestId).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should require exactly one of vector or text', () => {
      expect(() => buildRequest(Operation.SEARCH, { model: 'phi3' })).toThrow(
        'vector: exactly one of vector or text is required'
      );
      expect(() => buildRequest(Operation.SEARCH, { model: 'phi3', text: 'a', vector: [1] })).toThrow(ValidationError);
    });

    it('should bound the limit', () => {
      expect(() => buildRequest(Operation.SEARCH, { model: 'phi3', text: 'a', limit: MAX_SEARCH_LIMIT + 1 }))
        .toThrow(ValidationError);
    });

    it('should name the offending field', () => {
      try {
        buildRequest(Operation.SEARCH, { text: 'a' });
        throw new Error('expected a validation error');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({ details: { field: 'model' } });
      }
    });
  });

  describe('Embed', () => {
    it('should accept a single text', () => {
      const request = buildRequest(Operation.EMBED, { model: 'phi3', text: 'hello', urgent: true });

      expect(request.urgent).toBe(true);
      expect(request.payload).toEqual({ texts: ['hello'] });
    });

    it('should merge texts and items and fill in missing ids', () => {
      const request = buildRequest(Operation.EMBED, {
        model: 'phi3',
        texts: ['a'],
        items: ['b', { id: 'c-id', text: 'c' }],
        collection: 'docs',
      });

      expect(request.payload).toEqual({
        texts: ['a', 'b', 'c'],
        ids: [textItemId('a'), textItemId('b'), 'c-id'],
        collection: 'docs',
      });
    });

    it('should reject blank texts', () => {
      expect(() => buildRequest(Operation.EMBED, { model: 'phi3', text: '   ' })).toThrow('text: text must not be empty');
    });

    it('should require some text', () => {
      expect(() => buildRequest(Operation.EMBED, { model: 'phi3' })).toThrow('text: text, texts or items is required');
    });

    it('should require ids to match the texts', () => {
      expect(() => buildRequest(Operation.EMBED, { model: 'phi3', texts: ['a', 'b'], ids: ['1'] })).toThrow(
        'ids: ids must match the number of texts'
      );
    });
  });

  describe('Upsert and delete', () => {
    it('should coerce numeric ids to strings', () => {
      const upsert = buildRequest(Operation.UPSERT, { model: 'm', items: [{ id: 7, text: 'seven' }] });
      const remove = buildRequest(Operation.DELETE, { model: 'm', ids: [7, 'eight'] });

      expect(upsert.payload).toEqual({ items: [{ id: '7', text: 'seven' }] });
      expect(remove.payload).toEqual({ ids: ['7', 'eight'] });
      expect(remove.urgent).toBe(false);
    });

    it('should require a text or a vector on every upsert item', () => {
      expect(() => buildRequest(Operation.UPSERT, { model: 'm', items: [{ id: 'x' }] })).toThrow(
        'items.0: each item needs a text or a vector'
      );
    });

    it('should reject an empty delete', () => {
      expect(() => buildRequest(Operation.DELETE, { model: 'm', ids: [] })).toThrow('ids: ids must not be empty');
    });
  });
});

describe('Authorization', () => {
  it('should allow everything when no keys are configured', async () => {
    const authorizer = createAuthorizer([]);

    expect(authorizer).toBeInstanceOf(AllowAllAuthorizer);
    await expect(authorizeOrThrow(authorizer, { surface: 'rest', action: 'embed', headers: {} })).resolves.toBeUndefined();
  });

  describe('ApiKeyAuthorizer', () => {
    const authorizer = new ApiKeyAuthorizer(['test-secret']);

    it('should accept the x-api-key header', () => {
      expect(authorizer.authorize({ surface: 'rest', action: 'embed', headers: { 'x-api-key': 'test-secret' } }))
        .toEqual({ allowed: true });
    });

    it('should accept a bearer token', () => {
      expect(authorizer.authorize({
        surface: 'query',
        action: 'search',
        headers: { authorization: 'Bearer test-secret' },
      })).toEqual({ allowed: true });
    });

    it('should deny a missing or wrong key', () => {
      expect(authorizer.authorize({ surface: 'stream', action: 'embed', headers: {} }))
        .toEqual({ allowed: false, reason: 'API key required' });
      expect(authorizer.authorize({ surface: 'stream', action: 'embed', headers: { 'x-api-key': 'wrong' } }))
        .toEqual({ allowed: false, reason: 'Invalid API key' });
    });

    it('should turn a denial into ForbiddenError', async () => {
      await expect(authorizeOrThrow(authorizer, { surface: 'rest', action: 'embed', headers: {} }))
        .rejects.toThrow(new ForbiddenError('API key required'));
    });
  });
});
