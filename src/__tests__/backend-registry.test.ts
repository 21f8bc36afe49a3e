/**
 * Backend Registry Unit Tests
 */

import { BackendRegistry, HealthChangedEvent } from '../registry/backend-registry';
import { ConfigError } from '../errors';
import { IntegrationPattern } from '../types';
import { backendConfig } from './helpers/fakes';

describe('BackendRegistry', () => {
  let registry: BackendRegistry;

  beforeEach(() => {
    registry = new BackendRegistry([
      backendConfig({ name: 'phi3-a', model: 'phi3', dimension: 2560 }),
      backendConfig({ name: 'phi3-b', model: 'phi3', dimension: 2560, maxRetries: 4 }),
      backendConfig({ name: 'mixtral', pattern: IntegrationPattern.BULK_ONLY, dimension: 4096 }),
    ]);
  });

  afterEach(() => {
    registry.destroy();
  });

  describe('Registration', () => {
    it('should register backends as healthy with no active connections', () => {
      const backend = registry.get('phi3-a');

      expect(backend?.healthy).toBe(true);
      expect(backend?.activeConnections).toBe(0);
      expect(registry.list()).toHaveLength(3);
    });

    it('should reject a non-positive weight', () => {
      expect(() => registry.register(backendConfig({ name: 'bad', weight: 0 }))).toThrow(ConfigError);
    });

    it('should reject a non-positive dimension', () => {
      expect(() => registry.register(backendConfig({ name: 'bad', dimension: 0 }))).toThrow(ConfigError);
    });

    it('should reject a model served under two patterns', () => {
      expect(() =>
        registry.register(backendConfig({ name: 'phi3-c', model: 'phi3', pattern: IntegrationPattern.HYBRID }))
      ).toThrow('Model phi3 is already served as real_time by phi3-a');
    });

    it('should emit an event on registration', () => {
      const listener = jest.fn();
      registry.on('backend:registered', listener);

      registry.register(backendConfig({ name: 'qwen' }));

      expect(listener).toHaveBeenCalledWith(expect.objectContaining({ name: 'qwen', healthy: true }));
    });
  });

  describe('Lookups', () => {
    it('should list backends by pattern', () => {
      expect(registry.listByPattern(IntegrationPattern.BULK_ONLY).map(b => b.name)).toEqual(['mixtral']);
      expect(registry.listByPattern(IntegrationPattern.HYBRID)).toEqual([]);
    });

    it('should resolve the pattern of a model', () => {
      expect(registry.patternFor('phi3')).toBe(IntegrationPattern.REAL_TIME);
      expect(registry.patternFor('unknown')).toBeUndefined();
    });

    it('should use the largest retry budget among a model\'s backends', () => {
      expect(registry.retryBudget('phi3')).toBe(4);
      expect(registry.retryBudget('unknown')).toBe(0);
    });

    it('should return copies that cannot change the registry', () => {
      const backend = registry.get('phi3-a');

      expect(Object.isFrozen(backend)).toBe(true);
      expect(registry.get('phi3-a')).not.toBe(backend);
    });
  });

  describe('Health', () => {
    it('should emit an event only when health actually changes', () => {
      const events: HealthChangedEvent[] = [];
      registry.on('backend:health-changed', (event: HealthChangedEvent) => events.push(event));

      expect(registry.setHealth('phi3-a', false)).toBe(true);
      expect(registry.setHealth('phi3-a', false)).toBe(true);
      expect(registry.setHealth('phi3-a', true)).toBe(true);

      expect(events.map(e => [e.name, e.previous, e.healthy])).toEqual([
        ['phi3-a', true, false],
        ['phi3-a', false, true],
      ]);
    });

    it('should return false for an unknown backend', () => {
      expect(registry.setHealth('nope', false)).toBe(false);
    });
  });

  describe('Active connections', () => {
    it('should count dispatches in flight', () => {
      registry.markDispatchStart('phi3-a');
      registry.markDispatchStart('phi3-a');
      registry.markDispatchEnd('phi3-a');

      expect(registry.get('phi3-a')?.activeConnections).toBe(1);
    });

    it('should never go below zero', () => {
      registry.markDispatchEnd('phi3-b');

      expect(registry.get('phi3-b')?.activeConnections).toBe(0);
    });

    it('should keep the counter when a backend is re-registered', () => {
      registry.markDispatchStart('phi3-a');
      registry.register(backendConfig({ name: 'phi3-a', model: 'phi3', dimension: 2560, weight: 3 }));

      expect(registry.get('phi3-a')?.activeConnections).toBe(1);
      expect(registry.get('phi3-a')?.weight).toBe(3);
    });
  });
});
