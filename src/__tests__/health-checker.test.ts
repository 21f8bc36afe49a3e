/**
 * Health Checker Unit Tests
 */

import { BackendRegistry } from '../registry/backend-registry';
import { HealthChecker } from '../registry/health-checker';
import { NotFoundError } from '../errors';
import { EmbeddingProvider } from '../types';
import { backendConfig, fakeProviders, FakeEmbeddingProvider } from './helpers/fakes';

describe('HealthChecker', () => {
  let registry: BackendRegistry;
  let provider: FakeEmbeddingProvider;
  let checker: HealthChecker;

  beforeEach(() => {
    registry = new BackendRegistry([
      backendConfig({ name: 'a', model: 'm' }),
      backendConfig({ name: 'b', model: 'm' }),
    ]);
    provider = new FakeEmbeddingProvider();
    checker = new HealthChecker(registry, fakeProviders(provider), {
      intervalMs: 1000,
      timeoutMs: 50,
      failureThreshold: 2,
    });
  });

  afterEach(async () => {
    await checker.stop();
  });

  it('should mark a backend unhealthy only after consecutive failures reach the threshold', async () => {
    provider.healthy.set('a', false);

    await checker.runOnce();
    expect(registry.get('a')?.healthy).toBe(true);
    expect(checker.consecutiveFailures('a')).toBe(1);

    await checker.runOnce();
    expect(registry.get('a')?.healthy).toBe(false);
    expect(registry.get('b')?.healthy).toBe(true);
  });

  it('should restore health and reset the counter on the first passing probe', async () => {
    provider.healthy.set('a', false);
    await checker.runOnce();
    await checker.runOnce();

    provider.healthy.set('a', true);
    await checker.runOnce();

    expect(registry.get('a')?.healthy).toBe(true);
    expect(checker.consecutiveFailures('a')).toBe(0);
  });

  it('should treat a probe that throws as a failure', async () => {
    const throwing: EmbeddingProvider = {
      embed: async () => [],
      health: async () => {
        throw new Error('connection refused');
      },
    };
    checker = new HealthChecker(registry, fakeProviders(throwing), { timeoutMs: 50, failureThreshold: 1 });

    await checker.runOnce();

    expect(registry.get('a')?.healthy).toBe(false);
  });

  it('should treat a probe slower than the timeout as a failure', async () => {
    const slow: EmbeddingProvider = {
      embed: async () => [],
      health: () => new Promise(resolve => setTimeout(() => resolve(true), 100)),
    };
    checker = new HealthChecker(registry, fakeProviders(slow), { timeoutMs: 10, failureThreshold: 1 });

    await checker.runOnce();

    expect(registry.get('b')?.healthy).toBe(false);
  });

  it('should probe on an interval once started', async () => {
    jest.useFakeTimers();
    try {
      provider.healthy.set('b', false);
      checker.start();

      await jest.advanceTimersByTimeAsync(2000);
      await checker.stop();

      expect(checker.consecutiveFailures('b')).toBe(2);
      expect(registry.get('b')?.healthy).toBe(false);
    } finally {
      await checker.stop();
      jest.useRealTimers();
    }
  });

  describe('checkConnection', () => {
    it('should report a passing backend as connected', async () => {
      const check = await checker.checkConnection('a');

      expect(check).toEqual({ backend: 'a', model: 'm', status: 'connected', latencyMs: expect.any(Number) });
    });

    it('should report a failing probe without touching health', async () => {
      provider.healthy.set('b', false);

      const check = await checker.checkConnection('b');

      expect(check).toMatchObject({ backend: 'b', status: 'failed', error: 'b failed its health check' });
      expect(registry.get('b')?.healthy).toBe(true);
      expect(checker.consecutiveFailures('b')).toBe(0);
    });

    it('should carry the timeout message when the probe is too slow', async () => {
      const slow: EmbeddingProvider = {
        embed: async () => [],
        health: () => new Promise(resolve => setTimeout(() => resolve(true), 100)),
      };
      checker = new HealthChecker(registry, fakeProviders(slow), { timeoutMs: 10 });

      const check = await checker.checkConnection('a');

      expect(check).toMatchObject({ status: 'failed', error: 'Health check of a timed out after 10ms' });
      expect(check.latencyMs).toBeGreaterThanOrEqual(5);
    });

    it('should reject an unknown backend', async () => {
      await expect(checker.checkConnection('nope')).rejects.toThrow(new NotFoundError('Backend nope'));
    });
  });
});
