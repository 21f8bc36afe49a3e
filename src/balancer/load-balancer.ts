/**
 * Load Balancer - picks a healthy backend for a (pattern, model) pair
 */

import { Logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { UnavailableError } from '../errors';
import { BackendDescriptor, BalancingStrategy, IntegrationPattern } from '../types';
import { BackendRegistry } from '../registry/backend-registry';
import { createStrategy, SelectionStrategy } from './strategies';

const logger = Logger.child({ component: 'load-balancer' });

export interface LoadBalancerOptions {
  strategy: BalancingStrategy | SelectionStrategy;
  random: () => number;
}

export class LoadBalancer {
  private strategy: SelectionStrategy;
  private random: () => number;

  constructor(private registry: BackendRegistry, options: Partial<LoadBalancerOptions> = {}) {
    const strategy = options.strategy ?? BalancingStrategy.WEIGHTED_RANDOM;
    this.strategy = typeof strategy === 'string' ? createStrategy(strategy) : strategy;
    this.random = options.random ?? Math.random;
  }

  public get strategyName(): BalancingStrategy {
    return this.strategy.name;
  }

  /**
   * Select a backend; throws UnavailableError when none is healthy
   */
  public selectBackend(pattern: IntegrationPattern, model: string): Readonly<BackendDescriptor> {
    const candidates = this.candidates(pattern, model);

    if (candidates.length === 0) {
      logger.debug({ pattern, model }, 'No healthy backend');
      throw new UnavailableError(model, pattern);
    }

    const selected = candidates.length === 1
      ? candidates[0]
      : this.strategy.select(candidates, { key: `${pattern}:${model}`, random: this.random });

    logger.debug({
      pattern,
      model,
      backend: selected.name,
      strategy: this.strategy.name,
      candidates: candidates.length
    }, 'Backend selected');

    return selected;
  }

  public hasHealthyBackend(pattern: IntegrationPattern, model: string): boolean {
    return this.candidates(pattern, model).length > 0;
  }

  /**
   * Run `call` against `backend`, bounded by its timeout and counted in
   * its active connections for the whole duration
   */
  public async track<T>(
    backend: Readonly<BackendDescriptor>,
    call: (backend: Readonly<BackendDescriptor>) => Promise<T>
  ): Promise<T> {
    this.registry.markDispatchStart(backend.name);
    try {
      return await withTimeout(call(backend), backend.timeoutMs, `Call to ${backend.name}`, backend.name);
    } finally {
      this.registry.markDispatchEnd(backend.name);
    }
  }

  private candidates(pattern: IntegrationPattern, model: string): Readonly<BackendDescriptor>[] {
    return this.registry
      .listByPattern(pattern)
      .filter(b => b.model === model && b.healthy);
  }
}
