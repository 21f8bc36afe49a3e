/**
 * Backend Registry - configuration and runtime state of every embedding backend
 */

import { EventEmitter } from 'events';
import { Logger } from '../utils/logger';
import { ConfigError } from '../errors';
import { BackendConfig, BackendDescriptor, IntegrationPattern } from '../types';

const logger = Logger.child({ component: 'backend-registry' });

export interface HealthChangedEvent {
  name: string;
  model: string;
  previous: boolean;
  healthy: boolean;
  timestamp: Date;
}

const snapshot = (entry: BackendDescriptor): Readonly<BackendDescriptor> =>
  Object.freeze({ ...entry });

export class BackendRegistry extends EventEmitter {
  private backends: Map<string, BackendDescriptor>;

  constructor(configs: BackendConfig[] = []) {
    super();
    this.backends = new Map();
    configs.forEach(config => this.register(config));
  }

  /**
   * Register a backend or replace the one with the same name
   */
  public register(config: BackendConfig): Readonly<BackendDescriptor> {
    if (!config.name) {
      throw new ConfigError('Backend name is required');
    }
    if (!(config.weight > 0)) {
      throw new ConfigError(`Backend ${config.name} must have a positive weight`, {
        backend: config.name,
        weight: config.weight,
      });
    }
    if (!(config.dimension > 0)) {
      throw new ConfigError(`Backend ${config.name} must have a positive dimension`, {
        backend: config.name,
        dimension: config.dimension,
      });
    }

    const conflicting = this.findByModel(config.model).find(
      other => other.name !== config.name && other.pattern !== config.pattern
    );
    if (conflicting) {
      throw new ConfigError(
        `Model ${config.model} is already served as ${conflicting.pattern} by ${conflicting.name}`,
        { backend: config.name, model: config.model, pattern: config.pattern }
      );
    }

    const previous = this.backends.get(config.name);
    const entry: BackendDescriptor = {
      ...config,
      healthy: true,
      activeConnections: previous?.activeConnections ?? 0,
    };
    this.backends.set(config.name, entry);

    logger.info({
      backend: entry.name,
      model: entry.model,
      pattern: entry.pattern,
      replaced: previous !== undefined
    }, 'Backend registered');
    this.emit('backend:registered', snapshot(entry));

    return snapshot(entry);
  }

  public get(name: string): Readonly<BackendDescriptor> | undefined {
    const entry = this.backends.get(name);
    return entry ? snapshot(entry) : undefined;
  }

  public list(): Readonly<BackendDescriptor>[] {
    return Array.from(this.backends.values()).map(snapshot);
  }

  public listByPattern(pattern: IntegrationPattern): Readonly<BackendDescriptor>[] {
    return this.list().filter(b => b.pattern === pattern);
  }

  public findByModel(model: string): Readonly<BackendDescriptor>[] {
    return this.list().filter(b => b.model === model);
  }

  public hasModel(model: string): boolean {
    return this.findByModel(model).length > 0;
  }

  /**
   * Integration pattern shared by every backend serving `model`
   */
  public patternFor(model: string): IntegrationPattern | undefined {
    return this.findByModel(model)[0]?.pattern;
  }

  /**
   * Retries allowed for a model: the largest budget among its backends
   */
  public retryBudget(model: string): number {
    return this.findByModel(model).reduce((max, b) => Math.max(max, b.maxRetries), 0);
  }

  /**
   * Set health flag. Idempotent; returns false for an unknown backend.
   */
  public setHealth(name: string, healthy: boolean): boolean {
    const entry = this.backends.get(name);
    if (!entry) {
      logger.warn({ backend: name }, 'Health update for unknown backend');
      return false;
    }

    const previous = entry.healthy;
    if (previous === healthy) return true;

    entry.healthy = healthy;
    const event: HealthChangedEvent = {
      name,
      model: entry.model,
      previous,
      healthy,
      timestamp: new Date()
    };

    if (healthy) {
      logger.info({ backend: name, model: entry.model }, 'Backend recovered');
    } else {
      logger.warn({ backend: name, model: entry.model }, 'Backend marked unhealthy');
    }
    this.emit('backend:health-changed', event);

    return true;
  }

  public markDispatchStart(name: string): void {
    const entry = this.backends.get(name);
    if (!entry) {
      logger.warn({ backend: name }, 'Dispatch start for unknown backend');
      return;
    }
    entry.activeConnections++;
  }

  public markDispatchEnd(name: string): void {
    const entry = this.backends.get(name);
    if (!entry) {
      logger.warn({ backend: name }, 'Dispatch end for unknown backend');
      return;
    }
    if (entry.activeConnections === 0) {
      logger.warn({ backend: name }, 'Dispatch end without matching start; counter left at zero');
      return;
    }
    entry.activeConnections--;
  }

  public destroy(): void {
    this.removeAllListeners();
  }
}
