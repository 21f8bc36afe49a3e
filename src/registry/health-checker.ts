/**
 * Health Checker - background loop probing every registered backend
 */

import { Logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { NotFoundError } from '../errors';
import { BackendDescriptor } from '../types';
import { BackendRegistry } from './backend-registry';
import { ProviderMap } from '../clients/providers';

const logger = Logger.child({ component: 'health-checker' });

export interface HealthCheckerOptions {
  intervalMs: number;
  timeoutMs: number;
  failureThreshold: number;
}

export const DEFAULT_HEALTH_OPTIONS: HealthCheckerOptions = {
  intervalMs: 15000,
  timeoutMs: 2000,
  failureThreshold: 3,
};

export interface ConnectionCheck {
  backend: string;
  model: string;
  status: 'connected' | 'failed';
  latencyMs: number;
  error?: string;
}

export class HealthChecker {
  private failures: Map<string, number> = new Map();
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;
  private options: HealthCheckerOptions;

  constructor(
    private registry: BackendRegistry,
    private providers: ProviderMap,
    options: Partial<HealthCheckerOptions> = {}
  ) {
    this.options = { ...DEFAULT_HEALTH_OPTIONS, ...options };
  }

  public start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      if (this.inFlight) return; // previous round still running
      this.inFlight = this.runOnce()
        .catch(err => {
          logger.error({ err }, 'Health check round failed');
        })
        .finally(() => {
          this.inFlight = undefined;
        });
    }, this.options.intervalMs);
    this.timer.unref();

    logger.info({ intervalMs: this.options.intervalMs }, 'Started health check monitoring');
  }

  public async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.inFlight;
  }

  /**
   * Probe every backend once and apply the results
   */
  public async runOnce(): Promise<void> {
    const backends = this.registry.list();
    await Promise.all(backends.map(backend => this.checkBackend(backend)));
  }

  /**
   * Probe one backend on demand. Leaves health flags and failure counts alone.
   */
  public async checkConnection(name: string): Promise<ConnectionCheck> {
    const backend = this.registry.get(name);
    if (!backend) {
      throw new NotFoundError(`Backend ${name}`);
    }

    const startedAt = Date.now();
    let error: string | undefined;
    try {
      if (!(await this.callHealth(backend))) {
        error = `${name} failed its health check`;
      }
    } catch (err) {
      error = err instanceof Error ? err.message : String(err);
    }
    const latencyMs = Date.now() - startedAt;

    logger.info({ backend: name, latencyMs, error }, 'Connection check');

    return {
      backend: name,
      model: backend.model,
      status: error === undefined ? 'connected' : 'failed',
      latencyMs,
      ...(error === undefined ? {} : { error }),
    };
  }

  public consecutiveFailures(name: string): number {
    return this.failures.get(name) ?? 0;
  }

  private async checkBackend(backend: Readonly<BackendDescriptor>): Promise<void> {
    const passed = await this.probe(backend);

    if (passed) {
      this.failures.set(backend.name, 0);
      this.registry.setHealth(backend.name, true);
      return;
    }

    const failures = this.consecutiveFailures(backend.name) + 1;
    this.failures.set(backend.name, failures);
    logger.debug({ backend: backend.name, failures }, 'Health check failed');

    if (failures >= this.options.failureThreshold) {
      this.registry.setHealth(backend.name, false);
    }
  }

  private callHealth(backend: Readonly<BackendDescriptor>): Promise<boolean> {
    const provider = this.providers[backend.provider];
    return withTimeout(
      provider.health(backend, this.options.timeoutMs),
      this.options.timeoutMs,
      `Health check of ${backend.name}`,
      backend.name
    );
  }

  private async probe(backend: Readonly<BackendDescriptor>): Promise<boolean> {
    try {
      return await this.callHealth(backend);
    } catch (err) {
      logger.debug({ err, backend: backend.name }, 'Health probe error');
      return false;
    }
  }
}
