/**
 * Backend selection strategies
 */

import { BackendDescriptor, BalancingStrategy } from '../types';

export type Candidate = Readonly<BackendDescriptor>;

export interface SelectionContext {
  /** Rotation key for round robin, `<pattern>:<model>` */
  key: string;
  random: () => number;
}

export interface SelectionStrategy {
  readonly name: BalancingStrategy;
  select(candidates: Candidate[], context: SelectionContext): Candidate;
}

/**
 * Draw proportionally to weight. `candidates` must be non-empty.
 */
export const pickWeighted = (candidates: Candidate[], random: () => number): Candidate => {
  const total = candidates.reduce((sum, c) => sum + c.weight, 0);
  let threshold = Math.min(Math.max(random(), 0), 1 - Number.EPSILON) * total;

  for (const candidate of candidates) {
    threshold -= candidate.weight;
    if (threshold < 0) return candidate;
  }
  return candidates[candidates.length - 1];
};

export class WeightedRandomStrategy implements SelectionStrategy {
  public readonly name = BalancingStrategy.WEIGHTED_RANDOM;

  public select(candidates: Candidate[], context: SelectionContext): Candidate {
    return pickWeighted(candidates, context.random);
  }
}

export class LeastConnectionsStrategy implements SelectionStrategy {
  public readonly name = BalancingStrategy.LEAST_CONNECTIONS;

  public select(candidates: Candidate[], context: SelectionContext): Candidate {
    const least = Math.min(...candidates.map(c => c.activeConnections));
    const tied = candidates.filter(c => c.activeConnections === least);
    return tied.length === 1 ? tied[0] : pickWeighted(tied, context.random);
  }
}

export class RoundRobinStrategy implements SelectionStrategy {
  public readonly name = BalancingStrategy.ROUND_ROBIN;
  private indexes: Map<string, number> = new Map();

  public select(candidates: Candidate[], context: SelectionContext): Candidate {
    const index = (this.indexes.get(context.key) ?? 0) % candidates.length;
    this.indexes.set(context.key, (index + 1) % candidates.length);
    return candidates[index];
  }
}

export function createStrategy(name: BalancingStrategy): SelectionStrategy {
  switch (name) {
    case BalancingStrategy.WEIGHTED_RANDOM:
      return new WeightedRandomStrategy();
    case BalancingStrategy.LEAST_CONNECTIONS:
      return new LeastConnectionsStrategy();
    case BalancingStrategy.ROUND_ROBIN:
      return new RoundRobinStrategy();
  }
}
