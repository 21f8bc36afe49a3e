import { BackendError } from '../errors';
import { Vector } from '../types';

/**
 * Post-processing applied to embeddings before they are stored or returned
 */
export interface EmbeddingEnricher {
  readonly name: string;
  enrich(vectors: Vector[]): Promise<Vector[]>;
}

export class L2Normalizer implements EmbeddingEnricher {
  public readonly name = 'l2_normalize';

  public async enrich(vectors: Vector[]): Promise<Vector[]> {
    return vectors.map(vector => {
      const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
      if (!Number.isFinite(norm) || norm === 0) {
        throw new BackendError('Cannot normalize a zero or non-finite vector');
      }
      return vector.map(v => v / norm);
    });
  }
}

export function createEnricher(name: 'none' | 'l2_normalize'): EmbeddingEnricher | undefined {
  return name === 'l2_normalize' ? new L2Normalizer() : undefined;
}
