import { Logger } from '../utils/logger';
import { BackendError, toAppError } from '../errors';
import { BackendDescriptor, Vector } from '../types';
import { ProviderMap } from '../clients/providers';
import { EmbeddingEnricher } from './enrichment';

const logger = Logger.child({ component: 'embedding-pipeline' });

/**
 * Provider call, dimension check and optional enrichment.
 * Enrichment failures fall back to the provider's vectors.
 */
export class EmbeddingPipeline {
  constructor(
    private providers: ProviderMap,
    private enricher?: EmbeddingEnricher
  ) {}

  public async embed(backend: Readonly<BackendDescriptor>, texts: string[]): Promise<Vector[]> {
    let vectors: Vector[];
    try {
      vectors = await this.providers[backend.provider].embed(backend, texts);
    } catch (error) {
      throw toAppError(error, backend.name);
    }

    const mismatch = vectors.find(vector => vector.length !== backend.dimension);
    if (mismatch) {
      throw new BackendError(
        `${backend.name} returned a ${mismatch.length}-dimensional vector, expected ${backend.dimension}`,
        { backend: backend.name }
      );
    }

    return this.enrich(backend, vectors);
  }

  private async enrich(backend: Readonly<BackendDescriptor>, vectors: Vector[]): Promise<Vector[]> {
    if (!this.enricher) return vectors;

    try {
      return await this.enricher.enrich(vectors);
    } catch (err) {
      logger.warn({ err, backend: backend.name, enricher: this.enricher.name }, 'Enrichment failed, using provider vectors');
      return vectors;
    }
  }
}
