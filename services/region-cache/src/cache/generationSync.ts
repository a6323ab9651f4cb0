import { GenerationConflictError } from '../errors';
import type { Logger } from '../observability/logger';
import type { Generation } from '../types';
import type { CacheNamespace } from './namespace';

export type GenerationOperation<T> = (generation: Generation) => Promise<T>;

/**
 * Runs an item operation against the generation this client believes is
 * current, then re-reads the authoritative generation. When another client
 * moved it in the meantime the operation is repeated under the new value,
 * at most `maxAttempts` times in total.
 */
export class GenerationSynchronizer {
  constructor(
    private readonly namespace: CacheNamespace,
    private readonly maxAttempts: number,
    private readonly log?: Logger,
  ) {}

  async run<T>(operation: GenerationOperation<T>): Promise<T> {
    let generation = this.namespace.localGeneration ?? (await this.namespace.ensureGeneration());

    for (let attempt = 1; ; attempt++) {
      const result = await operation(generation);
      const authoritative = await this.namespace.currentGeneration();
      if (authoritative === generation) return result;

      this.log?.debug(
        { region: this.namespace.region, from: generation, to: authoritative, attempt },
        'Generation moved during operation; retrying',
      );
      if (attempt >= this.maxAttempts) {
        throw new GenerationConflictError(this.namespace.region, attempt);
      }
      generation = authoritative;
    }
  }
}
