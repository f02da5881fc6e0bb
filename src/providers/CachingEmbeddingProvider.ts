/**
 * Exact-text embedding cache.
 * Wraps another provider; the cache key is the input string as given, with no
 * trimming or case folding. Only successful results are cached. When full,
 * the least recently used entry is evicted.
 */

import type { IEmbeddingProvider } from './IEmbeddingProvider.js';

export class CachingEmbeddingProvider implements IEmbeddingProvider {
  private readonly cache = new Map<string, Promise<number[]>>();
  hits = 0;
  misses = 0;

  constructor(
    private readonly inner: IEmbeddingProvider,
    private readonly maxEntries: number
  ) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError('maxEntries must be a positive integer');
    }
  }

  get dimensions(): number {
    return this.inner.dimensions;
  }

  get model(): string {
    return this.inner.model;
  }

  get size(): number {
    return this.cache.size;
  }

  async generate(text: string): Promise<number[]> {
    const cached = this.cache.get(text);
    if (cached) {
      this.hits++;
      // Refresh recency
      this.cache.delete(text);
      this.cache.set(text, cached);
      return [...(await cached)];
    }

    this.misses++;
    const pending = this.inner.generate(text);
    this.cache.set(text, pending);
    this.evictOverflow();

    try {
      return [...(await pending)];
    } catch (err) {
      if (this.cache.get(text) === pending) this.cache.delete(text);
      throw err;
    }
  }

  private evictOverflow(): void {
    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) return;
      this.cache.delete(oldest.value);
    }
  }
}
