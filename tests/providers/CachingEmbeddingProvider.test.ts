import { describe, it, expect, beforeEach } from 'vitest';
import { CachingEmbeddingProvider } from '../../src/providers/CachingEmbeddingProvider.js';
import { GatewayUnavailableError } from '../../src/errors.js';
import { MockEmbeddingProvider } from '../mocks/MockEmbeddingProvider.js';

describe('CachingEmbeddingProvider', () => {
  let inner: MockEmbeddingProvider;
  let cache: CachingEmbeddingProvider;

  beforeEach(() => {
    inner = new MockEmbeddingProvider(4);
    cache = new CachingEmbeddingProvider(inner, 2);
  });

  it('should expose the inner provider model and dimensions', () => {
    expect(cache.model).toBe('mock-embedding');
    expect(cache.dimensions).toBe(4);
  });

  it('should call the inner provider once per exact text', async () => {
    const first = await cache.generate('slow login');
    const second = await cache.generate('slow login');

    expect(second).toEqual(first);
    expect(inner.callCount).toBe(1);
    expect(cache.hits).toBe(1);
    expect(cache.misses).toBe(1);
  });

  it('should not normalise the key', async () => {
    await cache.generate('slow login');
    await cache.generate('Slow login');
    await cache.generate('slow login ');

    expect(inner.callCount).toBe(3);
  });

  it('should share one in-flight call between concurrent requests', async () => {
    await Promise.all([cache.generate('same'), cache.generate('same')]);
    expect(inner.callCount).toBe(1);
  });

  it('should hand out copies so callers cannot corrupt the cache', async () => {
    const vector = await cache.generate('text');
    vector[0] = 42;

    expect((await cache.generate('text'))[0]).not.toBe(42);
  });

  it('should evict the least recently used entry', async () => {
    await cache.generate('a');
    await cache.generate('b');
    await cache.generate('a'); // a is now most recent
    await cache.generate('c'); // evicts b

    inner.resetCallCount();
    await cache.generate('a');
    await cache.generate('b');

    expect(inner.calls).toEqual(['b']);
    expect(cache.size).toBe(2);
  });

  it('should not cache failures', async () => {
    inner.failNext(new GatewayUnavailableError('Test embeddings', 'down'));

    await expect(cache.generate('x')).rejects.toBeInstanceOf(GatewayUnavailableError);
    await cache.generate('x');

    expect(inner.callCount).toBe(2);
    expect(cache.size).toBe(1);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new CachingEmbeddingProvider(inner, 0)).toThrow(RangeError);
  });
});
