import { LRUCache } from 'lru-cache';
import { createMemoCache, MemoCacheOptions } from '../logic/cache';
import { Embedder, Embedding, VectorHit, VectorIndex, VectorQueryOptions } from '../types';
import { RetrievalError, throwIfAborted } from '../utils/errors';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('vector-index');

const EMBED_BATCH_SIZE = 64;

export interface IndexedDocument<M> {
  id: string;
  text: string;
  metadata: M;
}

/** Squared Euclidean distance; 0 for identical vectors, 2 - 2·cos for unit vectors. */
export const squaredDistance = (a: Embedding, b: Embedding): number => {
  if (a.length !== b.length) {
    throw new RetrievalError(`embedding size mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return sum;
};

const matchesFilter = <M extends object>(metadata: M, filter?: Partial<M>): boolean => {
  if (!filter) return true;
  for (const key in filter) {
    const expected = filter[key];
    if (expected !== undefined && metadata[key] !== expected) return false;
  }
  return true;
};

/**
 * Brute-force nearest-neighbour index over a small, immutable document set.
 * Documents are embedded once by `build()`; queries never mutate the index.
 */
export class InMemoryVectorIndex<M extends object> implements VectorIndex<M> {
  private vectors: Embedding[] = [];

  private built = false;

  constructor(
    private readonly name: string,
    private readonly embedder: Embedder,
    private readonly documents: readonly IndexedDocument<M>[]
  ) {}

  get size(): number {
    return this.documents.length;
  }

  async build(): Promise<void> {
    const vectors: Embedding[] = [];
    for (let start = 0; start < this.documents.length; start += EMBED_BATCH_SIZE) {
      const batch = this.documents.slice(start, start + EMBED_BATCH_SIZE).map((doc) => doc.text);
      vectors.push(...(await this.embedder.embed(batch)));
    }
    if (vectors.length !== this.documents.length) {
      throw new RetrievalError(`${this.name}: embedder returned ${vectors.length} vectors for ${this.documents.length} documents`);
    }
    this.vectors = vectors;
    this.built = true;
    log.info(`${this.name}: indexed ${vectors.length} documents`);
  }

  async query(input: string | Embedding, options: VectorQueryOptions<M>): Promise<VectorHit<M>[]> {
    if (!this.built) {
      throw new RetrievalError(`${this.name}: index queried before build()`);
    }
    const vector = typeof input === 'string' ? (await this.embedder.embed([input], options.signal))[0] : input;
    throwIfAborted(options.signal);
    if (!vector) {
      throw new RetrievalError(`${this.name}: embedder returned no vector for the query`);
    }

    const hits: VectorHit<M>[] = [];
    this.documents.forEach((doc, index) => {
      if (!matchesFilter(doc.metadata, options.filter)) return;
      hits.push({ id: doc.id, text: doc.text, metadata: doc.metadata, distance: squaredDistance(vector, this.vectors[index]) });
    });

    // Array.prototype.sort is stable, so equal distances keep catalog order.
    return hits.sort((a, b) => a.distance - b.distance).slice(0, Math.max(0, options.k));
  }
}

/** Memoizes embeddings per exact text, shared by every caller in the process. */
export class CachedEmbedder implements Embedder {
  private readonly cache: LRUCache<string, Embedding>;

  constructor(private readonly inner: Embedder, options: MemoCacheOptions) {
    this.cache = createMemoCache<Embedding>(options);
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<Embedding[]> {
    const misses = [...new Set(texts.filter((text) => !this.cache.has(text)))];
    if (misses.length > 0) {
      const vectors = await this.inner.embed(misses, signal);
      misses.forEach((text, index) => {
        const vector = vectors[index];
        if (vector) this.cache.set(text, vector);
      });
    }
    return texts.map((text) => {
      const vector = this.cache.get(text);
      if (!vector) {
        throw new RetrievalError('embedding missing after fetch');
      }
      return vector;
    });
  }
}
