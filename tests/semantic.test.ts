import { CachedEmbedder, InMemoryVectorIndex, squaredDistance } from '../src/knowledge/vectorIndex';
import { matchSemantic } from '../src/nlu/semantic';
import { IntentVectorMetadata } from '../src/types';
import { RetrievalError } from '../src/utils/errors';
import { FakeVectorIndex, KeywordEmbedder } from './helpers/fakes';

const documents = [
  { id: 'a', text: 'price list', metadata: { intent: 'pricing', category: 'pricing' } },
  { id: 'b', text: 'setup time', metadata: { intent: 'setup_process', category: 'onboarding' } },
  { id: 'c', text: 'whatsapp and setup', metadata: { intent: 'integrations', category: 'product' } },
];

const buildIndex = async (): Promise<InMemoryVectorIndex<IntentVectorMetadata>> => {
  const index = new InMemoryVectorIndex('test', new KeywordEmbedder(['price', 'setup', 'whatsapp']), documents);
  await index.build();
  return index;
};

describe('InMemoryVectorIndex', () => {
  it('ranks documents by squared distance', async () => {
    const index = await buildIndex();
    const hits = await index.query('what is the price', { k: 2 });
    expect(hits.map((hit) => hit.id)).toEqual(['a', 'b']);
    expect(hits.map((hit) => hit.distance)).toEqual([0, 2]);
  });

  it('applies metadata filters before ranking', async () => {
    const index = await buildIndex();
    const hits = await index.query('what is the price', { k: 5, filter: { category: 'onboarding' } });
    expect(hits.map((hit) => hit.id)).toEqual(['b']);
  });

  it('accepts a precomputed vector', async () => {
    const index = await buildIndex();
    const hits = await index.query([0, 1, 1, 1], { k: 1 });
    expect(hits[0].id).toBe('c');
  });

  it('refuses queries before build', async () => {
    const index = new InMemoryVectorIndex('test', new KeywordEmbedder(['price']), documents);
    await expect(index.query('price', { k: 1 })).rejects.toBeInstanceOf(RetrievalError);
  });

  it('rejects vectors of different sizes', () => {
    expect(() => squaredDistance([1, 0], [1, 0, 0])).toThrow(RetrievalError);
  });
});

describe('CachedEmbedder', () => {
  it('only embeds texts it has not seen', async () => {
    const inner = new KeywordEmbedder(['price']);
    const cached = new CachedEmbedder(inner, { maxEntries: 10, ttlMs: 60_000 });

    await cached.embed(['a', 'b']);
    const vectors = await cached.embed(['b', 'price c']);

    expect(inner.calls).toEqual([['a', 'b'], ['price c']]);
    expect(vectors).toEqual([
      [0, 1],
      [1, 1],
    ]);
  });
});

describe('matchSemantic', () => {
  it('accepts the nearest intent within the threshold', async () => {
    const index = await buildIndex();
    await expect(matchSemantic('how long is setup', index, 1.4, { timeoutMs: 1000 })).resolves.toEqual({
      intent: 'setup_process',
      distance: 0,
    });
  });

  it('rejects a nearest hit beyond the threshold', async () => {
    const index = await buildIndex();
    // no keywords: distance 1 to both single-keyword documents, 'a' comes first
    await expect(matchSemantic('hello', index, 0.5, { timeoutMs: 1000 })).resolves.toBeNull();
    await expect(matchSemantic('hello', index, 1.4, { timeoutMs: 1000 })).resolves.toEqual({
      intent: 'pricing',
      distance: 1,
    });
  });

  it('returns null when the index fails', async () => {
    const index = new FakeVectorIndex<IntentVectorMetadata>(() => {
      throw new RetrievalError('index down');
    });
    await expect(matchSemantic('price', index, 1.4, { timeoutMs: 1000 })).resolves.toBeNull();
  });

  it('returns null when the index times out', async () => {
    const index = new FakeVectorIndex<IntentVectorMetadata>(() => new Promise<never>(() => undefined));
    await expect(matchSemantic('price', index, 1.4, { timeoutMs: 10 })).resolves.toBeNull();
  });

  it('propagates cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    const index = new FakeVectorIndex<IntentVectorMetadata>(() => []);
    await expect(matchSemantic('price', index, 1.4, { timeoutMs: 1000, signal: controller.signal })).rejects.toThrow(
      'request aborted'
    );
  });
});
