import { RetrievalConfig } from '../src/config';
import { createMemoCache } from '../src/logic/cache';
import { nextLayer, retrieve } from '../src/logic/retrieval';
import { Language, RetrievalResult, SnippetMetadata, VectorHit } from '../src/types';
import { FakeVectorIndex } from './helpers/fakes';

const config: RetrievalConfig = { intentTopK: 3, languageTopK: 5, broadTopK: 10, broadKeep: 3, timeoutMs: 1000 };

const hit = (id: string, intent: string, language: Language): VectorHit<SnippetMetadata> => ({
  id,
  text: `snippet ${id}`,
  metadata: { intent, language, category: 'test' },
  distance: 0.5,
});

interface Layers {
  intent?: VectorHit<SnippetMetadata>[] | Error;
  language?: VectorHit<SnippetMetadata>[] | Error;
  broad?: VectorHit<SnippetMetadata>[] | Error;
}

const layeredIndex = (layers: Layers): FakeVectorIndex<SnippetMetadata> =>
  new FakeVectorIndex<SnippetMetadata>((_input, { filter }) => {
    const answer = filter?.intent ? layers.intent : filter?.language ? layers.language : layers.broad;
    if (answer instanceof Error) throw answer;
    return answer ?? [];
  });

describe('retrieve', () => {
  it('stops at the intent layer when it has snippets', async () => {
    const index = layeredIndex({ intent: [hit('p1', 'pricing', 'en')] });
    const result = await retrieve('how much?', 'pricing', 'en', { index, config });

    expect(result.layer).toBe('intent_filtered');
    expect(result.snippets.map((snippet) => snippet.id)).toEqual(['p1']);
    expect(index.calls.map(({ filter, k }) => ({ filter, k }))).toEqual([
      { filter: { intent: 'pricing', language: 'en' }, k: 3 },
    ]);
  });

  it('falls through to the language layer', async () => {
    const index = layeredIndex({ intent: [], language: [hit('g1', 'faq', 'en')] });
    const result = await retrieve('how much?', 'pricing', 'en', { index, config });

    expect(result.layer).toBe('language_filtered');
    expect(index.calls[1]).toMatchObject({ filter: { language: 'en' }, k: 5 });
  });

  it('skips the intent layer for an unknown intent', async () => {
    const index = layeredIndex({ language: [hit('g1', 'faq', 'he')] });
    const result = await retrieve('מה?', 'unknown', 'he', { index, config });

    expect(result.layer).toBe('language_filtered');
    expect(index.calls).toHaveLength(1);
  });

  it('post-filters the broad layer by language and keeps the first three', async () => {
    const broad = [
      hit('b1', 'a', 'en'),
      hit('b2', 'a', 'he'),
      hit('b3', 'a', 'en'),
      hit('b4', 'a', 'en'),
      hit('b5', 'a', 'en'),
    ];
    const index = layeredIndex({ broad });
    const result = await retrieve('setup', 'setup_process', 'en', { index, config });

    expect(result.layer).toBe('broad_semantic');
    expect(result.snippets.map((snippet) => snippet.id)).toEqual(['b1', 'b3', 'b4']);
    expect(index.calls[2]).toMatchObject({ k: 10 });
    expect(index.calls[2].filter).toBeUndefined();
  });

  it('returns the none layer when every layer is empty', async () => {
    const index = layeredIndex({});
    await expect(retrieve('setup', 'setup_process', 'en', { index, config })).resolves.toEqual({
      layer: 'none',
      snippets: [],
    });
  });

  it('treats a failing layer as empty', async () => {
    const index = layeredIndex({ intent: new Error('boom'), language: [hit('g1', 'faq', 'en')] });
    const result = await retrieve('how much?', 'pricing', 'en', { index, config });
    expect(result.layer).toBe('language_filtered');
  });

  it('can start at a broader layer', async () => {
    const index = layeredIndex({ intent: [hit('p1', 'pricing', 'en')], broad: [hit('b1', 'a', 'en')] });
    const result = await retrieve('how much?', 'pricing', 'en', { index, config }, { startLayer: 'broad_semantic' });

    expect(result.layer).toBe('broad_semantic');
    expect(index.calls).toHaveLength(1);
  });

  it('does not query at all from the none layer', async () => {
    const index = layeredIndex({ intent: [hit('p1', 'pricing', 'en')] });
    const result = await retrieve('how much?', 'pricing', 'en', { index, config }, { startLayer: 'none' });
    expect(result).toEqual({ layer: 'none', snippets: [] });
    expect(index.calls).toHaveLength(0);
  });

  it('is deterministic for fixed inputs', async () => {
    const index = layeredIndex({ intent: [], language: [hit('g1', 'faq', 'en'), hit('g2', 'faq', 'en')] });
    const first = await retrieve('how much?', 'pricing', 'en', { index, config });
    const second = await retrieve('how much?', 'pricing', 'en', { index, config });
    expect(second).toEqual(first);
  });

  it('memoizes successful results', async () => {
    const cache = createMemoCache<RetrievalResult>({ maxEntries: 10, ttlMs: 60_000 });
    const index = layeredIndex({ intent: [hit('p1', 'pricing', 'en')] });

    await retrieve('How much?', 'pricing', 'en', { index, config, cache });
    const cached = await retrieve('how  much?', 'pricing', 'en', { index, config, cache });

    expect(cached.snippets.map((snippet) => snippet.id)).toEqual(['p1']);
    expect(index.calls).toHaveLength(1);
  });

  it('does not memoize results produced after a failure', async () => {
    const cache = createMemoCache<RetrievalResult>({ maxEntries: 10, ttlMs: 60_000 });
    const index = layeredIndex({ intent: new Error('boom'), language: [hit('g1', 'faq', 'en')] });

    await retrieve('how much?', 'pricing', 'en', { index, config, cache });
    await retrieve('how much?', 'pricing', 'en', { index, config, cache });

    expect(index.calls).toHaveLength(4);
  });
});

describe('nextLayer', () => {
  it('moves one layer broader', () => {
    expect(nextLayer('intent_filtered')).toBe('language_filtered');
    expect(nextLayer('language_filtered')).toBe('broad_semantic');
    expect(nextLayer('broad_semantic')).toBe('none');
    expect(nextLayer('none')).toBe('broad_semantic');
  });
});
