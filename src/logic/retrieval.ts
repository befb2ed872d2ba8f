import { LRUCache } from 'lru-cache';
import { RetrievalConfig } from '../config';
import {
  IntentId,
  KnowledgeSnippet,
  Language,
  RetrievalLayer,
  RetrievalResult,
  SnippetMetadata,
  UNKNOWN_INTENT,
  VectorHit,
  VectorIndex,
} from '../types';
import { getErrorMessage, throwIfAborted, withTimeout } from '../utils/errors';
import { moduleLogger } from '../utils/logger';
import { normalizeText } from '../utils/text';

const log = moduleLogger('retrieval');

export interface RetrievalDeps {
  index: VectorIndex<SnippetMetadata>;
  config: RetrievalConfig;
  cache?: LRUCache<string, RetrievalResult>;
}

export interface RetrieveOptions {
  startLayer?: RetrievalLayer;
  signal?: AbortSignal;
}

const BROADER: Record<RetrievalLayer, RetrievalLayer> = {
  intent_filtered: 'language_filtered',
  language_filtered: 'broad_semantic',
  broad_semantic: 'none',
  // nothing was found: try the broad layer once more
  none: 'broad_semantic',
};

export const nextLayer = (layer: RetrievalLayer): RetrievalLayer => BROADER[layer];

const toSnippet = (hit: VectorHit<SnippetMetadata>): KnowledgeSnippet => ({
  id: hit.id,
  text: hit.text,
  metadata: hit.metadata,
});

/**
 * Runs the cascade from `startLayer` down to the first layer that returns
 * snippets. Layer failures count as empty; an aborted signal still throws.
 */
export const retrieve = async (
  utterance: string,
  intent: IntentId,
  language: Language,
  deps: RetrievalDeps,
  options: RetrieveOptions = {}
): Promise<RetrievalResult> => {
  const { index, config, cache } = deps;
  const { signal } = options;
  let start = options.startLayer ?? 'intent_filtered';
  if (start === 'intent_filtered' && intent === UNKNOWN_INTENT) {
    start = 'language_filtered';
  }
  if (start === 'none') {
    return { layer: 'none', snippets: [] };
  }

  const cacheKey = `${start}|${intent}|${language}|${normalizeText(utterance)}`;
  const cached = cache?.get(cacheKey);
  if (cached) {
    log.debug(`cache hit layer=${cached.layer}`);
    return cached;
  }

  let failed = false;
  const runLayer = async (
    layer: RetrievalLayer,
    query: () => Promise<VectorHit<SnippetMetadata>[]>
  ): Promise<VectorHit<SnippetMetadata>[]> => {
    try {
      return await withTimeout(query(), config.timeoutMs, `retrieval ${layer}`);
    } catch (error) {
      throwIfAborted(signal);
      failed = true;
      log.warn(`layer ${layer} failed: ${getErrorMessage(error)}`);
      return [];
    }
  };

  const layers: Array<[RetrievalLayer, () => Promise<KnowledgeSnippet[]>]> = [
    [
      'intent_filtered',
      async () => {
        const hits = await runLayer('intent_filtered', () =>
          index.query(utterance, { filter: { intent, language }, k: config.intentTopK, signal })
        );
        return hits.map(toSnippet);
      },
    ],
    [
      'language_filtered',
      async () => {
        const hits = await runLayer('language_filtered', () =>
          index.query(utterance, { filter: { language }, k: config.languageTopK, signal })
        );
        return hits.map(toSnippet);
      },
    ],
    [
      'broad_semantic',
      async () => {
        const hits = await runLayer('broad_semantic', () => index.query(utterance, { k: config.broadTopK, signal }));
        return hits
          .filter((hit) => hit.metadata.language === language)
          .slice(0, config.broadKeep)
          .map(toSnippet);
      },
    ],
  ];

  let result: RetrievalResult = { layer: 'none', snippets: [] };
  for (const [layer, run] of layers.slice(layers.findIndex(([name]) => name === start))) {
    throwIfAborted(signal);
    const snippets = await run();
    log.debug(`layer=${layer} snippets=${snippets.length}`);
    if (snippets.length > 0) {
      result = { layer, snippets };
      break;
    }
  }

  log.info(`retrieval intent=${intent} language=${language} layer=${result.layer} snippets=${result.snippets.length}`);
  // a failed layer may succeed next time, so degraded results are not memoized
  if (!failed) {
    cache?.set(cacheKey, result);
  }
  return result;
};
