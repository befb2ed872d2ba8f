import { AppConfig } from '../config';
import { IndexedDocument } from '../knowledge/vectorIndex';
import { IntentDefinition, IntentMatch, IntentVectorMetadata, UNKNOWN_INTENT, VectorIndex } from '../types';
import { moduleLogger } from '../utils/logger';
import { matchLexical } from './lexical';
import { matchSemantic } from './semantic';

const log = moduleLogger('intent');

export interface IntentResolverDeps {
  catalog: readonly IntentDefinition[];
  index: VectorIndex<IntentVectorMetadata>;
  thresholds: AppConfig['intent'];
  timeoutMs: number;
}

/** One document per trigger phrase plus one for the description, all labelled with the intent. */
export const intentDocuments = (catalog: readonly IntentDefinition[]): IndexedDocument<IntentVectorMetadata>[] =>
  catalog.flatMap((entry) => {
    const metadata = { intent: entry.intent, category: entry.category };
    const texts = entry.description ? [...entry.triggers, entry.description] : entry.triggers;
    return texts.map((text, position) => ({ id: `${entry.intent}#${position}`, text, metadata }));
  });

const semanticConfidence = (distance: number): number => Math.min(1, Math.max(0, 1 - distance / 2));

/**
 * Picks one intent for the utterance. Order:
 * specific lexical hit, semantic hit, catch-all lexical hit, relaxed semantic hit.
 */
export const resolveIntent = async (
  utterance: string,
  deps: IntentResolverDeps,
  signal?: AbortSignal
): Promise<IntentMatch> => {
  const { catalog, index, thresholds, timeoutMs } = deps;

  const [lexical, semantic] = await Promise.all([
    Promise.resolve().then(() => matchLexical(utterance, catalog, thresholds.lexicalThreshold)),
    matchSemantic(utterance, index, thresholds.semanticThreshold, { timeoutMs, signal }),
  ]);

  const categoryOf = (intent: string): string | undefined => catalog.find((entry) => entry.intent === intent)?.category;

  let match: IntentMatch;
  if (lexical && categoryOf(lexical.intent) !== thresholds.catchAllCategory) {
    match = { intent: lexical.intent, source: 'lexical', confidence: lexical.score / 100 };
  } else if (semantic) {
    match = { intent: semantic.intent, source: 'semantic', confidence: semanticConfidence(semantic.distance) };
  } else if (lexical) {
    match = { intent: lexical.intent, source: 'lexical', confidence: lexical.score / 100 };
  } else {
    const relaxed = await matchSemantic(utterance, index, thresholds.relaxedThreshold, { timeoutMs, signal });
    match = relaxed
      ? { intent: relaxed.intent, source: 'hybrid', confidence: semanticConfidence(relaxed.distance) }
      : { intent: UNKNOWN_INTENT, source: 'none', confidence: 0 };
  }

  log.info(`intent=${match.intent} source=${match.source} confidence=${match.confidence.toFixed(2)}`);
  return match;
};
