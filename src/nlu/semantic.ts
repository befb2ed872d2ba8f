import { IntentVectorMetadata, SemanticMatch, VectorIndex } from '../types';
import { getErrorMessage, withTimeout } from '../utils/errors';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('semantic');

export interface SemanticMatchOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Nearest intent by embedding distance. Lower is closer; the hit is accepted
 * only when `distance <= threshold`. Index failures and timeouts yield null.
 */
export const matchSemantic = async (
  utterance: string,
  index: VectorIndex<IntentVectorMetadata>,
  threshold: number,
  options: SemanticMatchOptions
): Promise<SemanticMatch | null> => {
  if (!utterance.trim()) return null;

  try {
    const [nearest] = await withTimeout(
      index.query(utterance, { k: 1, signal: options.signal }),
      options.timeoutMs,
      'intent index query'
    );
    if (!nearest) return null;
    if (nearest.distance > threshold) {
      log.debug(`nearest=${nearest.metadata.intent} distance=${nearest.distance.toFixed(3)} above ${threshold}`);
      return null;
    }
    log.debug(`match intent=${nearest.metadata.intent} distance=${nearest.distance.toFixed(3)}`);
    return { intent: nearest.metadata.intent, distance: nearest.distance };
  } catch (error) {
    if (options.signal?.aborted) throw error;
    log.warn(`semantic match failed: ${getErrorMessage(error)}`);
    return null;
  }
};
