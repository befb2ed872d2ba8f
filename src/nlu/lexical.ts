import { IntentDefinition, LexicalMatch } from '../types';
import { normalizeText } from '../utils/text';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('lexical');

const longestCommonSubsequence = (a: string[], b: string[]): number => {
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i += 1) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j += 1) {
      current[j] = a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }
  return previous[b.length];
};

/**
 * Indel similarity on a 0–100 scale: 100 * 2·LCS / (|a| + |b|).
 * Operates on code points so astral characters count once.
 */
export const ratio = (a: string, b: string): number => {
  const left = Array.from(a);
  const right = Array.from(b);
  const total = left.length + right.length;
  if (total === 0) return 100;
  return (200 * longestCommonSubsequence(left, right)) / total;
};

/**
 * Best ratio between the shorter string and every window of the same length
 * in the longer one.
 */
export const partialRatio = (a: string, b: string): number => {
  const left = Array.from(a);
  const right = Array.from(b);
  const [short, long] = left.length <= right.length ? [left, right] : [right, left];
  if (!short.length) return 0;
  const shorter = short.join('');
  if (long.join('').includes(shorter)) return 100;

  let best = 0;
  for (let start = 0; start + short.length <= long.length; start += 1) {
    const window = long.slice(start, start + short.length).join('');
    const score = ratio(shorter, window);
    if (score > best) {
      best = score;
      if (best === 100) break;
    }
  }
  return best;
};

export const matchLexical = (
  utterance: string,
  catalog: readonly IntentDefinition[],
  threshold: number
): LexicalMatch | null => {
  const normalized = normalizeText(utterance);
  if (!normalized || catalog.length === 0) return null;

  let best: LexicalMatch | null = null;
  for (const entry of catalog) {
    for (const trigger of entry.triggers) {
      const score = partialRatio(normalized, normalizeText(trigger));
      // strict comparison keeps the first entry on ties
      if (!best || score > best.score) {
        best = { intent: entry.intent, score };
      }
    }
  }

  if (best && best.score >= threshold) {
    log.debug(`match intent=${best.intent} score=${best.score.toFixed(1)}`);
    return best;
  }
  log.debug(`no match above ${threshold} (best=${best?.score.toFixed(1) ?? 'n/a'})`);
  return null;
};
