import { countPhrases, normalizeText } from '../utils/text';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('quality');

export interface QualityRules {
  vaguePatterns: readonly string[];
  minLength: number;
  shortVagueLength: number;
}

/** False for replies too short or too generic to send as a final answer. */
export const isUsable = (reply: string, rules: QualityRules): boolean => {
  const text = reply.trim();
  if (!text) return false;
  if (text.length < rules.minLength) {
    log.debug(`reply too short (${text.length} chars)`);
    return false;
  }

  const hits = countPhrases(normalizeText(text), rules.vaguePatterns);
  if (hits >= 2 || (hits === 1 && text.length < rules.shortVagueLength)) {
    log.debug(`reply looks vague (${hits} patterns, ${text.length} chars)`);
    return false;
  }
  return true;
};
