import { Language } from '../types';

const latinLetter = /[a-zA-Z]/;
const anyLetter = /\p{L}/u;

export const normalizeText = (text: string): string =>
  text.normalize('NFKC').replace(/[\u2018\u2019]/g, "'").toLowerCase().replace(/\s+/g, ' ').trim();

/**
 * English when the text carries a Latin letter, Hebrew for any other letters.
 * Text without letters (a bare phone number) takes `fallback`.
 */
export const detectLanguage = (text: string, fallback: Language = 'he'): Language => {
  if (latinLetter.test(text)) return 'en';
  return anyLetter.test(text) ? 'he' : fallback;
};

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Whole-phrase containment: the phrase must not be glued to letters or digits
 * on either side. Works for any script.
 */
export const containsPhrase = (normalized: string, phrase: string): boolean => {
  const needle = normalizeText(phrase);
  if (!needle) return false;
  const pattern = new RegExp(`(^|[^\\p{L}\\p{N}])${escapeRegExp(needle)}($|[^\\p{L}\\p{N}])`, 'u');
  return pattern.test(normalized);
};

export const containsAnyPhrase = (normalized: string, phrases: readonly string[]): boolean =>
  phrases.some((phrase) => containsPhrase(normalized, phrase));

export const countPhrases = (normalized: string, phrases: readonly string[]): number =>
  phrases.filter((phrase) => normalized.includes(normalizeText(phrase))).length;
