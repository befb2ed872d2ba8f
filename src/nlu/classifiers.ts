import { PhraseBook } from '../knowledge/catalog';
import { BUSINESS_TYPES, BusinessType, TOPIC_IDS, TopicId } from '../types';
import { containsAnyPhrase, containsPhrase, normalizeText } from '../utils/text';

export type TimeOfDay = 'morning' | 'evening' | undefined;

export interface Classifiers {
  isGreeting(text: string): boolean;
  /** A greeting with nothing else worth answering ("hi", "good morning!"). */
  isPureGreeting(text: string): boolean;
  greetingTimeOfDay(text: string): TimeOfDay;
  isBuyingIntent(text: string): boolean;
  isPositiveEngagement(text: string): boolean;
  isDisengagement(text: string): boolean;
  detectBusinessType(text: string): BusinessType | undefined;
  detectTopics(text: string): TopicId[];
}

const stripPunctuation = (text: string): string =>
  text.replace(/[^\p{L}\p{N}\s'"]/gu, ' ').replace(/\s+/g, ' ').trim();

const removePhrases = (normalized: string, phrases: readonly string[]): string => {
  const ordered = [...phrases].map(normalizeText).sort((a, b) => b.length - a.length);
  let rest = ` ${stripPunctuation(normalized)} `;
  for (const phrase of ordered) {
    rest = rest.split(` ${phrase} `).join(' ');
  }
  return rest.trim();
};

export const createClassifiers = (phrases: PhraseBook): Classifiers => {
  const isGreeting = (text: string): boolean => containsAnyPhrase(normalizeText(text), phrases.greetings);

  const isBuyingIntent = (text: string): boolean => containsAnyPhrase(normalizeText(text), phrases.buyingIntent);

  return {
    isGreeting,
    isPureGreeting: (text) => {
      if (!isGreeting(text)) return false;
      const rest = removePhrases(normalizeText(text), [...phrases.greetings, ...phrases.smallTalk]);
      return rest.length === 0;
    },
    greetingTimeOfDay: (text) => {
      const normalized = normalizeText(text);
      if (/morning|בוקר/.test(normalized)) return 'morning';
      if (/evening|ערב/.test(normalized)) return 'evening';
      return undefined;
    },
    isBuyingIntent,
    isPositiveEngagement: (text) => {
      // purchase intent is its own signal, not engagement
      if (isBuyingIntent(text)) return false;
      return containsAnyPhrase(normalizeText(text), phrases.positiveEngagement);
    },
    isDisengagement: (text) => containsAnyPhrase(normalizeText(text), phrases.disengagement),
    detectBusinessType: (text) => {
      const normalized = normalizeText(text);
      return BUSINESS_TYPES.find((type) =>
        (phrases.businessTypes[type] ?? []).some((phrase) => containsPhrase(normalized, phrase))
      );
    },
    detectTopics: (text) => {
      const normalized = normalizeText(text);
      return TOPIC_IDS.filter((topic) =>
        (phrases.topics[topic] ?? []).some((phrase) => containsPhrase(normalized, phrase))
      );
    },
  };
};
