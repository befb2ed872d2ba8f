import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { BUSINESS_TYPES, BusinessType, IntentDefinition, KnowledgeSnippet, TOPIC_IDS, TopicId } from '../types';

const languageSchema = z.enum(['he', 'en']);

const intentSchema = z.object({
  intent: z.string().min(1),
  category: z.string().min(1),
  description: z.string().optional(),
  triggers: z.array(z.string().min(1)).min(1),
  examples: z.array(z.string().min(1)).optional(),
});

const snippetSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  metadata: z.object({
    intent: z.string().min(1),
    language: languageSchema,
    category: z.string().min(1),
  }),
});

const phraseList = z.array(z.string().min(1));

const phraseSchema = z.object({
  greetings: phraseList,
  smallTalk: phraseList,
  buyingIntent: phraseList,
  positiveEngagement: phraseList,
  disengagement: phraseList,
  vagueReplies: phraseList,
  businessTypes: z.record(z.enum(BUSINESS_TYPES), phraseList),
  topics: z.record(z.enum(TOPIC_IDS), phraseList),
  leadLabels: phraseList,
  leadFillers: phraseList,
  selfIntroductions: phraseList,
});

export type PhraseBook = {
  greetings: string[];
  smallTalk: string[];
  buyingIntent: string[];
  positiveEngagement: string[];
  disengagement: string[];
  vagueReplies: string[];
  businessTypes: Partial<Record<BusinessType, string[]>>;
  topics: Partial<Record<TopicId, string[]>>;
  leadLabels: string[];
  leadFillers: string[];
  selfIntroductions: string[];
};

export interface Catalogs {
  intents: IntentDefinition[];
  knowledge: KnowledgeSnippet[];
  phrases: PhraseBook;
  persona: string;
}

const readJson = (filePath: string): unknown => {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return parsed;
};

export const loadIntents = (dataDir: string): IntentDefinition[] =>
  z.array(intentSchema).parse(readJson(path.join(dataDir, 'intents.json')));

export const loadKnowledge = (dataDir: string): KnowledgeSnippet[] =>
  z.array(snippetSchema).parse(readJson(path.join(dataDir, 'knowledge.json')));

export const loadPhrases = (dataDir: string): PhraseBook =>
  phraseSchema.parse(readJson(path.join(dataDir, 'phrases.json')));

export const loadPersona = (dataDir: string): string =>
  fs.readFileSync(path.join(dataDir, 'persona.txt'), 'utf8').trim();

/** Reads every catalog once; the returned objects are frozen and shared process-wide. */
export const loadCatalogs = (dataDir: string): Catalogs => {
  const catalogs: Catalogs = {
    intents: loadIntents(dataDir),
    knowledge: loadKnowledge(dataDir),
    phrases: loadPhrases(dataDir),
    persona: loadPersona(dataDir),
  };
  catalogs.intents.forEach((intent) => Object.freeze(intent));
  catalogs.knowledge.forEach((snippet) => Object.freeze(snippet));
  return Object.freeze(catalogs);
};
