import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { CompleteLead, LeadExtraction, LeadField, NotificationSink } from '../types';
import { moduleLogger } from '../utils/logger';
import { normalizeText } from '../utils/text';

const log = moduleLogger('lead');

export interface LeadVocabulary {
  labels: readonly string[];
  fillers: readonly string[];
  selfIntroductions: readonly string[];
}

const LEAD_FIELDS: LeadField[] = ['name', 'phone', 'email'];
const MAX_NAME_WORDS = 4;
const MIN_PHONE_DIGITS = 7;

const emailCandidate = /[A-Za-z0-9._%+-]+@[^\s@]+/;
const emailFormat = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9-]+(\.[A-Za-z0-9-]+)*\.[A-Za-z]{2,}$/;
const phoneCandidate = /\+?\d[\d\s-]{6,}\d/;
const nameWord = /^\p{L}{2,}$/u;

const trimToken = (token: string): string => token.replace(/^[^\p{L}\p{N}+]+|[^\p{L}\p{N}]+$/gu, '');

/** Israeli local numbers (0 + 8–9 digits, mobile 05x exactly 10 digits) or international +10–15 digits. */
export const isValidPhone = (raw: string): boolean => {
  const compact = raw.replace(/[\s-]/g, '');
  if (/^\+\d{10,15}$/.test(compact)) return true;
  if (!/^0\d{8,9}$/.test(compact)) return false;
  return compact.startsWith('05') ? compact.length === 10 : true;
};

export const isValidEmail = (raw: string): boolean => emailFormat.test(raw);

export const isValidName = (raw: string): boolean => {
  const words = raw.split(/\s+/).filter(Boolean);
  return words.length >= 1 && words.length <= MAX_NAME_WORDS && words.every((word) => nameWord.test(word));
};

const phraseWords = (phrase: string): string[] => normalizeText(phrase).split(' ').filter(Boolean);

const findSequence = (tokens: readonly string[], words: readonly string[]): number => {
  for (let start = 0; start + words.length <= tokens.length; start += 1) {
    if (words.every((word, offset) => tokens[start + offset] === word)) return start;
  }
  return -1;
};

export interface LeadExtractor {
  extract(utterance: string): LeadExtraction;
}

export const createLeadExtractor = (vocabulary: LeadVocabulary): LeadExtractor => {
  const skipWords = new Set([...vocabulary.labels, ...vocabulary.fillers].flatMap(phraseWords));
  const introductions = vocabulary.selfIntroductions
    .map(phraseWords)
    .filter((words) => words.length > 0)
    .sort((a, b) => b.length - a.length);

  const extractName = (text: string, allowResidual: boolean): { name?: string; invalid: boolean } => {
    const tokens = text.split(/\s+/).map(trimToken).filter(Boolean);
    const normalized = tokens.map(normalizeText);

    for (const intro of introductions) {
      const at = findSequence(normalized, intro);
      if (at < 0) continue;
      const words: string[] = [];
      for (let i = at + intro.length; i < tokens.length && words.length < MAX_NAME_WORDS; i += 1) {
        if (skipWords.has(normalized[i]) || !nameWord.test(tokens[i])) break;
        words.push(tokens[i]);
      }
      return words.length ? { name: words.join(' '), invalid: false } : { invalid: true };
    }

    // without an introduction, leftover words only count next to a phone or email
    if (!allowResidual) return { invalid: false };
    const residual = tokens.filter((_token, i) => !skipWords.has(normalized[i]));
    const candidate = residual.join(' ');
    return residual.length && isValidName(candidate) ? { name: candidate, invalid: false } : { invalid: false };
  };

  return {
    extract: (utterance) => {
      const result: LeadExtraction = { invalid: [] };
      let rest = utterance;

      const email = rest.match(emailCandidate)?.[0];
      if (email) {
        const cleaned = trimToken(email);
        if (isValidEmail(cleaned)) result.email = cleaned;
        else result.invalid.push('email');
        rest = rest.replace(email, ' ');
      }

      const phone = rest.match(phoneCandidate)?.[0];
      if (phone && phone.replace(/\D/g, '').length >= MIN_PHONE_DIGITS) {
        if (isValidPhone(phone)) result.phone = phone.replace(/[\s-]/g, '');
        else result.invalid.push('phone');
        rest = rest.replace(phone, ' ');
      }

      const { name, invalid } = extractName(rest, Boolean(result.email || result.phone || result.invalid.length));
      if (name) result.name = name;
      if (invalid) result.invalid.push('name');

      log.debug(
        `extracted ${LEAD_FIELDS.filter((field) => result[field]).join(',') || 'nothing'}` +
          (result.invalid.length ? ` invalid=${result.invalid.join(',')}` : '')
      );
      return result;
    },
  };
};

export const isCompleteLead = (lead: LeadExtraction): lead is LeadExtraction & CompleteLead =>
  Boolean(lead.name && lead.phone && lead.email);

/** Fields neither captured nor rejected as invalid. */
export const missingLeadFields = (lead: LeadExtraction): LeadField[] =>
  LEAD_FIELDS.filter((field) => !lead[field] && !lead.invalid.includes(field));

export const hasAnyLeadField = (lead: LeadExtraction): boolean =>
  LEAD_FIELDS.some((field) => lead[field]) || lead.invalid.length > 0;

const leadNotificationSchema = z.object({
  name: z.string(),
  phone: z.string(),
  email: z.string(),
  message: z.string(),
  receivedAt: z.string(),
});

export type LeadNotification = z.infer<typeof leadNotificationSchema>;

export const formatLeadNotification = (lead: CompleteLead, utterance: string, now = new Date()): LeadNotification => ({
  name: lead.name,
  phone: lead.phone,
  email: lead.email,
  message: utterance,
  receivedAt: now.toISOString(),
});

/** Appends captured leads to a JSON array on disk. Writes are serialized. */
export class FileLeadSink implements NotificationSink {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly dataFile: string) {}

  async loadLeads(): Promise<LeadNotification[]> {
    try {
      const raw = await fs.readFile(this.dataFile, 'utf8');
      const parsed: unknown = JSON.parse(raw);
      return z.array(leadNotificationSchema).parse(parsed);
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  notify(lead: CompleteLead, utterance: string): Promise<boolean> {
    const write = this.queue.then(async () => {
      const leads = await this.loadLeads();
      leads.push(formatLeadNotification(lead, utterance));
      await fs.mkdir(path.dirname(this.dataFile), { recursive: true });
      await fs.writeFile(this.dataFile, JSON.stringify(leads, null, 2), 'utf8');
      log.info(`lead saved (${leads.length} total)`);
      return true;
    });
    this.queue = write.catch(() => undefined);
    return write;
  }
}
