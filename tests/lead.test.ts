import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadPhrases } from '../src/knowledge/catalog';
import {
  createLeadExtractor,
  FileLeadSink,
  formatLeadNotification,
  hasAnyLeadField,
  isCompleteLead,
  isValidPhone,
  missingLeadFields,
} from '../src/logic/lead';
import { leadFieldsReply } from '../src/logic/replies';
import { dataDir } from './helpers/fakes';

const phrases = loadPhrases(dataDir);
const extractor = createLeadExtractor({
  labels: phrases.leadLabels,
  fillers: phrases.leadFillers,
  selfIntroductions: phrases.selfIntroductions,
});

describe('lead extraction', () => {
  it('extracts a complete lead from a bare message', () => {
    const lead = extractor.extract('John Doe 0501234567 john@example.com');
    expect(lead).toEqual({ name: 'John Doe', phone: '0501234567', email: 'john@example.com', invalid: [] });
    expect(isCompleteLead(lead)).toBe(true);
  });

  it('is not complete without a name', () => {
    const lead = extractor.extract('0501234567 john@example.com');
    expect(isCompleteLead(lead)).toBe(false);
    expect(missingLeadFields(lead)).toEqual(['name']);
  });

  it('reads a name after a self-introduction and skips labels', () => {
    const lead = extractor.extract('My name is Dana Levi, phone 052-123-4567, email dana@test.co.il');
    expect(lead).toEqual({ name: 'Dana Levi', phone: '0521234567', email: 'dana@test.co.il', invalid: [] });
  });

  it('handles Hebrew introductions', () => {
    expect(extractor.extract('שמי דנה לוי 0501234567')).toEqual({
      name: 'דנה לוי',
      phone: '0501234567',
      invalid: [],
    });
  });

  it('reports invalid fields separately from missing ones', () => {
    const lead = extractor.extract('Dana Levi 05312345678 dana@test');
    expect(lead.invalid).toEqual(['email', 'phone']);
    expect(lead.name).toBe('Dana Levi');
    expect(missingLeadFields(lead)).toEqual([]);
    expect(leadFieldsReply('en', missingLeadFields(lead), lead.invalid)).toBe(
      "The email address and phone number don't look right. Could you send your full name, phone number and email address together in one message?"
    );
  });

  it('flags an introduction without a usable name', () => {
    expect(extractor.extract('my name is 42').invalid).toEqual(['name']);
  });

  it('finds nothing in an ordinary question', () => {
    const lead = extractor.extract('what is the price for a restaurant bot?');
    expect(lead).toEqual({ invalid: [] });
    expect(hasAnyLeadField(lead)).toBe(false);
  });
});

describe('isValidPhone', () => {
  it.each([
    ['0501234567', true],
    ['050-123-4567', true],
    ['031234567', true],
    ['+972501234567', true],
    ['054123456', false],
    ['+12345', false],
    ['1234567890', false],
  ])('%s -> %s', (phone, expected) => {
    expect(isValidPhone(phone)).toBe(expected);
  });
});

describe('FileLeadSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'leads-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('formats the notification record', () => {
    const record = formatLeadNotification(
      { name: 'Dana Levi', phone: '0501234567', email: 'dana@test.com' },
      'Dana Levi 0501234567 dana@test.com',
      new Date('2024-05-01T09:30:00.000Z')
    );
    expect(record).toEqual({
      name: 'Dana Levi',
      phone: '0501234567',
      email: 'dana@test.com',
      message: 'Dana Levi 0501234567 dana@test.com',
      receivedAt: '2024-05-01T09:30:00.000Z',
    });
  });

  it('starts from an empty list when the file is missing', async () => {
    await expect(new FileLeadSink(path.join(dir, 'leads.json')).loadLeads()).resolves.toEqual([]);
  });

  it('appends concurrent leads without losing any', async () => {
    const sink = new FileLeadSink(path.join(dir, 'leads.json'));
    const results = await Promise.all([
      sink.notify({ name: 'Dana Levi', phone: '0501234567', email: 'dana@test.com' }, 'first'),
      sink.notify({ name: 'John Doe', phone: '0521234567', email: 'john@test.com' }, 'second'),
    ]);

    const leads = await sink.loadLeads();
    expect(results).toEqual([true, true]);
    expect(leads.map((lead) => lead.name)).toEqual(['Dana Levi', 'John Doe']);
  });
});
