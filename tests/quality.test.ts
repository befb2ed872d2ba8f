import { loadPhrases } from '../src/knowledge/catalog';
import { isUsable, QualityRules } from '../src/logic/quality';
import { dataDir } from './helpers/fakes';

const rules: QualityRules = {
  vaguePatterns: loadPhrases(dataDir).vagueReplies,
  minLength: 15,
  shortVagueLength: 30,
};

describe('isUsable', () => {
  it('accepts short factual answers', () => {
    expect(isUsable('Setup takes 3 to 5 days.', rules)).toBe(true);
  });

  it('rejects empty and very short replies', () => {
    expect(isUsable('', rules)).toBe(false);
    expect(isUsable('   ', rules)).toBe(false);
    expect(isUsable('Sure thing!', rules)).toBe(false);
  });

  it('rejects a short reply with one boilerplate pattern', () => {
    expect(isUsable('I have no information about.', rules)).toBe(false);
    expect(isUsable('אין לי מידע על זה', rules)).toBe(false);
  });

  it('matches patterns written with typographic apostrophes', () => {
    expect(isUsable('I don\u2019t know anything about.', rules)).toBe(false);
  });

  it('accepts a longer reply with a single pattern', () => {
    expect(isUsable('I have no information about the Enterprise plan, but Pro costs 199 USD.', rules)).toBe(true);
  });

  it('rejects any reply with two patterns', () => {
    expect(
      isUsable('I have no information about that and I cannot help you with this request right now.', rules)
    ).toBe(false);
  });
});
