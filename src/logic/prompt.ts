import { BusinessType, ChatMessage, KnowledgeSnippet, Language, PromptMessage, PromptPayload, PromptSection } from '../types';
import { PromptBudgetError } from '../utils/errors';
import { moduleLogger } from '../utils/logger';
import { countMessageTokens } from './tokens';

const log = moduleLogger('prompt');

const WARN_RATIO = 0.7;
const CRITICAL_RATIO = 0.9;

export interface PersonaContext {
  language: Language;
  businessType?: BusinessType;
  /** First bot reply of the conversation. */
  firstTurn: boolean;
  /** Every detected topic was already answered. */
  recap: boolean;
}

export const buildPersonaSection = (persona: string, context: PersonaContext): string => {
  const lines = [persona];
  lines.push(context.language === 'he' ? 'Reply in Hebrew.' : 'Reply in English.');
  if (context.businessType) {
    lines.push(
      `The user runs a ${context.businessType.replace('_', ' ')} business. Tailor examples and suggestions to that kind of business.`
    );
  }
  if (context.firstTurn) {
    lines.push('This is your first reply in the conversation: open with a short, warm greeting, then answer the question.');
  }
  if (context.recap) {
    lines.push(
      'You already explained this topic earlier in the conversation. Give a brief recap in two sentences at most and do not repeat details.'
    );
  }
  return lines.join('\n');
};

export interface PromptInput {
  persona: string;
  utterance: string;
  history: readonly ChatMessage[];
  snippets: readonly KnowledgeSnippet[];
  examples: readonly string[];
  tokenLimit: number;
  historyTurns: number;
}

type OptionalSection = Exclude<PromptSection, 'persona' | 'utterance'>;

const OPTIONAL_ORDER: OptionalSection[] = ['history', 'snippets', 'examples'];

const recentHistory = (input: PromptInput): ChatMessage[] =>
  input.historyTurns > 0 ? input.history.slice(-input.historyTurns) : [];

const render = (input: PromptInput, sections: ReadonlySet<PromptSection>): PromptMessage[] => {
  const system = [input.persona];
  if (sections.has('snippets')) {
    system.push(`Business knowledge:\n${input.snippets.map((snippet) => `- ${snippet.text}`).join('\n')}`);
  }
  if (sections.has('examples')) {
    system.push(`Example answers in the expected style:\n${input.examples.map((example) => `- ${example}`).join('\n')}`);
  }

  const messages: PromptMessage[] = [{ role: 'system', content: system.join('\n\n') }];
  if (sections.has('history')) {
    messages.push(...recentHistory(input));
  }
  messages.push({ role: 'user', content: input.utterance });
  return messages;
};

const isEmpty = (input: PromptInput, section: OptionalSection): boolean => {
  switch (section) {
    case 'history':
      return recentHistory(input).length === 0;
    case 'snippets':
      return input.snippets.length === 0;
    case 'examples':
      return input.examples.length === 0;
    default:
      return true;
  }
};

/**
 * Builds the completion payload within `tokenLimit`. Persona and utterance
 * are always present; history, snippets and examples are added whole, in that
 * order, when they still fit.
 */
export const assemblePrompt = (input: PromptInput): PromptPayload => {
  const included = new Set<PromptSection>(['persona', 'utterance']);
  const dropped: PromptSection[] = [];

  let tokens = countMessageTokens(render(input, included));
  if (tokens > input.tokenLimit) {
    throw new PromptBudgetError(tokens, input.tokenLimit);
  }

  for (const section of OPTIONAL_ORDER) {
    if (isEmpty(input, section)) continue;
    const candidate = new Set(included).add(section);
    const candidateTokens = countMessageTokens(render(input, candidate));
    if (candidateTokens <= input.tokenLimit) {
      included.add(section);
      tokens = candidateTokens;
    } else {
      dropped.push(section);
      log.debug(`dropped ${section} (${candidateTokens} > ${input.tokenLimit})`);
    }
  }

  const utilization = tokens / input.tokenLimit;
  if (utilization >= CRITICAL_RATIO) {
    log.warn(`prompt budget critical: ${tokens}/${input.tokenLimit} tokens (${Math.round(utilization * 100)}%)`);
  } else if (utilization >= WARN_RATIO) {
    log.warn(`prompt budget high: ${tokens}/${input.tokenLimit} tokens (${Math.round(utilization * 100)}%)`);
  }

  return { messages: render(input, included), tokens, included: [...included], dropped };
};
