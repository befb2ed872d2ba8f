import { getEncoding } from 'js-tiktoken';
import { PromptMessage } from '../types';

const TOKENS_PER_MESSAGE = 4;
const TOKENS_PER_CONVERSATION = 2;

let encoder: ReturnType<typeof getEncoding> | null = null;

const getEncoder = (): ReturnType<typeof getEncoding> => {
  if (!encoder) {
    encoder = getEncoding('cl100k_base');
  }
  return encoder;
};

export const countTokens = (text: string): number => getEncoder().encode(text).length;

export const messageTokens = (message: PromptMessage): number =>
  TOKENS_PER_MESSAGE + countTokens(message.role) + countTokens(message.content);

/** Chat-format estimate: per-message overhead plus role and content, plus priming for the reply. */
export const countMessageTokens = (messages: readonly PromptMessage[]): number =>
  messages.reduce((total, message) => total + messageTokens(message), TOKENS_PER_CONVERSATION);
