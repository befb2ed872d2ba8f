import { OpenAI } from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { AppConfig } from '../config';
import { CompletionOptions, CompletionService, Embedder, Embedding, PromptMessage } from '../types';
import { CompletionError, getErrorMessage, RetrievalError } from '../utils/errors';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('openai');

export const createOpenAIClient = (config: AppConfig['openai']): OpenAI | undefined =>
  config.apiKey ? new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 1 }) : undefined;

const toChatMessage = (message: PromptMessage): ChatCompletionMessageParam => {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
};

export class OpenAICompletionService implements CompletionService {
  constructor(
    private readonly client: OpenAI | undefined,
    private readonly model: string
  ) {}

  async complete(messages: PromptMessage[], options: CompletionOptions = {}): Promise<string> {
    if (!this.client) {
      throw new CompletionError('OPENAI_API_KEY is not configured');
    }
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: 0.4,
          max_tokens: options.maxTokens,
          messages: messages.map(toChatMessage),
        },
        { signal: options.signal }
      );
      const content = completion.choices[0]?.message?.content;
      if (!content) {
        throw new CompletionError('completion returned no content');
      }
      return content;
    } catch (error) {
      if (error instanceof CompletionError) throw error;
      log.debug(`chat completion failed: ${getErrorMessage(error)}`);
      throw new CompletionError(getErrorMessage(error), { cause: error });
    }
  }
}

export class OpenAIEmbedder implements Embedder {
  constructor(
    private readonly client: OpenAI | undefined,
    private readonly model: string
  ) {}

  async embed(texts: string[], signal?: AbortSignal): Promise<Embedding[]> {
    if (!this.client) {
      throw new RetrievalError('OPENAI_API_KEY is not configured');
    }
    if (texts.length === 0) return [];
    try {
      const response = await this.client.embeddings.create({ model: this.model, input: texts }, { signal });
      return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    } catch (error) {
      throw new RetrievalError(`embedding failed: ${getErrorMessage(error)}`, { cause: error });
    }
  }
}
