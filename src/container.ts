import path from 'path';
import { AppConfig } from './config';
import { loadCatalogs } from './knowledge/catalog';
import { CachedEmbedder, InMemoryVectorIndex } from './knowledge/vectorIndex';
import { createMemoCache } from './logic/cache';
import { createLeadExtractor, FileLeadSink } from './logic/lead';
import { SessionStore } from './memory/sessionStore';
import { createClassifiers } from './nlu/classifiers';
import { intentDocuments } from './nlu/intent';
import { createOpenAIClient, OpenAICompletionService, OpenAIEmbedder } from './nlu/openai';
import { ChatCore, createChatCore } from './orchestrator';
import { CompletionService, Embedder, IntentVectorMetadata, NotificationSink, RetrievalResult, SnippetMetadata } from './types';
import { getErrorMessage } from './utils/errors';
import { moduleLogger } from './utils/logger';

const log = moduleLogger('container');

export interface Collaborators {
  embedder: Embedder;
  completion: CompletionService;
  notifier: NotificationSink;
}

export interface AppDependencies {
  config: AppConfig;
  core: ChatCore;
  sessions: SessionStore;
}

const buildIndex = async (index: { build(): Promise<void> }): Promise<void> => {
  try {
    await index.build();
  } catch (error) {
    // queries against an unbuilt index fail and degrade to lexical matching
    log.warn(`vector index unavailable: ${getErrorMessage(error)}`);
  }
};

/**
 * Loads catalogs, embeds them and wires the chat core. Any collaborator can be
 * replaced, which is how tests run without OpenAI.
 */
export const createDependencies = async (
  config: AppConfig,
  overrides: Partial<Collaborators> = {}
): Promise<AppDependencies> => {
  const catalogs = loadCatalogs(config.dataDir);
  const client = createOpenAIClient(config.openai);

  const embedder = new CachedEmbedder(
    overrides.embedder ?? new OpenAIEmbedder(client, config.openai.embeddingModel),
    config.cache
  );
  const intentIndex = new InMemoryVectorIndex<IntentVectorMetadata>('intents', embedder, intentDocuments(catalogs.intents));
  const knowledgeIndex = new InMemoryVectorIndex<SnippetMetadata>('knowledge', embedder, catalogs.knowledge);
  await Promise.all([buildIndex(intentIndex), buildIndex(knowledgeIndex)]);

  const core = createChatCore({
    config,
    catalogs,
    classifiers: createClassifiers(catalogs.phrases),
    leadExtractor: createLeadExtractor({
      labels: catalogs.phrases.leadLabels,
      fillers: catalogs.phrases.leadFillers,
      selfIntroductions: catalogs.phrases.selfIntroductions,
    }),
    intentIndex,
    knowledgeIndex,
    completion: overrides.completion ?? new OpenAICompletionService(client, config.openai.model),
    notifier: overrides.notifier ?? new FileLeadSink(path.join(config.dataDir, 'leads.json')),
    retrievalCache: createMemoCache<RetrievalResult>(config.cache),
  });

  log.info(`loaded ${catalogs.intents.length} intents and ${catalogs.knowledge.length} snippets`);
  return { config, core, sessions: new SessionStore(config.sessionIdleTtlMs) };
};
