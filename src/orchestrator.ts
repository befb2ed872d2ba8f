import { LRUCache } from 'lru-cache';
import { AppConfig } from './config';
import { Catalogs } from './knowledge/catalog';
import { Classifiers } from './nlu/classifiers';
import { resolveIntent } from './nlu/intent';
import { DialogueEvent, dialogueState, transition, validateSession } from './logic/dialogue';
import { hasAnyLeadField, isCompleteLead, LeadExtractor, missingLeadFields } from './logic/lead';
import { assemblePrompt, buildPersonaSection, PromptInput } from './logic/prompt';
import { isUsable, QualityRules } from './logic/quality';
import {
  apologyReply,
  clarifyReply,
  greetingReply,
  leadAlreadyCollectedReply,
  leadExitReply,
  leadFieldsReply,
  leadInvite,
  leadRequestReply,
  leadRetryLaterReply,
  leadThanksReply,
  recapPrefix,
} from './logic/replies';
import { nextLayer, retrieve, RetrievalDeps } from './logic/retrieval';
import {
  CompleteLead,
  CompletionService,
  IntentId,
  IntentVectorMetadata,
  Language,
  NotificationSink,
  ResolveResult,
  RetrievalResult,
  Session,
  SnippetMetadata,
  VectorIndex,
} from './types';
import { getErrorMessage, throwIfAborted, withTimeout } from './utils/errors';
import { moduleLogger } from './utils/logger';
import { detectLanguage } from './utils/text';

const log = moduleLogger('orchestrator');

/** Labels reported for replies that never reach the intent resolver. */
export const GREETING_INTENT = 'greeting';
export const LEAD_INTENT = 'lead';
export const CLARIFY_INTENT = 'clarify';

export interface OrchestratorDeps {
  config: AppConfig;
  catalogs: Catalogs;
  classifiers: Classifiers;
  leadExtractor: LeadExtractor;
  intentIndex: VectorIndex<IntentVectorMetadata>;
  knowledgeIndex: VectorIndex<SnippetMetadata>;
  completion: CompletionService;
  notifier: NotificationSink;
  retrievalCache?: LRUCache<string, RetrievalResult>;
}

export interface ResolveOptions {
  signal?: AbortSignal;
}

export interface ChatCore {
  resolve(utterance: string, session: Session, options?: ResolveOptions): Promise<ResolveResult>;
}

/** Language of the latest user message, for utterances without letters. */
const lastUserLanguage = (session: Session): Language | undefined => {
  const last = [...session.history].reverse().find((message) => message.role === 'user');
  return last ? detectLanguage(last.content) : undefined;
};

type GenerationInput = Omit<PromptInput, 'tokenLimit' | 'historyTurns'>;

export const createChatCore = (deps: OrchestratorDeps): ChatCore => {
  const { config, catalogs, classifiers, leadExtractor, completion, notifier } = deps;
  const limits = config.dialogue;
  const retrievalDeps: RetrievalDeps = {
    index: deps.knowledgeIndex,
    config: config.retrieval,
    cache: deps.retrievalCache,
  };
  const qualityRules: QualityRules = {
    vaguePatterns: catalogs.phrases.vagueReplies,
    minLength: config.quality.minLength,
    shortVagueLength: config.quality.shortVagueLength,
  };

  const notify = async (lead: CompleteLead, utterance: string): Promise<boolean> => {
    try {
      return await withTimeout(notifier.notify(lead, utterance), config.collaboratorTimeoutMs, 'lead notification');
    } catch (error) {
      log.error(`lead notification failed: ${getErrorMessage(error)}`);
      return false;
    }
  };

  /** One retry with a smaller payload; null when both attempts fail. */
  const generate = async (input: GenerationInput, maxTokens: number, signal?: AbortSignal): Promise<string | null> => {
    const reduced = input.examples.length ? { ...input, examples: [] } : { ...input, snippets: [] };
    const attempts: GenerationInput[] = [input, reduced];

    for (const [index, attempt] of attempts.entries()) {
      try {
        const payload = assemblePrompt({
          ...attempt,
          tokenLimit: config.prompt.tokenLimit,
          historyTurns: config.prompt.historyTurns,
        });
        log.debug(`completion attempt ${index + 1}: ${payload.tokens} tokens, sections=${payload.included.join(',')}`);
        const text = await withTimeout(
          completion.complete(payload.messages, { maxTokens, signal }),
          config.openai.timeoutMs,
          'completion'
        );
        return text.trim();
      } catch (error) {
        throwIfAborted(signal);
        log.warn(`completion attempt ${index + 1} failed: ${getErrorMessage(error)}`);
      }
    }
    return null;
  };

  const examplesFor = (intent: IntentId): string[] =>
    catalogs.intents.find((entry) => entry.intent === intent)?.examples ?? [];

  const resolve = async (utterance: string, input: Session, options: ResolveOptions = {}): Promise<ResolveResult> => {
    const { signal } = options;
    let session = validateSession(input);
    throwIfAborted(signal);

    const text = utterance.trim();
    const language: Language = detectLanguage(text, lastUserLanguage(session));
    const pendingAtStart = session.leadPending;
    const apply = (event: DialogueEvent): void => {
      session = transition(session, event, limits);
    };
    const finish = (reply: string, intent: IntentId): ResolveResult => {
      throwIfAborted(signal);
      apply({ type: 'greeted' });
      apply({ type: 'turn', user: text, assistant: reply });
      return { reply, session, intent, state: dialogueState(session) };
    };

    // a complete lead is captured before anything else, pending or not
    const lead = leadExtractor.extract(text);
    if (!session.leadCollected && isCompleteLead(lead)) {
      await notify({ name: lead.name, phone: lead.phone, email: lead.email }, text);
      apply({ type: 'leadCompleted' });
      log.info('lead collected');
      return finish(leadThanksReply(language, lead.name), LEAD_INTENT);
    }

    if (classifiers.isBuyingIntent(text)) {
      if (session.leadCollected) {
        return finish(leadAlreadyCollectedReply(language), LEAD_INTENT);
      }
      apply({ type: 'buyingIntent' });
      return finish(leadRequestReply(language), LEAD_INTENT);
    }

    if (session.leadPending) {
      if (classifiers.isDisengagement(text)) {
        apply({ type: 'disengaged' });
        return finish(leadExitReply(language), LEAD_INTENT);
      }
      if (classifiers.isGreeting(text)) {
        apply({ type: 'disengaged' });
      } else {
        apply({ type: 'leadAttemptFailed' });
        if (hasAnyLeadField(lead)) {
          return session.leadPending
            ? finish(leadFieldsReply(language, missingLeadFields(lead), lead.invalid), LEAD_INTENT)
            : finish(leadRetryLaterReply(language), LEAD_INTENT);
        }
        if (session.leadPending && session.history.length === 0) {
          return finish(leadRequestReply(language), LEAD_INTENT);
        }
      }
    }

    if (!session.greeted && classifiers.isPureGreeting(text)) {
      return finish(greetingReply(language, classifiers.greetingTimeOfDay(text)), GREETING_INTENT);
    }
    if (!session.greeted && Array.from(text).length < 2) {
      return finish(clarifyReply(language), CLARIFY_INTENT);
    }

    const businessType = classifiers.detectBusinessType(text);
    if (businessType) {
      apply({ type: 'businessTypeDetected', businessType });
    }
    const wasPending = session.leadPending;
    // a turn that began pending never reopens the lead flow
    if (!pendingAtStart && classifiers.isPositiveEngagement(text)) {
      apply({ type: 'positiveEngagement' });
    }
    const invite = !wasPending && session.leadPending;

    const match = await resolveIntent(
      text,
      {
        catalog: catalogs.intents,
        index: deps.intentIndex,
        thresholds: config.intent,
        timeoutMs: config.collaboratorTimeoutMs,
      },
      signal
    );
    apply({ type: 'intentResolved', intent: match.intent });

    const topics = classifiers.detectTopics(text);
    const recap = topics.length > 0 && topics.every((topic) => session.topicsDiscussed.includes(topic));
    const maxTokens = recap ? config.prompt.briefReplyMaxTokens : config.prompt.replyMaxTokens;

    const persona = buildPersonaSection(catalogs.persona, {
      language,
      businessType: session.businessType,
      firstTurn: !session.greeted,
      recap,
    });
    const baseInput = {
      persona,
      utterance: text,
      history: session.history,
      examples: examplesFor(match.intent),
    };

    const retrieval = await retrieve(text, match.intent, language, retrievalDeps, { signal });
    let reply = await generate({ ...baseInput, snippets: retrieval.snippets }, maxTokens, signal);

    if (reply !== null && !isUsable(reply, qualityRules)) {
      const startLayer = nextLayer(retrieval.layer);
      log.warn(`vague reply, retrying from layer ${startLayer}`);
      const broader = await retrieve(text, match.intent, language, retrievalDeps, { startLayer, signal });
      reply = await generate({ ...baseInput, snippets: broader.snippets }, maxTokens, signal);
      if (reply !== null && !isUsable(reply, qualityRules)) {
        reply = null;
      }
    }

    if (reply === null) {
      log.warn(`falling back to apology for intent=${match.intent}`);
      return finish(apologyReply(language), match.intent);
    }

    apply({ type: 'informativeReply', topics });
    let final = recap ? `${recapPrefix(language, topics)} ${reply}` : reply;
    if (invite) {
      final = `${final}\n\n${leadInvite(language)}`;
    }
    return finish(final, match.intent);
  };

  return { resolve };
};
