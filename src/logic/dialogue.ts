import { z } from 'zod';
import { BUSINESS_TYPES, BusinessType, DialogueState, IntentId, Session, TOPIC_IDS, TopicId } from '../types';
import { getErrorMessage, SessionStateError } from '../utils/errors';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('dialogue');

const sessionSchema = z
  .object({
    history: z.array(z.object({ role: z.enum(['user', 'assistant']), content: z.string() })),
    greeted: z.boolean(),
    leadPending: z.boolean(),
    leadAttempts: z.number().int().nonnegative(),
    leadCollected: z.boolean(),
    topicsDiscussed: z.array(z.enum(TOPIC_IDS)),
    engagementCount: z.number().int().nonnegative(),
    informativeReplies: z.number().int().nonnegative(),
    businessType: z.enum(BUSINESS_TYPES).optional(),
    lastIntent: z.string().optional(),
  })
  .strict()
  .refine((session) => !(session.leadPending && session.leadCollected), {
    message: 'leadPending and leadCollected are mutually exclusive',
  });

export const createSession = (): Session => ({
  history: [],
  greeted: false,
  leadPending: false,
  leadAttempts: 0,
  leadCollected: false,
  topicsDiscussed: [],
  engagementCount: 0,
  informativeReplies: 0,
});

/** Rejects corrupt sessions instead of repairing them. */
export const validateSession = (value: unknown): Session => {
  const result = sessionSchema.safeParse(value);
  if (!result.success) {
    throw new SessionStateError(`invalid session: ${getErrorMessage(result.error)}`);
  }
  return result.data;
};

export const dialogueState = (session: Session): DialogueState => {
  if (session.leadCollected) return 'LEAD_COLLECTED';
  if (session.leadPending) return 'LEAD_PENDING';
  return session.greeted ? 'ACTIVE' : 'FRESH';
};

export type DialogueEvent =
  | { type: 'greeted' }
  | { type: 'buyingIntent' }
  | { type: 'positiveEngagement' }
  | { type: 'leadCompleted' }
  | { type: 'disengaged' }
  | { type: 'leadAttemptFailed' }
  | { type: 'informativeReply'; topics: readonly TopicId[] }
  | { type: 'intentResolved'; intent: IntentId }
  | { type: 'businessTypeDetected'; businessType: BusinessType }
  | { type: 'turn'; user: string; assistant: string };

export interface DialogueLimits {
  maxLeadAttempts: number;
  maxSessionTurns: number;
}

const requestLead = (session: Session): Session =>
  session.leadCollected || session.leadPending ? session : { ...session, leadPending: true, leadAttempts: 0 };

const reduce = (session: Session, event: DialogueEvent, limits: DialogueLimits): Session => {
  switch (event.type) {
    case 'greeted':
      return session.greeted ? session : { ...session, greeted: true };
    case 'buyingIntent':
      return requestLead(session);
    case 'positiveEngagement': {
      const engaged = { ...session, engagementCount: session.engagementCount + 1 };
      return engaged.engagementCount >= 2 || engaged.informativeReplies >= 1 ? requestLead(engaged) : engaged;
    }
    case 'leadCompleted':
      return { ...session, leadCollected: true, leadPending: false, leadAttempts: 0 };
    case 'disengaged':
      return { ...session, leadPending: false, leadAttempts: 0 };
    case 'leadAttemptFailed': {
      if (!session.leadPending) return session;
      const attempts = session.leadAttempts + 1;
      return attempts >= limits.maxLeadAttempts
        ? { ...session, leadPending: false, leadAttempts: 0 }
        : { ...session, leadAttempts: attempts };
    }
    case 'informativeReply':
      return {
        ...session,
        informativeReplies: session.informativeReplies + 1,
        topicsDiscussed: [...new Set([...session.topicsDiscussed, ...event.topics])],
      };
    case 'intentResolved':
      return { ...session, lastIntent: event.intent };
    case 'businessTypeDetected':
      return { ...session, businessType: event.businessType };
    case 'turn':
      return {
        ...session,
        history: [
          ...session.history,
          { role: 'user' as const, content: event.user },
          { role: 'assistant' as const, content: event.assistant },
        ].slice(-limits.maxSessionTurns),
      };
    default:
      return session;
  }
};

/** Pure reducer: never mutates `session`, returns it unchanged when the event does not apply. */
export const transition = (session: Session, event: DialogueEvent, limits: DialogueLimits): Session => {
  const next = reduce(session, event, limits);
  const before = dialogueState(session);
  const after = dialogueState(next);
  if (before !== after) {
    log.info(`state ${before} -> ${after} on ${event.type}`);
  }
  return next;
};
