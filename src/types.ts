export type Language = 'he' | 'en';

export type Role = 'user' | 'assistant';

export type IntentId = string;

export const TOPIC_IDS = ['pricing', 'features', 'setup', 'integrations', 'support'] as const;

export type TopicId = (typeof TOPIC_IDS)[number];

export const BUSINESS_TYPES = ['restaurant', 'beauty', 'retail', 'medical', 'real_estate', 'education', 'recruitment'] as const;

export type BusinessType = (typeof BUSINESS_TYPES)[number];

export const UNKNOWN_INTENT = 'unknown';

export interface ChatMessage {
  role: Role;
  content: string;
}

export interface Session {
  readonly history: readonly ChatMessage[];
  readonly greeted: boolean;
  readonly leadPending: boolean;
  readonly leadAttempts: number;
  readonly leadCollected: boolean;
  readonly topicsDiscussed: readonly TopicId[];
  readonly engagementCount: number;
  readonly informativeReplies: number;
  readonly businessType?: BusinessType;
  readonly lastIntent?: IntentId;
}

export type DialogueState = 'FRESH' | 'ACTIVE' | 'LEAD_PENDING' | 'LEAD_COLLECTED';

export interface IntentDefinition {
  intent: IntentId;
  category: string;
  triggers: string[];
  description?: string;
  examples?: string[];
}

export interface SnippetMetadata {
  intent: IntentId;
  language: Language;
  category: string;
}

export interface KnowledgeSnippet {
  id: string;
  text: string;
  metadata: SnippetMetadata;
}

export interface LexicalMatch {
  intent: IntentId;
  score: number;
}

export interface SemanticMatch {
  intent: IntentId;
  distance: number;
}

export type MatchSource = 'lexical' | 'semantic' | 'hybrid' | 'none';

export interface IntentMatch {
  intent: IntentId;
  source: MatchSource;
  confidence: number;
}

export type RetrievalLayer = 'intent_filtered' | 'language_filtered' | 'broad_semantic' | 'none';

export interface RetrievalResult {
  layer: RetrievalLayer;
  snippets: KnowledgeSnippet[];
}

export interface LeadRecord {
  name?: string;
  phone?: string;
  email?: string;
}

export type CompleteLead = Required<LeadRecord>;

export type LeadField = keyof LeadRecord;

export interface LeadExtraction extends LeadRecord {
  invalid: LeadField[];
}

export type Embedding = number[];

export interface Embedder {
  embed(texts: string[], signal?: AbortSignal): Promise<Embedding[]>;
}

export interface VectorHit<M> {
  id: string;
  text: string;
  metadata: M;
  distance: number;
}

export interface VectorQueryOptions<M> {
  filter?: Partial<M>;
  k: number;
  signal?: AbortSignal;
}

export interface VectorIndex<M> {
  query(input: string | Embedding, options: VectorQueryOptions<M>): Promise<VectorHit<M>[]>;
}

export interface IntentVectorMetadata {
  intent: IntentId;
  category: string;
}

export interface CompletionOptions {
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface CompletionService {
  complete(messages: PromptMessage[], options?: CompletionOptions): Promise<string>;
}

export interface NotificationSink {
  notify(lead: CompleteLead, utterance: string): Promise<boolean>;
}

export type PromptRole = 'system' | Role;

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

export type PromptSection = 'persona' | 'utterance' | 'history' | 'snippets' | 'examples';

export interface PromptPayload {
  messages: PromptMessage[];
  tokens: number;
  included: PromptSection[];
  dropped: PromptSection[];
}

export interface ResolveResult {
  reply: string;
  session: Session;
  intent: IntentId;
  state: DialogueState;
}
