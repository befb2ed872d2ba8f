import path from 'path';
import { z } from 'zod';

const MINUTE = 60 * 1000;

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  PORT: z.coerce.number().int().positive().default(3000),
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),
  DATA_DIR: z.string().default(path.resolve('data')),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4-turbo'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),

  LEXICAL_THRESHOLD: z.coerce.number().min(0).max(100).default(70),
  SEMANTIC_THRESHOLD: z.coerce.number().positive().default(1.4),
  SEMANTIC_RELAXED_THRESHOLD: z.coerce.number().positive().default(1.8),
  CATCH_ALL_CATEGORY: z.string().default('general'),

  HISTORY_TURNS: z.coerce.number().int().nonnegative().default(3),
  MAX_SESSION_TURNS: z.coerce.number().int().positive().default(20),
  TOKEN_LIMIT: z.coerce.number().int().positive().default(8192),
  REPLY_MAX_TOKENS: z.coerce.number().int().positive().default(500),
  BRIEF_REPLY_MAX_TOKENS: z.coerce.number().int().positive().default(150),

  MIN_REPLY_LENGTH: z.coerce.number().int().nonnegative().default(15),
  SHORT_VAGUE_LENGTH: z.coerce.number().int().nonnegative().default(30),
  MAX_LEAD_ATTEMPTS: z.coerce.number().int().positive().default(2),

  COLLABORATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(500),
  CACHE_TTL_MS: z.coerce.number().int().positive().default(30 * MINUTE),
  SESSION_IDLE_TTL_MS: z.coerce.number().int().positive().default(30 * MINUTE),
});

export interface RetrievalConfig {
  intentTopK: number;
  languageTopK: number;
  broadTopK: number;
  broadKeep: number;
  timeoutMs: number;
}

export interface AppConfig {
  env: string;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  port: number;
  allowedOrigins: string[];
  dataDir: string;
  openai: {
    apiKey?: string;
    model: string;
    embeddingModel: string;
    timeoutMs: number;
  };
  intent: {
    lexicalThreshold: number;
    semanticThreshold: number;
    relaxedThreshold: number;
    catchAllCategory: string;
  };
  retrieval: RetrievalConfig;
  prompt: {
    historyTurns: number;
    tokenLimit: number;
    replyMaxTokens: number;
    briefReplyMaxTokens: number;
  };
  quality: {
    minLength: number;
    shortVagueLength: number;
  };
  dialogue: {
    maxLeadAttempts: number;
    maxSessionTurns: number;
  };
  collaboratorTimeoutMs: number;
  cache: {
    maxEntries: number;
    ttlMs: number;
  };
  sessionIdleTtlMs: number;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.parse(env);
  return Object.freeze({
    env: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    port: parsed.PORT,
    allowedOrigins: parsed.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean),
    dataDir: parsed.DATA_DIR,
    openai: {
      apiKey: parsed.OPENAI_API_KEY,
      model: parsed.OPENAI_MODEL,
      embeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
      timeoutMs: parsed.COMPLETION_TIMEOUT_MS,
    },
    intent: {
      lexicalThreshold: parsed.LEXICAL_THRESHOLD,
      semanticThreshold: parsed.SEMANTIC_THRESHOLD,
      relaxedThreshold: parsed.SEMANTIC_RELAXED_THRESHOLD,
      catchAllCategory: parsed.CATCH_ALL_CATEGORY,
    },
    retrieval: {
      intentTopK: 3,
      languageTopK: 5,
      broadTopK: 10,
      broadKeep: 3,
      timeoutMs: parsed.COLLABORATOR_TIMEOUT_MS,
    },
    prompt: {
      historyTurns: parsed.HISTORY_TURNS,
      tokenLimit: parsed.TOKEN_LIMIT,
      replyMaxTokens: parsed.REPLY_MAX_TOKENS,
      briefReplyMaxTokens: parsed.BRIEF_REPLY_MAX_TOKENS,
    },
    quality: {
      minLength: parsed.MIN_REPLY_LENGTH,
      shortVagueLength: parsed.SHORT_VAGUE_LENGTH,
    },
    dialogue: {
      maxLeadAttempts: parsed.MAX_LEAD_ATTEMPTS,
      maxSessionTurns: parsed.MAX_SESSION_TURNS,
    },
    collaboratorTimeoutMs: parsed.COLLABORATOR_TIMEOUT_MS,
    cache: {
      maxEntries: parsed.CACHE_MAX_ENTRIES,
      ttlMs: parsed.CACHE_TTL_MS,
    },
    sessionIdleTtlMs: parsed.SESSION_IDLE_TTL_MS,
  });
};
