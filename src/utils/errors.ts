import { ZodError } from 'zod';

export class ChatCoreError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChatCoreError';
    this.code = code;
  }
}

/** Any failed embedding, vector or knowledge query. Never reaches the user. */
export class RetrievalError extends ChatCoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RETRIEVAL_FAILED', message, options);
    this.name = 'RetrievalError';
  }
}

export class CompletionError extends ChatCoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('COMPLETION_FAILED', message, options);
    this.name = 'CompletionError';
  }
}

export class TimeoutError extends ChatCoreError {
  readonly label: string;

  constructor(label: string, ms: number) {
    super('TIMEOUT', `${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
    this.label = label;
  }
}

export class PromptBudgetError extends ChatCoreError {
  constructor(tokens: number, limit: number) {
    super('PROMPT_BUDGET', `mandatory prompt sections need ${tokens} tokens, limit is ${limit}`);
    this.name = 'PromptBudgetError';
  }
}

/**
 * Corrupt or inconsistent session input. Fatal: the request is rejected
 * instead of repairing the session.
 */
export class SessionStateError extends ChatCoreError {
  constructor(message: string) {
    super('SESSION_STATE', message);
    this.name = 'SessionStateError';
  }
}

export class AbortedError extends ChatCoreError {
  constructor() {
    super('ABORTED', 'request aborted');
    this.name = 'AbortedError';
  }
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
  }
  if (error instanceof Error) {
    return error.message;
  }
  return 'An unexpected error occurred';
};

export const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw new AbortedError();
  }
};

export const withTimeout = <T>(promise: Promise<T>, ms: number, label: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
};
