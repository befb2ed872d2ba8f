import { createSession } from '../logic/dialogue';
import { Session } from '../types';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('session-store');

const SWEEP_INTERVAL_MS = 60 * 1000;

interface StoredSession {
  session: Session;
  touchedAt: number;
}

const noop = (): void => undefined;

/**
 * In-memory sessions keyed by client id. Requests for the same id run one at
 * a time; a session is replaced only when its request succeeds.
 */
export class SessionStore {
  private sessions = new Map<string, StoredSession>();

  private locks = new Map<string, Promise<void>>();

  private lastSweep: number;

  constructor(
    private readonly idleTtlMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.lastSweep = now();
  }

  get size(): number {
    return this.sessions.size;
  }

  getSession(sessionId: string): Session {
    const stored = this.sessions.get(sessionId);
    if (!stored || this.isExpired(stored)) {
      return createSession();
    }
    return stored.session;
  }

  async run<T extends { session: Session }>(sessionId: string, handler: (session: Session) => Promise<T>): Promise<T> {
    const previous = this.locks.get(sessionId) ?? Promise.resolve();
    const current = previous.then(async () => {
      this.sweep();
      const result = await handler(this.getSession(sessionId));
      this.sessions.set(sessionId, { session: result.session, touchedAt: this.now() });
      return result;
    });
    const tail = current.then(noop, noop);
    this.locks.set(sessionId, tail);
    try {
      return await current;
    } finally {
      if (this.locks.get(sessionId) === tail) {
        this.locks.delete(sessionId);
      }
    }
  }

  clear(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /** Drops sessions idle for longer than the TTL. */
  evictIdle(): number {
    let evicted = 0;
    for (const [sessionId, stored] of this.sessions) {
      if (this.isExpired(stored)) {
        this.sessions.delete(sessionId);
        evicted += 1;
      }
    }
    if (evicted) {
      log.info(`evicted ${evicted} idle sessions`);
    }
    return evicted;
  }

  private isExpired(stored: StoredSession): boolean {
    return this.now() - stored.touchedAt > this.idleTtlMs;
  }

  private sweep(): void {
    if (this.now() - this.lastSweep < SWEEP_INTERVAL_MS) return;
    this.lastSweep = this.now();
    this.evictIdle();
  }
}
