/**
 * Session store: one PageCursor per session, LRU-bounded.
 */

import crypto from 'crypto';
import type { Logger } from 'pino';
import { PageCursor } from './pagination.js';
import { SessionNotFoundError } from './errors.js';

/**
 * One continuous interaction scope.
 *
 * Work submitted through `exclusive` runs strictly in call order, so two racing
 * "next page" requests cannot interleave with each other or with a query.
 */
export class Session {
  readonly cursor: PageCursor;
  private queue: Promise<void> = Promise.resolve();

  constructor(readonly id: string, pageSize: number) {
    this.cursor = new PageCursor(pageSize);
  }

  exclusive<T>(work: () => Promise<T> | T): Promise<T> {
    const run = this.queue.then(work);
    // Keep the chain alive whatever the outcome; the caller sees the rejection.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

export interface SessionStoreOptions {
  pageSize: number;
  maxSessions?: number;
  logger: Logger;
}

export class SessionStore {
  private sessions: Map<string, Session> = new Map();
  private readonly maxSessions: number;
  private readonly pageSize: number;
  private readonly logger: Logger;

  constructor(options: SessionStoreOptions) {
    this.pageSize = options.pageSize;
    this.maxSessions = options.maxSessions ?? 1000;
    this.logger = options.logger;
  }

  open(): Session {
    if (this.sessions.size >= this.maxSessions) {
      // Map iterates in insertion order (least recently used first)
      const oldest = this.sessions.keys().next().value;
      if (oldest !== undefined) {
        this.sessions.delete(oldest);
        this.logger.info({ sessionId: oldest }, 'Evicted session to make space');
      }
    }

    const session = new Session(crypto.randomUUID(), this.pageSize);
    this.sessions.set(session.id, session);
    this.logger.debug({ sessionId: session.id }, 'Opened session');
    return session;
  }

  /**
   * Look up a session and promote it to most recently used.
   */
  get(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, session);
    return session;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  close(sessionId: string): boolean {
    const closed = this.sessions.delete(sessionId);
    if (closed) {
      this.logger.debug({ sessionId }, 'Closed session');
    }
    return closed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
