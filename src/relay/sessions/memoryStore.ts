import { EventEmitter } from 'events';

import { Logger } from '../../utils/logger.js';

import type { Session, SessionStore } from './types.js';

export interface InMemorySessionStoreOptions {
  idleTimeoutMinutes: number;
  now?: () => Date;
}

/**
 * Process-local SessionStore. A session expires, with all of its entries,
 * once it has been idle for longer than the configured timeout.
 */
export class InMemorySessionStore extends EventEmitter implements SessionStore {
  private sessions: Map<string, Session> = new Map();
  private cleanupTimer: NodeJS.Timeout | undefined;
  private readonly idleTimeoutMs: number;
  private readonly now: () => Date;
  private readonly logger = Logger.getInstance('SessionStore');

  constructor(options: InMemorySessionStoreOptions) {
    super();
    this.idleTimeoutMs = options.idleTimeoutMinutes * 60 * 1000;
    this.now = options.now ?? (() => new Date());
  }

  get(sessionId: string, key: string): Promise<string | undefined> {
    const session = this.getActiveSession(sessionId);
    if (!session) {
      return Promise.resolve(undefined);
    }
    session.lastActivity = this.now();
    return Promise.resolve(session.entries.get(key));
  }

  set(sessionId: string, key: string, value: string): Promise<void> {
    const session = this.getActiveSession(sessionId) ?? this.createSession(sessionId);
    session.entries.set(key, value);
    session.lastActivity = this.now();
    return Promise.resolve();
  }

  delete(sessionId: string, key: string): Promise<boolean> {
    const session = this.getActiveSession(sessionId);
    if (!session) {
      return Promise.resolve(false);
    }
    session.lastActivity = this.now();
    return Promise.resolve(session.entries.delete(key));
  }

  /**
   * Number of sessions that have not expired yet
   */
  get size(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (!this.isExpired(session)) {
        count += 1;
      }
    }
    return count;
  }

  /**
   * Drops every idle session and returns how many were removed
   */
  cleanupExpiredSessions(): number {
    let removed = 0;
    for (const session of this.sessions.values()) {
      if (this.isExpired(session)) {
        this.expire(session);
        removed += 1;
      }
    }
    if (removed > 0) {
      this.logger.debug(`Expired ${removed} idle session(s)`);
    }
    return removed;
  }

  startCleanup(intervalMs: number = 60_000): void {
    this.stopCleanup();
    this.cleanupTimer = setInterval(() => {
      this.cleanupExpiredSessions();
    }, intervalMs);
    this.cleanupTimer.unref();
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  private createSession(sessionId: string): Session {
    const session: Session = {
      sessionId,
      createdAt: this.now(),
      lastActivity: this.now(),
      entries: new Map(),
    };
    this.sessions.set(sessionId, session);
    this.emit('sessionCreated', { sessionId });
    return session;
  }

  private getActiveSession(sessionId: string): Session | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return undefined;
    }
    if (this.isExpired(session)) {
      this.expire(session);
      return undefined;
    }
    return session;
  }

  private isExpired(session: Session): boolean {
    return this.now().getTime() - session.lastActivity.getTime() > this.idleTimeoutMs;
  }

  private expire(session: Session): void {
    this.sessions.delete(session.sessionId);
    this.emit('sessionExpired', { sessionId: session.sessionId, entries: session.entries.size });
  }
}
