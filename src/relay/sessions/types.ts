/**
 * Server-held key/value storage scoped by a caller-supplied session token.
 * Implementations decide how sessions expire; the relay never locks and
 * concurrent writes to one key are last-write-wins.
 */
export interface SessionStore {
  get(sessionId: string, key: string): Promise<string | undefined>;
  set(sessionId: string, key: string, value: string): Promise<void>;
  /** Resolves true when an entry was removed */
  delete(sessionId: string, key: string): Promise<boolean>;
}

export interface Session {
  sessionId: string;
  createdAt: Date;
  lastActivity: Date;
  entries: Map<string, string>;
}
