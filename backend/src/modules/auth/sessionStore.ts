import { randomUUID } from 'crypto';
import type { Session, SessionStore, SessionUser } from './auth.types.js';

type InMemorySessionStoreOptions = {
  ttlMs: number;
  now?: () => number;
  generateToken?: () => string;
};

// Expired sessions are pruned on every create, so the map holds at most the live ones plus
// those that expired since the last login
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly generateToken: () => string;

  constructor(options: InMemorySessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    this.generateToken = options.generateToken ?? randomUUID;
  }

  create(user: SessionUser): Session {
    this.pruneExpired();
    const createdAt = this.now();
    const session: Session = {
      token: this.generateToken(),
      username: user.username,
      role: user.role,
      createdAt: new Date(createdAt),
      expiresAt: new Date(createdAt + this.ttlMs)
    };
    this.sessions.set(session.token, session);
    return session;
  }

  get(token: string): Session | null {
    const session = this.sessions.get(token);
    if (!session) {
      return null;
    }
    if (session.expiresAt.getTime() <= this.now()) {
      this.sessions.delete(token);
      return null;
    }
    return session;
  }

  destroy(token: string): boolean {
    return this.sessions.delete(token);
  }

  pruneExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [token, session] of this.sessions) {
      if (session.expiresAt.getTime() <= now) {
        this.sessions.delete(token);
        removed += 1;
      }
    }
    return removed;
  }

  get size() {
    return this.sessions.size;
  }
}
