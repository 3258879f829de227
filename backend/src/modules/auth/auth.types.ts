export type UserRole = 'user' | 'admin';

export interface UserRecord {
  id: string;
  username: string;
  passwordHash: string;
  role: UserRole;
  createdAt: string;
}

export type PublicUser = Omit<UserRecord, 'passwordHash'>;

export interface SessionUser {
  username: string;
  role: UserRole;
}

export interface Session extends SessionUser {
  token: string;
  createdAt: Date;
  expiresAt: Date;
}

/**
 * Keyed session registry. Sessions are created on login and end on logout or expiry.
 */
export interface SessionStore {
  create(user: SessionUser): Session;
  /** Expired sessions are dropped on lookup and read as absent. */
  get(token: string): Session | null;
  destroy(token: string): boolean;
}
