import { ConflictError, UnauthorizedError } from '../../shared/errors.js';
import { requirePayload, requireText } from '../../shared/validation.js';
import type { PublicUser, Session, SessionStore, UserRecord } from './auth.types.js';
import { hashPassword, verifyPassword } from './password.js';
import { UsersRepository } from './users.repository.js';

const toPublicUser = ({ id, username, role, createdAt }: UserRecord): PublicUser => ({ id, username, role, createdAt });

const readCredentials = (payload: unknown) => {
  const source = requirePayload(payload, 'Provide username and password.');
  return { username: requireText(source, 'username'), password: requireText(source, 'password') };
};

export class AuthService {
  constructor(
    private readonly users: UsersRepository,
    private readonly sessions: SessionStore,
    private readonly adminUsername: string | null = null
  ) {}

  async register(payload: unknown): Promise<PublicUser> {
    const { username, password } = readCredentials(payload);
    const user = await this.users.createUserIfAbsent({
      username,
      passwordHash: await hashPassword(password),
      role: username === this.adminUsername ? 'admin' : 'user'
    });
    if (!user) {
      throw new ConflictError('User already exists.');
    }
    return toPublicUser(user);
  }

  async login(payload: unknown) {
    const { username, password } = readCredentials(payload);
    const user = await this.users.findByUsername(username);
    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      throw new UnauthorizedError('Invalid credentials.');
    }
    const session = this.sessions.create({ username: user.username, role: user.role });
    return {
      token: session.token,
      username: session.username,
      role: session.role,
      expiresAt: session.expiresAt.toISOString()
    };
  }

  logout(token: string): boolean {
    return this.sessions.destroy(token);
  }

  resolveSession(token: string): Session | null {
    return this.sessions.get(token);
  }

  async listUsers(): Promise<PublicUser[]> {
    const users = await this.users.listUsers();
    return users.map(toPublicUser);
  }
}
