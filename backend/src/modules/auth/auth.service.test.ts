import { describe, expect, it } from 'vitest';
import { ConflictError, UnauthorizedError } from '../../shared/errors.js';
import { MemoryCollectionStore } from '../../shared/storage/memoryCollectionStore.js';
import { AuthService } from './auth.service.js';
import { InMemorySessionStore } from './sessionStore.js';
import { UsersRepository } from './users.repository.js';

const createService = () => {
  const users = new UsersRepository(new MemoryCollectionStore('users'));
  const sessions = new InMemorySessionStore({
    ttlMs: 60_000,
    now: () => Date.parse('2024-01-01T00:00:00.000Z'),
    generateToken: () => 'session-token'
  });
  return { service: new AuthService(users, sessions, 'admin'), users };
};

describe('AuthService', () => {
  it('registers users without exposing the password hash', async () => {
    const { service, users } = createService();

    const user = await service.register({ username: ' alice ', password: 'test-password' });

    expect(user).toEqual({ id: expect.any(String), username: 'alice', role: 'user', createdAt: expect.any(String) });
    expect(user).not.toHaveProperty('passwordHash');
    expect((await users.findByUsername('alice'))?.passwordHash).not.toBe('test-password');
  });

  it('gives the configured administrator the admin role', async () => {
    const { service } = createService();
    expect((await service.register({ username: 'admin', password: 'test-password' })).role).toBe('admin');
  });

  it('refuses a duplicate username', async () => {
    const { service } = createService();
    await service.register({ username: 'alice', password: 'test-password' });

    await expect(service.register({ username: 'alice', password: 'other' })).rejects.toBeInstanceOf(ConflictError);
  });

  it('keeps usernames unique when registrations overlap', async () => {
    const { service } = createService();

    const results = await Promise.allSettled([
      service.register({ username: 'alice', password: 'test-password' }),
      service.register({ username: 'alice', password: 'other-password' })
    ]);

    expect(results.map((result) => result.status).sort()).toEqual(['fulfilled', 'rejected']);
    const reasons = results.flatMap((result) => (result.status === 'rejected' ? [result.reason] : []));
    expect(reasons).toHaveLength(1);
    expect(reasons[0]).toBeInstanceOf(ConflictError);
    expect((await service.listUsers()).map((user) => user.username)).toEqual(['alice']);
  });

  it('opens a session for valid credentials', async () => {
    const { service } = createService();
    await service.register({ username: 'alice', password: 'test-password' });

    expect(await service.login({ username: 'alice', password: 'test-password' })).toEqual({
      token: 'session-token',
      username: 'alice',
      role: 'user',
      expiresAt: '2024-01-01T00:01:00.000Z'
    });
    expect(service.resolveSession('session-token')?.username).toBe('alice');
  });

  it('rejects unknown users and wrong passwords alike', async () => {
    const { service } = createService();
    await service.register({ username: 'alice', password: 'test-password' });

    await expect(service.login({ username: 'alice', password: 'wrong' })).rejects.toThrow('Invalid credentials.');
    await expect(service.login({ username: 'bob', password: 'test-password' })).rejects.toBeInstanceOf(
      UnauthorizedError
    );
  });

  it('ends the session on logout', async () => {
    const { service } = createService();
    await service.register({ username: 'alice', password: 'test-password' });
    await service.login({ username: 'alice', password: 'test-password' });

    expect(service.logout('session-token')).toBe(true);
    expect(service.resolveSession('session-token')).toBeNull();
  });

  it('lists registered users in registration order', async () => {
    const { service } = createService();
    await service.register({ username: 'admin', password: 'test-password' });
    await service.register({ username: 'alice', password: 'test-password' });

    const users = await service.listUsers();
    expect(users.map(({ username, role }) => ({ username, role }))).toEqual([
      { username: 'admin', role: 'admin' },
      { username: 'alice', role: 'user' }
    ]);
  });
});
