import type { CollectionStore } from '../../shared/storage/collectionStore.types.js';
import { AuthService } from './auth.service.js';
import type { SessionStore } from './auth.types.js';
import { UsersRepository } from './users.repository.js';

export const createAuthModule = (store: CollectionStore, sessions: SessionStore, adminUsername: string | null) => {
  const users = new UsersRepository(store);
  return { users, service: new AuthService(users, sessions, adminUsername) };
};
