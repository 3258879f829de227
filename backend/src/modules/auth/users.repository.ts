import { StorageError } from '../../shared/errors.js';
import type { CollectionStore, StoredRecord } from '../../shared/storage/collectionStore.types.js';
import { SerialQueue } from '../../shared/storage/serialQueue.js';
import type { UserRecord, UserRole } from './auth.types.js';

const mapDocumentToUser = (document: StoredRecord): UserRecord => ({
  id: document.id,
  username: typeof document.username === 'string' ? document.username : '',
  passwordHash: typeof document.password_hash === 'string' ? document.password_hash : '',
  role: document.role === 'admin' ? 'admin' : 'user',
  createdAt: document.created_at
});

type NewUser = { username: string; passwordHash: string; role: UserRole };

export class UsersRepository {
  // Orders lookup-then-insert pairs so usernames stay unique within the process
  private readonly writes = new SerialQueue();

  constructor(private readonly store: CollectionStore) {}

  async listUsers(): Promise<UserRecord[]> {
    const documents = await this.store.readAll();
    return documents.map(mapDocumentToUser);
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const [document] = await this.store.findItems({ username });
    return document ? mapDocumentToUser(document) : null;
  }

  /** Returns null when the username is already taken. */
  createUserIfAbsent(model: NewUser): Promise<UserRecord | null> {
    return this.writes.run(async () => {
      if (await this.findByUsername(model.username)) {
        return null;
      }
      return this.createUser(model);
    });
  }

  private async createUser(model: NewUser): Promise<UserRecord> {
    const id = await this.store.addItem({
      username: model.username,
      password_hash: model.passwordHash,
      role: model.role
    });
    const document = await this.store.getItem(id);
    if (!document) {
      throw new StorageError(this.store.collection, `User ${id} disappeared right after it was written.`);
    }
    return mapDocumentToUser(document);
  }
}
