import { randomUUID } from 'crypto';
import { StoryDatabase } from '../database.js';
import { createLogger, NAMESPACES } from '../logging.js';

const usersLog = createLogger(NAMESPACES.services.users);

export interface User {
  id: string;
  email: string;
  name: string | null;
  avatarUrl: string | null;
  lastLogin: string | null;
}

export interface UserProfile {
  email: string;
  name?: string;
  avatarUrl?: string;
}

interface UserRow {
  id: string;
  email: string;
  name: string | null;
  avatar_url: string | null;
  last_login: string | null;
}

function toUser(row: UserRow): User {
  return { id: row.id, email: row.email, name: row.name, avatarUrl: row.avatar_url, lastLogin: row.last_login };
}

export class UserService {
  constructor(private readonly db: StoryDatabase, private readonly now: () => Date = () => new Date()) {}

  /** Insert or update by email; the local id of an existing user never changes. */
  upsertByEmail(profile: UserProfile): User {
    const ts = this.now().toISOString();
    this.db
      .prepare(
        `INSERT INTO users (id, email, name, avatar_url, last_login) VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(email) DO UPDATE SET name = excluded.name, avatar_url = excluded.avatar_url, last_login = excluded.last_login`
      )
      .run(randomUUID(), profile.email, profile.name ?? null, profile.avatarUrl ?? null, ts);

    const row = this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE email = ?').get(profile.email);
    if (!row) {
      throw new Error(`Database error during upsert of ${profile.email}`);
    }
    usersLog('Upserted user %s', row.id);
    return toUser(row);
  }

  getById(userId: string): User | undefined {
    const row = this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE id = ?').get(userId);
    return row ? toUser(row) : undefined;
  }
}

export default UserService;
