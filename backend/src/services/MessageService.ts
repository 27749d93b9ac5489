import { StoryDatabase } from '../database.js';
import { createLogger, NAMESPACES } from '../logging.js';

const messagesLog = createLogger(NAMESPACES.services.messages);

export type TurnRole = 'user' | 'assistant';

export interface TurnRecord {
  id: number;
  sessionId: string;
  role: TurnRole;
  content: string;
  createdAt: string;
}

interface MessageRow {
  id: number;
  session_id: string;
  role: TurnRole;
  content: string;
  created_at: string;
}

function toRecord(row: MessageRow): TurnRecord {
  return { id: row.id, sessionId: row.session_id, role: row.role, content: row.content, createdAt: row.created_at };
}

/**
 * Append-only audit log of chat turns. Records outlive the session that owns
 * them: archiving a session never deletes its messages.
 */
export class MessageService {
  constructor(private readonly db: StoryDatabase, private readonly now: () => Date = () => new Date()) {}

  logMessage(sessionId: string, role: TurnRole, content: string): TurnRecord {
    const createdAt = this.now().toISOString();
    const result = this.db
      .prepare('INSERT INTO chat_messages (session_id, role, content, created_at) VALUES (?, ?, ?, ?)')
      .run(sessionId, role, content, createdAt);
    const id = Number(result.lastInsertRowid);
    messagesLog('Logged %s message %d for session %s', role, id, sessionId);
    return { id, sessionId, role, content, createdAt };
  }

  /** Both sides of one turn, written together or not at all. */
  logExchange(sessionId: string, userInput: string, reply: string): [TurnRecord, TurnRecord] {
    const write = this.db.transaction((): [TurnRecord, TurnRecord] => [
      this.logMessage(sessionId, 'user', userInput),
      this.logMessage(sessionId, 'assistant', reply)
    ]);
    return write();
  }

  /** The last `limit` records of a session, oldest first. */
  getRecent(sessionId: string, limit: number): TurnRecord[] {
    if (limit <= 0) return [];
    return this.db
      .prepare<[string, number], MessageRow>(
        'SELECT * FROM chat_messages WHERE session_id = ? ORDER BY created_at DESC, id DESC LIMIT ?'
      )
      .all(sessionId, limit)
      .map(toRecord)
      .reverse();
  }
}

export default MessageService;
