import { randomUUID } from 'crypto';
import { StoryDatabase } from '../database.js';
import { ConflictError, NotFoundError } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { MessageService, TurnRecord } from './MessageService.js';

const sessionsLog = createLogger(NAMESPACES.services.sessions);

export interface StorySession {
  id: string;
  userId: string;
  bookId: string;
  currentStage: number;
  stageTurnCount: number;
  storyContext: string;
  isArchived: boolean;
  isCompleted: boolean;
  createdAt: string;
  updatedAt: string;
}

/** The progression fields a turn writes back, always together. */
export interface SessionProgress {
  currentStage: number;
  stageTurnCount: number;
  storyContext: string;
  isCompleted: boolean;
}

export interface StartOptions {
  archiveExisting?: boolean;
  initialContext: string;
  replayLimit: number;
}

export interface StartResult {
  session: StorySession;
  resumed: boolean;
  archivedSessionId?: string;
  history: TurnRecord[];
}

interface SessionRow {
  id: string;
  user_id: string;
  book_id: string;
  current_stage: number;
  stage_turn_count: number;
  story_context: string;
  is_archived: number;
  is_completed: number;
  created_at: string;
  updated_at: string;
}

function toSession(row: SessionRow): StorySession {
  return {
    id: row.id,
    userId: row.user_id,
    bookId: row.book_id,
    currentStage: row.current_stage,
    stageTurnCount: row.stage_turn_count,
    storyContext: row.story_context,
    isArchived: row.is_archived === 1,
    isCompleted: row.is_completed === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

/**
 * Session lifecycle per (user, book): NONE -> ACTIVE -> ARCHIVED. Sessions are
 * never deleted; restarting archives the active one.
 */
export class SessionService {
  constructor(
    private readonly db: StoryDatabase,
    private readonly messages: MessageService,
    private readonly now: () => Date = () => new Date()
  ) {}

  getById(sessionId: string): StorySession | undefined {
    const row = this.db.prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?').get(sessionId);
    return row ? toSession(row) : undefined;
  }

  /** A session is only visible to the user who owns it. */
  getForUser(sessionId: string, userId: string): StorySession {
    const session = this.getById(sessionId);
    if (!session || session.userId !== userId) {
      throw new NotFoundError(`Session ${sessionId} not found`);
    }
    return session;
  }

  findActive(userId: string, bookId: string): StorySession | undefined {
    const row = this.db
      .prepare<[string, string], SessionRow>('SELECT * FROM sessions WHERE user_id = ? AND book_id = ? AND is_archived = 0')
      .get(userId, bookId);
    return row ? toSession(row) : undefined;
  }

  check(userId: string, bookId: string): { exists: boolean; session?: StorySession } {
    const session = this.findActive(userId, bookId);
    return session ? { exists: true, session } : { exists: false };
  }

  create(userId: string, bookId: string, initialContext: string): StorySession {
    const id = randomUUID();
    const ts = this.now().toISOString();
    this.db
      .prepare(
        'INSERT INTO sessions (id, user_id, book_id, current_stage, stage_turn_count, story_context, is_archived, is_completed, created_at, updated_at) VALUES (?, ?, ?, 1, 0, ?, 0, 0, ?, ?)'
      )
      .run(id, userId, bookId, initialContext, ts, ts);
    sessionsLog('Created session %s for user=%s book=%s', id, userId, bookId);
    return {
      id,
      userId,
      bookId,
      currentStage: 1,
      stageTurnCount: 0,
      storyContext: initialContext,
      isArchived: false,
      isCompleted: false,
      createdAt: ts,
      updatedAt: ts
    };
  }

  archive(sessionId: string): boolean {
    const result = this.db
      .prepare('UPDATE sessions SET is_archived = 1, updated_at = ? WHERE id = ? AND is_archived = 0')
      .run(this.now().toISOString(), sessionId);
    if (result.changes > 0) sessionsLog('Archived session %s', sessionId);
    return result.changes > 0;
  }

  /**
   * Resume the active session for (user, book) or create one. With
   * archiveExisting the active session is archived first, so a fresh one is
   * always created. Archive and create run in one transaction.
   */
  start(userId: string, bookId: string, options: StartOptions): StartResult {
    const run = this.db.transaction((): { session: StorySession; resumed: boolean; archivedSessionId?: string } => {
      let archivedSessionId: string | undefined;
      const existing = this.findActive(userId, bookId);
      if (existing && options.archiveExisting) {
        this.archive(existing.id);
        archivedSessionId = existing.id;
      } else if (existing) {
        return { session: existing, resumed: true };
      }
      return { session: this.create(userId, bookId, options.initialContext), resumed: false, archivedSessionId };
    });

    const { session, resumed, archivedSessionId } = run();
    const history = resumed ? this.messages.getRecent(session.id, options.replayLimit) : [];
    return { session, resumed, archivedSessionId, history };
  }

  /**
   * The only mutation path for progression fields. The update is conditional on
   * the stage and turn counter the caller read, so a turn computed from stale
   * state changes nothing and raises ConflictError.
   */
  advance(session: StorySession, progress: SessionProgress): StorySession {
    if (progress.currentStage < session.currentStage) {
      throw new ConflictError('Stage cannot move backwards', `from ${session.currentStage} to ${progress.currentStage}`);
    }
    const ts = this.now().toISOString();
    const result = this.db
      .prepare(
        `UPDATE sessions
           SET current_stage = ?, stage_turn_count = ?, story_context = ?, is_completed = ?, updated_at = ?
         WHERE id = ? AND current_stage = ? AND stage_turn_count = ? AND is_archived = 0`
      )
      .run(
        progress.currentStage,
        progress.stageTurnCount,
        progress.storyContext,
        progress.isCompleted ? 1 : 0,
        ts,
        session.id,
        session.currentStage,
        session.stageTurnCount
      );

    if (result.changes === 0) {
      throw new ConflictError('Session changed since this turn started', `session ${session.id}`);
    }
    sessionsLog(
      'Session %s progressed stage %d/%d -> %d/%d',
      session.id,
      session.currentStage,
      session.stageTurnCount,
      progress.currentStage,
      progress.stageTurnCount
    );
    return { ...session, ...progress, updatedAt: ts };
  }
}

export default SessionService;
