import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type StoryDatabase = Database.Database;

/**
 * Schema for the record store. Stages are keyed by (book_id, stage_number),
 * sessions by (user_id, book_id, is_archived) and chat messages by session in
 * creation order. The partial unique index keeps at most one non-archived
 * session per (user, book).
 */
export function initializeSchema(db: StoryDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      email TEXT NOT NULL UNIQUE,
      name TEXT,
      avatar_url TEXT,
      last_login TEXT
    );

    CREATE TABLE IF NOT EXISTS books (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      description TEXT,
      cover_image_url TEXT,
      opening_line TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS story_stages (
      book_id TEXT NOT NULL REFERENCES books(id) ON DELETE CASCADE,
      stage_number INTEGER NOT NULL CHECK (stage_number >= 1),
      theme TEXT NOT NULL,
      image_url TEXT NOT NULL,
      PRIMARY KEY (book_id, stage_number)
    );

    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      book_id TEXT NOT NULL REFERENCES books(id),
      current_stage INTEGER NOT NULL DEFAULT 1 CHECK (current_stage >= 1),
      stage_turn_count INTEGER NOT NULL DEFAULT 0 CHECK (stage_turn_count >= 0),
      story_context TEXT NOT NULL DEFAULT '',
      is_archived INTEGER NOT NULL DEFAULT 0,
      is_completed INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_sessions_active
      ON sessions (user_id, book_id) WHERE is_archived = 0;

    CREATE TABLE IF NOT EXISTS chat_messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id TEXT NOT NULL REFERENCES sessions(id),
      role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
      content TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_chat_messages_session
      ON chat_messages (session_id, created_at, id);
  `);
}

/**
 * Open (creating if needed) the database at dbPath. Built once at process start
 * and injected into the services.
 */
export function openDatabase(dbPath: string): StoryDatabase {
  if (dbPath !== ':memory:') {
    // Ensure parent directories exist to avoid disk I/O errors on first run
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('foreign_keys = ON');

  if (dbPath !== ':memory:') {
    try {
      db.pragma('journal_mode = WAL');
    } catch (e) {
      console.warn('Failed to enable WAL, continuing with default mode:', e instanceof Error ? e.message : String(e));
    }
  }

  initializeSchema(db);
  return db;
}
