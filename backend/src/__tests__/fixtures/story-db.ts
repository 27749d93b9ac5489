/**
 * In-memory story database and a scripted generator for controller tests.
 */
import { openDatabase, StoryDatabase } from '../../database.js';
import { BookService, BookFile } from '../../services/BookService.js';
import { StageWelcomeContext, StoryGenerator, StoryTurnContext } from '../../agents/StoryBuddyAgent.js';
import { CallOptions } from '../../llm/types.js';

export function createTestDatabase(): StoryDatabase {
  return openDatabase(':memory:');
}

export function makeBook(id: string, stageCount: number): BookFile {
  return {
    id,
    title: `Book ${id}`,
    description: 'A test book',
    openingLine: 'Hello author! Who is in our story?',
    stages: Array.from({ length: stageCount }, (_, i) => ({
      stageNumber: i + 1,
      theme: `Theme ${i + 1}`,
      imageUrl: `/img/${id}/${i + 1}.jpg`
    }))
  };
}

export function seedTestBook(db: StoryDatabase, id = 'forest', stageCount = 8): BookService {
  const books = new BookService(db);
  books.insertBook(makeBook(id, stageCount));
  return books;
}

type TurnScript = string | Error | ((context: StoryTurnContext, options?: CallOptions) => Promise<string>);

/** Replies to turns from a queue; welcome passes use `welcome`. */
export class ScriptedGenerator implements StoryGenerator {
  readonly turnCalls: StoryTurnContext[] = [];
  readonly welcomeCalls: StageWelcomeContext[] = [];
  welcome: string | Error = 'Welcome to the next page! [STAY]';

  constructor(private readonly script: TurnScript[] = []) {}

  push(...items: TurnScript[]): this {
    this.script.push(...items);
    return this;
  }

  async generateTurn(context: StoryTurnContext, options?: CallOptions): Promise<string> {
    this.turnCalls.push(context);
    const next = this.script.shift();
    if (next === undefined) throw new Error('No scripted reply left');
    if (next instanceof Error) throw next;
    if (typeof next === 'function') return next(context, options);
    return next;
  }

  async generateWelcome(context: StageWelcomeContext): Promise<string> {
    this.welcomeCalls.push(context);
    if (this.welcome instanceof Error) throw this.welcome;
    return this.welcome;
  }
}

/** Logged turns of a session as [role, content] pairs, in write order. */
export function transcriptOf(db: StoryDatabase, sessionId: string): Array<[string, string]> {
  return db
    .prepare<[string], { role: string; content: string }>(
      'SELECT role, content FROM chat_messages WHERE session_id = ? ORDER BY created_at, id'
    )
    .all(sessionId)
    .map(row => [row.role, row.content]);
}
