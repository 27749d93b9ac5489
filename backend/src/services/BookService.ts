import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { StoryDatabase } from '../database.js';
import { NotFoundError } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';

const booksLog = createLogger(NAMESPACES.services.books);

export interface Book {
  id: string;
  title: string;
  description: string | null;
  coverImageUrl: string | null;
  openingLine: string;
}

export interface Stage {
  bookId: string;
  stageNumber: number;
  theme: string;
  imageUrl: string;
}

interface BookRow {
  id: string;
  title: string;
  description: string | null;
  cover_image_url: string | null;
  opening_line: string;
}

interface StageRow {
  book_id: string;
  stage_number: number;
  theme: string;
  image_url: string;
}

export const BookFileSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  description: z.string().optional(),
  coverImageUrl: z.string().optional(),
  openingLine: z.string().min(1),
  stages: z.array(z.object({
    stageNumber: z.number().int().min(1),
    theme: z.string().min(1),
    imageUrl: z.string().min(1)
  })).min(1)
}).superRefine((book, ctx) => {
  // The controller walks stages by n + 1, so numbering must be 1..N without gaps
  const numbers = book.stages.map(s => s.stageNumber).sort((a, b) => a - b);
  numbers.forEach((n, i) => {
    if (n !== i + 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['stages'], message: `stage numbers must run 1..${numbers.length} without gaps` });
    }
  });
});

export type BookFile = z.infer<typeof BookFileSchema>;

function toBook(row: BookRow): Book {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    coverImageUrl: row.cover_image_url,
    openingLine: row.opening_line
  };
}

function toStage(row: StageRow): Stage {
  return { bookId: row.book_id, stageNumber: row.stage_number, theme: row.theme, imageUrl: row.image_url };
}

/**
 * Read-only stage catalog. Stages are authored elsewhere (or seeded from JSON
 * files) and shared across every session of a book.
 */
export class BookService {
  constructor(private readonly db: StoryDatabase) {}

  listBooks(): Book[] {
    return this.db.prepare<[], BookRow>('SELECT * FROM books ORDER BY title').all().map(toBook);
  }

  getBook(bookId: string): Book | undefined {
    const row = this.db.prepare<[string], BookRow>('SELECT * FROM books WHERE id = ?').get(bookId);
    return row ? toBook(row) : undefined;
  }

  requireBook(bookId: string): Book {
    const book = this.getBook(bookId);
    if (!book) throw new NotFoundError(`Book ${bookId} not found`);
    return book;
  }

  stagesFor(bookId: string): Stage[] {
    return this.db
      .prepare<[string], StageRow>('SELECT * FROM story_stages WHERE book_id = ? ORDER BY stage_number')
      .all(bookId)
      .map(toStage);
  }

  stageAt(bookId: string, stageNumber: number): Stage | undefined {
    const row = this.db
      .prepare<[string, number], StageRow>('SELECT * FROM story_stages WHERE book_id = ? AND stage_number = ?')
      .get(bookId, stageNumber);
    return row ? toStage(row) : undefined;
  }

  requireStage(bookId: string, stageNumber: number): Stage {
    const stage = this.stageAt(bookId, stageNumber);
    if (!stage) throw new NotFoundError(`Stage ${stageNumber} of book ${bookId} not found`);
    return stage;
  }

  /** Insert a book with its stages. Returns false when the book already exists. */
  insertBook(book: BookFile): boolean {
    const insert = this.db.transaction((b: BookFile) => {
      const exists = this.db.prepare<[string], { id: string }>('SELECT id FROM books WHERE id = ?').get(b.id);
      if (exists) return false;
      this.db
        .prepare('INSERT INTO books (id, title, description, cover_image_url, opening_line) VALUES (?, ?, ?, ?, ?)')
        .run(b.id, b.title, b.description ?? null, b.coverImageUrl ?? null, b.openingLine);
      const stageStmt = this.db.prepare('INSERT INTO story_stages (book_id, stage_number, theme, image_url) VALUES (?, ?, ?, ?)');
      for (const stage of b.stages) {
        stageStmt.run(b.id, stage.stageNumber, stage.theme, stage.imageUrl);
      }
      return true;
    });
    return insert(book);
  }

  /** Load every *.json book file in dir. Existing books are left untouched. */
  seedFromDirectory(dir: string): number {
    if (!fs.existsSync(dir)) {
      booksLog('WARN: books directory %s does not exist, nothing seeded', dir);
      return 0;
    }
    let inserted = 0;
    const files = fs.readdirSync(dir).filter(f => f.endsWith('.json')).sort();
    for (const file of files) {
      const raw: unknown = JSON.parse(fs.readFileSync(path.join(dir, file), 'utf-8'));
      const parsed = BookFileSchema.safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid book file ${file}: ${issues}`);
      }
      if (this.insertBook(parsed.data)) {
        inserted += 1;
        booksLog('Seeded book %s with %d stages', parsed.data.id, parsed.data.stages.length);
      }
    }
    return inserted;
  }
}

export default BookService;
