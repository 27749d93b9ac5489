import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { ServerSettings } from './configManager.js';
import { AppError, RequestAbortedError, UnauthorizedError, ValidationError, errorMessage } from './errors.js';
import { createLogger, NAMESPACES } from './logging.js';
import { StageController, TurnResult } from './agents/StageController.js';
import { LoginService } from './auth/loginService.js';
import { BookService, Book, Stage } from './services/BookService.js';
import { SessionService, StorySession } from './services/SessionService.js';
import { TurnRecord } from './services/MessageService.js';
import { User } from './services/UserService.js';

const httpLog = createLogger(NAMESPACES.server.http);

export interface AppDeps {
  controller: StageController;
  books: BookService;
  sessions: SessionService;
  login: LoginService;
  server: Pick<ServerSettings, 'corsOrigins'>;
}

const LoginBody = z.object({ credential: z.string().min(1) });

const StartBody = z.object({
  book_id: z.string().min(1),
  restart: z.boolean().optional()
});

const ChatBody = z.object({
  user_input: z.string().trim().min(1),
  current_stage: z.number().int().min(1),
  stage_turn_count: z.number().int().min(0),
  story_context: z.string(),
  book_id: z.string().min(1),
  session_id: z.string().min(1).optional()
});

const BookQuery = z.object({ book_id: z.string().min(1) });

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || what}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid ${what}`, issues);
  }
  return parsed.data;
}

type Handler = (req: Request, res: Response) => Promise<void> | void;

/** Express 4 does not forward rejected promises to the error middleware. */
const asyncHandler = (handler: Handler) => (req: Request, res: Response, next: NextFunction) => {
  Promise.resolve()
    .then(() => handler(req, res))
    .catch(next);
};

function bearerToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (!header) return undefined;
  const [scheme, token] = header.split(' ');
  if (scheme?.toLowerCase() !== 'bearer' || !token) {
    throw new UnauthorizedError('Malformed Authorization header');
  }
  return token;
}

function authenticatedUser(res: Response): string {
  const userId: unknown = res.locals.userId;
  if (typeof userId !== 'string') throw new UnauthorizedError();
  return userId;
}

function bookJson(book: Book) {
  return {
    id: book.id,
    title: book.title,
    description: book.description,
    cover_image_url: book.coverImageUrl,
    opening_line: book.openingLine
  };
}

function stageJson(stage: Stage) {
  return { book_id: stage.bookId, stage_number: stage.stageNumber, theme: stage.theme, image_url: stage.imageUrl };
}

function sessionJson(session: StorySession) {
  return {
    session_id: session.id,
    book_id: session.bookId,
    current_stage: session.currentStage,
    stage_turn_count: session.stageTurnCount,
    story_context: session.storyContext,
    is_completed: session.isCompleted,
    updated_at: session.updatedAt
  };
}

function userJson(user: User) {
  return { id: user.id, name: user.name, email: user.email, avatar: user.avatarUrl };
}

function historyJson(records: TurnRecord[]) {
  return records.map(r => ({ role: r.role, content: r.content, created_at: r.createdAt }));
}

function turnJson(result: TurnResult) {
  return {
    reply: result.reply,
    current_stage: result.currentStage,
    stage_turn_count: result.stageTurnCount,
    image_url: result.imageUrl,
    action: result.action,
    story_context: result.storyContext,
    emotion: result.emotion
  };
}

export function createApp(deps: AppDeps): express.Express {
  const { controller, books, sessions, login } = deps;
  const app = express();

  const origins = deps.server.corsOrigins;
  app.use(
    cors({
      origin: origins.length === 0 || origins.includes('*') ? '*' : origins,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Authorization', 'Content-Type']
    })
  );
  app.use(express.json({ limit: '1mb' }));
  app.use((req, res, next) => {
    const started = Date.now();
    res.on('finish', () => httpLog('%s %s -> %d (%dms)', req.method, req.path, res.statusCode, Date.now() - started));
    next();
  });

  const requireAuth = (req: Request, res: Response, next: NextFunction) => {
    try {
      const token = bearerToken(req);
      if (!token) throw new UnauthorizedError('Missing bearer token');
      res.locals.userId = login.authenticate(token);
      next();
    } catch (error) {
      next(error);
    }
  };

  app.get('/', (_req, res) => {
    res.json({ message: 'Story Buddy API is Active!' });
  });

  app.post('/auth/login', asyncHandler(async (req, res) => {
    const { credential } = parseWith(LoginBody, req.body, 'login request');
    const result = await login.login(credential);
    res.json({ token: result.token, user: userJson(result.user) });
  }));

  app.get('/books', requireAuth, (_req, res) => {
    res.json(books.listBooks().map(bookJson));
  });

  app.get('/books/:bookId/stages', requireAuth, (req, res) => {
    const book = books.requireBook(req.params.bookId);
    res.json(books.stagesFor(book.id).map(stageJson));
  });

  app.get('/sessions/check', requireAuth, (req, res) => {
    const { book_id } = parseWith(BookQuery, req.query, 'query');
    const result = sessions.check(authenticatedUser(res), book_id);
    res.json(result.session ? { exists: true, session: sessionJson(result.session) } : { exists: false });
  });

  app.post('/sessions/start', requireAuth, asyncHandler(async (req, res) => {
    const { book_id, restart } = parseWith(StartBody, req.body, 'start request');
    const started = await controller.startStory(authenticatedUser(res), book_id, { restart });
    res.json({
      session_id: started.session.id,
      reply: started.reply,
      current_stage: started.session.currentStage,
      stage_turn_count: started.session.stageTurnCount,
      story_context: started.session.storyContext,
      image_url: started.imageUrl,
      emotion: started.emotion,
      action: 'STAY',
      history: historyJson(started.history),
      resumed: started.resumed
    });
  }));

  app.get('/start', (req, res) => {
    const { book_id } = parseWith(BookQuery, req.query, 'query');
    const opening = controller.openingTurn(book_id);
    res.json({
      reply: opening.reply,
      current_stage: opening.currentStage,
      stage_turn_count: opening.stageTurnCount,
      story_context: opening.storyContext,
      image_url: opening.imageUrl,
      emotion: opening.emotion,
      action: 'STAY'
    });
  });

  app.post('/chat', asyncHandler(async (req, res) => {
    const body = parseWith(ChatBody, req.body, 'chat request');

    let userId: string | undefined;
    if (body.session_id !== undefined) {
      const token = bearerToken(req);
      if (!token) throw new UnauthorizedError('Missing bearer token');
      userId = login.authenticate(token);
    }

    const controllerAbort = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) controllerAbort.abort(new RequestAbortedError());
    };
    res.on('close', onClose);

    try {
      const result = await controller.processTurn({
        userInput: body.user_input,
        currentStage: body.current_stage,
        stageTurnCount: body.stage_turn_count,
        storyContext: body.story_context,
        bookId: body.book_id,
        sessionId: body.session_id,
        userId,
        signal: controllerAbort.signal
      });
      res.json(turnJson(result));
    } finally {
      res.off('close', onClose);
    }
  }));

  app.use((req, res) => {
    res.status(404).json({ error: `Cannot ${req.method} ${req.path}` });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RequestAbortedError) {
      httpLog('%s %s aborted by client', req.method, req.path);
      if (!res.headersSent && !res.writableEnded) res.status(err.status).end();
      return;
    }
    if (err instanceof AppError) {
      res.status(err.status).json(err.detail ? { error: err.message, detail: err.detail } : { error: err.message });
      return;
    }
    const status: unknown = typeof err === 'object' && err !== null ? Reflect.get(err, 'status') : undefined;
    if (typeof status === 'number' && status >= 400 && status < 500) {
      // body-parser failures (malformed JSON, payload too large)
      res.status(status).json({ error: errorMessage(err) });
      return;
    }
    console.error(`[SERVER] ${req.method} ${req.path} failed:`, err);
    res.status(500).json({ error: 'Internal Server Error' });
  });

  return app;
}

export default createApp;
