import { BookService, Stage } from '../services/BookService.js';
import { MessageService, TurnRecord } from '../services/MessageService.js';
import { SessionService, StorySession } from '../services/SessionService.js';
import { BackgroundWrites } from '../jobs/backgroundWrites.js';
import { TurnLock } from '../utils/turnLock.js';
import { withDeadline } from '../utils/abort.js';
import { FeatureFlags, StoryPolicy } from '../configManager.js';
import { ConflictError, GenerationError, NotFoundError, RequestAbortedError, ValidationError, errorMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { StoryGenerator } from './StoryBuddyAgent.js';
import { AdvancementReason, StageAction, applyDecision, decideAdvancement } from './advancement.js';
import { Emotion, extractEmotion, parseControlMarker, sanitizeReply } from './responseSanitizer.js';
import {
  STORY_OPENING,
  appendToContext,
  dedupeHistory,
  toChatHistory,
  windowContext
} from './context/contextBuilder.js';

const controllerLog = createLogger(NAMESPACES.agents.controller);

export interface StageControllerDeps {
  books: BookService;
  sessions: SessionService;
  messages: MessageService;
  generator: StoryGenerator;
  writes: BackgroundWrites;
  turnLock: TurnLock;
  policy: StoryPolicy;
  features: FeatureFlags;
}

/** What the client believes the story state is when it sends a turn. */
export interface ClientTurnState {
  bookId: string;
  currentStage: number;
  stageTurnCount: number;
  storyContext: string;
}

export interface TurnRequest extends ClientTurnState {
  userInput: string;
  /** Persisted mode: both set. Stateless mode: neither. */
  sessionId?: string;
  userId?: string;
  signal?: AbortSignal;
}

export interface TurnResult {
  reply: string;
  currentStage: number;
  stageTurnCount: number;
  storyContext: string;
  imageUrl: string;
  action: StageAction;
  emotion: Emotion;
  reason?: AdvancementReason;
  /** True when the collaborator failed and the fallback apology was returned. */
  failed: boolean;
}

export interface StartStoryResult {
  session: StorySession;
  reply: string;
  imageUrl: string;
  emotion: Emotion;
  resumed: boolean;
  history: TurnRecord[];
}

export interface OpeningTurn {
  reply: string;
  currentStage: number;
  stageTurnCount: number;
  storyContext: string;
  imageUrl: string;
  emotion: Emotion;
}

/**
 * Runs one turn of the stage machine: reads state, calls the collaborator,
 * decides the transition and persists the result. Progression fields change
 * only here and only through SessionService.advance.
 */
export class StageController {
  constructor(private readonly deps: StageControllerDeps) {}

  async processTurn(request: TurnRequest): Promise<TurnResult> {
    if (request.sessionId === undefined) {
      return this.runTurn(request, undefined);
    }
    if (request.userId === undefined) {
      throw new ValidationError('A session turn needs an authenticated user');
    }

    const { sessionId, userId } = request;
    return this.deps.turnLock.runExclusive(sessionId, async () => {
      const session = this.deps.sessions.getForUser(sessionId, userId);
      if (session.isArchived) {
        throw new ConflictError('Session has been archived', `session ${session.id}`);
      }
      if (session.bookId !== request.bookId) {
        throw new ValidationError('book_id does not match the session', `session book is ${session.bookId}`);
      }
      if (session.currentStage !== request.currentStage || session.stageTurnCount !== request.stageTurnCount) {
        throw new ConflictError(
          'Client state is out of date',
          `server is at stage ${session.currentStage} turn ${session.stageTurnCount}`
        );
      }
      return this.runTurn(
        {
          ...request,
          currentStage: session.currentStage,
          stageTurnCount: session.stageTurnCount,
          storyContext: session.storyContext
        },
        session
      );
    });
  }

  private async runTurn(request: TurnRequest, session: StorySession | undefined): Promise<TurnResult> {
    const { books, policy, features, generator } = this.deps;
    books.requireBook(request.bookId);

    const stages = books.stagesFor(request.bookId);
    const current = stages.find(s => s.stageNumber === request.currentStage);
    if (!current) {
      throw new NotFoundError(`Stage ${request.currentStage} of book ${request.bookId} not found`);
    }
    const next = stages.find(s => s.stageNumber === request.currentStage + 1);

    if (session?.isCompleted) {
      return {
        reply: policy.closingRemark,
        currentStage: session.currentStage,
        stageTurnCount: session.stageTurnCount,
        storyContext: session.storyContext,
        imageUrl: current.imageUrl,
        action: 'FINISH',
        emotion: 'HAPPY',
        failed: false
      };
    }

    const history = session
      ? toChatHistory(dedupeHistory(this.deps.messages.getRecent(session.id, policy.historyWindowMessages), request.userInput))
      : [];
    const contextWithInput = appendToContext(request.storyContext, 'Author', request.userInput);

    let raw: string;
    try {
      raw = await withDeadline(
        signal =>
          generator.generateTurn(
            {
              userInput: request.userInput,
              storyContext: windowContext(request.storyContext, policy.contextWindowEntries),
              history,
              currentStage: current,
              nextStage: next,
              stageCount: stages.length,
              turnsElapsed: request.stageTurnCount,
              maxTurnsPerStage: policy.maxTurnsPerStage,
              sessionId: session?.id
            },
            { signal }
          ),
        features.generationTimeoutMs,
        request.signal
      );
      if (!raw.trim()) throw new GenerationError('Collaborator returned an empty reply');
    } catch (error) {
      if (request.signal?.aborted) throw new RequestAbortedError();
      controllerLog('Generation failed for %s stage %d: %s', session?.id ?? 'stateless', current.stageNumber, errorMessage(error));
      return {
        reply: policy.fallbackReply,
        currentStage: request.currentStage,
        stageTurnCount: request.stageTurnCount,
        storyContext: request.storyContext,
        imageUrl: current.imageUrl,
        action: 'STAY',
        emotion: 'HAPPY',
        failed: true
      };
    }

    const marker = parseControlMarker(raw);
    const decision = decideAdvancement(
      {
        userInput: request.userInput,
        turnsElapsed: request.stageTurnCount,
        nextStageExists: next !== undefined,
        marker
      },
      policy
    );
    controllerLog(
      'Turn %s stage %d turns %d marker %s -> %s (%s)',
      session?.id ?? 'stateless',
      current.stageNumber,
      request.stageTurnCount,
      marker,
      decision.action,
      decision.reason
    );

    const acknowledgement = sanitizeReply(raw);
    const emotion = extractEmotion(raw);
    const state = applyDecision(
      { currentStage: request.currentStage, turnsElapsed: request.stageTurnCount, finished: false },
      decision.action
    );

    let reply = acknowledgement;
    let storyContext = contextWithInput;
    let shownStage: Stage = current;

    if (decision.action === 'ADVANCE' && next) {
      shownStage = next;
      storyContext = appendToContext(storyContext, 'Narrator', `A new page begins: ${next.theme}`);
      if (features.twoPassWelcome) {
        const welcome = await this.welcomeFor(storyContext, next, stages.length, session?.id, request.signal);
        if (welcome) reply = reply ? `${reply}\n\n${welcome}` : welcome;
      }
    } else if (decision.action === 'FINISH') {
      reply = reply ? `${reply}\n\n${policy.closingRemark}` : policy.closingRemark;
    }

    if (request.signal?.aborted) throw new RequestAbortedError();

    if (session) {
      this.deps.sessions.advance(session, {
        currentStage: state.currentStage,
        stageTurnCount: state.turnsElapsed,
        storyContext,
        isCompleted: state.finished
      });
      this.scheduleTranscript(session.id, request.userInput, reply);
    }

    return {
      reply,
      currentStage: state.currentStage,
      stageTurnCount: state.turnsElapsed,
      storyContext,
      imageUrl: shownStage.imageUrl,
      action: decision.action,
      emotion,
      reason: decision.reason,
      failed: false
    };
  }

  /** The second pass only narrates; a failure leaves the acknowledgement alone. */
  private async welcomeFor(
    storyContext: string,
    stage: Stage,
    stageCount: number,
    sessionId: string | undefined,
    parent: AbortSignal | undefined
  ): Promise<string> {
    const { generator, policy, features } = this.deps;
    try {
      const raw = await withDeadline(
        signal =>
          generator.generateWelcome(
            { storyContext: windowContext(storyContext, policy.contextWindowEntries), stage, stageCount, sessionId },
            { signal }
          ),
        features.generationTimeoutMs,
        parent
      );
      return sanitizeReply(raw);
    } catch (error) {
      if (parent?.aborted) throw new RequestAbortedError();
      controllerLog('Welcome pass failed for stage %d: %s', stage.stageNumber, errorMessage(error));
      return '';
    }
  }

  private scheduleTranscript(sessionId: string, userInput: string, reply: string): void {
    const { writes, messages } = this.deps;
    writes.schedule(`transcript:${sessionId}`, () => {
      messages.logExchange(sessionId, userInput, reply);
    });
  }

  /**
   * Resume the active session or start a fresh one. Outstanding transcript
   * writes are flushed first so the replayed history includes them.
   */
  async startStory(userId: string, bookId: string, options: { restart?: boolean } = {}): Promise<StartStoryResult> {
    const book = this.deps.books.requireBook(bookId);
    await this.deps.writes.flush();

    const { session, resumed, history } = this.deps.sessions.start(userId, bookId, {
      archiveExisting: options.restart === true,
      initialContext: STORY_OPENING,
      replayLimit: this.deps.policy.replayLimit
    });
    const stage = this.deps.books.requireStage(bookId, session.currentStage);

    controllerLog('%s session %s for user %s book %s', resumed ? 'Resumed' : 'Started', session.id, userId, bookId);
    return {
      session,
      reply: resumed ? this.deps.policy.resumeReply : book.openingLine,
      imageUrl: stage.imageUrl,
      emotion: 'HAPPY',
      resumed,
      history
    };
  }

  /** Stage-1 opening for clients that keep their own state. */
  openingTurn(bookId: string): OpeningTurn {
    const book = this.deps.books.requireBook(bookId);
    const stage = this.deps.books.requireStage(bookId, 1);
    return {
      reply: book.openingLine,
      currentStage: 1,
      stageTurnCount: 0,
      storyContext: STORY_OPENING,
      imageUrl: stage.imageUrl,
      emotion: 'HAPPY'
    };
  }
}

export default StageController;
