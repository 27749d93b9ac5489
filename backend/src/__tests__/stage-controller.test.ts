import { describe, it, expect, beforeEach, vi } from 'vitest';
import { StoryDatabase } from '../database.js';
import { DEFAULT_CONFIG, FeatureFlags, StoryPolicy } from '../configManager.js';
import { BookService } from '../services/BookService.js';
import { MessageService } from '../services/MessageService.js';
import { SessionService, StorySession } from '../services/SessionService.js';
import { BackgroundWrites } from '../jobs/backgroundWrites.js';
import { TurnLock } from '../utils/turnLock.js';
import { StageController, TurnRequest } from '../agents/StageController.js';
import { STORY_OPENING } from '../agents/context/contextBuilder.js';
import { ConflictError, NotFoundError, RequestAbortedError, ValidationError } from '../errors.js';
import { ScriptedGenerator, createTestDatabase, seedTestBook, transcriptOf } from './fixtures/story-db.js';

const policy: StoryPolicy = { ...DEFAULT_CONFIG.story };

describe('StageController', () => {
  let db: StoryDatabase;
  let books: BookService;
  let messages: MessageService;
  let sessions: SessionService;
  let writes: BackgroundWrites;
  let generator: ScriptedGenerator;

  function controller(features: Partial<FeatureFlags> = {}): StageController {
    return new StageController({
      books,
      sessions,
      messages,
      generator,
      writes,
      turnLock: new TurnLock(),
      policy,
      features: { twoPassWelcome: false, generationTimeoutMs: 1000, ...features }
    });
  }

  /** An active session for u1 positioned at the given stage and turn. */
  function sessionAt(stage: number, turns: number, storyContext = STORY_OPENING): StorySession {
    const created = sessions.start('u1', 'forest', { initialContext: STORY_OPENING, replayLimit: 20 }).session;
    return sessions.advance(created, { currentStage: stage, stageTurnCount: turns, storyContext, isCompleted: false });
  }

  function turn(session: StorySession, userInput: string, extra: Partial<TurnRequest> = {}): TurnRequest {
    return {
      userInput,
      bookId: session.bookId,
      currentStage: session.currentStage,
      stageTurnCount: session.stageTurnCount,
      storyContext: session.storyContext,
      sessionId: session.id,
      userId: session.userId,
      ...extra
    };
  }

  beforeEach(() => {
    db = createTestDatabase();
    books = seedTestBook(db, 'forest', 8);
    let tick = 0;
    const clock = () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
    messages = new MessageService(db, clock);
    sessions = new SessionService(db, messages, clock);
    writes = new BackgroundWrites();
    generator = new ScriptedGenerator();
  });

  describe('turn scenarios', () => {
    it('stays on the stage and counts the turn when the collaborator asks to stay', async () => {
      const session = sessionAt(3, 0);
      generator.push('Sam sounds brave! [STAY]');

      const result = await controller().processTurn(turn(session, 'the boy is Sam'));

      expect(result).toMatchObject({
        reply: 'Sam sounds brave!',
        action: 'STAY',
        currentStage: 3,
        stageTurnCount: 1,
        imageUrl: '/img/forest/3.jpg',
        emotion: 'HAPPY',
        failed: false
      });
      expect(result.storyContext).toBe(`${STORY_OPENING}\nAuthor: the boy is Sam`);
      expect(sessions.getById(session.id)).toMatchObject({
        currentStage: 3,
        stageTurnCount: 1,
        storyContext: `${STORY_OPENING}\nAuthor: the boy is Sam`
      });

      await writes.flush();
      expect(transcriptOf(db, session.id)).toEqual([
        ['user', 'the boy is Sam'],
        ['assistant', 'Sam sounds brave!']
      ]);
    });

    it('forces an advance at the turn ceiling despite a STAY marker', async () => {
      const session = sessionAt(3, 3);
      generator.push('Great! [STAY]');

      const result = await controller().processTurn(turn(session, 'the crow flies away'));

      expect(result).toMatchObject({ action: 'ADVANCE', reason: 'turn-ceiling', currentStage: 4, stageTurnCount: 0, reply: 'Great!' });
      expect(result.imageUrl).toBe('/img/forest/4.jpg');
      expect(result.storyContext).toBe(
        `${STORY_OPENING}\nAuthor: the crow flies away\nNarrator: A new page begins: Theme 4`
      );
      expect(sessions.getById(session.id)).toMatchObject({ currentStage: 4, stageTurnCount: 0 });
    });

    it('finishes on the last stage without looking up a stage after it', async () => {
      const session = sessionAt(8, 3);
      generator.push('[ADVANCE]');
      const stageAt = vi.spyOn(books, 'stageAt');
      const requireStage = vi.spyOn(books, 'requireStage');

      const result = await controller().processTurn(turn(session, 'and they all lived happily'));

      expect(result).toMatchObject({ action: 'FINISH', currentStage: 8, stageTurnCount: 0, reply: policy.closingRemark });
      expect(stageAt).not.toHaveBeenCalled();
      expect(requireStage).not.toHaveBeenCalled();
      expect(sessions.getById(session.id)).toMatchObject({ currentStage: 8, isCompleted: true });
    });

    it('holds the stage below the minimum gate even on an explicit completion signal', async () => {
      const session = sessionAt(2, 0);
      generator.push('Wonderful! [ADVANCE]');

      const result = await controller().processTurn(
        turn(session, 'I have finished writing this part in my template')
      );

      expect(result).toMatchObject({ action: 'STAY', reason: 'minimum-gate', currentStage: 2, stageTurnCount: 1 });
    });

    it('returns the fallback and changes nothing when the collaborator fails', async () => {
      const session = sessionAt(3, 1);
      generator.push(new Error('model unavailable'));

      const result = await controller().processTurn(turn(session, 'the boy is Sam'));

      expect(result).toEqual({
        reply: policy.fallbackReply,
        action: 'STAY',
        currentStage: 3,
        stageTurnCount: 1,
        storyContext: STORY_OPENING,
        imageUrl: '/img/forest/3.jpg',
        emotion: 'HAPPY',
        failed: true
      });
      expect(sessions.getById(session.id)).toMatchObject({ currentStage: 3, stageTurnCount: 1, storyContext: STORY_OPENING });
      await writes.flush();
      expect(transcriptOf(db, session.id)).toEqual([]);
    });

    it('returns the fallback and changes nothing when the collaborator replies with blank text', async () => {
      const session = sessionAt(1, 0);
      generator.push('   \n ');

      const result = await controller().processTurn(turn(session, 'the girl is Mia'));

      expect(result).toEqual({
        reply: policy.fallbackReply,
        action: 'STAY',
        currentStage: 1,
        stageTurnCount: 0,
        storyContext: STORY_OPENING,
        imageUrl: '/img/forest/1.jpg',
        emotion: 'HAPPY',
        failed: true
      });
      expect(sessions.getById(session.id)).toMatchObject({ currentStage: 1, stageTurnCount: 0, storyContext: STORY_OPENING });
      await writes.flush();
      expect(transcriptOf(db, session.id)).toEqual([]);
    });

    it('accepts a reply that is only a control marker', async () => {
      const session = sessionAt(3, 1);
      generator.push('[ADVANCE]');

      const result = await controller().processTurn(turn(session, 'next page'));

      expect(result).toMatchObject({ reply: '', action: 'ADVANCE', currentStage: 4, failed: false });
    });

    it('returns the fallback when the collaborator times out', async () => {
      const session = sessionAt(3, 1);
      let seen: AbortSignal | undefined;
      generator.push((_context, options) => {
        seen = options?.signal;
        return new Promise<string>(() => undefined);
      });

      const result = await controller({ generationTimeoutMs: 20 }).processTurn(turn(session, 'hello?'));

      expect(result.failed).toBe(true);
      expect(result.reply).toBe(policy.fallbackReply);
      expect(seen?.aborted).toBe(true);
      expect(sessions.getById(session.id)?.stageTurnCount).toBe(1);
    });
  });

  describe('collaborator input', () => {
    it('passes the stage themes, the prior context, the new input and deduplicated history', async () => {
      const session = sessionAt(3, 1);
      messages.logMessage(session.id, 'user', 'Sam');
      messages.logMessage(session.id, 'assistant', 'Hi Sam!');
      messages.logMessage(session.id, 'user', 'Leo');
      generator.push('Leo is a great name [STAY]');

      await controller().processTurn(turn(session, 'Leo'));

      const call = generator.turnCalls[0];
      expect(call.currentStage.theme).toBe('Theme 3');
      expect(call.nextStage?.theme).toBe('Theme 4');
      expect(call.stageCount).toBe(8);
      expect(call.turnsElapsed).toBe(1);
      expect(call.userInput).toBe('Leo');
      expect(call.storyContext).toBe(STORY_OPENING);
      expect(call.history).toEqual([
        { role: 'user', content: 'Sam' },
        { role: 'assistant', content: 'Hi Sam!' }
      ]);
    });

    it('reports the emotion found in the raw reply', async () => {
      const session = sessionAt(3, 1);
      generator.push('SURPRISED: A dragon?! [STAY]');
      const result = await controller().processTurn(turn(session, 'a dragon appears'));
      expect(result.emotion).toBe('SURPRISED');
      expect(result.reply).toBe('A dragon?!');
    });
  });

  describe('two-pass welcome', () => {
    it('appends the welcome for the new stage after the acknowledgement', async () => {
      const session = sessionAt(3, 1);
      generator.push('Yay! [ADVANCE]');
      generator.welcome = 'HAPPY: Welcome to page four! [STAY]';

      const result = await controller({ twoPassWelcome: true }).processTurn(turn(session, 'done with this page'));

      expect(result.reply).toBe('Yay!\n\nWelcome to page four!');
      expect(result.action).toBe('ADVANCE');
      expect(generator.welcomeCalls).toHaveLength(1);
      expect(generator.welcomeCalls[0].stage.stageNumber).toBe(4);
      expect(generator.welcomeCalls[0].storyContext).toBe(
        `${STORY_OPENING}\nAuthor: done with this page\nNarrator: A new page begins: Theme 4`
      );
    });

    it('keeps the decision when the welcome pass fails', async () => {
      const session = sessionAt(3, 1);
      generator.push('Yay! [ADVANCE]');
      generator.welcome = new Error('welcome failed');

      const result = await controller({ twoPassWelcome: true }).processTurn(turn(session, 'next please'));

      expect(result).toMatchObject({ reply: 'Yay!', action: 'ADVANCE', currentStage: 4, failed: false });
    });

    it('does not run on a stay', async () => {
      const session = sessionAt(3, 1);
      generator.push('Tell me more [STAY]');
      await controller({ twoPassWelcome: true }).processTurn(turn(session, 'hmm'));
      expect(generator.welcomeCalls).toHaveLength(0);
    });
  });

  describe('completed stories', () => {
    it('answers with the closing remark without calling the collaborator', async () => {
      const session = sessionAt(8, 3);
      generator.push('The end [ADVANCE]');
      const ctl = controller();
      const finished = await ctl.processTurn(turn(session, 'the end'));

      const after = sessions.getForUser(session.id, 'u1');
      const again = await ctl.processTurn(turn(after, 'more please'));

      expect(finished.reply).toBe(`The end\n\n${policy.closingRemark}`);
      expect(again).toMatchObject({ reply: policy.closingRemark, action: 'FINISH', currentStage: 8 });
      expect(generator.turnCalls).toHaveLength(1);
      expect(sessions.getById(session.id)?.updatedAt).toBe(after.updatedAt);
    });
  });

  describe('cancellation and conflicts', () => {
    it('persists nothing when the client goes away during generation', async () => {
      const session = sessionAt(3, 1);
      const client = new AbortController();
      generator.push(async () => {
        client.abort(new RequestAbortedError());
        return 'Too late [ADVANCE]';
      });

      await expect(
        controller().processTurn(turn(session, 'hello', { signal: client.signal }))
      ).rejects.toBeInstanceOf(RequestAbortedError);

      expect(sessions.getById(session.id)).toMatchObject({ currentStage: 3, stageTurnCount: 1 });
      await writes.flush();
      expect(transcriptOf(db, session.id)).toEqual([]);
    });

    it('rejects a turn sent with stale counters', async () => {
      const session = sessionAt(3, 1);
      await expect(
        controller().processTurn(turn(session, 'hi', { stageTurnCount: 0 }))
      ).rejects.toBeInstanceOf(ConflictError);
      expect(generator.turnCalls).toHaveLength(0);
    });

    it('rejects a concurrent turn for the same session', async () => {
      const session = sessionAt(3, 1);
      let release: (value: string) => void = () => undefined;
      generator.push(() => new Promise<string>(resolve => { release = resolve; }));
      const ctl = controller();

      const first = ctl.processTurn(turn(session, 'first'));
      await expect(ctl.processTurn(turn(session, 'second'))).rejects.toBeInstanceOf(ConflictError);

      release('Nice [STAY]');
      await expect(first).resolves.toMatchObject({ stageTurnCount: 2 });
    });

    it('hides sessions of other users', async () => {
      const session = sessionAt(3, 1);
      await expect(controller().processTurn(turn(session, 'hi', { userId: 'u2' }))).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects a turn for an archived session', async () => {
      const session = sessionAt(3, 1);
      sessions.archive(session.id);
      await expect(controller().processTurn(turn(session, 'hi'))).rejects.toBeInstanceOf(ConflictError);
    });

    it('rejects a book that does not match the session', async () => {
      seedTestBook(db, 'castle', 4);
      const session = sessionAt(3, 1);
      await expect(controller().processTurn(turn(session, 'hi', { bookId: 'castle' }))).rejects.toBeInstanceOf(ValidationError);
    });

    it('needs a user for a session turn', async () => {
      const session = sessionAt(3, 1);
      await expect(controller().processTurn(turn(session, 'hi', { userId: undefined }))).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('stateless turns', () => {
    it('uses the request state and persists nothing', async () => {
      generator.push('On we go [ADVANCE]');
      const result = await controller().processTurn({
        userInput: 'Sam and Leo',
        bookId: 'forest',
        currentStage: 2,
        stageTurnCount: 1,
        storyContext: 'Narrator: The story begins.'
      });

      expect(result).toMatchObject({ action: 'ADVANCE', currentStage: 3, stageTurnCount: 0 });
      expect(generator.turnCalls[0].history).toEqual([]);
      expect(sessions.check('u1', 'forest')).toEqual({ exists: false });
    });

    it('rejects a stage the book does not have', async () => {
      await expect(
        controller().processTurn({ userInput: 'hi', bookId: 'forest', currentStage: 9, stageTurnCount: 0, storyContext: '' })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects an unknown book', async () => {
      await expect(
        controller().processTurn({ userInput: 'hi', bookId: 'nope', currentStage: 1, stageTurnCount: 0, storyContext: '' })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it('never moves a persisted session backwards over a whole story', async () => {
    const markers = ['[STAY]', '[ADVANCE]', '', '[ADVANCE]', '[STAY]', '[STAY]', '[STAY]'];
    const ctl = controller();
    let session = sessionAt(1, 0);
    let lastStage = 1;

    for (let i = 0; i < 60; i++) {
      generator.push(`Turn ${i} ${markers[i % markers.length]}`);
      const result = await ctl.processTurn(turn(session, `idea ${i}`));
      expect(result.currentStage).toBeGreaterThanOrEqual(lastStage);
      lastStage = result.currentStage;
      session = sessions.getForUser(session.id, 'u1');
      if (result.action === 'FINISH') break;
    }

    expect(session.isCompleted).toBe(true);
    expect(session.currentStage).toBe(8);
  });

  describe('startStory', () => {
    it('opens a new session with the book opening line', async () => {
      const started = await controller().startStory('u1', 'forest');
      expect(started).toMatchObject({
        reply: 'Hello author! Who is in our story?',
        imageUrl: '/img/forest/1.jpg',
        emotion: 'HAPPY',
        resumed: false,
        history: []
      });
      expect(started.session.storyContext).toBe(STORY_OPENING);
    });

    it('resumes with the transcript written so far', async () => {
      const ctl = controller();
      const started = await ctl.startStory('u1', 'forest');
      generator.push('Hi Sam! [STAY]');
      await ctl.processTurn(turn(started.session, 'Sam'));

      const resumed = await ctl.startStory('u1', 'forest');

      expect(resumed.resumed).toBe(true);
      expect(resumed.reply).toBe(policy.resumeReply);
      expect(resumed.session.stageTurnCount).toBe(1);
      expect(resumed.history.map(r => r.content)).toEqual(['Sam', 'Hi Sam!']);
    });

    it('starts over on restart', async () => {
      const ctl = controller();
      const first = await ctl.startStory('u1', 'forest');
      const second = await ctl.startStory('u1', 'forest', { restart: true });
      expect(second.resumed).toBe(false);
      expect(second.session.id).not.toBe(first.session.id);
      expect(sessions.getById(first.session.id)?.isArchived).toBe(true);
    });

    it('rejects an unknown book', async () => {
      await expect(controller().startStory('u1', 'nope')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it('openingTurn describes stage 1 without a session', () => {
    expect(controller().openingTurn('forest')).toEqual({
      reply: 'Hello author! Who is in our story?',
      currentStage: 1,
      stageTurnCount: 0,
      storyContext: STORY_OPENING,
      imageUrl: '/img/forest/1.jpg',
      emotion: 'HAPPY'
    });
  });
});
