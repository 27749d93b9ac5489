import * as nunjucks from 'nunjucks';
import { BaseAgent } from './BaseAgent.js';
import { ConfigManager } from '../configManager.js';
import { CallOptions, ChatMessage } from '../llm/types.js';
import { Stage } from '../services/BookService.js';
import { createLogger, NAMESPACES } from '../logging.js';

const storyBuddyLog = createLogger(NAMESPACES.agents.storyBuddy);

export interface StoryTurnContext {
  userInput: string;
  /** Windowed story context before this turn; the input arrives as the user message */
  storyContext: string;
  history: ChatMessage[];
  currentStage: Stage;
  nextStage?: Stage;
  stageCount: number;
  turnsElapsed: number;
  maxTurnsPerStage: number;
  sessionId?: string;
}

export interface StageWelcomeContext {
  storyContext: string;
  stage: Stage;
  stageCount: number;
  sessionId?: string;
}

/** The text-generation collaborator as the stage controller sees it. */
export interface StoryGenerator {
  generateTurn(context: StoryTurnContext, options?: CallOptions): Promise<string>;
  generateWelcome(context: StageWelcomeContext, options?: CallOptions): Promise<string>;
}

/**
 * How hard to steer toward finishing the page, by position in the stage:
 * brainstorm freely, then a gentle nudge on the turn before the ceiling, then
 * wrap up.
 */
export function nudgeInstruction(turnsElapsed: number, maxTurnsPerStage: number): string {
  if (turnsElapsed < maxTurnsPerStage - 1) {
    return "Just be a playful friend and brainstorm. Don't mention the template yet.";
  }
  if (turnsElapsed === maxTurnsPerStage - 1) {
    return "Give a gentle nudge like: 'That would look so cool on your storybook page! Do you want to write that bit down?'";
  }
  return "Tell them they've done a great job on this page and that it's time to see what happens next in the story.";
}

export class StoryBuddyAgent extends BaseAgent<StoryTurnContext> implements StoryGenerator {
  constructor(configManager: ConfigManager, env: nunjucks.Environment) {
    super('storyBuddy', configManager, env);
  }

  async run(context: StoryTurnContext, options: CallOptions = {}): Promise<string> {
    storyBuddyLog('Turn for stage %d/%d, %d turns elapsed', context.currentStage.stageNumber, context.stageCount, context.turnsElapsed);
    const systemPrompt = this.renderTemplate('storyBuddy', {
      storyContext: context.storyContext,
      currentStageNumber: context.currentStage.stageNumber,
      stageCount: context.stageCount,
      currentTheme: context.currentStage.theme,
      nextTheme: context.nextStage?.theme ?? 'the story is complete!',
      isFinalStage: !context.nextStage,
      turnsElapsed: context.turnsElapsed,
      maxTurns: context.maxTurnsPerStage,
      nudge: nudgeInstruction(context.turnsElapsed, context.maxTurnsPerStage)
    });

    const response = await this.callLLM(
      {
        systemPrompt,
        chatHistory: context.history,
        userInput: context.userInput,
        metadata: { sessionId: context.sessionId, stageNumber: context.currentStage.stageNumber }
      },
      options
    );
    return this.cleanResponse(response);
  }

  generateTurn(context: StoryTurnContext, options?: CallOptions): Promise<string> {
    return this.run(context, options);
  }

  /** Narration only: a welcoming line for a stage just reached. Carries no decision. */
  async generateWelcome(context: StageWelcomeContext, options: CallOptions = {}): Promise<string> {
    const systemPrompt = this.renderTemplate('stageWelcome', {
      storyContext: context.storyContext,
      stageNumber: context.stage.stageNumber,
      stageCount: context.stageCount,
      theme: context.stage.theme
    });
    const response = await this.callLLM(
      {
        systemPrompt,
        userInput: 'Welcome me to the next page of our story.',
        metadata: { sessionId: context.sessionId, stageNumber: context.stage.stageNumber }
      },
      options
    );
    return this.cleanResponse(response);
  }
}
