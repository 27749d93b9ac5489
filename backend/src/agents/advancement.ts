import { ControlMarker } from './responseSanitizer.js';

export type StageAction = 'STAY' | 'ADVANCE' | 'FINISH';

export type AdvancementReason =
  | 'completion-signal'
  | 'minimum-gate'
  | 'turn-ceiling'
  | 'marker-advance'
  | 'marker-stay';

export interface AdvancementPolicy {
  minTurnsBeforeAdvance: number;
  maxTurnsPerStage: number;
  completionPhrases: string[];
}

export interface AdvancementInput {
  userInput: string;
  turnsElapsed: number;
  nextStageExists: boolean;
  marker: ControlMarker;
}

export interface AdvancementDecision {
  action: StageAction;
  reason: AdvancementReason;
}

export interface StageState {
  currentStage: number;
  turnsElapsed: number;
  finished: boolean;
}

export function matchesCompletionPhrase(userInput: string, phrases: string[]): boolean {
  const lowered = userInput.toLowerCase();
  return phrases.some(phrase => phrase.trim().length > 0 && lowered.includes(phrase.trim().toLowerCase()));
}

/**
 * Decide the transition for one turn. Rules are checked in order, first match
 * wins:
 *  1. the author's completion phrase asks to advance (still subject to 2),
 *  2. below the minimum turn count the stage never advances,
 *  3. at the turn ceiling the stage always advances,
 *  4. otherwise the collaborator's marker decides.
 * An advance on the last stage finishes the story.
 */
export function decideAdvancement(input: AdvancementInput, policy: AdvancementPolicy): AdvancementDecision {
  const advance = (reason: AdvancementReason): AdvancementDecision => ({
    action: input.nextStageExists ? 'ADVANCE' : 'FINISH',
    reason
  });
  const belowGate = input.turnsElapsed < policy.minTurnsBeforeAdvance;

  if (matchesCompletionPhrase(input.userInput, policy.completionPhrases)) {
    return belowGate ? { action: 'STAY', reason: 'minimum-gate' } : advance('completion-signal');
  }
  if (belowGate) {
    return { action: 'STAY', reason: 'minimum-gate' };
  }
  if (input.turnsElapsed >= policy.maxTurnsPerStage) {
    return advance('turn-ceiling');
  }
  if (input.marker === 'ADVANCE') {
    return advance('marker-advance');
  }
  return { action: 'STAY', reason: 'marker-stay' };
}

/** Stage and counter after applying a decision. The stage only moves forward. */
export function applyDecision(state: StageState, action: StageAction): StageState {
  switch (action) {
    case 'STAY':
      return { ...state, turnsElapsed: state.turnsElapsed + 1 };
    case 'ADVANCE':
      return { currentStage: state.currentStage + 1, turnsElapsed: 0, finished: false };
    case 'FINISH':
      return { currentStage: state.currentStage, turnsElapsed: 0, finished: true };
  }
}
