/**
 * Chat message format for LLM APIs
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Structured prompt context, kept apart from formatting so it can be built into
 * OpenAI messages or rendered through a raw completion template.
 */
export interface MessageContext {
  /** Rendered system prompt for the agent (role, story state, rules) */
  systemPrompt: string;

  /** Recent role-tagged turns, oldest first, already deduplicated */
  chatHistory?: ChatMessage[];

  /** The author's input for this turn */
  userInput?: string;

  metadata?: {
    agentName?: string;
    sessionId?: string;
    stageNumber?: number;
  };
}

export interface CallOptions {
  signal?: AbortSignal;
}
