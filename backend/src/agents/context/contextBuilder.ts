import { ChatMessage } from '../../llm/types.js';
import { TurnRecord } from '../../services/MessageService.js';

/**
 * Speaker labels in the story context. `Author` is the child's literal words,
 * `Narrator` is narrative description (stage openings). The labels keep the
 * author apart from characters in the story.
 */
export type ContextLabel = 'Author' | 'Narrator';

export const CONTEXT_SEPARATOR = '\n';
export const STORY_OPENING = 'Narrator: The story begins.';

/**
 * Append one labelled entry. The result always starts with `context`; earlier
 * content is never rewritten. Whitespace inside the entry collapses so each
 * entry stays on one line.
 */
export function appendToContext(context: string, label: ContextLabel, text: string): string {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (!normalized) return context;
  const entry = `${label}: ${normalized}`;
  return context ? `${context}${CONTEXT_SEPARATOR}${entry}` : entry;
}

export function contextEntries(context: string): string[] {
  return context.split(CONTEXT_SEPARATOR).filter(line => line.trim().length > 0);
}

/** Last `maxEntries` entries, for the prompt. Storage keeps everything. */
export function windowContext(context: string, maxEntries: number): string {
  if (maxEntries <= 0) return '';
  return contextEntries(context).slice(-maxEntries).join(CONTEXT_SEPARATOR);
}

/**
 * Drop the just-submitted input from recent history so the collaborator does
 * not see it twice. Only user records after the last assistant reply are
 * candidates; an earlier turn that happens to repeat the words stays.
 */
export function dedupeHistory(history: TurnRecord[], userInput: string): TurnRecord[] {
  const input = userInput.trim();
  if (!input) return history;

  let lastAssistant = -1;
  history.forEach((record, index) => {
    if (record.role === 'assistant') lastAssistant = index;
  });

  return history.filter((record, index) =>
    !(index > lastAssistant && record.role === 'user' && record.content.trim() === input)
  );
}

export function toChatHistory(records: TurnRecord[]): ChatMessage[] {
  return records
    .filter(record => record.content.trim().length > 0)
    .map(record => ({ role: record.role, content: record.content }));
}
