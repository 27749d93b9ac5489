import { encode } from 'gpt-tokenizer';
import { ChatMessage } from '../llm/types.js';

/**
 * Count tokens with the GPT tokenizer.
 * Falls back to ~4 characters per token if tokenization fails.
 */
export function countTokens(text: string): number {
  if (!text) return 0;

  try {
    return encode(text).length;
  } catch (error) {
    console.warn('Tokenization failed, using fallback estimation:', error);
    return Math.max(1, Math.round(text.length / 4));
  }
}

/** Content tokens of a prompt; role framing is not counted. */
export function countMessageTokens(messages: ChatMessage[]): number {
  return messages.reduce((total, message) => total + countTokens(message.content), 0);
}
