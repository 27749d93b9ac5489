import * as nunjucks from 'nunjucks';
import { MessageContext, ChatMessage } from './types.js';
import { createLogger, NAMESPACES } from '../logging.js';

const messagesLog = createLogger(NAMESPACES.llm.messages);

/**
 * Builds an OpenAI-compatible messages array: one system message, then the
 * recent turns with their own roles, then the author's input as the final user
 * message. Consecutive duplicates in history are dropped.
 */
export function buildOpenAIMessages(context: MessageContext): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: context.systemPrompt }];

  let previous: ChatMessage | undefined;
  for (const msg of context.chatHistory ?? []) {
    const content = msg.content.trim();
    if (!content) continue;
    if (previous && previous.role === msg.role && previous.content === content) continue;
    previous = { role: msg.role, content };
    messages.push(previous);
  }

  const input = context.userInput?.trim();
  if (input) {
    messages.push({ role: 'user', content: input });
  }

  messagesLog('Built %d messages (system length %d) for %s', messages.length, context.systemPrompt.length, context.metadata?.agentName ?? 'agent');
  return messages;
}

/**
 * Renders a raw completion template (ChatML, Mistral, ...) for custom profiles.
 * Templates live under llm_templates/ in the prompts directory.
 */
export function buildCustomTemplate(context: MessageContext, templateName: string, env: nunjucks.Environment): string {
  return env.render(`llm_templates/${templateName}.njk`, {
    messages: buildOpenAIMessages(context),
    systemPrompt: context.systemPrompt,
    userInput: context.userInput ?? '',
    metadata: context.metadata ?? {}
  });
}
