import OpenAI from 'openai';
import { LLMProfile } from '../configManager.js';
import { countMessageTokens, countTokens } from '../utils/tokenCounter.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { errorMessage } from '../errors.js';
import { buildOpenAIMessages } from './messageBuilder.js';
import { ChatMessage, MessageContext } from './types.js';

export type { ChatMessage } from './types.js';

const llmLog = createLogger(NAMESPACES.llm.client);

// Retry configuration
const MAX_RETRIES = 3;
const INITIAL_BACKOFF_MS = 1000;
const BACKOFF_MULTIPLIER = 2;

// Retryable error codes (network, rate limit, temporary server errors)
const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];
const RETRYABLE_NETWORK_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT'];

export interface ChatCompletionOptions {
  fallbackProfiles?: LLMProfile[];
  signal?: AbortSignal;
}

function readProperty(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) return undefined;
  const value: unknown = Reflect.get(error, key);
  return value;
}

export function isRetryableError(error: unknown): boolean {
  if (!error || error instanceof OpenAI.APIUserAbortError) return false;
  if (error instanceof OpenAI.APIConnectionError) return true;

  const code = readProperty(error, 'code');
  if (typeof code === 'string' && RETRYABLE_NETWORK_CODES.includes(code)) return true;

  const status = readProperty(error, 'status');
  return typeof status === 'number' && RETRYABLE_STATUS_CODES.includes(status);
}

function calculateBackoff(retryCount: number): number {
  return INITIAL_BACKOFF_MS * Math.pow(BACKOFF_MULTIPLIER, retryCount);
}

async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Keep the system message and the current user message, then as much recent
 * history as fits in maxTokens.
 */
export function trimMessages(messages: ChatMessage[], maxTokens: number): ChatMessage[] {
  if (!maxTokens || messages.length <= 2) return messages;

  const systemMessage = messages.find(msg => msg.role === 'system');
  const userMessages = messages.filter(msg => msg.role === 'user');
  const currentUserMessage = userMessages[userMessages.length - 1];

  if (!systemMessage || !currentUserMessage) return messages;

  const baseTokens = countTokens(systemMessage.content) + countTokens(currentUserMessage.content);
  if (maxTokens - baseTokens <= 0) {
    return [systemMessage, currentUserMessage];
  }

  const trimmed: ChatMessage[] = [systemMessage];
  let usedTokens = baseTokens;
  const historyMessages = messages.filter(msg => msg !== systemMessage && msg !== currentUserMessage);

  // Most recent history first
  for (let i = historyMessages.length - 1; i >= 0; i--) {
    const msgTokens = countTokens(historyMessages[i].content);
    if (usedTokens + msgTokens > maxTokens) break;
    trimmed.splice(1, 0, historyMessages[i]);
    usedTokens += msgTokens;
  }

  trimmed.push(currentUserMessage);
  return trimmed;
}

// One SDK client per endpoint and key, reused across calls
const clients = new Map<string, OpenAI>();

function clientFor(profile: LLMProfile): OpenAI {
  const apiKey = profile.apiKey || 'dummy';
  const key = `${profile.baseURL}|${apiKey}`;
  let client = clients.get(key);
  if (!client) {
    client = new OpenAI({ apiKey, baseURL: profile.baseURL, maxRetries: 0 });
    clients.set(key, client);
  }
  return client;
}

async function attemptChatCompletion(
  profile: LLMProfile,
  messages: ChatMessage[],
  options: ChatCompletionOptions
): Promise<string> {
  const model = profile.model || 'gpt-4o-mini';
  const sampler = profile.sampler;

  const prompt = trimMessages(messages, sampler?.maxContextTokens ?? 0);
  const body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
    model,
    messages: prompt,
    ...(sampler ? {
      temperature: sampler.temperature,
      top_p: sampler.topP,
      max_completion_tokens: sampler.max_completion_tokens,
      frequency_penalty: sampler.frequencyPenalty,
      presence_penalty: sampler.presencePenalty,
      stop: sampler.stop
    } : {})
  };

  try {
    llmLog('Making call to %s at %s (%d messages, ~%d tokens)', model, profile.baseURL, prompt.length, countMessageTokens(prompt));
    const response = await clientFor(profile).chat.completions.create(body, { signal: options.signal });
    return response.choices[0]?.message?.content ?? '';
  } catch (error) {
    llmLog('API call failed: profile=%s model=%s status=%o error=%s', profile.baseURL, model, readProperty(error, 'status'), errorMessage(error));
    throw error;
  }
}

/**
 * Chat completion with retries (exponential backoff on retryable errors), then
 * the fallback profiles in order. An aborted signal stops everything at once.
 */
export async function chatCompletion(
  profile: LLMProfile,
  messages: ChatMessage[],
  options: ChatCompletionOptions = {}
): Promise<string> {
  const profilesToTry: LLMProfile[] = [profile, ...(options.fallbackProfiles ?? [])];
  let lastError: unknown = null;

  for (let profileIndex = 0; profileIndex < profilesToTry.length; profileIndex++) {
    const currentProfile = profilesToTry[profileIndex];

    for (let retryCount = 0; retryCount < MAX_RETRIES; retryCount++) {
      if (options.signal?.aborted) throw options.signal.reason;
      try {
        llmLog('Attempt %d/%d on profile %s', retryCount + 1, MAX_RETRIES, currentProfile.baseURL);
        const result = await attemptChatCompletion(currentProfile, messages, options);
        if (retryCount > 0) llmLog('Retry succeeded on attempt %d', retryCount + 1);
        return result;
      } catch (error) {
        lastError = error;
        if (options.signal?.aborted) throw options.signal.reason;

        if (!isRetryableError(error)) {
          llmLog('Non-retryable error: %s', errorMessage(error));
          break;
        }
        if (retryCount < MAX_RETRIES - 1) {
          const backoffMs = calculateBackoff(retryCount);
          llmLog('Retryable error, waiting %dms before retry: %s', backoffMs, errorMessage(error));
          await sleep(backoffMs, options.signal);
        } else {
          llmLog('Max retries (%d) reached on this profile', MAX_RETRIES);
        }
      }
    }

    if (profileIndex < profilesToTry.length - 1) {
      llmLog('Profile %s failed, trying fallback profile', currentProfile.baseURL);
    }
  }

  const errorMsg = `All LLM profiles failed. Last error: ${lastError ? errorMessage(lastError) : 'Unknown error'}`;
  llmLog(errorMsg);
  throw new Error(errorMsg, { cause: lastError });
}

export async function chatCompletionFromContext(
  profile: LLMProfile,
  context: MessageContext,
  options: ChatCompletionOptions = {}
): Promise<string> {
  return chatCompletion(profile, buildOpenAIMessages(context), options);
}
