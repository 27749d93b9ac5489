import axios from 'axios';
import { LLMProfile } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';

const customLog = createLogger(NAMESPACES.llm.custom);

const REQUEST_TIMEOUT_MS = 120000;

export interface CustomClientOptions {
  signal?: AbortSignal;
}

interface CompletionChoice {
  text?: string;
  message?: { content?: string };
}

interface CompletionResponse {
  choices?: CompletionChoice[];
  result?: string;
}

/**
 * Custom LLM client using axios for non-OpenAI compatible endpoints.
 * Sends raw rendered prompts directly to the completions endpoint.
 */
export async function customLLMRequest(
  profile: LLMProfile,
  renderedPrompt: string,
  options: CustomClientOptions = {}
): Promise<string> {
  const { signal } = options;
  const sampler = profile.sampler;

  const requestBody = {
    prompt: renderedPrompt,
    model: profile.model,
    max_tokens: sampler?.max_completion_tokens || 512,
    temperature: sampler?.temperature ?? 0.7,
    top_p: sampler?.topP ?? 0.9,
    ...(sampler?.frequencyPenalty !== undefined && { frequency_penalty: sampler.frequencyPenalty }),
    ...(sampler?.presencePenalty !== undefined && { presence_penalty: sampler.presencePenalty }),
    ...(sampler?.stop && sampler.stop.length > 0 && { stop: sampler.stop })
  };

  try {
    customLog('Posting to %s with model %s', profile.baseURL, profile.model);
    const response = await axios.post<CompletionResponse>(`${profile.baseURL}/completions`, requestBody, {
      timeout: REQUEST_TIMEOUT_MS,
      signal,
      headers: {
        'Content-Type': 'application/json',
        ...(profile.apiKey ? { Authorization: `Bearer ${profile.apiKey}` } : {})
      }
    });

    // Support both 'text' (completions API) and 'message.content' (chat format)
    const choice = response.data.choices?.[0];
    if (choice) {
      return choice.text || choice.message?.content || '';
    }
    if (response.data.result) {
      return response.data.result;
    }

    customLog('WARN: unexpected response format: %o', response.data);
    return '';
  } catch (error) {
    const message = axios.isAxiosError(error) ? error.response?.statusText || error.message : String(error);
    customLog('Request failed: %s', message);
    throw error;
  }
}
