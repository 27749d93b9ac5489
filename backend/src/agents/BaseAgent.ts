import * as nunjucks from 'nunjucks';
import { chatCompletionFromContext } from '../llm/client.js';
import { customLLMRequest } from '../llm/customClient.js';
import { ConfigManager, LLMProfile } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { GenerationError, errorMessage } from '../errors.js';
import { CallOptions, MessageContext } from '../llm/types.js';
import { buildCustomTemplate } from '../llm/messageBuilder.js';

/** Nunjucks environment over the prompts directory; built once at startup. */
export function createPromptEnvironment(promptsDirectory: string): nunjucks.Environment {
  const env = new nunjucks.Environment(new nunjucks.FileSystemLoader(promptsDirectory), {
    autoescape: false,
    throwOnUndefined: false
  });
  env.addFilter('json', (obj: unknown) => JSON.stringify(obj, null, 2));
  return env;
}

export abstract class BaseAgent<TContext> {
  protected configManager: ConfigManager;
  protected env: nunjucks.Environment;
  protected agentName: string;
  private readonly baseAgentLog = createLogger(NAMESPACES.agents.base);

  constructor(agentName: string, configManager: ConfigManager, env: nunjucks.Environment) {
    this.agentName = agentName;
    this.configManager = configManager;
    this.env = env;
  }

  /** The agent's profile: its configured llmProfile (or the default) with per-agent overrides applied. */
  protected getProfile(): LLMProfile {
    const config = this.configManager.getConfig();
    const agentConfig = this.configManager.getAgentConfig(this.agentName);
    let profileName = agentConfig?.llmProfile || config.defaultProfile;
    if (profileName === 'default' || !config.profiles[profileName]) {
      profileName = config.defaultProfile;
    }

    const baseProfile = this.configManager.getProfile(profileName);
    return {
      ...baseProfile,
      sampler: { ...baseProfile.sampler, ...agentConfig?.sampler },
      ...(agentConfig?.model !== undefined ? { model: agentConfig.model } : {}),
      ...(agentConfig?.template !== undefined ? { template: agentConfig.template } : {})
    };
  }

  protected getFallbackProfiles(profile: LLMProfile): LLMProfile[] {
    const config = this.configManager.getConfig();
    return (profile.fallbackProfiles ?? [])
      .map(name => config.profiles[name])
      .filter((p): p is LLMProfile => p !== undefined);
  }

  protected renderTemplate(templateName: string, context: object): string {
    const result = this.env.render(`${templateName}.njk`, context);
    const preview = result.substring(0, 500) + (result.length > 500 ? '...' : '');
    this.baseAgentLog('Rendered template for %s: %s', templateName, preview);
    return result;
  }

  /**
   * Call the LLM with structured context. Any failure, including an abort, comes
   * back as a GenerationError; callers decide what the user sees.
   */
  protected async callLLM(context: MessageContext, options: CallOptions = {}): Promise<string> {
    const profile = this.getProfile();
    const withMeta: MessageContext = { ...context, metadata: { agentName: this.agentName, ...context.metadata } };

    try {
      if (profile.type === 'custom') {
        const templateName = profile.template || 'chatml';
        return await customLLMRequest(profile, buildCustomTemplate(withMeta, templateName, this.env), {
          signal: options.signal
        });
      }
      return await chatCompletionFromContext(profile, withMeta, {
        fallbackProfiles: this.getFallbackProfiles(profile),
        signal: options.signal
      });
    } catch (error) {
      this.baseAgentLog('[LLM] Call failed for agent %s: %s', this.agentName, errorMessage(error));
      if (error instanceof GenerationError) throw error;
      throw new GenerationError(`Agent ${this.agentName} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** Strip reasoning blocks and stray code fences some models wrap replies in. */
  protected cleanResponse(response: string): string {
    return response
      .replace(/<thinking>[\s\S]*?<\/thinking>/gi, '')
      .replace(/^```(?:\w+)?\s*\n?/i, '')
      .replace(/\n?```\s*$/i, '')
      .trim();
  }

  abstract run(context: TContext, options?: CallOptions): Promise<string>;
}
