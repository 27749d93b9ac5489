import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { createLogger, NAMESPACES } from './logging.js';

const configLog = createLogger(NAMESPACES.config);

const SamplerSchema = z.object({
  temperature: z.number().optional(),
  topP: z.number().optional(),
  max_completion_tokens: z.number().int().positive().optional(),
  frequencyPenalty: z.number().optional(),
  presencePenalty: z.number().optional(),
  stop: z.array(z.string()).optional(),
  maxContextTokens: z.number().int().positive().optional() // Maximum total context length in tokens
});

const ProfileSchema = z.object({
  type: z.enum(['openai', 'custom']), // 'openai' uses the OpenAI SDK, 'custom' posts rendered templates with axios
  apiKey: z.string().optional(),
  baseURL: z.string().url(),
  model: z.string().optional(),
  template: z.string().optional(),
  sampler: SamplerSchema.optional(),
  fallbackProfiles: z.array(z.string()).optional()
});

const AgentSchema = z.object({
  llmProfile: z.string().optional(),
  sampler: SamplerSchema.optional(),
  model: z.string().optional(),
  template: z.string().optional()
});

const StorySchema = z.object({
  minTurnsBeforeAdvance: z.number().int().min(0),
  maxTurnsPerStage: z.number().int().min(1),
  completionPhrases: z.array(z.string().min(1)),
  fallbackReply: z.string().min(1),
  closingRemark: z.string().min(1),
  resumeReply: z.string().min(1),
  contextWindowEntries: z.number().int().positive(),
  historyWindowMessages: z.number().int().min(0),
  replayLimit: z.number().int().min(0)
});

const FeaturesSchema = z.object({
  twoPassWelcome: z.boolean(),
  generationTimeoutMs: z.number().int().positive()
});

const AuthSchema = z.object({
  jwtSecret: z.string().min(1),
  googleClientId: z.string(),
  tokenTtlDays: z.number().positive()
});

const ServerSchema = z.object({
  port: z.number().int().min(0),
  corsOrigins: z.array(z.string()),
  databasePath: z.string().min(1),
  booksDirectory: z.string().min(1),
  promptsDirectory: z.string().min(1)
});

const DebugSchema = z.object({
  enabledNamespaces: z.string().optional()
});

const ConfigFileSchema = z.object({
  defaultProfile: z.string().optional(),
  profiles: z.record(ProfileSchema).optional(),
  agents: z.record(AgentSchema).optional(),
  story: StorySchema.partial().optional(),
  features: FeaturesSchema.partial().optional(),
  auth: AuthSchema.partial().optional(),
  server: ServerSchema.partial().optional(),
  debug: DebugSchema.optional()
});

export type SamplerSettings = z.infer<typeof SamplerSchema>;
export type LLMProfile = z.infer<typeof ProfileSchema>;
export type AgentConfig = z.infer<typeof AgentSchema>;
export type StoryPolicy = z.infer<typeof StorySchema>;
export type FeatureFlags = z.infer<typeof FeaturesSchema>;
export type AuthSettings = z.infer<typeof AuthSchema>;
export type ServerSettings = z.infer<typeof ServerSchema>;
export type DebugSettings = z.infer<typeof DebugSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface Config {
  defaultProfile: string;
  profiles: Record<string, LLMProfile>;
  agents: Record<string, AgentConfig>;
  story: StoryPolicy;
  features: FeatureFlags;
  auth: AuthSettings;
  server: ServerSettings;
  debug: DebugSettings;
}

export const DEFAULT_JWT_SECRET = 'change-me';

export const DEFAULT_CONFIG: Config = {
  defaultProfile: 'openai',
  profiles: {
    openai: {
      type: 'openai',
      apiKey: 'sk-dummy-key',
      baseURL: 'https://api.openai.com/v1',
      model: 'gpt-4o-mini',
      sampler: { temperature: 0.8, max_completion_tokens: 300 }
    }
  },
  agents: {},
  story: {
    minTurnsBeforeAdvance: 1,
    maxTurnsPerStage: 3,
    completionPhrases: ['i have finished writing this part in my template', 'i have finished writing'],
    fallbackReply: 'Oops, my story brain got a little tangled! Can you try telling me that again?',
    closingRemark: 'The End! You wrote a wonderful story. I am so proud of you, author!',
    resumeReply: "Welcome back! Let's keep going with our story.",
    contextWindowEntries: 40,
    historyWindowMessages: 10,
    replayLimit: 20
  },
  features: {
    twoPassWelcome: true,
    generationTimeoutMs: 30000
  },
  auth: {
    jwtSecret: DEFAULT_JWT_SECRET,
    googleClientId: '',
    tokenTtlDays: 30
  },
  server: {
    port: 8000,
    corsOrigins: ['*'],
    databasePath: 'data/storynest.db',
    booksDirectory: 'backend/data/books',
    promptsDirectory: 'backend/prompts'
  },
  debug: {
    enabledNamespaces: 'storynest:server*,storynest:agents:controller'
  }
};

function mergeConfig(file: ConfigFile): Config {
  return {
    defaultProfile: file.defaultProfile ?? DEFAULT_CONFIG.defaultProfile,
    profiles: file.profiles ?? { ...DEFAULT_CONFIG.profiles },
    agents: file.agents ?? {},
    story: { ...DEFAULT_CONFIG.story, ...file.story },
    features: { ...DEFAULT_CONFIG.features, ...file.features },
    auth: { ...DEFAULT_CONFIG.auth, ...file.auth },
    server: { ...DEFAULT_CONFIG.server, ...file.server },
    debug: { ...DEFAULT_CONFIG.debug, ...file.debug }
  };
}

function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv): Config {
  const profiles = { ...config.profiles };
  const base = profiles[config.defaultProfile];
  if (base) {
    profiles[config.defaultProfile] = {
      ...base,
      ...(env.OPENAI_API_KEY ? { apiKey: env.OPENAI_API_KEY } : {}),
      ...(env.MODEL_NAME ? { model: env.MODEL_NAME } : {}),
      ...(env.LLM_BASE_URL ? { baseURL: env.LLM_BASE_URL } : {})
    };
  }

  const server = { ...config.server };
  if (env.DATABASE_PATH) server.databasePath = env.DATABASE_PATH;
  if (env.PORT && Number.isInteger(Number(env.PORT))) server.port = Number(env.PORT);
  if (env.CORS_ORIGINS) server.corsOrigins = env.CORS_ORIGINS.split(',').map(o => o.trim()).filter(Boolean);

  const auth = { ...config.auth };
  if (env.JWT_SECRET) auth.jwtSecret = env.JWT_SECRET;
  if (env.GOOGLE_CLIENT_ID) auth.googleClientId = env.GOOGLE_CLIENT_ID;

  return { ...config, profiles, server, auth };
}

/** Cross-field checks that the per-field schemas cannot express. */
function validateConfig(config: Config): Config {
  const story = StorySchema.parse(config.story);
  if (story.minTurnsBeforeAdvance > story.maxTurnsPerStage) {
    throw new Error(
      `story.minTurnsBeforeAdvance (${story.minTurnsBeforeAdvance}) must not exceed story.maxTurnsPerStage (${story.maxTurnsPerStage})`
    );
  }
  FeaturesSchema.parse(config.features);
  AuthSchema.parse(config.auth);
  ServerSchema.parse(config.server);

  if (!config.profiles[config.defaultProfile]) {
    throw new Error(`Default profile ${config.defaultProfile} is not defined`);
  }
  for (const [name, agent] of Object.entries(config.agents)) {
    if (agent.llmProfile && agent.llmProfile !== 'default' && !config.profiles[agent.llmProfile]) {
      configLog('WARN: agent %s references unknown profile %s; the default profile will be used', name, agent.llmProfile);
    }
  }
  return config;
}

export class ConfigManager {
  private config: Config;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    configPath: string = path.join(process.cwd(), 'localConfig', 'config.json'),
    env: NodeJS.ProcessEnv = process.env
  ) {
    this.env = env;
    this.config = this.loadConfig(configPath);
  }

  private loadConfig(configPath: string): Config {
    if (!fs.existsSync(configPath)) {
      // First run: write the defaults so there is a file to edit
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2));
      configLog('Wrote default config to %s', configPath);
      return validateConfig(applyEnvOverrides(mergeConfig({}), this.env));
    }

    const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(`Invalid config at ${configPath}: ${issues}`);
    }
    return validateConfig(applyEnvOverrides(mergeConfig(parsed.data), this.env));
  }

  getProfile(name?: string): LLMProfile {
    const profileName = name || this.config.defaultProfile;
    const profile = this.config.profiles[profileName];
    if (!profile) {
      throw new Error(`Profile ${profileName} not found`);
    }
    return profile;
  }

  getConfig(): Config {
    return { ...this.config };
  }

  getAgentConfig(agentName: string): AgentConfig | undefined {
    return this.config.agents[agentName];
  }

  getStoryPolicy(): StoryPolicy {
    return { ...this.config.story, completionPhrases: [...this.config.story.completionPhrases] };
  }

  getFeatures(): FeatureFlags {
    return { ...this.config.features };
  }

  getAuthSettings(): AuthSettings {
    return { ...this.config.auth };
  }

  getServerSettings(): ServerSettings {
    return { ...this.config.server, corsOrigins: [...this.config.server.corsOrigins] };
  }
}
