import { z } from 'zod';
import { createLogger, LogLevelSchema } from './logger.js';
import { ConfigError } from './errors.js';

const logger = createLogger('config');

const ConfigSchema = z.object({
  logLevel: LogLevelSchema.default('info'),
  inputFile: z.string().min(1).default('players.json'),
  outputFile: z.string().min(1).default('logs/run.jsonl'),
  outputFormat: z.enum(['jsonl', 'json']).default('jsonl'),
  historySize: z.coerce.number().int().positive().default(3),
  moodTriggerProfile: z.enum(['standard', 'extended']).default('standard'),
  promptStyle: z.enum(['detailed', 'compact']).default('detailed'),
  // Optional YAML catalog replacing the built-in personas
  personasFile: z.string().optional(),
  llm: z.object({
    provider: z.enum(['openai', 'anthropic', 'gemini', 'grok']).default('openai'),
    model: z.string().optional(),
    maxTokens: z.coerce.number().int().positive().default(150),
    temperature: z.coerce.number().min(0).max(2).default(0.7),
  }),
  // Provider API keys
  providers: z.object({
    openaiApiKey: z.string().optional(),
    anthropicApiKey: z.string().optional(),
    geminiApiKey: z.string().optional(),
    grokApiKey: z.string().optional(),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LlmProviderName = Config['llm']['provider'];

let config: Config | null = null;

/**
 * Empty strings in .env files mean "unset"
 */
function env(source: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = source[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  if (config) {
    return config;
  }

  const rawConfig = {
    logLevel: env(source, 'LOG_LEVEL'),
    inputFile: env(source, 'INPUT_FILE'),
    outputFile: env(source, 'OUTPUT_FILE'),
    outputFormat: env(source, 'OUTPUT_FORMAT'),
    historySize: env(source, 'HISTORY_SIZE'),
    moodTriggerProfile: env(source, 'MOOD_TRIGGER_PROFILE'),
    promptStyle: env(source, 'PROMPT_STYLE'),
    personasFile: env(source, 'PERSONAS_FILE'),
    llm: {
      provider: env(source, 'LLM_PROVIDER'),
      model: env(source, 'LLM_MODEL'),
      maxTokens: env(source, 'LLM_MAX_TOKENS'),
      temperature: env(source, 'LLM_TEMPERATURE'),
    },
    providers: {
      openaiApiKey: env(source, 'OPENAI_API_KEY'),
      anthropicApiKey: env(source, 'ANTHROPIC_API_KEY'),
      geminiApiKey: env(source, 'GEMINI_API_KEY'),
      grokApiKey: env(source, 'GROK_API_KEY'),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    logger.error({ issues: parsed.error.issues }, 'Failed to load configuration');
    throw new ConfigError(`Configuration validation failed: ${details}`);
  }

  config = parsed.data;

  // Log config with all sensitive fields redacted
  const safeConfig = {
    ...config,
    providers: {
      openaiApiKey: config.providers.openaiApiKey ? '[REDACTED]' : undefined,
      anthropicApiKey: config.providers.anthropicApiKey ? '[REDACTED]' : undefined,
      geminiApiKey: config.providers.geminiApiKey ? '[REDACTED]' : undefined,
      grokApiKey: config.providers.grokApiKey ? '[REDACTED]' : undefined,
    },
  };
  logger.debug({ config: safeConfig }, 'Configuration loaded');
  return config;
}

export function getConfig(): Config {
  if (!config) {
    return loadConfig();
  }
  return config;
}

/**
 * Drop the cached config so the next call re-reads the environment
 */
export function resetConfig(): void {
  config = null;
}

/**
 * API key of the configured provider. A missing key is fatal at startup.
 */
export function requireProviderApiKey(cfg: Config): string {
  const keys: Record<LlmProviderName, { value: string | undefined; envName: string }> = {
    openai: { value: cfg.providers.openaiApiKey, envName: 'OPENAI_API_KEY' },
    anthropic: { value: cfg.providers.anthropicApiKey, envName: 'ANTHROPIC_API_KEY' },
    gemini: { value: cfg.providers.geminiApiKey, envName: 'GEMINI_API_KEY' },
    grok: { value: cfg.providers.grokApiKey, envName: 'GROK_API_KEY' },
  };

  const entry = keys[cfg.llm.provider];
  if (!entry.value) {
    throw new ConfigError(
      `Missing API key for provider "${cfg.llm.provider}". Set ${entry.envName} in your environment or .env file`
    );
  }
  return entry.value;
}
