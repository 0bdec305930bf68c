import { createLogger } from './logger.js';
import { requireProviderApiKey, type Config } from './config.js';
import { createLlmProvider } from './providers/llm/factory.js';
import type { LLMProvider } from './providers/llm/interface.js';
import { PersonaRegistry, loadPersonasFile } from './core/personas.js';
import { ResponseGenerator } from './core/generator.js';
import { NpcChatSystem } from './core/chat-system.js';
import { getMoodTriggers } from './core/mood.js';
import { runBatch, type BatchRunResult } from './batch/runner.js';

const logger = createLogger('app');

export interface RunOptions {
  inputFile?: string;
  outputFile?: string;
  /** Use this provider instead of building one from config */
  provider?: LLMProvider;
}

/**
 * Wire the chat system from config. Fails fast on a missing API key.
 */
export async function createNpcChatSystem(config: Config, provider?: LLMProvider): Promise<NpcChatSystem> {
  const llm =
    provider ??
    createLlmProvider({
      provider: config.llm.provider,
      apiKey: requireProviderApiKey(config),
      model: config.llm.model,
      maxTokens: config.llm.maxTokens,
      temperature: config.llm.temperature,
    });

  const registry = config.personasFile
    ? new PersonaRegistry(await loadPersonasFile(config.personasFile))
    : new PersonaRegistry();

  return new NpcChatSystem({
    registry,
    generator: new ResponseGenerator(llm, { promptStyle: config.promptStyle }),
    triggers: getMoodTriggers(config.moodTriggerProfile),
    historySize: config.historySize,
  });
}

export async function run(config: Config, options: RunOptions = {}): Promise<BatchRunResult> {
  const system = await createNpcChatSystem(config, options.provider);

  const inputFile = options.inputFile ?? config.inputFile;
  const outputFile = options.outputFile ?? config.outputFile;

  logger.info(
    { inputFile, outputFile, provider: options.provider?.name ?? config.llm.provider },
    'Starting NPC replay'
  );

  return runBatch({
    inputFile,
    outputFile,
    outputFormat: config.outputFormat,
    system,
  });
}
