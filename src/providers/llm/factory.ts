import { createLogger } from '../../logger.js';
import type { LLMProvider, LLMProviderType, LLMFactoryConfig } from './interface.js';
import { createGeminiProvider } from './gemini.js';
import { createOpenAIProvider } from './openai.js';
import { createAnthropicProvider } from './anthropic.js';
import { createGrokProvider } from './grok.js';

const logger = createLogger('llm-factory');

/**
 * Create an LLM provider based on the specified type
 * @param config Factory configuration including provider type
 * @returns The created LLM provider
 * @throws Error if provider type is unknown or API key missing
 */
export function createLlmProvider(config: LLMFactoryConfig): LLMProvider {
  const { provider, ...providerConfig } = config;
  const model = providerConfig.model ?? getDefaultModel(provider);

  logger.info({ provider, model }, 'Creating LLM provider');

  switch (provider) {
    case 'openai':
      return createOpenAIProvider({ ...providerConfig, model });

    case 'anthropic':
      return createAnthropicProvider({ ...providerConfig, model });

    case 'gemini':
      return createGeminiProvider({ ...providerConfig, model });

    case 'grok':
      return createGrokProvider({ ...providerConfig, model });

    default: {
      const exhaustiveCheck: never = provider;
      throw new Error(`Unknown LLM provider type: ${exhaustiveCheck}`);
    }
  }
}

/**
 * Get default model for a provider type
 */
export function getDefaultModel(provider: LLMProviderType): string {
  switch (provider) {
    case 'openai':
      return 'gpt-3.5-turbo';
    case 'anthropic':
      return 'claude-3-5-haiku-20241022';
    case 'gemini':
      return 'gemini-2.5-flash';
    case 'grok':
      return 'grok-beta';
  }
}
