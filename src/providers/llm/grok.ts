import { createLogger } from '../../logger.js';
import { buildChatCompletionBody, streamChatCompletionText } from './openai.js';
import type {
  LLMProvider,
  LLMProviderConfig,
  LLMChatRequest,
  LLMStreamChunk,
} from './interface.js';

const logger = createLogger('grok-provider');

const DEFAULT_MODEL = 'grok-beta';
const DEFAULT_MAX_TOKENS = 150;
const DEFAULT_TEMPERATURE = 0.7;

/**
 * Grok (xAI) LLM Provider implementation
 * Uses the xAI API which is OpenAI-compatible
 */
export class GrokLlmProvider implements LLMProvider {
  readonly name = 'grok';
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly baseUrl: string;

  constructor(config: LLMProviderConfig) {
    if (!config.apiKey) {
      throw new GrokError('Grok (xAI) API key is required');
    }

    this.apiKey = config.apiKey;
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.baseUrl = 'https://api.x.ai/v1';

    logger.info({ model: this.model }, 'Grok provider initialized');
  }

  async *streamChat(request: LLMChatRequest): AsyncIterable<LLMStreamChunk> {
    const startTime = Date.now();
    logger.debug({ messageCount: request.messages.length }, 'Starting Grok stream chat');

    try {
      const body = buildChatCompletionBody(request, this.model, this.maxTokens, this.temperature);

      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: request.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new GrokError(`Grok API error: ${response.status} - ${error}`);
      }

      if (!response.body) {
        throw new GrokError('No response body');
      }

      let accumulatedText = '';
      for await (const text of streamChatCompletionText(response.body)) {
        accumulatedText += text;
        yield { text, done: false };
      }

      yield { text: '', done: true };

      const duration = Date.now() - startTime;
      logger.info({ duration, textLength: accumulatedText.length }, 'Grok stream chat completed');
    } catch (error) {
      const duration = Date.now() - startTime;

      if (error instanceof Error && error.name === 'AbortError') {
        logger.info({ duration }, 'Grok stream chat aborted');
        throw error;
      }

      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      logger.error({ duration, error: errorMessage }, 'Grok stream chat failed');
      throw error instanceof GrokError ? error : new GrokError(errorMessage);
    }
  }
}

/**
 * Base Grok error class
 */
export class GrokError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GrokError';
  }
}

/**
 * Factory function to create a Grok provider
 */
export function createGrokProvider(config: LLMProviderConfig): LLMProvider {
  return new GrokLlmProvider(config);
}
