import { z } from 'zod';
import { createLogger } from '../../logger.js';
import { readSseData, parseSseJson } from './sse.js';
import type {
  LLMProvider,
  LLMProviderConfig,
  LLMChatRequest,
  LLMStreamChunk,
  LLMMessage,
} from './interface.js';

const logger = createLogger('anthropic-provider');

const DEFAULT_MODEL = 'claude-3-5-haiku-20241022';
const DEFAULT_MAX_TOKENS = 150;
const DEFAULT_TEMPERATURE = 0.7;

/**
 * Streamed event carrying a text delta; every other event type is ignored
 */
const TextDeltaEventSchema = z.object({
  type: z.literal('content_block_delta'),
  delta: z.object({
    type: z.literal('text_delta'),
    text: z.string(),
  }),
});

/**
 * Error event sent mid-stream
 */
const ErrorEventSchema = z.object({
  type: z.literal('error'),
  error: z.object({ message: z.string() }).partial().optional(),
});

/**
 * Convert internal message format to Anthropic message format
 */
function messageToAnthropic(message: LLMMessage): { role: 'user' | 'assistant'; content: string } {
  return {
    role: message.role === 'model' ? 'assistant' : 'user',
    content: message.content,
  };
}

/**
 * Anthropic (Claude) LLM Provider implementation
 * Uses the Anthropic Messages API with streaming
 */
export class AnthropicLlmProvider implements LLMProvider {
  readonly name = 'anthropic';
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly baseUrl: string;

  constructor(config: LLMProviderConfig) {
    if (!config.apiKey) {
      throw new AnthropicError('Anthropic API key is required');
    }

    this.apiKey = config.apiKey;
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.baseUrl = 'https://api.anthropic.com/v1';

    logger.info({ model: this.model }, 'Anthropic provider initialized');
  }

  async *streamChat(request: LLMChatRequest): AsyncIterable<LLMStreamChunk> {
    const startTime = Date.now();
    logger.debug({ messageCount: request.messages.length }, 'Starting Anthropic stream chat');

    try {
      const body: Record<string, unknown> = {
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        messages: request.messages.map(messageToAnthropic),
        stream: true,
      };

      if (request.systemPrompt) {
        body.system = request.systemPrompt;
      }

      const response = await fetch(`${this.baseUrl}/messages`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.apiKey,
          'anthropic-version': '2023-06-01',
        },
        body: JSON.stringify(body),
        signal: request.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new AnthropicError(`Anthropic API error: ${response.status} - ${error}`);
      }

      if (!response.body) {
        throw new AnthropicError('No response body');
      }

      let accumulatedText = '';

      for await (const data of readSseData(response.body)) {
        const json = parseSseJson(data);

        const errorEvent = ErrorEventSchema.safeParse(json);
        if (errorEvent.success) {
          throw new AnthropicError(`Anthropic stream error: ${errorEvent.data.error?.message ?? 'unknown'}`);
        }

        const textEvent = TextDeltaEventSchema.safeParse(json);
        if (textEvent.success && textEvent.data.delta.text) {
          accumulatedText += textEvent.data.delta.text;
          yield { text: textEvent.data.delta.text, done: false };
        }
      }

      yield { text: '', done: true };

      const duration = Date.now() - startTime;
      logger.info({ duration, textLength: accumulatedText.length }, 'Anthropic stream chat completed');
    } catch (error) {
      const duration = Date.now() - startTime;

      if (error instanceof Error && error.name === 'AbortError') {
        logger.info({ duration }, 'Anthropic stream chat aborted');
        throw error;
      }

      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      logger.error({ duration, error: errorMessage }, 'Anthropic stream chat failed');
      throw error instanceof AnthropicError ? error : new AnthropicError(errorMessage);
    }
  }
}

/**
 * Base Anthropic error class
 */
export class AnthropicError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AnthropicError';
  }
}

/**
 * Factory function to create an Anthropic provider
 */
export function createAnthropicProvider(config: LLMProviderConfig): LLMProvider {
  return new AnthropicLlmProvider(config);
}
