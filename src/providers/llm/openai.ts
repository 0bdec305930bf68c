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

const logger = createLogger('openai-provider');

const DEFAULT_MODEL = 'gpt-3.5-turbo';
const DEFAULT_MAX_TOKENS = 150;
const DEFAULT_TEMPERATURE = 0.7;

/**
 * Shape of one streamed chat completion chunk (only the fields we read)
 */
export const ChatCompletionChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).partial().optional(),
      })
    )
    .default([]),
});

/**
 * Chat message in the OpenAI-compatible wire format
 */
export interface ChatCompletionMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Convert internal message format to OpenAI message format
 */
export function messageToOpenAI(message: LLMMessage): ChatCompletionMessage {
  return {
    role: message.role === 'model' ? 'assistant' : 'user',
    content: message.content,
  };
}

/**
 * Request body for an OpenAI-compatible streaming chat completion
 */
export function buildChatCompletionBody(
  request: LLMChatRequest,
  model: string,
  maxTokens: number,
  temperature: number
): Record<string, unknown> {
  const messages: ChatCompletionMessage[] = [];

  if (request.systemPrompt) {
    messages.push({ role: 'system', content: request.systemPrompt });
  }
  messages.push(...request.messages.map(messageToOpenAI));

  return {
    model,
    messages,
    max_tokens: maxTokens,
    temperature,
    stream: true,
  };
}

/**
 * Text deltas from an OpenAI-compatible SSE body
 */
export async function* streamChatCompletionText(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<string> {
  for await (const data of readSseData(body)) {
    const parsed = ChatCompletionChunkSchema.safeParse(parseSseJson(data));
    if (!parsed.success) continue;

    const content = parsed.data.choices[0]?.delta?.content;
    if (content) {
      yield content;
    }
  }
}

/**
 * OpenAI LLM Provider implementation
 * Uses the OpenAI Chat Completions API with streaming
 */
export class OpenAILlmProvider implements LLMProvider {
  readonly name = 'openai';
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly baseUrl: string;

  constructor(config: LLMProviderConfig) {
    if (!config.apiKey) {
      throw new OpenAIError('OpenAI API key is required');
    }

    this.apiKey = config.apiKey;
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.baseUrl = 'https://api.openai.com/v1';

    logger.info({ model: this.model }, 'OpenAI provider initialized');
  }

  async *streamChat(request: LLMChatRequest): AsyncIterable<LLMStreamChunk> {
    const startTime = Date.now();
    logger.debug({ messageCount: request.messages.length }, 'Starting OpenAI stream chat');

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
        throw new OpenAIError(`OpenAI API error: ${response.status} - ${error}`);
      }

      if (!response.body) {
        throw new OpenAIError('No response body');
      }

      let accumulatedText = '';
      for await (const text of streamChatCompletionText(response.body)) {
        accumulatedText += text;
        yield { text, done: false };
      }

      yield { text: '', done: true };

      const duration = Date.now() - startTime;
      logger.info({ duration, textLength: accumulatedText.length }, 'OpenAI stream chat completed');
    } catch (error) {
      const duration = Date.now() - startTime;

      if (error instanceof Error && error.name === 'AbortError') {
        logger.info({ duration }, 'OpenAI stream chat aborted');
        throw error;
      }

      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      logger.error({ duration, error: errorMessage }, 'OpenAI stream chat failed');
      throw error instanceof OpenAIError ? error : new OpenAIError(errorMessage);
    }
  }
}

/**
 * Base OpenAI error class
 */
export class OpenAIError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OpenAIError';
  }
}

/**
 * Factory function to create an OpenAI provider
 */
export function createOpenAIProvider(config: LLMProviderConfig): LLMProvider {
  return new OpenAILlmProvider(config);
}
