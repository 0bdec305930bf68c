import { GoogleGenerativeAI, type GenerativeModel, type Content } from '@google/generative-ai';
import { createLogger } from '../../logger.js';
import type {
  LLMProvider,
  LLMProviderConfig,
  LLMChatRequest,
  LLMStreamChunk,
  LLMMessage,
} from './interface.js';

const logger = createLogger('gemini-provider');

const DEFAULT_MODEL = 'gemini-2.5-flash';
const DEFAULT_MAX_TOKENS = 150;
const DEFAULT_TEMPERATURE = 0.7;

/**
 * Convert internal message format to Gemini Content format
 */
function messageToContent(message: LLMMessage): Content {
  return {
    role: message.role === 'model' ? 'model' : 'user',
    parts: [{ text: message.content }],
  };
}

/**
 * HTTP status attached to SDK errors, when there is one
 */
function errorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Gemini LLM Provider implementation
 */
export class GeminiLlmProvider implements LLMProvider {
  readonly name = 'gemini';
  private readonly client: GoogleGenerativeAI;
  private readonly model: GenerativeModel;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(config: LLMProviderConfig) {
    if (!config.apiKey) {
      throw new GeminiError('Gemini API key is required');
    }

    this.client = new GoogleGenerativeAI(config.apiKey);
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;

    this.model = this.client.getGenerativeModel({
      model: config.model ?? DEFAULT_MODEL,
      generationConfig: {
        maxOutputTokens: this.maxTokens,
        temperature: this.temperature,
      },
    });

    logger.info({ model: config.model ?? DEFAULT_MODEL }, 'Gemini provider initialized');
  }

  async *streamChat(request: LLMChatRequest): AsyncIterable<LLMStreamChunk> {
    const startTime = Date.now();
    logger.debug({ messageCount: request.messages.length }, 'Starting Gemini stream chat');

    try {
      const contents: Content[] = request.messages.map(messageToContent);

      const chat = this.model.startChat({
        history: contents.slice(0, -1), // All but the last message
        systemInstruction: request.systemPrompt || undefined,
      });

      // Get the last message content for the current turn
      const lastMessage = contents[contents.length - 1];
      const lastMessageParts = lastMessage?.parts ?? [{ text: '' }];

      const result = await chat.sendMessageStream(lastMessageParts);

      let accumulatedText = '';

      for await (const chunk of result.stream) {
        if (request.signal?.aborted) {
          logger.info('Stream aborted by signal');
          break;
        }

        const parts = chunk.candidates?.[0]?.content?.parts ?? [];

        let chunkText = '';
        for (const part of parts) {
          if (part.text) {
            chunkText += part.text;
          }
        }

        if (chunkText) {
          accumulatedText += chunkText;
          yield { text: chunkText, done: false };
        }
      }

      yield { text: '', done: true };

      const duration = Date.now() - startTime;
      logger.info({ duration, textLength: accumulatedText.length }, 'Gemini stream chat completed');
    } catch (error) {
      const duration = Date.now() - startTime;

      if (error instanceof Error && error.name === 'AbortError') {
        logger.info({ duration }, 'Gemini stream chat aborted');
        throw error;
      }

      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const status = errorStatus(error);

      if (status === 429) {
        logger.warn({ duration, error: errorMessage }, 'Gemini rate limit exceeded');
        throw new GeminiRateLimitError(errorMessage);
      }

      if (status === 503) {
        logger.error({ duration, error: errorMessage }, 'Gemini service unavailable');
        throw new GeminiServiceError(errorMessage);
      }

      logger.error({ duration, error: errorMessage }, 'Gemini stream chat failed');
      throw error instanceof GeminiError ? error : new GeminiError(errorMessage);
    }
  }
}

/**
 * Base Gemini error class
 */
export class GeminiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeminiError';
  }
}

/**
 * Gemini rate limit error
 */
export class GeminiRateLimitError extends GeminiError {
  constructor(message: string) {
    super(message);
    this.name = 'GeminiRateLimitError';
  }
}

/**
 * Gemini service error (503, etc)
 */
export class GeminiServiceError extends GeminiError {
  constructor(message: string) {
    super(message);
    this.name = 'GeminiServiceError';
  }
}

/**
 * Factory function to create a Gemini provider
 */
export function createGeminiProvider(config: LLMProviderConfig): LLMProvider {
  return new GeminiLlmProvider(config);
}
