/**
 * Supported LLM provider types
 */
export type LLMProviderType = 'openai' | 'anthropic' | 'gemini' | 'grok';

/**
 * A single chunk from an LLM streaming response
 */
export interface LLMStreamChunk {
  /** Text content in this chunk (may be empty on the final chunk) */
  text: string;
  /** Whether this is the final chunk in the stream */
  done: boolean;
}

/**
 * Message in conversation history
 */
export interface LLMMessage {
  role: 'user' | 'model';
  content: string;
}

/**
 * Request for LLM chat completion
 */
export interface LLMChatRequest {
  /** System prompt / instructions */
  systemPrompt: string;
  /** Conversation turns */
  messages: LLMMessage[];
  /** Abort signal for cancellation */
  signal?: AbortSignal;
}

/**
 * Configuration for LLM provider
 */
export interface LLMProviderConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Extended config for factory - includes provider type
 */
export interface LLMFactoryConfig extends LLMProviderConfig {
  provider: LLMProviderType;
}

/**
 * LLM Provider interface - all LLM implementations must conform to this
 */
export interface LLMProvider {
  /**
   * Stream a chat completion response
   * @param request The chat request with system prompt and messages
   * @returns AsyncIterable of stream chunks
   */
  streamChat(request: LLMChatRequest): AsyncIterable<LLMStreamChunk>;

  /**
   * Get the provider name for logging
   */
  readonly name: string;
}

/**
 * Drain a stream into the full reply text
 */
export async function collectText(stream: AsyncIterable<LLMStreamChunk>): Promise<string> {
  let text = '';
  for await (const chunk of stream) {
    text += chunk.text;
  }
  return text;
}
