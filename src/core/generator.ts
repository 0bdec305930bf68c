import { createLogger } from '../logger.js';
import { collectText, type LLMProvider } from '../providers/llm/interface.js';
import {
  assembleSystemPrompt,
  assembleConversationMessages,
  buildConversationContext,
  type PromptStyle,
} from './context.js';
import type { Mood, Persona } from '../types/npc.js';

const logger = createLogger('response-generator');

/**
 * Outcome of one provider call. A failure still carries the text to show.
 */
export type GenerationResult =
  | { ok: true; text: string }
  | { ok: false; reason: string; text: string };

export interface GenerateInput {
  persona: Persona;
  mood: Mood;
  message: string;
  /** Prior messages from this player, oldest first */
  history: readonly string[];
}

export interface ResponseGeneratorOptions {
  promptStyle?: PromptStyle;
}

export function fallbackReply(persona: Persona): string {
  return `*${persona.name} seems distracted and doesn't respond clearly*`;
}

/**
 * Turns a persona, mood and context into a reply through the LLM provider.
 * Provider failures are caught here and only here; generate() never rejects.
 */
export class ResponseGenerator {
  private readonly provider: LLMProvider;
  private readonly promptStyle: PromptStyle;

  constructor(provider: LLMProvider, options: ResponseGeneratorOptions = {}) {
    this.provider = provider;
    this.promptStyle = options.promptStyle ?? 'detailed';
  }

  async generate(input: GenerateInput): Promise<GenerationResult> {
    const { persona, mood, message, history } = input;
    const context = buildConversationContext(history, message);
    const systemPrompt = assembleSystemPrompt(persona, mood, context, this.promptStyle);

    try {
      const text = (
        await collectText(
          this.provider.streamChat({
            systemPrompt,
            messages: assembleConversationMessages(context),
          })
        )
      ).trim();

      if (!text) {
        return this.fail(persona, 'Provider returned an empty reply');
      }

      return { ok: true, text };
    } catch (error) {
      return this.fail(persona, error instanceof Error ? error.message : String(error));
    }
  }

  private fail(persona: Persona, reason: string): GenerationResult {
    logger.error({ provider: this.provider.name, persona: persona.key, reason }, 'Error generating response');
    return { ok: false, reason, text: fallbackReply(persona) };
  }
}
