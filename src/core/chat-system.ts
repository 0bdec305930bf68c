import { createLogger } from '../logger.js';
import { ConversationHistory, DEFAULT_HISTORY_SIZE } from './history.js';
import { nextMood, STANDARD_TRIGGERS, type MoodTriggers } from './mood.js';
import type { PersonaRegistry } from './personas.js';
import type { ResponseGenerator } from './generator.js';
import { INITIAL_MOOD, type InteractionRecord, type PlayerMessage, type PlayerState } from '../types/npc.js';

const logger = createLogger('npc-chat-system');

export interface NpcChatSystemOptions {
  registry: PersonaRegistry;
  generator: ResponseGenerator;
  triggers?: MoodTriggers;
  historySize?: number;
}

/**
 * Owns per-player state and runs the per-message pipeline:
 * mood update, context, reply, history append.
 */
export class NpcChatSystem {
  private readonly registry: PersonaRegistry;
  private readonly generator: ResponseGenerator;
  private readonly triggers: MoodTriggers;
  private readonly historySize: number;
  private readonly players = new Map<number, PlayerState>();

  constructor(options: NpcChatSystemOptions) {
    this.registry = options.registry;
    this.generator = options.generator;
    this.triggers = options.triggers ?? STANDARD_TRIGGERS;
    this.historySize = options.historySize ?? DEFAULT_HISTORY_SIZE;
  }

  /**
   * State for a player, created on first sight
   */
  getPlayerState(playerId: number): PlayerState {
    let state = this.players.get(playerId);
    if (!state) {
      state = {
        playerId,
        personaKey: this.registry.assign(playerId),
        mood: INITIAL_MOOD,
        history: new ConversationHistory(this.historySize),
      };
      this.players.set(playerId, state);
      logger.debug({ playerId, persona: state.personaKey }, 'Player state created');
    }
    return state;
  }

  /**
   * All player states, in first-seen order
   */
  getPlayerStates(): PlayerState[] {
    return [...this.players.values()];
  }

  async processMessage(message: PlayerMessage): Promise<InteractionRecord> {
    const state = this.getPlayerState(message.player_id);
    const persona = this.registry.get(state.personaKey);

    const previousMood = state.mood;
    state.mood = nextMood(state.mood, message.text, this.triggers);
    if (state.mood !== previousMood) {
      logger.debug({ playerId: state.playerId, from: previousMood, to: state.mood }, 'Mood changed');
    }

    // Snapshot before the append so the current message is never its own context
    const history = state.history.toArray();

    const result = await this.generator.generate({
      persona,
      mood: state.mood,
      message: message.text,
      history,
    });

    state.history.push(message.text);

    return {
      timestamp: message.timestamp,
      player_id: message.player_id,
      player_message: message.text,
      npc_key: persona.key,
      npc_name: persona.name,
      npc_role: persona.role,
      npc_mood: state.mood,
      npc_response: result.text,
      conversation_history: history,
      fallback: !result.ok,
    };
  }
}
