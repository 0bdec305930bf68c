import type { ConversationHistory } from '../core/history.js';

/**
 * Discrete emotional state of an NPC toward one player
 */
export const MOODS = ['neutral', 'friendly', 'angry', 'helpful', 'confused'] as const;

export type Mood = (typeof MOODS)[number];

export const INITIAL_MOOD: Mood = 'neutral';

/**
 * Immutable NPC descriptor. Mood lives on PlayerState, never here.
 */
export interface Persona {
  key: string;
  name: string;
  role: string;
  background: string;
  quirks: string[];
}

/**
 * One entry of the input batch
 */
export interface PlayerMessage {
  player_id: number;
  text: string;
  /** Timestamp exactly as it appeared in the input */
  timestamp: string;
  /** Parsed timestamp (epoch ms), used for ordering */
  time: number;
  /** Nanoseconds past `time`, for timestamps finer than a millisecond */
  subMillis: number;
}

/**
 * Per-player bookkeeping, created on the player's first message
 */
export interface PlayerState {
  playerId: number;
  personaKey: string;
  mood: Mood;
  history: ConversationHistory;
}

/**
 * One line of the output log
 */
export interface InteractionRecord {
  timestamp: string;
  player_id: number;
  player_message: string;
  npc_key: string;
  npc_name: string;
  npc_role: string;
  npc_mood: Mood;
  npc_response: string;
  /** Prior messages from this player, oldest first, excluding the current one */
  conversation_history: string[];
  /** True when the reply is the fallback text */
  fallback: boolean;
}
