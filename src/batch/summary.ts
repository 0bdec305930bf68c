import type { InteractionRecord, Mood, PlayerState } from '../types/npc.js';

export interface RunSummary {
  totalMessages: number;
  uniquePlayers: number;
  fallbackReplies: number;
  /** Interactions per resulting mood; moods never reached are 0 */
  moodCounts: Record<Mood, number>;
  /** Entries currently held in each player's history */
  historyLengths: Record<number, number>;
}

export function summarize(records: readonly InteractionRecord[], players: readonly PlayerState[]): RunSummary {
  const moodCounts: Record<Mood, number> = { neutral: 0, friendly: 0, angry: 0, helpful: 0, confused: 0 };
  for (const record of records) {
    moodCounts[record.npc_mood] += 1;
  }

  const historyLengths: Record<number, number> = {};
  for (const player of players) {
    historyLengths[player.playerId] = player.history.size;
  }

  return {
    totalMessages: records.length,
    uniquePlayers: players.length,
    fallbackReplies: records.filter((record) => record.fallback).length,
    moodCounts,
    historyLengths,
  };
}
