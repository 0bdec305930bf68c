import type { Mood } from '../types/npc.js';

/**
 * Keyword sets that move an NPC into a mood. Matching is a case-insensitive
 * substring test, so "hi" also fires on "this".
 */
export interface MoodTriggers {
  angry: readonly string[];
  helpful: readonly string[];
  friendly: readonly string[];
  confused: readonly string[];
}

export type MoodTriggerProfile = 'standard' | 'extended';

export const STANDARD_TRIGGERS: MoodTriggers = {
  angry: ['stupid', 'useless', 'hate', 'idiot'],
  helpful: ['help', 'please', 'quest', 'thank'],
  friendly: ['hello', 'hi', 'nice', 'good'],
  confused: ['confused', 'lost', 'understand'],
};

export const EXTENDED_TRIGGERS: MoodTriggers = {
  angry: ['stupid', 'useless', 'idiot', 'hate', 'suck', 'terrible', 'awful', 'damn'],
  helpful: ['where', 'how', 'what', 'quest', 'direction', 'guide', 'help'],
  friendly: ['hello', 'hi', 'thank you', 'thanks', 'please', 'help', 'quest', 'village', 'nice'],
  confused: [],
};

const PROFILES: Record<MoodTriggerProfile, MoodTriggers> = {
  standard: STANDARD_TRIGGERS,
  extended: EXTENDED_TRIGGERS,
};

export function getMoodTriggers(profile: MoodTriggerProfile): MoodTriggers {
  return PROFILES[profile];
}

/**
 * Checked in this order; the first set with a hit wins
 */
const PRECEDENCE: readonly (keyof MoodTriggers)[] = ['angry', 'helpful', 'friendly', 'confused'];

/**
 * Find which trigger set a message hits first, if any
 */
export function matchMoodTrigger(text: string, triggers: MoodTriggers): Mood | null {
  const lowered = text.toLowerCase();

  for (const mood of PRECEDENCE) {
    if (triggers[mood].some((word) => lowered.includes(word))) {
      return mood;
    }
  }

  return null;
}

/**
 * Next mood after a player message. Without a trigger, anger cools
 * to neutral and every other mood holds.
 */
export function nextMood(
  current: Mood,
  text: string,
  triggers: MoodTriggers = STANDARD_TRIGGERS
): Mood {
  const matched = matchMoodTrigger(text, triggers);
  if (matched) {
    return matched;
  }

  return current === 'angry' ? 'neutral' : current;
}
