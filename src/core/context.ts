import { createLogger } from '../logger.js';
import type { Mood, Persona } from '../types/npc.js';
import type { LLMMessage } from '../providers/llm/interface.js';

const logger = createLogger('context-assembly');

export type PromptStyle = 'detailed' | 'compact';

/**
 * Render a player's recent messages plus the new one. This is the user turn
 * sent to the LLM; it has no effect on mood or persona.
 *
 * @param history - Prior messages, oldest first
 * @param message - The message being answered
 */
export function buildConversationContext(history: readonly string[], message: string): string {
  const parts: string[] = [];

  if (history.length > 0) {
    parts.push('Recent conversation:');
    history.forEach((entry, i) => {
      parts.push(`${i + 1}. Player: ${entry}`);
    });
  }

  parts.push(`Current message: ${message}`);

  return parts.join('\n');
}

/**
 * Single user turn for the provider
 */
export function assembleConversationMessages(context: string): LLMMessage[] {
  return [{ role: 'user', content: context }];
}

/**
 * One-line mood description used by the compact prompt
 */
const MOOD_DESCRIPTIONS: Record<Mood, string> = {
  neutral: 'You are a neutral, balanced NPC. Be polite but not overly enthusiastic.',
  friendly: 'You are a friendly, welcoming NPC. Be warm and enthusiastic in your responses.',
  angry: 'You are an irritated NPC. Be curt and slightly hostile, but still helpful.',
  helpful: 'You are an eager-to-help NPC. Be informative and offer assistance.',
  confused: 'You are a confused NPC. Be uncertain and ask clarifying questions.',
};

/**
 * Behavior block per mood for the detailed prompt
 */
const MOOD_GUIDANCE: Record<Mood, string> = {
  neutral: `When NEUTRAL:
- Be professional but not overly warm
- Give straightforward, helpful information
- Maintain character-appropriate mannerisms
- Show mild interest in the player's goals
- Example tone: "I can help with that. The blacksmith's shop is just down the cobblestone path, past the fountain."`,
  friendly: `When FRIENDLY:
- Be welcoming and enthusiastic
- Offer additional help or information
- Share personal anecdotes or local gossip
- Use warm, inviting language
- Show genuine interest in the player's journey
- Example tone: "Well hello there, friend! You look like you could use some guidance - and perhaps a good meal too!"`,
  helpful: `When HELPFUL:
- Be eager to assist and provide detailed information
- Offer practical advice and warnings
- Share useful tips about the village or surrounding areas
- Be patient with questions
- Show expertise in your field
- Example tone: "Ah, you're looking for supplies? Let me tell you exactly what you'll need and where to find the best prices..."`,
  angry: `When ANGRY:
- Be curt and somewhat hostile, but not completely unhelpful
- Show irritation through short responses
- May mention what's bothering you
- Still provide basic information (you have a job to do)
- Use gruff or impatient language
- Example tone: "What do you want? I'm busy here... *sighs heavily* Fine, the inn is that way. Now leave me be."`,
  confused: `When CONFUSED:
- Be uncertain and ask for clarification
- Show puzzlement about the player's request
- May ramble or give incomplete information
- Ask follow-up questions
- Show your character is trying to understand
- Example tone: "I'm not quite sure what you mean by that... Could you explain it differently? Are you talking about the old ruins or the new merchant district?"`,
};

const GUIDE_ORDER: readonly Mood[] = ['neutral', 'friendly', 'helpful', 'angry', 'confused'];

export function getMoodGuidance(mood: Mood): string {
  return MOOD_GUIDANCE[mood];
}

function formatWorldContext(): string {
  return `=== GAME WORLD CONTEXT ===
You are an NPC (Non-Player Character) in "Chronicles of Aethermoor," a medieval fantasy RPG set in a bustling village at the crossroads of ancient kingdoms. This village serves as a safe haven for adventurers, traders, and travelers seeking quests, supplies, and information.

The village contains:
- Market Square (merchants, traders, gossips)
- Blacksmith Quarter (crafters, weapon smiths, armorers)
- Guard Barracks (soldiers, captains, veterans)
- Tavern District (innkeepers, bards, locals)
- Temple Grounds (clerics, healers, wise folk)
- Mysterious ruins and ancient forests nearby

Players are adventurers who arrive seeking glory, treasure, knowledge, or simply a place to rest. They may be complete novices or seasoned heroes. Your interactions shape their journey.`;
}

function formatCharacter(persona: Persona, mood: Mood): string {
  return `=== YOUR CHARACTER ===
Name: ${persona.name}
Role: ${persona.role}
Background: ${persona.background}
Personality Quirks: ${persona.quirks.join(', ')}

Current Emotional State: ${mood}`;
}

function formatMoodGuide(): string {
  return `=== MOOD-BASED BEHAVIOR GUIDE ===

${GUIDE_ORDER.map(getMoodGuidance).join('\n\n')}`;
}

function formatRoleplayGuidelines(): string {
  return `=== ROLEPLAY GUIDELINES ===

1. **Stay in Character**: Never break the fourth wall or mention you're an AI/game mechanic
2. **Be Concise**: Keep responses to 1-2 sentences maximum (this is crucial for game flow)
3. **Show, Don't Tell**: Express mood through word choice and tone, not by stating "I am angry"
4. **Include Character Quirks**: Naturally weave in your personality traits
5. **Maintain Consistency**: Remember previous interactions with this player
6. **Provide Value**: Always give the player something useful - information, direction, quest hint, or roleplay flavor
7. **Use Medieval Fantasy Language**: Avoid modern slang, but keep it understandable`;
}

function assembleDetailedPrompt(persona: Persona, mood: Mood, context: string): string {
  const sections = [
    formatWorldContext(),
    formatCharacter(persona, mood),
    formatMoodGuide(),
    formatRoleplayGuidelines(),
    `=== INTERACTION HISTORY ===
${context}`,
    `*${persona.name} ${mood} responds:*`,
  ];

  return sections.join('\n\n');
}

function assembleCompactPrompt(persona: Persona, mood: Mood): string {
  return `You are ${persona.name}, the ${persona.role}, a medieval fantasy NPC (Non-Player Character) in a village.
${MOOD_DESCRIPTIONS[mood]}

Keep responses short (1-2 sentences max). You can:
- Give directions around the village
- Offer simple quests or tasks
- Share basic village lore
- React to the player's tone

Current mood: ${mood}`;
}

/**
 * Assemble the system prompt for one reply.
 *
 * The detailed style embeds world-building, the persona, the full mood guide
 * and the rendered conversation context. The compact style is a short
 * instruction block; the context then travels only as the user turn.
 */
export function assembleSystemPrompt(
  persona: Persona,
  mood: Mood,
  context: string,
  style: PromptStyle = 'detailed'
): string {
  const prompt =
    style === 'detailed'
      ? assembleDetailedPrompt(persona, mood, context)
      : assembleCompactPrompt(persona, mood);

  logger.debug({ persona: persona.key, mood, style, promptLength: prompt.length }, 'System prompt assembled');

  return prompt;
}
