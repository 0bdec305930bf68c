import { describe, it, expect } from 'vitest';
import {
  buildConversationContext,
  assembleConversationMessages,
  assembleSystemPrompt,
  getMoodGuidance,
} from './context.js';
import { DEFAULT_PERSONAS } from '../data/personas.js';
import type { Persona } from '../types/npc.js';

const marcus: Persona = DEFAULT_PERSONAS[0];

describe('buildConversationContext', () => {
  it('should render only the current message without history', () => {
    expect(buildConversationContext([], 'hello there')).toBe('Current message: hello there');
  });

  it('should number prior messages oldest first', () => {
    const context = buildConversationContext(['first', 'second'], 'third');

    expect(context).toBe(
      'Recent conversation:\n1. Player: first\n2. Player: second\nCurrent message: third'
    );
  });
});

describe('assembleConversationMessages', () => {
  it('should send the context as a single user turn', () => {
    expect(assembleConversationMessages('Current message: hi')).toEqual([
      { role: 'user', content: 'Current message: hi' },
    ]);
  });
});

describe('assembleSystemPrompt', () => {
  const context = 'Recent conversation:\n1. Player: you are useless\nCurrent message: hello there';

  describe('detailed style', () => {
    const prompt = assembleSystemPrompt(marcus, 'angry', context, 'detailed');

    it('should open with the world context', () => {
      expect(prompt.startsWith('=== GAME WORLD CONTEXT ===\n')).toBe(true);
    });

    it('should describe the persona', () => {
      expect(prompt).toContain('Name: Marcus\nRole: Village Guard\n');
      expect(prompt).toContain(
        'Personality Quirks: Always mentions his war stories, Suspicious of strangers'
      );
      expect(prompt).toContain('Current Emotional State: angry');
    });

    it('should embed the conversation context', () => {
      expect(prompt).toContain(`=== INTERACTION HISTORY ===\n${context}`);
    });

    it('should include guidance for every mood', () => {
      for (const header of ['When NEUTRAL:', 'When FRIENDLY:', 'When HELPFUL:', 'When ANGRY:', 'When CONFUSED:']) {
        expect(prompt).toContain(header);
      }
    });

    it('should list the mood blocks in guide order', () => {
      const guide = ['neutral', 'friendly', 'helpful', 'angry', 'confused'] as const;

      expect(prompt).toContain(
        `=== MOOD-BASED BEHAVIOR GUIDE ===\n\n${guide.map(getMoodGuidance).join('\n\n')}\n\n=== ROLEPLAY GUIDELINES ===`
      );
    });

    it('should end with the response cue', () => {
      expect(prompt.endsWith('*Marcus angry responds:*')).toBe(true);
    });
  });

  describe('compact style', () => {
    const prompt = assembleSystemPrompt(marcus, 'angry', context, 'compact');
    const lines = prompt.split('\n');

    it('should name the persona and describe the mood up front', () => {
      expect(lines[0]).toBe(
        'You are Marcus, the Village Guard, a medieval fantasy NPC (Non-Player Character) in a village.'
      );
      expect(lines[1]).toBe('You are an irritated NPC. Be curt and slightly hostile, but still helpful.');
    });

    it('should end with the current mood', () => {
      expect(lines[lines.length - 1]).toBe('Current mood: angry');
    });

    it('should leave the context to the user turn', () => {
      expect(prompt).not.toContain('Current message:');
    });
  });

  it('should default to the detailed style', () => {
    expect(assembleSystemPrompt(marcus, 'neutral', context)).toBe(
      assembleSystemPrompt(marcus, 'neutral', context, 'detailed')
    );
  });
});

describe('getMoodGuidance', () => {
  it('should return the block for one mood', () => {
    expect(getMoodGuidance('confused').split('\n')[0]).toBe('When CONFUSED:');
  });
});
