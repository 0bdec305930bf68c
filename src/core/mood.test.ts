import { describe, it, expect } from 'vitest';
import {
  nextMood,
  matchMoodTrigger,
  getMoodTriggers,
  STANDARD_TRIGGERS,
  EXTENDED_TRIGGERS,
} from './mood.js';
import type { Mood } from '../types/npc.js';

describe('mood engine', () => {
  describe('nextMood', () => {
    it('should move to angry on an angry trigger', () => {
      expect(nextMood('neutral', 'you are useless')).toBe('angry');
    });

    it('should let angry win over helpful and friendly triggers in the same message', () => {
      expect(nextMood('friendly', 'hello, please help me you idiot')).toBe('angry');
      expect(nextMood('helpful', 'Nice try, stupid')).toBe('angry');
    });

    it('should prefer helpful over friendly', () => {
      expect(nextMood('neutral', 'hello, please help')).toBe('helpful');
    });

    it('should move to friendly on a greeting', () => {
      expect(nextMood('neutral', 'hello there')).toBe('friendly');
    });

    it('should move to confused on confusion keywords', () => {
      expect(nextMood('neutral', 'I am lost')).toBe('confused');
    });

    it('should match case-insensitively', () => {
      expect(nextMood('neutral', 'YOU ARE USELESS')).toBe('angry');
    });

    it('should match triggers as substrings', () => {
      // "this" contains "hi"
      expect(nextMood('neutral', 'this is fine')).toBe('friendly');
    });

    it('should decay angry to neutral when nothing matches', () => {
      expect(nextMood('angry', 'the weather')).toBe('neutral');
    });

    it('should decay only one step', () => {
      const first = nextMood('angry', 'the weather');
      expect(nextMood(first, 'the weather')).toBe('neutral');
    });

    it.each<Mood>(['neutral', 'friendly', 'helpful', 'confused'])(
      'should keep %s when nothing matches',
      (mood) => {
        expect(nextMood(mood, 'ok')).toBe(mood);
      }
    );

    it('should be deterministic for the same input', () => {
      const results = Array.from({ length: 5 }, () => nextMood('confused', 'Where is the quest board?'));
      expect(new Set(results)).toEqual(new Set(['helpful']));
    });
  });

  describe('matchMoodTrigger', () => {
    it('should return null when no set matches', () => {
      expect(matchMoodTrigger('the weather', STANDARD_TRIGGERS)).toBeNull();
    });
  });

  describe('extended profile', () => {
    it('should treat questions as helpful', () => {
      expect(nextMood('neutral', 'where is the inn', EXTENDED_TRIGGERS)).toBe('helpful');
      expect(nextMood('neutral', 'where is the inn', STANDARD_TRIGGERS)).toBe('neutral');
    });

    it('should have no confusion triggers', () => {
      expect(nextMood('neutral', 'I am confused', EXTENDED_TRIGGERS)).toBe('neutral');
    });

    it('should know the wider angry vocabulary', () => {
      expect(nextMood('friendly', 'this village is terrible', EXTENDED_TRIGGERS)).toBe('angry');
    });
  });

  describe('getMoodTriggers', () => {
    it('should resolve profiles by name', () => {
      expect(getMoodTriggers('standard')).toBe(STANDARD_TRIGGERS);
      expect(getMoodTriggers('extended')).toBe(EXTENDED_TRIGGERS);
    });
  });
});
