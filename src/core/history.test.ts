import { describe, it, expect } from 'vitest';
import { ConversationHistory } from './history.js';

describe('ConversationHistory', () => {
  it('should default to a capacity of 3', () => {
    expect(new ConversationHistory().capacity).toBe(3);
  });

  it('should keep entries oldest first', () => {
    const history = new ConversationHistory();
    history.push('one');
    history.push('two');

    expect(history.toArray()).toEqual(['one', 'two']);
    expect(history.size).toBe(2);
  });

  it('should evict the oldest entry past capacity', () => {
    const history = new ConversationHistory(3);
    for (const text of ['one', 'two', 'three', 'four']) {
      history.push(text);
    }

    expect(history.toArray()).toEqual(['two', 'three', 'four']);
    expect(history.size).toBe(3);
  });

  it('should return a copy from toArray', () => {
    const history = new ConversationHistory();
    history.push('one');
    history.toArray().push('mutated');

    expect(history.toArray()).toEqual(['one']);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new ConversationHistory(0)).toThrow(RangeError);
    expect(() => new ConversationHistory(1.5)).toThrow(RangeError);
  });
});
