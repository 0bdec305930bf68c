import { describe, it, expect } from 'vitest';
import { createLlmProvider, getDefaultModel } from './factory.js';
import type { LLMProviderType } from './interface.js';

describe('createLlmProvider', () => {
  it.each<LLMProviderType>(['openai', 'anthropic', 'gemini', 'grok'])('should create the %s provider', (provider) => {
    expect(createLlmProvider({ provider, apiKey: 'test-key' }).name).toBe(provider);
  });

  it('should refuse to build a provider without a key', () => {
    expect(() => createLlmProvider({ provider: 'openai', apiKey: '' })).toThrow('OpenAI API key is required');
  });
});

describe('getDefaultModel', () => {
  it('should default OpenAI to gpt-3.5-turbo', () => {
    expect(getDefaultModel('openai')).toBe('gpt-3.5-turbo');
  });
});
