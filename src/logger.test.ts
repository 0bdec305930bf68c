import { describe, it, expect } from 'vitest';
import { resolveLogLevel } from './logger.js';

describe('resolveLogLevel', () => {
  it('should accept a pino level', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('should fall back to info for a missing or unknown level', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('loud')).toBe('info');
  });
});
