import { describe, it, expect } from 'vitest';
import { isLogLevel, resolveLogLevel } from './logger.js';

describe('resolveLogLevel', () => {
  it('should accept known levels case-insensitively', () => {
    expect(resolveLogLevel(' DEBUG ')).toBe('debug');
    expect(resolveLogLevel('warn')).toBe('warn');
  });

  it('should fall back for unknown or missing levels', () => {
    expect(resolveLogLevel('verbose')).toBe('info');
    expect(resolveLogLevel(undefined, 'error')).toBe('error');
  });
});

describe('isLogLevel', () => {
  it('should narrow only exact level names', () => {
    expect(isLogLevel('trace')).toBe(true);
    expect(isLogLevel('Trace')).toBe(false);
  });
});
