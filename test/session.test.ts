/**
 * Session key and input text tests
 */

import { describe, it, expect } from 'vitest';
import { formatSessionKey, inputToText, parseSessionKey } from '../src/types/index.js';

describe('session keys', () => {
  it('should format as agent name and session id joined by --', () => {
    expect(formatSessionKey({ agentName: 'haiku_agent', sessionId: 's1' })).toBe('haiku_agent--s1');
  });

  it('should split on the first separator only', () => {
    expect(parseSessionKey('haiku_agent--s1--retry')).toEqual({ agentName: 'haiku_agent', sessionId: 's1--retry' });
  });

  it('should reject keys without an agent name or session id', () => {
    expect(parseSessionKey('no-separator')).toBeNull();
    expect(parseSessionKey('--s1')).toBeNull();
    expect(parseSessionKey('haiku_agent--')).toBeNull();
  });
});

describe('inputToText', () => {
  it('should pass text through unchanged', () => {
    expect(inputToText('Tell me about the sea')).toBe('Tell me about the sea');
  });

  it('should send structured input as JSON', () => {
    expect(inputToText({ city: 'Oslo', days: 2 })).toBe('{"city":"Oslo","days":2}');
    expect(inputToText(42)).toBe('42');
  });

  it('should treat undefined as empty text', () => {
    expect(inputToText(undefined)).toBe('');
  });
});
