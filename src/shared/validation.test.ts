import { describe, it, expect } from 'vitest';
import {
  escapeHtml,
  isValidAge,
  isValidConversationId,
  isValidEmail,
  isValidMessage,
  isValidName,
  normalizeEmail,
  normalizeGender,
  normalizeName,
  sanitizeInput,
} from './validation';

describe('validation', () => {
  it('accepts transport-style conversation ids', () => {
    expect(isValidConversationId('conv-123_abc')).toBe(true);
    expect(isValidConversationId('')).toBe(false);
    expect(isValidConversationId('has space')).toBe(false);
    expect(isValidConversationId('x'.repeat(129))).toBe(false);
  });

  it('validates names', () => {
    expect(isValidName('Ana')).toBe(true);
    expect(isValidName("Mary-Jane O'Neil")).toBe(true);
    expect(isValidName('José Álvarez')).toBe(true);
    expect(isValidName('J')).toBe(false);
    expect(isValidName('R2D2')).toBe(false);
    expect(isValidName('one two three four five')).toBe(false);
  });

  it('capitalizes names', () => {
    expect(normalizeName("mary-jane o'neil")).toBe("Mary-Jane O'Neil");
    expect(normalizeName('  JOHN   smith ')).toBe('John Smith');
  });

  it('validates and normalizes emails', () => {
    expect(isValidEmail('pat@example.com')).toBe(true);
    expect(isValidEmail('pat@example')).toBe(false);
    expect(isValidEmail('pat example.com')).toBe(false);
    expect(normalizeEmail(' Pat@Example.COM ')).toBe('pat@example.com');
  });

  it('validates ages', () => {
    expect(isValidAge(0)).toBe(true);
    expect(isValidAge(120)).toBe(true);
    expect(isValidAge(121)).toBe(false);
    expect(isValidAge(-1)).toBe(false);
    expect(isValidAge(30.5)).toBe(false);
  });

  it('maps gender words', () => {
    expect(normalizeGender('Woman')).toBe('female');
    expect(normalizeGender('m')).toBe('male');
    expect(normalizeGender('non-binary')).toBe('other');
    expect(normalizeGender('unsure')).toBeNull();
  });

  it('sanitizes and checks messages', () => {
    expect(sanitizeInput('  hi\u0007 there ')).toBe('hi there');
    expect(sanitizeInput('abcdef', 3)).toBe('abc');
    expect(isValidMessage('ok')).toBe(true);
    expect(isValidMessage('   ')).toBe(false);
    expect(isValidMessage('?!')).toBe(false);
  });

  it('escapes HTML', () => {
    expect(escapeHtml('<b>Tom & Jerry</b>')).toBe('&lt;b&gt;Tom &amp; Jerry&lt;/b&gt;');
  });
});
