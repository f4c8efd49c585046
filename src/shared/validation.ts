/**
 * Validation utilities for the intake service
 * Centralized so the extractors, the merge rules and the API agree on what
 * a valid value looks like.
 */

import type { Gender } from '../domain/intake/types';

/**
 * Conversation ids are opaque tokens assigned by the chat transport.
 */
export function isValidConversationId(id: string): boolean {
  return /^[A-Za-z0-9_-]{1,128}$/.test(id);
}

/**
 * Validate name format
 * - 1-4 words
 * - Each word 2-20 characters
 * - Only letters (including accented), apostrophes and hyphens
 */
export function isValidName(name: string): boolean {
  const words = name.trim().split(/\s+/);

  if (words.length < 1 || words.length > 4) {
    return false;
  }

  return words.every(word => {
    if (word.length < 2 || word.length > 20) {
      return false;
    }
    return /^\p{L}[\p{L}'-]*$/u.test(word);
  });
}

/**
 * Capitalize each word: "mary-jane o'neil" -> "Mary-Jane O'Neil"
 */
export function normalizeName(name: string): string {
  return name
    .trim()
    .split(/\s+/)
    .map(word => word.toLowerCase().replace(/(^|[-'])(\p{L})/gu, (_m, sep: string, ch: string) => sep + ch.toUpperCase()))
    .join(' ');
}

export function isValidEmail(email: string): boolean {
  if (email.length > 254) return false;
  return /^[A-Za-z0-9._%+-]+@[A-Za-z0-9-]+(\.[A-Za-z0-9-]+)*\.[A-Za-z]{2,}$/.test(email);
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function isValidAge(age: number): boolean {
  return Number.isInteger(age) && age >= 0 && age <= 120;
}

/**
 * Map free-form gender words onto the three values the record stores.
 * Returns null when the word is not recognised.
 */
export function normalizeGender(input: string): Gender | null {
  const value = input.trim().toLowerCase();

  if (['male', 'm', 'man', 'boy'].includes(value)) return 'male';
  if (['female', 'f', 'woman', 'girl'].includes(value)) return 'female';
  if (['other', 'non-binary', 'nonbinary', 'non binary'].includes(value)) return 'other';

  return null;
}

/**
 * Sanitize user input for safe storage
 * - Trim whitespace
 * - Remove control characters
 * - Limit length
 */
export function sanitizeInput(input: string, maxLength: number = 1000): string {
  return input
    .trim()
    // Remove control characters except newlines
    .replace(/[\x00-\x09\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .substring(0, maxLength);
}

/**
 * Validate message content
 * - Not empty
 * - Not too long
 * - Contains printable characters
 */
export function isValidMessage(message: string): boolean {
  const sanitized = sanitizeInput(message, 10001);

  if (sanitized.length === 0) {
    return false;
  }

  if (sanitized.length > 10000) {
    return false;
  }

  return /[\p{L}\p{N}]/u.test(sanitized);
}

/**
 * Escape text for Telegram's HTML parse mode
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}
