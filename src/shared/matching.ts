/**
 * Shared phrase matching utilities for symptom lookup and red-flag triggers.
 */

const MATCHING_STOP_WORDS = new Set([
  'the', 'and', 'in', 'of', 'a', 'an', 'for', 'with', 'on', 'at', 'to',
  'my', 'me', 'i', 'im', 'is', 'am', 'are', 'have', 'has', 'had', 'been',
  'having', 'feel', 'feeling', 'some', 'very', 'really', 'bit', 'little',
  'it', 'its', 'this', 'that', 'since', 'when', 'from', 'get', 'got',
]);

/**
 * Lowercase, fold apostrophes, turn punctuation and hyphens into spaces and
 * collapse whitespace: "Can't breathe!" -> "cant breathe"
 */
export function normalizePhrase(text: string): string {
  return text
    .toLowerCase()
    .replace(/['’`]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

/**
 * Whole-phrase containment on normalized text. Both sides must already be
 * normalized.
 */
export function containsPhrase(normalizedText: string, normalizedPhrase: string): boolean {
  if (!normalizedPhrase) return false;
  return ` ${normalizedText} `.includes(` ${normalizedPhrase} `);
}

export function containsAnyPhrase(text: string, phrases: readonly string[]): boolean {
  const normalized = normalizePhrase(text);
  return phrases.some(phrase => containsPhrase(normalized, normalizePhrase(phrase)));
}

/**
 * Find the best matching term for a piece of free text.
 * Returns the matched term or null if no match found.
 *
 * Matching strategy (in order):
 * 1. Exact match
 * 2. Longest term contained in the text as a whole phrase
 * 3. Every significant word of the term present in the text, most words wins
 */
export function findBestTermMatch(text: string, terms: readonly string[]): string | null {
  const normalizedText = normalizePhrase(text);
  if (!normalizedText) return null;

  // 1. Exact match
  for (const term of terms) {
    if (normalizePhrase(term) === normalizedText) {
      return term;
    }
  }

  // 2. Phrase containment, longest first
  const byLength = [...terms].sort((a, b) => normalizePhrase(b).length - normalizePhrase(a).length);
  for (const term of byLength) {
    if (containsPhrase(normalizedText, normalizePhrase(term))) {
      return term;
    }
  }

  // 3. Word overlap
  const textWords = new Set(getSignificantWords(normalizedText));
  if (textWords.size === 0) return null;

  let best: { term: string; words: number } | null = null;
  for (const term of terms) {
    const termWords = getSignificantWords(normalizePhrase(term));
    if (termWords.length < 2) continue;

    if (termWords.every(w => textWords.has(w)) && (!best || termWords.length > best.words)) {
      best = { term, words: termWords.length };
    }
  }

  return best?.term ?? null;
}

function getSignificantWords(text: string): string[] {
  return text.split(/\s+/).filter(w => w.length > 2 && !MATCHING_STOP_WORDS.has(w));
}
