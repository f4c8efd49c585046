import type { ExtractionContext, Extractor, PartialFieldMap } from './types';
import { findBestTermMatch, normalizePhrase } from '../../shared/matching';
import { isValidName } from '../../shared/validation';

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*\.[A-Za-z]{2,}/;

const NAME_WORD = "\\p{L}[\\p{L}'-]*";

const NAME_PATTERNS = [
  new RegExp(`\\bmy name is\\s+(${NAME_WORD}(?:\\s+${NAME_WORD}){0,2})`, 'iu'),
  new RegExp(`\\bname(?:\\s+is|:)\\s*(${NAME_WORD}(?:\\s+${NAME_WORD}){0,2})`, 'iu'),
  new RegExp(`\\bcall me\\s+(${NAME_WORD})`, 'iu'),
  new RegExp(`\\b(?:i'?m|i am|this is)\\s+(${NAME_WORD}(?:\\s+${NAME_WORD})?)`, 'iu'),
];

const AGE_PATTERNS = [
  /\b(\d{1,3})\s*(?:years?\s*old|yrs?\s*old|y\/o|yo)\b/i,
  /\bage[d:]?\s*(?:is\s*)?(\d{1,3})\b/i,
  /\b(?:i'?m|i am)\s+(\d{1,3})\b/i,
];

const GENDER_PATTERN = /\b(female|male|woman|man|non-?binary)\b/i;

// Words that follow "I'm" without being a name
const NOT_A_NAME = new Set([
  'a', 'an', 'the', 'and', 'with', 'in', 'at', 'from', 'so', 'very', 'really', 'just', 'also',
  'not', 'fine', 'good', 'okay', 'ok', 'well', 'sick', 'ill', 'here', 'back', 'sorry', 'sure',
  'having', 'feeling', 'experiencing', 'suffering', 'getting', 'looking', 'writing', 'calling',
  'worried', 'concerned', 'scared', 'afraid', 'unsure', 'pregnant', 'been', 'still', 'currently',
  'male', 'female', 'man', 'woman', 'years', 'year', 'old', 'age', 'aged',
  'yes', 'no', 'hi', 'hello', 'hey', 'thanks', 'thank', 'you', 'please', 'my', 'email',
  'doing', 'going', 'trying', 'hoping', 'wondering', 'coming', 'reaching', 'glad', 'happy',
  'alright', 'all', 'great', 'better', 'worse', 'new', 'interested', 'available', 'ready',
]);

// "i'm doing", "i'm texting": a lowercase gerund is never a name
const LOWERCASE_GERUND = /^\p{Ll}+ing$/u;

/**
 * Deterministic extractor built from regular expressions and the catalog
 * vocabulary. Used by tests and as the EXTRACTOR=rules mode.
 */
export class RuleBasedExtractor implements Extractor {
  readonly name = 'rules';
  private readonly symptomTerms: readonly string[];
  private readonly symptomWords: Set<string>;

  constructor(symptomTerms: readonly string[]) {
    this.symptomTerms = symptomTerms;
    this.symptomWords = new Set(symptomTerms.flatMap(term => normalizePhrase(term).split(' ')));
  }

  async extract(text: string, context: ExtractionContext): Promise<PartialFieldMap> {
    const result: PartialFieldMap = {};

    const emailMatch = text.match(EMAIL_PATTERN);
    if (emailMatch) {
      result.email = emailMatch[0];
    }

    // Emails carry digits and words that would confuse the other patterns
    const rest = emailMatch ? text.replace(emailMatch[0], ' ') : text;

    const age = this.extractAge(rest, context);
    if (age !== null) result.age = age;

    const gender = rest.match(GENDER_PATTERN);
    if (gender?.[1]) result.gender = gender[1].toLowerCase();

    const name = this.extractName(rest, context);
    if (name) result.name = name;

    const symptom = findBestTermMatch(rest, this.symptomTerms);
    if (symptom) result.symptom = symptom;

    return result;
  }

  private extractAge(text: string, context: ExtractionContext): number | null {
    for (const pattern of AGE_PATTERNS) {
      const match = text.match(pattern);
      if (match?.[1]) {
        return parseInt(match[1], 10);
      }
    }

    // "John, 28, male": a bare number between separators
    if (context.status === 'collecting_demographics') {
      for (const segment of text.split(/[,;\n]/)) {
        const trimmed = segment.trim();
        if (/^\d{1,3}$/.test(trimmed)) {
          return parseInt(trimmed, 10);
        }
      }
    }

    return null;
  }

  private extractName(text: string, context: ExtractionContext): string | null {
    for (const pattern of NAME_PATTERNS) {
      const match = text.match(pattern);
      if (match?.[1]) {
        const name = this.trimName(match[1]);
        if (name) return name;
      }
    }

    // A reply made of nothing but a name, when a name was asked for
    if (context.status === 'collecting_demographics' && context.missingFields.includes('name')) {
      const bare = text.trim().replace(/[.!]+$/, '');
      const name = this.trimName(bare);
      if (name && name === bare) return name;
    }

    return null;
  }

  private trimName(candidate: string): string | null {
    const words: string[] = [];
    for (const word of candidate.trim().split(/\s+/)) {
      const lower = word.toLowerCase();
      if (NOT_A_NAME.has(lower) || this.symptomWords.has(lower) || LOWERCASE_GERUND.test(word)) break;
      words.push(word);
    }

    const name = words.join(' ');
    return name && isValidName(name) ? name : null;
  }
}
