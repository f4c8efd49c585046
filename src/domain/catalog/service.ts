import fs from 'fs';
import { z } from 'zod';
import { CatalogLoadError } from '../../shared/errors';
import { containsAnyPhrase, findBestTermMatch, normalizePhrase } from '../../shared/matching';

// ============================================================================
// Catalog file schema
// ============================================================================

const questionSchema = z.object({
  id: z.string().min(1),
  category: z.enum(['red_flag', 'detail', 'vital_sign']),
  text: z.string().min(1),
});

const entrySchema = z.object({
  key: z.string().regex(/^[a-z0-9_]+$/, 'keys are lowercase snake_case'),
  label: z.string().min(1),
  synonyms: z.array(z.string().min(1)).default([]),
  redFlagTriggers: z.array(z.string().min(1)).default([]),
  questions: z.array(questionSchema),
});

const catalogFileSchema = z.object({
  version: z.number().int(),
  fallback: entrySchema,
  symptoms: z.array(entrySchema).min(1),
});

export type CatalogQuestion = Readonly<z.infer<typeof questionSchema>>;

export interface CatalogEntry {
  readonly key: string;
  readonly label: string;
  readonly synonyms: readonly string[];
  readonly redFlagTriggers: readonly string[];
  readonly questions: readonly CatalogQuestion[];
}

/**
 * "matched with an empty question list" and "no match" are different
 * results: the first still completes the follow-up phase.
 */
export type CatalogMatch =
  | { kind: 'matched'; entry: CatalogEntry; term: string }
  | { kind: 'no_match'; normalized: string };

// ============================================================================
// Symptom Catalog
// ============================================================================

export class SymptomCatalog {
  private readonly entries: readonly CatalogEntry[];
  private readonly fallbackEntry: CatalogEntry;
  private readonly byKey = new Map<string, CatalogEntry>();
  private readonly byTerm = new Map<string, CatalogEntry>();

  private constructor(data: z.infer<typeof catalogFileSchema>) {
    const seenQuestionIds = new Set<string>();

    const freeze = (raw: z.infer<typeof entrySchema>): CatalogEntry => {
      for (const question of raw.questions) {
        if (seenQuestionIds.has(question.id)) {
          throw new CatalogLoadError(`duplicate question id "${question.id}"`);
        }
        seenQuestionIds.add(question.id);
      }

      return Object.freeze({
        key: raw.key,
        label: raw.label,
        synonyms: Object.freeze([...raw.synonyms]),
        redFlagTriggers: Object.freeze([...raw.redFlagTriggers]),
        questions: Object.freeze(raw.questions.map(q => Object.freeze({ ...q }))),
      });
    };

    this.fallbackEntry = freeze(data.fallback);
    this.entries = Object.freeze(data.symptoms.map(freeze));

    for (const entry of [...this.entries, this.fallbackEntry]) {
      if (this.byKey.has(entry.key)) {
        throw new CatalogLoadError(`duplicate symptom key "${entry.key}"`);
      }
      this.byKey.set(entry.key, entry);
    }

    for (const entry of this.entries) {
      for (const term of [entry.label, entry.key.replace(/_/g, ' '), ...entry.synonyms]) {
        const normalized = normalizePhrase(term);
        const existing = this.byTerm.get(normalized);
        if (existing && existing !== entry) {
          throw new CatalogLoadError(`term "${term}" maps to both ${existing.key} and ${entry.key}`);
        }
        this.byTerm.set(normalized, entry);
      }
    }
  }

  static fromData(raw: unknown): SymptomCatalog {
    const result = catalogFileSchema.safeParse(raw);
    if (!result.success) {
      throw new CatalogLoadError(result.error.message);
    }
    return new SymptomCatalog(result.data);
  }

  static fromFile(filePath: string): SymptomCatalog {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      throw new CatalogLoadError(`cannot read ${filePath}: ${err.message}`);
    }
    return SymptomCatalog.fromData(raw);
  }

  /**
   * Resolve free text ("my chest hurts") to a catalog entry.
   */
  lookup(symptomText: string): CatalogMatch {
    const normalized = normalizePhrase(symptomText);
    if (!normalized) {
      return { kind: 'no_match', normalized };
    }

    const term = findBestTermMatch(normalized, [...this.byTerm.keys()]);
    const entry = term ? this.byTerm.get(term) : undefined;

    if (!term || !entry) {
      return { kind: 'no_match', normalized };
    }

    return { kind: 'matched', entry, term };
  }

  get(key: string): CatalogEntry | null {
    return this.byKey.get(key) ?? null;
  }

  fallback(): CatalogEntry {
    return this.fallbackEntry;
  }

  list(): readonly CatalogEntry[] {
    return this.entries;
  }

  /**
   * Every normalized term the catalog recognises, longest first.
   */
  terms(): string[] {
    return [...this.byTerm.keys()].sort((a, b) => b.length - a.length);
  }

  /**
   * True when any of the entry's red-flag trigger phrases occurs in the text.
   */
  hasRedFlag(entry: CatalogEntry, text: string): boolean {
    return containsAnyPhrase(text, entry.redFlagTriggers);
  }

  get size(): number {
    return this.entries.length;
  }
}
