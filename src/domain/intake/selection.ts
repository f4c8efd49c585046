import type { CatalogEntry, CatalogQuestion, SymptomCatalog } from '../catalog/service';
import type { IntakePolicy, IntakeRecord, QuestionCategory } from './types';

const RED_FLAG_ORDER: readonly QuestionCategory[] = ['red_flag', 'detail', 'vital_sign'];
const DEFAULT_ORDER: readonly QuestionCategory[] = ['detail', 'vital_sign', 'red_flag'];

/**
 * True when one of the entry's red-flag trigger phrases appears in the
 * symptom description or any earlier answer.
 */
export function hasRedFlagSignal(record: IntakeRecord, entry: CatalogEntry, catalog: SymptomCatalog): boolean {
  const texts = [record.symptom?.description ?? '', ...record.answers.map(a => a.answer)];
  return texts.some(text => catalog.hasRedFlag(entry, text));
}

export function categoryOrder(redFlag: boolean): readonly QuestionCategory[] {
  return redFlag ? RED_FLAG_ORDER : DEFAULT_ORDER;
}

/**
 * Highest-priority question not yet asked. A category is skipped once all
 * its questions were asked or its turn cap is spent. Null means the
 * candidate list is exhausted.
 */
export function selectNextQuestion(
  record: IntakeRecord,
  entry: CatalogEntry,
  policy: IntakePolicy,
  redFlag: boolean
): CatalogQuestion | null {
  const asked = new Set(record.askedQuestionIds);

  for (const category of categoryOrder(redFlag)) {
    if (record.categoryTurns[category] >= policy.categoryCaps[category]) continue;

    const next = entry.questions.find(q => q.category === category && !asked.has(q.id));
    if (next) return next;
  }

  return null;
}
