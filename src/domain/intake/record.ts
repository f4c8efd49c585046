import type {
  DemographicField,
  IntakeRecord,
  IntakeSnapshot,
  QuestionCategory,
} from './types';

export const DEMOGRAPHIC_FIELDS: readonly DemographicField[] = ['name', 'age', 'gender', 'email'];

export const QUESTION_CATEGORIES: readonly QuestionCategory[] = ['red_flag', 'detail', 'vital_sign'];

/**
 * A fresh record at revision 0. Revision 0 is never stored: the first
 * save writes revision 1.
 */
export function createRecord(conversationId: string, now: Date): IntakeRecord {
  const timestamp = now.toISOString();
  return {
    conversationId,
    revision: 0,
    status: 'collecting_demographics',
    demographics: {
      name: { value: null, provided: false },
      age: { value: null, provided: false },
      gender: { value: null, provided: false },
      email: { value: null, provided: false },
    },
    symptom: null,
    answers: [],
    askedQuestionIds: [],
    categoryTurns: { red_flag: 0, detail: 0, vital_sign: 0 },
    fieldAsks: { name: 0, age: 0, gender: 0, email: 0 },
    corrections: { name: 0, age: 0, gender: 0, email: 0 },
    symptomClarifications: 0,
    pending: null,
    turns: 0,
    lastMessageId: null,
    lastAction: null,
    createdAt: timestamp,
    updatedAt: timestamp,
    completedAt: null,
    abandonReason: null,
    handedOff: false,
  };
}

export function cloneRecord(record: IntakeRecord): IntakeRecord {
  return structuredClone(record);
}

export function isTerminal(record: IntakeRecord): boolean {
  return record.status === 'complete' || record.status === 'abandoned';
}

export function missingDemographics(record: IntakeRecord): DemographicField[] {
  return DEMOGRAPHIC_FIELDS.filter(field => !record.demographics[field].provided);
}

/**
 * Build the immutable hand-off value. Only valid once the record holds an
 * email and a symptom; returns null otherwise.
 */
export function toSnapshot(record: IntakeRecord): IntakeSnapshot | null {
  const { demographics, symptom, completedAt } = record;
  if (!symptom || !completedAt || demographics.email.value === null) {
    return null;
  }

  return deepFreeze({
    conversationId: record.conversationId,
    name: demographics.name.value,
    age: demographics.age.value,
    gender: demographics.gender.value,
    email: demographics.email.value,
    symptom: { ...symptom },
    answers: record.answers.map(answer => ({ ...answer })),
    completedAt,
  });
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
