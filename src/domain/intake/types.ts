// ============================================================================
// Intake Record
// ============================================================================

export type IntakeStatus =
  | 'collecting_demographics'
  | 'collecting_symptom'
  | 'collecting_followups'
  | 'complete'
  | 'abandoned';

export type QuestionCategory = 'red_flag' | 'detail' | 'vital_sign';

export type DemographicField = 'name' | 'age' | 'gender' | 'email';

export type Gender = 'male' | 'female' | 'other';

export type AbandonReason = 'cancelled' | 'idle_timeout' | 'email_not_provided';

export interface Slot<T> {
  value: T | null;
  provided: boolean;
}

export interface Demographics {
  name: Slot<string>;
  age: Slot<number>;
  gender: Slot<Gender>;
  email: Slot<string>;
}

export interface PrimarySymptom {
  /** Catalog key; the fallback entry's key when unmatched */
  key: string;
  label: string;
  /** What the patient actually wrote */
  description: string;
  matched: boolean;
}

export interface FollowUpAnswer {
  questionId: string;
  questionText: string;
  category: QuestionCategory;
  answer: string;
}

export type PendingQuestion =
  | { kind: 'demographics'; fields: DemographicField[]; correction: boolean }
  | { kind: 'symptom'; clarification: boolean }
  | { kind: 'followup'; questionId: string; questionText: string; category: QuestionCategory };

export interface IntakeRecord {
  conversationId: string;
  revision: number;
  status: IntakeStatus;
  demographics: Demographics;
  symptom: PrimarySymptom | null;
  answers: FollowUpAnswer[];
  askedQuestionIds: string[];
  categoryTurns: Record<QuestionCategory, number>;
  fieldAsks: Record<DemographicField, number>;
  corrections: Record<DemographicField, number>;
  symptomClarifications: number;
  pending: PendingQuestion | null;
  turns: number;
  lastMessageId: string | null;
  lastAction: EngineAction | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
  abandonReason: AbandonReason | null;
  handedOff: boolean;
}

// ============================================================================
// Snapshot handed downstream on completion
// ============================================================================

export interface IntakeSnapshot {
  readonly conversationId: string;
  readonly name: string | null;
  readonly age: number | null;
  readonly gender: Gender | null;
  readonly email: string;
  readonly symptom: Readonly<PrimarySymptom>;
  readonly answers: ReadonlyArray<Readonly<FollowUpAnswer>>;
  readonly completedAt: string;
}

// ============================================================================
// Engine Actions
// ============================================================================

export type EngineAction =
  | { type: 'ask'; text: string; questionId: string | null }
  | { type: 'complete'; snapshot: IntakeSnapshot }
  | { type: 'abandoned'; reason: AbandonReason };

// ============================================================================
// Policy
// ============================================================================

export interface IntakePolicy {
  minFollowUps: number;
  demographicRetryCap: number;
  symptomClarifications: number;
  categoryCaps: Record<QuestionCategory, number>;
  extractionTimeoutMs: number;
  maxSaveAttempts: number;
}

export const DEFAULT_POLICY: IntakePolicy = {
  minFollowUps: 2,
  demographicRetryCap: 2,
  symptomClarifications: 1,
  categoryCaps: { red_flag: 2, detail: 3, vital_sign: 2 },
  extractionTimeoutMs: 8000,
  maxSaveAttempts: 3,
};
