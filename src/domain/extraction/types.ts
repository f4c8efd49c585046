import type { DemographicField, IntakeStatus } from '../intake/types';

export type ExtractableField = DemographicField | 'symptom';

/**
 * Best-effort field values proposed for one utterance. A field the
 * extractor could not determine is absent, never a placeholder.
 */
export interface PartialFieldMap {
  name?: string;
  age?: number;
  gender?: string;
  email?: string;
  symptom?: string;
}

export interface ExtractionContext {
  conversationId?: string;
  /** Fields the record still needs (plus a field under correction) */
  missingFields: ExtractableField[];
  status: IntakeStatus;
  /** Text of the question the patient is answering, if any */
  lastQuestion: string | null;
  signal?: AbortSignal;
}

export interface Extractor {
  readonly name: string;
  extract(text: string, context: ExtractionContext): Promise<PartialFieldMap>;
}
