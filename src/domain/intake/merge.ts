import type { PartialFieldMap } from '../extraction/types';
import type { DemographicField, Demographics, Slot } from './types';
import {
  isValidAge,
  isValidEmail,
  isValidName,
  normalizeEmail,
  normalizeGender,
  normalizeName,
} from '../../shared/validation';

export type MergeOutcome = 'accepted' | 'rejected_invalid' | 'rejected_conflict' | 'unchanged';

export interface FieldMergeResult {
  field: DemographicField;
  outcome: MergeOutcome;
}

/**
 * Merge extracted demographics into the record in place.
 *
 * A missing field is filled. A provided field changes only when it is the
 * `correcting` field; any other differing value is a conflict and dropped.
 */
export function mergeDemographics(
  demographics: Demographics,
  fields: PartialFieldMap,
  correcting: DemographicField | null
): FieldMergeResult[] {
  const results: FieldMergeResult[] = [];

  if (fields.name !== undefined) {
    const name = isValidName(fields.name) ? normalizeName(fields.name) : null;
    results.push({ field: 'name', outcome: mergeSlot(demographics.name, name, correcting === 'name') });
  }

  if (fields.age !== undefined) {
    const age = isValidAge(fields.age) ? fields.age : null;
    results.push({ field: 'age', outcome: mergeSlot(demographics.age, age, correcting === 'age') });
  }

  if (fields.gender !== undefined) {
    const gender = normalizeGender(fields.gender);
    results.push({ field: 'gender', outcome: mergeSlot(demographics.gender, gender, correcting === 'gender') });
  }

  if (fields.email !== undefined) {
    const trimmed = fields.email.trim();
    const email = isValidEmail(trimmed) ? normalizeEmail(trimmed) : null;
    results.push({ field: 'email', outcome: mergeSlot(demographics.email, email, correcting === 'email') });
  }

  return results;
}

function mergeSlot<T>(slot: Slot<T>, value: T | null, overwritable: boolean): MergeOutcome {
  if (value === null) {
    return 'rejected_invalid';
  }

  if (slot.provided) {
    if (slot.value === value) return 'unchanged';
    if (!overwritable) return 'rejected_conflict';
  }

  slot.value = value;
  slot.provided = true;
  return 'accepted';
}
