import type { Pool } from 'pg';
import type { IntakeSnapshot } from '../intake/types';
import { DatabaseError } from '../../shared/errors';

/**
 * Completed intakes in Postgres. One row per conversation; archiving the
 * same snapshot twice is a no-op.
 */
export class IntakeArchiveService {
  constructor(private db: Pool) {}

  /**
   * Returns true when this call inserted the row.
   */
  async saveCompleted(snapshot: IntakeSnapshot): Promise<boolean> {
    try {
      const result = await this.db.query(
        `INSERT INTO intake_records
         (conversation_id, patient_name, age, gender, email,
          symptom_key, symptom_label, symptom_description, symptom_matched,
          answers, completed_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
         ON CONFLICT (conversation_id) DO NOTHING`,
        [
          snapshot.conversationId,
          snapshot.name,
          snapshot.age,
          snapshot.gender,
          snapshot.email,
          snapshot.symptom.key,
          snapshot.symptom.label,
          snapshot.symptom.description,
          snapshot.symptom.matched,
          JSON.stringify(snapshot.answers),
          snapshot.completedAt,
        ]
      );
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      throw new DatabaseError(`Failed to archive intake ${snapshot.conversationId}: ${err.message}`, err);
    }
  }
}
