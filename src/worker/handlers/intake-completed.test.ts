import { describe, it, expect, vi } from 'vitest';
import { handleIntakeCompleted } from './intake-completed';
import type { IntakeSnapshot } from '../../domain/intake/types';
import { DatabaseError } from '../../shared/errors';
import { silentLogger } from '../../testing/fixtures';

const snapshot: IntakeSnapshot = {
  conversationId: 'conv-1',
  name: 'Ana Silva',
  age: 52,
  gender: 'female',
  email: 'ana@example.com',
  symptom: { key: 'dizziness', label: 'Dizziness', description: 'dizzy', matched: true },
  answers: [],
  completedAt: '2026-03-02T09:05:00.000Z',
};

describe('handleIntakeCompleted', () => {
  it('archives the snapshot and notifies the doctor', async () => {
    const saveCompleted = vi.fn(async () => true);
    const notifyCompleted = vi.fn(async () => 'sent' as const);

    const result = await handleIntakeCompleted(
      { type: 'intake_completed', correlationId: 'corr-1', snapshot },
      silentLogger,
      { archive: { saveCompleted }, notifier: { notifyCompleted } }
    );

    expect(result).toEqual({ status: 'completed', correlationId: 'corr-1', action: 'archived:new,notified:sent' });
    expect(saveCompleted).toHaveBeenCalledWith(snapshot);
    expect(notifyCompleted).toHaveBeenCalledWith(snapshot);
  });

  it('reports a redelivered job that finds everything already done', async () => {
    const result = await handleIntakeCompleted(
      { type: 'intake_completed', correlationId: 'corr-1', snapshot },
      silentLogger,
      {
        archive: { saveCompleted: async () => false },
        notifier: { notifyCompleted: async () => 'duplicate' as const },
      }
    );

    expect(result.action).toBe('archived:existing,notified:duplicate');
  });

  it('does not notify when archiving fails', async () => {
    const notifyCompleted = vi.fn(async () => 'sent' as const);

    await expect(
      handleIntakeCompleted(
        { type: 'intake_completed', correlationId: 'corr-1', snapshot },
        silentLogger,
        {
          archive: {
            saveCompleted: async () => {
              throw new DatabaseError('connection refused');
            },
          },
          notifier: { notifyCompleted },
        }
      )
    ).rejects.toBeInstanceOf(DatabaseError);

    expect(notifyCompleted).not.toHaveBeenCalled();
  });
});
