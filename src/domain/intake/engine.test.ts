import { describe, it, expect } from 'vitest';
import {
  ScriptedExtractor,
  FailingExtractor,
  HangingExtractor,
  buildTestEngine,
} from '../../testing/fixtures';
import { InMemorySessionStore } from '../session/store';
import { LlmExtractor } from '../extraction/llm';
import { renderReply } from './messages';
import type { IntakeRecord } from './types';
import {
  ConflictError,
  InvalidConversationIdError,
  RevisionConflictError,
  UnknownConversationError,
} from '../../shared/errors';

const JOHN = "I'm John, 28, male, john@example.com, chest pain";

const GREETING_ALL =
  "Hello! I'm the clinic's intake assistant and I'll help get you ready for your consultation. " +
  'To start, could you tell me your full name, age, gender and email address?';

class FlakyStore extends InMemorySessionStore {
  conflicts = 0;

  async save(conversationId: string, record: IntakeRecord): Promise<void> {
    if (this.conflicts > 0) {
      this.conflicts -= 1;
      throw new RevisionConflictError(conversationId, record.revision - 1, null);
    }
    return super.save(conversationId, record);
  }
}

describe('IntakeEngine', () => {
  describe('demographics', () => {
    it('collects everything from one message and moves straight to follow-ups', async () => {
      const { engine } = buildTestEngine();

      const action = await engine.processMessage('conv-1', JOHN);

      expect(action).toEqual({
        type: 'ask',
        text: 'When did the chest pain start, and is it constant or does it come and go?',
        questionId: 'chest_pain.onset',
      });

      const record = await engine.getRecord('conv-1');
      expect(record.status).toBe('collecting_followups');
      expect(record.demographics).toEqual({
        name: { value: 'John', provided: true },
        age: { value: 28, provided: true },
        gender: { value: 'male', provided: true },
        email: { value: 'john@example.com', provided: true },
      });
      expect(record.symptom).toEqual({
        key: 'chest_pain',
        label: 'Chest pain / discomfort',
        description: 'chest pain',
        matched: true,
      });
      expect(record.askedQuestionIds).toEqual(['chest_pain.onset']);
      expect(record.fieldAsks).toEqual({ name: 0, age: 0, gender: 0, email: 0 });
      expect(record.revision).toBe(1);
      expect(record.turns).toBe(1);
    });

    it('greets a new patient and asks for every field', async () => {
      const { engine } = buildTestEngine({ extractor: new ScriptedExtractor() });

      const action = await engine.processMessage('conv-1', 'hi');

      expect(action).toEqual({ type: 'ask', text: GREETING_ALL, questionId: null });
      const record = await engine.getRecord('conv-1');
      expect(record.fieldAsks).toEqual({ name: 1, age: 1, gender: 1, email: 1 });
      expect(record.pending).toEqual({
        kind: 'demographics',
        fields: ['name', 'age', 'gender', 'email'],
        correction: false,
      });
    });

    it('moves on without a name once the name was asked for twice', async () => {
      const extractor = new ScriptedExtractor([{ email: 'pat@example.com' }]);
      const { engine } = buildTestEngine({ extractor });

      const first = await engine.processMessage('conv-1', 'pat@example.com');
      expect(first).toEqual({
        type: 'ask',
        text:
          "Hello! I'm the clinic's intake assistant and I'll help get you ready for your consultation. " +
          'To start, could you tell me your full name, age and gender?',
        questionId: null,
      });

      const second = await engine.processMessage('conv-1', 'not telling');
      expect(second).toEqual({
        type: 'ask',
        text: 'Thanks. Could you also share your full name, age and gender?',
        questionId: null,
      });

      const third = await engine.processMessage('conv-1', 'still no');
      expect(third).toEqual({
        type: 'ask',
        text: 'Thanks. What is the main health concern that brings you in today?',
        questionId: null,
      });

      const record = await engine.getRecord('conv-1');
      expect(record.status).toBe('collecting_symptom');
      expect(record.demographics.name).toEqual({ value: null, provided: false });
      expect(record.fieldAsks.name).toBe(2);
    });

    it('abandons the intake when no email arrives after the retry cap', async () => {
      const { engine } = buildTestEngine({ extractor: new ScriptedExtractor() });

      await engine.processMessage('conv-1', 'hi');
      await engine.processMessage('conv-1', 'hello?');
      const action = await engine.processMessage('conv-1', 'no');

      expect(action).toEqual({ type: 'abandoned', reason: 'email_not_provided' });
      const record = await engine.getRecord('conv-1');
      expect(record.status).toBe('abandoned');
      expect(record.abandonReason).toBe('email_not_provided');
    });

    it('keeps a provided field when a later message disagrees', async () => {
      const extractor = new ScriptedExtractor([
        { name: 'Ana', email: 'ana@example.com' },
        { email: 'other@example.com' },
      ]);
      const { engine } = buildTestEngine({ extractor });

      await engine.processMessage('conv-1', 'Ana, ana@example.com');
      await engine.processMessage('conv-1', 'reach me at other@example.com');

      const record = await engine.getRecord('conv-1');
      expect(record.demographics.email.value).toBe('ana@example.com');
    });

    it('lets the patient correct a field once when they say it is wrong', async () => {
      const { engine } = buildTestEngine();

      await engine.processMessage('conv-1', "I'm John, john@exmaple.com");

      const ask = await engine.processMessage('conv-1', 'my email is wrong');
      expect(ask).toEqual({ type: 'ask', text: 'No problem. What is the correct email address?', questionId: null });

      const after = await engine.processMessage('conv-1', 'john@example.com');
      expect(after).toEqual({
        type: 'ask',
        text: 'Thanks, John. What is the main health concern that brings you in today?',
        questionId: null,
      });

      const record = await engine.getRecord('conv-1');
      expect(record.demographics.email.value).toBe('john@example.com');
      expect(record.corrections.email).toBe(1);
    });
  });

  describe('symptom', () => {
    it('takes a symptom description that mentions a field as the symptom, not a correction', async () => {
      const { engine } = buildTestEngine();

      await engine.processMessage('conv-1', "I'm Ana, 40, ana@example.com");
      const action = await engine.processMessage('conv-1', 'chest pain that seems to change with age and activity');

      expect(action).toEqual({
        type: 'ask',
        text: 'When did the chest pain start, and is it constant or does it come and go?',
        questionId: 'chest_pain.onset',
      });

      const record = await engine.getRecord('conv-1');
      expect(record.status).toBe('collecting_followups');
      expect(record.symptom?.key).toBe('chest_pain');
      expect(record.demographics.age).toEqual({ value: 40, provided: true });
      expect(record.corrections.age).toBe(0);
    });

    it('asks once for clarification, then falls back to the general entry', async () => {
      const { engine } = buildTestEngine();

      const askSymptom = await engine.processMessage('conv-1', "I'm Ana, ana@example.com");
      expect(askSymptom).toEqual({
        type: 'ask',
        text: 'Thanks, Ana. What is the main health concern that brings you in today?',
        questionId: null,
      });

      const clarify = await engine.processMessage('conv-1', 'my elbow itches');
      expect(clarify).toEqual({
        type: 'ask',
        text:
          "I want to make sure I understand. Which of these is closest to what you're experiencing: " +
          'chest pain / discomfort, shortness of breath, palpitations, dizziness, fatigue, leg swelling and routine check-up? ' +
          'If none fit, a few words describing it is fine.',
        questionId: null,
      });

      const followUp = await engine.processMessage('conv-1', 'it is a rash on my arm');
      expect(followUp).toEqual({
        type: 'ask',
        text: 'When did this problem start, and has it been getting better or worse?',
        questionId: 'general.onset',
      });

      const record = await engine.getRecord('conv-1');
      expect(record.symptom).toEqual({
        key: 'general',
        label: 'General concern',
        description: 'it is a rash on my arm',
        matched: false,
      });
      expect(record.symptomClarifications).toBe(1);
    });

    it('takes the answer to the clarification as-is, even when it names a catalog symptom', async () => {
      const { engine } = buildTestEngine();

      await engine.processMessage('conv-1', "I'm Ana, ana@example.com");
      await engine.processMessage('conv-1', 'my elbow itches');
      const action = await engine.processMessage('conv-1', 'actually I feel dizzy');

      expect(action).toEqual({
        type: 'ask',
        text: 'When did this problem start, and has it been getting better or worse?',
        questionId: 'general.onset',
      });
      const record = await engine.getRecord('conv-1');
      expect(record.symptom).toEqual({
        key: 'general',
        label: 'General concern',
        description: 'dizzy',
        matched: false,
      });
    });

    it('falls back without clarifying when clarifications are disabled', async () => {
      const { engine } = buildTestEngine({ policy: { symptomClarifications: 0 } });

      await engine.processMessage('conv-1', "I'm Ana, ana@example.com");
      const action = await engine.processMessage('conv-1', 'my elbow itches');

      expect(action).toEqual({
        type: 'ask',
        text: 'When did this problem start, and has it been getting better or worse?',
        questionId: 'general.onset',
      });
    });

    it('completes at once when the matched symptom has no follow-up questions', async () => {
      const { engine, sink } = buildTestEngine();

      await engine.processMessage('conv-1', "I'm Ana, ana@example.com");
      const action = await engine.processMessage('conv-1', 'I need a prescription refill');

      expect(action.type).toBe('complete');
      if (action.type !== 'complete') return;
      expect(action.snapshot.symptom.key).toBe('routine_checkup');
      expect(action.snapshot.answers).toEqual([]);
      expect(sink.snapshots).toHaveLength(1);
    });
  });

  describe('follow-ups', () => {
    it('completes after the minimum number of answers and hands off once', async () => {
      const { engine, sink } = buildTestEngine();

      await engine.processMessage('conv-1', JOHN);
      const second = await engine.processMessage('conv-1', 'Started yesterday, comes and goes');
      expect(second).toEqual({
        type: 'ask',
        text: 'How would you describe the pain: pressure, squeezing, sharp or burning?',
        questionId: 'chest_pain.character',
      });

      const done = await engine.processMessage('conv-1', 'Pressure');
      expect(done).toEqual({
        type: 'complete',
        snapshot: {
          conversationId: 'conv-1',
          name: 'John',
          age: 28,
          gender: 'male',
          email: 'john@example.com',
          symptom: { key: 'chest_pain', label: 'Chest pain / discomfort', description: 'chest pain', matched: true },
          answers: [
            {
              questionId: 'chest_pain.onset',
              questionText: 'When did the chest pain start, and is it constant or does it come and go?',
              category: 'detail',
              answer: 'Started yesterday, comes and goes',
            },
            {
              questionId: 'chest_pain.character',
              questionText: 'How would you describe the pain: pressure, squeezing, sharp or burning?',
              category: 'detail',
              answer: 'Pressure',
            },
          ],
          completedAt: '2026-03-02T09:00:03.000Z',
        },
      });

      expect(sink.snapshots).toHaveLength(1);
      expect(Object.isFrozen(sink.snapshots[0])).toBe(true);

      const record = await engine.getRecord('conv-1');
      expect(record.status).toBe('complete');
      expect(record.handedOff).toBe(true);
      expect(record.revision).toBe(4);

      // Later messages replay the completion without a second handoff
      const again = await engine.processMessage('conv-1', 'hello again');
      expect(again).toEqual(done);
      expect(sink.snapshots).toHaveLength(1);
    });

    it('asks red-flag questions first once a trigger phrase appears', async () => {
      const { engine } = buildTestEngine();

      await engine.processMessage('conv-1', JOHN);
      const action = await engine.processMessage('conv-1', 'It spreads to my left arm');

      expect(action).toEqual({
        type: 'ask',
        text: 'Does the pain spread to your arm, jaw, neck or back?',
        questionId: 'chest_pain.radiation',
      });
    });

    it('never repeats a question and completes when the candidates run out', async () => {
      const { engine } = buildTestEngine({ policy: { minFollowUps: 10 } });

      await engine.processMessage('conv-1', JOHN);
      let action = await engine.processMessage('conv-1', 'no');
      for (let i = 0; i < 5; i++) {
        action = await engine.processMessage('conv-1', 'no');
      }

      expect(action.type).toBe('complete');
      const record = await engine.getRecord('conv-1');
      expect(record.askedQuestionIds).toEqual([
        'chest_pain.onset',
        'chest_pain.character',
        'chest_pain.exertion',
        'chest_pain.vitals',
        'chest_pain.radiation',
        'chest_pain.associated',
      ]);
      expect(new Set(record.askedQuestionIds).size).toBe(record.askedQuestionIds.length);
      expect(record.answers).toHaveLength(6);
      expect(record.categoryTurns).toEqual({ red_flag: 2, detail: 3, vital_sign: 1 });
    });

    it('respects category caps', async () => {
      const { engine } = buildTestEngine({
        policy: { minFollowUps: 10, categoryCaps: { red_flag: 1, detail: 1, vital_sign: 0 } },
      });

      await engine.processMessage('conv-1', JOHN);
      const second = await engine.processMessage('conv-1', 'no');
      expect(second).toEqual({
        type: 'ask',
        text: 'Does the pain spread to your arm, jaw, neck or back?',
        questionId: 'chest_pain.radiation',
      });

      const third = await engine.processMessage('conv-1', 'no');
      expect(third.type).toBe('complete');
    });
  });

  describe('handoff', () => {
    it('retries a failed handoff on the next delivery', async () => {
      const { engine, sink } = buildTestEngine();
      sink.failures = 1;

      await engine.processMessage('conv-1', JOHN);
      await engine.processMessage('conv-1', 'yesterday');
      const done = await engine.processMessage('conv-1', 'sharp');

      expect(done.type).toBe('complete');
      expect(sink.snapshots).toHaveLength(0);
      expect((await engine.getRecord('conv-1')).handedOff).toBe(false);

      await engine.processMessage('conv-1', 'are you there?');

      expect(sink.snapshots).toHaveLength(1);
      expect((await engine.getRecord('conv-1')).handedOff).toBe(true);
    });
  });

  describe('extraction failures', () => {
    it('keeps the valid fields of a model reply that has one bad value', async () => {
      const extractor = new LlmExtractor({
        client: {
          create: async () => ({
            model: 'claude-test',
            content: [
              {
                type: 'text',
                text: '{"name":"John","email":"john@example.com","age":"twenty-eight","symptom":"chest pain"}',
              },
            ],
            usage: { input_tokens: 100, output_tokens: 20 },
          }),
        },
        model: 'claude-test',
      });
      const { engine } = buildTestEngine({ extractor });

      const action = await engine.processMessage('conv-1', "I'm John, twenty-eight, john@example.com, chest pain");

      expect(action).toEqual({
        type: 'ask',
        text: 'When did the chest pain start, and is it constant or does it come and go?',
        questionId: 'chest_pain.onset',
      });
      const record = await engine.getRecord('conv-1');
      expect(record.demographics.name).toEqual({ value: 'John', provided: true });
      expect(record.demographics.email).toEqual({ value: 'john@example.com', provided: true });
      expect(record.demographics.age.provided).toBe(false);
      expect(record.fieldAsks.email).toBe(0);
    });

    it('continues without fields when the extractor throws', async () => {
      const { engine } = buildTestEngine({ extractor: new FailingExtractor() });

      const action = await engine.processMessage('conv-1', 'hi');

      expect(action).toEqual({ type: 'ask', text: GREETING_ALL, questionId: null });
    });

    it('aborts a slow extractor and continues without fields', async () => {
      const extractor = new HangingExtractor();
      const { engine } = buildTestEngine({ extractor, policy: { extractionTimeoutMs: 20 } });

      const action = await engine.processMessage('conv-1', 'hi');

      expect(action).toEqual({ type: 'ask', text: GREETING_ALL, questionId: null });
      expect(extractor.aborted).toBe(true);
    });

    it('does not call the extractor for follow-up answers', async () => {
      const extractor = new ScriptedExtractor([
        { name: 'Ana', email: 'ana@example.com', symptom: 'dizzy' },
      ]);
      const { engine } = buildTestEngine({ extractor });

      await engine.processMessage('conv-1', 'Ana, ana@example.com, dizzy');
      await engine.processMessage('conv-1', 'only when I stand up');

      expect(extractor.calls).toHaveLength(1);
      expect(extractor.calls[0]?.context.conversationId).toBe('conv-1');
      expect(extractor.calls[0]?.context.missingFields).toEqual(['name', 'age', 'gender', 'email', 'symptom']);
    });
  });

  describe('redelivery and blank input', () => {
    it('replays the last action for a duplicate message id', async () => {
      const { engine } = buildTestEngine();

      const first = await engine.processMessage('conv-1', "I'm Ana, ana@example.com", { messageId: 'm1' });
      const replay = await engine.processMessage('conv-1', 'chest pain', { messageId: 'm1' });

      expect(replay).toEqual(first);
      const record = await engine.getRecord('conv-1');
      expect(record.revision).toBe(1);
      expect(record.turns).toBe(1);
    });

    it('repeats the open question for a message with no content', async () => {
      const { engine } = buildTestEngine();

      const first = await engine.processMessage('conv-1', "I'm Ana, ana@example.com");
      const again = await engine.processMessage('conv-1', '  ...  ');

      expect(again).toEqual(first);
      expect((await engine.getRecord('conv-1')).revision).toBe(1);
    });
  });

  describe('cancel and idle timeout', () => {
    it('cancels an intake and keeps answering with the cancellation', async () => {
      const { engine } = buildTestEngine();

      await engine.processMessage('conv-1', "I'm Ana, ana@example.com");
      const cancelled = await engine.cancel('conv-1');

      expect(cancelled).toEqual({ type: 'abandoned', reason: 'cancelled' });
      expect(await engine.processMessage('conv-1', 'chest pain')).toEqual(cancelled);

      const again = await engine.processMessage('conv-1', 'hi, I would like to start again');
      expect(again).toEqual(cancelled);
      expect(renderReply(again)).toBe(
        'Your intake has been cancelled and this conversation is now closed. Please contact the clinic if you would like to book again.'
      );
      expect((await engine.getRecord('conv-1')).status).toBe('abandoned');
    });

    it('ignores a stale idle timeout and honours a current one', async () => {
      const { engine } = buildTestEngine();

      await engine.processMessage('conv-1', "I'm Ana, ana@example.com");

      expect(await engine.signalIdleTimeout('conv-1', 0)).toBeNull();
      expect((await engine.getRecord('conv-1')).status).toBe('collecting_symptom');

      expect(await engine.signalIdleTimeout('conv-1', 1)).toEqual({ type: 'abandoned', reason: 'idle_timeout' });
      expect(await engine.signalIdleTimeout('conv-1', 1)).toBeNull();
      expect(await engine.processMessage('conv-1', 'chest pain')).toEqual({ type: 'abandoned', reason: 'idle_timeout' });
    });

    it('rejects signals for unknown conversations', async () => {
      const { engine } = buildTestEngine();

      await expect(engine.cancel('missing')).rejects.toBeInstanceOf(UnknownConversationError);
      await expect(engine.signalIdleTimeout('missing', 1)).rejects.toBeInstanceOf(UnknownConversationError);
      await expect(engine.getRecord('missing')).rejects.toBeInstanceOf(UnknownConversationError);
    });

    it('rejects malformed conversation ids', async () => {
      const { engine } = buildTestEngine();

      await expect(engine.processMessage('bad id!', 'hi')).rejects.toBeInstanceOf(InvalidConversationIdError);
    });
  });

  describe('concurrency', () => {
    it('serialises messages for the same conversation', async () => {
      const { engine } = buildTestEngine();

      await Promise.all([
        engine.processMessage('conv-1', "I'm Ana, ana@example.com"),
        engine.processMessage('conv-1', 'chest pain'),
      ]);

      const record = await engine.getRecord('conv-1');
      expect(record.turns).toBe(2);
      expect(record.revision).toBe(2);
      expect(record.askedQuestionIds).toEqual(['chest_pain.onset']);
    });

    it('retries the cycle after a revision conflict', async () => {
      const store = new FlakyStore();
      store.conflicts = 1;
      const { engine } = buildTestEngine({ store });

      const action = await engine.processMessage('conv-1', "I'm Ana, ana@example.com");

      expect(action.type).toBe('ask');
      expect((await engine.getRecord('conv-1')).revision).toBe(1);
    });

    it('gives up after repeated conflicts', async () => {
      const store = new FlakyStore();
      store.conflicts = 3;
      const { engine } = buildTestEngine({ store });

      await expect(engine.processMessage('conv-1', 'hi')).rejects.toBeInstanceOf(ConflictError);
      expect(store.size).toBe(0);
    });
  });
});
