import { z } from 'zod';
import type { EngineAction, IntakeRecord } from './types';

// Stored records are parsed back through these schemas on load.

const statusSchema = z.enum([
  'collecting_demographics',
  'collecting_symptom',
  'collecting_followups',
  'complete',
  'abandoned',
]);

const categorySchema = z.enum(['red_flag', 'detail', 'vital_sign']);
const demographicFieldSchema = z.enum(['name', 'age', 'gender', 'email']);
const genderSchema = z.enum(['male', 'female', 'other']);
const abandonReasonSchema = z.enum(['cancelled', 'idle_timeout', 'email_not_provided']);

function slot<T extends z.ZodTypeAny>(value: T) {
  return z.object({ value: value.nullable(), provided: z.boolean() });
}

const symptomSchema = z.object({
  key: z.string(),
  label: z.string(),
  description: z.string(),
  matched: z.boolean(),
});

const answerSchema = z.object({
  questionId: z.string(),
  questionText: z.string(),
  category: categorySchema,
  answer: z.string(),
});

const snapshotSchema = z.object({
  conversationId: z.string(),
  name: z.string().nullable(),
  age: z.number().int().nullable(),
  gender: genderSchema.nullable(),
  email: z.string(),
  symptom: symptomSchema,
  answers: z.array(answerSchema),
  completedAt: z.string(),
});

export const engineActionSchema: z.ZodType<EngineAction> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ask'), text: z.string(), questionId: z.string().nullable() }),
  z.object({ type: z.literal('complete'), snapshot: snapshotSchema }),
  z.object({ type: z.literal('abandoned'), reason: abandonReasonSchema }),
]);

const pendingSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('demographics'), fields: z.array(demographicFieldSchema), correction: z.boolean() }),
  z.object({ kind: z.literal('symptom'), clarification: z.boolean() }),
  z.object({
    kind: z.literal('followup'),
    questionId: z.string(),
    questionText: z.string(),
    category: categorySchema,
  }),
]);

const counterSchema = z.number().int().min(0);

export const intakeRecordSchema: z.ZodType<IntakeRecord> = z.object({
  conversationId: z.string(),
  revision: z.number().int().min(0),
  status: statusSchema,
  demographics: z.object({
    name: slot(z.string()),
    age: slot(z.number().int()),
    gender: slot(genderSchema),
    email: slot(z.string()),
  }),
  symptom: symptomSchema.nullable(),
  answers: z.array(answerSchema),
  askedQuestionIds: z.array(z.string()),
  categoryTurns: z.object({ red_flag: counterSchema, detail: counterSchema, vital_sign: counterSchema }),
  fieldAsks: z.object({ name: counterSchema, age: counterSchema, gender: counterSchema, email: counterSchema }),
  corrections: z.object({ name: counterSchema, age: counterSchema, gender: counterSchema, email: counterSchema }),
  symptomClarifications: counterSchema,
  pending: pendingSchema.nullable(),
  turns: counterSchema,
  lastMessageId: z.string().nullable(),
  lastAction: engineActionSchema.nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().nullable(),
  abandonReason: abandonReasonSchema.nullable(),
  handedOff: z.boolean(),
});
