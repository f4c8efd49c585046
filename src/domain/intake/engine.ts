import type { Logger } from 'pino';
import type { SymptomCatalog } from '../catalog/service';
import type { ExtractionContext, ExtractableField, Extractor, PartialFieldMap } from '../extraction/types';
import type { SessionStore } from '../session/store';
import type {
  AbandonReason,
  DemographicField,
  EngineAction,
  IntakePolicy,
  IntakeRecord,
  IntakeSnapshot,
} from './types';
import { DEFAULT_POLICY } from './types';
import { cloneRecord, createRecord, isTerminal, missingDemographics, toSnapshot } from './record';
import { mergeDemographics } from './merge';
import { hasRedFlagSignal, selectNextQuestion } from './selection';
import {
  correctionPrompt,
  demographicsPrompt,
  greetingPrompt,
  symptomClarificationPrompt,
  symptomPrompt,
} from './messages';
import { logger as rootLogger } from '../../infra/logging/logger';
import {
  AppError,
  ConflictError,
  ExtractionTimeoutError,
  InvalidConversationIdError,
  RevisionConflictError,
  UnknownConversationError,
  isAppError,
} from '../../shared/errors';
import { KeyedMutex } from '../../shared/keyed-mutex';
import { isValidConversationId, isValidMessage, sanitizeInput } from '../../shared/validation';

/**
 * Receives the snapshot of a completed intake. Called at most once per
 * record unless the call fails, in which case the next delivery retries.
 */
export interface CompletionSink {
  handoff(snapshot: IntakeSnapshot): Promise<void>;
}

/**
 * Arms an idle timeout for the record state reached after `turn`.
 */
export interface IdleTimeoutScheduler {
  schedule(conversationId: string, turn: number): Promise<void>;
}

export interface IntakeEngineDeps {
  store: SessionStore;
  extractor: Extractor;
  catalog: SymptomCatalog;
  completionSink: CompletionSink;
  policy?: IntakePolicy;
  logger?: Logger;
  now?: () => Date;
}

export interface ProcessOptions {
  /** Transport message id; a redelivered id returns the earlier action */
  messageId?: string;
}

interface CycleResult {
  action: EngineAction | null;
  /** Record to persist, or null when nothing changed */
  next: IntakeRecord | null;
}

const CORRECTION_PATTERN = /\b(wrong|incorrect|mistake|typo|change|update|fix)\b/i;

const CORRECTION_FIELDS: Array<[DemographicField, RegExp]> = [
  ['email', /\be-?mail\b/i],
  ['name', /\bname\b/i],
  ['age', /\bage\b/i],
  ['gender', /\b(gender|sex)\b/i],
];

function detectCorrectionRequest(text: string): DemographicField | null {
  if (!CORRECTION_PATTERN.test(text)) return null;
  for (const [field, pattern] of CORRECTION_FIELDS) {
    if (pattern.test(text)) return field;
  }
  return null;
}

// ============================================================================
// Intake Dialogue Engine
// ============================================================================

export class IntakeEngine {
  private readonly store: SessionStore;
  private readonly extractor: Extractor;
  private readonly catalog: SymptomCatalog;
  private readonly completionSink: CompletionSink;
  private readonly policy: IntakePolicy;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly mutex = new KeyedMutex();

  constructor(deps: IntakeEngineDeps) {
    this.store = deps.store;
    this.extractor = deps.extractor;
    this.catalog = deps.catalog;
    this.completionSink = deps.completionSink;
    this.policy = deps.policy ?? DEFAULT_POLICY;
    this.log = (deps.logger ?? rootLogger).child({ module: 'intake-engine' });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Process one inbound patient message and return what to do next.
   */
  async processMessage(conversationId: string, rawText: string, options: ProcessOptions = {}): Promise<EngineAction> {
    this.assertValidId(conversationId);
    const text = sanitizeInput(rawText);

    const action = await this.runCycle(conversationId, 'message', async (stored) => {
      const record = stored ?? createRecord(conversationId, this.now());

      if (isTerminal(record)) {
        return { action: this.terminalAction(record), next: null };
      }

      if (options.messageId && record.lastMessageId === options.messageId && record.lastAction) {
        this.log.info({ conversationId, messageId: options.messageId }, 'Duplicate message delivery, replaying last action');
        return { action: record.lastAction, next: null };
      }

      // Nothing usable in the message: repeat the open question
      if (!isValidMessage(text) && record.lastAction?.type === 'ask') {
        return { action: record.lastAction, next: null };
      }

      const next = cloneRecord(record);
      next.turns += 1;
      const turnAction = await this.advance(next, text);
      this.finishTurn(next, turnAction, options.messageId ?? null);
      return { action: turnAction, next };
    });

    if (!action) {
      throw new AppError('Intake cycle produced no action', 500, 'INVALID_STATE', false);
    }
    return action;
  }

  /**
   * Abandon an in-progress intake at the patient's request.
   */
  async cancel(conversationId: string): Promise<EngineAction> {
    this.assertValidId(conversationId);

    const action = await this.runCycle(conversationId, 'cancel', async (stored) => {
      const record = this.requireRecord(conversationId, stored);
      if (isTerminal(record)) {
        return { action: this.terminalAction(record), next: null };
      }

      const next = cloneRecord(record);
      const abandoned = this.abandon(next, 'cancelled');
      this.finishTurn(next, abandoned, null);
      return { action: abandoned, next };
    });

    if (!action) {
      throw new AppError('Intake cycle produced no action', 500, 'INVALID_STATE', false);
    }
    return action;
  }

  /**
   * Deliver an idle timeout scheduled after `turn`. Returns null when the
   * signal is stale (the patient wrote since) or the intake already ended.
   */
  async signalIdleTimeout(conversationId: string, turn: number): Promise<EngineAction | null> {
    this.assertValidId(conversationId);

    return this.runCycle(conversationId, 'idle_timeout', async (stored) => {
      const record = this.requireRecord(conversationId, stored);

      if (isTerminal(record)) {
        return { action: null, next: null };
      }
      if (record.turns !== turn) {
        this.log.debug({ conversationId, turn, currentTurn: record.turns }, 'Ignoring stale idle timeout');
        return { action: null, next: null };
      }

      const next = cloneRecord(record);
      const abandoned = this.abandon(next, 'idle_timeout');
      this.finishTurn(next, abandoned, null);
      return { action: abandoned, next };
    });
  }

  async getRecord(conversationId: string): Promise<IntakeRecord> {
    this.assertValidId(conversationId);
    return this.requireRecord(conversationId, await this.store.load(conversationId));
  }

  // ==========================================================================
  // Cycle: load, decide, compare-and-swap save
  // ==========================================================================

  private async runCycle(
    conversationId: string,
    operation: string,
    decide: (stored: IntakeRecord | null) => Promise<CycleResult>
  ): Promise<EngineAction | null> {
    return this.mutex.runExclusive(conversationId, async () => {
      for (let attempt = 1; attempt <= this.policy.maxSaveAttempts; attempt++) {
        const stored = await this.store.load(conversationId);
        const { action, next } = await decide(stored);

        if (next) {
          try {
            await this.store.save(conversationId, next);
          } catch (error) {
            if (error instanceof RevisionConflictError) {
              this.log.warn({ conversationId, operation, attempt }, 'Revision conflict, retrying intake cycle');
              continue;
            }
            throw error;
          }

          this.log.info(
            { conversationId, operation, status: next.status, revision: next.revision, action: action?.type },
            'Intake record saved'
          );
        }

        const current = next ?? stored;
        if (current) {
          await this.handOff(current);
        }
        return action;
      }

      throw new ConflictError(
        `Intake ${conversationId} changed concurrently ${this.policy.maxSaveAttempts} times, giving up`
      );
    });
  }

  private async handOff(record: IntakeRecord): Promise<void> {
    if (record.status !== 'complete' || record.handedOff) return;

    const snapshot = toSnapshot(record);
    if (!snapshot) {
      this.log.error({ conversationId: record.conversationId }, 'Completed record has no valid snapshot');
      return;
    }

    try {
      await this.completionSink.handoff(snapshot);
    } catch (error) {
      // handedOff stays false, so the next delivery tries again
      this.log.error({ conversationId: record.conversationId, err: error }, 'Completion handoff failed');
      return;
    }

    const next = cloneRecord(record);
    next.handedOff = true;
    next.revision += 1;
    next.updatedAt = this.now().toISOString();

    try {
      await this.store.save(record.conversationId, next);
      this.log.info({ conversationId: record.conversationId }, 'Intake handed off');
    } catch (error) {
      this.log.error(
        { conversationId: record.conversationId, err: error },
        'Handoff delivered but flag not saved; a later delivery will repeat it'
      );
    }
  }

  // ==========================================================================
  // State machine
  // ==========================================================================

  private async advance(record: IntakeRecord, text: string): Promise<EngineAction> {
    const pending = record.pending;
    const pendingCorrection = pending?.kind === 'demographics' && pending.correction ? pending.fields[0] ?? null : null;

    let requested = this.correctionRequest(record, text);
    const fields = await this.extractFields(record, text, pendingCorrection ?? requested);

    // While the symptom is open, a message describing one is not a correction
    if (requested && record.status === 'collecting_symptom' && !record.symptom && this.describesSymptom(text, fields)) {
      this.log.debug({ conversationId: record.conversationId, field: requested }, 'Ignoring correction keyword in symptom description');
      requested = null;
    }
    const correcting = pendingCorrection ?? requested;

    const merged = mergeDemographics(record.demographics, fields, correcting);
    for (const { field, outcome } of merged) {
      this.log.debug({ conversationId: record.conversationId, field, outcome }, 'Merged extracted field');
    }

    if (requested) {
      record.corrections[requested] += 1;
      const corrected = merged.some(m => m.field === requested && m.outcome === 'accepted');
      if (!corrected) {
        return this.ask(record, correctionPrompt(requested), null, { kind: 'demographics', fields: [requested], correction: true });
      }
    }

    if (record.status === 'collecting_demographics') {
      const action = this.stepDemographics(record, fields);
      if (action) return action;
    }

    if (record.status === 'collecting_symptom') {
      const action = this.stepSymptom(record, text, fields, pending?.kind === 'symptom' ? pending : null);
      if (action) return action;
    }

    return this.stepFollowUps(record, text, pending?.kind === 'followup' ? pending : null);
  }

  private stepDemographics(record: IntakeRecord, fields: PartialFieldMap): EngineAction | null {
    const { demographics, fieldAsks } = record;
    const cap = this.policy.demographicRetryCap;

    // A recognised complaint mentioned early is kept
    if (fields.symptom && !record.symptom) {
      const match = this.catalog.lookup(fields.symptom);
      if (match.kind === 'matched') {
        record.symptom = { key: match.entry.key, label: match.entry.label, description: fields.symptom, matched: true };
      }
    }

    if (demographics.email.provided && (demographics.name.provided || fieldAsks.name >= cap)) {
      this.log.info(
        { conversationId: record.conversationId, nameProvided: demographics.name.provided },
        'Demographics collected'
      );
      record.status = 'collecting_symptom';
      return null;
    }

    if (!demographics.email.provided && fieldAsks.email >= cap) {
      return this.abandon(record, 'email_not_provided');
    }

    const askFor = missingDemographics(record).filter(field => fieldAsks[field] < cap);
    for (const field of askFor) {
      fieldAsks[field] += 1;
    }

    const text = record.lastAction === null
      ? greetingPrompt(askFor)
      : demographicsPrompt(askFor, demographics.name.value);

    return this.ask(record, text, null, { kind: 'demographics', fields: askFor, correction: false });
  }

  private stepSymptom(
    record: IntakeRecord,
    text: string,
    fields: PartialFieldMap,
    answering: Extract<IntakeRecord['pending'], { kind: 'symptom' }> | null
  ): EngineAction | null {
    if (record.symptom) {
      record.status = 'collecting_followups';
      return null;
    }

    const candidate = fields.symptom ?? (answering && isValidMessage(text) ? text : null);
    if (candidate === null) {
      return this.ask(record, symptomPrompt(record.demographics.name.value), null, { kind: 'symptom', clarification: false });
    }

    const match = this.catalog.lookup(candidate);
    const clarificationsSpent = record.symptomClarifications >= this.policy.symptomClarifications;

    // The answer to the last allowed clarification is taken as-is
    if (match.kind === 'matched' && !(answering?.clarification && clarificationsSpent)) {
      record.symptom = { key: match.entry.key, label: match.entry.label, description: candidate, matched: true };
    } else if (!clarificationsSpent) {
      record.symptomClarifications += 1;
      this.log.info({ conversationId: record.conversationId, candidate }, 'Symptom not in catalog, clarifying');
      const labels = this.catalog.list().map(entry => entry.label);
      return this.ask(record, symptomClarificationPrompt(labels), null, { kind: 'symptom', clarification: true });
    } else {
      const fallback = this.catalog.fallback();
      record.symptom = { key: fallback.key, label: fallback.label, description: candidate, matched: false };
      this.log.info({ conversationId: record.conversationId }, 'Accepting symptom with generic follow-ups');
    }

    record.status = 'collecting_followups';
    return null;
  }

  private stepFollowUps(
    record: IntakeRecord,
    text: string,
    answering: Extract<IntakeRecord['pending'], { kind: 'followup' }> | null
  ): EngineAction {
    if (answering) {
      record.answers.push({
        questionId: answering.questionId,
        questionText: answering.questionText,
        category: answering.category,
        answer: text,
      });
    }

    if (record.answers.length >= this.policy.minFollowUps) {
      return this.complete(record);
    }

    const symptom = record.symptom;
    if (!symptom) {
      throw new AppError(`Intake ${record.conversationId} reached follow-ups without a symptom`, 500, 'INVALID_STATE', false);
    }

    const entry = this.catalog.get(symptom.key) ?? this.catalog.fallback();
    const redFlag = hasRedFlagSignal(record, entry, this.catalog);
    const question = selectNextQuestion(record, entry, this.policy, redFlag);

    if (!question) {
      this.log.info({ conversationId: record.conversationId, answers: record.answers.length }, 'Follow-up questions exhausted');
      return this.complete(record);
    }

    record.askedQuestionIds.push(question.id);
    record.categoryTurns[question.category] += 1;

    return this.ask(record, question.text, question.id, {
      kind: 'followup',
      questionId: question.id,
      questionText: question.text,
      category: question.category,
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async extractFields(
    record: IntakeRecord,
    text: string,
    correcting: DemographicField | null
  ): Promise<PartialFieldMap> {
    // Follow-up answers are stored verbatim; nothing to extract
    if (record.status === 'collecting_followups' || !isValidMessage(text)) {
      return {};
    }

    const missing: ExtractableField[] = missingDemographics(record);
    if (correcting && !missing.includes(correcting)) missing.push(correcting);
    if (!record.symptom) missing.push('symptom');

    const context: ExtractionContext = {
      conversationId: record.conversationId,
      missingFields: missing,
      status: record.status,
      lastQuestion: record.lastAction?.type === 'ask' ? record.lastAction.text : null,
    };

    const timeoutMs = this.policy.extractionTimeoutMs;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ExtractionTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      const fields = await Promise.race([
        this.extractor.extract(text, { ...context, signal: controller.signal }),
        deadline,
      ]);
      this.log.debug({ conversationId: record.conversationId, fields: Object.keys(fields) }, 'Extracted fields');
      return fields;
    } catch (error) {
      this.log.warn(
        {
          conversationId: record.conversationId,
          extractor: this.extractor.name,
          code: isAppError(error) ? error.code : undefined,
          err: error,
        },
        'Extraction failed, continuing without extracted fields'
      );
      return {};
    } finally {
      clearTimeout(timer);
    }
  }

  private correctionRequest(record: IntakeRecord, text: string): DemographicField | null {
    if (record.status !== 'collecting_demographics' && record.status !== 'collecting_symptom') {
      return null;
    }

    const field = detectCorrectionRequest(text);
    if (!field || !record.demographics[field].provided || record.corrections[field] >= 1) {
      return null;
    }
    return field;
  }

  private describesSymptom(text: string, fields: PartialFieldMap): boolean {
    return fields.symptom !== undefined || this.catalog.lookup(text).kind === 'matched';
  }

  private ask(
    record: IntakeRecord,
    text: string,
    questionId: string | null,
    pending: NonNullable<IntakeRecord['pending']>
  ): EngineAction {
    record.pending = pending;
    return { type: 'ask', text, questionId };
  }

  private complete(record: IntakeRecord): EngineAction {
    record.status = 'complete';
    record.pending = null;
    record.completedAt = record.completedAt ?? this.now().toISOString();

    const snapshot = toSnapshot(record);
    if (!snapshot) {
      throw new AppError(`Intake ${record.conversationId} completed without email or symptom`, 500, 'INVALID_STATE', false);
    }

    this.log.info(
      { conversationId: record.conversationId, symptom: snapshot.symptom.key, answers: snapshot.answers.length },
      'Intake complete'
    );
    return { type: 'complete', snapshot };
  }

  private abandon(record: IntakeRecord, reason: AbandonReason): EngineAction {
    record.status = 'abandoned';
    record.abandonReason = reason;
    record.pending = null;
    this.log.info({ conversationId: record.conversationId, reason }, 'Intake abandoned');
    return { type: 'abandoned', reason };
  }

  private finishTurn(record: IntakeRecord, action: EngineAction, messageId: string | null): void {
    record.lastMessageId = messageId;
    record.lastAction = action;
    record.revision += 1;
    record.updatedAt = this.now().toISOString();
  }

  private terminalAction(record: IntakeRecord): EngineAction {
    if (record.status === 'abandoned') {
      return { type: 'abandoned', reason: record.abandonReason ?? 'cancelled' };
    }

    const snapshot = toSnapshot(record);
    if (!snapshot) {
      throw new AppError(`Completed intake ${record.conversationId} has no valid snapshot`, 500, 'INVALID_STATE', false);
    }
    return { type: 'complete', snapshot };
  }

  private requireRecord(conversationId: string, record: IntakeRecord | null): IntakeRecord {
    if (!record) {
      this.log.warn({ conversationId }, 'Signal for unknown conversation');
      throw new UnknownConversationError(conversationId);
    }
    return record;
  }

  private assertValidId(conversationId: string): void {
    if (!isValidConversationId(conversationId)) {
      throw new InvalidConversationIdError(conversationId);
    }
  }
}
