import type { AbandonReason, DemographicField, EngineAction, IntakeSnapshot } from './types';

// ============================================================================
// Patient-facing texts
// ============================================================================

const FIELD_LABELS: Record<DemographicField, string> = {
  name: 'full name',
  age: 'age',
  gender: 'gender',
  email: 'email address',
};

const ABANDON_MESSAGES: Record<AbandonReason, string> = {
  cancelled: 'Your intake has been cancelled and this conversation is now closed. Please contact the clinic if you would like to book again.',
  idle_timeout:
    'This intake was closed after a period of inactivity. Please contact the clinic if you would like to book again.',
  email_not_provided:
    'We need an email address to arrange your consultation, so this intake has been closed. Please contact the clinic if you would like to book again.',
};

function joinList(items: string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}

function thanks(name: string | null): string {
  return name ? `Thanks, ${name}.` : 'Thanks.';
}

export function greetingPrompt(fields: DemographicField[]): string {
  return (
    "Hello! I'm the clinic's intake assistant and I'll help get you ready for your consultation. " +
    `To start, could you tell me your ${joinList(fields.map(f => FIELD_LABELS[f]))}?`
  );
}

export function demographicsPrompt(fields: DemographicField[], name: string | null): string {
  return `${thanks(name)} Could you also share your ${joinList(fields.map(f => FIELD_LABELS[f]))}?`;
}

export function correctionPrompt(field: DemographicField): string {
  return `No problem. What is the correct ${FIELD_LABELS[field]}?`;
}

export function symptomPrompt(name: string | null): string {
  return `${thanks(name)} What is the main health concern that brings you in today?`;
}

export function symptomClarificationPrompt(labels: string[]): string {
  return (
    "I want to make sure I understand. Which of these is closest to what you're experiencing: " +
    `${joinList(labels.map(l => l.toLowerCase()))}? If none fit, a few words describing it is fine.`
  );
}

export function completionMessage(snapshot: IntakeSnapshot): string {
  return (
    `${snapshot.name ? `Thank you, ${snapshot.name}.` : 'Thank you.'} ` +
    "I have everything the doctor needs for your consultation. " +
    `We'll send the details to ${snapshot.email}.`
  );
}

export function abandonMessage(reason: AbandonReason): string {
  return ABANDON_MESSAGES[reason];
}

/**
 * The text to send back to the patient for an engine action.
 */
export function renderReply(action: EngineAction): string {
  switch (action.type) {
    case 'ask':
      return action.text;
    case 'complete':
      return completionMessage(action.snapshot);
    case 'abandoned':
      return abandonMessage(action.reason);
  }
}
