import type { IntakeSnapshot } from '../domain/intake/types';

// ============================================================================
// Job Types
// ============================================================================

export interface IntakeCompletedJobData {
  type: 'intake_completed';
  correlationId: string;
  snapshot: IntakeSnapshot;
}

export interface IdleTimeoutJobData {
  type: 'idle_timeout';
  correlationId: string;
  conversationId: string;
  /** Record turn count when the timeout was scheduled */
  turn: number;
}

export type LifecycleJobData = IntakeCompletedJobData | IdleTimeoutJobData;

export interface JobResult {
  status: 'completed' | 'failed' | 'skipped';
  correlationId: string;
  action?: string;
  error?: string;
}

// ============================================================================
// API Types
// ============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  correlationId?: string;
}
