// ============================================================================
// STEM Tutor Session Types
// ============================================================================

import type { ClassifiedSubject, Logger, NewTurn, Session, Turn } from '@stem-tutor/shared';

/**
 * Export format for session transcripts
 */
export type TranscriptFormat = 'markdown' | 'json';

/**
 * Persistence port for per-student conversation state.
 *
 * Implementations must serialise writes per student and may run writes for
 * different students concurrently.
 */
export interface SessionStore {
  /** Returns a snapshot; creates an empty session on first access */
  getSession(studentId: string): Promise<Session>;

  /** Appends atomically and returns the stamped turn */
  appendTurn(studentId: string, turn: NewTurn): Promise<Turn>;

  /** Applies one quiz outcome and returns the new estimate */
  updateProficiency(studentId: string, subject: ClassifiedSubject, outcome: number): Promise<number>;

  /** Student IDs with a stored session */
  listStudents(): Promise<string[]>;

  exportTranscript(studentId: string, format: TranscriptFormat): Promise<string>;
}

/**
 * Options shared by the store implementations
 */
export interface SessionStoreOptions {
  /** Exponential weighting constant (default 0.3) */
  alpha?: number;

  logger?: Logger;

  /** Clock, injectable for tests */
  now?: () => Date;
}
