// ============================================================================
// STEM Tutor Orchestrator Types
// ============================================================================

import type {
  ClassifiedSubject,
  ErrorKind,
  Intent,
  Logger,
  ResponseMetadata,
  Subject,
} from '@stem-tutor/shared';
import type { SessionStore } from '@stem-tutor/session';
import type { ProviderInvoker } from '@stem-tutor/providers';
import type { IntentClassifier, SubjectClassifier } from '@stem-tutor/classifier';

// ============================================================================
// Requests and Replies
// ============================================================================

/**
 * Inbound student message
 */
export interface TutorRequest {
  studentId: string;
  text: string;
}

/**
 * Answer to the student's active quiz
 */
export interface QuizAnswerRequest {
  studentId: string;
  answer: string;
}

/**
 * Reply returned once the turn has been persisted
 */
export interface TutorReply {
  messageId: string;
  text: string;
  metadata: ResponseMetadata;
  intent: Intent;
  subject: Subject;
  topic?: string;
  degraded: boolean;
}

export interface WelcomeReply {
  text: string;

  /** Whether the student already had turns on record */
  returning: boolean;

  /** True when the fixed greeting was used */
  degraded: boolean;
}

// ============================================================================
// Request Lifecycle
// ============================================================================

export const REQUEST_STATES = [
  'Received',
  'Classified',
  'ProviderSelected',
  'ProviderInvoked',
  'Merged',
  'Persisted',
  'Completed',
  'Failed',
] as const;

export type RequestState = (typeof REQUEST_STATES)[number];

// ============================================================================
// Routing
// ============================================================================

/**
 * What the orchestrator does for a classified message
 */
export type RoutePlan =
  | { kind: 'memory' }
  | { kind: 'explain'; subject: ClassifiedSubject | null; mode: 'explain' | 'chat' }
  | { kind: 'quiz'; subject: ClassifiedSubject }
  | { kind: 'search-explain'; subject: ClassifiedSubject | null };

// ============================================================================
// Configuration
// ============================================================================

/**
 * Retry policy for classification and provider steps
 */
export interface RetryConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  useJitter: boolean;
}

export interface OrchestratorConfig {
  logger: Logger;

  store: SessionStore;
  invoker: ProviderInvoker;
  intentClassifier: IntentClassifier;
  subjectClassifier: SubjectClassifier;

  retry?: Partial<RetryConfig>;

  /** Prior turns passed to providers (default 5) */
  contextTurns?: number;

  /** Turns listed in a memory summary (default 10) */
  memorySummaryTurns?: number;

  /** Quiz length when the message names none (default 5) */
  defaultQuestionCount?: number;

  /** Message ID source (default UUID v4) */
  generateId?: () => string;
}

// ============================================================================
// Events
// ============================================================================

/**
 * Event types emitted by the orchestrator
 */
export type OrchestratorEvent =
  | { type: 'request:transition'; requestId: string; studentId: string; from: RequestState; to: RequestState }
  | { type: 'provider:invoked'; requestId: string; capability: string; durationMs: number; retryCount: number }
  | { type: 'request:degraded'; requestId: string; studentId: string; reason: ErrorKind }
  | { type: 'request:completed'; requestId: string; studentId: string; reply: TutorReply }
  | { type: 'request:failed'; requestId: string; studentId: string; reason: ErrorKind | 'Unexpected'; error: string };
