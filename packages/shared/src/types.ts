// ============================================================================
// STEM Tutor Shared Types
// Data model used across all tutor packages
// ============================================================================

// ============================================================================
// Classification Tags
// ============================================================================

/**
 * Classified purpose of a student message. Declaration order is the
 * canonical listing order, not the classification order.
 */
export const INTENTS = [
  'ExplainConcept',
  'RequestQuiz',
  'LookupFact',
  'GeneralChat',
  'MemoryQuery',
] as const;

export type Intent = (typeof INTENTS)[number];

/**
 * STEM discipline tag. `Unclassified` is a valid routing outcome.
 */
export const SUBJECTS = ['Math', 'Physics', 'Chemistry', 'Biology', 'Unclassified'] as const;

export type Subject = (typeof SUBJECTS)[number];

/**
 * Subjects that can carry a proficiency estimate
 */
export type ClassifiedSubject = Exclude<Subject, 'Unclassified'>;

export function isIntent(value: unknown): value is Intent {
  return typeof value === 'string' && (INTENTS as readonly string[]).includes(value);
}

export function isSubject(value: unknown): value is Subject {
  return typeof value === 'string' && (SUBJECTS as readonly string[]).includes(value);
}

export function isClassifiedSubject(value: unknown): value is ClassifiedSubject {
  return isSubject(value) && value !== 'Unclassified';
}

// ============================================================================
// Messages & Turns
// ============================================================================

/**
 * An incoming student message. Immutable once created.
 */
export interface Message {
  readonly id: string;
  readonly studentId: string;
  readonly text: string;
  readonly timestamp: Date;
}

/**
 * Search citation attached to a merged response
 */
export interface Citation {
  /** Capability that produced the citation */
  source: string;

  snippet: string;
  title?: string;
  url?: string;
}

export type Difficulty = 'easy' | 'medium' | 'hard';

/**
 * A single quiz question as returned by the quiz generator
 */
export interface QuizItem {
  question: string;
  options?: Record<string, string>;
  answer?: string;
}

/**
 * Quiz state carried on a quiz turn
 */
export interface QuizMetadata {
  subject: ClassifiedSubject;
  topic?: string;
  difficulty: Difficulty;

  /** Proficiency estimate the difficulty was derived from */
  proficiency: number;

  numQuestions: number;
  items: QuizItem[];

  /** Provider-side quiz identifier, echoed back when grading */
  quizId?: string;

  /** Set once the quiz generator reports the quiz finished */
  completed?: boolean;
}

/**
 * Metadata of a response returned to the student and recorded on the turn
 */
export interface ResponseMetadata {
  /** Capabilities that contributed, in invocation order */
  providers: string[];

  citations?: Citation[];
  quiz?: QuizMetadata;

  /** Graded outcome of a quiz answer, in [0,1] */
  quizOutcome?: number;

  degraded: boolean;
  degradedReason?: ErrorKind;
}

export interface TurnResponse {
  text: string;
  metadata: ResponseMetadata;
}

/**
 * One immutable record in a session's history
 */
export interface Turn {
  readonly message: Message;
  readonly intent: Intent;
  readonly subject: Subject;
  readonly topic?: string;
  readonly response: TurnResponse;

  /** Stamped by the session store when the turn is appended */
  readonly timestamp: Date;

  /** Quiz grading outcome in [0,1]; only these turns move proficiency */
  readonly quizOutcome?: number;
}

/**
 * A turn as handed to the store, before it is stamped
 */
export type NewTurn = Omit<Turn, 'timestamp'>;

/**
 * Per-student conversation state
 */
export interface Session {
  studentId: string;
  turns: Turn[];
  proficiency: Partial<Record<ClassifiedSubject, number>>;

  /** Most recent classified subject and topic */
  currentSubject?: ClassifiedSubject;
  currentTopic?: string;

  createdAt: Date;
  lastActiveAt: Date;
}

// ============================================================================
// Capability Providers
// ============================================================================

/**
 * Logical names of the capabilities the core knows how to route to
 */
export const CAPABILITIES = {
  CONCEPT_EXPLAINER: 'concept-explainer',
  QUIZ_GENERATOR: 'quiz-generator',
  WEB_SEARCH: 'web-search',
  INTENT_CLASSIFIER: 'intent-classifier',
  SUBJECT_CLASSIFIER: 'subject-classifier',
} as const;

export type CapabilityName = (typeof CAPABILITIES)[keyof typeof CAPABILITIES];

/**
 * Condensed prior turn passed to providers as context
 */
export interface PriorContextEntry {
  text: string;
  intent: Intent;
  subject: Subject;
  response: string;
}

/**
 * Uniform request sent to any capability provider
 */
export interface ProviderRequest {
  capability: string;
  subject: Subject | null;
  priorContext: PriorContextEntry[];
  payload: Record<string, unknown>;
}

/**
 * Uniform response returned by any capability provider
 */
export interface ProviderResponse {
  text: string;
  metadata: Record<string, unknown>;
}

// ============================================================================
// Errors
// ============================================================================

export const ERROR_KINDS = [
  'InvalidInput',
  'ClassificationUnavailable',
  'AmbiguousRouting',
  'ProviderUnavailable',
  'PersistenceFailure',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger interface for dependency injection
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Logger that discards everything; the default when none is injected
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
